import type { FastifyInstance } from 'fastify';
import { VERSION } from '../config.js';
import type { AssessmentService } from '../services/assessment.service.js';
import type { RetractionService } from '../services/retraction.service.js';
import type { WatchlistService } from '../services/watchlist.service.js';

export interface HealthRoutesOptions {
  retractions: RetractionService;
  watchlists: WatchlistService;
  assessment: AssessmentService;
}

export async function healthRoutes(app: FastifyInstance, options: HealthRoutesOptions) {
  app.get('/health', async () => {
    const records = options.retractions.indexSize;

    return {
      status: 'healthy',
      timestamp: new Date().toISOString(),
      version: VERSION,
      sources: {
        retractionIndex: {
          loaded: records !== null,
          records: records ?? 0,
        },
        watchlists: options.watchlists.counts(),
        rationale: {
          configured: options.assessment.rationaleConfigured,
        },
      },
    };
  });
}
