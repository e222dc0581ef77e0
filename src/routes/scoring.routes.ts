import type { FastifyInstance } from 'fastify';
import type { RuleEngine } from '../scoring/rule-engine.js';

export interface ScoringRoutesOptions {
  engine: RuleEngine;
}

export async function scoringRoutes(app: FastifyInstance, options: ScoringRoutesOptions) {
  // Active weights, bands and thresholds, so clients can see how a score was reached
  app.get('/scoring', async () => {
    const { baseline, weights, bands, thresholds } = options.engine.config;
    return {
      baseline,
      weights,
      bands,
      thresholds,
      checks: options.engine.describeChecks(),
    };
  });
}
