/**
 * Dependency wiring.
 * Loads the local data files once and constructs the services around them.
 */

import type { Logger } from 'pino';
import type { AppConfig } from './config.js';
import { RuleEngine } from './scoring/rule-engine.js';
import { loadScoringConfig } from './scoring/scoring-config.js';
import { AssessmentService } from './services/assessment.service.js';
import { CrossRefService } from './services/crossref.service.js';
import { JsonHttpClient } from './services/http.js';
import { MetadataService } from './services/metadata.service.js';
import { OpenAlexService } from './services/openalex.service.js';
import { AnthropicRationaleGenerator } from './services/rationale.service.js';
import { RetractionIndex } from './services/retraction-index.js';
import { RetractionService } from './services/retraction.service.js';
import { WatchlistService } from './services/watchlist.service.js';

export interface Container {
  assessment: AssessmentService;
  engine: RuleEngine;
  retractions: RetractionService;
  watchlists: WatchlistService;
}

async function loadRetractionIndex(path: string | null, logger: Logger): Promise<RetractionIndex | null> {
  if (!path) {
    logger.info('No Retraction Watch export configured; using Crossref notices only');
    return null;
  }

  try {
    const index = await RetractionIndex.fromCsv(path);
    logger.info({ path, records: index.size }, 'Loaded Retraction Watch export');
    return index;
  } catch (error) {
    logger.error({ path, err: error }, 'Could not load Retraction Watch export; using Crossref notices only');
    return null;
  }
}

/**
 * Throws ConfigError when the scoring configuration is invalid
 */
export async function createContainer(config: AppConfig, logger: Logger): Promise<Container> {
  const [engineConfig, index, watchlists] = await Promise.all([
    loadScoringConfig(config.scoringConfigPath),
    loadRetractionIndex(config.retractionWatchCsv, logger.child({ service: 'retraction-index' })),
    WatchlistService.load(
      {
        predatoryCsv: config.predatoryListCsv,
        hijackedIssns: config.hijackedIssnList,
        hijackedTitles: config.hijackedTitleList,
      },
      logger.child({ service: 'watchlists' })
    ),
  ]);

  const http = new JsonHttpClient({
    userAgent: config.userAgent,
    timeoutMs: config.fetchTimeoutMs,
    logger: logger.child({ service: 'http' }),
  });

  const openalex = new OpenAlexService({ http, email: config.contactEmail });
  const crossref = new CrossRefService({ http });
  const retractions = new RetractionService({
    crossref,
    index,
    logger: logger.child({ service: 'retractions' }),
  });

  const metadata = new MetadataService({
    openalex,
    retractions,
    watchlists,
    logger: logger.child({ service: 'metadata' }),
  });

  const engine = new RuleEngine({ config: engineConfig });

  const rationale = config.anthropic.apiKey
    ? new AnthropicRationaleGenerator({ apiKey: config.anthropic.apiKey, model: config.anthropic.model })
    : null;

  const assessment = new AssessmentService({
    source: metadata,
    engine,
    rationale,
    logger: logger.child({ service: 'assessment' }),
  });

  return { assessment, engine, retractions, watchlists };
}
