import type { Logger } from 'pino';
import type { RuleEngine } from '../scoring/rule-engine.js';
import type {
  AssessmentOutcome,
  AssessOptions,
  MetadataSource,
  RationaleGenerator,
  SubjectIdentifier,
  SubjectKind,
} from '../types.js';

export interface AssessmentServiceOptions {
  source: MetadataSource;
  engine: RuleEngine;
  /** null when no model is configured */
  rationale: RationaleGenerator | null;
  logger: Logger;
}

export function notFoundMessage(kind: SubjectKind): string {
  return `Could not retrieve metadata: no trusted scholarly source lists this ${kind}.`;
}

export const FETCH_ERROR_MESSAGE = 'Could not retrieve metadata: the metadata provider is unreachable.';

export function insufficientDataMessage(kind: SubjectKind): string {
  return `Insufficient data to score this ${kind}.`;
}

/**
 * Fetch, score and optionally explain one journal or paper
 */
export class AssessmentService {
  private readonly source: MetadataSource;
  private readonly engine: RuleEngine;
  private readonly rationale: RationaleGenerator | null;
  private readonly logger: Logger;

  constructor(options: AssessmentServiceOptions) {
    this.source = options.source;
    this.engine = options.engine;
    this.rationale = options.rationale;
    this.logger = options.logger;
  }

  get rationaleConfigured(): boolean {
    return this.rationale !== null;
  }

  async assess(identifier: SubjectIdentifier, options: AssessOptions = {}): Promise<AssessmentOutcome> {
    const fetched = await this.source.fetch(identifier);

    if (fetched.status === 'not_found') {
      return { status: 'not_found', message: notFoundMessage(identifier.kind) };
    }
    if (fetched.status === 'error') {
      this.logger.warn({ identifier, error: fetched.message }, 'Metadata fetch failed');
      return { status: 'fetch_error', message: FETCH_ERROR_MESSAGE };
    }

    const evaluation = this.engine.evaluate(fetched.record);
    if (evaluation.status === 'insufficient_data') {
      return {
        status: 'insufficient_data',
        message: insufficientDataMessage(identifier.kind),
        checks: evaluation.checks,
      };
    }

    const { report } = evaluation;
    if (!options.rationale || !this.rationale) {
      return { status: 'scored', report, rationale: null };
    }

    try {
      const rationale = await this.rationale.generate(fetched.record, report);
      return { status: 'scored', report, rationale };
    } catch (error) {
      const message = error instanceof Error ? error.message : 'Unknown error';
      this.logger.error({ identifier, err: error }, 'Rationale generation failed');
      return { status: 'scored', report, rationale: null, rationaleError: message };
    }
  }
}
