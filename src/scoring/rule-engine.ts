import type {
  CheckId,
  CheckResult,
  EvaluationResult,
  JournalRecord,
  MetadataRecord,
  ScoreBand,
  SubjectKind,
} from '../types.js';
import { RULE_CHECKS, type CheckContext, type RuleCheck } from './checks.js';
import { DEFAULT_SCORING_CONFIG, type ScoringConfig } from './scoring-config.js';

export interface CheckDescriptor {
  id: CheckId;
  name: string;
  appliesTo: readonly SubjectKind[];
  weight: number;
}

export interface RuleEngineOptions {
  config?: ScoringConfig;
  /** Clock for age-based checks */
  now?: () => Date;
  checks?: readonly RuleCheck[];
}

function clamp(value: number, min: number, max: number): number {
  return Math.max(min, Math.min(max, value));
}

function venueOf(record: MetadataRecord): JournalRecord | null {
  return record.kind === 'journal' ? record : record.venue;
}

/**
 * Scores a metadata record against the rule checks.
 * Pure: the same record, config and clock always give the same result.
 */
export class RuleEngine {
  readonly config: ScoringConfig;
  private readonly now: () => Date;
  private readonly checks: readonly RuleCheck[];

  constructor(options: RuleEngineOptions = {}) {
    this.config = options.config ?? DEFAULT_SCORING_CONFIG;
    this.now = options.now ?? (() => new Date());
    this.checks = options.checks ?? RULE_CHECKS;
  }

  /**
   * The checks this engine runs, with their active weights
   */
  describeChecks(): CheckDescriptor[] {
    return this.checks.map((check) => ({
      id: check.id,
      name: check.name,
      appliesTo: check.appliesTo,
      weight: this.config.weights[check.id],
    }));
  }

  evaluate(record: MetadataRecord): EvaluationResult {
    const context: CheckContext = {
      record,
      venue: venueOf(record),
      thresholds: this.config.thresholds,
      currentYear: this.now().getFullYear(),
    };

    const checks = this.checks
      .filter((check) => check.appliesTo.includes(record.kind))
      .map((check) => this.runCheck(check, context));

    const evaluatedChecks = checks.filter((c) => c.outcome !== 'insufficient-data').length;
    if (evaluatedChecks === 0) {
      return { status: 'insufficient_data', checks };
    }

    const totalPenalty = checks.reduce((sum, c) => sum + c.penalty, 0);
    const score = clamp(this.config.baseline - totalPenalty, 0, 100);

    return {
      status: 'scored',
      report: {
        kind: record.kind,
        identifier: record.identifier,
        title: record.title,
        score,
        band: this.band(score),
        reasons: checks
          .filter((c) => c.outcome === 'triggered')
          .map((c) => c.reason ?? c.name),
        checks,
        evaluatedChecks,
        applicableChecks: checks.length,
        reducedConfidence: evaluatedChecks * 2 < checks.length,
      },
    };
  }

  band(score: number): ScoreBand {
    if (score >= this.config.bands.trusted) return 'trusted';
    if (score >= this.config.bands.questionable) return 'questionable';
    return 'predatory';
  }

  private runCheck(check: RuleCheck, context: CheckContext): CheckResult {
    const evaluation = check.evaluate(context);

    if (evaluation.outcome === 'triggered') {
      const severity = clamp(evaluation.severity, 0, 1);
      return {
        id: check.id,
        name: check.name,
        outcome: 'triggered',
        severity,
        penalty: Math.round(this.config.weights[check.id] * severity),
        reason: `${check.name}: ${evaluation.detail}`,
      };
    }

    return {
      id: check.id,
      name: check.name,
      outcome: evaluation.outcome,
      severity: 0,
      penalty: 0,
      reason: evaluation.outcome === 'insufficient-data' ? `${check.name}: insufficient data` : null,
    };
  }
}
