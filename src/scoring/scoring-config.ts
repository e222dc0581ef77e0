import { readFile } from 'node:fs/promises';
import { z } from 'zod';
import { ConfigError } from '../errors.js';
import type { CheckId } from '../types.js';

export interface ScoreBands {
  /** Lowest score still banded "trusted" */
  trusted: number;
  /** Lowest score still banded "questionable"; anything below is "predatory" */
  questionable: number;
}

export interface ScoringThresholds {
  maxCitationsPerYear: number;
  uncitedMinAgeYears: number;
  maxRetractionRate: number;
  maxRetractedWorks: number;
  highOutputWorksPerYear: number;
  lowImpactHIndex: number;
  apcMinUsd: number;
  apcMaxUsd: number;
  maxShareWithoutOrcid: number;
  maxVolumeChange: number;
  volumeChangeMinWorks: number;
}

export interface ScoringConfig {
  baseline: number;
  weights: Record<CheckId, number>;
  bands: ScoreBands;
  thresholds: ScoringThresholds;
}

export const DEFAULT_SCORING_CONFIG: ScoringConfig = {
  baseline: 100,
  weights: {
    'hijacked-identifier': 100,
    'predatory-list': 50,
    'not-indexed': 25,
    'open-access-outside-doaj': 15,
    'retraction-on-record': 40,
    'high-retraction-rate': 20,
    'citation-anomaly': 15,
    'uncited-with-age': 10,
    'output-impact-mismatch': 15,
    'suspicious-fees': 10,
    'missing-orcid': 10,
    'publication-spike': 10,
  },
  bands: {
    trusted: 80,
    questionable: 50,
  },
  thresholds: {
    maxCitationsPerYear: 500,
    uncitedMinAgeYears: 5,
    maxRetractionRate: 0.01,
    maxRetractedWorks: 5,
    highOutputWorksPerYear: 500,
    lowImpactHIndex: 10,
    apcMinUsd: 200,
    apcMaxUsd: 3000,
    maxShareWithoutOrcid: 0.5,
    maxVolumeChange: 0.5,
    volumeChangeMinWorks: 20,
  },
};

const weight = z.number().int().min(0).max(100);
const score = z.number().min(0).max(100);
const nonNegative = z.number().min(0);
const share = z.number().min(0).max(1);

const ScoringOverridesSchema = z
  .object({
    weights: z
      .object({
        'hijacked-identifier': weight,
        'predatory-list': weight,
        'not-indexed': weight,
        'open-access-outside-doaj': weight,
        'retraction-on-record': weight,
        'high-retraction-rate': weight,
        'citation-anomaly': weight,
        'uncited-with-age': weight,
        'output-impact-mismatch': weight,
        'suspicious-fees': weight,
        'missing-orcid': weight,
        'publication-spike': weight,
      })
      .partial()
      .strict(),
    bands: z.object({ trusted: score, questionable: score }).partial().strict(),
    thresholds: z
      .object({
        maxCitationsPerYear: nonNegative,
        uncitedMinAgeYears: nonNegative,
        maxRetractionRate: share,
        maxRetractedWorks: nonNegative,
        highOutputWorksPerYear: nonNegative,
        lowImpactHIndex: nonNegative,
        apcMinUsd: nonNegative,
        apcMaxUsd: nonNegative,
        maxShareWithoutOrcid: share,
        maxVolumeChange: nonNegative,
        volumeChangeMinWorks: nonNegative,
      })
      .partial()
      .strict(),
  })
  .partial()
  .strict();

export type ScoringOverrides = z.infer<typeof ScoringOverridesSchema>;

/**
 * Merge deployment overrides onto the defaults. Throws ConfigError on anything invalid.
 */
export function resolveScoringConfig(overrides: unknown = {}): ScoringConfig {
  const parsed = ScoringOverridesSchema.safeParse(overrides);
  if (!parsed.success) {
    const issue = parsed.error.issues[0];
    const path = issue.path.length > 0 ? issue.path.join('.') : '(root)';
    throw new ConfigError(`Invalid scoring configuration at ${path}: ${issue.message}`);
  }

  const config: ScoringConfig = {
    baseline: DEFAULT_SCORING_CONFIG.baseline,
    weights: { ...DEFAULT_SCORING_CONFIG.weights, ...parsed.data.weights },
    bands: { ...DEFAULT_SCORING_CONFIG.bands, ...parsed.data.bands },
    thresholds: { ...DEFAULT_SCORING_CONFIG.thresholds, ...parsed.data.thresholds },
  };

  if (config.bands.questionable >= config.bands.trusted) {
    throw new ConfigError(
      `Invalid scoring configuration: questionable threshold (${config.bands.questionable}) must be below trusted threshold (${config.bands.trusted})`
    );
  }

  if (config.thresholds.apcMinUsd > config.thresholds.apcMaxUsd) {
    throw new ConfigError('Invalid scoring configuration: apcMinUsd must not exceed apcMaxUsd');
  }

  return config;
}

/**
 * Read a JSON overrides file, or return the defaults when no path is configured.
 */
export async function loadScoringConfig(path: string | null): Promise<ScoringConfig> {
  if (!path) {
    return resolveScoringConfig();
  }

  let raw: string;
  try {
    raw = await readFile(path, 'utf8');
  } catch (error) {
    throw new ConfigError(
      `Cannot read scoring configuration ${path}: ${error instanceof Error ? error.message : 'Unknown error'}`
    );
  }

  let overrides: unknown;
  try {
    overrides = JSON.parse(raw);
  } catch {
    throw new ConfigError(`Scoring configuration ${path} is not valid JSON`);
  }

  return resolveScoringConfig(overrides);
}
