export const VERSION = '0.1.0';

export interface AppConfig {
  port: number;
  host: string;
  logLevel: string;
  rateLimit: {
    max: number;
    timeWindowMs: number;
  };
  contactEmail: string;
  userAgent: string;
  fetchTimeoutMs: number;
  anthropic: {
    apiKey: string | null;
    model: string;
  };
  retractionWatchCsv: string | null;
  predatoryListCsv: string | null;
  hijackedIssnList: string | null;
  hijackedTitleList: string | null;
  scoringConfigPath: string | null;
}

type Env = Record<string, string | undefined>;

function intFromEnv(value: string | undefined, fallback: number, min = 0): number {
  const parsed = parseInt(value ?? '', 10);
  return Number.isNaN(parsed) || parsed < min ? fallback : parsed;
}

/**
 * Unset falls back to the default path; an empty value turns the file off
 */
function pathFromEnv(value: string | undefined, fallback: string | null): string | null {
  if (value === undefined) return fallback;
  const trimmed = value.trim();
  return trimmed.length > 0 ? trimmed : null;
}

export function loadConfig(env: Env = process.env): AppConfig {
  const contactEmail = env.CONTACT_EMAIL?.trim() || 'contact@example.org';

  return {
    port: intFromEnv(env.PORT, 3000),
    host: env.HOST || '0.0.0.0',
    logLevel: env.LOG_LEVEL || 'info',
    rateLimit: {
      max: intFromEnv(env.RATE_LIMIT_MAX, 100, 1),
      timeWindowMs: intFromEnv(env.RATE_LIMIT_WINDOW_MS, 60000, 1),
    },
    contactEmail,
    userAgent: `ScholarlyTrust/${VERSION} (mailto:${contactEmail})`,
    fetchTimeoutMs: intFromEnv(env.FETCH_TIMEOUT_MS, 10000, 1),
    anthropic: {
      apiKey: env.ANTHROPIC_API_KEY?.trim() || null,
      model: env.ANTHROPIC_MODEL || 'claude-3-5-sonnet-latest',
    },
    retractionWatchCsv: pathFromEnv(env.RETRACTION_WATCH_CSV, null),
    predatoryListCsv: pathFromEnv(env.PREDATORY_LIST_CSV, 'data/predatory-journals.csv'),
    hijackedIssnList: pathFromEnv(env.HIJACKED_ISSN_LIST, 'data/hijacked-issn.txt'),
    hijackedTitleList: pathFromEnv(env.HIJACKED_TITLE_LIST, 'data/hijacked-journal-titles.txt'),
    scoringConfigPath: pathFromEnv(env.SCORING_CONFIG, null),
  };
}
