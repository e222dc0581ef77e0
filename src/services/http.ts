import type { Logger } from 'pino';
import type { ZodType, ZodTypeDef } from 'zod';

// Lookup result - distinguishes found/not_found/error
export type LookupResult<T> =
  | { status: 'found'; data: T }
  | { status: 'not_found' }
  | { status: 'error'; message: string };

export interface JsonHttpClientOptions {
  userAgent: string;
  timeoutMs: number;
  logger: Logger;
  /** Extra attempts after the first one for network errors, timeouts, 429 and 5xx */
  retries?: number;
}

function isTransientStatus(status: number): boolean {
  return status === 429 || status >= 500;
}

export class JsonHttpClient {
  private readonly retries: number;

  constructor(private readonly options: JsonHttpClientOptions) {
    this.retries = options.retries ?? 1;
  }

  private get headers(): Record<string, string> {
    return {
      Accept: 'application/json',
      'User-Agent': this.options.userAgent,
    };
  }

  /**
   * GET a JSON document.
   * 404 is a definitive "not found"; everything else that fails after the retry is an error.
   */
  async get(url: string): Promise<LookupResult<unknown>> {
    let lastError = 'Unknown error';

    for (let attempt = 0; attempt <= this.retries; attempt++) {
      if (attempt > 0) {
        this.options.logger.warn({ url, attempt, error: lastError }, 'Retrying request');
      }

      const controller = new AbortController();
      const timeoutId = setTimeout(() => controller.abort(), this.options.timeoutMs);

      try {
        const response = await fetch(url, {
          headers: this.headers,
          signal: controller.signal,
        });

        if (response.status === 404) {
          return { status: 'not_found' };
        }

        if (response.ok) {
          const data: unknown = await response.json();
          return { status: 'found', data };
        }

        lastError = `HTTP ${response.status}`;
        if (!isTransientStatus(response.status)) {
          break;
        }
      } catch (error) {
        // Network/timeout errors
        lastError = error instanceof Error ? error.message : 'Unknown error';
      } finally {
        clearTimeout(timeoutId);
      }
    }

    this.options.logger.warn({ url, error: lastError }, 'Request failed');
    return { status: 'error', message: lastError };
  }

  /**
   * GET a JSON document and validate it against a schema.
   */
  async getParsed<T>(url: string, schema: ZodType<T, ZodTypeDef, unknown>): Promise<LookupResult<T>> {
    const result = await this.get(url);
    if (result.status !== 'found') {
      return result;
    }

    const parsed = schema.safeParse(result.data);
    if (!parsed.success) {
      this.options.logger.warn(
        { url, issues: parsed.error.issues.slice(0, 3) },
        'Unexpected response shape'
      );
      return { status: 'error', message: 'Unexpected response shape' };
    }

    return { status: 'found', data: parsed.data };
  }
}
