import type { JsonHttpClient, LookupResult } from './http.js';
import { CrossRefWorkSchema, type CrossRefUpdate, type CrossRefWork } from './schemas.js';

const CROSSREF_BASE_URL = 'https://api.crossref.org';

export interface CrossRefServiceOptions {
  http: JsonHttpClient;
  baseUrl?: string;
}

export class CrossRefService {
  private readonly http: JsonHttpClient;
  private readonly baseUrl: string;

  constructor(options: CrossRefServiceOptions) {
    this.http = options.http;
    this.baseUrl = options.baseUrl ?? CROSSREF_BASE_URL;
  }

  /**
   * Get work metadata by DOI
   * Returns a result object that distinguishes found/not_found/error
   */
  async getWork(doi: string): Promise<LookupResult<CrossRefWork>> {
    const result = await this.http.getParsed(
      `${this.baseUrl}/works/${encodeURIComponent(doi)}`,
      CrossRefWorkSchema
    );
    if (result.status !== 'found') return result;

    return { status: 'found', data: result.data.message };
  }

  /**
   * Editorial notices attached to a work.
   * Crossref puts them in `updated-by` on the original; older deposits use `update-to`.
   */
  static notices(work: CrossRefWork): CrossRefUpdate[] {
    return [...(work['updated-by'] ?? []), ...(work['update-to'] ?? [])];
  }
}
