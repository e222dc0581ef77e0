import { stringSimilarity } from 'string-similarity-js';
import type { AuthorInfo } from '../types.js';
import type { JsonHttpClient, LookupResult } from './http.js';
import {
  OpenAlexSampledWorkListSchema,
  OpenAlexSourceListSchema,
  OpenAlexSourceSchema,
  OpenAlexWorkListSchema,
  OpenAlexWorkSchema,
  type OpenAlexAuthorship,
  type OpenAlexSource,
  type OpenAlexWork,
} from './schemas.js';

const OPENALEX_BASE_URL = 'https://api.openalex.org';

// Minimum similarity for a title search hit to count as the requested paper
const TITLE_MATCH_THRESHOLD = 0.9;

export interface OpenAlexServiceOptions {
  http: JsonHttpClient;
  email: string;
  baseUrl?: string;
  /** Works fetched per venue to estimate retraction rate and author ORCID coverage */
  sampleSize?: number;
}

export interface VenueSample {
  sampledWorks: number;
  retractedWorks: number;
  authors: AuthorInfo[];
}

/**
 * Strip the https://openalex.org/ prefix from an entity id
 */
export function shortOpenAlexId(id: string): string {
  return id.replace(/^https?:\/\/openalex\.org\//i, '');
}

export function toAuthorInfo(authorship: OpenAlexAuthorship): AuthorInfo {
  return {
    name: authorship.author?.display_name || 'Unknown',
    hasOrcid: Boolean(authorship.author?.orcid),
    affiliation: authorship.institutions?.[0]?.display_name || null,
  };
}

export class OpenAlexService {
  private readonly http: JsonHttpClient;
  private readonly email: string;
  private readonly baseUrl: string;
  private readonly sampleSize: number;

  constructor(options: OpenAlexServiceOptions) {
    this.http = options.http;
    this.email = options.email;
    this.baseUrl = options.baseUrl ?? OPENALEX_BASE_URL;
    this.sampleSize = options.sampleSize ?? 200;
  }

  private url(path: string, params: Record<string, string> = {}): string {
    const query = Object.entries({ ...params, mailto: this.email })
      .map(([key, value]) => `${key}=${encodeURIComponent(value)}`)
      .join('&');
    return `${this.baseUrl}${path}?${query}`;
  }

  /**
   * Find a journal (source) by ISSN
   */
  async findSourceByIssn(issn: string): Promise<LookupResult<OpenAlexSource>> {
    const result = await this.http.getParsed(
      this.url('/sources', { filter: `issn:${issn}` }),
      OpenAlexSourceListSchema
    );
    if (result.status !== 'found') return result;

    const [source] = result.data.results;
    return source ? { status: 'found', data: source } : { status: 'not_found' };
  }

  /**
   * Find a journal (source) by name.
   * Only an exact, case-insensitive name match counts.
   */
  async findSourceByName(name: string): Promise<LookupResult<OpenAlexSource>> {
    const result = await this.http.getParsed(
      this.url('/sources', { search: `"${name}"` }),
      OpenAlexSourceListSchema
    );
    if (result.status !== 'found') return result;

    const wanted = name.trim().toLowerCase();
    const source = result.data.results.find((s) => s.display_name.trim().toLowerCase() === wanted);
    return source ? { status: 'found', data: source } : { status: 'not_found' };
  }

  /**
   * Get a journal (source) by OpenAlex id
   */
  async getSource(id: string): Promise<LookupResult<OpenAlexSource>> {
    return this.http.getParsed(
      this.url(`/sources/${encodeURIComponent(shortOpenAlexId(id))}`),
      OpenAlexSourceSchema
    );
  }

  /**
   * Sample a venue's recent works for retraction and ORCID statistics.
   * Returns null when the sample cannot be fetched; the caller treats that as unknown.
   */
  async sampleVenueWorks(sourceId: string): Promise<VenueSample | null> {
    const result = await this.http.getParsed(
      this.url('/works', {
        filter: `primary_location.source.id:${shortOpenAlexId(sourceId)}`,
        sort: 'publication_date:desc',
        'per-page': String(this.sampleSize),
      }),
      OpenAlexSampledWorkListSchema
    );

    if (result.status === 'not_found') {
      return { sampledWorks: 0, retractedWorks: 0, authors: [] };
    }
    if (result.status === 'error') {
      return null;
    }

    const works = result.data.results;
    return {
      sampledWorks: works.length,
      retractedWorks: works.filter((w) => w.is_retracted === true).length,
      authors: works.flatMap((w) => (w.authorships ?? []).map(toAuthorInfo)),
    };
  }

  /**
   * Get work metadata by DOI
   */
  async getWorkByDoi(doi: string): Promise<LookupResult<OpenAlexWork>> {
    return this.http.getParsed(
      this.url(`/works/doi:${encodeURIComponent(doi)}`),
      OpenAlexWorkSchema
    );
  }

  /**
   * Find a work by title; the closest hit must be a near-exact match
   */
  async findWorkByTitle(title: string): Promise<LookupResult<OpenAlexWork>> {
    const result = await this.http.getParsed(
      this.url('/works', { filter: `title.search:${title.replace(/,/g, ' ')}`, 'per-page': '10' }),
      OpenAlexWorkListSchema
    );
    if (result.status !== 'found') return result;

    const wanted = title.toLowerCase();
    let bestMatch: { work: OpenAlexWork; score: number } | null = null;

    for (const work of result.data.results) {
      const candidate = work.title ?? work.display_name;
      if (!candidate) continue;

      const score = stringSimilarity(wanted, candidate.toLowerCase());
      if (!bestMatch || score > bestMatch.score) {
        bestMatch = { work, score };
      }
    }

    return bestMatch && bestMatch.score >= TITLE_MATCH_THRESHOLD
      ? { status: 'found', data: bestMatch.work }
      : { status: 'not_found' };
  }
}
