import type { Logger } from 'pino';
import type {
  FetchResult,
  JournalIdentifier,
  JournalRecord,
  MetadataRecord,
  MetadataSource,
  PaperIdentifier,
  PaperRecord,
  RetractionDetails,
  RetractionStatus,
  SubjectIdentifier,
} from '../types.js';
import { normalizeDoi } from '../validation/identifiers.js';
import { toAuthorInfo, type OpenAlexService } from './openalex.service.js';
import { strongerStatus } from './retraction-index.js';
import type { RetractionService } from './retraction.service.js';
import type { OpenAlexLocation, OpenAlexSource, OpenAlexWork } from './schemas.js';
import type { WatchlistService, WatchlistSubject } from './watchlist.service.js';

export interface MetadataServiceOptions {
  openalex: OpenAlexService;
  retractions: RetractionService;
  watchlists: WatchlistService;
  logger: Logger;
}

function uniqueIssns(source: OpenAlexSource): string[] {
  const all = [source.issn_l, ...(source.issn ?? [])].filter(
    (issn): issn is string => typeof issn === 'string' && issn.length > 0
  );
  return [...new Set(all.map((issn) => issn.toUpperCase()))];
}

// Primary location first, then the first location that names a source
function venueLocation(work: OpenAlexWork): OpenAlexLocation | null {
  if (work.primary_location?.source) return work.primary_location;
  return work.locations?.find((l) => l.source) ?? null;
}

/**
 * Assembles normalized records from OpenAlex, retraction sources and the local watchlists.
 */
export class MetadataService implements MetadataSource {
  private readonly openalex: OpenAlexService;
  private readonly retractions: RetractionService;
  private readonly watchlists: WatchlistService;
  private readonly logger: Logger;

  constructor(options: MetadataServiceOptions) {
    this.openalex = options.openalex;
    this.retractions = options.retractions;
    this.watchlists = options.watchlists;
    this.logger = options.logger;
  }

  async fetch(identifier: SubjectIdentifier): Promise<FetchResult<MetadataRecord>> {
    return identifier.kind === 'journal'
      ? this.fetchJournal(identifier)
      : this.fetchPaper(identifier);
  }

  async fetchJournal(identifier: JournalIdentifier): Promise<FetchResult<JournalRecord>> {
    const lookup =
      identifier.by === 'issn'
        ? await this.openalex.findSourceByIssn(identifier.value)
        : await this.openalex.findSourceByName(identifier.value);

    if (lookup.status === 'found') {
      return { status: 'found', record: await this.buildJournalRecord(lookup.data, identifier.value) };
    }

    // A list hit is still a result when OpenAlex does not know the title or cannot be reached
    const listed = this.listedOnlyRecord(identifier);
    if (listed) {
      return { status: 'found', record: listed };
    }

    return lookup;
  }

  async fetchPaper(identifier: PaperIdentifier): Promise<FetchResult<PaperRecord>> {
    const lookup =
      identifier.by === 'doi'
        ? await this.openalex.getWorkByDoi(identifier.value)
        : await this.openalex.findWorkByTitle(identifier.value);

    if (lookup.status !== 'found') {
      return lookup;
    }

    return { status: 'found', record: await this.buildPaperRecord(lookup.data, identifier.value) };
  }

  private async buildJournalRecord(source: OpenAlexSource, identifier: string): Promise<JournalRecord> {
    const sample = await this.openalex.sampleVenueWorks(source.id);
    const issns = uniqueIssns(source);
    const subject: WatchlistSubject = { title: source.display_name, issns };

    let retractionStatus: RetractionStatus | null = null;
    if (sample) {
      retractionStatus = sample.retractedWorks > 0 ? 'retracted' : 'none';
    }

    return {
      kind: 'journal',
      identifier,
      title: source.display_name,
      publisher: source.host_organization_name ?? null,
      isInDoaj: source.is_in_doaj ?? null,
      isIndexedInScopus: source.is_indexed_in_scopus ?? source.is_core ?? null,
      isOpenAccess: source.is_oa ?? null,
      citedByCount: source.cited_by_count ?? null,
      publicationYear: null,
      retractionStatus,
      retractionDetails: null,
      authors: sample ? sample.authors : null,
      issn: source.issn_l?.toUpperCase() ?? issns[0] ?? null,
      openAlexId: source.id,
      homepageUrl: source.homepage_url ?? null,
      countryCode: source.country_code ?? null,
      hostOrganization: source.host_organization_name ?? null,
      worksCount: source.works_count ?? null,
      hIndex: source.summary_stats?.h_index ?? null,
      i10Index: source.summary_stats?.i10_index ?? null,
      twoYearMeanCitedness: source.summary_stats?.['2yr_mean_citedness'] ?? null,
      apcUsd: source.apc_usd ?? null,
      fieldsOfResearch: source.topics?.map((t) => t.display_name) ?? null,
      countsByYear:
        source.counts_by_year?.map((c) => ({
          year: c.year,
          worksCount: c.works_count ?? 0,
          citedByCount: c.cited_by_count ?? 0,
        })) ?? null,
      sampledWorksCount: sample?.sampledWorks ?? null,
      retractedWorksCount: sample?.retractedWorks ?? null,
      listedAsPredatory: this.watchlists.isPredatory(subject),
      listedAsHijacked: this.watchlists.isHijacked(subject),
    };
  }

  /**
   * A record carrying only watchlist flags, for a journal OpenAlex does not know
   */
  private listedOnlyRecord(identifier: JournalIdentifier): JournalRecord | null {
    const subject: WatchlistSubject = {
      title: identifier.value,
      issns: identifier.by === 'issn' ? [identifier.value] : [],
    };
    const listedAsHijacked = this.watchlists.isHijacked(subject);
    const listedAsPredatory = this.watchlists.isPredatory(subject);
    if (!listedAsHijacked && !listedAsPredatory) return null;

    return {
      kind: 'journal',
      identifier: identifier.value,
      title: identifier.value,
      publisher: null,
      isInDoaj: null,
      isIndexedInScopus: null,
      isOpenAccess: null,
      citedByCount: null,
      publicationYear: null,
      retractionStatus: null,
      retractionDetails: null,
      authors: null,
      issn: identifier.by === 'issn' ? identifier.value : null,
      openAlexId: null,
      homepageUrl: null,
      countryCode: null,
      hostOrganization: null,
      worksCount: null,
      hIndex: null,
      i10Index: null,
      twoYearMeanCitedness: null,
      apcUsd: null,
      fieldsOfResearch: null,
      countsByYear: null,
      sampledWorksCount: null,
      retractedWorksCount: null,
      listedAsPredatory,
      listedAsHijacked,
    };
  }

  private async resolveVenue(location: OpenAlexLocation | null): Promise<JournalRecord | null> {
    const source = location?.source;
    if (!source) return null;

    // ISSN-L first, then the OpenAlex source id
    if (source.issn_l) {
      const byIssn = await this.fetchJournal({ kind: 'journal', by: 'issn', value: source.issn_l.toUpperCase() });
      if (byIssn.status === 'found') return byIssn.record;
    }

    const byId = await this.openalex.getSource(source.id);
    if (byId.status === 'found') {
      return this.buildJournalRecord(byId.data, source.issn_l ?? source.id);
    }

    this.logger.warn({ sourceId: source.id }, 'Could not resolve venue for paper');
    return null;
  }

  private async resolveRetraction(
    work: OpenAlexWork,
    doi: string | null
  ): Promise<{ status: RetractionStatus | null; details: RetractionDetails | null }> {
    let status: RetractionStatus | null = null;
    let details: RetractionDetails | null = null;

    if (work.is_retracted === true) {
      status = 'retracted';
      details = {
        recordId: null,
        title: work.title ?? work.display_name ?? null,
        journal: venueLocation(work)?.source?.display_name ?? null,
        publisher: null,
        authors: (work.authorships ?? []).map((a) => toAuthorInfo(a).name),
        retractionDate: null,
        retractionNature: 'Retraction',
        reason: [],
        retractionNoticeUrl: null,
        originalPaperDate: work.publication_date ?? null,
        source: 'openalex',
      };
    } else if (work.is_retracted === false) {
      status = 'none';
    }

    if (!doi) {
      return { status, details };
    }

    const checked = await this.retractions.check(doi);
    if (checked.status === null) {
      return { status, details };
    }

    const current = status ?? 'none';
    if (strongerStatus(current, checked.status) !== current || (checked.status === current && !details)) {
      return { status: checked.status, details: checked.details ?? details };
    }
    return { status: current, details };
  }

  private async buildPaperRecord(work: OpenAlexWork, identifier: string): Promise<PaperRecord> {
    const location = venueLocation(work);
    const doi = work.doi ? normalizeDoi(work.doi) : null;

    const [venue, retraction] = await Promise.all([
      this.resolveVenue(location),
      this.resolveRetraction(work, doi),
    ]);

    return {
      kind: 'paper',
      identifier,
      title: work.title ?? work.display_name ?? identifier,
      publisher: venue?.publisher ?? location?.source?.host_organization_name ?? null,
      isInDoaj: venue?.isInDoaj ?? location?.source?.is_in_doaj ?? null,
      isIndexedInScopus: venue?.isIndexedInScopus ?? null,
      isOpenAccess: work.open_access?.is_oa ?? location?.is_oa ?? null,
      citedByCount: work.cited_by_count ?? null,
      publicationYear: work.publication_year ?? null,
      retractionStatus: retraction.status,
      retractionDetails: retraction.details,
      authors: work.authorships ? work.authorships.map(toAuthorInfo) : null,
      doi,
      openAlexId: work.id,
      publicationDate: work.publication_date ?? null,
      language: work.language ?? null,
      referencedWorksCount: work.referenced_works_count ?? null,
      venue,
    };
  }
}
