import type { Logger } from 'pino';
import type { RetractionCheckResponse, RetractionDetails, RetractionStatus } from '../types.js';
import { normalizeDoi } from '../validation/identifiers.js';
import { CrossRefService } from './crossref.service.js';
import {
  retractionNatureToStatus,
  strongerStatus,
  type RetractionIndex,
} from './retraction-index.js';
import type { CrossRefUpdate, CrossRefWork } from './schemas.js';

export interface RetractionServiceOptions {
  crossref: CrossRefService;
  /** Local Retraction Watch export; null when none is configured */
  index: RetractionIndex | null;
  logger: Logger;
}

function noticeStatus(update: CrossRefUpdate): RetractionStatus {
  switch (update.type.toLowerCase().replace(/_/g, '-')) {
    case 'retraction':
    case 'withdrawal':
    case 'removal':
      return 'retracted';
    case 'expression-of-concern':
      return 'concern';
    default:
      return 'none';
  }
}

export class RetractionService {
  private readonly crossref: CrossRefService;
  private readonly index: RetractionIndex | null;
  private readonly logger: Logger;

  constructor(options: RetractionServiceOptions) {
    this.crossref = options.crossref;
    this.index = options.index;
    this.logger = options.logger;
  }

  /**
   * Number of DOIs in the local index, or null when no index is loaded
   */
  get indexSize(): number | null {
    return this.index ? this.index.size : null;
  }

  /**
   * Check a DOI against Crossref editorial notices (which include Retraction Watch data),
   * then against the local Retraction Watch export. The most severe status wins. The status
   * is null when Crossref cannot be reached and no index is loaded.
   */
  async check(doi: string): Promise<RetractionCheckResponse> {
    const normalizedDoi = normalizeDoi(doi);
    const fromCrossRef = await this.checkViaCrossRef(normalizedDoi);
    if (!this.index) {
      return fromCrossRef;
    }

    const fromIndex = this.checkLocal(normalizedDoi);
    if (fromCrossRef.status === null || strongerStatus(fromCrossRef.status, fromIndex.status) !== fromCrossRef.status) {
      return fromIndex;
    }
    return fromCrossRef;
  }

  /**
   * Check if a DOI has a retraction or expression of concern registered with Crossref
   */
  async checkViaCrossRef(doi: string): Promise<RetractionCheckResponse> {
    const result = await this.crossref.getWork(doi);

    if (result.status === 'error') {
      this.logger.warn({ doi, error: result.message }, 'Crossref retraction check failed');
      return { status: null };
    }
    if (result.status === 'not_found') {
      return { status: 'none' };
    }

    let strongest: { status: RetractionStatus; update: CrossRefUpdate } | null = null;
    for (const update of CrossRefService.notices(result.data)) {
      const status = noticeStatus(update);
      if (status === 'none') continue;
      if (!strongest || strongerStatus(strongest.status, status) !== strongest.status) {
        strongest = { status, update };
      }
    }

    if (!strongest) {
      return { status: 'none' };
    }

    return {
      status: strongest.status,
      details: this.formatCrossRefDetails(result.data, strongest.update, strongest.status),
    };
  }

  /**
   * Check a DOI against the local Retraction Watch export
   */
  checkLocal(doi: string): RetractionCheckResponse & { status: RetractionStatus } {
    const details = this.index?.lookup(doi) ?? null;
    if (!details) {
      return { status: 'none' };
    }

    const status = retractionNatureToStatus(details.retractionNature);
    return status === 'none' ? { status } : { status, details };
  }

  private formatCrossRefDetails(
    work: CrossRefWork,
    update: CrossRefUpdate,
    status: RetractionStatus
  ): RetractionDetails {
    return {
      recordId: null, // Crossref doesn't carry the Retraction Watch record ID
      title: work.title?.[0] || null,
      journal: work['container-title']?.[0] || null,
      publisher: work.publisher || null,
      authors:
        work.author?.map((a) => a.name || `${a.given || ''} ${a.family || ''}`.trim()) ?? [],
      retractionDate: update.updated?.['date-time'] || null,
      retractionNature: status === 'retracted' ? 'Retraction' : 'Expression of Concern',
      reason: [], // Crossref doesn't include detailed reasons
      retractionNoticeUrl: update.DOI ? `https://doi.org/${update.DOI}` : null,
      originalPaperDate: work.created?.['date-time'] || null,
      source: update.source === 'retraction-watch' ? 'retraction-watch' : 'publisher',
    };
  }
}
