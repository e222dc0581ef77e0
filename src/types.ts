// Identifier types
export type SubjectKind = 'journal' | 'paper';

export type JournalIdentifier =
  | { kind: 'journal'; by: 'issn'; value: string }
  | { kind: 'journal'; by: 'name'; value: string };

export type PaperIdentifier =
  | { kind: 'paper'; by: 'doi'; value: string }
  | { kind: 'paper'; by: 'title'; value: string };

export type SubjectIdentifier = JournalIdentifier | PaperIdentifier;

// Retraction types
export type RetractionStatus = 'none' | 'retracted' | 'concern';

export interface RetractionDetails {
  recordId: number | null;
  title: string | null;
  journal: string | null;
  publisher: string | null;
  authors: string[];
  retractionDate: string | null;
  retractionNature: string | null;
  reason: string[];
  retractionNoticeUrl: string | null;
  originalPaperDate: string | null;
  source: 'publisher' | 'retraction-watch' | 'openalex';
}

export interface RetractionCheckResponse {
  /** null when no source could answer */
  status: RetractionStatus | null;
  details?: RetractionDetails;
}

// Metadata record types
export interface AuthorInfo {
  name: string;
  hasOrcid: boolean;
  affiliation: string | null;
}

export interface YearCount {
  year: number;
  worksCount: number;
  citedByCount: number;
}

/**
 * Fields shared by journals and papers. `null` always means "unknown", never "false".
 */
export interface RecordBase {
  identifier: string;
  title: string;
  publisher: string | null;
  isInDoaj: boolean | null;
  isIndexedInScopus: boolean | null;
  isOpenAccess: boolean | null;
  citedByCount: number | null;
  publicationYear: number | null;
  retractionStatus: RetractionStatus | null;
  retractionDetails: RetractionDetails | null;
  authors: AuthorInfo[] | null;
}

export interface JournalRecord extends RecordBase {
  kind: 'journal';
  issn: string | null;
  openAlexId: string | null;
  homepageUrl: string | null;
  countryCode: string | null;
  hostOrganization: string | null;
  worksCount: number | null;
  hIndex: number | null;
  i10Index: number | null;
  twoYearMeanCitedness: number | null;
  apcUsd: number | null;
  fieldsOfResearch: string[] | null;
  countsByYear: YearCount[] | null;
  sampledWorksCount: number | null;
  retractedWorksCount: number | null;
  listedAsPredatory: boolean | null;
  listedAsHijacked: boolean | null;
}

export interface PaperRecord extends RecordBase {
  kind: 'paper';
  doi: string | null;
  openAlexId: string | null;
  publicationDate: string | null;
  language: string | null;
  referencedWorksCount: number | null;
  venue: JournalRecord | null;
}

export type MetadataRecord = JournalRecord | PaperRecord;

// Fetch result - distinguishes found/not_found/error
export type FetchResult<T> =
  | { status: 'found'; record: T }
  | { status: 'not_found' }
  | { status: 'error'; message: string };

/**
 * Metadata collaborator: resolves an identifier into a normalized record.
 */
export interface MetadataSource {
  fetch(identifier: SubjectIdentifier): Promise<FetchResult<MetadataRecord>>;
}

// Scoring types
export type CheckId =
  | 'hijacked-identifier'
  | 'predatory-list'
  | 'not-indexed'
  | 'open-access-outside-doaj'
  | 'retraction-on-record'
  | 'high-retraction-rate'
  | 'citation-anomaly'
  | 'uncited-with-age'
  | 'output-impact-mismatch'
  | 'suspicious-fees'
  | 'missing-orcid'
  | 'publication-spike';

export type CheckOutcome = 'triggered' | 'passed' | 'insufficient-data';

export interface CheckResult {
  id: CheckId;
  name: string;
  outcome: CheckOutcome;
  severity: number;
  penalty: number;
  reason: string | null;
}

export type ScoreBand =
  | 'trusted'       // score >= bands.trusted
  | 'questionable'  // score >= bands.questionable
  | 'predatory';    // below both

export interface ScoreReport {
  kind: SubjectKind;
  identifier: string;
  title: string;
  score: number;
  band: ScoreBand;
  reasons: string[];
  checks: CheckResult[];
  evaluatedChecks: number;
  applicableChecks: number;
  reducedConfidence: boolean;
}

export type EvaluationResult =
  | { status: 'scored'; report: ScoreReport }
  | { status: 'insufficient_data'; checks: CheckResult[] };

/**
 * Rationale collaborator: free text explaining a report. Advisory only.
 */
export interface RationaleGenerator {
  generate(record: MetadataRecord, report: ScoreReport): Promise<string>;
}

// Assessment outcome - what the API returns for one subject
export type AssessmentOutcome =
  | {
      status: 'scored';
      report: ScoreReport;
      rationale: string | null;
      rationaleError?: string;
    }
  | { status: 'insufficient_data'; message: string; checks: CheckResult[] }
  | { status: 'not_found'; message: string }
  | { status: 'fetch_error'; message: string };

export interface AssessOptions {
  rationale?: boolean;
}
