import type {
  CheckId,
  JournalRecord,
  MetadataRecord,
  SubjectKind,
  YearCount,
} from '../types.js';
import type { ScoringThresholds } from './scoring-config.js';

export interface CheckContext {
  record: MetadataRecord;
  /** The journal itself, or the paper's venue */
  venue: JournalRecord | null;
  thresholds: ScoringThresholds;
  currentYear: number;
}

export type CheckEvaluation =
  | { outcome: 'insufficient-data' }
  | { outcome: 'passed' }
  | { outcome: 'triggered'; severity: number; detail: string };

export interface RuleCheck {
  id: CheckId;
  name: string;
  appliesTo: readonly SubjectKind[];
  evaluate(context: CheckContext): CheckEvaluation;
}

const BOTH: readonly SubjectKind[] = ['journal', 'paper'];
const INSUFFICIENT: CheckEvaluation = { outcome: 'insufficient-data' };
const PASSED: CheckEvaluation = { outcome: 'passed' };

function triggered(detail: string, severity = 1): CheckEvaluation {
  return { outcome: 'triggered', severity, detail };
}

function ageInYears(publicationYear: number, currentYear: number): number {
  return Math.max(1, currentYear - publicationYear);
}

// The current calendar year is still filling up, so volume checks skip it
function completeYears(counts: YearCount[], currentYear: number): YearCount[] {
  return counts.filter((c) => c.year < currentYear).sort((a, b) => a.year - b.year);
}

const hijackedIdentifier: RuleCheck = {
  id: 'hijacked-identifier',
  name: 'Identifier appears on the hijacked-journal list',
  appliesTo: BOTH,
  evaluate({ venue }) {
    if (!venue || venue.listedAsHijacked === null) return INSUFFICIENT;
    return venue.listedAsHijacked
      ? triggered(`"${venue.title}" matches a known hijacked journal`)
      : PASSED;
  },
};

const predatoryList: RuleCheck = {
  id: 'predatory-list',
  name: 'Listed as a predatory journal',
  appliesTo: BOTH,
  evaluate({ venue }) {
    if (!venue || venue.listedAsPredatory === null) return INSUFFICIENT;
    return venue.listedAsPredatory
      ? triggered(`"${venue.title}" appears on the predatory journal list`)
      : PASSED;
  },
};

const notIndexed: RuleCheck = {
  id: 'not-indexed',
  name: 'Not indexed in a trusted list',
  appliesTo: BOTH,
  evaluate({ venue }) {
    if (!venue) return INSUFFICIENT;

    const indexes: { name: string; listed: boolean | null }[] = [
      { name: 'DOAJ', listed: venue.isInDoaj },
      { name: 'Scopus', listed: venue.isIndexedInScopus },
    ];
    const known = indexes.filter((i) => i.listed !== null);
    if (known.length === 0) return INSUFFICIENT;
    if (known.some((i) => i.listed)) return PASSED;

    return triggered(
      `"${venue.title}" is not listed in ${known.map((i) => i.name).join(' or ')}`
    );
  },
};

const openAccessOutsideDoaj: RuleCheck = {
  id: 'open-access-outside-doaj',
  name: 'Open access but not listed in DOAJ',
  appliesTo: BOTH,
  evaluate({ venue }) {
    if (!venue || venue.isOpenAccess === null || venue.isInDoaj === null) return INSUFFICIENT;
    return venue.isOpenAccess && !venue.isInDoaj
      ? triggered(`"${venue.title}" is open access without a DOAJ listing`)
      : PASSED;
  },
};

const retractionOnRecord: RuleCheck = {
  id: 'retraction-on-record',
  name: 'Retraction or expression of concern on record',
  appliesTo: BOTH,
  evaluate({ record }) {
    switch (record.retractionStatus) {
      case null:
        return INSUFFICIENT;
      case 'none':
        return PASSED;
      case 'retracted':
        return triggered(
          record.kind === 'paper'
            ? 'the paper has been retracted'
            : 'retracted papers were found among the journal\'s recent works'
        );
      case 'concern':
        return triggered('an expression of concern has been issued', 0.5);
    }
  },
};

const highRetractionRate: RuleCheck = {
  id: 'high-retraction-rate',
  name: 'Elevated retraction rate',
  appliesTo: BOTH,
  evaluate({ venue, thresholds }) {
    if (!venue || venue.retractedWorksCount === null || !venue.sampledWorksCount) {
      return INSUFFICIENT;
    }

    const retracted = venue.retractedWorksCount;
    const sampled = venue.sampledWorksCount;
    const rate = retracted / sampled;

    if (rate <= thresholds.maxRetractionRate && retracted <= thresholds.maxRetractedWorks) {
      return PASSED;
    }

    return triggered(
      `${retracted} of ${sampled} sampled works are retracted (${(rate * 100).toFixed(1)}%)`
    );
  },
};

const citationAnomaly: RuleCheck = {
  id: 'citation-anomaly',
  name: 'Unusually high citation count for age',
  appliesTo: ['paper'],
  evaluate({ record, thresholds, currentYear }) {
    if (record.citedByCount === null || record.publicationYear === null) return INSUFFICIENT;

    const age = ageInYears(record.publicationYear, currentYear);
    const perYear = record.citedByCount / age;
    if (perYear <= thresholds.maxCitationsPerYear) return PASSED;

    return triggered(
      `${record.citedByCount} citations in ${age} year(s), about ${Math.round(perYear)} per year`
    );
  },
};

const uncitedWithAge: RuleCheck = {
  id: 'uncited-with-age',
  name: 'No citations years after publication',
  appliesTo: ['paper'],
  evaluate({ record, thresholds, currentYear }) {
    if (record.citedByCount === null || record.publicationYear === null) return INSUFFICIENT;

    const age = ageInYears(record.publicationYear, currentYear);
    if (record.citedByCount > 0 || age < thresholds.uncitedMinAgeYears) return PASSED;

    return triggered(`no citations ${age} years after publication`);
  },
};

const outputImpactMismatch: RuleCheck = {
  id: 'output-impact-mismatch',
  name: 'High output with low impact',
  appliesTo: ['journal'],
  evaluate({ venue, thresholds, currentYear }) {
    if (!venue || !venue.countsByYear || venue.hIndex === null) return INSUFFICIENT;

    const years = completeYears(venue.countsByYear, currentYear);
    if (years.length === 0) return INSUFFICIENT;

    const meanWorks = years.reduce((sum, y) => sum + y.worksCount, 0) / years.length;
    if (meanWorks <= thresholds.highOutputWorksPerYear || venue.hIndex >= thresholds.lowImpactHIndex) {
      return PASSED;
    }

    return triggered(
      `about ${Math.round(meanWorks)} works per year with an h-index of ${venue.hIndex}`
    );
  },
};

const suspiciousFees: RuleCheck = {
  id: 'suspicious-fees',
  name: 'Suspicious fee structure',
  appliesTo: BOTH,
  evaluate({ venue, thresholds }) {
    if (!venue || venue.apcUsd === null) return INSUFFICIENT;

    const apc = venue.apcUsd;
    // A zero APC is a diamond open access journal
    if (apc === 0 || (apc >= thresholds.apcMinUsd && apc <= thresholds.apcMaxUsd)) {
      return PASSED;
    }

    return triggered(
      `article processing charge of ${apc} USD is outside the usual ${thresholds.apcMinUsd} to ${thresholds.apcMaxUsd} USD range`
    );
  },
};

const missingOrcid: RuleCheck = {
  id: 'missing-orcid',
  name: 'Most authors lack an ORCID',
  appliesTo: BOTH,
  evaluate({ record, thresholds }) {
    if (!record.authors || record.authors.length === 0) return INSUFFICIENT;

    const total = record.authors.length;
    const without = record.authors.filter((a) => !a.hasOrcid).length;
    const share = without / total;
    if (share <= thresholds.maxShareWithoutOrcid) return PASSED;

    return triggered(`${without} of ${total} authors have no ORCID`, share);
  },
};

const publicationSpike: RuleCheck = {
  id: 'publication-spike',
  name: 'Abrupt change in publication volume',
  appliesTo: ['journal'],
  evaluate({ venue, thresholds, currentYear }) {
    if (!venue || !venue.countsByYear) return INSUFFICIENT;

    const years = completeYears(venue.countsByYear, currentYear);
    if (years.length < 2) return INSUFFICIENT;

    let largest: { from: YearCount; to: YearCount; change: number } | null = null;
    for (let i = 1; i < years.length; i++) {
      const from = years[i - 1];
      const to = years[i];
      if (to.year !== from.year + 1 || from.worksCount < thresholds.volumeChangeMinWorks) continue;

      const change = Math.abs(to.worksCount - from.worksCount) / from.worksCount;
      if (!largest || change > largest.change) {
        largest = { from, to, change };
      }
    }

    if (!largest || largest.change <= thresholds.maxVolumeChange) return PASSED;

    const { from, to } = largest;
    return triggered(
      `works went from ${from.worksCount} in ${from.year} to ${to.worksCount} in ${to.year}`
    );
  },
};

/**
 * Every check, in the order reasons are reported.
 */
export const RULE_CHECKS: readonly RuleCheck[] = [
  hijackedIdentifier,
  predatoryList,
  notIndexed,
  openAccessOutsideDoaj,
  retractionOnRecord,
  highRetractionRate,
  citationAnomaly,
  uncitedWithAge,
  outputImpactMismatch,
  suspiciousFees,
  missingOrcid,
  publicationSpike,
];
