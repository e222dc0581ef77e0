import { describe, it, expect } from 'vitest';
import { RULE_CHECKS, type CheckContext, type RuleCheck } from '../../src/scoring/checks.js';
import { DEFAULT_SCORING_CONFIG } from '../../src/scoring/scoring-config.js';
import type { CheckId, MetadataRecord } from '../../src/types.js';
import { journalRecord, paperRecord } from '../mocks/records.js';

function check(id: CheckId): RuleCheck {
  const found = RULE_CHECKS.find((c) => c.id === id);
  if (!found) throw new Error(`No check ${id}`);
  return found;
}

function context(record: MetadataRecord): CheckContext {
  return {
    record,
    venue: record.kind === 'journal' ? record : record.venue,
    thresholds: DEFAULT_SCORING_CONFIG.thresholds,
    currentYear: 2024,
  };
}

describe('RULE_CHECKS', () => {
  it('should have a unique id and a weight for every check', () => {
    const ids = RULE_CHECKS.map((c) => c.id);
    expect(new Set(ids).size).toBe(ids.length);
    for (const id of ids) {
      expect(DEFAULT_SCORING_CONFIG.weights[id]).toBeGreaterThan(0);
    }
  });

  describe('not-indexed', () => {
    it('should name only the indexes whose status is known', () => {
      const record = journalRecord({ isInDoaj: false, isIndexedInScopus: null });

      expect(check('not-indexed').evaluate(context(record))).toEqual({
        outcome: 'triggered',
        severity: 1,
        detail: '"Journal of Test Results" is not listed in DOAJ',
      });
    });

    it('should pass when any index lists the journal', () => {
      const record = journalRecord({ isInDoaj: false, isIndexedInScopus: true });

      expect(check('not-indexed').evaluate(context(record))).toEqual({ outcome: 'passed' });
    });

    it('should lack data for a paper without a venue', () => {
      const record = paperRecord({ venue: null });

      expect(check('not-indexed').evaluate(context(record))).toEqual({ outcome: 'insufficient-data' });
    });
  });

  describe('open-access-outside-doaj', () => {
    it('should trigger for open access journals missing from DOAJ', () => {
      const record = journalRecord({ isOpenAccess: true, isInDoaj: false });

      expect(check('open-access-outside-doaj').evaluate(context(record))).toEqual({
        outcome: 'triggered',
        severity: 1,
        detail: '"Journal of Test Results" is open access without a DOAJ listing',
      });
    });

    it('should pass subscription journals', () => {
      const record = journalRecord({ isOpenAccess: false, isInDoaj: false });

      expect(check('open-access-outside-doaj').evaluate(context(record))).toEqual({ outcome: 'passed' });
    });
  });

  describe('retraction-on-record', () => {
    it('should describe a retracted paper', () => {
      const record = paperRecord({ retractionStatus: 'retracted' });

      expect(check('retraction-on-record').evaluate(context(record))).toEqual({
        outcome: 'triggered',
        severity: 1,
        detail: 'the paper has been retracted',
      });
    });

    it('should use half severity for an expression of concern', () => {
      const record = paperRecord({ retractionStatus: 'concern' });

      expect(check('retraction-on-record').evaluate(context(record))).toEqual({
        outcome: 'triggered',
        severity: 0.5,
        detail: 'an expression of concern has been issued',
      });
    });

    it('should lack data when the status is unknown', () => {
      const record = paperRecord({ retractionStatus: null });

      expect(check('retraction-on-record').evaluate(context(record))).toEqual({ outcome: 'insufficient-data' });
    });
  });

  describe('high-retraction-rate', () => {
    it('should trigger above the rate threshold', () => {
      const record = journalRecord({ sampledWorksCount: 200, retractedWorksCount: 6 });

      expect(check('high-retraction-rate').evaluate(context(record))).toEqual({
        outcome: 'triggered',
        severity: 1,
        detail: '6 of 200 sampled works are retracted (3.0%)',
      });
    });

    it('should pass a single retraction in a large sample', () => {
      const record = journalRecord({ sampledWorksCount: 200, retractedWorksCount: 1 });

      expect(check('high-retraction-rate').evaluate(context(record))).toEqual({ outcome: 'passed' });
    });

    it('should lack data for an empty sample', () => {
      const record = journalRecord({ sampledWorksCount: 0, retractedWorksCount: 0 });

      expect(check('high-retraction-rate').evaluate(context(record))).toEqual({ outcome: 'insufficient-data' });
    });
  });

  describe('citation-anomaly', () => {
    it('should trigger for implausibly many citations per year', () => {
      const record = paperRecord({ citedByCount: 5000, publicationYear: 2023 });

      expect(check('citation-anomaly').evaluate(context(record))).toEqual({
        outcome: 'triggered',
        severity: 1,
        detail: '5000 citations in 1 year(s), about 5000 per year',
      });
    });

    it('should treat papers from the current year as one year old', () => {
      const record = paperRecord({ citedByCount: 400, publicationYear: 2024 });

      expect(check('citation-anomaly').evaluate(context(record))).toEqual({ outcome: 'passed' });
    });
  });

  describe('uncited-with-age', () => {
    it('should trigger for an old paper nobody cites', () => {
      const record = paperRecord({ citedByCount: 0, publicationYear: 2015 });

      expect(check('uncited-with-age').evaluate(context(record))).toEqual({
        outcome: 'triggered',
        severity: 1,
        detail: 'no citations 9 years after publication',
      });
    });

    it('should pass a recent uncited paper', () => {
      const record = paperRecord({ citedByCount: 0, publicationYear: 2022 });

      expect(check('uncited-with-age').evaluate(context(record))).toEqual({ outcome: 'passed' });
    });
  });

  describe('output-impact-mismatch', () => {
    it('should trigger for high volume with a low h-index', () => {
      const record = journalRecord({
        hIndex: 5,
        countsByYear: [
          { year: 2021, worksCount: 800, citedByCount: 10 },
          { year: 2022, worksCount: 820, citedByCount: 10 },
          { year: 2023, worksCount: 840, citedByCount: 10 },
          { year: 2024, worksCount: 5, citedByCount: 0 },
        ],
      });

      expect(check('output-impact-mismatch').evaluate(context(record))).toEqual({
        outcome: 'triggered',
        severity: 1,
        detail: 'about 820 works per year with an h-index of 5',
      });
    });

    it('should lack data when only the current year is known', () => {
      const record = journalRecord({
        countsByYear: [{ year: 2024, worksCount: 900, citedByCount: 0 }],
      });

      expect(check('output-impact-mismatch').evaluate(context(record))).toEqual({ outcome: 'insufficient-data' });
    });
  });

  describe('suspicious-fees', () => {
    it('should trigger for a fee below the usual range', () => {
      const record = journalRecord({ apcUsd: 50 });

      expect(check('suspicious-fees').evaluate(context(record))).toEqual({
        outcome: 'triggered',
        severity: 1,
        detail: 'article processing charge of 50 USD is outside the usual 200 to 3000 USD range',
      });
    });

    it('should pass journals without a fee', () => {
      const record = journalRecord({ apcUsd: 0 });

      expect(check('suspicious-fees').evaluate(context(record))).toEqual({ outcome: 'passed' });
    });
  });

  describe('missing-orcid', () => {
    it('should use the share of authors without an ORCID as severity', () => {
      const record = paperRecord({
        authors: [
          { name: 'A', hasOrcid: false, affiliation: null },
          { name: 'B', hasOrcid: false, affiliation: null },
          { name: 'C', hasOrcid: false, affiliation: null },
          { name: 'D', hasOrcid: true, affiliation: null },
        ],
      });

      expect(check('missing-orcid').evaluate(context(record))).toEqual({
        outcome: 'triggered',
        severity: 0.75,
        detail: '3 of 4 authors have no ORCID',
      });
    });

    it('should lack data without authors', () => {
      const record = paperRecord({ authors: [] });

      expect(check('missing-orcid').evaluate(context(record))).toEqual({ outcome: 'insufficient-data' });
    });
  });

  describe('publication-spike', () => {
    it('should report the largest change between consecutive complete years', () => {
      const record = journalRecord({
        countsByYear: [
          { year: 2023, worksCount: 310, citedByCount: 0 },
          { year: 2021, worksCount: 100, citedByCount: 0 },
          { year: 2022, worksCount: 300, citedByCount: 0 },
        ],
      });

      expect(check('publication-spike').evaluate(context(record))).toEqual({
        outcome: 'triggered',
        severity: 1,
        detail: 'works went from 100 in 2021 to 300 in 2022',
      });
    });

    it('should ignore changes from very small volumes', () => {
      const record = journalRecord({
        countsByYear: [
          { year: 2022, worksCount: 5, citedByCount: 0 },
          { year: 2023, worksCount: 40, citedByCount: 0 },
        ],
      });

      expect(check('publication-spike').evaluate(context(record))).toEqual({ outcome: 'passed' });
    });
  });
});
