import { fileURLToPath } from 'node:url';
import { describe, it, expect } from 'vitest';
import {
  parseRetractionRow,
  parseRetractionWatchDate,
  retractionNatureToStatus,
  RetractionIndex,
  strongerStatus,
} from '../../src/services/retraction-index.js';

const fixture = (name: string) => fileURLToPath(new URL(`../fixtures/${name}`, import.meta.url));

describe('parseRetractionWatchDate', () => {
  it('should convert M/D/YYYY dates with an optional time', () => {
    expect(parseRetractionWatchDate('3/15/2021 0:00')).toBe('2021-03-15');
    expect(parseRetractionWatchDate('11/2/2022')).toBe('2022-11-02');
  });

  it('should return null for placeholders and malformed dates', () => {
    expect(parseRetractionWatchDate('0')).toBeNull();
    expect(parseRetractionWatchDate(undefined)).toBeNull();
    expect(parseRetractionWatchDate('2021-03-15')).toBeNull();
    expect(parseRetractionWatchDate('13/1/2021')).toBeNull();
  });
});

describe('retractionNatureToStatus', () => {
  it('should map notice natures to a status', () => {
    expect(retractionNatureToStatus('Retraction')).toBe('retracted');
    expect(retractionNatureToStatus('Expression of concern')).toBe('concern');
    expect(retractionNatureToStatus('Correction')).toBe('none');
    expect(retractionNatureToStatus(null)).toBe('none');
  });
});

describe('strongerStatus', () => {
  it('should rank retracted over concern over none', () => {
    expect(strongerStatus('none', 'concern')).toBe('concern');
    expect(strongerStatus('retracted', 'concern')).toBe('retracted');
    expect(strongerStatus('none', 'none')).toBe('none');
  });
});

describe('parseRetractionRow', () => {
  it('should skip rows without an original paper DOI', () => {
    expect(parseRetractionRow({ OriginalPaperDOI: 'unavailable', RetractionNature: 'Retraction' })).toBeNull();
    expect(parseRetractionRow({ OriginalPaperDOI: '0' })).toBeNull();
  });
});

describe('RetractionIndex', () => {
  it('should load a Retraction Watch export keyed by DOI', async () => {
    const index = await RetractionIndex.fromCsv(fixture('retraction-watch.csv'));

    expect(index.size).toBe(2);
    expect(index.lookup('https://doi.org/10.1234/TEST.1')).toEqual({
      recordId: 1001,
      title: 'Fabricated Results in Test Data',
      journal: 'Journal of Test Results',
      publisher: 'Test Academic Press',
      authors: ['Ada Example', 'Ben Example'],
      retractionDate: '2021-03-15',
      retractionNature: 'Retraction',
      reason: ['+Fabrication of Data', '+Investigation by Journal/Publisher'],
      retractionNoticeUrl: 'https://notice.example.org/1001',
      originalPaperDate: '2019-06-01',
      source: 'retraction-watch',
    });
  });

  it('should keep the most severe notice for a DOI', async () => {
    const index = await RetractionIndex.fromCsv(fixture('retraction-watch.csv'));

    expect(index.lookup('10.1234/test.2')?.retractionNature).toBe('Expression of concern');
  });

  it('should return null for unknown DOIs', async () => {
    const index = await RetractionIndex.fromCsv(fixture('retraction-watch.csv'));

    expect(index.lookup('10.1234/unknown')).toBeNull();
  });

  it('should reject a missing file', async () => {
    await expect(RetractionIndex.fromCsv(fixture('missing.csv'))).rejects.toThrow(/ENOENT/);
  });
});
