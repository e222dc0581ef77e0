import { fileURLToPath } from 'node:url';
import { describe, it, expect } from 'vitest';
import { parseLineList, parsePredatoryCsv, WatchlistService } from '../../src/services/watchlist.service.js';
import { silentLogger } from '../mocks/logger.js';

const fixture = (name: string) => fileURLToPath(new URL(`../fixtures/${name}`, import.meta.url));

const paths = {
  predatoryCsv: fixture('predatory-journals.csv'),
  hijackedIssns: fixture('hijacked-issn.txt'),
  hijackedTitles: fixture('hijacked-journal-titles.txt'),
};

describe('parseLineList', () => {
  it('should skip blank lines and comments', () => {
    expect(parseLineList('# comment\n\n one \r\ntwo\n')).toEqual(['one', 'two']);
  });
});

describe('parsePredatoryCsv', () => {
  it('should collect titles and every ISSN in a cell', () => {
    const list = parsePredatoryCsv('name,issn\nSome Journal,"1111-2222; 3333-4444"\n');

    expect(list.entries).toBe(1);
    expect([...list.titles]).toEqual(['some journal']);
    expect([...list.issns]).toEqual(['1111-2222', '3333-4444']);
  });

  it('should accept a journal column instead of name', () => {
    const list = parsePredatoryCsv('Journal,ISSN\nOther Journal,\n');

    expect([...list.titles]).toEqual(['other journal']);
  });
});

describe('WatchlistService', () => {
  it('should load all three lists', async () => {
    const watchlists = await WatchlistService.load(paths, silentLogger());

    expect(watchlists.counts()).toEqual({ predatory: 4, hijackedIssns: 2, hijackedTitles: 1 });
  });

  it('should match predatory journals by ISSN or title', async () => {
    const watchlists = await WatchlistService.load(paths, silentLogger());

    expect(watchlists.isPredatory({ title: 'Unrelated', issns: ['3333-444x'] })).toBe(true);
    expect(watchlists.isPredatory({ title: ' global journal of  test sciences ', issns: [] })).toBe(true);
    expect(watchlists.isPredatory({ title: 'Journal of Test Results', issns: ['1234-5678'] })).toBe(false);
  });

  it('should match hijacked journals by ISSN or title', async () => {
    const watchlists = await WatchlistService.load(paths, silentLogger());

    expect(watchlists.isHijacked({ title: 'Unrelated', issns: ['4444-555X'] })).toBe(true);
    expect(watchlists.isHijacked({ title: 'Annals of Test Medicine', issns: [] })).toBe(true);
    expect(watchlists.isHijacked({ title: 'Journal of Test Results', issns: ['1234-5678'] })).toBe(false);
  });

  it('should answer null for lists that are not configured', async () => {
    const watchlists = await WatchlistService.load(
      { predatoryCsv: null, hijackedIssns: null, hijackedTitles: null },
      silentLogger()
    );

    expect(watchlists.isPredatory({ title: 'Any', issns: [] })).toBeNull();
    expect(watchlists.isHijacked({ title: 'Any', issns: [] })).toBeNull();
    expect(watchlists.counts()).toEqual({ predatory: null, hijackedIssns: null, hijackedTitles: null });
  });

  it('should treat an unreadable list as not loaded', async () => {
    const watchlists = await WatchlistService.load(
      { ...paths, predatoryCsv: fixture('missing.csv') },
      silentLogger()
    );

    expect(watchlists.isPredatory({ title: 'Global Journal of Test Sciences', issns: [] })).toBeNull();
    expect(watchlists.counts().hijackedIssns).toBe(2);
  });
});
