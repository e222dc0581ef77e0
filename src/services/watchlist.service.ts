import { readFile } from 'node:fs/promises';
import { parse } from 'csv-parse/sync';
import type { Logger } from 'pino';

const ISSN_IN_TEXT = /\d{4}-\d{3}[\dX]/gi;

export interface WatchlistPaths {
  predatoryCsv: string | null;
  hijackedIssns: string | null;
  hijackedTitles: string | null;
}

export interface WatchlistSubject {
  title: string;
  issns: string[];
}

export interface JournalList {
  entries: number;
  issns: Set<string>;
  titles: Set<string>;
}

export interface WatchlistCounts {
  predatory: number | null;
  hijackedIssns: number | null;
  hijackedTitles: number | null;
}

function normalizeTitle(title: string): string {
  return title.trim().toLowerCase().replace(/\s+/g, ' ');
}

function extractIssns(text: string): string[] {
  return (text.match(ISSN_IN_TEXT) ?? []).map((issn) => issn.toUpperCase());
}

/**
 * One entry per line; blank lines and # comments are ignored
 */
export function parseLineList(content: string): string[] {
  return content
    .split(/\r?\n/)
    .map((line) => line.trim())
    .filter((line) => line.length > 0 && !line.startsWith('#'));
}

/**
 * Predatory journal list: CSV with a name (or journal/title) column and an issn column
 */
export function parsePredatoryCsv(content: string): JournalList {
  const rows: unknown = parse(content, {
    columns: (header: string[]) => header.map((h) => h.trim().toLowerCase()),
    skip_empty_lines: true,
    relax_column_count: true,
    bom: true,
  });

  const list: JournalList = { entries: 0, issns: new Set(), titles: new Set() };
  if (!Array.isArray(rows)) return list;

  for (const row of rows) {
    if (typeof row !== 'object' || row === null) continue;
    const cells = new Map<string, string>(
      Object.entries(row).filter((e): e is [string, string] => typeof e[1] === 'string')
    );

    const name = cells.get('name') ?? cells.get('journal') ?? cells.get('title') ?? '';
    const issns = extractIssns(cells.get('issn') ?? '');
    if (!name.trim() && issns.length === 0) continue;

    list.entries++;
    if (name.trim()) list.titles.add(normalizeTitle(name));
    for (const issn of issns) list.issns.add(issn);
  }

  return list;
}

/**
 * Local predatory and hijacked journal lists. A list that is not loaded answers null.
 */
export class WatchlistService {
  constructor(
    private readonly predatory: JournalList | null,
    private readonly hijackedIssns: Set<string> | null,
    private readonly hijackedTitles: Set<string> | null
  ) {}

  static empty(): WatchlistService {
    return new WatchlistService(null, null, null);
  }

  static async load(paths: WatchlistPaths, logger: Logger): Promise<WatchlistService> {
    const read = async (path: string | null, label: string): Promise<string | null> => {
      if (!path) return null;
      try {
        const content = await readFile(path, 'utf8');
        logger.info({ path }, `Loaded ${label}`);
        return content;
      } catch (error) {
        logger.error({ path, err: error }, `Could not read ${label}; related checks will report insufficient data`);
        return null;
      }
    };

    const [predatoryCsv, issnList, titleList] = await Promise.all([
      read(paths.predatoryCsv, 'predatory journal list'),
      read(paths.hijackedIssns, 'hijacked ISSN list'),
      read(paths.hijackedTitles, 'hijacked journal title list'),
    ]);

    let predatory: JournalList | null = null;
    if (predatoryCsv !== null) {
      try {
        predatory = parsePredatoryCsv(predatoryCsv);
      } catch (error) {
        logger.error({ path: paths.predatoryCsv, err: error }, 'Predatory journal list is not valid CSV');
      }
    }

    return new WatchlistService(
      predatory,
      issnList === null ? null : new Set(parseLineList(issnList).flatMap(extractIssns)),
      titleList === null ? null : new Set(parseLineList(titleList).map(normalizeTitle))
    );
  }

  isPredatory(subject: WatchlistSubject): boolean | null {
    if (!this.predatory) return null;
    const { issns, titles } = this.predatory;
    return (
      subject.issns.some((issn) => issns.has(issn.toUpperCase())) ||
      titles.has(normalizeTitle(subject.title))
    );
  }

  isHijacked(subject: WatchlistSubject): boolean | null {
    if (!this.hijackedIssns && !this.hijackedTitles) return null;
    const byIssn = subject.issns.some((issn) => this.hijackedIssns?.has(issn.toUpperCase()) ?? false);
    const byTitle = this.hijackedTitles?.has(normalizeTitle(subject.title)) ?? false;
    return byIssn || byTitle;
  }

  counts(): WatchlistCounts {
    return {
      predatory: this.predatory?.entries ?? null,
      hijackedIssns: this.hijackedIssns?.size ?? null,
      hijackedTitles: this.hijackedTitles?.size ?? null,
    };
  }
}
