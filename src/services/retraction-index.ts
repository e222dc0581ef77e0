import { createReadStream } from 'node:fs';
import { parse } from 'csv-parse';
import type { RetractionDetails, RetractionStatus } from '../types.js';
import { normalizeDoi } from '../validation/identifiers.js';

/**
 * Parse semicolon-separated field into array
 */
function parseArrayField(field: string | undefined): string[] {
  if (!field) return [];
  return field
    .split(';')
    .map((s) => s.trim())
    .filter(Boolean);
}

/**
 * Parse date field (M/D/YYYY, optionally followed by a time) into YYYY-MM-DD
 */
export function parseRetractionWatchDate(dateStr: string | undefined): string | null {
  if (!dateStr || dateStr === '0') return null;

  // Handle format: "10/24/2025 0:00" or "10/24/2025"
  const cleanDate = dateStr.trim().split(' ')[0];
  const parts = cleanDate.split('/');
  if (parts.length !== 3) return null;

  const [month, day, year] = parts.map(Number);
  if ([month, day, year].some((n) => !Number.isInteger(n))) return null;
  if (month < 1 || month > 12 || day < 1 || day > 31) return null;

  return `${year}-${String(month).padStart(2, '0')}-${String(day).padStart(2, '0')}`;
}

function parseDoiField(doi: string | undefined): string | null {
  if (!doi || doi === '0' || doi.toLowerCase() === 'unavailable') return null;
  return normalizeDoi(doi);
}

export function retractionNatureToStatus(nature: string | null): RetractionStatus {
  const value = nature?.toLowerCase() ?? '';
  if (value.includes('retraction')) return 'retracted';
  if (value.includes('concern')) return 'concern';
  return 'none';
}

const STATUS_RANK: Record<RetractionStatus, number> = { none: 0, concern: 1, retracted: 2 };

export function strongerStatus(a: RetractionStatus, b: RetractionStatus): RetractionStatus {
  return STATUS_RANK[b] > STATUS_RANK[a] ? b : a;
}

/**
 * Map one CSV row of the Retraction Watch export to a DOI and its notice
 */
export function parseRetractionRow(
  row: Record<string, string | undefined>
): { doi: string; details: RetractionDetails } | null {
  const doi = parseDoiField(row.OriginalPaperDOI);
  if (!doi) return null;

  const recordId = parseInt(row['Record ID'] ?? '', 10);

  return {
    doi,
    details: {
      recordId: Number.isNaN(recordId) ? null : recordId,
      title: row.Title || null,
      journal: row.Journal || null,
      publisher: row.Publisher || null,
      authors: parseArrayField(row.Author),
      retractionDate: parseRetractionWatchDate(row.RetractionDate),
      retractionNature: row.RetractionNature || null,
      reason: parseArrayField(row.Reason),
      retractionNoticeUrl: parseArrayField(row.URLS)[0] ?? null,
      originalPaperDate: parseRetractionWatchDate(row.OriginalPaperDate),
      source: 'retraction-watch',
    },
  };
}

function isStringRow(value: unknown): value is Record<string, string | undefined> {
  return (
    typeof value === 'object' &&
    value !== null &&
    Object.values(value).every((v) => typeof v === 'string' || v === undefined)
  );
}

/**
 * In-memory index of a Retraction Watch export, keyed by the original paper's DOI.
 * Lives for the process only.
 */
export class RetractionIndex {
  private readonly byDoi = new Map<string, RetractionDetails>();

  get size(): number {
    return this.byDoi.size;
  }

  /**
   * Keep the most severe notice per DOI
   */
  add(doi: string, details: RetractionDetails): void {
    const key = normalizeDoi(doi);
    const existing = this.byDoi.get(key);
    if (existing) {
      const current = retractionNatureToStatus(existing.retractionNature);
      const incoming = retractionNatureToStatus(details.retractionNature);
      if (strongerStatus(current, incoming) === current) return;
    }
    this.byDoi.set(key, details);
  }

  lookup(doi: string): RetractionDetails | null {
    return this.byDoi.get(normalizeDoi(doi)) ?? null;
  }

  static async fromCsv(filePath: string): Promise<RetractionIndex> {
    const index = new RetractionIndex();

    const source = createReadStream(filePath);
    const parser = source.pipe(
      parse({
        columns: true,
        skip_empty_lines: true,
        relax_quotes: true,
        relax_column_count: true,
        bom: true,
      })
    );
    // pipe() does not forward read errors (e.g. a missing file)
    source.on('error', (error) => parser.destroy(error));

    for await (const record of parser) {
      const row: unknown = record;
      if (!isStringRow(row)) continue;

      const parsed = parseRetractionRow(row);
      if (parsed) {
        index.add(parsed.doi, parsed.details);
      }
    }

    return index;
  }
}
