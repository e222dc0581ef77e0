import { InputValidationError } from '../errors.js';
import type { JournalIdentifier, PaperIdentifier } from '../types.js';

export const MAX_TITLE_LENGTH = 500;

const ISSN_PATTERN = /^\d{4}-\d{3}[\dX]$/;
const DOI_PATTERN = /^10\.\d{4,9}\/\S+$/;

export interface JournalQuery {
  issn?: string;
  name?: string;
}

export interface PaperQuery {
  doi?: string;
  title?: string;
}

/**
 * Normalize DOI for lookup: lower-case, no resolver or scheme prefix
 */
export function normalizeDoi(doi: string): string {
  return doi
    .toLowerCase()
    .trim()
    .replace(/^https?:\/\/(dx\.)?doi\.org\//i, '')
    .replace(/^doi:\s*/i, '');
}

export function normalizeIssn(issn: string): string {
  return issn.trim().toUpperCase();
}

export function isValidIssn(issn: string): boolean {
  return ISSN_PATTERN.test(normalizeIssn(issn));
}

export function isValidDoi(doi: string): boolean {
  return DOI_PATTERN.test(normalizeDoi(doi));
}

export function isValidTitle(title: string): boolean {
  const trimmed = title.trim();
  return trimmed.length > 0 && trimmed.length <= MAX_TITLE_LENGTH;
}

function exactlyOne(fields: Record<string, string | undefined>): [string, string] {
  const provided = Object.entries(fields).filter(
    (entry): entry is [string, string] => entry[1] !== undefined
  );
  if (provided.length !== 1) {
    throw new InputValidationError(
      `Provide exactly one of ${Object.keys(fields).join(' or ')}`
    );
  }
  return provided[0];
}

export function parseJournalQuery(query: JournalQuery): JournalIdentifier {
  const [field, value] = exactlyOne({ issn: query.issn, name: query.name });

  if (field === 'issn') {
    if (!isValidIssn(value)) {
      throw new InputValidationError('Invalid ISSN format. Use a format like 1234-5678.');
    }
    return { kind: 'journal', by: 'issn', value: normalizeIssn(value) };
  }

  if (!isValidTitle(value)) {
    throw new InputValidationError(
      `Invalid journal name. Enter a non-empty name of up to ${MAX_TITLE_LENGTH} characters.`
    );
  }
  return { kind: 'journal', by: 'name', value: value.trim() };
}

export function parsePaperQuery(query: PaperQuery): PaperIdentifier {
  const [field, value] = exactlyOne({ doi: query.doi, title: query.title });

  if (field === 'doi') {
    if (!isValidDoi(value)) {
      throw new InputValidationError('Invalid DOI. Use a format like 10.1234/example.');
    }
    return { kind: 'paper', by: 'doi', value: normalizeDoi(value) };
  }

  if (!isValidTitle(value)) {
    throw new InputValidationError(
      `Invalid title. Enter a non-empty title of up to ${MAX_TITLE_LENGTH} characters.`
    );
  }
  return { kind: 'paper', by: 'title', value: value.trim() };
}
