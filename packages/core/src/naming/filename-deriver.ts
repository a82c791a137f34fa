/**
 * FilenameDeriver
 *
 * Turns the author and year of a structured summary into a stable output name
 * such as `Loeffler-2019`. Anything that cannot be parsed falls back to the
 * original document identifier, so derivation never fails.
 */
import { FILENAME_MAX_LENGTH, FILENAME_UNKNOWN } from '../constants';
import { type Summary, stringifyValue, summaryField } from '../summary';

const AUTHOR_SENTINEL = 'not specified';
const YEAR_SENTINELS: ReadonlySet<string> = new Set(['', 'null', 'None', 'Not specified']);
const AUTHOR_SEPARATOR = ' and ';
const MAX_AUTHORS = 2;

/**
 * Last names of the first (at most two) authors in an author field.
 * Handles "Last, First" and "First Middle Last" per segment; a segment without
 * a usable last name stays as an empty string so positions are kept.
 */
export function parseAuthorList(field: string): string[] {
  return field.split(AUTHOR_SEPARATOR).slice(0, MAX_AUTHORS).map(lastNameOf);
}

function lastNameOf(segment: string): string {
  const trimmed = segment.trim();
  const comma = trimmed.indexOf(',');
  const candidate = comma !== -1 ? trimmed.slice(0, comma) : (trimmed.split(/\s+/).pop() ?? '');
  return candidate.trim().replace(/[.,;]+$/, '');
}

/**
 * Filesystem-safe form of a name, at most FILENAME_MAX_LENGTH characters.
 */
export function sanitizeFilename(name: string): string {
  const cleaned = name
    .replace(/[<>:"/\\|?*]/g, '')
    .replace(/\s+/g, '_')
    .replace(/^[._-]+|[._-]+$/g, '');
  return (cleaned.length > 0 ? cleaned : FILENAME_UNKNOWN).slice(0, FILENAME_MAX_LENGTH);
}

export function deriveFilename(summary: Summary, originalIdentifier: string): string {
  if (summary.kind !== 'structured') {
    return originalIdentifier;
  }

  const author = summaryField(summary, 'Author(s)');
  if (author === undefined || author.toLowerCase() === AUTHOR_SENTINEL) {
    return originalIdentifier;
  }

  const [firstAuthor = ''] = parseAuthorList(author);
  if (firstAuthor.length === 0) {
    return originalIdentifier;
  }

  const year = stringifyValue(summary.fields['Year Published']);
  const base = YEAR_SENTINELS.has(year) ? firstAuthor : `${firstAuthor}-${year}`;
  return sanitizeFilename(base);
}

function withSuffix(base: string, suffix: string): string {
  return `${base.slice(0, Math.max(0, FILENAME_MAX_LENGTH - suffix.length))}${suffix}`.slice(0, FILENAME_MAX_LENGTH);
}

/**
 * Names to try, in order, when `base` already belongs to another document:
 * the base itself, the base with the original identifier, then numbered variants.
 */
export function* filenameCandidates(base: string, originalIdentifier: string): Generator<string> {
  yield base;
  const identifier = sanitizeFilename(originalIdentifier);
  if (identifier !== base) {
    yield withSuffix(base, `_${identifier}`);
  }
  for (let n = 2; ; n++) {
    yield withSuffix(base, `_${n}`);
  }
}
