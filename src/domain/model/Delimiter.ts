import { ConfigurationInvalidError } from './ReportError.js';

/** Field separators tried, in order of preference, when the input delimiter is detected. */
export const DEFAULT_CANDIDATE_DELIMITERS: readonly string[] = [',', ';', '\t', '|'];

/** Used when no candidate splits the sample consistently. */
export const FALLBACK_DELIMITER = ',';

/** How the input delimiter was chosen. */
export type DelimiterMethod = 'configured' | 'detected' | 'fallback';

/** Outcome of delimiter detection. */
export interface DelimiterDetection {
  readonly delimiter: string;
  readonly method: DelimiterMethod;
  /** Modal number of fields per sample line under the chosen delimiter (0 when not measured). */
  readonly columnCount: number;
  /** Share of sample lines that have `columnCount` fields, between 0 and 1. */
  readonly consistency: number;
}

const DELIMITER_ALIASES = new Map<string, string>([
  ['', '\t'],
  ['\t', '\t'],
  ['\\t', '\t'],
  ['tab', '\t'],
  [' ', ' '],
  ['space', ' '],
  [',', ','],
  ['comma', ','],
  [';', ';'],
  ['semicolon', ';'],
  ['|', '|'],
  ['pipe', '|'],
]);

/**
 * Map a user-facing delimiter name to its character.
 *
 * An empty value selects tab. Names are case-insensitive.
 */
export function resolveDelimiterAlias(value: string): string {
  const delimiter = DELIMITER_ALIASES.get(value.toLowerCase());
  if (delimiter === undefined) {
    throw new ConfigurationInvalidError(`Unknown delimiter '${value}'. Use one of: comma, semicolon, tab, space, pipe.`, [
      { path: '/outputDelimiter', message: 'Unknown delimiter alias' },
    ]);
  }
  return delimiter;
}

/** `true` when `value` is exactly one Unicode character. */
export function isSingleCharacter(value: string): boolean {
  return Array.from(value).length === 1;
}

/** `true` when `value` can separate fields on one line. */
export function isUsableDelimiter(value: string): boolean {
  return isSingleCharacter(value) && value !== '\n' && value !== '\r' && value !== '"';
}
