import { CellValue, RawTable } from '../types/domain.types';
import { InputFile, SchemaError } from '../types/result.types';
import { formatTimestamp, isMissing } from './timestamp.util';

// UTF-8 byte order mark, as decoded by a UTF-8 reader and by a Latin-1 reader
const BOM_PREFIXES = ['\uFEFF', '\u00EF\u00BB\u00BF'];

/**
 * Normalize column header: strip BOM, trim, collapse whitespace, lowercase.
 * "ï»¿Create DateTime" and "ACTIVITY TYPE " both resolve to their clean names.
 */
export function normalizeHeader(header: string): string {
  let text = header;
  for (const prefix of BOM_PREFIXES) {
    if (text.startsWith(prefix)) {
      text = text.slice(prefix.length);
    }
  }
  return text.trim().replace(/\s+/g, ' ').toLowerCase();
}

export interface ColumnAlias<K extends string> {
  key: K;
  headers: readonly string[];   // accepted spellings, first one is reported when absent
}

/**
 * Raw header names of a file's required columns, keyed by canonical name.
 */
export class ResolvedColumns<K extends string> {
  constructor(private readonly headers: ReadonlyMap<K, string>) {}

  header(key: K): string {
    const header = this.headers.get(key);
    if (header === undefined) {
      throw new Error(`Column "${key}" was not resolved`);
    }
    return header;
  }
}

/**
 * Finds the raw header for every required column of a file.
 * @throws SchemaError listing every required column the table lacks
 */
export function resolveColumns<K extends string>(
  table: RawTable,
  file: InputFile,
  aliases: ReadonlyArray<ColumnAlias<K>>
): ResolvedColumns<K> {
  const byNormalized = new Map<string, string>();
  for (const column of table.columns) {
    const normalized = normalizeHeader(column);
    if (!byNormalized.has(normalized)) {
      byNormalized.set(normalized, column);
    }
  }

  const resolved = new Map<K, string>();
  const missing: string[] = [];

  for (const alias of aliases) {
    const match = alias.headers
      .map(spelling => byNormalized.get(normalizeHeader(spelling)))
      .find((column): column is string => column !== undefined);

    if (match === undefined) {
      missing.push(alias.headers[0] ?? alias.key);
    } else {
      resolved.set(alias.key, match);
    }
  }

  if (missing.length > 0) {
    throw new SchemaError(
      `The ${file} file is missing required column(s): ${missing.map(c => `"${c}"`).join(', ')}`,
      file,
      missing[0]
    );
  }

  return new ResolvedColumns(resolved);
}

/**
 * Reads a cell as text. Identifiers stay strings so leading zeros survive.
 * @returns null for a missing cell
 */
export function cellText(value: CellValue): string | null {
  if (isMissing(value)) {
    return null;
  }
  if (value instanceof Date) {
    return formatTimestamp(value);
  }
  return String(value);
}

// Plain code-point ordering, the order spreadsheet exports sort identifiers in
export function compareIdentifiers(a: string, b: string): number {
  if (a < b) return -1;
  if (a > b) return 1;
  return 0;
}
