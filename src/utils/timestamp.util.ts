// Wall-clock timestamp helpers shared by the cleaners and exporters

import { differenceInMilliseconds, format, isValid, parse, parseISO } from 'date-fns';
import { CellValue } from '../types/domain.types';
import { InputFile, SchemaError } from '../types/result.types';

export interface CellLocation {
  file: InputFile;
  column: string;
  row: number;   // 1-based data row
}

// Exports carry no zone; they are read in one without DST so durations stay exact
export const WALL_CLOCK_TIME_ZONE = 'UTC';

export function pinWallClockTimeZone(): void {
  process.env.TZ = WALL_CLOCK_TIME_ZONE;
}

// Two-digit years resolve within ±50 years of this date
const REFERENCE_DATE = new Date(2000, 0, 1);

// Two-digit year formats come first: "yyyy" would read "1/2/24" as year 24
const SUPPORTED_FORMATS = [
  'M/d/yy H:mm:ss',
  'M/d/yy H:mm',
  'M/d/yy',
  'M/d/yyyy H:mm:ss',
  'M/d/yyyy H:mm',
  'M/d/yyyy h:mm:ss a',
  'M/d/yyyy h:mm a',
  'M/d/yyyy',
  'yyyy-MM-dd HH:mm:ss',
  'yyyy-MM-dd HH:mm',
  'yyyy-MM-dd'
];

const EXPORT_FORMAT = 'yyyy-MM-dd HH:mm:ss';

export function isMissing(value: CellValue): value is null | undefined | '' {
  return value === null || value === undefined || value === '';
}

export function tryParseTimestamp(value: string): Date | null {
  const text = value.trim();

  const iso = parseISO(text);
  if (isValid(iso)) {
    return iso;
  }

  for (const pattern of SUPPORTED_FORMATS) {
    const parsed = parse(text, pattern, REFERENCE_DATE);
    if (isValid(parsed)) {
      return parsed;
    }
  }

  return null;
}

/**
 * Parses a raw cell into a timestamp.
 * @returns null for a missing cell
 * @throws SchemaError when the cell holds a value no supported format accepts
 */
export function parseTimestamp(value: CellValue, location: CellLocation): Date | null {
  if (isMissing(value)) {
    return null;
  }

  if (value instanceof Date) {
    if (isValid(value)) {
      return value;
    }
  } else if (typeof value === 'string') {
    const parsed = tryParseTimestamp(value);
    if (parsed) {
      return parsed;
    }
  }

  throw new SchemaError(
    `Unparseable timestamp "${String(value)}" in column "${location.column}" of the ${location.file} file (row ${location.row})`,
    location.file,
    location.column,
    location.row
  );
}

export function formatTimestamp(date: Date): string {
  return format(date, EXPORT_FORMAT);
}

export function toDateKey(date: Date): string {
  return format(date, 'yyyy-MM-dd');
}

export function minutesBetween(start: Date, end: Date): number {
  return differenceInMilliseconds(end, start) / 60_000;
}

export function hoursBetween(start: Date, end: Date): number {
  return differenceInMilliseconds(end, start) / 3_600_000;
}

// Ties go to the even digit; a tie is exact only for odd multiples of 1/8
export function roundTo2(value: number): number {
  const eighths = value * 8;
  const rounded = Number.isInteger(eighths) && Math.abs(eighths) % 2 === 1
    ? (2 * Math.round(value * 50)) / 100
    : Number(value.toFixed(2));
  // Collapse -0 so it never reads as a negative duration
  return rounded === 0 ? 0 : rounded;
}
