import { ShiftSlot } from './domain.types';

export type ShiftAssignment = Readonly<Record<ShiftSlot, string | null>>;

/**
 * Shift labels per calendar date, keyed by "yyyy-MM-dd".
 */
export type ShiftCalendar = ReadonlyMap<string, ShiftAssignment>;
