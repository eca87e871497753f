export interface IShiftResolver {
  /**
   * Shift label for the calendar date and half-day of a timestamp.
   * Dates missing from the calendar resolve to UNRESOLVED_SHIFT.
   */
  resolve(timestamp: Date): string;
}
