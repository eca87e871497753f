import { ShiftCalendar } from '../../types/shift.types';
import { Result } from '../../types/result.types';

/**
 * Adapter for loading the facility's shift calendar.
 */
export interface IShiftCalendarAdapter {
  /**
   * Loads the full calendar once; callers treat it as immutable configuration.
   * @returns Result with the calendar on success, success=false when the source cannot be read
   */
  loadCalendar(): Promise<Result<ShiftCalendar>>;
}
