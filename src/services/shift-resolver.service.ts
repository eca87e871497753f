import { inject, injectable } from 'tsyringe';
import { ShiftSlot, UNRESOLVED_SHIFT } from '../types/domain.types';
import { ShiftCalendar } from '../types/shift.types';
import { toDateKey } from '../utils/timestamp.util';
import { IShiftResolver } from './shift-resolver.interface';

const DAY_SHIFT_START_HOUR = 7;
const DAY_SHIFT_END_HOUR = 19;

/**
 * Day shift covers [07:00, 19:00); every other hour belongs to the night slot
 * of the same calendar date.
 */
export function shiftSlotFor(timestamp: Date): ShiftSlot {
  const hour = timestamp.getHours();
  return hour >= DAY_SHIFT_START_HOUR && hour < DAY_SHIFT_END_HOUR ? '1' : '2';
}

@injectable()
export class ShiftResolverService implements IShiftResolver {
  constructor(@inject('ShiftCalendar') private readonly calendar: ShiftCalendar) {}

  resolve(timestamp: Date): string {
    const assignment = this.calendar.get(toDateKey(timestamp));
    return assignment?.[shiftSlotFor(timestamp)] ?? UNRESOLVED_SHIFT;
  }
}
