import 'reflect-metadata';
import { ShiftSlot, UNRESOLVED_SHIFT } from '../types/domain.types';
import { ShiftCalendar } from '../types/shift.types';
import { shiftSlotFor, ShiftResolverService } from './shift-resolver.service';

describe('ShiftResolverService', () => {
  const calendar: ShiftCalendar = new Map([
    ['2024-01-02', { '1': 'Red', '2': 'Blue' }],
    ['2024-01-03', { '1': 'Green', '2': 'Yellow' }],
    ['2024-01-04', { '1': 'Red', '2': null }]
  ]);

  let resolver: ShiftResolverService;

  beforeEach(() => {
    resolver = new ShiftResolverService(calendar);
  });

  describe('shiftSlotFor', () => {
    const cases: Array<[Date, ShiftSlot]> = [
      [new Date(2024, 0, 2, 6, 59, 59), '2'],
      [new Date(2024, 0, 2, 7, 0, 0), '1'],
      [new Date(2024, 0, 2, 18, 59, 59), '1'],
      [new Date(2024, 0, 2, 19, 0, 0), '2'],
      [new Date(2024, 0, 2, 0, 0, 0), '2']
    ];

    it.each(cases)('should place %p in slot %p', (timestamp, slot) => {
      expect(shiftSlotFor(timestamp)).toBe(slot);
    });
  });

  it('should resolve the day slot at the start of the day shift', () => {
    expect(resolver.resolve(new Date(2024, 0, 2, 7, 0))).toBe('Red');
  });

  it('should resolve the night slot from 19:00', () => {
    expect(resolver.resolve(new Date(2024, 0, 2, 19, 0))).toBe('Blue');
  });

  it('should use the calendar date of the timestamp for early morning hours', () => {
    // 02:00 on Jan 3 belongs to Jan 3's night slot, not Jan 2's
    expect(resolver.resolve(new Date(2024, 0, 3, 2, 0))).toBe('Yellow');
  });

  it('should return Unresolved for a date missing from the calendar', () => {
    expect(resolver.resolve(new Date(2024, 5, 1, 9, 0))).toBe(UNRESOLVED_SHIFT);
  });

  it('should return Unresolved when the slot has no label', () => {
    expect(resolver.resolve(new Date(2024, 0, 4, 22, 0))).toBe(UNRESOLVED_SHIFT);
  });
});
