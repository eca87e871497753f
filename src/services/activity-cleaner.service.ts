import { inject, injectable } from 'tsyringe';
import { LoadTimeRecord, OrderType, RawTable, UNRESOLVED_SHIFT } from '../types/domain.types';
import { cellText, compareIdentifiers, resolveColumns } from '../utils/columns.util';
import { minutesBetween, parseTimestamp, roundTo2 } from '../utils/timestamp.util';
import { IActivityCleaner } from './activity-cleaner.interface';
import { IShiftResolver } from './shift-resolver.interface';

const ACTIVITY_COLUMNS = [
  { key: 'createdAt', headers: ['Create DateTime'] },
  { key: 'orderNum', headers: ['Order #', 'Order Num'] }
] as const;

export function classifyOrderType(orderNum: string): OrderType {
  if (orderNum.startsWith('02')) {
    return OrderType.SHUTTLE;
  }
  if (orderNum.startsWith('04')) {
    return OrderType.CUSTOMER_LOAD;
  }
  return OrderType.UNKNOWN;
}

@injectable()
export class ActivityCleanerService implements IActivityCleaner {
  constructor(@inject('IShiftResolver') private readonly shiftResolver: IShiftResolver) {}

  cleanActivity(raw: RawTable): LoadTimeRecord[] {
    const columns = resolveColumns(raw, 'activity', ACTIVITY_COLUMNS);
    const orderColumn = columns.header('orderNum');
    const createdColumn = columns.header('createdAt');

    // Every timestamp is parsed before grouping so one bad value fails the whole file
    const events = raw.rows.map((row, index) => ({
      orderNum: cellText(row[orderColumn]),
      createdAt: parseTimestamp(row[createdColumn], {
        file: 'activity',
        column: createdColumn,
        row: index + 1
      })
    }));

    const eventsByOrder = new Map<string, Date[]>();
    // An order none of whose events carries a timestamp has no load time and no row
    for (const event of events) {
      if (event.orderNum === null || event.createdAt === null) {
        continue;
      }
      const timestamps = eventsByOrder.get(event.orderNum);
      if (timestamps) {
        timestamps.push(event.createdAt);
      } else {
        eventsByOrder.set(event.orderNum, [event.createdAt]);
      }
    }

    return [...eventsByOrder.entries()]
      .sort(([a], [b]) => compareIdentifiers(a, b))
      .map(([orderNum, timestamps]) => this.buildRecord(orderNum, timestamps));
  }

  private buildRecord(orderNum: string, timestamps: Date[]): LoadTimeRecord {
    let first = timestamps[0];
    let last = timestamps[0];
    for (const timestamp of timestamps) {
      if (timestamp < first) first = timestamp;
      if (timestamp > last) last = timestamp;
    }

    return {
      orderNum,
      loadTimeMinutes: roundTo2(minutesBetween(first, last)),
      shift: this.representativeShift(timestamps),
      orderType: classifyOrderType(orderNum)
    };
  }

  /**
   * First shift that resolves, taking the order's events in file order.
   * Events of one order normally share a shift; when they straddle a
   * changeover the earliest listed event decides.
   */
  private representativeShift(timestamps: Date[]): string {
    for (const timestamp of timestamps) {
      const shift = this.shiftResolver.resolve(timestamp);
      if (shift !== UNRESOLVED_SHIFT) {
        return shift;
      }
    }
    return UNRESOLVED_SHIFT;
  }
}
