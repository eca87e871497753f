import { inject, injectable } from 'tsyringe';
import { CellValue, RawTable, TrailerRecord } from '../types/domain.types';
import { cellText, compareIdentifiers, resolveColumns } from '../utils/columns.util';
import { isMissing, parseTimestamp } from '../utils/timestamp.util';
import { IShiftResolver } from './shift-resolver.interface';
import { ITrailerCleaner } from './trailer-cleaner.interface';

const TRAILER_COLUMNS = [
  { key: 'activityType', headers: ['ACTIVITY TYPE'] },
  { key: 'shipmentNum', headers: ['SHIPMENT_ID', 'Shipment Num'] },
  { key: 'checkin', headers: ['CHECKIN DATE TIME', 'Checkin DateTime'] },
  { key: 'checkout', headers: ['CHECKOUT DATE TIME', 'Checkout DateTime'] },
  { key: 'eventTime', headers: ['Date/Time', 'Loaded DateTime'] }
] as const;

// Compared verbatim: "Closed" or "CLOSED " are other statuses
const CLOSED_ACTIVITY = 'CLOSED';

interface ClosedEvent {
  shipmentNum: string;
  loadedAt: Date;
  rowIndex: number;
}

@injectable()
export class TrailerCleanerService implements ITrailerCleaner {
  constructor(@inject('IShiftResolver') private readonly shiftResolver: IShiftResolver) {}

  cleanTrailers(raw: RawTable): TrailerRecord[] {
    const columns = resolveColumns(raw, 'trailers', TRAILER_COLUMNS);
    const activityColumn = columns.header('activityType');
    const shipmentColumn = columns.header('shipmentNum');
    const checkinColumn = columns.header('checkin');
    const checkoutColumn = columns.header('checkout');
    const eventColumn = columns.header('eventTime');

    const events: ClosedEvent[] = [];
    raw.rows.forEach((row, index) => {
      if (cellText(row[activityColumn]) !== CLOSED_ACTIVITY) {
        return;
      }
      const shipmentNum = cellText(row[shipmentColumn]);
      if (
        shipmentNum === null
        || isMissing(row[checkinColumn])
        || isMissing(row[checkoutColumn])
        || isMissing(row[eventColumn])
      ) {
        return;
      }

      const loadedAt = parseTimestamp(row[eventColumn], { file: 'trailers', column: eventColumn, row: index + 1 });
      if (loadedAt !== null) {
        events.push({ shipmentNum, loadedAt, rowIndex: index });
      }
    });

    // Latest CLOSED event per shipment; equal times keep the earlier row
    const latest = new Map<string, ClosedEvent>();
    for (const event of events) {
      const current = latest.get(event.shipmentNum);
      if (!current || event.loadedAt > current.loadedAt) {
        latest.set(event.shipmentNum, event);
      }
    }

    return [...latest.values()]
      .sort((a, b) => compareIdentifiers(a.shipmentNum, b.shipmentNum))
      .map(event => {
        const row = raw.rows[event.rowIndex];
        const checkinDateTime = this.requireTimestamp(row[checkinColumn], checkinColumn, event.rowIndex);
        const checkoutDateTime = this.requireTimestamp(row[checkoutColumn], checkoutColumn, event.rowIndex);

        return {
          shipmentNum: event.shipmentNum,
          checkinDateTime,
          checkoutDateTime,
          loadedDateTime: event.loadedAt,
          shift: this.shiftResolver.resolve(checkinDateTime)
        };
      });
  }

  private requireTimestamp(value: CellValue, column: string, rowIndex: number): Date {
    const parsed = parseTimestamp(value, { file: 'trailers', column, row: rowIndex + 1 });
    if (parsed === null) {
      throw new Error(`Missing value in column "${column}" survived the completeness filter (row ${rowIndex + 1})`);
    }
    return parsed;
  }
}
