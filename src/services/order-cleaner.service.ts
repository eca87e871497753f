import { addHours, addMinutes, format, getISOWeek } from 'date-fns';
import { injectable } from 'tsyringe';
import { LIVE_VISIT_TYPE, OrderRecord, RawTable } from '../types/domain.types';
import { cellText, compareIdentifiers, resolveColumns } from '../utils/columns.util';
import { parseTimestamp } from '../utils/timestamp.util';
import { IOrderCleaner } from './order-cleaner.interface';

const ORDER_COLUMNS = [
  { key: 'shipmentNum', headers: ['Shipment #', 'Shipment Num'] },
  { key: 'orderNum', headers: ['SAP Delivery # (Order#)', 'Order Num'] },
  { key: 'appointment', headers: ['Appointment Date', 'Appointment DateTime'] },
  { key: 'carrier', headers: ['Carrier'] },
  { key: 'visitType', headers: ['Appointment Type', 'Visit Type'] }
] as const;

const LIVE_GRACE_MINUTES = 15;
const DROP_GRACE_HOURS = 24;

interface AppointmentRow {
  shipmentNum: string;
  orderNum: string | null;
  appointment: Date | null;
  carrier: string | null;
  visitType: string | null;
}

type CompleteAppointmentRow = { [K in keyof AppointmentRow]: NonNullable<AppointmentRow[K]> };

/**
 * Deadline a trailer must check in by: 15 minutes after a LIVE appointment,
 * 24 hours after any other visit type.
 */
export function requiredDateTimeFor(appointment: Date, visitType: string): Date {
  return visitType === LIVE_VISIT_TYPE
    ? addMinutes(appointment, LIVE_GRACE_MINUTES)
    : addHours(appointment, DROP_GRACE_HOURS);
}

// A dated appointment outranks an undated one; equal appointments keep the earlier row
function isLaterAppointment(candidate: Date | null, current: Date | null): boolean {
  if (candidate === null) {
    return false;
  }
  return current === null || candidate > current;
}

function isComplete(row: AppointmentRow): row is CompleteAppointmentRow {
  return row.orderNum !== null
    && row.appointment !== null
    && row.carrier !== null
    && row.visitType !== null;
}

@injectable()
export class OrderCleanerService implements IOrderCleaner {
  cleanOrders(raw: RawTable): OrderRecord[] {
    const columns = resolveColumns(raw, 'orders', ORDER_COLUMNS);
    const appointmentColumn = columns.header('appointment');

    const rows: AppointmentRow[] = [];
    raw.rows.forEach((row, index) => {
      const appointment = parseTimestamp(row[appointmentColumn], {
        file: 'orders',
        column: appointmentColumn,
        row: index + 1
      });
      const shipmentNum = cellText(row[columns.header('shipmentNum')]);
      if (shipmentNum === null) {
        return;
      }
      rows.push({
        shipmentNum,
        orderNum: cellText(row[columns.header('orderNum')]),
        appointment,
        carrier: cellText(row[columns.header('carrier')]),
        visitType: cellText(row[columns.header('visitType')])
      });
    });

    // Latest appointment per shipment wins, before incomplete rows are dropped
    const latest = new Map<string, AppointmentRow>();
    for (const row of rows) {
      const current = latest.get(row.shipmentNum);
      if (!current || isLaterAppointment(row.appointment, current.appointment)) {
        latest.set(row.shipmentNum, row);
      }
    }

    return [...latest.values()]
      .filter(isComplete)
      .sort((a, b) => compareIdentifiers(a.shipmentNum, b.shipmentNum))
      .map(row => this.buildRecord(row));
  }

  private buildRecord(row: CompleteAppointmentRow): OrderRecord {
    return {
      shipmentNum: row.shipmentNum,
      orderNum: row.orderNum,
      appointmentDateTime: row.appointment,
      carrier: row.carrier,
      visitType: row.visitType,
      requiredDateTime: requiredDateTimeFor(row.appointment, row.visitType),
      scheduledDate: format(row.appointment, 'MM/dd/yyyy'),
      week: getISOWeek(row.appointment),
      month: row.appointment.getMonth() + 1
    };
  }
}
