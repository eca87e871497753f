import { injectable } from 'tsyringe';
import {
  ComplianceStatus,
  JoinedShipmentRow,
  OrderRecord,
  ShipmentComplianceRecord,
  TrailerRecord
} from '../types/domain.types';
import { hoursBetween, roundTo2 } from '../utils/timestamp.util';
import { IReconciliationEngine } from './reconciliation.interface';

/**
 * On Time only when the trailer checked in at or before the required time.
 * A shipment with no checkin is Late.
 */
export function complianceFor(required: Date, checkin: Date | null): ComplianceStatus {
  return checkin !== null && required >= checkin
    ? ComplianceStatus.ON_TIME
    : ComplianceStatus.LATE;
}

/**
 * Hours from the reference time to loading: the appointment for on-time
 * shipments, the checkin for late ones. Negative values become null.
 */
export function dwellTimeFor(
  compliance: ComplianceStatus,
  appointment: Date,
  checkin: Date | null,
  loaded: Date | null
): number | null {
  if (loaded === null) {
    return null;
  }

  const reference = compliance === ComplianceStatus.ON_TIME ? appointment : checkin;
  if (reference === null) {
    return null;
  }

  const dwell = roundTo2(hoursBetween(reference, loaded));
  return dwell < 0 ? null : dwell;
}

/**
 * Left join of orders onto trailers by shipment, with compliance and dwell
 * derived for every order, matched or not.
 */
export function joinShipments(orders: OrderRecord[], trailers: TrailerRecord[]): JoinedShipmentRow[] {
  const trailersByShipment = new Map<string, TrailerRecord>();
  for (const trailer of trailers) {
    const current = trailersByShipment.get(trailer.shipmentNum);
    if (!current || trailer.loadedDateTime > current.loadedDateTime) {
      trailersByShipment.set(trailer.shipmentNum, trailer);
    }
  }

  return orders.map(order => {
    const trailer = trailersByShipment.get(order.shipmentNum);
    const checkin = trailer?.checkinDateTime ?? null;
    const loaded = trailer?.loadedDateTime ?? null;
    const compliance = complianceFor(order.requiredDateTime, checkin);

    return {
      shipmentNum: order.shipmentNum,
      orderNum: order.orderNum,
      appointmentDateTime: order.appointmentDateTime,
      requiredDateTime: order.requiredDateTime,
      checkinDateTime: checkin,
      checkoutDateTime: trailer?.checkoutDateTime ?? null,
      carrier: order.carrier,
      visitType: order.visitType,
      loadedDateTime: loaded,
      shift: trailer?.shift ?? null,
      scheduledDate: order.scheduledDate,
      week: order.week,
      month: order.month,
      compliance,
      dwellTimeHours: dwellTimeFor(compliance, order.appointmentDateTime, checkin, loaded)
    };
  });
}

export function hasCheckin(row: JoinedShipmentRow): row is ShipmentComplianceRecord {
  return row.checkinDateTime !== null
    && row.checkoutDateTime !== null
    && row.loadedDateTime !== null
    && row.shift !== null;
}

@injectable()
export class ReconciliationService implements IReconciliationEngine {
  reconcile(orders: OrderRecord[], trailers: TrailerRecord[]): ShipmentComplianceRecord[] {
    // Unmatched orders are classified first, then pruned
    return joinShipments(orders, trailers).filter(hasCheckin);
  }
}
