import {
  LoadTimeRecord,
  OrderRecord,
  ShipmentComplianceRecord,
  TrailerRecord
} from './domain.types';

/**
 * Maps a record field to the header it is exported under.
 * Headers match the column names downstream spreadsheets already use.
 */
export interface ColumnSpec<T> {
  key: keyof T & string;
  header: string;
}

export const LOAD_TIME_COLUMNS: ReadonlyArray<ColumnSpec<LoadTimeRecord>> = [
  { key: 'orderNum', header: 'Order Num' },
  { key: 'loadTimeMinutes', header: 'Load Time (minutes)' },
  { key: 'shift', header: 'Shift' },
  { key: 'orderType', header: 'Order Type' }
];

export const ORDER_COLUMNS: ReadonlyArray<ColumnSpec<OrderRecord>> = [
  { key: 'shipmentNum', header: 'Shipment Num' },
  { key: 'orderNum', header: 'Order Num' },
  { key: 'appointmentDateTime', header: 'Appointment DateTime' },
  { key: 'carrier', header: 'Carrier' },
  { key: 'visitType', header: 'Visit Type' },
  { key: 'requiredDateTime', header: 'Required DateTime' },
  { key: 'scheduledDate', header: 'Scheduled Date' },
  { key: 'week', header: 'Week' },
  { key: 'month', header: 'Month' }
];

export const TRAILER_COLUMNS: ReadonlyArray<ColumnSpec<TrailerRecord>> = [
  { key: 'shipmentNum', header: 'Shipment Num' },
  { key: 'checkinDateTime', header: 'Checkin DateTime' },
  { key: 'checkoutDateTime', header: 'Checkout DateTime' },
  { key: 'loadedDateTime', header: 'Loaded DateTime' },
  { key: 'shift', header: 'Shift' }
];

export const COMPLIANCE_COLUMNS: ReadonlyArray<ColumnSpec<ShipmentComplianceRecord>> = [
  { key: 'shipmentNum', header: 'Shipment Num' },
  { key: 'orderNum', header: 'Order Num' },
  { key: 'appointmentDateTime', header: 'Appointment DateTime' },
  { key: 'requiredDateTime', header: 'Required DateTime' },
  { key: 'checkinDateTime', header: 'Checkin DateTime' },
  { key: 'compliance', header: 'Compliance' },
  { key: 'dwellTimeHours', header: 'Dwell Time (Hours)' },
  { key: 'checkoutDateTime', header: 'Checkout DateTime' },
  { key: 'carrier', header: 'Carrier' },
  { key: 'visitType', header: 'Visit Type' },
  { key: 'loadedDateTime', header: 'Loaded DateTime' },
  { key: 'shift', header: 'Shift' },
  { key: 'scheduledDate', header: 'Scheduled Date' },
  { key: 'week', header: 'Week' },
  { key: 'month', header: 'Month' }
];
