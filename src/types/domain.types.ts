// Domain types - canonical records isolated from export file formats

export type CellValue = string | number | Date | null | undefined;

export type RawRow = Record<string, CellValue>;

/**
 * Parsed tabular input as delivered by a file reader or an upload.
 * Column names are kept exactly as they appear in the export header.
 */
export interface RawTable {
  columns: string[];
  rows: RawRow[];
}

export const UNRESOLVED_SHIFT = 'Unresolved';

export type ShiftSlot = '1' | '2';

export enum OrderType {
  SHUTTLE = 'Shuttle',
  CUSTOMER_LOAD = 'Customer Load',
  UNKNOWN = 'Unknown'
}

export enum ComplianceStatus {
  ON_TIME = 'On Time',
  LATE = 'Late'
}

export const LIVE_VISIT_TYPE = 'LIVE';

export interface LoadTimeRecord {
  orderNum: string;
  loadTimeMinutes: number;
  shift: string;
  orderType: OrderType;
}

export interface OrderRecord {
  shipmentNum: string;
  orderNum: string;
  appointmentDateTime: Date;
  carrier: string;
  visitType: string;
  requiredDateTime: Date;
  scheduledDate: string;   // MM/dd/yyyy
  week: number;            // ISO-8601 week
  month: number;           // 1-12
}

export interface TrailerRecord {
  shipmentNum: string;
  checkinDateTime: Date;
  checkoutDateTime: Date;
  loadedDateTime: Date;
  shift: string;
}

/**
 * One order left-joined with its trailer, before rows without a checkin are pruned.
 * Trailer-side fields are null when the shipment has no CLOSED trailer event.
 */
export interface JoinedShipmentRow {
  shipmentNum: string;
  orderNum: string;
  appointmentDateTime: Date;
  requiredDateTime: Date;
  checkinDateTime: Date | null;
  checkoutDateTime: Date | null;
  carrier: string;
  visitType: string;
  loadedDateTime: Date | null;
  shift: string | null;
  scheduledDate: string;
  week: number;
  month: number;
  compliance: ComplianceStatus;
  dwellTimeHours: number | null;
}

export interface ShipmentComplianceRecord extends JoinedShipmentRow {
  checkinDateTime: Date;
  checkoutDateTime: Date;
  loadedDateTime: Date;
  shift: string;
}

export interface PipelineInputs {
  activity: RawTable;
  orders: RawTable;
  trailers: RawTable;
}

export interface PipelineOutput {
  loadTimes: LoadTimeRecord[];
  orders: OrderRecord[];
  trailers: TrailerRecord[];
  compliance: ShipmentComplianceRecord[];
}
