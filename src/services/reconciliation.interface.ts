import { OrderRecord, ShipmentComplianceRecord, TrailerRecord } from '../types/domain.types';

export interface IReconciliationEngine {
  reconcile(orders: OrderRecord[], trailers: TrailerRecord[]): ShipmentComplianceRecord[];
}
