import { OrderRecord, RawTable } from '../types/domain.types';

export interface IOrderCleaner {
  /**
   * Reduces an order view export to one record per shipment.
   * @throws SchemaError when a required column is missing or a timestamp is unparseable
   */
  cleanOrders(raw: RawTable): OrderRecord[];
}
