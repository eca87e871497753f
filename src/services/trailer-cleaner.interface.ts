import { RawTable, TrailerRecord } from '../types/domain.types';

export interface ITrailerCleaner {
  /**
   * Reduces a trailer activity export to one CLOSED record per shipment.
   * @throws SchemaError when a required column is missing or a timestamp is unparseable
   */
  cleanTrailers(raw: RawTable): TrailerRecord[];
}
