import { LoadTimeRecord, RawTable } from '../types/domain.types';

export interface IActivityCleaner {
  /**
   * Reduces an activity tracker export to one load-time record per order.
   * @throws SchemaError when a required column is missing or a timestamp is unparseable
   */
  cleanActivity(raw: RawTable): LoadTimeRecord[];
}
