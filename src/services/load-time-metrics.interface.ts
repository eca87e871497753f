import { LoadTimeRecord } from '../types/domain.types';
import {
  LoadTimeCompliance,
  LoadTimeFilter,
  LoadTimeSummary,
  ShiftLoadComplianceRow
} from '../types/metrics.types';

export interface ILoadTimeMetrics {
  classify(loadTimeMinutes: number): LoadTimeCompliance;
  summarize(loadTimes: LoadTimeRecord[], filter: LoadTimeFilter): LoadTimeSummary;
  complianceByShift(loadTimes: LoadTimeRecord[]): ShiftLoadComplianceRow[];
}
