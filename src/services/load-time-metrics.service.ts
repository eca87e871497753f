import { inject, injectable } from 'tsyringe';
import { LoadTimeRecord } from '../types/domain.types';
import {
  ALL_FILTER,
  ClassifiedLoadTime,
  LoadTimeCompliance,
  LoadTimeFilter,
  LoadTimeSummary,
  ShiftLoadComplianceRow
} from '../types/metrics.types';
import { compareIdentifiers } from '../utils/columns.util';
import { roundTo2 } from '../utils/timestamp.util';
import { ILoadTimeMetrics } from './load-time-metrics.interface';

function averageLoadTime(records: ClassifiedLoadTime[], compliance: LoadTimeCompliance): number | null {
  const values = records.filter(r => r.compliance === compliance).map(r => r.loadTimeMinutes);
  if (values.length === 0) {
    return null;
  }
  return roundTo2(values.reduce((sum, v) => sum + v, 0) / values.length);
}

@injectable()
export class LoadTimeMetricsService implements ILoadTimeMetrics {
  constructor(@inject('LoadTimeTargetMinutes') private readonly targetMinutes: number) {}

  // The target itself still counts as compliant
  classify(loadTimeMinutes: number): LoadTimeCompliance {
    return loadTimeMinutes <= this.targetMinutes
      ? LoadTimeCompliance.COMPLIANT
      : LoadTimeCompliance.NON_COMPLIANT;
  }

  summarize(loadTimes: LoadTimeRecord[], filter: LoadTimeFilter): LoadTimeSummary {
    const records: ClassifiedLoadTime[] = loadTimes
      .filter(r => filter.shift === ALL_FILTER || r.shift === filter.shift)
      .filter(r => filter.orderType === ALL_FILTER || r.orderType === filter.orderType)
      .map(r => ({ ...r, compliance: this.classify(r.loadTimeMinutes) }));

    const compliantCount = records.filter(r => r.compliance === LoadTimeCompliance.COMPLIANT).length;

    return {
      filter,
      targetMinutes: this.targetMinutes,
      orderCount: records.length,
      compliantCount,
      complianceRate: records.length === 0 ? 0 : roundTo2((compliantCount / records.length) * 100),
      averageLoadTime: {
        [LoadTimeCompliance.COMPLIANT]: averageLoadTime(records, LoadTimeCompliance.COMPLIANT),
        [LoadTimeCompliance.NON_COMPLIANT]: averageLoadTime(records, LoadTimeCompliance.NON_COMPLIANT)
      },
      records
    };
  }

  /**
   * Compliant and non-compliant order counts for every shift, best rate first.
   * Shifts with equal rates keep alphabetical order.
   */
  complianceByShift(loadTimes: LoadTimeRecord[]): ShiftLoadComplianceRow[] {
    const byShift = new Map<string, ShiftLoadComplianceRow>();
    for (const record of loadTimes) {
      const row = byShift.get(record.shift)
        ?? { shift: record.shift, compliant: 0, nonCompliant: 0, total: 0, complianceRate: 0 };
      if (this.classify(record.loadTimeMinutes) === LoadTimeCompliance.COMPLIANT) {
        row.compliant += 1;
      } else {
        row.nonCompliant += 1;
      }
      row.total += 1;
      byShift.set(record.shift, row);
    }

    return [...byShift.values()]
      .map(row => ({ ...row, complianceRate: roundTo2((row.compliant / row.total) * 100) }))
      .sort((a, b) => compareIdentifiers(a.shift, b.shift))
      .sort((a, b) => b.complianceRate - a.complianceRate);
  }
}
