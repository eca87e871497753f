import { format, parse } from 'date-fns';
import { injectable } from 'tsyringe';
import { ComplianceStatus, ShipmentComplianceRecord } from '../types/domain.types';
import {
  ALL_FILTER,
  BreakdownFilter,
  CarrierComplianceRow,
  ComplianceBreakdown,
  ComplianceCounts,
  DateComplianceRow,
  DwellCategory,
  DwellCategoryRow,
  MonthlyTrendRow,
  PeriodFilter,
  VisitTypeDwellRow
} from '../types/metrics.types';
import { compareIdentifiers } from '../utils/columns.util';
import { roundTo2 } from '../utils/timestamp.util';
import { IComplianceMetrics } from './compliance-metrics.interface';

// Right-inclusive upper bounds; anything above the last bound is OVER_THREE
const DWELL_BUCKETS: ReadonlyArray<{ category: DwellCategory; upTo: number }> = [
  { category: DwellCategory.NONE, upTo: 0 },
  { category: DwellCategory.UP_TO_ONE, upTo: 1 },
  { category: DwellCategory.ONE_TO_TWO, upTo: 2 },
  { category: DwellCategory.TWO_TO_THREE, upTo: 3 }
];

const SCHEDULED_DATE_FORMAT = 'MM/dd/yyyy';

export function dwellCategoryFor(dwellHours: number): DwellCategory {
  const bucket = DWELL_BUCKETS.find(b => dwellHours <= b.upTo);
  return bucket ? bucket.category : DwellCategory.OVER_THREE;
}

function percent(part: number, total: number): number {
  return total === 0 ? 0 : roundTo2((part / total) * 100);
}

function countCompliance(records: ShipmentComplianceRecord[]): ComplianceCounts {
  const onTime = records.filter(r => r.compliance === ComplianceStatus.ON_TIME).length;
  const late = records.length - onTime;
  return { onTime, late, grandTotal: records.length, onTimePercent: percent(onTime, records.length) };
}

function average(values: number[]): number | null {
  if (values.length === 0) {
    return null;
  }
  return roundTo2(values.reduce((sum, v) => sum + v, 0) / values.length);
}

function groupBy<T>(items: T[], keyOf: (item: T) => string): Map<string, T[]> {
  const groups = new Map<string, T[]>();
  for (const item of items) {
    const key = keyOf(item);
    const group = groups.get(key);
    if (group) {
      group.push(item);
    } else {
      groups.set(key, [item]);
    }
  }
  return groups;
}

function matchesPeriod(record: ShipmentComplianceRecord, period: PeriodFilter): boolean {
  switch (period.kind) {
    case 'day':
      return record.scheduledDate === period.date;
    case 'week':
      return record.week === period.week;
    case 'month':
      return record.month === period.month;
    case 'ytd':
      return true;
  }
}

function parseScheduledDate(scheduledDate: string): Date {
  return parse(scheduledDate, SCHEDULED_DATE_FORMAT, new Date(2000, 0, 1));
}

@injectable()
export class ComplianceMetricsService implements IComplianceMetrics {
  filter(records: ShipmentComplianceRecord[], filter: BreakdownFilter): ShipmentComplianceRecord[] {
    return records.filter(record =>
      matchesPeriod(record, filter.period)
      && (filter.shift === ALL_FILTER || record.shift === filter.shift)
    );
  }

  shiftOptions(records: ShipmentComplianceRecord[]): string[] {
    return [ALL_FILTER, ...new Set(records.map(r => r.shift))];
  }

  complianceByDate(records: ShipmentComplianceRecord[]): DateComplianceRow[] {
    return [...groupBy(records, r => r.scheduledDate).entries()]
      .sort(([a], [b]) => parseScheduledDate(a).getTime() - parseScheduledDate(b).getTime())
      .map(([scheduledDate, group]) => ({ scheduledDate, ...countCompliance(group) }));
  }

  complianceByCarrier(records: ShipmentComplianceRecord[]): CarrierComplianceRow[] {
    return [...groupBy(records, r => r.carrier).entries()]
      .sort(([a], [b]) => compareIdentifiers(a, b))
      .map(([carrier, group]) => ({ carrier, ...countCompliance(group) }))
      .sort((a, b) => b.onTimePercent - a.onTimePercent);
  }

  dwellCategoryCounts(records: ShipmentComplianceRecord[]): DwellCategoryRow[] {
    const byCategory = new Map<DwellCategory, ShipmentComplianceRecord[]>();
    for (const record of records) {
      if (record.dwellTimeHours === null) {
        continue;
      }
      const category = dwellCategoryFor(record.dwellTimeHours);
      byCategory.set(category, [...(byCategory.get(category) ?? []), record]);
    }

    return Object.values(DwellCategory).map(category => {
      const counts = countCompliance(byCategory.get(category) ?? []);
      return {
        category,
        ...counts,
        latePercent: percent(counts.late, counts.grandTotal)
      };
    });
  }

  averageDwellByVisitType(records: ShipmentComplianceRecord[]): VisitTypeDwellRow[] {
    const dwellOf = (group: ShipmentComplianceRecord[], status: ComplianceStatus): number[] =>
      group
        .filter(r => r.compliance === status)
        .flatMap(r => (r.dwellTimeHours === null ? [] : [r.dwellTimeHours]));

    return [...groupBy(records, r => r.visitType).entries()]
      .sort(([a], [b]) => compareIdentifiers(a, b))
      .map(([visitType, group]) => ({
        visitType,
        onTimeAverage: average(dwellOf(group, ComplianceStatus.ON_TIME)),
        lateAverage: average(dwellOf(group, ComplianceStatus.LATE))
      }));
  }

  /**
   * Average shipments per scheduled day, by month. Days without any
   * shipment are not counted.
   */
  monthlyAverageTrend(records: ShipmentComplianceRecord[]): MonthlyTrendRow[] {
    const days = this.complianceByDate(records);
    const byMonth = groupBy(days, day => format(parseScheduledDate(day.scheduledDate), 'yyyy-MM'));

    return [...byMonth.entries()]
      .sort(([a], [b]) => compareIdentifiers(a, b))
      .map(([month, monthDays]) => ({
        month,
        averageOnTime: average(monthDays.map(d => d.onTime)) ?? 0,
        averageLate: average(monthDays.map(d => d.late)) ?? 0
      }));
  }

  breakdown(records: ShipmentComplianceRecord[], filter: BreakdownFilter): ComplianceBreakdown {
    const filtered = this.filter(records, filter);

    return {
      filter,
      shipmentCount: filtered.length,
      totals: countCompliance(filtered),
      byDate: this.complianceByDate(filtered),
      byCarrier: this.complianceByCarrier(filtered),
      dwellCategories: this.dwellCategoryCounts(filtered),
      dwellByVisitType: this.averageDwellByVisitType(filtered),
      monthlyTrend: this.monthlyAverageTrend(filtered)
    };
  }
}
