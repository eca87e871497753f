import { LoadTimeRecord } from './domain.types';

export const ALL_FILTER = 'All';

export type PeriodFilter =
  | { readonly kind: 'day'; readonly date: string }      // MM/dd/yyyy, as in Scheduled Date
  | { readonly kind: 'week'; readonly week: number }
  | { readonly kind: 'month'; readonly month: number }
  | { readonly kind: 'ytd' };

export interface BreakdownFilter {
  period: PeriodFilter;
  shift: string;   // ALL_FILTER or a shift label
}

export interface ComplianceCounts {
  onTime: number;
  late: number;
  grandTotal: number;
  onTimePercent: number;
}

export interface DateComplianceRow extends ComplianceCounts {
  scheduledDate: string;
}

export interface CarrierComplianceRow extends ComplianceCounts {
  carrier: string;
}

export enum DwellCategory {
  NONE = '<=0',
  UP_TO_ONE = '0-1',
  ONE_TO_TWO = '1-2',
  TWO_TO_THREE = '2-3',
  OVER_THREE = '3+'
}

export interface DwellCategoryRow extends ComplianceCounts {
  category: DwellCategory;
  latePercent: number;
}

export interface VisitTypeDwellRow {
  visitType: string;
  onTimeAverage: number | null;
  lateAverage: number | null;
}

export interface MonthlyTrendRow {
  month: string;            // yyyy-MM
  averageOnTime: number;    // mean shipments per scheduled day
  averageLate: number;
}

export interface ComplianceBreakdown {
  filter: BreakdownFilter;
  shipmentCount: number;
  totals: ComplianceCounts;
  byDate: DateComplianceRow[];
  byCarrier: CarrierComplianceRow[];
  dwellCategories: DwellCategoryRow[];
  dwellByVisitType: VisitTypeDwellRow[];
  monthlyTrend: MonthlyTrendRow[];
}

export enum LoadTimeCompliance {
  COMPLIANT = 'Compliant',
  NON_COMPLIANT = 'Non-Compliant'
}

export interface ClassifiedLoadTime extends LoadTimeRecord {
  compliance: LoadTimeCompliance;
}

export interface LoadTimeFilter {
  shift: string;       // ALL_FILTER or a shift label
  orderType: string;   // ALL_FILTER or an order type
}

export interface LoadTimeSummary {
  filter: LoadTimeFilter;
  targetMinutes: number;
  orderCount: number;
  compliantCount: number;
  complianceRate: number;   // percent, 2 decimals
  averageLoadTime: Record<LoadTimeCompliance, number | null>;
  records: ClassifiedLoadTime[];
}

// Per-shift tally of load-time compliance, ignoring the summary filter
export interface ShiftLoadComplianceRow {
  shift: string;
  compliant: number;
  nonCompliant: number;
  total: number;
  complianceRate: number;   // percent, 2 decimals
}
