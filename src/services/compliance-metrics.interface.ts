import { ShipmentComplianceRecord } from '../types/domain.types';
import {
  BreakdownFilter,
  CarrierComplianceRow,
  ComplianceBreakdown,
  DateComplianceRow,
  DwellCategoryRow,
  MonthlyTrendRow,
  VisitTypeDwellRow
} from '../types/metrics.types';

export interface IComplianceMetrics {
  filter(records: ShipmentComplianceRecord[], filter: BreakdownFilter): ShipmentComplianceRecord[];
  shiftOptions(records: ShipmentComplianceRecord[]): string[];
  complianceByDate(records: ShipmentComplianceRecord[]): DateComplianceRow[];
  complianceByCarrier(records: ShipmentComplianceRecord[]): CarrierComplianceRow[];
  dwellCategoryCounts(records: ShipmentComplianceRecord[]): DwellCategoryRow[];
  averageDwellByVisitType(records: ShipmentComplianceRecord[]): VisitTypeDwellRow[];
  monthlyAverageTrend(records: ShipmentComplianceRecord[]): MonthlyTrendRow[];
  breakdown(records: ShipmentComplianceRecord[], filter: BreakdownFilter): ComplianceBreakdown;
}
