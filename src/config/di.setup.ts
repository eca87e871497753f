import 'reflect-metadata';
import { container } from 'tsyringe';
import { CsvShiftCalendarAdapter } from '../adapters/shift-calendar/csv-shift-calendar.adapter';
import { IShiftCalendarAdapter } from '../adapters/shift-calendar/shift-calendar-adapter.interface';
import { IActivityCleaner } from '../services/activity-cleaner.interface';
import { ActivityCleanerService } from '../services/activity-cleaner.service';
import { IComplianceMetrics } from '../services/compliance-metrics.interface';
import { ComplianceMetricsService } from '../services/compliance-metrics.service';
import { ICompliancePipeline } from '../services/compliance-pipeline.interface';
import { CompliancePipelineService } from '../services/compliance-pipeline.service';
import { ICsvProcessor } from '../services/csv-processor.interface';
import { CsvProcessorService } from '../services/csv-processor.service';
import { IDashboardSession } from '../services/dashboard-session.interface';
import { DashboardSessionService } from '../services/dashboard-session.service';
import { ILoadTimeMetrics } from '../services/load-time-metrics.interface';
import { LoadTimeMetricsService } from '../services/load-time-metrics.service';
import { IOrderCleaner } from '../services/order-cleaner.interface';
import { OrderCleanerService } from '../services/order-cleaner.service';
import { IReconciliationEngine } from '../services/reconciliation.interface';
import { ReconciliationService } from '../services/reconciliation.service';
import { IShiftResolver } from '../services/shift-resolver.interface';
import { ShiftResolverService } from '../services/shift-resolver.service';
import { ITrailerCleaner } from '../services/trailer-cleaner.interface';
import { TrailerCleanerService } from '../services/trailer-cleaner.service';
import { isSuccess } from '../types/result.types';
import { AppConfig } from './app.config';

export function setupDI(config: AppConfig): void {
  // Register configuration values
  container.register('ShiftCalendarPath', { useValue: config.data.shiftCalendarPath });
  container.register('InputEncoding', { useValue: config.data.inputEncoding });
  container.register('LoadTimeTargetMinutes', { useValue: config.loadTimeTargetMinutes });

  // Register adapters
  container.register<IShiftCalendarAdapter>('IShiftCalendarAdapter', {
    useClass: CsvShiftCalendarAdapter
  });

  // Register services
  container.register<ICsvProcessor>('ICsvProcessor', {
    useClass: CsvProcessorService
  });

  container.register<IShiftResolver>('IShiftResolver', {
    useClass: ShiftResolverService
  });

  container.register<IActivityCleaner>('IActivityCleaner', {
    useClass: ActivityCleanerService
  });

  container.register<IOrderCleaner>('IOrderCleaner', {
    useClass: OrderCleanerService
  });

  container.register<ITrailerCleaner>('ITrailerCleaner', {
    useClass: TrailerCleanerService
  });

  container.register<IReconciliationEngine>('IReconciliationEngine', {
    useClass: ReconciliationService
  });

  container.register<ICompliancePipeline>('ICompliancePipeline', {
    useClass: CompliancePipelineService
  });

  container.register<IComplianceMetrics>('IComplianceMetrics', {
    useClass: ComplianceMetricsService
  });

  container.register<ILoadTimeMetrics>('ILoadTimeMetrics', {
    useClass: LoadTimeMetricsService
  });

  // One session per process: it holds the last known-good tables
  container.registerSingleton<IDashboardSession>('IDashboardSession', DashboardSessionService);
}

/**
 * Loads the shift calendar once and registers it as immutable configuration
 * for the shift resolver. Must run after setupDI.
 */
export async function registerShiftCalendar(): Promise<void> {
  const adapter = container.resolve<IShiftCalendarAdapter>('IShiftCalendarAdapter');
  const result = await adapter.loadCalendar();

  if (!isSuccess(result)) {
    throw new Error(result.message);
  }

  console.log(`[Shift Calendar] ${result.message}`);
  container.register('ShiftCalendar', { useValue: result.data });
}
