import { inject, injectable } from 'tsyringe';
import { PipelineInputs, PipelineOutput } from '../types/domain.types';
import { IActivityCleaner } from './activity-cleaner.interface';
import { ICompliancePipeline } from './compliance-pipeline.interface';
import { IOrderCleaner } from './order-cleaner.interface';
import { IReconciliationEngine } from './reconciliation.interface';
import { ITrailerCleaner } from './trailer-cleaner.interface';

@injectable()
export class CompliancePipelineService implements ICompliancePipeline {
  constructor(
    @inject('IActivityCleaner') private activityCleaner: IActivityCleaner,
    @inject('IOrderCleaner') private orderCleaner: IOrderCleaner,
    @inject('ITrailerCleaner') private trailerCleaner: ITrailerCleaner,
    @inject('IReconciliationEngine') private reconciliationEngine: IReconciliationEngine,
  ) {}

  run(inputs: PipelineInputs): PipelineOutput {
    const loadTimes = this.activityCleaner.cleanActivity(inputs.activity);
    const orders = this.orderCleaner.cleanOrders(inputs.orders);
    const trailers = this.trailerCleaner.cleanTrailers(inputs.trailers);
    const compliance = this.reconciliationEngine.reconcile(orders, trailers);

    console.log(
      `[Pipeline] ${loadTimes.length} order load time(s); ${compliance.length} of ${orders.length} shipment(s) matched ${trailers.length} closed trailer(s)`,
    );

    return { loadTimes, orders, trailers, compliance };
  }
}
