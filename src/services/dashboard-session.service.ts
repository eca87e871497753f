import { inject, injectable } from 'tsyringe';
import { PipelineInputs, PipelineOutput } from '../types/domain.types';
import { isSchemaError, Result } from '../types/result.types';
import { ICompliancePipeline } from './compliance-pipeline.interface';
import { IDashboardSession } from './dashboard-session.interface';

@injectable()
export class DashboardSessionService implements IDashboardSession {
  private snapshot: PipelineOutput | null = null;

  constructor(@inject('ICompliancePipeline') private pipeline: ICompliancePipeline) {}

  upload(inputs: PipelineInputs): Result<PipelineOutput> {
    try {
      const output = this.pipeline.run(inputs);
      this.snapshot = output;
      return {
        success: true,
        data: output,
        message: 'All files uploaded and cleaned successfully'
      };
    } catch (error) {
      const errorMessage = error instanceof Error ? error.message : String(error);
      const kind = isSchemaError(error) ? `schema error in ${error.file} file` : 'unexpected error';

      console.error(`[Session] Upload rejected (${kind}): ${errorMessage}`);

      return {
        success: false,
        message: `Error in processing files: ${errorMessage}`
      };
    }
  }

  current(): Result<PipelineOutput> {
    if (this.snapshot === null) {
      return { success: true, message: 'No files have been processed yet' };
    }
    return { success: true, data: this.snapshot, message: 'Current session tables' };
  }
}
