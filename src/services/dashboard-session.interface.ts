import { PipelineInputs, PipelineOutput } from '../types/domain.types';
import { Result } from '../types/result.types';

export interface IDashboardSession {
  /**
   * Recomputes every table from a fresh set of exports.
   * @returns success=false with a readable message when any file is rejected; the previous tables stay current
   */
  upload(inputs: PipelineInputs): Result<PipelineOutput>;

  /**
   * @returns success without data until the first upload succeeds
   */
  current(): Result<PipelineOutput>;
}
