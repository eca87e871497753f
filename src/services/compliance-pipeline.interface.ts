import { PipelineInputs, PipelineOutput } from '../types/domain.types';

export interface ICompliancePipeline {
  /**
   * Cleans all three exports and reconciles them. Either every table is
   * produced or a SchemaError is thrown.
   */
  run(inputs: PipelineInputs): PipelineOutput;
}
