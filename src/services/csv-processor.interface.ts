import { RawTable } from '../types/domain.types';
import { ColumnSpec } from '../types/table.types';

export interface ICsvProcessor {
  readTable(csvPath: string): Promise<RawTable>;
  parseTable(content: string): Promise<RawTable>;
  stringifyTable<T>(records: T[], columns: ReadonlyArray<ColumnSpec<T>>): Promise<string>;
  writeTable<T>(outputPath: string, records: T[], columns: ReadonlyArray<ColumnSpec<T>>): Promise<void>;
}
