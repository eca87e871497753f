import * as fs from 'fs';
import { parse, Parser } from 'csv-parse';
import { stringify } from 'csv-stringify';
import { inject, injectable } from 'tsyringe';
import { RawRow, RawTable } from '../types/domain.types';
import { ColumnSpec } from '../types/table.types';
import { formatTimestamp } from '../utils/timestamp.util';
import { ICsvProcessor } from './csv-processor.interface';

@injectable()
export class CsvProcessorService implements ICsvProcessor {
  constructor(@inject('InputEncoding') private readonly encoding: BufferEncoding) {}

  async readTable(csvPath: string): Promise<RawTable> {
    return new Promise((resolve, reject) => {
      const parser = this.createParser(this.encoding, resolve, reject);

      fs.createReadStream(csvPath)
        .on('error', (error) => reject(error))
        .pipe(parser);
    });
  }

  async parseTable(content: string): Promise<RawTable> {
    return new Promise((resolve, reject) => {
      // Text uploads are already decoded
      const parser = this.createParser('utf8', resolve, reject);
      parser.end(content);
    });
  }

  async stringifyTable<T>(records: T[], columns: ReadonlyArray<ColumnSpec<T>>): Promise<string> {
    return new Promise((resolve, reject) => {
      stringify(
        records,
        {
          header: true,
          columns: columns.map(c => ({ key: c.key, header: c.header })),
          cast: { date: (value) => formatTimestamp(value) }
        },
        (err, output) => {
          if (err) {
            reject(err);
            return;
          }
          resolve(output);
        }
      );
    });
  }

  async writeTable<T>(
    outputPath: string,
    records: T[],
    columns: ReadonlyArray<ColumnSpec<T>>
  ): Promise<void> {
    const output = await this.stringifyTable(records, columns);
    await fs.promises.writeFile(outputPath, output);
  }

  // Headers are kept verbatim; the cleaners resolve them by normalized name
  private createParser(
    encoding: BufferEncoding,
    resolve: (table: RawTable) => void,
    reject: (error: Error) => void
  ): Parser {
    let columns: string[] = [];
    const rows: RawRow[] = [];

    return parse({
      encoding,
      bom: true,
      skip_empty_lines: true,
      relax_column_count: true,
      columns: (header: string[]) => {
        columns = header;
        return header;
      }
    })
      .on('data', (row: RawRow) => rows.push(row))
      .on('end', () => resolve({ columns, rows }))
      .on('error', (error: Error) => reject(error));
  }
}
