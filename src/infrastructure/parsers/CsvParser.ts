import Papa from 'papaparse';
import type { SourceParser, ParserOptions } from '../../domain/ports/SourceParser.js';
import type { RawRecord } from '../../domain/model/Record.js';
import { isEmptyRow } from '../../domain/model/Record.js';

export interface CsvParserOptions extends ParserOptions {
  /** Key names for each column, in order. Required when `hasHeader` is `false`. */
  readonly columns?: readonly string[];
}

/**
 * CSV parser adapter using PapaParse. Every value is kept as a string; conversion
 * belongs to the field chains. Rows whose values are all empty are skipped.
 */
export class CsvParser implements SourceParser {
  private readonly options: CsvParserOptions;

  constructor(options?: CsvParserOptions) {
    this.options = {
      delimiter: options?.delimiter,
      encoding: options?.encoding ?? 'utf-8',
      hasHeader: options?.hasHeader ?? true,
      columns: options?.columns,
    };

    if (!this.options.hasHeader && !this.options.columns) {
      throw new Error('CsvParser: `columns` is required when `hasHeader` is false');
    }
  }

  *parse(data: string | Buffer): Iterable<RawRecord> {
    const content = typeof data === 'string' ? data : new TextDecoder(this.options.encoding).decode(data);
    const rows = this.options.hasHeader ? this.parseWithHeader(content) : this.parseWithColumns(content);

    for (const row of rows) {
      if (isEmptyRow(row)) continue;
      yield row;
    }
  }

  private parseWithHeader(content: string): RawRecord[] {
    return Papa.parse<Record<string, string>>(content, {
      header: true,
      delimiter: this.options.delimiter ?? '',
      skipEmptyLines: true,
      dynamicTyping: false,
    }).data;
  }

  private parseWithColumns(content: string): RawRecord[] {
    const columns = this.options.columns ?? [];
    const rows = Papa.parse<string[]>(content, {
      header: false,
      delimiter: this.options.delimiter ?? '',
      skipEmptyLines: true,
      dynamicTyping: false,
    }).data;

    return rows.map((row) =>
      Object.fromEntries(columns.map((column, index): [string, unknown] => [column, row[index]])),
    );
  }
}
