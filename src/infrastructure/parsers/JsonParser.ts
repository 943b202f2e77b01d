import type { SourceParser } from '../../domain/ports/SourceParser.js';
import type { RawRecord } from '../../domain/model/Record.js';

export type JsonFormat = 'array' | 'ndjson';

export interface JsonParserOptions {
  /** `'array'` for one JSON array of objects, `'ndjson'` for one object per line. Default: picked from the first character. */
  readonly format?: JsonFormat;
}

/** A decoded value and where it came from, for error messages. */
type Located = readonly [position: string, value: unknown];

/**
 * Decodes a JSON array or newline-delimited JSON into mappings.
 *
 * Values keep their JSON types and nested objects stay nested, so fields declared
 * with `asStep()` construct them as records.
 */
export class JsonParser implements SourceParser {
  constructor(private readonly options: JsonParserOptions = {}) {}

  *parse(data: string | Buffer): Iterable<RawRecord> {
    const content = (typeof data === 'string' ? data : data.toString('utf-8')).trim();
    if (content === '') return;

    const format = this.options.format ?? (content.startsWith('[') ? 'array' : 'ndjson');
    const items = format === 'array' ? decodeArray(content) : decodeLines(content);

    for (const [position, item] of items) {
      if (!isJsonObject(item)) {
        throw new Error(`JsonParser: ${position} is not a JSON object`);
      }
      yield item;
    }
  }
}

function decodeArray(content: string): Located[] {
  const parsed: unknown = JSON.parse(content);
  if (!Array.isArray(parsed)) {
    throw new Error('JsonParser: expected a JSON array of objects');
  }
  const items: unknown[] = parsed;
  return items.map((item, index): Located => [`item ${String(index)}`, item]);
}

function* decodeLines(content: string): Iterable<Located> {
  for (const [index, line] of content.split('\n').entries()) {
    if (line.trim() === '') continue;
    const value: unknown = JSON.parse(line);
    yield [`line ${String(index + 1)}`, value];
  }
}

function isJsonObject(value: unknown): value is RawRecord {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}
