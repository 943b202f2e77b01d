import type { RawRecord } from '../model/Record.js';

/** Options shared by delimited-text parsers. */
export interface ParserOptions {
  /** Column delimiter character (e.g. `','`, `';'`, `'\t'`). */
  readonly delimiter?: string;
  /** Character encoding of the source data. */
  readonly encoding?: string;
  /** Whether the first row contains column headers. */
  readonly hasHeader?: boolean;
}

/**
 * Port for decoding a payload into mappings.
 *
 * Implement this interface to construct records from new formats. Parsing is
 * synchronous, like construction itself.
 */
export interface SourceParser {
  /** Decode a payload into mappings, one per record. */
  parse(data: string | Buffer): Iterable<RawRecord>;
}
