/** A field error message, or the report of a nested record. */
export type ErrorDetail = string | ErrorReport;

/**
 * Structured errors for one construction call.
 *
 * Keys are field names, or the decimal index of the failing element when a list
 * of inputs was constructed. Values are messages or nested reports.
 */
export interface ErrorReport {
  readonly [fieldOrIndex: string]: ErrorDetail;
}

/** Check whether a report carries no errors. */
export function isEmptyReport(report: ErrorReport): boolean {
  return Object.keys(report).length === 0;
}
