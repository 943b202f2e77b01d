import type { ErrorReport } from '../model/ErrorReport.js';

/** Emitted when a single record was built and accepted by `afterConstruct`. */
export interface RecordConstructedEvent {
  readonly type: 'record:constructed';
  readonly recordType: string;
  readonly record: object;
  readonly timestamp: number;
}

/** Emitted when field chains, `beforeConstruct` or `afterConstruct` rejected a single record. */
export interface RecordRejectedEvent {
  readonly type: 'record:rejected';
  readonly recordType: string;
  readonly report: ErrorReport;
  readonly timestamp: number;
}

/** Emitted when the input has no recognized shape. */
export interface InputRejectedEvent {
  readonly type: 'input:rejected';
  readonly recordType: string;
  readonly reason: string;
  readonly timestamp: number;
}

export type DomainEvent = RecordConstructedEvent | RecordRejectedEvent | InputRejectedEvent;

export type EventType = DomainEvent['type'];

/** Extract the event payload type for a given event type string. */
export type EventPayload<T extends EventType> = Extract<DomainEvent, { type: T }>;
