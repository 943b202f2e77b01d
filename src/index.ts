// Main entry point
export { RecordType, defineRecord } from './RecordType.js';
export type { RecordTypeConfig } from './RecordType.js';
export type { Constructed, ConstructionResult } from './application/usecases/ConstructRecord.js';

// Domain model
export type { SchemaDefinition } from './domain/model/Schema.js';
export type { FieldDefinition } from './domain/model/FieldDefinition.js';
export type { ConstructOptions, ResolvedConstructOptions } from './domain/model/ConstructOptions.js';
export { DEFAULT_CONSTRUCT_OPTIONS } from './domain/model/ConstructOptions.js';
export type {
  ConversionStep,
  DirectStep,
  BoundStep,
  ChainStep,
  StepSpec,
  StepFn,
  BoundStepFn,
  StepResult,
  StepError,
} from './domain/model/ConversionStep.js';
export { direct, bound, chain, toStep } from './domain/model/ConversionStep.js';
export type { Result } from './domain/model/Result.js';
export { ok, fail } from './domain/model/Result.js';
export type { ErrorReport, ErrorDetail } from './domain/model/ErrorReport.js';
export { isEmptyReport } from './domain/model/ErrorReport.js';
export type { RawRecord, RecordOwner } from './domain/model/Record.js';
export { ownerOf } from './domain/model/Record.js';
export type { RecordConstructorErrorCode } from './domain/model/Errors.js';
export {
  RecordConstructorError,
  ShapeError,
  KeyError,
  ConstructionException,
  ConversionStepError,
  SchemaDefinitionError,
} from './domain/model/Errors.js';

// Domain services (for building custom pipelines)
export { runStep } from './domain/services/FieldPipeline.js';

// Ports (for custom implementations)
export type {
  ConstructHooks,
  HookContext,
  BeforeConstructResult,
  AfterConstructResult,
} from './domain/ports/ConstructHooks.js';
export { defaultBeforeConstruct, defaultAfterConstruct } from './domain/ports/ConstructHooks.js';
export type { SourceParser, ParserOptions } from './domain/ports/SourceParser.js';

// Domain events
export type {
  DomainEvent,
  EventType,
  EventPayload,
  RecordConstructedEvent,
  RecordRejectedEvent,
  InputRejectedEvent,
} from './domain/events/DomainEvents.js';
export type { HandlerErrorListener } from './application/EventBus.js';

// Infrastructure adapters (built-in parsers)
export { CsvParser } from './infrastructure/parsers/CsvParser.js';
export type { CsvParserOptions } from './infrastructure/parsers/CsvParser.js';
export { JsonParser } from './infrastructure/parsers/JsonParser.js';
export type { JsonParserOptions, JsonFormat } from './infrastructure/parsers/JsonParser.js';

// Built-in conversion steps
export * from './steps/index.js';
