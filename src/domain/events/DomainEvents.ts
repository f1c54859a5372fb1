import type { ColumnSchema } from '../model/ColumnSchema.js';
import type { ConversionStage, SkipReason } from '../model/FileOutcome.js';

/** Emitted when a file passes its entry guards and inference begins. */
export interface FileStartedEvent {
  readonly type: 'file:started';
  readonly filePath: string;
  readonly timestamp: number;
}

/** Emitted when a file is left alone because of a guard. */
export interface FileSkippedEvent {
  readonly type: 'file:skipped';
  readonly filePath: string;
  readonly reason: SkipReason;
  readonly path: string;
  readonly timestamp: number;
}

/** Emitted after overrides are applied, in every mode. */
export interface FileSchemaEvent {
  readonly type: 'file:schema';
  readonly filePath: string;
  readonly schema: ColumnSchema;
  readonly sampledRows: number;
  readonly timestamp: number;
}

/** Emitted after the output has been renamed into place. */
export interface FileConvertedEvent {
  readonly type: 'file:converted';
  readonly filePath: string;
  readonly outputPath: string;
  readonly rowCount: number;
  readonly timestamp: number;
}

/** Emitted when a conversion fails. The run stops after this event. */
export interface FileFailedEvent {
  readonly type: 'file:failed';
  readonly filePath: string;
  readonly stage: ConversionStage;
  readonly error: string;
  readonly timestamp: number;
}

/** Emitted when `removeInput` deleted a converted input. */
export interface InputRemovedEvent {
  readonly type: 'input:removed';
  readonly filePath: string;
  readonly timestamp: number;
}

/** Emitted when `removeInput` could not delete a converted input. Not fatal. */
export interface InputRemoveFailedEvent {
  readonly type: 'input:remove-failed';
  readonly filePath: string;
  readonly error: string;
  readonly timestamp: number;
}

/** Emitted when a staging file or an input handle could not be released after a conversion. */
export interface CleanupFailedEvent {
  readonly type: 'cleanup:failed';
  readonly filePath: string;
  /** The staging file or input that could not be released. */
  readonly path: string;
  readonly error: string;
  readonly timestamp: number;
}

/** Union of all domain events. */
export type DomainEvent =
  | FileStartedEvent
  | FileSkippedEvent
  | FileSchemaEvent
  | FileConvertedEvent
  | FileFailedEvent
  | InputRemovedEvent
  | InputRemoveFailedEvent
  | CleanupFailedEvent;

/** String literal union of all event type discriminators. */
export type EventType = DomainEvent['type'];

/** Extract the event payload type for a given event type string. */
export type EventPayload<T extends EventType> = Extract<DomainEvent, { type: T }>;
