/**
 * Error codes follow the MODULE-NNN convention:
 * BUS (event bus), STATE (storage / context), POLICY, VA (assistant pipeline),
 * CONFIG and SYSTEM.
 */
export type ErrorCode =
  | 'BUS-002'
  | 'BUS-003'
  | 'BUS-007'
  | 'STATE-002'
  | 'VA-002'
  | 'VA-004'
  | 'VA-005'
  | 'VA-006'
  | 'CONFIG-001'
  | 'CONFIG-002'
  | 'SYSTEM-005';

/** Base class for every error the core throws on purpose. */
export abstract class AssistantError extends Error {
  abstract readonly code: ErrorCode;

  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
  }
}

/** Publish attempted on a topic nobody registered to emit (or with no topic at all). */
export class UnregisteredTopicError extends AssistantError {
  readonly code = 'BUS-003';

  constructor(readonly topic: string) {
    super(topic === '' ? 'Event has no topic' : `No publisher registered for topic "${topic}"`);
  }
}

/** Malformed event draft or topic name. */
export class EventValidationError extends AssistantError {
  readonly code = 'BUS-002';
}

export class EventBusClosedError extends AssistantError {
  readonly code = 'BUS-007';

  constructor() {
    super('Event bus is closed');
  }
}

export class StorageError extends AssistantError {
  readonly code = 'STATE-002';
}

/** No response variant could be rendered with the available slots. */
export class TemplateRenderError extends AssistantError {
  readonly code = 'VA-002';
}

export class IllegalTransitionError extends AssistantError {
  readonly code = 'VA-004';
}

/** A caller-supplied turn id is already in use. */
export class DuplicateTurnError extends AssistantError {
  readonly code = 'VA-005';

  constructor(readonly turnId: string) {
    super(`Turn ${turnId} already exists`);
  }
}

/** The generation backend could not produce a completion. */
export class BackendUnavailableError extends AssistantError {
  readonly code = 'VA-006';
}

/** A bounded wait inside a turn ran past its deadline. */
export class StageTimeoutError extends AssistantError {
  readonly code = 'SYSTEM-005';

  constructor(readonly stage: string, readonly timeoutMs: number) {
    super(`Stage ${stage} exceeded ${timeoutMs}ms`);
  }
}

/** Intent or response catalog could not be loaded. */
export class CatalogError extends AssistantError {
  readonly code = 'CONFIG-001';
}

/** Environment configuration failed validation. */
export class ConfigError extends AssistantError {
  readonly code = 'CONFIG-002';
}
