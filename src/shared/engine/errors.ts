/**
 * Engine Domain Errors - Structured error types for the rules engine layer
 *
 * Ordinary rule rejections (illegal moves, missing staged input, world
 * limits) are NOT errors: they are reported as `ValidationOutcome` values so
 * that a commit can fail without unwinding anything. The classes here cover
 * the exceptional cases:
 *
 * - **InvalidState**: a caller addressed state that does not exist
 *   (unknown world id, empty history)
 * - **BoardConstraintViolation**: direct board access outside the 9×9 grid
 * - **InvalidSettings**: settings that fail schema validation
 * - **EngineError** with an INTERNAL_* code: a broken engine invariant
 *
 * Usage:
 * ```typescript
 * import { InvalidState, EngineErrorCode } from './errors';
 *
 * throw new InvalidState(
 *   EngineErrorCode.STATE_WORLD_NOT_FOUND,
 *   'World not found',
 *   { worldId: 4 }
 * );
 * ```
 *
 * @module EngineErrors
 */

// =============================================================================
// ERROR CODES
// =============================================================================

/**
 * Enumeration of all engine domain error codes.
 *
 * Error codes are prefixed by category:
 * - STATE_*: Missing or inconsistent game state
 * - BOARD_*: Board geometry issues
 * - CONFIG_*: Settings validation issues
 * - FSM_*: Commit phase transition errors
 * - INTERNAL_*: Broken engine invariants
 */
export enum EngineErrorCode {
  /** No world with the requested id */
  STATE_WORLD_NOT_FOUND = 'STATE_WORLD_NOT_FOUND',
  /** A world exists but its history is empty */
  STATE_SNAPSHOT_NOT_FOUND = 'STATE_SNAPSHOT_NOT_FOUND',

  /** Position outside the 9×9 grid */
  BOARD_INVALID_POSITION = 'BOARD_INVALID_POSITION',

  /** Settings failed schema validation */
  CONFIG_INVALID_SETTINGS = 'CONFIG_INVALID_SETTINGS',

  /** Invalid commit phase transition */
  FSM_INVALID_TRANSITION = 'FSM_INVALID_TRANSITION',

  /** Assertion failed - indicates a bug */
  INTERNAL_ASSERTION_FAILED = 'INTERNAL_ASSERTION_FAILED',
  /** Candidate collapse did not reach a fixpoint within the pass bound */
  INTERNAL_COLLAPSE_DIVERGED = 'INTERNAL_COLLAPSE_DIVERGED',
}

/**
 * Maps error codes to human-readable category descriptions.
 */
export const ERROR_CATEGORY_DESCRIPTIONS: Record<string, string> = {
  STATE_: 'Missing or inconsistent game state',
  BOARD_: 'Board geometry constraint violation',
  CONFIG_: 'Invalid engine settings',
  FSM_: 'Invalid commit phase transition',
  INTERNAL_: 'Internal engine error (bug)',
};

// =============================================================================
// BASE ERROR CLASS
// =============================================================================

/**
 * Base class for all engine domain errors.
 */
export class EngineError extends Error {
  /** Error code for programmatic handling */
  readonly code: EngineErrorCode;

  /** Additional context for debugging */
  readonly context: Record<string, unknown>;

  /** Domain that generated the error (e.g., 'CommitOrchestrator', 'Collapse') */
  readonly domain: string;

  readonly timestamp: Date;

  constructor(
    code: EngineErrorCode,
    message: string,
    context: Record<string, unknown> = {},
    domain: string = 'Engine'
  ) {
    super(message);
    this.name = 'EngineError';
    this.code = code;
    this.context = context;
    this.domain = domain;
    this.timestamp = new Date();

    // Maintain proper prototype chain
    Object.setPrototypeOf(this, EngineError.prototype);
  }

  /** Get error category from code prefix */
  get category(): string {
    const prefix = this.code.split('_')[0] + '_';
    return ERROR_CATEGORY_DESCRIPTIONS[prefix] ?? 'Unknown error category';
  }

  /** Serialize to a JSON-safe object for logging/debugging */
  toJSON(): EngineErrorJSON {
    return {
      error: true,
      type: this.name,
      code: this.code,
      message: this.message,
      domain: this.domain,
      context: this.context,
      category: this.category,
      timestamp: this.timestamp.toISOString(),
    };
  }
}

export interface EngineErrorJSON {
  error: true;
  type: string;
  code: string;
  message: string;
  domain: string;
  context: Record<string, unknown>;
  category: string;
  timestamp: string;
}

// =============================================================================
// SPECIFIC ERROR CLASSES
// =============================================================================

/**
 * Error for missing or inconsistent game state, e.g. a world id that does
 * not exist.
 */
export class InvalidState extends EngineError {
  constructor(
    code: EngineErrorCode,
    message: string,
    context: Record<string, unknown> = {},
    domain: string = 'State'
  ) {
    super(code, message, context, domain);
    this.name = 'InvalidState';
    Object.setPrototypeOf(this, InvalidState.prototype);
  }
}

/**
 * Error for board geometry violations: reading or writing a square outside
 * the grid.
 */
export class BoardConstraintViolation extends EngineError {
  constructor(
    code: EngineErrorCode,
    message: string,
    context: Record<string, unknown> = {},
    domain: string = 'Board'
  ) {
    super(code, message, context, domain);
    this.name = 'BoardConstraintViolation';
    Object.setPrototypeOf(this, BoardConstraintViolation.prototype);
  }
}

/**
 * Error for settings rejected by the settings schema.
 */
export class InvalidSettings extends EngineError {
  constructor(message: string, context: Record<string, unknown> = {}, domain: string = 'Config') {
    super(EngineErrorCode.CONFIG_INVALID_SETTINGS, message, context, domain);
    this.name = 'InvalidSettings';
    Object.setPrototypeOf(this, InvalidSettings.prototype);
  }
}

// =============================================================================
// TYPE GUARDS
// =============================================================================

export function isEngineError(error: unknown): error is EngineError {
  return error instanceof EngineError;
}

export function isInvalidState(error: unknown): error is InvalidState {
  return error instanceof InvalidState;
}

export function isBoardConstraintViolation(error: unknown): error is BoardConstraintViolation {
  return error instanceof BoardConstraintViolation;
}

export function isInvalidSettings(error: unknown): error is InvalidSettings {
  return error instanceof InvalidSettings;
}

// =============================================================================
// UTILITIES
// =============================================================================

/**
 * Wrap an unknown error in an EngineError.
 *
 * Useful for catching and normalizing errors at domain boundaries.
 */
export function wrapEngineError(
  error: unknown,
  domain: string = 'Engine',
  context: Record<string, unknown> = {}
): EngineError {
  if (isEngineError(error)) {
    return error;
  }

  const message = error instanceof Error ? error.message : String(error);
  const stack = error instanceof Error ? error.stack : undefined;

  return new EngineError(
    EngineErrorCode.INTERNAL_ASSERTION_FAILED,
    message,
    {
      ...context,
      originalStack: stack,
    },
    domain
  );
}

/**
 * Create a standard "not found" InvalidState error.
 */
export function entityNotFound(
  entityType: 'world' | 'snapshot',
  context: Record<string, unknown> = {},
  domain: string = 'State'
): InvalidState {
  const codes: Record<'world' | 'snapshot', EngineErrorCode> = {
    world: EngineErrorCode.STATE_WORLD_NOT_FOUND,
    snapshot: EngineErrorCode.STATE_SNAPSHOT_NOT_FOUND,
  };

  return new InvalidState(
    codes[entityType],
    `${entityType.charAt(0).toUpperCase() + entityType.slice(1)} not found`,
    context,
    domain
  );
}
