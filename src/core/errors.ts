/**
 * @fileoverview Orchestrator error hierarchy
 *
 * Every failure the orchestrator raises on its own account is one of these
 * typed errors. Collaborator errors are rethrown unchanged.
 */

// ============================================================================
// ERROR JSON TYPE
// ============================================================================

export interface ErrorJSON {
  code: string;
  message: string;
  retryable: boolean;
  timestamp: number;
  stack?: string;
  details?: Record<string, unknown>;
}

// ============================================================================
// BASE ERROR
// ============================================================================

export abstract class OrchestratorError extends Error {
  abstract readonly code: string;
  abstract readonly retryable: boolean;
  readonly timestamp = Date.now();

  toJSON(): ErrorJSON {
    return {
      code: this.code,
      message: this.message,
      retryable: this.retryable,
      timestamp: this.timestamp,
      stack: this.stack,
    };
  }

  toString(): string {
    return `[${this.code}] ${this.message}`;
  }
}

// ============================================================================
// PRECONDITION ERRORS
// ============================================================================

export class PreconditionError extends OrchestratorError {
  readonly code = 'PRECONDITION_ERROR';
  readonly retryable = false;

  constructor(
    readonly operation: string,
    readonly requirement: string,
  ) {
    super(`Cannot ${operation}: ${requirement}`);
    this.name = 'PreconditionError';
  }

  toJSON(): ErrorJSON {
    return {
      ...super.toJSON(),
      details: {
        operation: this.operation,
        requirement: this.requirement,
      },
    };
  }
}

// ============================================================================
// INITIALIZATION ERRORS
// ============================================================================

export class InitializationError extends OrchestratorError {
  readonly code = 'INITIALIZATION_ERROR';
  // A fresh initialize() re-runs the whole sequence.
  readonly retryable = true;

  constructor(
    readonly subsystem: string,
    readonly cause: Error,
  ) {
    super(`Subsystem ${subsystem} failed to initialize: ${cause.message}`);
    this.name = 'InitializationError';
  }

  toJSON(): ErrorJSON {
    return {
      ...super.toJSON(),
      details: {
        subsystem: this.subsystem,
        cause: this.cause.message,
      },
    };
  }
}

// ============================================================================
// CONFIGURATION ERRORS
// ============================================================================

export class ConfigurationError extends OrchestratorError {
  readonly code = 'CONFIGURATION_ERROR';
  readonly retryable = false;

  constructor(
    readonly configKey: string,
    message: string,
  ) {
    super(`Configuration error for ${configKey}: ${message}`);
    this.name = 'ConfigurationError';
  }

  toJSON(): ErrorJSON {
    return {
      ...super.toJSON(),
      details: {
        configKey: this.configKey,
      },
    };
  }
}

// ============================================================================
// VALIDATION ERRORS
// ============================================================================

export class ValidationError extends OrchestratorError {
  readonly code = 'VALIDATION_ERROR';
  readonly retryable = false;

  constructor(
    readonly field: string,
    readonly expected: string,
    readonly received: string,
  ) {
    super(`Validation failed for ${field}: expected ${expected}, got ${received}`);
    this.name = 'ValidationError';
  }

  toJSON(): ErrorJSON {
    return {
      ...super.toJSON(),
      details: {
        field: this.field,
        expected: this.expected,
        received: this.received,
      },
    };
  }
}

// ============================================================================
// HOST PROFILE ERRORS
// ============================================================================

export type HostProfilePhase = 'detect' | 'optimize' | 'apply';

export class HostProfileError extends OrchestratorError {
  readonly code = 'HOST_PROFILE_ERROR';
  readonly retryable = false;

  constructor(
    readonly phase: HostProfilePhase,
    message: string,
  ) {
    super(`Host profile ${phase} failed: ${message}`);
    this.name = 'HostProfileError';
  }

  toJSON(): ErrorJSON {
    return {
      ...super.toJSON(),
      details: {
        phase: this.phase,
      },
    };
  }
}

// ============================================================================
// ERROR TYPE GUARDS
// ============================================================================

export function isOrchestratorError(error: unknown): error is OrchestratorError {
  return error instanceof OrchestratorError;
}

export function isPreconditionError(error: unknown): error is PreconditionError {
  return error instanceof PreconditionError;
}

export function isValidationError(error: unknown): error is ValidationError {
  return error instanceof ValidationError;
}

// ============================================================================
// ERROR FACTORY
// ============================================================================

export const Errors = {
  notInitialized: (operation: string) =>
    new PreconditionError(operation, 'orchestrator is not initialized'),

  initialization: (subsystem: string, cause: Error) =>
    new InitializationError(subsystem, cause),

  config: (key: string, message: string) =>
    new ConfigurationError(key, message),

  validation: (field: string, expected: string, received: string) =>
    new ValidationError(field, expected, received),

  hostProfile: (phase: HostProfilePhase, message: string) =>
    new HostProfileError(phase, message),
};
