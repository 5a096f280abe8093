/**
 * @fileoverview Knowledge Orchestrator
 *
 * Coordinates a knowledge-graph platform's subsystems: brings them up in a
 * fixed order, supervises metrics, health and performance loops, and exposes
 * cached ingestion, query and insight pipelines.
 *
 * @packageDocumentation
 */

export * from './orchestrator/index.js';
export * from './collaborators/index.js';
export * from './config/index.js';

export {
  OrchestratorError,
  PreconditionError,
  InitializationError,
  ConfigurationError,
  ValidationError,
  HostProfileError,
  Errors,
  isOrchestratorError,
  isPreconditionError,
  isValidationError,
  getErrorMessage,
  toError,
  type ErrorJSON,
  type HostProfilePhase,
} from './utils/errors.js';

export {
  OrchestratorEventBus,
  createEvent,
  type OrchestratorEvent,
  type OrchestratorEventPayloads,
  type OrchestratorEventHandler,
  type OrchestratorEventType,
} from './events.js';

export {
  logDebug,
  logError,
  logInfo,
  logWarning,
  setLogLevel,
  getLogLevel,
  type LogLevel,
  type LogContext,
} from './telemetry/logger.js';
