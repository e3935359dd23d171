/**
 * Junction
 *
 * Request-to-action dispatcher: maps request paths onto controller actions
 * through pluggable dispatch types, and runs delegation between actions.
 *
 * @packageDocumentation
 */

// =============================================================================
// Actions and the namespace tree
// =============================================================================
export * from './action/index.js';

// =============================================================================
// Application host and request context
// =============================================================================
export * from './app/index.js';
export * from './context/index.js';

// =============================================================================
// Configuration
// =============================================================================
export {
  ConfigError,
  configFromEnv,
  DEFAULT_POSTLOAD_DISPATCH_TYPES,
  DEFAULT_PRELOAD_DISPATCH_TYPES,
  type DispatcherConfig,
  type DispatcherConfigInput,
  resolveConfig,
} from './config/index.js';

// =============================================================================
// Controllers
// =============================================================================
export * from './controller/index.js';

// =============================================================================
// Dispatch types
// =============================================================================
export * from './dispatch-type/index.js';

// =============================================================================
// Dispatcher, errors and signals
// =============================================================================
export * from './dispatcher/index.js';

// =============================================================================
// Events
// =============================================================================
export * from './events/index.js';

// =============================================================================
// Logging
// =============================================================================
export {
  createLogger,
  type CreateLoggerOptions,
  getRootLogger,
  type LogFields,
  type Logger,
  type LogLevel,
  logDebug,
  logError,
  logInfo,
  logTrace,
  logWarn,
  setLogLevel,
  setRootLogger,
} from './logging/index.js';

// =============================================================================
// Context contracts
// =============================================================================
export {
  type Component,
  type DispatchContext,
  hasRegisterActions,
  type RegistersActions,
  type SetupContext,
} from './types/context.js';
