/**
 * Telemetry Module
 *
 * - AsyncLocalStorage-based run context propagation
 * - Structured JSON logging with secret redaction
 *
 * @module @docqa/core/telemetry
 */

export {
  type TelemetrySource,
  type Severity,
  type TelemetryContext,
  getCurrentContext,
  runWithContext,
  createContext,
  generateRunId,
} from './context.js';

export {
  type LoggerConfig,
  type LogEntry,
  Logger,
  SEVERITY_ORDER,
  parseSeverity,
  getLogger,
  setLogger,
  createLogger,
} from './logger.js';
