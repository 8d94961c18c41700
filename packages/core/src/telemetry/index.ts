/**
 * Telemetry Module
 *
 * Structured JSON logging with severity filtering and secret redaction.
 *
 * @module @tsforge/core/telemetry
 */

export {
  type Severity,
  type LoggerConfig,
  type LogEntry,
  SEVERITIES,
  isSeverity,
  Logger,
  getLogger,
  setLogger,
  createLogger,
} from './logger.js';
