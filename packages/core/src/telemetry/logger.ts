/**
 * Structured Logger Module
 *
 * Provides structured JSON logging with:
 * - Severity filtering
 * - Secret/token redaction
 * - Consistent field names
 * - Child loggers carrying default fields
 *
 * @module @tsforge/core/telemetry/logger
 */

// =============================================================================
// Severity
// =============================================================================

/**
 * Severity levels (aligned with Cloud Logging)
 */
export type Severity = 'DEBUG' | 'INFO' | 'NOTICE' | 'WARNING' | 'ERROR' | 'CRITICAL' | 'ALERT' | 'EMERGENCY';

export const SEVERITIES: readonly Severity[] = [
  'DEBUG',
  'INFO',
  'NOTICE',
  'WARNING',
  'ERROR',
  'CRITICAL',
  'ALERT',
  'EMERGENCY',
];

/**
 * Severity level ordering (higher = more severe)
 */
const SEVERITY_ORDER: Record<Severity, number> = {
  DEBUG: 0,
  INFO: 1,
  NOTICE: 2,
  WARNING: 3,
  ERROR: 4,
  CRITICAL: 5,
  ALERT: 6,
  EMERGENCY: 7,
};

export function isSeverity(value: string): value is Severity {
  return (SEVERITIES as readonly string[]).includes(value);
}

// =============================================================================
// Logger Configuration
// =============================================================================

/**
 * Logger configuration options
 */
export interface LoggerConfig {
  /** Service name for identification */
  serviceName: string;
  /** Minimum severity to log */
  minSeverity?: Severity;
  /** Whether to pretty print (for development) */
  prettyPrint?: boolean;
  /** Additional default fields */
  defaultFields?: Record<string, unknown>;
  /** Custom redaction patterns */
  redactionPatterns?: RegExp[];
}

/**
 * Default redaction patterns for sensitive data
 */
const DEFAULT_REDACTION_PATTERNS: RegExp[] = [
  /Bearer\s+[a-zA-Z0-9\-._~+/]+=*/gi,
  /Authorization:\s*[^\s,;]+/gi,
  /password['":\s]*[=:]\s*['"]?[^'"\s,}{]+['"]?/gi,
  /secret['":\s]*[=:]\s*['"]?[^'"\s,}{]+['"]?/gi,
  /api[_-]?key['":\s]*[=:]\s*['"]?[^'"\s,}{]+['"]?/gi,
];

// =============================================================================
// Log Entry Types
// =============================================================================

/**
 * Structured log entry
 */
export interface LogEntry {
  severity: Severity;
  message: string;
  timestamp: string;

  labels?: {
    service: string;
    version?: string;
    environment?: string;
  };

  eventName?: string;
  metricName?: string;
  durationMs?: number;

  error?: {
    message: string;
    name?: string;
    stack?: string;
    code?: string;
  };

  [key: string]: unknown;
}

// =============================================================================
// Logger Class
// =============================================================================

/**
 * Structured logger writing one JSON document per entry
 */
export class Logger {
  private config: Required<LoggerConfig>;
  private redactionPatterns: RegExp[];

  constructor(config: LoggerConfig) {
    this.config = {
      serviceName: config.serviceName,
      minSeverity: config.minSeverity ?? 'DEBUG',
      prettyPrint: config.prettyPrint ?? (process.env.NODE_ENV === 'development'),
      defaultFields: config.defaultFields ?? {},
      redactionPatterns: config.redactionPatterns ?? [],
    };
    this.redactionPatterns = [...DEFAULT_REDACTION_PATTERNS, ...this.config.redactionPatterns];
  }

  get serviceName(): string {
    return this.config.serviceName;
  }

  get minSeverity(): Severity {
    return this.config.minSeverity;
  }

  isEnabled(severity: Severity): boolean {
    return SEVERITY_ORDER[severity] >= SEVERITY_ORDER[this.config.minSeverity];
  }

  // ===========================================================================
  // Log Methods
  // ===========================================================================

  debug(message: string, data?: Record<string, unknown>): void {
    this.log('DEBUG', message, data);
  }

  info(message: string, data?: Record<string, unknown>): void {
    this.log('INFO', message, data);
  }

  notice(message: string, data?: Record<string, unknown>): void {
    this.log('NOTICE', message, data);
  }

  warn(message: string, data?: Record<string, unknown>): void {
    this.log('WARNING', message, data);
  }

  error(message: string, error?: Error | unknown, data?: Record<string, unknown>): void {
    const errorData = this.formatError(error);
    this.log('ERROR', message, { ...data, ...errorData });
  }

  critical(message: string, error?: Error | unknown, data?: Record<string, unknown>): void {
    const errorData = this.formatError(error);
    this.log('CRITICAL', message, { ...data, ...errorData });
  }

  // ===========================================================================
  // Specialized Logging Methods
  // ===========================================================================

  /**
   * Log a completed metric computation
   */
  metricComputed(metricName: string, durationMs: number, data?: Record<string, unknown>): void {
    this.debug('Metric computed', {
      eventName: 'metric.computed',
      metricName,
      durationMs,
      ...data,
    });
  }

  /**
   * Log a metric that failed after its inputs were accepted
   */
  metricFailed(metricName: string, error: Error | unknown, data?: Record<string, unknown>): void {
    this.log('ERROR', `Metric failed: ${metricName}`, {
      eventName: 'metric.failure',
      metricName,
      ...data,
      ...this.formatError(error),
    });
  }

  /**
   * Log an input rejected during validation
   */
  validationFailed(reason: string, error: Error | unknown, data?: Record<string, unknown>): void {
    this.log('WARNING', `Validation failed: ${reason}`, {
      eventName: 'validation.failure',
      ...data,
      ...this.formatError(error),
    });
  }

  // ===========================================================================
  // Core Logging
  // ===========================================================================

  private log(severity: Severity, message: string, data?: Record<string, unknown>): void {
    if (!this.isEnabled(severity)) {
      return;
    }

    const entry = this.buildLogEntry(severity, message, data);
    const redacted = this.redact(entry);
    this.output(redacted);
  }

  private buildLogEntry(
    severity: Severity,
    message: string,
    data?: Record<string, unknown>
  ): LogEntry {
    const entry: LogEntry = {
      severity,
      message,
      timestamp: new Date().toISOString(),
      labels: {
        service: this.config.serviceName,
        version: process.env.APP_VERSION,
        environment: process.env.DEPLOYMENT_ENV,
      },
      ...this.config.defaultFields,
    };

    if (data) {
      Object.assign(entry, data);
    }

    return entry;
  }

  private formatError(error: Error | unknown): Record<string, unknown> {
    if (!error) return {};

    if (error instanceof Error) {
      const code = 'code' in error && typeof error.code === 'string' ? error.code : undefined;
      return {
        error: {
          message: error.message,
          name: error.name,
          stack: error.stack,
          code,
        },
      };
    }

    return {
      error: {
        message: String(error),
      },
    };
  }

  private redact(entry: LogEntry): LogEntry {
    const json = JSON.stringify(entry);
    let redacted = json;

    for (const pattern of this.redactionPatterns) {
      redacted = redacted.replace(pattern, '[REDACTED]');
    }

    const parsed: LogEntry = JSON.parse(redacted);
    return parsed;
  }

  private output(entry: LogEntry): void {
    const output = this.config.prettyPrint
      ? JSON.stringify(entry, null, 2)
      : JSON.stringify(entry);

    switch (entry.severity) {
      case 'ERROR':
      case 'CRITICAL':
      case 'ALERT':
      case 'EMERGENCY':
        console.error(output);
        break;
      case 'WARNING':
        console.warn(output);
        break;
      default:
        console.log(output);
    }
  }

  // ===========================================================================
  // Child Logger
  // ===========================================================================

  /**
   * Create a child logger with additional default fields
   */
  child(additionalFields: Record<string, unknown>): Logger {
    return new Logger({
      ...this.config,
      defaultFields: {
        ...this.config.defaultFields,
        ...additionalFields,
      },
    });
  }
}

// =============================================================================
// Singleton Logger
// =============================================================================

let defaultLogger: Logger | null = null;

/**
 * Get the default logger instance
 */
export function getLogger(): Logger {
  if (!defaultLogger) {
    const level = process.env.LOG_LEVEL?.toUpperCase();
    defaultLogger = new Logger({
      serviceName: process.env.APP_NAME || 'tsforge',
      minSeverity: level && isSeverity(level) ? level : 'INFO',
      prettyPrint: process.env.NODE_ENV === 'development',
    });
  }
  return defaultLogger;
}

/**
 * Set a custom default logger
 */
export function setLogger(logger: Logger | null): void {
  defaultLogger = logger;
}

/**
 * Create a logger for a specific service
 */
export function createLogger(serviceName: string, config?: Partial<LoggerConfig>): Logger {
  return new Logger({
    serviceName,
    ...config,
  });
}
