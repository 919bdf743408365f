import { getRequestContext } from './request-context';
import { sanitizeForLogging as redact } from './redaction';

/**
* Structured Logger
*
* Provides structured logging with context support,
* multiple log levels, and custom handlers.
*
* stdout carries the tool protocol, so the default handler writes to stderr only.
*/

// ============================================================================
// Type Definitions
// ============================================================================

/** Available log levels */
export type LogLevel = 'debug' | 'info' | 'warn' | 'error' | 'fatal';

/**
* Log entry structure
*/
export interface LogEntry {
  /** ISO timestamp */
  timestamp: string;
  level: LogLevel;
  message: string;
  service?: string | undefined;
  /** Correlation ID of the tool call */
  correlationId?: string | undefined;
  /** Tool being executed */
  tool?: string | undefined;
  /** Milliseconds since the tool call started */
  duration?: number | undefined;
  error?: Error | undefined;
  errorMessage?: string | undefined;
  errorStack?: string | undefined;
  metadata?: Record<string, unknown> | undefined;
}

/** Log handler function type */
export type LogHandler = (entry: LogEntry) => void;

/** Logger options for getLogger */
export interface LoggerOptions {
  service: string;
  /** Correlation ID (overrides request context) */
  correlationId?: string | undefined;
  /** Additional context to include in every log */
  context?: Record<string, unknown> | undefined;
}

// ============================================================================
// Handlers
// ============================================================================

let handlers: LogHandler[] = [];

const getHandlers = (): readonly LogHandler[] => [...handlers];

const LOG_LEVELS: readonly LogLevel[] = ['debug', 'info', 'warn', 'error', 'fatal'];

function isLogLevel(value: string | undefined): value is LogLevel {
  return LOG_LEVELS.some(level => level === value);
}

/**
* Get configured log level from environment
* Defaults to 'info' in production, 'debug' in development
*/
function getConfiguredLogLevel(): LogLevel {
  const envLevel = process.env['LOG_LEVEL']?.toLowerCase();
  if (isLogLevel(envLevel)) {
    return envLevel;
  }
  return process.env['NODE_ENV'] === 'production' ? 'info' : 'debug';
}

function shouldLog(level: LogLevel): boolean {
  return LOG_LEVELS.indexOf(level) >= LOG_LEVELS.indexOf(getConfiguredLogLevel());
}

function redactSensitiveData(obj: Record<string, unknown>): Record<string, unknown> {
  const result = redact(obj);
  return (typeof result === 'object' && result !== null && !Array.isArray(result))
    ? result
    : { _redacted: result };
}

/**
* Default handler: one JSON line per entry on stderr
*/
function consoleHandler(entry: LogEntry): void {
  const { level, message, service, correlationId, tool, duration, errorMessage, errorStack, metadata } = entry;

  const logOutput: Record<string, unknown> = {
    level: level.toUpperCase(),
    message,
  };

  if (service) logOutput["service"] = service;
  if (correlationId) logOutput["correlationId"] = correlationId;
  if (tool) logOutput["tool"] = tool;
  if (duration !== undefined) logOutput["duration"] = duration;
  if (errorMessage) logOutput["error"] = errorMessage;
  if (errorStack && process.env['LOG_LEVEL'] === 'debug') logOutput["stack"] = errorStack;
  if (metadata && Object.keys(metadata).length > 0) {
    logOutput["metadata"] = redactSensitiveData(metadata);
  }

  console["error"](JSON.stringify(logOutput));
}

/**
* Add a log handler
* @returns Function to remove the handler
*/
export function addLogHandler(handler: LogHandler): () => void {
  handlers = [...handlers, handler];
  return () => {
    handlers = handlers.filter(h => h !== handler);
  };
}

/**
* Remove all log handlers, including the default stderr handler
*/
export function clearLogHandlers(): void {
  handlers = [];
}

/**
* Restore the default stderr handler as the only handler
*/
export function resetLogHandlers(): void {
  handlers = [consoleHandler];
}

resetLogHandlers();

// ============================================================================
// Logger Class
// ============================================================================

/**
* Logger instance with bound context and correlation ID support
*/
export class Logger {
  private readonly context: Record<string, unknown>;

  constructor(
    private readonly service: string,
    private readonly correlationId?: string,
    context?: Record<string, unknown>
  ) {
    this.context = context || {};
  }

  private createServiceLogEntry(
    level: LogLevel,
    message: string,
    metadata?: Record<string, unknown>,
    err?: Error
  ): LogEntry {
    const context = getRequestContext();

    const entry: LogEntry = {
      timestamp: new Date().toISOString(),
      level,
      message: `[${this.service}] ${message}`,
      service: this.service,
      metadata: { ...this.context, ...metadata },
    };

    const correlationId = this.correlationId || context?.requestId;
    if (correlationId) entry.correlationId = correlationId;
    if (context?.tool) entry.tool = context.tool;
    if (context) entry.duration = Date.now() - context.startTime;

    if (err) {
      entry.error = err;
      entry.errorMessage = err.message;
      entry.errorStack = err.stack;
    }

    return entry;
  }

  private emit(level: LogLevel, message: string, metadata?: Record<string, unknown>, err?: Error): void {
    if (!shouldLog(level)) return;
    const entry = this.createServiceLogEntry(level, message, metadata, err);
    getHandlers().forEach(h => h(entry));
  }

  debug(message: string, metadata?: Record<string, unknown>): void {
    this.emit('debug', message, metadata);
  }

  info(message: string, metadata?: Record<string, unknown>): void {
    this.emit('info', message, metadata);
  }

  warn(message: string, metadata?: Record<string, unknown>): void {
    this.emit('warn', message, metadata);
  }

  error(message: string, err?: Error | undefined, metadata?: Record<string, unknown>): void {
    this.emit('error', message, metadata, err);
  }

  fatal(message: string, err?: Error | undefined, metadata?: Record<string, unknown>): void {
    this.emit('fatal', message, metadata, err);
  }

  /**
  * Create a child logger with additional context
  */
  child(additionalContext: Record<string, unknown>): Logger {
    return new Logger(
      this.service,
      this.correlationId,
      { ...this.context, ...additionalContext }
    );
  }
}

/**
* Get logger for service
* @param serviceOrOptions - Service name or LoggerOptions object
*/
export function getLogger(serviceOrOptions: string | LoggerOptions): Logger {
  if (typeof serviceOrOptions === 'string') {
    return new Logger(serviceOrOptions);
  }
  return new Logger(
    serviceOrOptions.service,
    serviceOrOptions.correlationId,
    serviceOrOptions.context
  );
}
