/**
 * Observability for the retrieve client.
 */

/**
 * Log levels.
 */
export enum LogLevel {
  Debug = 'debug',
  Info = 'info',
  Warn = 'warn',
  Error = 'error',
}

/**
 * Log entry structure.
 */
export interface LogEntry {
  /** Log level. */
  level: LogLevel;
  /** Log message. */
  message: string;
  /** Timestamp. */
  timestamp: Date;
  /** Request context. */
  context?: RequestContext;
  /** Additional fields. */
  fields?: Record<string, unknown>;
}

/**
 * Request context for tracing.
 */
export interface RequestContext {
  /** Unique request ID. */
  requestId: string;
  /** Operation name. */
  operation: string;
  /** Start time. */
  startTime: Date;
  /** Additional tags. */
  tags: Record<string, string>;
}

/**
 * Creates a new request context.
 */
export function createRequestContext(operation: string, tags?: Record<string, string>): RequestContext {
  return {
    requestId: generateRequestId(),
    operation,
    startTime: new Date(),
    tags: tags ?? {},
  };
}

function generateRequestId(): string {
  return `req-${Date.now().toString(36)}-${Math.random().toString(36).substring(2, 9)}`;
}

/**
 * Logger interface.
 */
export interface Logger {
  debug(message: string, fields?: Record<string, unknown>): void;
  info(message: string, fields?: Record<string, unknown>): void;
  warn(message: string, fields?: Record<string, unknown>): void;
  error(message: string, error?: Error, fields?: Record<string, unknown>): void;
  withContext(context: RequestContext): Logger;
}

/**
 * Console logger implementation.
 */
export class ConsoleLogger implements Logger {
  private readonly minLevel: LogLevel;
  private readonly context?: RequestContext;

  constructor(minLevel: LogLevel = LogLevel.Info, context?: RequestContext) {
    this.minLevel = minLevel;
    this.context = context;
  }

  debug(message: string, fields?: Record<string, unknown>): void {
    this.log(LogLevel.Debug, message, fields);
  }

  info(message: string, fields?: Record<string, unknown>): void {
    this.log(LogLevel.Info, message, fields);
  }

  warn(message: string, fields?: Record<string, unknown>): void {
    this.log(LogLevel.Warn, message, fields);
  }

  error(message: string, error?: Error, fields?: Record<string, unknown>): void {
    this.log(LogLevel.Error, message, { ...fields, error: error?.message, stack: error?.stack });
  }

  withContext(context: RequestContext): Logger {
    return new ConsoleLogger(this.minLevel, context);
  }

  private log(level: LogLevel, message: string, fields?: Record<string, unknown>): void {
    if (!this.shouldLog(level)) {
      return;
    }

    const output = formatEntry({
      level,
      message,
      timestamp: new Date(),
      context: this.context,
      fields,
    });

    switch (level) {
      case LogLevel.Debug:
        console.debug(output);
        break;
      case LogLevel.Info:
        console.info(output);
        break;
      case LogLevel.Warn:
        console.warn(output);
        break;
      case LogLevel.Error:
        console.error(output);
        break;
    }
  }

  private shouldLog(level: LogLevel): boolean {
    const levels: LogLevel[] = [LogLevel.Debug, LogLevel.Info, LogLevel.Warn, LogLevel.Error];
    return levels.indexOf(level) >= levels.indexOf(this.minLevel);
  }
}

/**
 * Formats a log entry as a single line.
 */
export function formatEntry(entry: LogEntry): string {
  const parts: string[] = [
    entry.timestamp.toISOString(),
    `[${entry.level.toUpperCase()}]`,
  ];

  if (entry.context) {
    parts.push(`[${entry.context.requestId}]`);
    parts.push(`[${entry.context.operation}]`);
  }

  parts.push(entry.message);

  if (entry.fields && Object.keys(entry.fields).length > 0) {
    parts.push(JSON.stringify(entry.fields));
  }

  return parts.join(' ');
}

/**
 * No-op logger that discards all logs.
 */
export class NoopLogger implements Logger {
  debug(): void {
    // No-op
  }
  info(): void {
    // No-op
  }
  warn(): void {
    // No-op
  }
  error(): void {
    // No-op
  }
  withContext(): Logger {
    return this;
  }
}

/**
 * Retrieve operation metrics.
 */
export interface RetrieveMetrics {
  /** Requests written to a connection. */
  requestsSent: number;
  /** Responses parsed, keyed by status class ("2xx", "3xx", ...). */
  responsesByClass: Record<string, number>;
  /** Redirects followed. */
  redirectsFollowed: number;
  /** Connections opened. */
  connectionsOpened: number;
  /** Pooled connections reused. */
  connectionsReused: number;
  /** Connections closed by the client. */
  connectionsClosed: number;
  /** Opens that ended in an error. */
  failures: number;
  /** Open latency histogram (ms). */
  openLatencyMs: number[];
}

/**
 * Creates empty metrics.
 */
export function createEmptyMetrics(): RetrieveMetrics {
  return {
    requestsSent: 0,
    responsesByClass: {},
    redirectsFollowed: 0,
    connectionsOpened: 0,
    connectionsReused: 0,
    connectionsClosed: 0,
    failures: 0,
    openLatencyMs: [],
  };
}

/**
 * Metrics collector.
 */
export class MetricsCollector {
  private metrics: RetrieveMetrics = createEmptyMetrics();

  /** Records a request written to the wire. */
  recordRequestSent(): void {
    this.metrics.requestsSent++;
  }

  /** Records a parsed response by its status class. */
  recordResponse(status: string): void {
    const statusClass = `${status.charAt(0)}xx`;
    this.metrics.responsesByClass[statusClass] = (this.metrics.responsesByClass[statusClass] ?? 0) + 1;
  }

  /** Records a followed redirect. */
  recordRedirect(): void {
    this.metrics.redirectsFollowed++;
  }

  /** Records a newly opened connection. */
  recordConnectionOpened(): void {
    this.metrics.connectionsOpened++;
  }

  /** Records a reused pooled connection. */
  recordConnectionReused(): void {
    this.metrics.connectionsReused++;
  }

  /** Records a closed connection. */
  recordConnectionClosed(): void {
    this.metrics.connectionsClosed++;
  }

  /** Records a completed open. */
  recordOpen(latencyMs: number): void {
    this.metrics.openLatencyMs.push(latencyMs);
  }

  /** Records a failed open. */
  recordFailure(): void {
    this.metrics.failures++;
  }

  /** Gets current metrics. */
  getMetrics(): RetrieveMetrics {
    return {
      ...this.metrics,
      responsesByClass: { ...this.metrics.responsesByClass },
      openLatencyMs: [...this.metrics.openLatencyMs],
    };
  }

  /** Gets computed statistics. */
  getStats(): {
    reuseRate: number;
    avgOpenLatencyMs: number;
    p95OpenLatencyMs: number;
  } {
    const acquired = this.metrics.connectionsOpened + this.metrics.connectionsReused;

    return {
      reuseRate: acquired > 0 ? this.metrics.connectionsReused / acquired : 0,
      avgOpenLatencyMs: this.average(this.metrics.openLatencyMs),
      p95OpenLatencyMs: this.percentile(this.metrics.openLatencyMs, 95),
    };
  }

  /** Resets all metrics. */
  reset(): void {
    this.metrics = createEmptyMetrics();
  }

  private average(values: number[]): number {
    if (values.length === 0) return 0;
    return values.reduce((a, b) => a + b, 0) / values.length;
  }

  private percentile(values: number[], p: number): number {
    if (values.length === 0) return 0;
    const sorted = [...values].sort((a, b) => a - b);
    const index = Math.ceil((p / 100) * sorted.length) - 1;
    return sorted[Math.max(0, index)] ?? 0;
  }
}

/**
 * Timer for measuring durations.
 */
export class Timer {
  private readonly startTime: number;

  private constructor() {
    this.startTime = Date.now();
  }

  /** Starts a new timer. */
  static start(): Timer {
    return new Timer();
  }

  /** Gets elapsed time in milliseconds. */
  elapsed(): number {
    return Date.now() - this.startTime;
  }
}

/**
 * Creates a console logger.
 */
export function createLogger(minLevel?: LogLevel): Logger {
  return new ConsoleLogger(minLevel);
}

/**
 * Creates a no-op logger.
 */
export function createNoopLogger(): Logger {
  return new NoopLogger();
}

/**
 * Creates a metrics collector.
 */
export function createMetricsCollector(): MetricsCollector {
  return new MetricsCollector();
}
