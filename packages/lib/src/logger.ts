// packages/lib/src/logger.ts

export enum LogLevel {
  DEBUG = 'DEBUG',
  INFO = 'INFO',
  WARN = 'WARN',
  ERROR = 'ERROR',
}

export type LogContext = Record<string, unknown>;

export type Logger = {
  debug: (message: string, context?: LogContext) => void;
  info: (message: string, context?: LogContext) => void;
  warn: (message: string, context?: LogContext) => void;
  error: (message: string, context?: LogContext) => void;
  child: (bindings: LogContext) => Logger;
};

const RANK: Record<LogLevel, number> = {
  [LogLevel.DEBUG]: 10,
  [LogLevel.INFO]: 20,
  [LogLevel.WARN]: 30,
  [LogLevel.ERROR]: 40,
};

// Map our log levels to Google Cloud Logging severity levels
function mapLogLevelToSeverity(level: LogLevel): string {
  switch (level) {
    case LogLevel.DEBUG:
      return 'DEBUG';
    case LogLevel.INFO:
      return 'INFO';
    case LogLevel.WARN:
      return 'WARNING';
    case LogLevel.ERROR:
      return 'ERROR';
    default:
      return 'DEFAULT';
  }
}

// Cloud Run exposes the trace header; outside it there is nothing to correlate.
function getTraceFields(): LogContext {
  const traceHeader = process.env.HTTP_X_CLOUD_TRACE_CONTEXT;
  if (!process.env.K_SERVICE || !traceHeader) return {};
  const [traceId, rest] = traceHeader.split('/');
  return {
    'logging.googleapis.com/trace': `projects/${process.env.GOOGLE_CLOUD_PROJECT ?? 'unknown'}/traces/${traceId}`,
    'logging.googleapis.com/spanId': rest?.split(';')[0],
  };
}

export function parseLogLevel(raw: string | undefined): LogLevel {
  switch ((raw ?? '').trim().toLowerCase()) {
    case 'debug':
      return LogLevel.DEBUG;
    case 'warn':
    case 'warning':
      return LogLevel.WARN;
    case 'error':
      return LogLevel.ERROR;
    default:
      return LogLevel.INFO;
  }
}

/** Errors do not survive JSON.stringify; flatten the useful parts. */
export function serializeError(err: unknown): LogContext {
  if (err instanceof Error) {
    const out: LogContext = { name: err.name, message: err.message };
    if ('kind' in err) out.kind = err.kind;
    if (err.stack) out.stack = err.stack;
    return out;
  }
  return { message: String(err) };
}

let threshold: LogLevel = parseLogLevel(process.env.LOG_LEVEL);

export function setLogLevel(level: LogLevel): void {
  threshold = level;
}

type Sink = (line: string) => void;
let sink: Sink = (line) => console.log(line);

/** Redirect output (tests capture lines here). Returns the previous sink. */
export function setLogSink(next: Sink): Sink {
  const prev = sink;
  sink = next;
  return prev;
}

function log(level: LogLevel, message: string, context: LogContext): void {
  if (RANK[level] < RANK[threshold]) return;
  // Structured single-line JSON for Cloud Logging ingestion
  const structuredLog = {
    timestamp: new Date().toISOString(),
    severity: mapLogLevelToSeverity(level),
    message,
    ...context,
    ...getTraceFields(),
  };
  sink(JSON.stringify(structuredLog));
}

export function createLogger(bindings: LogContext = {}): Logger {
  return {
    debug: (message, context) => log(LogLevel.DEBUG, message, { ...bindings, ...context }),
    info: (message, context) => log(LogLevel.INFO, message, { ...bindings, ...context }),
    warn: (message, context) => log(LogLevel.WARN, message, { ...bindings, ...context }),
    error: (message, context) => log(LogLevel.ERROR, message, { ...bindings, ...context }),
    child: (more) => createLogger({ ...bindings, ...more }),
  };
}

export const logger: Logger = createLogger();
