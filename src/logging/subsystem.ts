/**
 * Subsystem loggers.
 *
 * Every module logs through a named subsystem so a line can be traced back to
 * the breaker, the preflight probes or the executor without a stack trace.
 * Output goes to stderr; stdout is reserved for command results.
 */

export type LogLevel = "debug" | "info" | "warn" | "error";

const LEVEL_PRIORITY: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
};

export type LogSink = (line: string, meta?: Record<string, unknown>) => void;

export type SubsystemLogger = {
  readonly subsystem: string;
  debug: (message: string, meta?: Record<string, unknown>) => void;
  info: (message: string, meta?: Record<string, unknown>) => void;
  warn: (message: string, meta?: Record<string, unknown>) => void;
  error: (message: string, meta?: Record<string, unknown>) => void;
};

export function parseLogLevel(raw: string | undefined, fallback: LogLevel = "info"): LogLevel {
  const normalized = raw?.trim().toLowerCase();
  if (
    normalized === "debug" ||
    normalized === "info" ||
    normalized === "warn" ||
    normalized === "error"
  ) {
    return normalized;
  }
  return fallback;
}

const defaultSink: LogSink = (line, meta) => {
  if (meta && Object.keys(meta).length > 0) {
    console.error(line, JSON.stringify(meta));
    return;
  }
  console.error(line);
};

let activeLevel: LogLevel = parseLogLevel(process.env.KEYRELAY_LOG_LEVEL);
let activeSink: LogSink = defaultSink;

/**
 * Change the threshold. Returns a restore function (used by tests).
 */
export function setLogLevel(level: LogLevel): () => void {
  const previous = activeLevel;
  activeLevel = level;
  return () => {
    activeLevel = previous;
  };
}

/**
 * Redirect all subsystem output. Returns a restore function (used by tests).
 */
export function setLogSink(sink: LogSink): () => void {
  const previous = activeSink;
  activeSink = sink;
  return () => {
    activeSink = previous;
  };
}

export function createSubsystemLogger(subsystem: string): SubsystemLogger {
  const write = (level: LogLevel, message: string, meta?: Record<string, unknown>) => {
    if (LEVEL_PRIORITY[level] < LEVEL_PRIORITY[activeLevel]) {
      return;
    }
    activeSink(`[${level}][${subsystem}] ${message}`, meta);
  };

  return {
    subsystem,
    debug: (message, meta) => write("debug", message, meta),
    info: (message, meta) => write("info", message, meta),
    warn: (message, meta) => write("warn", message, meta),
    error: (message, meta) => write("error", message, meta),
  };
}
