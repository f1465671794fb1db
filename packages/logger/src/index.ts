export type LogLevel = "debug" | "info" | "warn" | "error";

export type LogMeta = {
  readonly indicator?: string;
} & Record<string, unknown>;

/** Receives one serialised JSON line per accepted entry. */
export type LogSink = (level: LogLevel, line: string) => void;

export interface LoggerOptions {
  /** Minimum level written; defaults to `INCTA_LOG_LEVEL` or "info". */
  readonly level?: LogLevel;
  readonly sink?: LogSink;
  /** Meta merged into every entry. */
  readonly bindings?: LogMeta;
}

export interface Logger {
  readonly module: string;
  readonly level: LogLevel;
  log(level: LogLevel, msg: string, meta?: LogMeta): void;
  debug(msg: string, meta?: LogMeta): void;
  info(msg: string, meta?: LogMeta): void;
  warn(msg: string, meta?: LogMeta): void;
  error(msg: string, meta?: LogMeta): void;
  child(bindings: LogMeta): Logger;
}

const LEVEL_WEIGHT: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
};

export const LOG_LEVEL_ENV = "INCTA_LOG_LEVEL";

const isLogLevel = (value: string): value is LogLevel => {
  return Object.prototype.hasOwnProperty.call(LEVEL_WEIGHT, value);
};

/**
 * Maps free-form text (usually an environment variable) onto a level.
 * Anything unrecognised resolves to "info".
 */
export const resolveLogLevel = (value: string | undefined): LogLevel => {
  const normalised = value?.trim().toLowerCase() ?? "";
  return isLogLevel(normalised) ? normalised : "info";
};

const writeLine: LogSink = (level, line) => {
  const output = level === "error" ? process.stderr : process.stdout;
  output.write(`${line}\n`);
};

const buildEntry = (moduleName: string, level: LogLevel, msg: string, meta: LogMeta) => {
  const { indicator, ...rest } = meta;

  return {
    ts: new Date().toISOString(),
    level,
    module: moduleName,
    msg,
    ...(typeof indicator === "string" ? { indicator } : {}),
    ...rest,
  };
};

export const createLogger = (moduleName: string, options: LoggerOptions = {}): Logger => {
  const threshold = options.level ?? resolveLogLevel(process.env[LOG_LEVEL_ENV]);
  const sink = options.sink ?? writeLine;
  const bindings = options.bindings ?? {};

  const log = (level: LogLevel, msg: string, meta?: LogMeta): void => {
    if (LEVEL_WEIGHT[level] < LEVEL_WEIGHT[threshold]) {
      return;
    }
    const entry = buildEntry(moduleName, level, msg, { ...bindings, ...meta });
    sink(level, JSON.stringify(entry));
  };

  return {
    module: moduleName,
    level: threshold,
    log,
    debug: (msg, meta) => log("debug", msg, meta),
    info: (msg, meta) => log("info", msg, meta),
    warn: (msg, meta) => log("warn", msg, meta),
    error: (msg, meta) => log("error", msg, meta),
    child: (extra) =>
      createLogger(moduleName, {
        level: threshold,
        sink,
        bindings: { ...bindings, ...extra },
      }),
  };
};
