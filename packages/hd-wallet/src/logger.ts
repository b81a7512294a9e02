export type LogLevel = "debug" | "info" | "warn" | "error";
export type LogMeta = Record<string, unknown>;

export type WalletLogger = Record<LogLevel, (message: string, meta?: LogMeta) => void>;

const LEVELS: readonly LogLevel[] = ["debug", "info", "warn", "error"];

function buildLogger(write: (level: LogLevel, message: string, meta?: LogMeta) => void): WalletLogger {
  return {
    debug: (message, meta) => write("debug", message, meta),
    info: (message, meta) => write("info", message, meta),
    warn: (message, meta) => write("warn", message, meta),
    error: (message, meta) => write("error", message, meta),
  };
}

export const NOOP_LOGGER: WalletLogger = buildLogger(() => undefined);

/**
 * Console output tagged with `[prefix]`. Entries below `minLevel` are dropped.
 */
export function createConsoleLogger(prefix = "HDWallet", minLevel: LogLevel = "debug"): WalletLogger {
  const threshold = LEVELS.indexOf(minLevel);
  return buildLogger((level, message, meta) => {
    if (LEVELS.indexOf(level) < threshold) return;
    console[level](`[${prefix}] ${message}`, meta ?? "");
  });
}

/**
 * Logger that adds `context` to the metadata of every entry. Fields passed at
 * the call site win over the bound ones.
 */
export function withLogContext(logger: WalletLogger, context: LogMeta): WalletLogger {
  if (logger === NOOP_LOGGER) return logger;
  return buildLogger((level, message, meta) => logger[level](message, { ...context, ...meta }));
}
