export type LogLevel = "debug" | "info" | "warn" | "error";

type LogMeta = Record<string, unknown>;

let debugEnabled = process.env.NODE_ENV !== "production";

export function setDebugLogging(enabled: boolean) {
  debugEnabled = enabled;
}

function safeJson(meta?: LogMeta) {
  try {
    return meta ? JSON.stringify(meta, errorReplacer) : "";
  } catch {
    return "";
  }
}

function errorReplacer(_key: string, value: unknown) {
  if (value instanceof Error) return { name: value.name, message: value.message };
  return value;
}

export type Logger = Readonly<{
  debug(msg: string, meta?: LogMeta): void;
  info(msg: string, meta?: LogMeta): void;
  warn(msg: string, meta?: LogMeta): void;
  error(msg: string, meta?: LogMeta): void;
  scoped(name: string): Logger;
}>;

function createLogger(prefix: string): Logger {
  const tag = (msg: string) => (prefix ? `[${prefix}] ${msg}` : msg);

  return {
    debug(msg, meta) {
      if (!debugEnabled) return;
      // eslint-disable-next-line no-console
      console.log(`[debug] ${tag(msg)}`, safeJson(meta));
    },
    info(msg, meta) {
      // eslint-disable-next-line no-console
      console.log(`[info] ${tag(msg)}`, safeJson(meta));
    },
    warn(msg, meta) {
      // eslint-disable-next-line no-console
      console.warn(`[warn] ${tag(msg)}`, safeJson(meta));
    },
    error(msg, meta) {
      // eslint-disable-next-line no-console
      console.error(`[error] ${tag(msg)}`, safeJson(meta));
    },
    scoped(name) {
      return createLogger(prefix ? `${prefix}:${name}` : name);
    },
  };
}

export const logger = createLogger("");
