export interface Logger {
  error(message: string, context?: Record<string, unknown>): void;
  warn(message: string, context?: Record<string, unknown>): void;
  info(message: string, context?: Record<string, unknown>): void;
}

export const consoleLogger: Logger = {
  error: (msg, ctx) => console.error(`[ERROR] ${msg}`, ctx ?? ""),
  warn: (msg, ctx) => console.warn(`[WARN] ${msg}`, ctx ?? ""),
  info: (msg, ctx) => console.info(`[INFO] ${msg}`, ctx ?? ""),
};

export const silentLogger: Logger = {
  error: () => {},
  warn: () => {},
  info: () => {},
};

/** Routes every level to a single line-oriented sink, e.g. a terminal log widget. */
export function loggerFromCallback(log: (msg: string) => void): Logger {
  const format = (level: string, msg: string, ctx?: Record<string, unknown>) =>
    ctx && Object.keys(ctx).length > 0
      ? `${level}${msg} ${JSON.stringify(ctx)}`
      : `${level}${msg}`;

  return {
    error: (msg, ctx) => log(format("error: ", msg, ctx)),
    warn: (msg, ctx) => log(format("warn: ", msg, ctx)),
    info: (msg, ctx) => log(format("", msg, ctx)),
  };
}
