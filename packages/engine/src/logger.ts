export interface LoggerMethods {
  debug(message: string, ...args: unknown[]): void;
  info(message: string, ...args: unknown[]): void;
  warn(message: string, ...args: unknown[]): void;
  error(message: string, ...args: unknown[]): void;
}

function noop(): void {}

export const silentLogger: LoggerMethods = {
  debug: noop,
  info: noop,
  warn: noop,
  error: noop,
};

/**
 * Logger writing every level to stderr. Stdout stays free for transports that
 * own it (the MCP stdio server).
 */
export function createStderrLogger(
  minLevel: "debug" | "info" | "warn" | "error" = "info",
): LoggerMethods {
  const order = ["debug", "info", "warn", "error"] as const;
  const threshold = order.indexOf(minLevel);
  const write =
    (level: (typeof order)[number]) =>
    (message: string, ...args: unknown[]) => {
      if (order.indexOf(level) < threshold) {
        return;
      }
      console.error(`${level.toUpperCase()} ${message}`, ...args);
    };

  return {
    debug: write("debug"),
    info: write("info"),
    warn: write("warn"),
    error: write("error"),
  };
}
