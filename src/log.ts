// stdout belongs to the MCP stdio transport, so everything goes to stderr

export interface Logger {
  debug(message: string, details?: Record<string, unknown>): void;
  info(message: string, details?: Record<string, unknown>): void;
  error(message: string, error?: unknown): void;
}

const now = (): string => new Date().toISOString();

const suffix = (details?: Record<string, unknown>): string =>
  details && Object.keys(details).length > 0 ? ` ${JSON.stringify(details)}` : "";

export function createLogger(
  scope: string,
  options: { debug?: boolean } = {}
): Logger {
  return {
    debug(message, details) {
      if (!options.debug) return;
      console.error(`[${now()}] [${scope}] DEBUG ${message}${suffix(details)}`);
    },
    info(message, details) {
      console.error(`[${now()}] [${scope}] ${message}${suffix(details)}`);
    },
    error(message, error) {
      const detail =
        error instanceof Error
          ? `${error.name}: ${error.message}`
          : error
            ? String(error)
            : "";
      console.error(
        `[${now()}] [${scope}] ERROR ${message}${detail ? ` | ${detail}` : ""}`
      );
    },
  };
}

export const silentLogger: Logger = {
  debug() {},
  info() {},
  error() {},
};
