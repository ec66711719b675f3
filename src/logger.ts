export type Logger = {
  debug: (message: string, data?: unknown) => void;
  warn: (message: string, data?: unknown) => void;
  error: (message: string, data?: unknown) => void;
};

export const silentLogger: Logger = {
  debug: () => {},
  warn: () => {},
  error: () => {},
};

/** Bracket-prefixed lines on stderr; debug lines only when `debug` is on. */
export function createConsoleLogger(options: { debug?: boolean; scope?: string } = {}): Logger {
  const prefix = options.scope ? `[chatstream:${options.scope}]` : "[chatstream]";
  const write = (level: string, message: string, data?: unknown) => {
    const suffix = data === undefined ? "" : ` ${formatData(data)}`;
    console.error(`${prefix} ${level}: ${message}${suffix}`);
  };

  return {
    debug: (message, data) => {
      if (options.debug) {
        write("debug", message, data);
      }
    },
    warn: (message, data) => write("warn", message, data),
    error: (message, data) => write("error", message, data),
  };
}

function formatData(data: unknown): string {
  if (typeof data === "string") {
    return data;
  }
  try {
    return JSON.stringify(data);
  } catch {
    return String(data);
  }
}
