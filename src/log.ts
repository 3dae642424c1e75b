/* eslint-disable no-console */

export interface Logger {
  info: (message: string) => void;
  warn: (message: string) => void;
  error: (message: string) => void;
  debug: (message: string, details?: Record<string, unknown>) => void;
}

const formatDetails = (details?: Record<string, unknown>): string => {
  if (!details) {
    return "";
  }
  const parts = Object.entries(details)
    .filter(([, value]) => value !== undefined)
    .map(([key, value]) => `${key}=${typeof value === "string" ? value : JSON.stringify(value)}`);
  return parts.length ? ` ${parts.join(" ")}` : "";
};

export const createLogger = (options: { debug: boolean }): Logger => {
  return {
    info: (message) => {
      console.log(message);
    },
    warn: (message) => {
      console.error(`warning: ${message}`);
    },
    error: (message) => {
      console.error(`error: ${message}`);
    },
    debug: (message, details) => {
      if (!options.debug) {
        return;
      }
      console.error(`[debug] ${message}${formatDetails(details)}`);
    },
  };
};

export const silentLogger: Logger = {
  info: () => {},
  warn: () => {},
  error: () => {},
  debug: () => {},
};
