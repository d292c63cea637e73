export type LogContext = Record<string, unknown>;

export interface Logger {
  info(message: string, context?: LogContext): void;
  warn(message: string, context?: LogContext): void;
  error(message: string, context?: LogContext): void;
}

const withContext = (message: string, context?: LogContext): [string, LogContext] => {
  if (context && Object.keys(context).length > 0) {
    return [`[codepane] ${message}`, context];
  }
  return [`[codepane] ${message}`, {}];
};

export const createConsoleLogger = (): Logger => {
  return {
    info(message, context) {
      const [msg, ctx] = withContext(message, context);
      console.info(msg, ctx);
    },
    warn(message, context) {
      const [msg, ctx] = withContext(message, context);
      console.warn(msg, ctx);
    },
    error(message, context) {
      const [msg, ctx] = withContext(message, context);
      console.error(msg, ctx);
    }
  };
};

/** Logger that drops everything; used by tests that only care about responses. */
export const createSilentLogger = (): Logger => {
  return {
    info() {},
    warn() {},
    error() {}
  };
};
