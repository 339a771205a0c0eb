export type Logger = {
  info: (...messages: unknown[]) => void;
  warn: (...messages: unknown[]) => void;
  error: (...messages: unknown[]) => void;
};

export const createPrefixedLogger = (prefix: string, target: Logger = console): Logger => ({
  info: (...args) => target.info(prefix, ...args),
  warn: (...args) => target.warn(prefix, ...args),
  error: (...args) => target.error(prefix, ...args),
});
