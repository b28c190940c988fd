export type Logger = Pick<Console, "debug" | "info" | "warn" | "error">;

const noop = (): void => undefined;

export const silentLogger: Logger = {
  debug: noop,
  info: noop,
  warn: noop,
  error: noop
};
