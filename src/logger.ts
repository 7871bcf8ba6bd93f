export type Logger = Pick<Console, 'info' | 'warn' | 'error'>;

export const consoleLogger: Logger = console;

export const silentLogger: Logger = {
  info: () => undefined,
  warn: () => undefined,
  error: () => undefined,
};
