export type LogContext = Record<string, unknown>;

export type Logger = {
  info(message: string, context?: LogContext): void;
  warn(message: string, context?: LogContext): void;
  error(message: string, context?: LogContext): void;
};

export const consoleLogger: Logger = {
  info: (message, context) => (context ? console.log(message, context) : console.log(message)),
  warn: (message, context) => (context ? console.warn(message, context) : console.warn(message)),
  error: (message, context) =>
    context ? console.error(message, context) : console.error(message),
};

export function errorContext(e: unknown): LogContext {
  if (e instanceof Error) return { error: e.message, name: e.name };
  return { error: String(e) };
}
