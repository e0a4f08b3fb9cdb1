export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

export type LoggerContext = {
  /** Logical operation the log pertains to (e.g. `race.run`, `cli.team.add`). */
  route?: string;
  /** Machine friendly event name for querying (e.g. `race.run.completed`). */
  event?: string;
  /** Duration of the operation in milliseconds when applicable. */
  durationMs?: number;
  /** Outcome keyword such as `success`, `failure`, or `skipped`. */
  outcome?: string;
  /** Optional error instance or metadata to serialise. */
  error?: unknown;
  /** Additional structured properties to enrich the log entry. */
  [key: string]: unknown;
};

export interface Logger {
  debug(message: string, context?: LoggerContext): void;
  info(message: string, context?: LoggerContext): void;
  warn(message: string, context?: LoggerContext): void;
  error(message: string, context?: LoggerContext): void;
  withContext(context: LoggerContext): Logger;
}
