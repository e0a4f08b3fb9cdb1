import { mkdirSync } from 'node:fs';
import { join } from 'node:path';

import pino, { type DestinationStream, type Logger as PinoInstance } from 'pino';

import type { Logger, LoggerContext, LogLevel } from '@core/app/ports/logger';

const DEFAULT_LOG_LEVEL: LogLevel = 'info';
const DEFAULT_LOG_DIRECTORY = join(process.cwd(), 'logs');

export type CreatePinoLoggerOptions = {
  level?: string;
  disableFileLogs?: boolean;
  disableConsoleLogs?: boolean;
  logDirectory?: string;
};

const serializeError = (value: unknown): Record<string, unknown> | undefined => {
  if (!value) {
    return undefined;
  }

  if (value instanceof Error) {
    const serialised: Record<string, unknown> = {
      name: value.name,
      message: value.message,
    };

    if (value.stack) {
      serialised.stack = value.stack;
    }

    if ('operation' in value && typeof value.operation === 'string') {
      serialised.operation = value.operation;
    }

    if ('code' in value && typeof value.code !== 'undefined') {
      serialised.code = value.code;
    }

    if (value.cause !== undefined) {
      serialised.cause = serializeError(value.cause);
    }

    return serialised;
  }

  if (typeof value === 'object') {
    return { ...value };
  }

  return { value: String(value) };
};

export const serializeContext = (context?: LoggerContext): Record<string, unknown> | undefined => {
  if (!context) {
    return undefined;
  }

  const output: Record<string, unknown> = {};

  for (const [key, value] of Object.entries(context)) {
    if (typeof value === 'undefined') {
      continue;
    }

    if (key === 'error') {
      const serialisedError = serializeError(value);
      if (serialisedError) {
        output.error = serialisedError;
      }
      continue;
    }

    output[key] = value;
  }

  return Object.keys(output).length > 0 ? output : undefined;
};

class PinoLoggerAdapter implements Logger {
  constructor(private readonly instance: PinoInstance) {}

  debug(message: string, context?: LoggerContext): void {
    this.write('debug', message, context);
  }

  info(message: string, context?: LoggerContext): void {
    this.write('info', message, context);
  }

  warn(message: string, context?: LoggerContext): void {
    this.write('warn', message, context);
  }

  error(message: string, context?: LoggerContext): void {
    this.write('error', message, context);
  }

  withContext(context: LoggerContext): Logger {
    const serialised = serializeContext(context) ?? {};
    return new PinoLoggerAdapter(this.instance.child(serialised));
  }

  private write(level: LogLevel, message: string, context?: LoggerContext) {
    const serialised = serializeContext(context);

    if (serialised) {
      this.instance[level](serialised, message);
      return;
    }

    this.instance[level](message);
  }
}

type StreamEntry = { stream: DestinationStream; level?: LogLevel };

const fileStream = (filePath: string, level?: LogLevel): StreamEntry => {
  const stream = pino.destination({ dest: filePath, mkdir: true, append: true, sync: true });
  return level ? { stream, level } : { stream };
};

export const createPinoLogger = (options: CreatePinoLoggerOptions = {}): Logger => {
  const level = options.level ?? DEFAULT_LOG_LEVEL;
  const disableFileLogs = options.disableFileLogs ?? false;
  const logDirectory = options.logDirectory ?? DEFAULT_LOG_DIRECTORY;

  // multistream filters each stream at its own level, defaulting to info.
  const streams: StreamEntry[] = [];

  if (!options.disableConsoleLogs) {
    streams.push({ stream: pino.destination({ dest: 2, sync: true }), level: 'debug' });
  }

  if (!disableFileLogs) {
    mkdirSync(logDirectory, { recursive: true });

    streams.push(
      { ...fileStream(join(logDirectory, 'app.log')), level: 'debug' },
      fileStream(join(logDirectory, 'error.log'), 'warn'),
    );
  }

  const instance = pino(
    {
      level: streams.length > 0 ? level : 'silent',
      base: undefined,
      timestamp: () => `,"timestamp":"${new Date().toISOString()}"`,
    },
    pino.multistream(streams),
  );

  return new PinoLoggerAdapter(instance);
};
