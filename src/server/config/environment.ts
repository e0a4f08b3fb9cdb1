/**
 * Purpose: Parse and validate process environment variables into a strongly typed configuration object.
 */

import { isAbsolute, join } from 'node:path';

import { z } from 'zod';

import { blankToUndefined, dedupeIssues, parseBooleanFlagValue, type EnvIssue } from './env-status';

export const LOG_LEVELS = ['debug', 'info', 'warn', 'error', 'silent'] as const;
export const ADJUSTMENT_FAILURE_POLICIES = ['rollback', 'log-and-continue'] as const;
export const POT_MODES = ['per-entry', 'per-team'] as const;
export const PODIUM_TIE_MODES = ['full-share', 'split'] as const;

export type EnvironmentConfig = {
  databaseUrl: string;
  logging: {
    level: (typeof LOG_LEVELS)[number];
    directory: string;
    disableFileLogs: boolean;
  };
  race: {
    adjustmentFailurePolicy: (typeof ADJUSTMENT_FAILURE_POLICIES)[number];
    potMode: (typeof POT_MODES)[number];
    podiumTieMode: (typeof PODIUM_TIE_MODES)[number];
  };
};

export class EnvironmentValidationError extends Error {
  constructor(public readonly issues: EnvIssue[]) {
    super(
      `Environment configuration is invalid: ${issues.map((issue) => issue.message).join(' ')}`,
    );
    this.name = 'EnvironmentValidationError';
  }
}

const DEFAULT_DATABASE_URL = 'file:rally.db';

const oneOf = <T extends readonly [string, ...string[]]>(key: string, values: T) =>
  z.enum(values, {
    errorMap: () => ({
      message: `${key} must be one of ${values.map((value) => `"${value}"`).join(', ')}.`,
    }),
  });

const booleanFlag = (key: string) =>
  z
    .string()
    .optional()
    .transform((value, ctx) => {
      if (value === undefined) {
        return false;
      }

      const parsed = parseBooleanFlagValue(value);
      if (parsed === null) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          message: `${key} must be set to "true" or "false".`,
        });
        return z.NEVER;
      }

      return parsed;
    });

const environmentSchema = z.object({
  DATABASE_URL: z.preprocess(
    blankToUndefined,
    z
      .string()
      .refine(
        (value) => value === ':memory:' || (value.startsWith('file:') && value.length > 'file:'.length),
        'DATABASE_URL must be ":memory:" or a "file:" URL.',
      )
      .default(DEFAULT_DATABASE_URL),
  ),
  LOG_LEVEL: z.preprocess(blankToUndefined, oneOf('LOG_LEVEL', LOG_LEVELS).default('info')),
  LOG_DIR: z.preprocess(blankToUndefined, z.string().optional()),
  DISABLE_FILE_LOGS: z.preprocess(blankToUndefined, booleanFlag('DISABLE_FILE_LOGS')),
  RACE_ADJUSTMENT_FAILURE_POLICY: z.preprocess(
    blankToUndefined,
    oneOf('RACE_ADJUSTMENT_FAILURE_POLICY', ADJUSTMENT_FAILURE_POLICIES).default('rollback'),
  ),
  RACE_POT_MODE: z.preprocess(blankToUndefined, oneOf('RACE_POT_MODE', POT_MODES).default('per-entry')),
  RACE_PODIUM_TIE_MODE: z.preprocess(
    blankToUndefined,
    oneOf('RACE_PODIUM_TIE_MODE', PODIUM_TIE_MODES).default('full-share'),
  ),
});

const resolveLogDirectory = (raw: string | undefined, cwd: string): string => {
  if (!raw) {
    return join(cwd, 'logs');
  }

  return isAbsolute(raw) ? raw : join(cwd, raw);
};

export const parseEnvironment = (
  env: Record<string, string | undefined>,
  cwd: string = process.cwd(),
): EnvironmentConfig => {
  const parsed = environmentSchema.safeParse(env);

  if (!parsed.success) {
    const issues = parsed.error.issues.map(
      (issue): EnvIssue => ({ key: String(issue.path[0] ?? 'env'), message: issue.message }),
    );
    throw new EnvironmentValidationError(dedupeIssues(issues));
  }

  const values = parsed.data;

  return {
    databaseUrl: values.DATABASE_URL,
    logging: {
      level: values.LOG_LEVEL,
      directory: resolveLogDirectory(values.LOG_DIR, cwd),
      disableFileLogs: values.DISABLE_FILE_LOGS,
    },
    race: {
      adjustmentFailurePolicy: values.RACE_ADJUSTMENT_FAILURE_POLICY,
      potMode: values.RACE_POT_MODE,
      podiumTieMode: values.RACE_PODIUM_TIE_MODE,
    },
  };
};

let cachedEnvironment: EnvironmentConfig | null = null;

export const getEnvironment = (): EnvironmentConfig => {
  if (!cachedEnvironment) {
    cachedEnvironment = parseEnvironment(process.env);
  }

  return cachedEnvironment;
};

export const __resetEnvironmentCacheForTests = () => {
  cachedEnvironment = null;
};
