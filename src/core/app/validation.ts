import type { z } from 'zod';

export type InputIssue = {
  path: string;
  message: string;
  code: string;
};

export const normaliseZodIssues = (issues: z.ZodIssue[]): InputIssue[] =>
  issues.map((issue) => ({
    path: issue.path.join('.'),
    message: issue.message,
    code: issue.code,
  }));

export const describeIssues = (issues: InputIssue[]): string =>
  issues.map((issue) => issue.message).join(' ');
