/**
 * Purpose: Shared helpers for reading raw environment values and reporting configuration issues.
 */

export type EnvIssue = {
  key: string;
  message: string;
};

const TRUE_FLAG_VALUES = new Set(['1', 'true', 'yes', 'y', 'on']);
const FALSE_FLAG_VALUES = new Set(['0', 'false', 'no', 'n', 'off']);

export function parseBooleanFlagValue(value: string): boolean | null {
  const normalised = value.trim().toLowerCase();

  if (normalised.length === 0) {
    return null;
  }

  if (TRUE_FLAG_VALUES.has(normalised)) {
    return true;
  }

  if (FALSE_FLAG_VALUES.has(normalised)) {
    return false;
  }

  return null;
}

/** Treats unset and whitespace-only values alike so defaults apply to both. */
export function blankToUndefined(value: unknown): unknown {
  if (typeof value !== 'string') {
    return value;
  }

  const trimmed = value.trim();
  return trimmed.length > 0 ? trimmed : undefined;
}

export function dedupeIssues(issues: EnvIssue[]): EnvIssue[] {
  const seen = new Map<string, EnvIssue>();

  for (const issue of issues) {
    if (!seen.has(issue.key)) {
      seen.set(issue.key, issue);
    }
  }

  return Array.from(seen.values());
}
