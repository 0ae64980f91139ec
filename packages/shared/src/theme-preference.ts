import { z } from 'zod';

import { COLOR_SCHEMES, type ColorScheme } from './style-vocabulary';

/**
 * Persisted theme preference record.
 * Owned by the host application; the engine only reads it once at startup.
 */
export interface ThemePreference {
  scheme: ColorScheme;
  primaryColor: string;
}

export const DEFAULT_THEME_PREFERENCE: Readonly<ThemePreference> = Object.freeze({
  scheme: 'light',
  primaryColor: 'blue',
});

export const THEME_PREFERENCE_SCHEMA = z.object({
  scheme: z.enum(COLOR_SCHEMES),
  primaryColor: z
    .string()
    .trim()
    .regex(/^[a-z][a-zA-Z0-9_-]*$/, 'must be a color family name'),
});

export type ParseOutcome<T> = { ok: true; value: T } | { ok: false; issues: string[] };

/** Render zod issues as `path: message` lines */
export function formatIssues(error: z.ZodError): string[] {
  return error.issues.map((issue) => {
    const path = issue.path.length > 0 ? issue.path.join('.') : '(root)';
    return `${path}: ${issue.message}`;
  });
}

/**
 * Validate an untrusted preference record.
 * Missing fields fall back to {@link DEFAULT_THEME_PREFERENCE}.
 */
export function parseThemePreference(input: unknown): ParseOutcome<ThemePreference> {
  const candidate =
    input && typeof input === 'object' ? { ...DEFAULT_THEME_PREFERENCE, ...input } : input;
  const result = THEME_PREFERENCE_SCHEMA.safeParse(candidate);
  if (!result.success) return { ok: false, issues: formatIssues(result.error) };
  return { ok: true, value: result.data };
}
