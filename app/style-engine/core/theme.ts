/**
 * Theme construction
 *
 * A theme is the default token tables deep-merged with an override, then
 * validated and frozen. Color families are replaced whole, never merged
 * shade by shade.
 */

import { z } from 'zod';
import { COLOR_SCHEMES, formatIssues } from 'facet-shared';

import { COLOR_SHADE_COUNT } from '../constants';
import { fingerprint } from '../utils/fingerprint';
import { LookupError, ValidationError } from './errors';
import { createTokenStore, readonlyTokenStore, type TokenStore } from './tokens/token-store';
import { DEFAULT_TOKEN_TABLES } from './tokens/default-tokens';
import type { ComponentThemeOverride, PropBag, Theme, ThemeHandle } from './types';

// =============================================================================
// Schema
// =============================================================================

const rawValueSchema = z.union([z.string(), z.number()]);

const propBagSchema: z.ZodType<PropBag> = z.lazy(() =>
  z.record(z.union([rawValueSchema, propBagSchema])),
);

const shadeIndexSchema = z
  .number()
  .int()
  .min(0)
  .max(COLOR_SHADE_COUNT - 1);

const numberTableSchema = z.record(z.number().finite());

export const THEME_OVERRIDE_SCHEMA = z
  .object({
    colorScheme: z.enum(COLOR_SCHEMES).optional(),
    primaryColor: z.string().min(1).optional(),
    primaryShade: z
      .union([
        shadeIndexSchema,
        z.object({ light: shadeIndexSchema.optional(), dark: shadeIndexSchema.optional() }).strict(),
      ])
      .optional(),
    scale: z.number().finite().positive().optional(),
    fontFamily: z.string().min(1).optional(),
    colors: z
      .record(z.array(z.string()).length(COLOR_SHADE_COUNT, `must have exactly ${COLOR_SHADE_COUNT} shades`))
      .optional(),
    spacing: numberTableSchema.optional(),
    radius: numberTableSchema.optional(),
    fontSizes: numberTableSchema.optional(),
    lineHeights: numberTableSchema.optional(),
    fontWeights: numberTableSchema.optional(),
    shadows: z.record(z.string()).optional(),
    fontFamilies: z.record(z.string()).optional(),
    breakpoints: z.record(z.number().finite().positive()).optional(),
    components: z
      .record(
        z
          .object({
            defaultProps: propBagSchema.optional(),
            styles: z.record(propBagSchema).optional(),
          })
          .strict(),
      )
      .optional(),
  })
  .strict();

export type ThemeOverride = z.infer<typeof THEME_OVERRIDE_SCHEMA>;

// =============================================================================
// Helpers
// =============================================================================

function deepFreeze<T>(value: T): T {
  if (typeof value === 'object' && value !== null && !Object.isFrozen(value)) {
    for (const member of Object.values(value)) deepFreeze(member);
    Object.freeze(value);
  }
  return value;
}

function isDeepFrozen(value: unknown): boolean {
  if (typeof value !== 'object' || value === null) return true;
  return Object.isFrozen(value) && Object.values(value).every(isDeepFrozen);
}

function mergeComponents(
  base: Readonly<Record<string, ComponentThemeOverride>>,
  override: Record<string, ComponentThemeOverride> | undefined,
): Record<string, ComponentThemeOverride> {
  const merged: Record<string, ComponentThemeOverride> = { ...base };
  for (const [name, next] of Object.entries(override ?? {})) {
    const prev = merged[name];
    const styles: Record<string, PropBag> = { ...prev?.styles };
    for (const [target, bag] of Object.entries(next.styles ?? {})) {
      styles[target] = { ...styles[target], ...bag };
    }
    merged[name] = {
      defaultProps: { ...prev?.defaultProps, ...next.defaultProps },
      styles,
    };
  }
  return merged;
}

// =============================================================================
// Public API
// =============================================================================

/**
 * Validate an untrusted override.
 * @throws ValidationError listing every schema issue
 */
export function parseThemeOverride(input: unknown): ThemeOverride {
  const result = THEME_OVERRIDE_SCHEMA.safeParse(input);
  if (!result.success) {
    const issues = formatIssues(result.error);
    throw new ValidationError(`Invalid theme override: ${issues.join('; ')}`, { issues });
  }
  return result.data;
}

/**
 * Deep-merge an already validated override into `base`.
 * The result is frozen; `base` and `override` are left untouched.
 */
export function mergeTheme(base: Theme, override: ThemeOverride): Theme {
  const next = structuredClone(override);
  const primaryShade =
    typeof next.primaryShade === 'number'
      ? { light: next.primaryShade, dark: next.primaryShade }
      : { ...base.primaryShade, ...next.primaryShade };

  return deepFreeze<Theme>({
    colorScheme: next.colorScheme ?? base.colorScheme,
    primaryColor: next.primaryColor ?? base.primaryColor,
    primaryShade,
    scale: next.scale ?? base.scale,
    fontFamily: next.fontFamily ?? base.fontFamily,
    colors: { ...base.colors, ...next.colors },
    spacing: { ...base.spacing, ...next.spacing },
    radius: { ...base.radius, ...next.radius },
    fontSizes: { ...base.fontSizes, ...next.fontSizes },
    lineHeights: { ...base.lineHeights, ...next.lineHeights },
    fontWeights: { ...base.fontWeights, ...next.fontWeights },
    shadows: { ...base.shadows, ...next.shadows },
    fontFamilies: { ...base.fontFamilies, ...next.fontFamilies },
    breakpoints: { ...base.breakpoints, ...next.breakpoints },
    components: mergeComponents(base.components, next.components),
  });
}

/**
 * Build the read-only token store for a theme and check cross-references.
 *
 * @throws ValidationError for malformed tables
 * @throws LookupError when the primary color is not a registered family
 */
export function validateTheme(theme: Theme): TokenStore {
  const tokens = createTokenStore(theme, { scale: theme.scale });
  if (!tokens.has(theme.primaryColor)) {
    throw new LookupError(`Primary color "${theme.primaryColor}" is not a registered family`, {
      path: 'primaryColor',
    });
  }
  return readonlyTokenStore(tokens);
}

export const DEFAULT_THEME: Theme = deepFreeze<Theme>({
  ...structuredClone(DEFAULT_TOKEN_TABLES),
  colorScheme: 'light',
  primaryColor: 'blue',
  primaryShade: { light: 6, dark: 8 },
  scale: 1,
  fontFamily: 'sans',
  components: {},
});

/**
 * Default theme merged with `override`, validated.
 */
export function createTheme(override: unknown = {}, base: Theme = DEFAULT_THEME): Theme {
  const theme = mergeTheme(base, parseThemeOverride(override));
  validateTheme(theme);
  return theme;
}

/**
 * Theme safe to install: returned as is when already deeply frozen,
 * otherwise a frozen copy, so later writes to `theme` are not seen.
 */
export function freezeTheme(theme: Theme): Theme {
  return isDeepFrozen(theme) ? theme : deepFreeze(structuredClone(theme));
}

/** Content hash of a theme; equal themes share a fingerprint */
export function themeFingerprint(theme: Theme): string {
  return fingerprint(theme);
}

export function createThemeHandle(theme: Theme, version: number, tokens?: TokenStore): ThemeHandle {
  return Object.freeze({ theme, tokens: tokens ?? validateTheme(theme), version });
}
