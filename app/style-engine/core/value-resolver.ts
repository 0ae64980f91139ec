/**
 * Value Resolver
 *
 * Turns a raw prop value (token reference, literal or responsive map) into
 * the concrete string the style sheet carries.
 *
 * Resolution order:
 * 1. Responsive maps select the entry for the active breakpoint, falling
 *    back through smaller breakpoints to `base`.
 * 2. The scalar is resolved by the target property's value kind:
 *    - colors: semantic alias, `primary[.N]`, `family.N`, bare family
 *    - lengths: named token, bare number or `rem`, scaled to px
 *    - everything else: named token or literal
 *
 * Resolved output never contains a token reference, so resolving a
 * resolved value returns it unchanged.
 */

import type { ColorScheme } from 'facet-shared';
import { BASE_BREAKPOINT } from 'facet-shared';

import { REM_BASE_PX } from '../constants';
import { ConfigError, LookupError, SerializationError } from './errors';
import type { LengthTokenKind, PropValue, RawValue, ResponsiveValue, ThemeHandle, ValueKind } from './types';

// =============================================================================
// Types
// =============================================================================

export interface ResolveContext {
  handle: ThemeHandle;
  /** Active breakpoint name (or `base`) */
  breakpoint: string;
  kind: ValueKind;
  /** Prop path for error messages */
  path?: string;
}

export interface ValueResolverOptions {
  /**
   * Pixels per rem before scaling.
   * @default 16
   */
  remBasePx?: number;
}

export interface ValueResolver {
  resolve(raw: PropValue, context: ResolveContext): string;
  /** Resolve a color reference under the theme's active scheme */
  resolveColor(raw: string, handle: ThemeHandle, path?: string): string;
}

// =============================================================================
// Constants
// =============================================================================

/**
 * Scheme-dependent color aliases.
 * Entries are themselves color references.
 */
export const SEMANTIC_COLORS: Readonly<Record<ColorScheme, Readonly<Record<string, string>>>> = {
  light: {
    text: '#000000',
    body: '#ffffff',
    error: 'red.6',
    placeholder: 'gray.5',
    dimmed: 'gray.6',
    bright: '#000000',
    anchor: 'primary.6',
    default: '#ffffff',
    'default-hover': 'gray.0',
    'default-color': '#000000',
    'default-border': 'gray.4',
    disabled: 'gray.1',
    'disabled-color': 'gray.5',
    'disabled-border': 'gray.3',
  },
  dark: {
    text: 'dark.0',
    body: 'dark.7',
    error: 'red.8',
    placeholder: 'dark.3',
    dimmed: 'dark.2',
    bright: '#ffffff',
    anchor: 'primary.4',
    default: 'dark.6',
    'default-hover': 'dark.5',
    'default-color': '#ffffff',
    'default-border': 'dark.4',
    disabled: 'dark.6',
    'disabled-color': 'dark.3',
    'disabled-border': 'dark.4',
  },
};

const PRIMARY = 'primary';
const SHADE_REFERENCE = /^([a-z][a-zA-Z0-9_-]*)\.(\d+)$/;
const NUMBER_PATTERN = /^-?(?:\d+\.?\d*|\.\d+)$/;
const REM_PATTERN = /^(-?(?:\d+\.?\d*|\.\d+))rem$/;

/** Kinds emitted as scaled px for bare numbers */
const LENGTH_KINDS: ReadonlySet<ValueKind> = new Set(['spacing', 'size', 'radius', 'font-size', 'border']);

/** Table used for named keys of each length kind */
const LENGTH_TABLES: Partial<Record<ValueKind, LengthTokenKind>> = {
  spacing: 'spacing',
  size: 'spacing',
  radius: 'radius',
  'font-size': 'font-size',
};

// =============================================================================
// Responsive Helpers
// =============================================================================

export function isResponsiveValue(value: unknown): value is ResponsiveValue {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/** Wrap a scalar as `{ base: value }`; responsive maps pass through */
export function toResponsive(value: PropValue): ResponsiveValue {
  return isResponsiveValue(value) ? value : { [BASE_BREAKPOINT]: value };
}

/** `base` followed by the theme's breakpoint names, ascending */
export function breakpointOrder(handle: ThemeHandle): string[] {
  return [BASE_BREAKPOINT, ...handle.tokens.getBreakpoints().map((b) => b.name)];
}

/**
 * Pick the entry for `active`, falling back to smaller breakpoints.
 *
 * @param order - `base` first, then breakpoint names ascending
 * @throws LookupError for keys outside `order` or an unknown active breakpoint
 * @throws ConfigError when no entry at or below `active` exists
 */
export function selectResponsive(
  value: ResponsiveValue,
  active: string,
  order: readonly string[],
  path?: string,
): RawValue {
  for (const key of Object.keys(value)) {
    if (!order.includes(key)) {
      throw new LookupError(`Unknown breakpoint "${key}" in responsive value`, { path, value });
    }
  }

  const start = order.indexOf(active);
  if (start === -1) {
    throw new LookupError(`Unknown active breakpoint "${active}"`, { path });
  }

  for (let i = start; i >= 0; i--) {
    const name = order[i];
    if (name === undefined) continue;
    const entry = value[name];
    if (entry !== undefined) return entry;
  }

  throw new ConfigError(`Responsive value has no entry for "${active}" or any smaller breakpoint`, {
    path,
    value,
  });
}

// =============================================================================
// Formatting
// =============================================================================

/** Up to four decimals, no trailing zeros, never `-0` */
export function formatNumber(n: number): string {
  const rounded = Math.round(n * 10000) / 10000;
  return Object.is(rounded, -0) ? '0' : String(rounded);
}

export function formatPx(n: number): string {
  return `${formatNumber(n)}px`;
}

// =============================================================================
// Implementation
// =============================================================================

export function createValueResolver(options: ValueResolverOptions = {}): ValueResolver {
  const remBasePx = options.remBasePx ?? REM_BASE_PX;

  function resolveColor(raw: string, handle: ThemeHandle, path?: string, depth = 0): string {
    const { theme, tokens } = handle;
    const value = raw.trim();
    const shadeIndex = theme.primaryShade[theme.colorScheme];

    const alias = depth === 0 ? SEMANTIC_COLORS[theme.colorScheme][value] : undefined;
    if (alias !== undefined) return resolveColor(alias, handle, path, depth + 1);

    if (value === PRIMARY) return tokens.get(theme.primaryColor, shadeIndex);

    const match = value.match(SHADE_REFERENCE);
    if (match) {
      const family = match[1] === PRIMARY ? theme.primaryColor : (match[1] ?? '');
      if (!tokens.has(family)) {
        throw new LookupError(`Unknown color family "${family}"`, { path, value: raw });
      }
      return tokens.get(family, Number(match[2]));
    }

    if (tokens.has(value)) return tokens.get(value, shadeIndex);

    return value;
  }

  /** Named length key, bare number or rem to a scaled px string */
  function resolveLength(value: string, kind: ValueKind, handle: ThemeHandle): string | null {
    const { tokens } = handle;
    const table = LENGTH_TABLES[kind];
    const negative = value.startsWith('-');
    const key = negative ? value.slice(1) : value;

    if (table && tokens.hasNumber(table, key)) {
      const px = tokens.toLength(table, key);
      return formatPx(negative ? -px : px);
    }
    if (NUMBER_PATTERN.test(value)) {
      return formatPx(Number(value) * tokens.scale);
    }
    const rem = value.match(REM_PATTERN);
    if (rem) {
      return formatPx(Number(rem[1]) * remBasePx * tokens.scale);
    }
    return null;
  }

  function resolveBorder(value: string, handle: ThemeHandle, path?: string): string {
    return value
      .split(/\s+/)
      .map((word) => resolveLength(word, 'border', handle) ?? resolveColor(word, handle, path))
      .join(' ');
  }

  function resolveNamedNumber(
    value: string,
    kind: 'line-height' | 'font-weight',
    handle: ThemeHandle,
  ): string {
    if (handle.tokens.hasNumber(kind, value)) {
      return formatNumber(handle.tokens.getNumber(kind, value));
    }
    return NUMBER_PATTERN.test(value) ? formatNumber(Number(value)) : value;
  }

  function resolveScalar(raw: RawValue, context: ResolveContext): string {
    const { handle, kind, path } = context;

    if (typeof raw === 'number') {
      if (!Number.isFinite(raw)) {
        throw new SerializationError(`Value ${raw} cannot be emitted`, { path, value: raw });
      }
      return LENGTH_KINDS.has(kind) ? formatPx(raw * handle.tokens.scale) : formatNumber(raw);
    }

    const value = raw.trim();
    if (!value) {
      throw new ConfigError('Empty style value', { path, value: raw });
    }

    switch (kind) {
      case 'color':
        return resolveColor(value, handle, path);
      case 'border':
        return resolveBorder(value, handle, path);
      case 'spacing':
      case 'size':
      case 'radius':
      case 'font-size':
        return resolveLength(value, kind, handle) ?? value;
      case 'line-height':
      case 'font-weight':
        return resolveNamedNumber(value, kind, handle);
      case 'shadow':
        return handle.tokens.getShadow(value) ?? value;
      case 'font-family':
        return handle.tokens.getFontFamily(value) ?? value;
      case 'literal':
        return value;
    }
  }

  return {
    resolve(raw, context) {
      const scalar = isResponsiveValue(raw)
        ? selectResponsive(raw, context.breakpoint, breakpointOrder(context.handle), context.path)
        : raw;
      return resolveScalar(scalar, context);
    },

    resolveColor: (raw, handle, path) => resolveColor(raw, handle, path),
  };
}
