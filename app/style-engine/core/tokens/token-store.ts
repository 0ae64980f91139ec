/**
 * Token Store
 *
 * Holds the named design values a theme defines: color families (ten
 * shades each), spacing, radius, typography, shadows and breakpoints.
 *
 * Registration validates eagerly; lookups of unknown families, indices
 * or keys throw LookupError.
 */

import { BASE_BREAKPOINT } from 'facet-shared';

import { COLOR_SHADE_COUNT } from '../../constants';
import { LookupError, ValidationError } from '../errors';
import type {
  BreakpointThreshold,
  ColorShades,
  LengthTokenKind,
  NumericTokenKind,
  TokenTables,
} from '../types';
import { isColor } from './color';

// =============================================================================
// Types
// =============================================================================

export interface TokenStoreOptions {
  /**
   * Multiplier applied to every physical length.
   * @default 1
   */
  scale?: number;
}

/** Read side handed to resolvers and theme handles */
export interface TokenStore {
  /** Length multiplier */
  readonly scale: number;

  /** Shade `index` (0-9) of `family` */
  get(family: string, index: number): string;
  has(family: string): boolean;
  /** Registered family names, sorted */
  families(): string[];
  getShades(family: string): ColorShades;

  /** Raw (unscaled) numeric token */
  getNumber(kind: NumericTokenKind, key: string): number;
  hasNumber(kind: NumericTokenKind, key: string): boolean;
  /**
   * Scaled length in px for a named key or a bare number.
   * @throws LookupError for unknown keys
   */
  toLength(kind: LengthTokenKind, value: string | number): number;

  getShadow(key: string): string | undefined;
  getFontFamily(key: string): string | undefined;

  /** Breakpoint thresholds, ascending by width */
  getBreakpoints(): readonly BreakpointThreshold[];
}

export interface MutableTokenStore extends TokenStore {
  /** Register or replace a whole color family */
  register(family: string, shades: readonly string[]): void;
}

// =============================================================================
// Constants
// =============================================================================

const FAMILY_NAME_PATTERN = /^[a-z][a-zA-Z0-9_-]*$/;

/** Names the resolver interprets itself */
const RESERVED_FAMILY_NAMES = new Set(['primary']);

const NUMERIC_TABLE_KEYS = {
  spacing: 'spacing',
  radius: 'radius',
  'font-size': 'fontSizes',
  'line-height': 'lineHeights',
  'font-weight': 'fontWeights',
} as const satisfies Record<NumericTokenKind, keyof TokenTables>;

// =============================================================================
// Validation
// =============================================================================

function validateShades(family: string, shades: readonly string[]): ColorShades {
  if (!FAMILY_NAME_PATTERN.test(family) || RESERVED_FAMILY_NAMES.has(family)) {
    throw new ValidationError(`Invalid color family name "${family}"`, { path: `colors.${family}` });
  }
  if (shades.length !== COLOR_SHADE_COUNT) {
    throw new ValidationError(
      `Color family "${family}" must have exactly ${COLOR_SHADE_COUNT} shades, got ${shades.length}`,
      { path: `colors.${family}`, value: shades },
    );
  }
  const normalized = shades.map((shade, index) => {
    if (typeof shade !== 'string' || !isColor(shade)) {
      throw new ValidationError(`Color family "${family}" shade ${index} is not a color`, {
        path: `colors.${family}.${index}`,
        value: shade,
      });
    }
    return shade.trim().toLowerCase();
  });
  return Object.freeze(normalized);
}

function validateNumbers(
  path: string,
  table: Readonly<Record<string, number>>,
  { positive }: { positive: boolean },
): Map<string, number> {
  const out = new Map<string, number>();
  for (const [key, value] of Object.entries(table)) {
    if (!Number.isFinite(value) || (positive ? value <= 0 : value < 0)) {
      throw new ValidationError(`Token "${path}.${key}" must be a ${positive ? 'positive' : 'non-negative'} number`, {
        path: `${path}.${key}`,
        value,
      });
    }
    out.set(key, value);
  }
  return out;
}

/**
 * Sort breakpoints ascending; reject reserved names and duplicate widths.
 */
export function toBreakpointThresholds(
  breakpoints: Readonly<Record<string, number>>,
): BreakpointThreshold[] {
  const thresholds: BreakpointThreshold[] = [];
  const seen = new Map<number, string>();
  for (const [name, minWidth] of Object.entries(breakpoints)) {
    if (name === BASE_BREAKPOINT) {
      throw new ValidationError(`Breakpoint name "${BASE_BREAKPOINT}" is reserved`, {
        path: `breakpoints.${name}`,
      });
    }
    if (!Number.isFinite(minWidth) || minWidth <= 0) {
      throw new ValidationError(`Breakpoint "${name}" must be a positive width`, {
        path: `breakpoints.${name}`,
        value: minWidth,
      });
    }
    const clash = seen.get(minWidth);
    if (clash !== undefined) {
      throw new ValidationError(`Breakpoints "${clash}" and "${name}" share width ${minWidth}`, {
        path: `breakpoints.${name}`,
        value: minWidth,
      });
    }
    seen.set(minWidth, name);
    thresholds.push({ name, minWidth });
  }
  return thresholds.sort((a, b) => a.minWidth - b.minWidth);
}

// =============================================================================
// Implementation
// =============================================================================

export function createTokenStore(tables: TokenTables, options: TokenStoreOptions = {}): MutableTokenStore {
  const scale = options.scale ?? 1;
  if (!Number.isFinite(scale) || scale <= 0) {
    throw new ValidationError('Theme scale must be a positive number', { path: 'scale', value: scale });
  }

  const colors = new Map<string, ColorShades>();
  for (const [family, shades] of Object.entries(tables.colors)) {
    colors.set(family, validateShades(family, shades));
  }

  const numbers: Record<NumericTokenKind, Map<string, number>> = {
    spacing: validateNumbers('spacing', tables.spacing, { positive: false }),
    radius: validateNumbers('radius', tables.radius, { positive: false }),
    'font-size': validateNumbers('fontSizes', tables.fontSizes, { positive: true }),
    'line-height': validateNumbers('lineHeights', tables.lineHeights, { positive: true }),
    'font-weight': validateNumbers('fontWeights', tables.fontWeights, { positive: true }),
  };

  const shadows = new Map(Object.entries(tables.shadows));
  const fontFamilies = new Map(Object.entries(tables.fontFamilies));
  const breakpoints = Object.freeze(toBreakpointThresholds(tables.breakpoints));

  function getShades(family: string): ColorShades {
    const shades = colors.get(family);
    if (!shades) {
      throw new LookupError(`Unknown color family "${family}"`, { path: family });
    }
    return shades;
  }

  function getNumber(kind: NumericTokenKind, key: string): number {
    const value = numbers[kind].get(key);
    if (value === undefined) {
      throw new LookupError(`Unknown ${NUMERIC_TABLE_KEYS[kind]} token "${key}"`, { path: key });
    }
    return value;
  }

  return {
    scale,

    register(family, shades) {
      colors.set(family, validateShades(family, shades));
    },

    get(family, index) {
      const shades = getShades(family);
      const shade = Number.isInteger(index) ? shades[index] : undefined;
      if (shade === undefined) {
        throw new LookupError(`Shade index ${index} is out of range for "${family}" (0-${COLOR_SHADE_COUNT - 1})`, {
          path: `${family}.${index}`,
        });
      }
      return shade;
    },

    has: (family) => colors.has(family),
    families: () => Array.from(colors.keys()).sort(),
    getShades,

    getNumber,
    hasNumber: (kind, key) => numbers[kind].has(key),

    toLength(kind, value) {
      const base = typeof value === 'number' ? value : getNumber(kind, value);
      return base * scale;
    },

    getShadow: (key) => shadows.get(key),
    getFontFamily: (key) => fontFamilies.get(key),
    getBreakpoints: () => breakpoints,
  };
}

/**
 * Frozen view of `store` without `register`. Installed themes only hand
 * out this view, so families change through a new theme version.
 */
export function readonlyTokenStore(store: TokenStore): TokenStore {
  return Object.freeze({
    scale: store.scale,
    get: (family: string, index: number) => store.get(family, index),
    has: (family: string) => store.has(family),
    families: () => store.families(),
    getShades: (family: string) => store.getShades(family),
    getNumber: (kind: NumericTokenKind, key: string) => store.getNumber(kind, key),
    hasNumber: (kind: NumericTokenKind, key: string) => store.hasNumber(kind, key),
    toLength: (kind: LengthTokenKind, value: string | number) => store.toLength(kind, value),
    getShadow: (key: string) => store.getShadow(key),
    getFontFamily: (key: string) => store.getFontFamily(key),
    getBreakpoints: () => store.getBreakpoints(),
  });
}
