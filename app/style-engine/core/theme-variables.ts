/**
 * Theme Variables
 *
 * Flattens a theme into a table of named, fully resolved values for code
 * that paints outside style sheets (custom delegates, charts, icons).
 * Values depend on the active scheme and, through responsive component
 * props, on the breakpoint.
 *
 * Naming: `--facet-<group>-<key>`, e.g. `--facet-color-blue-6`,
 * `--facet-spacing-md`, `--facet-button-border-radius`.
 */

import { BASE_BREAKPOINT, PSEUDO_STATES, ROOT_TARGET } from 'facet-shared';

import { createPropNormalizer, type PropNormalizer } from './prop-normalizer';
import { assertSerializable } from './stylesheet-generator';
import { isStyleEngineError } from './errors';
import { SEMANTIC_COLORS, createValueResolver, formatPx, type ValueResolver } from './value-resolver';
import type { StyleDiagnostic, ThemeHandle } from './types';

// =============================================================================
// Types
// =============================================================================

export type ThemeVariables = Readonly<Record<string, string>>;

export interface ThemeVariablesOptions {
  /** @default 'base' */
  breakpoint?: string;
  resolver?: ValueResolver;
  /** Used for component variables; built-in defaults are not applied */
  normalizer?: PropNormalizer;
  onDiagnostic?: (diagnostic: StyleDiagnostic) => void;
}

export interface BreakpointRange {
  name: string;
  minWidth: number;
  /** Inclusive; absent for the widest breakpoint */
  maxWidth?: number;
}

// =============================================================================
// Constants
// =============================================================================

export const VARIABLE_PREFIX = '--facet';

const VARIABLE_NAME_PATTERN = /^--facet(?:-[a-z0-9]+)+$/;

// =============================================================================
// Helpers
// =============================================================================

function variableName(...parts: Array<string | number>): string {
  const slug = parts
    .map((part) => String(part).replace(/[^a-zA-Z0-9]+/g, '-').replace(/^-+|-+$/g, ''))
    .filter((part) => part.length > 0)
    .join('-')
    .toLowerCase();
  return `${VARIABLE_PREFIX}-${slug}`;
}

// =============================================================================
// Public API
// =============================================================================

export function createThemeVariables(handle: ThemeHandle, options: ThemeVariablesOptions = {}): ThemeVariables {
  const { theme, tokens } = handle;
  const breakpoint = options.breakpoint ?? BASE_BREAKPOINT;
  const resolver = options.resolver ?? createValueResolver();
  const normalizer = options.normalizer ?? createPropNormalizer({ resolver });
  const vars: Record<string, string> = {};
  const scheme = theme.colorScheme;

  // Core
  vars[variableName('scale')] = String(tokens.scale);
  vars[variableName('color-scheme')] = scheme;
  vars[variableName('breakpoint')] = breakpoint;
  vars[variableName('color-white')] = '#ffffff';
  vars[variableName('color-black')] = '#000000';

  // Colors
  for (const family of tokens.families()) {
    tokens.getShades(family).forEach((shade, index) => {
      vars[variableName('color', family, index)] = shade;
    });
  }
  tokens.getShades(theme.primaryColor).forEach((shade, index) => {
    vars[variableName('primary-color', index)] = shade;
  });
  vars[variableName('primary-color-filled')] = resolver.resolveColor('primary', handle);

  // Semantic
  for (const alias of Object.keys(SEMANTIC_COLORS[scheme])) {
    vars[variableName('color', alias)] = resolver.resolveColor(alias, handle);
  }

  // Typography
  vars[variableName('font-family')] = resolver.resolve(theme.fontFamily, {
    handle,
    breakpoint,
    kind: 'font-family',
  });
  for (const key of Object.keys(theme.fontSizes)) {
    vars[variableName('font-size', key)] = formatPx(tokens.toLength('font-size', key));
  }
  for (const [key, value] of Object.entries(theme.lineHeights)) {
    vars[variableName('line-height', key)] = String(value);
  }
  for (const [key, value] of Object.entries(theme.fontWeights)) {
    vars[variableName('font-weight', key)] = String(value);
  }

  // Layout
  for (const key of Object.keys(theme.spacing)) {
    vars[variableName('spacing', key)] = formatPx(tokens.toLength('spacing', key));
  }
  for (const key of Object.keys(theme.radius)) {
    vars[variableName('radius', key)] = formatPx(tokens.toLength('radius', key));
  }
  for (const [key, value] of Object.entries(theme.shadows)) {
    vars[variableName('shadow', key)] = value;
  }
  for (const { name, minWidth } of tokens.getBreakpoints()) {
    vars[variableName('breakpoint', name)] = formatPx(minWidth);
  }

  // Components
  for (const name of Object.keys(theme.components).sort()) {
    const defaultProps = theme.components[name]?.defaultProps;
    if (!defaultProps) continue;
    const declarations = normalizer.normalize(defaultProps, {
      handle,
      breakpoint,
      onDiagnostic: (diagnostic) =>
        options.onDiagnostic?.({ ...diagnostic, path: `components.${name}.${diagnostic.path ?? ''}` }),
    });
    for (const decl of declarations) {
      if (decl.target !== ROOT_TARGET) continue;
      const state = decl.state === PSEUDO_STATES[0] ? [] : [decl.state];
      vars[variableName(name, ...state, decl.property)] = decl.value;
    }
  }

  return Object.freeze(vars);
}

/**
 * Width range covered by each breakpoint, `base` first.
 */
export function breakpointRanges(handle: ThemeHandle): BreakpointRange[] {
  const thresholds = handle.tokens.getBreakpoints();
  const starts = [{ name: BASE_BREAKPOINT, minWidth: 0 }, ...thresholds];
  return starts.map((start, index) => {
    const next = starts[index + 1];
    return next ? { name: start.name, minWidth: start.minWidth, maxWidth: next.minWidth - 1 } : { ...start };
  });
}

/**
 * Problems with a variable table: names outside the `--facet-` scheme and
 * values that could not be written into a style sheet.
 */
export function validateThemeVariables(vars: ThemeVariables): string[] {
  const issues: string[] = [];
  for (const [name, value] of Object.entries(vars)) {
    if (!VARIABLE_NAME_PATTERN.test(name)) {
      issues.push(`${name}: invalid variable name`);
      continue;
    }
    try {
      assertSerializable(name, value, name);
    } catch (error) {
      if (!isStyleEngineError(error)) throw error;
      issues.push(error.message);
    }
  }
  return issues;
}

/** Variables whose name matches `pattern` (a substring or a RegExp) */
export function filterThemeVariables(vars: ThemeVariables, pattern: string | RegExp): Record<string, string> {
  const matches = (name: string) => (typeof pattern === 'string' ? name.includes(pattern) : pattern.test(name));
  const out: Record<string, string> = {};
  for (const [name, value] of Object.entries(vars)) {
    if (matches(name)) out[name] = value;
  }
  return out;
}
