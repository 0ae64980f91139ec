/**
 * Prop Normalizer
 *
 * Expands a widget's prop bag into canonical declarations.
 *
 * Precedence (later layers win per target/state/property):
 *   component defaults (base < variant < size)
 *   < theme component override
 *   < instance props
 * Within a bag, the raw `style` escape hatch wins over short-hands for
 * the same property. Pseudo-state sub-bags produce declarations under
 * their own state.
 *
 * Responsive values are resolved against the active breakpoint here, so
 * the output always describes one breakpoint.
 */

import { PSEUDO_STATES, ROOT_TARGET, isPseudoStateKey, PSEUDO_STATE_KEYS } from 'facet-shared';
import type { PseudoState } from 'facet-shared';

import { ConfigError } from './errors';
import { assertSerializable, normalizePropertyName } from './stylesheet-generator';
import type { ComponentDefaultsRegistry } from './component-defaults';
import type { PropBag, PropValue, StyleDeclaration, StyleDiagnostic, ThemeHandle, ValueKind } from './types';
import { createValueResolver, isResponsiveValue, type ValueResolver } from './value-resolver';

// =============================================================================
// Types
// =============================================================================

interface ShorthandSpec {
  properties: readonly string[];
  kind: ValueKind;
}

/** Parsed prop entry */
export type StyleEntry =
  | { kind: 'shorthand'; name: ShorthandName; value: PropValue }
  | { kind: 'passthrough'; property: string; value: PropValue }
  | { kind: 'raw'; property: string; value: PropValue };

export interface ParsedPropBag {
  entries: StyleEntry[];
  /** Pseudo-state sub-bags (non-base states only) */
  states: Partial<Record<PseudoState, ParsedPropBag>>;
  /** Inner target sub-bags */
  inner: Record<string, ParsedPropBag>;
  variant?: string;
  size?: string;
  /** Entries that could not be parsed */
  problems: StyleDiagnostic[];
}

export interface NormalizeContext {
  handle: ThemeHandle;
  breakpoint: string;
  /** Component name for defaults and theme overrides */
  component?: string;
  /** Declared inner target names */
  targets?: readonly string[];
  /** Receives recoverable problems; the affected declaration is dropped */
  onDiagnostic?: (diagnostic: StyleDiagnostic) => void;
}

export interface PropNormalizerOptions {
  resolver?: ValueResolver;
  defaults?: ComponentDefaultsRegistry;
}

export interface PropNormalizer {
  parse(bag: PropBag): ParsedPropBag;
  /**
   * Expand, merge and resolve a bag.
   * Output is sorted by target, state, then property.
   *
   * @throws LookupError for unknown tokens or breakpoints
   * @throws SerializationError for values that cannot be emitted
   */
  normalize(bag: PropBag, context: NormalizeContext): StyleDeclaration[];
}

// =============================================================================
// Short-hand Table
// =============================================================================

export const SHORTHAND_PROPS = {
  // Margin
  m: { properties: ['margin'], kind: 'spacing' },
  mt: { properties: ['margin-top'], kind: 'spacing' },
  mr: { properties: ['margin-right'], kind: 'spacing' },
  mb: { properties: ['margin-bottom'], kind: 'spacing' },
  ml: { properties: ['margin-left'], kind: 'spacing' },
  mx: { properties: ['margin-left', 'margin-right'], kind: 'spacing' },
  my: { properties: ['margin-top', 'margin-bottom'], kind: 'spacing' },

  // Padding
  p: { properties: ['padding'], kind: 'spacing' },
  pt: { properties: ['padding-top'], kind: 'spacing' },
  pr: { properties: ['padding-right'], kind: 'spacing' },
  pb: { properties: ['padding-bottom'], kind: 'spacing' },
  pl: { properties: ['padding-left'], kind: 'spacing' },
  px: { properties: ['padding-left', 'padding-right'], kind: 'spacing' },
  py: { properties: ['padding-top', 'padding-bottom'], kind: 'spacing' },

  // Sizing
  w: { properties: ['width'], kind: 'size' },
  h: { properties: ['height'], kind: 'size' },
  miw: { properties: ['min-width'], kind: 'size' },
  mih: { properties: ['min-height'], kind: 'size' },
  maw: { properties: ['max-width'], kind: 'size' },
  mah: { properties: ['max-height'], kind: 'size' },

  // Color
  c: { properties: ['color'], kind: 'color' },
  bg: { properties: ['background-color'], kind: 'color' },
  bdc: { properties: ['border-color'], kind: 'color' },

  // Typography
  fz: { properties: ['font-size'], kind: 'font-size' },
  fw: { properties: ['font-weight'], kind: 'font-weight' },
  lh: { properties: ['line-height'], kind: 'line-height' },
  ff: { properties: ['font-family'], kind: 'font-family' },
  lts: { properties: ['letter-spacing'], kind: 'size' },
  ta: { properties: ['text-align'], kind: 'literal' },
  td: { properties: ['text-decoration'], kind: 'literal' },
  tt: { properties: ['text-transform'], kind: 'literal' },
  fs: { properties: ['font-style'], kind: 'literal' },

  // Border / shadow
  bd: { properties: ['border'], kind: 'border' },
  bdrs: { properties: ['border-radius'], kind: 'radius' },
  bxsh: { properties: ['box-shadow'], kind: 'shadow' },

  // Layout
  opacity: { properties: ['opacity'], kind: 'literal' },
  display: { properties: ['display'], kind: 'literal' },
  pos: { properties: ['position'], kind: 'literal' },
  top: { properties: ['top'], kind: 'size' },
  right: { properties: ['right'], kind: 'size' },
  bottom: { properties: ['bottom'], kind: 'size' },
  left: { properties: ['left'], kind: 'size' },
  inset: { properties: ['top', 'right', 'bottom', 'left'], kind: 'size' },
} as const satisfies Record<string, ShorthandSpec>;

export type ShorthandName = keyof typeof SHORTHAND_PROPS;

const STYLES_KEY = 'styles';
const STYLE_KEY = 'style';
const VARIANT_KEY = 'variant';
const SIZE_KEY = 'size';

const LENGTH_PROPERTIES: ReadonlySet<string> = new Set([
  'margin',
  'margin-top',
  'margin-right',
  'margin-bottom',
  'margin-left',
  'padding',
  'padding-top',
  'padding-right',
  'padding-bottom',
  'padding-left',
  'width',
  'height',
  'min-width',
  'min-height',
  'max-width',
  'max-height',
  'spacing',
  'top',
  'right',
  'bottom',
  'left',
]);

// =============================================================================
// Helpers
// =============================================================================

function isShorthandName(name: string): name is ShorthandName {
  return Object.prototype.hasOwnProperty.call(SHORTHAND_PROPS, name);
}

function isPropBag(value: unknown): value is PropBag {
  return isResponsiveValue(value);
}

function isPropValue(value: unknown): value is PropValue {
  if (typeof value === 'string' || typeof value === 'number') return true;
  if (!isResponsiveValue(value)) return false;
  return Object.values(value).every(
    (entry) => entry === undefined || typeof entry === 'string' || typeof entry === 'number',
  );
}

/** Value kind inferred from a literal property name */
export function inferValueKind(property: string): ValueKind {
  if (property === 'border' || /^border-(top|right|bottom|left)$/.test(property)) return 'border';
  if (property.endsWith('color')) return 'color';
  if (property === 'border-radius') return 'radius';
  if (property === 'font-size') return 'font-size';
  if (property === 'font-weight') return 'font-weight';
  if (property === 'line-height') return 'line-height';
  if (property === 'font-family') return 'font-family';
  if (property === 'box-shadow') return 'shadow';
  if (LENGTH_PROPERTIES.has(property)) return 'size';
  return 'literal';
}

function joinPath(prefix: string, key: string): string {
  return prefix ? `${prefix}.${key}` : key;
}

function emptyParsed(): ParsedPropBag {
  return { entries: [], states: {}, inner: {}, problems: [] };
}

function parseBag(bag: PropBag, path: string, allowNesting: boolean): ParsedPropBag {
  const parsed = emptyParsed();
  const problem = (key: string, message: string) =>
    parsed.problems.push({ code: 'CONFIG', message, path: joinPath(path, key) });

  for (const key of Object.keys(bag).sort()) {
    const value = bag[key];
    if (value === undefined) continue;

    if (isPseudoStateKey(key)) {
      if (!allowNesting) {
        problem(key, `Pseudo-state "${key}" cannot be nested`);
      } else if (!isPropBag(value)) {
        problem(key, `Pseudo-state "${key}" expects a prop bag`);
      } else {
        const sub = parseBag(value, joinPath(path, key), false);
        parsed.states[PSEUDO_STATE_KEYS[key]] = sub;
        parsed.problems.push(...sub.problems);
      }
      continue;
    }

    if (key === STYLES_KEY) {
      if (!allowNesting || !isPropBag(value)) {
        problem(key, '"styles" expects a map of inner targets at the top level');
        continue;
      }
      for (const target of Object.keys(value).sort()) {
        const targetBag = value[target];
        if (targetBag === undefined) continue;
        if (!isPropBag(targetBag)) {
          problem(`${key}.${target}`, `Inner target "${target}" expects a prop bag`);
          continue;
        }
        const sub = parseBag(targetBag, joinPath(path, `${key}.${target}`), true);
        parsed.inner[target] = sub;
        parsed.problems.push(...sub.problems);
      }
      continue;
    }

    if (key === STYLE_KEY) {
      if (!isPropBag(value)) {
        problem(key, '"style" expects a map of properties');
        continue;
      }
      for (const property of Object.keys(value).sort()) {
        const raw = value[property];
        if (raw === undefined) continue;
        if (!isPropValue(raw)) {
          problem(`${key}.${property}`, `Unsupported value for "${property}"`);
          continue;
        }
        parsed.entries.push({ kind: 'raw', property: normalizePropertyName(property), value: raw });
      }
      continue;
    }

    if (key === VARIANT_KEY || key === SIZE_KEY) {
      if (typeof value !== 'string') {
        problem(key, `"${key}" expects a string`);
      } else if (key === VARIANT_KEY) {
        parsed.variant = value;
      } else {
        parsed.size = value;
      }
      continue;
    }

    if (!isPropValue(value)) {
      problem(key, `Unsupported value for "${key}"`);
      continue;
    }

    parsed.entries.push(
      isShorthandName(key)
        ? { kind: 'shorthand', name: key, value }
        : { kind: 'passthrough', property: key, value },
    );
  }

  return parsed;
}

function compareDeclarations(a: StyleDeclaration, b: StyleDeclaration): number {
  if (a.target !== b.target) {
    if (a.target === ROOT_TARGET) return -1;
    if (b.target === ROOT_TARGET) return 1;
    return a.target < b.target ? -1 : 1;
  }
  if (a.state !== b.state) {
    return PSEUDO_STATES.indexOf(a.state) - PSEUDO_STATES.indexOf(b.state);
  }
  if (a.property === b.property) return 0;
  return a.property < b.property ? -1 : 1;
}

// =============================================================================
// Implementation
// =============================================================================

export function createPropNormalizer(options: PropNormalizerOptions = {}): PropNormalizer {
  const resolver = options.resolver ?? createValueResolver();
  const defaults = options.defaults;

  function parse(bag: PropBag): ParsedPropBag {
    return parseBag(bag, '', true);
  }

  function normalize(bag: PropBag, context: NormalizeContext): StyleDeclaration[] {
    const { handle, breakpoint, component } = context;
    const declared = new Set(context.targets ?? []);
    const merged = new Map<string, StyleDeclaration>();

    const report = (diagnostic: StyleDiagnostic) => context.onDiagnostic?.(diagnostic);

    function emit(target: string, state: PseudoState, property: string, value: string) {
      merged.set(`${target}|${state}|${property}`, { target, property, value, state, breakpoint });
    }

    function applyEntry(entry: StyleEntry, target: string, state: PseudoState, path: string) {
      const properties =
        entry.kind === 'shorthand' ? SHORTHAND_PROPS[entry.name].properties : [entry.property];
      const kind =
        entry.kind === 'shorthand' ? SHORTHAND_PROPS[entry.name].kind : inferValueKind(entry.property);
      const entryPath = joinPath(path, entry.kind === 'shorthand' ? entry.name : entry.property);

      let value: string;
      try {
        value = resolver.resolve(entry.value, { handle, breakpoint, kind, path: entryPath });
      } catch (error) {
        if (error instanceof ConfigError) {
          report({ code: error.code, message: error.message, path: entryPath });
          return;
        }
        throw error;
      }

      for (const property of properties) {
        assertSerializable(property, value, entryPath);
        emit(target, state, property, value);
      }
    }

    function applyParsed(parsed: ParsedPropBag, target: string, path: string) {
      for (const entry of parsed.entries) {
        if (entry.kind !== 'raw') applyEntry(entry, target, 'base', path);
      }
      for (const entry of parsed.entries) {
        if (entry.kind === 'raw') applyEntry(entry, target, 'base', joinPath(path, STYLE_KEY));
      }

      for (const state of PSEUDO_STATES) {
        const sub = parsed.states[state];
        if (!sub) continue;
        const statePath = joinPath(path, `:${state}`);
        for (const entry of sub.entries) {
          if (entry.kind !== 'raw') applyEntry(entry, target, state, statePath);
        }
        for (const entry of sub.entries) {
          if (entry.kind === 'raw') applyEntry(entry, target, state, joinPath(statePath, STYLE_KEY));
        }
      }

      for (const name of Object.keys(parsed.inner).sort()) {
        const inner = parsed.inner[name];
        if (!inner) continue;
        const innerPath = joinPath(path, `${STYLES_KEY}.${name}`);
        if (target !== ROOT_TARGET || !declared.has(name)) {
          const error = new ConfigError(`Unknown inner target "${name}"`, { path: innerPath });
          report({ code: error.code, message: error.message, path: innerPath });
          continue;
        }
        applyParsed(inner, name, innerPath);
      }
    }

    function applyBag(source: PropBag | undefined, target: string, path: string) {
      if (!source) return;
      const parsed = parse(source);
      for (const problem of parsed.problems) report({ ...problem, path: joinPath(path, problem.path ?? '') });
      applyParsed(parsed, target, path);
    }

    const instance = parse(bag);
    for (const problem of instance.problems) report(problem);

    const override = component ? handle.theme.components[component] : undefined;
    const builtIn = component ? defaults?.get(component) : undefined;

    if (builtIn) {
      const overrideDefaults = override?.defaultProps ? parse(override.defaultProps) : undefined;
      const variant = instance.variant ?? overrideDefaults?.variant ?? builtIn.defaultVariant;
      const size = instance.size ?? overrideDefaults?.size ?? builtIn.defaultSize;
      const defaultsPath = `defaults.${component ?? ''}`;

      applyBag(builtIn.base, ROOT_TARGET, defaultsPath);
      if (variant !== undefined) {
        const variantBag = builtIn.variants?.[variant];
        if (variantBag) {
          applyBag(variantBag, ROOT_TARGET, `${defaultsPath}.variant`);
        } else if (builtIn.variants) {
          report({ code: 'CONFIG', message: `Unknown variant "${variant}"`, path: VARIANT_KEY });
        }
      }
      if (size !== undefined) {
        const sizeBag = builtIn.sizes?.[size];
        if (sizeBag) {
          applyBag(sizeBag, ROOT_TARGET, `${defaultsPath}.size`);
        } else if (builtIn.sizes) {
          report({ code: 'CONFIG', message: `Unknown size "${size}"`, path: SIZE_KEY });
        }
      }
    }

    if (override && component) {
      const themePath = `theme.components.${component}`;
      applyBag(override.defaultProps, ROOT_TARGET, themePath);
      for (const name of Object.keys(override.styles ?? {}).sort()) {
        const innerBag = override.styles?.[name];
        if (!innerBag) continue;
        const innerPath = `${themePath}.styles.${name}`;
        if (name === ROOT_TARGET) {
          applyBag(innerBag, ROOT_TARGET, innerPath);
        } else if (declared.has(name)) {
          applyBag(innerBag, name, innerPath);
        } else {
          const error = new ConfigError(`Unknown inner target "${name}"`, { path: innerPath });
          report({ code: error.code, message: error.message, path: innerPath });
        }
      }
    }

    applyParsed(instance, ROOT_TARGET, '');

    return Array.from(merged.values()).sort(compareDeclarations);
  }

  return { parse, normalize };
}
