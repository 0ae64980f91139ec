/**
 * Style Engine Types
 *
 * Type definitions shared by the token store, resolver, normalizer,
 * generator, cache and provider.
 */

import type { ColorScheme, PseudoState } from 'facet-shared';

import type { StyleEngineErrorCode } from './errors';
import type { TokenStore } from './tokens/token-store';

// =============================================================================
// Raw Prop Values
// =============================================================================

/** Literal or token reference as written by application code */
export type RawValue = string | number;

/**
 * Breakpoint-keyed value.
 * Example: `{ base: 100, lg: 300 }`
 */
export interface ResponsiveValue {
  [breakpoint: string]: RawValue | undefined;
}

/** Value accepted by a single style prop */
export type PropValue = RawValue | ResponsiveValue;

/**
 * Flat map of short-hand props to raw values.
 *
 * Reserved keys:
 * - `':hover' | ':focus' | ':active' | ':disabled'` nest a pseudo-state sub-bag
 * - `styles` maps inner target names to sub-bags
 * - `style` is the raw-property escape hatch
 * - `variant` / `size` select component defaults
 */
export interface PropBag {
  [name: string]: PropValue | PropBag | undefined;
}

// =============================================================================
// Token Classification
// =============================================================================

/** Numeric token tables */
export type NumericTokenKind = 'spacing' | 'radius' | 'font-size' | 'line-height' | 'font-weight';

/** Numeric tables whose values are physical lengths (scaled, emitted in px) */
export type LengthTokenKind = 'spacing' | 'radius' | 'font-size';

/** Every token kind the store knows about */
export type TokenKind =
  | 'color-shade'
  | NumericTokenKind
  | 'shadow'
  | 'font-family'
  | 'breakpoint';

/**
 * What a target property expects.
 * Selects which token table a named key resolves through.
 */
export type ValueKind =
  | 'color'
  | 'spacing' // margin/padding/gap
  | 'size' // width/height/offsets (named keys use spacing)
  | 'radius'
  | 'shadow'
  | 'font-size'
  | 'line-height'
  | 'font-weight'
  | 'font-family'
  | 'border' // width/style/color triplets
  | 'literal';

/** Ten shades, lightest to darkest */
export type ColorShades = readonly string[];

/** Breakpoint name with its minimum width */
export interface BreakpointThreshold {
  name: string;
  minWidth: number;
}

// =============================================================================
// Theme
// =============================================================================

export interface TokenTables {
  colors: Readonly<Record<string, ColorShades>>;
  spacing: Readonly<Record<string, number>>;
  radius: Readonly<Record<string, number>>;
  fontSizes: Readonly<Record<string, number>>;
  lineHeights: Readonly<Record<string, number>>;
  fontWeights: Readonly<Record<string, number>>;
  shadows: Readonly<Record<string, string>>;
  fontFamilies: Readonly<Record<string, string>>;
  breakpoints: Readonly<Record<string, number>>;
}

/** Shade of the primary family used per scheme */
export interface PrimaryShade {
  light: number;
  dark: number;
}

/** Theme-level defaults for one component */
export interface ComponentThemeOverride {
  defaultProps?: PropBag;
  /** Sub-bags per inner target */
  styles?: Record<string, PropBag>;
}

export interface Theme extends TokenTables {
  colorScheme: ColorScheme;
  primaryColor: string;
  primaryShade: PrimaryShade;
  /** Global multiplier for every physical length */
  scale: number;
  /** Key into `fontFamilies` used by the application style sheet */
  fontFamily: string;
  components: Readonly<Record<string, ComponentThemeOverride>>;
}

/**
 * Installed theme plus its validated token store.
 * Readers receive this handle; only the provider creates new ones.
 */
export interface ThemeHandle {
  readonly theme: Theme;
  readonly tokens: TokenStore;
  readonly version: number;
}

// =============================================================================
// Declarations and Artifacts
// =============================================================================

/** Canonical, fully resolved declaration */
export interface StyleDeclaration {
  /** `'root'` or a declared inner target */
  target: string;
  /** Toolkit property name */
  property: string;
  /** Resolved value, never a token reference */
  value: string;
  state: PseudoState;
  /** Breakpoint the value was resolved under */
  breakpoint: string;
}

/** Selectors for a widget and its named inner elements */
export interface SelectorScope {
  /** Root selector, e.g. `QPushButton#save` */
  root: string;
  /** Inner target name to descendant selector, e.g. `{ label: 'QLabel#label' }` */
  targets?: Readonly<Record<string, string>>;
}

/** Generated style-sheet text for one widget */
export interface StyleSheetArtifact {
  text: string;
  /** Content hash of `text` */
  hash: string;
  /** Selectors covered, sorted */
  selectors: readonly string[];
}

// =============================================================================
// Diagnostics
// =============================================================================

/** Recoverable problem surfaced while styling one widget */
export interface StyleDiagnostic {
  code: StyleEngineErrorCode;
  message: string;
  /** Prop path, e.g. `':hover'.bg` or `styles.label.c` */
  path?: string;
  /** Widget being styled, when known */
  widgetId?: string;
}

/** Unsubscribe function for event listeners */
export type Unsubscribe = () => void;

// =============================================================================
// Host Toolkit Seams
// =============================================================================

/** Top-level window of the host toolkit */
export interface HostWindow {
  readonly id: string;
  /** Current width in physical pixels */
  width(): number;
  /** Resize/geometry-change notifications */
  onResize(listener: (width: number) => void): Unsubscribe;
  /** Window destruction, when the host reports it */
  onClose?(listener: () => void): Unsubscribe;
}

/** Widget that accepts generated style-sheet text */
export interface StyleTarget {
  readonly id: string;
  readonly window: HostWindow;
  /** Root selector */
  readonly selector: string;
  /** Declared inner targets ("label", "input", ...) */
  readonly targets?: Readonly<Record<string, string>>;
  /** Component name used for defaults lookup */
  readonly component?: string;
  setStyleSheet(text: string): void;
}

/** Application-wide style sheet sink */
export interface HostApplication {
  setStyleSheet(text: string): void;
}

/** Console subset used for diagnostics */
export type StyleEngineLogger = Pick<Console, 'debug' | 'warn' | 'error'>;
