/**
 * Component Defaults Registry
 *
 * Built-in prop bags per component, split into a base bag plus variant
 * and size bags. These sit at the bottom of the precedence chain: theme
 * overrides and instance props both win over them.
 */

import type { PropBag } from './types';

// =============================================================================
// Types
// =============================================================================

export interface ComponentDefaults {
  /** Always applied */
  base?: PropBag;
  /** Selected by the `variant` prop */
  variants?: Readonly<Record<string, PropBag>>;
  /** Selected by the `size` prop */
  sizes?: Readonly<Record<string, PropBag>>;
  /** Variant used when none is given */
  defaultVariant?: string;
  /** Size used when none is given */
  defaultSize?: string;
}

export interface ComponentDefaultsRegistry {
  register(name: string, defaults: ComponentDefaults): void;
  get(name: string): ComponentDefaults | undefined;
  names(): string[];
}

// =============================================================================
// Built-in Components
// =============================================================================

const CONTROL_SIZES: Readonly<Record<string, PropBag>> = {
  xs: { py: 'xxs', px: 'xs', fz: 'xs' },
  sm: { py: 'xxs', px: 'sm', fz: 'sm' },
  md: { py: 'xs', px: 'md', fz: 'sm' },
  lg: { py: 'sm', px: 'lg', fz: 'md' },
  xl: { py: 'sm', px: 'xl', fz: 'lg' },
};

export const BUILTIN_COMPONENT_DEFAULTS: Readonly<Record<string, ComponentDefaults>> = {
  button: {
    base: {
      bdrs: 'sm',
      fw: 'semibold',
      ':disabled': { bg: 'disabled', c: 'disabled-color' },
    },
    variants: {
      filled: { bg: 'primary', c: '#ffffff', bd: 'none', ':hover': { bg: 'primary.7' } },
      light: { bg: 'primary.0', c: 'primary.9', bd: 'none', ':hover': { bg: 'primary.1' } },
      outline: { bg: 'transparent', c: 'primary', bd: '1px solid primary', ':hover': { bg: 'primary.0' } },
      subtle: { bg: 'transparent', c: 'primary', bd: 'none', ':hover': { bg: 'primary.0' } },
      default: { bg: 'default', c: 'default-color', bd: '1px solid default-border', ':hover': { bg: 'default-hover' } },
    },
    sizes: CONTROL_SIZES,
    defaultVariant: 'filled',
    defaultSize: 'md',
  },
  input: {
    base: {
      bdrs: 'sm',
      c: 'default-color',
      ':focus': { bdc: 'primary' },
      ':disabled': { bg: 'disabled', c: 'disabled-color', bdc: 'disabled-border' },
    },
    variants: {
      default: { bg: 'default', bd: '1px solid default-border' },
      filled: { bg: 'default-hover', bd: '1px solid transparent' },
      unstyled: { bg: 'transparent', bd: 'none' },
    },
    sizes: CONTROL_SIZES,
    defaultVariant: 'default',
    defaultSize: 'md',
  },
  paper: {
    base: { bg: 'body', c: 'text', bdrs: 'md', p: 'md' },
    variants: {
      plain: {},
      bordered: { bd: '1px solid default-border' },
      raised: { bxsh: 'md' },
    },
    defaultVariant: 'plain',
  },
};

// =============================================================================
// Implementation
// =============================================================================

export function createComponentDefaultsRegistry(
  initial: Readonly<Record<string, ComponentDefaults>> = BUILTIN_COMPONENT_DEFAULTS,
): ComponentDefaultsRegistry {
  const entries = new Map<string, ComponentDefaults>(Object.entries(initial));

  return {
    register(name, defaults) {
      entries.set(name, defaults);
    },
    get: (name) => entries.get(name),
    names: () => Array.from(entries.keys()).sort(),
  };
}
