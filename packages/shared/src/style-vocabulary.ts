// style-vocabulary.ts: names shared by the style engine and the widget catalog
// Centralize scheme/state/breakpoint strings here to avoid magic literals.

export const COLOR_SCHEMES = ['light', 'dark'] as const;
export type ColorScheme = (typeof COLOR_SCHEMES)[number];

/** Interaction-dependent style variants, in emission order */
export const PSEUDO_STATES = ['base', 'hover', 'focus', 'active', 'disabled'] as const;
export type PseudoState = (typeof PSEUDO_STATES)[number];

/** Pseudo-states a prop bag may nest a sub-bag under (`':hover': { ... }`) */
export type VariantPseudoState = Exclude<PseudoState, 'base'>;
export type PseudoStateKey = `:${VariantPseudoState}`;

export const PSEUDO_STATE_KEYS: Readonly<Record<PseudoStateKey, VariantPseudoState>> = {
  ':hover': 'hover',
  ':focus': 'focus',
  ':active': 'active',
  ':disabled': 'disabled',
};

/** Name of the implicit smallest breakpoint */
export const BASE_BREAKPOINT = 'base' as const;

/** Name of the widget's own selector target */
export const ROOT_TARGET = 'root' as const;

export function isPseudoStateKey(key: string): key is PseudoStateKey {
  return Object.prototype.hasOwnProperty.call(PSEUDO_STATE_KEYS, key);
}
