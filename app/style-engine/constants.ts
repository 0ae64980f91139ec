/**
 * Style Engine Constants
 *
 * Centralized configuration values for the style engine.
 * All magic strings/numbers should be defined here.
 */

/** Log prefix for console messages */
export const STYLE_ENGINE_LOG_PREFIX = '[StyleEngine]' as const;

// =============================================================================
// Resolution
// =============================================================================

/** Pixels per `rem` before the theme scale is applied */
export const REM_BASE_PX = 16;

/** Number of shades every color family carries */
export const COLOR_SHADE_COUNT = 10;

// =============================================================================
// Responsive
// =============================================================================

/** Quiet period before a resize is classified into a breakpoint */
export const DEFAULT_RESIZE_DEBOUNCE_MS = 100;

// =============================================================================
// Cache
// =============================================================================

/** Length of the hex digests used for cache keys and artifact hashes */
export const HASH_LENGTH = 16;

// =============================================================================
// Serialization
// =============================================================================

/** Toolkit pseudo-state suffixes */
export const PSEUDO_STATE_SELECTORS = {
  base: '',
  hover: ':hover',
  focus: ':focus',
  active: ':pressed',
  disabled: ':disabled',
} as const;

/** Indentation used inside generated blocks */
export const STYLE_SHEET_INDENT = '  ';
