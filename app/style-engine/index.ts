/**
 * Style Engine
 *
 * Token store, value resolution, prop normalization, responsive
 * classification, style-sheet generation and the theme provider.
 */

export * from './core/types';
export * from './core/errors';
export * from './core/tokens';
export * from './core/theme';
export * from './core/value-resolver';
export * from './core/component-defaults';
export * from './core/prop-normalizer';
export * from './core/responsive-context';
export * from './core/stylesheet-generator';
export * from './core/artifact-cache';
export * from './core/theme-stylesheet';
export * from './core/theme-variables';
export * from './core/theme-provider';
export { Disposer, type DisposeFn } from './utils/disposables';
export { stableStringify, hashString, fingerprint } from './utils/fingerprint';
export * from './constants';
