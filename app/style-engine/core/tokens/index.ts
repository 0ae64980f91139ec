/**
 * Design Tokens Module
 */

export { parseColor, isColor, toHex, type RgbaColor } from './color';
export {
  contrastRatio,
  relativeLuminance,
  auditColorContrast,
  type ContrastIssue,
  type ContrastAuditOptions,
} from './contrast';
export {
  createTokenStore,
  readonlyTokenStore,
  toBreakpointThresholds,
  type MutableTokenStore,
  type TokenStore,
  type TokenStoreOptions,
} from './token-store';
export * from './default-tokens';
