/**
 * Contrast audit for color families.
 *
 * Reports shades that fall below a minimum contrast ratio against a
 * background. Advisory only: nothing here throws on a low ratio.
 */

import { z } from 'zod';
import { formatIssues } from 'facet-shared';

import { COLOR_SHADE_COUNT } from '../../constants';
import { ValidationError } from '../errors';
import { isColor, parseColor, type RgbaColor } from './color';
import type { TokenStore } from './token-store';

export interface ContrastIssue {
  family: string;
  index: number;
  shade: string;
  ratio: number;
}

export interface ContrastAuditOptions {
  /** @default '#ffffff' */
  background?: string;
  /** @default 4.5 */
  minRatio?: number;
  /** Shade indices checked per family. @default [6, 7, 8, 9] */
  shades?: readonly number[];
}

const DEFAULT_AUDIT_SHADES = [6, 7, 8, 9] as const;

export const CONTRAST_AUDIT_OPTIONS_SCHEMA = z
  .object({
    background: z.string().refine(isColor, 'must be a color').optional(),
    minRatio: z.number().min(1).max(21).optional(),
    shades: z
      .array(
        z
          .number()
          .int()
          .min(0)
          .max(COLOR_SHADE_COUNT - 1),
      )
      .optional(),
  })
  .strict();

/**
 * Validate audit options before any theme is audited.
 * @throws ValidationError listing every schema issue
 */
export function parseContrastAuditOptions(input: unknown): ContrastAuditOptions {
  const result = CONTRAST_AUDIT_OPTIONS_SCHEMA.safeParse(input);
  if (!result.success) {
    const issues = formatIssues(result.error);
    throw new ValidationError(`Invalid contrast audit options: ${issues.join('; ')}`, { issues });
  }
  return result.data;
}

function channel(value: number): number {
  const c = value / 255;
  return c <= 0.03928 ? c / 12.92 : ((c + 0.055) / 1.055) ** 2.4;
}

export function relativeLuminance(color: RgbaColor): number {
  return 0.2126 * channel(color.r) + 0.7152 * channel(color.g) + 0.0722 * channel(color.b);
}

function parseOrThrow(raw: string): RgbaColor {
  const parsed = parseColor(raw);
  if (!parsed) throw new ValidationError(`"${raw}" is not a color`, { value: raw });
  return parsed;
}

/** WCAG contrast ratio, 1 to 21, rounded to two decimals */
export function contrastRatio(foreground: string, background: string): number {
  const a = relativeLuminance(parseOrThrow(foreground));
  const b = relativeLuminance(parseOrThrow(background));
  const ratio = (Math.max(a, b) + 0.05) / (Math.min(a, b) + 0.05);
  return Math.round(ratio * 100) / 100;
}

export function auditColorContrast(tokens: TokenStore, options: ContrastAuditOptions = {}): ContrastIssue[] {
  const background = options.background ?? '#ffffff';
  const minRatio = options.minRatio ?? 4.5;
  const indices = options.shades ?? DEFAULT_AUDIT_SHADES;

  const issues: ContrastIssue[] = [];
  for (const family of tokens.families()) {
    for (const index of indices) {
      const shade = tokens.get(family, index);
      const ratio = contrastRatio(shade, background);
      if (ratio < minRatio) issues.push({ family, index, shade, ratio });
    }
  }
  return issues;
}
