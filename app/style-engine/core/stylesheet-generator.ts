/**
 * Stylesheet Generator
 *
 * Serializes resolved declarations into toolkit style-sheet text.
 *
 * Output is byte-stable for a given input:
 * - one block per selector, blocks ordered by selector (code-unit order)
 * - properties ordered within a block
 * - blocks separated by one blank line
 *
 * ```
 * QPushButton#save {
 *   background-color: #228be6;
 *   color: #ffffff;
 * }
 *
 * QPushButton#save:hover {
 *   background-color: #1c7ed6;
 * }
 * ```
 */

import { ROOT_TARGET } from 'facet-shared';
import type { PseudoState } from 'facet-shared';

import { PSEUDO_STATE_SELECTORS, STYLE_SHEET_INDENT } from '../constants';
import { hashString } from '../utils/fingerprint';
import { SerializationError } from './errors';
import type { SelectorScope, StyleDeclaration, StyleSheetArtifact } from './types';

// =============================================================================
// Constants
// =============================================================================

const PROPERTY_PATTERN = /^-{0,2}[a-zA-Z_][a-zA-Z0-9_-]*$/;
const FORBIDDEN_VALUE_CHARS = /[{};\r\n]/;

// =============================================================================
// Validation
// =============================================================================

function compareCodeUnits(a: string, b: string): number {
  if (a < b) return -1;
  if (a > b) return 1;
  return 0;
}

function hasBalancedDelimiters(value: string): boolean {
  let depth = 0;
  let quote: string | null = null;
  for (const ch of value) {
    if (quote) {
      if (ch === quote) quote = null;
      continue;
    }
    if (ch === '"' || ch === "'") {
      quote = ch;
    } else if (ch === '(') {
      depth++;
    } else if (ch === ')') {
      depth--;
      if (depth < 0) return false;
    }
  }
  return depth === 0 && quote === null;
}

/**
 * Ensure a property/value pair can be written without breaking out of
 * its declaration.
 *
 * @throws SerializationError
 */
export function assertSerializable(property: string, value: string, path?: string): void {
  if (!PROPERTY_PATTERN.test(property)) {
    throw new SerializationError(`Invalid property name "${property}"`, { path, value: property });
  }
  if (!value.trim()) {
    throw new SerializationError(`Empty value for "${property}"`, { path, value });
  }
  if (FORBIDDEN_VALUE_CHARS.test(value) || value.includes('/*') || value.includes('*/')) {
    throw new SerializationError(`Value for "${property}" contains style-sheet syntax`, { path, value });
  }
  if (!hasBalancedDelimiters(value)) {
    throw new SerializationError(`Value for "${property}" has unbalanced quotes or parentheses`, {
      path,
      value,
    });
  }
}

/**
 * Normalize a property name to kebab-case.
 * Names already containing a dash (including `qproperty-*` and custom
 * properties) are kept as written.
 */
export function normalizePropertyName(property: string): string {
  const p = property.trim();
  if (!p) return '';
  if (p.includes('-')) return p;
  return p.replace(/[A-Z]/g, (m) => `-${m.toLowerCase()}`);
}

// =============================================================================
// Selectors
// =============================================================================

/**
 * Selector for a target in a given state.
 * Inner targets become descendant selectors of the root.
 */
export function buildSelector(scope: SelectorScope, target: string, state: PseudoState): string {
  let selector = scope.root;
  if (target !== ROOT_TARGET) {
    const inner = scope.targets?.[target];
    if (inner === undefined) {
      throw new SerializationError(`No selector declared for inner target "${target}"`, { path: target });
    }
    selector = `${scope.root} ${inner}`;
  }
  return `${selector}${PSEUDO_STATE_SELECTORS[state]}`;
}

// =============================================================================
// Public API
// =============================================================================

interface SerializedBlocks {
  text: string;
  selectors: string[];
}

function serializeBlocks(declarations: readonly StyleDeclaration[], scope: SelectorScope): SerializedBlocks {
  const blocks = new Map<string, Map<string, string>>();

  for (const decl of declarations) {
    assertSerializable(decl.property, decl.value, decl.property);
    const selector = buildSelector(scope, decl.target, decl.state);
    let block = blocks.get(selector);
    if (!block) {
      block = new Map();
      blocks.set(selector, block);
    }
    block.set(decl.property, decl.value);
  }

  const selectors = Array.from(blocks.keys()).sort(compareCodeUnits);
  const text = selectors
    .map((selector) => {
      const props = blocks.get(selector) ?? new Map<string, string>();
      const lines = Array.from(props.keys())
        .sort(compareCodeUnits)
        .map((property) => `${STYLE_SHEET_INDENT}${property}: ${props.get(property) ?? ''};`);
      return `${selector} {\n${lines.join('\n')}\n}`;
    })
    .join('\n\n');

  return { text, selectors };
}

/**
 * Serialize declarations into style-sheet text.
 * Later duplicates of the same selector/property replace earlier ones.
 *
 * @throws SerializationError when a value cannot be emitted safely
 */
export function serialize(declarations: readonly StyleDeclaration[], scope: SelectorScope): string {
  return serializeBlocks(declarations, scope).text;
}

export function createArtifact(
  declarations: readonly StyleDeclaration[],
  scope: SelectorScope,
): StyleSheetArtifact {
  const { text, selectors } = serializeBlocks(declarations, scope);
  return { text, hash: hashString(text), selectors };
}
