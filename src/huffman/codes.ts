/**
 * codes.ts - Code table generation from a Huffman tree
 */

import type { FrequencyTable } from './frequency.js';
import type { HuffmanNode } from './tree.js';

/** Byte value -> code as a string of '0' and '1' characters */
export type CodeTable = ReadonlyMap<number, string>;

/**
 * Walk the tree depth-first: left appends '0', right appends '1'.
 *
 * A root that is itself a leaf has an empty path; it is given the code
 * "0" so every occurrence still takes one bit.
 */
export function generateCodes(root: HuffmanNode): CodeTable {
  const codes = new Map<number, string>();

  if (root.kind === 'leaf') {
    codes.set(root.symbol, '0');
    return codes;
  }

  const walk = (node: HuffmanNode, path: string): void => {
    if (node.kind === 'leaf') {
      codes.set(node.symbol, path);
      return;
    }
    walk(node.left, path + '0');
    walk(node.right, path + '1');
  };
  walk(root, '');

  return codes;
}

/**
 * Check that no code is a prefix of another.
 */
export function isPrefixFree(codes: CodeTable): boolean {
  // After sorting, a prefix sorts immediately before some code it prefixes
  const sorted = [...codes.values()].sort();
  for (let i = 1; i < sorted.length; i++) {
    if (sorted[i].startsWith(sorted[i - 1])) return false;
  }
  return true;
}

/**
 * Number of payload bits the table produces for input with these counts.
 */
export function encodedBitLength(frequencies: FrequencyTable, codes: CodeTable): number {
  let total = 0;
  for (const [symbol, code] of codes) {
    total += frequencies[symbol] * code.length;
  }
  return total;
}
