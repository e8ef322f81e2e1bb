/**
 * packing.ts - Pack input bytes into Huffman-coded bits and back
 */

import { BitReader, BitWriter } from '../bitstream.js';
import type { CodeTable } from './codes.js';
import { InvalidContainerError, TruncatedStreamError } from './errors.js';
import type { HuffmanNode } from './tree.js';

export interface PackedBits {
  payload: Uint8Array;
  /** Zero bits appended to the last payload byte (0..7) */
  padLength: number;
}

export interface UnpackOptions {
  /**
   * Reject a stream whose usable bits end part-way down the tree.
   * When false the partial path is dropped silently. Default: true.
   */
  strict?: boolean;
}

/**
 * Concatenate the code of every input byte, in input order, then pad to
 * a whole number of bytes.
 */
export function packSymbols(data: Uint8Array, codes: CodeTable): PackedBits {
  const writer = new BitWriter();
  for (let i = 0; i < data.length; i++) {
    const code = codes.get(data[i]);
    if (code === undefined) {
      throw new Error(`Symbol not in Huffman table: ${data[i]}`);
    }
    writer.writeBitString(code);
  }

  const padLength = writer.padLength;
  return { payload: writer.toBytes(), padLength };
}

/**
 * Decode a payload by walking the tree from the root for each symbol.
 * The last `padLength` bits are ignored.
 */
export function unpackSymbols(
  payload: Uint8Array,
  padLength: number,
  root: HuffmanNode,
  options: UnpackOptions = {},
): Uint8Array {
  const strict = options.strict ?? true;
  const reader = new BitReader(payload, payload.length * 8 - padLength);
  const out: number[] = [];

  // Single-symbol alphabet: each occurrence is the one-bit code "0"
  if (root.kind === 'leaf') {
    while (reader.remaining > 0) {
      if (reader.readBit() !== 0) {
        throw new InvalidContainerError(
          `unexpected 1 bit at position ${reader.bitPosition - 1} in single-symbol stream`,
        );
      }
      out.push(root.symbol);
    }
    return Uint8Array.from(out);
  }

  let node: HuffmanNode = root;
  while (reader.remaining > 0) {
    if (node.kind === 'internal') {
      node = reader.readBit() === 0 ? node.left : node.right;
    }
    if (node.kind === 'leaf') {
      out.push(node.symbol);
      node = root;
    }
  }

  if (node !== root && strict) {
    throw new TruncatedStreamError(out.length);
  }

  return Uint8Array.from(out);
}
