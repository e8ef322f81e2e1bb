/**
 * huffman/index.ts - Huffman coding engine and .huf container
 *
 * Everything here is synchronous and works on in-memory bytes, so it runs
 * in Node.js and browsers alike.
 *
 * Usage:
 *   import { compress, decompress } from './huffman/index.js';
 *   const container = compress(data);
 *   const restored = decompress(container);
 */

export { ALPHABET_SIZE, MAX_COUNT, buildFrequencyTable, totalWeight, distinctSymbols } from './frequency.js';
export type { FrequencyTable } from './frequency.js';

export { INTERNAL_TIE_KEY, tieKey, compareNodes, buildHuffmanTree, treeStats } from './tree.js';
export type { HuffmanNode, HuffmanLeaf, HuffmanInternal } from './tree.js';

export { generateCodes, isPrefixFree, encodedBitLength } from './codes.js';
export type { CodeTable } from './codes.js';

export { packSymbols, unpackSymbols } from './packing.js';
export type { PackedBits, UnpackOptions } from './packing.js';

export {
  HUF_EXTENSION,
  COUNT_SIZE,
  FREQUENCY_TABLE_SIZE,
  PAD_LENGTH_OFFSET,
  HEADER_SIZE,
  MAX_PAD_LENGTH,
  writeHeader,
  readHeader,
  payloadOf,
} from './formats.js';
export type { ContainerHeader } from './formats.js';

export { compress, decompress, inspect } from './container.js';
export type { DecompressOptions, ContainerInfo } from './container.js';

export * from './errors.js';
