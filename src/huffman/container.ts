/**
 * container.ts - End-to-end .huf encoding and decoding
 *
 * Compression: frequencies -> tree -> codes -> packed bits -> container.
 * Decompression rebuilds the same tree from the stored frequencies, so the
 * tree itself is never written.
 */

import { generateCodes } from './codes.js';
import { EmptyAlphabetError, EmptyInputError, InvalidContainerError } from './errors.js';
import { HEADER_SIZE, payloadOf, readHeader, writeHeader } from './formats.js';
import { buildFrequencyTable, distinctSymbols, totalWeight } from './frequency.js';
import { packSymbols, unpackSymbols, type UnpackOptions } from './packing.js';
import { buildHuffmanTree, type HuffmanNode } from './tree.js';

export type DecompressOptions = UnpackOptions;

export interface ContainerInfo {
  /** Length of the original input (sum of stored counts) */
  originalSize: number;
  /** Byte values with a non-zero count */
  distinctSymbols: number;
  padLength: number;
  payloadSize: number;
  containerSize: number;
  /** Usable payload bits (payload bits minus padding) */
  encodedBits: number;
}

/**
 * Compress bytes into a self-describing .huf container.
 */
export function compress(data: Uint8Array): Uint8Array {
  if (data.length === 0) {
    throw new EmptyInputError();
  }

  const frequencies = buildFrequencyTable(data);
  const root = buildHuffmanTree(frequencies);
  const codes = generateCodes(root);
  const { payload, padLength } = packSymbols(data, codes);

  const out = new Uint8Array(HEADER_SIZE + payload.length);
  writeHeader(out, { frequencies, padLength });
  out.set(payload, HEADER_SIZE);
  return out;
}

/**
 * Decompress a .huf container back to the original bytes.
 */
export function decompress(container: Uint8Array, options: DecompressOptions = {}): Uint8Array {
  const { frequencies, padLength } = readHeader(container);

  let root: HuffmanNode;
  try {
    root = buildHuffmanTree(frequencies);
  } catch (error) {
    if (error instanceof EmptyAlphabetError) {
      throw new InvalidContainerError('frequency table is all zeros', { cause: error });
    }
    throw error;
  }

  const decoded = unpackSymbols(payloadOf(container), padLength, root, options);

  const expected = totalWeight(frequencies);
  if ((options.strict ?? true) && decoded.length !== expected) {
    throw new InvalidContainerError(
      `decoded ${decoded.length} bytes but the frequency table records ${expected}`,
    );
  }

  return decoded;
}

/**
 * Summarize a container's header without decoding the payload.
 */
export function inspect(container: Uint8Array): ContainerInfo {
  const { frequencies, padLength } = readHeader(container);
  const payloadSize = container.length - HEADER_SIZE;
  return {
    originalSize: totalWeight(frequencies),
    distinctSymbols: distinctSymbols(frequencies).length,
    padLength,
    payloadSize,
    containerSize: container.length,
    encodedBits: payloadSize * 8 - padLength,
  };
}
