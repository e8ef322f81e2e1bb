/**
 * formats.ts - .huf container layout and header validation
 *
 * The container has no magic number or version field. All integers are
 * big-endian.
 *
 *   offset 0     1024 bytes  256 x uint32 counts, byte value 0..255
 *   offset 1024  1 byte      pad length (0..7)
 *   offset 1025  remainder   packed bit payload
 */

import { InvalidContainerError } from './errors.js';
import { ALPHABET_SIZE, MAX_COUNT, type FrequencyTable } from './frequency.js';

/** Conventional file extension for compressed files */
export const HUF_EXTENSION = '.huf';

/** Bytes per stored count */
export const COUNT_SIZE = 4;

/** Size of the stored frequency table */
export const FREQUENCY_TABLE_SIZE = ALPHABET_SIZE * COUNT_SIZE;

/** Offset of the pad length byte */
export const PAD_LENGTH_OFFSET = FREQUENCY_TABLE_SIZE;

/** Header size in bytes (frequency table + pad length) */
export const HEADER_SIZE = FREQUENCY_TABLE_SIZE + 1;

/** Largest valid pad length */
export const MAX_PAD_LENGTH = 7;

export interface ContainerHeader {
  frequencies: FrequencyTable;
  padLength: number;
}

/**
 * Write the header into the first HEADER_SIZE bytes of `buffer`.
 */
export function writeHeader(buffer: Uint8Array, header: ContainerHeader): void {
  const { frequencies, padLength } = header;
  if (frequencies.length !== ALPHABET_SIZE) {
    throw new RangeError(`Frequency table must have ${ALPHABET_SIZE} entries, got ${frequencies.length}`);
  }
  if (!Number.isInteger(padLength) || padLength < 0 || padLength > MAX_PAD_LENGTH) {
    throw new RangeError(`Pad length ${padLength} out of range [0, ${MAX_PAD_LENGTH}]`);
  }

  const view = new DataView(buffer.buffer, buffer.byteOffset, buffer.byteLength);
  for (let symbol = 0; symbol < ALPHABET_SIZE; symbol++) {
    const count = frequencies[symbol];
    if (count > MAX_COUNT) {
      throw new RangeError(`Count ${count} for byte ${symbol} does not fit in 32 bits`);
    }
    view.setUint32(symbol * COUNT_SIZE, count, false);
  }
  view.setUint8(PAD_LENGTH_OFFSET, padLength);
}

/**
 * Read and validate the header of a container.
 *
 * Only the layout is checked here; whether the counts describe a usable
 * tree is left to the decoder.
 */
export function readHeader(buffer: Uint8Array): ContainerHeader {
  if (buffer.length < HEADER_SIZE) {
    throw new InvalidContainerError(
      `expected at least ${HEADER_SIZE} bytes, got ${buffer.length}`,
    );
  }

  const view = new DataView(buffer.buffer, buffer.byteOffset, buffer.byteLength);
  const frequencies = new Uint32Array(ALPHABET_SIZE);
  for (let symbol = 0; symbol < ALPHABET_SIZE; symbol++) {
    frequencies[symbol] = view.getUint32(symbol * COUNT_SIZE, false);
  }

  const padLength = view.getUint8(PAD_LENGTH_OFFSET);
  if (padLength > MAX_PAD_LENGTH) {
    throw new InvalidContainerError(`pad length ${padLength} exceeds ${MAX_PAD_LENGTH}`);
  }

  const payloadBits = (buffer.length - HEADER_SIZE) * 8;
  if (padLength > payloadBits) {
    throw new InvalidContainerError(
      `pad length ${padLength} exceeds the ${payloadBits}-bit payload`,
    );
  }

  return { frequencies, padLength };
}

/**
 * Payload bytes following the header (a view, not a copy).
 */
export function payloadOf(buffer: Uint8Array): Uint8Array {
  return buffer.subarray(HEADER_SIZE);
}
