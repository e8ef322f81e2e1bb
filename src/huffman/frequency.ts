/**
 * frequency.ts - Byte frequency analysis
 *
 * A frequency table always has 256 slots, one per byte value, so it maps
 * directly onto the fixed-size table stored in a .huf container.
 */

/** Number of distinct byte values */
export const ALPHABET_SIZE = 256;

/** Largest count a container slot can hold (uint32) */
export const MAX_COUNT = 0xffffffff;

/** Occurrence count per byte value, indexed 0..255 */
export type FrequencyTable = Uint32Array;

/**
 * Count occurrences of each byte value in a single pass.
 */
export function buildFrequencyTable(data: Uint8Array): FrequencyTable {
  if (data.length > MAX_COUNT) {
    throw new RangeError(`Input of ${data.length} bytes exceeds the ${MAX_COUNT} count limit`);
  }

  const table = new Uint32Array(ALPHABET_SIZE);
  for (let i = 0; i < data.length; i++) {
    table[data[i]]++;
  }
  return table;
}

/**
 * Sum of all counts (equals the length of the analyzed input).
 */
export function totalWeight(table: FrequencyTable): number {
  let total = 0;
  for (let i = 0; i < table.length; i++) {
    total += table[i];
  }
  return total;
}

/**
 * Byte values with a non-zero count, ascending.
 */
export function distinctSymbols(table: FrequencyTable): number[] {
  const symbols: number[] = [];
  for (let symbol = 0; symbol < table.length; symbol++) {
    if (table[symbol] > 0) symbols.push(symbol);
  }
  return symbols;
}
