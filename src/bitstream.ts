/**
 * bitstream.ts - MSB-first bit writer and reader
 *
 * Bits fill each byte from the most significant bit down. The writer pads
 * the final byte with zero bits and reports how many it added; the reader
 * can be bounded to a bit length so that padding is never read back.
 */

/**
 * Bit writer for building bit-packed streams.
 */
export class BitWriter {
  private buffer: number[] = [];
  private currentByte: number = 0;
  private bitPosition: number = 0;

  /**
   * Write a single bit (0 or 1).
   */
  writeBit(bit: number): void {
    this.currentByte = (this.currentByte << 1) | (bit & 1);
    this.bitPosition++;

    if (this.bitPosition === 8) {
      this.buffer.push(this.currentByte);
      this.currentByte = 0;
      this.bitPosition = 0;
    }
  }

  /**
   * Write a code given as a string of '0' and '1' characters.
   */
  writeBitString(bits: string): void {
    for (let i = 0; i < bits.length; i++) {
      const c = bits.charCodeAt(i);
      if (c === 0x30) {
        this.writeBit(0);
      } else if (c === 0x31) {
        this.writeBit(1);
      } else {
        throw new Error(`Invalid bit character '${bits[i]}' in "${bits}"`);
      }
    }
  }

  /**
   * Get current bit count.
   */
  get bitCount(): number {
    return this.buffer.length * 8 + this.bitPosition;
  }

  /**
   * Zero bits toBytes() appends to complete the final byte (0..7).
   */
  get padLength(): number {
    return (8 - (this.bitCount % 8)) % 8;
  }

  /**
   * Finalize the stream and return bytes.
   * Pads the final byte with zeros if needed.
   */
  toBytes(): Uint8Array {
    const out = new Uint8Array(this.buffer.length + (this.bitPosition > 0 ? 1 : 0));
    out.set(this.buffer);
    if (this.bitPosition > 0) {
      out[this.buffer.length] = (this.currentByte << (8 - this.bitPosition)) & 0xff;
    }
    return out;
  }
}

/**
 * Bit reader for decoding bit-packed streams.
 */
export class BitReader {
  private data: Uint8Array;
  private position: number = 0;
  private readonly bitLength: number;

  /**
   * @param bitLength Number of readable bits; defaults to every bit in `data`
   */
  constructor(data: Uint8Array, bitLength: number = data.length * 8) {
    if (bitLength < 0 || bitLength > data.length * 8) {
      throw new RangeError(`Bit length ${bitLength} out of range [0, ${data.length * 8}]`);
    }
    this.data = data;
    this.bitLength = bitLength;
  }

  /**
   * Read a single bit.
   */
  readBit(): number {
    if (this.position >= this.bitLength) {
      throw new Error('BitReader: end of data');
    }

    const byte = this.data[this.position >>> 3];
    const bit = (byte >> (7 - (this.position & 7))) & 1;
    this.position++;
    return bit;
  }

  /** Bits left before the bound */
  get remaining(): number {
    return this.bitLength - this.position;
  }

  /** Bits consumed so far */
  get bitPosition(): number {
    return this.position;
  }
}
