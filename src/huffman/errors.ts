/**
 * errors.ts - Error taxonomy for huffpack
 *
 * Every failure the library raises is a HuffmanError with a stable `code`,
 * so callers can branch on the code instead of matching messages.
 */

export type HuffmanErrorCode =
  | 'EMPTY_INPUT'
  | 'EMPTY_ALPHABET'
  | 'INVALID_CONTAINER'
  | 'TRUNCATED_STREAM'
  | 'IO_FAILURE'
  | 'INVALID_ARCHIVE'
  | 'ENTRY_NOT_FOUND'
  | 'NOT_TEXT';

export class HuffmanError extends Error {
  readonly code: HuffmanErrorCode;

  constructor(message: string, code: HuffmanErrorCode, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'HuffmanError';
    this.code = code;
  }
}

/** Compression was asked to encode zero bytes. */
export class EmptyInputError extends HuffmanError {
  constructor(message = 'Cannot compress an empty input') {
    super(message, 'EMPTY_INPUT');
    this.name = 'EmptyInputError';
  }
}

/** Every count in the frequency table is zero, so no tree exists. */
export class EmptyAlphabetError extends HuffmanError {
  constructor() {
    super('Frequency table has no non-zero counts', 'EMPTY_ALPHABET');
    this.name = 'EmptyAlphabetError';
  }
}

export class InvalidContainerError extends HuffmanError {
  constructor(message: string, options?: { cause?: unknown }) {
    super(`Invalid Huffman data: ${message}`, 'INVALID_CONTAINER', options);
    this.name = 'InvalidContainerError';
  }
}

/** The bit stream ended part-way down the tree. */
export class TruncatedStreamError extends HuffmanError {
  readonly decodedLength: number;

  constructor(decodedLength: number) {
    super(`Bit stream ended mid-symbol after ${decodedLength} decoded bytes`, 'TRUNCATED_STREAM');
    this.name = 'TruncatedStreamError';
    this.decodedLength = decodedLength;
  }
}

export class IoFailureError extends HuffmanError {
  readonly path: string;

  constructor(message: string, path: string, options?: { cause?: unknown }) {
    super(message, 'IO_FAILURE', options);
    this.name = 'IoFailureError';
    this.path = path;
  }
}

/** A path failed the readability/writability check before any work started. */
export class PathValidationError extends IoFailureError {
  constructor(message: string, path: string) {
    super(message, path);
    this.name = 'PathValidationError';
  }
}

export class InvalidArchiveError extends HuffmanError {
  readonly path: string;

  constructor(path: string, options?: { cause?: unknown }) {
    super(`'${path}' is not a readable ZIP archive`, 'INVALID_ARCHIVE', options);
    this.name = 'InvalidArchiveError';
    this.path = path;
  }
}

export class ArchiveEntryNotFoundError extends HuffmanError {
  readonly suffix: string;

  constructor(suffix: string) {
    super(`No ${suffix} file found in ZIP archive`, 'ENTRY_NOT_FOUND');
    this.name = 'ArchiveEntryNotFoundError';
    this.suffix = suffix;
  }
}

export class NotTextError extends HuffmanError {
  constructor(options?: { cause?: unknown }) {
    super('Decompressed data is not valid UTF-8 text', 'NOT_TEXT', options);
    this.name = 'NotTextError';
  }
}

export function isHuffmanError(error: unknown): error is HuffmanError {
  return error instanceof HuffmanError;
}
