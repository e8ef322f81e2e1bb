/**
 * files.ts - File-level compress/decompress
 *
 * Wraps the in-memory codec with path checks and atomic writes: output is
 * written to a temporary sibling and renamed into place, so a failed
 * operation never leaves a partial file at the destination.
 */

import * as fs from 'fs/promises';
import { constants as fsConstants, type Stats } from 'fs';
import * as path from 'path';
import { compress, decompress, type DecompressOptions } from './huffman/container.js';
import { EmptyInputError, IoFailureError, PathValidationError } from './huffman/errors.js';

export type PathMode = 'read' | 'write';

export type ContentKind = 'text' | 'binary';

export interface CompressResult {
  inputSize: number;
  outputSize: number;
  /** outputSize / inputSize */
  ratio: number;
}

export interface DecompressResult {
  inputSize: number;
  outputSize: number;
  kind: ContentKind;
}

function reason(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

/**
 * Check that `filePath` is a readable regular file ('read') or that its
 * directory is writable ('write').
 */
export async function validatePath(filePath: string, mode: PathMode): Promise<void> {
  if (mode === 'read') {
    let stat: Stats;
    try {
      stat = await fs.stat(filePath);
    } catch {
      throw new PathValidationError(`File '${filePath}' not found.`, filePath);
    }
    if (!stat.isFile()) {
      throw new PathValidationError(`'${filePath}' is not a regular file.`, filePath);
    }
    return;
  }

  const directory = path.dirname(path.resolve(filePath));
  try {
    await fs.access(directory, fsConstants.W_OK);
  } catch {
    throw new PathValidationError(`Cannot write to path '${filePath}'.`, filePath);
  }
}

/**
 * Read a whole file into memory.
 */
export async function readBytes(filePath: string): Promise<Uint8Array> {
  try {
    const buffer = await fs.readFile(filePath);
    return new Uint8Array(buffer.buffer, buffer.byteOffset, buffer.byteLength);
  } catch (error) {
    throw new IoFailureError(`Unable to read '${filePath}': ${reason(error)}`, filePath, { cause: error });
  }
}

let tempCounter = 0;

/**
 * Write a whole file via a temporary sibling and rename. Each call gets its
 * own temp name, so concurrent writes to one path never share a temp file.
 */
export async function writeBytesAtomic(filePath: string, data: Uint8Array | string): Promise<void> {
  const tempPath = path.join(
    path.dirname(filePath),
    `.${path.basename(filePath)}.${process.pid}.${tempCounter++}.tmp`,
  );
  try {
    await fs.writeFile(tempPath, data);
    await fs.rename(tempPath, filePath);
  } catch (error) {
    await fs.rm(tempPath, { force: true });
    throw new IoFailureError(`Unable to write '${filePath}': ${reason(error)}`, filePath, { cause: error });
  }
}

/**
 * Label bytes as text when they decode as strict UTF-8. Cosmetic only.
 */
export function classifyContent(data: Uint8Array): ContentKind {
  try {
    new TextDecoder('utf-8', { fatal: true }).decode(data);
    return 'text';
  } catch {
    return 'binary';
  }
}

/**
 * Compress `inputPath` into a .huf container at `outputPath`.
 */
export async function compressFile(inputPath: string, outputPath: string): Promise<CompressResult> {
  await validatePath(inputPath, 'read');
  await validatePath(outputPath, 'write');

  const data = await readBytes(inputPath);
  if (data.length === 0) {
    throw new EmptyInputError('Cannot compress an empty file.');
  }

  const container = compress(data);
  await writeBytesAtomic(outputPath, container);

  return {
    inputSize: data.length,
    outputSize: container.length,
    ratio: container.length / data.length,
  };
}

/**
 * Decompress the .huf container at `inputPath` into `outputPath`.
 */
export async function decompressFile(
  inputPath: string,
  outputPath: string,
  options: DecompressOptions = {},
): Promise<DecompressResult> {
  await validatePath(inputPath, 'read');
  await validatePath(outputPath, 'write');

  const container = await readBytes(inputPath);
  const decoded = decompress(container, options);
  await writeBytesAtomic(outputPath, decoded);

  return {
    inputSize: container.length,
    outputSize: decoded.length,
    kind: classifyContent(decoded),
  };
}
