/**
 * archive.ts - ZIP conversions for .huf and .txt files
 *
 * ZIP reading and writing is delegated to fflate; this module only moves
 * whole entries in and out of archives. Intermediate data stays in memory.
 */

import * as path from 'path';
import { unzipSync, zipSync, type Zippable } from 'fflate';
import { decompress, type DecompressOptions } from './huffman/container.js';
import { ArchiveEntryNotFoundError, InvalidArchiveError, NotTextError } from './huffman/errors.js';
import { HUF_EXTENSION } from './huffman/formats.js';
import { readBytes, validatePath, writeBytesAtomic } from './files.js';

export const TXT_EXTENSION = '.txt';

/** Size of a ZIP end-of-central-directory record, the smallest valid archive */
export const MIN_ZIP_SIZE = 22;

/** Deflate level used for new archives */
export const ZIP_LEVEL = 6;

export interface ArchiveEntry {
  name: string;
  data: Uint8Array;
}

export interface ExtractResult {
  entryName: string;
  outputSize: number;
}

export interface ArchiveResult {
  entryName: string;
  archiveSize: number;
}

/**
 * First entry, in archive order, whose name ends with `suffix`.
 * @param source Label used in error messages
 */
export function extractEntryBySuffix(
  zip: Uint8Array,
  suffix: string,
  source: string = '<memory>',
): ArchiveEntry | null {
  if (zip.length < MIN_ZIP_SIZE) {
    throw new InvalidArchiveError(source);
  }

  let entries: Record<string, Uint8Array>;
  try {
    entries = unzipSync(zip, {
      filter: (file) => !file.name.endsWith('/') && file.name.endsWith(suffix),
    });
  } catch (error) {
    throw new InvalidArchiveError(source, { cause: error });
  }

  const first = Object.entries(entries).at(0);
  return first === undefined ? null : { name: first[0], data: first[1] };
}

/**
 * Build a deflate-compressed archive holding the given entries.
 */
export function buildArchive(entries: ArchiveEntry[]): Uint8Array {
  const files: Zippable = {};
  for (const { name, data } of entries) {
    files[name] = [data, { level: ZIP_LEVEL }];
  }
  return zipSync(files);
}

/**
 * Write a new archive at `zipPath` containing `filePath` under its base name.
 */
export async function createArchive(zipPath: string, filePath: string): Promise<ArchiveResult> {
  await validatePath(filePath, 'read');
  await validatePath(zipPath, 'write');

  const entryName = path.basename(filePath);
  const archive = buildArchive([{ name: entryName, data: await readBytes(filePath) }]);
  await writeBytesAtomic(zipPath, archive);

  return { entryName, archiveSize: archive.length };
}

async function readEntry(zipPath: string, suffix: string): Promise<ArchiveEntry> {
  await validatePath(zipPath, 'read');
  const entry = extractEntryBySuffix(await readBytes(zipPath), suffix, zipPath);
  if (entry === null) {
    throw new ArchiveEntryNotFoundError(suffix);
  }
  return entry;
}

async function extractEntry(zipPath: string, outputPath: string, suffix: string): Promise<ExtractResult> {
  const entry = await readEntry(zipPath, suffix);
  await validatePath(outputPath, 'write');
  await writeBytesAtomic(outputPath, entry.data);
  return { entryName: entry.name, outputSize: entry.data.length };
}

/**
 * Decode bytes as strict UTF-8, or fail with NotTextError.
 * A leading byte order mark is kept.
 */
export function decodeText(data: Uint8Array): string {
  try {
    return new TextDecoder('utf-8', { fatal: true, ignoreBOM: true }).decode(data);
  } catch (error) {
    throw new NotTextError({ cause: error });
  }
}

function decompressToText(container: Uint8Array, options: DecompressOptions): string {
  return decodeText(decompress(container, options));
}

/** Wrap a .huf file in a new ZIP archive */
export function hufToZip(hufPath: string, zipPath: string): Promise<ArchiveResult> {
  return createArchive(zipPath, hufPath);
}

/** Copy the first .huf entry of a ZIP archive to `outputPath` */
export function zipToHuf(zipPath: string, outputPath: string): Promise<ExtractResult> {
  return extractEntry(zipPath, outputPath, HUF_EXTENSION);
}

/** Wrap a text file in a new ZIP archive */
export function txtToZip(txtPath: string, zipPath: string): Promise<ArchiveResult> {
  return createArchive(zipPath, txtPath);
}

/** Copy the first .txt entry of a ZIP archive to `outputPath` */
export function extractTxtFromZip(zipPath: string, outputPath: string): Promise<ExtractResult> {
  return extractEntry(zipPath, outputPath, TXT_EXTENSION);
}

/**
 * Decompress a .huf file and write it as UTF-8 text.
 * Nothing is written when the content is not valid UTF-8.
 */
export async function hufToTxt(
  hufPath: string,
  txtPath: string,
  options: DecompressOptions = {},
): Promise<ExtractResult> {
  await validatePath(hufPath, 'read');
  await validatePath(txtPath, 'write');

  const text = decompressToText(await readBytes(hufPath), options);
  await writeBytesAtomic(txtPath, text);
  return { entryName: path.basename(hufPath), outputSize: Buffer.byteLength(text, 'utf-8') };
}

/**
 * Decompress the first .huf entry of a ZIP archive and write it as text.
 */
export async function zipToTxt(
  zipPath: string,
  txtPath: string,
  options: DecompressOptions = {},
): Promise<ExtractResult> {
  const entry = await readEntry(zipPath, HUF_EXTENSION);
  await validatePath(txtPath, 'write');

  const text = decompressToText(entry.data, options);
  await writeBytesAtomic(txtPath, text);
  return { entryName: entry.name, outputSize: Buffer.byteLength(text, 'utf-8') };
}
