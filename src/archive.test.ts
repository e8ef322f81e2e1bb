/**
 * archive.test.ts - Tests for ZIP conversions
 */

import { after, before, describe, test } from 'node:test';
import * as assert from 'node:assert';
import * as fs from 'fs/promises';
import * as os from 'os';
import * as path from 'path';
import {
  buildArchive,
  createArchive,
  decodeText,
  extractEntryBySuffix,
  extractTxtFromZip,
  hufToTxt,
  hufToZip,
  txtToZip,
  zipToHuf,
  zipToTxt,
} from './archive.js';
import { compressFile } from './files.js';
import {
  ArchiveEntryNotFoundError,
  InvalidArchiveError,
  NotTextError,
} from './huffman/errors.js';
import { compress } from './huffman/container.js';

const bytes = (s: string): Uint8Array => new TextEncoder().encode(s);

let dir: string;

before(async () => {
  dir = await fs.mkdtemp(path.join(os.tmpdir(), 'huffpack-archive-'));
});

after(async () => {
  await fs.rm(dir, { recursive: true, force: true });
});

describe('In-memory archives', () => {
  test('finds the first entry with a suffix', () => {
    const zip = buildArchive([
      { name: 'notes.txt', data: bytes('notes') },
      { name: 'data.huf', data: bytes('first') },
      { name: 'more.huf', data: bytes('second') },
    ]);
    const entry = extractEntryBySuffix(zip, '.huf');
    assert.ok(entry !== null);
    assert.strictEqual(entry.name, 'data.huf');
    assert.deepStrictEqual(entry.data, bytes('first'));
  });

  test('returns null when no entry matches', () => {
    const zip = buildArchive([{ name: 'notes.txt', data: bytes('notes') }]);
    assert.strictEqual(extractEntryBySuffix(zip, '.huf'), null);
  });

  test('rejects data that is not a ZIP archive', () => {
    assert.throws(() => extractEntryBySuffix(new Uint8Array(64).fill(7), '.huf'), InvalidArchiveError);
    assert.throws(() => extractEntryBySuffix(new Uint8Array(3), '.huf', 'tiny.zip'), (error: unknown) => {
      assert.ok(error instanceof InvalidArchiveError);
      assert.strictEqual(error.message, "'tiny.zip' is not a readable ZIP archive");
      return true;
    });
  });

  test('decodeText rejects invalid UTF-8 and keeps a byte order mark', () => {
    assert.throws(() => decodeText(new Uint8Array([0xff, 0x00])), NotTextError);
    assert.strictEqual(decodeText(new Uint8Array([0xef, 0xbb, 0xbf, 0x68, 0x69])), '\ufeffhi');
  });
});

describe('File conversions', () => {
  test('txt -> zip -> txt', async () => {
    const txt = path.join(dir, 'letter.txt');
    const zip = path.join(dir, 'letter.zip');
    const out = path.join(dir, 'letter.extracted');
    await fs.writeFile(txt, 'Dear reader,\nhello.\n');

    const created = await txtToZip(txt, zip);
    assert.strictEqual(created.entryName, 'letter.txt');
    assert.strictEqual(created.archiveSize, (await fs.stat(zip)).size);

    const extracted = await extractTxtFromZip(zip, out);
    assert.strictEqual(extracted.entryName, 'letter.txt');
    assert.strictEqual(await fs.readFile(out, 'utf-8'), 'Dear reader,\nhello.\n');
  });

  test('huf -> zip -> huf keeps the container byte for byte', async () => {
    const src = path.join(dir, 'song.txt');
    const huf = path.join(dir, 'song.huf');
    const zip = path.join(dir, 'song.zip');
    const back = path.join(dir, 'song.copy.huf');
    await fs.writeFile(src, 'la la la, la la la, la la la la');
    await compressFile(src, huf);

    await hufToZip(huf, zip);
    const result = await zipToHuf(zip, back);
    assert.strictEqual(result.entryName, 'song.huf');
    assert.deepStrictEqual(await fs.readFile(back), await fs.readFile(huf));
  });

  test('huf -> txt and zip(huf) -> txt', async () => {
    const huf = path.join(dir, 'story.huf');
    const zip = path.join(dir, 'story.zip');
    const content = 'Once upon a time — there was a tree.\n';
    await fs.writeFile(huf, compress(bytes(content)));
    await createArchive(zip, huf);

    const direct = path.join(dir, 'story.direct.txt');
    const viaZip = path.join(dir, 'story.zip.txt');
    const first = await hufToTxt(huf, direct);
    const second = await zipToTxt(zip, viaZip);

    assert.strictEqual(await fs.readFile(direct, 'utf-8'), content);
    assert.strictEqual(await fs.readFile(viaZip, 'utf-8'), content);
    assert.strictEqual(first.outputSize, Buffer.byteLength(content, 'utf-8'));
    assert.strictEqual(second.entryName, 'story.huf');
  });

  test('huf -> txt refuses binary content and writes nothing', async () => {
    const huf = path.join(dir, 'binary.huf');
    const out = path.join(dir, 'binary.txt');
    await fs.writeFile(huf, compress(new Uint8Array([0xff, 0xfe, 0xfd])));
    await assert.rejects(hufToTxt(huf, out), NotTextError);
    await assert.rejects(fs.stat(out));
  });

  test('missing entry is reported by suffix', async () => {
    const txt = path.join(dir, 'only.txt');
    const zip = path.join(dir, 'only.zip');
    await fs.writeFile(txt, 'only text here');
    await txtToZip(txt, zip);
    await assert.rejects(zipToHuf(zip, path.join(dir, 'x.huf')), (error: unknown) => {
      assert.ok(error instanceof ArchiveEntryNotFoundError);
      assert.strictEqual(error.message, 'No .huf file found in ZIP archive');
      return true;
    });
  });
});
