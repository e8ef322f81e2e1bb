/**
 * files.test.ts - Tests for file-level compress/decompress
 */

import { after, before, describe, test } from 'node:test';
import * as assert from 'node:assert';
import * as fs from 'fs/promises';
import * as os from 'os';
import * as path from 'path';
import {
  classifyContent,
  compressFile,
  decompressFile,
  readBytes,
  validatePath,
  writeBytesAtomic,
} from './files.js';
import {
  EmptyInputError,
  InvalidContainerError,
  IoFailureError,
  PathValidationError,
} from './huffman/errors.js';

let dir: string;

before(async () => {
  dir = await fs.mkdtemp(path.join(os.tmpdir(), 'huffpack-files-'));
});

after(async () => {
  await fs.rm(dir, { recursive: true, force: true });
});

async function exists(filePath: string): Promise<boolean> {
  try {
    await fs.stat(filePath);
    return true;
  } catch {
    return false;
  }
}

describe('validatePath', () => {
  test('accepts an existing file for reading', async () => {
    const file = path.join(dir, 'readable.txt');
    await fs.writeFile(file, 'x');
    await validatePath(file, 'read');
  });

  test('rejects a missing file', async () => {
    const file = path.join(dir, 'missing.txt');
    await assert.rejects(validatePath(file, 'read'), (error: unknown) => {
      assert.ok(error instanceof PathValidationError);
      assert.strictEqual(error.message, `File '${file}' not found.`);
      assert.strictEqual(error.code, 'IO_FAILURE');
      return true;
    });
  });

  test('rejects a directory for reading', async () => {
    await assert.rejects(validatePath(dir, 'read'), /is not a regular file/);
  });

  test('rejects a destination in a missing directory', async () => {
    const file = path.join(dir, 'no-such-dir', 'out.huf');
    await assert.rejects(validatePath(file, 'write'), /Cannot write to path/);
  });

  test('accepts a destination in an existing directory', async () => {
    await validatePath(path.join(dir, 'new-file.huf'), 'write');
  });
});

describe('compressFile / decompressFile', () => {
  test('text file round trip', async () => {
    const input = path.join(dir, 'poem.txt');
    const packed = path.join(dir, 'poem.huf');
    const restored = path.join(dir, 'poem.out.txt');
    const content = 'Tyger Tyger, burning bright,\nIn the forests of the night;\n';
    await fs.writeFile(input, content);

    const compressed = await compressFile(input, packed);
    assert.strictEqual(compressed.inputSize, content.length);
    assert.strictEqual(compressed.outputSize, (await fs.stat(packed)).size);
    assert.strictEqual(compressed.ratio, compressed.outputSize / compressed.inputSize);

    const decompressed = await decompressFile(packed, restored);
    assert.strictEqual(decompressed.kind, 'text');
    assert.strictEqual(decompressed.outputSize, content.length);
    assert.strictEqual(await fs.readFile(restored, 'utf-8'), content);
  });

  test('binary file round trip', async () => {
    const input = path.join(dir, 'blob.bin');
    const packed = path.join(dir, 'blob.huf');
    const restored = path.join(dir, 'blob.out');
    const data = Buffer.from([0xff, 0xfe, 0x00, 0x01, 0xff, 0xff, 0x80]);
    await fs.writeFile(input, data);

    await compressFile(input, packed);
    const result = await decompressFile(packed, restored);
    assert.strictEqual(result.kind, 'binary');
    assert.deepStrictEqual(await fs.readFile(restored), data);
  });

  test('leaves no temporary files behind', async () => {
    const sub = await fs.mkdtemp(path.join(dir, 'clean-'));
    await fs.writeFile(path.join(sub, 'in.txt'), 'aaaabbc');
    await compressFile(path.join(sub, 'in.txt'), path.join(sub, 'out.huf'));
    assert.deepStrictEqual((await fs.readdir(sub)).sort(), ['in.txt', 'out.huf']);
  });

  test('empty input fails and creates no output', async () => {
    const input = path.join(dir, 'empty.txt');
    const output = path.join(dir, 'empty.huf');
    await fs.writeFile(input, '');
    await assert.rejects(compressFile(input, output), (error: unknown) => {
      assert.ok(error instanceof EmptyInputError);
      assert.strictEqual(error.message, 'Cannot compress an empty file.');
      return true;
    });
    assert.strictEqual(await exists(output), false);
  });

  test('invalid container leaves an existing destination untouched', async () => {
    const input = path.join(dir, 'short.huf');
    const output = path.join(dir, 'keep.txt');
    await fs.writeFile(input, Buffer.alloc(100));
    await fs.writeFile(output, 'previous contents');
    await assert.rejects(decompressFile(input, output), InvalidContainerError);
    assert.strictEqual(await fs.readFile(output, 'utf-8'), 'previous contents');
  });

  test('missing input is reported before any work', async () => {
    await assert.rejects(
      compressFile(path.join(dir, 'nope.txt'), path.join(dir, 'nope.huf')),
      PathValidationError,
    );
  });
});

describe('I/O helpers', () => {
  test('readBytes wraps read failures', async () => {
    const file = path.join(dir, 'absent.bin');
    await assert.rejects(readBytes(file), (error: unknown) => {
      assert.ok(error instanceof IoFailureError);
      assert.strictEqual(error.path, file);
      assert.ok(error.cause instanceof Error);
      return true;
    });
  });

  test('writeBytesAtomic wraps write failures', async () => {
    const file = path.join(dir, 'missing-dir', 'x.bin');
    await assert.rejects(writeBytesAtomic(file, new Uint8Array([1])), IoFailureError);
  });

  test('writeBytesAtomic replaces an existing file', async () => {
    const file = path.join(dir, 'replace.txt');
    await fs.writeFile(file, 'old');
    await writeBytesAtomic(file, 'new');
    assert.strictEqual(await fs.readFile(file, 'utf-8'), 'new');
  });

  test('concurrent writes to one path each complete', async () => {
    const target = await fs.mkdtemp(path.join(dir, 'concurrent-'));
    const file = path.join(target, 'out.bin');
    const first = new Uint8Array(1 << 20).fill(0x61);
    const second = new Uint8Array(1 << 20).fill(0x62);

    await Promise.all([writeBytesAtomic(file, first), writeBytesAtomic(file, second)]);

    const written = await fs.readFile(file);
    assert.strictEqual(written.length, 1 << 20);
    assert.ok(written.every((b) => b === written[0]));
    assert.ok(written[0] === 0x61 || written[0] === 0x62);
    assert.deepStrictEqual(await fs.readdir(target), ['out.bin']);
  });

  test('classifyContent', () => {
    assert.strictEqual(classifyContent(new TextEncoder().encode('plain ascii')), 'text');
    assert.strictEqual(classifyContent(new TextEncoder().encode('ünïcödé ✓')), 'text');
    assert.strictEqual(classifyContent(new Uint8Array([0xc3, 0x28])), 'binary');
    assert.strictEqual(classifyContent(new Uint8Array([0xff])), 'binary');
    assert.strictEqual(classifyContent(new Uint8Array(0)), 'text');
  });
});
