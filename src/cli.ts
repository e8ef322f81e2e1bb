/**
 * cli.ts - Command-line front end for huffpack
 *
 * Usage:
 *   huffpack compress <input> <output.huf>
 *   huffpack decompress <input.huf> <output> [--lenient]
 *   huffpack inspect <input.huf>
 *   huffpack huf-to-zip | zip-to-huf | huf-to-txt | zip-to-txt
 *            | txt-to-zip | zip-extract-txt <input> <output>
 *   huffpack [menu]            interactive menu
 *
 * Flags:
 *   --lenient   accept streams that end mid-symbol (also HUFFPACK_LENIENT=1)
 *   --quiet     skip the statistics block
 *   --help, -h  print usage
 */

import {
  extractTxtFromZip,
  hufToTxt,
  hufToZip,
  txtToZip,
  zipToHuf,
  zipToTxt,
} from './archive.js';
import { compressFile, decompressFile, readBytes, validatePath } from './files.js';
import { inspect, isHuffmanError } from './huffman/index.js';

export type Command =
  | 'compress'
  | 'decompress'
  | 'inspect'
  | 'huf-to-zip'
  | 'zip-to-huf'
  | 'huf-to-txt'
  | 'zip-to-txt'
  | 'txt-to-zip'
  | 'zip-extract-txt'
  | 'menu';

/** Positional arguments each command takes */
export const COMMAND_ARITY: Record<Command, number> = {
  compress: 2,
  decompress: 2,
  inspect: 1,
  'huf-to-zip': 2,
  'zip-to-huf': 2,
  'huf-to-txt': 2,
  'zip-to-txt': 2,
  'txt-to-zip': 2,
  'zip-extract-txt': 2,
  menu: 0,
};

export interface CliOptions {
  command: Command;
  paths: string[];
  lenient: boolean;
  quiet: boolean;
  help: boolean;
}

/** Where CLI output goes; `console` in production */
export interface Output {
  log(message: string): void;
  error(message: string): void;
}

export class UsageError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'UsageError';
  }
}

export const USAGE = `Usage: huffpack <command> <input> [output] [--lenient] [--quiet]

Commands:
  compress <input> <output.huf>        Compress any file
  decompress <input.huf> <output>      Decompress a .huf file
  inspect <input.huf>                  Show container header details
  huf-to-zip <input.huf> <output.zip>  Wrap a .huf file in a ZIP archive
  zip-to-huf <input.zip> <output.huf>  Extract the first .huf entry
  huf-to-txt <input.huf> <output.txt>  Decompress to UTF-8 text
  zip-to-txt <input.zip> <output.txt>  Decompress the first .huf entry to text
  txt-to-zip <input.txt> <output.zip>  Wrap a text file in a ZIP archive
  zip-extract-txt <input.zip> <output> Extract the first .txt entry
  menu                                 Interactive menu (default)`;

function isCommand(value: string): value is Command {
  return Object.prototype.hasOwnProperty.call(COMMAND_ARITY, value);
}

/**
 * Parse command line arguments.
 * @param env Environment consulted for HUFFPACK_LENIENT
 */
export function parseArgs(args: string[], env: NodeJS.ProcessEnv = {}): CliOptions {
  let lenient = env.HUFFPACK_LENIENT === '1';
  let quiet = false;
  let help = false;
  const positional: string[] = [];

  for (const arg of args) {
    if (arg === '--lenient') {
      lenient = true;
    } else if (arg === '--quiet') {
      quiet = true;
    } else if (arg === '--help' || arg === '-h') {
      help = true;
    } else if (arg.startsWith('--')) {
      throw new UsageError(`Unknown flag: ${arg}`);
    } else {
      positional.push(arg);
    }
  }

  const [first, ...paths] = positional;
  const command = first ?? 'menu';
  if (!isCommand(command)) {
    throw new UsageError(`Unknown command: ${command}`);
  }
  if (!help && paths.length !== COMMAND_ARITY[command]) {
    throw new UsageError(
      `${command} takes ${COMMAND_ARITY[command]} path(s), got ${paths.length}`,
    );
  }

  return { command, paths, lenient, quiet, help };
}

function kb(bytes: number): string {
  return `${bytes.toLocaleString('en-US')} bytes (${(bytes / 1024).toFixed(1)} KB)`;
}

function printStats(out: Output, rows: Array<[string, string]>): void {
  out.log('='.repeat(50));
  out.log('Statistics:');
  out.log('='.repeat(50));
  for (const [label, value] of rows) {
    out.log(`${`${label}:`.padEnd(17)}${value}`);
  }
  out.log('='.repeat(50));
}

/**
 * Run one non-interactive command. Library errors propagate to the caller.
 */
export async function runCommand(
  command: Exclude<Command, 'menu'>,
  paths: string[],
  options: { lenient?: boolean; quiet?: boolean },
  out: Output,
): Promise<void> {
  const [input, output] = paths;
  const strict = !options.lenient;

  switch (command) {
    case 'compress': {
      const result = await compressFile(input, output);
      out.log(`Compressed ${result.inputSize} bytes to ${result.outputSize} bytes.`);
      if (!options.quiet) {
        printStats(out, [
          ['Input size', kb(result.inputSize)],
          ['Output size', kb(result.outputSize)],
          ['Compression', `${(result.ratio * 100).toFixed(1)}% of original`],
        ]);
      }
      return;
    }
    case 'decompress': {
      const result = await decompressFile(input, output, { strict });
      out.log(`Decompressed to ${result.kind} file: '${output}'.`);
      return;
    }
    case 'inspect': {
      await validatePath(input, 'read');
      const info = inspect(await readBytes(input));
      printStats(out, [
        ['Container size', kb(info.containerSize)],
        ['Original size', kb(info.originalSize)],
        ['Symbols', String(info.distinctSymbols)],
        ['Payload', kb(info.payloadSize)],
        ['Encoded bits', info.encodedBits.toLocaleString('en-US')],
        ['Pad length', String(info.padLength)],
      ]);
      return;
    }
    case 'huf-to-zip':
    case 'txt-to-zip': {
      const result = command === 'huf-to-zip'
        ? await hufToZip(input, output)
        : await txtToZip(input, output);
      out.log(`Created ZIP archive: '${output}' containing '${result.entryName}'.`);
      return;
    }
    case 'zip-to-huf':
    case 'zip-extract-txt': {
      const result = command === 'zip-to-huf'
        ? await zipToHuf(input, output)
        : await extractTxtFromZip(input, output);
      out.log(`Extracted '${result.entryName}' to '${output}'.`);
      return;
    }
    case 'huf-to-txt':
    case 'zip-to-txt': {
      const result = command === 'huf-to-txt'
        ? await hufToTxt(input, output, { strict })
        : await zipToTxt(input, output, { strict });
      out.log(`Converted '${result.entryName}' to text file '${output}'.`);
      return;
    }
  }
}

/**
 * Run one command and turn library errors into messages.
 * @returns true when the command succeeded
 */
export async function runReported(
  command: Exclude<Command, 'menu'>,
  paths: string[],
  options: { lenient?: boolean; quiet?: boolean },
  out: Output,
): Promise<boolean> {
  try {
    await runCommand(command, paths, options, out);
    return true;
  } catch (error) {
    if (isHuffmanError(error)) {
      out.error(`Error: ${error.message}`);
      return false;
    }
    throw error;
  }
}
