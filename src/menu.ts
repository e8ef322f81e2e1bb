/**
 * menu.ts - Line-oriented interactive menu
 *
 * Collects file paths and dispatches to the same commands as the CLI.
 * Errors are reported and the menu returns to the prompt.
 */

import * as readline from 'readline/promises';
import { runReported, type Command, type Output } from './cli.js';

/** Resolves to null once input is exhausted */
export interface Prompt {
  question(query: string): Promise<string | null>;
}

interface MenuItem {
  label: string;
  command: Exclude<Command, 'menu' | 'inspect'>;
  inputPrompt: string;
  outputPrompt: string;
}

export const MENU_ITEMS: ReadonlyMap<string, MenuItem> = new Map<string, MenuItem>([
  ['1', { label: 'Compress file (Huffman)', command: 'compress', inputPrompt: 'Input file (any type): ', outputPrompt: 'Output file (.huf): ' }],
  ['2', { label: 'Decompress .huf file', command: 'decompress', inputPrompt: 'Compressed file (.huf): ', outputPrompt: 'Output file: ' }],
  ['3', { label: 'Convert .huf to .zip', command: 'huf-to-zip', inputPrompt: 'Input Huffman file (.huf): ', outputPrompt: 'Output ZIP file (.zip): ' }],
  ['4', { label: 'Extract .huf from ZIP', command: 'zip-to-huf', inputPrompt: 'Input ZIP file (.zip): ', outputPrompt: 'Output .huf file: ' }],
  ['5', { label: 'Convert .huf to .txt', command: 'huf-to-txt', inputPrompt: 'Input Huffman file (.huf): ', outputPrompt: 'Output text file (.txt): ' }],
  ['6', { label: 'Convert ZIP (with .huf) to .txt', command: 'zip-to-txt', inputPrompt: 'Input ZIP file (.zip): ', outputPrompt: 'Output text file (.txt): ' }],
  ['7', { label: 'Convert .txt to .zip', command: 'txt-to-zip', inputPrompt: 'Input text file (.txt): ', outputPrompt: 'Output ZIP file (.zip): ' }],
  ['8', { label: 'Extract .txt from ZIP', command: 'zip-extract-txt', inputPrompt: 'Input ZIP file (.zip): ', outputPrompt: 'Output text file (.txt): ' }],
]);

export const EXIT_CHOICE = '9';

function printMenu(out: Output): void {
  out.log('');
  out.log('=== File Compressor and Converter ===');
  for (const [key, item] of MENU_ITEMS) {
    out.log(`${key}. ${item.label}`);
  }
  out.log(`${EXIT_CHOICE}. Exit`);
}

/**
 * Run the menu until the user exits or input ends.
 */
export async function runMenu(
  prompt: Prompt,
  out: Output,
  options: { lenient?: boolean; quiet?: boolean } = {},
): Promise<void> {
  while (true) {
    printMenu(out);
    const choice = await prompt.question('Enter choice: ');
    if (choice === null) return;

    const key = choice.trim();
    if (key === EXIT_CHOICE) {
      out.log('Exiting the program.');
      return;
    }

    const item = MENU_ITEMS.get(key);
    if (item === undefined) {
      out.log('Invalid choice.');
      continue;
    }

    const input = await prompt.question(item.inputPrompt);
    if (input === null) return;
    const output = await prompt.question(item.outputPrompt);
    if (output === null) return;

    await runReported(item.command, [input.trim(), output.trim()], options, out);
  }
}

/**
 * Prompt backed by a readline interface. Lines are queued as they arrive,
 * so input piped in faster than the menu asks keeps every line. Once the
 * interface closes and the queue is drained, questions resolve with null.
 */
export function createReadlinePrompt(rl: readline.Interface): Prompt {
  const lines: string[] = [];
  const waiting: Array<(line: string | null) => void> = [];
  let closed = false;

  rl.on('line', (line: string) => {
    const next = waiting.shift();
    if (next === undefined) {
      lines.push(line);
    } else {
      next(line);
    }
  });
  rl.once('close', () => {
    closed = true;
    for (const resolve of waiting.splice(0)) resolve(null);
  });

  return {
    question(query) {
      if (!closed) {
        rl.setPrompt(query);
        rl.prompt();
      }
      const line = lines.shift();
      if (line !== undefined) return Promise.resolve(line);
      if (closed) return Promise.resolve(null);
      return new Promise((resolve) => {
        waiting.push(resolve);
      });
    },
  };
}
