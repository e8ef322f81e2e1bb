#!/usr/bin/env node
/**
 * main.ts - huffpack executable entry point
 */

import * as readline from 'readline/promises';
import { parseArgs, runReported, UsageError, USAGE, type CliOptions, type Output } from './cli.js';
import { createReadlinePrompt, runMenu } from './menu.js';

/**
 * @returns process exit code
 */
async function main(args: string[], env: NodeJS.ProcessEnv, out: Output): Promise<number> {
  let options: CliOptions;
  try {
    options = parseArgs(args, env);
  } catch (error) {
    if (error instanceof UsageError) {
      out.error(`Error: ${error.message}`);
      out.error(USAGE);
      return 1;
    }
    throw error;
  }

  if (options.help) {
    out.log(USAGE);
    return 0;
  }

  if (options.command === 'menu') {
    const rl = readline.createInterface({ input: process.stdin, output: process.stdout });
    try {
      await runMenu(createReadlinePrompt(rl), out, options);
    } finally {
      rl.close();
    }
    return 0;
  }

  const ok = await runReported(options.command, options.paths, options, out);
  return ok ? 0 : 1;
}

main(process.argv.slice(2), process.env, console)
  .then((code) => {
    process.exitCode = code;
  })
  .catch((error: unknown) => {
    console.error(error);
    process.exitCode = 1;
  });
