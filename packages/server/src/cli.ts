#!/usr/bin/env node
/**
 * CLI entry point
 *
 * Usage:
 *   schemalens serve --config ./config.json
 *   schemalens extract --request ./request.json --format text
 */

import { errorMessage } from '@schemalens/core';
import { USAGE, UsageError, parseCliArgs, runExtractCommand, runServeCommand, type CliCommand } from './commands.js';

async function main(): Promise<void> {
  let command: CliCommand;
  try {
    command = parseCliArgs(process.argv.slice(2));
  } catch (error) {
    if (!(error instanceof UsageError)) throw error;
    console.error(error.message);
    console.error('');
    console.error(USAGE);
    process.exitCode = 1;
    return;
  }

  switch (command.kind) {
    case 'help':
      console.error(USAGE);
      return;
    case 'extract':
      process.exitCode = await runExtractCommand(command, { stdout: process.stdout, stderr: process.stderr });
      return;
    case 'serve':
      await runServeCommand(command);
      return;
  }
}

main().catch((error: unknown) => {
  console.error(`Failed: ${errorMessage(error)}`);
  process.exit(1);
});
