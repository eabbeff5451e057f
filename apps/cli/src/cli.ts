#!/usr/bin/env node
/**
 * modelstack CLI entry point
 *
 * Dispatches to the command loader, which parses the command's arguments
 * with its zod schema, runs it and prints the results.
 */

import { getPreamble, getPreambleSeparator } from './core/io/cli-colors.js';
import { printError } from './core/io/cli-logger.js';
import { executeCommand, generateGlobalHelp, getAvailableCommands } from './core/command-loader.js';
import { getVersion } from './lib/version.js';

async function printHelp(): Promise<void> {
  console.log(getPreamble(getVersion()));
  console.log(getPreambleSeparator());
  console.log();
  console.log(await generateGlobalHelp());
}

async function main(): Promise<number> {
  const args = process.argv.slice(2);
  const command = args[0];

  if (command === undefined || command === '--help' || command === '-h') {
    await printHelp();
    return 0;
  }

  if (command === '--version' || command === '-V') {
    console.log(`modelstack v${getVersion()}`);
    return 0;
  }

  const availableCommands = getAvailableCommands();
  if (!availableCommands.includes(command)) {
    printError(`Unknown command: ${command}`);
    console.error(`Available commands: ${availableCommands.join(', ')}`);
    console.error(`Run 'modelstack --help' for more information.`);
    return 1;
  }

  return executeCommand(command, args.slice(1));
}

main().then(
  code => {
    process.exitCode = code;
  },
  (error: unknown) => {
    printError(`Unexpected error: ${error instanceof Error ? error.message : String(error)}`);
    process.exitCode = 1;
  }
);
