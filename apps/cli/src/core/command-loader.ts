/**
 * Command Loader - Dynamic command loading and execution
 *
 * Commands are imported on first use, so `modelstack status` does not pay
 * for the backup code.
 */

import { formatErrorForCli } from '@modelstack/core';
import { getVersion } from '../lib/version.js';
import type { LoadedCommand } from './command-definition.js';
import { exitCodeFor } from './command-results.js';
import { generateHelp, parseCommandArgs } from './io/arg-parser.js';
import { getPreamble, getPreambleSeparator } from './io/cli-colors.js';
import { printError, setSuppressOutput } from './io/cli-logger.js';
import { OutputFormatter } from './io/output-formatter.js';
import { createStackContext, type CreateStackContextOptions } from './stack-context.js';

const COMMANDS: Record<string, () => Promise<LoadedCommand>> = {
  install: async () => (await import('./commands/install.js')).installCommand,
  check: async () => (await import('./commands/check.js')).checkCommand,
  start: async () => (await import('./commands/start.js')).startCommand,
  stop: async () => (await import('./commands/stop.js')).stopCommand,
  restart: async () => (await import('./commands/restart.js')).restartCommand,
  update: async () => (await import('./commands/update.js')).updateCommand,
  status: async () => (await import('./commands/status.js')).statusCommand,
  logs: async () => (await import('./commands/logs.js')).logsCommand,
  backup: async () => (await import('./commands/backup.js')).backupCommand,
  restore: async () => (await import('./commands/restore.js')).restoreCommand,
  cleanup: async () => (await import('./commands/cleanup.js')).cleanupCommand,
  uninstall: async () => (await import('./commands/uninstall.js')).uninstallCommand,
};

const CATEGORIES: Record<string, string[]> = {
  'Setup': ['install', 'check'],
  'Lifecycle': ['start', 'stop', 'restart', 'update'],
  'Monitoring': ['status', 'logs'],
  'Data': ['backup', 'restore'],
  'Removal': ['cleanup', 'uninstall'],
};

export function getAvailableCommands(): string[] {
  return Object.keys(COMMANDS);
}

export async function loadCommand(name: string): Promise<LoadedCommand> {
  const load = COMMANDS[name];
  if (!load) {
    throw new Error(`Unknown command: ${name}`);
  }
  return load();
}

function printPreamble(): void {
  console.log(getPreamble(getVersion()));
  console.log(getPreambleSeparator());
}

/**
 * Parse, run and print one command. Resolves to the process exit code.
 */
export async function executeCommand(
  commandName: string,
  argv: string[],
  contextOptions: CreateStackContextOptions = {}
): Promise<number> {
  const previousSuppress = setSuppressOutput(false);
  try {
    const command = await loadCommand(commandName);

    if (argv.includes('--help') || argv.includes('-h')) {
      console.log(generateHelp(command));
      return 0;
    }

    const prepared = parseCommandArgs(command, argv);
    const { output, quiet, verbose } = prepared.options;

    // Structured formats own stdout
    setSuppressOutput(output !== 'summary' || quiet);
    if (output === 'summary' && !quiet) {
      printPreamble();
    }

    const ctx = await createStackContext({ verbose, ...contextOptions });
    const results = await prepared.run(ctx);

    const formatted = OutputFormatter.format(results, { format: output, quiet, verbose });
    if (formatted !== '') {
      console.log(formatted);
    }
    return exitCodeFor(results);
  } catch (error) {
    printError(formatErrorForCli(error));
    return 1;
  } finally {
    setSuppressOutput(previousSuppress);
  }
}

/**
 * Generate help text for all commands
 */
export async function generateGlobalHelp(): Promise<string> {
  const lines: string[] = [];

  lines.push('USAGE:');
  lines.push('  modelstack <command> [options]');
  lines.push('');
  lines.push('COMMON OPTIONS:');
  lines.push('  -v, --verbose               Enable verbose output');
  lines.push('  -q, --quiet                 Suppress output except errors');
  lines.push('  -o, --output <format>       Output format: summary, json, yaml');
  lines.push('  --help                      Show help for a command');
  lines.push('');
  lines.push('ENVIRONMENT VARIABLES:');
  lines.push('  MODELSTACK_HOME             Configuration home (default: ~/.modelstack)');
  lines.push('  MODELSTACK_LOG_LEVEL        Diagnostic log level: error, warn, info, debug');
  lines.push('  MODELSTACK_LOG_FORMAT       Diagnostic log format: simple, json');
  lines.push('  MODELSTACK_CONTAINER_RUNTIME  Container CLI to use: docker, podman');
  lines.push('');
  lines.push('COMMANDS:');

  for (const [category, names] of Object.entries(CATEGORIES)) {
    lines.push(`  ${category}:`);
    for (const name of names) {
      const command = await loadCommand(name);
      lines.push(`    ${name.padEnd(12)} ${command.description}`);
    }
    lines.push('');
  }

  lines.push('For command-specific help:');
  lines.push('  modelstack <command> --help');

  return lines.join('\n');
}
