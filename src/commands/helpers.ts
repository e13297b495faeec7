/**
 * Shared helpers for CLI commands
 */

import type { Command } from 'commander';
import { McpCoreError, ValidationError, errorMessage } from '../errors.js';
import { TOOL_MODES } from '../modes.js';

/** Accumulate a repeatable option (`-m A -m B`) */
export function collect(value: string, previous: string[]): string[] {
  return [...previous, value];
}

/**
 * Add the repeatable `-m/--mode` option
 */
export function addModeOption(cmd: Command, description = 'Tool mode'): Command {
  return cmd.option(
    '-m, --mode <mode>',
    `${description} (repeatable; ${TOOL_MODES.join(', ')})`,
    collect,
    []
  );
}

/** Parse a TCP port option */
export function parsePort(value: string): number {
  const port = Number(value);
  if (!Number.isInteger(port) || port < 0 || port > 65535) {
    throw new ValidationError([{ path: '--port', message: `"${value}" is not a port number` }], 'Invalid option');
  }
  return port;
}

/**
 * Print an error to stderr. Validation errors list every violation with its
 * path.
 */
export function reportError(error: unknown): void {
  if (error instanceof ValidationError) {
    console.error(`Error: ${error.context}`);
    for (const v of error.violations) {
      console.error(`  ${v.path}: ${v.message}`);
    }
    return;
  }
  if (error instanceof McpCoreError) {
    console.error(`Error [${error.code}]: ${error.message}`);
    return;
  }
  console.error(`Error: ${errorMessage(error)}`);
}

/**
 * Wrap a command action so failures are reported and the exit code is 1
 */
export function handled<A extends unknown[]>(
  action: (...args: A) => Promise<void> | void
): (...args: A) => Promise<void> {
  return async (...args: A) => {
    try {
      await action(...args);
    } catch (error) {
      reportError(error);
      process.exitCode = 1;
    }
  };
}

export function formatJsonOutput(data: unknown): string {
  return JSON.stringify(data, null, 2);
}
