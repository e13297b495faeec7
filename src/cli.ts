/**
 * Command-line interface
 *
 *   dremio-mcp-server run       - Serve MCP over stdio or HTTP
 *   dremio-mcp-server config    - Show or create configuration files
 *   dremio-mcp-server tools     - List or invoke tools directly
 */

import { Command } from 'commander';
import { parseLogLevel, setLogLevel } from './config.js';
import { ValidationError } from './errors.js';
import { PKG } from './version.js';
import { createRunCommand } from './commands/run.js';
import { createConfigCommand } from './commands/config.js';
import { createToolsCommand } from './commands/tools.js';
import { reportError } from './commands/helpers.js';

interface GlobalOptions {
  logLevel?: string;
}

export function createProgram(): Command {
  const program = new Command();

  program
    .name('dremio-mcp-server')
    .description('MCP server for Dremio')
    .version(PKG.version)
    .option('--log-level <level>', 'debug, info, warn or error (overrides LOG_LEVEL)')
    .hook('preAction', () => {
      const { logLevel } = program.opts<GlobalOptions>();
      if (logLevel === undefined) return;
      const level = parseLogLevel(logLevel);
      if (!level) {
        throw new ValidationError(
          [{ path: '--log-level', message: `"${logLevel}" is not one of debug, info, warn, error` }],
          'Invalid option'
        );
      }
      setLogLevel(level);
    });

  program.addCommand(createRunCommand());
  program.addCommand(createConfigCommand());
  program.addCommand(createToolsCommand());

  return program;
}

/**
 * Parse argv and run the selected command. Failures outside a command
 * action (such as a bad global option) are reported here.
 */
export async function runCli(argv: readonly string[] = process.argv): Promise<void> {
  try {
    await createProgram().parseAsync([...argv]);
  } catch (error) {
    reportError(error);
    process.exitCode = 1;
  }
}
