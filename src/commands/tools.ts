/**
 * Tools Command Group
 *
 * Exercise tools without an MCP client:
 * - tools list      - Tools visible under the given modes
 * - tools invoke    - Call one tool with key=value arguments
 *
 * Usage:
 *   dremio-mcp-server tools list -m FOR_SELF -m FOR_PROMETHEUS
 *   dremio-mcp-server tools list -m EXPERIMENTAL --enable-experimental
 *   dremio-mcp-server tools invoke -t RunSqlQuery query="SELECT 1"
 *   dremio-mcp-server tools invoke -t GetSchemaOfTable -c ./config.yaml table_name=sales.orders
 */

import { Command } from 'commander';
import { createKernel } from '../kernel.js';
import { effectiveModes, parseModeSpec, type ToolMode } from '../modes.js';
import { loadSettings } from '../settings/loader.js';
import { allTools } from '../tools/index.js';
import { buildRegistry } from '../tools/registry.js';
import { parseKeyValueArgs } from '../tools/arguments.js';
import type { DispatchOutcome } from '../tools/dispatcher.js';
import { addModeOption, formatJsonOutput, handled } from './helpers.js';

const DEFAULT_LIST_MODES: readonly ToolMode[] = ['FOR_SELF'];

interface ListOptions {
  mode: string[];
  cfg?: string;
  enableExperimental?: boolean;
}

interface InvokeOptions {
  tool: string;
  cfg?: string;
}

/** Render an outcome the way `tools invoke` prints it */
export function formatOutcome(outcome: DispatchOutcome): string {
  if (outcome.status === 'success') {
    return typeof outcome.result === 'string' ? outcome.result : formatJsonOutput(outcome.result);
  }
  return formatJsonOutput({ status: outcome.status, ...outcome.error.toJSON() });
}

/**
 * Create the tools command group
 */
export function createToolsCommand(): Command {
  const tools = new Command('tools');
  tools.description('Support for testing tools directly');

  // tools list
  const listCmd = tools
    .command('list')
    .description('List the tools visible under the given modes')
    .option('-c, --cfg <file>', 'Settings file (replaces the default one)')
    .option('--enable-experimental', 'Include EXPERIMENTAL tools even if the settings do not allow them');
  addModeOption(listCmd, 'Mode to list (default FOR_SELF)');
  listCmd.action(
    handled((options: ListOptions) => {
      // The experimental switch and the project id come from the settings
      const { settings } = loadSettings({ configPath: options.cfg });
      const modes = options.mode.length > 0 ? parseModeSpec(options.mode) : DEFAULT_LIST_MODES;
      const enableExperimental = options.enableExperimental === true || (settings.dremio?.enable_experimental ?? false);
      const snapshot = buildRegistry(allTools, effectiveModes(modes, enableExperimental), {
        projectScoped: settings.dremio?.project_id !== undefined,
      });
      for (const listing of snapshot.list()) {
        const summary = listing.description.split('\n')[0];
        console.log(`${listing.name}: ${summary}`);
      }
    })
  );

  // tools invoke
  tools
    .command('invoke')
    .description('Invoke a tool with key=value arguments')
    .requiredOption('-t, --tool <name>', 'Tool to invoke')
    .option('-c, --cfg <file>', 'Settings file (replaces the default one)')
    .argument('[args...]', 'Arguments as key=value pairs')
    .action(
      handled(async (pairs: string[], options: InvokeOptions) => {
        const args = parseKeyValueArgs(pairs);
        const { settings } = loadSettings({ configPath: options.cfg });
        const kernel = createKernel({ settings });

        const controller = new AbortController();
        const onInterrupt = (): void => controller.abort('interrupted');
        process.once('SIGINT', onInterrupt);
        try {
          const outcome = await kernel.dispatch(options.tool, args, { signal: controller.signal });
          console.log(formatOutcome(outcome));
          if (outcome.status !== 'success') process.exitCode = 1;
        } finally {
          process.off('SIGINT', onInterrupt);
        }
      })
    );

  return tools;
}
