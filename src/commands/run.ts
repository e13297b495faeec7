/**
 * Run Command
 *
 * Start the MCP server over stdio (default) or streamable HTTP.
 *
 * Usage:
 *   dremio-mcp-server run                                   # stdio, default config file
 *   dremio-mcp-server run -c ./config.yaml -m FOR_DATA_PATTERNS
 *   dremio-mcp-server run --dremio-uri PROD --dremio-pat @~/.dremio/pat
 *   dremio-mcp-server run --http --port 8000
 *   dremio-mcp-server run --list-tools
 */

import { Command } from 'commander';
import { createKernel } from '../kernel.js';
import { loadSettings, type SettingsOverrides } from '../settings/loader.js';
import {
  StdioAdapter,
  HttpAdapter,
  DEFAULT_HTTP_PORT,
  DEFAULT_HTTP_HOST,
  type TransportAdapter,
} from '../transports/index.js';
import { installShutdownHandlers } from '../shutdown.js';
import { addModeOption, handled, parsePort } from './helpers.js';

export interface RunOptions {
  dremioUri?: string;
  dremioPat?: string;
  dremioProjectId?: string;
  cfg?: string;
  mode: string[];
  enableExperimental?: boolean;
  listTools?: boolean;
  http?: boolean;
  port: string;
  host: string;
}

/**
 * Map CLI flags onto settings paths. Flags that were not given stay
 * undefined and leave lower layers alone.
 */
export function runOverrides(options: RunOptions): SettingsOverrides {
  return {
    'dremio.uri': options.dremioUri,
    'dremio.pat': options.dremioPat,
    'dremio.project_id': options.dremioProjectId,
    'dremio.enable_experimental': options.enableExperimental ? true : undefined,
    'tools.server_mode': options.mode.length > 0 ? options.mode.join(',') : undefined,
  };
}

/**
 * Create the run command
 */
export function createRunCommand(): Command {
  const cmd = new Command('run');

  cmd
    .description('Run the Dremio MCP server')
    .option('--dremio-uri <uri>', 'Dremio URL or PROD / PRODEMEA')
    .option('--dremio-pat <pat>', 'Dremio personal access token, or @file')
    .option('--dremio-project-id <id>', 'Dremio Cloud project id')
    .option('-c, --cfg <file>', 'Settings file (replaces the default one)')
    .option('--enable-experimental', 'Allow EXPERIMENTAL tools')
    .option('--list-tools', 'Print the tools visible with these settings and exit')
    .option('--http', 'Serve streamable HTTP instead of stdio')
    .option('--port <port>', 'HTTP port', String(DEFAULT_HTTP_PORT))
    .option('--host <host>', 'HTTP bind address', DEFAULT_HTTP_HOST);

  addModeOption(cmd, 'Server mode');

  cmd.action(
    handled(async (options: RunOptions) => {
      const port = parsePort(options.port);
      const { settings, source } = loadSettings({ configPath: options.cfg, overrides: runOverrides(options) });
      const kernel = createKernel({ settings });

      if (options.listTools) {
        for (const tool of kernel.snapshot().tools) {
          console.log(tool.name);
        }
        return;
      }

      const adapter: TransportAdapter = options.http ? new HttpAdapter() : new StdioAdapter();
      await adapter.start(kernel, { port, host: options.host, source });
      installShutdownHandlers(() => adapter.stop());
    })
  );

  return cmd;
}
