/**
 * Config Command Group
 *
 * - config list                - Show the resolved settings (secrets masked)
 * - config create dremioai     - Write the default settings file
 * - config create claude       - Register this server with Claude Desktop
 *
 * Usage:
 *   dremio-mcp-server config list --show-filename
 *   dremio-mcp-server config list --type claude
 *   dremio-mcp-server config create dremioai --uri PROD --pat @~/.dremio/pat --project-id abc
 *   dremio-mcp-server config create claude --dry-run
 */

import { existsSync } from 'fs';
import { Command } from 'commander';
import { ValidationError } from '../errors.js';
import { defaultConfigPath, loadSettings } from '../settings/loader.js';
import {
  buildDremioDocument,
  maskSecrets,
  renderSettings,
  writeSettingsFile,
} from '../settings/writer.js';
import {
  claudeConfigPath,
  defaultServerEntry,
  mergeServerEntry,
  readClaudeConfig,
  writeClaudeConfig,
} from '../claudeConfig.js';
import { addModeOption, formatJsonOutput, handled } from './helpers.js';

export const CONFIG_TYPES = ['dremioai', 'claude'] as const;
export type ConfigType = (typeof CONFIG_TYPES)[number];

function parseConfigType(value: string): ConfigType {
  for (const t of CONFIG_TYPES) {
    if (t === value) return t;
  }
  throw new ValidationError(
    [{ path: '--type', message: `"${value}" is not one of ${CONFIG_TYPES.join(', ')}` }],
    'Invalid option'
  );
}

interface ListOptions {
  showFilename?: boolean;
  type: string;
}

interface CreateDremioFlags {
  uri: string;
  pat: string;
  projectId?: string;
  mode: string[];
  enableExperimental?: boolean;
  allowDml?: boolean;
  dryRun?: boolean;
}

interface CreateClaudeFlags {
  dryRun?: boolean;
}

function listConfig(options: ListOptions): void {
  const type = parseConfigType(options.type);

  if (type === 'dremioai') {
    const path = defaultConfigPath();
    const exists = existsSync(path);
    console.log(`Default config file: ${path} (exists = ${exists})`);
    if (!options.showFilename) {
      const { settings } = loadSettings();
      console.log(renderSettings(maskSecrets(settings, true)));
    }
    return;
  }

  const path = claudeConfigPath();
  const exists = existsSync(path);
  console.log(`Default config file: ${path} (exists = ${exists})`);
  if (!options.showFilename && exists) {
    console.log(formatJsonOutput(readClaudeConfig(path)));
  }
}

function createDremioConfig(flags: CreateDremioFlags): void {
  const doc = buildDremioDocument({
    uri: flags.uri,
    pat: flags.pat,
    projectId: flags.projectId,
    modes: flags.mode,
    enableExperimental: flags.enableExperimental,
    allowDml: flags.allowDml,
  });

  if (flags.dryRun) {
    console.log(renderSettings(maskSecrets(doc)));
    return;
  }

  const path = defaultConfigPath();
  writeSettingsFile(path, doc);
  console.log(`Created default config file: ${path}`);
}

function createClaudeConfig(flags: CreateClaudeFlags): void {
  const path = claudeConfigPath();
  const merged = mergeServerEntry(readClaudeConfig(path), defaultServerEntry());

  if (flags.dryRun) {
    console.log(formatJsonOutput(merged));
    return;
  }

  writeClaudeConfig(path, merged);
  console.log(`Created default config file: ${path}`);
}

/**
 * Create the config command group
 */
export function createConfigCommand(): Command {
  const config = new Command('config');
  config.description('Configuration management');

  // config list
  config
    .command('list')
    .description('Show the settings resolved from the default file and the environment')
    .option('--show-filename', 'Only show the file name')
    .option('--type <type>', `Configuration to show (${CONFIG_TYPES.join(', ')})`, 'dremioai')
    .action(handled((options: ListOptions) => listConfig(options)));

  // config create
  const create = config.command('create').description('Create settings or LLM client configuration files');

  const dremioCmd = create
    .command('dremioai')
    .description('Create the default settings file')
    .requiredOption('--uri <uri>', 'Dremio URL or PROD / PRODEMEA')
    .requiredOption('--pat <pat>', 'Dremio personal access token; @file keeps the token in that file')
    .option('--project-id <id>', 'Dremio Cloud project id')
    .option('--enable-experimental', 'Allow EXPERIMENTAL tools')
    .option('--allow-dml', 'Allow RunSqlQuery to run statements that change data')
    .option('--dry-run', 'Print the file instead of writing it');
  addModeOption(dremioCmd, 'Server mode (default FOR_DATA_PATTERNS)');
  dremioCmd.action(handled((flags: CreateDremioFlags) => createDremioConfig(flags)));

  create
    .command('claude')
    .description('Register this server in the Claude Desktop configuration')
    .option('--dry-run', 'Print the file instead of writing it')
    .action(handled((flags: CreateClaudeFlags) => createClaudeConfig(flags)));

  return config;
}
