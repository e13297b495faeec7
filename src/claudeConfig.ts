// ============================================================================
// Claude Desktop Configuration
// ============================================================================
// `config create claude` registers this server under mcpServers.Dremio in
// claude_desktop_config.json, keeping every other entry of the file.
// ============================================================================

import { existsSync, mkdirSync, readFileSync, writeFileSync } from 'fs';
import { homedir } from 'os';
import { dirname, join } from 'path';
import { fileURLToPath } from 'url';
import { z } from 'zod';
import { log } from './config.js';
import { ValidationError, errorMessage } from './errors.js';

export const CLAUDE_SERVER_KEY = 'Dremio';

const McpServerEntry = z
  .object({
    command: z.string(),
    args: z.array(z.string()).default([]),
  })
  .passthrough();

const ClaudeConfig = z
  .object({
    mcpServers: z.record(McpServerEntry).default({}),
  })
  .passthrough();

export type ClaudeConfig = z.output<typeof ClaudeConfig>;
export type McpServerEntry = z.output<typeof McpServerEntry>;

export function claudeConfigPath(
  platform: NodeJS.Platform = process.platform,
  env: NodeJS.ProcessEnv = process.env
): string {
  switch (platform) {
    case 'win32':
      return join(homedir(), 'AppData', 'Roaming', 'Claude', 'claude_desktop_config.json');
    case 'darwin':
      return join(homedir(), 'Library', 'Application Support', 'Claude', 'claude_desktop_config.json');
    default:
      return join(env.XDG_CONFIG_HOME || join(homedir(), '.config'), 'Claude', 'claude_desktop_config.json');
  }
}

/** Launch entry pointing at the built CLI next to this module */
export function defaultServerEntry(): McpServerEntry {
  const entry = fileURLToPath(new URL('./server.js', import.meta.url));
  return { command: process.execPath, args: [entry, 'run'] };
}

export function readClaudeConfig(path: string): ClaudeConfig {
  if (!existsSync(path)) return { mcpServers: {} };

  let raw: unknown;
  try {
    raw = JSON.parse(readFileSync(path, 'utf-8'));
  } catch (err) {
    throw new ValidationError([{ path: '(file)', message: `${path}: ${errorMessage(err)}` }], 'Invalid Claude config');
  }

  const parsed = ClaudeConfig.safeParse(raw);
  if (!parsed.success) {
    throw new ValidationError(
      parsed.error.issues.map(i => ({ path: i.path.join('.') || '(root)', message: i.message })),
      'Invalid Claude config'
    );
  }
  return parsed.data;
}

export function mergeServerEntry(config: ClaudeConfig, entry: McpServerEntry): ClaudeConfig {
  return { ...config, mcpServers: { ...config.mcpServers, [CLAUDE_SERVER_KEY]: entry } };
}

export function writeClaudeConfig(path: string, config: ClaudeConfig): void {
  mkdirSync(dirname(path), { recursive: true });
  writeFileSync(path, JSON.stringify(config, null, 2) + '\n', 'utf-8');
  log(`Claude: wrote ${path}`);
}
