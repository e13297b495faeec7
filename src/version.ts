// ============================================================================
// Version Info
// ============================================================================

import { readFileSync } from 'fs';
import { fileURLToPath } from 'url';
import { dirname, join } from 'path';
import { z } from 'zod';

const PackageJson = z.object({
  name: z.string().default('dremio-mcp-server'),
  version: z.string().default('0.0.0'),
});

const __filename = fileURLToPath(import.meta.url);
const __dirname = dirname(__filename);

function readPackageJson(path: string): unknown {
  try {
    return JSON.parse(readFileSync(path, 'utf-8'));
  } catch {
    return undefined;
  }
}

function getVersion(): { version: string; name: string } {
  // src/ and dist/ both sit one level below package.json
  const parsed = PackageJson.safeParse(readPackageJson(join(__dirname, '..', 'package.json')));
  return parsed.success ? parsed.data : { version: '0.1.0', name: 'dremio-mcp-server' };
}

export const PKG = getVersion();
