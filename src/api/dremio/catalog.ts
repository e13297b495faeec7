// ============================================================================
// Catalog
// ============================================================================
// Dataset lookup by path or id, lineage graph, and wiki/tag descriptions of
// a dataset and every container above it.
// ============================================================================

import { z } from 'zod';
import { debug } from '../../config.js';
import { ToolExecutionError, errorMessage } from '../../errors.js';
import type { DremioConnection } from './client.js';

export const CatalogEntry = z
  .object({
    id: z.string(),
    path: z.array(z.string()).optional(),
    name: z.string().optional(),
    type: z.string().optional(),
    fields: z
      .array(z.object({ name: z.string(), type: z.object({ name: z.string() }).passthrough() }).passthrough())
      .optional(),
  })
  .passthrough();

export type CatalogEntry = z.infer<typeof CatalogEntry>;

const TagsBody = z.object({ tags: z.array(z.string()).default([]) }).passthrough();
const WikiBody = z.object({ text: z.string().default('') }).passthrough();

const LineageNode = z
  .object({
    id: z.string(),
    path: z.array(z.string()),
    type: z.string().optional(),
    datasetType: z.string().optional(),
    containerType: z.string().optional(),
    createdAt: z.string().optional(),
  })
  .passthrough();

export const LineageGraph = z.object({
  sources: z.array(LineageNode).default([]),
  parents: z.array(LineageNode).default([]),
  children: z.array(LineageNode).default([]),
});

export type LineageGraph = z.infer<typeof LineageGraph>;

export type DatasetSchema = CatalogEntry & {
  tags?: string[];
  description?: string;
};

export interface Description {
  description?: string;
  tags?: string[];
}

/**
 * Split a dotted name into path components. Double quotes protect dots and
 * a doubled quote inside quotes is a literal quote:
 *   `space."my.folder".t` -> ['space', 'my.folder', 't']
 */
export function splitPath(name: string): string[] {
  const parts: string[] = [];
  let current = '';
  let quoted = false;

  for (let i = 0; i < name.length; i++) {
    const ch = name[i];
    if (quoted) {
      if (ch === '"' && name[i + 1] === '"') {
        current += '"';
        i++;
      } else if (ch === '"') {
        quoted = false;
      } else {
        current += ch;
      }
    } else if (ch === '"') {
      quoted = true;
    } else if (ch === '.') {
      parts.push(current);
      current = '';
    } else {
      current += ch;
    }
  }
  parts.push(current);

  const trimmed = parts.map(p => p.trim());
  if (quoted || trimmed.some(p => p.length === 0)) {
    throw new ToolExecutionError('malformed-argument', `Invalid dataset name: ${name}`);
  }
  return trimmed;
}

/** `a.b` -> `"a"."b"` */
export function quotePath(path: readonly string[]): string {
  return path.map(p => `"${p.replace(/"/g, '""')}"`).join('.');
}

export async function getEntryByPath(conn: DremioConnection, path: readonly string[]): Promise<CatalogEntry> {
  const encoded = path.map(encodeURIComponent).join('/');
  return conn.http.get(`${conn.endpoint}/catalog/by-path/${encoded}`, CatalogEntry);
}

export async function getEntryById(conn: DremioConnection, id: string): Promise<CatalogEntry> {
  return conn.http.get(`${conn.endpoint}/catalog/${encodeURIComponent(id)}`, CatalogEntry);
}

async function optionalCollaboration<T>(load: () => Promise<T>, what: string): Promise<T | undefined> {
  try {
    return await load();
  } catch (err) {
    // Entries without a wiki or tags answer 404
    if (!(err instanceof ToolExecutionError) || err.category !== 'malformed-argument') throw err;
    debug(`Catalog: no ${what}: ${errorMessage(err)}`);
    return undefined;
  }
}

/** Entry plus its tags and wiki text, when it has any */
export async function getSchema(conn: DremioConnection, path: readonly string[]): Promise<DatasetSchema> {
  const entry = await getEntryByPath(conn, path);
  const base = `${conn.endpoint}/catalog/${encodeURIComponent(entry.id)}/collaboration`;
  const [tags, wiki] = await Promise.all([
    optionalCollaboration(() => conn.http.get(`${base}/tag`, TagsBody), 'tags'),
    optionalCollaboration(() => conn.http.get(`${base}/wiki`, WikiBody), 'wiki'),
  ]);

  const schema: DatasetSchema = { ...entry };
  if (tags && tags.tags.length > 0) schema.tags = tags.tags;
  if (wiki && wiki.text.length > 0) schema.description = wiki.text;
  return schema;
}

/** Lineage by dotted name or catalog id */
export async function getLineage(conn: DremioConnection, nameOrId: string): Promise<LineageGraph> {
  let id = nameOrId;
  if (nameOrId.includes('.')) {
    id = (await getEntryByPath(conn, splitPath(nameOrId))).id;
  }
  return conn.http.get(`${conn.endpoint}/catalog/${encodeURIComponent(id)}/graph`, LineageGraph);
}

/**
 * Descriptions of the named datasets and of every container above them,
 * keyed by quoted path. Entries without wiki text or tags are left out.
 */
export async function getDescriptions(
  conn: DremioConnection,
  paths: readonly (readonly string[])[]
): Promise<Record<string, Description>> {
  const result: Record<string, Description> = {};
  const seen = new Set<string>();
  let pending = paths.filter(p => {
    const key = quotePath(p);
    if (seen.has(key)) return false;
    seen.add(key);
    return true;
  });

  while (pending.length > 0) {
    const schemas = await Promise.all(pending.map(p => getSchema(conn, p)));
    const next: string[][] = [];

    schemas.forEach((schema, i) => {
      const path = schema.path ?? [...pending[i]];
      if (schema.description || schema.tags) {
        const entry: Description = {};
        if (schema.description) entry.description = schema.description;
        if (schema.tags) entry.tags = schema.tags;
        result[quotePath(path)] = entry;
      }
      for (let len = 1; len < path.length; len++) {
        const parent = path.slice(0, len);
        const key = quotePath(parent);
        if (!seen.has(key)) {
          seen.add(key);
          next.push(parent);
        }
      }
    });

    pending = next;
  }

  return result;
}
