// ============================================================================
// Semantic Search
// ============================================================================

import { z } from 'zod';
import { ToolExecutionError } from '../../errors.js';
import type { DremioConnection } from './client.js';

export const SEARCH_CATEGORIES = [
  'JOB',
  'VIEW',
  'TABLE',
  'FOLDER',
  'UDF',
  'SPACE',
  'REFLECTION',
  'SCRIPT',
  'SOURCE',
] as const;

export type SearchCategory = (typeof SEARCH_CATEGORIES)[number];

export function parseCategory(value: string): SearchCategory {
  const upper = value.trim().toUpperCase();
  const match = SEARCH_CATEGORIES.find(c => c === upper);
  if (!match) {
    throw new ToolExecutionError(
      'malformed-argument',
      `Unknown search category "${value}" (expected one of ${SEARCH_CATEGORIES.join(', ')})`
    );
  }
  return match;
}

const SearchResult = z
  .object({
    category: z.string().optional(),
    catalogObject: z.record(z.unknown()).optional(),
    jobObject: z.record(z.unknown()).optional(),
    scriptObject: z.record(z.unknown()).optional(),
    reflectionObject: z.record(z.unknown()).optional(),
  })
  .passthrough();

export type SearchResult = z.infer<typeof SearchResult>;

const SearchPage = z
  .object({
    results: z.array(SearchResult).default([]),
    nextPageToken: z.string().optional(),
    errorMessage: z.string().optional(),
    moreInfo: z.string().optional(),
  })
  .passthrough();

export interface SearchRequest {
  query: string;
  categories?: SearchCategory[];
  maxResults?: number;
}

export function categoryFilter(categories: readonly SearchCategory[] | undefined): string {
  if (!categories || categories.length === 0) return '';
  return `category in [${categories.map(c => `"${c}"`).join(',')}]`;
}

/** Every page of results for one query */
export async function search(conn: DremioConnection, request: SearchRequest): Promise<SearchResult[]> {
  const results: SearchResult[] = [];
  const body: Record<string, unknown> = {
    query: request.query,
    filter: categoryFilter(request.categories),
    maxResults: request.maxResults ?? 50,
  };

  for (;;) {
    const page = await conn.http.post(`${conn.endpoint}/search`, body, SearchPage);
    if (page.errorMessage) {
      throw new ToolExecutionError('malformed-query', `Search failed: ${page.errorMessage}`);
    }
    if (page.results.length === 0 || page.moreInfo) break;
    results.push(...page.results);
    if (!page.nextPageToken) break;
    body.pageToken = page.nextPageToken;
  }

  return results;
}
