// ============================================================================
// System Prompt
// ============================================================================
// Served as the MCP prompt "System Prompt". Lists only the tools visible
// under the active modes, so the agent is never told about a tool it cannot
// call.
// ============================================================================

import type { RegistrySnapshot } from './tools/registry.js';

export const SYSTEM_PROMPT_NAME = 'System Prompt';

const GUIDANCE = [
  'In general prefer to illustrate results using interactive graphical plots',
  'Use UNNEST instead of FLATTEN for arrays like queriedDatasets',
  "Use ARRAY_TO_STRING([array], ',') to convert arrays to strings",
  'Make sure reserved words like count are enclosed in double quotes',
  'Components in paths to views and tables must be double-quoted.',
  'You must distinguish between user requests that intend to get the result of a SQL query and requests to generate SQL.',
  'You must use correct SQL syntax; you may use EXPLAIN, or run the query with LIMIT 1, to validate it.',
  'You must use the GetDescriptionOfTableOrSchema tool to get the descriptions of multiple tables and schemas before deciding their relevance.',
  'You must consider views and tables in all search results, not just the top 1 or 2.',
  "Consider sampling rows from multiple tables or views to understand what's in the data before deciding what table to use.",
  "If the user prompt is not in English, translate it to English before searching, and respond in the language of the user's prompt.",
  'You must check your answer before finalizing the result.',
  'You must use the GetSchemaOfTable tool to get the schema of a table before running any queries on it.',
];

export function systemPrompt(snapshot: RegistrySnapshot): string {
  const tools = snapshot.visible
    .map(t => `${t.name}: ${t.description.split('\n').join('\n\t')}`)
    .join('\n');

  return [
    'You are a helpful AI assistant with access to several tools for analyzing a Dremio cluster, its data, tables and jobs.',
    'Note:',
    ...GUIDANCE.map(g => `- ${g}`),
    '',
    'Available tools:',
    tools,
  ].join('\n');
}
