// ============================================================================
// Catalog Domain Tools
// ============================================================================
// Table discovery: system tables, schemas, lineage, descriptions and the
// experimental semantic search.
// ============================================================================

import { connect } from '../../api/dremio/client.js';
import { getSchema, getLineage, getDescriptions, splitPath } from '../../api/dremio/catalog.js';
import { search, parseCategory } from '../../api/dremio/search.js';
import { stringArg, optionalStringArg, stringListArg } from '../arguments.js';
import type { ToolDefinition } from '../types.js';

export interface SystemTable {
  table_name: string;
  description: string;
}

export const USEFUL_SYSTEM_TABLES: SystemTable[] = [
  {
    table_name: 'information_schema."tables"',
    description:
      'Information about tables in this cluster. Be sure to filter out SYSTEM_TABLE for looking at user tables. ' +
      'You must encapsulate TABLES in double quotes.',
  },
  {
    table_name: 'information_schema."columns"',
    description: 'Column names and types of every table and view. You must encapsulate COLUMNS in double quotes.',
  },
  {
    table_name: 'sys.reflections',
    description: 'Reflections defined in the cluster with their status and the datasets they accelerate.',
  },
];

export const getUsefulSystemTableNamesTool: ToolDefinition = {
  name: 'GetUsefulSystemTableNames',
  description: [
    'Gets the names of system tables in the dremio cluster, useful for various analysis.',
    'Use the GetSchemaOfTable tool to get the schema of the table',
  ].join('\n'),
  params: [],
  modes: ['FOR_SELF', 'FOR_DATA_PATTERNS'],
  kind: 'tool',
  execute: async () => USEFUL_SYSTEM_TABLES,
};

export const getSchemaOfTableTool: ToolDefinition = {
  name: 'GetSchemaOfTable',
  description: [
    'Gets the schema of the given table.',
    'Returns the table path, its fields as "name: type" lines, and its description and tags when present.',
  ].join('\n'),
  params: [
    { name: 'table_name', type: 'string', required: true, description: 'Name of the table, including the schema' },
  ],
  modes: ['FOR_SELF', 'FOR_DATA_PATTERNS'],
  kind: 'tool',
  execute: async (args, { settings, signal }) => {
    const conn = connect(settings, signal);
    const schema = await getSchema(conn, splitPath(stringArg(args, 'table_name')));
    return {
      id: schema.id,
      path: (schema.path ?? []).join('.'),
      fields: (schema.fields ?? []).map(f => `${f.name}: ${f.type.name}`).join('\n'),
      tags: (schema.tags ?? []).join(', '),
      description: schema.description ?? '',
    };
  },
};

export const getTableOrViewLineageTool: ToolDefinition = {
  name: 'GetTableOrViewLineage',
  description: 'Finds the lineage (sources, parents and children) of a table or view in the Dremio cluster',
  params: [
    {
      name: 'table_name',
      type: 'string',
      required: true,
      description: 'Name of the table or view, including the schema. Quote components that contain special characters',
    },
  ],
  modes: ['FOR_SELF', 'FOR_DATA_PATTERNS'],
  kind: 'tool',
  execute: async (args, { settings, signal }) => {
    const conn = connect(settings, signal);
    return getLineage(conn, stringArg(args, 'table_name'));
  },
};

export const getDescriptionOfTableOrSchemaTool: ToolDefinition = {
  name: 'GetDescriptionOfTableOrSchema',
  description: [
    'Given one or more table or schema names, returns the description and tags of each,',
    'and of every parent schema, keyed by quoted path.',
  ].join('\n'),
  params: [
    { name: 'name', type: 'string[]', required: true, description: 'Names of tables or schemas' },
  ],
  modes: ['FOR_SELF', 'FOR_DATA_PATTERNS'],
  kind: 'tool',
  execute: async (args, { settings, signal }) => {
    const paths = stringListArg(args, 'name').map(splitPath);
    const conn = connect(settings, signal);
    return getDescriptions(conn, paths);
  },
};

export const semanticSearchTool: ToolDefinition = {
  name: 'SemanticSearch',
  description: 'Runs a semantic search on the Dremio cluster using the given query',
  params: [
    { name: 'query', type: 'string', required: true, description: 'The query to run' },
    {
      name: 'category',
      type: 'string',
      required: false,
      description: 'One of TABLE, VIEW, JOB, SOURCE, FOLDER. Searches all categories if unspecified',
    },
  ],
  modes: ['EXPERIMENTAL'],
  kind: 'tool',
  execute: async (args, { settings, signal }) => {
    const category = optionalStringArg(args, 'category');
    const categories = category ? [parseCategory(category)] : undefined;
    const conn = connect(settings, signal);
    const results = await search(conn, { query: stringArg(args, 'query'), categories });
    return { results };
  },
};

export const catalogTools: ToolDefinition[] = [
  getUsefulSystemTableNamesTool,
  getSchemaOfTableTool,
  getTableOrViewLineageTool,
  getDescriptionOfTableOrSchemaTool,
  semanticSearchTool,
];
