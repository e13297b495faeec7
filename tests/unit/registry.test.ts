import { describe, it, expect } from 'vitest';
import { buildRegistry, registryForSettings, toJsonSchema, toListing } from '../../src/tools/registry.js';
import { allTools } from '../../src/tools/index.js';
import { validateSettings } from '../../src/settings/loader.js';
import { TOOL_MODES, type ToolMode } from '../../src/modes.js';
import { ValidationError } from '../../src/errors.js';
import type { ToolDefinition } from '../../src/tools/types.js';
import { mulberry32 } from '../utils/random.js';

function randomModes(rand: () => number, allowEmpty: boolean): ToolMode[] {
  for (;;) {
    const modes = TOOL_MODES.filter(() => rand() < 0.5);
    if (allowEmpty || modes.length > 0) return modes;
  }
}

function fakeTool(name: string, modes: ToolMode[], extra: Partial<ToolDefinition> = {}): ToolDefinition {
  return {
    name,
    description: `${name} description`,
    params: [],
    modes,
    kind: 'tool',
    execute: async () => name,
    ...extra,
  };
}

const names = (defs: readonly ToolDefinition[]): string[] => defs.map(d => d.name);

describe('Tool registry', () => {
  it('shows exactly the tools whose modes intersect the active set', () => {
    const rand = mulberry32(20240611);
    for (let round = 0; round < 200; round++) {
      const table = Array.from({ length: 1 + Math.floor(rand() * 8) }, (_, i) => fakeTool(`tool${i}`, randomModes(rand, false)));
      const active = new Set(randomModes(rand, true));

      const snapshot = buildRegistry(table, active);
      const expected = table.filter(t => t.modes.some(m => active.has(m)));

      expect(names(snapshot.tools)).toEqual(names(expected));
      for (const t of table) {
        expect(snapshot.get(t.name) !== undefined).toBe(expected.includes(t));
      }
    }
  });

  it('freezes the snapshot', () => {
    const snapshot = buildRegistry(allTools, new Set<ToolMode>(['FOR_SELF']));
    expect(Object.isFrozen(snapshot)).toBe(true);
    expect(Object.isFrozen(snapshot.tools)).toBe(true);
  });

  it('separates resources from tools', () => {
    const snapshot = buildRegistry(allTools, new Set<ToolMode>(['FOR_SELF']));
    expect(names(snapshot.resources)).toEqual(['Hints']);
    expect(snapshot.getResource('dremio://hints')?.name).toBe('Hints');
    expect(names(snapshot.tools)).not.toContain('Hints');
    expect(snapshot.list().map(l => l.name)).toEqual(names(snapshot.tools));
  });

  it('looks up tools by name but never resources', () => {
    const snapshot = buildRegistry(allTools, new Set<ToolMode>(['FOR_SELF']));
    expect(snapshot.get('Hints')).toBeUndefined();
    expect(snapshot.get('GetFailedJobDetails')?.name).toBe('GetFailedJobDetails');
  });

  it('hides project tools unless the registry is project scoped', () => {
    const table = [fakeTool('anywhere', ['FOR_SELF']), fakeTool('projectOnly', ['FOR_SELF'], { requiresProjectId: true })];
    const active = new Set<ToolMode>(['FOR_SELF']);

    expect(names(buildRegistry(table, active).tools)).toEqual(['anywhere']);
    expect(names(buildRegistry(table, active, { projectScoped: false }).tools)).toEqual(['anywhere']);
    expect(names(buildRegistry(table, active, { projectScoped: true }).tools)).toEqual(['anywhere', 'projectOnly']);
    expect(buildRegistry(table, new Set<ToolMode>(['FOR_PROMETHEUS']), { projectScoped: true }).tools).toHaveLength(0);
  });

  describe('built-in table', () => {
    const settingsFor = (server_mode: string, enable_experimental = false) =>
      validateSettings({ dremio: { uri: 'PROD', pat: 'test-secret', enable_experimental }, tools: { server_mode } });

    it('exposes the data tools under FOR_DATA_PATTERNS', () => {
      const snapshot = registryForSettings(allTools, settingsFor('FOR_DATA_PATTERNS'));
      expect(names(snapshot.tools)).toEqual([
        'RunSqlQuery',
        'GetUsefulSystemTableNames',
        'GetSchemaOfTable',
        'GetTableOrViewLineage',
        'GetDescriptionOfTableOrSchema',
      ]);
      expect(snapshot.resources).toHaveLength(0);
    });

    it('exposes the metrics tools only under FOR_PROMETHEUS', () => {
      const snapshot = registryForSettings(allTools, settingsFor('FOR_PROMETHEUS'));
      expect(names(snapshot.tools)).toEqual(['GetRelevantMetrics', 'GetMetricSchema', 'RunPromQL']);
    });

    it('hides EXPERIMENTAL tools until the switch is on', () => {
      expect(registryForSettings(allTools, settingsFor('FOR_DATA_PATTERNS,EXPERIMENTAL')).get('SemanticSearch')).toBeUndefined();
      expect(registryForSettings(allTools, settingsFor('FOR_DATA_PATTERNS,EXPERIMENTAL', true)).get('SemanticSearch')?.name).toBe(
        'SemanticSearch'
      );
      expect(registryForSettings(allTools, settingsFor('FOR_DATA_PATTERNS', true)).get('SemanticSearch')).toBeUndefined();
    });

    it('applies the experimental gate to every mode subset', () => {
      const table = TOOL_MODES.map(m => fakeTool(m, [m]));
      for (let mask = 0; mask < 1 << TOOL_MODES.length; mask++) {
        const declared = TOOL_MODES.filter((_, i) => (mask & (1 << i)) !== 0);
        for (const enabled of [false, true]) {
          const snapshot = registryForSettings(table, settingsFor('FOR_SELF', enabled), declared);
          const expected = declared.filter(m => m !== 'EXPERIMENTAL' || enabled);
          expect(names(snapshot.tools)).toEqual(expected);
          expect([...snapshot.activeModes].sort()).toEqual([...expected].sort());
        }
      }
    });

    it('shows BuildUsageReport only with a project id', () => {
      const withoutProject = registryForSettings(allTools, settingsFor('FOR_SELF'));
      expect(withoutProject.get('BuildUsageReport')).toBeUndefined();
      expect(names(withoutProject.tools)).toEqual([
        'RunSqlQuery',
        'GetFailedJobDetails',
        'GetNameOfJobsRecentTable',
        'GetUsefulSystemTableNames',
        'GetSchemaOfTable',
        'GetTableOrViewLineage',
        'GetDescriptionOfTableOrSchema',
      ]);

      const withProject = registryForSettings(
        allTools,
        validateSettings({ dremio: { uri: 'PROD', pat: 'test-secret', project_id: 'p-1' }, tools: { server_mode: 'FOR_SELF' } })
      );
      expect(names(withProject.tools).slice(0, 4)).toEqual([
        'RunSqlQuery',
        'GetFailedJobDetails',
        'GetNameOfJobsRecentTable',
        'BuildUsageReport',
      ]);
      expect(withProject.tools).toHaveLength(8);
    });
  });

  describe('table checks', () => {
    it('rejects duplicate names, empty modes and resources without uri', () => {
      const table = [
        fakeTool('a', ['FOR_SELF']),
        fakeTool('a', ['FOR_SELF']),
        fakeTool('b', []),
        fakeTool('c', ['FOR_SELF'], { kind: 'resource' }),
      ];
      let caught: unknown;
      try {
        buildRegistry(table, new Set<ToolMode>(['FOR_SELF']));
      } catch (err) {
        caught = err;
      }
      expect(caught).toBeInstanceOf(ValidationError);
      expect(caught instanceof ValidationError ? caught.violations : []).toEqual([
        { path: 'a', message: 'duplicate tool name' },
        { path: 'b', message: 'tool declares no modes' },
        { path: 'c', message: 'resource has no uri' },
      ]);
    });
  });

  describe('schemas', () => {
    const tool = fakeTool('t', ['FOR_SELF'], {
      params: [
        { name: 'query', type: 'string', required: true, description: 'SQL' },
        { name: 'names', type: 'string[]', required: false, description: 'Names' },
        { name: 'limit', type: 'integer', required: false, default: 10, description: 'Limit' },
      ],
    });

    it('renders a JSON schema for MCP', () => {
      expect(toJsonSchema(tool)).toEqual({
        type: 'object',
        properties: {
          query: { type: 'string', description: 'SQL' },
          names: { type: 'array', items: { type: 'string' }, description: 'Names' },
          limit: { type: 'integer', description: 'Limit', default: 10 },
        },
        required: ['query'],
        additionalProperties: false,
      });
    });

    it('renders a listing for the CLI', () => {
      expect(toListing(tool).params).toEqual([
        { name: 'query', type: 'string', required: true, description: 'SQL' },
        { name: 'names', type: 'string[]', required: false, description: 'Names' },
        { name: 'limit', type: 'integer', required: false, default: 10, description: 'Limit' },
      ]);
    });
  });
});
