// ============================================================================
// Tools Aggregator
// ============================================================================
// The static tool table. Domains declare their definitions; the registry
// decides which of them a given settings tree can see.
// ============================================================================

import type { ToolDefinition } from './types.js';
import { sqlTools } from './sql/index.js';
import { jobsTools } from './jobs/index.js';
import { catalogTools } from './catalog/index.js';
import { metricsTools } from './metrics/index.js';

export const allTools: readonly ToolDefinition[] = Object.freeze([
  ...sqlTools,
  ...jobsTools,
  ...catalogTools,
  ...metricsTools,
]);
