// ============================================================================
// Data Platform Connection
// ============================================================================

import { ToolExecutionError } from '../../errors.js';
import { HttpClient } from '../http.js';
import type { DremioSettings, Settings } from '../../settings/schema.js';

export interface DremioConnection {
  http: HttpClient;
  /** `/v0/projects/<id>` on the hosted platform, `/api/v3` otherwise */
  endpoint: string;
  settings: DremioSettings;
}

export function projectEndpoint(dremio: DremioSettings): string {
  return dremio.project_id ? `/v0/projects/${encodeURIComponent(dremio.project_id)}` : '/api/v3';
}

/**
 * Connection for the settings in scope.
 *
 * @throws ToolExecutionError when the connection is not configured
 */
export function connect(settings: Settings, signal?: AbortSignal): DremioConnection {
  const dremio = settings.dremio;
  if (!dremio) {
    throw new ToolExecutionError('upstream-unreachable', 'dremio.uri is not configured');
  }
  if (!dremio.pat) {
    throw new ToolExecutionError('permission-denied', 'dremio.pat is not configured');
  }
  return {
    http: new HttpClient({ baseUrl: dremio.uri, token: dremio.pat, signal }),
    endpoint: projectEndpoint(dremio),
    settings: dremio,
  };
}
