// ============================================================================
// HTTP Client
// ============================================================================
// Thin JSON client over global fetch. Upstream failures are mapped to the
// ToolExecutionError categories here so tools never see raw statuses.
// ============================================================================

import { z } from 'zod';
import { debug } from '../config.js';
import { ToolExecutionError, errorMessage, type ToolErrorCategory } from '../errors.js';

export type QueryParams = Record<string, string | number | undefined>;

export interface HttpClientOptions {
  baseUrl: string;
  token?: string;
  signal?: AbortSignal;
}

/** Category for a non-2xx status */
export function categorizeStatus(status: number): ToolErrorCategory {
  if (status === 401 || status === 403) return 'permission-denied';
  if (status === 404) return 'malformed-argument';
  if (status >= 400 && status < 500) return 'malformed-query';
  return 'upstream-unreachable';
}

const UpstreamErrorBody = z
  .object({
    errorMessage: z.string().optional(),
    error: z.string().optional(),
    message: z.string().optional(),
  })
  .passthrough();

function parseJson(text: string): unknown {
  try {
    return JSON.parse(text);
  } catch {
    return undefined;
  }
}

function upstreamMessage(text: string): string | undefined {
  const parsed = UpstreamErrorBody.safeParse(parseJson(text));
  if (parsed.success) {
    const message = parsed.data.errorMessage ?? parsed.data.error ?? parsed.data.message;
    if (message) return message;
  }
  const trimmed = text.trim();
  return trimmed.length > 0 ? trimmed.slice(0, 500) : undefined;
}

export class HttpClient {
  private readonly baseUrl: string;
  private readonly token?: string;
  private readonly signal?: AbortSignal;

  constructor(options: HttpClientOptions) {
    this.baseUrl = options.baseUrl.replace(/\/+$/, '');
    this.token = options.token;
    this.signal = options.signal;
  }

  url(path: string, params?: QueryParams): string {
    const url = new URL(`${this.baseUrl}${path}`);
    for (const [key, value] of Object.entries(params ?? {})) {
      if (value !== undefined) url.searchParams.set(key, String(value));
    }
    return url.toString();
  }

  async get<T>(path: string, schema: z.ZodType<T, z.ZodTypeDef, unknown>, params?: QueryParams): Promise<T> {
    return this.request('GET', this.url(path, params), schema);
  }

  async post<T>(path: string, body: unknown, schema: z.ZodType<T, z.ZodTypeDef, unknown>): Promise<T> {
    return this.request('POST', this.url(path), schema, body);
  }

  private async request<T>(
    method: 'GET' | 'POST',
    url: string,
    schema: z.ZodType<T, z.ZodTypeDef, unknown>,
    body?: unknown
  ): Promise<T> {
    const headers: Record<string, string> = { Accept: 'application/json' };
    if (this.token) headers.Authorization = `Bearer ${this.token}`;
    if (body !== undefined) headers['Content-Type'] = 'application/json';

    debug(`HTTP ${method} ${url}`);

    let response: Response;
    try {
      response = await fetch(url, {
        method,
        headers,
        body: body === undefined ? undefined : JSON.stringify(body),
        signal: this.signal,
      });
    } catch (err) {
      if (this.signal?.aborted) throw err;
      throw new ToolExecutionError('upstream-unreachable', `Cannot reach ${url}: ${errorMessage(err)}`, err);
    }

    const text = await response.text();
    if (!response.ok) {
      const detail = upstreamMessage(text);
      throw new ToolExecutionError(
        categorizeStatus(response.status),
        `${method} ${url} returned ${response.status}${detail ? `: ${detail}` : ''}`
      );
    }

    let json: unknown;
    try {
      json = text.length > 0 ? JSON.parse(text) : {};
    } catch (err) {
      throw new ToolExecutionError('upstream-unreachable', `${method} ${url} returned invalid JSON`, err);
    }

    const parsed = schema.safeParse(json);
    if (!parsed.success) {
      const issues = parsed.error.issues.map(i => `${i.path.join('.') || '(root)'}: ${i.message}`).join('; ');
      throw new ToolExecutionError('upstream-unreachable', `${method} ${url} returned an unexpected body: ${issues}`);
    }
    return parsed.data;
  }
}
