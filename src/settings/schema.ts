// ============================================================================
// Settings Schema
// ============================================================================
// The settings tree, declared once in zod. Every object is strict, so a typo
// in the config file is an error rather than a silently ignored key.
//
// Mixed-shape fields are normalized here and nowhere else:
//   dremio.uri        literal URL | PROD | PRODEMEA      -> literal URL
//   tools.server_mode name | "A,B" | [names] | integer    -> ToolMode[]
// Secret-shaped fields are marked with secretString() and resolved by
// validateSettings() (see loader.ts) right after the shape check.
// ============================================================================

import { z } from 'zod';
import { parseModeSpec, type ToolMode } from '../modes.js';
import { ValidationError } from '../errors.js';

// ============================================================================
// Field Helpers
// ============================================================================

const secretSchemas = new WeakSet<z.ZodTypeAny>();

/** A string that may be a literal or an `@path` secret reference */
function secretString(): z.ZodString {
  const schema = z.string().min(1);
  secretSchemas.add(schema);
  return schema;
}

/** Symbolic endpoints of the hosted platform */
export const CLOUD_URIS = {
  PROD: 'https://api.dremio.cloud',
  PRODEMEA: 'https://api.eu.dremio.cloud',
} as const;

export type CloudUri = keyof typeof CLOUD_URIS;

export function isCloudUri(value: string): value is CloudUri {
  return Object.prototype.hasOwnProperty.call(CLOUD_URIS, value);
}

function literalUrl(value: string, ctx: z.RefinementCtx, allowSymbolic: boolean): string {
  const upper = value.trim().toUpperCase();
  if (allowSymbolic && isCloudUri(upper)) {
    return CLOUD_URIS[upper];
  }

  let url: URL;
  try {
    url = new URL(value.trim());
  } catch {
    ctx.addIssue({
      code: z.ZodIssueCode.custom,
      message: allowSymbolic
        ? `"${value}" is neither a URL nor one of ${Object.keys(CLOUD_URIS).join(', ')}`
        : `"${value}" is not a URL`,
    });
    return z.NEVER;
  }

  if (url.protocol !== 'http:' && url.protocol !== 'https:') {
    ctx.addIssue({
      code: z.ZodIssueCode.custom,
      message: `unsupported URL scheme "${url.protocol}" (expected http or https)`,
    });
    return z.NEVER;
  }

  return value.trim().replace(/\/+$/, '');
}

const endpointUri = z.string().transform((v, ctx) => literalUrl(v, ctx, true));
const httpUri = z.string().transform((v, ctx) => literalUrl(v, ctx, false));

const modeSpec = z
  .union([z.string(), z.number(), z.array(z.string())])
  .default('FOR_SELF')
  .transform((spec, ctx): ToolMode[] => {
    try {
      return parseModeSpec(spec);
    } catch (err) {
      if (!(err instanceof ValidationError)) throw err;
      for (const v of err.violations) {
        ctx.addIssue({ code: z.ZodIssueCode.custom, message: v.message });
      }
      return z.NEVER;
    }
  });

// ============================================================================
// Sections
// ============================================================================

export const DremioSchema = z
  .object({
    uri: endpointUri,
    pat: secretString().optional(),
    project_id: z.string().min(1).optional(),
    enable_experimental: z.boolean().default(false),
    allow_dml: z.boolean().default(false),
  })
  .strict();

export const ToolsSchema = z
  .object({
    server_mode: modeSpec,
  })
  .strict();

export const PrometheusSchema = z
  .object({
    uri: httpUri,
    token: secretString(),
  })
  .strict();

const OpenAiSchema = z
  .object({
    api_key: secretString().optional(),
    model: z.string().default('gpt-4o'),
    org: z.string().optional(),
  })
  .strict();

const OllamaSchema = z
  .object({
    model: z.string().default('llama3.1'),
  })
  .strict();

const AnthropicSchema = z
  .object({
    api_key: secretString().optional(),
    chat_model: z.string().optional(),
  })
  .strict();

export const LangChainSchema = z
  .object({
    llm: z.enum(['ollama', 'openai']).optional(),
    openai: OpenAiSchema.optional(),
    ollama: OllamaSchema.optional(),
  })
  .strict();

export const BeeAISchema = z
  .object({
    mcp_server: z
      .object({
        command: z.string().min(1),
        args: z.array(z.string()).default([]),
        env: z.record(z.string()).default({}),
      })
      .strict()
      .optional(),
    sliding_memory_size: z.number().int().positive().default(10),
    anthropic: AnthropicSchema.optional(),
    openai: OpenAiSchema.optional(),
    ollama: OllamaSchema.optional(),
  })
  .strict();

export const SettingsSchema = z
  .object({
    dremio: DremioSchema.optional(),
    tools: ToolsSchema.default({}),
    prometheus: PrometheusSchema.optional(),
    langchain: LangChainSchema.optional(),
    beeai: BeeAISchema.optional(),
  })
  .strict();

/** Fully resolved settings: literal URLs, literal secrets, named modes */
export type Settings = z.output<typeof SettingsSchema>;

/** What a config file, the environment or an override may contain */
export type RawSettings = z.input<typeof SettingsSchema>;

export type DremioSettings = NonNullable<Settings['dremio']>;
export type PrometheusSettings = NonNullable<Settings['prometheus']>;

// ============================================================================
// Leaf Enumeration
// ============================================================================
// Used by the environment layer (one variable per leaf) and by the secret
// resolution pass.
// ============================================================================

export type LeafKind = 'string' | 'number' | 'boolean' | 'list' | 'json';

export interface SettingsLeaf {
  path: string[];
  kind: LeafKind;
  secret: boolean;
}

function unwrap(schema: z.ZodTypeAny): { inner: z.ZodTypeAny; secret: boolean } {
  let current = schema;
  let secret = secretSchemas.has(current);
  for (;;) {
    if (current instanceof z.ZodOptional || current instanceof z.ZodNullable) {
      current = current.unwrap();
    } else if (current instanceof z.ZodDefault) {
      current = current.removeDefault();
    } else if (current instanceof z.ZodEffects) {
      current = current.innerType();
    } else {
      return { inner: current, secret };
    }
    secret = secret || secretSchemas.has(current);
  }
}

function leafKind(schema: z.ZodTypeAny): LeafKind {
  if (schema instanceof z.ZodBoolean) return 'boolean';
  if (schema instanceof z.ZodNumber) return 'number';
  if (schema instanceof z.ZodArray) return 'list';
  if (schema instanceof z.ZodRecord) return 'json';
  return 'string';
}

function collectLeaves(schema: z.ZodTypeAny, prefix: string[], out: SettingsLeaf[]): void {
  const { inner, secret } = unwrap(schema);
  if (inner instanceof z.ZodObject) {
    const shape: Record<string, z.ZodTypeAny> = inner.shape;
    for (const [key, child] of Object.entries(shape)) {
      collectLeaves(child, [...prefix, key], out);
    }
    return;
  }
  out.push({ path: prefix, kind: leafKind(inner), secret });
}

let leafCache: SettingsLeaf[] | undefined;

export function settingsLeaves(): SettingsLeaf[] {
  if (!leafCache) {
    const leaves: SettingsLeaf[] = [];
    collectLeaves(SettingsSchema, [], leaves);
    leafCache = leaves;
  }
  return leafCache;
}
