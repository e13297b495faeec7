// ============================================================================
// Error Taxonomy
// ============================================================================
// Every failure the core reports is one of these. `code` is stable and is what
// the MCP layer and the CLI surface to callers.
// ============================================================================

export type ErrorCode =
  | 'RESOLUTION_ERROR'
  | 'VALIDATION_ERROR'
  | 'NOT_FOUND'
  | 'TOOL_EXECUTION_ERROR'
  | 'CANCELLED';

export abstract class McpCoreError extends Error {
  abstract readonly code: ErrorCode;

  /** JSON body sent back to protocol callers */
  toJSON(): Record<string, unknown> {
    return { error: this.message, code: this.code };
  }
}

/**
 * A secret reference (`@path`) could not be read. Carries the field and the
 * path, never the value.
 */
export class ResolutionError extends McpCoreError {
  readonly code = 'RESOLUTION_ERROR';

  constructor(
    public readonly field: string,
    public readonly path: string,
    reason?: string
  ) {
    super(`Cannot resolve secret for ${field} from ${path}${reason ? `: ${reason}` : ''}`);
    this.name = 'ResolutionError';
  }

  override toJSON(): Record<string, unknown> {
    return { ...super.toJSON(), field: this.field, path: this.path };
  }
}

export interface Violation {
  /** Dotted field path, or parameter name for tool arguments */
  path: string;
  message: string;
}

export class ValidationError extends McpCoreError {
  readonly code = 'VALIDATION_ERROR';

  constructor(
    public readonly violations: Violation[],
    public readonly context = 'Validation failed'
  ) {
    super(`${context}: ${violations.map(v => `${v.path}: ${v.message}`).join('; ')}`);
    this.name = 'ValidationError';
  }

  override toJSON(): Record<string, unknown> {
    return { ...super.toJSON(), violations: this.violations };
  }
}

/**
 * Unknown tool, or a tool hidden by the active modes. The two cases are
 * deliberately the same error.
 */
export class NotFoundError extends McpCoreError {
  readonly code = 'NOT_FOUND';

  constructor(public readonly toolName: string, kind: 'Tool' | 'Resource' = 'Tool') {
    super(`${kind} not found: ${toolName}`);
    this.name = 'NotFoundError';
  }

  override toJSON(): Record<string, unknown> {
    return { ...super.toJSON(), tool: this.toolName };
  }
}

export type ToolErrorCategory =
  | 'upstream-unreachable'
  | 'permission-denied'
  | 'malformed-query'
  | 'malformed-argument'
  | 'mutation-not-allowed';

export class ToolExecutionError extends McpCoreError {
  readonly code = 'TOOL_EXECUTION_ERROR';

  constructor(
    public readonly category: ToolErrorCategory,
    message: string,
    cause?: unknown
  ) {
    super(message, cause === undefined ? undefined : { cause });
    this.name = 'ToolExecutionError';
  }

  override toJSON(): Record<string, unknown> {
    return { ...super.toJSON(), category: this.category };
  }
}

export class CancellationError extends McpCoreError {
  readonly code = 'CANCELLED';

  constructor(public readonly toolName: string, reason?: string) {
    super(`Invocation of ${toolName} was cancelled${reason ? `: ${reason}` : ''}`);
    this.name = 'CancellationError';
  }

  override toJSON(): Record<string, unknown> {
    return { ...super.toJSON(), tool: this.toolName };
  }
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
