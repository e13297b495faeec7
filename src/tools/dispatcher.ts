// ============================================================================
// Tool Invocation Dispatcher
// ============================================================================
// name + raw arguments -> DispatchOutcome. Every failure is captured in the
// outcome; dispatch() itself never rejects. No retries, no caching: each
// call reaches the tool exactly once or not at all.
// ============================================================================

import { debug, logError } from '../config.js';
import {
  McpCoreError,
  NotFoundError,
  CancellationError,
  ToolExecutionError,
  errorMessage,
} from '../errors.js';
import { validateArguments } from './arguments.js';
import type { RegistrySnapshot } from './registry.js';
import type { Settings } from '../settings/schema.js';
import type { ToolDefinition, ToolArgs } from './types.js';

export interface DispatchOptions {
  settings: Settings;
  signal?: AbortSignal;
}

interface OutcomeBase {
  tool: string;
  durationMs: number;
}

export type DispatchOutcome =
  | (OutcomeBase & { status: 'success'; result: unknown })
  | (OutcomeBase & { status: 'failure'; error: McpCoreError })
  | (OutcomeBase & { status: 'cancelled'; error: CancellationError });

type Settled =
  | { kind: 'value'; value: unknown }
  | { kind: 'error'; error: unknown }
  | { kind: 'aborted' };

function abortReason(signal: AbortSignal): string | undefined {
  const reason: unknown = signal.reason;
  if (reason instanceof Error && reason.name !== 'AbortError') return reason.message;
  if (typeof reason === 'string') return reason;
  return undefined;
}

/**
 * Run `execute` until it settles or `signal` aborts, whichever comes first.
 * A late result or rejection is observed and dropped.
 */
function settle(
  def: ToolDefinition,
  args: ToolArgs,
  settings: Settings,
  signal: AbortSignal
): Promise<Settled> {
  return new Promise<Settled>(resolve => {
    const onAbort = (): void => resolve({ kind: 'aborted' });
    signal.addEventListener('abort', onAbort, { once: true });

    void Promise.resolve()
      .then(() => def.execute(args, { settings, signal }))
      .then(
        value => resolve({ kind: 'value', value }),
        (error: unknown) => {
          if (signal.aborted) {
            debug(`Dispatch: ${def.name} rejected after cancellation: ${errorMessage(error)}`);
          }
          resolve({ kind: 'error', error });
        }
      )
      .finally(() => signal.removeEventListener('abort', onAbort));
  });
}

function toCoreError(name: string, error: unknown): McpCoreError {
  if (error instanceof McpCoreError) return error;
  logError(`Dispatch: ${name} failed unexpectedly:`, error);
  return new ToolExecutionError('upstream-unreachable', errorMessage(error), error);
}

/**
 * Validate and execute a located definition; `name` labels the outcome and
 * a missing definition is reported as not found.
 */
async function invoke(
  def: ToolDefinition | undefined,
  name: string,
  notFound: () => NotFoundError,
  rawArgs: unknown,
  options: DispatchOptions
): Promise<DispatchOutcome> {
  const start = Date.now();
  const signal = options.signal ?? new AbortController().signal;
  const elapsed = (): number => Date.now() - start;

  const cancelled = (): DispatchOutcome => ({
    status: 'cancelled',
    tool: name,
    durationMs: elapsed(),
    error: new CancellationError(name, abortReason(signal)),
  });

  if (signal.aborted) return cancelled();

  if (!def) {
    return { status: 'failure', tool: name, durationMs: elapsed(), error: notFound() };
  }

  let args: ToolArgs;
  try {
    args = validateArguments(def.params, rawArgs);
  } catch (err) {
    return { status: 'failure', tool: name, durationMs: elapsed(), error: toCoreError(name, err) };
  }

  const settled = await settle(def, args, options.settings, signal);

  // Anything that lands after the abort is discarded
  if (settled.kind === 'aborted' || signal.aborted) return cancelled();

  if (settled.kind === 'error') {
    return { status: 'failure', tool: name, durationMs: elapsed(), error: toCoreError(name, settled.error) };
  }
  return { status: 'success', tool: name, durationMs: elapsed(), result: settled.value };
}

/**
 * Locate, validate and execute one tool invocation. Resources are not
 * reachable by name.
 *
 * Hidden and unknown tools produce the same NotFoundError, so tools outside
 * the caller's modes cannot be discovered by name.
 */
export function dispatch(
  snapshot: RegistrySnapshot,
  name: string,
  rawArgs: unknown,
  options: DispatchOptions
): Promise<DispatchOutcome> {
  return invoke(snapshot.get(name), name, () => new NotFoundError(name), rawArgs, options);
}

/** Read a visible resource by URI; the outcome is labelled with the URI */
export function dispatchResource(
  snapshot: RegistrySnapshot,
  uri: string,
  options: DispatchOptions
): Promise<DispatchOutcome> {
  return invoke(snapshot.getResource(uri), uri, () => new NotFoundError(uri, 'Resource'), {}, options);
}
