/**
 * Parallel dispatcher: fans one prompt out to every council entry.
 *
 * Duplicated model ids are separate calls, told apart by instanceIndex.
 * Results come back in completion order; a failed slot is reported and dropped.
 */

import { GatewayError, TotalStageFailure, errorMessage } from './errors.js';
import type { GatewayReply, ModelGateway, ModelResponse, StageName } from './types.js';

export const DEFAULT_TIMEOUT_MS = 120_000;

export interface DispatchChunk {
  /** Position of the entry in the requested model list */
  slot: number;
  modelId: string;
  instanceIndex: number;
  text: string;
}

export interface CallFailure {
  slot: number;
  modelId: string;
  instanceIndex: number;
  error: GatewayError;
}

export interface DispatchOptions {
  stage: StageName;
  timeoutMs?: number;
  signal?: AbortSignal;
  /** When set, calls are streamed and every chunk is forwarded */
  onChunk?: (chunk: DispatchChunk) => void;
  onFailure?: (failure: CallFailure) => void;
}

export interface DispatchResult {
  responses: ModelResponse[];
  attempted: number;
  failures: CallFailure[];
}

/** instanceIndex for each entry: how many times the same id appeared before it. */
export function instanceIndices(models: readonly string[]): number[] {
  const seen = new Map<string, number>();
  return models.map((model) => {
    const n = seen.get(model) ?? 0;
    seen.set(model, n + 1);
    return n;
  });
}

function toGatewayError(err: unknown, modelId: string): GatewayError {
  if (err instanceof GatewayError) return err;
  return new GatewayError(`${modelId}: ${errorMessage(err)}`, modelId, 'transport');
}

/**
 * One gateway call bounded by its own timeout and the caller's signal.
 * The race makes the cutoff hold even if the gateway ignores its signal, and
 * deltas arriving after the call settled are dropped.
 */
export async function invokeWithDeadline(
  gateway: ModelGateway,
  modelId: string,
  prompt: string,
  timeoutMs: number,
  parent?: AbortSignal,
  onDelta?: (delta: string) => void,
): Promise<GatewayReply> {
  const controller = new AbortController();
  let settled = false;
  const forward = onDelta
    ? (delta: string) => {
        if (!settled && !controller.signal.aborted) onDelta(delta);
      }
    : undefined;
  let timer: ReturnType<typeof setTimeout> | undefined;
  let onAbort: (() => void) | undefined;

  const cutoff = new Promise<never>((_, reject) => {
    timer = setTimeout(() => {
      const err = new GatewayError(`${modelId} timed out after ${timeoutMs / 1000}s`, modelId, 'timeout');
      controller.abort(err);
      reject(err);
    }, timeoutMs);
    onAbort = () => {
      const err = new GatewayError(`${modelId} cancelled`, modelId, 'aborted');
      controller.abort(err);
      reject(err);
    };
    if (parent?.aborted) onAbort();
    else parent?.addEventListener('abort', onAbort, { once: true });
  });

  try {
    return await Promise.race([
      gateway.invoke({ modelId, prompt, signal: controller.signal, onDelta: forward }),
      cutoff,
    ]);
  } catch (err) {
    throw toGatewayError(err, modelId);
  } finally {
    settled = true;
    clearTimeout(timer);
    if (onAbort) parent?.removeEventListener('abort', onAbort);
  }
}

export async function dispatch(
  gateway: ModelGateway,
  models: readonly string[],
  prompt: string,
  options: DispatchOptions,
): Promise<DispatchResult> {
  const timeoutMs = options.timeoutMs ?? DEFAULT_TIMEOUT_MS;
  const instances = instanceIndices(models);
  const responses: ModelResponse[] = [];
  const failures: CallFailure[] = [];

  await Promise.all(
    models.map(async (modelId, slot) => {
      const instanceIndex = instances[slot];
      const onChunk = options.onChunk;
      const onDelta = onChunk
        ? (text: string) => onChunk({ slot, modelId, instanceIndex, text })
        : undefined;
      try {
        const reply = await invokeWithDeadline(
          gateway,
          modelId,
          prompt,
          timeoutMs,
          options.signal,
          onDelta,
        );
        responses.push({
          modelId,
          instanceIndex,
          content: reply.content,
          elapsedMs: reply.elapsedMs,
          ...(reply.reasoningTrace ? { reasoningTrace: reply.reasoningTrace } : {}),
        });
      } catch (err) {
        const failure: CallFailure = {
          slot,
          modelId,
          instanceIndex,
          error: toGatewayError(err, modelId),
        };
        failures.push(failure);
        options.onFailure?.(failure);
      }
    }),
  );

  if (responses.length === 0) {
    throw new TotalStageFailure(options.stage, models.length);
  }
  return { responses, attempted: models.length, failures };
}
