/**
 * Progress events and the per-run channel that carries them.
 *
 * The engine only needs a sink; EventChannel turns that sink into an async
 * iterable so SSE, WebSocket or a terminal can consume the same stream.
 */

import type { FailedStage } from './errors.js';
import type {
  AggregateFactCheck,
  AggregateRanking,
  ChairmanSynthesis,
  ClassifiedError,
  FactCheckResult,
  InstanceRef,
  ModelResponse,
  RankingResult,
} from './types.js';

export interface ChunkPayload {
  slot: number;
  modelId: string;
  instanceIndex: number;
  text: string;
}

export type DeliberationEvent =
  | { type: 'stage1_start'; models: string[] }
  | ({ type: 'stage1_chunk' } & ChunkPayload)
  | { type: 'stage1_complete'; data: ModelResponse[] }
  | { type: 'fact_check_start'; models: string[] }
  | ({ type: 'fact_check_chunk' } & ChunkPayload)
  | {
      type: 'fact_check_complete';
      data: FactCheckResult[];
      metadata: {
        labelToModel: Record<string, InstanceRef>;
        aggregateFactChecks: AggregateFactCheck[];
      };
    }
  | { type: 'stage3_start'; models: string[] }
  | ({ type: 'stage3_chunk' } & ChunkPayload)
  | {
      type: 'stage3_complete';
      data: RankingResult[];
      metadata: {
        labelToModel: Record<string, InstanceRef>;
        aggregateRankings: AggregateRanking[];
      };
    }
  | { type: 'stage4_start'; models: string[] }
  | ({ type: 'stage4_chunk' } & ChunkPayload)
  | { type: 'stage4_complete'; data: ChairmanSynthesis }
  | { type: 'title_complete'; data: { title: string } }
  | { type: 'classification_complete'; data: ClassifiedError[] }
  | { type: 'error'; stage: FailedStage; reason: string; attempted: number; succeeded: number };

export type DeliberationEventType = DeliberationEvent['type'];

export type EventSink = (event: DeliberationEvent) => void;

const DONE: IteratorReturnResult<undefined> = { value: undefined, done: true };

/**
 * Unbounded single-consumer queue. push() never blocks; iteration ends after
 * close() once buffered events are drained.
 */
export class EventChannel<T = DeliberationEvent> implements AsyncIterable<T> {
  private buffer: T[] = [];
  private waiting: Array<(result: IteratorResult<T, undefined>) => void> = [];
  private closed = false;

  push(event: T): void {
    if (this.closed) return;
    const next = this.waiting.shift();
    if (next) next({ value: event, done: false } satisfies IteratorYieldResult<T>);
    else this.buffer.push(event);
  }

  close(): void {
    if (this.closed) return;
    this.closed = true;
    for (const resolve of this.waiting.splice(0)) {
      resolve(DONE);
    }
  }

  get isClosed(): boolean {
    return this.closed;
  }

  /** Bound `push`, usable directly as an EventSink. */
  get sink(): (event: T) => void {
    return (event) => this.push(event);
  }

  [Symbol.asyncIterator](): AsyncIterator<T, undefined> {
    return {
      next: () => {
        if (this.buffer.length > 0) {
          const [value] = this.buffer.splice(0, 1);
          const result: IteratorYieldResult<T> = { value, done: false };
          return Promise.resolve(result);
        }
        if (this.closed) return Promise.resolve(DONE);
        return new Promise<IteratorResult<T, undefined>>((resolve) => this.waiting.push(resolve));
      },
      return: () => {
        this.close();
        this.buffer = [];
        return Promise.resolve(DONE);
      },
    };
  }
}
