/**
 * Deliberation: answer → fact-check → rank → synthesize.
 *
 * Each stage fans out to every council entry through the dispatcher, and only
 * anonymized labels ever reach the evaluators. A stage with zero survivors,
 * a chairman failure or cancellation ends the run in `failed`; partial
 * failures are recorded and the run continues.
 */

import { aggregateFactChecks, aggregateRankings } from './aggregator.js';
import { Anonymizer } from './anonymizer.js';
import { classifyErrors } from './classification.js';
import {
  DEFAULT_TIMEOUT_MS,
  dispatch,
  instanceIndices,
  type DispatchChunk,
  type DispatchOptions,
} from './dispatcher.js';
import {
  ChairmanFailure,
  ConfigError,
  DeliberationError,
  TotalStageFailure,
  errorMessage,
  type FailedStage,
} from './errors.js';
import { EventChannel, type EventSink } from './events.js';
import { FACT_CHECK_MARKER, RANKING_MARKER, parseFactCheck, parseRanking } from './parser.js';
import { buildFactCheckPrompt, buildRankingPrompt, type LabeledResponse } from './prompts.js';
import { StageMachine, type Transition } from './stage-machine.js';
import { synthesize, type SynthesisInput } from './synthesizer.js';
import { generateTitle } from './title.js';
import type {
  AggregateFactCheck,
  AggregateRanking,
  ChairmanSynthesis,
  ClassifiedError,
  Diagnostic,
  DeliberationResult,
  FactCheckResult,
  InstanceRef,
  ModelGateway,
  ModelResponse,
  ParsedFactCheck,
  ParsedRanking,
  PartialDeliberation,
  RankingResult,
  StageName,
} from './types.js';

export interface DeliberationConfig {
  /** Council entries; a repeated id is a separate instance */
  councilModels: readonly string[];
  chairmanModel: string;
  factCheck?: boolean;
  streaming?: boolean;
  timeoutMs?: number;
  /** Generate a conversation title with this model alongside stage 1 */
  titleModel?: string;
  /** Have the chairman classify flagged inaccuracies after stage 4 */
  classifyErrors?: boolean;
}

export interface DeliberationOptions {
  onEvent?: EventSink;
  onDiagnostic?: (diagnostic: Diagnostic) => void;
  onTransition?: (transition: Transition) => void;
  signal?: AbortSignal;
}

/** An answer the caller already has, e.g. from an earlier run or another app. */
export interface SuppliedAnswer {
  modelId: string;
  content: string;
}

export interface DirectSynthesisResult {
  question: string;
  stage1: ModelResponse[];
  labelToModel: Record<string, InstanceRef>;
  synthesis: ChairmanSynthesis;
}

interface ActiveStage {
  stage: StageName;
  attempted: number;
}

interface RunContext {
  question: string;
  machine: StageMachine;
  partial: PartialDeliberation;
  active: ActiveStage | null;
  signal?: AbortSignal;
  /** Side calls (title) that must not outlive a failed run */
  sideCalls: AbortController;
}

function deepFreeze<T>(value: T): T {
  if (value !== null && typeof value === 'object' && !Object.isFrozen(value)) {
    Object.freeze(value);
    for (const child of Object.values(value)) deepFreeze(child);
  }
  return value;
}

function labeledResponses(stage1: readonly ModelResponse[], anonymizer: Anonymizer): LabeledResponse[] {
  return stage1.flatMap((r) => {
    const label = anonymizer.labelFor(r);
    return label ? [{ label, content: r.content }] : [];
  });
}

export class Deliberation {
  private readonly emit: EventSink;
  private readonly factCheck: boolean;
  private readonly streaming: boolean;
  private readonly timeoutMs: number;

  constructor(
    private readonly gateway: ModelGateway,
    private readonly config: DeliberationConfig,
    private readonly options: DeliberationOptions = {},
  ) {
    if (config.councilModels.length === 0) {
      throw new ConfigError('At least one council model is required');
    }
    if (!config.chairmanModel) {
      throw new ConfigError('A chairman model is required');
    }
    this.emit = options.onEvent ?? (() => {});
    this.factCheck = config.factCheck ?? true;
    this.streaming = config.streaming ?? false;
    this.timeoutMs = config.timeoutMs ?? DEFAULT_TIMEOUT_MS;
  }

  async run(question: string): Promise<DeliberationResult> {
    const ctx: RunContext = {
      question,
      machine: new StageMachine(this.options.onTransition),
      partial: { question, stats: [], diagnostics: [] },
      active: null,
      signal: this.options.signal,
      sideCalls: new AbortController(),
    };
    const sideSignal = ctx.signal
      ? AbortSignal.any([ctx.signal, ctx.sideCalls.signal])
      : ctx.sideCalls.signal;

    // generateTitle never rejects
    const title = this.config.titleModel
      ? generateTitle(this.gateway, this.config.titleModel, question, { signal: sideSignal })
      : null;

    try {
      ctx.signal?.throwIfAborted();
      const stage1 = await this.collect(ctx);
      const anonymizer = Anonymizer.fromResponses(stage1);
      ctx.partial.labelToModel = anonymizer.toRecord();

      let factChecks: FactCheckResult[] | null = null;
      let aggregateFacts: AggregateFactCheck[] | null = null;
      if (this.factCheck) {
        ctx.signal?.throwIfAborted();
        [factChecks, aggregateFacts] = await this.checkFacts(ctx, stage1, anonymizer);
      }
      ctx.partial.factChecks = factChecks;
      ctx.partial.aggregateFactChecks = aggregateFacts;

      ctx.signal?.throwIfAborted();
      const [rankings, aggregateRanks] = await this.rank(ctx, stage1, anonymizer, factChecks);

      ctx.signal?.throwIfAborted();
      const synthesis = await this.synthesize(ctx, {
        question,
        stage1,
        anonymizer,
        factChecks,
        aggregateFactChecks: aggregateFacts,
        rankings,
        aggregateRankings: aggregateRanks,
      });

      const result: DeliberationResult = {
        question,
        stage1,
        factChecks,
        aggregateFactChecks: aggregateFacts,
        rankings,
        aggregateRankings: aggregateRanks,
        synthesis,
        labelToModel: anonymizer.toRecord(),
        stats: ctx.partial.stats,
        diagnostics: ctx.partial.diagnostics,
      };

      if (title) {
        result.title = await title;
        this.emit({ type: 'title_complete', data: { title: result.title } });
      }
      if (factChecks && this.config.classifyErrors) {
        const classified = await this.classify(ctx, stage1, anonymizer, factChecks);
        if (classified) result.classifiedErrors = classified;
      }

      ctx.machine.advance('complete');
      return deepFreeze(result);
    } catch (err) {
      throw this.fail(ctx, err);
    }
  }

  /**
   * Stage 4 alone, over answers supplied by the caller. They are labelled
   * A, B, … in the order given and the chairman gets no review context.
   */
  async synthesizeFrom(question: string, answers: readonly SuppliedAnswer[]): Promise<DirectSynthesisResult> {
    if (answers.length === 0) {
      throw new ConfigError('At least one answer is required');
    }
    const instances = instanceIndices(answers.map((a) => a.modelId));
    const stage1 = answers.map(
      (a, i): ModelResponse => ({ modelId: a.modelId, instanceIndex: instances[i], content: a.content, elapsedMs: 0 }),
    );
    const anonymizer = Anonymizer.fromResponses(stage1);
    const chairman = this.config.chairmanModel;
    const signal = this.options.signal;
    this.emit({ type: 'stage4_start', models: [chairman] });

    try {
      const synthesis = await synthesize(
        this.gateway,
        chairman,
        {
          question,
          stage1,
          anonymizer,
          factChecks: null,
          aggregateFactChecks: null,
          rankings: null,
          aggregateRankings: null,
        },
        {
          timeoutMs: this.timeoutMs,
          signal,
          onDelta: this.streaming
            ? (text) => this.emit({ type: 'stage4_chunk', slot: 0, modelId: chairman, instanceIndex: 0, text })
            : undefined,
        },
      );
      this.emit({ type: 'stage4_complete', data: synthesis });
      return deepFreeze({ question, stage1, labelToModel: anonymizer.toRecord(), synthesis });
    } catch (err) {
      const stage: FailedStage = signal?.aborted ? 'cancelled' : 'stage4';
      const reason = signal?.aborted ? 'Deliberation cancelled' : errorMessage(err);
      this.emit({ type: 'error', stage, reason, attempted: 1, succeeded: 0 });
      throw new DeliberationError(
        stage,
        reason,
        1,
        0,
        deepFreeze({ question, stage1, labelToModel: anonymizer.toRecord(), stats: [], diagnostics: [] }),
      );
    }
  }

  // --- Stages ---

  private async collect(ctx: RunContext): Promise<ModelResponse[]> {
    const models = this.config.councilModels;
    ctx.machine.advance('stage1_collecting');
    ctx.active = { stage: 'stage1', attempted: models.length };
    this.emit({ type: 'stage1_start', models: [...models] });

    const { responses, attempted } = await dispatch(
      this.gateway,
      models,
      ctx.question,
      this.dispatchOptions(ctx, 'stage1', (chunk) => this.emit({ type: 'stage1_chunk', ...chunk })),
    );
    ctx.signal?.throwIfAborted();
    this.record(ctx, 'stage1', attempted, responses.length);
    ctx.partial.stage1 = responses;
    this.emit({ type: 'stage1_complete', data: responses });
    ctx.machine.advance('stage1_done');
    return responses;
  }

  private async checkFacts(
    ctx: RunContext,
    stage1: ModelResponse[],
    anonymizer: Anonymizer,
  ): Promise<[FactCheckResult[], AggregateFactCheck[]]> {
    const models = this.config.councilModels;
    ctx.machine.advance('stage2_fact_checking');
    ctx.active = { stage: 'stage2', attempted: models.length };
    this.emit({ type: 'fact_check_start', models: [...models] });

    const prompt = buildFactCheckPrompt(ctx.question, labeledResponses(stage1, anonymizer));
    const { responses, attempted } = await dispatch(
      this.gateway,
      models,
      prompt,
      this.dispatchOptions(ctx, 'stage2', (chunk) => this.emit({ type: 'fact_check_chunk', ...chunk })),
    );
    ctx.signal?.throwIfAborted();

    const known = new Set(anonymizer.labels());
    const results = responses.map((r): FactCheckResult => {
      const parsed = parseFactCheck(r.content, known);
      this.noteParse(ctx, 'stage2', r, parsed, FACT_CHECK_MARKER);
      return { modelId: r.modelId, instanceIndex: r.instanceIndex, rawText: r.content, elapsedMs: r.elapsedMs, ...parsed };
    });
    const aggregates = aggregateFactChecks(results, anonymizer);

    this.record(ctx, 'stage2', attempted, results.length);
    this.emit({
      type: 'fact_check_complete',
      data: results,
      metadata: { labelToModel: anonymizer.toRecord(), aggregateFactChecks: aggregates },
    });
    ctx.machine.advance('stage2_done');
    return [results, aggregates];
  }

  private async rank(
    ctx: RunContext,
    stage1: ModelResponse[],
    anonymizer: Anonymizer,
    factChecks: FactCheckResult[] | null,
  ): Promise<[RankingResult[], AggregateRanking[]]> {
    const models = this.config.councilModels;
    ctx.machine.advance('stage3_ranking');
    ctx.active = { stage: 'stage3', attempted: models.length };
    this.emit({ type: 'stage3_start', models: [...models] });

    const prompt = buildRankingPrompt(
      ctx.question,
      labeledResponses(stage1, anonymizer),
      factChecks?.map((f) => f.rawText),
    );
    const { responses, attempted } = await dispatch(
      this.gateway,
      models,
      prompt,
      this.dispatchOptions(ctx, 'stage3', (chunk) => this.emit({ type: 'stage3_chunk', ...chunk })),
    );
    ctx.signal?.throwIfAborted();

    const known = new Set(anonymizer.labels());
    const results = responses.map((r): RankingResult => {
      const parsed = parseRanking(r.content, known);
      this.noteParse(ctx, 'stage3', r, parsed, RANKING_MARKER);
      return { modelId: r.modelId, instanceIndex: r.instanceIndex, rawText: r.content, elapsedMs: r.elapsedMs, ...parsed };
    });
    const aggregates = aggregateRankings(results, anonymizer);

    this.record(ctx, 'stage3', attempted, results.length);
    ctx.partial.rankings = results;
    ctx.partial.aggregateRankings = aggregates;
    this.emit({
      type: 'stage3_complete',
      data: results,
      metadata: { labelToModel: anonymizer.toRecord(), aggregateRankings: aggregates },
    });
    ctx.machine.advance('stage3_done');
    return [results, aggregates];
  }

  private async synthesize(
    ctx: RunContext,
    input: SynthesisInput,
  ): Promise<ChairmanSynthesis> {
    const chairman = this.config.chairmanModel;
    ctx.machine.advance('stage4_synthesizing');
    ctx.active = { stage: 'stage4', attempted: 1 };
    this.emit({ type: 'stage4_start', models: [chairman] });

    const synthesis = await synthesize(this.gateway, chairman, input, {
      timeoutMs: this.timeoutMs,
      signal: ctx.signal,
      onDelta: this.streaming
        ? (text) => this.emit({ type: 'stage4_chunk', slot: 0, modelId: chairman, instanceIndex: 0, text })
        : undefined,
    });
    this.record(ctx, 'stage4', 1, 1);
    ctx.partial.synthesis = synthesis;
    this.emit({ type: 'stage4_complete', data: synthesis });
    return synthesis;
  }

  private async classify(
    ctx: RunContext,
    stage1: ModelResponse[],
    anonymizer: Anonymizer,
    factChecks: FactCheckResult[],
  ): Promise<ClassifiedError[] | null> {
    try {
      const classified = await classifyErrors(
        this.gateway,
        this.config.chairmanModel,
        { question: ctx.question, stage1, anonymizer, factChecks },
        { timeoutMs: this.timeoutMs, signal: ctx.signal },
      );
      this.emit({ type: 'classification_complete', data: classified });
      return classified;
    } catch (err) {
      this.diagnose(ctx, {
        level: 'warn',
        stage: 'run',
        message: `Error classification failed: ${errorMessage(err)}`,
      });
      return null;
    }
  }

  // --- Bookkeeping ---

  private dispatchOptions(
    ctx: RunContext,
    stage: StageName,
    onChunk: (chunk: DispatchChunk) => void,
  ): DispatchOptions {
    return {
      stage,
      timeoutMs: this.timeoutMs,
      signal: ctx.signal,
      onChunk: this.streaming ? onChunk : undefined,
      onFailure: (failure) =>
        this.diagnose(ctx, {
          level: 'warn',
          stage,
          message: failure.error.message,
          data: { modelId: failure.modelId, instanceIndex: failure.instanceIndex, kind: failure.error.kind },
        }),
    };
  }

  private record(ctx: RunContext, stage: StageName, attempted: number, succeeded: number): void {
    ctx.partial.stats.push({ stage, attempted, succeeded });
    if (succeeded < attempted) {
      this.diagnose(ctx, {
        level: 'warn',
        stage,
        message: `${succeeded} of ${attempted} call(s) succeeded`,
        data: { attempted, succeeded },
      });
    }
  }

  private noteParse(
    ctx: RunContext,
    stage: StageName,
    response: ModelResponse,
    parsed: ParsedFactCheck | ParsedRanking,
    marker: string,
  ): void {
    const source = { modelId: response.modelId, instanceIndex: response.instanceIndex };
    if (parsed.strategy === 'fallback') {
      this.diagnose(ctx, {
        level: 'info',
        stage,
        message: `${response.modelId}: no usable ${marker} block, scanned for labels instead`,
        data: source,
      });
    }
    if (parsed.discardedLabels.length > 0) {
      this.diagnose(ctx, {
        level: 'warn',
        stage,
        message: `${response.modelId}: discarded unknown label(s) ${parsed.discardedLabels.join(', ')}`,
        data: { ...source, labels: parsed.discardedLabels },
      });
    }
  }

  private diagnose(ctx: RunContext, diagnostic: Diagnostic): void {
    ctx.partial.diagnostics.push(diagnostic);
    this.options.onDiagnostic?.(diagnostic);
  }

  private fail(ctx: RunContext, err: unknown): DeliberationError {
    let stage: FailedStage = ctx.active?.stage ?? 'stage1';
    let reason = errorMessage(err);
    let attempted = ctx.active?.attempted ?? 0;
    let succeeded = 0;

    if (ctx.signal?.aborted) {
      stage = 'cancelled';
      reason = 'Deliberation cancelled';
    } else if (err instanceof TotalStageFailure) {
      stage = err.stage;
      attempted = err.attempted;
      succeeded = err.succeeded;
    } else if (err instanceof ChairmanFailure) {
      stage = 'stage4';
      attempted = 1;
    }

    ctx.sideCalls.abort();
    if (!ctx.machine.isTerminal) ctx.machine.fail(stage, reason);
    this.diagnose(ctx, { level: 'warn', stage: 'run', message: `Failed in ${stage}: ${reason}` });
    this.emit({ type: 'error', stage, reason, attempted, succeeded });
    return new DeliberationError(stage, reason, attempted, succeeded, deepFreeze(ctx.partial));
  }
}

/**
 * Run a deliberation and expose its events as an async iterable.
 * Iteration ends when the run settles; `result` carries the outcome.
 */
export function streamDeliberation(
  gateway: ModelGateway,
  config: DeliberationConfig,
  question: string,
  options: Omit<DeliberationOptions, 'onEvent'> = {},
): { events: EventChannel; result: Promise<DeliberationResult> } {
  const events = new EventChannel();
  const deliberation = new Deliberation(gateway, config, { ...options, onEvent: events.sink });
  const result = deliberation.run(question).finally(() => events.close());
  // Marks the rejection handled; awaiting `result` still rejects.
  void result.catch(() => undefined);
  return { events, result };
}
