/**
 * Chairman synthesis, the one stage 4 call.
 * Everything the chairman sees is de-anonymized; its output is passed through as-is.
 */

import type { Anonymizer } from './anonymizer.js';
import { ratingLabel } from './aggregator.js';
import { DEFAULT_TIMEOUT_MS, invokeWithDeadline } from './dispatcher.js';
import { ChairmanFailure } from './errors.js';
import { buildChairmanPrompt, type ChairmanPromptInput, type ChairmanSection } from './prompts.js';
import type {
  AggregateFactCheck,
  AggregateRanking,
  ChairmanSynthesis,
  FactCheckResult,
  InstanceRef,
  ModelGateway,
  ModelResponse,
  RankingResult,
} from './types.js';

export interface SynthesisInput {
  question: string;
  stage1: readonly ModelResponse[];
  anonymizer: Anonymizer;
  factChecks: readonly FactCheckResult[] | null;
  aggregateFactChecks: readonly AggregateFactCheck[] | null;
  /** null when synthesizing straight from supplied answers */
  rankings: readonly RankingResult[] | null;
  aggregateRankings: readonly AggregateRanking[] | null;
}

export interface SynthesisOptions {
  timeoutMs?: number;
  signal?: AbortSignal;
  onDelta?: (delta: string) => void;
}

/**
 * Real name for one council entry. The instance is only spelled out when the
 * same model sat on the council more than once.
 */
export function instanceNamer(stage1: readonly ModelResponse[]): (ref: InstanceRef) => string {
  const counts = new Map<string, number>();
  for (const r of stage1) counts.set(r.modelId, (counts.get(r.modelId) ?? 0) + 1);
  return (ref) =>
    (counts.get(ref.modelId) ?? 0) > 1
      ? `${ref.modelId} (instance ${ref.instanceIndex + 1})`
      : ref.modelId;
}

export function formatFactCheckSummary(
  aggregates: readonly AggregateFactCheck[],
  name: (ref: InstanceRef) => string,
): string {
  return aggregates
    .map((a) =>
      a.averageScore === null
        ? `Response ${a.label} (${name(a)}): no data`
        : `Response ${a.label} (${name(a)}): ${ratingLabel(a.consensusRating)}, average ${a.averageScore.toFixed(2)} from ${a.ratingCount} rating(s), ${a.mostReliableVotes} most-reliable vote(s)`,
    )
    .join('\n');
}

export function formatRankingSummary(
  aggregates: readonly AggregateRanking[],
  name: (ref: InstanceRef) => string,
): string {
  return aggregates
    .map((a) =>
      a.averagePosition === null
        ? `Response ${a.label} (${name(a)}): no data`
        : `Response ${a.label} (${name(a)}): average position ${a.averagePosition.toFixed(2)} from ${a.voteCount} ranking(s)`,
    )
    .join('\n');
}

export function buildChairmanContext(input: SynthesisInput): ChairmanPromptInput {
  const name = instanceNamer(input.stage1);
  const asSection = (r: { modelId: string; instanceIndex: number }, text: string): ChairmanSection => ({
    name: name(r),
    text,
  });

  return {
    question: input.question,
    responses: input.stage1.map((r) => asSection(r, r.content)),
    labelKey: input.anonymizer.labels().flatMap((label) => {
      const ref = input.anonymizer.resolve(label);
      return ref ? [{ label, name: name(ref) }] : [];
    }),
    ...(input.factChecks && input.aggregateFactChecks
      ? {
          factChecks: {
            analyses: input.factChecks.map((f) => asSection(f, f.rawText)),
            summary: formatFactCheckSummary(input.aggregateFactChecks, name),
          },
        }
      : {}),
    ...(input.rankings && input.aggregateRankings
      ? {
          rankings: {
            analyses: input.rankings.map((r) => asSection(r, r.rawText)),
            summary: formatRankingSummary(input.aggregateRankings, name),
          },
        }
      : {}),
  };
}

export async function synthesize(
  gateway: ModelGateway,
  chairmanModel: string,
  input: SynthesisInput,
  options: SynthesisOptions = {},
): Promise<ChairmanSynthesis> {
  const prompt = buildChairmanPrompt(buildChairmanContext(input));
  try {
    const reply = await invokeWithDeadline(
      gateway,
      chairmanModel,
      prompt,
      options.timeoutMs ?? DEFAULT_TIMEOUT_MS,
      options.signal,
      options.onDelta,
    );
    return { text: reply.content, modelId: chairmanModel, elapsedMs: reply.elapsedMs };
  } catch (err) {
    throw new ChairmanFailure(chairmanModel, err);
  }
}
