/**
 * Core types for the deliberation council
 */

// --- Ratings ---

export const RATINGS = [
  'ACCURATE',
  'MOSTLY_ACCURATE',
  'MIXED',
  'MOSTLY_INACCURATE',
  'INACCURATE',
] as const;

export type Rating = (typeof RATINGS)[number];

// --- Gateway ---

export interface InvokeRequest {
  modelId: string;
  prompt: string;
  signal?: AbortSignal;
  /** Streaming: called with text chunks as they arrive */
  onDelta?: (delta: string) => void;
}

export interface GatewayReply {
  content: string;
  elapsedMs: number;
  reasoningTrace?: string;
}

/**
 * The only thing the engine knows about a backend: send a prompt, get text back.
 * Implementations reject with a GatewayError.
 */
export interface ModelGateway {
  name: string;
  invoke(request: InvokeRequest): Promise<GatewayReply>;
}

// --- Stage 1 ---

/** One successful council call. `instanceIndex` separates duplicate entries of the same model. */
export interface ModelResponse {
  readonly modelId: string;
  readonly instanceIndex: number;
  readonly content: string;
  readonly elapsedMs: number;
  readonly reasoningTrace?: string;
}

export interface InstanceRef {
  modelId: string;
  instanceIndex: number;
}

// --- Parsing ---

export type ParseStrategy = 'marker' | 'fallback';

export interface ParsedFactCheck {
  ratings: Record<string, Rating>;
  mostReliable: string | null;
  /** Labels in first-appearance order (filled by the fallback scan) */
  mentionOrder: string[];
  discardedLabels: string[];
  strategy: ParseStrategy;
}

export interface ParsedRanking {
  orderedLabels: string[];
  discardedLabels: string[];
  strategy: ParseStrategy;
}

// --- Stage 2 / 3 ---

export interface FactCheckResult extends ParsedFactCheck {
  modelId: string;
  instanceIndex: number;
  rawText: string;
  elapsedMs: number;
}

export interface RankingResult extends ParsedRanking {
  modelId: string;
  instanceIndex: number;
  rawText: string;
  elapsedMs: number;
}

export interface AggregateFactCheck {
  label: string;
  modelId: string;
  instanceIndex: number;
  /** null when nobody rated this label ("no data") */
  consensusRating: Rating | null;
  averageScore: number | null;
  ratingCount: number;
  mostReliableVotes: number;
  ratingBreakdown: Rating[];
}

export interface AggregateRanking {
  label: string;
  modelId: string;
  instanceIndex: number;
  averagePosition: number | null;
  voteCount: number;
  firstPlaceVotes: number;
}

// --- Stage 4 ---

export interface ChairmanSynthesis {
  text: string;
  modelId: string;
  elapsedMs: number;
}

// --- Supplements ---

export interface ClassifiedError {
  modelId: string;
  errorType: string;
  claim: string;
  explanation: string;
  questionSummary: string;
}

// --- Run bookkeeping ---

export type StageName = 'stage1' | 'stage2' | 'stage3' | 'stage4';

export interface StageStats {
  stage: StageName;
  attempted: number;
  succeeded: number;
}

export interface Diagnostic {
  level: 'info' | 'warn';
  stage: StageName | 'run';
  message: string;
  data?: Record<string, unknown>;
}

export interface DeliberationResult {
  question: string;
  stage1: ModelResponse[];
  /** null when fact-checking was disabled */
  factChecks: FactCheckResult[] | null;
  aggregateFactChecks: AggregateFactCheck[] | null;
  rankings: RankingResult[];
  aggregateRankings: AggregateRanking[];
  synthesis: ChairmanSynthesis;
  labelToModel: Record<string, InstanceRef>;
  stats: StageStats[];
  diagnostics: Diagnostic[];
  title?: string;
  classifiedErrors?: ClassifiedError[];
}

/** Whatever a failed run managed to produce before it stopped. */
export type PartialDeliberation = Partial<Omit<DeliberationResult, 'question'>> & {
  question: string;
  stats: StageStats[];
  diagnostics: Diagnostic[];
};
