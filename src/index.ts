export * from './types.js';
export * from './errors.js';
export { createGateway, resolveApiKey, resolveModel, findProvider, isRegisteredModel } from './providers/base.js';
export type { GatewayConfig } from './providers/base.js';
export { dispatch, invokeWithDeadline, instanceIndices, DEFAULT_TIMEOUT_MS } from './dispatcher.js';
export type { CallFailure, DispatchChunk, DispatchOptions, DispatchResult } from './dispatcher.js';
export { Anonymizer, labelForIndex } from './anonymizer.js';
export {
  parseFactCheck,
  parseRanking,
  parseRating,
  markerBlock,
  scanLabels,
  FACT_CHECK_MARKER,
  RANKING_MARKER,
} from './parser.js';
export {
  aggregateFactChecks,
  aggregateRankings,
  ratingScore,
  ratingFromScore,
  ratingLabel,
  RATING_SCORES,
} from './aggregator.js';
export * from './prompts.js';
export { synthesize, buildChairmanContext, instanceNamer } from './synthesizer.js';
export type { SynthesisInput, SynthesisOptions } from './synthesizer.js';
export { Deliberation, streamDeliberation } from './council.js';
export type {
  DeliberationConfig,
  DeliberationOptions,
  DirectSynthesisResult,
  SuppliedAnswer,
} from './council.js';
export { StageMachine } from './stage-machine.js';
export type { DeliberationState, FailureInfo, Transition } from './stage-machine.js';
export { EventChannel } from './events.js';
export type { ChunkPayload, DeliberationEvent, DeliberationEventType, EventSink } from './events.js';
export { generateTitle, cleanTitle, DEFAULT_TITLE } from './title.js';
export {
  classifyErrors,
  parseClassification,
  summarizeErrors,
  normalizeErrorType,
  ERROR_TYPES,
} from './classification.js';
export type { ClassificationInput, ErrorSummary, ErrorType } from './classification.js';
export { loadConfig, parseConfig, resolveConfigPath, toDeliberationConfig, DEFAULT_CONFIG } from './config.js';
export { CouncilConfigSchema, DEFAULT_COUNCIL_MODELS, DEFAULT_CHAIRMAN_MODEL } from './config-schema.js';
export type { CouncilConfig, CouncilConfigInput } from './config-schema.js';
