import type { PartialDeliberation, StageName } from './types.js';

export class CouncilError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'CouncilError';
  }
}

export type GatewayErrorKind = 'timeout' | 'aborted' | 'transport' | 'http' | 'empty';

/** A single model call that produced no usable content. */
export class GatewayError extends CouncilError {
  constructor(
    message: string,
    public readonly modelId: string,
    public readonly kind: GatewayErrorKind,
  ) {
    super(message);
    this.name = 'GatewayError';
  }
}

/** Every call of a fan-out stage failed. */
export class TotalStageFailure extends CouncilError {
  constructor(
    public readonly stage: StageName,
    public readonly attempted: number,
    public readonly succeeded = 0,
  ) {
    super(`All ${attempted} model call(s) failed in ${stage}`);
    this.name = 'TotalStageFailure';
  }
}

export class ChairmanFailure extends CouncilError {
  constructor(
    public readonly modelId: string,
    public readonly underlying: unknown,
  ) {
    super(`Chairman ${modelId} failed: ${errorMessage(underlying)}`);
    this.name = 'ChairmanFailure';
  }
}

/** A state machine was asked for a move its transition table does not allow. */
export class StateTransitionError extends CouncilError {
  constructor(
    public readonly from: string,
    public readonly to: string,
  ) {
    super(`Illegal transition ${from} -> ${to}`);
    this.name = 'StateTransitionError';
  }
}

export type FailedStage = StageName | 'cancelled';

/** Terminal failure of a run. `partial` keeps the stages that completed. */
export class DeliberationError extends CouncilError {
  constructor(
    public readonly stage: FailedStage,
    public readonly reason: string,
    public readonly attempted: number,
    public readonly succeeded: number,
    public readonly partial: PartialDeliberation,
  ) {
    super(`Deliberation failed in ${stage}: ${reason}`);
    this.name = 'DeliberationError';
  }
}

export class ConfigError extends CouncilError {
  constructor(
    message: string,
    public readonly issues: string[] = [],
  ) {
    super(issues.length > 0 ? `${message}\n  ${issues.join('\n  ')}` : message);
    this.name = 'ConfigError';
  }
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
