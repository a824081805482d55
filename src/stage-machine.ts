import { StateTransitionError, type FailedStage } from './errors.js';

export type DeliberationState =
  | 'idle'
  | 'stage1_collecting'
  | 'stage1_done'
  | 'stage2_fact_checking'
  | 'stage2_done'
  | 'stage3_ranking'
  | 'stage3_done'
  | 'stage4_synthesizing'
  | 'complete'
  | 'failed';

const TRANSITIONS: Record<DeliberationState, readonly DeliberationState[]> = {
  idle: ['stage1_collecting', 'failed'],
  stage1_collecting: ['stage1_done', 'failed'],
  // Fact-checking is optional
  stage1_done: ['stage2_fact_checking', 'stage3_ranking', 'failed'],
  stage2_fact_checking: ['stage2_done', 'failed'],
  stage2_done: ['stage3_ranking', 'failed'],
  stage3_ranking: ['stage3_done', 'failed'],
  stage3_done: ['stage4_synthesizing', 'failed'],
  stage4_synthesizing: ['complete', 'failed'],
  complete: [],
  failed: [],
};

export interface FailureInfo {
  stage: FailedStage;
  reason: string;
}

export interface Transition {
  from: DeliberationState;
  to: DeliberationState;
  failure?: FailureInfo;
}

export class StageMachine {
  private current: DeliberationState = 'idle';
  private failureInfo: FailureInfo | null = null;

  constructor(private readonly onTransition?: (transition: Transition) => void) {}

  get state(): DeliberationState {
    return this.current;
  }

  get failure(): FailureInfo | null {
    return this.failureInfo;
  }

  get isTerminal(): boolean {
    return TRANSITIONS[this.current].length === 0;
  }

  canMove(to: DeliberationState): boolean {
    return TRANSITIONS[this.current].includes(to);
  }

  advance(to: Exclude<DeliberationState, 'failed'>): void {
    this.move(to);
  }

  fail(stage: FailedStage, reason: string): void {
    const info = { stage, reason };
    this.move('failed', info);
    this.failureInfo = info;
  }

  private move(to: DeliberationState, failure?: FailureInfo): void {
    if (!this.canMove(to)) throw new StateTransitionError(this.current, to);
    const from = this.current;
    this.current = to;
    this.onTransition?.(failure ? { from, to, failure } : { from, to });
  }
}
