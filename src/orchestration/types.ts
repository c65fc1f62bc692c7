// Orchestration-specific types
import type { CheckResult, ResourceRef, TemporaryCredentials } from '../types';
import type { GateSource } from './confirmation';
import type { OrchestrationContext } from './context';

export interface ApplyOutcome {
  detail?: string;
  /** Published into `ctx.outputs` for later stages. */
  outputs?: Record<string, string>;
  /** Replaces `ctx.credentials` for the rest of the run. */
  credentials?: TemporaryCredentials;
  resources?: ResourceRef[];
}

export type ApplyFn = (ctx: OrchestrationContext) => Promise<ApplyOutcome | void>;

export type ReadinessFn = (ctx: OrchestrationContext) => Promise<boolean>;

/**
 * An alternative way to reach the stage's goal, tried when the previous
 * strategy threw or never became ready.
 */
export interface ApplyStrategy {
  name: string;
  apply: ApplyFn;
  readinessCheck?: ReadinessFn;
  maxRetries?: number;
}

export interface Check {
  name: string;
  run(ctx: OrchestrationContext): Promise<CheckResult>;
  /** Stage run once when the check fails, before re-checking. */
  recovery?: StageDefinition;
}

export interface StageDefinition {
  name: string;
  description?: string;
  /** A failed fatal stage halts the pipeline. */
  fatal: boolean;
  preconditions?: Check[];
  idempotencyCheck?: (ctx: OrchestrationContext) => Promise<boolean>;
  apply: ApplyFn;
  alternatives?: ApplyStrategy[];
  readinessCheck?: ReadinessFn;
  rollback?: (ctx: OrchestrationContext) => Promise<void>;
  /** Readiness poll attempts per strategy. */
  maxRetries?: number;
  pollIntervalSeconds?: number;
  confirmation?: GateSource;
}

export interface ResidualProbe {
  name: string;
  /** Returns one warning per resource that still exists. */
  probe(ctx: OrchestrationContext): Promise<string[]>;
}

export interface PipelineDefinition {
  name: string;
  description: string;
  destructive?: boolean;
  stages: StageDefinition[];
  residualProbes?: ResidualProbe[];
}

export interface PollDefaults {
  maxRetries: number;
  pollIntervalSeconds: number;
}
