import type { CheckResult, ErrorCode, RunResult, StageStatus } from '../types';
import { resolveGate } from './confirmation';
import type { ConfirmFn } from './confirmation';
import type { OrchestrationContext } from './context';
import { describeError, errorCodeOf, isFatal, remediationOf, UserAbortedError } from './errors';
import { waitUntil } from './poller';
import type { PollResult } from './poller';
import type { ApplyOutcome, ApplyStrategy, Check, PollDefaults, StageDefinition } from './types';

export const DEFAULT_POLL: PollDefaults = {
  maxRetries: 30,
  pollIntervalSeconds: 10
};

export interface StageRunOptions {
  /** Asked when the stage has a confirmation gate. Without it, gates are declined. */
  confirm?: ConfirmFn;
  defaults?: PollDefaults;
}

interface ResultFields {
  status: StageStatus;
  detail: string;
  warning?: string;
  errorCode?: ErrorCode;
  remediation?: string;
  strategy?: string;
}

type ApplyAttempt =
  | { kind: 'ready'; strategy: string; outcome: ApplyOutcome }
  | { kind: 'failed'; error: unknown }
  | { kind: 'timed_out'; strategy: string; outcome: ApplyOutcome; poll: PollResult };

/**
 * One idempotent unit of provisioning or teardown work.
 *
 * `run` never throws: every error is converted into a RunResult.
 */
export class Stage {
  constructor(readonly definition: StageDefinition) {}

  get name(): string {
    return this.definition.name;
  }

  get fatal(): boolean {
    return this.definition.fatal;
  }

  /**
   * True when the idempotency check reports the desired state already exists.
   * Non-fatal errors count as "not there yet".
   */
  async isSatisfied(ctx: OrchestrationContext): Promise<boolean> {
    const { idempotencyCheck } = this.definition;
    if (!idempotencyCheck) {
      return false;
    }
    try {
      return await idempotencyCheck(ctx);
    } catch (error) {
      if (isFatal(error)) {
        throw error;
      }
      ctx.logger.debug(`[${this.name}] idempotency check errored, assuming not applied: ${describeError(error)}`);
      return false;
    }
  }

  async run(ctx: OrchestrationContext, options: StageRunOptions = {}): Promise<RunResult> {
    const startedAt = Date.now();
    const result = (fields: ResultFields): RunResult => ({
      stageName: this.name,
      fatal: this.fatal,
      durationMs: Date.now() - startedAt,
      ...fields
    });

    try {
      if (await this.isSatisfied(ctx)) {
        return result({ status: 'skipped', detail: 'Desired state already present' });
      }

      const failedCheck = await this.verifyPreconditions(ctx, options);
      if (failedCheck) {
        return result({
          status: 'failed',
          detail: `Precondition "${failedCheck.name}" not met: ${failedCheck.detail}`,
          errorCode: 'PRECONDITION_FAILED',
          remediation: failedCheck.recovery ? `Recovery "${failedCheck.recovery.name}" did not resolve it` : undefined
        });
      }

      const gate = await resolveGate(this.definition.confirmation, ctx);
      if (gate) {
        const approved = options.confirm ? await options.confirm(gate, this.name) : false;
        if (!approved) {
          return result({ status: 'skipped', detail: `Declined: ${gate.message}`, errorCode: 'USER_ABORTED' });
        }
      }

      const attempt = await this.applyStrategies(ctx, options.defaults ?? DEFAULT_POLL);
      const strategy = this.definition.alternatives?.length && attempt.kind !== 'failed' ? attempt.strategy : undefined;

      switch (attempt.kind) {
        case 'ready':
          return result({ status: 'applied', detail: attempt.outcome.detail ?? 'Applied', strategy });
        case 'timed_out':
          return result({
            status: 'applied',
            detail: attempt.outcome.detail ?? 'Applied',
            strategy,
            ...(attempt.poll.cancelled
              ? { warning: 'Readiness wait cancelled', errorCode: 'CANCELLED' as const }
              : {
                  warning: `Not ready after ${attempt.poll.attempts} attempt(s); check its status later`,
                  errorCode: 'READINESS_TIMEOUT' as const
                })
          });
        case 'failed':
          return this.failAfterApply(ctx, attempt.error, result);
      }
    } catch (error) {
      if (error instanceof UserAbortedError) {
        return result({ status: 'skipped', detail: error.message, errorCode: 'USER_ABORTED' });
      }
      return result({
        status: 'failed',
        detail: describeError(error),
        errorCode: errorCodeOf(error, isFatal(error) ? 'FATAL' : 'APPLY_FAILED'),
        remediation: remediationOf(error)
      });
    }
  }

  /**
   * Returns the first check that still fails after its recovery, if any.
   */
  private async verifyPreconditions(
    ctx: OrchestrationContext,
    options: StageRunOptions
  ): Promise<(CheckResult & Check) | undefined> {
    for (const check of this.definition.preconditions ?? []) {
      let outcome = await runCheck(check, ctx);
      if (!outcome.ok && check.recovery) {
        ctx.logger.warn(`[${this.name}] ${check.name}: ${outcome.detail}; running ${check.recovery.name}`);
        const recovery = await new Stage({ ...check.recovery, preconditions: [] }).run(ctx, options);
        if (recovery.status === 'applied' || recovery.status === 'skipped') {
          outcome = await runCheck(check, ctx);
        } else {
          ctx.logger.warn(`[${this.name}] recovery ${check.recovery.name} ${recovery.status}: ${recovery.detail}`);
        }
      }
      if (!outcome.ok) {
        return { ...check, ...outcome };
      }
      ctx.logger.debug(`[${this.name}] ${check.name}: ${outcome.detail}`);
    }
    return undefined;
  }

  private strategies(): ApplyStrategy[] {
    const { apply, readinessCheck, maxRetries, alternatives = [] } = this.definition;
    return [{ name: 'default', apply, readinessCheck, maxRetries }, ...alternatives];
  }

  private async applyStrategies(ctx: OrchestrationContext, defaults: PollDefaults): Promise<ApplyAttempt> {
    const strategies = this.strategies();
    const intervalMs = (this.definition.pollIntervalSeconds ?? defaults.pollIntervalSeconds) * 1000;
    let lastError: unknown;
    let timedOut: ApplyAttempt | undefined;

    for (const [index, strategy] of strategies.entries()) {
      if (index > 0) {
        ctx.logger.warn(`[${this.name}] trying alternative strategy "${strategy.name}"`);
      }

      let outcome: ApplyOutcome;
      try {
        const returned = await strategy.apply(ctx);
        outcome = typeof returned === 'object' ? returned : {};
      } catch (error) {
        if (error instanceof UserAbortedError) {
          throw error;
        }
        if (isFatal(error)) {
          return { kind: 'failed', error };
        }
        ctx.logger.warn(`[${this.name}] ${strategy.name} apply failed: ${describeError(error)}`);
        lastError = error;
        continue;
      }
      mergeOutcome(ctx, outcome);

      const readiness = strategy.readinessCheck ?? this.definition.readinessCheck;
      if (!readiness) {
        return { kind: 'ready', strategy: strategy.name, outcome };
      }

      let poll: PollResult;
      try {
        poll = await waitUntil(() => readiness(ctx), {
          intervalMs,
          maxAttempts: strategy.maxRetries ?? this.definition.maxRetries ?? defaults.maxRetries,
          signal: ctx.signal,
          onAttempt: (attempt, error) =>
            ctx.logger.debug(`[${this.name}] not ready (attempt ${attempt})${error ? `: ${describeError(error)}` : ''}`)
        });
      } catch (error) {
        return { kind: 'failed', error };
      }
      if (poll.satisfied) {
        return { kind: 'ready', strategy: strategy.name, outcome };
      }
      timedOut = { kind: 'timed_out', strategy: strategy.name, outcome, poll };
      if (poll.cancelled) {
        break;
      }
    }

    return timedOut ?? { kind: 'failed', error: lastError };
  }

  private async failAfterApply(
    ctx: OrchestrationContext,
    error: unknown,
    result: (fields: ResultFields) => RunResult
  ): Promise<RunResult> {
    const rolledBack = await this.rollback(ctx);
    return result({
      status: rolledBack ? 'rolled_back' : 'failed',
      detail: describeError(error),
      errorCode: errorCodeOf(error, 'APPLY_FAILED'),
      remediation: remediationOf(error)
    });
  }

  // Best effort; never throws.
  private async rollback(ctx: OrchestrationContext): Promise<boolean> {
    const { rollback } = this.definition;
    if (!rollback) {
      return false;
    }
    try {
      await rollback(ctx);
      ctx.logger.info(`[${this.name}] rolled back`);
      return true;
    } catch (error) {
      ctx.logger.error(`[${this.name}] rollback failed: ${describeError(error)}`);
      return false;
    }
  }
}

async function runCheck(check: Check, ctx: OrchestrationContext): Promise<CheckResult> {
  try {
    return await check.run(ctx);
  } catch (error) {
    return { ok: false, detail: describeError(error) };
  }
}

function mergeOutcome(ctx: OrchestrationContext, outcome: ApplyOutcome): void {
  for (const [key, value] of Object.entries(outcome.outputs ?? {})) {
    ctx.outputs.set(key, value);
  }
  if (outcome.credentials) {
    ctx.credentials = outcome.credentials;
  }
}
