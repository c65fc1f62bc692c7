import type { RunResult } from '../types';
import type { ConfirmationPolicy } from './confirmation';
import type { OrchestrationContext } from './context';
import { describeError } from './errors';
import { DEFAULT_POLL, Stage } from './stage';
import type { PipelineDefinition, PollDefaults } from './types';

export type ExitCode = 0 | 1 | 2;

export interface PipelineReport {
  runId: string;
  pipeline: string;
  results: RunResult[];
  halted: boolean;
  haltedBy?: string;
  cancelled: boolean;
  /** Stages never attempted because of a halt or cancellation. */
  notRun: string[];
  residualWarnings: string[];
  exitCode: ExitCode;
  durationMs: number;
}

export type StageState = 'present' | 'absent' | 'unknown';

export interface StageInspection {
  stageName: string;
  state: StageState;
  detail?: string;
}

export interface OrchestratorOptions {
  confirmation: ConfirmationPolicy;
  defaults?: PollDefaults;
}

export function isFailure(result: RunResult): boolean {
  return result.status === 'failed' || result.status === 'rolled_back';
}

/** A fatal stage failed, or any stage failed with a FatalError. */
export function haltsPipeline(result: RunResult): boolean {
  return isFailure(result) && (result.fatal || result.errorCode === 'FATAL');
}

/**
 * 0 when nothing failed, 1 when a failure halted the run or the run was
 * cancelled, 2 when only non-fatal stages failed.
 */
export function computeExitCode(results: RunResult[], cancelled: boolean): ExitCode {
  const failures = results.filter(isFailure);
  if (cancelled || failures.some(haltsPipeline)) {
    return 1;
  }
  return failures.length > 0 ? 2 : 0;
}

export class Orchestrator {
  private readonly defaults: PollDefaults;

  constructor(private readonly options: OrchestratorOptions) {
    this.defaults = options.defaults ?? DEFAULT_POLL;
  }

  async runPipeline(pipeline: PipelineDefinition, ctx: OrchestrationContext): Promise<PipelineReport> {
    const startedAt = Date.now();
    const { logger } = ctx;
    const stages = pipeline.stages.map(definition => new Stage(definition));
    const results: RunResult[] = [];
    const notRun: string[] = [];
    let haltedBy: string | undefined;
    let cancelled = false;

    logger.section(`Pipeline ${pipeline.name} (run ${ctx.runId})`);
    if (pipeline.destructive) {
      logger.warn(`${pipeline.name} removes resources; confirmation mode is "${this.options.confirmation.mode}"`);
    }

    for (const [index, stage] of stages.entries()) {
      if (haltedBy || cancelled || ctx.signal?.aborted) {
        cancelled = cancelled || Boolean(ctx.signal?.aborted);
        notRun.push(stage.name);
        continue;
      }

      logger.section(`[${index + 1}/${stages.length}] ${stage.name}`);
      if (stage.definition.description) {
        logger.info(stage.definition.description);
      }

      const result = await stage.run(ctx, {
        confirm: this.options.confirmation.asConfirmFn(),
        defaults: this.defaults
      });
      results.push(result);
      this.logResult(ctx, result);

      if (haltsPipeline(result)) {
        haltedBy = stage.name;
        logger.error(
          result.fatal
            ? `${stage.name} is fatal; halting ${pipeline.name}`
            : `${stage.name} hit an unrecoverable error; halting ${pipeline.name}`
        );
      }
    }

    const residualWarnings = pipeline.destructive && !cancelled ? await this.probeResiduals(pipeline, ctx) : [];

    return {
      runId: ctx.runId,
      pipeline: pipeline.name,
      results,
      halted: haltedBy !== undefined,
      haltedBy,
      cancelled,
      notRun,
      residualWarnings,
      exitCode: computeExitCode(results, cancelled),
      durationMs: Date.now() - startedAt
    };
  }

  /**
   * Read-only view: evaluates each stage's idempotency check, nothing else.
   */
  async inspect(pipeline: PipelineDefinition, ctx: OrchestrationContext): Promise<StageInspection[]> {
    const inspections: StageInspection[] = [];
    for (const definition of pipeline.stages) {
      if (!definition.idempotencyCheck) {
        inspections.push({ stageName: definition.name, state: 'unknown', detail: 'no idempotency check' });
        continue;
      }
      try {
        const present = await definition.idempotencyCheck(ctx);
        inspections.push({ stageName: definition.name, state: present ? 'present' : 'absent' });
      } catch (error) {
        inspections.push({ stageName: definition.name, state: 'unknown', detail: describeError(error) });
      }
    }
    return inspections;
  }

  private async probeResiduals(pipeline: PipelineDefinition, ctx: OrchestrationContext): Promise<string[]> {
    const warnings: string[] = [];
    for (const probe of pipeline.residualProbes ?? []) {
      try {
        warnings.push(...(await probe.probe(ctx)));
      } catch (error) {
        warnings.push(`Could not verify ${probe.name}: ${describeError(error)}`);
      }
    }
    for (const warning of warnings) {
      ctx.logger.warn(warning);
    }
    return warnings;
  }

  private logResult(ctx: OrchestrationContext, result: RunResult): void {
    const { logger } = ctx;
    switch (result.status) {
      case 'applied':
        logger.success(`${result.stageName}: ${result.detail}`);
        if (result.warning) {
          logger.warn(`${result.stageName}: ${result.warning}`);
        }
        break;
      case 'skipped':
        logger.info(`${result.stageName}: skipped (${result.detail})`);
        break;
      case 'rolled_back':
      case 'failed':
        logger.error(`${result.stageName}: ${result.status.replace('_', ' ')} (${result.detail})`);
        if (result.remediation) {
          logger.info(`  hint: ${result.remediation}`);
        }
        break;
    }
  }
}
