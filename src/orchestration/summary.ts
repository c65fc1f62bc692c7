import chalk from 'chalk';
import type { StageStatus } from '../types';
import type { PipelineReport } from './orchestrator';

const STATUS_SYMBOL: Record<StageStatus, string> = {
  applied: '✔',
  skipped: '○',
  failed: '✖',
  rolled_back: '↺'
};

export function formatDuration(ms: number): string {
  if (ms < 1000) {
    return `${ms}ms`;
  }
  if (ms < 60_000) {
    return `${(ms / 1000).toFixed(1)}s`;
  }
  const minutes = Math.floor(ms / 60_000);
  const seconds = Math.round((ms % 60_000) / 1000);
  return `${minutes}m ${seconds}s`;
}

export interface SummaryOptions {
  color?: boolean;
}

export function formatSummary(report: PipelineReport, options: SummaryOptions = {}): string {
  const paint = new chalk.Instance({ level: options.color === false ? 0 : chalk.level });
  const colorFor = (status: StageStatus): chalk.Chalk => {
    switch (status) {
      case 'applied':
        return paint.green;
      case 'skipped':
        return paint.gray;
      case 'failed':
        return paint.red;
      case 'rolled_back':
        return paint.yellow;
    }
  };

  const nameWidth = Math.max(0, ...report.results.map(result => result.stageName.length), ...report.notRun.map(name => name.length));
  const lines: string[] = [paint.bold(`Summary: ${report.pipeline} (run ${report.runId})`)];

  for (const result of report.results) {
    const status = colorFor(result.status)(`${STATUS_SYMBOL[result.status]} ${result.status.padEnd(11)}`);
    lines.push(`  ${status} ${result.stageName.padEnd(nameWidth)}  ${formatDuration(result.durationMs).padStart(7)}  ${result.detail}`);
    if (result.warning) {
      lines.push(paint.yellow(`      warning: ${result.warning}`));
    }
  }
  for (const name of report.notRun) {
    lines.push(paint.gray(`  - not run     ${name}`));
  }

  if (report.residualWarnings.length > 0) {
    lines.push('', paint.yellow('Resources that may still exist:'));
    for (const warning of report.residualWarnings) {
      lines.push(paint.yellow(`  ! ${warning}`));
    }
  }

  const outcome = report.exitCode === 0 ? paint.green('succeeded') : paint.red('failed');
  const halted = report.haltedBy ? `, halted by ${report.haltedBy}` : '';
  const cancelled = report.cancelled ? ', cancelled' : '';
  lines.push('', `Result: ${outcome}${halted}${cancelled} (exit code ${report.exitCode}, ${formatDuration(report.durationMs)})`);

  return lines.join('\n');
}

/** Lines for the `*_url` values stages published, e.g. Grafana's address. */
export function formatEndpoints(outputs: ReadonlyMap<string, string>, options: SummaryOptions = {}): string[] {
  const paint = new chalk.Instance({ level: options.color === false ? 0 : chalk.level });
  return [...outputs.entries()]
    .filter(([key]) => key.endsWith('_url'))
    .map(([key, url]) => `  ${key.slice(0, -'_url'.length).padEnd(12)} ${paint.underline(url)}`);
}
