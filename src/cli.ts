#!/usr/bin/env node

import { Command, Option } from 'commander';
import chalk from 'chalk';
import ora from 'ora';
import type { Ora } from 'ora';
import { existsSync, readFileSync, writeFileSync } from 'fs';
import { join, resolve } from 'path';
import { DEFAULT_CONFIG_FILE } from './config/defaults';
import { OrchestratorConfigLoader, loadDefaultConfig } from './config/loader';
import { renderStarterConfig } from './config/starter';
import { ConsoleLogger } from './logging/logger';
import type { Logger } from './logging/logger';
import { ConfirmationPolicy, InquirerPrompter, parseConfirmationMode } from './orchestration/confirmation';
import { createContext, credentialsToExports } from './orchestration/context';
import type { OrchestrationContext } from './orchestration/context';
import { ConfigError, describeError, remediationOf } from './orchestration/errors';
import { Orchestrator } from './orchestration/orchestrator';
import type { ExitCode, PipelineReport } from './orchestration/orchestrator';
import { formatEndpoints, formatSummary } from './orchestration/summary';
import { buildPipeline, listPipelines } from './pipelines/registry';
import { createServices } from './pipelines/services';
import type { PipelineServices } from './pipelines/services';
import type { OrchestratorConfig } from './types';

type GlobalOptions = {
  config?: string;
  verbose?: boolean;
};

interface RunOptions {
  confirm?: string;
  yes?: boolean;
  json?: boolean;
}

interface InitOptions {
  output: string;
  project?: string;
  region?: string;
  cluster?: string;
  force?: boolean;
}

interface Session {
  config: OrchestratorConfig;
  ctx: OrchestrationContext;
  services: PipelineServices;
  logger: Logger;
}

function packageVersion(): string {
  const manifest: unknown = JSON.parse(readFileSync(join(__dirname, '..', 'package.json'), 'utf8'));
  if (typeof manifest === 'object' && manifest !== null && 'version' in manifest && typeof manifest.version === 'string') {
    return manifest.version;
  }
  return '0.0.0';
}

async function loadConfig(options: GlobalOptions): Promise<OrchestratorConfig> {
  if (options.config) {
    return new OrchestratorConfigLoader().load(resolve(process.cwd(), options.config));
  }
  return loadDefaultConfig(process.cwd());
}

async function openSession(options: GlobalOptions, signal?: AbortSignal): Promise<Session> {
  const config = await loadConfig(options);
  const logger = new ConsoleLogger({ verbose: options.verbose });
  const ctx = createContext({
    region: config.aws.region,
    clusterName: config.cluster.name,
    profile: config.aws.profile,
    logger,
    signal
  });
  return { config, ctx, services: createServices(config, ctx), logger };
}

function fail(error: unknown, spinner?: Ora, verbose?: boolean): void {
  spinner?.fail(spinner.text);
  console.error(chalk.red('❌ Error:'), describeError(error));
  const remediation = remediationOf(error);
  if (remediation) {
    console.error(chalk.yellow(`💡 ${remediation}`));
  }
  if (verbose) {
    console.error(error);
  }
  process.exitCode = 1;
}

/** Worst exit code wins: 1 over 2 over 0. */
function combineExitCodes(reports: PipelineReport[]): ExitCode {
  if (reports.some(report => report.exitCode === 1)) {
    return 1;
  }
  return reports.some(report => report.exitCode === 2) ? 2 : 0;
}

const program = new Command();

program
  .name('stagecraft')
  .description('Provision and tear down an EKS monitoring environment in idempotent stages')
  .version(packageVersion())
  .option('-c, --config <path>', `Configuration file (default: ${DEFAULT_CONFIG_FILE} in the working directory)`)
  .option('-v, --verbose', 'Enable debug logging')
  .showHelpAfterError();

program
  .command('init')
  .description('Write a starter configuration file')
  .option('-o, --output <path>', 'Output configuration file path', DEFAULT_CONFIG_FILE)
  .option('-p, --project <name>', 'Project name; prefixes the state bucket and lock table')
  .option('-r, --region <region>', 'AWS region')
  .option('--cluster <name>', 'EKS cluster name')
  .option('-f, --force', 'Overwrite an existing file')
  .action((options: InitOptions) => {
    const spinner = ora('Writing configuration...').start();
    try {
      const target = resolve(process.cwd(), options.output);
      if (existsSync(target) && !options.force) {
        throw new ConfigError(`${options.output} already exists`, { remediation: 'Pass --force to overwrite it' });
      }
      writeFileSync(
        target,
        renderStarterConfig({ project: options.project, region: options.region, clusterName: options.cluster })
      );

      spinner.succeed(`Configuration file created: ${options.output}`);
      console.log(chalk.green('\n✅ Next steps:'));
      console.log('1. Review the configuration file');
      console.log('2. Make sure your AWS credentials are configured');
      console.log(`3. Run: ${chalk.cyan('stagecraft run bootstrap')}`);
    } catch (error) {
      fail(error, spinner);
    }
  });

program
  .command('list')
  .description('List the pipelines that can be run')
  .action(async () => {
    try {
      const { services } = await openSession(program.opts<GlobalOptions>());
      for (const entry of listPipelines(services)) {
        const name = entry.composite ? chalk.magenta(entry.name.padEnd(18)) : chalk.cyan(entry.name.padEnd(18));
        console.log(`  ${name} ${entry.description}`);
      }
    } catch (error) {
      fail(error);
    }
  });

program
  .command('plan')
  .description('Show the stages a pipeline would run, without touching anything')
  .argument('<pipeline>', 'Pipeline or composite name')
  .action(async (name: string) => {
    try {
      const { services } = await openSession(program.opts<GlobalOptions>());
      const pipeline = buildPipeline(name, services);

      console.log(chalk.bold(`${pipeline.name}: ${pipeline.description}`));
      if (pipeline.destructive) {
        console.log(chalk.red('  removes resources'));
      }
      for (const [index, stage] of pipeline.stages.entries()) {
        const flag = stage.fatal ? chalk.red('fatal') : chalk.gray('non-fatal');
        console.log(`\n  ${index + 1}. ${chalk.cyan(stage.name)} (${flag})`);
        if (stage.description) {
          console.log(`     ${stage.description}`);
        }
        for (const check of stage.preconditions ?? []) {
          console.log(chalk.gray(`     requires ${check.name}${check.recovery ? `, else runs ${check.recovery.name}` : ''}`));
        }
        if (stage.confirmation) {
          console.log(chalk.gray('     asks for confirmation'));
        }
        const alternatives = (stage.alternatives ?? []).map(strategy => strategy.name);
        if (alternatives.length > 0) {
          console.log(chalk.gray(`     falls back to ${alternatives.join(', ')}`));
        }
      }
    } catch (error) {
      fail(error);
    }
  });

program
  .command('status')
  .description("Report which of a pipeline's stages are already in place")
  .argument('<pipeline>', 'Pipeline or composite name')
  .action(async (name: string) => {
    const globals = program.opts<GlobalOptions>();
    const spinner = ora(`Inspecting ${name}...`);
    try {
      const { services, ctx, config } = await openSession(globals);
      const pipeline = buildPipeline(name, services);
      const orchestrator = new Orchestrator({
        confirmation: new ConfirmationPolicy('proceed', new InquirerPrompter(ctx.logger), ctx.logger),
        defaults: { maxRetries: config.orchestration.max_attempts, pollIntervalSeconds: config.orchestration.poll_interval_seconds }
      });

      spinner.start();
      const inspections = await orchestrator.inspect(pipeline, ctx);
      spinner.succeed(`${pipeline.name} on ${ctx.clusterName} (${ctx.region})`);

      for (const inspection of inspections) {
        const state =
          inspection.state === 'present'
            ? chalk.green('present')
            : inspection.state === 'absent'
              ? chalk.yellow('absent ')
              : chalk.gray('unknown');
        const detail = inspection.detail ? chalk.gray(`  ${inspection.detail}`) : '';
        console.log(`  ${state}  ${inspection.stageName}${detail}`);
      }
    } catch (error) {
      fail(error, spinner.isSpinning ? spinner : undefined, globals.verbose);
    }
  });

program
  .command('run')
  .description('Run one or more pipelines in order')
  .argument('<pipelines...>', 'Pipeline or composite names')
  .addOption(
    new Option('--confirm <mode>', 'How confirmation gates are answered').choices(['proceed', 'prompt', 'auto-approve'])
  )
  .option('-y, --yes', 'Approve every confirmation gate (same as --confirm auto-approve)')
  .option('--json', 'Print the run reports as JSON on stdout')
  .action(async (names: string[], options: RunOptions) => {
    const globals = program.opts<GlobalOptions>();
    const controller = new AbortController();
    const onInterrupt = () => {
      console.error(chalk.yellow('\nInterrupted; stopping after the current step'));
      controller.abort();
    };
    process.once('SIGINT', onInterrupt);

    try {
      const { config, ctx, services, logger } = await openSession(globals, controller.signal);
      const pipelines = names.map(name => buildPipeline(name, services));
      const mode = options.yes ? 'auto-approve' : parseConfirmationMode(options.confirm ?? config.orchestration.confirmation);
      const orchestrator = new Orchestrator({
        confirmation: new ConfirmationPolicy(mode, new InquirerPrompter(logger), logger),
        defaults: { maxRetries: config.orchestration.max_attempts, pollIntervalSeconds: config.orchestration.poll_interval_seconds }
      });

      const reports: PipelineReport[] = [];
      for (const pipeline of pipelines) {
        const report = await orchestrator.runPipeline(pipeline, ctx);
        reports.push(report);
        if (!options.json) {
          console.error(`\n${formatSummary(report)}`);
        }
        if (report.exitCode === 1) {
          break;
        }
      }

      if (options.json) {
        console.log(JSON.stringify(reports, null, 2));
      } else {
        const endpoints = formatEndpoints(ctx.outputs);
        if (endpoints.length > 0) {
          console.error(chalk.blue('\n🌐 Endpoints:'));
          endpoints.forEach(line => console.error(line));
        }
      }
      process.exitCode = combineExitCodes(reports);
    } catch (error) {
      fail(error, undefined, globals.verbose);
    } finally {
      process.removeListener('SIGINT', onInterrupt);
    }
  });

program
  .command('credentials')
  .description('Assume the cluster admin role and print its credentials as export lines')
  .action(async () => {
    const globals = program.opts<GlobalOptions>();
    const spinner = ora('Assuming the admin role...').start();
    try {
      const { config, services } = await openSession(globals);
      const outputs = await services.infra.outputs(config.terraform.eks_infrastructure_dir);
      const roleArn = outputs[config.access.role_arn_output];
      if (!roleArn) {
        throw new ConfigError(`${config.terraform.eks_infrastructure_dir} has no "${config.access.role_arn_output}" output`, {
          remediation: 'Run "stagecraft run access" first'
        });
      }

      const credentials = await services.identity.assumeRole(
        roleArn,
        config.access.duration_seconds,
        config.access.session_name
      );
      spinner.succeed(`Assumed ${roleArn} until ${credentials.expiresAt.toISOString()}`);
      credentialsToExports(credentials).forEach(line => console.log(line));
    } catch (error) {
      fail(error, spinner, globals.verbose);
    }
  });

program.parseAsync(process.argv).catch((error: unknown) => {
  fail(error);
});
