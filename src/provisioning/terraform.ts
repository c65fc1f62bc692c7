import { existsSync } from 'fs';
import { isAbsolute, join } from 'path';
import { CommandError } from '../orchestration/errors';
import { runChecked } from './exec';
import { parseJson, isRecord } from './json';
import type { CommandRunner, EnvSource, InfraApplyResult, InfraDestroyResult, InfraProvisioner } from './types';

export interface TerraformOptions {
  /** Directory that plan ids are resolved against. */
  rootDir: string;
  env: EnvSource;
  binary?: string;
}

const COMMON_FLAGS = ['-input=false', '-no-color'];

/**
 * Terraform CLI wrapper. A plan id names a configuration directory under
 * `rootDir`, e.g. `00_terraform_backend`.
 */
export class TerraformCli implements InfraProvisioner {
  private readonly binary: string;

  constructor(private readonly runner: CommandRunner, private readonly options: TerraformOptions) {
    this.binary = options.binary ?? 'terraform';
  }

  directory(planId: string): string {
    return isAbsolute(planId) ? planId : join(this.options.rootDir, planId);
  }

  async apply(planId: string): Promise<InfraApplyResult> {
    await this.ensureInitialized(planId);
    const before = new Set(await this.resources(planId));
    await this.exec(planId, ['apply', '-auto-approve', ...COMMON_FLAGS]);
    const after = await this.resources(planId);

    return {
      created: after.filter(address => !before.has(address)),
      outputs: await this.outputs(planId)
    };
  }

  async destroy(planId: string): Promise<InfraDestroyResult> {
    await this.ensureInitialized(planId);
    const before = await this.resources(planId);
    await this.exec(planId, ['destroy', '-auto-approve', ...COMMON_FLAGS]);
    return { destroyed: before };
  }

  /**
   * `plan -detailed-exitcode` exits 0 for no changes and 2 when changes are pending.
   */
  async hasDrift(planId: string): Promise<boolean> {
    await this.ensureInitialized(planId);
    const result = await this.runner.run(this.binary, ['plan', '-detailed-exitcode', '-lock=false', ...COMMON_FLAGS], {
      cwd: this.directory(planId),
      env: this.options.env()
    });
    if (result.code === 0) {
      return false;
    }
    if (result.code === 2) {
      return true;
    }
    throw new CommandError(`${this.binary} plan`, result.code, result.stderr);
  }

  async outputs(planId: string): Promise<Record<string, string>> {
    const stdout = await this.exec(planId, ['output', '-json', '-no-color']);
    const parsed = parseJson(stdout);
    const outputs: Record<string, string> = {};
    if (!isRecord(parsed)) {
      return outputs;
    }

    for (const [key, entry] of Object.entries(parsed)) {
      if (!isRecord(entry)) {
        continue;
      }
      const { value } = entry;
      outputs[key] = typeof value === 'string' ? value : JSON.stringify(value);
    }
    return outputs;
  }

  async resources(planId: string): Promise<string[]> {
    const result = await this.runner.run(this.binary, ['state', 'list'], {
      cwd: this.directory(planId),
      env: this.options.env()
    });
    if (result.code !== 0) {
      if (/No state file was found/i.test(result.stderr)) {
        return [];
      }
      throw new CommandError(`${this.binary} state list`, result.code, result.stderr);
    }
    return result.stdout
      .split('\n')
      .map(line => line.trim())
      .filter(Boolean);
  }

  private async ensureInitialized(planId: string): Promise<void> {
    if (existsSync(join(this.directory(planId), '.terraform'))) {
      return;
    }
    await this.exec(planId, ['init', ...COMMON_FLAGS]);
  }

  private exec(planId: string, args: string[]): Promise<string> {
    return runChecked(this.runner, this.binary, args, {
      cwd: this.directory(planId),
      env: this.options.env()
    });
  }
}
