import { dump } from 'js-yaml';
import { ApplyError, CommandError } from '../orchestration/errors';
import { didNotRun } from './exec';
import { isRecord, numberField, parseJson, stringField } from './json';
import type { ChartInstaller, ChartSource, CommandRunner, EnvSource, InstallOptions, ReleaseRef } from './types';

const PENDING = /pending|deploying/i;
const RELEASE_NOT_FOUND = /release: not found/i;

export class HelmClient implements ChartInstaller {
  constructor(
    private readonly runner: CommandRunner,
    private readonly env: EnvSource,
    private readonly binary: string = 'helm'
  ) {}

  /**
   * `upgrade --install`, so a second call with the same values is a no-op
   * revision rather than an error. Refuses to run over a pending operation.
   */
  async install(
    source: ChartSource,
    namespace: string,
    values: Record<string, unknown>,
    options: InstallOptions
  ): Promise<ReleaseRef> {
    const existing = await this.getRelease(options.release, namespace);
    if (existing?.status && PENDING.test(existing.status)) {
      throw new ApplyError(`Helm release ${options.release} has an operation in progress (${existing.status})`, {
        remediation: `Wait for it to finish, or run "helm rollback ${options.release} -n ${namespace}"`
      });
    }

    await this.checked(['repo', 'add', source.repoName, source.repoUrl, '--force-update']);
    await this.checked(['repo', 'update', source.repoName]);

    const args = [
      'upgrade',
      '--install',
      options.release,
      `${source.repoName}/${source.chart}`,
      '--namespace',
      namespace,
      '--create-namespace',
      '--values',
      '-'
    ];
    if (source.version) {
      args.push('--version', source.version);
    }
    await this.checked(args, dump(values, { noRefs: true }));

    return (await this.getRelease(options.release, namespace)) ?? { name: options.release, namespace };
  }

  async uninstall(ref: Pick<ReleaseRef, 'name' | 'namespace'>): Promise<boolean> {
    const result = await this.runner.run(this.binary, ['uninstall', ref.name, '--namespace', ref.namespace], {
      env: this.env()
    });
    if (result.code === 0) {
      return true;
    }
    if (!didNotRun(result) && RELEASE_NOT_FOUND.test(result.stderr)) {
      return false;
    }
    throw new CommandError(`${this.binary} uninstall`, result.code, result.stderr);
  }

  async getRelease(name: string, namespace: string): Promise<ReleaseRef | null> {
    const stdout = await this.checked(['list', '--all', '--namespace', namespace, '--filter', `^${name}$`, '--output', 'json']);
    const parsed = parseJson(stdout);
    if (!Array.isArray(parsed)) {
      return null;
    }

    for (const entry of parsed) {
      if (isRecord(entry) && stringField(entry, 'name') === name) {
        return {
          name,
          namespace: stringField(entry, 'namespace') ?? namespace,
          revision: numberField(entry, 'revision'),
          status: stringField(entry, 'status'),
          chart: stringField(entry, 'chart')
        };
      }
    }
    return null;
  }

  private async checked(args: string[], input?: string): Promise<string> {
    const result = await this.runner.run(this.binary, args, { env: this.env(), input });
    if (result.code !== 0) {
      throw new CommandError(`${this.binary} ${args[0]}`, result.code, result.stderr);
    }
    return result.stdout;
  }
}
