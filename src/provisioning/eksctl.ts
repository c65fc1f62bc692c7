import { CommandError } from '../orchestration/errors';
import { didNotRun, runChecked } from './exec';
import type { ClusterProvisioner, ClusterSpec, CommandRunner, EnvSource } from './types';

// eksctl waits on CloudFormation; creation commonly takes 15 to 20 minutes.
const CLUSTER_TIMEOUT_MS = 40 * 60 * 1000;

export class EksctlClient implements ClusterProvisioner {
  constructor(
    private readonly runner: CommandRunner,
    private readonly env: EnvSource,
    private readonly binary: string = 'eksctl'
  ) {}

  async clusterExists(name: string, region: string): Promise<boolean> {
    const result = await this.runner.run(this.binary, ['get', 'cluster', '--name', name, '--region', region, '-o', 'json'], {
      env: this.env()
    });
    if (result.code === 0) {
      return true;
    }
    if (!didNotRun(result) && /ResourceNotFoundException|No cluster found/i.test(result.stderr)) {
      return false;
    }
    throw new CommandError(`${this.binary} get cluster`, result.code, result.stderr);
  }

  async createCluster(spec: ClusterSpec): Promise<void> {
    await runChecked(this.runner, this.binary, createClusterArgs(spec), {
      env: this.env(),
      timeoutMs: CLUSTER_TIMEOUT_MS
    });
  }

  async deleteCluster(name: string, region: string): Promise<void> {
    await runChecked(this.runner, this.binary, ['delete', 'cluster', '--name', name, '--region', region, '--wait'], {
      env: this.env(),
      timeoutMs: CLUSTER_TIMEOUT_MS
    });
  }

  async associateOidcProvider(name: string, region: string): Promise<void> {
    await runChecked(
      this.runner,
      this.binary,
      ['utils', 'associate-iam-oidc-provider', '--cluster', name, '--region', region, '--approve'],
      { env: this.env() }
    );
  }
}

export function createClusterArgs(spec: ClusterSpec): string[] {
  const args = [
    'create',
    'cluster',
    '--name',
    spec.name,
    '--region',
    spec.region,
    '--nodegroup-name',
    spec.nodeGroupName,
    '--node-type',
    spec.nodeType,
    '--nodes',
    String(spec.nodeCount),
    '--with-oidc',
    '--ssh-access',
    '--ssh-public-key',
    spec.sshPublicKeyPath,
    '--managed',
    '--full-ecr-access',
    '--zones',
    spec.zones.join(',')
  ];
  if (spec.kubernetesVersion) {
    args.push('--version', spec.kubernetesVersion);
  }
  return args;
}
