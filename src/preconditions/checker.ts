import { existsSync } from 'fs';
import { homedir } from 'os';
import { join } from 'path';
import { activeCredentials } from '../orchestration/context';
import type { OrchestrationContext } from '../orchestration/context';
import { describeError } from '../orchestration/errors';
import type { Check, StageDefinition } from '../orchestration/types';
import { EXIT_NOT_INSTALLED } from '../provisioning/exec';
import type { ClusterClient, CommandRunner, EksApi, IdentityVerifier } from '../provisioning/types';
import type { CheckResult } from '../types';

export type Requirement =
  | { kind: 'tool-present'; tool: string }
  | { kind: 'credentials-valid' }
  | { kind: 'cluster-reachable' }
  | { kind: 'namespace-exists'; namespace: string }
  | { kind: 'storageclass-exists'; name: string }
  | { kind: 'service-exists'; namespace: string; name: string }
  | { kind: 'file-exists'; path: string }
  | { kind: 'cluster-absent'; clusterName?: string }
  | { kind: 'output-present'; key: string };

export interface CheckerDependencies {
  runner: CommandRunner;
  identity: IdentityVerifier;
  cluster: ClusterClient;
  eks: EksApi;
}

// Not every tool accepts --version.
const VERSION_ARGS: Record<string, string[]> = {
  kubectl: ['version', '--client'],
  helm: ['version', '--short'],
  terraform: ['version'],
  eksctl: ['version']
};

/**
 * Read-only checks of the outside world. `check` never throws: a failure to
 * evaluate a requirement is reported as not met.
 */
export class PreconditionChecker {
  constructor(private readonly deps: CheckerDependencies) {}

  async check(requirement: Requirement, ctx: OrchestrationContext): Promise<CheckResult> {
    try {
      return await this.evaluate(requirement, ctx);
    } catch (error) {
      return { ok: false, detail: describeError(error) };
    }
  }

  /** Wraps a requirement as a stage precondition, optionally with a recovery stage. */
  require(requirement: Requirement, recovery?: StageDefinition): Check {
    return {
      name: describeRequirement(requirement),
      run: ctx => this.check(requirement, ctx),
      recovery
    };
  }

  private async evaluate(requirement: Requirement, ctx: OrchestrationContext): Promise<CheckResult> {
    switch (requirement.kind) {
      case 'tool-present': {
        const args = VERSION_ARGS[requirement.tool] ?? ['--version'];
        const result = await this.deps.runner.run(requirement.tool, args, { timeoutMs: 30_000 });
        if (result.code === EXIT_NOT_INSTALLED) {
          return { ok: false, detail: `${requirement.tool} is not installed or not on PATH` };
        }
        const version = result.stdout.trim().split('\n')[0] ?? '';
        return { ok: true, detail: version || `${requirement.tool} found` };
      }

      case 'credentials-valid': {
        if (ctx.credentials && !activeCredentials(ctx)) {
          return { ok: false, detail: `Assumed credentials expired at ${ctx.credentials.expiresAt.toISOString()}` };
        }
        const identity = await this.deps.identity.getCallerIdentity();
        return { ok: true, detail: `Authenticated as ${identity.arn}` };
      }

      case 'cluster-reachable': {
        const nodes = await this.deps.cluster.getNodes();
        return nodes.length > 0
          ? { ok: true, detail: `${nodes.length} node(s) registered` }
          : { ok: false, detail: 'The cluster answered but has no nodes' };
      }

      case 'namespace-exists':
        return presence(await this.deps.cluster.namespaceExists(requirement.namespace), `Namespace ${requirement.namespace}`);

      case 'storageclass-exists':
        return presence(await this.deps.cluster.storageClassExists(requirement.name), `StorageClass ${requirement.name}`);

      case 'service-exists': {
        const service = await this.deps.cluster.getService(requirement.namespace, requirement.name);
        return presence(service !== null, `Service ${requirement.namespace}/${requirement.name}`);
      }

      case 'file-exists': {
        const path = expandHome(requirement.path);
        return presence(existsSync(path), path);
      }

      case 'cluster-absent': {
        const name = requirement.clusterName ?? ctx.clusterName;
        const cluster = await this.deps.eks.describeCluster(name);
        return cluster
          ? { ok: false, detail: `Cluster ${name} already exists (${cluster.status})` }
          : { ok: true, detail: `Cluster ${name} does not exist` };
      }

      case 'output-present':
        return ctx.outputs.get(requirement.key)
          ? { ok: true, detail: `${requirement.key} is set` }
          : { ok: false, detail: `${requirement.key} has not been published by an earlier stage` };
    }
  }
}

function presence(found: boolean, subject: string): CheckResult {
  return { ok: found, detail: found ? `${subject} exists` : `${subject} not found` };
}

export function expandHome(path: string): string {
  if (path === '~') {
    return homedir();
  }
  return path.startsWith('~/') ? join(homedir(), path.slice(2)) : path;
}

export function describeRequirement(requirement: Requirement): string {
  switch (requirement.kind) {
    case 'tool-present':
      return `${requirement.tool} installed`;
    case 'credentials-valid':
      return 'AWS credentials valid';
    case 'cluster-reachable':
      return 'cluster reachable';
    case 'namespace-exists':
      return `namespace ${requirement.namespace} exists`;
    case 'storageclass-exists':
      return `storage class ${requirement.name} exists`;
    case 'service-exists':
      return `service ${requirement.namespace}/${requirement.name} exists`;
    case 'file-exists':
      return `${requirement.path} exists`;
    case 'cluster-absent':
      return requirement.clusterName ? `cluster ${requirement.clusterName} absent` : 'cluster absent';
    case 'output-present':
      return `${requirement.key} available`;
  }
}
