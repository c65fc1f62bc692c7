import { CommandError, FatalError } from '../orchestration/errors';
import { didNotRun } from './exec';
import type { ClusterClient, CommandResult, CommandRunner, EnvSource, NodeInfo, PodInfo, ServiceInfo } from './types';

const UNAUTHORIZED = /Unauthorized|You must be logged in to the server|the server has asked for the client to provide credentials/i;
const NOT_FOUND = /\(NotFound\)/;

const NODE_FIELDS = '{range .items[*]}{.metadata.name}{"\\t"}{.status.conditions[?(@.type=="Ready")].status}{"\\n"}{end}';
const POD_FIELDS = '{range .items[*]}{.metadata.name}{"\\t"}{.status.phase}{"\\t"}{.status.containerStatuses[*].ready}{"\\n"}{end}';
const SERVICE_FIELDS = '{.spec.type}{"\\t"}{.spec.clusterIP}{"\\t"}{.status.loadBalancer.ingress[0].hostname}';

/**
 * kubectl wrapper. An authorization failure is raised as FatalError: polling
 * cannot fix it, a kubeconfig refresh or new credentials can.
 */
export class KubectlClient implements ClusterClient {
  constructor(
    private readonly runner: CommandRunner,
    private readonly env: EnvSource,
    private readonly binary: string = 'kubectl'
  ) {}

  async getNodes(): Promise<NodeInfo[]> {
    const stdout = await this.checked(['get', 'nodes', '-o', `jsonpath=${NODE_FIELDS}`]);
    return rows(stdout).map(([name, ready]) => ({ name, ready: ready === 'True' }));
  }

  async getPods(namespace: string, selector?: string): Promise<PodInfo[]> {
    const args = ['get', 'pods', '-n', namespace];
    if (selector) {
      args.push('-l', selector);
    }
    const stdout = await this.checked([...args, '-o', `jsonpath=${POD_FIELDS}`]);
    return rows(stdout).map(([name, phase = '', readiness = '']) => {
      const flags = readiness.split(' ').filter(Boolean);
      return { name, phase, ready: flags.length > 0 && flags.every(flag => flag === 'true') };
    });
  }

  async getService(namespace: string, name: string): Promise<ServiceInfo | null> {
    const result = await this.exec(['get', 'service', name, '-n', namespace, '-o', `jsonpath=${SERVICE_FIELDS}`]);
    if (result.code !== 0) {
      if (NOT_FOUND.test(result.stderr)) {
        return null;
      }
      throw new CommandError(`${this.binary} get service`, result.code, result.stderr);
    }

    const [type = '', clusterIP = '', hostname = ''] = result.stdout.split('\t');
    return {
      name,
      namespace,
      type,
      clusterIP: clusterIP || undefined,
      loadBalancerHostname: hostname.trim() || undefined
    };
  }

  async getEndpointAddresses(namespace: string, name: string): Promise<string[]> {
    const result = await this.exec(['get', 'endpoints', name, '-n', namespace, '-o', 'jsonpath={.subsets[*].addresses[*].ip}']);
    if (result.code !== 0) {
      if (NOT_FOUND.test(result.stderr)) {
        return [];
      }
      throw new CommandError(`${this.binary} get endpoints`, result.code, result.stderr);
    }
    return result.stdout.split(/\s+/).filter(Boolean);
  }

  namespaceExists(namespace: string): Promise<boolean> {
    return this.exists(['get', 'namespace', namespace, '-o', 'name']);
  }

  storageClassExists(name: string): Promise<boolean> {
    return this.exists(['get', 'storageclass', name, '-o', 'name']);
  }

  deploymentExists(namespace: string, name: string): Promise<boolean> {
    return this.exists(['get', 'deployment', name, '-n', namespace, '-o', 'name']);
  }

  async applyManifest(manifest: string): Promise<void> {
    await this.checked(['apply', '-f', '-'], manifest);
  }

  async deleteResource(kind: string, name: string, namespace?: string): Promise<void> {
    const args = ['delete', kind, name, '--ignore-not-found'];
    if (namespace) {
      args.push('-n', namespace);
    }
    await this.checked(args);
  }

  async deletePersistentVolumeClaims(namespace: string): Promise<void> {
    await this.checked(['delete', 'pvc', '--all', '-n', namespace, '--ignore-not-found']);
  }

  async getClaimPhase(namespace: string, name: string): Promise<string | null> {
    const result = await this.exec(['get', 'pvc', name, '-n', namespace, '-o', 'jsonpath={.status.phase}']);
    if (result.code !== 0) {
      if (NOT_FOUND.test(result.stderr)) {
        return null;
      }
      throw new CommandError(`${this.binary} get pvc`, result.code, result.stderr);
    }
    return result.stdout.trim() || null;
  }

  async updateKubeconfig(clusterName: string, region: string): Promise<void> {
    const result = await this.runner.run('aws', ['eks', 'update-kubeconfig', '--name', clusterName, '--region', region], {
      env: this.env()
    });
    if (result.code !== 0) {
      throw new CommandError('aws eks update-kubeconfig', result.code, result.stderr);
    }
  }

  private async exists(args: string[]): Promise<boolean> {
    const result = await this.exec(args);
    if (result.code === 0) {
      return true;
    }
    if (NOT_FOUND.test(result.stderr)) {
      return false;
    }
    throw new CommandError(`${this.binary} ${args.slice(0, 2).join(' ')}`, result.code, result.stderr);
  }

  private async checked(args: string[], input?: string): Promise<string> {
    const result = await this.exec(args, input);
    if (result.code !== 0) {
      throw new CommandError(`${this.binary} ${args.slice(0, 2).join(' ')}`, result.code, result.stderr);
    }
    return result.stdout;
  }

  private async exec(args: string[], input?: string): Promise<CommandResult> {
    const result = await this.runner.run(this.binary, args, { env: this.env(), input });
    if (didNotRun(result)) {
      throw new CommandError(`${this.binary} ${args.slice(0, 2).join(' ')}`, result.code, result.stderr);
    }
    if (result.code !== 0 && UNAUTHORIZED.test(result.stderr)) {
      throw new FatalError(`kubectl is not authorized against the cluster: ${result.stderr.trim()}`, {
        remediation: 'Refresh the kubeconfig (aws eks update-kubeconfig) or re-assume the admin role'
      });
    }
    return result;
  }
}

function rows(stdout: string): string[][] {
  return stdout
    .split('\n')
    .map(line => line.trim())
    .filter(Boolean)
    .map(line => line.split('\t'));
}
