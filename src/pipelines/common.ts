import { mkdirSync } from 'fs';
import { dirname, join } from 'path';
import type { OrchestrationContext } from '../orchestration/context';
import { ApplyError } from '../orchestration/errors';
import { waitUntil } from '../orchestration/poller';
import type { Check, ReadinessFn, StageDefinition } from '../orchestration/types';
import { expandHome } from '../preconditions/checker';
import { runChecked } from '../provisioning/exec';
import type { PipelineServices } from './services';

/** Keys stages publish into `ctx.outputs`. */
export const OUTPUTS = {
  adminRoleArn: 'admin_role_arn',
  oidcIssuer: 'oidc_issuer',
  csiRoleArn: 'ebs_csi_role_arn',
  smokeTestUrl: 'smoke_test_url',
  prometheusUrl: 'prometheus_url',
  grafanaUrl: 'grafana_url'
} as const;

export function sshPublicKeyPath(services: PipelineServices): string {
  const { ssh_key_dir, ssh_key_name } = services.config.cluster;
  return join(expandHome(ssh_key_dir), `${ssh_key_name}.pub`);
}

/** Recovery for a missing SSH public key. */
export function generateSshKeyStage(services: PipelineServices): StageDefinition {
  const publicKey = sshPublicKeyPath(services);
  const privateKey = publicKey.replace(/\.pub$/, '');
  return {
    name: 'generate-ssh-key',
    description: `Generate an RSA key pair at ${privateKey}`,
    fatal: true,
    apply: async () => {
      mkdirSync(dirname(privateKey), { recursive: true, mode: 0o700 });
      await runChecked(services.runner, 'ssh-keygen', ['-t', 'rsa', '-b', '2048', '-f', privateKey, '-N', '']);
      return { detail: `Generated ${publicKey}` };
    }
  };
}

export function updateKubeconfigStage(services: PipelineServices, name = 'update-kubeconfig'): StageDefinition {
  return {
    name,
    description: 'Point kubectl at the cluster',
    fatal: true,
    preconditions: [services.checker.require({ kind: 'tool-present', tool: 'aws' })],
    apply: async ctx => {
      await services.cluster.updateKubeconfig(ctx.clusterName, ctx.region);
      return { detail: `kubeconfig updated for ${ctx.clusterName}` };
    }
  };
}

/** cluster-reachable, refreshing the kubeconfig once when it fails. */
export function clusterReachable(services: PipelineServices): Check {
  return services.checker.require({ kind: 'cluster-reachable' }, updateKubeconfigStage(services, 'refresh-kubeconfig'));
}

export async function clusterGone(services: PipelineServices, ctx: OrchestrationContext): Promise<boolean> {
  return (await services.eks.describeCluster(ctx.clusterName)) === null;
}

export function podsRunning(services: PipelineServices, namespace: string, selector: string): ReadinessFn {
  return async () => {
    const pods = await services.cluster.getPods(namespace, selector);
    return pods.some(pod => pod.phase === 'Running');
  };
}

/**
 * Ready once the service has a load balancer hostname; publishes the URL
 * under `outputKey`.
 */
export function loadBalancerReady(
  services: PipelineServices,
  namespace: string,
  name: string,
  outputKey: string
): ReadinessFn {
  return async ctx => {
    const service = await services.cluster.getService(namespace, name);
    if (!service?.loadBalancerHostname) {
      return false;
    }
    ctx.outputs.set(outputKey, `http://${service.loadBalancerHostname}`);
    return true;
  };
}

export function publishOutputs(ctx: OrchestrationContext, outputs: Record<string, string>): void {
  for (const [key, value] of Object.entries(outputs)) {
    ctx.outputs.set(key, value);
  }
}

export function describeChange(created: string[]): string {
  return created.length === 0 ? 'No changes' : `Created ${created.length} resource(s)`;
}

/**
 * Polls until `gone` holds, at the configured interval. Throws ApplyError
 * when the attempts run out.
 */
export async function waitForRemoval(
  services: PipelineServices,
  ctx: OrchestrationContext,
  what: string,
  gone: () => Promise<boolean>
): Promise<void> {
  const { poll_interval_seconds, max_attempts } = services.config.orchestration;
  const result = await waitUntil(gone, {
    intervalMs: poll_interval_seconds * 1000,
    maxAttempts: max_attempts,
    signal: ctx.signal,
    onAttempt: attempt => ctx.logger.debug(`waiting for ${what} to be removed (attempt ${attempt})`)
  });
  if (!result.satisfied) {
    throw new ApplyError(`${what} was still present after ${result.attempts} attempt(s)`);
  }
}
