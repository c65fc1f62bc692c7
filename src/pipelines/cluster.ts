import { ApplyError } from '../orchestration/errors';
import type { PipelineDefinition } from '../orchestration/types';
import { smokeTestDeployment, smokeTestService } from '../templates/manifests';
import { OUTPUTS, generateSshKeyStage, loadBalancerReady, sshPublicKeyPath, updateKubeconfigStage } from './common';
import type { PipelineServices } from './services';

export function clusterPipeline(services: PipelineServices): PipelineDefinition {
  const { cluster, smoke_test, orchestration } = services.config;
  const { checker } = services;

  return {
    name: 'cluster',
    description: 'EKS cluster with a managed node group and an nginx smoke test',
    stages: [
      {
        name: 'create-cluster',
        description: `Create ${cluster.name} with ${cluster.node_count} x ${cluster.node_type} (15 to 20 minutes)`,
        fatal: true,
        preconditions: [
          checker.require({ kind: 'tool-present', tool: 'eksctl' }),
          checker.require({ kind: 'credentials-valid' }),
          checker.require({ kind: 'file-exists', path: sshPublicKeyPath(services) }, generateSshKeyStage(services))
        ],
        idempotencyCheck: ctx => services.clusters.clusterExists(ctx.clusterName, ctx.region),
        apply: async ctx => {
          await services.clusters.createCluster({
            name: ctx.clusterName,
            region: ctx.region,
            nodeGroupName: `${ctx.clusterName}-nodes`,
            nodeType: cluster.node_type,
            nodeCount: cluster.node_count,
            zones: cluster.zones,
            sshPublicKeyPath: sshPublicKeyPath(services),
            kubernetesVersion: cluster.kubernetes_version
          });
          return { detail: `Cluster ${ctx.clusterName} created`, resources: [{ kind: 'EKSCluster', name: ctx.clusterName }] };
        },
        readinessCheck: async ctx => (await services.eks.describeCluster(ctx.clusterName))?.status === 'ACTIVE',
        rollback: async ctx => {
          if (await services.clusters.clusterExists(ctx.clusterName, ctx.region)) {
            await services.clusters.deleteCluster(ctx.clusterName, ctx.region);
          }
        }
      },
      updateKubeconfigStage(services),
      {
        name: 'verify-nodes',
        description: 'Wait for every node to report Ready',
        fatal: true,
        preconditions: [checker.require({ kind: 'tool-present', tool: 'kubectl' })],
        apply: async () => {
          const nodes = await services.cluster.getNodes();
          return { detail: `${nodes.filter(node => node.ready).length}/${nodes.length} node(s) ready` };
        },
        readinessCheck: async () => {
          const nodes = await services.cluster.getNodes();
          return nodes.length >= cluster.node_count && nodes.every(node => node.ready);
        },
        maxRetries: orchestration.pod_attempts
      },
      {
        name: 'deploy-nginx',
        description: `Deploy ${smoke_test.image} behind a LoadBalancer service`,
        fatal: false,
        idempotencyCheck: async () =>
          (await services.cluster.deploymentExists(smoke_test.namespace, smoke_test.name)) &&
          (await services.cluster.getService(smoke_test.namespace, smoke_test.name)) !== null,
        apply: async () => {
          await services.cluster.applyManifest(
            services.templates.render([smokeTestDeployment(smoke_test), smokeTestService(smoke_test)])
          );
          return {
            detail: `Deployment and service ${smoke_test.name} applied`,
            resources: [
              { kind: 'Deployment', name: smoke_test.name, namespace: smoke_test.namespace },
              { kind: 'Service', name: smoke_test.name, namespace: smoke_test.namespace }
            ]
          };
        },
        readinessCheck: loadBalancerReady(services, smoke_test.namespace, smoke_test.name, OUTPUTS.smokeTestUrl),
        rollback: async () => {
          await services.cluster.deleteResource('service', smoke_test.name, smoke_test.namespace);
          await services.cluster.deleteResource('deployment', smoke_test.name, smoke_test.namespace);
        }
      },
      {
        name: 'check-nginx',
        description: 'Request the smoke test through its load balancer',
        fatal: false,
        apply: async ctx => {
          const service = await services.cluster.getService(smoke_test.namespace, smoke_test.name);
          if (!service?.loadBalancerHostname) {
            throw new ApplyError(`Service ${smoke_test.name} has no load balancer hostname yet`, {
              remediation: `Check it later with "kubectl get service ${smoke_test.name} -n ${smoke_test.namespace}"`
            });
          }
          const url = `http://${service.loadBalancerHostname}`;
          ctx.outputs.set(OUTPUTS.smokeTestUrl, url);
          return { detail: `Probing ${url}` };
        },
        readinessCheck: async ctx => {
          const url = ctx.outputs.get(OUTPUTS.smokeTestUrl);
          if (!url) {
            return false;
          }
          const body = await services.http.fetchText(url, 10_000);
          return body?.includes(smoke_test.expected_body) ?? false;
        },
        // DNS for a fresh load balancer usually resolves within a few minutes.
        maxRetries: 6
      }
    ]
  };
}
