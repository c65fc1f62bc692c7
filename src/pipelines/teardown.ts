import type { OrchestrationContext } from '../orchestration/context';
import type { PipelineDefinition, ResidualProbe, StageDefinition } from '../orchestration/types';
import type { ChartConfig } from '../types';
import { clusterGone, waitForRemoval } from './common';
import type { PipelineServices } from './services';

/**
 * Removes everything that runs in or makes up the cluster. Stages are
 * non-fatal so one stuck resource does not leave the rest behind.
 */
export function teardownClusterPipeline(services: PipelineServices): PipelineDefinition {
  const { smoke_test, monitoring, terraform, storage } = services.config;
  const { cluster, clusters, eks, infra, roles } = services;

  const deleteCluster: StageDefinition = {
    name: 'delete-cluster',
    description: 'Delete the EKS cluster and its node groups',
    fatal: false,
    idempotencyCheck: ctx => clusterGone(services, ctx),
    confirmation: ctx => Promise.resolve({
      message: `Delete EKS cluster ${ctx.clusterName}? This cannot be undone`,
      defaultAnswer: true
    }),
    apply: async ctx => {
      await clusters.deleteCluster(ctx.clusterName, ctx.region);
      return { detail: `Cluster ${ctx.clusterName} deleted with eksctl` };
    },
    alternatives: [
      {
        name: 'eks-api',
        apply: async ctx => {
          const nodegroups = await eks.listNodegroups(ctx.clusterName);
          for (const nodegroup of nodegroups) {
            ctx.logger.info(`Deleting node group ${nodegroup}`);
            await eks.deleteNodegroup(ctx.clusterName, nodegroup);
            await waitForRemoval(services, ctx, `node group ${nodegroup}`, async () =>
              !(await eks.listNodegroups(ctx.clusterName)).includes(nodegroup)
            );
          }
          await eks.deleteCluster(ctx.clusterName);
          return { detail: `Deleted ${nodegroups.length} node group(s) and the control plane through the EKS API` };
        },
        readinessCheck: ctx => clusterGone(services, ctx)
      }
    ],
    readinessCheck: ctx => clusterGone(services, ctx)
  };

  // The storage pipeline creates this role outside Terraform; nothing else removes it.
  const deleteCsiRole: StageDefinition = {
    name: 'delete-ebs-csi-role',
    description: `Delete IAM role ${storage.csi_role_name}`,
    fatal: false,
    idempotencyCheck: async () => (await roles.getRoleArn(storage.csi_role_name)) === null,
    confirmation: async ctx =>
      (await clusterGone(services, ctx))
        ? { message: `Delete IAM role ${storage.csi_role_name}?`, defaultAnswer: true }
        : {
            message: `Cluster ${ctx.clusterName} still uses ${storage.csi_role_name}. Delete the role anyway?`,
            defaultAnswer: false
          },
    apply: async () => {
      const deleted = await roles.deleteRole(storage.csi_role_name);
      return { detail: deleted ? `Deleted IAM role ${storage.csi_role_name}` : `IAM role ${storage.csi_role_name} was already gone` };
    }
  };

  return {
    name: 'teardown-cluster',
    description: 'Uninstall monitoring, remove the smoke test and delete the cluster',
    destructive: true,
    stages: [
      uninstallChartStage(services, 'uninstall-grafana', monitoring.grafana),
      uninstallChartStage(services, 'uninstall-prometheus', monitoring.prometheus),
      {
        name: 'remove-nginx',
        description: `Delete the ${smoke_test.name} deployment and service`,
        fatal: false,
        preconditions: [services.checker.require({ kind: 'tool-present', tool: 'kubectl' })],
        idempotencyCheck: async ctx =>
          (await clusterGone(services, ctx)) ||
          (!(await cluster.deploymentExists(smoke_test.namespace, smoke_test.name)) &&
            (await cluster.getService(smoke_test.namespace, smoke_test.name)) === null),
        apply: async () => {
          await cluster.deleteResource('service', smoke_test.name, smoke_test.namespace);
          await cluster.deleteResource('deployment', smoke_test.name, smoke_test.namespace);
          return { detail: `${smoke_test.name} removed` };
        }
      },
      deleteCluster,
      deleteCsiRole,
      {
        name: 'destroy-eks-infrastructure',
        description: 'Destroy the cluster-access Terraform plan',
        fatal: false,
        preconditions: [services.checker.require({ kind: 'tool-present', tool: 'terraform' })],
        idempotencyCheck: async () => (await infra.resources(terraform.eks_infrastructure_dir)).length === 0,
        confirmation: { message: 'Destroy the cluster-access IAM resources?', defaultAnswer: true },
        apply: async () => {
          const { destroyed } = await infra.destroy(terraform.eks_infrastructure_dir);
          return { detail: `Destroyed ${destroyed.length} resource(s)` };
        }
      }
    ],
    residualProbes: clusterProbes(services)
  };
}

/** Workstation and state backend; run after teardown-cluster. */
export function teardownInfraPipeline(services: PipelineServices): PipelineDefinition {
  const { terraform, backend } = services.config;
  const { buckets, infra, inventory, checker } = services;

  return {
    name: 'teardown-infra',
    description: 'Destroy the workstation and the Terraform state backend',
    destructive: true,
    stages: [
      {
        name: 'destroy-workstation',
        description: 'Destroy the EC2 workstation',
        fatal: false,
        preconditions: [checker.require({ kind: 'tool-present', tool: 'terraform' })],
        idempotencyCheck: async () => (await infra.resources(terraform.workstation_dir)).length === 0,
        confirmation: async ctx =>
          (await clusterGone(services, ctx))
            ? { message: 'Destroy the EC2 workstation?', defaultAnswer: true }
            : {
                message: `Cluster ${ctx.clusterName} still exists. Destroy the workstation anyway?`,
                defaultAnswer: false
              },
        apply: async () => {
          const { destroyed } = await infra.destroy(terraform.workstation_dir);
          return { detail: `Destroyed ${destroyed.length} resource(s)` };
        }
      },
      {
        name: 'destroy-state-backend',
        description: `Delete state bucket ${backend.bucket_name} and lock table ${backend.lock_table_name}`,
        fatal: false,
        preconditions: [checker.require({ kind: 'tool-present', tool: 'terraform' })],
        idempotencyCheck: async () =>
          !(await buckets.bucketExists(backend.bucket_name)) && !(await inventory.tableExists(backend.lock_table_name)),
        confirmation: {
          message: `Delete ${backend.bucket_name} and every Terraform state file in it?`,
          defaultAnswer: false
        },
        apply: async ctx => {
          let emptied = 0;
          if (await buckets.bucketExists(backend.bucket_name)) {
            emptied = await buckets.emptyBucket(backend.bucket_name);
            ctx.logger.info(`Removed ${emptied} object version(s) from ${backend.bucket_name}`);
          }
          await infra.destroy(terraform.backend_dir);
          if (await buckets.bucketExists(backend.bucket_name)) {
            await buckets.deleteBucket(backend.bucket_name);
          }
          return { detail: `State backend removed (${emptied} object version(s) deleted)` };
        }
      }
    ],
    residualProbes: infraProbes(services)
  };
}

function uninstallChartStage(services: PipelineServices, name: string, chart: ChartConfig): StageDefinition {
  const { charts, cluster, checker } = services;
  return {
    name,
    description: `Uninstall ${chart.release} and delete namespace ${chart.namespace}`,
    fatal: false,
    preconditions: [
      checker.require({ kind: 'tool-present', tool: 'kubectl' }),
      checker.require({ kind: 'tool-present', tool: 'helm' })
    ],
    idempotencyCheck: async (ctx: OrchestrationContext) =>
      (await clusterGone(services, ctx)) || !(await cluster.namespaceExists(chart.namespace)),
    confirmation: { message: `Uninstall ${chart.release} and delete its volumes?`, defaultAnswer: true },
    apply: async () => {
      const removed = await charts.uninstall({ name: chart.release, namespace: chart.namespace });
      await cluster.deletePersistentVolumeClaims(chart.namespace);
      await cluster.deleteResource('namespace', chart.namespace);
      return { detail: `${removed ? 'Uninstalled' : 'No release'} ${chart.release}; namespace ${chart.namespace} deleted` };
    }
  };
}

function clusterProbes(services: PipelineServices): ResidualProbe[] {
  const { storage } = services.config;
  return [
    {
      name: 'EKS cluster',
      probe: async ctx => {
        const cluster = await services.eks.describeCluster(ctx.clusterName);
        return cluster ? [`EKS cluster ${ctx.clusterName} still exists (${cluster.status})`] : [];
      }
    },
    {
      name: 'eksctl stacks',
      probe: async ctx =>
        (await services.inventory.findStacks(`eksctl-${ctx.clusterName}-`)).map(
          stack => `CloudFormation stack ${stack} still exists`
        )
    },
    {
      name: 'EBS CSI role',
      probe: async () =>
        (await services.roles.getRoleArn(storage.csi_role_name))
          ? [`IAM role ${storage.csi_role_name} still exists`]
          : []
    }
  ];
}

function infraProbes(services: PipelineServices): ResidualProbe[] {
  const { workstation, backend } = services.config;
  return [
    {
      name: 'workstation instances',
      probe: async () =>
        (await services.inventory.findInstancesByName(workstation.name_tag)).map(
          instance => `EC2 instance ${instance.instanceId} (${workstation.name_tag}) is ${instance.state}`
        )
    },
    {
      name: 'state bucket',
      probe: async () =>
        (await services.buckets.bucketExists(backend.bucket_name)) ? [`S3 bucket ${backend.bucket_name} still exists`] : []
    },
    {
      name: 'lock table',
      probe: async () =>
        (await services.inventory.tableExists(backend.lock_table_name))
          ? [`DynamoDB table ${backend.lock_table_name} still exists`]
          : []
    }
  ];
}
