import type { OrchestrationContext } from '../orchestration/context';
import { ApplyError } from '../orchestration/errors';
import { waitUntil } from '../orchestration/poller';
import type { PipelineDefinition } from '../orchestration/types';
import { createServiceAccountTrustPolicy } from '../provisioning/iam-manager';
import { STORAGE_TEST, storageClass, storageTestClaim, storageTestPod } from '../templates/manifests';
import { OUTPUTS, clusterReachable, podsRunning, waitForRemoval } from './common';
import type { PipelineServices } from './services';

const CSI_NAMESPACE = 'kube-system';
const CSI_SERVICE_ACCOUNT = 'ebs-csi-controller-sa';
const CSI_POD_SELECTOR = 'app.kubernetes.io/name=aws-ebs-csi-driver';
const CSI_POD_ATTEMPTS = 10;
const STORAGE_TEST_ATTEMPTS = 12;

/**
 * OIDC provider, IRSA role and add-on for the EBS CSI driver, then the
 * default storage class and a test volume provisioned from it.
 */
export function storagePipeline(services: PipelineServices): PipelineDefinition {
  const { storage } = services.config;
  const { checker } = services;

  const issuerOf = async (ctx: OrchestrationContext): Promise<string> => {
    const cached = ctx.outputs.get(OUTPUTS.oidcIssuer);
    if (cached) {
      return cached;
    }
    const issuer = (await services.eks.describeCluster(ctx.clusterName))?.oidcIssuer;
    if (!issuer) {
      throw new ApplyError(`Cluster ${ctx.clusterName} has no OIDC issuer`, {
        remediation: 'Run the associate-oidc-provider stage first'
      });
    }
    ctx.outputs.set(OUTPUTS.oidcIssuer, issuer);
    return issuer;
  };

  const csiPodsRunning = podsRunning(services, CSI_NAMESPACE, CSI_POD_SELECTOR);

  return {
    name: 'storage',
    description: 'EBS CSI driver and encrypted gp3 storage class',
    stages: [
      {
        name: 'associate-oidc-provider',
        description: 'Register the cluster OIDC issuer with IAM',
        fatal: true,
        preconditions: [
          checker.require({ kind: 'tool-present', tool: 'eksctl' }),
          checker.require({ kind: 'credentials-valid' })
        ],
        idempotencyCheck: async ctx => services.roles.oidcProviderExists(await issuerOf(ctx)),
        apply: async ctx => {
          await services.clusters.associateOidcProvider(ctx.clusterName, ctx.region);
          return { detail: `OIDC provider associated for ${ctx.clusterName}` };
        }
      },
      {
        name: 'ebs-csi-driver-role',
        description: `Create ${storage.csi_role_name} for the ${CSI_SERVICE_ACCOUNT} service account`,
        fatal: true,
        idempotencyCheck: async ctx => {
          const roleArn = await services.roles.getRoleArn(storage.csi_role_name);
          if (!roleArn || !(await services.roles.hasAttachedPolicy(storage.csi_role_name, storage.csi_policy_arn))) {
            return false;
          }
          ctx.outputs.set(OUTPUTS.csiRoleArn, roleArn);
          return true;
        },
        apply: async ctx => {
          const { account } = await services.identity.getCallerIdentity();
          const role = await services.roles.ensureRole({
            roleName: storage.csi_role_name,
            trustPolicy: createServiceAccountTrustPolicy(account, await issuerOf(ctx), CSI_NAMESPACE, CSI_SERVICE_ACCOUNT),
            policyArns: [storage.csi_policy_arn]
          });
          return {
            detail: `Role ${role.roleName} ${role.status}`,
            outputs: { [OUTPUTS.csiRoleArn]: role.roleArn },
            resources: [{ kind: 'IAMRole', name: role.roleName }]
          };
        }
      },
      {
        name: 'ebs-csi-addon',
        description: `Install the ${storage.addon_name} add-on`,
        fatal: true,
        preconditions: [clusterReachable(services)],
        idempotencyCheck: async ctx => {
          const addon = await services.eks.getAddon(ctx.clusterName, storage.addon_name);
          return addon !== null && (await csiPodsRunning(ctx));
        },
        apply: async ctx => {
          const roleArn = ctx.outputs.get(OUTPUTS.csiRoleArn) ?? (await services.roles.getRoleArn(storage.csi_role_name));
          if (!roleArn) {
            throw new ApplyError(`Role ${storage.csi_role_name} does not exist`, {
              remediation: 'Run the ebs-csi-driver-role stage first'
            });
          }

          // An add-on without running driver pods is recreated from scratch.
          const existing = await services.eks.getAddon(ctx.clusterName, storage.addon_name);
          if (existing) {
            ctx.logger.warn(`${storage.addon_name} is ${existing.status} but no driver pods run; recreating it`);
            await services.eks.deleteAddon(ctx.clusterName, storage.addon_name);
            await waitForRemoval(services, ctx, `add-on ${storage.addon_name}`, async () =>
              (await services.eks.getAddon(ctx.clusterName, storage.addon_name)) === null
            );
          }

          await services.eks.createAddon(ctx.clusterName, storage.addon_name, roleArn);
          return { detail: `${existing ? 'Recreated' : 'Created'} ${storage.addon_name}` };
        },
        readinessCheck: csiPodsRunning,
        maxRetries: CSI_POD_ATTEMPTS
      },
      {
        name: 'storage-class',
        description: `Create storage class ${storage.storage_class}`,
        fatal: false,
        idempotencyCheck: () => services.cluster.storageClassExists(storage.storage_class),
        apply: async () => {
          await services.cluster.applyManifest(services.templates.render([storageClass(storage)]));
          return {
            detail: `${storage.storage_class} (${storage.volume_type}, encrypted: ${storage.encrypted})`,
            resources: [{ kind: 'StorageClass', name: storage.storage_class }]
          };
        },
        rollback: async () => {
          await services.cluster.deleteResource('storageclass', storage.storage_class);
        }
      },
      {
        name: 'verify-storage',
        description: `Provision a ${STORAGE_TEST.size} test volume from ${storage.storage_class}, then remove it`,
        fatal: false,
        preconditions: [checker.require({ kind: 'storageclass-exists', name: storage.storage_class })],
        apply: async ctx => {
          await services.cluster.applyManifest(services.templates.render([storageTestClaim(storage), storageTestPod()]));
          try {
            await waitForStorageTest(services, ctx);
          } finally {
            await removeStorageTest(services);
          }
          return { detail: `${STORAGE_TEST.claim} bound and ${STORAGE_TEST.pod} running on ${storage.storage_class}` };
        },
        rollback: () => removeStorageTest(services)
      }
    ]
  };
}

async function waitForStorageTest(services: PipelineServices, ctx: OrchestrationContext): Promise<void> {
  const { cluster } = services;
  const { namespace, claim, selector } = STORAGE_TEST;
  const podRunning = podsRunning(services, namespace, selector);

  const result = await waitUntil(
    async () => (await cluster.getClaimPhase(namespace, claim)) === 'Bound' && (await podRunning(ctx)),
    {
      intervalMs: services.config.orchestration.poll_interval_seconds * 1000,
      maxAttempts: STORAGE_TEST_ATTEMPTS,
      signal: ctx.signal,
      onAttempt: attempt => ctx.logger.debug(`waiting for ${claim} to bind (attempt ${attempt})`)
    }
  );
  if (!result.satisfied) {
    const phase = await cluster.getClaimPhase(namespace, claim);
    throw new ApplyError(`${claim} is ${phase ?? 'missing'} after ${result.attempts} attempt(s)`, {
      remediation: `Check "kubectl describe pvc ${claim}" and the EBS CSI controller logs`
    });
  }
}

async function removeStorageTest(services: PipelineServices): Promise<void> {
  const { namespace, claim, pod } = STORAGE_TEST;
  await services.cluster.deleteResource('pod', pod, namespace);
  await services.cluster.deleteResource('pvc', claim, namespace);
}
