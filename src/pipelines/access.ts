import { credentialsExpired, requireOutput } from '../orchestration/context';
import type { PipelineDefinition } from '../orchestration/types';
import { OUTPUTS, describeChange, publishOutputs, updateKubeconfigStage } from './common';
import type { PipelineServices } from './services';

// Credentials closer than this to expiry are assumed again.
export const MIN_CREDENTIAL_LIFETIME_MS = 5 * 60 * 1000;

/**
 * Applies the IAM plan that grants cluster-admin through a role, assumes that
 * role, and proves kubectl works with the temporary credentials.
 */
export function accessPipeline(services: PipelineServices): PipelineDefinition {
  const { terraform, access } = services.config;
  const { checker, infra } = services;

  return {
    name: 'access',
    description: 'Temporary admin access to the cluster through an assumed role',
    stages: [
      {
        name: 'provision-eks-infrastructure',
        description: 'Apply the cluster-access Terraform plan',
        fatal: true,
        preconditions: [
          checker.require({ kind: 'tool-present', tool: 'terraform' }),
          checker.require({ kind: 'credentials-valid' })
        ],
        // Publishes the plan outputs when skipping so assume-admin-role can read them.
        idempotencyCheck: async ctx => {
          if (await infra.hasDrift(terraform.eks_infrastructure_dir)) {
            return false;
          }
          const outputs = await infra.outputs(terraform.eks_infrastructure_dir);
          if (!outputs[access.role_arn_output]) {
            return false;
          }
          publishOutputs(ctx, outputs);
          return true;
        },
        apply: async () => {
          const result = await infra.apply(terraform.eks_infrastructure_dir);
          return { detail: describeChange(result.created), outputs: result.outputs };
        }
      },
      {
        name: 'assume-admin-role',
        description: `Assume the admin role for ${access.duration_seconds}s`,
        fatal: true,
        preconditions: [checker.require({ kind: 'output-present', key: access.role_arn_output })],
        idempotencyCheck: async ctx =>
          ctx.credentials !== undefined && !credentialsExpired(ctx.credentials, ctx.now(), MIN_CREDENTIAL_LIFETIME_MS),
        apply: async ctx => {
          const roleArn = requireOutput(ctx, access.role_arn_output);
          const planCluster = ctx.outputs.get(access.cluster_name_output);
          if (planCluster && planCluster !== ctx.clusterName) {
            ctx.logger.warn(
              `The access plan targets cluster ${planCluster} but this run uses ${ctx.clusterName}`
            );
          }

          const credentials = await services.identity.assumeRole(roleArn, access.duration_seconds, access.session_name);
          return {
            detail: `Assumed ${roleArn} until ${credentials.expiresAt.toISOString()}`,
            credentials,
            outputs: { [OUTPUTS.adminRoleArn]: roleArn }
          };
        }
      },
      updateKubeconfigStage(services),
      {
        name: 'verify-cluster-access',
        description: 'List nodes with the assumed credentials',
        fatal: true,
        apply: async () => {
          const nodes = await services.cluster.getNodes();
          return { detail: `${nodes.length} node(s) visible` };
        },
        readinessCheck: async () => {
          const nodes = await services.cluster.getNodes();
          return nodes.length > 0 && nodes.every(node => node.ready);
        },
        maxRetries: services.config.orchestration.pod_attempts
      }
    ]
  };
}
