import type { PipelineDefinition } from '../orchestration/types';
import { describeChange } from './common';
import type { PipelineServices } from './services';

/** S3 bucket and DynamoDB lock table that hold Terraform state for the other plans. */
export function backendPipeline(services: PipelineServices): PipelineDefinition {
  const { terraform, backend } = services.config;
  const { checker, infra } = services;

  return {
    name: 'backend',
    description: 'Terraform remote-state backend',
    stages: [
      {
        name: 'provision-state-backend',
        description: `Create state bucket ${backend.bucket_name} and lock table ${backend.lock_table_name}`,
        fatal: true,
        preconditions: [
          checker.require({ kind: 'tool-present', tool: 'terraform' }),
          checker.require({ kind: 'credentials-valid' })
        ],
        idempotencyCheck: async () =>
          (await services.buckets.bucketExists(backend.bucket_name)) &&
          (await services.inventory.tableExists(backend.lock_table_name)) &&
          !(await infra.hasDrift(terraform.backend_dir)),
        apply: async () => {
          const result = await infra.apply(terraform.backend_dir);
          return { detail: describeChange(result.created), outputs: result.outputs };
        }
      }
    ]
  };
}
