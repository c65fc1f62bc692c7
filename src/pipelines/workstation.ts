import type { PipelineDefinition } from '../orchestration/types';
import { describeChange, generateSshKeyStage, sshPublicKeyPath } from './common';
import type { PipelineServices } from './services';

export function workstationPipeline(services: PipelineServices): PipelineDefinition {
  const { terraform, workstation } = services.config;
  const { checker, infra } = services;

  return {
    name: 'workstation',
    description: 'EC2 workstation the cluster is administered from',
    stages: [
      {
        name: 'provision-workstation',
        description: `Create the ${workstation.name_tag} instance`,
        fatal: true,
        preconditions: [
          checker.require({ kind: 'tool-present', tool: 'terraform' }),
          checker.require({ kind: 'credentials-valid' }),
          checker.require({ kind: 'file-exists', path: sshPublicKeyPath(services) }, generateSshKeyStage(services))
        ],
        idempotencyCheck: async () =>
          (await services.inventory.findInstancesByName(workstation.name_tag)).length > 0 &&
          !(await infra.hasDrift(terraform.workstation_dir)),
        apply: async () => {
          const result = await infra.apply(terraform.workstation_dir);
          return { detail: describeChange(result.created), outputs: result.outputs };
        },
        rollback: async () => {
          await infra.destroy(terraform.workstation_dir);
        }
      }
    ]
  };
}
