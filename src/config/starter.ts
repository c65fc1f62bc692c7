import { dump } from 'js-yaml';
import { DEFAULT_CONFIG } from './defaults';

export interface StarterOptions {
  project?: string;
  region?: string;
  clusterName?: string;
  generatedAt?: Date;
}

/**
 * The file `init` writes: every default spelled out, so operators edit
 * values instead of looking up key names.
 */
export function renderStarterConfig(options: StarterOptions = {}): string {
  const project = options.project ?? DEFAULT_CONFIG.project;
  const document = {
    ...DEFAULT_CONFIG,
    project,
    aws: { ...DEFAULT_CONFIG.aws, region: options.region ?? DEFAULT_CONFIG.aws.region },
    cluster: { ...DEFAULT_CONFIG.cluster, name: options.clusterName ?? DEFAULT_CONFIG.cluster.name }
  };

  const header = [
    '# Provisioning orchestrator configuration',
    `# Generated on ${(options.generatedAt ?? new Date()).toISOString()}`,
    '#',
    '# The state backend defaults to:',
    '#   backend:',
    `#     bucket_name: ${project}-terraform-state`,
    `#     lock_table_name: ${project}-terraform-locks`,
    '#',
    '# ${VAR} and ${VAR:-default} are replaced from the environment.',
    '# orchestration.confirmation is one of proceed, prompt or auto-approve.',
    ''
  ];

  return `${header.join('\n')}\n${dump(document, { lineWidth: 120, noRefs: true })}`;
}
