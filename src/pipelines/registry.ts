import { ConfigError } from '../orchestration/errors';
import type { PipelineDefinition } from '../orchestration/types';
import { accessPipeline } from './access';
import { backendPipeline } from './backend';
import { clusterPipeline } from './cluster';
import { monitoringPipeline } from './monitoring';
import type { PipelineServices } from './services';
import { storagePipeline } from './storage';
import { teardownClusterPipeline, teardownInfraPipeline } from './teardown';
import { workstationPipeline } from './workstation';

type PipelineFactory = (services: PipelineServices) => PipelineDefinition;

const PIPELINES = {
  backend: backendPipeline,
  workstation: workstationPipeline,
  access: accessPipeline,
  cluster: clusterPipeline,
  storage: storagePipeline,
  monitoring: monitoringPipeline,
  'teardown-cluster': teardownClusterPipeline,
  'teardown-infra': teardownInfraPipeline
} satisfies Record<string, PipelineFactory>;

export type PipelineName = keyof typeof PIPELINES;

/** Named sequences of pipelines, run as one. */
export const COMPOSITES: Record<string, { description: string; parts: PipelineName[] }> = {
  bootstrap: { description: 'State backend and workstation', parts: ['backend', 'workstation'] },
  up: { description: 'Cluster, storage and monitoring', parts: ['cluster', 'storage', 'monitoring'] },
  down: { description: 'Cluster teardown, then workstation and state backend', parts: ['teardown-cluster', 'teardown-infra'] }
};

export interface PipelineListing {
  name: string;
  description: string;
  composite: boolean;
}

function isPipelineName(name: string): name is PipelineName {
  return Object.prototype.hasOwnProperty.call(PIPELINES, name);
}

export function pipelineNames(): string[] {
  return [...Object.keys(PIPELINES), ...Object.keys(COMPOSITES)];
}

/** Descriptions come from the definitions, so services are needed to list them. */
export function listPipelines(services: PipelineServices): PipelineListing[] {
  const single = Object.values(PIPELINES).map(factory => {
    const definition = factory(services);
    return { name: definition.name, description: definition.description, composite: false };
  });
  const composite = Object.entries(COMPOSITES).map(([name, entry]) => ({
    name,
    description: `${entry.description} (${entry.parts.join(' + ')})`,
    composite: true
  }));
  return [...single, ...composite];
}

/**
 * Builds a pipeline by name. Composites concatenate their parts' stages and
 * residual probes, and are destructive when any part is.
 */
export function buildPipeline(name: string, services: PipelineServices): PipelineDefinition {
  if (isPipelineName(name)) {
    return PIPELINES[name](services);
  }

  const composite = COMPOSITES[name];
  if (!composite) {
    throw new ConfigError(`Unknown pipeline "${name}". Available: ${pipelineNames().join(', ')}`, {
      remediation: 'Run "stagecraft list" to see every pipeline'
    });
  }
  return mergePipelines(name, composite.description, composite.parts.map(part => PIPELINES[part](services)));
}

export function mergePipelines(name: string, description: string, parts: PipelineDefinition[]): PipelineDefinition {
  return {
    name,
    description,
    destructive: parts.some(part => part.destructive === true),
    stages: parts.flatMap(part => part.stages),
    residualProbes: parts.flatMap(part => part.residualProbes ?? [])
  };
}
