import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { ConfigError } from '../../orchestration/errors';
import type { PipelineDefinition } from '../../orchestration/types';
import { buildPipeline, listPipelines, mergePipelines, pipelineNames } from '../registry';
import { createFakeWorld } from './fakes';
import type { FakeWorld } from './fakes';

describe('pipeline registry', () => {
  let world: FakeWorld;

  beforeEach(() => {
    world = createFakeWorld();
  });

  afterEach(() => world.cleanup());

  it('should name single pipelines before composites', () => {
    expect(pipelineNames()).toEqual([
      'backend',
      'workstation',
      'access',
      'cluster',
      'storage',
      'monitoring',
      'teardown-cluster',
      'teardown-infra',
      'bootstrap',
      'up',
      'down'
    ]);
  });

  it('should build a single pipeline by name', () => {
    const pipeline = buildPipeline('storage', world.services);

    expect(pipeline.name).toBe('storage');
    expect(pipeline.stages.map(stage => stage.name)).toEqual([
      'associate-oidc-provider',
      'ebs-csi-driver-role',
      'ebs-csi-addon',
      'storage-class',
      'verify-storage'
    ]);
  });

  it('should concatenate the stages of a composite in order', () => {
    const pipeline = buildPipeline('up', world.services);

    expect(pipeline.name).toBe('up');
    expect(pipeline.description).toBe('Cluster, storage and monitoring');
    expect(pipeline.stages.map(stage => stage.name)).toEqual([
      'create-cluster',
      'update-kubeconfig',
      'verify-nodes',
      'deploy-nginx',
      'check-nginx',
      'associate-oidc-provider',
      'ebs-csi-driver-role',
      'ebs-csi-addon',
      'storage-class',
      'verify-storage',
      'install-prometheus',
      'expose-prometheus',
      'install-grafana',
      'expose-grafana'
    ]);
  });

  it('should mark the teardown composite destructive and keep every residual probe', () => {
    const pipeline = buildPipeline('down', world.services);

    expect(pipeline.destructive).toBe(true);
    expect(pipeline.residualProbes?.map(probe => probe.name)).toEqual([
      'EKS cluster',
      'eksctl stacks',
      'EBS CSI role',
      'workstation instances',
      'state bucket',
      'lock table'
    ]);
  });

  it('should reject an unknown name with the list of pipelines', () => {
    let caught: unknown;
    try {
      buildPipeline('everything', world.services);
    } catch (error) {
      caught = error;
    }

    expect(caught).toBeInstanceOf(ConfigError);
    expect(caught).toMatchObject({
      message:
        'Unknown pipeline "everything". Available: backend, workstation, access, cluster, storage, monitoring, ' +
        'teardown-cluster, teardown-infra, bootstrap, up, down',
      remediation: 'Run "stagecraft list" to see every pipeline'
    });
  });

  it('should list composites with their parts', () => {
    const listing = listPipelines(world.services);

    expect(listing).toHaveLength(11);
    expect(listing.filter(entry => !entry.composite).map(entry => entry.name)).toEqual(pipelineNames().slice(0, 8));
    expect(listing.slice(8)).toEqual([
      { name: 'bootstrap', description: 'State backend and workstation (backend + workstation)', composite: true },
      { name: 'up', description: 'Cluster, storage and monitoring (cluster + storage + monitoring)', composite: true },
      {
        name: 'down',
        description: 'Cluster teardown, then workstation and state backend (teardown-cluster + teardown-infra)',
        composite: true
      }
    ]);
  });

  describe('mergePipelines', () => {
    const part = (name: string, destructive?: boolean): PipelineDefinition => ({
      name,
      description: name,
      destructive,
      stages: [{ name: `${name}-stage`, description: name, fatal: true, apply: async () => undefined }]
    });

    it('should not be destructive when no part is', () => {
      const merged = mergePipelines('both', 'Both', [part('a'), part('b', false)]);

      expect(merged.destructive).toBe(false);
      expect(merged.stages.map(stage => stage.name)).toEqual(['a-stage', 'b-stage']);
      expect(merged.residualProbes).toEqual([]);
    });

    it('should be destructive when any part is', () => {
      expect(mergePipelines('both', 'Both', [part('a'), part('b', true)]).destructive).toBe(true);
    });
  });
});
