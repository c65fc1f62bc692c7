import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import { ConfirmationPolicy } from '../../orchestration/confirmation';
import { Orchestrator } from '../../orchestration/orchestrator';
import { HelmClient } from '../../provisioning/helm';
import { KubectlClient } from '../../provisioning/kubectl';
import { teardownClusterPipeline, teardownInfraPipeline } from '../teardown';
import { createFakeWorld } from './fakes';
import type { FakeWorld } from './fakes';

describe('teardownClusterPipeline', () => {
  let world: FakeWorld;

  beforeEach(() => {
    world = createFakeWorld();
    world.eks.addCluster('eks-mundos-e');
    world.charts.seed('grafana', 'grafana', 'deployed').seed('prometheus', 'prometheus', 'deployed');
    world.cluster.namespaces.add('grafana');
    world.cluster.namespaces.add('prometheus');
    world.cluster.deployments.add('default/nginx');
    world.cluster.addService('default', 'nginx', { type: 'LoadBalancer' });
    world.infra.state.set('01_eks_infrastructure', { resources: ['aws_iam_role.eks_admin', 'aws_iam_policy.eks_admin'], outputs: {} });
  });

  afterEach(() => world.cleanup());

  it('should remove everything in order and leave nothing behind', async () => {
    const report = await world.orchestrator('auto-approve').runPipeline(teardownClusterPipeline(world.services), world.ctx);

    expect(report.results.map(result => [result.stageName, result.status, result.detail])).toEqual([
      ['uninstall-grafana', 'applied', 'Uninstalled grafana; namespace grafana deleted'],
      ['uninstall-prometheus', 'applied', 'Uninstalled prometheus; namespace prometheus deleted'],
      ['remove-nginx', 'applied', 'nginx removed'],
      ['delete-cluster', 'applied', 'Cluster eks-mundos-e deleted with eksctl'],
      ['delete-ebs-csi-role', 'skipped', 'Desired state already present'],
      ['destroy-eks-infrastructure', 'applied', 'Destroyed 2 resource(s)']
    ]);
    expect(world.cluster.purgedClaims).toEqual(['grafana', 'prometheus']);
    expect(world.cluster.deleted).toEqual([
      'namespace/grafana',
      'namespace/prometheus',
      'service/default/nginx',
      'deployment/default/nginx'
    ]);
    expect(report.residualWarnings).toEqual([]);
    expect(report.exitCode).toBe(0);
  });

  it('should fall back to the EKS API when eksctl cannot delete the cluster', async () => {
    world.clusters.deleteError = new Error('eksctl delete cluster exited with code 1: stack DELETE_FAILED');

    const report = await world.orchestrator('auto-approve').runPipeline(teardownClusterPipeline(world.services), world.ctx);

    expect(report.results[3]).toMatchObject({
      stageName: 'delete-cluster',
      status: 'applied',
      strategy: 'eks-api',
      detail: 'Deleted 1 node group(s) and the control plane through the EKS API'
    });
    expect(world.eks.calls).toEqual(['deleteNodegroup eks-mundos-e-nodes', 'deleteCluster eks-mundos-e']);
  });

  it('should attempt every stage and report leftovers when the cluster cannot be deleted', async () => {
    world.clusters.deleteError = new Error('stack DELETE_FAILED');
    vi.spyOn(world.eks, 'deleteCluster').mockRejectedValue(new Error('ResourceInUseException'));
    world.inventory.stacks = ['eksctl-eks-mundos-e-cluster', 'eksctl-other-cluster'];

    const report = await world.orchestrator('auto-approve').runPipeline(teardownClusterPipeline(world.services), world.ctx);

    expect(report.results.map(result => result.status)).toEqual(['applied', 'applied', 'applied', 'failed', 'skipped', 'applied']);
    expect(report.results[3].detail).toBe('ResourceInUseException');
    expect(report.residualWarnings).toEqual([
      'EKS cluster eks-mundos-e still exists (ACTIVE)',
      'CloudFormation stack eksctl-eks-mundos-e-cluster still exists'
    ]);
    expect(report.halted).toBe(false);
    expect(report.exitCode).toBe(2);
  });

  it('should fail the in-cluster cleanup instead of skipping it when kubectl and helm are missing', async () => {
    world.runner
      .on('kubectl', { code: 127, stderr: 'kubectl: command not found' })
      .on('helm', { code: 127, stderr: 'helm: command not found' });
    const services = {
      ...world.services,
      cluster: new KubectlClient(world.runner, () => ({})),
      charts: new HelmClient(world.runner, () => ({}))
    };

    const report = await world.orchestrator('auto-approve').runPipeline(teardownClusterPipeline(services), world.ctx);

    const missingKubectl = 'Precondition "kubectl installed" not met: kubectl is not installed or not on PATH';
    expect(report.results.slice(0, 3).map(result => [result.stageName, result.status, result.detail, result.errorCode])).toEqual([
      ['uninstall-grafana', 'failed', missingKubectl, 'PRECONDITION_FAILED'],
      ['uninstall-prometheus', 'failed', missingKubectl, 'PRECONDITION_FAILED'],
      ['remove-nginx', 'failed', missingKubectl, 'PRECONDITION_FAILED']
    ]);
    expect(report.exitCode).toBe(2);
  });

  it('should delete the EBS CSI driver role once the cluster is gone', async () => {
    world.roles.addRole('AmazonEKS_EBS_CSI_DriverRole', ['arn:aws:iam::aws:policy/service-role/AmazonEBSCSIDriverPolicy']);

    const report = await world.orchestrator('auto-approve').runPipeline(teardownClusterPipeline(world.services), world.ctx);

    expect(report.results[4]).toMatchObject({
      stageName: 'delete-ebs-csi-role',
      status: 'applied',
      detail: 'Deleted IAM role AmazonEKS_EBS_CSI_DriverRole'
    });
    expect(world.roles.roles.has('AmazonEKS_EBS_CSI_DriverRole')).toBe(false);
    expect(report.residualWarnings).toEqual([]);
  });

  it('should default to keeping the CSI role while the cluster exists', async () => {
    world.roles.addRole('AmazonEKS_EBS_CSI_DriverRole');
    const confirm = vi.fn().mockResolvedValue(false);
    const orchestrator = new Orchestrator({
      confirmation: new ConfirmationPolicy('prompt', { confirm }, world.logger),
      defaults: { maxRetries: 2, pollIntervalSeconds: 0 }
    });

    const report = await orchestrator.runPipeline(teardownClusterPipeline(world.services), world.ctx);

    expect(confirm).toHaveBeenCalledWith(
      'Cluster eks-mundos-e still uses AmazonEKS_EBS_CSI_DriverRole. Delete the role anyway?',
      false
    );
    expect(report.results[4].status).toBe('skipped');
    expect(report.residualWarnings).toEqual([
      'EKS cluster eks-mundos-e still exists (ACTIVE)',
      'IAM role AmazonEKS_EBS_CSI_DriverRole still exists'
    ]);
  });

  it('should skip everything when the cluster is already gone', async () => {
    world.eks.clusters.clear();
    world.infra.state.clear();

    const report = await world.orchestrator('auto-approve').runPipeline(teardownClusterPipeline(world.services), world.ctx);

    expect(report.results.map(result => result.status)).toEqual(['skipped', 'skipped', 'skipped', 'skipped', 'skipped', 'skipped']);
    expect(world.charts.uninstalled).toEqual([]);
  });

  it('should keep the cluster when the operator declines', async () => {
    const report = await world.orchestrator('prompt', false).runPipeline(teardownClusterPipeline(world.services), world.ctx);

    expect(report.results[3]).toMatchObject({
      status: 'skipped',
      detail: 'Declined: Delete EKS cluster eks-mundos-e? This cannot be undone',
      errorCode: 'USER_ABORTED'
    });
    expect(world.clusters.deleted).toEqual([]);
    expect(report.residualWarnings).toContain('EKS cluster eks-mundos-e still exists (ACTIVE)');
  });
});

describe('teardownInfraPipeline', () => {
  let world: FakeWorld;

  beforeEach(() => {
    world = createFakeWorld();
    world.infra.state.set('01_ec2_workstation', { resources: ['aws_instance.workstation'], outputs: {} });
    world.infra.state.set('00_terraform_backend', {
      resources: ['aws_s3_bucket.state', 'aws_dynamodb_table.locks'],
      outputs: {}
    });
    world.buckets.buckets.set('demo-terraform-state', 12);
    world.inventory.tables.add('demo-terraform-locks');
    world.inventory.instances.set('DevOps-Workstation', [{ instanceId: 'i-0abc123', state: 'running' }]);
  });

  afterEach(() => world.cleanup());

  it('should destroy the workstation and empty the state bucket before deleting it', async () => {
    const report = await world.orchestrator('auto-approve').runPipeline(teardownInfraPipeline(world.services), world.ctx);

    expect(report.results.map(result => [result.stageName, result.status, result.detail])).toEqual([
      ['destroy-workstation', 'applied', 'Destroyed 1 resource(s)'],
      ['destroy-state-backend', 'applied', 'State backend removed (12 object version(s) deleted)']
    ]);
    expect(world.buckets.calls).toEqual(['empty demo-terraform-state', 'delete demo-terraform-state']);
    expect(world.infra.calls).toEqual(['destroy 01_ec2_workstation', 'destroy 00_terraform_backend']);
  });

  it('should report resources the inventory still sees', async () => {
    const report = await world.orchestrator('auto-approve').runPipeline(teardownInfraPipeline(world.services), world.ctx);

    expect(report.residualWarnings).toEqual([
      'EC2 instance i-0abc123 (DevOps-Workstation) is running',
      'DynamoDB table demo-terraform-locks still exists'
    ]);
  });

  it('should default to keeping the workstation while the cluster exists', async () => {
    world.eks.addCluster('eks-mundos-e');
    const confirm = vi.fn().mockResolvedValue(false);
    const orchestrator = new Orchestrator({
      confirmation: new ConfirmationPolicy('prompt', { confirm }, world.logger),
      defaults: { maxRetries: 2, pollIntervalSeconds: 0 }
    });

    const report = await orchestrator.runPipeline(teardownInfraPipeline(world.services), world.ctx);

    expect(confirm).toHaveBeenNthCalledWith(1, 'Cluster eks-mundos-e still exists. Destroy the workstation anyway?', false);
    expect(confirm).toHaveBeenNthCalledWith(2, 'Delete demo-terraform-state and every Terraform state file in it?', false);
    expect(report.results.map(result => result.status)).toEqual(['skipped', 'skipped']);
    expect(world.infra.calls).toEqual([]);
  });

  it('should skip the backend when bucket and table are gone', async () => {
    world.buckets.buckets.clear();
    world.inventory.tables.clear();

    const report = await world.orchestrator('auto-approve').runPipeline(teardownInfraPipeline(world.services), world.ctx);

    expect(report.results[1].status).toBe('skipped');
  });
});
