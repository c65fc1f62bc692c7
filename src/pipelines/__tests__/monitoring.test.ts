import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { prometheusValues } from '../../templates/helm-values';
import { monitoringPipeline } from '../monitoring';
import { createFakeWorld } from './fakes';
import type { AppliedObject, FakeWorld } from './fakes';

const PROMETHEUS_PODS = 'app.kubernetes.io/name=prometheus,app.kubernetes.io/component=server';
const GRAFANA_PODS = 'app.kubernetes.io/name=grafana';
const PROMETHEUS_HOST = 'prom.us-east-1.elb.amazonaws.com';
const GRAFANA_HOST = 'grafana.us-east-1.elb.amazonaws.com';

describe('monitoringPipeline', () => {
  let world: FakeWorld;

  /** Gives prometheus-external endpoints only when `matches` accepts what was applied. */
  const endpointsWhen = (matches: (object: AppliedObject) => boolean) => {
    world.cluster.onApply = object => {
      if (object.name === 'prometheus-external' && matches(object)) {
        world.cluster.endpoints.set('prometheus/prometheus-external', ['10.0.1.5']);
      }
    };
  };

  beforeEach(() => {
    world = createFakeWorld();
    world.cluster.storageClasses.add('ebs-sc');
    world.cluster
      .setPods('prometheus', PROMETHEUS_PODS, ['Running'])
      .setPods('grafana', GRAFANA_PODS, ['Running'])
      .addService('prometheus', 'prometheus-server', { clusterIP: '10.100.0.10' })
      .addService('grafana', 'grafana', { type: 'LoadBalancer', loadBalancerHostname: GRAFANA_HOST });
    world.cluster.hostnames.set('prometheus/prometheus-external', PROMETHEUS_HOST);
  });

  afterEach(() => world.cleanup());

  it('should install and publish Prometheus and Grafana', async () => {
    endpointsWhen(object => object.selector['app.kubernetes.io/name'] === 'prometheus');

    const report = await world.orchestrator().runPipeline(monitoringPipeline(world.services), world.ctx);

    expect(report.results.map(result => [result.stageName, result.status, result.detail])).toEqual([
      ['install-prometheus', 'applied', 'Release prometheus deployed (storage class ebs-sc)'],
      [
        'expose-prometheus',
        'applied',
        'Service prometheus-external selects app.kubernetes.io/name=prometheus,app.kubernetes.io/component=server'
      ],
      ['install-grafana', 'applied', 'Release grafana deployed (storage class ebs-sc)'],
      ['expose-grafana', 'applied', 'Admin password is in secret grafana/grafana (key admin-password)']
    ]);
    expect(report.results[1].strategy).toBe('default');
    expect(world.ctx.outputs.get('prometheus_url')).toBe(`http://${PROMETHEUS_HOST}`);
    expect(world.ctx.outputs.get('grafana_url')).toBe(`http://${GRAFANA_HOST}`);
  });

  it('should pass the resolved storage class into the chart values', async () => {
    endpointsWhen(() => true);

    await world.orchestrator().runPipeline(monitoringPipeline(world.services), world.ctx);

    expect(world.charts.installs.map(install => install.release)).toEqual(['prometheus', 'grafana']);
    expect(world.charts.installs[0].values).toEqual(prometheusValues(world.config.monitoring.prometheus, 'ebs-sc'));
    expect(world.charts.installs[0].source).toEqual({
      repoName: 'prometheus-community',
      repoUrl: 'https://prometheus-community.github.io/helm-charts',
      chart: 'prometheus',
      version: undefined
    });
  });

  it('should fall back to the legacy selector when the default one finds no pods', async () => {
    endpointsWhen(object => object.selector.app === 'prometheus');

    const report = await world.orchestrator().runPipeline(monitoringPipeline(world.services), world.ctx);

    expect(report.results[1]).toMatchObject({
      status: 'applied',
      strategy: 'legacy-selector',
      detail: 'Service prometheus-external selects app=prometheus,component=server'
    });
    expect(report.results[1].warning).toBeUndefined();
    expect(world.logger.messages('warn')).toContain('[expose-prometheus] trying alternative strategy "legacy-selector"');
  });

  it('should point the service straight at the server IP as a last resort', async () => {
    endpointsWhen(object => object.kind === 'Endpoints');

    const report = await world.orchestrator().runPipeline(monitoringPipeline(world.services), world.ctx);

    expect(report.results[1]).toMatchObject({
      status: 'applied',
      strategy: 'direct-endpoint',
      detail: 'Service prometheus-external routes to 10.100.0.10'
    });
    expect(world.cluster.applied.filter(object => object.name === 'prometheus-external').map(object => object.kind)).toEqual([
      'Service',
      'Service',
      'Service',
      'Endpoints'
    ]);
  });

  it('should use gp2 when the configured storage class is missing', async () => {
    world.cluster.storageClasses.delete('ebs-sc');
    endpointsWhen(() => true);

    const report = await world.orchestrator().runPipeline(monitoringPipeline(world.services), world.ctx);

    expect(report.results[0].detail).toBe('Release prometheus deployed (storage class gp2)');
    expect(world.logger.messages('warn')).toContain('Storage class ebs-sc not found; using gp2');
  });

  it('should not install without any usable storage class', async () => {
    world.cluster.storageClasses.clear();

    const report = await world.orchestrator().runPipeline(monitoringPipeline(world.services), world.ctx);

    expect(report.results[0]).toMatchObject({
      stageName: 'install-prometheus',
      status: 'rolled_back',
      detail: 'Neither ebs-sc nor gp2 exists',
      errorCode: 'PRECONDITION_FAILED',
      remediation: 'Run the storage pipeline first'
    });
    expect(world.charts.installs).toEqual([]);
  });

  describe('with a failed release', () => {
    beforeEach(() => {
      world.charts.seed('prometheus', 'prometheus', 'failed');
      endpointsWhen(() => true);
    });

    it('should leave the release alone when the operator declines', async () => {
      const report = await world.orchestrator('prompt', false).runPipeline(monitoringPipeline(world.services), world.ctx);

      expect(report.results[0]).toMatchObject({
        status: 'skipped',
        detail: 'Declined: Release prometheus is failed. Remove it and its volumes, then reinstall?',
        errorCode: 'USER_ABORTED'
      });
      expect(world.charts.uninstalled).toEqual([]);
    });

    it('should remove the release and its volumes before reinstalling', async () => {
      const report = await world.orchestrator('auto-approve').runPipeline(monitoringPipeline(world.services), world.ctx);

      expect(report.results[0].status).toBe('applied');
      expect(world.charts.uninstalled).toEqual(['prometheus/prometheus']);
      expect(world.cluster.purgedClaims).toEqual(['prometheus']);
      expect(world.charts.releases.get('prometheus/prometheus')?.status).toBe('deployed');
    });
  });

  it('should skip releases that are already deployed', async () => {
    world.charts.seed('prometheus', 'prometheus', 'deployed').seed('grafana', 'grafana', 'deployed');
    endpointsWhen(() => true);

    const report = await world.orchestrator().runPipeline(monitoringPipeline(world.services), world.ctx);

    expect(report.results[0].status).toBe('skipped');
    expect(report.results[2].status).toBe('skipped');
    expect(world.charts.installs).toEqual([]);
  });
});
