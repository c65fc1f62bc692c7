import type { GateSource } from '../orchestration/confirmation';
import type { OrchestrationContext } from '../orchestration/context';
import { ApplyError, PreconditionError } from '../orchestration/errors';
import type { ApplyStrategy, PipelineDefinition, ReadinessFn, StageDefinition } from '../orchestration/types';
import { grafanaValues, prometheusValues } from '../templates/helm-values';
import {
  PROMETHEUS_SELECTORS,
  prometheusDirectService,
  prometheusExternalService,
  selectorString
} from '../templates/manifests';
import type { ReleaseRef } from '../provisioning/types';
import type { KubernetesManifest } from '../templates/types';
import type { ChartConfig } from '../types';
import { OUTPUTS, clusterReachable, loadBalancerReady, podsRunning } from './common';
import type { PipelineServices } from './services';

const FALLBACK_STORAGE_CLASS = 'gp2';
// Attempts per exposure strategy before the next selector is tried.
const SELECTOR_ATTEMPTS = 10;

/** Prometheus and Grafana from their Helm charts, each published through a load balancer. */
export function monitoringPipeline(services: PipelineServices): PipelineDefinition {
  const { prometheus, grafana } = services.config.monitoring;
  const { checker, cluster } = services;
  const serverService = `${prometheus.release}-server`;

  const exposed: ReadinessFn = async ctx => {
    const ready = await loadBalancerReady(services, prometheus.namespace, prometheus.external_service, OUTPUTS.prometheusUrl)(ctx);
    if (!ready) {
      return false;
    }
    const endpoints = await cluster.getEndpointAddresses(prometheus.namespace, prometheus.external_service);
    return endpoints.length > 0;
  };

  const replaceExternal = async (manifests: KubernetesManifest[]): Promise<void> => {
    await cluster.deleteResource('service', prometheus.external_service, prometheus.namespace);
    await cluster.applyManifest(services.templates.render(manifests));
  };

  const selectorStrategy = (name: string, index: number): ApplyStrategy => ({
    name,
    apply: async () => {
      const selector = PROMETHEUS_SELECTORS[index];
      await replaceExternal([prometheusExternalService(prometheus, selector)]);
      return { detail: `Service ${prometheus.external_service} selects ${selectorString(selector)}` };
    },
    readinessCheck: exposed,
    maxRetries: SELECTOR_ATTEMPTS
  });

  const exposePrometheus: StageDefinition = {
    ...selectorStrategy('default', 0),
    name: 'expose-prometheus',
    description: `Publish Prometheus through ${prometheus.external_service}`,
    fatal: false,
    preconditions: [checker.require({ kind: 'service-exists', namespace: prometheus.namespace, name: serverService })],
    idempotencyCheck: exposed,
    confirmation: async () =>
      (await cluster.getService(prometheus.namespace, prometheus.external_service))
        ? { message: `Service ${prometheus.external_service} exists without working endpoints. Replace it?`, defaultAnswer: true }
        : null,
    alternatives: [
      selectorStrategy('legacy-selector', 1),
      {
        name: 'direct-endpoint',
        apply: async () => {
          const server = await cluster.getService(prometheus.namespace, serverService);
          if (!server?.clusterIP) {
            throw new ApplyError(`Service ${serverService} has no cluster IP`);
          }
          await replaceExternal(prometheusDirectService(prometheus, server.clusterIP));
          return { detail: `Service ${prometheus.external_service} routes to ${server.clusterIP}` };
        },
        readinessCheck: exposed,
        maxRetries: SELECTOR_ATTEMPTS
      }
    ],
    rollback: async () => {
      await cluster.deleteResource('service', prometheus.external_service, prometheus.namespace);
    }
  };

  return {
    name: 'monitoring',
    description: 'Prometheus and Grafana with public load balancers',
    stages: [
      chartStage(services, {
        name: 'install-prometheus',
        chart: prometheus,
        values: storageClass => prometheusValues(prometheus, storageClass),
        podSelector: selectorString(PROMETHEUS_SELECTORS[0]),
        preconditions: []
      }),
      exposePrometheus,
      chartStage(services, {
        name: 'install-grafana',
        chart: grafana,
        values: storageClass => grafanaValues(grafana, prometheus, storageClass),
        podSelector: 'app.kubernetes.io/name=grafana',
        preconditions: [
          checker.require({ kind: 'namespace-exists', namespace: prometheus.namespace }),
          checker.require({ kind: 'service-exists', namespace: prometheus.namespace, name: serverService })
        ]
      }),
      {
        name: 'expose-grafana',
        description: 'Wait for the Grafana load balancer',
        fatal: false,
        preconditions: [checker.require({ kind: 'service-exists', namespace: grafana.namespace, name: grafana.release })],
        apply: async () => ({
          detail: `Admin password is in secret ${grafana.namespace}/${grafana.release} (key admin-password)`
        }),
        readinessCheck: loadBalancerReady(services, grafana.namespace, grafana.release, OUTPUTS.grafanaUrl)
      }
    ]
  };
}

interface ChartStageOptions {
  name: string;
  chart: ChartConfig;
  values: (storageClass: string) => Record<string, unknown>;
  podSelector: string;
  preconditions: StageDefinition['preconditions'];
}

/**
 * Installs a chart; a release left failed or pending is removed, with its
 * volumes, after the operator agrees.
 */
function chartStage(services: PipelineServices, options: ChartStageOptions): StageDefinition {
  const { chart } = options;
  const { charts, cluster, checker } = services;

  const release = (): Promise<ReleaseRef | null> => charts.getRelease(chart.release, chart.namespace);

  const confirmation: GateSource = async () => {
    const existing = await release();
    return existing
      ? {
          message: `Release ${chart.release} is ${existing.status ?? 'in an unknown state'}. Remove it and its volumes, then reinstall?`,
          defaultAnswer: false
        }
      : null;
  };

  return {
    name: options.name,
    description: `Install ${chart.repo_name}/${chart.chart} as ${chart.release} in ${chart.namespace}`,
    fatal: false,
    preconditions: [
      checker.require({ kind: 'tool-present', tool: 'helm' }),
      clusterReachable(services),
      ...(options.preconditions ?? [])
    ],
    idempotencyCheck: async () => (await release())?.status === 'deployed',
    confirmation,
    apply: async ctx => {
      if (await release()) {
        await charts.uninstall({ name: chart.release, namespace: chart.namespace });
        await cluster.deletePersistentVolumeClaims(chart.namespace);
      }

      const storageClass = await resolveStorageClass(services, ctx);
      const installed = await charts.install(
        { repoName: chart.repo_name, repoUrl: chart.repo_url, chart: chart.chart, version: chart.chart_version },
        chart.namespace,
        options.values(storageClass),
        { release: chart.release }
      );
      return {
        detail: `Release ${installed.name} ${installed.status ?? 'installed'} (storage class ${storageClass})`,
        resources: [{ kind: 'HelmRelease', name: installed.name, namespace: installed.namespace }]
      };
    },
    readinessCheck: podsRunning(services, chart.namespace, options.podSelector),
    maxRetries: services.config.orchestration.pod_attempts,
    rollback: async () => {
      await charts.uninstall({ name: chart.release, namespace: chart.namespace });
    }
  };
}

/** The configured storage class, or gp2 when the cluster lacks it. */
async function resolveStorageClass(services: PipelineServices, ctx: OrchestrationContext): Promise<string> {
  const preferred = services.config.storage.storage_class;
  if (await services.cluster.storageClassExists(preferred)) {
    return preferred;
  }
  if (await services.cluster.storageClassExists(FALLBACK_STORAGE_CLASS)) {
    ctx.logger.warn(`Storage class ${preferred} not found; using ${FALLBACK_STORAGE_CLASS}`);
    return FALLBACK_STORAGE_CLASS;
  }
  throw new PreconditionError(`Neither ${preferred} nor ${FALLBACK_STORAGE_CLASS} exists`, {
    remediation: 'Run the storage pipeline first'
  });
}
