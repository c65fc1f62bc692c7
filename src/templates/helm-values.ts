import type { GrafanaConfig, PrometheusConfig } from '../types';

interface ResourceSpec {
  limits: { cpu: string; memory: string };
  requests: { cpu: string; memory: string };
}

function resources(limitCpu: string, limitMemory: string, requestCpu: string, requestMemory: string): ResourceSpec {
  return {
    limits: { cpu: limitCpu, memory: limitMemory },
    requests: { cpu: requestCpu, memory: requestMemory }
  };
}

const SMALL = resources('100m', '128Mi', '50m', '64Mi');

/**
 * Alertmanager persistence stays off: its PVC tends to stay Pending on small
 * node groups and blocks the release.
 */
export function prometheusValues(config: PrometheusConfig, storageClass: string): Record<string, unknown> {
  return {
    alertmanager: {
      persistentVolume: { enabled: false },
      resources: resources('100m', '256Mi', '50m', '128Mi')
    },
    server: {
      persistentVolume: { enabled: true, storageClass, size: config.volume_size },
      resources: resources('500m', '512Mi', '200m', '256Mi')
    },
    pushgateway: { resources: SMALL },
    nodeExporter: { resources: SMALL },
    kubeStateMetrics: { resources: SMALL }
  };
}

export function prometheusServerUrl(prometheus: PrometheusConfig): string {
  return `http://${prometheus.release}-server.${prometheus.namespace}.svc.cluster.local`;
}

export function grafanaValues(
  config: GrafanaConfig,
  prometheus: PrometheusConfig,
  storageClass: string
): Record<string, unknown> {
  const dashboards: Record<string, { gnetId: number; revision: number; datasource: string }> = {};
  for (const dashboard of config.dashboards) {
    dashboards[dashboard.name] = { gnetId: dashboard.gnet_id, revision: dashboard.revision, datasource: 'Prometheus' };
  }

  return {
    persistence: { enabled: true, storageClassName: storageClass, size: config.volume_size },
    adminPassword: config.admin_password,
    service: { type: 'LoadBalancer' },
    datasources: {
      'datasources.yaml': {
        apiVersion: 1,
        datasources: [
          { name: 'Prometheus', type: 'prometheus', url: prometheusServerUrl(prometheus), access: 'proxy', isDefault: true }
        ]
      }
    },
    dashboardProviders: {
      'dashboardproviders.yaml': {
        apiVersion: 1,
        providers: [
          {
            name: 'kubernetes',
            orgId: 1,
            folder: 'Kubernetes',
            type: 'file',
            disableDeletion: false,
            editable: true,
            options: { path: '/var/lib/grafana/dashboards/kubernetes' }
          }
        ]
      }
    },
    dashboards: { kubernetes: dashboards },
    resources: resources('500m', '512Mi', '200m', '256Mi')
  };
}
