import type { PrometheusConfig, SmokeTestConfig, StorageConfig } from '../types';
import type { KubernetesManifest, PodSelector } from './types';

const CLASSIC_LB_ANNOTATIONS = {
  'service.beta.kubernetes.io/aws-load-balancer-type': 'classic',
  'service.beta.kubernetes.io/aws-load-balancer-backend-protocol': 'http'
};

const PROMETHEUS_PORT = 9090;

/** Server pod labels, newest chart layout first. */
export const PROMETHEUS_SELECTORS: PodSelector[] = [
  { 'app.kubernetes.io/name': 'prometheus', 'app.kubernetes.io/component': 'server' },
  { app: 'prometheus', component: 'server' }
];

export function smokeTestDeployment(config: SmokeTestConfig): KubernetesManifest {
  const labels = { app: config.name };
  return {
    apiVersion: 'apps/v1',
    kind: 'Deployment',
    metadata: { name: config.name, namespace: config.namespace, labels },
    spec: {
      replicas: 1,
      selector: { matchLabels: labels },
      template: {
        metadata: { labels },
        spec: {
          containers: [{ name: config.name, image: config.image, ports: [{ containerPort: 80 }] }]
        }
      }
    }
  };
}

export function smokeTestService(config: SmokeTestConfig): KubernetesManifest {
  return {
    apiVersion: 'v1',
    kind: 'Service',
    metadata: { name: config.name, namespace: config.namespace },
    spec: {
      type: 'LoadBalancer',
      selector: { app: config.name },
      ports: [{ port: 80, targetPort: 80, protocol: 'TCP' }]
    }
  };
}

export function storageClass(config: StorageConfig): KubernetesManifest {
  return {
    apiVersion: 'storage.k8s.io/v1',
    kind: 'StorageClass',
    metadata: { name: config.storage_class },
    provisioner: 'ebs.csi.aws.com',
    volumeBindingMode: 'WaitForFirstConsumer',
    parameters: {
      type: config.volume_type,
      encrypted: String(config.encrypted)
    }
  };
}

/** Throwaway claim and pod that prove the storage class provisions volumes. */
export const STORAGE_TEST = {
  namespace: 'default',
  claim: 'ebs-test-claim',
  pod: 'ebs-test-pod',
  selector: 'app=ebs-test',
  size: '4Gi'
} as const;

export function storageTestClaim(config: StorageConfig): KubernetesManifest {
  return {
    apiVersion: 'v1',
    kind: 'PersistentVolumeClaim',
    metadata: { name: STORAGE_TEST.claim, namespace: STORAGE_TEST.namespace },
    spec: {
      accessModes: ['ReadWriteOnce'],
      storageClassName: config.storage_class,
      resources: { requests: { storage: STORAGE_TEST.size } }
    }
  };
}

export function storageTestPod(): KubernetesManifest {
  return {
    apiVersion: 'v1',
    kind: 'Pod',
    metadata: { name: STORAGE_TEST.pod, namespace: STORAGE_TEST.namespace, labels: { app: 'ebs-test' } },
    spec: {
      containers: [
        {
          name: 'ebs-test',
          image: 'nginx',
          volumeMounts: [{ mountPath: '/usr/share/nginx/html', name: 'ebs-volume' }]
        }
      ],
      volumes: [{ name: 'ebs-volume', persistentVolumeClaim: { claimName: STORAGE_TEST.claim } }]
    }
  };
}

/** LoadBalancer in front of the Prometheus server pods. */
export function prometheusExternalService(config: PrometheusConfig, selector: PodSelector): KubernetesManifest {
  return {
    apiVersion: 'v1',
    kind: 'Service',
    metadata: {
      name: config.external_service,
      namespace: config.namespace,
      annotations: { ...CLASSIC_LB_ANNOTATIONS }
    },
    spec: {
      type: 'LoadBalancer',
      ports: [{ name: 'http', port: 80, targetPort: PROMETHEUS_PORT, protocol: 'TCP' }],
      selector
    }
  };
}

/**
 * Selector-less LoadBalancer plus a hand-written Endpoints object pointing at
 * the prometheus-server cluster IP. Last resort when no selector matches.
 */
export function prometheusDirectService(config: PrometheusConfig, serverIp: string): KubernetesManifest[] {
  const metadata = { name: config.external_service, namespace: config.namespace };
  return [
    {
      apiVersion: 'v1',
      kind: 'Service',
      metadata: { ...metadata, annotations: { ...CLASSIC_LB_ANNOTATIONS } },
      spec: {
        type: 'LoadBalancer',
        ports: [{ name: 'http', port: 80, targetPort: 80, protocol: 'TCP' }]
      }
    },
    {
      apiVersion: 'v1',
      kind: 'Endpoints',
      metadata,
      subsets: [
        {
          addresses: [{ ip: serverIp }],
          ports: [{ name: 'http', port: 80, protocol: 'TCP' }]
        }
      ]
    }
  ];
}

export function selectorString(selector: PodSelector): string {
  return Object.entries(selector)
    .map(([key, value]) => `${key}=${value}`)
    .join(',');
}
