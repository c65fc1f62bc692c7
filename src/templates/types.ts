// Kubernetes manifest shapes rendered by the template engine

export interface ObjectMeta {
  name: string;
  namespace?: string;
  labels?: Record<string, string>;
  annotations?: Record<string, string>;
}

export interface KubernetesManifest {
  apiVersion: string;
  kind: string;
  metadata: ObjectMeta;
  spec?: Record<string, unknown>;
  [field: string]: unknown;
}

export interface ServicePort {
  name?: string;
  port: number;
  targetPort?: number;
  protocol?: 'TCP' | 'UDP';
}

/** Label selectors tried in order when exposing the Prometheus server. */
export type PodSelector = Record<string, string>;
