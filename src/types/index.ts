// Core type definitions for the provisioning orchestrator

export type StageStatus = 'skipped' | 'applied' | 'failed' | 'rolled_back';

export type ErrorCode =
  | 'PRECONDITION_FAILED'
  | 'APPLY_FAILED'
  | 'READINESS_TIMEOUT'
  | 'USER_ABORTED'
  | 'FATAL'
  | 'CANCELLED'
  | 'COMMAND_FAILED'
  | 'CONFIG_INVALID';

export type ConfirmationMode = 'proceed' | 'prompt' | 'auto-approve';

export interface RunResult {
  stageName: string;
  status: StageStatus;
  detail: string;
  durationMs: number;
  fatal: boolean;
  warning?: string;
  errorCode?: ErrorCode;
  remediation?: string;
  /** Name of the apply strategy that produced the result, when the stage has alternatives. */
  strategy?: string;
}

export interface CheckResult {
  ok: boolean;
  detail: string;
}

export interface ResourceRef {
  kind: string;
  name: string;
  namespace?: string;
}

export interface TemporaryCredentials {
  accessKeyId: string;
  secretAccessKey: string;
  sessionToken: string;
  expiresAt: Date;
}

export interface AWSConfig {
  region: string;
  profile?: string;
}

export interface ClusterConfig {
  name: string;
  node_type: string;
  node_count: number;
  zones: string[];
  ssh_key_name: string;
  ssh_key_dir: string;
  kubernetes_version?: string;
}

export interface TerraformConfig {
  root_dir: string;
  backend_dir: string;
  workstation_dir: string;
  eks_infrastructure_dir: string;
}

export interface StateBackendConfig {
  bucket_name: string;
  lock_table_name: string;
}

export interface WorkstationConfig {
  name_tag: string;
}

export interface AccessConfig {
  role_arn_output: string;
  cluster_name_output: string;
  session_name: string;
  duration_seconds: number;
}

export interface SmokeTestConfig {
  name: string;
  namespace: string;
  image: string;
  expected_body: string;
}

export interface StorageConfig {
  storage_class: string;
  volume_type: string;
  encrypted: boolean;
  csi_role_name: string;
  csi_policy_arn: string;
  addon_name: string;
}

export interface ChartConfig {
  namespace: string;
  release: string;
  repo_name: string;
  repo_url: string;
  chart: string;
  chart_version?: string;
  volume_size: string;
}

export interface DashboardConfig {
  name: string;
  gnet_id: number;
  revision: number;
}

export interface PrometheusConfig extends ChartConfig {
  external_service: string;
}

export interface GrafanaConfig extends ChartConfig {
  admin_password: string;
  dashboards: DashboardConfig[];
}

export interface MonitoringConfig {
  prometheus: PrometheusConfig;
  grafana: GrafanaConfig;
}

export interface OrchestrationSettings {
  confirmation: ConfirmationMode;
  poll_interval_seconds: number;
  max_attempts: number;
  pod_attempts: number;
}

export interface OrchestratorConfig {
  project: string;
  aws: AWSConfig;
  cluster: ClusterConfig;
  terraform: TerraformConfig;
  backend: StateBackendConfig;
  workstation: WorkstationConfig;
  access: AccessConfig;
  smoke_test: SmokeTestConfig;
  storage: StorageConfig;
  monitoring: MonitoringConfig;
  orchestration: OrchestrationSettings;
}
