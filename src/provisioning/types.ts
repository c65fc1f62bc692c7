// Contracts for the external systems stages drive
import type { TemporaryCredentials } from '../types';

export interface CommandResult {
  code: number;
  stdout: string;
  stderr: string;
}

export interface CommandOptions {
  cwd?: string;
  env?: Record<string, string>;
  input?: string;
  signal?: AbortSignal;
  timeoutMs?: number;
}

export interface CommandRunner {
  run(command: string, args: string[], options?: CommandOptions): Promise<CommandResult>;
}

/** Supplies the environment for each subprocess call; re-read every time so new credentials apply. */
export type EnvSource = () => Record<string, string>;

// Terraform

export interface InfraApplyResult {
  /** Resource addresses that did not exist before the apply. */
  created: string[];
  outputs: Record<string, string>;
}

export interface InfraDestroyResult {
  destroyed: string[];
}

export interface InfraProvisioner {
  apply(planId: string): Promise<InfraApplyResult>;
  destroy(planId: string): Promise<InfraDestroyResult>;
  hasDrift(planId: string): Promise<boolean>;
  outputs(planId: string): Promise<Record<string, string>>;
  resources(planId: string): Promise<string[]>;
}

// Kubernetes

export interface NodeInfo {
  name: string;
  ready: boolean;
}

export interface PodInfo {
  name: string;
  phase: string;
  ready: boolean;
}

export interface ServiceInfo {
  name: string;
  namespace: string;
  type: string;
  clusterIP?: string;
  loadBalancerHostname?: string;
}

export interface ClusterClient {
  getNodes(): Promise<NodeInfo[]>;
  getPods(namespace: string, selector?: string): Promise<PodInfo[]>;
  getService(namespace: string, name: string): Promise<ServiceInfo | null>;
  getEndpointAddresses(namespace: string, name: string): Promise<string[]>;
  namespaceExists(namespace: string): Promise<boolean>;
  storageClassExists(name: string): Promise<boolean>;
  deploymentExists(namespace: string, name: string): Promise<boolean>;
  applyManifest(manifest: string): Promise<void>;
  deleteResource(kind: string, name: string, namespace?: string): Promise<void>;
  deletePersistentVolumeClaims(namespace: string): Promise<void>;
  /** Phase of a PersistentVolumeClaim (Pending, Bound, Lost), or null when absent. */
  getClaimPhase(namespace: string, name: string): Promise<string | null>;
  updateKubeconfig(clusterName: string, region: string): Promise<void>;
}

// Helm

export interface ChartSource {
  repoName: string;
  repoUrl: string;
  chart: string;
  version?: string;
}

export interface ReleaseRef {
  name: string;
  namespace: string;
  revision?: number;
  status?: string;
  chart?: string;
}

export interface InstallOptions {
  release: string;
}

export interface ChartInstaller {
  install(source: ChartSource, namespace: string, values: Record<string, unknown>, options: InstallOptions): Promise<ReleaseRef>;
  /** Resolves false when the release did not exist. */
  uninstall(ref: Pick<ReleaseRef, 'name' | 'namespace'>): Promise<boolean>;
  getRelease(name: string, namespace: string): Promise<ReleaseRef | null>;
}

// eksctl

export interface ClusterSpec {
  name: string;
  region: string;
  nodeGroupName: string;
  nodeType: string;
  nodeCount: number;
  zones: string[];
  sshPublicKeyPath: string;
  kubernetesVersion?: string;
}

export interface ClusterProvisioner {
  clusterExists(name: string, region: string): Promise<boolean>;
  createCluster(spec: ClusterSpec): Promise<void>;
  deleteCluster(name: string, region: string): Promise<void>;
  associateOidcProvider(name: string, region: string): Promise<void>;
}

// AWS APIs

export interface CallerIdentity {
  account: string;
  arn: string;
  userId: string;
}

export interface IdentityVerifier {
  getCallerIdentity(): Promise<CallerIdentity>;
}

export interface CredentialExchange extends IdentityVerifier {
  assumeRole(roleArn: string, durationSeconds: number, sessionName: string): Promise<TemporaryCredentials>;
}

export interface ClusterDescription {
  name: string;
  status: string;
  endpoint?: string;
  oidcIssuer?: string;
  version?: string;
}

export interface AddonDescription {
  name: string;
  status: string;
  version?: string;
  serviceAccountRoleArn?: string;
}

export interface EksApi {
  describeCluster(name: string): Promise<ClusterDescription | null>;
  getAddon(clusterName: string, addonName: string): Promise<AddonDescription | null>;
  createAddon(clusterName: string, addonName: string, serviceAccountRoleArn?: string): Promise<void>;
  deleteAddon(clusterName: string, addonName: string): Promise<void>;
  listNodegroups(clusterName: string): Promise<string[]>;
  deleteNodegroup(clusterName: string, nodegroupName: string): Promise<void>;
  deleteCluster(name: string): Promise<void>;
}

export interface PolicyStatement {
  Effect: 'Allow' | 'Deny';
  Action: string | string[];
  Resource?: string | string[];
  Principal?: Record<string, string | string[]>;
  Condition?: Record<string, Record<string, string>>;
}

export interface PolicyDocument {
  Version: '2012-10-17';
  Statement: PolicyStatement[];
}

export interface RoleConfig {
  roleName: string;
  trustPolicy: PolicyDocument;
  policyArns?: string[];
}

export interface RoleResult {
  roleName: string;
  roleArn: string;
  status: 'created' | 'updated';
}

export interface RoleApi {
  ensureRole(config: RoleConfig): Promise<RoleResult>;
  getRoleArn(roleName: string): Promise<string | null>;
  hasAttachedPolicy(roleName: string, policyArn: string): Promise<boolean>;
  deleteRole(roleName: string): Promise<boolean>;
  oidcProviderExists(issuerUrl: string): Promise<boolean>;
}

export interface BucketApi {
  bucketExists(bucketName: string): Promise<boolean>;
  /** Deletes every object version and delete marker; returns how many were removed. */
  emptyBucket(bucketName: string): Promise<number>;
  deleteBucket(bucketName: string): Promise<void>;
}

export interface InstanceSummary {
  instanceId: string;
  state: string;
}

export interface InventoryApi {
  findInstancesByName(nameTag: string): Promise<InstanceSummary[]>;
  tableExists(tableName: string): Promise<boolean>;
  findStacks(namePrefix: string): Promise<string[]>;
}

export interface HttpProbe {
  /** Resolves with the response body, or null when the endpoint did not answer. */
  fetchText(url: string, timeoutMs: number): Promise<string | null>;
}
