import { mkdtempSync, rmSync, writeFileSync } from 'fs';
import { tmpdir } from 'os';
import { join } from 'path';
import { parseAllDocuments } from 'yaml';
import { OrchestratorConfigLoader, deepMerge } from '../../config/loader';
import { MemoryLogger } from '../../logging/logger';
import { ConfirmationPolicy } from '../../orchestration/confirmation';
import { createContext } from '../../orchestration/context';
import type { OrchestrationContext } from '../../orchestration/context';
import { Orchestrator } from '../../orchestration/orchestrator';
import { PreconditionChecker } from '../../preconditions/checker';
import { FakeRunner } from '../../provisioning/__tests__/fake-runner';
import type {
  AddonDescription,
  BucketApi,
  CallerIdentity,
  ChartInstaller,
  ChartSource,
  ClusterClient,
  ClusterDescription,
  ClusterProvisioner,
  ClusterSpec,
  CredentialExchange,
  EksApi,
  HttpProbe,
  InfraApplyResult,
  InfraDestroyResult,
  InfraProvisioner,
  InstallOptions,
  InstanceSummary,
  InventoryApi,
  NodeInfo,
  PodInfo,
  ReleaseRef,
  RoleApi,
  RoleConfig,
  RoleResult,
  ServiceInfo
} from '../../provisioning/types';
import { TemplateEngine } from '../../templates/template-engine';
import type { ConfirmationMode, OrchestratorConfig, TemporaryCredentials } from '../../types';
import type { PipelineServices } from '../services';

export const ACCOUNT_ID = '123456789012';
export const OIDC_ISSUER = 'https://oidc.eks.us-east-1.amazonaws.com/id/EXAMPLE0000';

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function stringRecord(value: unknown): Record<string, string> {
  if (!isRecord(value)) {
    return {};
  }
  return Object.fromEntries(
    Object.entries(value).flatMap(([key, entry]): [string, string][] =>
      typeof entry === 'string' ? [[key, entry]] : []
    )
  );
}

// Terraform

interface PlanState {
  resources: string[];
  outputs: Record<string, string>;
}

export class FakeInfra implements InfraProvisioner {
  /** What each plan creates when applied. */
  readonly desired = new Map<string, PlanState>();
  readonly state = new Map<string, PlanState>();
  readonly drifted = new Set<string>();
  readonly calls: string[] = [];
  /** Keyed by operation, e.g. "apply 01_ec2_workstation". */
  readonly failures = new Map<string, Error>();

  plan(planId: string, resources: string[], outputs: Record<string, string> = {}): this {
    this.desired.set(planId, { resources, outputs });
    return this;
  }

  async apply(planId: string): Promise<InfraApplyResult> {
    this.record(`apply ${planId}`);
    const before = this.state.get(planId)?.resources ?? [];
    const target = this.desired.get(planId) ?? { resources: [], outputs: {} };
    this.state.set(planId, target);
    this.drifted.delete(planId);
    return { created: target.resources.filter(resource => !before.includes(resource)), outputs: target.outputs };
  }

  async destroy(planId: string): Promise<InfraDestroyResult> {
    this.record(`destroy ${planId}`);
    const destroyed = this.state.get(planId)?.resources ?? [];
    this.state.delete(planId);
    return { destroyed };
  }

  async hasDrift(planId: string): Promise<boolean> {
    return !this.state.has(planId) || this.drifted.has(planId);
  }

  async outputs(planId: string): Promise<Record<string, string>> {
    return this.state.get(planId)?.outputs ?? {};
  }

  async resources(planId: string): Promise<string[]> {
    return this.state.get(planId)?.resources ?? [];
  }

  private record(call: string): void {
    this.calls.push(call);
    const failure = this.failures.get(call);
    if (failure) {
      throw failure;
    }
  }
}

// kubectl

export interface AppliedObject {
  kind: string;
  name: string;
  namespace: string;
  selector: Record<string, string>;
  type?: string;
}

export class FakeCluster implements ClusterClient {
  nodes: NodeInfo[] = [
    { name: 'node-1', ready: true },
    { name: 'node-2', ready: true },
    { name: 'node-3', ready: true }
  ];
  readonly pods = new Map<string, PodInfo[]>();
  readonly services = new Map<string, ServiceInfo>();
  readonly endpoints = new Map<string, string[]>();
  readonly namespaces = new Set<string>(['default', 'kube-system']);
  readonly storageClasses = new Set<string>(['gp2']);
  readonly deployments = new Set<string>();
  readonly claims = new Map<string, string>();
  /** Phase given to claims as they are applied. */
  claimPhase = 'Bound';
  /** Hostnames given to LoadBalancer services as soon as they are applied. */
  readonly hostnames = new Map<string, string>();
  readonly applied: AppliedObject[] = [];
  readonly deleted: string[] = [];
  readonly purgedClaims: string[] = [];
  kubeconfigUpdates = 0;
  /** Called for each object after it is registered. */
  onApply?: (object: AppliedObject) => void;

  setPods(namespace: string, selector: string, phases: string[]): this {
    this.pods.set(
      `${namespace}|${selector}`,
      phases.map((phase, index) => ({ name: `pod-${index}`, phase, ready: phase === 'Running' }))
    );
    return this;
  }

  addService(namespace: string, name: string, fields: Partial<ServiceInfo> = {}): this {
    this.services.set(`${namespace}/${name}`, { name, namespace, type: 'ClusterIP', ...fields });
    return this;
  }

  async getNodes(): Promise<NodeInfo[]> {
    return this.nodes;
  }

  async getPods(namespace: string, selector?: string): Promise<PodInfo[]> {
    return this.pods.get(`${namespace}|${selector ?? ''}`) ?? [];
  }

  async getService(namespace: string, name: string): Promise<ServiceInfo | null> {
    return this.services.get(`${namespace}/${name}`) ?? null;
  }

  async getEndpointAddresses(namespace: string, name: string): Promise<string[]> {
    return this.endpoints.get(`${namespace}/${name}`) ?? [];
  }

  async namespaceExists(namespace: string): Promise<boolean> {
    return this.namespaces.has(namespace);
  }

  async storageClassExists(name: string): Promise<boolean> {
    return this.storageClasses.has(name);
  }

  async deploymentExists(namespace: string, name: string): Promise<boolean> {
    return this.deployments.has(`${namespace}/${name}`);
  }

  async applyManifest(manifest: string): Promise<void> {
    for (const document of parseAllDocuments(manifest)) {
      const value: unknown = document.toJS();
      if (!isRecord(value) || !isRecord(value.metadata) || typeof value.kind !== 'string') {
        continue;
      }
      const metadata = value.metadata;
      const spec: Record<string, unknown> = isRecord(value.spec) ? value.spec : {};
      const object: AppliedObject = {
        kind: value.kind,
        name: String(metadata.name),
        namespace: typeof metadata.namespace === 'string' ? metadata.namespace : 'default',
        selector: stringRecord(spec.selector),
        type: typeof spec.type === 'string' ? spec.type : undefined
      };
      this.register(object);
      this.applied.push(object);
      this.onApply?.(object);
    }
  }

  async deleteResource(kind: string, name: string, namespace?: string): Promise<void> {
    const key = `${namespace ?? 'default'}/${name}`;
    this.deleted.push(namespace ? `${kind}/${namespace}/${name}` : `${kind}/${name}`);
    switch (kind) {
      case 'service':
        this.services.delete(key);
        this.endpoints.delete(key);
        break;
      case 'deployment':
        this.deployments.delete(key);
        break;
      case 'storageclass':
        this.storageClasses.delete(name);
        break;
      case 'namespace':
        this.namespaces.delete(name);
        break;
      case 'pvc':
        this.claims.delete(key);
        break;
    }
  }

  async deletePersistentVolumeClaims(namespace: string): Promise<void> {
    this.purgedClaims.push(namespace);
  }

  async getClaimPhase(namespace: string, name: string): Promise<string | null> {
    return this.claims.get(`${namespace}/${name}`) ?? null;
  }

  async updateKubeconfig(): Promise<void> {
    this.kubeconfigUpdates += 1;
  }

  private register(object: AppliedObject): void {
    const key = `${object.namespace}/${object.name}`;
    switch (object.kind) {
      case 'Deployment':
        this.deployments.add(key);
        break;
      case 'Service':
        this.services.set(key, {
          name: object.name,
          namespace: object.namespace,
          type: object.type ?? 'ClusterIP',
          loadBalancerHostname: this.hostnames.get(key)
        });
        break;
      case 'StorageClass':
        this.storageClasses.add(object.name);
        break;
      case 'Namespace':
        this.namespaces.add(object.name);
        break;
      case 'PersistentVolumeClaim':
        this.claims.set(key, this.claimPhase);
        break;
    }
  }
}

// Helm

export interface InstalledChart {
  source: ChartSource;
  namespace: string;
  values: Record<string, unknown>;
  release: string;
}

export class FakeCharts implements ChartInstaller {
  readonly releases = new Map<string, ReleaseRef>();
  readonly installs: InstalledChart[] = [];
  readonly uninstalled: string[] = [];

  constructor(private readonly cluster: FakeCluster) {}

  seed(name: string, namespace: string, status: string): this {
    this.releases.set(`${namespace}/${name}`, { name, namespace, status, revision: 1 });
    return this;
  }

  async install(
    source: ChartSource,
    namespace: string,
    values: Record<string, unknown>,
    options: InstallOptions
  ): Promise<ReleaseRef> {
    this.installs.push({ source, namespace, values, release: options.release });
    this.cluster.namespaces.add(namespace);
    const ref = { name: options.release, namespace, status: 'deployed', revision: 1, chart: source.chart };
    this.releases.set(`${namespace}/${options.release}`, ref);
    return ref;
  }

  async uninstall(ref: Pick<ReleaseRef, 'name' | 'namespace'>): Promise<boolean> {
    this.uninstalled.push(`${ref.namespace}/${ref.name}`);
    return this.releases.delete(`${ref.namespace}/${ref.name}`);
  }

  async getRelease(name: string, namespace: string): Promise<ReleaseRef | null> {
    return this.releases.get(`${namespace}/${name}`) ?? null;
  }
}

// AWS

export class FakeEks implements EksApi {
  readonly clusters = new Map<string, ClusterDescription>();
  readonly nodegroups = new Map<string, string[]>();
  readonly addons = new Map<string, AddonDescription>();
  readonly calls: string[] = [];

  addCluster(name: string, fields: Partial<ClusterDescription> = {}): this {
    this.clusters.set(name, { name, status: 'ACTIVE', oidcIssuer: OIDC_ISSUER, version: '1.29', ...fields });
    this.nodegroups.set(name, [`${name}-nodes`]);
    return this;
  }

  async describeCluster(name: string): Promise<ClusterDescription | null> {
    return this.clusters.get(name) ?? null;
  }

  async getAddon(clusterName: string, addonName: string): Promise<AddonDescription | null> {
    return this.addons.get(`${clusterName}/${addonName}`) ?? null;
  }

  async createAddon(clusterName: string, addonName: string, serviceAccountRoleArn?: string): Promise<void> {
    this.calls.push(`createAddon ${addonName}`);
    this.addons.set(`${clusterName}/${addonName}`, { name: addonName, status: 'ACTIVE', serviceAccountRoleArn });
  }

  async deleteAddon(clusterName: string, addonName: string): Promise<void> {
    this.calls.push(`deleteAddon ${addonName}`);
    this.addons.delete(`${clusterName}/${addonName}`);
  }

  async listNodegroups(clusterName: string): Promise<string[]> {
    return this.nodegroups.get(clusterName) ?? [];
  }

  async deleteNodegroup(clusterName: string, nodegroupName: string): Promise<void> {
    this.calls.push(`deleteNodegroup ${nodegroupName}`);
    this.nodegroups.set(
      clusterName,
      (this.nodegroups.get(clusterName) ?? []).filter(name => name !== nodegroupName)
    );
  }

  async deleteCluster(name: string): Promise<void> {
    this.calls.push(`deleteCluster ${name}`);
    this.clusters.delete(name);
    this.nodegroups.delete(name);
  }
}

export class FakeRoles implements RoleApi {
  readonly roles = new Map<string, { arn: string; policies: Set<string>; config: RoleConfig }>();
  readonly oidcProviders = new Set<string>();

  addRole(roleName: string, policyArns: string[] = []): this {
    this.roles.set(roleName, {
      arn: `arn:aws:iam::${ACCOUNT_ID}:role/${roleName}`,
      policies: new Set(policyArns),
      config: { roleName, trustPolicy: { Version: '2012-10-17', Statement: [] } }
    });
    return this;
  }

  async ensureRole(config: RoleConfig): Promise<RoleResult> {
    const existing = this.roles.get(config.roleName);
    const arn = `arn:aws:iam::${ACCOUNT_ID}:role/${config.roleName}`;
    const policies = new Set([...(existing?.policies ?? []), ...(config.policyArns ?? [])]);
    this.roles.set(config.roleName, { arn, policies, config });
    return { roleName: config.roleName, roleArn: arn, status: existing ? 'updated' : 'created' };
  }

  async getRoleArn(roleName: string): Promise<string | null> {
    return this.roles.get(roleName)?.arn ?? null;
  }

  async hasAttachedPolicy(roleName: string, policyArn: string): Promise<boolean> {
    return this.roles.get(roleName)?.policies.has(policyArn) ?? false;
  }

  async deleteRole(roleName: string): Promise<boolean> {
    return this.roles.delete(roleName);
  }

  async oidcProviderExists(issuerUrl: string): Promise<boolean> {
    return this.oidcProviders.has(issuerUrl);
  }
}

export class FakeClusters implements ClusterProvisioner {
  readonly created: ClusterSpec[] = [];
  readonly deleted: string[] = [];
  deleteError?: Error;

  constructor(private readonly eks: FakeEks, private readonly roles: FakeRoles) {}

  async clusterExists(name: string): Promise<boolean> {
    return this.eks.clusters.has(name);
  }

  async createCluster(spec: ClusterSpec): Promise<void> {
    this.created.push(spec);
    this.eks.addCluster(spec.name);
    this.eks.nodegroups.set(spec.name, [spec.nodeGroupName]);
  }

  async deleteCluster(name: string): Promise<void> {
    this.deleted.push(name);
    if (this.deleteError) {
      throw this.deleteError;
    }
    this.eks.clusters.delete(name);
    this.eks.nodegroups.delete(name);
  }

  async associateOidcProvider(name: string): Promise<void> {
    const issuer = this.eks.clusters.get(name)?.oidcIssuer;
    if (issuer) {
      this.roles.oidcProviders.add(issuer);
    }
  }
}

export class FakeIdentity implements CredentialExchange {
  readonly assumed: string[] = [];

  constructor(private readonly now: () => Date) {}

  async getCallerIdentity(): Promise<CallerIdentity> {
    return { account: ACCOUNT_ID, arn: `arn:aws:iam::${ACCOUNT_ID}:user/operator`, userId: 'AIDATEST' };
  }

  async assumeRole(roleArn: string, durationSeconds: number): Promise<TemporaryCredentials> {
    this.assumed.push(roleArn);
    return {
      accessKeyId: 'ASIATEST',
      secretAccessKey: 'test-secret',
      sessionToken: 'test-session-token',
      expiresAt: new Date(this.now().getTime() + durationSeconds * 1000)
    };
  }
}

export class FakeBuckets implements BucketApi {
  /** Bucket name to object version count. */
  readonly buckets = new Map<string, number>();
  readonly calls: string[] = [];

  async bucketExists(bucketName: string): Promise<boolean> {
    return this.buckets.has(bucketName);
  }

  async emptyBucket(bucketName: string): Promise<number> {
    this.calls.push(`empty ${bucketName}`);
    const count = this.buckets.get(bucketName) ?? 0;
    if (this.buckets.has(bucketName)) {
      this.buckets.set(bucketName, 0);
    }
    return count;
  }

  async deleteBucket(bucketName: string): Promise<void> {
    this.calls.push(`delete ${bucketName}`);
    this.buckets.delete(bucketName);
  }
}

export class FakeInventory implements InventoryApi {
  readonly instances = new Map<string, InstanceSummary[]>();
  readonly tables = new Set<string>();
  stacks: string[] = [];

  async findInstancesByName(nameTag: string): Promise<InstanceSummary[]> {
    return this.instances.get(nameTag) ?? [];
  }

  async tableExists(tableName: string): Promise<boolean> {
    return this.tables.has(tableName);
  }

  async findStacks(namePrefix: string): Promise<string[]> {
    return this.stacks.filter(stack => stack.startsWith(namePrefix));
  }
}

export class FakeHttp implements HttpProbe {
  readonly bodies = new Map<string, string>();
  readonly requested: string[] = [];

  async fetchText(url: string): Promise<string | null> {
    this.requested.push(url);
    return this.bodies.get(url) ?? null;
  }
}

// Wiring

export interface FakeWorld {
  services: PipelineServices;
  config: OrchestratorConfig;
  runner: FakeRunner;
  infra: FakeInfra;
  cluster: FakeCluster;
  charts: FakeCharts;
  clusters: FakeClusters;
  identity: FakeIdentity;
  eks: FakeEks;
  roles: FakeRoles;
  buckets: FakeBuckets;
  inventory: FakeInventory;
  http: FakeHttp;
  logger: MemoryLogger;
  ctx: OrchestrationContext;
  sshDir: string;
  orchestrator(mode?: ConfirmationMode, answer?: boolean): Orchestrator;
  cleanup(): void;
}

export interface FakeWorldOptions {
  /** Deep-merged over the test configuration. */
  config?: Record<string, unknown>;
  /** Write the SSH public key the cluster and workstation stages expect. */
  sshKey?: boolean;
  now?: () => Date;
}

/**
 * Services backed entirely by in-memory fakes, with polling shortened so
 * readiness loops finish at once.
 */
export function createFakeWorld(options: FakeWorldOptions = {}): FakeWorld {
  const sshDir = mkdtempSync(join(tmpdir(), 'orchestrator-ssh-'));
  if (options.sshKey ?? true) {
    writeFileSync(join(sshDir, 'pin.pub'), 'ssh-rsa AAAATEST operator@example');
  }

  const config = new OrchestratorConfigLoader({}).resolve(
    deepMerge(
      {
        project: 'demo',
        cluster: { ssh_key_dir: sshDir },
        orchestration: { poll_interval_seconds: 0, max_attempts: 3, pod_attempts: 2 }
      },
      options.config ?? {}
    )
  );

  const now = options.now ?? (() => new Date());
  const logger = new MemoryLogger();
  const ctx = createContext({
    region: config.aws.region,
    clusterName: config.cluster.name,
    logger,
    runId: 'run-test',
    now
  });

  const runner = new FakeRunner();
  const infra = new FakeInfra();
  const cluster = new FakeCluster();
  const charts = new FakeCharts(cluster);
  const eks = new FakeEks();
  const roles = new FakeRoles();
  const clusters = new FakeClusters(eks, roles);
  const identity = new FakeIdentity(now);
  const buckets = new FakeBuckets();
  const inventory = new FakeInventory();
  const http = new FakeHttp();

  const services: PipelineServices = {
    config,
    runner,
    infra,
    cluster,
    charts,
    clusters,
    identity,
    eks,
    roles,
    buckets,
    inventory,
    http,
    templates: new TemplateEngine(),
    checker: new PreconditionChecker({ runner, identity, cluster, eks })
  };

  return {
    services,
    config,
    runner,
    infra,
    cluster,
    charts,
    clusters,
    identity,
    eks,
    roles,
    buckets,
    inventory,
    http,
    logger,
    ctx,
    sshDir,
    orchestrator: (mode = 'auto-approve', answer = true) =>
      new Orchestrator({
        confirmation: new ConfirmationPolicy(mode, { confirm: async () => answer }, logger),
        defaults: { maxRetries: 2, pollIntervalSeconds: 0 }
      }),
    cleanup: () => rmSync(sshDir, { recursive: true, force: true })
  };
}
