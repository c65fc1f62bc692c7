import { contextEnv } from '../orchestration/context';
import type { OrchestrationContext } from '../orchestration/context';
import { PreconditionChecker } from '../preconditions/checker';
import { AwsClientFactory } from '../provisioning/clients';
import { STSCredentialExchange } from '../provisioning/credentials';
import { EKSManager } from '../provisioning/eks-manager';
import { EksctlClient } from '../provisioning/eksctl';
import { ProcessRunner } from '../provisioning/exec';
import { HelmClient } from '../provisioning/helm';
import { FetchProbe } from '../provisioning/http';
import { IAMManager } from '../provisioning/iam-manager';
import { ResourceInventory } from '../provisioning/inventory';
import { KubectlClient } from '../provisioning/kubectl';
import { S3Manager } from '../provisioning/s3-manager';
import { TerraformCli } from '../provisioning/terraform';
import type {
  BucketApi,
  ChartInstaller,
  ClusterClient,
  ClusterProvisioner,
  CommandRunner,
  CredentialExchange,
  EksApi,
  HttpProbe,
  InfraProvisioner,
  InventoryApi,
  RoleApi
} from '../provisioning/types';
import { TemplateEngine } from '../templates/template-engine';
import type { OrchestratorConfig } from '../types';

/** Every external collaborator a pipeline stage may call. */
export interface PipelineServices {
  config: OrchestratorConfig;
  runner: CommandRunner;
  infra: InfraProvisioner;
  cluster: ClusterClient;
  charts: ChartInstaller;
  clusters: ClusterProvisioner;
  identity: CredentialExchange;
  eks: EksApi;
  roles: RoleApi;
  buckets: BucketApi;
  inventory: InventoryApi;
  http: HttpProbe;
  templates: TemplateEngine;
  checker: PreconditionChecker;
}

/**
 * Wires the real CLI wrappers and SDK managers to one run context. Subprocess
 * environments and SDK clients are derived from the context on every call.
 */
export function createServices(
  config: OrchestratorConfig,
  ctx: OrchestrationContext,
  runner: CommandRunner = new ProcessRunner()
): PipelineServices {
  const env = () => contextEnv(ctx);
  const aws = new AwsClientFactory(ctx);

  const cluster = new KubectlClient(runner, env);
  const identity = new STSCredentialExchange(aws.sts);
  const eks = new EKSManager(aws.eks);

  return {
    config,
    runner,
    infra: new TerraformCli(runner, { rootDir: config.terraform.root_dir, env }),
    cluster,
    charts: new HelmClient(runner, env),
    clusters: new EksctlClient(runner, env),
    identity,
    eks,
    roles: new IAMManager(aws.iam),
    buckets: new S3Manager(aws.s3),
    inventory: new ResourceInventory({ ec2: aws.ec2, dynamodb: aws.dynamodb, cloudformation: aws.cloudformation }),
    http: new FetchProbe(),
    templates: new TemplateEngine(),
    checker: new PreconditionChecker({ runner, identity, cluster, eks })
  };
}
