import { CloudFormationClient } from '@aws-sdk/client-cloudformation';
import { DynamoDBClient } from '@aws-sdk/client-dynamodb';
import { EC2Client } from '@aws-sdk/client-ec2';
import { EKSClient } from '@aws-sdk/client-eks';
import { IAMClient } from '@aws-sdk/client-iam';
import { S3Client } from '@aws-sdk/client-s3';
import { STSClient } from '@aws-sdk/client-sts';
import { activeCredentials } from '../orchestration/context';
import type { OrchestrationContext } from '../orchestration/context';

interface ClientConfig {
  region: string;
  profile?: string;
  credentials?: {
    accessKeyId: string;
    secretAccessKey: string;
    sessionToken: string;
    expiration: Date;
  };
}

interface ClientSet {
  sts?: STSClient;
  eks?: EKSClient;
  iam?: IAMClient;
  s3?: S3Client;
  ec2?: EC2Client;
  dynamodb?: DynamoDBClient;
  cloudformation?: CloudFormationClient;
}

/**
 * Builds SDK clients from the context on demand. A client is rebuilt when the
 * context's credentials change, so stages after assume-admin-role act as the
 * assumed role.
 */
export class AwsClientFactory {
  private clients: ClientSet = {};
  private cacheKey = '';

  constructor(private readonly ctx: OrchestrationContext) {}

  readonly sts = (): STSClient => this.client('sts', config => new STSClient(config));
  readonly eks = (): EKSClient => this.client('eks', config => new EKSClient(config));
  readonly iam = (): IAMClient => this.client('iam', config => new IAMClient(config));
  readonly s3 = (): S3Client => this.client('s3', config => new S3Client(config));
  readonly ec2 = (): EC2Client => this.client('ec2', config => new EC2Client(config));
  readonly dynamodb = (): DynamoDBClient => this.client('dynamodb', config => new DynamoDBClient(config));
  readonly cloudformation = (): CloudFormationClient =>
    this.client('cloudformation', config => new CloudFormationClient(config));

  config(): ClientConfig {
    const credentials = activeCredentials(this.ctx);
    if (credentials) {
      return {
        region: this.ctx.region,
        credentials: {
          accessKeyId: credentials.accessKeyId,
          secretAccessKey: credentials.secretAccessKey,
          sessionToken: credentials.sessionToken,
          expiration: credentials.expiresAt
        }
      };
    }
    return { region: this.ctx.region, profile: this.ctx.profile };
  }

  private client<K extends keyof ClientSet>(
    service: K,
    create: (config: ClientConfig) => NonNullable<ClientSet[K]>
  ): NonNullable<ClientSet[K]> {
    const config = this.config();
    const key = config.credentials?.accessKeyId ?? `profile:${config.profile ?? 'default'}`;
    if (key !== this.cacheKey) {
      this.clients = {};
      this.cacheKey = key;
    }

    const cached = this.clients[service];
    if (cached) {
      return cached;
    }
    const created = create(config);
    this.clients[service] = created;
    return created;
  }
}
