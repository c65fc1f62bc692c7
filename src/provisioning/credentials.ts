import { STSClient, AssumeRoleCommand, GetCallerIdentityCommand } from '@aws-sdk/client-sts';
import { FatalError } from '../orchestration/errors';
import { rethrowAuthErrors } from './aws-errors';
import type { TemporaryCredentials } from '../types';
import type { CallerIdentity, CredentialExchange } from './types';

export class STSCredentialExchange implements CredentialExchange {
  constructor(private readonly client: () => Pick<STSClient, 'send'>) {}

  async getCallerIdentity(): Promise<CallerIdentity> {
    try {
      const result = await this.client().send(new GetCallerIdentityCommand({}));
      return {
        account: result.Account ?? '',
        arn: result.Arn ?? '',
        userId: result.UserId ?? ''
      };
    } catch (error) {
      return rethrowAuthErrors(error);
    }
  }

  async assumeRole(roleArn: string, durationSeconds: number, sessionName: string): Promise<TemporaryCredentials> {
    try {
      const result = await this.client().send(
        new AssumeRoleCommand({ RoleArn: roleArn, RoleSessionName: sessionName, DurationSeconds: durationSeconds })
      );
      const credentials = result.Credentials;
      if (
        !credentials?.AccessKeyId ||
        !credentials.SecretAccessKey ||
        !credentials.SessionToken ||
        !credentials.Expiration
      ) {
        throw new FatalError(`AssumeRole for ${roleArn} returned incomplete credentials`);
      }

      return {
        accessKeyId: credentials.AccessKeyId,
        secretAccessKey: credentials.SecretAccessKey,
        sessionToken: credentials.SessionToken,
        expiresAt: credentials.Expiration
      };
    } catch (error) {
      return rethrowAuthErrors(error);
    }
  }
}
