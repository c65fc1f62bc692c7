import {
  IAMClient,
  AttachRolePolicyCommand,
  CreateRoleCommand,
  DeleteRoleCommand,
  DeleteRolePolicyCommand,
  DetachRolePolicyCommand,
  GetRoleCommand,
  ListAttachedRolePoliciesCommand,
  ListOpenIDConnectProvidersCommand,
  ListRolePoliciesCommand,
  UpdateAssumeRolePolicyCommand
} from '@aws-sdk/client-iam';
import { OrchestrationError } from '../orchestration/errors';
import { hasErrorName, rethrowAuthErrors } from './aws-errors';
import type { PolicyDocument, RoleApi, RoleConfig, RoleResult } from './types';

export class IAMManager implements RoleApi {
  constructor(private readonly client: () => Pick<IAMClient, 'send'>) {}

  /**
   * Creates the role, or refreshes the trust policy of an existing one, then
   * attaches the managed policies. Every call is safe to repeat.
   */
  async ensureRole(config: RoleConfig): Promise<RoleResult> {
    try {
      let roleArn = await this.getRoleArn(config.roleName);
      const status: RoleResult['status'] = roleArn ? 'updated' : 'created';

      if (roleArn) {
        await this.client().send(
          new UpdateAssumeRolePolicyCommand({
            RoleName: config.roleName,
            PolicyDocument: JSON.stringify(config.trustPolicy)
          })
        );
      } else {
        const created = await this.client().send(
          new CreateRoleCommand({
            RoleName: config.roleName,
            AssumeRolePolicyDocument: JSON.stringify(config.trustPolicy)
          })
        );
        roleArn = created.Role?.Arn ?? null;
      }

      if (!roleArn) {
        throw new Error('IAM did not return a role ARN');
      }

      for (const policyArn of config.policyArns ?? []) {
        await this.client().send(new AttachRolePolicyCommand({ RoleName: config.roleName, PolicyArn: policyArn }));
      }

      return { roleName: config.roleName, roleArn, status };
    } catch (error) {
      if (error instanceof OrchestrationError) {
        throw error;
      }
      throw new Error(`Failed to ensure IAM role ${config.roleName}: ${error instanceof Error ? error.message : String(error)}`, {
        cause: error
      });
    }
  }

  async getRoleArn(roleName: string): Promise<string | null> {
    try {
      const result = await this.client().send(new GetRoleCommand({ RoleName: roleName }));
      return result.Role?.Arn ?? null;
    } catch (error) {
      if (hasErrorName(error, 'NoSuchEntityException', 'NoSuchEntity')) {
        return null;
      }
      return rethrowAuthErrors(error);
    }
  }

  async hasAttachedPolicy(roleName: string, policyArn: string): Promise<boolean> {
    try {
      return (await this.attachedPolicyArns(roleName)).includes(policyArn);
    } catch (error) {
      if (hasErrorName(error, 'NoSuchEntityException', 'NoSuchEntity')) {
        return false;
      }
      return rethrowAuthErrors(error);
    }
  }

  /**
   * Detaches managed policies, deletes inline policies, then the role.
   * Resolves false when the role did not exist.
   */
  async deleteRole(roleName: string): Promise<boolean> {
    if (!(await this.getRoleArn(roleName))) {
      return false;
    }

    for (const policyArn of await this.attachedPolicyArns(roleName)) {
      await this.client().send(new DetachRolePolicyCommand({ RoleName: roleName, PolicyArn: policyArn }));
    }
    for (const policyName of await this.inlinePolicyNames(roleName)) {
      await this.client().send(new DeleteRolePolicyCommand({ RoleName: roleName, PolicyName: policyName }));
    }
    await this.client().send(new DeleteRoleCommand({ RoleName: roleName }));
    return true;
  }

  async oidcProviderExists(issuerUrl: string): Promise<boolean> {
    const suffix = `oidc-provider/${issuerHost(issuerUrl)}`;
    const result = await this.client().send(new ListOpenIDConnectProvidersCommand({}));
    return (result.OpenIDConnectProviderList ?? []).some(provider => provider.Arn?.endsWith(suffix) ?? false);
  }

  private async attachedPolicyArns(roleName: string): Promise<string[]> {
    const arns: string[] = [];
    let marker: string | undefined;
    do {
      const page = await this.client().send(new ListAttachedRolePoliciesCommand({ RoleName: roleName, Marker: marker }));
      for (const policy of page.AttachedPolicies ?? []) {
        if (policy.PolicyArn) {
          arns.push(policy.PolicyArn);
        }
      }
      marker = page.IsTruncated ? page.Marker : undefined;
    } while (marker);
    return arns;
  }

  private async inlinePolicyNames(roleName: string): Promise<string[]> {
    const names: string[] = [];
    let marker: string | undefined;
    do {
      const page = await this.client().send(new ListRolePoliciesCommand({ RoleName: roleName, Marker: marker }));
      names.push(...(page.PolicyNames ?? []));
      marker = page.IsTruncated ? page.Marker : undefined;
    } while (marker);
    return names;
  }
}

export function issuerHost(issuerUrl: string): string {
  return issuerUrl.replace(/^https:\/\//, '').replace(/\/$/, '');
}

/**
 * Trust policy letting one Kubernetes service account assume the role
 * through the cluster's OIDC provider (IRSA).
 */
export function createServiceAccountTrustPolicy(
  accountId: string,
  issuerUrl: string,
  namespace: string,
  serviceAccount: string
): PolicyDocument {
  const host = issuerHost(issuerUrl);
  return {
    Version: '2012-10-17',
    Statement: [
      {
        Effect: 'Allow',
        Principal: { Federated: `arn:aws:iam::${accountId}:oidc-provider/${host}` },
        Action: 'sts:AssumeRoleWithWebIdentity',
        Condition: {
          StringEquals: {
            [`${host}:aud`]: 'sts.amazonaws.com',
            [`${host}:sub`]: `system:serviceaccount:${namespace}:${serviceAccount}`
          }
        }
      }
    ]
  };
}
