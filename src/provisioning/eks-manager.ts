import {
  EKSClient,
  CreateAddonCommand,
  DeleteAddonCommand,
  DeleteClusterCommand,
  DeleteNodegroupCommand,
  DescribeAddonCommand,
  DescribeClusterCommand,
  ListNodegroupsCommand
} from '@aws-sdk/client-eks';
import { hasErrorName, rethrowAuthErrors } from './aws-errors';
import type { AddonDescription, ClusterDescription, EksApi } from './types';

export class EKSManager implements EksApi {
  constructor(private readonly client: () => Pick<EKSClient, 'send'>) {}

  async describeCluster(name: string): Promise<ClusterDescription | null> {
    try {
      const { cluster } = await this.client().send(new DescribeClusterCommand({ name }));
      if (!cluster) {
        return null;
      }
      return {
        name: cluster.name ?? name,
        status: cluster.status ?? 'UNKNOWN',
        endpoint: cluster.endpoint,
        oidcIssuer: cluster.identity?.oidc?.issuer,
        version: cluster.version
      };
    } catch (error) {
      return notFoundAsNull(error);
    }
  }

  async getAddon(clusterName: string, addonName: string): Promise<AddonDescription | null> {
    try {
      const { addon } = await this.client().send(new DescribeAddonCommand({ clusterName, addonName }));
      if (!addon) {
        return null;
      }
      return {
        name: addon.addonName ?? addonName,
        status: addon.status ?? 'UNKNOWN',
        version: addon.addonVersion,
        serviceAccountRoleArn: addon.serviceAccountRoleArn
      };
    } catch (error) {
      return notFoundAsNull(error);
    }
  }

  async createAddon(clusterName: string, addonName: string, serviceAccountRoleArn?: string): Promise<void> {
    await this.client().send(
      new CreateAddonCommand({
        clusterName,
        addonName,
        serviceAccountRoleArn,
        resolveConflicts: 'OVERWRITE'
      })
    );
  }

  async deleteAddon(clusterName: string, addonName: string): Promise<void> {
    try {
      await this.client().send(new DeleteAddonCommand({ clusterName, addonName }));
    } catch (error) {
      notFoundAsNull(error);
    }
  }

  async listNodegroups(clusterName: string): Promise<string[]> {
    const names: string[] = [];
    let nextToken: string | undefined;
    do {
      const page = await this.client().send(new ListNodegroupsCommand({ clusterName, nextToken }));
      names.push(...(page.nodegroups ?? []));
      nextToken = page.nextToken;
    } while (nextToken);
    return names;
  }

  async deleteNodegroup(clusterName: string, nodegroupName: string): Promise<void> {
    try {
      await this.client().send(new DeleteNodegroupCommand({ clusterName, nodegroupName }));
    } catch (error) {
      notFoundAsNull(error);
    }
  }

  async deleteCluster(name: string): Promise<void> {
    try {
      await this.client().send(new DeleteClusterCommand({ name }));
    } catch (error) {
      notFoundAsNull(error);
    }
  }
}

function notFoundAsNull(error: unknown): null {
  if (hasErrorName(error, 'ResourceNotFoundException')) {
    return null;
  }
  return rethrowAuthErrors(error);
}
