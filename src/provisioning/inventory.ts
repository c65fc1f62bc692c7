import { CloudFormationClient, ListStacksCommand } from '@aws-sdk/client-cloudformation';
import type { StackStatus } from '@aws-sdk/client-cloudformation';
import { DynamoDBClient, DescribeTableCommand } from '@aws-sdk/client-dynamodb';
import { EC2Client, DescribeInstancesCommand } from '@aws-sdk/client-ec2';
import { hasErrorName, rethrowAuthErrors } from './aws-errors';
import type { InstanceSummary, InventoryApi } from './types';

// Anything not yet fully deleted counts as residual.
const LIVE_STACK_STATUSES: StackStatus[] = [
  'CREATE_IN_PROGRESS',
  'CREATE_FAILED',
  'CREATE_COMPLETE',
  'ROLLBACK_IN_PROGRESS',
  'ROLLBACK_FAILED',
  'ROLLBACK_COMPLETE',
  'DELETE_IN_PROGRESS',
  'DELETE_FAILED',
  'UPDATE_IN_PROGRESS',
  'UPDATE_COMPLETE',
  'UPDATE_ROLLBACK_FAILED',
  'UPDATE_ROLLBACK_COMPLETE'
];

export interface InventoryClients {
  ec2: () => Pick<EC2Client, 'send'>;
  dynamodb: () => Pick<DynamoDBClient, 'send'>;
  cloudformation: () => Pick<CloudFormationClient, 'send'>;
}

/** Read-only lookups used by residual-resource probes. */
export class ResourceInventory implements InventoryApi {
  constructor(private readonly clients: InventoryClients) {}

  async findInstancesByName(nameTag: string): Promise<InstanceSummary[]> {
    const instances: InstanceSummary[] = [];
    let nextToken: string | undefined;
    do {
      const page = await this.clients.ec2().send(
        new DescribeInstancesCommand({
          Filters: [
            { Name: 'tag:Name', Values: [nameTag] },
            { Name: 'instance-state-name', Values: ['pending', 'running', 'stopping', 'stopped'] }
          ],
          NextToken: nextToken
        })
      );
      for (const reservation of page.Reservations ?? []) {
        for (const instance of reservation.Instances ?? []) {
          if (instance.InstanceId) {
            instances.push({ instanceId: instance.InstanceId, state: instance.State?.Name ?? 'unknown' });
          }
        }
      }
      nextToken = page.NextToken;
    } while (nextToken);
    return instances;
  }

  async tableExists(tableName: string): Promise<boolean> {
    try {
      await this.clients.dynamodb().send(new DescribeTableCommand({ TableName: tableName }));
      return true;
    } catch (error) {
      if (hasErrorName(error, 'ResourceNotFoundException')) {
        return false;
      }
      return rethrowAuthErrors(error);
    }
  }

  async findStacks(namePrefix: string): Promise<string[]> {
    const names: string[] = [];
    let nextToken: string | undefined;
    do {
      const page = await this.clients
        .cloudformation()
        .send(new ListStacksCommand({ StackStatusFilter: LIVE_STACK_STATUSES, NextToken: nextToken }));
      for (const stack of page.StackSummaries ?? []) {
        if (stack.StackName?.startsWith(namePrefix)) {
          names.push(stack.StackName);
        }
      }
      nextToken = page.NextToken;
    } while (nextToken);
    return names;
  }
}
