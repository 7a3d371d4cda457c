import {
  ElasticLoadBalancingV2Client,
  AddTagsCommand,
  DeleteLoadBalancerCommand,
  DeleteTargetGroupCommand,
  DescribeLoadBalancersCommand,
  DescribeTagsCommand,
  paginateDescribeLoadBalancers,
  paginateDescribeTargetGroups
} from '@aws-sdk/client-elastic-load-balancing-v2';
import { throwIfCancelled } from '../errors';
import { ILoadBalancerClient } from '../interfaces';
import { LoadBalancerResource, Tags, TargetGroupResource } from '../types';
import { collectPages, restartable, tagsFromList, tagsToList } from '../utils';

/**
 * Elastic Load Balancing v2 client implementation backed by the AWS SDK
 */
export class LoadBalancerClient implements ILoadBalancerClient {
  private client: ElasticLoadBalancingV2Client;

  constructor(client: ElasticLoadBalancingV2Client) {
    this.client = client;
  }

  listLoadBalancers(signal?: AbortSignal): AsyncIterable<LoadBalancerResource[]> {
    const client = this.client;

    return restartable(async function* () {
      for await (const page of paginateDescribeLoadBalancers({ client }, {}, { abortSignal: signal })) {
        const loadBalancers: LoadBalancerResource[] = [];
        for (const lb of page.LoadBalancers ?? []) {
          if (!lb.LoadBalancerArn) continue;
          loadBalancers.push({
            arn: lb.LoadBalancerArn,
            name: lb.LoadBalancerName ?? lb.LoadBalancerArn
          });
        }
        throwIfCancelled(signal);
        yield loadBalancers;
      }
    });
  }

  async describeTags(arn: string, signal?: AbortSignal): Promise<Tags> {
    const output = await this.client.send(new DescribeTagsCommand({ ResourceArns: [arn] }), { abortSignal: signal });

    const tags: Tags = {};
    for (const description of output.TagDescriptions ?? []) {
      Object.assign(tags, tagsFromList(description.Tags));
    }
    return tags;
  }

  async addTags(arn: string, tags: Tags, signal?: AbortSignal): Promise<void> {
    await this.client.send(
      new AddTagsCommand({ ResourceArns: [arn], Tags: tagsToList(tags) }),
      { abortSignal: signal }
    );
  }

  async listTargetGroups(loadBalancerArn: string, signal?: AbortSignal): Promise<TargetGroupResource[]> {
    const client = this.client;
    const pages = restartable(async function* () {
      const paginator = paginateDescribeTargetGroups({ client }, { LoadBalancerArn: loadBalancerArn }, { abortSignal: signal });
      for await (const page of paginator) {
        const groups: TargetGroupResource[] = [];
        for (const group of page.TargetGroups ?? []) {
          if (group.TargetGroupArn) {
            groups.push({ arn: group.TargetGroupArn, name: group.TargetGroupName });
          }
        }
        yield groups;
      }
    });
    return collectPages(pages, signal);
  }

  async deleteLoadBalancer(arn: string, signal?: AbortSignal): Promise<void> {
    await this.client.send(new DeleteLoadBalancerCommand({ LoadBalancerArn: arn }), { abortSignal: signal });
  }

  async loadBalancerExists(arn: string, signal?: AbortSignal): Promise<boolean> {
    try {
      const output = await this.client.send(
        new DescribeLoadBalancersCommand({ LoadBalancerArns: [arn] }),
        { abortSignal: signal }
      );
      return (output.LoadBalancers ?? []).length > 0;
    } catch (error) {
      if (error instanceof Error && error.name === 'LoadBalancerNotFoundException') {
        return false;
      }
      throw error;
    }
  }

  async deleteTargetGroup(arn: string, signal?: AbortSignal): Promise<void> {
    await this.client.send(new DeleteTargetGroupCommand({ TargetGroupArn: arn }), { abortSignal: signal });
  }
}
