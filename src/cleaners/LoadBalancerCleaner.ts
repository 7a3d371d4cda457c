import { EnumerationError, errorMessage, rethrowIfCancelled, throwIfCancelled } from '../errors';
import { CleanupContext, IClientFactory, ICleaner, ILoadBalancerClient } from '../interfaces';
import { CleanerStats, CleanupScope, LoadBalancerResource, ResourceKind, Tags, TargetGroupResource } from '../types';
import { collectPages, deletionTags, waitUntil } from '../utils';
import { createStats, processWorklist, triage } from './CleanupPolicy';

interface TaggedLoadBalancer extends LoadBalancerResource {
  tags: Tags;
}

/**
 * Removes Application and Network load balancers and their target groups
 */
export class LoadBalancerCleaner implements ICleaner {
  readonly kind: ResourceKind = 'load-balancer';
  private clientFactory: IClientFactory;

  constructor(clientFactory: IClientFactory) {
    this.clientFactory = clientFactory;
  }

  async clean(scope: CleanupScope, context: CleanupContext): Promise<CleanerStats> {
    const { logger, signal } = context;
    const client = this.clientFactory.loadBalancers(scope.session);
    const stats = createStats();

    let loadBalancers: LoadBalancerResource[];
    try {
      loadBalancers = await collectPages(client.listLoadBalancers(signal), signal);
    } catch (error) {
      rethrowIfCancelled(error, signal);
      throw new EnumerationError(this.kind, error);
    }
    stats.scanned = loadBalancers.length;

    // Tags are not part of the listing; a load balancer whose tags cannot be read is left alone
    const tagged: TaggedLoadBalancer[] = [];
    for (const lb of loadBalancers) {
      throwIfCancelled(signal);
      try {
        tagged.push({ ...lb, tags: await client.describeTags(lb.arn, signal) });
      } catch (error) {
        rethrowIfCancelled(error, signal);
        logger.error(`failed getting tags for load balancer ${lb.name}: ${errorMessage(error)}`);
        stats.contextFailures++;
      }
    }

    const worklist = await triage(tagged, {
      label: 'load balancer',
      idOf: lb => lb.name,
      tagsOf: lb => lb.tags,
      mark: async lb => {
        logger.log(`Marking load balancer ${lb.arn} for future deletion`);
        await client.addTags(lb.arn, deletionTags(), signal);
      }
    }, scope, context, stats);

    await processWorklist(worklist, {
      label: 'load balancer',
      plural: 'load balancers',
      idOf: lb => lb.arn,
      remove: lb => this.deleteLoadBalancer(client, lb.arn, context)
    }, context, stats);

    return stats;
  }

  /**
   * Delete the load balancer, wait for it to disappear, then drop its target groups.
   * Only the load balancer deletion itself decides the outcome.
   */
  private async deleteLoadBalancer(client: ILoadBalancerClient, arn: string, context: CleanupContext): Promise<void> {
    const { logger, signal, loadBalancerWait } = context;
    logger.log(`Deleting load balancer ${arn} and its target groups`);

    let targetGroups: TargetGroupResource[] = [];
    try {
      targetGroups = await client.listTargetGroups(arn, signal);
    } catch (error) {
      rethrowIfCancelled(error, signal);
      logger.warning(`failed to list target groups for load balancer ${arn}: ${errorMessage(error)}`);
    }

    await client.deleteLoadBalancer(arn, signal);

    try {
      await waitUntil(
        loadBalancerWait.timeoutMs,
        loadBalancerWait.intervalMs,
        async checkSignal => !(await client.loadBalancerExists(arn, checkSignal)),
        signal
      );
    } catch (error) {
      rethrowIfCancelled(error, signal);
      logger.warning(`failed waiting for load balancer ${arn} deletion: ${errorMessage(error)}`);
    }

    for (const group of targetGroups) {
      throwIfCancelled(signal);
      logger.log(`Deleting target group ${group.arn}`);
      try {
        await client.deleteTargetGroup(group.arn, signal);
      } catch (error) {
        rethrowIfCancelled(error, signal);
        logger.warning(`failed to delete target group ${group.arn}: ${errorMessage(error)}`);
      }
    }
  }
}
