import { LoadBalancerResource, Tags, TargetGroupResource } from '../types';

/**
 * Interface for the Elastic Load Balancing v2 calls the load balancer cleaner needs
 */
export interface ILoadBalancerClient {
  /**
   * List load balancers, one batch per provider page
   */
  listLoadBalancers(signal?: AbortSignal): AsyncIterable<LoadBalancerResource[]>;

  /**
   * Read the tags of one load balancer
   */
  describeTags(arn: string, signal?: AbortSignal): Promise<Tags>;

  addTags(arn: string, tags: Tags, signal?: AbortSignal): Promise<void>;

  listTargetGroups(loadBalancerArn: string, signal?: AbortSignal): Promise<TargetGroupResource[]>;

  deleteLoadBalancer(arn: string, signal?: AbortSignal): Promise<void>;

  /**
   * Check whether a load balancer is still visible to the provider
   */
  loadBalancerExists(arn: string, signal?: AbortSignal): Promise<boolean>;

  deleteTargetGroup(arn: string, signal?: AbortSignal): Promise<void>;
}
