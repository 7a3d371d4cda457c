import { AwsSession } from '../types';
import { IEc2Client } from './IEc2Client';
import { ILoadBalancerClient } from './ILoadBalancerClient';

/**
 * Builds authenticated provider clients for a session
 */
export interface IClientFactory {
  ec2(session: AwsSession): IEc2Client;
  loadBalancers(session: AwsSession): ILoadBalancerClient;
}
