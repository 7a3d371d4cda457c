import { EC2Client } from '@aws-sdk/client-ec2';
import { ElasticLoadBalancingV2Client } from '@aws-sdk/client-elastic-load-balancing-v2';
import { fromIni } from '@aws-sdk/credential-providers';
import { IClientFactory, IEc2Client, ILoadBalancerClient } from '../interfaces';
import { AwsSession } from '../types';
import { Ec2Client } from './Ec2Client';
import { LoadBalancerClient } from './LoadBalancerClient';

/**
 * Builds SDK-backed clients for a session, one of each kind per session.
 * A named profile is read from the shared config files; otherwise the SDK's
 * default credential chain applies.
 */
export class AwsClientFactory implements IClientFactory {
  private ec2Clients: Map<string, Ec2Client> = new Map();
  private lbClients: Map<string, LoadBalancerClient> = new Map();
  private sdkClients: Array<EC2Client | ElasticLoadBalancingV2Client> = [];

  ec2(session: AwsSession): IEc2Client {
    const key = AwsClientFactory.sessionKey(session);
    let client = this.ec2Clients.get(key);
    if (!client) {
      const sdkClient = new EC2Client(AwsClientFactory.clientConfig(session));
      this.sdkClients.push(sdkClient);
      client = new Ec2Client(sdkClient);
      this.ec2Clients.set(key, client);
    }
    return client;
  }

  loadBalancers(session: AwsSession): ILoadBalancerClient {
    const key = AwsClientFactory.sessionKey(session);
    let client = this.lbClients.get(key);
    if (!client) {
      const sdkClient = new ElasticLoadBalancingV2Client(AwsClientFactory.clientConfig(session));
      this.sdkClients.push(sdkClient);
      client = new LoadBalancerClient(sdkClient);
      this.lbClients.set(key, client);
    }
    return client;
  }

  /**
   * Release every SDK client built so far (sockets held by keep-alive agents)
   */
  destroy(): void {
    for (const sdkClient of this.sdkClients) {
      sdkClient.destroy();
    }
    this.sdkClients = [];
    this.ec2Clients.clear();
    this.lbClients.clear();
  }

  static clientConfig(session: AwsSession): {
    region: string;
    endpoint?: string;
    credentials?: ReturnType<typeof fromIni>;
  } {
    return {
      region: session.region,
      ...(session.endpoint ? { endpoint: session.endpoint } : {}),
      ...(session.profile ? { credentials: fromIni({ profile: session.profile }) } : {})
    };
  }

  private static sessionKey(session: AwsSession): string {
    return [session.region, session.profile ?? '', session.endpoint ?? ''].join('|');
  }
}
