import { CleanupContext, IClientFactory, IEc2Client, ILoadBalancerClient, ILogger, NetworkInterfaceFilter } from '../../interfaces';
import {
  AwsSession,
  CleanupScope,
  InternetGatewayResource,
  LoadBalancerResource,
  NatGatewayResource,
  NetworkInterfaceResource,
  RouteTableResource,
  SubnetResource,
  Tags,
  TargetGroupResource,
  VpcResource
} from '../../types';
import { restartable } from '../../utils';

export type LogLevel = 'log' | 'debug' | 'warning' | 'error';

export interface LogEntry {
  level: LogLevel;
  message: string;
}

/**
 * Logger that keeps every line for assertions
 */
export class RecordingLogger implements ILogger {
  entries: LogEntry[] = [];

  log(message: string): void {
    this.entries.push({ level: 'log', message });
  }

  debug(message: string): void {
    this.entries.push({ level: 'debug', message });
  }

  warning(message: string): void {
    this.entries.push({ level: 'warning', message });
  }

  error(message: string): void {
    this.entries.push({ level: 'error', message });
  }

  messages(level: LogLevel): string[] {
    return this.entries.filter(entry => entry.level === level).map(entry => entry.message);
  }
}

/**
 * Shared bookkeeping: every call is recorded as "<method> <id>"; a call listed in
 * `failures` rejects with the given error instead of running.
 */
class CallRecorder {
  calls: string[] = [];
  failures: Map<string, Error> = new Map();
  onCall?: (call: string) => void;

  record(call: string): void {
    this.calls.push(call);
    this.onCall?.(call);
    const failure = this.failures.get(call);
    if (failure) {
      throw failure;
    }
  }

  mutations(): string[] {
    return this.calls.filter(call => !call.startsWith('list') && !call.startsWith('describe') && !call.startsWith('exists'));
  }
}

function pagesOf<T>(items: () => T[], pageSize: number, recorder: CallRecorder, call: string): AsyncIterable<T[]> {
  return restartable(async function* () {
    recorder.record(call);
    const all = items();
    for (let i = 0; i < all.length; i += pageSize) {
      yield all.slice(i, i + pageSize);
    }
  });
}

export class FakeEc2Client extends CallRecorder implements IEc2Client {
  networkInterfaces: NetworkInterfaceResource[] = [];
  vpcs: VpcResource[] = [];
  natGateways: Record<string, NatGatewayResource[]> = {};
  internetGateways: Record<string, InternetGatewayResource[]> = {};
  routeTables: Record<string, RouteTableResource[]> = {};
  subnets: Record<string, SubnetResource[]> = {};
  pageSize = 2;

  listNetworkInterfaces(filter: NetworkInterfaceFilter): AsyncIterable<NetworkInterfaceResource[]> {
    return pagesOf(
      () => this.networkInterfaces.filter(ni => filter.status === undefined || ni.status === filter.status),
      this.pageSize,
      this,
      'listNetworkInterfaces'
    );
  }

  listVpcs(): AsyncIterable<VpcResource[]> {
    return pagesOf(() => this.vpcs, this.pageSize, this, 'listVpcs');
  }

  async listNatGateways(vpcId: string, state: string): Promise<NatGatewayResource[]> {
    this.record(`listNatGateways ${vpcId}`);
    return (this.natGateways[vpcId] ?? []).filter(gateway => gateway.state === state);
  }

  async listInternetGateways(vpcId: string): Promise<InternetGatewayResource[]> {
    this.record(`listInternetGateways ${vpcId}`);
    return this.internetGateways[vpcId] ?? [];
  }

  async listRouteTables(vpcId: string): Promise<RouteTableResource[]> {
    this.record(`listRouteTables ${vpcId}`);
    return this.routeTables[vpcId] ?? [];
  }

  async listSubnets(vpcId: string): Promise<SubnetResource[]> {
    this.record(`listSubnets ${vpcId}`);
    return this.subnets[vpcId] ?? [];
  }

  async createTags(resourceId: string, tags: Tags): Promise<void> {
    this.record(`createTags ${resourceId}`);
    const target = this.networkInterfaces.find(ni => ni.id === resourceId) ?? this.vpcs.find(vpc => vpc.id === resourceId);
    if (target) {
      target.tags = { ...target.tags, ...tags };
    }
  }

  async deleteNetworkInterface(id: string): Promise<void> {
    this.record(`deleteNetworkInterface ${id}`);
    this.networkInterfaces = this.networkInterfaces.filter(ni => ni.id !== id);
  }

  async deleteNatGateway(id: string): Promise<void> {
    this.record(`deleteNatGateway ${id}`);
  }

  async detachInternetGateway(id: string, vpcId: string): Promise<void> {
    this.record(`detachInternetGateway ${id} ${vpcId}`);
  }

  async deleteInternetGateway(id: string): Promise<void> {
    this.record(`deleteInternetGateway ${id}`);
  }

  async deleteRouteTable(id: string): Promise<void> {
    this.record(`deleteRouteTable ${id}`);
  }

  async deleteSubnet(id: string): Promise<void> {
    this.record(`deleteSubnet ${id}`);
  }

  async deleteVpc(id: string): Promise<void> {
    this.record(`deleteVpc ${id}`);
    this.vpcs = this.vpcs.filter(vpc => vpc.id !== id);
  }
}

export interface FakeLoadBalancer extends LoadBalancerResource {
  tags: Tags;
  targetGroups: TargetGroupResource[];
}

export class FakeLoadBalancerClient extends CallRecorder implements ILoadBalancerClient {
  loadBalancers: FakeLoadBalancer[] = [];
  pageSize = 2;
  /**
   * Number of existence checks that still report a deleted load balancer as present
   */
  lingeringChecks = 0;
  private deleted: Set<string> = new Set();

  listLoadBalancers(): AsyncIterable<LoadBalancerResource[]> {
    return pagesOf(
      () => this.loadBalancers.map(lb => ({ arn: lb.arn, name: lb.name })),
      this.pageSize,
      this,
      'listLoadBalancers'
    );
  }

  async describeTags(arn: string): Promise<Tags> {
    this.record(`describeTags ${arn}`);
    return { ...this.find(arn).tags };
  }

  async addTags(arn: string, tags: Tags): Promise<void> {
    this.record(`addTags ${arn}`);
    const lb = this.find(arn);
    lb.tags = { ...lb.tags, ...tags };
  }

  async listTargetGroups(loadBalancerArn: string): Promise<TargetGroupResource[]> {
    this.record(`listTargetGroups ${loadBalancerArn}`);
    return [...this.find(loadBalancerArn).targetGroups];
  }

  async deleteLoadBalancer(arn: string): Promise<void> {
    this.record(`deleteLoadBalancer ${arn}`);
    this.loadBalancers = this.loadBalancers.filter(lb => lb.arn !== arn);
    this.deleted.add(arn);
  }

  async loadBalancerExists(arn: string): Promise<boolean> {
    this.record(`exists ${arn}`);
    if (this.deleted.has(arn) && this.lingeringChecks > 0) {
      this.lingeringChecks--;
      return true;
    }
    return this.loadBalancers.some(lb => lb.arn === arn);
  }

  async deleteTargetGroup(arn: string): Promise<void> {
    this.record(`deleteTargetGroup ${arn}`);
  }

  private find(arn: string): FakeLoadBalancer {
    const lb = this.loadBalancers.find(candidate => candidate.arn === arn);
    if (!lb) {
      throw new Error(`LoadBalancerNotFound: ${arn}`);
    }
    return lb;
  }
}

export class FakeClientFactory implements IClientFactory {
  sessions: AwsSession[] = [];

  constructor(
    readonly ec2Client: FakeEc2Client = new FakeEc2Client(),
    readonly lbClient: FakeLoadBalancerClient = new FakeLoadBalancerClient()
  ) {}

  ec2(session: AwsSession): IEc2Client {
    this.sessions.push(session);
    return this.ec2Client;
  }

  loadBalancers(session: AwsSession): ILoadBalancerClient {
    this.sessions.push(session);
    return this.lbClient;
  }
}

export function createScope(ignoreTag: string = 'keep'): CleanupScope {
  return {
    session: { region: 'us-east-1' },
    ignoreTag
  };
}

export function createContext(
  commit: boolean,
  logger: ILogger = new RecordingLogger(),
  signal?: AbortSignal
): CleanupContext {
  return {
    commit,
    logger,
    signal,
    loadBalancerWait: { timeoutMs: 200, intervalMs: 1 }
  };
}
