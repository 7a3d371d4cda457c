import {
  InternetGatewayResource,
  NatGatewayResource,
  NetworkInterfaceResource,
  RouteTableResource,
  SubnetResource,
  Tags,
  VpcResource
} from '../types';

export interface NetworkInterfaceFilter {
  status?: string;
}

/**
 * Interface for the EC2 calls the network cleaners need
 */
export interface IEc2Client {
  /**
   * List network interfaces, one batch per provider page
   */
  listNetworkInterfaces(filter: NetworkInterfaceFilter, signal?: AbortSignal): AsyncIterable<NetworkInterfaceResource[]>;

  /**
   * List VPCs, one batch per provider page
   */
  listVpcs(signal?: AbortSignal): AsyncIterable<VpcResource[]>;

  listNatGateways(vpcId: string, state: string, signal?: AbortSignal): Promise<NatGatewayResource[]>;

  listInternetGateways(vpcId: string, signal?: AbortSignal): Promise<InternetGatewayResource[]>;

  listRouteTables(vpcId: string, signal?: AbortSignal): Promise<RouteTableResource[]>;

  listSubnets(vpcId: string, signal?: AbortSignal): Promise<SubnetResource[]>;

  /**
   * Add tags to a resource by ID
   */
  createTags(resourceId: string, tags: Tags, signal?: AbortSignal): Promise<void>;

  deleteNetworkInterface(id: string, signal?: AbortSignal): Promise<void>;

  deleteNatGateway(id: string, signal?: AbortSignal): Promise<void>;

  detachInternetGateway(id: string, vpcId: string, signal?: AbortSignal): Promise<void>;

  deleteInternetGateway(id: string, signal?: AbortSignal): Promise<void>;

  deleteRouteTable(id: string, signal?: AbortSignal): Promise<void>;

  deleteSubnet(id: string, signal?: AbortSignal): Promise<void>;

  deleteVpc(id: string, signal?: AbortSignal): Promise<void>;
}
