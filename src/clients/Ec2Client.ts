import {
  EC2Client,
  CreateTagsCommand,
  DeleteInternetGatewayCommand,
  DeleteNatGatewayCommand,
  DeleteNetworkInterfaceCommand,
  DeleteRouteTableCommand,
  DeleteSubnetCommand,
  DeleteVpcCommand,
  DetachInternetGatewayCommand,
  Filter,
  paginateDescribeInternetGateways,
  paginateDescribeNatGateways,
  paginateDescribeNetworkInterfaces,
  paginateDescribeRouteTables,
  paginateDescribeSubnets,
  paginateDescribeVpcs
} from '@aws-sdk/client-ec2';
import { throwIfCancelled } from '../errors';
import { IEc2Client, NetworkInterfaceFilter } from '../interfaces';
import {
  InternetGatewayResource,
  NatGatewayResource,
  NetworkInterfaceResource,
  RouteTableResource,
  SubnetResource,
  Tags,
  VpcResource
} from '../types';
import { collectPages, restartable, tagsFromList, tagsToList } from '../utils';

/**
 * EC2 client implementation backed by the AWS SDK
 */
export class Ec2Client implements IEc2Client {
  private client: EC2Client;

  constructor(client: EC2Client) {
    this.client = client;
  }

  listNetworkInterfaces(filter: NetworkInterfaceFilter, signal?: AbortSignal): AsyncIterable<NetworkInterfaceResource[]> {
    const client = this.client;
    const filters: Filter[] = filter.status ? [{ Name: 'status', Values: [filter.status] }] : [];

    return restartable(async function* () {
      for await (const page of paginateDescribeNetworkInterfaces({ client }, { Filters: filters }, { abortSignal: signal })) {
        const interfaces: NetworkInterfaceResource[] = [];
        for (const ni of page.NetworkInterfaces ?? []) {
          if (!ni.NetworkInterfaceId) continue;
          interfaces.push({
            id: ni.NetworkInterfaceId,
            subnetId: ni.SubnetId,
            description: ni.Description,
            status: ni.Status,
            tags: tagsFromList(ni.TagSet)
          });
        }
        throwIfCancelled(signal);
        yield interfaces;
      }
    });
  }

  listVpcs(signal?: AbortSignal): AsyncIterable<VpcResource[]> {
    const client = this.client;

    return restartable(async function* () {
      for await (const page of paginateDescribeVpcs({ client }, {}, { abortSignal: signal })) {
        const vpcs: VpcResource[] = [];
        for (const vpc of page.Vpcs ?? []) {
          if (!vpc.VpcId) continue;
          vpcs.push({
            id: vpc.VpcId,
            isDefault: vpc.IsDefault ?? false,
            tags: tagsFromList(vpc.Tags)
          });
        }
        throwIfCancelled(signal);
        yield vpcs;
      }
    });
  }

  async listNatGateways(vpcId: string, state: string, signal?: AbortSignal): Promise<NatGatewayResource[]> {
    const client = this.client;
    const pages = restartable(async function* () {
      const paginator = paginateDescribeNatGateways({ client }, {
        Filter: [
          { Name: 'vpc-id', Values: [vpcId] },
          { Name: 'state', Values: [state] }
        ]
      }, { abortSignal: signal });
      for await (const page of paginator) {
        const gateways: NatGatewayResource[] = [];
        for (const gateway of page.NatGateways ?? []) {
          if (gateway.NatGatewayId) {
            gateways.push({ id: gateway.NatGatewayId, state: gateway.State });
          }
        }
        yield gateways;
      }
    });
    return collectPages(pages, signal);
  }

  async listInternetGateways(vpcId: string, signal?: AbortSignal): Promise<InternetGatewayResource[]> {
    const client = this.client;
    const pages = restartable(async function* () {
      const paginator = paginateDescribeInternetGateways({ client }, {
        Filters: [{ Name: 'attachment.vpc-id', Values: [vpcId] }]
      }, { abortSignal: signal });
      for await (const page of paginator) {
        const gateways: InternetGatewayResource[] = [];
        for (const gateway of page.InternetGateways ?? []) {
          if (gateway.InternetGatewayId) {
            gateways.push({ id: gateway.InternetGatewayId });
          }
        }
        yield gateways;
      }
    });
    return collectPages(pages, signal);
  }

  async listRouteTables(vpcId: string, signal?: AbortSignal): Promise<RouteTableResource[]> {
    const client = this.client;
    const pages = restartable(async function* () {
      const paginator = paginateDescribeRouteTables({ client }, {
        Filters: [{ Name: 'vpc-id', Values: [vpcId] }]
      }, { abortSignal: signal });
      for await (const page of paginator) {
        const tables: RouteTableResource[] = [];
        for (const table of page.RouteTables ?? []) {
          if (table.RouteTableId) {
            tables.push({
              id: table.RouteTableId,
              isMain: (table.Associations ?? []).some(association => association.Main === true)
            });
          }
        }
        yield tables;
      }
    });
    return collectPages(pages, signal);
  }

  async listSubnets(vpcId: string, signal?: AbortSignal): Promise<SubnetResource[]> {
    const client = this.client;
    const pages = restartable(async function* () {
      const paginator = paginateDescribeSubnets({ client }, {
        Filters: [{ Name: 'vpc-id', Values: [vpcId] }]
      }, { abortSignal: signal });
      for await (const page of paginator) {
        const subnets: SubnetResource[] = [];
        for (const subnet of page.Subnets ?? []) {
          if (subnet.SubnetId) {
            subnets.push({ id: subnet.SubnetId });
          }
        }
        yield subnets;
      }
    });
    return collectPages(pages, signal);
  }

  async createTags(resourceId: string, tags: Tags, signal?: AbortSignal): Promise<void> {
    await this.client.send(
      new CreateTagsCommand({ Resources: [resourceId], Tags: tagsToList(tags) }),
      { abortSignal: signal }
    );
  }

  async deleteNetworkInterface(id: string, signal?: AbortSignal): Promise<void> {
    await this.client.send(new DeleteNetworkInterfaceCommand({ NetworkInterfaceId: id }), { abortSignal: signal });
  }

  async deleteNatGateway(id: string, signal?: AbortSignal): Promise<void> {
    await this.client.send(new DeleteNatGatewayCommand({ NatGatewayId: id }), { abortSignal: signal });
  }

  async detachInternetGateway(id: string, vpcId: string, signal?: AbortSignal): Promise<void> {
    await this.client.send(
      new DetachInternetGatewayCommand({ InternetGatewayId: id, VpcId: vpcId }),
      { abortSignal: signal }
    );
  }

  async deleteInternetGateway(id: string, signal?: AbortSignal): Promise<void> {
    await this.client.send(new DeleteInternetGatewayCommand({ InternetGatewayId: id }), { abortSignal: signal });
  }

  async deleteRouteTable(id: string, signal?: AbortSignal): Promise<void> {
    await this.client.send(new DeleteRouteTableCommand({ RouteTableId: id }), { abortSignal: signal });
  }

  async deleteSubnet(id: string, signal?: AbortSignal): Promise<void> {
    await this.client.send(new DeleteSubnetCommand({ SubnetId: id }), { abortSignal: signal });
  }

  async deleteVpc(id: string, signal?: AbortSignal): Promise<void> {
    await this.client.send(new DeleteVpcCommand({ VpcId: id }), { abortSignal: signal });
  }
}
