import { EnumerationError, errorMessage, rethrowIfCancelled, throwIfCancelled } from '../errors';
import { CleanupContext, IClientFactory, ICleaner, IEc2Client } from '../interfaces';
import { CleanerStats, CleanupScope, ResourceKind, VpcResource } from '../types';
import { collectPages, deletionTags } from '../utils';
import { createStats, processWorklist, triage } from './CleanupPolicy';

// VPCs created by a CloudFormation stack are removed by deleting the stack
const CLOUDFORMATION_TAGS = ['aws:cloudformation:stack-name', 'aws:cloudformation:stack-id'];

interface TeardownPhase {
  name: string;
  run(): Promise<void>;
}

/**
 * Removes VPCs together with the objects that keep them alive
 */
export class VpcCleaner implements ICleaner {
  readonly kind: ResourceKind = 'vpc';
  private clientFactory: IClientFactory;

  constructor(clientFactory: IClientFactory) {
    this.clientFactory = clientFactory;
  }

  async clean(scope: CleanupScope, context: CleanupContext): Promise<CleanerStats> {
    const { logger, signal } = context;
    const client = this.clientFactory.ec2(scope.session);
    const stats = createStats();

    let vpcs: VpcResource[];
    try {
      vpcs = await collectPages(client.listVpcs(signal), signal);
    } catch (error) {
      rethrowIfCancelled(error, signal);
      throw new EnumerationError(this.kind, error);
    }
    stats.scanned = vpcs.length;

    const worklist = await triage(vpcs, {
      label: 'vpc',
      idOf: vpc => vpc.id,
      tagsOf: vpc => vpc.tags,
      exclusionOf: vpc => VpcCleaner.exclusionOf(vpc),
      mark: async vpc => {
        logger.log(`Marking VPC ${vpc.id} for future deletion`);
        await client.createTags(vpc.id, deletionTags(), signal);
      }
    }, scope, context, stats);

    await processWorklist(worklist, {
      label: 'vpc',
      plural: 'vpcs',
      idOf: vpc => vpc.id,
      remove: vpc => this.deleteVpc(client, vpc.id, context)
    }, context, stats);

    return stats;
  }

  static exclusionOf(vpc: VpcResource): string | undefined {
    if (vpc.isDefault) {
      return 'is a default vpc';
    }
    if (CLOUDFORMATION_TAGS.some(key => key in vpc.tags)) {
      return 'is managed by CloudFormation and should be cleaned by stack deletion';
    }
    return undefined;
  }

  /**
   * Tear down the dependencies, then delete the VPC itself.
   * Teardown failures are logged only; a VPC that still has dependents is
   * rejected by the provider and that rejection is the error reported.
   */
  private async deleteVpc(client: IEc2Client, vpcId: string, context: CleanupContext): Promise<void> {
    const { logger, signal } = context;
    logger.log(`Deleting VPC ${vpcId} and its dependencies`);

    await this.cleanDependencies(client, vpcId, context);

    throwIfCancelled(signal);
    await client.deleteVpc(vpcId, signal);

    logger.log(`Successfully deleted VPC ${vpcId}`);
  }

  private async cleanDependencies(client: IEc2Client, vpcId: string, context: CleanupContext): Promise<void> {
    const { logger, signal } = context;
    logger.debug(`Cleaning VPC dependencies for ${vpcId}`);

    // Order matters: the provider refuses each step while the previous objects exist
    const phases: TeardownPhase[] = [
      { name: 'NAT gateways', run: () => this.deleteNatGateways(client, vpcId, context) },
      { name: 'internet gateways', run: () => this.deleteInternetGateways(client, vpcId, context) },
      { name: 'route tables', run: () => this.deleteRouteTables(client, vpcId, context) },
      { name: 'subnets', run: () => this.deleteSubnets(client, vpcId, context) }
    ];

    for (const phase of phases) {
      throwIfCancelled(signal);
      try {
        await phase.run();
      } catch (error) {
        rethrowIfCancelled(error, signal);
        logger.error(`failed to delete ${phase.name} for VPC ${vpcId}: ${errorMessage(error)}`);
      }
    }
  }

  /**
   * NAT gateway deletion is asynchronous on the provider side and is not awaited
   */
  private async deleteNatGateways(client: IEc2Client, vpcId: string, context: CleanupContext): Promise<void> {
    const { logger, signal } = context;
    const gateways = await client.listNatGateways(vpcId, 'available', signal);

    for (const gateway of gateways) {
      throwIfCancelled(signal);
      logger.debug(`Deleting NAT Gateway ${gateway.id}`);
      try {
        await client.deleteNatGateway(gateway.id, signal);
      } catch (error) {
        rethrowIfCancelled(error, signal);
        logger.error(`failed to delete NAT gateway ${gateway.id}: ${errorMessage(error)}`);
      }
    }
  }

  private async deleteInternetGateways(client: IEc2Client, vpcId: string, context: CleanupContext): Promise<void> {
    const { logger, signal } = context;
    const gateways = await client.listInternetGateways(vpcId, signal);

    for (const gateway of gateways) {
      throwIfCancelled(signal);
      logger.debug(`Detaching and deleting Internet Gateway ${gateway.id}`);

      try {
        await client.detachInternetGateway(gateway.id, vpcId, signal);
      } catch (error) {
        rethrowIfCancelled(error, signal);
        logger.error(`failed to detach internet gateway ${gateway.id}: ${errorMessage(error)}`);
        continue;
      }

      try {
        await client.deleteInternetGateway(gateway.id, signal);
      } catch (error) {
        rethrowIfCancelled(error, signal);
        logger.error(`failed to delete internet gateway ${gateway.id}: ${errorMessage(error)}`);
      }
    }
  }

  private async deleteRouteTables(client: IEc2Client, vpcId: string, context: CleanupContext): Promise<void> {
    const { logger, signal } = context;
    const tables = await client.listRouteTables(vpcId, signal);

    for (const table of tables) {
      throwIfCancelled(signal);
      if (table.isMain) {
        // Goes away with the VPC, cannot be deleted on its own
        logger.debug(`Skipping main route table ${table.id}`);
        continue;
      }

      logger.debug(`Deleting route table ${table.id}`);
      try {
        await client.deleteRouteTable(table.id, signal);
      } catch (error) {
        rethrowIfCancelled(error, signal);
        logger.error(`failed to delete route table ${table.id}: ${errorMessage(error)}`);
      }
    }
  }

  private async deleteSubnets(client: IEc2Client, vpcId: string, context: CleanupContext): Promise<void> {
    const { logger, signal } = context;
    const subnets = await client.listSubnets(vpcId, signal);

    for (const subnet of subnets) {
      throwIfCancelled(signal);
      logger.debug(`Deleting subnet ${subnet.id}`);
      try {
        await client.deleteSubnet(subnet.id, signal);
      } catch (error) {
        rethrowIfCancelled(error, signal);
        logger.error(`failed to delete subnet ${subnet.id}: ${errorMessage(error)}`);
      }
    }
  }
}
