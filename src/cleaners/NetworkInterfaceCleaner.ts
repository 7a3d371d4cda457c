import { EnumerationError, rethrowIfCancelled } from '../errors';
import { CleanupContext, IClientFactory, ICleaner } from '../interfaces';
import { CleanerStats, CleanupScope, NetworkInterfaceResource, ResourceKind } from '../types';
import { collectPages, deletionTags } from '../utils';
import { createStats, processWorklist, triage } from './CleanupPolicy';

/**
 * Removes network interfaces left unattached
 */
export class NetworkInterfaceCleaner implements ICleaner {
  readonly kind: ResourceKind = 'network-interface';
  private clientFactory: IClientFactory;

  constructor(clientFactory: IClientFactory) {
    this.clientFactory = clientFactory;
  }

  async clean(scope: CleanupScope, context: CleanupContext): Promise<CleanerStats> {
    const { logger, signal } = context;
    const client = this.clientFactory.ec2(scope.session);
    const stats = createStats();

    let interfaces: NetworkInterfaceResource[];
    try {
      // Only unattached interfaces; the tag policy below does not depend on it
      interfaces = await collectPages(client.listNetworkInterfaces({ status: 'available' }, signal), signal);
    } catch (error) {
      rethrowIfCancelled(error, signal);
      throw new EnumerationError(this.kind, error);
    }
    stats.scanned = interfaces.length;

    const worklist = await triage(interfaces, {
      label: 'network interface',
      idOf: ni => ni.id,
      tagsOf: ni => ni.tags,
      mark: async ni => {
        logger.log(`Marking network interface ${ni.id} for future deletion`);
        await client.createTags(ni.id, deletionTags(), signal);
      }
    }, scope, context, stats);

    await processWorklist(worklist, {
      label: 'network interface',
      plural: 'unattached network interfaces',
      idOf: ni => ni.id,
      remove: async ni => {
        logger.log(
          `Deleting unattached network interface ${ni.id} (subnet ${ni.subnetId ?? 'unknown'}, desc=${ni.description ?? ''})`
        );
        await client.deleteNetworkInterface(ni.id, signal);
      }
    }, context, stats);

    return stats;
  }
}
