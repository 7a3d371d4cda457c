import { errorMessage, rethrowIfCancelled, throwIfCancelled } from '../errors';
import { CleanupContext } from '../interfaces';
import { CleanerStats, CleanupScope, Tags } from '../types';
import { classifyTags, decide } from '../utils';

/**
 * How a cleaner names, inspects and marks one resource of its kind
 */
export interface TriageHooks<T> {
  label: string;
  idOf(resource: T): string;
  tagsOf(resource: T): Tags;
  /**
   * Reason the resource can never be deleted, checked before the tags
   */
  exclusionOf?(resource: T): string | undefined;
  mark(resource: T): Promise<void>;
}

export interface WorklistHooks<T> {
  label: string;
  plural: string;
  idOf(resource: T): string;
  remove(resource: T): Promise<void>;
}

export function createStats(): CleanerStats {
  return {
    scanned: 0,
    excluded: 0,
    ignored: 0,
    marked: 0,
    markFailures: 0,
    contextFailures: 0,
    pendingDeletion: 0,
    deleted: 0,
    deleteFailures: 0
  };
}

/**
 * Apply exclusions and the tag decision table to every resource.
 * Unmarked resources are tagged (commit only); the ones already marked are
 * returned as the deletion worklist.
 */
export async function triage<T>(
  resources: T[],
  hooks: TriageHooks<T>,
  scope: CleanupScope,
  context: CleanupContext,
  stats: CleanerStats
): Promise<T[]> {
  const { logger, signal } = context;
  const worklist: T[] = [];

  for (const resource of resources) {
    throwIfCancelled(signal);
    const id = hooks.idOf(resource);

    const exclusion = hooks.exclusionOf?.(resource);
    if (exclusion) {
      logger.debug(`${hooks.label} ${id} ${exclusion}, skipping cleanup`);
      stats.excluded++;
      continue;
    }

    const classification = classifyTags(hooks.tagsOf(resource), scope.ignoreTag);

    switch (decide(classification, context.commit)) {
    case 'skip':
      if (classification === 'ignored') {
        logger.debug(`${hooks.label} ${id} has ignore tag, skipping cleanup`);
        stats.ignored++;
      } else {
        logger.debug(`${hooks.label} ${id} does not have deletion tag, not marking as running in dry-run mode`);
      }
      break;
    case 'mark':
      logger.debug(`${hooks.label} ${id} does not have deletion tag, marking for future deletion and skipping cleanup`);
      try {
        await hooks.mark(resource);
        stats.marked++;
      } catch (error) {
        rethrowIfCancelled(error, signal);
        logger.error(`failed to mark ${hooks.label} ${id} for future deletion: ${errorMessage(error)}`);
        stats.markFailures++;
      }
      break;
    case 'delete':
    case 'dry-run':
      logger.debug(`adding ${hooks.label} ${id} to delete list`);
      worklist.push(resource);
      break;
    }
  }

  stats.pendingDeletion = worklist.length;
  return worklist;
}

/**
 * Delete every worklisted resource. One failure never stops the rest.
 */
export async function processWorklist<T>(
  worklist: T[],
  hooks: WorklistHooks<T>,
  context: CleanupContext,
  stats: CleanerStats
): Promise<void> {
  const { logger, signal } = context;

  if (worklist.length === 0) {
    logger.log(`no ${hooks.plural} to delete`);
    return;
  }

  for (const resource of worklist) {
    throwIfCancelled(signal);
    const id = hooks.idOf(resource);

    if (!context.commit) {
      logger.debug(`skipping deletion of ${hooks.label} ${id} as running in dry-run mode`);
      continue;
    }

    try {
      await hooks.remove(resource);
      stats.deleted++;
    } catch (error) {
      rethrowIfCancelled(error, signal);
      logger.error(`failed to delete ${hooks.label} ${id}: ${errorMessage(error)}`);
      stats.deleteFailures++;
    }
  }
}
