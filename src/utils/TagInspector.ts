import { DELETION_TAG, TagClassification, TagDecision, Tags } from '../types';

interface ProviderTag {
  Key?: string;
  Value?: string;
}

/**
 * Classify a tag set. The ignore tag wins over the deletion tag.
 */
export function classifyTags(tags: Tags, ignoreTag: string): TagClassification {
  let markedForDeletion = false;

  for (const key of Object.keys(tags)) {
    if (key === ignoreTag) {
      return 'ignored';
    }
    if (key === DELETION_TAG) {
      markedForDeletion = true;
    }
  }

  return markedForDeletion ? 'marked' : 'unmarked';
}

/**
 * Mark/delete decision table.
 * Dry-run never mutates: unmarked resources are skipped and marked ones
 * only reported.
 */
export function decide(classification: TagClassification, commit: boolean): TagDecision {
  switch (classification) {
  case 'ignored':
    return 'skip';
  case 'unmarked':
    return commit ? 'mark' : 'skip';
  case 'marked':
    return commit ? 'delete' : 'dry-run';
  }
}

export function deletionTags(): Tags {
  return { [DELETION_TAG]: 'true' };
}

/**
 * Convert the SDK's Key/Value list into a tag map; entries without a key are dropped
 */
export function tagsFromList(list: ProviderTag[] | undefined): Tags {
  const tags: Tags = {};
  for (const tag of list ?? []) {
    if (tag.Key !== undefined) {
      tags[tag.Key] = tag.Value ?? '';
    }
  }
  return tags;
}

export function tagsToList(tags: Tags): { Key: string; Value: string }[] {
  return Object.entries(tags).map(([Key, Value]) => ({ Key, Value }));
}
