import { throwIfCancelled } from '../errors';

/**
 * Wrap a page generator so every iteration starts a fresh listing
 */
export function restartable<T>(pages: () => AsyncGenerator<T[]>): AsyncIterable<T[]> {
  return {
    [Symbol.asyncIterator]: () => pages()
  };
}

/**
 * Drain every page before returning; a failure on any page rejects the whole listing
 */
export async function collectPages<T>(pages: AsyncIterable<T[]>, signal?: AbortSignal): Promise<T[]> {
  const items: T[] = [];
  for await (const page of pages) {
    throwIfCancelled(signal);
    items.push(...page);
  }
  return items;
}
