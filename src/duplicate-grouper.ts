import type { Fingerprinted } from './types.js';

/**
 * Bucket entities by fingerprint, keeping only buckets with two or more members.
 *
 * Buckets and their members keep discovery order. Entities that never got a
 * fingerprint (their hashing failed) are skipped.
 */
export function groupDuplicates<T extends Fingerprinted>(entities: Iterable<T>): Map<string, T[]> {
  const buckets = new Map<string, T[]>();

  for (const entity of entities) {
    if (entity.fingerprint === undefined) continue;
    const bucket = buckets.get(entity.fingerprint);
    if (bucket) {
      bucket.push(entity);
    } else {
      buckets.set(entity.fingerprint, [entity]);
    }
  }

  for (const [fingerprint, members] of buckets) {
    if (members.length < 2) {
      buckets.delete(fingerprint);
    }
  }
  return buckets;
}
