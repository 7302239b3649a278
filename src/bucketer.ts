import * as murmurhash from 'murmurhash';

import { logger } from './application-logger';
import { HASH_SEED, MAX_HASH_VALUE, MAX_TRAFFIC_VALUE } from './constants';
import { TrafficAllocation } from './entities';

export abstract class Sharder {
  /**
   * Maps a bucketing key to an integer in [0, MAX_TRAFFIC_VALUE).
   */
  abstract getBucketValue(bucketingKey: string): number;
}

/**
 * MurmurHash3 (x86, 32 bit) over the UTF-8 bytes of the key, scaled onto the traffic range.
 * Every SDK of the family computes exactly this value, so a user lands in the same bucket
 * whichever runtime evaluates the datafile.
 */
export class MurmurhashSharder extends Sharder {
  getBucketValue(bucketingKey: string): number {
    const hashCode = murmurhash.v3(bucketingKey, HASH_SEED);
    const ratio = hashCode / MAX_HASH_VALUE;
    return Math.floor(ratio * MAX_TRAFFIC_VALUE);
  }
}

/**
 * Sharder with fixed bucket values per key, for tests. Unknown keys land in bucket 0.
 */
export class DeterministicSharder extends Sharder {
  constructor(private readonly lookup: Record<string, number>) {
    super();
  }

  getBucketValue(bucketingKey: string): number {
    return this.lookup[bucketingKey] ?? 0;
  }
}

export function bucketingKeyFor(bucketingId: string, entityId: string): string {
  return `${bucketingId}${entityId}`;
}

export class Bucketer {
  constructor(private readonly sharder: Sharder = new MurmurhashSharder()) {}

  bucketValue(bucketingId: string, entityId: string): number {
    return this.sharder.getBucketValue(bucketingKeyFor(bucketingId, entityId));
  }

  /**
   * Returns the entity of the first allocation entry whose range ends after the bucket value,
   * or null when the value falls in the unallocated remainder of the table.
   */
  resolveVariation(
    bucketValue: number,
    trafficAllocation: readonly TrafficAllocation[],
  ): string | null {
    for (const { entityId, endOfRange } of trafficAllocation) {
      if (bucketValue < endOfRange) {
        // An entry with no entity reserves its range for nobody.
        return entityId ? entityId : null;
      }
    }
    return null;
  }

  bucket(
    bucketingId: string,
    entityId: string,
    trafficAllocation: readonly TrafficAllocation[],
  ): string | null {
    const bucketValue = this.bucketValue(bucketingId, entityId);
    logger.debug(`Assigned bucket ${bucketValue} to user with bucketing ID '${bucketingId}'.`);
    return this.resolveVariation(bucketValue, trafficAllocation);
  }
}
