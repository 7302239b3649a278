import { ExperimentId, UserId, VariationId } from './types';

export type ExperimentBucketMap = Record<ExperimentId, VariationId>;

/**
 * Sticky bucketing collaborator. Implementations may be backed by any store; the decision
 * service reads a user's assignments once per decision and writes back fresh assignments.
 * Either call may fail (throw, or return false from `save`) without affecting the decision.
 */
export interface IUserProfileService {
  lookup(userId: UserId): ExperimentBucketMap | null;
  save(userId: UserId, experimentId: ExperimentId, variationId: VariationId): boolean;
}

export class MemoryUserProfileService implements IUserProfileService {
  private readonly profiles = new Map<UserId, ExperimentBucketMap>();

  lookup(userId: UserId): ExperimentBucketMap | null {
    const profile = this.profiles.get(userId);
    return profile ? { ...profile } : null;
  }

  save(userId: UserId, experimentId: ExperimentId, variationId: VariationId): boolean {
    this.profiles.set(userId, { ...this.profiles.get(userId), [experimentId]: variationId });
    return true;
  }
}
