/**
 * Runtime variation overrides, keyed by experiment key and user id. The client writes to the
 * store and the decision service reads from it.
 */
export interface IForcedVariationStore {
  /**
   * Forces the user into a variation, or removes the override when `variationKey` is null.
   * @returns whether the store accepted the change
   */
  set(experimentKey: string, userId: string, variationKey: string | null): boolean;
  get(experimentKey: string, userId: string): string | null;
}

export class MemoryForcedVariationStore implements IForcedVariationStore {
  // user id -> experiment key -> variation key
  private readonly overrides = new Map<string, Map<string, string>>();

  set(experimentKey: string, userId: string, variationKey: string | null): boolean {
    if (variationKey === null) {
      const userOverrides = this.overrides.get(userId);
      userOverrides?.delete(experimentKey);
      if (userOverrides?.size === 0) {
        this.overrides.delete(userId);
      }
      return true;
    }
    const userOverrides = this.overrides.get(userId) ?? new Map<string, string>();
    userOverrides.set(experimentKey, variationKey);
    this.overrides.set(userId, userOverrides);
    return true;
  }

  get(experimentKey: string, userId: string): string | null {
    return this.overrides.get(userId)?.get(experimentKey) ?? null;
  }

  clear(): void {
    this.overrides.clear();
  }
}
