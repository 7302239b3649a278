export type AttributeType = string | number | boolean | null;
export type Attributes = Record<string, AttributeType>;

export type EventTagType = string | number | boolean | null;
export type EventTags = Record<string, EventTagType>;

export type ExperimentKey = string;
export type ExperimentId = string;
export type VariationId = string;
export type VariationKey = string;
export type FeatureKey = string;
export type UserId = string;

/**
 * Result of a three-valued condition evaluation. `null` stands for "unknown": the condition
 * could not be evaluated against the given attributes.
 */
export type Ternary = boolean | null;
