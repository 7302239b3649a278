import { AttributeCondition, ConditionTree } from './condition-tree';
import { GroupPolicy, VariableType } from './interfaces';

// Parsed, read-only view of the datafile entities. Built by ConfigIndex.

export interface TrafficAllocation {
  readonly entityId: string;
  readonly endOfRange: number;
}

export interface Variation {
  readonly id: string;
  readonly key: string;
  readonly featureEnabled: boolean;
  // variable id -> override value
  readonly variables: ReadonlyMap<string, string>;
}

export interface Experiment {
  readonly id: string;
  readonly key: string;
  readonly status: string;
  readonly layerId: string;
  readonly audienceIds: readonly string[];
  // Tree over audience ids; null when the experiment only lists audienceIds.
  readonly audienceConditions: ConditionTree<string> | null;
  readonly variations: readonly Variation[];
  readonly variationsById: ReadonlyMap<string, Variation>;
  readonly variationsByKey: ReadonlyMap<string, Variation>;
  readonly trafficAllocation: readonly TrafficAllocation[];
  // user id -> variation key
  readonly forcedVariations: ReadonlyMap<string, string>;
  readonly groupId: string | null;
  readonly groupPolicy: GroupPolicy | null;
}

export interface Group {
  readonly id: string;
  readonly policy: GroupPolicy;
  readonly experimentIds: readonly string[];
  readonly trafficAllocation: readonly TrafficAllocation[];
}

export interface Audience {
  readonly id: string;
  readonly name: string;
  readonly conditions: ConditionTree<AttributeCondition>;
}

export interface FeatureVariable {
  readonly id: string;
  readonly key: string;
  readonly type: VariableType;
  readonly defaultValue: string;
}

export interface FeatureFlag {
  readonly id: string;
  readonly key: string;
  readonly experimentIds: readonly string[];
  readonly rolloutId: string | null;
  readonly variables: readonly FeatureVariable[];
  readonly variablesByKey: ReadonlyMap<string, FeatureVariable>;
}

export interface Rollout {
  readonly id: string;
  // Evaluated in order; the last rule targets everyone else.
  readonly rules: readonly Experiment[];
}

export interface EventDefinition {
  readonly id: string;
  readonly key: string;
  readonly experimentIds: readonly string[];
}
