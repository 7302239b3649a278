// Wire format of the datafile, as produced by the configuration service.

export enum GroupPolicy {
  RANDOM = 'random',
  OVERLAPPING = 'overlapping',
}

export enum VariableType {
  STRING = 'string',
  BOOLEAN = 'boolean',
  DOUBLE = 'double',
  INTEGER = 'integer',
}

export interface TrafficAllocationDto {
  entityId: string;
  endOfRange: number;
}

export interface VariableUsageDto {
  id: string;
  value: string;
}

export interface VariationDto {
  id: string;
  key: string;
  featureEnabled?: boolean;
  variables?: VariableUsageDto[];
}

export interface ExperimentDto {
  id: string;
  key: string;
  status: string;
  layerId?: string;
  audienceIds?: string[];
  // Nested condition list whose leaves are audience ids. Takes precedence over audienceIds.
  audienceConditions?: unknown;
  variations: VariationDto[];
  trafficAllocation: TrafficAllocationDto[];
  forcedVariations?: Record<string, string>;
}

export interface GroupDto {
  id: string;
  policy: GroupPolicy | string;
  trafficAllocation: TrafficAllocationDto[];
  experiments: ExperimentDto[];
}

export interface AudienceDto {
  id: string;
  name: string;
  // JSON-encoded condition list for legacy audiences, the decoded list for typed audiences.
  conditions: string | unknown[];
}

export interface FeatureVariableDto {
  id: string;
  key: string;
  type: VariableType | string;
  defaultValue: string;
}

export interface FeatureFlagDto {
  id: string;
  key: string;
  experimentIds: string[];
  rolloutId?: string;
  variables: FeatureVariableDto[];
}

export interface RolloutDto {
  id: string;
  experiments: ExperimentDto[];
}

export interface EventDto {
  id: string;
  key: string;
  experimentIds: string[];
}

export interface AttributeDto {
  id: string;
  key: string;
}

export interface Datafile {
  version: string;
  projectId?: string;
  accountId?: string;
  revision?: string;
  anonymizeIP?: boolean;
  attributes?: AttributeDto[];
  audiences?: AudienceDto[];
  typedAudiences?: AudienceDto[];
  experiments?: ExperimentDto[];
  groups?: GroupDto[];
  featureFlags?: FeatureFlagDto[];
  rollouts?: RolloutDto[];
  events?: EventDto[];
}
