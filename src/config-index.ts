import { logger } from './application-logger';
import {
  AttributeCondition,
  ConditionTree,
  parseAttributeCondition,
  parseAudienceReference,
  parseConditionTree,
} from './condition-tree';
import { SUPPORTED_DATAFILE_VERSIONS } from './constants';
import {
  Audience,
  EventDefinition,
  Experiment,
  FeatureFlag,
  FeatureVariable,
  Group,
  Rollout,
  TrafficAllocation,
  Variation,
} from './entities';
import { InvalidDatafileVersionError, InvalidInputError } from './errors';
import {
  AudienceDto,
  Datafile,
  ExperimentDto,
  FeatureFlagDto,
  GroupDto,
  GroupPolicy,
  TrafficAllocationDto,
  VariableType,
  VariationDto,
} from './interfaces';

const EMPTY_VARIABLE_OVERRIDES: ReadonlyMap<string, string> = new Map();

function indexBy<T>(items: readonly T[], key: (item: T) => string): ReadonlyMap<string, T> {
  return new Map(items.map((item) => [key(item), item]));
}

function toGroupPolicy(policy: string): GroupPolicy {
  if (policy === GroupPolicy.RANDOM) {
    return GroupPolicy.RANDOM;
  }
  if (policy !== GroupPolicy.OVERLAPPING) {
    logger.warn(`Unknown group policy '${policy}', treating the group as overlapping`);
  }
  return GroupPolicy.OVERLAPPING;
}

function toVariableType(type: string): VariableType | null {
  switch (type) {
    case VariableType.STRING:
      return VariableType.STRING;
    case VariableType.BOOLEAN:
      return VariableType.BOOLEAN;
    case VariableType.DOUBLE:
      return VariableType.DOUBLE;
    case VariableType.INTEGER:
      return VariableType.INTEGER;
    default:
      return null;
  }
}

function parseTrafficAllocation(
  allocation: readonly TrafficAllocationDto[] = [],
): readonly TrafficAllocation[] {
  return Object.freeze(
    allocation.map(({ entityId, endOfRange }) => Object.freeze({ entityId, endOfRange })),
  );
}

function parseVariation({ id, key, featureEnabled, variables = [] }: VariationDto): Variation {
  return Object.freeze({
    id,
    key,
    featureEnabled: featureEnabled === true,
    variables: new Map(variables.map((usage) => [usage.id, usage.value])),
  });
}

function parseExperiment(dto: ExperimentDto, group: Group | null = null): Experiment {
  const variations = Object.freeze(dto.variations.map(parseVariation));
  return Object.freeze({
    id: dto.id,
    key: dto.key,
    status: dto.status,
    layerId: dto.layerId ?? '',
    audienceIds: Object.freeze([...(dto.audienceIds ?? [])]),
    audienceConditions:
      dto.audienceConditions === undefined
        ? null
        : parseConditionTree(dto.audienceConditions, parseAudienceReference),
    variations,
    variationsById: indexBy(variations, (variation) => variation.id),
    variationsByKey: indexBy(variations, (variation) => variation.key),
    trafficAllocation: parseTrafficAllocation(dto.trafficAllocation),
    forcedVariations: new Map(Object.entries(dto.forcedVariations ?? {})),
    groupId: group?.id ?? null,
    groupPolicy: group?.policy ?? null,
  });
}

function parseGroup(dto: GroupDto): Group {
  return Object.freeze({
    id: dto.id,
    policy: toGroupPolicy(dto.policy),
    experimentIds: Object.freeze(dto.experiments.map((experiment) => experiment.id)),
    trafficAllocation: parseTrafficAllocation(dto.trafficAllocation),
  });
}

function parseAudience({ id, name, conditions }: AudienceDto): Audience {
  let rawConditions: unknown = conditions;
  if (typeof conditions === 'string') {
    try {
      rawConditions = JSON.parse(conditions);
    } catch (err) {
      const reason = err instanceof Error ? err.message : String(err);
      throw new InvalidInputError('datafile', `conditions of audience ${id}: ${reason}`);
    }
  }
  const tree: ConditionTree<AttributeCondition> = parseConditionTree(
    rawConditions,
    parseAttributeCondition,
  );
  return Object.freeze({ id, name, conditions: tree });
}

function parseFeatureFlag(dto: FeatureFlagDto): FeatureFlag {
  const variables: FeatureVariable[] = [];
  for (const variable of dto.variables ?? []) {
    const type = toVariableType(variable.type);
    if (type === null) {
      logger.warn(
        `Ignoring variable '${variable.key}' of feature '${dto.key}' with unsupported type '${variable.type}'`,
      );
      continue;
    }
    const { id, key, defaultValue } = variable;
    variables.push(Object.freeze({ id, key, type, defaultValue }));
  }
  return Object.freeze({
    id: dto.id,
    key: dto.key,
    experimentIds: Object.freeze([...(dto.experimentIds ?? [])]),
    rolloutId: dto.rolloutId ? dto.rolloutId : null,
    variables: Object.freeze(variables),
    variablesByKey: indexBy(variables, (variable) => variable.key),
  });
}

/**
 * Read-only snapshot of a datafile with constant-time lookups. Every lookup returns `null` (or
 * an empty collection) for an unknown reference instead of throwing; the decision code turns
 * that into "no decision".
 *
 * A snapshot is never modified after construction. To apply a new datafile build a new
 * ConfigIndex and swap the reference.
 */
export class ConfigIndex {
  readonly version: string;
  readonly revision: string;
  readonly projectId: string;
  readonly accountId: string;
  readonly anonymizeIP: boolean;
  readonly featureFlags: readonly FeatureFlag[];

  private readonly experimentKeyMap: ReadonlyMap<string, Experiment>;
  private readonly experimentIdMap: ReadonlyMap<string, Experiment>;
  private readonly rolloutRuleIdMap: ReadonlyMap<string, Experiment>;
  private readonly groupIdMap: ReadonlyMap<string, Group>;
  private readonly audienceIdMap: ReadonlyMap<string, Audience>;
  private readonly featureFlagKeyMap: ReadonlyMap<string, FeatureFlag>;
  private readonly featureFlagIdMap: ReadonlyMap<string, FeatureFlag>;
  private readonly rolloutIdMap: ReadonlyMap<string, Rollout>;
  private readonly eventKeyMap: ReadonlyMap<string, EventDefinition>;

  constructor(datafile: Datafile) {
    if (!SUPPORTED_DATAFILE_VERSIONS.includes(datafile.version)) {
      throw new InvalidDatafileVersionError(datafile.version);
    }
    this.version = datafile.version;
    this.revision = datafile.revision ?? '';
    this.projectId = datafile.projectId ?? '';
    this.accountId = datafile.accountId ?? '';
    this.anonymizeIP = datafile.anonymizeIP === true;

    const groups = (datafile.groups ?? []).map(parseGroup);
    this.groupIdMap = indexBy(groups, (group) => group.id);

    const experiments = (datafile.experiments ?? []).map((dto) => parseExperiment(dto));
    (datafile.groups ?? []).forEach((groupDto, index) => {
      groupDto.experiments.forEach((dto) => experiments.push(parseExperiment(dto, groups[index])));
    });
    this.experimentKeyMap = indexBy(experiments, (experiment) => experiment.key);
    this.experimentIdMap = indexBy(experiments, (experiment) => experiment.id);

    // Typed audiences supersede legacy audiences that share an id.
    const audiences = [...(datafile.audiences ?? []), ...(datafile.typedAudiences ?? [])].map(
      parseAudience,
    );
    this.audienceIdMap = indexBy(audiences, (audience) => audience.id);

    const rollouts: Rollout[] = (datafile.rollouts ?? []).map((dto) =>
      Object.freeze({
        id: dto.id,
        rules: Object.freeze(dto.experiments.map((rule) => parseExperiment(rule))),
      }),
    );
    this.rolloutIdMap = indexBy(rollouts, (rollout) => rollout.id);
    this.rolloutRuleIdMap = indexBy(
      rollouts.flatMap((rollout) => rollout.rules),
      (rule) => rule.id,
    );

    this.featureFlags = Object.freeze((datafile.featureFlags ?? []).map(parseFeatureFlag));
    this.featureFlagKeyMap = indexBy(this.featureFlags, (flag) => flag.key);
    this.featureFlagIdMap = indexBy(this.featureFlags, (flag) => flag.id);

    const events: EventDefinition[] = (datafile.events ?? []).map(({ id, key, experimentIds }) =>
      Object.freeze({ id, key, experimentIds: Object.freeze([...(experimentIds ?? [])]) }),
    );
    this.eventKeyMap = indexBy(events, (event) => event.key);

    Object.freeze(this);
  }

  getExperimentFromKey(experimentKey: string): Experiment | null {
    const experiment = this.experimentKeyMap.get(experimentKey);
    if (!experiment) {
      logger.error(`Experiment key '${experimentKey}' is not in datafile.`);
      return null;
    }
    return experiment;
  }

  /**
   * Looks up an A/B experiment or a rollout rule by id.
   */
  getExperimentFromId(experimentId: string): Experiment | null {
    const experiment =
      this.experimentIdMap.get(experimentId) ?? this.rolloutRuleIdMap.get(experimentId);
    if (!experiment) {
      logger.error(`Experiment id '${experimentId}' is not in datafile.`);
      return null;
    }
    return experiment;
  }

  getExperimentKeys(): string[] {
    return [...this.experimentKeyMap.keys()];
  }

  getGroupFromId(groupId: string): Group | null {
    const group = this.groupIdMap.get(groupId);
    if (!group) {
      logger.error(`Group id '${groupId}' is not in datafile.`);
      return null;
    }
    return group;
  }

  getAudienceFromId(audienceId: string): Audience | null {
    const audience = this.audienceIdMap.get(audienceId);
    if (!audience) {
      logger.error(`Audience id '${audienceId}' is not in datafile.`);
      return null;
    }
    return audience;
  }

  getFeatureFlagFromKey(featureKey: string): FeatureFlag | null {
    const featureFlag = this.featureFlagKeyMap.get(featureKey);
    if (!featureFlag) {
      logger.error(`Feature flag key '${featureKey}' is not in datafile.`);
      return null;
    }
    return featureFlag;
  }

  getFeatureFlagFromId(featureId: string): FeatureFlag | null {
    const featureFlag = this.featureFlagIdMap.get(featureId);
    if (!featureFlag) {
      logger.error(`Feature flag id '${featureId}' is not in datafile.`);
      return null;
    }
    return featureFlag;
  }

  getRolloutFromId(rolloutId: string): Rollout | null {
    const rollout = this.rolloutIdMap.get(rolloutId);
    if (!rollout) {
      logger.error(`Rollout with id '${rolloutId}' is not in datafile.`);
      return null;
    }
    return rollout;
  }

  getEvent(eventKey: string): EventDefinition | null {
    const event = this.eventKeyMap.get(eventKey);
    if (!event) {
      logger.error(`Event '${eventKey}' is not in datafile.`);
      return null;
    }
    return event;
  }

  getExperimentIdsForEvent(eventKey: string): readonly string[] {
    return this.getEvent(eventKey)?.experimentIds ?? [];
  }

  getVariationFromId(experimentKey: string, variationId: string): Variation | null {
    const experiment = this.getExperimentFromKey(experimentKey);
    if (!experiment) {
      return null;
    }
    const variation = experiment.variationsById.get(variationId);
    if (!variation) {
      logger.error(`Variation id '${variationId}' is not in experiment '${experimentKey}'.`);
      return null;
    }
    return variation;
  }

  getVariationFromKey(experimentKey: string, variationKey: string): Variation | null {
    const experiment = this.getExperimentFromKey(experimentKey);
    if (!experiment) {
      return null;
    }
    const variation = experiment.variationsByKey.get(variationKey);
    if (!variation) {
      logger.error(`Variation key '${variationKey}' is not in experiment '${experimentKey}'.`);
      return null;
    }
    return variation;
  }

  getVariationIdFromKey(experimentKey: string, variationKey: string): string | null {
    return this.getVariationFromKey(experimentKey, variationKey)?.id ?? null;
  }

  /**
   * Returns the variable overrides of a variation of an experiment or rollout rule, keyed by
   * variable id. Variation ids are only unique within their experiment, so both ids are
   * needed. Unknown ids and variations without overrides give an empty map.
   */
  getVariableOverrides(experimentId: string, variationId: string): ReadonlyMap<string, string> {
    const experiment =
      this.experimentIdMap.get(experimentId) ?? this.rolloutRuleIdMap.get(experimentId);
    return experiment?.variationsById.get(variationId)?.variables ?? EMPTY_VARIABLE_OVERRIDES;
  }

  getFeatureVariable(featureFlag: FeatureFlag, variableKey: string): FeatureVariable | null {
    const variable = featureFlag.variablesByKey.get(variableKey);
    if (!variable) {
      logger.error(
        `No variable key '${variableKey}' defined in datafile for feature flag '${featureFlag.key}'.`,
      );
      return null;
    }
    return variable;
  }
}
