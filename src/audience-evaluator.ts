import * as semver from 'semver';

import { logger } from './application-logger';
import { AttributeCondition, ConditionTree, evaluateConditionTree } from './condition-tree';
import { ConfigIndex } from './config-index';
import { CUSTOM_ATTRIBUTE_CONDITION_TYPE, MAX_NUMERIC_CONDITION_VALUE } from './constants';
import { Experiment } from './entities';
import { AttributeType, Attributes, Ternary } from './types';
import { isFiniteNumber } from './validation';

export enum MatchType {
  EXACT = 'exact',
  EXISTS = 'exists',
  SUBSTRING = 'substring',
  GREATER_THAN = 'gt',
  GREATER_THAN_OR_EQUAL = 'ge',
  LESS_THAN = 'lt',
  LESS_THAN_OR_EQUAL = 'le',
  SEMVER_EQUAL = 'semver_eq',
  SEMVER_GREATER_THAN = 'semver_gt',
  SEMVER_GREATER_THAN_OR_EQUAL = 'semver_ge',
  SEMVER_LESS_THAN = 'semver_lt',
  SEMVER_LESS_THAN_OR_EQUAL = 'semver_le',
}

type Matcher = (condition: AttributeCondition, userValue: AttributeType) => Ternary;

function isSafeNumber(value: unknown): value is number {
  return isFiniteNumber(value) && Math.abs(value) <= MAX_NUMERIC_CONDITION_VALUE;
}

function isSupportedConditionValue(value: unknown): value is string | number | boolean {
  return typeof value === 'string' || typeof value === 'boolean' || isFiniteNumber(value);
}

function exactMatch(condition: AttributeCondition, userValue: AttributeType): Ternary {
  const conditionValue = condition.value;
  if (!isSupportedConditionValue(conditionValue)) {
    logger.warn(`Audience condition ${JSON.stringify(condition)} has an unsupported value`);
    return null;
  }
  if (typeof conditionValue === 'number') {
    if (!isSafeNumber(conditionValue) || !isSafeNumber(userValue)) {
      return null;
    }
    return conditionValue === userValue;
  }
  if (typeof conditionValue !== typeof userValue) {
    logger.debug(
      `Attribute '${condition.name}' of type ${typeof userValue} ` +
        `cannot be compared to ${typeof conditionValue}`,
    );
    return null;
  }
  return conditionValue === userValue;
}

function substringMatch(condition: AttributeCondition, userValue: AttributeType): Ternary {
  if (typeof condition.value !== 'string' || typeof userValue !== 'string') {
    return null;
  }
  return userValue.includes(condition.value);
}

function numericMatch(compare: (userValue: number, conditionValue: number) => boolean): Matcher {
  return (condition, userValue) => {
    if (!isSafeNumber(condition.value) || !isSafeNumber(userValue)) {
      return null;
    }
    return compare(userValue, condition.value);
  };
}

function semverMatch(compare: (userVersion: string, conditionVersion: string) => boolean): Matcher {
  return (condition, userValue) => {
    if (typeof condition.value !== 'string' || typeof userValue !== 'string') {
      return null;
    }
    const conditionVersion = semver.valid(condition.value);
    const userVersion = semver.valid(userValue);
    if (conditionVersion === null || userVersion === null) {
      logger.debug(`Attribute '${condition.name}' is not comparable as a semantic version`);
      return null;
    }
    return compare(userVersion, conditionVersion);
  };
}

const MATCHERS: Record<MatchType, Matcher> = {
  [MatchType.EXACT]: exactMatch,
  // Presence is handled before dispatch; a value reaching here is present.
  [MatchType.EXISTS]: () => true,
  [MatchType.SUBSTRING]: substringMatch,
  [MatchType.GREATER_THAN]: numericMatch((user, target) => user > target),
  [MatchType.GREATER_THAN_OR_EQUAL]: numericMatch((user, target) => user >= target),
  [MatchType.LESS_THAN]: numericMatch((user, target) => user < target),
  [MatchType.LESS_THAN_OR_EQUAL]: numericMatch((user, target) => user <= target),
  [MatchType.SEMVER_EQUAL]: semverMatch(semver.eq),
  [MatchType.SEMVER_GREATER_THAN]: semverMatch(semver.gt),
  [MatchType.SEMVER_GREATER_THAN_OR_EQUAL]: semverMatch(semver.gte),
  [MatchType.SEMVER_LESS_THAN]: semverMatch(semver.lt),
  [MatchType.SEMVER_LESS_THAN_OR_EQUAL]: semverMatch(semver.lte),
};

const MATCH_TYPES: ReadonlyMap<string, MatchType> = new Map<string, MatchType>([
  ...Object.values(MatchType).map((matchType) => [matchType, matchType] as const),
  // Spellings used by older datafiles.
  ['greater_than', MatchType.GREATER_THAN] as const,
  ['less_than', MatchType.LESS_THAN] as const,
]);

function toMatchType(match: string | undefined): MatchType | null {
  // Legacy audiences carry no match type and only ever meant exact matching.
  if (match === undefined) {
    return MatchType.EXACT;
  }
  return MATCH_TYPES.get(match) ?? null;
}

export class AudienceEvaluator {
  /**
   * Evaluates an audience condition tree against a user's attributes.
   *
   * @returns true or false when the tree could be decided, null when it could not (a missing
   * attribute, a type mismatch, an unknown match type)
   */
  evaluate(conditionTree: ConditionTree<AttributeCondition>, attributes: Attributes): Ternary {
    return evaluateConditionTree(conditionTree, (condition) =>
      this.evaluateCondition(condition, attributes),
    );
  }

  evaluateCondition(condition: AttributeCondition, attributes: Attributes): Ternary {
    if (condition.type !== CUSTOM_ATTRIBUTE_CONDITION_TYPE) {
      logger.warn(`Audience condition ${JSON.stringify(condition)} has an unknown condition type`);
      return null;
    }
    const matchType = toMatchType(condition.match);
    if (matchType === null) {
      logger.warn(`Audience condition ${JSON.stringify(condition)} uses an unknown match type`);
      return null;
    }

    const userValue = Object.prototype.hasOwnProperty.call(attributes, condition.name)
      ? attributes[condition.name]
      : null;
    if (userValue === null || userValue === undefined) {
      if (matchType === MatchType.EXISTS) {
        return false;
      }
      logger.debug(`No attribute '${condition.name}' passed for ${JSON.stringify(condition)}`);
      return null;
    }
    return MATCHERS[matchType](condition, userValue);
  }

  /**
   * Decides whether a user qualifies for an experiment or rollout rule. Explicit
   * audienceConditions are evaluated as a tree over audience ids; otherwise the audienceIds
   * are or-ed. An experiment without audiences targets everyone. An unknown result excludes the
   * user.
   */
  evaluateExperiment(config: ConfigIndex, experiment: Experiment, attributes: Attributes): boolean {
    const conditions: ConditionTree<string> = experiment.audienceConditions ?? {
      type: 'or',
      conditions: experiment.audienceIds.map(
        (audienceId): ConditionTree<string> => ({ type: 'leaf', leaf: audienceId }),
      ),
    };
    if ((conditions.type === 'and' || conditions.type === 'or') && !conditions.conditions.length) {
      return true;
    }

    const result = evaluateConditionTree(conditions, (audienceId) => {
      const audience = config.getAudienceFromId(audienceId);
      if (!audience) {
        return null;
      }
      const audienceResult = this.evaluate(audience.conditions, attributes);
      logger.debug(
        `Audience '${audience.name}' evaluated to ${String(audienceResult).toUpperCase()}`,
      );
      return audienceResult;
    });
    logger.debug(
      `Audiences for experiment '${experiment.key}' collectively evaluated to ` +
        String(result).toUpperCase(),
    );
    return result === true;
  }
}
