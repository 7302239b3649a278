import { logger } from './application-logger';
import { AudienceEvaluator } from './audience-evaluator';
import { Bucketer } from './bucketer';
import { ConfigIndex } from './config-index';
import { BUCKETING_ID_ATTRIBUTE, RUNNING_EXPERIMENT_STATUS } from './constants';
import { Experiment, FeatureFlag, Variation } from './entities';
import { IForcedVariationStore, MemoryForcedVariationStore } from './forced-variation-store';
import { GroupPolicy } from './interfaces';
import { Attributes } from './types';
import { IUserProfileService } from './user-profile-service';

export enum DecisionSource {
  EXPERIMENT = 'experiment',
  ROLLOUT = 'rollout',
}

export interface Decision {
  // The experiment the user was bucketed in, or the matching rule for rollout decisions.
  readonly experiment: Experiment;
  readonly variation: Variation;
  readonly source: DecisionSource;
}

export type DecisionServiceParameters = {
  forcedVariationStore?: IForcedVariationStore;
  // Used when a decision call does not bring its own profile service.
  userProfileService?: IUserProfileService;
  bucketer?: Bucketer;
  audienceEvaluator?: AudienceEvaluator;
};

function experimentDecision(experiment: Experiment, variation: Variation): Decision {
  return Object.freeze({ experiment, variation, source: DecisionSource.EXPERIMENT });
}

/**
 * Decides which variation a user sees. The service keeps no configuration of its own: each
 * call receives the snapshot to decide against, so a decision never mixes two datafiles.
 *
 * For an experiment the checks run in this order:
 *   1. experiment status
 *   2. runtime forced variation
 *   3. whitelisted users in the datafile
 *   4. mutual exclusion group
 *   5. audience targeting
 *   6. sticky bucketing through the user profile service
 *   7. bucketing, followed by saving the assignment to the user profile service
 */
export class DecisionService {
  private readonly forcedVariationStore: IForcedVariationStore;
  private readonly userProfileService?: IUserProfileService;
  private readonly bucketer: Bucketer;
  private readonly audienceEvaluator: AudienceEvaluator;

  constructor({
    forcedVariationStore = new MemoryForcedVariationStore(),
    userProfileService,
    bucketer = new Bucketer(),
    audienceEvaluator = new AudienceEvaluator(),
  }: DecisionServiceParameters = {}) {
    this.forcedVariationStore = forcedVariationStore;
    this.userProfileService = userProfileService;
    this.bucketer = bucketer;
    this.audienceEvaluator = audienceEvaluator;
  }

  decideExperiment(
    config: ConfigIndex,
    experimentKey: string,
    userId: string,
    attributes: Attributes = {},
    userProfileService: IUserProfileService | undefined = this.userProfileService,
  ): Decision | null {
    const experiment = config.getExperimentFromKey(experimentKey);
    if (!experiment) {
      return null;
    }
    return this.decideForExperiment(config, experiment, userId, attributes, userProfileService);
  }

  /**
   * Tries the feature's experiments in declared order, then its rollout.
   */
  decideFeature(
    config: ConfigIndex,
    featureKey: string,
    userId: string,
    attributes: Attributes = {},
    userProfileService: IUserProfileService | undefined = this.userProfileService,
  ): Decision | null {
    const featureFlag = config.getFeatureFlagFromKey(featureKey);
    if (!featureFlag) {
      return null;
    }

    const featureTestDecision = this.decideFeatureExperiment(
      config,
      featureFlag,
      userId,
      attributes,
      userProfileService,
    );
    if (featureTestDecision) {
      return featureTestDecision;
    }

    const rolloutDecision = this.decideFeatureRollout(config, featureFlag, userId, attributes);
    if (rolloutDecision) {
      logger.debug(`User '${userId}' is bucketed into a rollout for feature '${featureKey}'.`);
      return rolloutDecision;
    }

    logger.info(`User '${userId}' is not bucketed into a rollout for feature '${featureKey}'.`);
    return null;
  }

  getBucketingId(userId: string, attributes: Attributes = {}): string {
    const bucketingId = attributes[BUCKETING_ID_ATTRIBUTE];
    if (bucketingId === undefined || bucketingId === null) {
      return userId;
    }
    if (typeof bucketingId !== 'string') {
      logger.warn(`Bucketing ID attribute is not a string. Defaulted to user ID '${userId}'.`);
      return userId;
    }
    return bucketingId;
  }

  private decideForExperiment(
    config: ConfigIndex,
    experiment: Experiment,
    userId: string,
    attributes: Attributes,
    userProfileService: IUserProfileService | undefined,
  ): Decision | null {
    if (experiment.status !== RUNNING_EXPERIMENT_STATUS) {
      logger.info(`Experiment '${experiment.key}' is not running.`);
      return null;
    }

    const forcedVariation = this.getForcedVariation(experiment, userId);
    if (forcedVariation) {
      return experimentDecision(experiment, forcedVariation);
    }

    const whitelistedVariation = this.getWhitelistedVariation(experiment, userId);
    if (whitelistedVariation) {
      return experimentDecision(experiment, whitelistedVariation);
    }

    const bucketingId = this.getBucketingId(userId, attributes);
    if (!this.isInExperimentOfGroup(config, experiment, bucketingId, userId)) {
      return null;
    }

    if (!this.audienceEvaluator.evaluateExperiment(config, experiment, attributes)) {
      logger.info(
        `User '${userId}' does not meet the conditions to be in experiment '${experiment.key}'.`,
      );
      return null;
    }

    const storedVariation = this.getStoredVariation(experiment, userId, userProfileService);
    if (storedVariation) {
      return experimentDecision(experiment, storedVariation);
    }

    const variationId = this.bucketer.bucket(
      bucketingId,
      experiment.id,
      experiment.trafficAllocation,
    );
    const variation = variationId ? experiment.variationsById.get(variationId) : undefined;
    if (!variation) {
      if (variationId) {
        logger.warn(`Bucketed into an invalid variation ID '${variationId}'. Returning null.`);
      }
      logger.info(`User '${userId}' is in no variation of experiment '${experiment.key}'.`);
      return null;
    }
    logger.info(
      `User '${userId}' is in variation '${variation.key}' of experiment '${experiment.key}'.`,
    );

    this.saveVariation(experiment, variation, userId, userProfileService);
    return experimentDecision(experiment, variation);
  }

  private getForcedVariation(experiment: Experiment, userId: string): Variation | null {
    let variationKey: string | null;
    try {
      variationKey = this.forcedVariationStore.get(experiment.key, userId);
    } catch (err) {
      logger.error({ err }, `Unable to read forced variation for user '${userId}'`);
      return null;
    }
    if (variationKey === null) {
      return null;
    }
    const variation = experiment.variationsByKey.get(variationKey);
    if (!variation) {
      logger.warn(
        `Forced variation '${variationKey}' for user '${userId}' is not in experiment ` +
          `'${experiment.key}'. Ignoring it.`,
      );
      return null;
    }
    logger.info(
      `Variation '${variationKey}' is mapped to experiment '${experiment.key}' and user ` +
        `'${userId}' in the forced variation map.`,
    );
    return variation;
  }

  private getWhitelistedVariation(experiment: Experiment, userId: string): Variation | null {
    const variationKey = experiment.forcedVariations.get(userId);
    if (variationKey === undefined) {
      return null;
    }
    const variation = experiment.variationsByKey.get(variationKey);
    if (!variation) {
      logger.info(
        `User '${userId}' is whitelisted into variation '${variationKey}', which is not in ` +
          `the datafile.`,
      );
      return null;
    }
    logger.info(`User '${userId}' is whitelisted into variation '${variationKey}'.`);
    return variation;
  }

  /**
   * Members of a random-policy group share one bucket space; the user qualifies only for the
   * member the group allocation picks. Other experiments always pass.
   */
  private isInExperimentOfGroup(
    config: ConfigIndex,
    experiment: Experiment,
    bucketingId: string,
    userId: string,
  ): boolean {
    if (experiment.groupId === null || experiment.groupPolicy !== GroupPolicy.RANDOM) {
      return true;
    }
    const group = config.getGroupFromId(experiment.groupId);
    if (!group) {
      return false;
    }
    const bucketedExperimentId = this.bucketer.bucket(
      bucketingId,
      group.id,
      group.trafficAllocation,
    );
    if (bucketedExperimentId === null) {
      logger.info(`User '${userId}' is not in any experiment of group ${group.id}.`);
      return false;
    }
    if (bucketedExperimentId !== experiment.id) {
      logger.info(
        `User '${userId}' is not in experiment '${experiment.key}' of group ${group.id}.`,
      );
      return false;
    }
    logger.info(`User '${userId}' is in experiment '${experiment.key}' of group ${group.id}.`);
    return true;
  }

  private getStoredVariation(
    experiment: Experiment,
    userId: string,
    userProfileService: IUserProfileService | undefined,
  ): Variation | null {
    if (!userProfileService) {
      return null;
    }
    let variationId: string | undefined;
    try {
      variationId = userProfileService.lookup(userId)?.[experiment.id];
    } catch (err) {
      logger.error({ err }, `Error looking up the user profile of user '${userId}'`);
      return null;
    }
    if (variationId === undefined) {
      return null;
    }
    const variation = experiment.variationsById.get(variationId);
    if (!variation) {
      logger.info(
        `User '${userId}' was previously bucketed into variation ID '${variationId}' for ` +
          `experiment '${experiment.key}', but no matching variation was found. Re-bucketing user.`,
      );
      return null;
    }
    logger.info(
      `Returning previously activated variation '${variation.key}' of experiment ` +
        `'${experiment.key}' for user '${userId}' from user profile.`,
    );
    return variation;
  }

  private saveVariation(
    experiment: Experiment,
    variation: Variation,
    userId: string,
    userProfileService: IUserProfileService | undefined,
  ): void {
    if (!userProfileService) {
      return;
    }
    try {
      if (userProfileService.save(userId, experiment.id, variation.id)) {
        logger.info(
          `Saved variation '${variation.id}' of experiment '${experiment.id}' for user '${userId}'.`,
        );
      } else {
        logger.error(`User profile service did not save the assignment of user '${userId}'.`);
      }
    } catch (err) {
      logger.error({ err }, `Error saving the user profile of user '${userId}'`);
    }
  }

  private decideFeatureExperiment(
    config: ConfigIndex,
    featureFlag: FeatureFlag,
    userId: string,
    attributes: Attributes,
    userProfileService: IUserProfileService | undefined,
  ): Decision | null {
    if (!featureFlag.experimentIds.length) {
      logger.debug(`The feature flag '${featureFlag.key}' is not used in any experiments.`);
      return null;
    }
    for (const experimentId of featureFlag.experimentIds) {
      const experiment = config.getExperimentFromId(experimentId);
      if (!experiment) {
        continue;
      }
      const decision = this.decideForExperiment(
        config,
        experiment,
        userId,
        attributes,
        userProfileService,
      );
      if (decision) {
        logger.info(
          `User '${userId}' is in variation '${decision.variation.key}' of experiment ` +
            `'${experiment.key}' on feature '${featureFlag.key}'.`,
        );
        return decision;
      }
    }
    logger.info(`User '${userId}' is not in any experiment on feature '${featureFlag.key}'.`);
    return null;
  }

  /**
   * Walks the rollout rules in order. A user who matches a rule's audience but falls outside
   * its traffic gets no decision at all: later rules, including the final "everyone else"
   * rule, are not consulted.
   */
  private decideFeatureRollout(
    config: ConfigIndex,
    featureFlag: FeatureFlag,
    userId: string,
    attributes: Attributes,
  ): Decision | null {
    if (featureFlag.rolloutId === null) {
      logger.debug(`Feature flag '${featureFlag.key}' is not used in a rollout.`);
      return null;
    }
    const rollout = config.getRolloutFromId(featureFlag.rolloutId);
    if (!rollout || !rollout.rules.length) {
      return null;
    }

    const bucketingId = this.getBucketingId(userId, attributes);
    const lastIndex = rollout.rules.length - 1;
    for (let index = 0; index <= lastIndex; index++) {
      const rule = rollout.rules[index];
      const isEveryoneElseRule = index === lastIndex;
      if (!this.audienceEvaluator.evaluateExperiment(config, rule, attributes)) {
        if (isEveryoneElseRule) {
          logger.debug(`User '${userId}' does not meet conditions for the "Everyone Else" rule.`);
          return null;
        }
        logger.debug(`User '${userId}' does not meet conditions for targeting rule ${index + 1}.`);
        continue;
      }

      const variationId = this.bucketer.bucket(bucketingId, rule.id, rule.trafficAllocation);
      const variation = variationId ? rule.variationsById.get(variationId) : undefined;
      if (!variation) {
        logger.debug(
          `User '${userId}' is not in the traffic group for rule ${index + 1} of feature ` +
            `'${featureFlag.key}'.`,
        );
        return null;
      }
      return Object.freeze({ experiment: rule, variation, source: DecisionSource.ROLLOUT });
    }
    return null;
  }
}
