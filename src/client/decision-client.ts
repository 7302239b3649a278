import { LogLevel, logger, setLogLevel } from '../application-logger';
import { IAssignmentEvent, IAssignmentLogger } from '../assignment-logger';
import { ConfigIndex } from '../config-index';
import { IConversionEvent, IConversionLogger } from '../conversion-logger';
import { Decision, DecisionService, DecisionSource } from '../decision-service';
import { InvalidInputError } from '../errors';
import { BoundedEventQueue } from '../events/bounded-event-queue';
import { IForcedVariationStore, MemoryForcedVariationStore } from '../forced-variation-store';
import { Datafile, VariableType } from '../interfaces';
import { Attributes, EventTags, ExperimentId, VariationId } from '../types';
import { IUserProfileService } from '../user-profile-service';
import { castVariableValue, VariableValue } from '../variable-value';
import {
  isDatafile,
  isValidAttributes,
  isValidEventTags,
  validateNotBlank,
} from '../validation';
import { LIB_VERSION } from '../version';

export type DecisionClientParameters = {
  // Datafile to start with, as parsed JSON or its string form. Can be set later with setConfiguration.
  datafile?: Datafile | string;
  userProfileService?: IUserProfileService;
  forcedVariationStore?: IForcedVariationStore;
  assignmentLogger?: IAssignmentLogger;
  conversionLogger?: IConversionLogger;
  logLevel?: LogLevel;
  // When true (the default) errors are logged and neutral values returned instead of throwing.
  isGracefulFailureMode?: boolean;
};

function parseDatafile(datafile: Datafile | string): Datafile {
  if (typeof datafile !== 'string') {
    return datafile;
  }
  let parsed: unknown;
  try {
    parsed = JSON.parse(datafile);
  } catch (err) {
    throw new InvalidInputError('datafile', err instanceof Error ? err.message : String(err));
  }
  if (!isDatafile(parsed)) {
    throw new InvalidInputError('datafile', 'missing version');
  }
  return parsed;
}

export default class DecisionClient {
  // Replaced as a whole on reload; every public call reads it once.
  private config: ConfigIndex | null = null;
  private readonly forcedVariationStore: IForcedVariationStore;
  private readonly decisionService: DecisionService;
  private readonly assignmentEventsQueue: BoundedEventQueue<IAssignmentEvent> =
    new BoundedEventQueue<IAssignmentEvent>('assignments');
  private readonly conversionEventsQueue: BoundedEventQueue<IConversionEvent> =
    new BoundedEventQueue<IConversionEvent>('conversions');
  private assignmentLogger?: IAssignmentLogger;
  private conversionLogger?: IConversionLogger;
  private isGracefulFailureMode: boolean;

  constructor({
    datafile,
    userProfileService,
    forcedVariationStore = new MemoryForcedVariationStore(),
    assignmentLogger,
    conversionLogger,
    logLevel,
    isGracefulFailureMode = true,
  }: DecisionClientParameters = {}) {
    if (logLevel) {
      setLogLevel(logLevel);
    }
    this.isGracefulFailureMode = isGracefulFailureMode;
    this.forcedVariationStore = forcedVariationStore;
    this.decisionService = new DecisionService({ forcedVariationStore, userProfileService });
    this.assignmentLogger = assignmentLogger;
    this.conversionLogger = conversionLogger;
    if (datafile !== undefined) {
      this.setConfiguration(datafile);
    }
  }

  /**
   * Builds a snapshot from the datafile and publishes it. Decisions already running finish
   * against the snapshot they started with. A datafile that cannot be indexed leaves the
   * current snapshot in place.
   *
   * @returns whether the new configuration was applied
   */
  setConfiguration(datafile: Datafile | string): boolean {
    try {
      const config = new ConfigIndex(parseDatafile(datafile));
      this.config = config;
      logger.info(`Loaded datafile revision ${config.revision}`);
      return true;
    } catch (err) {
      this.rethrowIfNotGraceful(err);
      return false;
    }
  }

  getConfiguration(): ConfigIndex | null {
    return this.config;
  }

  isInitialized(): boolean {
    return this.config !== null;
  }

  setIsGracefulFailureMode(gracefulFailureMode: boolean) {
    this.isGracefulFailureMode = gracefulFailureMode;
  }

  setAssignmentLogger(assignmentLogger: IAssignmentLogger) {
    this.assignmentLogger = assignmentLogger;
    // log any assignment events that were queued while no logger was set
    this.flushQueuedEvents(this.assignmentEventsQueue, (event) =>
      assignmentLogger.logAssignment(event),
    );
  }

  setConversionLogger(conversionLogger: IConversionLogger) {
    this.conversionLogger = conversionLogger;
    this.flushQueuedEvents(this.conversionEventsQueue, (event) =>
      conversionLogger.logConversion(event),
    );
  }

  /**
   * Buckets a user into an experiment and records the assignment.
   *
   * @param experimentKey key of the experiment to activate
   * @param userId an identifier of the user, for example a user ID
   * @param attributes attributes used for audience targeting and the bucketing ID
   * @returns the key of the assigned variation, or null when the user is not in the experiment
   */
  activate(experimentKey: string, userId: string, attributes: Attributes = {}): string | null {
    const config = this.config;
    const decision = this.tryDecide(config, (snapshot) => {
      this.validateUserInputs(userId, attributes, { experimentKey });
      return this.decisionService.decideExperiment(snapshot, experimentKey, userId, attributes);
    });
    if (!config || !decision) {
      logger.info(`Not activating user '${userId}'.`);
      return null;
    }
    this.recordAssignment(config, decision, null, userId, attributes);
    return decision.variation.key;
  }

  /**
   * Same decision as `activate`, without recording an assignment.
   */
  getVariation(experimentKey: string, userId: string, attributes: Attributes = {}): string | null {
    const decision = this.tryDecide(this.config, (config) => {
      this.validateUserInputs(userId, attributes, { experimentKey });
      return this.decisionService.decideExperiment(config, experimentKey, userId, attributes);
    });
    return decision?.variation.key ?? null;
  }

  /**
   * Forces a user into a variation for the lifetime of this client, or clears the override
   * when `variationKey` is null.
   *
   * @returns false when the experiment or the variation is not in the datafile
   */
  setForcedVariation(experimentKey: string, userId: string, variationKey: string | null): boolean {
    const config = this.config;
    if (!config) {
      logger.error('Datafile has not been loaded. Not setting forced variation.');
      return false;
    }
    try {
      validateNotBlank(experimentKey, 'Invalid argument: experimentKey cannot be blank');
      if (typeof userId !== 'string') {
        throw new InvalidInputError('user_id');
      }
      const experiment = config.getExperimentFromKey(experimentKey);
      if (!experiment) {
        return false;
      }
      if (variationKey === null) {
        const cleared = this.forcedVariationStore.set(experimentKey, userId, null);
        logger.debug(
          `Variation mapped to experiment '${experimentKey}' has been removed for user '${userId}'.`,
        );
        return cleared;
      }
      validateNotBlank(variationKey, 'Invalid argument: variationKey cannot be blank');
      if (!config.getVariationFromKey(experimentKey, variationKey)) {
        return false;
      }
      const stored = this.forcedVariationStore.set(experimentKey, userId, variationKey);
      logger.debug(
        `Set variation '${variationKey}' for experiment '${experimentKey}' and user '${userId}' ` +
          'in the forced variation map.',
      );
      return stored;
    } catch (err) {
      this.rethrowIfNotGraceful(err);
      return false;
    }
  }

  getForcedVariation(experimentKey: string, userId: string): string | null {
    const config = this.config;
    if (!config) {
      logger.error('Datafile has not been loaded. Not getting forced variation.');
      return null;
    }
    try {
      const experiment = config.getExperimentFromKey(experimentKey);
      if (!experiment) {
        return null;
      }
      const variationKey = this.forcedVariationStore.get(experimentKey, userId);
      return variationKey !== null && experiment.variationsByKey.has(variationKey)
        ? variationKey
        : null;
    } catch (err) {
      this.rethrowIfNotGraceful(err);
      return null;
    }
  }

  /**
   * Whether a feature is on for a user, from a feature test or a rollout. An assignment is
   * recorded only when the decision comes from a feature test.
   */
  isFeatureEnabled(featureKey: string, userId: string, attributes: Attributes = {}): boolean {
    const config = this.config;
    if (!config) {
      logger.error('Datafile has not been loaded. Feature is not enabled.');
      return false;
    }
    return this.isFeatureEnabledFor(config, featureKey, userId, attributes);
  }

  /**
   * Keys of all features enabled for the user, in datafile order.
   */
  getEnabledFeatures(userId: string, attributes: Attributes = {}): string[] {
    const config = this.config;
    if (!config) {
      logger.error('Datafile has not been loaded. No features are enabled.');
      return [];
    }
    try {
      this.validateUserInputs(userId, attributes, {});
    } catch (err) {
      this.rethrowIfNotGraceful(err);
      return [];
    }
    return config.featureFlags
      .filter((featureFlag) => this.isFeatureEnabledFor(config, featureFlag.key, userId, attributes))
      .map((featureFlag) => featureFlag.key);
  }

  getFeatureVariableString(
    featureKey: string,
    variableKey: string,
    userId: string,
    attributes: Attributes = {},
  ): string | null {
    const value = this.getFeatureVariableForType(
      featureKey,
      variableKey,
      VariableType.STRING,
      userId,
      attributes,
    );
    return typeof value === 'string' ? value : null;
  }

  getFeatureVariableBoolean(
    featureKey: string,
    variableKey: string,
    userId: string,
    attributes: Attributes = {},
  ): boolean | null {
    const value = this.getFeatureVariableForType(
      featureKey,
      variableKey,
      VariableType.BOOLEAN,
      userId,
      attributes,
    );
    return typeof value === 'boolean' ? value : null;
  }

  getFeatureVariableDouble(
    featureKey: string,
    variableKey: string,
    userId: string,
    attributes: Attributes = {},
  ): number | null {
    const value = this.getFeatureVariableForType(
      featureKey,
      variableKey,
      VariableType.DOUBLE,
      userId,
      attributes,
    );
    return typeof value === 'number' ? value : null;
  }

  getFeatureVariableInteger(
    featureKey: string,
    variableKey: string,
    userId: string,
    attributes: Attributes = {},
  ): number | null {
    const value = this.getFeatureVariableForType(
      featureKey,
      variableKey,
      VariableType.INTEGER,
      userId,
      attributes,
    );
    return typeof value === 'number' ? value : null;
  }

  /**
   * Records a conversion for every experiment that tracks the event and in which the user is
   * currently bucketed. Nothing is recorded when there is no such experiment.
   */
  track(eventKey: string, userId: string, attributes: Attributes = {}, eventTags: EventTags = {}) {
    const config = this.config;
    if (!config) {
      logger.error('Datafile has not been loaded. Not tracking event.');
      return;
    }
    try {
      this.validateUserInputs(userId, attributes, { eventKey });
      if (!isValidEventTags(eventTags)) {
        throw new InvalidInputError('event tags');
      }
      const event = config.getEvent(eventKey);
      if (!event) {
        logger.info(`Not tracking user '${userId}'.`);
        return;
      }

      const experimentVariations: Record<ExperimentId, VariationId> = {};
      for (const experimentId of event.experimentIds) {
        const experiment = config.getExperimentFromId(experimentId);
        if (!experiment) {
          continue;
        }
        const decision = this.decisionService.decideExperiment(
          config,
          experiment.key,
          userId,
          attributes,
        );
        if (!decision) {
          logger.info(`Not tracking user '${userId}' for experiment '${experiment.key}'.`);
          continue;
        }
        experimentVariations[experimentId] = decision.variation.id;
      }
      if (!Object.keys(experimentVariations).length) {
        logger.info(`There are no valid experiments for event '${eventKey}' to track.`);
        return;
      }

      this.recordConversion({
        eventKey,
        eventId: event.id,
        subject: userId,
        timestamp: new Date().toISOString(),
        subjectAttributes: attributes,
        eventTags,
        experimentVariations,
        metaData: this.buildLoggerMetadata(config),
      });
    } catch (err) {
      this.rethrowIfNotGraceful(err);
    }
  }

  private isFeatureEnabledFor(
    config: ConfigIndex,
    featureKey: string,
    userId: string,
    attributes: Attributes,
  ): boolean {
    const decision = this.tryDecide(config, () => {
      this.validateUserInputs(userId, attributes, { featureKey });
      return this.decisionService.decideFeature(config, featureKey, userId, attributes);
    });
    if (!decision) {
      logger.info(`Feature '${featureKey}' is not enabled for user '${userId}'.`);
      return false;
    }
    if (decision.source === DecisionSource.EXPERIMENT) {
      this.recordAssignment(config, decision, featureKey, userId, attributes);
    } else {
      logger.debug(`The user '${userId}' is not being experimented on in feature '${featureKey}'.`);
    }
    const enabled = decision.variation.featureEnabled;
    logger.info(`Feature '${featureKey}' is ${enabled ? '' : 'not '}enabled for user '${userId}'.`);
    return enabled;
  }

  private getFeatureVariableForType(
    featureKey: string,
    variableKey: string,
    variableType: VariableType,
    userId: string,
    attributes: Attributes,
  ): VariableValue | null {
    const config = this.config;
    if (!config) {
      logger.error('Datafile has not been loaded. Not getting feature variable.');
      return null;
    }
    try {
      validateNotBlank(variableKey, 'Invalid argument: variableKey cannot be blank');
      this.validateUserInputs(userId, attributes, { featureKey });
      const featureFlag = config.getFeatureFlagFromKey(featureKey);
      if (!featureFlag) {
        return null;
      }
      const variable = config.getFeatureVariable(featureFlag, variableKey);
      if (!variable) {
        return null;
      }
      if (variable.type !== variableType) {
        logger.warn(
          `Requested variable as type '${variableType}' but variable '${variableKey}' is of ` +
            `type '${variable.type}'.`,
        );
        return null;
      }

      let value = variable.defaultValue;
      const decision = this.decisionService.decideFeature(config, featureKey, userId, attributes);
      if (!decision) {
        logger.info(
          `User '${userId}' was not bucketed into any variation for feature flag '${featureKey}'. ` +
            `Returning the default variable value '${value}'.`,
        );
      } else {
        const override = decision.variation.variables.get(variable.id);
        if (override !== undefined) {
          value = override;
          logger.info(
            `Got variable value '${value}' for variable '${variableKey}' of feature flag '${featureKey}'.`,
          );
        } else {
          logger.debug(
            `Variable '${variableKey}' is not used in variation '${decision.variation.key}'. ` +
              `Returning the default variable value '${value}'.`,
          );
        }
      }
      return castVariableValue(value, variableType);
    } catch (err) {
      this.rethrowIfNotGraceful(err);
      return null;
    }
  }

  private tryDecide(
    config: ConfigIndex | null,
    decide: (config: ConfigIndex) => Decision | null,
  ): Decision | null {
    if (!config) {
      logger.error('Datafile has not been loaded. Returning no decision.');
      return null;
    }
    try {
      return decide(config);
    } catch (err) {
      this.rethrowIfNotGraceful(err);
      return null;
    }
  }

  private validateUserInputs(
    userId: string,
    attributes: Attributes,
    keys: Record<string, string>,
  ): void {
    Object.entries(keys).forEach(([name, value]) =>
      validateNotBlank(value, `Invalid argument: ${name} cannot be blank`),
    );
    if (typeof userId !== 'string') {
      throw new InvalidInputError('user_id');
    }
    if (!isValidAttributes(attributes)) {
      throw new InvalidInputError('attributes');
    }
  }

  private recordAssignment(
    config: ConfigIndex,
    decision: Decision,
    featureKey: string | null,
    userId: string,
    attributes: Attributes,
  ): void {
    const event: IAssignmentEvent = {
      experiment: decision.experiment.key,
      experimentId: decision.experiment.id,
      featureFlag: featureKey,
      variation: decision.variation.key,
      variationId: decision.variation.id,
      source: decision.source,
      subject: userId,
      timestamp: new Date().toISOString(),
      subjectAttributes: attributes,
      metaData: this.buildLoggerMetadata(config),
    };
    try {
      if (this.assignmentLogger) {
        this.assignmentLogger.logAssignment(event);
      } else {
        // assignment logger may be unset while the host is starting up, queue up events (up to
        // a max) to be flushed when set
        this.assignmentEventsQueue.push(event);
      }
    } catch (error) {
      logger.error({ err: error }, 'Error logging assignment event');
    }
  }

  private recordConversion(event: IConversionEvent): void {
    try {
      if (this.conversionLogger) {
        this.conversionLogger.logConversion(event);
      } else {
        this.conversionEventsQueue.push(event);
      }
    } catch (error) {
      logger.error({ err: error }, 'Error logging conversion event');
    }
  }

  private flushQueuedEvents<T>(eventQueue: BoundedEventQueue<T>, logFunction: (event: T) => void) {
    eventQueue.flush().forEach((event) => {
      try {
        logFunction(event);
      } catch (error) {
        logger.error({ err: error }, 'Error flushing event to logger');
      }
    });
  }

  private buildLoggerMetadata(config: ConfigIndex): Record<string, unknown> {
    return {
      revision: config.revision,
      projectId: config.projectId,
      sdkLanguage: 'javascript',
      sdkLibVersion: LIB_VERSION,
    };
  }

  private rethrowIfNotGraceful(err: unknown): void {
    if (!this.isGracefulFailureMode) {
      throw err;
    }
    logger.error(`Error making decision: ${err instanceof Error ? err.message : String(err)}`);
  }
}
