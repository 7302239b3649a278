import {
  getLogLevel,
  logger as applicationLogger,
  loggerPrefix,
  setLogLevel,
} from './application-logger';
import type { LogLevel } from './application-logger';
import type { IAssignmentEvent, IAssignmentLogger } from './assignment-logger';
import { AudienceEvaluator, MatchType } from './audience-evaluator';
import { Bucketer, DeterministicSharder, MurmurhashSharder, Sharder } from './bucketer';
import DecisionClient from './client/decision-client';
import type { DecisionClientParameters } from './client/decision-client';
import { evaluateConditionTree, parseConditionTree } from './condition-tree';
import type { AttributeCondition, ConditionTree } from './condition-tree';
import { ConfigIndex } from './config-index';
import * as constants from './constants';
import type { IConversionEvent, IConversionLogger } from './conversion-logger';
import { DecisionService, DecisionSource } from './decision-service';
import type { Decision, DecisionServiceParameters } from './decision-service';
import type {
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
import { BoundedEventQueue } from './events/bounded-event-queue';
import { MemoryForcedVariationStore } from './forced-variation-store';
import type { IForcedVariationStore } from './forced-variation-store';
import { GroupPolicy, VariableType } from './interfaces';
import type { Datafile } from './interfaces';
import type { AttributeType, Attributes, EventTags, Ternary } from './types';
import { MemoryUserProfileService } from './user-profile-service';
import type { ExperimentBucketMap, IUserProfileService } from './user-profile-service';
import * as validation from './validation';
import { castVariableValue } from './variable-value';
import type { VariableValue } from './variable-value';

// Value exports
export {
  loggerPrefix,
  applicationLogger,
  setLogLevel,
  getLogLevel,
  DecisionClient,
  constants,
  validation,

  // Decision core
  ConfigIndex,
  AudienceEvaluator,
  Bucketer,
  Sharder,
  MurmurhashSharder,
  DeterministicSharder,
  DecisionService,
  parseConditionTree,
  evaluateConditionTree,
  castVariableValue,

  // Collaborators
  MemoryForcedVariationStore,
  MemoryUserProfileService,
  BoundedEventQueue,

  // Enums
  DecisionSource,
  GroupPolicy,
  MatchType,
  VariableType,

  // Errors
  InvalidInputError,
  InvalidDatafileVersionError,
};

// Type exports
export type {
  LogLevel,
  DecisionClientParameters,
  DecisionServiceParameters,
  Decision,
  IAssignmentEvent,
  IAssignmentLogger,
  IConversionEvent,
  IConversionLogger,
  IForcedVariationStore,
  IUserProfileService,
  ExperimentBucketMap,

  // Datafile and entity types
  Datafile,
  Audience,
  EventDefinition,
  Experiment,
  FeatureFlag,
  FeatureVariable,
  Group,
  Rollout,
  TrafficAllocation,
  Variation,
  AttributeCondition,
  ConditionTree,

  // Value types
  AttributeType,
  Attributes,
  EventTags,
  Ternary,
  VariableValue,
};
