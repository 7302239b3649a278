import { DecisionSource } from './decision-service';
import { Attributes } from './types';

/**
 * Holds data about the variation a user was assigned to. Recorded when a user is activated in
 * an experiment, either directly or through a feature test.
 * @public
 */
export interface IAssignmentEvent {
  /**
   * Key of the experiment the user was bucketed in
   */
  experiment: string;

  experimentId: string;

  /**
   * Key of the feature flag, for assignments made while evaluating a feature
   */
  featureFlag: string | null;

  /**
   * The assigned variation
   */
  variation: string;

  variationId: string;

  source: DecisionSource;

  /**
   * The user that was assigned to a variation
   */
  subject: string;

  /**
   * The time the user was exposed to the variation.
   */
  timestamp: string;

  subjectAttributes: Attributes;

  metaData?: Record<string, unknown>;
}

/**
 * Implement this interface to send variation assignments to your analytics pipeline.
 * @public
 */
export interface IAssignmentLogger {
  /**
   * Invoked when a user is assigned to an experiment variation.
   * @param assignment holds the variation the user was assigned to
   * @public
   */
  logAssignment(assignment: IAssignmentEvent): void;
}
