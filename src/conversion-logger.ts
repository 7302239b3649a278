import { Attributes, EventTags, ExperimentId, VariationId } from './types';

/**
 * A conversion recorded by `track`, with the experiments the user was bucketed in at the time.
 * @public
 */
export interface IConversionEvent {
  eventKey: string;
  eventId: string;
  subject: string;
  timestamp: string;
  subjectAttributes: Attributes;
  eventTags: EventTags;
  // experiment id -> variation id
  experimentVariations: Record<ExperimentId, VariationId>;
  metaData?: Record<string, unknown>;
}

export interface IConversionLogger {
  logConversion(conversion: IConversionEvent): void;
}
