import { InvalidInputError } from './errors';
import { Datafile } from './interfaces';
import { Attributes, EventTags } from './types';

export function validateNotBlank(value: string | undefined, errorMessage: string) {
  const isValid = value !== undefined && value.length > 0;
  if (!isValid) {
    throw new InvalidInputError('argument', errorMessage);
  }
}

export function isPlainObject(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

export function isValidAttributes(attributes: unknown): attributes is Attributes {
  if (!isPlainObject(attributes)) {
    return false;
  }
  return Object.values(attributes).every(
    (value) =>
      value === null ||
      typeof value === 'string' ||
      typeof value === 'boolean' ||
      typeof value === 'number',
  );
}

export function isValidEventTags(eventTags: unknown): eventTags is EventTags {
  return isValidAttributes(eventTags);
}

export function isFiniteNumber(value: unknown): value is number {
  return typeof value === 'number' && Number.isFinite(value);
}

/**
 * Shallow check of a parsed datafile. The entities themselves are read defensively when the
 * configuration is indexed.
 */
export function isDatafile(value: unknown): value is Datafile {
  return isPlainObject(value) && typeof value.version === 'string';
}
