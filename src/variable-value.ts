import { logger } from './application-logger';
import { VariableType } from './interfaces';

export type VariableValue = string | number | boolean;

const INTEGER_PATTERN = /^[+-]?\d+$/;

/**
 * Converts a datafile variable value, always serialized as a string, to the declared type.
 * Returns null for a value that does not represent the type.
 */
export function castVariableValue(value: string, type: VariableType): VariableValue | null {
  switch (type) {
    case VariableType.STRING:
      return value;
    case VariableType.BOOLEAN:
      if (value === 'true' || value === 'false') {
        return value === 'true';
      }
      break;
    case VariableType.INTEGER:
      if (INTEGER_PATTERN.test(value.trim())) {
        return Number.parseInt(value, 10);
      }
      break;
    case VariableType.DOUBLE: {
      const parsed = value.trim() === '' ? NaN : Number(value);
      if (Number.isFinite(parsed)) {
        return parsed;
      }
      break;
    }
  }
  logger.error(`Unable to cast variable value '${value}' to type '${type}'.`);
  return null;
}
