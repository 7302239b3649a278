import { SUPPORTED_DATAFILE_VERSIONS } from './constants';

/**
 * Raised when a caller supplies an argument the SDK cannot work with, such as a blank key or a
 * datafile that is not valid JSON.
 */
export class InvalidInputError extends Error {
  constructor(public readonly input: string, reason?: string) {
    super(
      reason
        ? `Provided ${input} is in an invalid format: ${reason}`
        : `Provided ${input} is in an invalid format.`,
    );
    this.name = 'InvalidInputError';
  }
}

export class InvalidDatafileVersionError extends Error {
  constructor(public readonly version: unknown) {
    super(
      `This version of the SDK does not support datafile version ${String(version)}. ` +
        `Supported versions: ${SUPPORTED_DATAFILE_VERSIONS.join(', ')}.`,
    );
    this.name = 'InvalidDatafileVersionError';
  }
}
