import { randomInt } from 'node:crypto';
import { DEFAULT_MAX_SECRET_NUMBER } from '../config/gameConfig.js';
import { InvalidConfigurationError } from '../errors.js';

/**
 * Source of secret numbers, consulted once per session.
 */
export interface SecretNumberGenerator {
  /** Upper bound (inclusive) of generated numbers; the lower bound is 1 */
  readonly maxSecretNumber: number;
  generate(): number;
}

/**
 * Uniformly random secret in [1, maxSecretNumber].
 */
export class RandomSecretNumberGenerator implements SecretNumberGenerator {
  readonly maxSecretNumber: number;

  constructor(maxSecretNumber: number = DEFAULT_MAX_SECRET_NUMBER) {
    if (!Number.isInteger(maxSecretNumber) || maxSecretNumber < 1) {
      throw new InvalidConfigurationError(
        `maxSecretNumber must be a positive integer, got ${maxSecretNumber}`
      );
    }
    this.maxSecretNumber = maxSecretNumber;
  }

  generate(): number {
    // randomInt's upper bound is exclusive
    return randomInt(1, this.maxSecretNumber + 1);
  }
}
