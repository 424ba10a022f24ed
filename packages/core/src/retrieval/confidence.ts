import { InvalidConfigurationError } from '../errors';

/**
 * Reject a confidence, threshold or factor outside [0, 1]
 */
export function checkUnitInterval(value: number, setting: string): void {
  if (!Number.isFinite(value) || value < 0 || value > 1) {
    throw new InvalidConfigurationError(`${setting} must be within [0, 1], got ${value}`, setting);
  }
}
