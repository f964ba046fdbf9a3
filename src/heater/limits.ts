import {ValidationError} from './errors.js';

export const MIN_TARGET_TEMPERATURE = 16;
export const MAX_TARGET_TEMPERATURE = 32;

export function validateTargetTemperature(celsius: number): void {
  if (!Number.isFinite(celsius)) {
    throw new ValidationError(`target temperature must be a number, got ${celsius}`);
  }
  if (celsius < MIN_TARGET_TEMPERATURE || celsius > MAX_TARGET_TEMPERATURE) {
    throw new ValidationError(
      `target temperature ${celsius} is outside ${MIN_TARGET_TEMPERATURE}-${MAX_TARGET_TEMPERATURE}°C`);
  }
}
