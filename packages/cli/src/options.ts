import { InvalidArgumentError } from 'commander';
import { FORMATION_TYPES, FormationTypeSchema, type FormationType } from '@swarmkit/formation';

/**
 * Option parsers for commander. Each throws InvalidArgumentError, which
 * commander reports against the offending option.
 */

export function parseCount(value: string): number {
  const parsed = Number(value);
  if (value.trim() === '' || !Number.isInteger(parsed) || parsed < 0) {
    throw new InvalidArgumentError('Not a non-negative integer.');
  }
  return parsed;
}

export function parseNumber(value: string): number {
  const parsed = Number(value);
  if (value.trim() === '' || !Number.isFinite(parsed)) {
    throw new InvalidArgumentError('Not a number.');
  }
  return parsed;
}

export function parseFormationType(value: string): FormationType {
  const result = FormationTypeSchema.safeParse(value);
  if (!result.success) {
    throw new InvalidArgumentError(`Expected one of: ${FORMATION_TYPES.join(', ')}.`);
  }
  return result.data;
}
