/**
 * Option parsers shared by the command modules.
 *
 * @module cli/commands/shared
 */

import { InvalidArgumentError } from 'commander';

/**
 * Collect a repeatable option into an array.
 */
export function collect(value: string, previous: string[]): string[] {
  return [...previous, value];
}

/**
 * Parse a positive integer option.
 */
export function parsePositiveInt(value: string): number {
  const parsed = Number(value);
  if (!Number.isInteger(parsed) || parsed < 1) {
    throw new InvalidArgumentError('Must be a positive integer.');
  }
  return parsed;
}
