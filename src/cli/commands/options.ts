import { InvalidArgumentError } from 'commander';

/**
 * commander option parser for non-negative integers.
 */
export function parseInteger(value: string, flag: string): number {
  const parsed = Number(value);
  if (!Number.isInteger(parsed) || parsed < 0) {
    throw new InvalidArgumentError(`${flag} expects a non-negative integer, got '${value}'`);
  }
  return parsed;
}
