import { InvalidArgumentError } from 'commander';

/**
 * Commander argument parser for non-negative integer options
 */
export function parseInteger(value: string): number {
  const parsed = Number.parseInt(value, 10);
  if (!Number.isFinite(parsed) || parsed < 0 || String(parsed) !== value.trim()) {
    throw new InvalidArgumentError('Expected a non-negative integer.');
  }
  return parsed;
}
