import { InvalidArgumentError } from 'commander';

/**
 * Parse `--max-rounds`. Returns undefined when the flag is absent.
 */
export function parseRounds(value: string | undefined): number | undefined {
  if (value === undefined) return undefined;
  const rounds = Number.parseInt(value, 10);
  if (!Number.isInteger(rounds) || rounds < 1 || String(rounds) !== value.trim()) {
    throw new InvalidArgumentError(`--max-rounds must be a positive integer, got "${value}"`);
  }
  return rounds;
}
