/**
 * Commander option parsers.
 */
import { InvalidArgumentError } from 'commander';

export function parsePositiveInt(value: string): number {
  const n = Number(value);
  if (!Number.isInteger(n) || n <= 0) {
    throw new InvalidArgumentError(`Expected a positive integer, got '${value}'.`);
  }
  return n;
}

/** `a,b , c` → ['a', 'b', 'c'] */
export function parseFieldList(value: string): string[] {
  const fields = value.split(',').map((f) => f.trim()).filter(Boolean);
  if (fields.length === 0) throw new InvalidArgumentError('Expected a comma-separated list of field names.');
  return fields;
}
