import { ArgumentTypeError } from '../errors/errors.js';

/**
 * Branded type for cache keys.
 * Prevents accidental use of raw resource names as keys of the pending set.
 */
export type CacheKey = string & { __brand: 'CacheKey' };

/**
 * Identifier accepted as a resource name or a declared dependency.
 */
export const ID_PATTERN = /^[a-z][a-z_0-9]*$/i;

export function isIdentifier(x: unknown): x is string {
  return typeof x === 'string' && ID_PATTERN.test(x);
}

/**
 * Build the cache key of a resource instance.
 *
 * The no-argument instance is keyed by the bare name, others as `name@argument`.
 *
 * @example
 * ```typescript
 * cacheKey('dbh', '');        // 'dbh'
 * cacheKey('redis', 'lock');  // 'redis@lock'
 * ```
 */
export function cacheKey(name: string, argument: string): CacheKey {
  return (argument === '' ? name : `${name}@${argument}`) as CacheKey;
}

/**
 * Runtime type guard for values usable as an argument.
 */
export function isScalar(x: unknown): x is string | number | bigint | boolean {
  const type = typeof x;
  return type === 'string' || type === 'number' || type === 'bigint' || type === 'boolean';
}

/**
 * Normalize a caller-supplied argument to its string form.
 *
 * @param resource - Resource name, for error reporting
 * @param argument - Raw argument; `undefined` and `null` mean "no argument"
 * @throws ArgumentTypeError if the argument is not a scalar
 */
export function normalizeArgument(resource: string, argument: unknown): string {
  if (argument === undefined || argument === null) return '';
  if (!isScalar(argument)) {
    throw new ArgumentTypeError(resource, Array.isArray(argument) ? 'array' : typeof argument);
  }
  return String(argument);
}
