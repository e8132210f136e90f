/**
 * @arch codeout.core.domain
 *
 * Artifact identifier resolution.
 */
import type { Clock } from './types.js';

function pad(value: number): string {
  return String(value).padStart(2, '0');
}

/**
 * Build a timestamp identifier such as `out_2026_1018_142507` (UTC).
 * Resolution is one second: two calls within the same second collide.
 */
export function defaultIdentifier(prefix: string, now: Date): string {
  const date = `${pad(now.getUTCMonth() + 1)}${pad(now.getUTCDate())}`;
  const time = `${pad(now.getUTCHours())}${pad(now.getUTCMinutes())}${pad(now.getUTCSeconds())}`;
  return `${prefix}_${now.getUTCFullYear()}_${date}_${time}`;
}

/**
 * Use the caller's identifier unchanged, or fall back to a timestamp name.
 */
export function resolveIdentifier(
  identifier: string | undefined,
  prefix: string,
  clock: Clock = () => new Date()
): string {
  return identifier ?? defaultIdentifier(prefix, clock());
}
