import { setTimeout as delay } from 'node:timers/promises';

export async function sleep(ms: number): Promise<void> {
  if (ms <= 0) return;
  await delay(ms);
}

/**
 * True when every element equals the first (vacuously true for 0 or 1 items).
 */
export function allEqual<T>(values: readonly T[]): boolean {
  return values.every((v) => v === values[0]);
}

/**
 * Set equality, ignoring order and duplicates.
 */
export function sameMembers(a: readonly string[], b: readonly string[]): boolean {
  const left = new Set(a);
  const right = new Set(b);
  if (left.size !== right.size) return false;
  for (const item of left) {
    if (!right.has(item)) return false;
  }
  return true;
}
