import { timingSafeEqual } from 'node:crypto';

/**
 * Constant-time string comparison. Strings of different length are unequal.
 */
export function secureEquals(left: string, right: string): boolean {
  const leftBuffer = Buffer.from(left);
  const rightBuffer = Buffer.from(right);

  if (leftBuffer.length !== rightBuffer.length) {
    return false;
  }

  return timingSafeEqual(leftBuffer, rightBuffer);
}
