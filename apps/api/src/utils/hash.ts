import crypto from 'node:crypto';

export function safeEqual(provided: string | undefined, expected: string): boolean {
  if (provided === undefined) {
    return false;
  }

  const a = Buffer.from(provided);
  const b = Buffer.from(expected);
  return a.length === b.length && crypto.timingSafeEqual(a, b);
}
