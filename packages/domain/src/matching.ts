import { normalizeNumber } from './phone.js';
import type { MappingSnapshot, SubscriberMatch } from './types.js';

export const LONGEST_SUFFIX = 12;
export const SHORTEST_SUFFIX = 6;

function keysEndingWith(mappings: MappingSnapshot, tail: string): string[] {
  const keys: string[] = [];
  for (const key of mappings.keys()) {
    if (key.endsWith(tail)) {
      keys.push(key);
    }
  }
  return keys;
}

/**
 * Resolves a raw inbound number against stored keys: exact key, then the
 * longest shared tail of 12 down to 6 digits, then any key ending with the
 * whole input. Keys are scanned in stored order and the first hit wins; the
 * other keys that also matched are reported as collisions.
 */
export function matchSubscriber(
  mappings: MappingSnapshot,
  rawNumber?: string | null
): SubscriberMatch | undefined {
  const digits = normalizeNumber(rawNumber);
  if (!digits) {
    return;
  }

  const exact = mappings.get(digits);
  if (exact !== undefined) {
    return { subscriberId: exact, key: digits, strategy: 'exact', collisions: [] };
  }

  for (let length = LONGEST_SUFFIX; length >= SHORTEST_SUFFIX; length--) {
    if (digits.length < length) {
      continue;
    }

    const [key, ...collisions] = keysEndingWith(mappings, digits.slice(-length));
    const subscriberId = key === undefined ? undefined : mappings.get(key);
    if (key !== undefined && subscriberId !== undefined) {
      return { subscriberId, key, strategy: 'suffix', suffixLength: length, collisions };
    }
  }

  const [key, ...collisions] = keysEndingWith(mappings, digits);
  const subscriberId = key === undefined ? undefined : mappings.get(key);
  if (key !== undefined && subscriberId !== undefined) {
    return { subscriberId, key, strategy: 'loose', collisions };
  }

  return;
}
