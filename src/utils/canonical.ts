import { createHash } from 'node:crypto';

/**
 * JSON serialization with object keys sorted at every depth, so equal
 * mappings serialize identically regardless of insertion order. Array order
 * is preserved. `undefined` members are dropped as JSON.stringify would.
 *
 * @throws TypeError for values JSON cannot represent exactly (non-finite
 *   numbers, bigint, Set, Map and other non-plain objects)
 */
export function canonicalStringify(value: unknown): string {
  return JSON.stringify(canonicalize(value)) ?? 'null';
}

function canonicalize(value: unknown): unknown {
  if (Array.isArray(value)) {
    return value.map((item) => (item === undefined ? null : canonicalize(item)));
  }
  if (value instanceof Date) {
    return value.toISOString();
  }
  if (typeof value === 'number' && !Number.isFinite(value)) {
    throw new TypeError(`Cannot canonicalize non-finite number ${value}`);
  }
  if (typeof value === 'bigint') {
    throw new TypeError('Cannot canonicalize a bigint');
  }
  if (value !== null && typeof value === 'object') {
    const proto: unknown = Object.getPrototypeOf(value);
    if (proto !== Object.prototype && proto !== null) {
      throw new TypeError(`Cannot canonicalize ${Object.prototype.toString.call(value)}`);
    }
    const sorted: Record<string, unknown> = {};
    for (const key of Object.keys(value).sort()) {
      const member: unknown = Reflect.get(value, key);
      if (member === undefined) continue;
      sorted[key] = canonicalize(member);
    }
    return sorted;
  }
  return value;
}

export function computeChecksum16(content: string | Buffer): string {
  return createHash('sha256').update(content).digest('hex').slice(0, 16);
}

/**
 * Order-independent 16-hex digest of a mapping.
 */
export function hashCanonical(value: unknown): string {
  return computeChecksum16(canonicalStringify(value));
}
