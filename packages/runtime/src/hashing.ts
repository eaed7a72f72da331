// 32-bit hash primitives shared by value and entity equality

const scratch = new DataView(new ArrayBuffer(8));
const identityHashes = new WeakMap<object, number>();
let nextIdentityHash = 1;

/**
 * Polynomial (31) string hash.
 */
export function hashString(value: string): number {
  let hash = 0;
  for (let i = 0; i < value.length; i++) {
    hash = (Math.imul(hash, 31) + value.charCodeAt(i)) | 0;
  }
  return hash;
}

/**
 * Hash a number so that values equal under SameValueZero hash alike.
 */
export function hashNumber(value: number): number {
  // -0 | 0 === 0, so both zeros land here
  if (Number.isInteger(value) && value >= -0x80000000 && value <= 0x7fffffff) {
    return value | 0;
  }
  if (Number.isNaN(value)) {
    return 0x7ff80000;
  }
  scratch.setFloat64(0, value);
  return (scratch.getInt32(0) ^ scratch.getInt32(4)) | 0;
}

/**
 * Stable per-object hash for values compared by reference.
 */
export function identityHash(value: object): number {
  let hash = identityHashes.get(value);
  if (hash === undefined) {
    hash = nextIdentityHash;
    nextIdentityHash = (nextIdentityHash + 1) | 0;
    identityHashes.set(value, hash);
  }
  return hash;
}

/**
 * Hash any primitive. Objects fall back to identity.
 */
export function hashPrimitive(value: unknown): number {
  switch (typeof value) {
    case 'undefined':
      return 0;
    case 'string':
      return hashString(value);
    case 'number':
      return hashNumber(value);
    case 'boolean':
      return value ? 1231 : 1237;
    case 'bigint':
      return hashString(value.toString());
    case 'symbol':
      return hashString(value.toString());
    case 'function':
    case 'object':
      return value === null ? 0 : identityHash(value);
  }
  return 0;
}

/**
 * Order-sensitive combination: seed 17, then seed * 23 + hash per element.
 */
export function combineHashes(hashes: Iterable<number>): number {
  let seed = 17;
  for (const hash of hashes) {
    seed = (Math.imul(seed, 23) + hash) | 0;
  }
  return seed;
}
