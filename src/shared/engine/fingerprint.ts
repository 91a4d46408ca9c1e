/**
 * Canonical fingerprints of replicated state.
 *
 * Replicas that applied the same ordered event stream must hold equal state;
 * these helpers turn a state into a string (and a compact hash) that is
 * independent of property insertion order, so two replicas can be compared
 * by exchanging a short hash rather than the whole state.
 *
 * Format rules:
 * - object keys are sorted; members whose value is `undefined` or a function
 *   are skipped
 * - `Map` entries and `Set` members are sorted by their own fingerprint
 * - non-finite numbers render as `null`, bigints as `<digits>n`
 * - class instances are fingerprinted by their own enumerable fields
 */

function fingerprintNumber(value: number): string {
  return Number.isFinite(value) ? JSON.stringify(value) : 'null';
}

function fingerprintEntries(entries: Array<[string, string]>): string {
  entries.sort((a, b) => (a[0] < b[0] ? -1 : a[0] > b[0] ? 1 : 0));
  return `{${entries.map(([key, value]) => `${JSON.stringify(key)}:${value}`).join(',')}}`;
}

export function fingerprintState(value: unknown): string {
  if (value === null || value === undefined) {
    return 'null';
  }

  switch (typeof value) {
    case 'string':
      return JSON.stringify(value);
    case 'number':
      return fingerprintNumber(value);
    case 'boolean':
      return value ? 'true' : 'false';
    case 'bigint':
      return `${value.toString()}n`;
    case 'function':
    case 'symbol':
      return 'null';
    default:
      break;
  }

  if (Array.isArray(value)) {
    return `[${value.map((item) => fingerprintState(item)).join(',')}]`;
  }

  if (value instanceof Map) {
    const entries = Array.from(value.entries()).map(
      ([key, item]) => `[${fingerprintState(key)},${fingerprintState(item)}]`
    );
    entries.sort();
    return `Map[${entries.join(',')}]`;
  }

  if (value instanceof Set) {
    const members = Array.from(value.values()).map((item) => fingerprintState(item));
    members.sort();
    return `Set[${members.join(',')}]`;
  }

  if (value instanceof Date) {
    return JSON.stringify(value.toISOString());
  }

  const entries: Array<[string, string]> = [];
  for (const [key, item] of Object.entries(value)) {
    if (item === undefined || typeof item === 'function') continue;
    entries.push([key, fingerprintState(item)]);
  }
  return fingerprintEntries(entries);
}

/**
 * Compact 64-bit string hash rendered as 16 hex chars.
 *
 * Not cryptographically secure; only meant for replica comparison.
 */
function simpleHash(str: string): string {
  let h1 = 0xdeadbeef | 0;
  let h2 = 0x41c6ce57 | 0;

  for (let i = 0; i < str.length; i += 1) {
    const ch = str.charCodeAt(i);
    h1 = Math.imul(h1 ^ ch, 2654435761) | 0;
    h2 = Math.imul(h2 ^ ch, 1597334677) | 0;
  }

  h1 = (Math.imul(h1 ^ (h1 >>> 16), 2246822507) ^ Math.imul(h2 ^ (h2 >>> 13), 3266489909)) | 0;
  h2 = (Math.imul(h2 ^ (h2 >>> 16), 2246822507) ^ Math.imul(h1 ^ (h1 >>> 13), 3266489909)) | 0;

  const hi = h2 >>> 0;
  const lo = h1 >>> 0;
  return hi.toString(16).padStart(8, '0') + lo.toString(16).padStart(8, '0');
}

/**
 * Hash of {@link fingerprintState}, 16 lowercase hex chars.
 */
export function hashState(value: unknown): string {
  return simpleHash(fingerprintState(value));
}
