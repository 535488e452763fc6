/**
 * Canonical, order-stable representation of arbitrary values.
 * Two values with the same canonical JSON are treated as structurally equal.
 */

/**
 * Converts a value into a JSON-safe structure with sorted object keys.
 * Date, RegExp, BigInt, Map, Set, class instances and non-finite numbers are tagged so they survive
 * serialization without colliding with plain strings.
 */
export const canonicalize = (value: unknown): unknown => {
  if (value === null || typeof value === 'string' || typeof value === 'boolean') {
    return value;
  }

  if (value === undefined) {
    return { __type: 'Undefined' };
  }

  if (typeof value === 'number') {
    return Number.isFinite(value) ? value : { __type: 'Number', value: String(value) };
  }

  if (typeof value === 'bigint') {
    return { __type: 'BigInt', value: value.toString() };
  }

  if (value instanceof Date) {
    return { __type: 'Date', value: value.getTime() };
  }

  if (Array.isArray(value)) {
    return value.map(canonicalize);
  }

  if (value instanceof Map) {
    return {
      __type: 'Map',
      value: Array.from(value.entries(), ([k, v]) => [canonicalize(k), canonicalize(v)]),
    };
  }

  if (value instanceof Set) {
    return { __type: 'Set', value: Array.from(value, canonicalize) };
  }

  if (value instanceof RegExp) {
    return { __type: 'RegExp', value: String(value) };
  }

  if (typeof value === 'object' && value !== null) {
    const record = canonicalRecord(value);
    const prototype: unknown = Object.getPrototypeOf(value);
    if (prototype === Object.prototype || prototype === null) {
      return record;
    }

    // class instances: prefer toJSON, then public fields, then the string form
    const owner: unknown = Reflect.get(value, 'constructor');
    const toJSON: unknown = Reflect.get(value, 'toJSON');
    let state: unknown;
    if (typeof toJSON === 'function') {
      state = canonicalize(Reflect.apply(toJSON, value, []));
    } else if (Object.keys(record).length > 0) {
      state = record;
    } else {
      state = String(value);
    }
    return { __type: typeof owner === 'function' ? owner.name : 'Object', value: state };
  }

  // functions and symbols only have an identity, not a structure
  return { __type: typeof value, value: String(value) };
};

const canonicalRecord = (value: object): Record<string, unknown> => {
  const record: Record<string, unknown> = {};
  for (const [key, entry] of Object.entries(value).sort(([a], [b]) => (a < b ? -1 : a > b ? 1 : 0))) {
    if (entry === undefined) continue;
    record[key] = canonicalize(entry);
  }
  return record;
};

/**
 * Serializes a value canonically.
 */
export const canonicalJson = (value: unknown): string => JSON.stringify(canonicalize(value));
