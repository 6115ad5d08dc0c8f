// Value helpers for rule evaluation: deep equality, ordering, truthiness

/**
 * Check if a value is a plain object (not an array, not null).
 */
export function isPlainObject(value: unknown): value is { readonly [key: string]: unknown } {
  if (typeof value !== 'object' || value === null || Array.isArray(value)) {
    return false;
  }
  const proto: unknown = Object.getPrototypeOf(value);
  return proto === Object.prototype || proto === null;
}

/**
 * Deep equality over strings, numbers, booleans, null, arrays and plain objects.
 * No type coercion: 1 and '1' are different values. Primitives compare with
 * `===`, so 0 equals -0 and NaN equals nothing.
 */
export function valuesEqual(a: unknown, b: unknown): boolean {
  if (a === b) return true;

  if (Array.isArray(a) && Array.isArray(b)) {
    return a.length === b.length && a.every((item, i) => valuesEqual(item, b[i]));
  }

  if (isPlainObject(a) && isPlainObject(b)) {
    const keys = Object.keys(a);
    if (keys.length !== Object.keys(b).length) return false;
    return keys.every((key) => Object.hasOwn(b, key) && valuesEqual(a[key], b[key]));
  }

  return false;
}

/**
 * Order two values.
 *
 * Numbers and strings compare naturally; arrays compare lexicographically.
 * Returns undefined when the values are not mutually orderable.
 */
export function compareValues(a: unknown, b: unknown): number | undefined {
  if (typeof a === 'number' && typeof b === 'number') {
    if (Number.isNaN(a) || Number.isNaN(b)) return undefined;
    return a === b ? 0 : a < b ? -1 : 1;
  }

  if (typeof a === 'string' && typeof b === 'string') {
    return a === b ? 0 : a < b ? -1 : 1;
  }

  if (Array.isArray(a) && Array.isArray(b)) {
    const shared = Math.min(a.length, b.length);
    for (let i = 0; i < shared; i++) {
      const result = compareValues(a[i], b[i]);
      if (result !== 0) return result;
    }
    return a.length === b.length ? 0 : a.length < b.length ? -1 : 1;
  }

  return undefined;
}

/**
 * Truthiness where empty arrays and empty objects count as false.
 */
export function isTruthy(value: unknown): boolean {
  if (Array.isArray(value)) return value.length > 0;
  if (isPlainObject(value)) return Object.keys(value).length > 0;
  return Boolean(value);
}

/**
 * Check if a sequence contains a value (deep equality).
 */
export function includesValue(values: readonly unknown[], value: unknown): boolean {
  return values.some((item) => valuesEqual(item, value));
}
