import type { PolicyList, PolicyMap, PolicyValue } from './types.js';

export type ValueKind = 'null' | 'bool' | 'number' | 'string' | 'list' | 'map';

export const isList = (value: PolicyValue): value is PolicyList => Array.isArray(value);

export const isMap = (value: PolicyValue): value is PolicyMap =>
  typeof value === 'object' && value !== null && !Array.isArray(value);

export const kindOf = (value: PolicyValue): ValueKind => {
  if (value === null) {
    return 'null';
  }
  if (isList(value)) {
    return 'list';
  }
  switch (typeof value) {
    case 'boolean':
      return 'bool';
    case 'number':
      return 'number';
    case 'string':
      return 'string';
    default:
      return 'map';
  }
};

/**
 * Own-property lookup. Maps are plain objects, so inherited members such as
 * `constructor` must never be visible to expressions.
 */
export const hasField = (map: PolicyMap, field: string): boolean => Object.hasOwn(map, field);

export const getField = (map: PolicyMap, field: string): PolicyValue | undefined =>
  hasField(map, field) ? map[field] : undefined;

/**
 * Builds a map without a prototype from key/value pairs.
 */
export const createMap = (entries: Iterable<readonly [string, PolicyValue]>): PolicyMap => {
  const map: Record<string, PolicyValue> = Object.create(null);
  for (const [key, value] of entries) {
    map[key] = value;
  }
  return map;
};

/**
 * Converts decoded JSON (or anything shaped like it) into a policy value.
 * `undefined` and values JSON cannot carry become null.
 */
export const toPolicyValue = (input: unknown): PolicyValue => {
  if (input === null || input === undefined) {
    return null;
  }
  switch (typeof input) {
    case 'boolean':
    case 'string':
      return input;
    case 'number':
      return Number.isFinite(input) ? input : null;
    case 'object': {
      if (Array.isArray(input)) {
        return input.map((element: unknown) => toPolicyValue(element));
      }
      return createMap(
        Object.entries(input).map(([key, value]): [string, PolicyValue] => [key, toPolicyValue(value)])
      );
    }
    default:
      return null;
  }
};

/**
 * Structural equality. Values of different kinds are never equal.
 */
export const valuesEqual = (left: PolicyValue, right: PolicyValue): boolean => {
  if (isList(left)) {
    return (
      isList(right) &&
      left.length === right.length &&
      left.every((element, index) => {
        const other = right[index];
        return other !== undefined && valuesEqual(element, other);
      })
    );
  }

  if (isMap(left)) {
    if (!isMap(right)) {
      return false;
    }
    const leftKeys = Object.keys(left);
    if (leftKeys.length !== Object.keys(right).length) {
      return false;
    }
    return leftKeys.every((key) => {
      const leftValue = getField(left, key);
      const rightValue = getField(right, key);
      return leftValue !== undefined && rightValue !== undefined && valuesEqual(leftValue, rightValue);
    });
  }

  return left === right;
};
