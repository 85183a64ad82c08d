import type { Element, ElementId } from '../types';
import { InvalidQueryError } from './errors';
import { isPlainObject, jsonEqual } from './fields';
import { toRecord } from './schema';

/**
 * Identity/relationship query used by get, filter and remove. Every given criterion must match.
 * - `id` considers nodes and edges
 * - `source` and `target` consider edges only
 * - `parent` considers nodes only
 */
export type ElementQuery = {
  id?: ElementId;
  source?: ElementId;
  target?: ElementId;
  parent?: ElementId;
};

const QUERY_KEYS: readonly string[] = ['id', 'source', 'target', 'parent'];

/** Attribute criteria used by select; keys are looked up in `data` first, then next to it. */
export type AttributeCriteria = Readonly<Record<string, unknown>>;

export function assertQuery(query: ElementQuery): void {
  const record = toRecord(query);
  const extra = Object.keys(record).filter((key) => !QUERY_KEYS.includes(key));
  if (extra.length > 0) {
    throw new InvalidQueryError(`unsupported query keys: ${extra.join(', ')}`, record);
  }
  const given = QUERY_KEYS.filter((key) => record[key] !== undefined);
  if (given.length === 0) {
    throw new InvalidQueryError('query needs at least one of id, source, target or parent', record);
  }
  for (const key of given) {
    if (typeof record[key] !== 'string') {
      throw new InvalidQueryError(`query key "${key}" must be a string`, record);
    }
  }
}

export function matchesQuery(element: Element, query: ElementQuery): boolean {
  if (query.id !== undefined && element.data.id !== query.id) return false;
  if (query.source !== undefined || query.target !== undefined) {
    if (element.group !== 'edges') return false;
    if (query.source !== undefined && element.data.source !== query.source) return false;
    if (query.target !== undefined && element.data.target !== query.target) return false;
  }
  if (query.parent !== undefined) {
    if (element.group !== 'nodes' || element.data.parent !== query.parent) return false;
  }
  return true;
}

export function assertCriteria(criteria: AttributeCriteria): void {
  if (Object.values(criteria).every((value) => value === undefined)) {
    throw new InvalidQueryError('select needs at least one criterion', criteria);
  }
}

function classTokens(value: string): string[] {
  return value.split(/\s+/).filter(Boolean);
}

function contains(items: readonly unknown[], expected: unknown): boolean {
  const wanted = expected instanceof Set ? [...expected] : Array.isArray(expected) ? expected : [expected];
  return wanted.every((w) => items.some((item) => jsonEqual(item, w)));
}

function matchesValue(key: string, actual: unknown, expected: unknown): boolean {
  if (expected instanceof RegExp) return typeof actual === 'string' && actual.search(expected) !== -1;
  if (key === 'classes' && typeof actual === 'string' && typeof expected === 'string') {
    const have = new Set(classTokens(actual));
    return classTokens(expected).every((c) => have.has(c));
  }
  if (Array.isArray(actual)) return contains(actual, expected);
  if (actual instanceof Set) return contains([...actual], expected);
  if (isPlainObject(actual) && isPlainObject(expected)) {
    return Object.entries(expected).every(([k, v]) => k in actual && jsonEqual(actual[k], v));
  }
  return jsonEqual(actual, expected);
}

/**
 * Attribute matching for select:
 * - `classes`: the element has every given class
 * - list and set fields: contain the item, or every item of a given array or set
 * - object fields: contain every given entry
 * - a RegExp matches string fields it finds a match in
 * - anything else compares by value
 * Keys the element does not have never match.
 */
export function matchesAttributes(element: Element, criteria: AttributeCriteria): boolean {
  const data = toRecord(element.data);
  const top = toRecord(element);
  return Object.entries(criteria).every(([key, expected]) => {
    if (expected === undefined) return true;
    if (key !== 'group' && key !== 'data' && Object.hasOwn(data, key)) {
      return matchesValue(key, data[key], expected);
    }
    if (key !== 'data' && Object.hasOwn(top, key)) return matchesValue(key, top[key], expected);
    return false;
  });
}
