import type { Json, JsonObject, Position } from '../types';

export type Decoded<T> = { ok: true; value: T } | { ok: false; expected: string };

/**
 * Runtime description of one element field.
 *
 * `isDefault` decides omission on output, so a field whose default is `0` or `false`
 * still emits any other value, and a field defaulting to `true` emits `false`.
 */
export interface Field<T> {
  /** Type name used in error messages. */
  readonly type: string;
  defaultValue(): T;
  isDefault(value: T): boolean;
  /** Strict check of an in-memory value. */
  accepts(value: unknown): value is T;
  /** Lenient conversion from caller input or parsed JSON. */
  decode(raw: unknown): Decoded<T>;
  encode(value: T): Json;
}

export type FieldMap = { readonly [key: string]: Field<unknown> };

export type FieldValue<F> = F extends Field<infer T> ? T : never;

type OptionalKeys<F extends FieldMap> = {
  [K in keyof F]: undefined extends FieldValue<F[K]> ? K : never;
}[keyof F];

type RequiredKeys<F extends FieldMap> = Exclude<keyof F, OptionalKeys<F>>;

/** Object type described by a field map; fields that may be undefined become optional. */
export type InferFields<F extends FieldMap> = { [K in RequiredKeys<F>]: FieldValue<F[K]> } & {
  [K in OptionalKeys<F>]?: FieldValue<F[K]>;
};

export function isPlainObject(value: unknown): value is Record<string, unknown> {
  if (typeof value !== 'object' || value === null || Array.isArray(value)) return false;
  const proto: unknown = Object.getPrototypeOf(value);
  return proto === Object.prototype || proto === null;
}

export function isJson(value: unknown): value is Json {
  if (value === null) return true;
  switch (typeof value) {
    case 'string':
    case 'boolean':
      return true;
    case 'number':
      return Number.isFinite(value);
    default:
      if (Array.isArray(value)) return value.every(isJson);
      return isPlainObject(value) && Object.values(value).every(isJson);
  }
}

export function jsonEqual(a: unknown, b: unknown): boolean {
  if (Object.is(a, b)) return true;
  if (Array.isArray(a) && Array.isArray(b)) {
    return a.length === b.length && a.every((v, i) => jsonEqual(v, b[i]));
  }
  if (isPlainObject(a) && isPlainObject(b)) {
    const keys = Object.keys(a);
    return keys.length === Object.keys(b).length && keys.every((k) => k in b && jsonEqual(a[k], b[k]));
  }
  return false;
}

export function cloneJson(value: Json): Json {
  if (Array.isArray(value)) return value.map(cloneJson);
  if (typeof value === 'object' && value !== null) return cloneJsonObject(value);
  return value;
}

export function cloneJsonObject(value: JsonObject): JsonObject {
  return Object.fromEntries(Object.entries(value).map(([key, entry]): [string, Json] => [key, cloneJson(entry)]));
}

function scalar<T extends string | number | boolean>(
  type: string,
  defaultValue: T,
  accepts: (value: unknown) => value is T,
): Field<T> {
  return {
    type,
    defaultValue: () => defaultValue,
    isDefault: (value) => value === defaultValue,
    accepts,
    decode: (raw) => (accepts(raw) ? { ok: true, value: raw } : { ok: false, expected: type }),
    encode: (value) => value,
  };
}

const isString = (value: unknown): value is string => typeof value === 'string';
const isBoolean = (value: unknown): value is boolean => typeof value === 'boolean';
const isFiniteNumber = (value: unknown): value is number =>
  typeof value === 'number' && Number.isFinite(value);

function string(defaultValue = ''): Field<string> {
  return scalar('string', defaultValue, isString);
}

function boolean(defaultValue = false): Field<boolean> {
  return scalar('boolean', defaultValue, isBoolean);
}

function number(defaultValue = 0): Field<number> {
  return scalar('number', defaultValue, isFiniteNumber);
}

/**
 * Wraps a field so it may be absent; absence is its default. The inner default (`''` for a
 * string) means absent too and decodes to `undefined`.
 */
function optional<T>(inner: Field<T>): Field<T | undefined> {
  return {
    type: `${inner.type} | undefined`,
    defaultValue: () => undefined,
    isDefault: (value) => value === undefined || inner.isDefault(value),
    accepts: (value): value is T | undefined => value === undefined || inner.accepts(value),
    decode: (raw) => {
      if (raw === undefined) return { ok: true, value: undefined };
      const result = inner.decode(raw);
      return result.ok && inner.isDefault(result.value) ? { ok: true, value: undefined } : result;
    },
    encode: (value) => (value === undefined ? null : inner.encode(value)),
  };
}

function position(): Field<Position> {
  const accepts = (value: unknown): value is Position =>
    isPlainObject(value) &&
    Object.keys(value).length === 2 &&
    isFiniteNumber(value.x) &&
    isFiniteNumber(value.y);
  return {
    type: '{ x: number, y: number }',
    defaultValue: () => ({ x: 0, y: 0 }),
    isDefault: () => false,
    accepts,
    decode: (raw) =>
      accepts(raw) ? { ok: true, value: { x: raw.x, y: raw.y } } : { ok: false, expected: '{ x: number, y: number }' },
    encode: (value) => ({ x: value.x, y: value.y }),
  };
}

function decodeItems<T>(raw: readonly unknown[], item: Field<T>): T[] | undefined {
  const out: T[] = [];
  for (const entry of raw) {
    const result = item.decode(entry);
    if (!result.ok) return undefined;
    out.push(result.value);
  }
  return out;
}

function list<T>(item: Field<T>): Field<T[]> {
  const type = `${item.type}[]`;
  return {
    type,
    defaultValue: () => [],
    isDefault: (value) => value.length === 0,
    accepts: (value): value is T[] => Array.isArray(value) && value.every((v) => item.accepts(v)),
    decode: (raw) => {
      const items = Array.isArray(raw) ? decodeItems(raw, item) : undefined;
      return items ? { ok: true, value: items } : { ok: false, expected: type };
    },
    encode: (value) => value.map((v) => item.encode(v)),
  };
}

/** A set of values; external formats carry it as a JSON array. */
function set<T>(item: Field<T>): Field<Set<T>> {
  const type = `Set<${item.type}>`;
  return {
    type,
    defaultValue: () => new Set<T>(),
    isDefault: (value) => value.size === 0,
    accepts: (value): value is Set<T> => value instanceof Set && [...value].every((v) => item.accepts(v)),
    decode: (raw) => {
      const source: unknown[] | undefined = raw instanceof Set ? [...raw] : Array.isArray(raw) ? raw : undefined;
      const items = source ? decodeItems(source, item) : undefined;
      return items ? { ok: true, value: new Set(items) } : { ok: false, expected: type };
    },
    encode: (value) => [...value].map((v) => item.encode(v)),
  };
}

/** An open string-keyed mapping of JSON values, like `scratch`. */
function record(): Field<JsonObject> {
  const accepts = (value: unknown): value is JsonObject => isPlainObject(value) && isJson(value);
  return {
    type: 'object',
    defaultValue: () => ({}),
    isDefault: (value) => Object.keys(value).length === 0,
    accepts,
    decode: (raw) => (accepts(raw) ? { ok: true, value: cloneJsonObject(raw) } : { ok: false, expected: 'object' }),
    encode: (value) => cloneJsonObject(value),
  };
}

export const field = {
  string,
  boolean,
  number,
  optional,
  position,
  list,
  set,
  record,
};
