import type { Edge, Element, ElementDefinition, ElementGroup, JsonObject, Node } from '../types';
import { ElementsError, ValidationError } from './errors';
import { field, isPlainObject } from './fields';
import type { Decoded, Field, FieldMap, InferFields } from './fields';
import type { IdFactory } from './ids';

/** Builds the error thrown for a bad field; `path` is the field as the caller wrote it. */
export type FailureFactory = (path: string, reason: string) => Error;

/** Maps a field name between the in-memory spelling and an external one. */
export type KeyMapper = (key: string) => string;

const sameKey: KeyMapper = (key) => key;

// Top-level names with a fixed meaning; attributes may not use them.
const RESERVED_KEYS: readonly string[] = ['group', 'data', 'x', 'y'];

// These decide the group in inferGroup, so a node may not declare them.
const EDGE_ONLY_KEYS: readonly string[] = ['source', 'target'];

function lookup(fields: FieldMap, key: string): Field<unknown> | undefined {
  return Object.hasOwn(fields, key) ? fields[key] : undefined;
}

export function toRecord(value: object): Record<string, unknown> {
  return Object.fromEntries(Object.entries(value));
}

function conforms(record: Record<string, unknown>, fields: FieldMap, reserved: readonly string[] = []): boolean {
  for (const key of Object.keys(record)) {
    if (!reserved.includes(key) && !lookup(fields, key)) return false;
  }
  return Object.entries(fields).every(([key, codec]) => codec.accepts(record[key]));
}

function decodeFields(fields: FieldMap, input: Record<string, unknown>, fail: FailureFactory): Record<string, unknown> {
  const out: Record<string, unknown> = {};
  for (const [key, codec] of Object.entries(fields)) {
    const raw = input[key];
    const result: Decoded<unknown> = raw === undefined ? { ok: true, value: codec.defaultValue() } : codec.decode(raw);
    if (!result.ok) throw fail(key, `expected ${result.expected}`);
    if (result.value !== undefined) out[key] = result.value;
  }
  return out;
}

/**
 * Runtime schema of one element shape. `T` is the element type it produces; the field maps
 * decide which keys live under `data` and which sit next to it.
 */
export class ElementSchema<T extends object> {
  readonly group: ElementGroup;
  readonly data: FieldMap;
  readonly attributes: FieldMap;
  /** Identity fields that must be present and non-empty. */
  readonly required: readonly string[];

  constructor(group: ElementGroup, data: FieldMap, attributes: FieldMap, required: readonly string[] = []) {
    this.group = group;
    this.data = data;
    this.attributes = attributes;
    this.required = required;
  }

  get kind(): 'node' | 'edge' {
    return this.group === 'nodes' ? 'node' : 'edge';
  }

  is(value: unknown): value is T {
    return (
      isPlainObject(value) &&
      value.group === this.group &&
      isPlainObject(value.data) &&
      conforms(value.data, this.data) &&
      conforms(value, this.attributes, ['group', 'data'])
    );
  }

  /**
   * Build an element from flat fields. Identity fields go under `data`, `x`/`y` become
   * `position`, the rest are attributes. A missing or empty `id` is taken from `makeId`.
   */
  create(input: object, makeId: IdFactory): T {
    const fail: FailureFactory = (path, reason) =>
      new ValidationError(`${this.kind} field "${path}" ${reason}`, path);
    const data: Record<string, unknown> = {};
    const attributes: Record<string, unknown> = {};
    const coords: Record<string, unknown> = {};

    for (const [key, value] of Object.entries(input)) {
      if (value === undefined) continue;
      if (lookup(this.data, key)) data[key] = value;
      else if ((key === 'x' || key === 'y') && lookup(this.attributes, 'position')) coords[key] = value;
      else if (lookup(this.attributes, key)) attributes[key] = value;
      else throw fail(key, 'is not declared');
    }

    if ('x' in coords || 'y' in coords) {
      if (!('x' in coords)) throw fail('x', 'is required when "y" is given');
      if (!('y' in coords)) throw fail('y', 'is required when "x" is given');
      if (attributes['position'] !== undefined) throw fail('position', 'cannot be combined with "x" and "y"');
      for (const axis of ['x', 'y']) {
        const value = coords[axis];
        if (typeof value !== 'number' || !Number.isFinite(value)) throw fail(axis, 'expected number');
      }
      attributes['position'] = { x: coords['x'], y: coords['y'] };
    }

    if (data['id'] === undefined || data['id'] === '') data['id'] = makeId();
    return this.assemble(data, attributes, fail, '');
  }

  /**
   * Build an element from an external record (`data` plus sibling attributes). `group` is
   * read by the caller. `readKey` maps external `data` keys back to field names.
   */
  decode(definition: Record<string, unknown>, fail: FailureFactory, readKey: KeyMapper = sameKey): T {
    const rawData = definition['data'];
    if (!isPlainObject(rawData)) throw fail('data', 'must be an object');

    const data: Record<string, unknown> = {};
    for (const [key, value] of Object.entries(rawData)) {
      const name = readKey(key);
      if (!lookup(this.data, name)) throw fail(`data.${key}`, 'is not declared');
      if (name in data) throw fail(`data.${key}`, `duplicates "data.${name}"`);
      data[name] = value;
    }

    const attributes: Record<string, unknown> = {};
    for (const [key, value] of Object.entries(definition)) {
      if (key === 'group' || key === 'data') continue;
      if (!lookup(this.attributes, key)) throw fail(key, 'is not declared');
      attributes[key] = value;
    }

    return this.assemble(data, attributes, fail, 'data.');
  }

  /** Fields at their default value are left out. Keys no field declares are an error. */
  encode(element: T, writeKey: KeyMapper = sameKey): ElementDefinition {
    const record = toRecord(element);
    const data = isPlainObject(record['data']) ? record['data'] : {};
    this.assertDeclared(data, this.data, [], 'data.');
    this.assertDeclared(record, this.attributes, ['group', 'data'], '');
    const out: ElementDefinition = { group: this.group, data: this.encodeFields(this.data, data, writeKey) };
    for (const [key, value] of Object.entries(this.encodeFields(this.attributes, record, sameKey))) {
      out[key] = value;
    }
    return out;
  }

  private assertDeclared(
    values: Record<string, unknown>,
    fields: FieldMap,
    reserved: readonly string[],
    path: string,
  ): void {
    for (const key of Object.keys(values)) {
      if (reserved.includes(key) || lookup(fields, key)) continue;
      throw new ValidationError(`${this.kind} field "${path}${key}" is not declared`, `${path}${key}`);
    }
  }

  private encodeFields(fields: FieldMap, values: Record<string, unknown>, writeKey: KeyMapper): JsonObject {
    const out: JsonObject = {};
    for (const [key, codec] of Object.entries(fields)) {
      const value = values[key];
      if (value === undefined) continue;
      if (!codec.accepts(value)) {
        throw new ValidationError(`${this.kind} field "${key}" holds a value that is not ${codec.type}`, key);
      }
      if (codec.isDefault(value)) continue;
      out[writeKey(key)] = codec.encode(value);
    }
    return out;
  }

  private assemble(
    dataIn: Record<string, unknown>,
    attributesIn: Record<string, unknown>,
    fail: FailureFactory,
    dataPath: string,
  ): T {
    for (const key of ['id', ...this.required]) {
      const value = dataIn[key];
      if (value === undefined || value === '') throw fail(`${dataPath}${key}`, 'is required');
    }
    const data = decodeFields(this.data, dataIn, (key, reason) => fail(`${dataPath}${key}`, reason));
    const attributes = decodeFields(this.attributes, attributesIn, fail);
    const candidate = { group: this.group, data, ...attributes };
    if (!this.is(candidate)) throw fail(this.kind, 'does not match its schema');
    return candidate;
  }
}

export type ElementSchemas<N extends Node, E extends Edge> = {
  readonly node: ElementSchema<N>;
  readonly edge: ElementSchema<E>;
};

/** Element type produced by extending `T` with extra identity fields `D` and attributes `A`. */
export type Extended<T extends Element, D extends FieldMap, A extends FieldMap> = Omit<T, 'data'> & {
  data: T['data'] & InferFields<D>;
} & InferFields<A>;

export type SchemaExtension<D extends FieldMap, A extends FieldMap> = {
  /** Fields nested under `data` in external formats. */
  data?: D;
  /** Fields emitted next to `data`. */
  attributes?: A;
};

const displayFields = (pannable: boolean) => ({
  classes: field.string(),
  selected: field.boolean(false),
  selectable: field.boolean(true),
  locked: field.boolean(false),
  grabbable: field.boolean(true),
  pannable: field.boolean(pannable),
  scratch: field.record(),
});

export const nodeSchema = new ElementSchema<Node>(
  'nodes',
  { id: field.string(), parent: field.optional(field.string()), label: field.string() },
  { position: field.optional(field.position()), ...displayFields(false) },
);

export const edgeSchema = new ElementSchema<Edge>(
  'edges',
  {
    id: field.string(),
    source: field.string(),
    target: field.string(),
    label: field.string(),
    source_label: field.string(),
    target_label: field.string(),
  },
  displayFields(true),
  ['source', 'target'],
);

export const baseSchemas: ElementSchemas<Node, Edge> = { node: nodeSchema, edge: edgeSchema };

/**
 * Derive a schema with extra fields. Existing fields cannot be redefined.
 *
 * @example
 * const taskNode = extendSchema(nodeSchema, {
 *   data: { owner: field.string() },
 *   attributes: { tags: field.set(field.string()) },
 * });
 */
export function extendSchema<
  T extends Element,
  D extends FieldMap = Record<never, never>,
  A extends FieldMap = Record<never, never>,
>(base: ElementSchema<T>, extension: SchemaExtension<D, A>): ElementSchema<Extended<T, D, A>> {
  const data: FieldMap = extension.data ?? {};
  const attributes: FieldMap = extension.attributes ?? {};
  const taken = new Set([
    ...RESERVED_KEYS,
    ...(base.group === 'nodes' ? EDGE_ONLY_KEYS : []),
    ...Object.keys(base.data),
    ...Object.keys(base.attributes),
  ]);
  for (const key of [...Object.keys(data), ...Object.keys(attributes)]) {
    if (taken.has(key)) throw new ElementsError(`field "${key}" is already defined on ${base.kind}s`);
    taken.add(key);
  }
  return new ElementSchema<Extended<T, D, A>>(
    base.group,
    { ...base.data, ...data },
    { ...base.attributes, ...attributes },
    base.required,
  );
}

/**
 * The one rule that tells nodes from edges: any `source` or `target` makes an edge.
 */
export function inferGroup(fields: object): ElementGroup {
  const record = toRecord(fields);
  return record['source'] !== undefined || record['target'] !== undefined ? 'edges' : 'nodes';
}

export function describeElement(element: Element): string {
  return `${element.group === 'nodes' ? 'Node' : 'Edge'}(id="${element.data.id}")`;
}

export function isNodeElement<N extends Node, E extends Edge>(element: N | E): element is N {
  return element.group === 'nodes';
}

export function isEdgeElement<N extends Node, E extends Edge>(element: N | E): element is E {
  return element.group === 'edges';
}
