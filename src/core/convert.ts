import type { Edge, ElementDefinition, ElementGroup, Node } from '../types';
import { ParseError } from './errors';
import { isPlainObject } from './fields';
import { inferGroup, isNodeElement } from './schema';
import type { ElementSchemas, KeyMapper } from './schema';

/** Key mapping between in-memory field names and one external format. */
export type ElementFormat = {
  readonly name: string;
  readonly writeKey: KeyMapper;
  readonly readKey: KeyMapper;
};

// Interchange JSON spells these `data` keys with a hyphen.
const INTERCHANGE_KEYS: ReadonlyMap<string, string> = new Map([
  ['source_label', 'source-label'],
  ['target_label', 'target-label'],
]);
const INTERCHANGE_KEYS_INVERSE: ReadonlyMap<string, string> = new Map(
  [...INTERCHANGE_KEYS].map(([field, key]) => [key, field]),
);

/** Records passed to a visualization component; keys match field names. */
export const componentFormat: ElementFormat = {
  name: 'component',
  writeKey: (key) => key,
  readKey: (key) => key,
};

/** Cytoscape.js elements JSON. Underscored keys are read too. */
export const interchangeFormat: ElementFormat = {
  name: 'interchange',
  writeKey: (key) => INTERCHANGE_KEYS.get(key) ?? key,
  readKey: (key) => INTERCHANGE_KEYS_INVERSE.get(key) ?? key,
};

export function encodeElements<N extends Node, E extends Edge>(
  elements: Iterable<N | E>,
  schemas: ElementSchemas<N, E>,
  format: ElementFormat,
): ElementDefinition[] {
  const out: ElementDefinition[] = [];
  for (const element of elements) {
    out.push(
      isNodeElement<N, E>(element)
        ? schemas.node.encode(element, format.writeKey)
        : schemas.edge.encode(element, format.writeKey),
    );
  }
  return out;
}

function readGroup(definition: Record<string, unknown>, index: number): ElementGroup {
  const group = definition['group'];
  if (group === 'nodes' || group === 'edges') return group;
  if (group === undefined) {
    const data = definition['data'];
    return isPlainObject(data) ? inferGroup(data) : 'nodes';
  }
  throw new ParseError(`element ${index}: "group" must be "nodes" or "edges"`, { index, field: 'group' });
}

/**
 * Decode a list of element records. A record without `group` is classified by its `data`.
 */
export function decodeElements<N extends Node, E extends Edge>(
  definitions: unknown,
  schemas: ElementSchemas<N, E>,
  format: ElementFormat,
): Array<N | E> {
  if (!Array.isArray(definitions)) {
    throw new ParseError(`${format.name} elements must be an array`);
  }
  return definitions.map((definition: unknown, index): N | E => {
    if (!isPlainObject(definition)) {
      throw new ParseError(`element ${index}: must be an object`, { index });
    }
    const fail = (field: string, reason: string) =>
      new ParseError(`element ${index}: "${field}" ${reason}`, { index, field });
    return readGroup(definition, index) === 'nodes'
      ? schemas.node.decode(definition, fail, format.readKey)
      : schemas.edge.decode(definition, fail, format.readKey);
  });
}

export function parseInterchange(text: string): unknown {
  try {
    const parsed: unknown = JSON.parse(text);
    return parsed;
  } catch (error) {
    throw new ParseError(`invalid JSON: ${error instanceof Error ? error.message : String(error)}`);
  }
}
