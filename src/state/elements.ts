import type { StoreApi } from 'zustand/vanilla';
import {
  componentFormat,
  decodeElements,
  encodeElements,
  interchangeFormat,
  parseInterchange,
} from '../core/convert';
import { ElementsError } from '../core/errors';
import { createElementId } from '../core/ids';
import type { IdFactory } from '../core/ids';
import { assertCriteria, assertQuery, matchesAttributes, matchesQuery } from '../core/query';
import type { AttributeCriteria, ElementQuery } from '../core/query';
import { baseSchemas, describeElement, inferGroup, isEdgeElement, isNodeElement } from '../core/schema';
import type { ElementSchemas } from '../core/schema';
import type { Edge, Element, ElementDefinition, ElementId, Node } from '../types';
import { createElementsStore } from './store';
import type { ElementsStore } from './store';

type FlatFields<T extends Element> = Partial<Omit<T, 'group' | 'data' | 'position'>> & Partial<T['data']>;

/** Fields accepted by add() for a node: identity and attribute fields side by side, plus `x`/`y`. */
export type NodeInput<N extends Node = Node> = FlatFields<N> & {
  x?: number;
  y?: number;
  source?: undefined;
  target?: undefined;
};

/** Fields accepted by add() for an edge; `source` and `target` make it one. */
export type EdgeInput<E extends Edge = Edge> = FlatFields<E> & {
  source: ElementId;
  target: ElementId;
};

export type ElementsOptions = {
  /** Source of ids for elements added without one. Defaults to a process-unique generator. */
  idFactory?: IdFactory;
};

const MAX_ID_ATTEMPTS = 100;

/**
 * Ordered collection of nodes and edges, generic over the element shapes so that extended
 * schemas reuse all of its logic. Elements are returned by reference; mutating one in place
 * changes the stored element without notifying store subscribers.
 */
export class GenericElements<N extends Node = Node, E extends Edge = Edge> implements Iterable<N | E> {
  readonly schemas: ElementSchemas<N, E>;
  readonly store: StoreApi<ElementsStore<N, E>>;
  private readonly idFactory: IdFactory;

  constructor(schemas: ElementSchemas<N, E>, options: ElementsOptions = {}) {
    this.schemas = schemas;
    this.store = createElementsStore<N, E>();
    this.idFactory = options.idFactory ?? createElementId;
  }

  get size(): number {
    return this.list().length;
  }

  [Symbol.iterator](): Iterator<N | E> {
    return this.list()[Symbol.iterator]();
  }

  nodes(): N[] {
    return this.list().filter((element): element is N => isNodeElement<N, E>(element));
  }

  edges(): E[] {
    return this.list().filter((element): element is E => isEdgeElement<N, E>(element));
  }

  /**
   * Create an element from flat fields and append it. `source` or `target` makes an edge;
   * anything else is a node. Returns the stored element, so a generated id can be read back.
   */
  add(fields: EdgeInput<E>): E;
  add(fields: NodeInput<N>): N;
  add(fields: NodeInput<N> | EdgeInput<E>): N | E {
    const element: N | E =
      inferGroup(fields) === 'edges'
        ? this.schemas.edge.create(fields, this.nextId)
        : this.schemas.node.create(fields, this.nextId);
    this.store.getState().append(element);
    return element;
  }

  /** First element matching the query, in insertion order. */
  get(query: ElementQuery = {}): N | E | undefined {
    assertQuery(query);
    return this.list().find((element) => matchesQuery(element, query));
  }

  filter(query: ElementQuery = {}): Array<N | E> {
    assertQuery(query);
    return this.list().filter((element) => matchesQuery(element, query));
  }

  /** Remove every match. An invalid query throws before anything is removed. */
  remove(query: ElementQuery = {}): Array<N | E> {
    assertQuery(query);
    return this.store.getState().removeWhere((element) => matchesQuery(element, query));
  }

  /** Elements whose attributes match every criterion; see {@link matchesAttributes}. */
  select(criteria: AttributeCriteria): Array<N | E> {
    assertCriteria(criteria);
    return this.list().filter((element) => matchesAttributes(element, criteria));
  }

  clear(): void {
    this.store.getState().replace([]);
  }

  toComponentElements(): ElementDefinition[] {
    return encodeElements(this.list(), this.schemas, componentFormat);
  }

  /** Interchange records; lets `JSON.stringify(elements)` produce interchange JSON. */
  toJSON(): ElementDefinition[] {
    return encodeElements(this.list(), this.schemas, interchangeFormat);
  }

  serialize(indent = 4): string {
    return JSON.stringify(this.toJSON(), null, indent);
  }

  /** Replace the contents with decoded component-format records. Nothing changes on error. */
  load(definitions: unknown): this {
    this.store.getState().replace(decodeElements(definitions, this.schemas, componentFormat));
    return this;
  }

  /** Replace the contents with parsed interchange JSON. Nothing changes on error. */
  loadJSON(text: string): this {
    this.store.getState().replace(decodeElements(parseInterchange(text), this.schemas, interchangeFormat));
    return this;
  }

  toString(): string {
    return `[${this.list().map(describeElement).join(', ')}]`;
  }

  private list(): ReadonlyArray<N | E> {
    return this.store.getState().elements;
  }

  private readonly nextId: IdFactory = () => {
    for (let attempt = 0; attempt < MAX_ID_ATTEMPTS; attempt++) {
      const id = this.idFactory();
      if (!this.list().some((element) => element.data.id === id)) return id;
    }
    throw new ElementsError(`id factory produced only ids already in use after ${MAX_ID_ATTEMPTS} attempts`);
  };
}

/** Collection over the base node and edge shapes. */
export class Elements extends GenericElements<Node, Edge> {
  constructor(options: ElementsOptions = {}) {
    super(baseSchemas, options);
  }
}

/** Parse interchange JSON text into a collection. */
export function parse(text: string): Elements {
  return new Elements().loadJSON(text);
}

export function serialize<N extends Node, E extends Edge>(elements: GenericElements<N, E>, indent = 4): string {
  return elements.serialize(indent);
}

export function fromComponentElements(definitions: unknown): Elements {
  return new Elements().load(definitions);
}
