import { useMemo } from 'react';
import { useStore } from 'zustand';
import { componentFormat, encodeElements } from '../core/convert';
import type { GenericElements } from '../state/elements';
import type { Edge, ElementDefinition, Node } from '../types';

/** Elements of a collection in insertion order; re-renders on add, remove and load. */
export function useElementList<N extends Node, E extends Edge>(elements: GenericElements<N, E>): ReadonlyArray<N | E> {
  return useStore(elements.store, (s) => s.elements);
}

/**
 * Component-format records for a visualization component's `elements` prop.
 * In-place edits of a held element are not seen until the collection changes.
 */
export function useElementDefinitions<N extends Node, E extends Edge>(
  elements: GenericElements<N, E>,
): ElementDefinition[] {
  const list = useElementList(elements);
  const { schemas } = elements;
  return useMemo(() => encodeElements(list, schemas, componentFormat), [list, schemas]);
}
