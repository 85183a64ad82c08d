import { createStore } from 'zustand/vanilla';
import type { StoreApi } from 'zustand/vanilla';
import type { Edge, Node } from '../types';

export type ElementsState<N extends Node, E extends Edge> = {
  /** Every element in insertion order; nodes and edges interleaved. */
  readonly elements: ReadonlyArray<N | E>;
};

export type ElementsActions<N extends Node, E extends Edge> = {
  append: (element: N | E) => void;
  /** Remove every element the predicate accepts; returns them in order. */
  removeWhere: (predicate: (element: N | E) => boolean) => Array<N | E>;
  replace: (elements: ReadonlyArray<N | E>) => void;
};

export type ElementsStore<N extends Node = Node, E extends Edge = Edge> = ElementsState<N, E> &
  ElementsActions<N, E>;

export function createElementsStore<N extends Node = Node, E extends Edge = Edge>(): StoreApi<ElementsStore<N, E>> {
  return createStore<ElementsStore<N, E>>()((set) => ({
    elements: [],

    append: (element) => set((s) => ({ elements: [...s.elements, element] })),

    removeWhere: (predicate) => {
      const removed: Array<N | E> = [];
      set((s) => {
        const kept = s.elements.filter((element) => {
          if (!predicate(element)) return true;
          removed.push(element);
          return false;
        });
        // Unchanged state keeps subscribers quiet.
        return removed.length === 0 ? s : { elements: kept };
      });
      return removed;
    },

    replace: (elements) => set({ elements: [...elements] }),
  }));
}
