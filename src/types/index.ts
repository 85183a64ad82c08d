export type ElementId = string;

export type ElementGroup = 'nodes' | 'edges';

export type Json = string | number | boolean | null | Json[] | { [key: string]: Json };
export type JsonObject = { [key: string]: Json };

export type Position = { x: number; y: number };

/**
 * Display state shared by nodes and edges. These sit next to `data` in every external format.
 */
export type DisplayAttributes = {
  /** Space-delimited class names. */
  classes: string;
  selected: boolean;
  selectable: boolean;
  locked: boolean;
  grabbable: boolean;
  pannable: boolean;
  /** Private, ephemeral data the schema does not model. */
  scratch: JsonObject;
};

export type NodeData = {
  id: ElementId;
  /** Id of the compound node containing this one. */
  parent?: ElementId;
  label: string;
};

export type EdgeData = {
  id: ElementId;
  source: ElementId;
  target: ElementId;
  label: string;
  source_label: string;
  target_label: string;
};

export type Node = DisplayAttributes & {
  group: 'nodes';
  data: NodeData;
  /** Either a full 2-D position or none at all. */
  position?: Position;
};

export type Edge = DisplayAttributes & {
  group: 'edges';
  data: EdgeData;
};

export type Element = Node | Edge;

/** One record of the component format or of interchange JSON. */
export interface ElementDefinition {
  group: ElementGroup;
  data: JsonObject;
  [key: string]: Json;
}
