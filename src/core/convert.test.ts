import { describe, it, expect } from 'vitest';
import { componentFormat, decodeElements, encodeElements, interchangeFormat, parseInterchange } from './convert';
import { ParseError } from './errors';
import { baseSchemas, edgeSchema, nodeSchema } from './schema';

const noId = () => 'unused';

function parseErrorOf(run: () => unknown): ParseError {
  try {
    run();
  } catch (error) {
    if (error instanceof ParseError) return error;
    throw error;
  }
  throw new Error('expected a ParseError');
}

describe('format key mapping', () => {
  it('interchange hyphenates the endpoint label keys in both directions', () => {
    expect(interchangeFormat.writeKey('source_label')).toBe('source-label');
    expect(interchangeFormat.writeKey('target_label')).toBe('target-label');
    expect(interchangeFormat.readKey('source-label')).toBe('source_label');
    expect(interchangeFormat.readKey('label')).toBe('label');
  });

  it('component format keeps field names', () => {
    expect(componentFormat.writeKey('source_label')).toBe('source_label');
  });
});

describe('encodeElements', () => {
  const elements = [
    nodeSchema.create({ id: 'a', label: 'A', x: 1, y: 2 }, noId),
    edgeSchema.create({ id: 'e', source: 'a', target: 'b', source_label: 'L', classes: 'hot' }, noId),
  ];

  it('writes component records with defaults omitted', () => {
    expect(encodeElements(elements, baseSchemas, componentFormat)).toEqual([
      { group: 'nodes', data: { id: 'a', label: 'A' }, position: { x: 1, y: 2 } },
      { group: 'edges', data: { id: 'e', source: 'a', target: 'b', source_label: 'L' }, classes: 'hot' },
    ]);
  });

  it('writes interchange records with hyphenated label keys', () => {
    const [, edge] = encodeElements(elements, baseSchemas, interchangeFormat);
    expect(edge?.data).toEqual({ id: 'e', source: 'a', target: 'b', 'source-label': 'L' });
  });
});

describe('decodeElements', () => {
  it('reads both label spellings from interchange records', () => {
    const [hyphen, underscore] = decodeElements(
      [
        { group: 'edges', data: { id: 'e1', source: 'a', target: 'b', 'target-label': 'T' } },
        { group: 'edges', data: { id: 'e2', source: 'a', target: 'b', target_label: 'U' } },
      ],
      baseSchemas,
      interchangeFormat,
    );
    expect(hyphen?.group === 'edges' && hyphen.data.target_label).toBe('T');
    expect(underscore?.group === 'edges' && underscore.data.target_label).toBe('U');
  });

  it('infers a missing group from the data', () => {
    const [edge, node] = decodeElements(
      [{ data: { id: 'e1', source: 'a', target: 'b' } }, { data: { id: 'n1' } }],
      baseSchemas,
      componentFormat,
    );
    expect(edge?.group).toBe('edges');
    expect(node?.group).toBe('nodes');
  });

  it('reports the index and field of a bad group', () => {
    const error = parseErrorOf(() =>
      decodeElements([{ data: { id: 'a' } }, { group: 'vertices', data: { id: 'b' } }], baseSchemas, componentFormat),
    );
    expect(error.index).toBe(1);
    expect(error.field).toBe('group');
    expect(error.message).toBe('element 1: "group" must be "nodes" or "edges"');
  });

  it('reports a missing edge endpoint', () => {
    const error = parseErrorOf(() =>
      decodeElements([{ group: 'edges', data: { id: 'e1', source: 'a' } }], baseSchemas, componentFormat),
    );
    expect(error).toMatchObject({ index: 0, field: 'data.target', message: 'element 0: "data.target" is required' });
  });

  it('reports a missing id, a bad type and an undeclared field', () => {
    expect(
      parseErrorOf(() => decodeElements([{ group: 'nodes', data: {} }], baseSchemas, componentFormat)).field,
    ).toBe('data.id');
    expect(
      parseErrorOf(() =>
        decodeElements([{ group: 'nodes', data: { id: 'a' }, locked: 'no' }], baseSchemas, componentFormat),
      ).message,
    ).toBe('element 0: "locked" expected boolean');
    expect(
      parseErrorOf(() =>
        decodeElements([{ group: 'nodes', data: { id: 'a', color: 'red' } }], baseSchemas, componentFormat),
      ).field,
    ).toBe('data.color');
  });

  it('rejects a document that is not an array of objects', () => {
    expect(parseErrorOf(() => decodeElements({}, baseSchemas, interchangeFormat)).message).toBe(
      'interchange elements must be an array',
    );
    expect(parseErrorOf(() => decodeElements(['a'], baseSchemas, componentFormat)).index).toBe(0);
    expect(parseErrorOf(() => decodeElements([{ group: 'nodes' }], baseSchemas, componentFormat)).field).toBe('data');
  });

  it('rejects both spellings of the same key in one record', () => {
    const error = parseErrorOf(() =>
      decodeElements(
        [{ group: 'edges', data: { id: 'e', source: 'a', target: 'b', source_label: 'x', 'source-label': 'y' } }],
        baseSchemas,
        interchangeFormat,
      ),
    );
    expect(error.field).toBe('data.source-label');
  });
});

describe('parseInterchange', () => {
  it('wraps JSON syntax errors', () => {
    const error = parseErrorOf(() => parseInterchange('[{'));
    expect(error.index).toBeUndefined();
    expect(error.message.startsWith('invalid JSON: ')).toBe(true);
  });
});
