import { describe, expect, it } from 'vitest';
import { ParseError } from '../core/errors';
import type { Json, JsonObject } from '../types';
import { Elements, fromComponentElements, parse, serialize } from './elements';
import conversion from './fixtures/conversion.json';

const text = JSON.stringify(conversion, null, 4);

function objectAt(value: Json | undefined, key: string): JsonObject | undefined {
  if (typeof value !== 'object' || value === null || Array.isArray(value)) return undefined;
  const entry = value[key];
  return typeof entry === 'object' && entry !== null && !Array.isArray(entry) ? entry : undefined;
}

describe('interchange JSON', () => {
  it('parses and serializes back to the same text', () => {
    const elements = parse(text);
    expect(elements.size).toBe(5);
    expect(serialize(elements)).toBe(text);
  });

  it('reads hyphenated label keys into fields', () => {
    const edge = parse(text).get({ id: 'edge1' });
    expect(edge?.group === 'edges' && edge.data.source_label).toBe('from');
    expect(edge?.group === 'edges' && edge.data.target_label).toBe('to');
  });

  it('writes source_label as "source-label"', () => {
    const elements = new Elements();
    elements.add({ id: 'e', source: 'a', target: 'b', source_label: 'L' });
    const json = elements.serialize();
    expect(JSON.parse(json)).toEqual([
      { group: 'edges', data: { id: 'e', source: 'a', target: 'b', 'source-label': 'L' } },
    ]);
    expect(json.includes('source_label')).toBe(false);
  });

  it('JSON.stringify goes through toJSON', () => {
    const elements = new Elements();
    elements.add({ id: 'n', label: 'N' });
    expect(JSON.stringify(elements)).toBe('[{"group":"nodes","data":{"id":"n","label":"N"}}]');
  });

  it('serializes an empty collection as an empty array', () => {
    expect(new Elements().serialize()).toBe('[]');
    expect(parse('[]').size).toBe(0);
  });

  it('keeps the previous contents when loading fails', () => {
    const elements = parse(text);
    expect(() => elements.loadJSON('[{"group":"nodes","data":{"id":"x"}},{"group":"edge"}]')).toThrowError(ParseError);
    expect(elements.size).toBe(5);
  });
});

describe('component format', () => {
  it('round-trips a collection', () => {
    const original = parse(text);
    const records = original.toComponentElements();
    const copy = fromComponentElements(records);
    expect([...copy]).toEqual([...original]);
    expect(copy.toComponentElements()).toEqual(records);
  });

  it('differs from interchange only in the label key spelling', () => {
    const records = parse(text).toComponentElements();
    expect(records[3]).toEqual({
      group: 'edges',
      data: {
        id: 'edge1',
        source: 'node1',
        target: 'node2',
        label: 'depends on',
        source_label: 'from',
        target_label: 'to',
      },
      classes: 'dashed',
      pannable: false,
    });
    expect(records.slice(0, 3)).toEqual(conversion.slice(0, 3));
  });

  it('rejects hyphenated keys, which only interchange JSON uses', () => {
    const records = [{ group: 'edges', data: { id: 'e', source: 'a', target: 'b', 'source-label': 'x' } }];
    expect(() => fromComponentElements(records)).toThrowError('element 0: "data.source-label" is not declared');
  });

  it('shares no nested scratch data with loaded or produced records', () => {
    const scratch = { nested: { v: 1 } };
    const elements = fromComponentElements([{ group: 'nodes', data: { id: 'n' }, scratch }]);
    scratch.nested.v = 2;

    const nested = objectAt(objectAt(elements.toComponentElements()[0], 'scratch'), 'nested');
    expect(nested).toEqual({ v: 1 });
    if (nested) nested['v'] = 3;

    expect(elements.get({ id: 'n' })?.scratch).toEqual({ nested: { v: 1 } });
  });

  it('writes no empty parent', () => {
    const elements = new Elements();
    elements.add({ id: 'n', parent: '' });
    expect(elements.serialize(0)).toBe('[{"group":"nodes","data":{"id":"n"}}]');
  });

  it('load replaces the previous contents', () => {
    const elements = new Elements();
    elements.add({ id: 'old' });
    elements.load([{ group: 'nodes', data: { id: 'new' } }]);
    expect(String(elements)).toBe('[Node(id="new")]');
  });
});
