import { describe, it, expect } from 'vitest';
import { parseDocument } from '../../../src/lib/tree/dom-adapter.js';
import type { TreeNode } from '../../../src/lib/tree/types.js';
import {
  analyzeStructure,
  createShapeRecord,
  isHomogeneous,
  shapeKind,
} from '../../../src/lib/analyzer/index.js';

const CATALOG = `<catalog>
  <book id="b1"><title>One</title><tag>x</tag><tag>y</tag></book>
  <book id="b2"><title>Two</title><tag>z</tag></book>
</catalog>`;

function anchorOf(xml: string): TreeNode {
  const { documentElement } = parseDocument(xml);
  if (!documentElement) throw new Error('expected a single document element');
  return documentElement;
}

describe('analyzeStructure', () => {
  it('should accumulate per-name shapes below the anchor', () => {
    const analysis = analyzeStructure(anchorOf(CATALOG));

    expect(analysis.anchorName).toBe('catalog');
    expect(analysis.recordNames).toEqual(['book']);
    expect(analysis.recordCount).toBe(2);
    expect(Array.from(analysis.shapes.keys())).toEqual(['book', 'title', 'tag']);

    const book = analysis.shapes.get('book');
    expect(book?.occurrenceCount).toBe(2);
    expect(book?.hasText).toBe(false);
    expect(book?.hasChildren).toBe(true);
    expect(book?.attributeCounts).toEqual(new Map([['id', 2]]));
    expect(book?.childElementCounts).toEqual(new Map([['title', 2], ['tag', 3]]));
    expect(book?.childMaxPerInstance).toEqual(new Map([['title', 1], ['tag', 2]]));

    const tag = analysis.shapes.get('tag');
    expect(tag?.occurrenceCount).toBe(3);
    expect(tag?.sampleValues).toEqual(['x', 'y', 'z']);
  });

  it('should cap samples per shape', () => {
    const analysis = analyzeStructure(anchorOf(CATALOG), { maxSamples: 2 });
    expect(analysis.shapes.get('tag')?.sampleValues).toEqual(['x', 'y']);
  });

  it('should clean sampled text', () => {
    const analysis = analyzeStructure(anchorOf('<r><v>  a \n  b  </v></r>'));
    expect(analysis.shapes.get('v')?.sampleValues).toEqual(['a b']);
  });

  it('should visit records only with depth limit 1', () => {
    const analysis = analyzeStructure(anchorOf(CATALOG), { depthLimit: 1 });
    const book = analysis.shapes.get('book');

    expect(Array.from(analysis.shapes.keys())).toEqual(['book']);
    expect(book?.hasChildren).toBe(true);
    expect(book?.childElementCounts.size).toBe(0);
  });

  it('should visit nothing with depth limit 0', () => {
    const analysis = analyzeStructure(anchorOf(CATALOG), { depthLimit: 0 });
    expect(analysis.shapes.size).toBe(0);
    expect(analysis.recordCount).toBe(2);
  });

  it('should not share state between calls', () => {
    const anchor = anchorOf(CATALOG);
    const first = analyzeStructure(anchor);
    const second = analyzeStructure(anchor);
    expect(second.shapes.get('book')?.occurrenceCount).toBe(2);
    expect(first.shapes).not.toBe(second.shapes);
  });
});

describe('shape classification', () => {
  const shapeWith = (maxima: [string, number][]) => {
    const shape = createShapeRecord('parent');
    shape.hasChildren = maxima.length > 0;
    shape.childMaxPerInstance = new Map(maxima);
    return shape;
  };

  it('should classify a single repeating child name as an array', () => {
    const shape = shapeWith([['item', 3]]);
    expect(shapeKind(shape)).toBe('array');
    expect(isHomogeneous(shape)).toBe(true);
  });

  it('should classify distinct once-per-instance children as a record', () => {
    const shape = shapeWith([['a', 1], ['b', 1]]);
    expect(shapeKind(shape)).toBe('record');
    expect(isHomogeneous(shape)).toBe(true);
  });

  it('should classify {a, a, b} as mixed', () => {
    const shape = shapeWith([['a', 2], ['b', 1]]);
    expect(shapeKind(shape)).toBe('mixed');
    expect(isHomogeneous(shape)).toBe(false);
  });

  it('should classify a childless shape as a leaf', () => {
    expect(shapeKind(shapeWith([]))).toBe('leaf');
  });

  it('should classify a single child seen once per instance as mixed', () => {
    const shape = shapeWith([['only', 1]]);
    expect(isHomogeneous(shape)).toBe(true);
    expect(shapeKind(shape)).toBe('mixed');
  });

  it('should classify children beyond the depth limit as mixed', () => {
    const shape = createShapeRecord('parent');
    shape.hasChildren = true;
    expect(shapeKind(shape)).toBe('mixed');
  });
});
