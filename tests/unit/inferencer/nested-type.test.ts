import { describe, it, expect } from 'vitest';
import { parseDocument } from '../../../src/lib/tree/dom-adapter.js';
import { analyzeStructure } from '../../../src/lib/analyzer/index.js';
import {
  NESTED_TYPE_FAILURE,
  inferNestedType,
  isNestedTypeFailure,
} from '../../../src/lib/inferencer/nested-type.js';
import { DEFAULT_SCHEMA_OPTIONS } from '../../../src/types/config.js';
import type { SchemaOptions } from '../../../src/types/config.js';
import { listOf, recordOf, scalar } from '../../../src/types/data-model.js';
import type { StructureAnalysis } from '../../../src/types/data-model.js';

const OPTIONS: SchemaOptions = { ...DEFAULT_SCHEMA_OPTIONS, forceList: [] };

function analyze(xml: string, depthLimit = 10): StructureAnalysis {
  const { documentElement } = parseDocument(xml);
  if (!documentElement) throw new Error('expected a single document element');
  return analyzeStructure(documentElement, { depthLimit, maxSamples: 20 });
}

function nestedTypeOf(xml: string, name: string, options = OPTIONS, depthLimit = 10) {
  const analysis = analyze(xml, depthLimit);
  const shape = analysis.shapes.get(name);
  if (!shape) throw new Error(`no shape for ${name}`);
  return inferNestedType(shape, analysis.shapes, options);
}

describe('inferNestedType', () => {
  it('should type one repeating leaf child as LIST of the detected scalar', () => {
    const xml = '<r><rec><scores><s>10</s><s>20</s><s>30</s></scores></rec></r>';
    expect(nestedTypeOf(xml, 'scores')).toEqual(listOf(scalar('INTEGER')));
  });

  it('should type distinct once-per-instance children as a RECORD', () => {
    const xml = '<r><rec><author><first>Ada</first><born>1815-12-10</born></author></rec></r>';
    expect(nestedTypeOf(xml, 'author')).toEqual(
      recordOf([
        { name: 'first', type: scalar('STRING') },
        { name: 'born', type: scalar('DATE') },
      ]),
    );
  });

  it('should recurse into list elements', () => {
    const xml =
      '<r><rec><people><p><n>A</n><a>30</a></p><p><n>B</n><a>40</a></p></people></rec></r>';
    expect(nestedTypeOf(xml, 'people')).toEqual(
      listOf(
        recordOf([
          { name: 'n', type: scalar('STRING') },
          { name: 'a', type: scalar('INTEGER') },
        ]),
      ),
    );
  });

  it('should fail for children {a, a, b}', () => {
    const xml = '<r><rec><box><a>1</a><a>2</a><b>3</b></box></rec></r>';
    const type = nestedTypeOf(xml, 'box');
    expect(type).toEqual(NESTED_TYPE_FAILURE);
    expect(isNestedTypeFailure(type)).toBe(true);
  });

  it('should fail for a single child name occurring once per instance', () => {
    const xml = '<r><rec><wrap><only>1</only></wrap></rec><rec><wrap><only>2</only></wrap></rec></r>';
    expect(isNestedTypeFailure(nestedTypeOf(xml, 'wrap'))).toBe(true);
  });

  it('should treat a forceList child as a list even when single', () => {
    const xml = '<r><rec><wrap><only>x</only></wrap></rec></r>';
    const options = { ...OPTIONS, forceList: ['only'] };
    expect(nestedTypeOf(xml, 'wrap', options)).toEqual(listOf(scalar('STRING')));
  });

  it('should add a text field for records with direct text', () => {
    const xml = '<r><rec><note>See <a>x</a><b>y</b></note></rec></r>';
    expect(nestedTypeOf(xml, 'note')).toEqual(
      recordOf([
        { name: 'a', type: scalar('STRING') },
        { name: 'b', type: scalar('STRING') },
        { name: 'text_content', type: scalar('STRING') },
      ]),
    );
  });

  it('should fail a list whose element structure lies beyond the depth limit', () => {
    const xml =
      '<r><rec><people><p><n>A</n><m>x</m></p><p><n>B</n><m>y</m></p></people></rec></r>';
    // people is level 2, p level 3, n and m level 4
    expect(isNestedTypeFailure(nestedTypeOf(xml, 'people', OPTIONS, 3))).toBe(true);
    expect(nestedTypeOf(xml, 'people', OPTIONS, 4)).toEqual(
      listOf(
        recordOf([
          { name: 'n', type: scalar('STRING') },
          { name: 'm', type: scalar('STRING') },
        ]),
      ),
    );
  });

  it('should omit record fields whose structure cannot be typed', () => {
    const xml = '<r><rec><meta><id>7</id><box><a>1</a><a>2</a><b>3</b></box></meta></rec></r>';
    expect(nestedTypeOf(xml, 'meta')).toEqual(
      recordOf([{ name: 'id', type: scalar('INTEGER') }]),
    );
  });
});
