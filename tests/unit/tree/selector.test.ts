import { describe, it, expect } from 'vitest';
import { parseDocument } from '../../../src/lib/tree/dom-adapter.js';
import { parseSelector, selectFirst, selectNodes } from '../../../src/lib/tree/selector.js';
import { ConfigError } from '../../../src/utils/errors.js';

const RSS =
  '<rss><channel><title>T</title><item><title>A</title></item><item><title>B</title></item></channel></rss>';

describe('parseSelector', () => {
  it('should treat a bare name as a descendant step', () => {
    expect(parseSelector('item')).toEqual({
      absolute: false,
      steps: [{ axis: 'descendant', test: 'item' }],
    });
  });

  it('should parse absolute paths and descendant axes', () => {
    expect(parseSelector('/rss/channel')).toEqual({
      absolute: true,
      steps: [
        { axis: 'child', test: 'rss' },
        { axis: 'child', test: 'channel' },
      ],
    });
    expect(parseSelector('channel//item').steps).toEqual([
      { axis: 'descendant', test: 'channel' },
      { axis: 'descendant', test: 'item' },
    ]);
  });

  it('should reject empty and malformed selectors', () => {
    expect(() => parseSelector('')).toThrow(ConfigError);
    expect(() => parseSelector('a/')).toThrow(ConfigError);
    expect(() => parseSelector('/')).toThrow(ConfigError);
    expect(() => parseSelector('item[1]')).toThrow(ConfigError);
  });
});

describe('selectNodes', () => {
  const { root } = parseDocument(RSS);

  it('should find descendants in document order', () => {
    expect(selectNodes(root, 'title').map((node) => node.text)).toEqual(['T', 'A', 'B']);
    expect(selectNodes(root, 'item')).toHaveLength(2);
  });

  it('should follow child steps after the first', () => {
    expect(selectNodes(root, 'channel/title').map((node) => node.text)).toEqual(['T']);
    expect(selectNodes(root, '/rss/channel/item')).toHaveLength(2);
  });

  it('should resolve absolute selectors from the document', () => {
    const [channel] = selectNodes(root, 'channel');
    if (!channel) throw new Error('expected a channel');
    expect(selectNodes(channel, '/rss').map((node) => node.name)).toEqual(['rss']);
  });

  it('should match any name with a wildcard', () => {
    const [channel] = selectNodes(root, 'channel');
    if (!channel) throw new Error('expected a channel');
    expect(selectNodes(channel, '*').map((node) => node.name)).toEqual([
      'title',
      'item',
      'title',
      'item',
      'title',
    ]);
  });

  it('should return null when nothing matches', () => {
    expect(selectFirst(root, 'missing')).toBeNull();
  });
});
