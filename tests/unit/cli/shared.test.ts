import { describe, it, expect } from 'vitest';
import { fileURLToPath } from 'url';
import { InvalidArgumentError } from 'commander';
import {
  parseFraction,
  parseInteger,
  resolveCommandContext,
} from '../../../src/cli/commands/shared.js';

const fixture = (name: string) => fileURLToPath(new URL(`../../fixtures/${name}`, import.meta.url));

describe('option parsers', () => {
  it('should parse integers', () => {
    expect(parseInteger('12')).toBe(12);
    expect(() => parseInteger('1.5')).toThrow(InvalidArgumentError);
  });

  it('should parse fractions between 0 and 1', () => {
    expect(parseFraction('0.25')).toBe(0.25);
    expect(() => parseFraction('1.5')).toThrow('Must be a number between 0.0 and 1.0.');
  });
});

describe('resolveCommandContext', () => {
  it('should use defaults without a config file', () => {
    const { schemaOptions, readerOptions } = resolveCommandContext({});
    expect(schemaOptions.depthLimit).toBe(10);
    expect(readerOptions).toEqual({
      maximumFileSize: 16 * 1024 * 1024,
      ignoreErrors: false,
      mode: 'xml',
      namespaces: 'strip',
    });
  });

  it('should layer flags over the config file', () => {
    const { schemaOptions, readerOptions } = resolveCommandContext({
      config: fixture('config.yaml'),
      depth: 5,
      html: true,
    });
    expect(schemaOptions.depthLimit).toBe(5);
    expect(schemaOptions.attributeMode).toBe('map');
    expect(schemaOptions.forceList).toEqual(['tag']);
    expect(readerOptions.ignoreErrors).toBe(true);
    expect(readerOptions.mode).toBe('html');
  });
});
