import { describe, expect, it } from 'vitest';
import { extractJson, parseJsonObject } from '../src/utils/parsing';
import { ParseError } from '../src/research/errors';

describe('extractJson', () => {
  it('prefers a json fenced block', () => {
    expect(extractJson('Here you go:\n```json\n{"a": 1}\n```\nThanks')).toBe('{"a": 1}');
  });

  it('accepts a plain fenced block that holds an object', () => {
    expect(extractJson('```\n{"b": 2}\n```')).toBe('{"b": 2}');
  });

  it('falls back to brace counting when the fence holds no object', () => {
    expect(extractJson('```\nnotes\n```\nResult: {"c": 3} done')).toBe('{"c": 3}');
  });

  it('balances nested braces inside prose', () => {
    expect(extractJson('I think {"a": {"b": 1}} is right {"x": 2}')).toBe('{"a": {"b": 1}}');
  });

  it('returns the whole text for an unbalanced object', () => {
    expect(extractJson('{"a": 1')).toBe('{"a": 1');
  });

  it('returns null when there is nothing object-like', () => {
    expect(extractJson('no json here')).toBeNull();
  });
});

describe('parseJsonObject', () => {
  it('parses the extracted object', () => {
    expect(parseJsonObject('Sure.\n{"urls": ["https://shop.test/p/1"]}')).toEqual({ urls: ['https://shop.test/p/1'] });
  });

  it('reports missing JSON', () => {
    expect(() => parseJsonObject('[1, 2]')).toThrow('No JSON found in response');
  });

  it('reports invalid JSON as a ParseError', () => {
    expect(() => parseJsonObject('{"a": 1')).toThrow(ParseError);
  });

  it('rejects non-object JSON', () => {
    expect(() => parseJsonObject('```json\n[1]\n```')).toThrow('Response JSON is not an object');
  });
});
