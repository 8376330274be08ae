// Tests for option parsing helpers

import { describe, it, expect } from 'vitest';
import { collect, parseAssignments } from './options.js';
import { ValidationError } from '../../core/errors.js';

describe('collect', () => {
  it('should accumulate repeated values', () => {
    expect(collect('b', collect('a'))).toEqual(['a', 'b']);
  });
});

describe('parseAssignments', () => {
  it('should split at the first equals sign', () => {
    expect(parseAssignments(['id=7', 'q=a=b', 'empty='], 'param')).toEqual({ id: '7', q: 'a=b', empty: '' });
  });

  it('should collect repeated keys into a list', () => {
    expect(parseAssignments(['tag=a', 'tag=b', 'tag=c'], 'param')).toEqual({ tag: ['a', 'b', 'c'] });
  });

  it('should accept keys named like object properties', () => {
    expect(parseAssignments(['constructor=1', 'constructor=2', 'toString=x'], 'param')).toEqual({
      constructor: ['1', '2'],
      toString: 'x'
    });
  });

  it('should reject pairs without a key', () => {
    expect(() => parseAssignments(['novalue'], 'param')).toThrow('Expected key=value, got "novalue"');
    expect(() => parseAssignments([' =x'], 'param')).toThrow(ValidationError);
  });
});
