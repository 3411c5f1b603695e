import { describe, it, expect, beforeEach } from 'vitest';
import { PythonParser, getDefaultParser, resetParser } from '../../../src/parser/index.js';
import { SourceParseError } from '../../../src/types/index.js';

describe('PythonParser', () => {
  let parser: PythonParser;

  beforeEach(() => {
    parser = new PythonParser();
  });

  it('should report the extensions it handles', () => {
    expect(parser.extensions).toEqual(['py', 'pyi']);
    expect(parser.canParse('pkg/mod.py')).toBe(true);
    expect(parser.canParse('pkg/mod.PYI')).toBe(true);
    expect(parser.canParse('pkg/mod.ts')).toBe(false);
  });

  it('should return the module node for valid source', () => {
    const root = parser.parseSource('x = 1\n');

    expect(root.type).toBe('module');
    expect(root.namedChildren).toHaveLength(1);
  });

  it('should throw SourceParseError with a position for broken source', () => {
    let caught: unknown;
    try {
      parser.parseSource(') = broken\n');
    } catch (error) {
      caught = error;
    }

    expect(caught).toBeInstanceOf(SourceParseError);
    if (caught instanceof SourceParseError) {
      expect(caught.message).toMatch(/^Syntax error at line 1, column \d+$/);
      expect(caught.line).toBe(1);
    }
  });

  it('should reject source the grammar only recovers by inserting tokens', () => {
    let caught: unknown;
    try {
      parser.parseSource('def f(:\n    pass\n');
    } catch (error) {
      caught = error;
    }

    expect(caught).toBeInstanceOf(SourceParseError);
    if (caught instanceof SourceParseError) {
      expect(caught.line).toBe(1);
    }
  });

  it('should reject an unclosed bracket', () => {
    expect(() => parser.parseSource('x = (1, 2\n')).toThrow(SourceParseError);
  });

  it('should share one default parser until reset', () => {
    const first = getDefaultParser();

    expect(getDefaultParser()).toBe(first);

    resetParser();
    expect(getDefaultParser()).not.toBe(first);
  });
});
