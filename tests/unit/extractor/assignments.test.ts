import { describe, it, expect } from 'vitest';
import { moduleFromSource, dedent } from '../../helpers/fixtures.js';

describe('Assignment extraction', () => {
  it('should turn plain module assignments into variables', () => {
    const module = moduleFromSource(dedent(`
      VERSION = "1.2.0"
      LIMITS = {"low": 1, "high": 9}
      a = b = 5
    `));

    expect(module.variables).toEqual([
      { kind: 'variable', name: 'VERSION', value: '"1.2.0"', type: null, docstring: null },
      { kind: 'variable', name: 'LIMITS', value: '{"low": 1, "high": 9}', type: null, docstring: null },
      { kind: 'variable', name: 'a', value: '5', type: null, docstring: null },
      { kind: 'variable', name: 'b', value: '5', type: null, docstring: null },
    ]);
  });

  it('should document the last target of a chained assignment', () => {
    const module = moduleFromSource('low = high = 0\n"""Bounds start at zero."""\n');

    expect(module.variables.map(v => [v.name, v.docstring])).toEqual([
      ['low', null],
      ['high', 'Bounds start at zero.'],
    ]);
  });

  it('should not declare tuple or attribute targets', () => {
    const module = moduleFromSource('x, y = 1, 2\nconfig.debug = True\n');

    expect(module.variables).toEqual([]);
  });

  it('should keep the annotation of annotated variables', () => {
    const module = moduleFromSource('TIMEOUT: float = 2.5\nNAME: str\n');

    expect(module.variables).toEqual([
      { kind: 'variable', name: 'TIMEOUT', value: '2.5', type: 'float', docstring: null },
      { kind: 'variable', name: 'NAME', value: null, type: 'str', docstring: null },
    ]);
  });

  it('should treat TypeAlias annotations and type statements as aliases', () => {
    const module = moduleFromSource(dedent(`
      Vector: TypeAlias = list[float]
      Matrix: typing.TypeAlias = list[Vector]
      type Pair = tuple[int, int]
    `));

    expect(module.variables).toEqual([]);
    expect(module.aliases).toEqual([
      { kind: 'alias', name: 'Vector', type: 'list[float]', docstring: null },
      { kind: 'alias', name: 'Matrix', type: 'list[Vector]', docstring: null },
      { kind: 'alias', name: 'Pair', type: 'tuple[int, int]', docstring: null },
    ]);
  });

  it('should attach a following string to the variable it documents', () => {
    const module = moduleFromSource(dedent(`
      RETRIES = 3
      """How often to retry."""
      DELAY = 1
    `));

    expect(module.variables.map(v => [v.name, v.docstring])).toEqual([
      ['RETRIES', 'How often to retry.'],
      ['DELAY', null],
    ]);
  });

  describe('__all__', () => {
    it('should read list and tuple literals', () => {
      expect(moduleFromSource('__all__ = ["a", "b"]\n').allExports).toEqual(['a', 'b']);
      expect(moduleFromSource("__all__ = ('a',)\n").allExports).toEqual(['a']);
    });

    it('should extend the list with +=', () => {
      const module = moduleFromSource('__all__ = ["a"]\n__all__ += ["b"]\n');

      expect(module.allExports).toEqual(['a', 'b']);
    });

    it('should not record __all__ as a variable', () => {
      const module = moduleFromSource('__all__ = ["a"]\n');

      expect(module.variables).toEqual([]);
    });

    it('should ignore a computed __all__', () => {
      const module = moduleFromSource('__all__ = [name for name in dir()]\n');

      expect(module.allExports).toEqual([]);
    });
  });
});
