import { describe, it, expect } from 'vitest';
import { moduleFromSource, dedent } from '../../helpers/fixtures.js';
import type { ClassDecl } from '../../../src/types/index.js';

function onlyClass(source: string): ClassDecl {
  const cls = moduleFromSource(dedent(source)).classes[0];
  if (!cls) throw new Error('no class extracted');
  return cls;
}

describe('Class extraction', () => {
  it('should record name, bases, docstring, methods and annotated fields', () => {
    const cls = onlyClass(`
      class Circle(Shape, Generic[T], metaclass=ABCMeta):
          """A round shape."""

          radius: float = 1.0
          label: str
          count = 0

          def area(self) -> float:
              """Area of the circle."""
              return 3.14 * self.radius ** 2
    `);

    expect(cls.name).toBe('Circle');
    expect(cls.bases).toEqual(['Shape', 'Generic[T]']);
    expect(cls.docstring).toBe('A round shape.');
    expect(cls.fields).toEqual([
      { name: 'radius', type: 'float', default: '1.0', docstring: null },
      { name: 'label', type: 'str', default: null, docstring: null },
    ]);
    expect(cls.methods.map(m => m.name)).toEqual(['area']);
    expect(cls.methods[0]?.docstring).toBe('Area of the circle.');
  });

  it('should attach a string statement after a field as its docstring', () => {
    const cls = onlyClass(`
      class Config:
          """Settings."""
          timeout: int = 30
          """Seconds before giving up."""
          retries: int = 3

          """Attempts before failing."""

          def reload(self):
              pass

          """Follows a method, documents nothing."""
          verbose: bool = False
    `);

    expect(cls.fields.map(f => [f.name, f.docstring])).toEqual([
      ['timeout', 'Seconds before giving up.'],
      ['retries', 'Attempts before failing.'],
      ['verbose', null],
    ]);
  });

  it('should not let the class docstring document the first field', () => {
    const cls = onlyClass(`
      class Point:
          """A point."""
          x: int
    `);

    expect(cls.fields).toEqual([{ name: 'x', type: 'int', default: null, docstring: null }]);
  });

  it('should extract decorated and async methods', () => {
    const cls = onlyClass(`
      class Repo:
          @staticmethod
          def create() -> "Repo":
              return Repo()

          @property
          def size(self) -> int:
              return 0

          async def load(self, key: str):
              pass
    `);

    expect(cls.methods.map(m => m.name)).toEqual(['create', 'size', 'load']);
    expect(cls.methods[0]?.decorators).toEqual(['staticmethod']);
    expect(cls.methods[1]?.decorators).toEqual(['property']);
    expect(cls.methods[2]?.isAsync).toBe(true);
  });

  it('should keep class decorators', () => {
    const source = dedent(`
      @dataclass(frozen=True)
      class Pair:
          left: int
          right: int
    `);
    const cls = moduleFromSource(source).classes[0];

    expect(cls?.decorators).toEqual(['dataclass(frozen=True)']);
    expect(cls?.fields.map(f => f.name)).toEqual(['left', 'right']);
  });
});
