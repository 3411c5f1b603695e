import { describe, it, expect } from 'vitest';
import { modulesFromSources, moduleFromSource, dedent } from '../../helpers/fixtures.js';
import { resolveExports } from '../../../src/resolver/index.js';
import {
  renderModule,
  renderSignature,
  importText,
  inlineCode,
  type RenderOptions,
} from '../../../src/render/index.js';
import type { ImportDecl } from '../../../src/types/index.js';

function render(sources: Record<string, string>, name: string, options?: RenderOptions): string {
  const view = resolveExports(modulesFromSources(sources)).get(name);
  if (!view) throw new Error(`missing module ${name}`);
  return renderModule(view, options);
}

function signatureOf(source: string, isMethod = false): string {
  const module = moduleFromSource(dedent(source));
  const fn = isMethod ? module.classes[0]?.methods[0] : module.functions[0];
  if (!fn) throw new Error('no function');
  return renderSignature(fn, isMethod);
}

describe('renderModule', () => {
  it('should render a method with its signature, arguments, return type and body', () => {
    const markdown = render(
      {
        'pkg.a': dedent(`
          class Foo:
              def bar(self, x: int = 3) -> str:
                  """doc"""
        `),
      },
      'pkg.a'
    );

    expect(markdown).toBe(
      [
        '# module `pkg.a`',
        '## Classes',
        '### `class Foo`',
        '<div style="padding-left: 20px;">',
        '#### Methods',
        '```python\nbar(x: int = 3) -> str\n```',
        '<div style="padding-left: 20px;">',
        '**Arguments**:',
        '- `x (int)` (default: `3`)',
        '**Returns**: `str`',
        'doc',
        '</div>',
        '</div>',
      ].join('\n\n') + '\n'
    );
  });

  it('should inline a re-exported class into the package document', () => {
    const markdown = render(
      {
        'pkg.__init__': '__all__ = ["Foo"]\nfrom .a import Foo\n',
        'pkg.a': 'class Foo:\n    """Foo docs."""\n',
      },
      'pkg.__init__'
    );

    expect(markdown).toBe(
      [
        '# package `pkg`',
        '## Classes',
        '### `class Foo`',
        '<div style="padding-left: 20px;">',
        '_Re-exported from `pkg.a.Foo`._',
        'Foo docs.',
        '</div>',
        '## Imports',
        '- `from .a import Foo`',
      ].join('\n\n') + '\n'
    );
  });

  it('should name the exported alias of a renamed re-export', () => {
    const markdown = render(
      {
        'pkg.__init__': '__all__ = ["start"]\nfrom .a import run as start\n',
        'pkg.a': 'def run():\n    """Run it."""\n',
      },
      'pkg.__init__'
    );

    expect(markdown).toContain('_Re-exported from `pkg.a.run` as `start`._');
    expect(markdown).toContain('```python\nrun()\n```');
  });

  it('should order sections and omit empty ones', () => {
    const markdown = render(
      {
        'pkg.m': dedent(`
          """Module docs."""
          import os
          from typing import TypeAlias

          __all__ = ["missing"]

          Vector: TypeAlias = list[float]
          TIMEOUT: float = 2.5
          """Seconds."""
          VERSION = "1.0"

          def helper():
              pass
        `),
      },
      'pkg.m'
    );

    const headings = markdown.split('\n').filter(line => line.startsWith('#'));
    expect(headings).toEqual([
      '# module `pkg.m`',
      '## Functions',
      '## Variables',
      '## Type Aliases',
      '## Imports',
      '## Unresolved Exports',
    ]);
    expect(markdown).toContain('# module `pkg.m`\n\nModule docs.\n\n## Functions');
    expect(markdown).toContain('## Variables\n\n- `TIMEOUT`: `float` = `2.5` - Seconds.\n- `VERSION` = `"1.0"`\n');
    expect(markdown).toContain('## Type Aliases\n\n- `type Vector = list[float]`\n');
    expect(markdown).toContain('## Imports\n\n- `import os`\n- `from typing import TypeAlias`\n');
    expect(markdown).toContain('## Unresolved Exports\n\n- `missing` _(unresolved)_\n');
  });

  it('should list cyclic exports as unresolved gaps', () => {
    const markdown = render(
      {
        'pkg.a': '__all__ = ["x"]\nfrom .b import x\n',
        'pkg.b': '__all__ = ["x"]\nfrom .a import x\n',
      },
      'pkg.a'
    );

    expect(markdown).toContain('- `x` _(cyclic re-export)_');
  });

  it('should render a module without declarations as its title only', () => {
    expect(render({ 'pkg.empty': '' }, 'pkg.empty')).toBe('# module `pkg.empty`\n');
  });

  it('should produce identical output when rendered twice', () => {
    const modules = modulesFromSources({
      'pkg.__init__': '__all__ = ["Foo"]\nfrom .a import Foo\n',
      'pkg.a': 'class Foo:\n    x: int = 1\n    def run(self):\n        pass\n',
    });
    const view = resolveExports(modules).get('pkg.__init__');
    if (!view) throw new Error('missing view');

    expect(renderModule(view)).toBe(renderModule(view));
  });

  describe('visibility', () => {
    const source = dedent(`
      class Widget:
          _cache: dict = {}
          size: int = 0

          def __init__(self):
              pass

          def __call__(self):
              pass

          def __repr__(self):
              pass

          def _helper(self):
              pass

      def _internal():
          pass
    `);

    it('should hide underscore names but keep __init__ and __call__', () => {
      const markdown = render({ 'pkg.w': source }, 'pkg.w');

      expect(markdown).toContain('__init__()');
      expect(markdown).toContain('__call__()');
      expect(markdown).not.toContain('__repr__');
      expect(markdown).not.toContain('_helper');
      expect(markdown).not.toContain('_internal');
      expect(markdown).not.toContain('_cache');
      expect(markdown).not.toContain('## Functions');
    });

    it('should show everything with includePrivate', () => {
      const markdown = render({ 'pkg.w': source }, 'pkg.w', { includePrivate: true });

      expect(markdown).toContain('```python\n__repr__()\n```');
      expect(markdown).toContain('```python\n_helper()\n```');
      expect(markdown).toContain('## Functions\n\n```python\n_internal()\n```');
      expect(markdown).toContain('- `_cache`: `dict` = `{}`');
    });
  });

  describe('classes', () => {
    it('should document __init__ arguments from the class docstring', () => {
      const markdown = render(
        {
          'pkg.pool': dedent(`
            class Pool(Base):
                """Connection pool.

                Args:
                    size: Number of connections.
                """

                def __init__(self, size: int = 4):
                    pass
          `),
        },
        'pkg.pool'
      );

      expect(markdown).toContain('### `class Pool(Base)`\n\n<div style="padding-left: 20px;">\n\nConnection pool.\n\n#### Methods');
      expect(markdown).toContain('- `size (int)`: Number of connections. (default: `4`)');
    });

    it('should merge documented attributes into the field list', () => {
      const markdown = render(
        {
          'pkg.user': dedent(`
            class User:
                """A user.

                Attributes:
                    name: Display name.
                    email (str): Contact address.
                """

                name: str
          `),
        },
        'pkg.user'
      );

      expect(markdown).toContain('#### Fields\n\n- `name`: `str` - Display name.\n- `email`: `str` - Contact address.');
    });

    it('should prefer a field docstring over the class docstring attribute', () => {
      const markdown = render(
        {
          'pkg.cfg': dedent(`
            class Config:
                """Settings.

                Attributes:
                    retries: From the class docstring.
                """

                retries: int = 3
                """From the attribute docstring."""
          `),
        },
        'pkg.cfg'
      );

      expect(markdown).toContain('- `retries`: `int` = `3` - From the attribute docstring.');
    });
  });

  describe('functions', () => {
    it('should render returns and raises sections from the docstring', () => {
      const markdown = render(
        {
          'pkg.db': dedent(`
            def count(table: str) -> int:
                """Count rows.

                Args:
                    table: Table name.

                Returns:
                    Number of rows.

                Raises:
                    KeyError: When the table is unknown.
                """
          `),
        },
        'pkg.db'
      );

      expect(markdown).toContain(
        [
          '```python\ncount(table: str) -> int\n```',
          '<div style="padding-left: 20px;">',
          '**Arguments**:',
          '- `table (str)`: Table name.',
          '**Returns**: `int` - Number of rows.',
          '**Raises**:',
          '- `KeyError`: When the table is unknown.',
          'Count rows.',
          '</div>',
        ].join('\n\n')
      );
    });

    it('should take argument types from the docstring when unannotated', () => {
      const markdown = render(
        { 'pkg.f': 'def f(x):\n    """Do.\n\n    :param int x: The x.\n    """\n' },
        'pkg.f'
      );

      expect(markdown).toContain('- `x (int)`: The x.');
    });
  });
});

describe('renderSignature', () => {
  it('should render varargs, keyword-only arguments and kwargs', () => {
    expect(signatureOf('def f(a, *args, b=1, **kw):\n    pass\n')).toBe('```python\nf(a, *args, b=1, **kw)\n```');
    expect(signatureOf('def g(a, *, b: int):\n    pass\n')).toBe('```python\ng(a, *, b: int)\n```');
  });

  it('should mark coroutine functions as async', () => {
    expect(signatureOf('async def fetch(url: str) -> bytes:\n    pass\n')).toBe(
      '```python\nasync fetch(url: str) -> bytes\n```'
    );
    expect(signatureOf('class A:\n    async def close(self):\n        pass\n', true)).toBe('```python\nasync close()\n```');
  });

  it('should drop cls from class methods but not the first argument of static methods', () => {
    expect(signatureOf('class A:\n    @classmethod\n    def create(cls, n: int):\n        pass\n', true)).toBe(
      '```python\ncreate(n: int)\n```'
    );
    expect(signatureOf('class A:\n    @staticmethod\n    def parse(self):\n        pass\n', true)).toBe(
      '```python\nparse(self)\n```'
    );
  });

  it('should break long signatures one parameter per line', () => {
    const signature = signatureOf(
      'def configure(connection_string: str, timeout_seconds: float = 30.0, retry_policy: str = "exponential") -> None:\n    pass\n'
    );

    expect(signature).toBe(
      [
        '```python',
        'configure(',
        '    connection_string: str,',
        '    timeout_seconds: float = 30.0,',
        '    retry_policy: str = "exponential",',
        ') -> None',
        '```',
      ].join('\n')
    );
  });
});

describe('importText', () => {
  it('should keep relative and absolute imports of the same names apart', () => {
    const relative: ImportDecl = {
      kind: 'from',
      module: 'util',
      names: [{ name: 'a', alias: null }, { name: 'b', alias: null }],
      relative: 2,
      wildcard: false,
    };
    const absolute: ImportDecl = { ...relative, relative: 0 };

    expect(importText(relative)).toBe('from ..util import a, b');
    expect(importText(absolute)).toBe('from util import a, b');
  });

  it('should render aliases, bare dots and wildcards', () => {
    expect(importText({ kind: 'import', module: 'numpy', alias: 'np' })).toBe('import numpy as np');
    expect(
      importText({ kind: 'from', module: null, names: [{ name: 'x', alias: 'y' }], relative: 1, wildcard: false })
    ).toBe('from . import x as y');
    expect(importText({ kind: 'from', module: 'm', names: [], relative: 1, wildcard: true })).toBe('from .m import *');
  });
});

describe('inlineCode', () => {
  it('should fold line breaks and fence text containing backticks', () => {
    expect(inlineCode('a\n    b')).toBe('`a b`');
    expect(inlineCode('say `hi`')).toBe('`` say `hi` ``');
  });
});
