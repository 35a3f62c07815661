import { parse, SourceText } from '../src/parser/parser';
import { Assign, Compound, FunctionDef, Statement } from '../src/parser/ast';
import { SourceParseError } from '../src/errors';

function parseError(source: string): SourceParseError {
  try {
    parse(source);
  } catch (err) {
    if (err instanceof SourceParseError) return err;
    throw err;
  }
  throw new Error('expected a parse error');
}

function onlyFunction(source: string): FunctionDef {
  const [statement] = parse(source).body;
  if (statement.kind !== 'FunctionDef') throw new Error(`expected FunctionDef, got ${statement.kind}`);
  return statement;
}

function onlyCompound(source: string): Compound {
  const [statement] = parse(source).body;
  if (statement.kind !== 'Compound') throw new Error(`expected Compound, got ${statement.kind}`);
  return statement;
}

function assignsIn(body: Statement[]): Assign[] {
  return body.filter((s): s is Assign => s.kind === 'Assign');
}

/** Compact view of nesting: `line` for assignments, `keyword@line[...]` for blocks. */
function shape(body: Statement[]): string[] {
  return body.map(s => {
    if (s.kind === 'Compound') return `${s.keyword}@${s.line}[${shape(s.body).join(',')}]`;
    return `${s.kind === 'Assign' ? '' : s.kind}${s.line}`;
  });
}

describe('SourceText', () => {
  test('maps offsets to 1-based lines', () => {
    const src = new SourceText('ab\ncd\n\nef');
    expect(src.lineAt(0)).toBe(1);
    expect(src.lineAt(2)).toBe(1);
    expect(src.lineAt(3)).toBe(2);
    expect(src.lineAt(6)).toBe(3);
    expect(src.lineAt(7)).toBe(4);
  });
});

describe('parse', () => {
  test('builds classes, methods and assignments', () => {
    const module = parse([
      'class Config:',
      '    Debug = True',
      '    def load(self, Path, retries=3):',
      '        Result = {}',
      '        return Result',
      '',
    ].join('\n'));

    const [classDef] = module.body;
    if (classDef.kind !== 'ClassDef') throw new Error(`expected ClassDef, got ${classDef.kind}`);
    expect(classDef.name).toBe('Config');
    expect(classDef.line).toBe(1);

    const [attr, fn] = classDef.body;
    expect(attr).toEqual({ kind: 'Assign', line: 2, targets: [{ kind: 'Name', name: 'Debug' }] });
    if (fn.kind !== 'FunctionDef') throw new Error(`expected FunctionDef, got ${fn.kind}`);
    expect(fn.name).toBe('load');
    expect(fn.line).toBe(3);
    expect(fn.parameters).toEqual([
      { name: 'self', kind: 'positional' },
      { name: 'Path', kind: 'positional' },
      { name: 'retries', kind: 'positional', default: { kind: 'Constant', type: 'number' } },
    ]);
    expect(fn.body.map(s => s.kind)).toEqual(['Assign', 'Other']);
  });

  test('classifies every parameter kind', () => {
    const fn = onlyFunction('def f(a, /, b, *args, c=1, **kw): pass\n');
    expect(fn.parameters.map(p => [p.name, p.kind])).toEqual([
      ['a', 'positional-only'],
      ['b', 'positional'],
      ['args', 'variadic'],
      ['c', 'keyword-only'],
      ['kw', 'variadic-keyword'],
    ]);
  });

  test('treats a bare star as the start of keyword-only parameters', () => {
    const fn = onlyFunction('def f(a, *, b=None): pass\n');
    expect(fn.parameters.map(p => p.kind)).toEqual(['positional', 'keyword-only']);
  });

  test('classifies default values', () => {
    const fn = onlyFunction(
      'def f(a=[], b={}, c={1}, e=(1), f=-1, g="s", h=f"x", i=None, j=..., k=dict(), l=x, m=b"z", n=True): pass\n',
    );
    expect(fn.parameters.map(p => p.default)).toEqual([
      { kind: 'NonConstant', form: 'list' },
      { kind: 'NonConstant', form: 'dict' },
      { kind: 'NonConstant', form: 'set' },
      { kind: 'Constant', type: 'number' },
      { kind: 'NonConstant', form: 'other' },
      { kind: 'Constant', type: 'string' },
      { kind: 'NonConstant', form: 'other' },
      { kind: 'Constant', type: 'none' },
      { kind: 'Constant', type: 'ellipsis' },
      { kind: 'NonConstant', form: 'call' },
      { kind: 'NonConstant', form: 'name' },
      { kind: 'Constant', type: 'bytes' },
      { kind: 'Constant', type: 'boolean' },
    ]);
  });

  test('keeps annotations out of parameter defaults', () => {
    const fn = onlyFunction('def f(x: int = 0, y: list = []) -> None:\n    pass\n');
    expect(fn.parameters).toEqual([
      { name: 'x', kind: 'positional', default: { kind: 'Constant', type: 'number' } },
      { name: 'y', kind: 'positional', default: { kind: 'NonConstant', form: 'list' } },
    ]);
  });

  test('keeps lambda parameters inside the default', () => {
    const fn = onlyFunction('def f(cb=lambda a, b=2: a, n=1): pass\n');
    expect(fn.parameters.map(p => p.name)).toEqual(['cb', 'n']);
    expect(fn.parameters[0].default).toEqual({ kind: 'NonConstant', form: 'other' });
  });

  test('classifies assignment targets', () => {
    const fn = onlyFunction([
      'def f(self, items):',
      '    a = B = 1',
      '    self.X = 2',
      '    items[0] = 3',
      '    Left, right = 1, 2',
      '    (Wrapped) = 4',
      '    Count: int = 5',
      '    Total += 1',
      '    fn = lambda Arg=1: Arg',
      '',
    ].join('\n'));

    expect(fn.body.map(s => s.kind)).toEqual([
      'Assign', 'Assign', 'Assign', 'Assign', 'Assign', 'Other', 'Other', 'Assign',
    ]);
    expect(assignsIn(fn.body).map(a => a.targets)).toEqual([
      [{ kind: 'Name', name: 'a' }, { kind: 'Name', name: 'B' }],
      [{ kind: 'Attribute' }],
      [{ kind: 'Subscript' }],
      [{ kind: 'Unpacking' }],
      [{ kind: 'Name', name: 'Wrapped' }],
      [{ kind: 'Name', name: 'fn' }],
    ]);
  });

  test('splits statements on semicolons and parses same-line bodies', () => {
    const fn = onlyFunction('def f(): X = 1; Y = 2\n');
    expect(fn.body).toEqual([
      { kind: 'Assign', line: 1, targets: [{ kind: 'Name', name: 'X' }] },
      { kind: 'Assign', line: 1, targets: [{ kind: 'Name', name: 'Y' }] },
    ]);
  });

  test('puts each except handler one level below the try body', () => {
    const compound = onlyCompound([
      'try:',
      '    a = 1',
      'except ValueError as err:',
      '    b = 2',
      'except KeyError:',
      '    e = 5',
      'else:',
      '    c = 3',
      'finally:',
      '    d = 4',
      '',
    ].join('\n'));
    expect(shape([compound])).toEqual(['try@1[2,except@3[4],except@5[6],8,10]']);
  });

  test('nests elif inside the if chain and keeps else with the last branch', () => {
    const compound = onlyCompound([
      'if a:',
      '    x = 1',
      'elif b:',
      '    y = 2',
      'elif c:',
      '    z = 3',
      'else:',
      '    w = 4',
      '',
    ].join('\n'));
    expect(shape([compound])).toEqual(['if@1[2,elif@3[4,elif@5[6,8]]]']);
  });

  test('keeps loop else bodies at the loop body level', () => {
    const compound = onlyCompound('for i in items:\n    x = i\nelse:\n    y = 0\n');
    expect(shape([compound])).toEqual(['for@1[2,4]']);
  });

  test('reads decorated and async definitions', () => {
    const module = parse('@decorator\n@other(1)\nasync def fetch(url):\n    pass\n');
    const [fn] = module.body;
    expect(fn).toMatchObject({ kind: 'FunctionDef', name: 'fetch', line: 3, isAsync: true });
  });

  test('treats match and case as keywords only where they start blocks', () => {
    const module = parse([
      'match = 1',
      'match command:',
      '    case [action, obj]:',
      '        pass',
      '    case _:',
      '        x = 1',
      '',
    ].join('\n'));
    expect(module.body[0]).toEqual({ kind: 'Assign', line: 1, targets: [{ kind: 'Name', name: 'match' }] });
    expect(shape(module.body.slice(1))).toEqual(['match@2[case@3[Other4],case@5[6]]']);
  });

  test('reads CRLF line endings', () => {
    const fn = onlyFunction('def f():\r\n    x = 1\r\n    y = 2\r\n');
    expect(fn.body.map(s => s.line)).toEqual([2, 3]);
  });

  test('parses an empty module', () => {
    expect(parse('')).toEqual({ kind: 'Module', body: [] });
  });

  describe('errors', () => {
    test('incomplete expression', () => {
      const err = parseError('x = 1\ny = (1 +)\n');
      expect(err.reason).toBe('invalid syntax');
      expect(err.line).toBe(2);
    });

    test('else without an if', () => {
      expect(parseError('else:\n    pass\n').reason).toBe('invalid syntax');
    });

    test('missing colon after a function header', () => {
      expect(parseError('def f(x)\n    pass\n').reason).toBe('invalid syntax');
    });

    test('missing function name', () => {
      expect(parseError('def (x):\n    pass\n').reason).toBe('invalid syntax');
    });

    test('unclosed parameter list', () => {
      expect(parseError('def broken(:\n    pass\n').reason).toBe('invalid syntax');
    });

    test('assignment without a value', () => {
      expect(parseError('x =\n').reason).toBe('invalid syntax');
    });
  });
});
