import { describe, it, expect } from 'vitest';
import {
  FStringMissing,
  MagicLiteralRule,
  MissingDocstringRule,
  NamingConventions,
  PrintStatements,
  ShadowBuiltins,
  UnusedVariables,
} from '../src/rules/style.js';
import { py, runRule, summarize } from './utils.js';

describe('UnusedVariables', () => {
  it('reports stored names never loaded, except underscored ones', () => {
    const source = py`
      def f():
          total = 1
          _ignored = 2
          used = 3
          return used
    `;
    expect(summarize(runRule(new UnusedVariables(), source))).toEqual([
      ['2', 'Variable "total" assigned but not used.'],
    ]);
  });

  it('uses the first store line of a name', () => {
    const source = py`
      count = 0
      for count in range(3):
          pass
    `;
    expect(summarize(runRule(new UnusedVariables(), source))).toEqual([
      ['1', 'Variable "count" assigned but not used.'],
    ]);
  });
});

describe('ShadowBuiltins', () => {
  it('flags parameters and assignment targets', () => {
    const source = py`
      def f(list, y):
          return y
      id = 3
    `;
    expect(summarize(runRule(new ShadowBuiltins(), source))).toEqual([
      ['1', 'Parameter "list" shadows built-in.'],
      ['3', 'Variable "id" shadows built-in.'],
    ]);
  });
});

describe('PrintStatements', () => {
  it('flags print calls', () => {
    const source = py`
      print("hi")
      logger.print("hi")
    `;
    expect(summarize(runRule(new PrintStatements(), source))).toEqual([
      ['1', 'print() used; consider logging or returning values instead.'],
    ]);
  });
});

describe('FStringMissing', () => {
  const message = 'String contains { } but is not an f-string (missing f-prefix or .format).';

  it('flags template-looking plain strings', () => {
    const source = py`
      name = "x"
      a = "Hello {name}"
      b = "Hello {name}".format(name=name)
      c = f"Hello {name}"
      d = "{{literal}}"
      e = "{0}"
      g = ("Hello {name}" " and more")
    `;
    expect(summarize(runRule(new FStringMissing(), source))).toEqual([
      ['2', message],
      ['7', message],
    ]);
  });
});

describe('NamingConventions', () => {
  it('checks functions, classes, parameters and variables', () => {
    const source = py`
      def BadName(self, someArg):
          localVar = someArg
          return localVar
      class lower_class:
          pass
      MAX_SIZE = 10
    `;
    expect(summarize(runRule(new NamingConventions(), source))).toEqual([
      ['1', 'Function name "BadName" is not snake_case.'],
      ['1', 'Parameter name "someArg" is not snake_case.'],
      ['4', 'Class name "lower_class" is not CamelCase.'],
      ['2', 'Variable "localVar" is not snake_case.'],
    ]);
  });

  it('accepts dunder methods and lambda parameters in snake_case', () => {
    const source = py`
      class Box:
          def __init__(self, size):
              self.size = size
      key = lambda item: item
    `;
    expect(runRule(new NamingConventions(), source)).toEqual([]);
  });
});

describe('MagicLiteralRule', () => {
  it('flags unexplained numbers in comparisons, returns and assignments', () => {
    const source = py`
      def area(r):
          if r > 100:
              return r * 3.14
          for i in range(10):
              pass
          return 2
      LIMIT = 50
      x = 4.0 + 7
      steps = range(5, 20)
    `;
    expect(summarize(runRule(new MagicLiteralRule(), source))).toEqual([
      ['2', "Magic literal '100' detected; use a named constant."],
      ['3', "Magic literal '3.14' detected; use a named constant."],
      ['8', "Magic literal '4.0' detected; use a named constant."],
      ['8', "Magic literal '7' detected; use a named constant."],
    ]);
  });

  it('renders numbers the way Python prints them', () => {
    const source = py`
      big = 12345678901234567890
      huge = 1e20
      mask = 0xFF
      tiny = 0.00001
    `;
    expect(summarize(runRule(new MagicLiteralRule(), source))).toEqual([
      ['1', "Magic literal '12345678901234567890' detected; use a named constant."],
      ['2', "Magic literal '1e+20' detected; use a named constant."],
      ['3', "Magic literal '255' detected; use a named constant."],
      ['4', "Magic literal '1e-05' detected; use a named constant."],
    ]);
  });

  it('skips annotated assignments', () => {
    const source = py`
      timeout: int = 30
    `;
    expect(runRule(new MagicLiteralRule(), source)).toEqual([]);
  });
});

describe('MissingDocstringRule', () => {
  it('flags public definitions without a docstring', () => {
    const source = py`
      """Module doc."""
      def public():
          pass
      def _private():
          pass
      class Thing:
          """Doc."""
          async def run(self):
              pass
    `;
    expect(summarize(runRule(new MissingDocstringRule(), source))).toEqual([
      ['2', "Public function 'public' missing docstring."],
      ['8', "Public async function 'run' missing docstring."],
    ]);
  });

  it('flags a module without a docstring at line 1', () => {
    expect(summarize(runRule(new MissingDocstringRule(), 'x = 1\n'))).toEqual([
      ['1', 'Module missing top-level docstring.'],
    ]);
  });
});
