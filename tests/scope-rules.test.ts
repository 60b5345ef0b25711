import { describe, it, expect } from 'vitest';
import { UndefinedNameRule } from '../src/rules/undefined-names.js';
import { ConcurrencyRule, ThreadSafetyRule } from '../src/rules/concurrency.js';
import { py, runRule, summarize } from './utils.js';

describe('UndefinedNameRule', () => {
  it('checks module code and each function body once', () => {
    const source = py`
      import os
      def f(a):
          b = a + c
          return os.path.join(b, undefined_thing)
      print(f(1), missing)
    `;
    expect(summarize(runRule(new UndefinedNameRule(), source))).toEqual([
      ['5', 'Name "missing" might be undefined in this scope.'],
      ['3', 'Name "c" might be undefined in this scope.'],
      ['4', 'Name "undefined_thing" might be undefined in this scope.'],
    ]);
  });

  it('sees handler names, comprehension targets and lambda parameters', () => {
    const source = py`
      try:
          value = int("3")
      except ValueError as err:
          print(err)
      squares = [n * n for n in range(value)]
      double = lambda k: k * 2
      print(__name__, squares, double)
    `;
    expect(runRule(new UndefinedNameRule(), source)).toEqual([]);
  });

  it('reports a name used inside a nested function only once', () => {
    const source = py`
      def outer():
          def inner():
              return ghost
          return inner
    `;
    expect(summarize(runRule(new UndefinedNameRule(), source))).toEqual([
      ['3', 'Name "ghost" might be undefined in this scope.'],
    ]);
  });
});

describe('ConcurrencyRule', () => {
  it('flags threads started without join in their scope', () => {
    const source = py`
      import threading
      def worker():
          pass
      def run():
          t = threading.Thread(target=worker)
          t.start()
          u = threading.Thread(target=worker)
          u.start()
          u.join()
    `;
    expect(summarize(runRule(new ConcurrencyRule(), source))).toEqual([
      ['6', 'Thread "t" started but not joined in scope "run".'],
    ]);
  });

  it('flags a worker started inline', () => {
    const source = py`
      import threading
      threading.Thread(target=print).start()
    `;
    expect(summarize(runRule(new ConcurrencyRule(), source))).toEqual([
      ['2', 'Thread started without a matching join(); ensure a join() in this code path.'],
    ]);
  });

  it('follows from-import aliases at module scope', () => {
    const source = py`
      from threading import Thread as T
      t = T(target=print)
      t.start()
    `;
    expect(summarize(runRule(new ConcurrencyRule(), source))).toEqual([
      ['3', 'Thread "t" started but not joined in scope "<module>".'],
    ]);
  });

  it('flags multiprocessing objects created at import time', () => {
    const source = py`
      import multiprocessing as mp
      pool = mp.Pool(4)
      if __name__ == "__main__":
          p = mp.Process(target=print)
          p.start()
          p.join()
    `;
    expect(summarize(runRule(new ConcurrencyRule(), source))).toEqual([
      ['2', "multiprocessing object created at import time; protect with if __name__ == '__main__':"],
    ]);
  });
});

describe('ThreadSafetyRule', () => {
  it('lists mutable globals written in a threaded module', () => {
    const source = py`
      import threading
      cache = {}
      items = []
      def work():
          cache["k"] = 1
      threading.Thread(target=work).start()
    `;
    expect(summarize(runRule(new ThreadSafetyRule(), source))).toEqual([
      ['2', "Mutable globals ['cache', 'items'] written while using threads; use locks or avoid shared state."],
    ]);
  });

  it('stays quiet without threads', () => {
    const source = py`
      cache = {}
      cache["k"] = 1
    `;
    expect(runRule(new ThreadSafetyRule(), source)).toEqual([]);
  });
});
