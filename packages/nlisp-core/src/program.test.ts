/**
 * Program runner tests
 */

import { describe, it, expect } from 'vitest';
import { runProgram, createRootContext, type FormResult } from './program.js';
import { ParseError } from './lisp/parser.js';
import { formatAtom } from './lisp/printer.js';
import { Vm } from './lisp/vm.js';

const DEFINE_FN = `
(global fn
    (lambda (name args definition)
        (global name (lambda args definition))))

(fn - (a b)
    (+ a (neg b)))
`;

const DEFINE_FIB = `
(fn fib (n fib)
    (if (= n 0)
        0
    (if (= n 1)
        1
    (+ (fib (- n 1)) (fib (- n 2))))))
`;

function describeResults(results: readonly FormResult[]): string[] {
  return results.map((result) => (result.ok ? formatAtom(result.value) : `error: ${result.error.kind}`));
}

describe('Program - Forms', () => {
  it('should evaluate each top-level list', () => {
    expect(describeResults(runProgram('(+ 1 2) (= 1 1)'))).toEqual(['3', 'true']);
  });

  it('should return non-list forms as they are', () => {
    expect(describeResults(runProgram('1 "s" pi'))).toEqual(['1', '"s"', 'pi']);
  });

  it('should give no results for an empty program', () => {
    expect(runProgram('')).toEqual([]);
  });

  it('should keep running after a failing form', () => {
    expect(describeResults(runProgram('(missing) () (+ 1 1)'))).toEqual([
      'error: NotAFunction',
      'error: NonEvaluable',
      '2',
    ]);
  });

  it('should abort on a parse error', () => {
    expect(() => runProgram('(+ 1 2')).toThrow(ParseError);
  });

  it('should pass options to the VM', () => {
    const lines: string[] = [];
    const source = '(global loop (lambda (x) (loop x))) (loop 1) (print 1)';
    const results = runProgram(source, { maxDepth: 20, write: (text) => lines.push(text) });
    expect(describeResults(results)).toEqual(['nil', 'error: DepthExceeded', 'nil']);
    expect(lines).toEqual(['(1)']);
  });

  it('should start from an empty thin context', () => {
    const root = createRootContext();
    expect(root.isThin).toBe(true);
    expect(root.code.length).toBe(0);
  });
});

describe('Program - Function definitions', () => {
  it('should define functions through a defining function', () => {
    expect(describeResults(runProgram(`${DEFINE_FN} (- 10 4)`))).toEqual(['nil', 'nil', '6']);
  });

  it('should compute fibonacci numbers', () => {
    const results = runProgram(`${DEFINE_FN} ${DEFINE_FIB} (fib 10 fib)`);
    expect(describeResults(results)).toEqual(['nil', 'nil', 'nil', '55']);
  });

  it('should not change a stored closure when it is called', () => {
    const vm = new Vm();
    runProgram(`${DEFINE_FN} ${DEFINE_FIB}`, { vm });

    const first = describeResults(runProgram('(fib 10 fib)', { vm }));
    const second = describeResults(runProgram('(fib 10 fib)', { vm }));

    expect(first).toEqual(['55']);
    expect(second).toEqual(['55']);
    expect(vm.lookup('fib')?.asClosure()?.upvalues?.map(formatAtom)).toEqual(['n', 'fib']);
  });

  it('should run the bundled sample size', () => {
    const results = runProgram(`${DEFINE_FN} ${DEFINE_FIB} (fib 25 fib)`);
    expect(describeResults(results)).toEqual(['nil', 'nil', 'nil', '75025']);
  }, 60_000);
});
