/**
 * Closure compiler tests
 */

import { describe, it, expect } from 'vitest';
import { ClosureAtom } from './closure.js';
import { type ListAtom, makeList, makeNumber, makeSymbol, makeUpvalueRef, theNilAtom } from './atom.js';
import { parseOne } from './parser.js';
import { formatAtom } from './printer.js';

function listOf(source: string): ListAtom {
  const list = parseOne(source).asList();
  if (!list) throw new Error(`not a list: ${source}`);
  return list;
}

describe('Closure - Compile', () => {
  it('should build a thin closure when there are no upvalues', () => {
    const code = listOf('(+ a b)');
    const closure = ClosureAtom.compile(code, []);
    expect(closure.isThin).toBe(true);
    expect(closure.upvalues).toBeNull();
    expect(closure.code).toBe(code);
  });

  it('should replace a matching symbol with an upvalue reference', () => {
    const closure = ClosureAtom.compile(makeList([makeSymbol('a')]), ['a', 'b']);
    expect(closure.code.items[0].equals(makeUpvalueRef(0, 'a'))).toBe(true);
  });

  it('should start slots as placeholder symbols', () => {
    const closure = ClosureAtom.compile(listOf('(a b)'), ['a', 'b']);
    expect(closure.upvalues?.map(formatAtom)).toEqual(['a', 'b']);
  });

  it('should rewrite nested lists, quoted data included', () => {
    const closure = ClosureAtom.compile(listOf('(quote (x y) z x)'), ['x']);
    expect(formatAtom(closure.code)).toBe('(quote (#<upvalue 0 x> y) z #<upvalue 0 x>)');
  });

  it('should use the first index for a repeated name', () => {
    const closure = ClosureAtom.compile(listOf('(x)'), ['x', 'x']);
    expect(closure.code.items[0].asUpvalue()?.index).toBe(0);
  });
});

describe('Closure - Resolve', () => {
  const closure = ClosureAtom.compile(listOf('(a b)'), ['a', 'b']).bind([makeNumber(1), makeNumber(2)]);

  it('should substitute upvalue references', () => {
    expect(closure.resolve(makeUpvalueRef(1, 'b')).asNumber()?.value).toBe(2);
  });

  it('should pass other atoms through', () => {
    const symbol = makeSymbol('c');
    expect(closure.resolve(symbol)).toBe(symbol);
  });

  it('should resolve out-of-range references to nil', () => {
    expect(closure.resolveRef(makeUpvalueRef(5, 'z'))).toBe(theNilAtom);
  });

  it('should resolve every reference of a thin closure to nil', () => {
    const thin = ClosureAtom.compileThin(makeList([]));
    expect(thin.resolveRef(makeUpvalueRef(0, 'a'))).toBe(theNilAtom);
  });
});

describe('Closure - Bind', () => {
  it('should return a new frame and leave the closure untouched', () => {
    const closure = ClosureAtom.compile(listOf('(a b)'), ['a', 'b']);
    const frame = closure.bind([makeNumber(1), makeNumber(2)]);

    expect(frame).not.toBe(closure);
    expect(frame.code).toBe(closure.code);
    expect(frame.upvalues?.map(formatAtom)).toEqual(['1', '2']);
    expect(closure.upvalues?.map(formatAtom)).toEqual(['a', 'b']);
  });

  it('should keep placeholders for missing params and ignore extra ones', () => {
    const closure = ClosureAtom.compile(listOf('(a b)'), ['a', 'b']);
    expect(closure.bind([makeNumber(1)]).upvalues?.map(formatAtom)).toEqual(['1', 'b']);
    expect(closure.bind([makeNumber(1), makeNumber(2), makeNumber(3)]).upvalues?.length).toBe(2);
  });

  it('should bind a thin closure to itself', () => {
    const thin = ClosureAtom.compileThin(listOf('(a)'));
    expect(thin.bind([makeNumber(1)])).toBe(thin);
  });
});
