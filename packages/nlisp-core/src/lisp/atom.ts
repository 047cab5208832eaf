/**
 * Atom value system
 *
 * Every piece of syntax, data and runtime state is an Atom. Atoms are
 * immutable once built; narrowing goes through the as*() predicates, which
 * return the concrete subclass or null.
 */

import type { ClosureAtom } from './closure.js';
import type { VmErrorKind } from './errors.js';
import type { Vm } from './vm.js';

export type AtomKind =
  | 'Symbol'
  | 'Number'
  | 'String'
  | 'List'
  | 'Bool'
  | 'Nil'
  | 'Error'
  | 'Upvalue'
  | 'Closure'
  | 'NativeFunction';

/**
 * Builtin callable signature. Params arrive unevaluated; each native decides
 * how much of them to resolve or evaluate.
 */
export type NativeFunction = (vm: Vm, context: ClosureAtom, params: readonly Atom[]) => Atom;

/**
 * Base class for all atoms
 */
export abstract class Atom {
  abstract readonly kind: AtomKind;

  asSymbol(): SymbolAtom | null { return null; }
  asNumber(): NumberAtom | null { return null; }
  asString(): StringAtom | null { return null; }
  asList(): ListAtom | null { return null; }
  asBool(): BoolAtom | null { return null; }
  asNil(): NilAtom | null { return null; }
  asError(): ErrorAtom | null { return null; }
  asUpvalue(): UpvalueRefAtom | null { return null; }
  asClosure(): ClosureAtom | null { return null; }
  asNative(): NativeFunctionAtom | null { return null; }

  /** Name reported by the `type` primitive */
  typeName(): string {
    return this.kind;
  }

  /**
   * Structural equality. Atoms of different kinds are never equal;
   * subclasses compare their own payload.
   */
  abstract equals(other: Atom): boolean;
}

export class SymbolAtom extends Atom {
  readonly kind = 'Symbol';

  constructor(public readonly name: string) {
    super();
  }

  asSymbol(): SymbolAtom { return this; }

  equals(other: Atom): boolean {
    return other.asSymbol()?.name === this.name;
  }
}

/**
 * Single-precision number. The value is always rounded through Math.fround.
 */
export class NumberAtom extends Atom {
  readonly kind = 'Number';
  readonly value: number;

  constructor(value: number) {
    super();
    this.value = Math.fround(value);
  }

  asNumber(): NumberAtom { return this; }

  equals(other: Atom): boolean {
    const n = other.asNumber();
    return n !== null && n.value === this.value;
  }
}

export class StringAtom extends Atom {
  readonly kind = 'String';

  constructor(public readonly value: string) {
    super();
  }

  asString(): StringAtom { return this; }

  equals(other: Atom): boolean {
    return other.asString()?.value === this.value;
  }
}

export class ListAtom extends Atom {
  readonly kind = 'List';
  constructor(public readonly items: readonly Atom[]) {
    super();
  }

  asList(): ListAtom { return this; }

  get length(): number {
    return this.items.length;
  }

  equals(other: Atom): boolean {
    const list = other.asList();
    return list !== null && atomsEqual(this.items, list.items);
  }
}

export class BoolAtom extends Atom {
  readonly kind = 'Bool';

  constructor(public readonly value: boolean) {
    super();
  }

  asBool(): BoolAtom { return this; }

  equals(other: Atom): boolean {
    return other.asBool()?.value === this.value;
  }
}

export class NilAtom extends Atom {
  readonly kind = 'Nil';

  asNil(): NilAtom { return this; }

  equals(other: Atom): boolean {
    return other.asNil() !== null;
  }
}

/**
 * An evaluation error reified as a value (produced by `eval` and by
 * evaluate-each argument resolution)
 */
export class ErrorAtom extends Atom {
  readonly kind = 'Error';

  constructor(public readonly errorKind: VmErrorKind) {
    super();
  }

  asError(): ErrorAtom { return this; }

  typeName(): string {
    return `Error:${this.errorKind}`;
  }

  equals(other: Atom): boolean {
    return other.asError()?.errorKind === this.errorKind;
  }
}

/**
 * Positional reference into the owning closure's upvalue slots
 */
export class UpvalueRefAtom extends Atom {
  readonly kind = 'Upvalue';

  constructor(
    public readonly index: number,
    public readonly name: string
  ) {
    super();
  }

  asUpvalue(): UpvalueRefAtom { return this; }

  equals(other: Atom): boolean {
    const ref = other.asUpvalue();
    return ref !== null && ref.index === this.index && ref.name === this.name;
  }
}

export class NativeFunctionAtom extends Atom {
  readonly kind = 'NativeFunction';

  constructor(
    public readonly fn: NativeFunction,
    public readonly name: string = '<native>'
  ) {
    super();
  }

  asNative(): NativeFunctionAtom { return this; }

  /** All natives compare equal, whatever function they wrap. */
  equals(other: Atom): boolean {
    return other.asNative() !== null;
  }
}

export function atomsEqual(a: readonly Atom[], b: readonly Atom[]): boolean {
  if (a.length !== b.length) return false;
  for (let i = 0; i < a.length; i++) {
    if (!a[i].equals(b[i])) return false;
  }
  return true;
}

/**
 * Singleton constants
 */
export const theNilAtom = new NilAtom();
export const theTrueAtom = new BoolAtom(true);
export const theFalseAtom = new BoolAtom(false);

/**
 * Convenience constructors. makeList copies its items, so the caller's array
 * stays independent of the list.
 */
export function makeSymbol(name: string): SymbolAtom {
  return new SymbolAtom(name);
}

export function makeNumber(value: number): NumberAtom {
  return new NumberAtom(value);
}

export function makeString(value: string): StringAtom {
  return new StringAtom(value);
}

export function makeList(items: readonly Atom[]): ListAtom {
  return new ListAtom([...items]);
}

export function makeBoolean(value: boolean): BoolAtom {
  return value ? theTrueAtom : theFalseAtom;
}

export function makeError(kind: VmErrorKind): ErrorAtom {
  return new ErrorAtom(kind);
}

export function makeUpvalueRef(index: number, name: string): UpvalueRefAtom {
  return new UpvalueRefAtom(index, name);
}

export function makeNative(fn: NativeFunction, name?: string): NativeFunctionAtom {
  return new NativeFunctionAtom(fn, name);
}
