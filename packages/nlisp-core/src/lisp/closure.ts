/**
 * Closures and the upvalue compiler
 *
 * A closure pairs a code body with positional upvalue slots. Compiling a
 * closure rewrites every symbol naming a declared parameter into an
 * UpvalueRefAtom; calling it binds arguments into a fresh copy of the slots.
 */

import {
  Atom,
  type ListAtom,
  atomsEqual,
  makeList,
  makeSymbol,
  makeUpvalueRef,
  theNilAtom,
  type UpvalueRefAtom,
} from './atom.js';

/**
 * Replace each symbol naming an upvalue with its reference, descending into
 * every nested list (quoted data included).
 */
function upvalueizeSymbols(code: ListAtom, names: readonly string[]): ListAtom {
  return makeList(code.items.map((atom) => {
    const symbol = atom.asSymbol();
    if (symbol) {
      const index = names.indexOf(symbol.name);
      return index === -1 ? atom : makeUpvalueRef(index, symbol.name);
    }
    const list = atom.asList();
    if (list) {
      return upvalueizeSymbols(list, names);
    }
    return atom;
  }));
}

export class ClosureAtom extends Atom {
  readonly kind = 'Closure';

  /**
   * @param upvalues Captured slots, or null for a thin closure
   * @param code Body evaluated on call
   */
  constructor(
    public readonly upvalues: readonly Atom[] | null,
    public readonly code: ListAtom
  ) {
    super();
  }

  /**
   * Build a closure from a code list and its upvalue names. Slots start out
   * holding placeholder symbols named after the parameters.
   */
  static compile(code: ListAtom, upvalueNames: readonly string[]): ClosureAtom {
    if (upvalueNames.length === 0) {
      return ClosureAtom.compileThin(code);
    }

    return new ClosureAtom(
      upvalueNames.map((name) => makeSymbol(name)),
      upvalueizeSymbols(code, upvalueNames)
    );
  }

  /** Closure with no upvalues; the code is kept as is. */
  static compileThin(code: ListAtom): ClosureAtom {
    return new ClosureAtom(null, code);
  }

  asClosure(): ClosureAtom { return this; }

  get isThin(): boolean {
    return this.upvalues === null;
  }

  /**
   * Per-call binding frame: a new closure sharing this code whose slots are
   * overwritten positionally by params. Slots without a matching param keep
   * their current value.
   */
  bind(params: readonly Atom[]): ClosureAtom {
    if (!this.upvalues) {
      return this;
    }
    const slots = this.upvalues.map((slot, i) => (i < params.length ? params[i] : slot));
    return new ClosureAtom(slots, this.code);
  }

  /** Substitute an upvalue reference; anything else passes through. */
  resolve(atom: Atom): Atom {
    const ref = atom.asUpvalue();
    return ref ? this.resolveRef(ref) : atom;
  }

  resolveRef(ref: UpvalueRefAtom): Atom {
    if (this.upvalues && ref.index < this.upvalues.length) {
      return this.upvalues[ref.index];
    }
    return theNilAtom;
  }

  equals(other: Atom): boolean {
    const closure = other.asClosure();
    if (!closure || !this.code.equals(closure.code)) return false;
    if (this.upvalues === null || closure.upvalues === null) {
      return this.upvalues === closure.upvalues;
    }
    return atomsEqual(this.upvalues, closure.upvalues);
  }
}
