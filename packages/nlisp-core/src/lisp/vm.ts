/**
 * Virtual machine
 *
 * The VM owns the global symbol table and evaluates call lists. Arguments are
 * never evaluated on the way in: closures receive them raw in their upvalue
 * slots, natives receive them raw and choose their own resolution policy.
 * That is how `if`, `quote` and `lambda` behave as special forms.
 */

import {
  type Atom,
  type ListAtom,
  makeBoolean,
  makeError,
  makeList,
  makeNative,
  makeNumber,
  theNilAtom,
} from './atom.js';
import type { ClosureAtom } from './closure.js';
import { formatAtom } from './printer.js';
import { standardPrimitives } from './primitives.js';
import { VmError, isReifiable } from './errors.js';

export interface VmOptions {
  /** Maximum nesting of evaluate() calls */
  maxDepth?: number;
  /** Sink for `print` and `printd` output, one call per line */
  write?: (text: string) => void;
}

export const DEFAULT_MAX_DEPTH = 1000;

export class Vm {
  /** Global symbol table */
  private readonly globals = new Map<string, Atom>();

  /** Current nesting of evaluate() */
  private depth: number = 0;

  /** Trace to stderr (NLISP_DEBUG), read once at construction */
  readonly debug: boolean;

  readonly maxDepth: number;
  readonly write: (text: string) => void;

  constructor(options: VmOptions = {}) {
    this.maxDepth = options.maxDepth ?? DEFAULT_MAX_DEPTH;
    this.write = options.write ?? ((text) => console.log(text));
    this.debug = Boolean(process.env.NLISP_DEBUG);

    this.globals.set('pi', makeNumber(3.14159265));
    this.globals.set('true', makeBoolean(true));
    this.globals.set('false', makeBoolean(false));
    this.globals.set('nil', theNilAtom);

    for (const [name, fn] of Object.entries(standardPrimitives)) {
      this.globals.set(name, makeNative(fn, name));
    }
  }

  /** Create or replace a global */
  define(name: string, value: Atom): void {
    this.globals.set(name, value);
  }

  lookup(name: string): Atom | undefined {
    return this.globals.get(name);
  }

  /** Names currently bound in the global table */
  globalNames(): string[] {
    return [...this.globals.keys()];
  }

  /**
   * Evaluate a call list within a closure context
   */
  evaluate(context: ClosureAtom, list: ListAtom): Atom {
    if (list.length === 0) {
      throw new VmError('NonEvaluable');
    }

    if (this.depth >= this.maxDepth) {
      throw new VmError('DepthExceeded', `limit is ${this.maxDepth}`);
    }

    this.depth++;
    try {
      const [first, ...params] = list.items;

      // Unresolved symbols stay as they are and fail at dispatch
      let head = first;
      const symbol = first.asSymbol();
      if (symbol) {
        head = this.lookup(symbol.name) ?? first;
      }

      if (this.debug) {
        console.error(`[Vm.evaluate] depth=${this.depth} head=${formatAtom(head)} params=${params.length}`);
      }

      const closure = head.asClosure();
      if (closure) {
        const frame = closure.bind(params);
        return this.evaluate(frame, frame.code);
      }

      const native = head.asNative();
      if (native) {
        return native.fn(this, context, params);
      }

      throw new VmError('NotAFunction', formatAtom(head));
    } finally {
      this.depth--;
    }
  }

  /**
   * Resolve or evaluate a single atom:
   * - a list is resolved one level and evaluated
   * - a symbol is looked up in the globals (kept as is if unbound)
   * - an upvalue reference is read from the context
   */
  evaluateAtom(context: ClosureAtom, atom: Atom): Atom {
    const list = atom.asList();
    if (list) {
      return this.evaluate(context, makeList(this.resolveParams(context, list.items, false)));
    }

    const symbol = atom.asSymbol();
    if (symbol) {
      return this.lookup(symbol.name) ?? atom;
    }

    const ref = atom.asUpvalue();
    if (ref) {
      return context.resolveRef(ref);
    }

    return atom;
  }

  /**
   * Resolve each param: upvalues through the context, symbols through the
   * globals. With evaluateEach, nested lists are resolved recursively and
   * evaluated, and their errors are kept in place as Error atoms.
   */
  resolveParams(context: ClosureAtom, params: readonly Atom[], evaluateEach: boolean): Atom[] {
    return params.map((atom) => {
      const list = atom.asList();
      if (list) {
        if (!evaluateEach) return atom;
        const resolved = makeList(this.resolveParams(context, list.items, true));
        try {
          return this.evaluate(context, resolved);
        } catch (error) {
          if (isReifiable(error)) {
            return makeError(error.kind);
          }
          throw error;
        }
      }

      const ref = atom.asUpvalue();
      if (ref) {
        return context.resolveRef(ref);
      }

      const symbol = atom.asSymbol();
      if (symbol) {
        return this.lookup(symbol.name) ?? atom;
      }

      return atom;
    });
  }
}
