/**
 * Program runner - the embedding entry point
 *
 * Parses a source text and evaluates each top-level list against an empty
 * root closure. Non-list top-level atoms are returned as they are.
 */

import { type Atom, makeList } from './lisp/atom.js';
import { ClosureAtom } from './lisp/closure.js';
import { VmError } from './lisp/errors.js';
import { parse } from './lisp/parser.js';
import { Vm, type VmOptions } from './lisp/vm.js';

export type FormResult =
  | { ok: true; value: Atom }
  | { ok: false; error: VmError };

export interface RunOptions extends VmOptions {
  /** Evaluate in an existing VM instead of a fresh one */
  vm?: Vm;
}

/**
 * Create the empty root context top-level forms are evaluated in
 */
export function createRootContext(): ClosureAtom {
  return ClosureAtom.compileThin(makeList([]));
}

/**
 * Run every top-level form of a program.
 *
 * A parse error aborts the whole run. An evaluation error only fails its own
 * form; the following forms still run.
 */
export function runProgram(source: string, options: RunOptions = {}): FormResult[] {
  const vm = options.vm ?? new Vm(options);
  const root = createRootContext();
  const forms = parse(source);

  const results: FormResult[] = [];
  for (const form of forms.items) {
    const list = form.asList();
    if (!list) {
      results.push({ ok: true, value: form });
      continue;
    }

    try {
      results.push({ ok: true, value: vm.evaluate(root, list) });
    } catch (error) {
      if (!(error instanceof VmError)) throw error;
      results.push({ ok: false, error });
    }
  }

  return results;
}
