/**
 * Builtin functions
 *
 * Every primitive receives its params raw. The argument policy is part of
 * each primitive's contract:
 * - none: params are used verbatim (quote, printd)
 * - resolve: upvalues and globals are substituted, lists left alone
 *   (lambda, type, resolve)
 * - evaluate: nested lists are evaluated as calls (+, *, =, print)
 * - selective: only the params actually needed are evaluated (if, global, neg)
 */

import {
  type Atom,
  type ListAtom,
  type NativeFunction,
  makeBoolean,
  makeError,
  makeList,
  makeNumber,
  makeString,
  theNilAtom,
} from './atom.js';
import { ClosureAtom } from './closure.js';
import { VmError, isReifiable } from './errors.js';
import { debugAtom, formatAtom } from './printer.js';

/**
 * Substitute upvalue references against the context, descending into every
 * nested list
 */
function resolveUpvalues(context: ClosureAtom, atoms: readonly Atom[]): Atom[] {
  return atoms.map((atom) => {
    const list = atom.asList();
    if (list) {
      return makeList(resolveUpvalues(context, list.items));
    }
    return context.resolve(atom);
  });
}

/** Numeric value of an atom; anything but a number counts as 0 */
function toNumber(atom: Atom): number {
  return atom.asNumber()?.value ?? 0;
}

function isFalsy(atom: Atom): boolean {
  return atom.asNil() !== null || atom.asBool()?.value === false;
}

/**
 * (if cond then [else])
 *
 * Bool false and nil are falsy, everything else is truthy. Only the selected
 * branch is evaluated; a missing branch gives nil.
 */
const ifPrimitive: NativeFunction = (vm, context, params) => {
  if (params.length === 0) {
    throw new VmError('InvalidUsage', 'if requires a condition');
  }

  const cond = vm.evaluateAtom(context, params[0]);
  const branch = isFalsy(cond) ? params[2] : params[1];
  return branch ? vm.evaluateAtom(context, branch) : theNilAtom;
};

/**
 * (lambda (params...) (body...))
 *
 * Upvalues already bound in the current context are substituted into the
 * body first, which is how nested lambdas capture outer parameters.
 */
const lambdaPrimitive: NativeFunction = (vm, context, params) => {
  const [names, source] = vm.resolveParams(context, params, false);

  const nameList = names?.asList();
  const sourceList = source?.asList();
  if (!nameList || !sourceList) {
    throw new VmError('InvalidUsage', 'lambda expects a parameter list and a body list');
  }

  const upvalueNames: string[] = [];
  for (const atom of nameList.items) {
    const symbol = atom.asSymbol();
    if (!symbol) {
      throw new VmError('InvalidUsage', `lambda parameter is not a symbol: ${formatAtom(atom)}`);
    }
    upvalueNames.push(symbol.name);
  }

  const closure = ClosureAtom.compile(makeList(resolveUpvalues(context, sourceList.items)), upvalueNames);
  if (vm.debug) {
    console.error(`[lambda] compiled (${upvalueNames.join(' ')}) ${formatAtom(closure.code)}`);
  }
  return closure;
};

/**
 * (quote ...) returns its params untouched
 */
const quotePrimitive: NativeFunction = (_vm, _context, params) => makeList(params);

/**
 * (global name value)
 *
 * Binds the evaluated value under `name`. The name is taken literally, or
 * read from an upvalue holding a symbol.
 */
const globalPrimitive: NativeFunction = (vm, context, params) => {
  const nameAtom = params.length > 0 ? context.resolve(params[0]) : undefined;
  const symbol = nameAtom?.asSymbol();
  if (!symbol) {
    throw new VmError('NotASymbol', 'global expects a name');
  }

  if (params.length < 2) {
    throw new VmError('InvalidUsage', `global ${symbol.name} has no value`);
  }

  vm.define(symbol.name, vm.evaluateAtom(context, params[1]));
  return theNilAtom;
};

/**
 * (eval (expr1) ... (exprN))
 *
 * Evaluates each list and collects the results; a failing expression shows
 * up as an Error atom in its place.
 */
const evalPrimitive: NativeFunction = (vm, context, params) => {
  const lists: ListAtom[] = [];
  for (const atom of params) {
    const list = atom.asList();
    if (!list) {
      throw new VmError('InvalidUsage', `eval expects lists, got ${formatAtom(atom)}`);
    }
    lists.push(list);
  }

  return makeList(lists.map((list) => {
    try {
      return vm.evaluate(context, list);
    } catch (error) {
      if (!isReifiable(error)) throw error;
      return makeError(error.kind);
    }
  }));
};

/**
 * (type val1 ... valN) lists the type name of each value
 */
const typePrimitive: NativeFunction = (vm, context, params) =>
  makeList(vm.resolveParams(context, params, false).map((atom) => makeString(atom.typeName())));

const resolvePrimitive: NativeFunction = (vm, context, params) =>
  makeList(vm.resolveParams(context, params, false));

const sumPrimitive: NativeFunction = (vm, context, params) =>
  makeNumber(vm.resolveParams(context, params, true).reduce((acc, atom) => Math.fround(acc + toNumber(atom)), 0));

/**
 * (* num1 ... numN)
 *
 * The fold is seeded with 0, not 1.
 */
const productPrimitive: NativeFunction = (vm, context, params) => {
  const values = vm.resolveParams(context, params, true).map((atom) => {
    const list = atom.asList();
    if (!list) return atom;
    try {
      return vm.evaluate(context, list);
    } catch (error) {
      if (!isReifiable(error)) throw error;
      return theNilAtom;
    }
  });
  return makeNumber(values.reduce((acc, atom) => Math.fround(acc * toNumber(atom)), 0));
};

/**
 * (= val1 ... valN) is true when every value equals the first
 */
const equalPrimitive: NativeFunction = (vm, context, params) => {
  const [first, ...rest] = vm.resolveParams(context, params, true);
  if (!first) {
    return makeBoolean(true);
  }
  return makeBoolean(rest.every((atom) => first.equals(atom)));
};

/**
 * (neg num) negates a number; other values pass through
 */
const negPrimitive: NativeFunction = (vm, context, params) => {
  const value = vm.evaluateAtom(context, params[0] ?? theNilAtom);
  const num = value.asNumber();
  return num ? makeNumber(-num.value) : value;
};

const printPrimitive: NativeFunction = (vm, context, params) => {
  vm.write(formatAtom(makeList(vm.resolveParams(context, params, true))));
  return theNilAtom;
};

const printdPrimitive: NativeFunction = (vm, _context, params) => {
  vm.write(debugAtom(makeList(params)));
  return theNilAtom;
};

/**
 * (map func list)
 *
 * Calls func once per element, passing the element raw, and collects the
 * results.
 */
const mapPrimitive: NativeFunction = (vm, context, params) => {
  if (params.length < 2) {
    throw new VmError('InvalidUsage', 'map expects a function and a list');
  }

  const func = vm.evaluateAtom(context, params[0]);
  if (!func.asClosure() && !func.asNative()) {
    throw new VmError('NotAFunction', formatAtom(func));
  }

  const list = vm.evaluateAtom(context, params[1]).asList();
  if (!list) {
    throw new VmError('InvalidUsage', 'map expects a list');
  }

  return makeList(list.items.map((item) => vm.evaluate(context, makeList([func, item]))));
};

/**
 * Primitives installed in every new VM, by global name
 */
export const standardPrimitives: Readonly<Record<string, NativeFunction>> = {
  print: printPrimitive,
  printd: printdPrimitive,
  if: ifPrimitive,
  lambda: lambdaPrimitive,
  quote: quotePrimitive,
  type: typePrimitive,
  global: globalPrimitive,
  resolve: resolvePrimitive,
  eval: evalPrimitive,
  '+': sumPrimitive,
  '*': productPrimitive,
  '=': equalPrimitive,
  neg: negPrimitive,
  map: mapPrimitive,
};
