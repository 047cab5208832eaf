/**
 * Atom printer
 */

import type { Atom } from './atom.js';

/**
 * Shortest decimal text that reads back to the same float32
 */
export function formatNumber(value: number): string {
  if (!Number.isFinite(value)) {
    return String(value);
  }
  for (let precision = 1; precision <= 9; precision++) {
    const candidate = Number(value.toPrecision(precision));
    if (Math.fround(candidate) === value) {
      return String(candidate);
    }
  }
  return String(value);
}

/**
 * Render an atom the way it would be written in source
 */
export function formatAtom(atom: Atom): string {
  const symbol = atom.asSymbol();
  if (symbol) return symbol.name;

  const num = atom.asNumber();
  if (num) return formatNumber(num.value);

  const str = atom.asString();
  if (str) return `"${str.value}"`;

  const list = atom.asList();
  if (list) return `(${list.items.map(formatAtom).join(' ')})`;

  const bool = atom.asBool();
  if (bool) return bool.value ? 'true' : 'false';

  if (atom.asNil()) return 'nil';

  const error = atom.asError();
  if (error) return `#<error ${error.errorKind}>`;

  const ref = atom.asUpvalue();
  if (ref) return `#<upvalue ${ref.index} ${ref.name}>`;

  if (atom.asClosure()) return '#<closure>';

  return '#<native>';
}

/**
 * Render the variant structure of an atom, e.g. List[Symbol(+), Number(1)]
 */
export function debugAtom(atom: Atom): string {
  const list = atom.asList();
  if (list) return `List[${list.items.map(debugAtom).join(', ')}]`;

  const closure = atom.asClosure();
  if (closure) {
    const slots = closure.upvalues ? `[${closure.upvalues.map(debugAtom).join(', ')}]` : 'thin';
    return `Closure(${slots}, ${debugAtom(closure.code)})`;
  }

  const ref = atom.asUpvalue();
  if (ref) return `Upvalue(${ref.index}, ${ref.name})`;

  const error = atom.asError();
  if (error) return `Error(${error.errorKind})`;

  if (atom.asNil()) return 'Nil';
  if (atom.asNative()) return 'NativeFunction';

  return `${atom.kind}(${formatAtom(atom)})`;
}
