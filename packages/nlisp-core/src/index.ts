/**
 * nlisp core
 *
 * - Atom value model
 * - S-expression parser
 * - Closure/upvalue compiler
 * - Evaluator (VM) and primitive library
 * - Program runner
 */

export * from './lisp/atom.js';
export { ClosureAtom } from './lisp/closure.js';
export { VmError, isReifiable, type VmErrorKind } from './lisp/errors.js';
export { parse, parseOne, ParseError, type ParseErrorKind } from './lisp/parser.js';
export { Vm, DEFAULT_MAX_DEPTH, type VmOptions } from './lisp/vm.js';
export { standardPrimitives } from './lisp/primitives.js';
export { formatAtom, formatNumber, debugAtom } from './lisp/printer.js';
export { runProgram, createRootContext, type FormResult, type RunOptions } from './program.js';
