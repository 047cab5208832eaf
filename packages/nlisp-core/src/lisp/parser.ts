/**
 * S-expression parser
 *
 * A single-pass state machine over the characters of the source. Lists are
 * not parsed token by token: the scanner only tracks paren depth until the
 * matching close, then re-parses the interior range recursively.
 */

import {
  type Atom,
  type ListAtom,
  makeList,
  makeNumber,
  makeString,
  makeSymbol,
} from './atom.js';

export type ParseErrorKind = 'InvalidCharacter' | 'NumberError' | 'IncompleteString' | 'IncompleteList';

export class ParseError extends Error {
  constructor(
    public readonly kind: ParseErrorKind,
    public readonly position?: number,
    public readonly text?: string
  ) {
    super(ParseError.describe(kind, position, text));
    this.name = 'ParseError';
  }

  private static describe(kind: ParseErrorKind, position?: number, text?: string): string {
    switch (kind) {
      case 'InvalidCharacter':
        return `Invalid character at ${position}`;
      case 'NumberError':
        return `Invalid number "${text}" at ${position}`;
      case 'IncompleteString':
        return 'Unterminated string';
      case 'IncompleteList':
        return 'Unterminated list';
    }
  }
}

/**
 * Scanner states
 */
type ReadingState =
  | { type: 'none' }
  | { type: 'symbol'; start: number }
  | { type: 'number'; start: number }
  | { type: 'string'; start: number }
  | { type: 'list'; start: number; depth: number; inString: boolean };

const NONE: ReadingState = { type: 'none' };

const WHITESPACE = /^\s$/u;
const ALPHABETIC = /^\p{Alphabetic}$/u;
const ALPHANUMERIC = /^[\p{Alphabetic}\p{N}]$/u;

const QUOTE = 0x22;
const OPEN_PAREN = 0x28;
const CLOSE_PAREN = 0x29;
const DOT = 0x2e;

// ASCII code points are classified by range; only the rest go through the
// Unicode property regexes

function isDigit(code: number): boolean {
  return code >= 0x30 && code <= 0x39;
}

function isAsciiLetter(code: number): boolean {
  return (code >= 0x41 && code <= 0x5a) || (code >= 0x61 && code <= 0x7a);
}

function isAsciiPunctuation(code: number): boolean {
  return (code >= 0x21 && code <= 0x2f)
    || (code >= 0x3a && code <= 0x40)
    || (code >= 0x5b && code <= 0x60)
    || (code >= 0x7b && code <= 0x7e);
}

function isWhitespace(code: number): boolean {
  if (code < 0x80) {
    return code === 0x20 || (code >= 0x09 && code <= 0x0d);
  }
  return WHITESPACE.test(String.fromCodePoint(code));
}

/** ASCII punctuation other than parentheses */
function isSymbolPunctuation(code: number): boolean {
  return isAsciiPunctuation(code) && code !== OPEN_PAREN && code !== CLOSE_PAREN;
}

function isSymbolStart(code: number): boolean {
  if (code < 0x80) {
    return isAsciiLetter(code) || (isSymbolPunctuation(code) && code !== QUOTE && code !== DOT);
  }
  return ALPHABETIC.test(String.fromCodePoint(code));
}

function isSymbolPart(code: number): boolean {
  if (code < 0x80) {
    return isAsciiLetter(code) || isDigit(code) || isSymbolPunctuation(code);
  }
  return ALPHANUMERIC.test(String.fromCodePoint(code));
}

function isNumberPart(code: number): boolean {
  return isDigit(code) || code === DOT;
}

function parseNumber(input: string, start: number, end: number): Atom {
  const text = input.slice(start, end);
  const value = Number(text);
  if (Number.isNaN(value)) {
    throw new ParseError('NumberError', end, text);
  }
  return makeNumber(value);
}

/**
 * Parse the range [from, to) of input into its sequence of atoms
 */
function parseRange(input: string, from: number, to: number): ListAtom {
  const atoms: Atom[] = [];
  let state: ReadingState = NONE;

  let pos = from;
  while (pos < to) {
    const code = input.codePointAt(pos) ?? 0;

    switch (state.type) {
      case 'none':
        if (isNumberPart(code)) {
          state = { type: 'number', start: pos };
        } else if (code === QUOTE) {
          state = { type: 'string', start: pos };
        } else if (code === OPEN_PAREN) {
          state = { type: 'list', start: pos, depth: 0, inString: false };
        } else if (isWhitespace(code)) {
          // skip
        } else if (isSymbolStart(code)) {
          state = { type: 'symbol', start: pos };
        } else {
          throw new ParseError('InvalidCharacter', pos);
        }
        break;

      case 'symbol':
        if (isWhitespace(code)) {
          atoms.push(makeSymbol(input.slice(state.start, pos)));
          state = NONE;
        } else if (!isSymbolPart(code)) {
          throw new ParseError('InvalidCharacter', pos);
        }
        break;

      case 'number':
        if (isWhitespace(code)) {
          atoms.push(parseNumber(input, state.start, pos));
          state = NONE;
        } else if (!isNumberPart(code)) {
          throw new ParseError('InvalidCharacter', pos);
        }
        break;

      case 'string':
        if (code === QUOTE) {
          atoms.push(makeString(input.slice(state.start + 1, pos)));
          state = NONE;
        }
        break;

      case 'list':
        if (code === QUOTE) {
          state = { ...state, inString: !state.inString };
        } else if (state.inString) {
          // parens inside strings do not nest
        } else if (code === OPEN_PAREN) {
          state = { ...state, depth: state.depth + 1 };
        } else if (code === CLOSE_PAREN) {
          if (state.depth === 0) {
            atoms.push(parseRange(input, state.start + 1, pos));
            state = NONE;
          } else {
            state = { ...state, depth: state.depth - 1 };
          }
        }
        break;
    }

    pos += code > 0xffff ? 2 : 1;
  }

  // Flush the trailing token
  switch (state.type) {
    case 'symbol':
      atoms.push(makeSymbol(input.slice(state.start, to)));
      break;
    case 'number':
      atoms.push(parseNumber(input, state.start, to));
      break;
    case 'string':
      throw new ParseError('IncompleteString');
    case 'list':
      throw new ParseError('IncompleteList');
    case 'none':
      break;
  }

  return makeList(atoms);
}

/**
 * Parse source text into the list of its top-level atoms.
 * Error positions are offsets into `input`.
 */
export function parse(input: string): ListAtom {
  return parseRange(input, 0, input.length);
}

/**
 * Parse a single atom
 */
export function parseOne(input: string): Atom {
  const atoms = parse(input).items;
  if (atoms.length === 0) {
    throw new Error('No expression to parse');
  }
  if (atoms.length > 1) {
    throw new Error('Multiple expressions found, expected one');
  }
  return atoms[0];
}
