/**
 * Source loading and result reporting for the command line
 */

import * as fs from 'fs';
import { fileURLToPath } from 'url';
import { type FormResult, formatAtom, runProgram } from 'nlisp-core';

/** Sample program bundled with the CLI */
export const SAMPLE_PATH = fileURLToPath(new URL('../examples/fib.lisp', import.meta.url));

export interface SourceOptions {
  eval?: string;
  sample?: boolean;
}

/**
 * Pick the program text: inline source wins over --sample, which wins over
 * the input file
 */
export function loadSource(inputFile: string | undefined, options: SourceOptions): string {
  if (options.eval !== undefined) {
    return options.eval;
  }
  if (options.sample) {
    return fs.readFileSync(SAMPLE_PATH, 'utf-8');
  }
  if (!inputFile || inputFile.trim() === '') {
    throw new Error('No input: pass a file, --eval <source> or --sample');
  }
  if (!fs.existsSync(inputFile)) {
    throw new Error(`Input file not found: ${inputFile}`);
  }
  return fs.readFileSync(inputFile, 'utf-8');
}

export interface Reporter {
  out: (line: string) => void;
  err: (line: string) => void;
}

/**
 * Print one line per form. Returns the number of failed forms.
 */
export function reportResults(results: readonly FormResult[], reporter: Reporter): number {
  let failures = 0;
  for (const result of results) {
    if (result.ok) {
      reporter.out(formatAtom(result.value));
    } else {
      failures++;
      reporter.err(`error: ${result.error.kind}`);
    }
  }
  return failures;
}

/**
 * Parse the --max-depth value
 */
export function parseDepth(value: string): number {
  const depth = /^\d+$/.test(value) ? Number(value) : NaN;
  if (!Number.isSafeInteger(depth) || depth <= 0) {
    throw new Error(`Invalid depth: ${value}`);
  }
  return depth;
}

export function runSource(source: string, reporter: Reporter, maxDepth?: number): number {
  const results = runProgram(source, { maxDepth, write: reporter.out });
  return reportResults(results, reporter);
}
