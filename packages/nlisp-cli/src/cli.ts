#!/usr/bin/env node
/**
 * nlisp CLI
 */

import { Command, InvalidArgumentError } from 'commander';
import { loadSource, parseDepth, runSource } from './run.js';

const program = new Command();

program
  .name('nlisp')
  .description('Run nlisp programs: one result line per top-level form')
  .version('0.1.0')
  .option('-e, --eval <source>', 'Evaluate inline source')
  .option('--sample', 'Run the bundled fibonacci sample')
  .option('--max-depth <n>', 'Maximum evaluation depth', (value: string) => {
    try {
      return parseDepth(value);
    } catch (error) {
      throw new InvalidArgumentError(error instanceof Error ? error.message : String(error));
    }
  })
  .argument('[input]', 'Source file')
  .action((inputFile: string | undefined, options: { eval?: string; sample?: boolean; maxDepth?: number }) => {
    try {
      const source = loadSource(inputFile, options);
      const failures = runSource(source, {
        out: (line) => console.log(line),
        err: (line) => console.error(line),
      }, options.maxDepth);
      if (failures > 0) {
        process.exitCode = 1;
      }
    } catch (error) {
      if (error instanceof Error) {
        console.error('Error:', error.message);
        if (process.env.DEBUG) {
          console.error(error.stack);
        }
      } else {
        console.error('Error:', String(error));
      }
      process.exit(1);
    }
  });

program.parse();
