#!/usr/bin/env node
/**
 * CLI Compile Entry Point
 *
 * Implements main(), parseArgs() and compileToFile() for the gcad binary.
 * The output file is written only after the whole program compiled.
 */

import * as fs from 'node:fs';
import { compile, type CompileResult } from './compile.js';
import { formatError, readVersion } from './cli-shared.js';
import { loadConfig } from './config.js';
import { formatValue } from './runtime/index.js';

/**
 * Parsed command-line arguments
 */
export type ParsedArgs =
  | {
      mode: 'compile';
      input: string;
      output: string;
      config?: string | undefined;
      verbose: boolean;
    }
  | { mode: 'help' | 'version' };

export const USAGE = `Usage:
  gcad [options] -o <out.nc> <input.gcad>

Options:
  -o, --output <file>   Write G-code to <file> (required)
  -c, --config <file>   Merge machine settings and materials from a YAML file
  --verbose             Report each statement on stderr
  -h, --help            Show this help message
  -v, --version         Show version information

Examples:
  gcad -o plate.nc plate.gcad
  gcad --config shop.yaml -o plate.nc plate.gcad`;

/**
 * Parse command-line arguments into structured command
 *
 * @param argv - Raw command-line arguments (typically process.argv.slice(2))
 * @returns Parsed command object
 * @throws Error on unknown options or missing arguments
 */
export function parseArgs(argv: string[]): ParsedArgs {
  // Check for --help or --version flags in any position
  if (argv.includes('--help') || argv.includes('-h')) {
    return { mode: 'help' };
  }
  if (argv.includes('--version') || argv.includes('-v')) {
    return { mode: 'version' };
  }

  let output: string | undefined;
  let config: string | undefined;
  let verbose = false;
  const positional: string[] = [];

  for (let i = 0; i < argv.length; i++) {
    const arg = argv[i] ?? '';
    switch (arg) {
      case '-o':
      case '--output':
        output = optionValue(argv, ++i, arg);
        break;
      case '-c':
      case '--config':
        config = optionValue(argv, ++i, arg);
        break;
      case '--verbose':
        verbose = true;
        break;
      default:
        if (arg.startsWith('-')) {
          throw new Error(`Unknown option: ${arg}`);
        }
        positional.push(arg);
    }
  }

  const input = positional[0];
  if (input === undefined) {
    throw new Error('Missing input file argument');
  }
  if (positional.length > 1) {
    throw new Error(`Unexpected argument: ${positional[1]}`);
  }
  if (output === undefined) {
    throw new Error('Missing output file (-o <file>)');
  }

  return { mode: 'compile', input, output, config, verbose };
}

function optionValue(argv: string[], index: number, option: string): string {
  const value = argv[index];
  if (value === undefined || value.startsWith('-')) {
    throw new Error(`Missing value after ${option}`);
  }
  return value;
}

/**
 * Compile source text and write the G-code to the output file.
 *
 * @throws GcadError on compilation errors; nothing is written then
 */
export function compileToFile(
  args: Extract<ParsedArgs, { mode: 'compile' }>,
  source: string,
  log: (line: string) => void = (line) => console.error(line)
): CompileResult {
  const config = loadConfig(args.config);

  const result = compile(source, {
    config,
    callbacks: { onLog: (value) => log(formatValue(value)) },
    observability: args.verbose
      ? {
          onStepEnd: (event) =>
            log(
              `[${event.index + 1}/${event.total}] ${event.segments} segment(s) in ${event.durationMs}ms`
            ),
        }
      : undefined,
  });

  fs.writeFileSync(args.output, result.gcode, 'utf-8');
  return result;
}

/**
 * Entry point for the gcad binary
 *
 * Parses command-line arguments and compiles the input file.
 * Errors go to stderr with the offending source line; exit code 1.
 */
export function main(argv: string[] = process.argv.slice(2)): number {
  let source: string | undefined;
  try {
    const parsed = parseArgs(argv);

    switch (parsed.mode) {
      case 'help':
        console.log(USAGE);
        return 0;

      case 'version':
        console.log(readVersion());
        return 0;

      case 'compile': {
        source = fs.readFileSync(parsed.input, 'utf-8');
        compileToFile(parsed, source);
        return 0;
      }
    }
  } catch (err) {
    const error = err instanceof Error ? err : new Error(String(err));
    console.error(formatError(error, source));
    return 1;
  }
}

// Only run main if not in test environment
const shouldRunMain =
  process.env['NODE_ENV'] !== 'test' &&
  !process.env['VITEST'] &&
  !process.env['VITEST_WORKER_ID'];

if (shouldRunMain) {
  process.exitCode = main();
}
