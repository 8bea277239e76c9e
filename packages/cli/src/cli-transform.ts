#!/usr/bin/env node
/**
 * CLI Entry Point
 *
 * Implements main(), parseArgs() and runCli() for the chainmark binary.
 * Transforms markup blocks in a file or stdin, or a single body given with -e.
 */

import { existsSync, readFileSync, writeFileSync } from 'node:fs';
import { resolve } from 'node:path';
import { transformMarkup, transformSource } from 'chainmark';
import {
  type CliIO,
  detectHelpVersionFlag,
  formatDiagnostics,
  formatError,
  type OutputFormat,
  VERSION,
} from './cli-shared.js';
import { loadConfig } from './config-loader.js';

// ============================================================
// ARGUMENTS
// ============================================================

export interface RunOptions {
  format: OutputFormat;
  verbose: boolean;
  configPath: string | undefined;
  macroName: string | undefined;
}

/**
 * Parsed command-line arguments
 */
export type ParsedArgs =
  | { mode: 'help' | 'version' }
  | { mode: 'eval'; markup: string; options: RunOptions }
  | {
      mode: 'transform';
      file: string;
      out: string | undefined;
      check: boolean;
      options: RunOptions;
    };

/** Flags followed by a value */
const VALUE_FLAGS = ['--out', '-o', '--format', '--config', '--macro', '-e'];
const BOOLEAN_FLAGS = ['--check', '--verbose'];

const USAGE = `Usage:
  chainmark <file> [options]     Transform every ui! { ... } block in a file
  chainmark - [options]          Read the file from stdin
  chainmark -e "<markup>"        Transform one markup body and print it
  chainmark --help               Show this help message
  chainmark --version            Show version information

Options:
  -o, --out <file>          Write the result to a file instead of stdout
  --check                   Report problems without writing output
  --format <format>         Diagnostic format: human, json, compact (default: human)
  --config <file>           YAML configuration (default: ./.chainmark.yaml when present)
  --macro <name>            Macro name introducing a block (default: ui)
  --verbose                 Print progress to stderr

Examples:
  chainmark src/view.rs -o src/view.gen.rs
  chainmark --check --format compact src/view.rs
  chainmark -e 'div @[flex] { "Hello" }'`;

function isFormat(value: string | undefined): value is OutputFormat {
  return value === 'human' || value === 'json' || value === 'compact';
}

/**
 * Parse command-line arguments into structured command
 *
 * @param argv - Raw command-line arguments (typically process.argv.slice(2))
 * @returns Parsed command object
 * @throws Error on unknown options, missing values and conflicting arguments
 */
export function parseArgs(argv: readonly string[]): ParsedArgs {
  const helpOrVersion = detectHelpVersionFlag(argv);
  if (helpOrVersion !== null) {
    return helpOrVersion;
  }

  const options: RunOptions = {
    format: 'human',
    verbose: false,
    configPath: undefined,
    macroName: undefined,
  };
  let out: string | undefined;
  let check = false;
  let markup: string | undefined;
  let file: string | undefined;

  for (let i = 0; i < argv.length; i++) {
    const arg = argv[i];
    if (arg === undefined) continue;

    if (VALUE_FLAGS.includes(arg)) {
      const value = argv[i + 1];
      if (value === undefined) {
        throw new Error(`Missing value after ${arg}`);
      }
      i++;

      switch (arg) {
        case '--out':
        case '-o':
          out = value;
          break;
        case '--format':
          if (!isFormat(value)) {
            throw new Error(
              `Invalid --format value: ${value}. Must be one of: human, json, compact`
            );
          }
          options.format = value;
          break;
        case '--config':
          options.configPath = value;
          break;
        case '--macro':
          options.macroName = value;
          break;
        case '-e':
          markup = value;
          break;
      }
      continue;
    }

    if (BOOLEAN_FLAGS.includes(arg)) {
      if (arg === '--check') check = true;
      if (arg === '--verbose') options.verbose = true;
      continue;
    }

    if (arg.startsWith('-') && arg !== '-') {
      throw new Error(`Unknown option: ${arg}`);
    }

    if (file !== undefined) {
      throw new Error(`Unexpected argument: ${arg}`);
    }
    file = arg;
  }

  if (markup !== undefined) {
    if (file !== undefined) {
      throw new Error('Cannot combine -e with a file argument');
    }
    if (out !== undefined || check) {
      throw new Error('-e prints to stdout and cannot take --out or --check');
    }
    return { mode: 'eval', markup, options };
  }

  if (file === undefined) {
    throw new Error('Missing file argument');
  }
  if (out !== undefined && check) {
    throw new Error('Cannot combine --out with --check');
  }
  return { mode: 'transform', file, out, check, options };
}

// ============================================================
// EXECUTION
// ============================================================

function readInput(file: string, io: CliIO, cwd: string): string {
  if (file === '-') {
    return io.readStdin();
  }
  const path = resolve(cwd, file);
  if (!existsSync(path)) {
    throw new Error(`File not found: ${file}`);
  }
  return readFileSync(path, 'utf-8');
}

/**
 * Run the CLI against injected streams.
 *
 * @returns Process exit code: 0 on success, 1 on any diagnostic or error
 */
export function runCli(argv: readonly string[], io: CliIO, cwd: string): number {
  let parsed: ParsedArgs;
  try {
    parsed = parseArgs(argv);
  } catch (err) {
    io.stderr(`${formatError(err)}\n`);
    return 1;
  }

  switch (parsed.mode) {
    case 'help':
      io.stdout(`${USAGE}\n`);
      return 0;
    case 'version':
      io.stdout(`${VERSION}\n`);
      return 0;
  }

  const { options } = parsed;
  try {
    const loaded = loadConfig(cwd, options.configPath);
    if (options.verbose && loaded.path !== null) {
      io.stderr(`Using configuration ${loaded.path}\n`);
    }
    const config = loaded.markup;

    if (parsed.mode === 'eval') {
      const result = transformMarkup(parsed.markup, { config });
      if (!result.ok) {
        io.stderr(
          `${formatDiagnostics([result.diagnostic], parsed.markup, {
            format: options.format,
            file: '<markup>',
          })}\n`
        );
        return 1;
      }
      io.stdout(`${result.code}\n`);
      return 0;
    }

    const displayName = parsed.file === '-' ? '<stdin>' : parsed.file;
    const source = readInput(parsed.file, io, cwd);
    const result = transformSource(source, {
      config,
      macroName: options.macroName ?? loaded.macroName,
    });

    if (options.verbose) {
      const replaced = result.blocks - result.diagnostics.length;
      io.stderr(
        `${displayName}: ${replaced} of ${result.blocks} block(s) transformed\n`
      );
    }

    if (result.diagnostics.length > 0) {
      io.stderr(
        `${formatDiagnostics(result.diagnostics, source, {
          format: options.format,
          file: displayName,
        })}\n`
      );
      return 1;
    }

    if (parsed.check) {
      return 0;
    }
    if (parsed.out !== undefined) {
      writeFileSync(resolve(cwd, parsed.out), result.code, 'utf-8');
      if (options.verbose) {
        io.stderr(`Wrote ${parsed.out}\n`);
      }
      return 0;
    }
    io.stdout(result.code);
    return 0;
  } catch (err) {
    io.stderr(`${formatError(err)}\n`);
    return 1;
  }
}

/**
 * Entry point for the chainmark binary.
 * Writes results to stdout and diagnostics to stderr.
 */
export function main(): void {
  const io: CliIO = {
    stdout: (text) => {
      process.stdout.write(text);
    },
    stderr: (text) => {
      process.stderr.write(text);
    },
    readStdin: () => readFileSync(0, 'utf-8'),
  };
  process.exitCode = runCli(process.argv.slice(2), io, process.cwd());
}

// Only run main if not in test environment
const shouldRunMain =
  process.env['NODE_ENV'] !== 'test' &&
  !process.env['VITEST'] &&
  !process.env['VITEST_WORKER_ID'];

if (shouldRunMain) {
  main();
}
