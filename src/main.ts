#!/usr/bin/env node
// file: src/main.ts
import * as fs from 'fs/promises';
import { Command, InvalidOptionArgumentError } from 'commander';
import { parseDiff } from './DiffParser';
import { DiffSyntaxError } from './DiffErrors';
import { Diff } from './DiffModel';
import { validateDiff } from './DiffValidator';
import { createLogger } from './logger';

/**
 * 0-based position of a hunk within a parsed diff.
 */
export interface HunkRef {
  delta: number;
  hunk: number;
}

/**
 * Where the diff text comes from: a file path ('-' means stdin), text, or a stream.
 */
export interface DiffInput {
  filePath?: string;
  diffText?: string;
  stdin?: NodeJS.ReadableStream;
}

/**
 * Options of a command-line run.
 */
export interface CliOptions {
  showHelp: boolean;
  verbose: boolean;
  /** Print the parsed diff as JSON instead of the summary. */
  json: boolean;
  /** Validate conventions and the round trip; exit 1 on problems. */
  check: boolean;
  /** Hunks to print as standalone patches, in order. */
  extract: HunkRef[];
  diffFile?: string;
  error?: string;
}

/**
 * Reads the complete diff text from the given input.
 * @param diffInput - Object specifying diff input: filePath to read from, diffText directly, or stdin stream.
 */
export async function readDiffInput(diffInput: DiffInput): Promise<string> {
  if (diffInput.filePath && diffInput.filePath !== '-') {
    return fs.readFile(diffInput.filePath, 'utf-8');
  }
  if (diffInput.diffText !== undefined) {
    return diffInput.diffText;
  }
  const stdin = diffInput.stdin;
  if (stdin) {
    return new Promise<string>((resolve, reject) => {
      let data = '';
      stdin.setEncoding('utf-8');
      stdin.on('data', (chunk: string) => { data += chunk; });
      stdin.on('end', () => resolve(data));
      stdin.on('error', err => reject(err));
    });
  }
  // No input provided in any form
  const details = `filePath=${diffInput.filePath ?? 'undefined'}, diffTextProvided=${diffInput.diffText !== undefined}, stdinProvided=${!!diffInput.stdin}`;
  throw new Error(`No diff input provided (${details})`);
}

/**
 * Parses a `<delta>:<hunk>` reference.
 * @throws InvalidOptionArgumentError for anything else.
 */
export function parseHunkRef(value: string): HunkRef {
  const match = /^(\d+):(\d+)$/.exec(value);
  if (!match) {
    throw new InvalidOptionArgumentError(`Invalid hunk reference: ${value} (expected <delta>:<hunk>)`);
  }
  return { delta: Number(match[1]), hunk: Number(match[2]) };
}

/**
 * Parses CLI arguments for the tool.
 * @param rawArgs - Array of arguments (excluding node and script path)
 * @returns Parsed options and any error message.
 */
export function parseCliArgs(rawArgs: string[]): CliOptions {
  const defaults: CliOptions = { showHelp: false, verbose: false, json: false, check: false, extract: [] };

  for (let i = 0; i < rawArgs.length; i++) {
    const arg = rawArgs[i];
    if ((arg === '--extract' || arg === '-x') && rawArgs[i + 1] === undefined) {
      return { ...defaults, error: 'Missing value for --extract' };
    }
  }

  const program = new Command();
  program
    .helpOption(false)
    .exitOverride()
    .configureOutput({ writeErr: () => undefined });

  program
    .option('-h, --help', 'Show this help message and exit')
    .option('-v, --verbose', 'Log progress to stderr')
    .option('-j, --json', 'Print the parsed diff as JSON')
    .option('-c, --check', 'Check hunk order, line counts and the round trip')
    .option(
      '-x, --extract <delta:hunk>',
      'Print one hunk as a standalone patch (0-based, repeatable)',
      (val: string, prev: HunkRef[]) => [...prev, parseHunkRef(val)],
      [] as HunkRef[]
    )
    .argument('[diffFile]', "Diff file (or '-' or omitted to read from stdin)");

  try {
    program.parse(rawArgs, { from: 'user' });
  } catch (err: unknown) {
    return { ...defaults, error: err instanceof Error ? err.message : String(err) };
  }

  const args = program.args;
  if (args.length > 1) {
    return { ...defaults, error: 'Too many arguments' };
  }
  const opts = program.opts<{
    help?: boolean;
    verbose?: boolean;
    json?: boolean;
    check?: boolean;
    extract: HunkRef[];
  }>();
  return {
    showHelp: !!opts.help,
    verbose: !!opts.verbose,
    json: !!opts.json,
    check: !!opts.check,
    extract: opts.extract,
    diffFile: args[0],
  };
}

/** The input text after the commit line, which `Diff.toString()` must reproduce. */
function diffBody(diffText: string, diff: Diff): string {
  if (diff.commit === undefined) {
    return diffText;
  }
  const nl = diffText.indexOf('\n');
  return nl === -1 ? '' : diffText.slice(nl + 1);
}

function summarize(diff: Diff): string {
  const lines: string[] = [];
  if (diff.commit !== undefined) {
    lines.push(`commit ${diff.commit}`);
  }
  for (const delta of diff.deltas) {
    const count = delta.hunks.length;
    const file = delta.newPath ?? delta.oldPath ?? delta.newFile;
    lines.push(`${file} (${count} ${count === 1 ? 'hunk' : 'hunks'})`);
  }
  return lines.map(line => line + '\n').join('');
}

/**
 * Parses a diff and prints a summary, JSON, or extracted hunk patches.
 *
 * @param diffInput - Where to read the diff from.
 * @param options - Output and check options.
 * @param write - Output sink, stdout by default.
 * @returns Promise resolving to exit code: 0 on success, 1 if --check found problems,
 *   2 if the diff could not be parsed or a requested hunk does not exist.
 */
export async function runCli(
  diffInput: DiffInput,
  options: Pick<CliOptions, 'verbose' | 'json' | 'check' | 'extract'>,
  write: (text: string) => void = text => { process.stdout.write(text); }
): Promise<number> {
  const log = createLogger(options.verbose);
  const diffText = await readDiffInput(diffInput);
  log(`Read ${diffText.length} characters of diff input`);

  let diff: Diff;
  try {
    diff = parseDiff(diffText);
  } catch (err: unknown) {
    if (err instanceof DiffSyntaxError) {
      console.error(err.message);
      return 2;
    }
    throw err;
  }
  log(`Parsed ${diff.deltas.length} file deltas`);

  if (options.extract.length > 0) {
    for (const ref of options.extract) {
      const hunk = diff.deltas[ref.delta]?.hunks[ref.hunk];
      if (!hunk) {
        console.error(`No hunk ${ref.delta}:${ref.hunk} in diff`);
        return 2;
      }
      log(`Extracting hunk ${ref.delta}:${ref.hunk} of ${hunk.newFile}`);
      write(hunk.formatPatch());
    }
  } else if (options.json) {
    write(JSON.stringify(diff, null, 2) + '\n');
  } else {
    write(summarize(diff));
  }

  if (!options.check) {
    return 0;
  }
  let problems = validateDiff(diff, msg => console.error(msg));
  if (diff.toString() !== diffBody(diffText, diff)) {
    console.error('[hunkwise] rendered diff does not reproduce the input');
    problems++;
  }
  log(`Check found ${problems} problems`);
  return problems > 0 ? 1 : 0;
}

// Execute when run as a CLI script
if (require.main === module) {
  const { showHelp, error, diffFile, ...options } = parseCliArgs(process.argv.slice(2));
  const usage = [
    'Usage: hunkwise [options] [diffFile]',
    '',
    'Options:',
    '  -h, --help                  Show this help message and exit',
    '  -v, --verbose               Log progress to stderr',
    '  -j, --json                  Print the parsed diff as JSON',
    '  -c, --check                 Check hunk order, line counts and the round trip',
    '  -x, --extract <delta:hunk>  Print one hunk as a standalone patch (0-based, repeatable)',
    '',
    "If diffFile is '-' or omitted, input is read from stdin"
  ].join('\n');
  if (showHelp) {
    console.log(usage);
    process.exit(0);
  }
  if (error) {
    console.error(error);
    console.log(usage);
    process.exit(2);
  }
  runCli({ filePath: diffFile, stdin: process.stdin }, options)
    .then(code => process.exit(code))
    .catch((err: unknown) => {
      console.error(err instanceof Error ? err.stack : err);
      process.exit(2);
    });
}
