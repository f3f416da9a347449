/**
 * xzarrguard command line
 *
 *   xzarrguard check <store> [--json] [--timing] [--strict-stale]
 *   xzarrguard create <source> <target> [--no-data <file.json>] [--strategy manifest|empty_chunks] [--overwrite]
 *
 * `check` exits 0 when the store passes, 1 when it fails and 2 on usage or
 * runtime errors.
 */

import { createStore, parseNoDataStrategy } from './create.js';
import { openLocalDataset } from './dataset.js';
import { describeError } from './errors.js';
import { VERSION } from './index.js';
import { checkStore } from './integrity.js';
import { loadNoDataChunks } from './manifest.js';
import { formatReport } from './report.js';

export interface CliIO {
  stdout: (text: string) => void;
  stderr: (text: string) => void;
}

const processIO: CliIO = {
  stdout: (text) => process.stdout.write(`${text}\n`),
  stderr: (text) => process.stderr.write(`${text}\n`),
};

const USAGE = `xzarrguard ${VERSION}

Usage:
  xzarrguard check <store> [--json] [--timing] [--strict-stale]
  xzarrguard create <source> <target> [--no-data <file.json>] [--strategy manifest|empty_chunks] [--overwrite] [--verbose]
  xzarrguard --version`;

class UsageError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'UsageError';
  }
}

const VALUE_FLAGS = new Set(['--no-data', '--strategy']);

interface ParsedArgs {
  positional: string[];
  flags: Set<string>;
  values: Map<string, string>;
}

function parseArgs(args: string[]): ParsedArgs {
  const parsed: ParsedArgs = { positional: [], flags: new Set(), values: new Map() };
  for (let i = 0; i < args.length; i++) {
    const arg = args[i];
    if (VALUE_FLAGS.has(arg)) {
      const value = args[i + 1];
      if (value === undefined || value.startsWith('--')) {
        throw new UsageError(`${arg} requires a value`);
      }
      parsed.values.set(arg, value);
      i++;
    } else if (arg.startsWith('--')) {
      parsed.flags.add(arg);
    } else {
      parsed.positional.push(arg);
    }
  }
  return parsed;
}

function assertKnownFlags(parsed: ParsedArgs, known: string[]): void {
  for (const flag of parsed.flags) {
    if (!known.includes(flag)) {
      throw new UsageError(`Unknown option: ${flag}`);
    }
  }
}

async function check(args: string[], io: CliIO): Promise<number> {
  const parsed = parseArgs(args);
  assertKnownFlags(parsed, ['--json', '--timing', '--strict-stale']);
  const [storePath] = parsed.positional;
  if (!storePath || parsed.positional.length > 1) {
    throw new UsageError('Usage: xzarrguard check <store> [--json] [--timing] [--strict-stale]');
  }

  const timing = parsed.flags.has('--timing');
  const report = await checkStore(storePath, {
    strictStale: parsed.flags.has('--strict-stale'),
    timing,
  });

  if (parsed.flags.has('--json')) {
    io.stdout(JSON.stringify(report, null, 2));
  } else {
    io.stdout(formatReport(report, { timing }));
  }
  return report.ok ? 0 : 1;
}

async function create(args: string[], io: CliIO): Promise<number> {
  const parsed = parseArgs(args);
  assertKnownFlags(parsed, ['--overwrite', '--verbose']);
  const [source, target] = parsed.positional;
  if (!source || !target || parsed.positional.length > 2) {
    throw new UsageError(
      'Usage: xzarrguard create <source> <target> [--no-data <file.json>] [--strategy manifest|empty_chunks] [--overwrite]'
    );
  }

  const noDataStrategy = parseNoDataStrategy(parsed.values.get('--strategy') ?? 'manifest');
  const noDataFile = parsed.values.get('--no-data');
  const noDataChunks = noDataFile ? await loadNoDataChunks(noDataFile) : undefined;

  const dataset = await openLocalDataset(source);
  const report = await createStore(dataset, target, {
    noDataChunks,
    noDataStrategy,
    overwrite: parsed.flags.has('--overwrite'),
    verbose: parsed.flags.has('--verbose'),
  });

  io.stdout(`created: ${report.storePath}`);
  if (report.manifestsWritten.length > 0) {
    io.stdout(`manifests: ${report.manifestsWritten.length}`);
  }
  return 0;
}

const commands: Record<string, (args: string[], io: CliIO) => Promise<number>> = {
  check,
  create,
};

/**
 * Run the CLI with `argv` (without the node and script entries) and return
 * the exit code.
 */
export async function run(argv: string[], io: CliIO = processIO): Promise<number> {
  const [command, ...args] = argv;

  if (command === '--version') {
    io.stdout(`xzarrguard ${VERSION}`);
    return 0;
  }
  if (command === undefined || command === '--help') {
    io.stdout(USAGE);
    return 0;
  }

  const handler = commands[command];
  if (!handler) {
    io.stderr(`error: unknown command: ${command}`);
    io.stderr(USAGE);
    return 2;
  }

  try {
    return await handler(args, io);
  } catch (error) {
    io.stderr(`error: ${describeError(error)}`);
    return 2;
  }
}
