import { Console } from 'node:console';
import { readFileSync } from 'node:fs';
import path from 'node:path';
import { createInterface, type Interface } from 'node:readline';
import type { Readable, Writable } from 'node:stream';

import { asDisplayError, DEFAULT_MAX_STEPS, TinyBasicRuntime, type LineOutcome } from '@tinybasic/interpreter';

import { NodeTerminal } from './node-terminal';
import { settle } from './session';

// Statements per slice between event-loop turns, so Ctrl-C can break a loop.
const DEFAULT_SLICE = 1_000;

const READY_BANNER = 'Ready!';

const COMMAND_PROMPT = '> ';

interface CliOptions {
  input?: string;
  maxSteps: number;
  slice: number;
  directory: string;
  help: boolean;
  errors: string[];
}

export interface CliStreams {
  stdin: Readable;
  stdout: Writable;
  stderr: Writable;
}

type LineSource = AsyncIterator<string>;

function printUsage(console: Console): void {
  console.log('Usage: tinybasic [-i program.bas] [--max-steps N] [--slice N] [--dir DIR]');
}

function parseCount(flag: string, value: string | undefined, errors: string[]): number | undefined {
  const count = Number(value);
  if (value === undefined || !Number.isInteger(count) || count < 1) {
    errors.push(`${flag} expects a positive integer`);
    return undefined;
  }
  return count;
}

function parseArgs(args: string[]): CliOptions {
  const opts: CliOptions = {
    maxSteps: DEFAULT_MAX_STEPS,
    slice: DEFAULT_SLICE,
    directory: process.cwd(),
    help: false,
    errors: []
  };
  for (let i = 0; i < args.length; i += 1) {
    const token = args[i] ?? '';
    const next = args[i + 1];
    switch (token) {
      case '-i':
      case '--input':
        if (next === undefined) {
          opts.errors.push('--input expects a file');
        } else {
          opts.input = next;
        }
        i += 1;
        break;
      case '--max-steps':
        opts.maxSteps = parseCount(token, next, opts.errors) ?? opts.maxSteps;
        i += 1;
        break;
      case '--slice':
        opts.slice = parseCount(token, next, opts.errors) ?? opts.slice;
        i += 1;
        break;
      case '--dir':
        if (next === undefined) {
          opts.errors.push('--dir expects a directory');
        } else {
          opts.directory = path.resolve(process.cwd(), next);
        }
        i += 1;
        break;
      case '-h':
      case '--help':
        opts.help = true;
        break;
      default:
        opts.errors.push(`Unknown option: ${token}`);
        break;
    }
  }
  return opts;
}

function report(console: Console, outcome: LineOutcome): void {
  if (outcome.status === 'failed') {
    console.error(asDisplayError(outcome.error));
  }
}

async function runBatch(
  inputPath: string,
  runtime: TinyBasicRuntime,
  terminal: NodeTerminal,
  lines: LineSource,
  console: Console
): Promise<number> {
  let source = '';
  try {
    source = readFileSync(inputPath, 'utf8');
  } catch (error) {
    console.error(`Failed to read input: ${inputPath}`);
    if (error instanceof Error) {
      console.error(error.message);
    }
    return 1;
  }

  const loaded = runtime.loadProgram(source);
  if (loaded.errors.length > 0) {
    for (const error of loaded.errors) {
      console.error(asDisplayError(error));
    }
    return 1;
  }

  let outcome = await settle(runtime, runtime.run());
  while (outcome.status === 'awaiting-input') {
    terminal.write(outcome.prompt);
    const answer = await lines.next();
    if (answer.done === true) {
      runtime.abort();
      console.error('INPUT: end of input');
      return 1;
    }
    outcome = await settle(runtime, runtime.supplyInput(answer.value));
  }

  report(console, outcome);
  return outcome.status === 'failed' ? 1 : 0;
}

// The prompt is written directly; readline only keeps it for redrawing edits.
function showPrompt(rl: Interface, terminal: NodeTerminal, prompt: string): void {
  rl.setPrompt(prompt);
  terminal.write(prompt);
}

async function runRepl(
  runtime: TinyBasicRuntime,
  terminal: NodeTerminal,
  rl: Interface,
  lines: LineSource,
  console: Console
): Promise<number> {
  rl.on('SIGINT', () => {
    if (runtime.getStatus() === 'halted') {
      rl.close();
      return;
    }
    runtime.abort();
    console.error('BREAK');
    showPrompt(rl, terminal, COMMAND_PROMPT);
  });

  console.log(READY_BANNER);
  showPrompt(rl, terminal, COMMAND_PROMPT);

  for (;;) {
    const next = await lines.next();
    if (next.done === true) {
      return 0;
    }
    const outcome = await settle(runtime, runtime.executeLine(next.value));
    report(console, outcome);
    showPrompt(rl, terminal, outcome.status === 'awaiting-input' ? outcome.prompt : COMMAND_PROMPT);
  }
}

const PROCESS_STREAMS: CliStreams = { stdin: process.stdin, stdout: process.stdout, stderr: process.stderr };

export async function runCli(argv: string[], streams: CliStreams = PROCESS_STREAMS): Promise<number> {
  const console = new Console({ stdout: streams.stdout, stderr: streams.stderr });
  const opts = parseArgs(argv);
  if (opts.help) {
    printUsage(console);
    return 0;
  }
  if (opts.errors.length > 0) {
    for (const message of opts.errors) {
      console.error(message);
    }
    printUsage(console);
    return 1;
  }

  const terminal = new NodeTerminal(streams.stdout, opts.directory);
  const runtime = new TinyBasicRuntime(terminal, { maxSteps: opts.maxSteps, stepsPerSlice: opts.slice });
  const rl = createInterface({ input: streams.stdin, output: streams.stdout, crlfDelay: Infinity });
  const lines = rl[Symbol.asyncIterator]();

  try {
    if (opts.input !== undefined) {
      return await runBatch(path.resolve(process.cwd(), opts.input), runtime, terminal, lines, console);
    }
    return await runRepl(runtime, terminal, rl, lines, console);
  } finally {
    rl.close();
  }
}

if (import.meta.url === `file://${process.argv[1]}`) {
  const code = await runCli(process.argv.slice(2));
  process.exit(code);
}
