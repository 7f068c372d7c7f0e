import type { VariableName } from './environment';
import type { BasicError } from './errors';

// The host surface the interpreter talks to. Only `write` is required; the
// rest are optional and degrade to no-ops (or NO STORAGE for LOAD/SAVE).
export interface TerminalAdapter {
  write(text: string): void;
  clear?(): void;
  // Prompt to show before the next line of input is read.
  setPrompt?(prompt: string): void;
  loadProgram?(name: string | undefined): string;
  saveProgram?(source: string, name: string | undefined): void;
}

export type ExecutorStatus = 'running' | 'awaiting-input' | 'halted';

export interface HaltedOutcome {
  status: 'halted';
}

// The run yielded after `stepsPerSlice` statements; call pump() to go on.
export interface RunningOutcome {
  status: 'running';
}

export interface AwaitingInputOutcome {
  status: 'awaiting-input';
  variable: VariableName;
  prompt: string;
}

export interface FailedOutcome {
  status: 'failed';
  error: BasicError;
}

export type RunOutcome = HaltedOutcome | RunningOutcome | AwaitingInputOutcome | FailedOutcome;

export interface StoredLineOutcome {
  status: 'stored';
  line: number;
}

export interface DeletedLineOutcome {
  status: 'deleted';
  line: number;
}

export type LineOutcome = RunOutcome | StoredLineOutcome | DeletedLineOutcome;

export interface LoadReport {
  loaded: number;
  errors: BasicError[];
}

// Runtime start-up options.
export interface RuntimeOptions {
  // Upper bound on statements executed by one run before RUNAWAY.
  maxSteps?: number;
  // Statements executed per pump() before yielding back to the host.
  stepsPerSlice?: number;
}
