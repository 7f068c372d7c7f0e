import type { CommandStatement, ExpressionNode, ParsedLine, StatementNode } from './ast';
import { Environment, type VariableName } from './environment';
import { BasicError, BasicParseError, BasicRuntimeError } from './errors';
import { parseLine } from './parser';
import { ProgramStore } from './program-store';
import { compareValues, evaluateExpression, evaluatePrintItems, parseInputValue } from './semantics';
import type {
  ExecutorStatus,
  FailedOutcome,
  LineOutcome,
  LoadReport,
  RunOutcome,
  RuntimeOptions,
  TerminalAdapter
} from './types';

// Runs are unbounded unless the host opts into a step limit.
export const DEFAULT_MAX_STEPS = Number.POSITIVE_INFINITY;

const HELP_TEXT = [
  'PRINT <item>[, <item>...]',
  'INPUT <variable>[, <variable>...]',
  'IF <expr> <relation> <expr> THEN <statement>',
  'LET <variable> = <expr>',
  'GOTO <expr>',
  'GOSUB <expr>',
  'RETURN',
  'END',
  'REM <comment>',
  'CLS',
  'LIST',
  'RUN',
  'NEW',
  'LOAD ["name"]',
  'SAVE ["name"]'
];

// Where RETURN resumes; null ends the run (GOSUB on the last line, or typed at
// the prompt).
type ReturnAddress = number | null;

type ControlFlow =
  | { kind: 'next' }
  | { kind: 'jump'; target: ReturnAddress }
  | { kind: 'halt' }
  | { kind: 'await-input'; variables: VariableName[] };

interface ActiveProgramState {
  status: 'running' | 'awaiting-input';
  // Line being executed; null while an immediate-mode statement runs.
  currentLine: number | null;
  immediate: StatementNode | null;
  callStack: ReturnAddress[];
  pendingInput: VariableName[];
  steps: number;
}

// Counts below one (or NaN) fall back to the default.
function stepCount(value: number | undefined, fallback: number): number {
  return value !== undefined && value >= 1 ? Math.floor(value) : fallback;
}

function failed(error: BasicError): FailedOutcome {
  return { status: 'failed', error };
}

function storageError(error: unknown): BasicRuntimeError {
  const detail = error instanceof Error ? error.message : String(error);
  return new BasicRuntimeError('NO_STORAGE', `NO STORAGE: ${detail}`);
}

// Line-numbered TinyBasic interpreter. Execution is a resumable state machine:
// INPUT suspends the run and supplyInput() continues it, so nothing here ever
// blocks waiting for the host.
export class TinyBasicRuntime {
  private readonly program = new ProgramStore();

  private readonly environment = new Environment();

  private readonly maxSteps: number;

  private readonly stepsPerSlice: number;

  private active: ActiveProgramState | null = null;

  constructor(
    private readonly terminal: TerminalAdapter,
    options: RuntimeOptions = {}
  ) {
    this.maxSteps = stepCount(options.maxSteps, DEFAULT_MAX_STEPS);
    this.stepsPerSlice = stepCount(options.stepsPerSlice, Number.POSITIVE_INFINITY);
  }

  getStatus(): ExecutorStatus {
    return this.active?.status ?? 'halted';
  }

  // Interactive entry point: one typed line at a time.
  executeLine(input: string): LineOutcome {
    if (this.active?.status === 'awaiting-input') {
      return this.supplyInput(input);
    }
    if (this.active !== null) {
      return failed(new BasicRuntimeError('BUSY'));
    }

    let parsed: ParsedLine;
    try {
      parsed = parseLine(input);
    } catch (error) {
      return this.toFailure(error, null);
    }

    if (parsed.lineNumber !== undefined) {
      if (parsed.statement === undefined) {
        this.program.delete(parsed.lineNumber);
        return { status: 'deleted', line: parsed.lineNumber };
      }
      this.program.set({ line: parsed.lineNumber, source: parsed.source, statement: parsed.statement });
      return { status: 'stored', line: parsed.lineNumber };
    }

    if (parsed.statement === undefined) {
      return { status: 'halted' };
    }
    return this.executeImmediate(parsed.statement);
  }

  run(): RunOutcome {
    if (this.active !== null) {
      return failed(new BasicRuntimeError('BUSY'));
    }
    return this.executeImmediate({ kind: 'RUN' });
  }

  // Continues a run that yielded after its step slice.
  pump(): RunOutcome {
    const active = this.active;
    if (active === null) {
      return { status: 'halted' };
    }
    if (active.status === 'awaiting-input') {
      return this.awaitInput(active);
    }

    for (let budget = this.stepsPerSlice; budget > 0; budget -= 1) {
      active.steps += 1;
      if (active.steps > this.maxSteps) {
        return this.fail(new BasicRuntimeError('RUNAWAY'), active.currentLine);
      }

      let flow: ControlFlow;
      try {
        flow = this.executeStatement(this.currentStatement(active), active);
      } catch (error) {
        return this.fail(error, active.currentLine);
      }

      const outcome = this.applyControlFlow(flow, active);
      if (outcome !== undefined) {
        return outcome;
      }
    }

    return { status: 'running' };
  }

  supplyInput(text: string): RunOutcome {
    const active = this.active;
    const variable = active?.pendingInput[0];
    if (active === null || active.status !== 'awaiting-input' || variable === undefined) {
      return failed(new BasicRuntimeError('NO_INPUT'));
    }

    let value: number;
    try {
      value = parseInputValue(text);
    } catch (error) {
      return this.fail(error, active.currentLine);
    }

    this.environment.set(variable, value);
    active.pendingInput.shift();
    return this.awaitInput(active);
  }

  // Drops the current run. Nothing outside the execution state needs releasing.
  abort(): void {
    this.active = null;
  }

  // Replaces the program with multi-line source text. Valid lines are stored
  // even when others are rejected.
  loadProgram(source: string): LoadReport {
    if (this.active !== null) {
      return { loaded: 0, errors: [new BasicRuntimeError('BUSY')] };
    }
    return this.replaceProgram(source);
  }

  listProgram(): string {
    return this.program
      .entries()
      .map((entry) => `${entry.line} ${entry.source}\n`)
      .join('');
  }

  getVariables(): ReadonlyMap<VariableName, number> {
    return new Map(this.environment.entries());
  }

  getProgramLines(): ReadonlyMap<number, string> {
    return new Map(this.program.entries().map((entry) => [entry.line, entry.source]));
  }

  private executeImmediate(statement: StatementNode): RunOutcome {
    this.active = {
      status: 'running',
      currentLine: null,
      immediate: statement,
      callStack: [],
      pendingInput: [],
      steps: 0
    };
    return this.pump();
  }

  private currentStatement(active: ActiveProgramState): StatementNode {
    if (active.immediate !== null) {
      return active.immediate;
    }
    const line = active.currentLine ?? 0;
    const entry = this.program.get(line);
    if (!entry) {
      throw new BasicRuntimeError('NO_LINE', `NO LINE ${line}`);
    }
    return entry.statement;
  }

  private executeStatement(statement: StatementNode, active: ActiveProgramState): ControlFlow {
    switch (statement.kind) {
      case 'PRINT':
        this.terminal.write(`${evaluatePrintItems(statement.items, this.environment)}\n`);
        return { kind: 'next' };
      case 'IF': {
        const left = evaluateExpression(statement.left, this.environment);
        const right = evaluateExpression(statement.right, this.environment);
        if (!compareValues(left, statement.relation, right)) {
          return { kind: 'next' };
        }
        return this.executeStatement(statement.then, active);
      }
      case 'INPUT':
        return { kind: 'await-input', variables: [...statement.variables] };
      case 'LET':
        this.environment.set(statement.variable, evaluateExpression(statement.expression, this.environment));
        return { kind: 'next' };
      case 'GOTO':
        return { kind: 'jump', target: this.resolveTarget(statement.target) };
      case 'GOSUB': {
        const target = this.resolveTarget(statement.target);
        active.callStack.push(this.fallthroughLine(active));
        return { kind: 'jump', target };
      }
      case 'RETURN': {
        if (active.callStack.length === 0) {
          throw new BasicRuntimeError('RETURN_WO_GOSUB');
        }
        return { kind: 'jump', target: active.callStack.pop() ?? null };
      }
      case 'END':
        return { kind: 'halt' };
      case 'REM':
        return { kind: 'next' };
      case 'CLS':
        this.terminal.clear?.();
        return { kind: 'next' };
      case 'RUN':
        this.assertImmediate(statement, active);
        active.callStack.length = 0;
        return { kind: 'jump', target: this.program.firstLine() };
      case 'LIST':
        this.assertImmediate(statement, active);
        this.terminal.write(this.listProgram());
        return { kind: 'next' };
      case 'NEW':
        this.assertImmediate(statement, active);
        this.program.clear();
        return { kind: 'next' };
      case 'HELP':
        this.assertImmediate(statement, active);
        this.terminal.write(`${HELP_TEXT.join('\n')}\n`);
        return { kind: 'next' };
      case 'LOAD': {
        this.assertImmediate(statement, active);
        const report = this.replaceProgram(this.loadFromStorage(statement.name));
        const firstError = report.errors[0];
        if (firstError) {
          throw firstError;
        }
        return { kind: 'next' };
      }
      case 'SAVE': {
        this.assertImmediate(statement, active);
        this.saveToStorage(this.listProgram(), statement.name);
        return { kind: 'next' };
      }
    }
  }

  private applyControlFlow(flow: ControlFlow, active: ActiveProgramState): RunOutcome | undefined {
    switch (flow.kind) {
      case 'next':
        return this.moveTo(this.fallthroughLine(active), active);
      case 'jump':
        return this.moveTo(flow.target, active);
      case 'halt':
        return this.finish();
      case 'await-input':
        active.pendingInput = flow.variables;
        return this.awaitInput(active);
    }
  }

  private moveTo(target: ReturnAddress, active: ActiveProgramState): RunOutcome | undefined {
    if (target === null) {
      return this.finish();
    }
    active.currentLine = target;
    active.immediate = null;
    return undefined;
  }

  private fallthroughLine(active: ActiveProgramState): ReturnAddress {
    if (active.currentLine === null) {
      return null;
    }
    return this.program.nextLineAfter(active.currentLine);
  }

  private resolveTarget(expression: ExpressionNode): number {
    const line = evaluateExpression(expression, this.environment);
    if (!this.program.has(line)) {
      throw new BasicRuntimeError('NO_LINE', `NO LINE ${line}`);
    }
    return line;
  }

  private assertImmediate(statement: CommandStatement, active: ActiveProgramState): void {
    if (active.currentLine !== null) {
      throw new BasicRuntimeError('BAD_STMT', `BAD STMT: ${statement.kind}`);
    }
  }

  private loadFromStorage(name: string | undefined): string {
    if (!this.terminal.loadProgram) {
      throw new BasicRuntimeError('NO_STORAGE');
    }
    try {
      return this.terminal.loadProgram(name);
    } catch (error) {
      throw storageError(error);
    }
  }

  private saveToStorage(source: string, name: string | undefined): void {
    if (!this.terminal.saveProgram) {
      throw new BasicRuntimeError('NO_STORAGE');
    }
    try {
      this.terminal.saveProgram(source, name);
    } catch (error) {
      throw storageError(error);
    }
  }

  private replaceProgram(source: string): LoadReport {
    this.program.clear();
    const errors: BasicError[] = [];
    let loaded = 0;

    for (const text of source.split(/\r?\n/)) {
      if (text.trim().length === 0) {
        continue;
      }
      try {
        const parsed = parseLine(text);
        if (parsed.lineNumber === undefined) {
          throw new BasicParseError('BAD_LINE', `BAD LINE: NO LINE NUMBER IN '${text.trim()}'`);
        }
        if (parsed.statement !== undefined) {
          this.program.set({ line: parsed.lineNumber, source: parsed.source, statement: parsed.statement });
          loaded += 1;
        }
      } catch (error) {
        if (!(error instanceof BasicError)) {
          throw error;
        }
        errors.push(error);
      }
    }

    return { loaded, errors };
  }

  private awaitInput(active: ActiveProgramState): RunOutcome {
    const variable = active.pendingInput[0];
    if (variable === undefined) {
      active.status = 'running';
      return this.applyControlFlow({ kind: 'next' }, active) ?? this.pump();
    }
    active.status = 'awaiting-input';
    const prompt = `${variable}? `;
    this.terminal.setPrompt?.(prompt);
    return { status: 'awaiting-input', variable, prompt };
  }

  private finish(): RunOutcome {
    this.active = null;
    return { status: 'halted' };
  }

  private fail(error: unknown, line: number | null): RunOutcome {
    this.active = null;
    return this.toFailure(error, line);
  }

  private toFailure(error: unknown, line: number | null): FailedOutcome {
    if (error instanceof BasicError) {
      return failed(error.atLine(line));
    }
    throw error;
  }
}
