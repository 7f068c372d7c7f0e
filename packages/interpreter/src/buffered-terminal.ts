import type { TerminalAdapter } from './types';

// In-memory terminal for embedding hosts and tests: output accumulates until
// drained, and LOAD/SAVE go to a named map.
export class BufferedTerminal implements TerminalAdapter {
  readonly files = new Map<string, string>();

  prompt = '';

  clearCount = 0;

  private output = '';

  write(text: string): void {
    this.output += text;
  }

  clear(): void {
    this.output = '';
    this.clearCount += 1;
  }

  setPrompt(prompt: string): void {
    this.prompt = prompt;
  }

  loadProgram(name: string | undefined): string {
    const source = this.files.get(name ?? '');
    if (source === undefined) {
      throw new Error(`no program named '${name ?? ''}'`);
    }
    return source;
  }

  saveProgram(source: string, name: string | undefined): void {
    this.files.set(name ?? '', source);
  }

  drain(): string {
    const text = this.output;
    this.output = '';
    return text;
  }
}
