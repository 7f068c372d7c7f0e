import { mkdirSync, readFileSync, writeFileSync } from 'node:fs';
import path from 'node:path';
import type { Writable } from 'node:stream';

import type { TerminalAdapter } from '@tinybasic/interpreter';

export const DEFAULT_PROGRAM_NAME = 'program';

export const PROGRAM_EXTENSION = '.bas';

const CLEAR_SCREEN = '\u001b[2J\u001b[H';

// Terminal backed by a Node stream; LOAD/SAVE read and write `.bas` files in
// one directory.
export class NodeTerminal implements TerminalAdapter {
  prompt = '';

  constructor(
    private readonly output: Writable,
    readonly directory: string
  ) {}

  write(text: string): void {
    this.output.write(text);
  }

  clear(): void {
    this.output.write(CLEAR_SCREEN);
  }

  setPrompt(prompt: string): void {
    this.prompt = prompt;
  }

  loadProgram(name: string | undefined): string {
    return readFileSync(this.resolveProgramPath(name), 'utf8');
  }

  saveProgram(source: string, name: string | undefined): void {
    const file = this.resolveProgramPath(name);
    mkdirSync(path.dirname(file), { recursive: true });
    writeFileSync(file, source, 'utf8');
  }

  resolveProgramPath(name: string | undefined): string {
    const base = name === undefined || name.trim().length === 0 ? DEFAULT_PROGRAM_NAME : name.trim();
    const file = path.extname(base) === '' ? `${base}${PROGRAM_EXTENSION}` : base;
    return path.resolve(this.directory, file);
  }
}
