import { mkdtempSync, readFileSync, rmSync } from 'node:fs';
import os from 'node:os';
import path from 'node:path';
import { Writable } from 'node:stream';

import { afterEach, beforeEach, describe, expect, it } from 'vitest';

import { NodeTerminal } from '../src/node-terminal';

function createTerminal(directory: string) {
  const chunks: string[] = [];
  const output = new Writable({
    write(chunk: Buffer, _encoding, callback) {
      chunks.push(chunk.toString('utf8'));
      callback();
    }
  });
  return { terminal: new NodeTerminal(output, directory), text: () => chunks.join('') };
}

describe('NodeTerminal', () => {
  let tempDir = '';

  beforeEach(() => {
    tempDir = mkdtempSync(path.join(os.tmpdir(), 'tinybasic-term-'));
  });

  afterEach(() => {
    rmSync(tempDir, { recursive: true, force: true });
  });

  it('resolves program names inside its directory', () => {
    const { terminal } = createTerminal(tempDir);

    expect(terminal.resolveProgramPath(undefined)).toBe(path.join(tempDir, 'program.bas'));
    expect(terminal.resolveProgramPath(' game ')).toBe(path.join(tempDir, 'game.bas'));
    expect(terminal.resolveProgramPath('notes.txt')).toBe(path.join(tempDir, 'notes.txt'));
  });

  it('writes text and clear sequences to its stream', () => {
    const { terminal, text } = createTerminal(tempDir);

    terminal.write('HI\n');
    terminal.clear();

    expect(text()).toBe('HI\n\u001b[2J\u001b[H');
  });

  it('round-trips program files', () => {
    const { terminal } = createTerminal(tempDir);

    terminal.saveProgram('10 END\n', 'nested/prog');

    expect(readFileSync(path.join(tempDir, 'nested', 'prog.bas'), 'utf8')).toBe('10 END\n');
    expect(terminal.loadProgram('nested/prog')).toBe('10 END\n');
    expect(() => terminal.loadProgram('absent')).toThrow(/ENOENT/);
  });
});
