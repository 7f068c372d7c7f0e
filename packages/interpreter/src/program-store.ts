import type { StatementNode } from './ast';

export interface ProgramEntry {
  line: number;
  source: string;
  statement: StatementNode;
}

// Program lines keyed by line number. Iteration and fallthrough follow numeric
// order, whatever order the lines were typed in.
export class ProgramStore {
  private readonly entriesByLine = new Map<number, ProgramEntry>();

  // Ascending line numbers; rebuilt lazily after an edit.
  private sortedLines: number[] | null = [];

  get size(): number {
    return this.entriesByLine.size;
  }

  set(entry: ProgramEntry): void {
    if (!this.entriesByLine.has(entry.line)) {
      this.sortedLines = null;
    }
    this.entriesByLine.set(entry.line, entry);
  }

  delete(line: number): boolean {
    const removed = this.entriesByLine.delete(line);
    if (removed) {
      this.sortedLines = null;
    }
    return removed;
  }

  clear(): void {
    this.entriesByLine.clear();
    this.sortedLines = [];
  }

  get(line: number): ProgramEntry | undefined {
    return this.entriesByLine.get(line);
  }

  has(line: number): boolean {
    return this.entriesByLine.has(line);
  }

  firstLine(): number | null {
    return this.lines()[0] ?? null;
  }

  // Smallest stored line strictly greater than `line`, or null at the end.
  nextLineAfter(line: number): number | null {
    const lines = this.lines();
    let low = 0;
    let high = lines.length;
    while (low < high) {
      const mid = (low + high) >>> 1;
      if ((lines[mid] ?? 0) <= line) {
        low = mid + 1;
      } else {
        high = mid;
      }
    }
    return lines[low] ?? null;
  }

  entries(): ProgramEntry[] {
    const result: ProgramEntry[] = [];
    for (const line of this.lines()) {
      const entry = this.entriesByLine.get(line);
      if (entry) {
        result.push(entry);
      }
    }
    return result;
  }

  lines(): readonly number[] {
    if (this.sortedLines === null) {
      this.sortedLines = [...this.entriesByLine.keys()].sort((a, b) => a - b);
    }
    return this.sortedLines;
  }
}
