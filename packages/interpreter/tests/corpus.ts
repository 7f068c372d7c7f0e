import fs from 'node:fs';
import path from 'node:path';
import { fileURLToPath } from 'node:url';

import type { ErrorCode } from '../src';

export interface CorpusCase {
  id: string;
  // Lines typed at the prompt, in order.
  lines: string[];
  // Answers handed to INPUT, one per requested variable.
  inputs?: string[];
  expect: {
    output: string;
    errorCode?: ErrorCode;
    errorLine?: number;
    variables?: Record<string, number>;
  };
}

const CORPUS_DIR = fileURLToPath(new URL('./corpus', import.meta.url));

export function loadCorpusCases(): CorpusCase[] {
  const fileNames = fs
    .readdirSync(CORPUS_DIR)
    .filter((name) => name.endsWith('.json'))
    .sort((a, b) => a.localeCompare(b));

  const cases: CorpusCase[] = [];
  for (const fileName of fileNames) {
    const source = fs.readFileSync(path.resolve(CORPUS_DIR, fileName), 'utf8');
    const parsed: { cases: CorpusCase[] } = JSON.parse(source);
    cases.push(...parsed.cases);
  }
  return cases;
}
