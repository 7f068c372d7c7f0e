import { setImmediate as nextTurn } from 'node:timers/promises';

import type { LineOutcome, TinyBasicRuntime } from '@tinybasic/interpreter';

// Pumps a sliced run until it halts, fails or asks for input. Each slice
// yields to the event loop so signal handlers can abort the run.
export async function settle(runtime: TinyBasicRuntime, outcome: LineOutcome): Promise<LineOutcome> {
  let current = outcome;
  while (current.status === 'running') {
    await nextTurn();
    current = runtime.pump();
  }
  return current;
}
