export const VARIABLE_NAMES = [
  'A', 'B', 'C', 'D', 'E', 'F', 'G', 'H', 'I', 'J', 'K', 'L', 'M',
  'N', 'O', 'P', 'Q', 'R', 'S', 'T', 'U', 'V', 'W', 'X', 'Y', 'Z'
] as const;

export type VariableName = (typeof VARIABLE_NAMES)[number];

const SLOT_BY_NAME = new Map<string, number>(VARIABLE_NAMES.map((name, index) => [name, index]));

export function isVariableName(value: string): value is VariableName {
  return SLOT_BY_NAME.has(value);
}

// Wraps to a signed 32-bit integer, truncating toward zero first.
export function toInt32(value: number): number {
  if (!Number.isFinite(value)) {
    return 0;
  }
  return Math.trunc(value) | 0;
}

// The 26 integer slots. Every slot exists from construction and starts at 0.
export class Environment {
  private readonly slots = new Int32Array(VARIABLE_NAMES.length);

  get(name: VariableName): number {
    return this.slots[this.slotOf(name)] ?? 0;
  }

  set(name: VariableName, value: number): void {
    this.slots[this.slotOf(name)] = toInt32(value);
  }

  entries(): Array<[VariableName, number]> {
    return VARIABLE_NAMES.map((name, index) => [name, this.slots[index] ?? 0]);
  }

  private slotOf(name: VariableName): number {
    return SLOT_BY_NAME.get(name) ?? 0;
  }
}
