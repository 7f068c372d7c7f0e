import type { ExpressionNode, PrintItem, RelationOperator } from './ast';
import { toInt32, type VariableName } from './environment';
import { BasicRuntimeError } from './errors';

// Read access to the variable slots; Environment satisfies it.
export interface VariableReader {
  get(name: VariableName): number;
}

// Evaluates an expression tree to a signed 32-bit integer.
export function evaluateExpression(node: ExpressionNode, vars: VariableReader): number {
  switch (node.kind) {
    case 'number-literal':
      return toInt32(node.value);
    case 'variable-reference':
      return vars.get(node.name);
    case 'unary-expression': {
      const operand = evaluateExpression(node.operand, vars);
      return node.operator === '-' ? toInt32(-operand) : operand;
    }
    case 'binary-expression': {
      const left = evaluateExpression(node.left, vars);
      const right = evaluateExpression(node.right, vars);

      switch (node.operator) {
        case '+':
          return toInt32(left + right);
        case '-':
          return toInt32(left - right);
        case '*':
          return toInt32(Math.imul(left, right));
        case '/':
          if (right === 0) {
            throw new BasicRuntimeError('DIV_ZERO');
          }
          return toInt32(left / right);
      }
    }
  }
}

export function compareValues(left: number, relation: RelationOperator, right: number): boolean {
  switch (relation) {
    case '=':
      return left === right;
    case '<>':
      return left !== right;
    case '<':
      return left < right;
    case '<=':
      return left <= right;
    case '>':
      return left > right;
    case '>=':
      return left >= right;
  }
}

// Renders a PRINT list. Every item is evaluated before any text is returned,
// so an error in a later item leaves no partial output.
export function evaluatePrintItems(items: PrintItem[], vars: VariableReader): string {
  return items
    .map((item) => (item.kind === 'string-literal' ? item.value : String(evaluateExpression(item, vars))))
    .join('');
}

// Input text must be an optionally signed decimal integer in 32-bit range.
export function parseInputValue(text: string): number {
  const trimmed = text.trim();
  const value = /^[+-]?\d+$/.test(trimmed) ? Number.parseInt(trimmed, 10) : Number.NaN;
  if (Number.isNaN(value) || value !== toInt32(value)) {
    throw new BasicRuntimeError('BAD_INPUT', `BAD INPUT '${trimmed}'`);
  }
  return value;
}
