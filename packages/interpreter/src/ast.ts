import type { VariableName } from './environment';

// Expression nodes, interpreted by semantics.ts.
export interface NumberLiteral {
  kind: 'number-literal';
  value: number;
}

export interface VariableReference {
  kind: 'variable-reference';
  name: VariableName;
}

export interface UnaryExpression {
  kind: 'unary-expression';
  operator: '+' | '-';
  operand: ExpressionNode;
}

export type ArithmeticOperator = '+' | '-' | '*' | '/';

export interface BinaryExpression {
  kind: 'binary-expression';
  operator: ArithmeticOperator;
  left: ExpressionNode;
  right: ExpressionNode;
}

export type ExpressionNode = NumberLiteral | VariableReference | UnaryExpression | BinaryExpression;

// String literals only ever appear as PRINT items.
export interface StringLiteral {
  kind: 'string-literal';
  value: string;
}

export type PrintItem = StringLiteral | ExpressionNode;

export type RelationOperator = '=' | '<>' | '<' | '<=' | '>' | '>=';

export interface PrintStatement {
  kind: 'PRINT';
  items: PrintItem[];
}

export interface IfStatement {
  kind: 'IF';
  left: ExpressionNode;
  relation: RelationOperator;
  right: ExpressionNode;
  then: StatementNode;
}

export interface InputStatement {
  kind: 'INPUT';
  variables: VariableName[];
}

export interface LetStatement {
  kind: 'LET';
  variable: VariableName;
  expression: ExpressionNode;
}

export interface GotoStatement {
  kind: 'GOTO';
  target: ExpressionNode;
}

export interface GosubStatement {
  kind: 'GOSUB';
  target: ExpressionNode;
}

export interface ReturnStatement {
  kind: 'RETURN';
}

export interface EndStatement {
  kind: 'END';
}

export interface RemStatement {
  kind: 'REM';
  text: string;
}

export interface ClsStatement {
  kind: 'CLS';
}

export interface RunStatement {
  kind: 'RUN';
}

export interface ListStatement {
  kind: 'LIST';
}

export interface NewStatement {
  kind: 'NEW';
}

export interface HelpStatement {
  kind: 'HELP';
}

export interface LoadStatement {
  kind: 'LOAD';
  name?: string;
}

export interface SaveStatement {
  kind: 'SAVE';
  name?: string;
}

// Statement nodes: parser.ts returns this union and runtime.ts executes it.
export type StatementNode =
  | PrintStatement
  | IfStatement
  | InputStatement
  | LetStatement
  | GotoStatement
  | GosubStatement
  | ReturnStatement
  | EndStatement
  | RemStatement
  | ClsStatement
  | RunStatement
  | ListStatement
  | NewStatement
  | HelpStatement
  | LoadStatement
  | SaveStatement;

// Statements that only make sense typed at the prompt.
export type CommandStatement = RunStatement | ListStatement | NewStatement | HelpStatement | LoadStatement | SaveStatement;

export interface ParsedLine {
  // Absent for immediate-mode lines.
  lineNumber?: number;
  // Statement text after the line number, as it is listed back.
  source: string;
  // Absent for an empty line, or for a numbered line that deletes itself.
  statement?: StatementNode;
}
