import type {
  ArithmeticOperator,
  ExpressionNode,
  GosubStatement,
  GotoStatement,
  IfStatement,
  InputStatement,
  LetStatement,
  LoadStatement,
  ParsedLine,
  PrintItem,
  PrintStatement,
  RelationOperator,
  SaveStatement,
  StatementNode
} from './ast';
import { isVariableName, type VariableName } from './environment';
import { getErrorCatalogEntry } from './error-catalog';
import { BasicError, BasicParseError, type ParseErrorCode } from './errors';
import { describeToken, tokenizeLine, type Token } from './lexer';

export const MIN_LINE_NUMBER = 1;
export const MAX_LINE_NUMBER = 8191;

const RELATIONS: readonly RelationOperator[] = ['=', '<>', '<', '<=', '>', '>='];

function isRelation(value: string): value is RelationOperator {
  return RELATIONS.some((relation) => relation === value);
}

function toInt(text: string): number {
  return Number.parseInt(text, 10);
}

class Parser {
  private readonly tokens: Token[];

  private index = 0;

  constructor(tokens: Token[]) {
    this.tokens = tokens;
  }

  parseLine(source: string): ParsedLine {
    const first = this.peek();
    if (first.type === 'eof') {
      return { source: '' };
    }

    if (first.type !== 'number') {
      return { source: source.trim(), statement: this.parseStatement() };
    }

    this.next();
    const lineNumber = toInt(first.value);
    if (lineNumber < MIN_LINE_NUMBER || lineNumber > MAX_LINE_NUMBER) {
      throw new BasicParseError('BAD_LINE', `BAD LINE ${first.value}`, { column: first.column, token: first.value });
    }

    const body = this.peek();
    if (body.type === 'eof') {
      return { lineNumber, source: '' };
    }

    return {
      lineNumber,
      source: source.slice(body.column).trim(),
      statement: this.parseStatement()
    };
  }

  parseStatement(): StatementNode {
    const statement = this.parseStatementBody();
    this.expectEof();
    return statement;
  }

  // Parses one statement without requiring the end of the line, so IF can
  // nest a statement after THEN.
  private parseStatementBody(): StatementNode {
    const first = this.peek();

    if (first.type === 'keyword') {
      switch (first.value) {
        case 'PRINT':
          this.next();
          return this.parsePrint();
        case 'IF':
          this.next();
          return this.parseIf();
        case 'INPUT':
          this.next();
          return this.parseInput();
        case 'LET':
          this.next();
          return this.parseLet();
        case 'GOTO':
          this.next();
          return { kind: 'GOTO', target: this.parseExpression() } satisfies GotoStatement;
        case 'GOSUB':
          this.next();
          return { kind: 'GOSUB', target: this.parseExpression() } satisfies GosubStatement;
        case 'RETURN':
          this.next();
          return { kind: 'RETURN' };
        case 'END':
          this.next();
          return { kind: 'END' };
        case 'REM': {
          this.next();
          const remark = this.peek();
          if (remark.type === 'remark') {
            this.next();
          }
          return { kind: 'REM', text: remark.type === 'remark' ? remark.value : '' };
        }
        case 'CLS':
          this.next();
          return { kind: 'CLS' };
        case 'RUN':
          this.next();
          return { kind: 'RUN' };
        case 'LIST':
          this.next();
          return { kind: 'LIST' };
        case 'NEW':
          this.next();
          return { kind: 'NEW' };
        case 'HELP':
          this.next();
          return { kind: 'HELP' };
        case 'LOAD':
          this.next();
          return { kind: 'LOAD', name: this.parseOptionalName() } satisfies LoadStatement;
        case 'SAVE':
          this.next();
          return { kind: 'SAVE', name: this.parseOptionalName() } satisfies SaveStatement;
        default:
          throw this.unexpected('SYNTAX', 'STATEMENT', first);
      }
    }

    if (first.type === 'identifier') {
      const second = this.tokens[this.index + 1];
      if (second?.type === 'operator' && second.value === '=') {
        return this.parseLet();
      }
    }

    throw this.unexpected('SYNTAX', 'STATEMENT', first);
  }

  private parsePrint(): PrintStatement {
    const items: PrintItem[] = [];
    do {
      const token = this.peek();
      if (token.type === 'string') {
        this.next();
        items.push({ kind: 'string-literal', value: token.value });
      } else {
        items.push(this.parseExpression());
      }
    } while (this.accept('comma'));

    return { kind: 'PRINT', items };
  }

  private parseIf(): IfStatement {
    const left = this.parseExpression();

    const relationToken = this.next();
    if (relationToken.type !== 'operator' || !isRelation(relationToken.value)) {
      throw this.unexpected('BAD_IF', 'RELATION', relationToken);
    }

    const right = this.parseExpression();

    const thenToken = this.next();
    if (thenToken.type !== 'keyword' || thenToken.value !== 'THEN') {
      throw this.unexpected('BAD_IF', 'THEN', thenToken);
    }

    if (this.peek().type === 'eof') {
      throw this.unexpected('BAD_IF', 'STATEMENT', this.peek());
    }

    return {
      kind: 'IF',
      left,
      relation: relationToken.value,
      right,
      then: this.parseStatementBody()
    };
  }

  private parseInput(): InputStatement {
    const variables: VariableName[] = [];
    do {
      variables.push(this.parseVariable('BAD_VAR'));
    } while (this.accept('comma'));

    return { kind: 'INPUT', variables };
  }

  private parseLet(): LetStatement {
    const variable = this.parseVariable('BAD_LET');

    const op = this.next();
    if (op.type !== 'operator' || op.value !== '=') {
      throw this.unexpected('BAD_LET', '=', op);
    }

    return {
      kind: 'LET',
      variable,
      expression: this.parseExpression()
    };
  }

  private parseVariable(code: ParseErrorCode): VariableName {
    const token = this.next();
    if (token.type === 'identifier' && isVariableName(token.value)) {
      return token.value;
    }
    if (token.type === 'identifier') {
      throw this.unexpected('BAD_VAR', 'VARIABLE A-Z', token);
    }
    throw this.unexpected(code, 'VARIABLE', token);
  }

  private parseOptionalName(): string | undefined {
    const token = this.peek();
    if (token.type !== 'string') {
      return undefined;
    }
    this.next();
    return token.value;
  }

  parseStandaloneExpression(): ExpressionNode {
    const expression = this.parseExpression();
    this.expectEof();
    return expression;
  }

  private parseExpression(): ExpressionNode {
    return this.parseAddSub();
  }

  private parseAddSub(): ExpressionNode {
    let node = this.parseMulDiv();

    while (true) {
      const operator = this.acceptOperator('+', '-');
      if (operator === undefined) {
        break;
      }
      node = {
        kind: 'binary-expression',
        operator,
        left: node,
        right: this.parseMulDiv()
      };
    }

    return node;
  }

  private parseMulDiv(): ExpressionNode {
    let node = this.parseUnary();

    while (true) {
      const operator = this.acceptOperator('*', '/');
      if (operator === undefined) {
        break;
      }
      node = {
        kind: 'binary-expression',
        operator,
        left: node,
        right: this.parseUnary()
      };
    }

    return node;
  }

  private parseUnary(): ExpressionNode {
    const token = this.peek();
    if (token.type === 'operator' && (token.value === '+' || token.value === '-')) {
      this.next();
      return {
        kind: 'unary-expression',
        operator: token.value,
        operand: this.parseUnary()
      };
    }
    return this.parsePrimary();
  }

  private parsePrimary(): ExpressionNode {
    const token = this.next();

    if (token.type === 'number') {
      return {
        kind: 'number-literal',
        value: toInt(token.value)
      };
    }

    if (token.type === 'identifier') {
      if (!isVariableName(token.value)) {
        throw this.unexpected('BAD_VAR', 'VARIABLE A-Z', token);
      }
      return {
        kind: 'variable-reference',
        name: token.value
      };
    }

    if (token.type === 'lparen') {
      const expr = this.parseExpression();
      const close = this.next();
      if (close.type !== 'rparen') {
        throw this.unexpected('SYNTAX', ')', close);
      }
      return expr;
    }

    throw this.unexpected('SYNTAX', 'EXPRESSION', token);
  }

  private acceptOperator<T extends ArithmeticOperator>(...operators: T[]): T | undefined {
    const token = this.peek();
    if (token.type !== 'operator') {
      return undefined;
    }
    const operator = operators.find((candidate) => candidate === token.value);
    if (operator !== undefined) {
      this.next();
    }
    return operator;
  }

  private accept(type: Token['type']): boolean {
    if (this.peek().type !== type) {
      return false;
    }
    this.next();
    return true;
  }

  private expectEof(): void {
    const token = this.peek();
    if (token.type !== 'eof') {
      throw this.unexpected('SYNTAX', 'END OF LINE', token);
    }
  }

  private unexpected(code: ParseErrorCode, expected: string, token: Token): BasicParseError {
    const found = describeToken(token);
    return new BasicParseError(code, `${getErrorCatalogEntry(code).message}: EXPECTED ${expected}, FOUND ${found}`, {
      column: token.column,
      token: found
    });
  }

  private peek(): Token {
    return this.tokens[this.index] ?? { type: 'eof', value: '', column: 0 };
  }

  private next(): Token {
    const token = this.peek();
    this.index += 1;
    return token;
  }
}

// Parses a typed line: an optional line number followed by one statement.
// Errors raised for a numbered line carry that line number.
export function parseLine(input: string): ParsedLine {
  try {
    return new Parser(tokenizeLine(input)).parseLine(input);
  } catch (error) {
    if (error instanceof BasicError) {
      const lineNumber = Number.parseInt(/^\s*(\d+)/.exec(input)?.[1] ?? '', 10);
      if (lineNumber >= MIN_LINE_NUMBER && lineNumber <= MAX_LINE_NUMBER) {
        error.atLine(lineNumber);
      }
    }
    throw error;
  }
}

export function parseStatement(input: string): StatementNode {
  return new Parser(tokenizeLine(input)).parseStatement();
}

export function parseExpression(input: string): ExpressionNode {
  return new Parser(tokenizeLine(input)).parseStandaloneExpression();
}
