import { describe, expect, it } from 'vitest';

import { Environment } from '../src/environment';
import { BasicError, BasicParseError } from '../src/errors';
import { parseExpression, parseLine, parseStatement } from '../src/parser';
import { evaluateExpression } from '../src/semantics';

function evaluate(source: string, environment = new Environment()): number {
  return evaluateExpression(parseExpression(source), environment);
}

function parseError(action: () => unknown): BasicError {
  try {
    action();
  } catch (error) {
    if (error instanceof BasicError) {
      return error;
    }
    throw error;
  }
  throw new Error('expected a parse failure');
}

describe('expression parser', () => {
  it('binds * and / tighter than + and -', () => {
    expect(evaluate('2 + 3 * 4')).toBe(14);
    expect(evaluate('2*3+4')).toBe(10);
    expect(evaluate('(2 + 3) * 4')).toBe(20);
  });

  it('associates operators of equal precedence to the left', () => {
    expect(evaluate('10 - 2 - 3')).toBe(5);
    expect(evaluate('100 / 10 / 5')).toBe(2);
    expect(parseExpression('1 - 2 + 3')).toEqual({
      kind: 'binary-expression',
      operator: '+',
      left: {
        kind: 'binary-expression',
        operator: '-',
        left: { kind: 'number-literal', value: 1 },
        right: { kind: 'number-literal', value: 2 }
      },
      right: { kind: 'number-literal', value: 3 }
    });
  });

  it('applies repeated unary signs before binary operators', () => {
    expect(evaluate('-2 * -3')).toBe(6);
    expect(evaluate('--5')).toBe(5);
    expect(evaluate('+-+7')).toBe(-7);
    expect(parseExpression('-A')).toEqual({
      kind: 'unary-expression',
      operator: '-',
      operand: { kind: 'variable-reference', name: 'A' }
    });
  });

  it('reads variables from the environment', () => {
    const environment = new Environment();
    environment.set('X', 6);
    expect(evaluate('X * X - 1', environment)).toBe(35);
  });

  it('rejects relations inside expressions', () => {
    const error = parseError(() => parseExpression('1 < 2'));
    expect(error.code).toBe('SYNTAX');
    expect(error.message).toBe('SYNTAX: EXPECTED END OF LINE, FOUND <');
  });

  it('reports an unclosed parenthesis', () => {
    const error = parseError(() => parseExpression('(1 + 2'));
    expect(error.message).toBe('SYNTAX: EXPECTED ), FOUND END OF LINE');
  });
});

describe('statement parser', () => {
  it('splits a numbered line into number, source and statement', () => {
    expect(parseLine('10 PRINT "A=", A')).toEqual({
      lineNumber: 10,
      source: 'PRINT "A=", A',
      statement: {
        kind: 'PRINT',
        items: [
          { kind: 'string-literal', value: 'A=' },
          { kind: 'variable-reference', name: 'A' }
        ]
      }
    });
  });

  it('returns immediate lines without a line number', () => {
    const parsed = parseLine('  PRINT 1  ');
    expect(parsed.lineNumber).toBeUndefined();
    expect(parsed.source).toBe('PRINT 1');
    expect(parsed.statement?.kind).toBe('PRINT');
  });

  it('treats a bare line number as a deletion', () => {
    expect(parseLine('30')).toEqual({ lineNumber: 30, source: '' });
    expect(parseLine('   ')).toEqual({ source: '' });
  });

  it('nests IF statements after THEN', () => {
    expect(parseStatement('IF A < 3 THEN IF B >= 1 THEN GOTO 50')).toEqual({
      kind: 'IF',
      left: { kind: 'variable-reference', name: 'A' },
      relation: '<',
      right: { kind: 'number-literal', value: 3 },
      then: {
        kind: 'IF',
        left: { kind: 'variable-reference', name: 'B' },
        relation: '>=',
        right: { kind: 'number-literal', value: 1 },
        then: { kind: 'GOTO', target: { kind: 'number-literal', value: 50 } }
      }
    });
  });

  it('accepts >< as not-equal', () => {
    const statement = parseStatement('IF A >< B THEN END');
    expect(statement.kind === 'IF' && statement.relation).toBe('<>');
  });

  it('parses INPUT variable lists', () => {
    expect(parseStatement('INPUT A, B, C')).toEqual({ kind: 'INPUT', variables: ['A', 'B', 'C'] });
  });

  it('parses LET with and without the keyword', () => {
    const expected = {
      kind: 'LET',
      variable: 'X',
      expression: {
        kind: 'binary-expression',
        operator: '+',
        left: { kind: 'variable-reference', name: 'X' },
        right: { kind: 'number-literal', value: 1 }
      }
    };
    expect(parseStatement('LET X = X + 1')).toEqual(expected);
    expect(parseStatement('X = X + 1')).toEqual(expected);
  });

  it('keeps GOTO and GOSUB targets as expressions', () => {
    expect(parseStatement('GOTO X+10')).toEqual({
      kind: 'GOTO',
      target: {
        kind: 'binary-expression',
        operator: '+',
        left: { kind: 'variable-reference', name: 'X' },
        right: { kind: 'number-literal', value: 10 }
      }
    });
    expect(parseStatement('GOSUB 100')).toEqual({ kind: 'GOSUB', target: { kind: 'number-literal', value: 100 } });
  });

  it('parses REM and the immediate commands', () => {
    expect(parseStatement('REM count to 3')).toEqual({ kind: 'REM', text: 'count to 3' });
    expect(parseStatement('REM')).toEqual({ kind: 'REM', text: '' });
    expect(parseStatement('LOAD "demo"')).toEqual({ kind: 'LOAD', name: 'demo' });
    expect(parseStatement('SAVE')).toEqual({ kind: 'SAVE' });
    for (const command of ['RUN', 'LIST', 'NEW', 'HELP', 'CLS', 'RETURN', 'END']) {
      expect(parseStatement(command).kind).toBe(command);
    }
  });

  it('rejects trailing tokens after RETURN and END', () => {
    expect(parseError(() => parseStatement('RETURN 5')).message).toBe('SYNTAX: EXPECTED END OF LINE, FOUND 5');
    expect(parseError(() => parseStatement('END X')).code).toBe('SYNTAX');
  });

  it('rejects incomplete IF statements', () => {
    expect(parseError(() => parseStatement('IF A THEN 10')).message).toBe('BAD IF: EXPECTED RELATION, FOUND THEN');
    expect(parseError(() => parseStatement('IF A = 1 PRINT 2')).message).toBe('BAD IF: EXPECTED THEN, FOUND PRINT');
    expect(parseError(() => parseStatement('IF 1 = 1 THEN')).code).toBe('BAD_IF');
  });

  it('rejects variable names that are not a single letter', () => {
    expect(parseError(() => parseStatement('LET AB = 1')).code).toBe('BAD_VAR');
    expect(parseError(() => parseStatement('INPUT 5')).code).toBe('BAD_VAR');
    expect(parseError(() => parseStatement('LET 5 = 1')).code).toBe('BAD_LET');
    expect(parseError(() => parseStatement('PRINT XY')).code).toBe('BAD_VAR');
  });

  it('rejects unknown statements', () => {
    const error = parseError(() => parseStatement('THEN 10'));
    expect(error).toBeInstanceOf(BasicParseError);
    expect(error.message).toBe('SYNTAX: EXPECTED STATEMENT, FOUND THEN');
    expect(error.column).toBe(0);
  });

  it('rejects line numbers outside 1..8191', () => {
    expect(parseError(() => parseLine('0 PRINT 1')).code).toBe('BAD_LINE');
    const error = parseError(() => parseLine('8192 PRINT 1'));
    expect(error.code).toBe('BAD_LINE');
    expect(error.line).toBeUndefined();
  });

  it('tags errors in numbered lines with the line number', () => {
    const parse = parseError(() => parseLine('20 PRINT ('));
    expect(parse.line).toBe(20);
    expect(parse.toDisplayString()).toBe('SYNTAX: EXPECTED EXPRESSION, FOUND END OF LINE IN 20 (E01)');

    const lex = parseError(() => parseLine('30 PRINT "open'));
    expect(lex.kind).toBe('lex');
    expect(lex.line).toBe(30);
  });
});
