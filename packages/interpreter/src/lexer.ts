import { BasicLexError } from './errors';

// Reserved words of the dialect. Every other alphabetic run is an identifier.
const KEYWORDS = new Set([
  'PRINT',
  'IF',
  'THEN',
  'INPUT',
  'LET',
  'GOTO',
  'GOSUB',
  'RETURN',
  'END',
  'REM',
  'CLS',
  'RUN',
  'LIST',
  'NEW',
  'HELP',
  'LOAD',
  'SAVE'
]);

export const MAX_INTEGER_LITERAL = 2_147_483_647;

export type TokenType =
  | 'number'
  | 'string'
  | 'identifier'
  | 'keyword'
  | 'operator'
  | 'comma'
  | 'lparen'
  | 'rparen'
  | 'remark'
  | 'eof';

export interface Token {
  type: TokenType;
  value: string;
  // 0-based column of the first character.
  column: number;
}

function isDigit(ch: string): boolean {
  return ch >= '0' && ch <= '9';
}

function isLetter(ch: string): boolean {
  return (ch >= 'A' && ch <= 'Z') || (ch >= 'a' && ch <= 'z');
}

// Splits one line into tokens. The list always ends with an eof token so the
// parser can test for the end of the line without bounds checks.
export function tokenizeLine(input: string): Token[] {
  const tokens: Token[] = [];
  const source = input.trimEnd();
  let index = 0;

  while (index < source.length) {
    const ch = source[index];
    if (ch === undefined) {
      break;
    }

    if (ch === ' ' || ch === '\t') {
      index += 1;
      continue;
    }

    if (isDigit(ch)) {
      let end = index + 1;
      while (end < source.length && isDigit(source[end] ?? '')) {
        end += 1;
      }
      const raw = source.slice(index, end);
      const value = Number.parseInt(raw, 10);
      if (value > MAX_INTEGER_LITERAL) {
        throw new BasicLexError('BAD_NUMBER', `BAD NUMBER ${raw}`, { column: index, token: raw });
      }
      tokens.push({ type: 'number', value: String(value), column: index });
      index = end;
      continue;
    }

    if (ch === '"') {
      const end = source.indexOf('"', index + 1);
      if (end < 0) {
        throw new BasicLexError('UNTERMINATED_STRING', `OPEN STRING AT ${source.length}`, {
          column: source.length,
          token: source.slice(index)
        });
      }
      tokens.push({ type: 'string', value: source.slice(index + 1, end), column: index });
      index = end + 1;
      continue;
    }

    if (isLetter(ch)) {
      let end = index + 1;
      while (end < source.length && isLetter(source[end] ?? '')) {
        end += 1;
      }
      const upper = source.slice(index, end).toUpperCase();
      const keyword = KEYWORDS.has(upper);
      tokens.push({ type: keyword ? 'keyword' : 'identifier', value: upper, column: index });
      index = end;

      if (keyword && upper === 'REM') {
        // Remark text is kept verbatim and never tokenized.
        const text = source.slice(index).trim();
        tokens.push({ type: 'remark', value: text, column: index });
        index = source.length;
      }
      continue;
    }

    const twoChar = source.slice(index, index + 2);
    if (twoChar === '<=' || twoChar === '>=' || twoChar === '<>' || twoChar === '><') {
      tokens.push({ type: 'operator', value: twoChar === '><' ? '<>' : twoChar, column: index });
      index += 2;
      continue;
    }

    if ('+-*/=<>'.includes(ch)) {
      tokens.push({ type: 'operator', value: ch, column: index });
      index += 1;
      continue;
    }

    if (ch === ',') {
      tokens.push({ type: 'comma', value: ch, column: index });
      index += 1;
      continue;
    }

    if (ch === '(') {
      tokens.push({ type: 'lparen', value: ch, column: index });
      index += 1;
      continue;
    }

    if (ch === ')') {
      tokens.push({ type: 'rparen', value: ch, column: index });
      index += 1;
      continue;
    }

    throw new BasicLexError('BAD_CHAR', `BAD CHAR '${ch}' AT ${index}`, { column: index, token: ch });
  }

  tokens.push({ type: 'eof', value: '', column: source.length });
  return tokens;
}

// Human-readable token description for parse error messages.
export function describeToken(token: Token): string {
  switch (token.type) {
    case 'eof':
      return 'END OF LINE';
    case 'string':
      return `"${token.value}"`;
    default:
      return token.value;
  }
}
