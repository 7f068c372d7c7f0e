// Internal error codes, grouped by the stage that raises them.
export type LexErrorCode = 'BAD_CHAR' | 'UNTERMINATED_STRING' | 'BAD_NUMBER';

export type ParseErrorCode = 'SYNTAX' | 'BAD_LINE' | 'BAD_VAR' | 'BAD_LET' | 'BAD_IF';

export type RuntimeErrorCode =
  | 'NO_LINE'
  | 'DIV_ZERO'
  | 'RETURN_WO_GOSUB'
  | 'BAD_INPUT'
  | 'NO_INPUT'
  | 'RUNAWAY'
  | 'BAD_STMT'
  | 'BUSY'
  | 'NO_STORAGE';

export type ErrorCode = LexErrorCode | ParseErrorCode | RuntimeErrorCode;

export type ErrorKind = 'lex' | 'parse' | 'runtime';

export type NumericErrorCode = `E${string}`;

export interface ErrorCatalogEntry {
  code?: ErrorCode;
  kind?: ErrorKind;
  numericCode: NumericErrorCode;
  message: string;
}

export const ERROR_CATALOG: readonly ErrorCatalogEntry[] = [
  { code: 'SYNTAX', kind: 'parse', numericCode: 'E01', message: 'SYNTAX' },
  { code: 'BAD_LINE', kind: 'parse', numericCode: 'E02', message: 'BAD LINE' },
  { code: 'BAD_VAR', kind: 'parse', numericCode: 'E03', message: 'BAD VAR' },
  { code: 'BAD_LET', kind: 'parse', numericCode: 'E04', message: 'BAD LET' },
  { code: 'BAD_IF', kind: 'parse', numericCode: 'E05', message: 'BAD IF' },
  { code: 'NO_LINE', kind: 'runtime', numericCode: 'E06', message: 'NO LINE' },
  { code: 'RUNAWAY', kind: 'runtime', numericCode: 'E07', message: 'RUNAWAY' },
  { code: 'BAD_INPUT', kind: 'runtime', numericCode: 'E08', message: 'BAD INPUT' },
  { code: 'RETURN_WO_GOSUB', kind: 'runtime', numericCode: 'E09', message: 'RETURN W/O GOSUB' },
  { code: 'BAD_STMT', kind: 'runtime', numericCode: 'E10', message: 'BAD STMT' },
  { code: 'DIV_ZERO', kind: 'runtime', numericCode: 'E11', message: 'DIV BY ZERO' },
  { code: 'BUSY', kind: 'runtime', numericCode: 'E12', message: 'BUSY' },
  { code: 'NO_STORAGE', kind: 'runtime', numericCode: 'E13', message: 'NO STORAGE' },
  { code: 'NO_INPUT', kind: 'runtime', numericCode: 'E14', message: 'INPUT NOT EXPECTED' },

  { code: 'BAD_CHAR', kind: 'lex', numericCode: 'E21', message: 'BAD CHAR' },
  { code: 'UNTERMINATED_STRING', kind: 'lex', numericCode: 'E22', message: 'OPEN STRING' },
  { code: 'BAD_NUMBER', kind: 'lex', numericCode: 'E23', message: 'BAD NUMBER' },

  { numericCode: 'E99', message: 'UNKNOWN' }
];

const UNKNOWN_ENTRY = ERROR_CATALOG.find((entry) => entry.numericCode === 'E99');

const BY_CODE = new Map<ErrorCode, ErrorCatalogEntry>();
for (const entry of ERROR_CATALOG) {
  if (entry.code !== undefined) {
    BY_CODE.set(entry.code, entry);
  }
}

export function getErrorCatalogEntry(code: ErrorCode): ErrorCatalogEntry {
  return BY_CODE.get(code) ?? getUnknownErrorCatalogEntry();
}

export function getUnknownErrorCatalogEntry(): ErrorCatalogEntry {
  if (UNKNOWN_ENTRY) {
    return UNKNOWN_ENTRY;
  }
  return {
    numericCode: 'E99',
    message: 'UNKNOWN'
  };
}
