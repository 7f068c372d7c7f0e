// Public API of the interpreter package.
export * from './ast';
export * from './buffered-terminal';
export * from './environment';
export * from './error-catalog';
export * from './errors';
export * from './lexer';
export * from './parser';
export * from './program-store';
export * from './runtime';
export * from './semantics';
export * from './types';
