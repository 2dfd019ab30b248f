// src/index.ts
export * from './parser/index.ts';
export { extractQuotedPhrases, isPlaceholder, PLACEHOLDER_PREFIX } from './parser/phrases.ts';
export type { PhraseTable, PhraseExtraction } from './parser/phrases.ts';
export * from './query/types.ts';
export * from './query/build.ts';
export * from './query/compile.ts';
export * from './query/evaluator.ts';
export * from './text/flatten.ts';
export * from './text/normalize.ts';
export * from './search/index.ts';
export { ResumeqError, ParseError, EvaluationError, DocumentError } from './errors/errors.ts';
export type { ErrorCode } from './errors/errors.ts';
