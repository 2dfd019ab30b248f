// src/search/index.ts
// 検索ドライバ: 文書ごとに Flatten → Normalize → Evaluate を行い、一致した文書を元の順序で返す。
// 1 文書の失敗は DocumentError として記録し、走査は継続する（ログは呼び出し側）。

import { DocumentError } from '../errors/errors.ts';
import type { ParseError } from '../errors/errors.ts';
import { compileQuery } from '../query/compile.ts';
import { buildMatcher } from '../query/evaluator.ts';
import type { CompiledQuery } from '../query/types.ts';
import { flattenDocument } from '../text/flatten.ts';
import { normalizeText } from '../text/normalize.ts';
import { NormalizedTextCache } from './cache.ts';

export { NormalizedTextCache };

export interface DocumentFailure<T> {
  index: number;
  document: T;
  error: DocumentError;
}

export interface SearchResult<T> {
  // 元の参照のまま（コピーも並べ替えもしない）
  matches: T[];
  failures: DocumentFailure<T>[];
}

export type SearchOptions<T> = {
  cache?: NormalizedTextCache;
  onDocumentError?: (failure: DocumentFailure<T>) => void;
};

export type SearchOutcome<T> =
  | { ok: true; query: CompiledQuery; result: SearchResult<T> }
  | { ok: false; error: ParseError };

export function documentText(doc: unknown, cache?: NormalizedTextCache): string {
  const cached = cache?.get(doc);
  if (cached !== undefined) return cached;
  const text = normalizeText(flattenDocument(doc));
  cache?.set(doc, text);
  return text;
}

export function searchDocuments<T>(
  query: CompiledQuery,
  documents: readonly T[],
  options: SearchOptions<T> = {},
): SearchResult<T> {
  const matcher = buildMatcher(query);
  const matches: T[] = [];
  const failures: DocumentFailure<T>[] = [];

  documents.forEach((document, index) => {
    try {
      if (matcher(documentText(document, options.cache))) matches.push(document);
    } catch (err) {
      const message = err instanceof Error ? err.message : String(err);
      const failure: DocumentFailure<T> = {
        index,
        document,
        error: new DocumentError(`Failed to process document #${index}: ${message}`, index, err),
      };
      failures.push(failure);
      options.onDocumentError?.(failure);
    }
  });

  return { matches, failures };
}

// クエリ文字列から一括で。構文エラーは結果として返す
export function search<T>(
  input: string,
  documents: readonly T[],
  options: SearchOptions<T> = {},
): SearchOutcome<T> {
  const compiled = compileQuery(input);
  if (!compiled.ok) return compiled;
  return { ok: true, query: compiled.query, result: searchDocuments(compiled.query, documents, options) };
}
