// src/query/compile.ts
// 公開API: 生のクエリ文字列 → CompiledQuery（式ツリー + フレーズ表）。
// 構文エラーは throw せず、結果型 { ok: false, error } で返す（呼び出し側は利用者に表示して終了）。

import { parse } from '../parser/index.ts';
import { extractQuotedPhrases } from '../parser/phrases.ts';
import { failEmptyQuery } from '../parser/parserErrors.ts';
import { ParseError } from '../errors/errors.ts';
import { buildExpression } from './build.ts';
import type { CompiledQuery } from './types.ts';

export type QueryOutcome =
  | { ok: true; query: CompiledQuery }
  | { ok: false; error: ParseError };

const EMPTY_PHRASES: ReadonlyMap<string, string> = new Map();

/**
 * 演算子（AND / OR / NOT、大文字のみ）もダブルクオートも含まないクエリかどうか。
 * true の場合はパーサーを通さず、小文字化したクエリ全体を 1 つの Term にする。
 */
export function isPlainQuery(input: string): boolean {
  return !['AND', 'OR', 'NOT', '"'].some(mark => input.includes(mark));
}

export function compileQuery(input: string): QueryOutcome {
  try {
    return { ok: true, query: compileOrThrow(input) };
  } catch (err) {
    if (err instanceof ParseError) return { ok: false, error: err };
    throw err;
  }
}

function compileOrThrow(input: string): CompiledQuery {
  if (input.trim() === '') failEmptyQuery();

  // 単一語の高速経路
  if (isPlainQuery(input)) {
    return {
      source: input,
      expression: { type: 'Term', text: input.toLowerCase() },
      phrases: EMPTY_PHRASES,
    };
  }

  // 1) フレーズ抽出 → 2) 構文解析 → 3) 平坦化
  const { text, phrases } = extractQuotedPhrases(input);
  const { ast } = parse(text);
  return { source: input, expression: buildExpression(ast), phrases };
}
