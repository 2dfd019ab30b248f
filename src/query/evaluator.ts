// src/query/evaluator.ts
// 式ツリー × 正規化済みテキスト → boolean
// 副作用なし。Term の照合は 3 段のフォールバック（phrase → word → substring）で、先に成立した段で確定する。

import { isPlaceholder } from '../parser/phrases.ts';
import type { PhraseTable } from '../parser/phrases.ts';
import type { CompiledQuery, ExprNode, TermNode } from './types.ts';
import { failUnsupportedNode } from './evaluationErrors.ts';

export type MatchTier = 'phrase' | 'word' | 'substring';

type Matcher = (text: string) => boolean;

// 単語境界は \b 相当。ただし ASCII ではなく Unicode の文字・数字・_ を単語構成文字とみなす
const WORD_CHAR = '[\\p{L}\\p{N}_]';
const BOUNDARY = `(?:(?<=${WORD_CHAR})(?!${WORD_CHAR})|(?<!${WORD_CHAR})(?=${WORD_CHAR}))`;

const EMPTY_PHRASES: PhraseTable = new Map();

interface EvalContext {
  phrases: PhraseTable;
  // 小文字化済みの語 → 単語境界パターン
  patterns: ReadonlyMap<string, RegExp>;
}

export function buildMatcher(query: CompiledQuery): Matcher {
  // パターンは文書ごとに作り直さず、ここで一度だけコンパイルする
  const patterns = new Map<string, RegExp>();
  for (const term of collectTerms(query.expression)) {
    const needle = term.text.toLowerCase();
    if (!patterns.has(needle)) patterns.set(needle, wordPattern(needle));
  }
  const ctx: EvalContext = { phrases: query.phrases, patterns };

  return function matcher(text: string): boolean {
    return evalNode(query.expression, text, ctx);
  };
}

export function evaluate(expr: ExprNode, text: string, phrases: PhraseTable = EMPTY_PHRASES): boolean {
  return evalNode(expr, text, { phrases, patterns: new Map() });
}

/**
 * どの段で Term が一致したかを返す。一致しなければ undefined。
 * 1. phrase: プレースホルダかつフレーズ表にある → 小文字化したフレーズの部分文字列一致（この段の結果で確定）
 * 2. word: 小文字化した語の単語境界一致
 * 3. substring: 小文字化した語の部分文字列一致
 */
export function matchTermTier(term: string, text: string, phrases: PhraseTable = EMPTY_PHRASES): MatchTier | undefined {
  return termTier(term, text, { phrases, patterns: new Map() });
}

export function matchTerm(term: string, text: string, phrases: PhraseTable = EMPTY_PHRASES): boolean {
  return matchTermTier(term, text, phrases) !== undefined;
}

function evalNode(node: ExprNode, text: string, ctx: EvalContext): boolean {
  switch (node.type) {
    case 'Term':
      return termTier(node.text, text, ctx) !== undefined;
    case 'And':
      return node.children.every(child => evalNode(child, text, ctx));
    case 'Or':
      return node.children.some(child => evalNode(child, text, ctx));
    case 'Not':
      return !evalNode(node.child, text, ctx);
    default:
      // 手組みのツリーなど、型の外から来たノード
      return failUnsupportedNode(describeNode(node));
  }
}

function termTier(term: string, text: string, ctx: EvalContext): MatchTier | undefined {
  // プレースホルダ判定は小文字化前の語で行う
  const phrase = isPlaceholder(term) ? ctx.phrases.get(term) : undefined;
  if (phrase !== undefined) {
    return text.includes(phrase.toLowerCase()) ? 'phrase' : undefined;
  }

  const needle = term.toLowerCase();
  const pattern = ctx.patterns.get(needle) ?? wordPattern(needle);
  if (pattern.test(text)) return 'word';
  if (text.includes(needle)) return 'substring';
  return undefined;
}

function wordPattern(needle: string): RegExp {
  return new RegExp(`${BOUNDARY}${escapeRegExp(needle)}${BOUNDARY}`, 'u');
}

// u フラグ下では構文文字以外のエスケープが不正になるため、構文文字のみエスケープする
function escapeRegExp(s: string): string {
  return s.replace(/[.*+?^${}()|[\]\\/]/g, '\\$&');
}

function collectTerms(node: ExprNode): TermNode[] {
  switch (node.type) {
    case 'Term':
      return [node];
    case 'And':
    case 'Or':
      return node.children.flatMap(collectTerms);
    case 'Not':
      return collectTerms(node.child);
    default:
      return failUnsupportedNode(describeNode(node));
  }
}

function describeNode(node: unknown): string {
  if (typeof node === 'object' && node !== null && 'type' in node) return String(node.type);
  return typeof node;
}
