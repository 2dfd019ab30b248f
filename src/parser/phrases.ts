// src/parser/phrases.ts
// 目的: クエリ中の "..." をプレースホルダ（QUOTED_PHRASE_<n>）へ置き換え、
// 文法側に空白や演算子を含む語が渡らないようにする。
// プレースホルダ表は呼び出しごとに新規作成し、カウンタも 0 から振り直す。

export const PLACEHOLDER_PREFIX = 'QUOTED_PHRASE_';

const PLACEHOLDER_PATTERN = /^QUOTED_PHRASE_\d+$/;
const QUOTED_SPAN = /"([^"]+)"/g;

// プレースホルダ → 元のフレーズ（空白・大小文字は保持）
export type PhraseTable = ReadonlyMap<string, string>;

export interface PhraseExtraction {
  text: string;
  phrases: PhraseTable;
}

export function extractQuotedPhrases(input: string): PhraseExtraction {
  const phrases = new Map<string, string>();
  let counter = 0;
  // 引用符は左から順に対にする。対にならない " は残り、字句解析でエラーになる
  const text = input.replace(QUOTED_SPAN, (_match, phrase: string) => {
    const placeholder = `${PLACEHOLDER_PREFIX}${counter++}`;
    phrases.set(placeholder, phrase);
    return placeholder;
  });
  return { text, phrases };
}

export function isPlaceholder(term: string): boolean {
  return PLACEHOLDER_PATTERN.test(term);
}
