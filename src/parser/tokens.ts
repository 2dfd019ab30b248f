// src/parser/tokens.ts
import { createToken, Lexer } from 'chevrotain';
import { Keyword, Separator, Operand } from './categories.ts';

// WhiteSpace は Lexer.SKIPPED とし、パーサーに渡さない。
export const WhiteSpace = createToken({
  name: 'WhiteSpace',
  pattern: /\s+/,
  group: Lexer.SKIPPED,
});

// ----- Operands -----
// 空白・括弧・ダブルクオート以外の連続。c++ や node.js もそのまま1語として扱う。
// ダブルクオートはフレーズ抽出（phrases.ts）で消費済みのはずなので、残っていれば字句エラーにする。
export const Word = createToken({
  name: 'Word',
  pattern: /[^\s()"]+/,
  categories: Operand,
});

// ----- Keywords -----
// 大小文字を区別しない。longer_alt: Word により "ANDROID" "ORACLE" "NOTE" は Word として切り出される。
export const And = createToken({ name: 'And', pattern: /AND/i, categories: Keyword, longer_alt: Word });
export const Or = createToken({ name: 'Or', pattern: /OR/i, categories: Keyword, longer_alt: Word });
export const Not = createToken({ name: 'Not', pattern: /NOT/i, categories: Keyword, longer_alt: Word });

// ----- Separators -----
export const LParen = createToken({
  name: 'LParen',
  pattern: /\(/,
  categories: Separator,
  start_chars_hint: ['('],
});
export const RParen = createToken({
  name: 'RParen',
  pattern: /\)/,
  categories: Separator,
  start_chars_hint: [')'],
});

// ----- Token order (priority) -----
// 重要: Chevrotain は配列順にマッチを試みます。
// 1) WhiteSpace（SKIPPED）
// 2) Keywords（Word より先に）
// 3) Separators
// 4) Word（最後）
export const allTokens = [
  WhiteSpace,

  // Keywords
  And, Or, Not,

  // Separators
  LParen, RParen,

  // Operands
  Word,
];
