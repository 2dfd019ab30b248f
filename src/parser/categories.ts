// src/parser/categories.ts
import { createToken } from 'chevrotain';

// すべてのトークンの基底カテゴリ。
// Chevrotainのカテゴリはフィルタリング用途であり、実行時に直接消費されるものではありません。
export const Token = createToken({ name: 'Token', pattern: /NA/ });

// AND / OR / NOT。Word より優先されるが、longer_alt により ANDROID 等は Word になる。
export const Keyword = createToken({ name: 'Keyword', categories: Token });

// 括弧用カテゴリ。
export const Separator = createToken({ name: 'Separator', categories: Token });

// 検索語（プレーンな単語またはフレーズのプレースホルダ）。
export const Operand = createToken({ name: 'Operand', categories: Token });
