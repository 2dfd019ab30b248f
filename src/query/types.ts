// src/query/types.ts
// 評価用の式ツリー。AST（二項）を平坦化した n 項表現で、構築後は変更しない。

import type { PhraseTable } from '../parser/phrases.ts';

export type ExprNode = TermNode | AndNode | OrNode | NotNode;

// 検索語 1 つ。プレースホルダの場合は PhraseTable で元のフレーズに解決される
export interface TermNode {
  readonly type: 'Term';
  readonly text: string;
}

// and/or は複数子要素を持つ（パーサー経由では常に 2 つ以上）
export interface AndNode {
  readonly type: 'And';
  readonly children: readonly ExprNode[];
}
export interface OrNode {
  readonly type: 'Or';
  readonly children: readonly ExprNode[];
}

export interface NotNode {
  readonly type: 'Not';
  readonly child: ExprNode;
}

// 1 回のパース結果。式ツリーと、そのパースで作られたフレーズ表を対で持つ
export interface CompiledQuery {
  readonly source: string;
  readonly expression: ExprNode;
  readonly phrases: PhraseTable;
}

export function isTerm(node: ExprNode): node is TermNode {
  return node.type === 'Term';
}
export function isAnd(node: ExprNode): node is AndNode {
  return node.type === 'And';
}
export function isOr(node: ExprNode): node is OrNode {
  return node.type === 'Or';
}
export function isNot(node: ExprNode): node is NotNode {
  return node.type === 'Not';
}
