// src/ast/types.ts
// パーサー（Visitor）が生成する AST。二項演算のまま保持し、n 項への平坦化は query/build.ts で行う。

export type AstNode = LogicalExpression | UnaryExpression | WordNode;

// A AND B, A OR B（左結合）
export interface LogicalExpression {
  type: 'LogicalExpression';
  operator: 'AND' | 'OR';
  left: Expression;
  right: Expression;
}

// NOT A
export interface UnaryExpression {
  type: 'UnaryExpression';
  operator: 'NOT';
  argument: Expression;
}

// 演算子以外のトークン。プレースホルダ（QUOTED_PHRASE_n）もここに入る。
// 大小文字はそのまま保持し、小文字化は評価側で行う。
export interface WordNode {
  type: 'Word';
  value: string;
}

export type Expression = AstNode;
