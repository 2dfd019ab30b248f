// src/query/build.ts
// AST → 式ツリー
// - 設計方針 -
// ・左結合の二項 AND/OR を n 項へ平坦化（A OR B OR C → Or[A, B, C]）
// ・NOT は押し下げず、そのまま Not ノードにする
// ・Word はテキストを加工せずに Term へ（小文字化は評価側）

import type { Expression, LogicalExpression } from '../ast/types.ts';
import type { ExprNode } from './types.ts';
import { isAnd, isOr } from './types.ts';

export function buildExpression(ast: Expression): ExprNode {
  switch (ast.type) {
    case 'LogicalExpression':
      return buildLogical(ast);
    case 'UnaryExpression':
      return { type: 'Not', child: buildExpression(ast.argument) };
    case 'Word':
      return { type: 'Term', text: ast.value };
  }
}

// 同じ演算子の子はchildrenへ展開する
function buildLogical(ast: LogicalExpression): ExprNode {
  const type = ast.operator === 'AND' ? 'And' : 'Or';
  const children: ExprNode[] = [];
  for (const side of [ast.left, ast.right]) {
    const child = buildExpression(side);
    if ((isAnd(child) && type === 'And') || (isOr(child) && type === 'Or')) children.push(...child.children);
    else children.push(child);
  }
  return type === 'And' ? { type: 'And', children } : { type: 'Or', children };
}
