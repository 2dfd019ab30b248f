// src/parser/visitor.ts
// 目的: ChevrotainのCSTをASTへ変換するVisitor実装
// 命名規約: メソッド名はCSTルール名に一致。ctx の型はルール定義（parser.ts）のラベルに合わせる。

import type { CstNode, IToken } from 'chevrotain';
import type {
  Expression as AstExpression,
  LogicalExpression as AstLogicalExpression,
} from '../ast/types.ts';
import { QueryParser } from './parser.ts';
import { failGenericParse } from './parserErrors.ts';

interface ExpressionCtx { orExpression: CstNode[] }
interface BinaryCtx { lhs: CstNode[]; rhs?: CstNode[] }
interface NotExpressionCtx { argument?: CstNode[]; atomicExpression?: CstNode[] }
interface AtomicExpressionCtx { groupExpression?: CstNode[]; Word?: IToken[] }
interface GroupExpressionCtx { expression: CstNode[] }

// パーサーのインスタンスからビジターのベースクラスを取得
const parser = new QueryParser();
const BaseCstVisitor = parser.getBaseCstVisitorConstructor<unknown, AstExpression>();

export class AstBuilderVisitor extends BaseCstVisitor {
  constructor() {
    super();
    // 実装されたVisitorメソッドがパーサーの全ルールをカバーしているか検証
    this.validateVisitor();
  }

  expression(ctx: ExpressionCtx): AstExpression {
    return this.visit(ctx.orExpression);
  }

  orExpression(ctx: BinaryCtx): AstExpression {
    return this.foldLeft(ctx, 'OR');
  }

  andExpression(ctx: BinaryCtx): AstExpression {
    return this.foldLeft(ctx, 'AND');
  }

  notExpression(ctx: NotExpressionCtx): AstExpression {
    if (ctx.argument) {
      return {
        type: 'UnaryExpression',
        operator: 'NOT',
        argument: this.visit(ctx.argument),
      };
    }
    // NOTがない場合はatomicExpressionの結果をそのまま返す
    if (ctx.atomicExpression) return this.visit(ctx.atomicExpression);
    return failGenericParse('notExpression: missing operand');
  }

  atomicExpression(ctx: AtomicExpressionCtx): AstExpression {
    if (ctx.groupExpression) return this.visit(ctx.groupExpression);
    const word = ctx.Word?.[0];
    if (word) return { type: 'Word', value: word.image };
    return failGenericParse('atomicExpression: missing word or group');
  }

  groupExpression(ctx: GroupExpressionCtx): AstExpression {
    return this.visit(ctx.expression);
  }

  // ---- utilities ----

  // 左結合の二項演算子を処理する共通パターン
  private foldLeft(ctx: BinaryCtx, operator: AstLogicalExpression['operator']): AstExpression {
    let astNode = this.visit(ctx.lhs);
    for (const rhsNode of ctx.rhs ?? []) {
      astNode = {
        type: 'LogicalExpression',
        operator,
        left: astNode,
        right: this.visit(rhsNode),
      };
    }
    return astNode;
  }
}

// ビジターのシングルトンインスタンスをエクスポート
export const astBuilderVisitor = new AstBuilderVisitor();
