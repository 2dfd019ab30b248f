// src/parser/parser.ts
// 目的: tokens.ts のトークンを用いてCSTを生成するChevrotainパーサーを提供。
// 優先順位: NOT > AND > OR（AND/OR は左結合）

import { CstParser } from 'chevrotain';
import { allTokens, And, Or, Not, LParen, RParen, Word } from './tokens.ts';

export class QueryParser extends CstParser {
  constructor() {
    super(allTokens, {
      // 部分的なツリーは返さない方針のため、エラー回復は無効
      recoveryEnabled: false,
    });
    this.performSelfAnalysis();
  }

  // トップレベル
  public expression = this.RULE('expression', () => {
    this.SUBRULE(this.orExpression);
  });

  // ORは最も低い優先順位。左結合。
  public orExpression = this.RULE('orExpression', () => {
    this.SUBRULE(this.andExpression, { LABEL: 'lhs' });
    this.MANY(() => {
      this.CONSUME(Or);
      this.SUBRULE2(this.andExpression, { LABEL: 'rhs' });
    });
  });

  // AND は OR より高い。左結合。
  public andExpression = this.RULE('andExpression', () => {
    this.SUBRULE(this.notExpression, { LABEL: 'lhs' });
    this.MANY(() => {
      this.CONSUME(And);
      this.SUBRULE2(this.notExpression, { LABEL: 'rhs' });
    });
  });

  // NOT は単項。再帰で NOT NOT A にも対応
  public notExpression = this.RULE('notExpression', () => {
    this.OR([
      {
        ALT: () => {
          this.CONSUME(Not);
          this.SUBRULE(this.notExpression, { LABEL: 'argument' });
        },
      },
      { ALT: () => this.SUBRULE(this.atomicExpression) },
    ]);
  });

  public atomicExpression = this.RULE('atomicExpression', () => {
    this.OR([
      { ALT: () => this.SUBRULE(this.groupExpression) },
      { ALT: () => this.CONSUME(Word) },
    ]);
  });

  // ( expr )
  public groupExpression = this.RULE('groupExpression', () => {
    this.CONSUME(LParen);
    this.SUBRULE(this.expression);
    this.CONSUME(RParen);
  });
}
