// src/parser/index.ts
// 公開API: クエリ文字列（フレーズ抽出済み）をASTへ変換します（CSTは内部実装に隠蔽）。
// 失敗時は ParseError を throw する。結果型で受けたい場合は query/compile.ts の compileQuery を使う。

import { EOF, Lexer, tokenMatcher } from 'chevrotain';
import type { IRecognitionException, IToken } from 'chevrotain';
import { allTokens } from './tokens.ts';
import { Keyword } from './categories.ts';
import { QueryParser } from './parser.ts';
import { astBuilderVisitor } from './visitor.ts';
import { failEmptyQuery, failGenericParse, failUnexpectedToken } from './parserErrors.ts';
import type { Expression as AstExpression } from '../ast/types.ts';
import { ParseError } from '../errors/errors.ts';

const lexer = new Lexer(allTokens);
const parser = new QueryParser();

export interface ParseOutput {
  ast: AstExpression;
  tokens: IToken[];
}

export function parse(input: string): ParseOutput {
  if (input.trim() === '') failEmptyQuery();

  // 1) Lexing — Lexer エラーは最初の1件を ParseError に正規化
  const lexResult = lexer.tokenize(input);
  const le = lexResult.errors[0];
  if (le) {
    const firstSentence = le.message.split('\n')[0] ?? 'Lexing error';
    const snippet = input.slice(le.offset, le.offset + le.length);
    throw new ParseError(firstSentence, le.line, le.column, snippet, 'E_PARSE_UNEXPECTED_TOKEN');
  }

  // 2) Parsing (CST)。パーサーは再利用し、input の代入で状態をリセットする
  parser.input = lexResult.tokens;
  const cst = parser.expression();

  const firstError = parser.errors[0];
  if (firstError) reportRecognitionError(firstError, lexResult.tokens);

  // 3) CST -> AST（Visitor）
  const ast = astBuilderVisitor.visit(cst);
  return { ast, tokens: lexResult.tokens };
}

function reportRecognitionError(error: IRecognitionException, tokens: IToken[]): never {
  const token = error.token;
  const message = error.message.replace(/\s*\n\s*/g, ' ');

  // 入力末尾以外の余分なトークン（"python java", "python )" 等）
  if (error.name === 'NotAllInputParsedException') {
    failUnexpectedToken(toTokenLike(token), message);
  }

  // 直前が演算子なら「宙ぶらりんの演算子」として明示する
  const previous = previousToken(token, tokens);
  if (previous && tokenMatcher(previous, Keyword)) {
    failGenericParse(`Dangling operator '${previous.image}'. ${message}`, toTokenLike(token));
  }
  failGenericParse(message, toTokenLike(token));
}

function previousToken(token: IToken, tokens: IToken[]): IToken | undefined {
  if (token.tokenType === EOF) return tokens[tokens.length - 1];
  const idx = tokens.indexOf(token);
  return idx > 0 ? tokens[idx - 1] : undefined;
}

// EOF トークンは位置が NaN になるため undefined に揃える
function toTokenLike(token: IToken) {
  return {
    image: token.image,
    startLine: Number.isNaN(token.startLine) ? undefined : token.startLine,
    startColumn: Number.isNaN(token.startColumn) ? undefined : token.startColumn,
  };
}
