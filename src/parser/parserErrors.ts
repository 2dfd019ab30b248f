// src/parser/parserErrors.ts
import { ParseError, formatLocation } from '../errors/errors.ts';

export interface TokenLike {
  image: string;
  startLine?: number | undefined;
  startColumn?: number | undefined;
}

// 代表ケース: 期待外トークン（余分な語、閉じ括弧の過剰など）
export function failUnexpectedToken(token: TokenLike, detail: string): never {
  const loc = formatLocation(token.startLine, token.startColumn);
  const msg = loc
    ? `Unexpected token '${token.image}' at ${loc}. ${detail}`
    : `Unexpected token '${token.image}'. ${detail}`;
  throw new ParseError(msg, token.startLine, token.startColumn, token.image, 'E_PARSE_UNEXPECTED_TOKEN');
}

export function failEmptyQuery(): never {
  throw new ParseError('Query is empty.', undefined, undefined, undefined, 'E_PARSE_EMPTY');
}

export function failGenericParse(message: string, token?: TokenLike): never {
  throw new ParseError(message, token?.startLine, token?.startColumn, token?.image, 'E_PARSE_GENERIC');
}
