// src/errors/errors.ts
// resumeq - error types and helpers
// 目的: 層ごとに例外型を分離し、呼び出し側が分類しやすい構造を提供
// ログはライブラリ層では行わず、呼び出し側（CLI/REPL）で処理する方針

export type ErrorCode =
  | 'E_PARSE_UNEXPECTED_TOKEN'
  | 'E_PARSE_GENERIC'
  | 'E_PARSE_EMPTY'
  | 'E_EVAL_UNSUPPORTED_NODE'
  | 'E_DOCUMENT_PROCESSING';

export abstract class ResumeqError extends Error {
  public abstract readonly code: ErrorCode;
  constructor(message: string, options?: ErrorOptions) {
    super(message, options);
    // Errorのプロトタイプ連鎖調整（Babel/TS互換）
    Object.setPrototypeOf(this, new.target.prototype);
  }
}

// Parser: フレーズ抽出/トークナイズ/構文解析
export class ParseError extends ResumeqError {
  public readonly code: ErrorCode;
  constructor(
    message: string,
    public readonly line?: number,
    public readonly column?: number,
    public readonly snippet?: string,
    code: Extract<ErrorCode, 'E_PARSE_UNEXPECTED_TOKEN' | 'E_PARSE_GENERIC' | 'E_PARSE_EMPTY'> = 'E_PARSE_GENERIC',
  ) {
    super(message);
    this.name = 'ParseError';
    this.code = code;
  }
}

// Evaluator: 式ツリーの評価
// グローバルのEvalErrorと衝突を避ける命名
export class EvaluationError extends ResumeqError {
  public readonly code: ErrorCode;
  constructor(
    message: string,
    public readonly nodeType?: string,
    code: Extract<ErrorCode, 'E_EVAL_UNSUPPORTED_NODE'> = 'E_EVAL_UNSUPPORTED_NODE',
  ) {
    super(message);
    this.name = 'EvaluationError';
    this.code = code;
  }
}

// Search driver: 1文書の処理失敗。走査全体は止めない
export class DocumentError extends ResumeqError {
  public readonly code: ErrorCode = 'E_DOCUMENT_PROCESSING';
  constructor(
    message: string,
    public readonly index: number,
    cause?: unknown,
  ) {
    super(message, { cause });
    this.name = 'DocumentError';
  }
}

// スニペット整形（必要に応じて使用）
export function formatLocation(line?: number, column?: number): string {
  if (line == null || column == null) return '';
  return `${line}:${column}`;
}
