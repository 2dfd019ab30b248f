// src/text/flatten.ts
// 任意のネスト構造（オブジェクト/Map/配列/スカラー）から文字列の葉だけを、
// 深さ優先・元の順序で集めて 1 本の文字列にする。

// スキーマは強制しない。文字列の葉だけが検索対象になる
export type RawDocument = unknown;

/**
 * 文字列の葉を出現順に返す。
 * - プレーンオブジェクトは Object.values の順、Map は値の挿入順、配列は添字順
 * - 数値/真偽値/null などの非文字列スカラーは文字列化せずに読み飛ばす
 * - Date やクラスインスタンス（DB の ObjectId 等）はコンテナとして扱わない
 * - 走査中の経路上に同じコンテナが再登場した場合（循環参照）はそこで打ち切る
 */
export function collectStringLeaves(doc: RawDocument): string[] {
  const parts: string[] = [];
  const onPath = new Set<object>();

  const visit = (value: unknown): void => {
    if (typeof value === 'string') {
      parts.push(value);
      return;
    }
    if (typeof value !== 'object' || value === null || onPath.has(value)) return;
    const children = childValues(value);
    if (!children) return;
    onPath.add(value);
    for (const child of children) visit(child);
    onPath.delete(value);
  };

  visit(doc);
  return parts;
}

export function flattenDocument(doc: RawDocument): string {
  return collectStringLeaves(doc).join(' ');
}

function childValues(value: object): Iterable<unknown> | undefined {
  if (Array.isArray(value)) return value;
  if (value instanceof Map) return value.values();
  if (isPlainObject(value)) return Object.values(value);
  return undefined;
}

function isPlainObject(value: object): boolean {
  const proto: unknown = Object.getPrototypeOf(value);
  return proto === Object.prototype || proto === null;
}
