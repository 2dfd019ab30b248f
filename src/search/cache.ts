// src/search/cache.ts
// 文書（オブジェクト参照）→ 正規化済みテキスト のキャッシュ。
// 同じコーパスに対してクエリを繰り返す REPL 向け。文書を書き換えたら invalidate する。
// 文字列などのプリミティブ文書は参照で識別できないため対象外。

export class NormalizedTextCache {
  private entries = new WeakMap<object, string>();

  get(doc: unknown): string | undefined {
    return isCacheable(doc) ? this.entries.get(doc) : undefined;
  }

  set(doc: unknown, text: string): void {
    if (isCacheable(doc)) this.entries.set(doc, text);
  }

  invalidate(doc: unknown): void {
    if (isCacheable(doc)) this.entries.delete(doc);
  }

  clear(): void {
    this.entries = new WeakMap();
  }
}

function isCacheable(doc: unknown): doc is object {
  return typeof doc === 'object' && doc !== null;
}
