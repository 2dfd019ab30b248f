// src/text/normalize.ts
// 文書テキスト → 検索対象文字列（小文字・空白区切り・トークン増補済み）
//
// 手順の順序そのものが仕様。入れ替えると結果が変わる:
//  1. CamelCase 分割   2. 小文字化   3. ".net" → "dotnet"   4. メール/URL 除去
//  5. "..." の空白除去形を末尾に追加   6. 記号除去   7. トークン化
//  8. 隣接 2 語の連結を追加   9. 長い語（9文字以上）の半分割を追加   10. 空白の正規化
//
// 8/9 の増補はヒューリスティック（再現率優先で、半分割による誤一致もあり得る）。
// 出力を再度 normalizeText にかけても不動点にはならない。エンジンは自分の出力を再正規化しない。

const CAMEL_BOUNDARY = /([a-z])([A-Z])/g;
// 単語構成文字または @ の直後ではなく、単語構成文字または . が続かない ".net"
const DOTNET = /(?<![\p{L}\p{N}_@])\.net(?![\p{L}\p{N}_.])/gu;
const EMAIL = /\S+@\S+/g;
const URL_LIKE = /https?:\/\/\S+|www\.\S+/g;
const QUOTED_SPAN = /"([^"]+)"/g;
const SYMBOL = /[^\p{L}\p{N}_\s]/gu;

// この長さを超える語は前半/後半にも分割して追加する
export const HALF_SPLIT_MIN_LENGTH = 8;

export function normalizeText(text: string): string {
  let out = splitCamelCase(text).toLowerCase();
  out = out.replace(DOTNET, ' dotnet ');
  out = stripNoise(out);

  // 記号除去より前に拾う（引用符が消えるとフレーズ境界が分からなくなる）
  for (const joined of quotedPhraseTokens(out)) out += ` ${joined}`;

  out = out.replace(/"/g, '').replace(SYMBOL, ' ');

  const words = tokenizeNormalized(out);
  const augmented = [...bigramTokens(words), ...halfSplitTokens(words)];
  if (augmented.length > 0) out += ` ${augmented.join(' ')}`;

  return out.replace(/\s+/g, ' ').trim();
}

// "HuggingFace" → "Hugging Face"（ASCII の小文字→大文字の境目のみ）
export function splitCamelCase(text: string): string {
  return text.replace(CAMEL_BOUNDARY, '$1 $2');
}

// メールアドレスと URL を丸ごと取り除く
export function stripNoise(text: string): string {
  return text.replace(EMAIL, '').replace(URL_LIKE, '');
}

// "machine learning" → machinelearning（半角スペースのみ除去）
export function quotedPhraseTokens(text: string): string[] {
  return Array.from(text.matchAll(QUOTED_SPAN), m => (m[1] ?? '').replace(/ /g, ''));
}

export function tokenizeNormalized(text: string): string[] {
  return text.split(/\s+/).filter(Boolean);
}

export function bigramTokens(words: readonly string[]): string[] {
  const out: string[] = [];
  for (let i = 0; i + 1 < words.length; i++) {
    out.push(`${words[i]}${words[i + 1]}`);
  }
  return out;
}

// 長さはコードポイント単位で数える
export function halfSplitTokens(words: readonly string[]): string[] {
  const out: string[] = [];
  for (const word of words) {
    const chars = Array.from(word);
    if (chars.length <= HALF_SPLIT_MIN_LENGTH) continue;
    const mid = Math.floor(chars.length / 2);
    out.push(chars.slice(0, mid).join(''), chars.slice(mid).join(''));
  }
  return out;
}
