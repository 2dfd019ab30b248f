/**
 * resumeq REPL (簡易)
 *
 * 目的:
 * - 1行のクエリを入力し、一致件数/ids/候補者一覧を即時表示する。:q で終了。
 * - データは環境変数 RESUMEQ_DATA から読み込む（JSON配列）。
 * - 正規化済みテキストは文書ごとにキャッシュし、クエリを変えても再計算しない。
 *
 * 使い方:
 *   RESUMEQ_DATA=examples/data/resumes.json npm run cli -- repl
 *
 * コマンド:
 *   :q                    終了
 *   :mode result|tree|text  出力モードの切替
 *   :reload               データファイルを読み直す（キャッシュも破棄）
 */

import process from 'node:process';
import readline from 'node:readline/promises';
import { stdin as input, stdout as output } from 'node:process';
import { compileQuery } from '../query/compile.ts';
import { NormalizedTextCache } from '../search/cache.ts';
import { isPrintMode, loadCorpus, render } from './output.ts';
import type { PrintMode } from './output.ts';

export async function startRepl(): Promise<void> {
  const dataPath = process.env['RESUMEQ_DATA'];
  if (!dataPath) {
    console.error('REPL error: RESUMEQ_DATA environment variable is required (path to JSON array).');
    process.exit(1);
  }
  let documents = await loadCorpus(dataPath);
  console.log(`loaded ${documents.length} documents`);

  let mode: PrintMode = 'result';
  const cache = new NormalizedTextCache();

  const rl = readline.createInterface({ input, output, prompt: 'resumeq> ' });
  rl.prompt();

  for await (const line of rl) {
    const text = line.trim();
    if (text === '') { rl.prompt(); continue; }
    if (text === ':q') { break; }

    // 設定コマンド
    if (text.startsWith(':mode ')) {
      const m = text.slice(6).trim();
      if (isPrintMode(m)) {
        mode = m;
        console.log(`mode = ${mode}`);
      } else {
        console.log('usage: :mode result|tree|text');
      }
      rl.prompt();
      continue;
    }
    if (text === ':reload') {
      try {
        documents = await loadCorpus(dataPath);
        cache.clear();
        console.log(`reloaded ${documents.length} documents`);
      } catch (err) {
        console.error('REPL reload error:', err instanceof Error ? err.message : err);
      }
      rl.prompt();
      continue;
    }

    const compiled = compileQuery(text);
    if (!compiled.ok) {
      console.error(`Error parsing query: ${compiled.error.message}`);
    } else {
      console.log(render(mode, compiled.query, documents, {
        cache,
        warn: message => console.error(`Warning: ${message}`),
      }));
    }

    rl.prompt();
  }

  rl.close();
}
