/// <reference types="node" />
/**
 * resumeq CLI
 *
 * 目的:
 * - ブール検索クエリを受け取り、JSON 配列の文書（履歴書）から一致するものを出力する。
 * - 入力は --query／--query-file／STDIN のいずれか。データは --data または環境変数 RESUMEQ_DATA。
 *
 * 使い方:
 *   resumeq --data examples/data/resumes.json --query 'Python AND (Django OR Flask)'
 *   echo '"Machine Learning"' | resumeq --data examples/data/resumes.json --print tree
 *   resumeq repl
 *
 * オプション:
 *   --data <path>            JSON配列のデータファイル（未指定時は RESUMEQ_DATA）
 *   --query "<q>"            クエリ文字列
 *   --query-file <path>      クエリを含むテキストファイル
 *   --print result|tree|text 出力内容（既定: result）
 */

import fs from 'node:fs/promises';
import path from 'node:path';
import process from 'node:process';
import { compileQuery } from '../query/compile.ts';
import { isPrintMode, loadCorpus, render } from './output.ts';
import type { PrintMode } from './output.ts';

type Args = {
  cmd?: 'run' | 'repl';
  data?: string;
  query?: string;
  queryFile?: string;
  print?: PrintMode;
};

function printHelp(): void {
  console.log(`resumeq CLI

Usage:
  resumeq --data examples/data/resumes.json --query 'Python AND (Django OR Flask)'
  echo '"Machine Learning"' | resumeq --data examples/data/resumes.json --print tree
  resumeq repl

Options:
  --data <path>              JSON array file (defaults to $RESUMEQ_DATA)
  --query "<q>"              Inline boolean query
  --query-file <path>        File containing the query
  --print result|tree|text   Output mode (default: result)
`);
}

function nextValueOrExit(argv: string[], idxRef: { i: number }, flag: string): string {
  idxRef.i++;
  const v = argv[idxRef.i];
  if (typeof v === 'string' && v.length > 0 && !v.startsWith('--')) return v;
  console.error(`Error: ${flag} requires a value`);
  printHelp();
  process.exit(1);
}

function parseArgs(argv: string[]): Args {
  const args: Args = {};
  const ref = { i: 1 };
  // サブコマンド風に "repl" を認識
  if (argv[2] === 'repl') {
    args.cmd = 'repl';
    return args;
  }
  while (++ref.i < argv.length) {
    const a = argv[ref.i];
    if (a === '--data') args.data = nextValueOrExit(argv, ref, '--data');
    else if (a === '--query') args.query = nextValueOrExit(argv, ref, '--query');
    else if (a === '--query-file') args.queryFile = nextValueOrExit(argv, ref, '--query-file');
    else if (a === '--print') {
      const v = nextValueOrExit(argv, ref, '--print');
      if (isPrintMode(v)) args.print = v;
      else {
        console.error(`Error: --print must be one of "result" | "tree" | "text" (got "${v}")`);
        printHelp();
        process.exit(1);
      }
    } else if (a === '--help' || a === '-h') {
      printHelp();
      process.exit(0);
    } else {
      console.error(`Unknown option: ${a}`);
      printHelp();
      process.exit(1);
    }
  }
  return args;
}

async function readQuery(args: Args): Promise<string> {
  if (args.query) return args.query;
  if (args.queryFile) return fs.readFile(path.resolve(args.queryFile), 'utf8');
  // STDIN
  if (!process.stdin.isTTY) {
    return await new Promise<string>((resolve, reject) => {
      let buf = '';
      process.stdin.setEncoding('utf8');
      process.stdin.on('data', chunk => { buf += chunk; });
      process.stdin.on('end', () => resolve(buf));
      process.stdin.on('error', reject);
    });
  }
  console.error('Error: --query or --query-file or STDIN is required');
  printHelp();
  process.exit(1);
}

async function runOnce(args: Args): Promise<void> {
  const dataPath = args.data ?? process.env['RESUMEQ_DATA'];
  if (!dataPath) {
    console.error('Error: --data <path> (or RESUMEQ_DATA) is required');
    printHelp();
    process.exit(1);
  }
  const queryText = (await readQuery(args)).trim();
  const documents = await loadCorpus(dataPath);

  const compiled = compileQuery(queryText);
  if (!compiled.ok) {
    // 利用者が直せる種類のエラー。評価には進まない
    console.error(`Error parsing query: ${compiled.error.message}`);
    process.exit(1);
  }

  console.log(render(args.print ?? 'result', compiled.query, documents, {
    warn: message => console.error(`Warning: ${message}`),
  }));
}

async function main() {
  const args = parseArgs(process.argv);
  if (args.cmd === 'repl') {
    const { startRepl } = await import('./repl.ts');
    await startRepl();
    return;
  }
  await runOnce(args);
}

main().catch(err => {
  console.error('resumeq error:', err);
  process.exit(1);
});
