// src/cli/output.ts
// CLI/REPL 共通の表示整形。検索コアには依存するが、コアからは参照しない（表示層）。

import fs from 'node:fs/promises';
import path from 'node:path';
import { documentText, searchDocuments } from '../search/index.ts';
import type { NormalizedTextCache, SearchResult } from '../search/index.ts';
import type { CompiledQuery } from '../query/types.ts';

export type PrintMode = 'result' | 'tree' | 'text';

export function isPrintMode(v: string): v is PrintMode {
  return v === 'result' || v === 'tree' || v === 'text';
}

// 一覧表示用の候補者 1 行（Skills は先頭 3 件まで）
export interface CandidateSummary {
  name: string;
  email: string;
  phone: string;
  location: string;
  skills: string;
}

const SKILL_PREVIEW = 3;

export async function loadCorpus(dataPath: string): Promise<unknown[]> {
  const raw = await fs.readFile(path.resolve(dataPath), 'utf8');
  const data: unknown = JSON.parse(raw);
  if (!Array.isArray(data)) {
    throw new Error(`data file must contain a JSON array (got non-array root): ${dataPath}`);
  }
  return data;
}

// _id（Mongo の拡張 JSON { "$oid": ... } を含む）または id
export function documentId(doc: unknown): string | undefined {
  if (!isRecord(doc)) return undefined;
  const raw = doc['_id'] ?? doc['id'];
  if (typeof raw === 'string' || typeof raw === 'number') return String(raw);
  if (isRecord(raw) && typeof raw['$oid'] === 'string') return raw['$oid'];
  return undefined;
}

export function summarizeCandidate(doc: unknown): CandidateSummary {
  const record = isRecord(doc) ? doc : {};
  return {
    name: field(record, 'name', 'Unknown'),
    email: field(record, 'email', 'N/A'),
    phone: field(record, 'phone', 'N/A'),
    location: field(record, 'location', 'N/A'),
    skills: skillPreview(record['skills']),
  };
}

export function render(
  mode: PrintMode,
  query: CompiledQuery,
  documents: readonly unknown[],
  options: { cache?: NormalizedTextCache; warn?: (message: string) => void } = {},
): string {
  if (mode === 'tree') {
    return json({
      source: query.source,
      expression: query.expression,
      phrases: Object.fromEntries(query.phrases),
    });
  }

  if (mode === 'text') {
    return json(documents.map((doc, index) => {
      const id = documentId(doc) ?? String(index);
      try {
        return { id, text: documentText(doc, options.cache) };
      } catch (err) {
        return { id, error: err instanceof Error ? err.message : String(err) };
      }
    }));
  }

  const result = searchDocuments(query, documents, {
    ...(options.cache ? { cache: options.cache } : {}),
    onDocumentError: failure => {
      const id = documentId(failure.document);
      options.warn?.(id === undefined ? failure.error.message : `${failure.error.message} (id: ${id})`);
    },
  });
  return json(summarizeResult(result));
}

export function summarizeResult(result: SearchResult<unknown>) {
  return {
    count: result.matches.length,
    ids: result.matches.map(documentId).filter((id): id is string => id !== undefined),
    candidates: result.matches.map(summarizeCandidate),
    failures: result.failures.map(f => ({ index: f.index, message: f.error.message })),
  };
}

function skillPreview(skills: unknown): string {
  if (skills == null) return '';
  if (!Array.isArray(skills)) return String(skills);
  const names = skills.map(s => String(s));
  const head = names.slice(0, SKILL_PREVIEW).join(', ');
  return names.length > SKILL_PREVIEW ? `${head}...` : head;
}

function field(record: Record<string, unknown>, key: string, fallback: string): string {
  const v = record[key];
  return v == null ? fallback : String(v);
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function json(value: unknown): string {
  return JSON.stringify(value, null, 2);
}
