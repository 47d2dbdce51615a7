import fs from 'fs-extra';
import path from 'path';
import { z, type ZodType, type ZodTypeDef } from 'zod';
import { dataDir } from './paths';
import type { Document, QueryLabel } from './types';

const DocumentRecord = z
  .object({
    doc_id: z.string().min(1),
    title: z.string(),
    text: z.string(),
  })
  .transform((r): Document => ({ docId: r.doc_id, title: r.title, text: r.text }));

const LabelRecord = z
  .object({
    query_id: z.string().min(1),
    query: z.string(),
    expected_doc_id: z.string().min(1),
    expected_answer: z.string(),
  })
  .transform((r): QueryLabel => ({
    queryId: r.query_id,
    query: r.query,
    expectedDocId: r.expected_doc_id,
    expectedAnswer: r.expected_answer,
  }));

export function defaultCorpusPath(): string {
  return path.join(dataDir(), 'corpus.jsonl');
}

export function defaultLabelsPath(): string {
  return path.join(dataDir(), 'labels.jsonl');
}

export function parseJsonLines<T>(content: string, schema: ZodType<T, ZodTypeDef, unknown>, source = '<input>'): T[] {
  const out: T[] = [];
  const lines = content.split(/\r?\n/);
  for (let i = 0; i < lines.length; i++) {
    const line = lines[i]!.trim();
    if (!line) continue;
    let raw: unknown;
    try {
      raw = JSON.parse(line);
    } catch (e) {
      throw new Error(`${source}:${i + 1}: invalid JSON (${e instanceof Error ? e.message : String(e)})`);
    }
    const res = schema.safeParse(raw);
    if (!res.success) {
      const detail = res.error.issues.map((iss) => `${iss.path.join('.') || '<root>'} ${iss.message}`).join('; ');
      throw new Error(`${source}:${i + 1}: ${detail}`);
    }
    out.push(res.data);
  }
  return out;
}

export function parseCorpus(content: string, source?: string): Document[] {
  const docs = parseJsonLines(content, DocumentRecord, source);
  const seen = new Set<string>();
  for (const d of docs) {
    if (seen.has(d.docId)) throw new Error(`${source ?? '<input>'}: duplicate doc_id ${d.docId}`);
    seen.add(d.docId);
  }
  return docs;
}

export function parseLabels(content: string, source?: string): QueryLabel[] {
  return parseJsonLines(content, LabelRecord, source);
}

export async function loadCorpus(filePath: string = defaultCorpusPath()): Promise<Document[]> {
  return parseCorpus(await fs.readFile(filePath, 'utf-8'), filePath);
}

export async function loadLabels(filePath: string = defaultLabelsPath()): Promise<QueryLabel[]> {
  return parseLabels(await fs.readFile(filePath, 'utf-8'), filePath);
}
