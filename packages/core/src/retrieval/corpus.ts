/**
 * Corpus loading
 *
 * Reads the documents an InMemoryRetriever serves from a local file:
 * - `.json` / `.yaml` / `.yml`: a list of `{ content, metadata? }` entries,
 *   or an object with a `documents` list
 * - `.txt` / `.md`: plain text split into paragraph chunks
 */

import { readFile } from 'node:fs/promises';
import { basename, extname } from 'node:path';
import yaml from 'js-yaml';
import { z } from 'zod';
import type { Document } from '../types.js';
import { ValidationError } from '../errors.js';

export type CorpusFormat = 'json' | 'yaml' | 'text';

const MetadataValue = z.union([z.string(), z.number(), z.boolean()]).transform(String);

const CorpusEntry = z.object({
  content: z.string().trim().min(1, 'content must not be empty'),
  metadata: z.record(MetadataValue).optional(),
});

const CorpusFile = z.union([
  z.array(CorpusEntry),
  z.object({ documents: z.array(CorpusEntry) }).transform((file) => file.documents),
]);

/**
 * Infer a corpus format from a file extension
 */
export function corpusFormatFor(path: string): CorpusFormat | undefined {
  switch (extname(path).toLowerCase()) {
    case '.json':
      return 'json';
    case '.yaml':
    case '.yml':
      return 'yaml';
    case '.txt':
    case '.md':
      return 'text';
    default:
      return undefined;
  }
}

/**
 * Parse corpus text
 *
 * Entries without a `source` metadata field get `source` (the given name)
 * and `chunk` (the entry's position).
 *
 * @throws {ValidationError} on malformed input
 */
export function parseCorpus(text: string, format: CorpusFormat, source: string): Document[] {
  if (format === 'text') {
    return text
      .split(/\r?\n\s*\r?\n/)
      .map((chunk) => chunk.trim())
      .filter((chunk) => chunk.length > 0)
      .map((content, i) => ({ content, metadata: { source, chunk: String(i) } }));
  }

  let raw: unknown;
  try {
    raw = format === 'json' ? JSON.parse(text) : yaml.load(text);
  } catch (error) {
    throw new ValidationError(
      `Corpus ${source} is not valid ${format.toUpperCase()}: ${error instanceof Error ? error.message : String(error)}`
    );
  }

  const parsed = CorpusFile.safeParse(raw);
  if (!parsed.success) {
    const fieldErrors: Record<string, string> = {};
    for (const issue of parsed.error.issues) {
      fieldErrors[issue.path.join('.') || '(root)'] = issue.message;
    }
    throw new ValidationError(`Corpus ${source} is invalid`, { fieldErrors });
  }

  return parsed.data.map((entry, i) => ({
    content: entry.content,
    metadata: entry.metadata?.source
      ? entry.metadata
      : { ...entry.metadata, source, chunk: String(i) },
  }));
}

/**
 * Load a corpus file
 *
 * @throws {ValidationError} for unreadable, unsupported or malformed files
 */
export async function loadCorpus(path: string): Promise<Document[]> {
  const format = corpusFormatFor(path);
  if (!format) {
    throw new ValidationError(`Unsupported corpus file type: ${path}`, {
      fieldErrors: { corpus: 'expected .json, .yaml, .yml, .txt or .md' },
    });
  }

  let text: string;
  try {
    text = await readFile(path, 'utf-8');
  } catch (error) {
    throw new ValidationError(
      `Cannot read corpus ${path}: ${error instanceof Error ? error.message : String(error)}`
    );
  }

  return parseCorpus(text, format, basename(path));
}
