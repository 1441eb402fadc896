/**
 * Guideline document loader.
 *
 * Documents are Markdown (or plain text) files in a documents directory,
 * addressed by file name without extension. Optional YAML frontmatter
 * sets `name` and `domain`; without a domain the specialty detected from
 * the body is used.
 */

import { readdir, readFile } from 'node:fs/promises';
import { extname, join } from 'node:path';
import matter from 'gray-matter';
import { z } from 'zod';
import type { GuidelineDocument } from '../types/coverage.js';
import { detectSpecialty } from '../drafting/draft-outliner.js';
import { NotFoundError } from '../taxonomy/registry.js';

export const DOCUMENT_EXTENSIONS = ['.md', '.txt'] as const;

const FrontmatterSchema = z.object({
  name: z.string().trim().min(1).optional(),
  domain: z.string().trim().min(1).optional(),
});

/**
 * A document file exists but cannot be parsed (bad frontmatter).
 */
export class DocumentLoadError extends Error {
  override name = 'DocumentLoadError' as const;

  constructor(
    message: string,
    public readonly filePath: string,
  ) {
    super(message);
  }
}

/**
 * Build a GuidelineDocument from raw file content.
 *
 * @param content - File content, frontmatter optional
 * @param id - Fallback name (the file name without extension)
 * @param filePath - Used in error messages
 */
export function parseGuidelineDocument(content: string, id: string, filePath = id): GuidelineDocument {
  let parsed: matter.GrayMatterFile<string>;
  try {
    parsed = matter(content);
  } catch (err: unknown) {
    const message = err instanceof Error ? err.message : String(err);
    throw new DocumentLoadError(`Invalid frontmatter in ${filePath}: ${message}`, filePath);
  }

  const frontmatter = FrontmatterSchema.safeParse(parsed.data);
  if (!frontmatter.success) {
    const issues = frontmatter.error.issues.map((i) => `${i.path.join('.')}: ${i.message}`);
    throw new DocumentLoadError(`Invalid frontmatter in ${filePath}:\n${issues.join('\n')}`, filePath);
  }

  const sourceText = parsed.content.trim();
  return {
    name: frontmatter.data.name ?? id,
    source_text: sourceText,
    domain_tag: frontmatter.data.domain ?? detectSpecialty(sourceText),
    byte_size: Buffer.byteLength(sourceText, 'utf-8'),
  };
}

function isDocumentFile(fileName: string): boolean {
  return DOCUMENT_EXTENSIONS.some((ext) => ext === extname(fileName).toLowerCase());
}

function idOf(fileName: string): string {
  return fileName.slice(0, fileName.length - extname(fileName).length);
}

/**
 * Document ids in `dir`, sorted. A missing directory holds no documents.
 */
export async function listDocumentIds(dir: string): Promise<string[]> {
  let names: string[];
  try {
    names = await readdir(dir);
  } catch (err: unknown) {
    if (err instanceof Error && 'code' in err && err.code === 'ENOENT') {
      return [];
    }
    throw err;
  }
  return [...new Set(names.filter(isDocumentFile).map(idOf))].sort();
}

/**
 * @throws {NotFoundError} When no `<id>.md` or `<id>.txt` exists in `dir`
 */
export async function loadDocument(dir: string, id: string): Promise<GuidelineDocument> {
  for (const ext of DOCUMENT_EXTENSIONS) {
    const filePath = join(dir, `${id}${ext}`);
    let content: string;
    try {
      content = await readFile(filePath, 'utf-8');
    } catch (err: unknown) {
      if (err instanceof Error && 'code' in err && err.code === 'ENOENT') {
        continue;
      }
      throw err;
    }
    return parseGuidelineDocument(content, id, filePath);
  }
  throw new NotFoundError('document', id);
}

/**
 * Load the named documents, or every document in `dir` when `ids` is
 * omitted. Order follows `ids` (or sorted id order).
 */
export async function loadDocuments(dir: string, ids?: readonly string[]): Promise<GuidelineDocument[]> {
  const wanted = ids ?? (await listDocumentIds(dir));
  return Promise.all(wanted.map((id) => loadDocument(dir, id)));
}
