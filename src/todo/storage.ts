import { createHash, randomUUID } from 'node:crypto';
import { mkdir, readFile, rename, writeFile } from 'node:fs/promises';
import { dirname, isAbsolute, relative, resolve, sep } from 'node:path';
import type { TodoTriageConfig } from '../config.js';

/**
 * Todo documents on disk.
 *
 * Paths are confined to `config.rootDir`; the etag is a SHA-256 of the content.
 */
export interface StoredTodoFile {
  absolutePath: string;
  text: string;
  etag: string;
}

export function sha256Hex(text: string): string {
  return createHash('sha256').update(text).digest('hex');
}

/**
 * Lexical check only; symlinks are not resolved.
 */
function escapesRoot(rootDir: string, absolutePath: string): boolean {
  const rel = relative(rootDir, absolutePath);
  // Across Windows drives `relative()` yields an absolute path.
  return isAbsolute(rel) || rel.split(sep).includes('..');
}

export function resolveDocumentPath(config: TodoTriageConfig, path: string): string {
  if (!path.trim()) throw new Error('Document path must be non-empty');
  const rootDir = resolve(config.rootDir);
  const absolutePath = resolve(rootDir, path);
  if (escapesRoot(rootDir, absolutePath)) {
    throw new Error(`Resolved path escapes rootDir: ${absolutePath}`);
  }
  return absolutePath;
}

/**
 * Optimistic concurrency: a given `ifMatch` must equal the current etag.
 */
export function assertEtag(currentEtag: string, ifMatch: string | undefined): void {
  if (ifMatch && ifMatch !== currentEtag) {
    throw new Error(`CONFLICT: etag mismatch (current=${currentEtag}, ifMatch=${ifMatch})`);
  }
}

export async function readTodoFile(
  config: TodoTriageConfig,
  path: string,
  ifMatch?: string
): Promise<StoredTodoFile> {
  const absolutePath = resolveDocumentPath(config, path);
  const text = await readFile(absolutePath, 'utf8');
  const etag = sha256Hex(text);
  assertEtag(etag, ifMatch);
  return { absolutePath, text, etag };
}

/**
 * Replace a document through a sibling temp file and `rename`. Returns the new etag.
 */
export async function writeTodoFile(absolutePath: string, text: string): Promise<string> {
  await mkdir(dirname(absolutePath), { recursive: true });
  const tmpPath = `${absolutePath}.tmp.${randomUUID()}`;
  await writeFile(tmpPath, text, 'utf8');
  await rename(tmpPath, absolutePath);
  return sha256Hex(text);
}
