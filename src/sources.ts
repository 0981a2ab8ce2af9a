import { promises as fs } from 'fs';
import * as path from 'path';
import { InputError, errorMessage } from './errors.js';
import { detectLanguage } from './language.js';
import type { SourceFile } from './types.js';

export interface SourceChunk {
  file: string;
  part: number;
  parts: number;
  code: string;
}

function looksBinary(buffer: Buffer): boolean {
  return buffer.subarray(0, 8000).includes(0);
}

/** Reads one file for review; `language` overrides extension-based detection. */
export async function readSourceFile(
  filePath: string,
  options: { language?: string; maxFileSize: number; displayPath?: string }
): Promise<SourceFile> {
  let buffer: Buffer;
  try {
    buffer = await fs.readFile(filePath);
  } catch (error) {
    throw new InputError(`Cannot read file ${filePath}: ${errorMessage(error)}`, { cause: error });
  }

  if (buffer.length > options.maxFileSize) {
    throw new InputError(
      `File too large for analysis (${buffer.length} bytes, limit: ${options.maxFileSize} bytes): ${filePath}`
    );
  }
  if (looksBinary(buffer)) {
    throw new InputError(`Binary file skipped: ${filePath}`);
  }

  return {
    path: options.displayPath ?? filePath,
    language: options.language ?? detectLanguage(filePath),
    content: buffer.toString('utf8'),
    size: buffer.length,
  };
}

export function shouldSkipFile(
  file: string,
  patterns: { includePatterns: string[]; excludePatterns: string[] }
): boolean {
  const normalized = file.split(path.sep).join('/');

  if (patterns.excludePatterns.some((pattern) => new RegExp(pattern).test(normalized))) {
    return true;
  }

  if (patterns.includePatterns.length > 0) {
    return !patterns.includePatterns.some((pattern) => new RegExp(pattern).test(normalized));
  }

  return false;
}

/**
 * Splits files into chunks of at most `chunkSize` characters, taking at most
 * `maxChars` characters in total. Blank files yield no chunk.
 */
export function chunkSources(
  files: SourceFile[],
  limits: { chunkSize: number; maxChars: number }
): SourceChunk[] {
  const chunks: SourceChunk[] = [];
  let total = 0;

  for (const file of files) {
    if (!file.content.trim()) continue;

    const parts = Math.ceil(file.content.length / limits.chunkSize);
    for (let part = 0; part < parts; part++) {
      const code = file.content.slice(part * limits.chunkSize, (part + 1) * limits.chunkSize);
      // the rest of this file does not fit; a smaller file further on still may
      if (total + code.length > limits.maxChars) break;
      chunks.push({ file: file.path, part: part + 1, parts, code });
      total += code.length;
    }
    if (total >= limits.maxChars) break;
  }

  return chunks;
}

export interface SourceCollection {
  files: SourceFile[];
  totalFiles: number; // files that passed the filters, before `maxFiles`
  errors: Array<{ file: string; error: string }>;
}

export async function collectSources(
  root: string,
  candidates: string[],
  options: {
    includePatterns: string[];
    excludePatterns: string[];
    maxFiles: number;
    maxFileSize: number;
  }
): Promise<SourceCollection> {
  const selected = candidates.filter((file) => !shouldSkipFile(file, options));
  const files: SourceFile[] = [];
  const errors: SourceCollection['errors'] = [];

  for (const file of selected.slice(0, options.maxFiles)) {
    try {
      files.push(
        await readSourceFile(path.join(root, file), { maxFileSize: options.maxFileSize, displayPath: file })
      );
    } catch (error) {
      if (!(error instanceof InputError)) throw error;
      errors.push({ file, error: error.message });
    }
  }

  return { files, totalFiles: selected.length, errors };
}

export function countLines(content: string): number {
  if (content.length === 0) return 0;
  const lines = content.split(/\r?\n/);
  return lines[lines.length - 1] === '' ? lines.length - 1 : lines.length;
}
