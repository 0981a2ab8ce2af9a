import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import { promises as fs } from 'fs';
import * as os from 'os';
import * as path from 'path';
import { DEFAULT_CONFIG } from '../src/config.js';
import { InputError } from '../src/errors.js';
import { detectLanguage, fenceTag } from '../src/language.js';
import { chunkSources, collectSources, countLines, readSourceFile, shouldSkipFile } from '../src/sources.js';
import type { SourceFile } from '../src/types.js';

function source(filePath: string, content: string): SourceFile {
  return { path: filePath, language: detectLanguage(filePath), content, size: content.length };
}

describe('chunkSources', () => {
  it('splits files into chunks of at most chunkSize characters', () => {
    const chunks = chunkSources([source('a.py', 'abcdefghij'), source('b.py', 'xyz')], {
      chunkSize: 4,
      maxChars: 100,
    });

    expect(chunks).toEqual([
      { file: 'a.py', part: 1, parts: 3, code: 'abcd' },
      { file: 'a.py', part: 2, parts: 3, code: 'efgh' },
      { file: 'a.py', part: 3, parts: 3, code: 'ij' },
      { file: 'b.py', part: 1, parts: 1, code: 'xyz' },
    ]);
  });

  it('stops before exceeding maxChars in total', () => {
    const chunks = chunkSources([source('a.py', 'abcdefghij'), source('b.py', 'xyz')], {
      chunkSize: 4,
      maxChars: 9,
    });

    expect(chunks.map((chunk) => chunk.code)).toEqual(['abcd', 'efgh']);
  });

  it('yields nothing for blank files', () => {
    const chunks = chunkSources([source('empty.py', ''), source('blank.py', '\n  \n'), source('b.py', 'xyz')], {
      chunkSize: 4,
      maxChars: 100,
    });

    expect(chunks).toEqual([{ file: 'b.py', part: 1, parts: 1, code: 'xyz' }]);
  });

  it('moves on to smaller files when the rest of a large one does not fit', () => {
    const chunks = chunkSources(
      [source('a.py', 'a'.repeat(3000)), source('b.py', 'b'.repeat(10000)), source('c.py', 'c'.repeat(500))],
      { chunkSize: 4000, maxChars: 12000 }
    );

    expect(chunks.map(({ file, part, code }) => `${file}:${part}:${code.length}`)).toEqual([
      'a.py:1:3000',
      'b.py:1:4000',
      'b.py:2:4000',
      'c.py:1:500',
    ]);
  });

  it('stops once the budget is used up exactly', () => {
    const chunks = chunkSources([source('a.py', 'abcd'), source('b.py', 'x')], { chunkSize: 4, maxChars: 4 });

    expect(chunks.map((chunk) => chunk.file)).toEqual(['a.py']);
  });
});

describe('shouldSkipFile', () => {
  const patterns = {
    includePatterns: DEFAULT_CONFIG.includePatterns,
    excludePatterns: DEFAULT_CONFIG.excludePatterns,
  };

  it.each([
    ['src/app.py', false],
    ['lib/index.ts', false],
    ['node_modules/left-pad/index.js', true],
    ['dist/bundle.js', true],
    ['tests/test_app.py', true],
    ['static/app.min.js', true],
    ['README.md', true],
    ['docs/guide.txt', true],
  ])('%s -> %s', (file, skipped) => {
    expect(shouldSkipFile(file, patterns)).toBe(skipped);
  });

  it('keeps everything that is not excluded when there are no include patterns', () => {
    expect(shouldSkipFile('README.md', { includePatterns: [], excludePatterns: ['\\.lock$'] })).toBe(false);
    expect(shouldSkipFile('yarn.lock', { includePatterns: [], excludePatterns: ['\\.lock$'] })).toBe(true);
  });
});

describe('countLines', () => {
  it.each([
    ['', 0],
    ['one', 1],
    ['one\n', 1],
    ['one\ntwo', 2],
    ['one\r\ntwo\r\n', 2],
    ['\n', 1],
  ])('%j has %i lines', (content, lines) => {
    expect(countLines(content)).toBe(lines);
  });
});

describe('fenceTag', () => {
  it.each([
    ['Python', 'python'],
    ['C++', 'cpp'],
    ['C#', 'csharp'],
    ['Objective C', 'objective-c'],
  ])('%s -> %s', (language, tag) => {
    expect(fenceTag(language)).toBe(tag);
  });
});

describe('files on disk', () => {
  let dir: string;

  beforeEach(async () => {
    dir = await fs.mkdtemp(path.join(os.tmpdir(), 'codereview-sources-'));
    await fs.mkdir(path.join(dir, 'src'));
    await fs.writeFile(path.join(dir, 'src', 'app.py'), 'print("hi")\n');
    await fs.writeFile(path.join(dir, 'src', 'util.js'), 'export const x = 1;\n');
    await fs.writeFile(path.join(dir, 'src', 'blob.c'), Buffer.from([0x68, 0x00, 0x69]));
    await fs.writeFile(path.join(dir, 'notes.md'), '# notes\n');
  });

  afterEach(async () => {
    await fs.rm(dir, { recursive: true, force: true });
  });

  it('reads a file and detects its language', async () => {
    const file = await readSourceFile(path.join(dir, 'src', 'app.py'), { maxFileSize: 1000 });

    expect(file).toEqual({
      path: path.join(dir, 'src', 'app.py'),
      language: 'python',
      content: 'print("hi")\n',
      size: 12,
    });
  });

  it('lets an explicit language win over the extension', async () => {
    const file = await readSourceFile(path.join(dir, 'notes.md'), { maxFileSize: 1000, language: 'markdown' });

    expect(file.language).toBe('markdown');
  });

  it('rejects missing, oversized and binary files', async () => {
    const missing = path.join(dir, 'nope.py');
    await expect(readSourceFile(missing, { maxFileSize: 1000 })).rejects.toThrow(InputError);
    await expect(readSourceFile(missing, { maxFileSize: 1000 })).rejects.toThrow(`Cannot read file ${missing}`);

    const app = path.join(dir, 'src', 'app.py');
    await expect(readSourceFile(app, { maxFileSize: 5 })).rejects.toThrow(
      `File too large for analysis (12 bytes, limit: 5 bytes): ${app}`
    );

    const blob = path.join(dir, 'src', 'blob.c');
    await expect(readSourceFile(blob, { maxFileSize: 1000 })).rejects.toThrow(`Binary file skipped: ${blob}`);
  });

  it('collects matching files and records unreadable ones', async () => {
    const collection = await collectSources(dir, ['notes.md', 'src/app.py', 'src/blob.c', 'src/util.js'], {
      includePatterns: DEFAULT_CONFIG.includePatterns,
      excludePatterns: DEFAULT_CONFIG.excludePatterns,
      maxFiles: 10,
      maxFileSize: 1000,
    });

    expect(collection.totalFiles).toBe(3);
    expect(collection.files.map((file) => file.path)).toEqual(['src/app.py', 'src/util.js']);
    expect(collection.errors).toEqual([
      { file: 'src/blob.c', error: `Binary file skipped: ${path.join(dir, 'src/blob.c')}` },
    ]);
  });

  it('reads at most maxFiles files', async () => {
    const collection = await collectSources(dir, ['src/app.py', 'src/util.js'], {
      includePatterns: [],
      excludePatterns: [],
      maxFiles: 1,
      maxFileSize: 1000,
    });

    expect(collection.totalFiles).toBe(2);
    expect(collection.files.map((file) => file.path)).toEqual(['src/app.py']);
  });
});
