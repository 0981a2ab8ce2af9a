import { ApiError, GitAccessError, InputError, errorMessage } from './errors.js';
import { logger } from './logger.js';
import type { ModelClient } from './model-client.js';
import {
  SYSTEM_PROMPT,
  buildAlgorithmPrompt,
  buildChangesReviewPrompt,
  buildChunkReviewPrompt,
  buildCommitReviewPrompt,
  buildFileReviewPrompt,
} from './prompts.js';
import { parseComplexity } from './response-parser.js';
import { chunkSources, countLines, type SourceCollection } from './sources.js';
import type {
  AlgorithmResult,
  ChangeScope,
  ChangesReviewResult,
  ChatMessage,
  CommitRecord,
  CommitReviewResult,
  FileReviewResult,
  ReviewConfig,
  ReviewDimension,
  ScanChunk,
  ScanReport,
  SourceFile,
} from './types.js';

type ReviewLimits = Pick<ReviewConfig, 'maxChars' | 'chunkSize' | 'dimensions'>;

export class CodeReviewer {
  constructor(
    private readonly client: ModelClient,
    private readonly limits: ReviewLimits
  ) {}

  get model(): string {
    return this.client.model;
  }

  private ask(prompt: string): Promise<string> {
    return this.client.generate({
      system: SYSTEM_PROMPT,
      messages: [{ role: 'user', text: prompt }],
    });
  }

  async reviewCommits(
    repository: string,
    range: string,
    commits: CommitRecord[],
    dimensions: ReviewDimension[] = this.limits.dimensions
  ): Promise<CommitReviewResult> {
    if (commits.length === 0) {
      throw new GitAccessError(`No commits found in range ${range}`);
    }

    const text = await this.ask(
      buildCommitReviewPrompt(commits, { range, dimensions, maxChars: this.limits.maxChars })
    );

    return {
      kind: 'commits',
      repository,
      range,
      commits: commits.map(({ hash, message, author, date }) => ({ hash, message, author, date })),
      model: this.model,
      text,
      createdAt: new Date().toISOString(),
    };
  }

  async reviewChanges(
    repository: string,
    scope: ChangeScope,
    diff: string,
    dimensions: ReviewDimension[] = this.limits.dimensions
  ): Promise<ChangesReviewResult> {
    const label = scope === 'staged' ? 'staged changes' : 'uncommitted working tree changes';
    if (!diff.trim()) {
      throw new InputError(`No ${label} found in ${repository}`);
    }

    const text = await this.ask(
      buildChangesReviewPrompt(diff, { label, dimensions, maxChars: this.limits.maxChars })
    );

    return {
      kind: 'changes',
      repository,
      scope,
      model: this.model,
      text,
      createdAt: new Date().toISOString(),
    };
  }

  async reviewFile(
    file: SourceFile,
    dimensions: ReviewDimension[] = this.limits.dimensions
  ): Promise<FileReviewResult> {
    if (!file.content.trim()) {
      throw new InputError(`File is empty: ${file.path}`);
    }

    const text = await this.ask(
      buildFileReviewPrompt({
        path: file.path,
        source: file.content,
        language: file.language,
        dimensions,
      })
    );

    return {
      kind: 'file',
      path: file.path,
      language: file.language,
      size: file.size,
      lines: countLines(file.content),
      model: this.model,
      text,
      createdAt: new Date().toISOString(),
    };
  }

  async suggestAlgorithms(code: string, language: string, task?: string): Promise<AlgorithmResult> {
    if (!code.trim()) {
      throw new InputError('No code provided');
    }
    if (!language.trim()) {
      throw new InputError('A programming language is required');
    }

    const text = await this.ask(buildAlgorithmPrompt(code, language, task));

    return {
      kind: 'algorithms',
      language,
      task: task?.trim() || undefined,
      complexity: parseComplexity(text),
      model: this.model,
      text,
      createdAt: new Date().toISOString(),
    };
  }

  /** Sends `history` plus `message`; the caller owns and extends the history. */
  async chat(history: ChatMessage[], message: string): Promise<string> {
    if (!message.trim()) {
      throw new InputError('Message is empty');
    }

    return this.client.generate({
      system: SYSTEM_PROMPT,
      messages: [...history, { role: 'user', text: message }],
    });
  }

  /**
   * Reviews source files chunk by chunk. A failed chunk is recorded and the
   * scan goes on; the scan only fails when no chunk succeeds.
   */
  async scan(
    repository: string,
    collection: SourceCollection,
    onProgress?: (done: number, total: number) => void
  ): Promise<ScanReport> {
    const { files } = collection;
    const chunks = chunkSources(files, this.limits);
    if (chunks.length === 0) {
      throw new InputError(`No source files to analyze in ${repository}`);
    }
    const languages = new Map(files.map((file) => [file.path, file.language]));
    const results: ScanChunk[] = [];
    const log = logger.withContext({ repository });
    let firstError: ApiError | undefined;

    for (const [index, chunk] of chunks.entries()) {
      const position = { file: chunk.file, part: chunk.part, parts: chunk.parts };
      try {
        const text = await this.ask(buildChunkReviewPrompt(chunk, languages.get(chunk.file) ?? 'text'));
        results.push({ ...position, text });
      } catch (error) {
        if (!(error instanceof ApiError)) throw error;
        firstError ??= error;
        log.warn('Chunk analysis failed', { file: chunk.file, part: chunk.part, error: errorMessage(error) });
        results.push({ ...position, error: error.message });
      }
      onProgress?.(index + 1, chunks.length);
    }

    if (firstError && results.every((result) => 'error' in result)) {
      throw firstError;
    }

    return {
      repository,
      model: this.model,
      totalFiles: collection.totalFiles,
      filesAnalyzed: [...new Set(chunks.map((chunk) => chunk.file))],
      chunks: results,
      errors: collection.errors,
    };
  }
}
