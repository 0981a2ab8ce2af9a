import { fenceTag } from './language.js';
import type { CommitRecord, ReviewDimension, ReviewRequest } from './types.js';
import type { SourceChunk } from './sources.js';

export const DIMENSION_DESCRIPTIONS: Record<ReviewDimension, string> = {
  readability: 'Readability: clarity, naming, comments and documentation',
  performance: 'Performance: efficiency, resource usage, algorithmic complexity',
  security: 'Security: vulnerabilities, input validation, secrets handling',
  maintainability: 'Maintainability: structure, modularity, duplication, testability',
  'best-practices': 'Best practices: idioms and conventions of the language and its ecosystem',
};

export const TRUNCATION_MARKER = '... (diff truncated)';

export const SYSTEM_PROMPT = `You are an expert code reviewer and algorithm optimization specialist.

You review code for readability, performance, security, maintainability and
best practices, and you point out inefficient algorithms together with faster
alternatives.

When you review code, structure the answer as:

### Code Quality Analysis
- Issues found, each with a severity (Critical, High, Medium, Low), the line
  it concerns and an explanation
- Concrete recommendations

### Algorithm Suggestions
- Current time and space complexity
- Inefficient patterns and better algorithms or data structures
- Improved code snippets

### Overall Assessment
- Priority issues, quick wins and long-term recommendations

Be specific, reference line numbers, prefer solutions over criticism and
explain why each suggestion is better.`;

/**
 * Fenced code block whose fence is longer than any backtick run in `content`,
 * so embedded fences cannot close it early.
 */
export function fenced(content: string, info = ''): string {
  const longestRun = Math.max(0, ...(content.match(/`+/g) ?? []).map((run) => run.length));
  const fence = '`'.repeat(Math.max(3, longestRun + 1));
  return `${fence}${info}\n${content}\n${fence}`;
}

function dimensionList(dimensions: ReviewDimension[]): string {
  return dimensions.map((dimension, index) => `${index + 1}. ${DIMENSION_DESCRIPTIONS[dimension]}`).join('\n');
}

/**
 * Formats commits newest first. Diff text beyond `maxChars` in total is cut
 * and marked with {@link TRUNCATION_MARKER}; commits past that point keep
 * their header only.
 */
export function formatCommits(commits: CommitRecord[], maxChars: number): string {
  let budget = maxChars;

  return commits
    .map((commit) => {
      const header = [
        `### Commit ${commit.hash.slice(0, 8)}: ${commit.message}`,
        `Author: ${commit.author}`,
        `Date: ${commit.date}`,
      ].join('\n');

      let diff = commit.diff.trim();
      if (diff.length > budget) {
        diff = diff.slice(0, budget) + (budget > 0 ? '\n' : '') + TRUNCATION_MARKER;
      }
      budget = Math.max(0, budget - commit.diff.trim().length);

      return `${header}\n\n${fenced(diff, 'diff')}`;
    })
    .join('\n\n');
}

export function buildCommitReviewPrompt(
  commits: CommitRecord[],
  options: { range: string; dimensions: ReviewDimension[]; maxChars: number }
): string {
  return `# Code Change Review

Review the following ${commits.length === 1 ? 'commit' : `${commits.length} commits`} (${options.range}).

## Review Dimensions
${dimensionList(options.dimensions)}

## Commits
${formatCommits(commits, options.maxChars)}

Point out problems introduced by these changes, reference files and lines from
the diffs, and suggest concrete fixes.`;
}

export function buildChangesReviewPrompt(
  diff: string,
  options: { label: string; dimensions: ReviewDimension[]; maxChars: number }
): string {
  const trimmed = diff.trim();
  const body = trimmed.length > options.maxChars
    ? trimmed.slice(0, options.maxChars) + '\n' + TRUNCATION_MARKER
    : trimmed;

  return `# Code Change Review

Review the following ${options.label}.

## Review Dimensions
${dimensionList(options.dimensions)}

## Diff
${fenced(body, 'diff')}`;
}

export function buildFileReviewPrompt(request: ReviewRequest & { path: string }): string {
  const language = request.language ?? 'text';

  return `# Code Analysis Request

Analyze the following ${language === 'text' ? 'code' : language} file.

File: ${request.path}

## Review Dimensions
${dimensionList(request.dimensions)}

## Code
${fenced(request.source, fenceTag(language))}

Identify issues across the dimensions above, rank them by severity and impact,
suggest more efficient algorithms and data structures where they apply, and
give line-by-line recommendations.`;
}

export function buildChunkReviewPrompt(chunk: SourceChunk, language: string): string {
  const part = chunk.parts > 1 ? ` (part ${chunk.part} of ${chunk.parts})` : '';

  return `Analyze the following code for quality, maintainability, performance and
possible improvements. Summarize the issues and give suggestions.

File: ${chunk.file}${part}

${fenced(chunk.code, fenceTag(language))}`;
}

export const COMPLEXITY_INSTRUCTION = `End your answer with a fenced JSON block estimating the complexity of the
original code, exactly in this shape:
\`\`\`json
{"timeComplexity": "O(...)", "spaceComplexity": "O(...)"}
\`\`\``;

export function buildAlgorithmPrompt(code: string, language: string, task?: string): string {
  return `# Algorithm Optimization Request

Analyze the following code and suggest more efficient algorithms.

## Current Code
${fenced(code, fenceTag(language))}

## Task Description
${task?.trim() || 'Not provided.'}

## Analysis Focus
1. Current approach and its time and space complexity
2. Bottlenecks and inefficient patterns
3. Better algorithms and data structures
4. Complexity of each alternative compared to the current one
5. Improved code snippets

Consider built-in functions of the language, memoization and parallelization
where they help.

${COMPLEXITY_INSTRUCTION}`;
}
