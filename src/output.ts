import chalk from 'chalk';
import { promises as fs } from 'fs';
import * as path from 'path';
import { InputError, errorMessage } from './errors.js';
import type { ReviewResult, ScanReport } from './types.js';

function withTrailingNewline(text: string): string {
  return text.endsWith('\n') ? text : text + '\n';
}

/**
 * `.json` files get the whole result object; any other file gets the
 * response text exactly as the model returned it.
 */
export async function saveResult(result: ReviewResult | ScanReport, outputPath: string): Promise<string> {
  const target = path.resolve(outputPath);
  const content =
    path.extname(target).toLowerCase() === '.json'
      ? JSON.stringify(result, null, 2) + '\n'
      : 'kind' in result
        ? result.text
        : formatScanReport(result);

  try {
    await fs.writeFile(target, content, 'utf8');
  } catch (error) {
    throw new InputError(`Cannot write results to ${target}: ${errorMessage(error)}`, { cause: error });
  }
  return target;
}

export function formatScanReport(report: ScanReport): string {
  return report.chunks
    .map((chunk) => {
      const part = chunk.parts > 1 ? ` (part ${chunk.part}/${chunk.parts})` : '';
      const body = 'text' in chunk ? chunk.text.trimEnd() : `Error: ${chunk.error}`;
      return `## ${chunk.file}${part}\n\n${body}\n`;
    })
    .join('\n');
}

/** Status lines that accompany a result on stderr. */
export function describeResult(result: ReviewResult): string[] {
  switch (result.kind) {
    case 'commits':
      return [
        chalk.bold(`📝 ${result.commits.length} commit(s) reviewed in ${result.range}`),
        ...result.commits.map((commit) => chalk.dim(`  ${commit.hash.slice(0, 8)} ${commit.message}`)),
      ];
    case 'changes':
      return [chalk.bold(`📝 Reviewed ${result.scope} changes in ${result.repository}`)];
    case 'file':
      return [
        chalk.bold(`📄 ${result.path}`),
        chalk.dim(`  ${result.language}, ${result.size} bytes, ${result.lines} lines`),
      ];
    case 'algorithms':
      return [
        chalk.bold(`🚀 Algorithm suggestions for ${result.language} code`),
        chalk.cyan(`  ⏱️  Time complexity: ${result.complexity?.time ?? 'unknown'}`),
        chalk.cyan(`  💾 Space complexity: ${result.complexity?.space ?? 'unknown'}`),
      ];
  }
}

export function describeScan(report: ScanReport): string[] {
  const failed = report.chunks.filter((chunk) => 'error' in chunk).length;
  return [
    chalk.bold(`📁 ${report.filesAnalyzed.length} of ${report.totalFiles} matching files analyzed in ${report.repository}`),
    ...(failed > 0 ? [chalk.yellow(`⚠️  ${failed} of ${report.chunks.length} chunks failed`)] : []),
    ...report.errors.map((entry) => chalk.yellow(`⚠️  ${entry.file}: ${entry.error}`)),
  ];
}

export interface EmitTarget {
  stdout: NodeJS.WritableStream;
  stderr: NodeJS.WritableStream;
}

/**
 * Without `outputPath` the response goes to stdout untouched (plus a final
 * newline); status lines always go to stderr.
 */
export async function emitResult(
  result: ReviewResult | ScanReport,
  target: EmitTarget,
  outputPath?: string
): Promise<void> {
  const status = 'kind' in result ? describeResult(result) : describeScan(result);
  for (const line of status) target.stderr.write(line + '\n');

  if (outputPath) {
    const saved = await saveResult(result, outputPath);
    target.stderr.write(chalk.green(`💾 Results saved to: ${saved}`) + '\n');
    return;
  }

  target.stdout.write(withTrailingNewline('kind' in result ? result.text : formatScanReport(result)));
}
