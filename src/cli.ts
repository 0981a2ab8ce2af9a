import { Command, CommanderError, InvalidArgumentError } from 'commander';
import chalk from 'chalk';
import ora, { type Ora } from 'ora';
import * as path from 'path';
import {
  describeConfig,
  initConfig,
  loadConfig,
  requireApiKey,
  type AppConfig,
} from './config.js';
import { CodeReviewError, InputError, errorMessage } from './errors.js';
import { isRemoteRepository, withRepository } from './git-reader.js';
import { runChatSession } from './interactive.js';
import { configureLogger, logger } from './logger.js';
import { GeminiClient, type ModelClient } from './model-client.js';
import { emitResult } from './output.js';
import { CodeReviewer } from './reviewer.js';
import { collectSources, readSourceFile } from './sources.js';
import { REVIEW_DIMENSIONS, type ChangeScope, type ReviewDimension } from './types.js';
import { createApp, startServer } from './web/server.js';

export const VERSION = '1.0.0';

export interface CliContext {
  stdin: NodeJS.ReadableStream;
  stdout: NodeJS.WritableStream;
  stderr: NodeJS.WritableStream;
  cwd: string;
  env: NodeJS.ProcessEnv;
  createClient(config: AppConfig): ModelClient;
}

export interface CliStatus {
  exitCode: number;
}

interface CommonOptions {
  model?: string;
  config?: string;
  verbose?: boolean;
}

interface AnalyzeOptions extends CommonOptions {
  repo?: string;
  commits?: string;
  maxCount?: number;
  staged?: boolean;
  working?: boolean;
  dimensions?: string;
  output?: string;
}

interface AnalyzeFileOptions extends CommonOptions {
  file: string;
  language?: string;
  dimensions?: string;
  output?: string;
}

interface SuggestOptions extends CommonOptions {
  code?: string;
  language: string;
  task?: string;
  output?: string;
}

interface ScanOptions extends CommonOptions {
  repo?: string;
  maxFiles?: number;
  output?: string;
}

interface WebOptions extends CommonOptions {
  port: number;
  host: string;
}

export function createDefaultContext(): CliContext {
  return {
    stdin: process.stdin,
    stdout: process.stdout,
    stderr: process.stderr,
    cwd: process.cwd(),
    env: process.env,
    createClient: (config) =>
      new GeminiClient({
        apiKey: requireApiKey(config),
        model: config.model,
        apiBaseUrl: config.apiBaseUrl,
        temperature: config.temperature,
        maxOutputTokens: config.maxOutputTokens,
        timeout: config.timeout,
      }),
  };
}

function parsePositiveInt(value: string): number {
  const parsed = Number(value);
  if (!Number.isInteger(parsed) || parsed <= 0) {
    throw new InvalidArgumentError('Must be a positive integer.');
  }
  return parsed;
}

function parsePort(value: string): number {
  const parsed = Number(value);
  if (!Number.isInteger(parsed) || parsed < 0 || parsed > 65535) {
    throw new InvalidArgumentError('Must be a port number between 0 and 65535.');
  }
  return parsed;
}

export function parseDimensions(value: string | undefined, fallback: ReviewDimension[]): ReviewDimension[] {
  if (value === undefined) return fallback;

  const names = value
    .split(',')
    .map((name) => name.trim().toLowerCase().replace(/_/g, '-'))
    .filter(Boolean);

  if (names.length === 0) {
    throw new InputError(`No review dimensions given. Choose from: ${REVIEW_DIMENSIONS.join(', ')}`);
  }

  return names.map((name) => {
    const dimension = REVIEW_DIMENSIONS.find((candidate) => candidate === name);
    if (!dimension) {
      throw new InputError(`Unknown review dimension "${name}". Choose from: ${REVIEW_DIMENSIONS.join(', ')}`);
    }
    return dimension;
  });
}

async function readAll(stream: NodeJS.ReadableStream): Promise<string> {
  const chunks: Buffer[] = [];
  for await (const chunk of stream) {
    chunks.push(typeof chunk === 'string' ? Buffer.from(chunk, 'utf8') : chunk);
  }
  // decode once so multi-byte characters split across chunks survive
  return Buffer.concat(chunks).toString('utf8');
}

function withCommonOptions(command: Command): Command {
  return command
    .option('-m, --model <name>', 'Model to use (overrides GEMINI_MODEL and the config file)')
    .option('--config <path>', 'Path to configuration file')
    .option('-v, --verbose', 'Verbose output');
}

export function createProgram(context: CliContext, status: CliStatus = { exitCode: 0 }): Command {
  const program = new Command();

  async function setup(options: CommonOptions): Promise<AppConfig> {
    const config = await loadConfig({
      configPath: options.config,
      cwd: context.cwd,
      env: context.env,
      model: options.model,
    });
    configureLogger({ level: options.verbose ? 'debug' : config.logLevel, stream: context.stderr });
    logger.debug('Configuration loaded', { source: config.source ?? 'defaults', model: config.model });
    return config;
  }

  function createReviewer(config: AppConfig): CodeReviewer {
    return new CodeReviewer(context.createClient(config), config);
  }

  async function withSpinner<T>(text: string, task: (spinner: Ora) => Promise<T>): Promise<T> {
    const spinner = ora({ text, stream: context.stderr, discardStdin: false }).start();
    try {
      const result = await task(spinner);
      spinner.succeed();
      return result;
    } catch (error) {
      spinner.fail();
      throw error;
    }
  }

  async function readCodeFromStdin(): Promise<string> {
    if ('isTTY' in context.stdin && context.stdin.isTTY) {
      context.stderr.write(chalk.blue('📝 Enter your code (press Ctrl+D when done):') + '\n');
    }
    return readAll(context.stdin);
  }

  function resolveOutput(output: string | undefined): string | undefined {
    return output === undefined ? undefined : path.resolve(context.cwd, output);
  }

  function resolveLocation(location: string | undefined): string {
    if (!location) return context.cwd;
    return isRemoteRepository(location) ? location : path.resolve(context.cwd, location);
  }

  program
    .name('codereview')
    .description('AI-powered code review and algorithm suggestions using the Gemini API')
    .version(VERSION)
    .exitOverride()
    .configureOutput({
      writeOut: (text) => context.stdout.write(text),
      writeErr: (text) => context.stderr.write(text),
    });

  withCommonOptions(
    program
      .command('analyze')
      .description('Review commits (or uncommitted changes) of a git repository')
      .option('-r, --repo <path>', 'Path or GitHub URL of the repository (default: current directory)')
      .option('-c, --commits <range>', 'Commit range, e.g. HEAD~5..HEAD (default: latest commit)')
      .option('-n, --max-count <n>', 'Maximum number of commits to read', parsePositiveInt)
      .option('--staged', 'Review staged changes instead of commits')
      .option('--working', 'Review unstaged working tree changes instead of commits')
      .option('-d, --dimensions <list>', `Comma-separated review dimensions (${REVIEW_DIMENSIONS.join(', ')})`)
      .option('-o, --output <file>', 'Write the result to a file (.json for the full result object)')
  ).action(async (options: AnalyzeOptions) => {
    const config = await setup(options);
    const dimensions = parseDimensions(options.dimensions, config.dimensions);

    if (options.staged && options.working) {
      throw new InputError('--staged and --working cannot be used together');
    }
    const scope: ChangeScope | undefined = options.staged ? 'staged' : options.working ? 'working' : undefined;
    if (scope && (options.commits || options.maxCount)) {
      throw new InputError(`--${scope} cannot be combined with --commits or --max-count`);
    }

    const location = resolveLocation(options.repo);
    context.stderr.write(chalk.bold.blue(`🔍 Analyzing repository: ${location}`) + '\n');
    if (options.commits) {
      context.stderr.write(chalk.blue(`📝 Commit range: ${options.commits}`) + '\n');
    }

    const result = await withSpinner('Reading repository...', (spinner) =>
      withRepository(location, async (reader) => {
        if (scope) {
          const diff = await reader.getChanges(scope);
          spinner.text = `Analyzing ${scope} changes with ${config.model}...`;
          return createReviewer(config).reviewChanges(location, scope, diff, dimensions);
        }

        const commits = await reader.listCommits(options.commits, options.maxCount);
        spinner.text = `Analyzing ${commits.length} commit(s) with ${config.model}...`;
        return createReviewer(config).reviewCommits(location, options.commits ?? 'HEAD', commits, dimensions);
      })
    );

    await emitResult(result, context, resolveOutput(options.output));
  });

  withCommonOptions(
    program
      .command('analyze-file')
      .description('Review a single source file')
      .requiredOption('-f, --file <path>', 'Path to the file to analyze')
      .option('-l, --language <lang>', 'Programming language (detected from the extension if omitted)')
      .option('-d, --dimensions <list>', `Comma-separated review dimensions (${REVIEW_DIMENSIONS.join(', ')})`)
      .option('-o, --output <file>', 'Write the result to a file (.json for the full result object)')
  ).action(async (options: AnalyzeFileOptions) => {
    const config = await setup(options);
    const dimensions = parseDimensions(options.dimensions, config.dimensions);

    const file = await readSourceFile(path.resolve(context.cwd, options.file), {
      language: options.language,
      maxFileSize: config.maxFileSize,
      displayPath: options.file,
    });
    const reviewer = createReviewer(config);

    const result = await withSpinner(`Analyzing ${file.path} with ${config.model}...`, () =>
      reviewer.reviewFile(file, dimensions)
    );

    await emitResult(result, context, resolveOutput(options.output));
  });

  withCommonOptions(
    program
      .command('suggest-algorithms')
      .description('Suggest more efficient algorithms for a code snippet')
      .option('-c, --code <code>', 'Code to analyze (read from stdin when omitted)')
      .requiredOption('-l, --language <lang>', 'Programming language')
      .option('-t, --task <text>', 'What the code is trying to accomplish')
      .option('-o, --output <file>', 'Write the result to a file (.json for the full result object)')
  ).action(async (options: SuggestOptions) => {
    const code = options.code ?? (await readCodeFromStdin());
    if (!code.trim()) {
      throw new InputError('No code provided.');
    }

    const config = await setup(options);
    const reviewer = createReviewer(config);

    const result = await withSpinner(`Analyzing algorithms for ${options.language} code...`, () =>
      reviewer.suggestAlgorithms(code, options.language, options.task)
    );

    await emitResult(result, context, resolveOutput(options.output));
  });

  withCommonOptions(
    program
      .command('scan')
      .description("Review a repository's tracked source files in chunks")
      .option('-r, --repo <path>', 'Path or GitHub URL of the repository (default: current directory)')
      .option('--max-files <n>', 'Maximum number of files to analyze', parsePositiveInt)
      .option('-o, --output <file>', 'Write the report to a file (.json for the full report object)')
  ).action(async (options: ScanOptions) => {
    const config = await setup(options);
    const location = resolveLocation(options.repo);
    context.stderr.write(chalk.bold.blue(`🔍 Scanning repository: ${location}`) + '\n');

    const report = await withSpinner('Collecting source files...', (spinner) =>
      withRepository(location, async (reader) => {
        const collection = await collectSources(reader.repoPath, await reader.listTrackedFiles(), {
          ...config,
          maxFiles: options.maxFiles ?? config.maxFiles,
        });
        spinner.text = `Analyzing ${collection.files.length} file(s) with ${config.model}...`;
        return createReviewer(config).scan(location, collection, (done, total) => {
          spinner.text = `Analyzing chunks... ${done}/${total}`;
        });
      })
    );

    await emitResult(report, context, resolveOutput(options.output));
  });

  withCommonOptions(
    program.command('interactive').description('Chat with the assistant about code')
  ).action(async (options: CommonOptions) => {
    const config = await setup(options);
    const reviewer = createReviewer(config);
    await runChatSession(reviewer, { input: context.stdin, output: context.stdout });
  });

  withCommonOptions(
    program
      .command('web')
      .description('Launch the web interface')
      .option('-p, --port <port>', 'Port to listen on', parsePort, 8501)
      .option('--host <host>', 'Host to bind', '127.0.0.1')
  ).action(async (options: WebOptions) => {
    const config = await setup(options);
    const app = createApp({ reviewer: createReviewer(config), config });
    const server = await startServer(app, options.port, options.host);
    const address = server.address();
    const port = address && typeof address === 'object' ? address.port : options.port;
    context.stderr.write(chalk.green(`🌐 Web interface running at http://${options.host}:${port}`) + '\n');
  });

  program
    .command('health')
    .description('Check that the API key works and the model is available')
    .option('-m, --model <name>', 'Model to check')
    .option('--config <path>', 'Path to configuration file')
    .action(async (options: CommonOptions) => {
      const config = await setup(options);
      const client = context.createClient(config);

      const spinner = ora({ text: `Checking ${client.model}...`, stream: context.stderr, discardStdin: false }).start();
      const health = await client.checkHealth();

      if (health.isHealthy) {
        spinner.succeed(`✅ Model ${client.model} is available`);
      } else {
        spinner.fail(`❌ ${health.error ?? 'Model API unavailable'}`);
        status.exitCode = 1;
      }
    });

  program
    .command('config')
    .description('Show current configuration')
    .option('--init', 'Create a configuration file with the defaults')
    .option('--config <path>', 'Path to configuration file')
    .action(async (options: { init?: boolean; config?: string }) => {
      if (options.init) {
        const created = await initConfig(context.cwd);
        context.stderr.write(
          created.created
            ? chalk.green(`✅ Configuration file created: ${created.path}`) + '\n'
            : chalk.yellow(`⚠️  Configuration file already exists: ${created.path}`) + '\n'
        );
        return;
      }

      const config = await setup(options);
      context.stdout.write(JSON.stringify(describeConfig(config), null, 2) + '\n');
    });

  return program;
}

/** Parses `argv` (without the node and script entries) and returns the exit code. */
export async function runCli(argv: string[], context: CliContext): Promise<number> {
  const status: CliStatus = { exitCode: 0 };
  const program = createProgram(context, status);

  try {
    await program.parseAsync(argv, { from: 'user' });
    return status.exitCode;
  } catch (error) {
    if (error instanceof CommanderError) {
      return error.exitCode;
    }
    if (error instanceof CodeReviewError) {
      context.stderr.write(chalk.red(`✖ ${error.name}: ${error.message}`) + '\n');
      return 1;
    }
    context.stderr.write(chalk.red(`✖ Unexpected error: ${errorMessage(error)}`) + '\n');
    if (error instanceof Error && error.stack) logger.debug(error.stack);
    return 1;
  }
}
