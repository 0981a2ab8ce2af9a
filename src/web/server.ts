/**
 * Web front-end: a JSON API over the reviewer plus the single-page app in
 * `public/`. Chat history lives in the browser and is sent with every
 * message, so sessions share nothing on the server.
 */

import express, { type NextFunction, type Request, type Response } from 'express';
import type { Server } from 'http';
import { fileURLToPath } from 'url';
import { z } from 'zod';
import { ApiError, CodeReviewError, GitAccessError, InputError } from '../errors.js';
import { withRepository } from '../git-reader.js';
import { detectLanguage } from '../language.js';
import { logger } from '../logger.js';
import type { CodeReviewer } from '../reviewer.js';
import { readSourceFile } from '../sources.js';
import { REVIEW_DIMENSIONS, type ReviewConfig } from '../types.js';

export const PUBLIC_DIR = fileURLToPath(new URL('../../public/', import.meta.url));

const dimensionsSchema = z.array(z.enum(REVIEW_DIMENSIONS)).min(1).optional();

const analyzeSchema = z.object({
  repo: z.string().trim().min(1, 'Repository path is required'),
  commits: z
    .string()
    .trim()
    .refine((range) => !range.startsWith('-'), 'A commit range cannot start with "-"')
    .optional(),
  maxCount: z.number().int().positive().optional(),
  dimensions: dimensionsSchema,
});

const analyzeFileSchema = z.union([
  z.object({
    path: z.string().trim().min(1),
    language: z.string().trim().min(1).optional(),
    dimensions: dimensionsSchema,
  }),
  z.object({
    filename: z.string().trim().min(1),
    content: z.string(),
    language: z.string().trim().min(1).optional(),
    dimensions: dimensionsSchema,
  }),
]);

const suggestSchema = z.object({
  code: z.string(),
  language: z.string().trim().min(1, 'Programming language is required'),
  task: z.string().optional(),
});

const chatSchema = z.object({
  history: z
    .array(z.object({ role: z.enum(['user', 'model']), text: z.string() }))
    .default([]),
  message: z.string(),
});

export interface WebAppOptions {
  reviewer: CodeReviewer;
  config: Pick<ReviewConfig, 'maxFileSize'>;
  publicDir?: string;
}

type Handler = (req: Request, res: Response) => Promise<void>;

function route(handler: Handler) {
  return (req: Request, res: Response, next: NextFunction) => {
    handler(req, res).catch(next);
  };
}

function parseBody<T extends z.ZodTypeAny>(schema: T, body: unknown): z.infer<T> {
  const parsed = schema.safeParse(body);
  if (!parsed.success) {
    const message = parsed.error.issues
      .map((issue) => (issue.path.length > 0 ? `${issue.path.join('.')}: ${issue.message}` : issue.message))
      .join('; ');
    throw new InputError(message);
  }
  return parsed.data;
}

/** Errors raised by body-parser carry their own 4xx status. */
function isBodyParserError(error: unknown): error is Error & { status: number; type: string } {
  return (
    error instanceof Error &&
    'status' in error &&
    typeof error.status === 'number' &&
    error.status >= 400 &&
    error.status < 500 &&
    'type' in error &&
    typeof error.type === 'string'
  );
}

const BODY_ERROR_MESSAGES: Record<string, string> = {
  'entity.parse.failed': 'Malformed JSON body',
  'entity.too.large': 'Request body too large',
};

export function statusFor(error: unknown): number {
  if (error instanceof InputError) return 400;
  if (error instanceof GitAccessError) return 422;
  if (error instanceof ApiError) return error.kind === 'rate-limit' ? 429 : 502;
  if (error instanceof CodeReviewError) return 400;
  return 500;
}

export function createApp(options: WebAppOptions): express.Express {
  const { reviewer, config } = options;
  const app = express();

  app.use(express.json({ limit: '2mb' }));

  app.get('/health', (_req, res) => {
    res.json({ status: 'ok', model: reviewer.model });
  });

  app.post(
    '/api/analyze',
    route(async (req, res) => {
      const body = parseBody(analyzeSchema, req.body);
      const result = await withRepository(body.repo, async (reader) => {
        const commits = await reader.listCommits(body.commits || undefined, body.maxCount);
        return reviewer.reviewCommits(body.repo, body.commits || 'HEAD', commits, body.dimensions);
      });
      res.json(result);
    })
  );

  app.post(
    '/api/analyze-file',
    route(async (req, res) => {
      const body = parseBody(analyzeFileSchema, req.body);
      const file =
        'path' in body
          ? await readSourceFile(body.path, { language: body.language, maxFileSize: config.maxFileSize })
          : {
              path: body.filename,
              language: body.language ?? detectLanguage(body.filename),
              content: body.content,
              size: Buffer.byteLength(body.content, 'utf8'),
            };
      if (file.size > config.maxFileSize) {
        throw new InputError(`File too large for analysis (${file.size} bytes, limit: ${config.maxFileSize} bytes)`);
      }
      res.json(await reviewer.reviewFile(file, body.dimensions));
    })
  );

  app.post(
    '/api/suggest-algorithms',
    route(async (req, res) => {
      const body = parseBody(suggestSchema, req.body);
      res.json(await reviewer.suggestAlgorithms(body.code, body.language, body.task));
    })
  );

  app.post(
    '/api/chat',
    route(async (req, res) => {
      const body = parseBody(chatSchema, req.body);
      res.json({ reply: await reviewer.chat(body.history, body.message) });
    })
  );

  app.use(express.static(options.publicDir ?? PUBLIC_DIR));

  app.use((error: unknown, req: Request, res: Response, _next: NextFunction) => {
    if (isBodyParserError(error)) {
      const message = BODY_ERROR_MESSAGES[error.type] ?? error.message;
      logger.warn('Request rejected', { path: req.path, status: error.status, error: message });
      res.status(error.status).json({ error: { name: 'InputError', message } });
      return;
    }

    const status = statusFor(error);
    const name = error instanceof Error ? error.name : 'Error';
    const message = status === 500 ? 'Internal server error' : error instanceof Error ? error.message : String(error);

    if (status === 500) logger.error('Request failed', { path: req.path, error: String(error) });
    else logger.warn('Request rejected', { path: req.path, status, error: message });

    res.status(status).json({ error: { name, message } });
  });

  return app;
}

export function startServer(app: express.Express, port: number, host: string): Promise<Server> {
  return new Promise((resolve, reject) => {
    const server = app.listen(port, host);
    server.once('listening', () => resolve(server));
    server.once('error', reject);
  });
}
