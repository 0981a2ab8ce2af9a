import { afterAll, afterEach, beforeAll, beforeEach, describe, expect, it } from 'vitest';
import { promises as fs } from 'fs';
import type { Server } from 'http';
import type { AddressInfo } from 'net';
import * as os from 'os';
import * as path from 'path';
import { ApiError, CodeReviewer, DEFAULT_CONFIG, createApp, startServer } from '../src/index.js';
import { configureLogger } from '../src/logger.js';
import { FakeModelClient, MemoryStream } from './helpers.js';

describe('web server', () => {
  let server: Server;
  let baseUrl: string;
  let client: FakeModelClient;
  let logs: MemoryStream;

  const reviewer = new CodeReviewer(
    {
      get model() {
        return client.model;
      },
      generate: (request) => client.generate(request),
      checkHealth: () => client.checkHealth(),
    },
    DEFAULT_CONFIG
  );

  beforeAll(async () => {
    server = await startServer(createApp({ reviewer, config: DEFAULT_CONFIG }), 0, '127.0.0.1');
    const address: AddressInfo | string | null = server.address();
    if (!address || typeof address === 'string') throw new Error('Server is not listening on a port');
    baseUrl = `http://127.0.0.1:${address.port}`;
  });

  afterAll(async () => {
    await new Promise<void>((resolve, reject) => server.close((error) => (error ? reject(error) : resolve())));
  });

  beforeEach(() => {
    client = new FakeModelClient('## Review\nLooks fine.');
    logs = new MemoryStream();
    configureLogger({ level: 'info', stream: logs });
  });

  function post(route: string, body: unknown) {
    return fetch(`${baseUrl}${route}`, {
      method: 'POST',
      headers: { 'Content-Type': 'application/json' },
      body: JSON.stringify(body),
    });
  }

  it('reports health and the model', async () => {
    const response = await fetch(`${baseUrl}/health`);

    expect(response.status).toBe(200);
    expect(await response.json()).toEqual({ status: 'ok', model: 'fake-model' });
  });

  it('serves the single-page app', async () => {
    const response = await fetch(`${baseUrl}/`);

    expect(response.status).toBe(200);
    expect(await response.text()).toContain('<title>AI Code Review</title>');
  });

  it('suggests algorithms with a complexity estimate', async () => {
    client = new FakeModelClient('Use a set.\n```json\n{"timeComplexity": "O(n^2)", "spaceComplexity": "O(1)"}\n```');

    const response = await post('/api/suggest-algorithms', { code: 'for a in xs: pass', language: 'Python', task: 'dedupe' });

    expect(response.status).toBe(200);
    expect(await response.json()).toMatchObject({
      kind: 'algorithms',
      language: 'Python',
      task: 'dedupe',
      complexity: { time: 'O(n^2)', space: 'O(1)' },
    });
  });

  it('rejects empty code with 400', async () => {
    const response = await post('/api/suggest-algorithms', { code: '  ', language: 'Python' });

    expect(response.status).toBe(400);
    expect(await response.json()).toEqual({ error: { name: 'InputError', message: 'No code provided' } });
    expect(client.requests).toHaveLength(0);
  });

  it('rejects a body that fails validation', async () => {
    const response = await post('/api/suggest-algorithms', { code: 'x' });

    expect(response.status).toBe(400);
    expect(await response.json()).toEqual({ error: { name: 'InputError', message: 'language: Required' } });
  });

  it('rejects malformed JSON', async () => {
    const response = await fetch(`${baseUrl}/api/chat`, {
      method: 'POST',
      headers: { 'Content-Type': 'application/json' },
      body: '{"message": ',
    });

    expect(response.status).toBe(400);
    expect(await response.json()).toEqual({ error: { name: 'InputError', message: 'Malformed JSON body' } });
  });

  it('rejects a body over the size limit with 413', async () => {
    const response = await post('/api/chat', { message: 'x'.repeat(2_200_000) });

    expect(response.status).toBe(413);
    expect(await response.json()).toEqual({ error: { name: 'InputError', message: 'Request body too large' } });
    expect(client.requests).toHaveLength(0);
  });

  it('rejects a commit range that starts with a dash', async () => {
    const response = await post('/api/analyze', { repo: os.tmpdir(), commits: '--output=/tmp/log.txt' });

    expect(response.status).toBe(400);
    expect(await response.json()).toEqual({
      error: { name: 'InputError', message: 'commits: A commit range cannot start with "-"' },
    });
  });

  it('reviews uploaded file content', async () => {
    const response = await post('/api/analyze-file', { filename: 'sort.py', content: 'xs.sort()\nprint(xs)\n' });

    expect(response.status).toBe(200);
    expect(await response.json()).toMatchObject({
      kind: 'file',
      path: 'sort.py',
      language: 'python',
      size: 20,
      lines: 2,
      text: '## Review\nLooks fine.',
    });
    expect(client.prompt()).toContain('```python\nxs.sort()\nprint(xs)\n\n```');
  });

  describe('with a file on disk', () => {
    let dir: string;

    beforeEach(async () => {
      dir = await fs.mkdtemp(path.join(os.tmpdir(), 'codereview-web-'));
      await fs.writeFile(path.join(dir, 'main.go'), 'package main\n');
    });

    afterEach(async () => {
      await fs.rm(dir, { recursive: true, force: true });
    });

    it('reviews a file by path with the chosen dimensions', async () => {
      const response = await post('/api/analyze-file', {
        path: path.join(dir, 'main.go'),
        dimensions: ['security'],
      });

      expect(response.status).toBe(200);
      expect(await response.json()).toMatchObject({ language: 'go', lines: 1 });
      expect(client.prompt()).toContain('1. Security:');
      expect(client.prompt()).not.toContain('Readability:');
    });
  });

  it('rejects unknown dimensions', async () => {
    const response = await post('/api/analyze-file', { filename: 'a.py', content: 'x', dimensions: ['speed'] });

    expect(response.status).toBe(400);
    expect(client.requests).toHaveLength(0);
  });

  it('answers chat messages with the history sent by the page', async () => {
    client = new FakeModelClient('Use collections.Counter.');
    const history = [
      { role: 'user', text: 'How do I count words?' },
      { role: 'model', text: 'Split and count.' },
    ];

    const response = await post('/api/chat', { history, message: 'Is there a builtin?' });

    expect(response.status).toBe(200);
    expect(await response.json()).toEqual({ reply: 'Use collections.Counter.' });
    expect(client.requests[0].messages).toEqual([...history, { role: 'user', text: 'Is there a builtin?' }]);
  });

  it('maps repository errors to 422', async () => {
    const missing = path.join(os.tmpdir(), 'codereview-web-missing-repo');

    const response = await post('/api/analyze', { repo: missing });

    expect(response.status).toBe(422);
    expect(await response.json()).toEqual({
      error: { name: 'GitAccessError', message: `Path does not exist or is not a directory: ${missing}` },
    });
  });

  it('maps model API errors to 502 and rate limits to 429', async () => {
    client = new FakeModelClient(() => {
      throw new ApiError('Model API error (500): backend error', 'server', 500);
    });
    const failed = await post('/api/chat', { message: 'hi' });
    expect(failed.status).toBe(502);
    expect(await failed.json()).toEqual({ error: { name: 'ApiError', message: 'Model API error (500): backend error' } });

    client = new FakeModelClient(() => {
      throw new ApiError('Model API error (429): quota', 'rate-limit', 429);
    });
    const limited = await post('/api/chat', { message: 'hi' });
    expect(limited.status).toBe(429);
  });

  it('hides unexpected errors behind a 500', async () => {
    client = new FakeModelClient(() => {
      throw new Error('database password is hunter2');
    });

    const response = await post('/api/chat', { message: 'hi' });

    expect(response.status).toBe(500);
    expect(await response.json()).toEqual({ error: { name: 'Error', message: 'Internal server error' } });
    expect(logs.text).toContain('Request failed');
  });
});
