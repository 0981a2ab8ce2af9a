import { Readable, Writable } from 'stream';
import type { ModelClient } from '../src/model-client.js';
import type { HealthCheck, ModelRequest } from '../src/types.js';

type Reply = string | ((request: ModelRequest) => string | Promise<string>);

export class FakeModelClient implements ModelClient {
  readonly model = 'fake-model';
  readonly requests: ModelRequest[] = [];
  health: HealthCheck = { isHealthy: true };

  constructor(private readonly reply: Reply = 'ok') {}

  async generate(request: ModelRequest): Promise<string> {
    this.requests.push(request);
    return typeof this.reply === 'string' ? this.reply : this.reply(request);
  }

  async checkHealth(): Promise<HealthCheck> {
    return this.health;
  }

  /** Text of the last message of the `index`-th request. */
  prompt(index = 0): string {
    const messages = this.requests[index]?.messages ?? [];
    return messages[messages.length - 1]?.text ?? '';
  }
}

export class MemoryStream extends Writable {
  private readonly chunks: string[] = [];

  override _write(chunk: Buffer | string, _encoding: BufferEncoding, callback: (error?: Error | null) => void): void {
    this.chunks.push(Buffer.isBuffer(chunk) ? chunk.toString('utf8') : String(chunk));
    callback();
  }

  get text(): string {
    return this.chunks.join('');
  }
}

export function inputOf(...lines: string[]): Readable {
  return Readable.from(lines.map((line) => Buffer.from(line)));
}
