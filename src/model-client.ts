import axios, { type AxiosInstance } from 'axios';
import { z } from 'zod';
import { ApiError, errorMessage, type ApiErrorKind } from './errors.js';
import { logger } from './logger.js';
import type { HealthCheck, ModelRequest } from './types.js';

export interface ModelClient {
  readonly model: string;
  generate(request: ModelRequest): Promise<string>;
  checkHealth(): Promise<HealthCheck>;
}

export interface GeminiClientOptions {
  apiKey: string;
  model: string;
  apiBaseUrl: string;
  temperature: number;
  maxOutputTokens: number;
  timeout: number;
}

const generateResponseSchema = z.object({
  candidates: z
    .array(
      z.object({
        content: z
          .object({
            parts: z.array(z.object({ text: z.string().optional() })).optional(),
          })
          .optional(),
        finishReason: z.string().optional(),
      })
    )
    .optional(),
  promptFeedback: z.object({ blockReason: z.string().optional() }).optional(),
});

const remoteErrorSchema = z.object({
  error: z.object({
    message: z.string(),
    status: z.string().optional(),
    details: z.array(z.object({ reason: z.string().optional() }).passthrough()).optional(),
  }),
});

export function toApiError(error: unknown): ApiError {
  if (error instanceof ApiError) return error;

  if (!axios.isAxiosError(error)) {
    return new ApiError(`Model API request failed: ${errorMessage(error)}`, 'network', undefined, { cause: error });
  }

  if (error.code === 'ECONNABORTED' || error.code === 'ETIMEDOUT') {
    return new ApiError('Timeout when calling the model API', 'timeout', undefined, { cause: error });
  }

  const status = error.response?.status;
  if (status === undefined) {
    return new ApiError(`Model API unreachable: ${error.message}`, 'network', undefined, { cause: error });
  }

  const remote = remoteErrorSchema.safeParse(error.response?.data);
  const detail = remote.success ? remote.data.error.message : error.message;
  const invalidKey =
    remote.success && (remote.data.error.details ?? []).some((d) => d.reason === 'API_KEY_INVALID');

  let kind: ApiErrorKind = 'server';
  if (status === 401 || status === 403 || invalidKey) kind = 'auth';
  else if (status === 429) kind = 'rate-limit';

  return new ApiError(`Model API error (${status}): ${detail}`, kind, status, { cause: error });
}

export class GeminiClient implements ModelClient {
  readonly model: string;
  private readonly http: AxiosInstance;

  constructor(private readonly options: GeminiClientOptions, http?: AxiosInstance) {
    this.model = options.model.replace(/^models\//, '');
    this.http = http ?? axios.create();
  }

  private get modelUrl(): string {
    const base = this.options.apiBaseUrl.replace(/\/+$/, '');
    return `${base}/v1beta/models/${encodeURIComponent(this.model)}`;
  }

  private get headers(): Record<string, string> {
    return {
      'x-goog-api-key': this.options.apiKey,
      'Content-Type': 'application/json',
    };
  }

  async checkHealth(): Promise<HealthCheck> {
    try {
      await this.http.get(this.modelUrl, {
        headers: this.headers,
        timeout: Math.min(this.options.timeout, 10000),
      });
      return { isHealthy: true };
    } catch (error) {
      const apiError = toApiError(error);
      if (apiError.status === 404) {
        return { isHealthy: false, error: `Model ${this.model} not found` };
      }
      return { isHealthy: false, error: apiError.message };
    }
  }

  async generate(request: ModelRequest): Promise<string> {
    const body = {
      ...(request.system ? { systemInstruction: { parts: [{ text: request.system }] } } : {}),
      contents: request.messages.map((message) => ({
        role: message.role,
        parts: [{ text: message.text }],
      })),
      generationConfig: {
        temperature: this.options.temperature,
        maxOutputTokens: this.options.maxOutputTokens,
      },
    };

    const promptChars = request.messages.reduce((sum, message) => sum + message.text.length, 0);
    logger.debug('Calling model', { model: this.model, messages: request.messages.length, promptChars });

    let data: unknown;
    try {
      const response = await this.http.post(`${this.modelUrl}:generateContent`, body, {
        headers: this.headers,
        timeout: this.options.timeout,
      });
      data = response.data;
    } catch (error) {
      throw toApiError(error);
    }

    const parsed = generateResponseSchema.safeParse(data);
    if (!parsed.success) {
      throw new ApiError('Unexpected response shape from the model API', 'invalid-response');
    }

    const blockReason = parsed.data.promptFeedback?.blockReason;
    if (blockReason) {
      throw new ApiError(`Prompt blocked by the model API: ${blockReason}`, 'blocked');
    }

    const candidate = parsed.data.candidates?.[0];
    const text = (candidate?.content?.parts ?? []).map((part) => part.text ?? '').join('');
    if (!text.trim()) {
      const reason = candidate?.finishReason ? ` (finish reason: ${candidate.finishReason})` : '';
      throw new ApiError(`Model returned an empty response${reason}`, 'invalid-response');
    }

    logger.debug('Model responded', { model: this.model, chars: text.length });
    return text;
  }
}
