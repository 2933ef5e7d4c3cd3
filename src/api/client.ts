// Copyright 2026 Layne Penney
// SPDX-License-Identifier: AGPL-3.0-or-later

/**
 * HTTP client for the model server API.
 * Thin wrapper over fetch: JSON in, JSON out, streamed progress for
 * long-running create/push requests.
 */

import { logger } from '../logger.js';
import { ApiError, ConnectionError } from '../errors.js';
import type {
  CreateRequest,
  DeleteRequest,
  GenerateRequest,
  GenerateResponse,
  ListResponse,
  ProgressResponse,
  PushRequest,
  ShowRequest,
  ShowResponse,
} from './types.js';

export type ProgressCallback = (progress: ProgressResponse) => void;

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Build an ApiError from a failed response, preferring the JSON `error` field.
 */
async function toApiError(response: Response): Promise<ApiError> {
  let message = '';
  try {
    const text = await response.text();
    message = text.trim();
    const parsed: unknown = JSON.parse(text);
    if (isRecord(parsed) && typeof parsed.error === 'string') {
      message = parsed.error;
    }
  } catch (error) {
    logger.trace(`Error body is not JSON: ${error instanceof Error ? error.message : String(error)}`);
  }
  return new ApiError(message || `${response.status} ${response.statusText}`.trim(), response.status);
}

/**
 * Split a response body into lines as they arrive.
 */
async function* readLines(response: Response): AsyncGenerator<string> {
  if (!response.body) {
    yield* (await response.text()).split('\n');
    return;
  }

  const reader = response.body.getReader();
  const decoder = new TextDecoder();
  let buffer = '';

  for (;;) {
    const { done, value } = await reader.read();
    if (done) break;
    buffer += decoder.decode(value, { stream: true });

    let newline = buffer.indexOf('\n');
    while (newline >= 0) {
      yield buffer.slice(0, newline);
      buffer = buffer.slice(newline + 1);
      newline = buffer.indexOf('\n');
    }
  }

  buffer += decoder.decode();
  if (buffer) {
    yield buffer;
  }
}

export class ApiClient {
  constructor(private readonly host: string) {}

  private async request(method: string, path: string, body?: unknown): Promise<Response> {
    const url = `${this.host}${path}`;
    logger.apiRequest(method, url, body);
    const started = Date.now();

    let response: Response;
    try {
      response = await fetch(url, {
        method,
        headers: body === undefined ? undefined : { 'Content-Type': 'application/json' },
        body: body === undefined ? undefined : JSON.stringify(body),
      });
    } catch (error) {
      throw new ConnectionError(this.host, { cause: error });
    }

    logger.apiResponse(response.status, (Date.now() - started) / 1000);

    if (!response.ok) {
      throw await toApiError(response);
    }
    return response;
  }

  /**
   * POST a request whose response is a stream of newline-delimited
   * progress objects. Rejects on the first line carrying an `error`.
   */
  private async stream(path: string, body: unknown, onProgress?: ProgressCallback): Promise<void> {
    const response = await this.request('POST', path, body);

    for await (const line of readLines(response)) {
      if (!line.trim()) continue;

      const parsed: unknown = JSON.parse(line);
      if (!isRecord(parsed)) continue;

      if (typeof parsed.error === 'string') {
        throw new ApiError(parsed.error, response.status);
      }
      const progress: ProgressResponse = {
        status: typeof parsed.status === 'string' ? parsed.status : undefined,
        digest: typeof parsed.digest === 'string' ? parsed.digest : undefined,
        total: typeof parsed.total === 'number' ? parsed.total : undefined,
        completed: typeof parsed.completed === 'number' ? parsed.completed : undefined,
      };
      onProgress?.(progress);
    }
  }

  /**
   * Fetch model details, metadata and (when verbose) tensors.
   */
  async show(request: ShowRequest): Promise<ShowResponse> {
    const response = await this.request('POST', '/api/show', request);
    return (await response.json()) as ShowResponse;
  }

  /**
   * List locally available models.
   */
  async list(): Promise<ListResponse> {
    const response = await this.request('GET', '/api/tags');
    const data = (await response.json()) as Partial<ListResponse>;
    return { models: data.models ?? [] };
  }

  async create(request: CreateRequest, onProgress?: ProgressCallback): Promise<void> {
    await this.stream('/api/create', { ...request, stream: true }, onProgress);
  }

  async push(request: PushRequest, onProgress?: ProgressCallback): Promise<void> {
    await this.stream('/api/push', { ...request, stream: true }, onProgress);
  }

  async delete(request: DeleteRequest): Promise<void> {
    await this.request('DELETE', '/api/delete', request);
  }

  /**
   * Non-streaming generate; with `keep_alive: 0` and no prompt this
   * unloads the model from memory.
   */
  async generate(request: GenerateRequest): Promise<GenerateResponse> {
    const response = await this.request('POST', '/api/generate', { ...request, stream: false });
    return (await response.json()) as GenerateResponse;
  }
}
