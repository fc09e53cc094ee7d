/**
 * Shared HTTP plumbing for the fetch-based adapters.
 *
 * Dependency direction: http.ts → zod, core/errors.ts
 * Used by: chat adapters, embedding adapters
 */

import type { z } from 'zod';
import { ProviderError, errorMessage } from '../core/errors.js';

export interface JsonRequest {
  readonly provider: string;
  readonly url: string;
  readonly method?: 'GET' | 'POST';
  readonly headers?: Record<string, string>;
  readonly body?: unknown;
  readonly signal?: AbortSignal;
}

/**
 * Send a request and return the raw response once it is known to be 2xx.
 *
 * @throws {ProviderError} on network failure or a non-2xx status
 */
export async function sendRequest(req: JsonRequest): Promise<Response> {
  let response: Response;

  try {
    response = await fetch(req.url, {
      method: req.method ?? 'POST',
      headers: { 'Content-Type': 'application/json', ...req.headers },
      body: req.body === undefined ? undefined : JSON.stringify(req.body),
      signal: req.signal,
    });
  } catch (err) {
    throw new ProviderError(`Failed to connect to ${req.provider} at ${req.url}: ${errorMessage(err)}`, {
      provider: req.provider,
      url: req.url,
    });
  }

  if (!response.ok) {
    const errorBody = await response.text();
    throw new ProviderError(`${req.provider} API error: ${response.status} ${response.statusText}`, {
      status: response.status,
      body: errorBody,
      provider: req.provider,
    });
  }

  return response;
}

/**
 * Send a request and validate the JSON body against a schema.
 *
 * @throws {ProviderError} on transport failure or an unexpected response shape
 */
export async function requestJson<T extends z.ZodTypeAny>(
  req: JsonRequest,
  schema: T,
): Promise<z.infer<T>> {
  const response = await sendRequest(req);

  let data: unknown;
  try {
    data = await response.json();
  } catch (err) {
    throw new ProviderError(`${req.provider} returned invalid JSON: ${errorMessage(err)}`, {
      provider: req.provider,
    });
  }

  const parsed = schema.safeParse(data);
  if (!parsed.success) {
    throw new ProviderError(`${req.provider} returned an unexpected response shape`, {
      provider: req.provider,
      issues: parsed.error.issues,
    });
  }
  return parsed.data;
}

/**
 * Iterate over the newline-delimited lines of a streaming response body.
 * Blank lines are skipped.
 */
export async function* readLines(response: Response, provider: string): AsyncIterable<string> {
  if (!response.body) {
    throw new ProviderError(`${provider} response has no body`, { provider });
  }

  const reader = response.body.getReader();
  const decoder = new TextDecoder();
  let buffer = '';

  try {
    while (true) {
      const { done, value } = await reader.read();
      if (done) break;

      buffer += decoder.decode(value, { stream: true });
      const lines = buffer.split('\n');
      buffer = lines.pop() ?? '';

      for (const line of lines) {
        if (line.trim()) yield line;
      }
    }
    buffer += decoder.decode();
    if (buffer.trim()) yield buffer;
  } finally {
    reader.releaseLock();
  }
}

/** Parse a line as JSON, returning undefined when it is not valid JSON. */
export function parseJsonLine(line: string): unknown {
  try {
    return JSON.parse(line);
  } catch {
    return undefined;
  }
}
