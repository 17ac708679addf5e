/**
 * OpenAI-compatible embedding client.
 *
 * Simple fetch-based client: no SDK dependency. Works against any
 * endpoint exposing POST {baseUrl}/embeddings.
 */

import { z } from 'zod';
import { GenerationError, ConfigurationError } from '@scriptdex/core';
import type { EmbeddingClient, EmbeddingRequest, EmbeddingResponse } from '@scriptdex/core';

const DEFAULT_BASE_URL = 'https://api.openai.com/v1';
const DEFAULT_TIMEOUT_MS = 30_000;

const openAIEmbeddingResponseSchema = z.object({
  data: z.array(
    z.object({
      embedding: z.array(z.number()),
      index: z.number().int().nonnegative(),
    }),
  ),
  model: z.string(),
  usage: z
    .object({
      prompt_tokens: z.number(),
      total_tokens: z.number(),
    })
    .optional(),
});

export interface OpenAIEmbeddingClientOptions {
  /** API key (falls back to OPENAI_API_KEY env var) */
  apiKey?: string;
  /** Endpoint base URL (default: https://api.openai.com/v1) */
  baseUrl?: string;
  timeoutMs?: number;
}

function detail(err: unknown, field: string): unknown {
  if (!(err instanceof GenerationError)) return undefined;
  const details = err.details;
  if (typeof details === 'object' && details !== null && field in details) {
    return Object.getOwnPropertyDescriptor(details, field)?.value;
  }
  return undefined;
}

/**
 * HTTP status carried by a provider error, when there was a response.
 */
export function providerStatus(err: unknown): number | undefined {
  const status = detail(err, 'status');
  return typeof status === 'number' ? status : undefined;
}

/**
 * Rate limits, server errors and network failures are worth retrying;
 * other 4xx responses and errors flagged `retryable: false` are not.
 */
export function isRetryableEmbeddingError(err: unknown): boolean {
  if (detail(err, 'retryable') === false) return false;
  const status = providerStatus(err);
  if (status === undefined) return true;
  return status === 408 || status === 429 || status >= 500;
}

export function createOpenAIEmbeddingClient(options: OpenAIEmbeddingClientOptions = {}): EmbeddingClient {
  const key = options.apiKey ?? process.env['OPENAI_API_KEY'];
  const baseUrl = (options.baseUrl ?? DEFAULT_BASE_URL).replace(/\/+$/, '');
  const timeoutMs = options.timeoutMs ?? DEFAULT_TIMEOUT_MS;

  if (!key) {
    throw new ConfigurationError(
      'OpenAI embedding client requires an API key. ' +
        'Set SCRIPTDEX_EMBEDDING_API_KEY or OPENAI_API_KEY, or pass apiKey.',
    );
  }

  return {
    async embed(request: EmbeddingRequest): Promise<EmbeddingResponse> {
      const body: Record<string, unknown> = { input: request.input, model: request.model };
      if (request.dimensions !== undefined) body.dimensions = request.dimensions;

      const response = await fetch(`${baseUrl}/embeddings`, {
        method: 'POST',
        headers: {
          Authorization: `Bearer ${key}`,
          'Content-Type': 'application/json',
        },
        body: JSON.stringify(body),
        signal: AbortSignal.timeout(timeoutMs),
      });

      if (!response.ok) {
        const errorBody = await response.text();
        throw new GenerationError(`Embeddings API error (${response.status}): ${errorBody}`, {
          status: response.status,
        });
      }

      const parsed = openAIEmbeddingResponseSchema.safeParse(await response.json());
      if (!parsed.success) {
        throw new GenerationError('Malformed embeddings API response', {
          issues: parsed.error.issues,
          retryable: false,
        });
      }

      const json = parsed.data;
      // Sort by index so output order matches input order
      const data = [...json.data].sort((a, b) => a.index - b.index);
      return {
        model: json.model,
        data: data.map((d) => ({ embedding: d.embedding, index: d.index })),
        usage: json.usage
          ? { promptTokens: json.usage.prompt_tokens, totalTokens: json.usage.total_tokens }
          : undefined,
      };
    },
  };
}
