/**
 * HttpEmbeddingProvider — OpenAI-compatible embeddings endpoint
 *
 * Works with any server exposing POST {apiUrl}/embeddings with
 * `{ model, input: string[] }` and answering `{ data: [{ index, embedding }] }`
 * (hosted APIs, or a local sentence-transformers server).
 */

import type { EmbeddingProvider } from "@/interfaces";
import type { HttpRequestFn } from "@/types";
import { httpRequest as defaultHttpRequest, HttpError } from "@/clients/http";
import {
  EMBEDDING_DEFAULT_API_URL,
  EMBEDDING_DEFAULT_MODEL,
  EMBEDDING_DEFAULT_TIMEOUT_MS,
  EMBEDDING_ENDPOINT_PATH,
} from "@/constants/clients/embeddings";

export interface HttpEmbeddingProviderConfig {
  apiUrl?: string;
  apiKey?: string;
  model?: string;
  timeoutMs?: number;
  httpRequest?: HttpRequestFn;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function isNumberArray(value: unknown): value is number[] {
  return (
    Array.isArray(value) &&
    value.length > 0 &&
    value.every((n) => typeof n === "number" && Number.isFinite(n))
  );
}

/**
 * Extract vectors from an embeddings response, ordered by `index`
 *
 * @throws Error if the body does not hold exactly one vector per input
 */
export function parseEmbeddingsResponse(body: unknown, expected: number): number[][] {
  if (!isRecord(body) || !Array.isArray(body.data)) {
    throw new Error("Malformed embeddings response: missing data");
  }

  const vectors: number[][] = new Array<number[]>(expected);
  body.data.forEach((item, position) => {
    if (!isRecord(item) || !isNumberArray(item.embedding)) {
      throw new Error(`Malformed embeddings response at position ${position}`);
    }
    const index = typeof item.index === "number" ? item.index : position;
    if (index < 0 || index >= expected) {
      throw new Error(`Embedding index out of range: ${index}`);
    }
    vectors[index] = item.embedding;
  });

  for (let i = 0; i < expected; i++) {
    if (!vectors[i]) {
      throw new Error(`Embeddings response missing input ${i}`);
    }
  }

  return vectors;
}

export class HttpEmbeddingProvider implements EmbeddingProvider {
  readonly model: string;

  private readonly url: string;
  private readonly apiKey?: string;
  private readonly timeoutMs: number;
  private readonly httpRequest: HttpRequestFn;

  constructor(config: HttpEmbeddingProviderConfig = {}) {
    const apiUrl = (config.apiUrl ?? EMBEDDING_DEFAULT_API_URL).replace(/\/+$/, "");
    this.url = `${apiUrl}${EMBEDDING_ENDPOINT_PATH}`;
    this.apiKey = config.apiKey;
    this.model = config.model ?? EMBEDDING_DEFAULT_MODEL;
    this.timeoutMs = config.timeoutMs ?? EMBEDDING_DEFAULT_TIMEOUT_MS;
    this.httpRequest = config.httpRequest ?? defaultHttpRequest;
  }

  async embed(texts: readonly string[]): Promise<number[][]> {
    if (texts.length === 0) {
      return [];
    }

    const headers: Record<string, string> = {};
    if (this.apiKey) {
      headers.Authorization = `Bearer ${this.apiKey}`;
    }

    let body: unknown;
    try {
      body = await this.httpRequest({
        method: "POST",
        url: this.url,
        headers,
        json: { model: this.model, input: texts },
        timeoutMs: this.timeoutMs,
      });
    } catch (err) {
      if (err instanceof HttpError) {
        throw new Error(`Embedding request failed with HTTP ${err.status}`);
      }
      throw err;
    }

    return parseEmbeddingsResponse(body, texts.length);
  }
}
