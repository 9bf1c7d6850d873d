/**
 * Unit tests for the HTTP embedding provider
 */

import { describe, it, expect } from "vitest";
import { HttpEmbeddingProvider, parseEmbeddingsResponse } from "@/clients/embeddings";
import { createMockHttp } from "../helpers/mockHttp";

describe("parseEmbeddingsResponse", () => {
  it("should order vectors by index", () => {
    const body = {
      data: [
        { index: 1, embedding: [0, 1] },
        { index: 0, embedding: [1, 0] },
      ],
    };

    expect(parseEmbeddingsResponse(body, 2)).toEqual([
      [1, 0],
      [0, 1],
    ]);
  });

  it("should reject a response missing an input", () => {
    expect(() =>
      parseEmbeddingsResponse({ data: [{ index: 0, embedding: [1] }] }, 2),
    ).toThrow("Embeddings response missing input 1");
  });

  it("should reject non-numeric embeddings", () => {
    expect(() =>
      parseEmbeddingsResponse({ data: [{ index: 0, embedding: ["a"] }] }, 1),
    ).toThrow("Malformed embeddings response at position 0");
  });
});

describe("HttpEmbeddingProvider", () => {
  it("should post the batch to the embeddings endpoint", async () => {
    const mock = createMockHttp();
    mock.on("POST", "http://embed.local/v1/embeddings", {
      data: [
        { index: 0, embedding: [0.1, 0.2] },
        { index: 1, embedding: [0.3, 0.4] },
      ],
    });
    const provider = new HttpEmbeddingProvider({
      apiUrl: "http://embed.local/v1/",
      apiKey: "test-secret",
      httpRequest: mock.request,
    });

    const vectors = await provider.embed(["heist", "hacker"]);

    expect(vectors).toEqual([
      [0.1, 0.2],
      [0.3, 0.4],
    ]);
    const [request] = mock.getRecordedRequests();
    expect(request.json).toEqual({
      model: "all-MiniLM-L6-v2",
      input: ["heist", "hacker"],
    });
    expect(request.headers).toEqual({ Authorization: "Bearer test-secret" });
  });

  it("should not call the endpoint for an empty batch", async () => {
    const mock = createMockHttp();
    const provider = new HttpEmbeddingProvider({ httpRequest: mock.request });

    expect(await provider.embed([])).toEqual([]);
    expect(mock.getRecordedRequests()).toEqual([]);
  });

  it("should report HTTP failures by status", async () => {
    const mock = createMockHttp();
    mock.onResponse("POST", "http://localhost:8080/v1/embeddings", {
      status: 503,
      body: { error: "loading model" },
    });
    const provider = new HttpEmbeddingProvider({ httpRequest: mock.request });

    await expect(provider.embed(["heist"])).rejects.toThrow(
      "Embedding request failed with HTTP 503",
    );
  });
});
