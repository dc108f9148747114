import { describe, it, expect, vi, beforeEach, afterEach } from "vitest";
import { z } from "zod";
import { RAG_CONFIG } from "./config.js";
import { EmbeddingService } from "./embedding-service.js";
import { EmbeddingError, InvalidArgumentError } from "./errors.js";
import { silentLogger } from "./logger.js";

const RequestSchema = z.object({ model: z.string(), input: z.array(z.string()) });

function jsonResponse(body: unknown): Response {
  return new Response(JSON.stringify(body), {
    status: 200,
    headers: { "Content-Type": "application/json" },
  });
}

function requestInput(init: RequestInit | undefined): string[] {
  return RequestSchema.parse(JSON.parse(String(init?.body))).input;
}

/** Answers each input with a one-dimensional vector holding its length. */
async function lengthEmbeddings(_url: string | URL | Request, init?: RequestInit): Promise<Response> {
  return jsonResponse({ data: requestInput(init).map((t) => ({ embedding: [t.length] })) });
}

describe("EmbeddingService", () => {
  const fetchMock = vi.fn<typeof fetch>();

  function service(overrides: { maxRetries?: number; onProgress?: (done: number, total: number) => void } = {}) {
    return new EmbeddingService({
      apiKey: "test-key",
      model: "test-embedder",
      batchSize: 2,
      concurrency: 1,
      maxRetries: overrides.maxRetries ?? 0,
      retryBaseDelayMs: 0,
      logger: silentLogger,
      onProgress: overrides.onProgress,
    });
  }

  beforeEach(() => {
    fetchMock.mockReset();
    vi.stubGlobal("fetch", fetchMock);
  });

  afterEach(() => {
    vi.unstubAllGlobals();
  });

  it("embeds in batches and keeps the input order", async () => {
    fetchMock.mockImplementation(lengthEmbeddings);
    const progress: Array<[number, number]> = [];

    const vectors = await service({ onProgress: (done, total) => progress.push([done, total]) }).embed([
      "a",
      "bb",
      "ccc",
      "dddd",
      "eeeee",
    ]);

    expect(vectors).toEqual([[1], [2], [3], [4], [5]]);
    expect(fetchMock.mock.calls.map(([, init]) => requestInput(init))).toEqual([
      ["a", "bb"],
      ["ccc", "dddd"],
      ["eeeee"],
    ]);
    expect(progress).toEqual([
      [2, 5],
      [4, 5],
      [5, 5],
    ]);
  });

  it("prefixes queries with the retrieval instruction", async () => {
    fetchMock.mockImplementation(lengthEmbeddings);

    const vector = await service().embedQuery("widgets");

    const expected = RAG_CONFIG.queryPrefix + "widgets";
    expect(vector).toEqual([expected.length]);
    expect(requestInput(fetchMock.mock.calls[0]?.[1])).toEqual([expected]);
  });

  it("rejects non-string input before calling the API", async () => {
    const pending = service().embed(JSON.parse('["fine", 7]'));

    await expect(pending).rejects.toThrow(InvalidArgumentError);
    await expect(pending).rejects.toThrow("Argument 'texts[1]' must be a string, received number");
    expect(fetchMock).not.toHaveBeenCalled();
  });

  it("fails when the API returns the wrong number of vectors", async () => {
    fetchMock.mockResolvedValue(jsonResponse({ data: [{ embedding: [1] }] }));

    const pending = service({ maxRetries: 2 }).embed(["one", "two"]);

    await expect(pending).rejects.toThrow(EmbeddingError);
    await expect(pending).rejects.toThrow("Embedding API returned 1 vectors for 2 inputs");
    expect(fetchMock).toHaveBeenCalledTimes(1);
  });

  it("retries a rate-limited batch", async () => {
    fetchMock
      .mockResolvedValueOnce(new Response("slow down", { status: 429 }))
      .mockImplementation(lengthEmbeddings);

    const vectors = await service({ maxRetries: 1 }).embed(["abc"]);

    expect(vectors).toEqual([[3]]);
    expect(fetchMock).toHaveBeenCalledTimes(2);
  });

  it("surfaces the status of a failed request", async () => {
    fetchMock.mockResolvedValue(new Response("no such model", { status: 404 }));

    await expect(service().embed(["abc"])).rejects.toMatchObject({
      name: "EmbeddingError",
      status: 404,
      message: "Embedding API error (404): no such model",
    });
  });
});
