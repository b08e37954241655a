import test from "node:test";
import assert from "node:assert/strict";
import { ExternalServiceError } from "../src/common/errors.js";
import { HttpTextEmbeddingService, parseEmbeddingBody } from "../src/features/embedding.js";

interface RecordedCall {
  url: string;
  body: unknown;
  headers: Record<string, string>;
}

function stubFetch(respond: () => Response | Promise<Response>, calls: RecordedCall[] = []): typeof fetch {
  return async (input, init) => {
    const headers: Record<string, string> = {};
    new Headers(init?.headers).forEach((value, key) => {
      headers[key] = value;
    });
    calls.push({
      url: String(input),
      body: typeof init?.body === "string" ? (JSON.parse(init.body) as unknown) : undefined,
      headers,
    });
    return respond();
  };
}

const endpoints = {
  long_form: "http://embeddings.local/long",
  short_form: "http://embeddings.local/short",
};

test("posts the text to the endpoint of its kind", async () => {
  const calls: RecordedCall[] = [];
  const service = new HttpTextEmbeddingService({
    endpoints,
    apiKey: "test-secret",
    fetchImpl: stubFetch(() => Response.json([0.1, 0.2, 0.3]), calls),
  });

  assert.deepEqual(await service.embed("hello world", "short_form"), [0.1, 0.2, 0.3]);
  assert.equal(calls.length, 1);
  assert.equal(calls[0].url, "http://embeddings.local/short");
  assert.deepEqual(calls[0].body, { inputs: "hello world", truncate: true });
  assert.equal(calls[0].headers.authorization, "Bearer test-secret");
  assert.equal(calls[0].headers["content-type"], "application/json");
});

test("accepts batch and envelope response shapes", () => {
  assert.deepEqual(parseEmbeddingBody("[[1,2],[3,4]]"), [1, 2]);
  assert.deepEqual(parseEmbeddingBody('{"embedding":[5,6]}'), [5, 6]);
  assert.deepEqual(parseEmbeddingBody('{"embeddings":[[7,8]]}'), [7, 8]);
  assert.throws(() => parseEmbeddingBody('{"vector":[1]}'), /unexpected response shape/);
  assert.throws(() => parseEmbeddingBody("<html>"), /response is not JSON/);
});

test("non-2xx responses become service errors", async () => {
  const service = new HttpTextEmbeddingService({
    endpoints,
    fetchImpl: stubFetch(() => new Response("model overloaded", { status: 503 })),
  });
  await assert.rejects(service.embed("text", "long_form"), (error: unknown) => {
    assert.ok(error instanceof ExternalServiceError);
    assert.equal(error.message, "text-embedding: long_form request failed (503): model overloaded");
    return true;
  });
});

test("network failures and timeouts become service errors", async () => {
  const refused = new HttpTextEmbeddingService({
    endpoints,
    fetchImpl: stubFetch(() => {
      throw new TypeError("fetch failed");
    }),
  });
  await assert.rejects(refused.embed("text", "short_form"), /short_form request failed: fetch failed/);

  const slow = new HttpTextEmbeddingService({
    endpoints,
    timeoutMs: 5,
    fetchImpl: async (_input, init) =>
      new Promise<Response>((_resolve, reject) => {
        init?.signal?.addEventListener("abort", () => {
          const error = new Error("The operation was aborted due to timeout");
          error.name = "TimeoutError";
          reject(error);
        });
      }),
  });
  await assert.rejects(slow.embed("text", "long_form"), /timed out after 5ms/);
});

test("a kind without an endpoint fails without calling fetch", async () => {
  const calls: RecordedCall[] = [];
  const service = new HttpTextEmbeddingService({
    endpoints: { long_form: endpoints.long_form },
    fetchImpl: stubFetch(() => Response.json([1]), calls),
  });
  await assert.rejects(service.embed("text", "short_form"), /no endpoint configured for short_form/);
  assert.equal(calls.length, 0);
});
