import { z } from "zod";
import { ExternalServiceError, isAbortError, stringifyError } from "../common/errors.js";

export type TextKind = "long_form" | "short_form";

export const EMBEDDING_DIMENSIONS: Readonly<Record<TextKind, number>> = Object.freeze({
  long_form: 768,
  short_form: 384,
});

export interface TextEmbeddingService {
  readonly name: string;
  embed(text: string, kind: TextKind): Promise<number[]>;
}

const vectorSchema = z.array(z.number());
const batchSchema = z.array(vectorSchema).min(1);
const envelopeSchema = z.union([
  z.object({ embedding: vectorSchema }),
  z.object({ embeddings: batchSchema }),
]);

export interface HttpTextEmbeddingOptions {
  endpoints: Partial<Record<TextKind, string>>;
  timeoutMs?: number;
  apiKey?: string;
  fetchImpl?: typeof fetch;
}

/**
 * Client for sentence-embedding servers that take `{ inputs }` and answer with
 * a vector, a batch of vectors, or an `embedding(s)` envelope. One endpoint per
 * text kind since long and short texts are served by different models.
 */
export class HttpTextEmbeddingService implements TextEmbeddingService {
  readonly name = "text-embedding";
  private readonly endpoints: Partial<Record<TextKind, string>>;
  private readonly timeoutMs: number;
  private readonly apiKey?: string;
  private readonly fetchImpl: typeof fetch;

  constructor(options: HttpTextEmbeddingOptions) {
    this.endpoints = options.endpoints;
    this.timeoutMs = options.timeoutMs ?? 30_000;
    this.apiKey = options.apiKey;
    this.fetchImpl = options.fetchImpl ?? fetch;
  }

  async embed(text: string, kind: TextKind): Promise<number[]> {
    const url = this.endpoints[kind];
    if (!url) {
      throw new ExternalServiceError(this.name, `no endpoint configured for ${kind}`);
    }

    const headers: Record<string, string> = { "content-type": "application/json" };
    if (this.apiKey) {
      headers.authorization = `Bearer ${this.apiKey}`;
    }

    let response: Response;
    try {
      response = await this.fetchImpl(url, {
        method: "POST",
        headers,
        body: JSON.stringify({ inputs: text, truncate: true }),
        signal: AbortSignal.timeout(this.timeoutMs),
      });
    } catch (error) {
      const detail = isAbortError(error) || isTimeoutError(error)
        ? `timed out after ${this.timeoutMs}ms`
        : stringifyError(error);
      throw new ExternalServiceError(this.name, `${kind} request failed: ${detail}`);
    }

    const body = await response.text();
    if (!response.ok) {
      throw new ExternalServiceError(
        this.name,
        `${kind} request failed (${response.status}): ${body.slice(0, 200)}`,
      );
    }
    return parseEmbeddingBody(body, this.name);
  }
}

export function parseEmbeddingBody(body: string, service = "text-embedding"): number[] {
  let json: unknown;
  try {
    json = JSON.parse(body) as unknown;
  } catch {
    throw new ExternalServiceError(service, "response is not JSON");
  }
  const flat = vectorSchema.safeParse(json);
  if (flat.success) {
    return flat.data;
  }
  const batch = batchSchema.safeParse(json);
  if (batch.success) {
    return batch.data[0];
  }
  const envelope = envelopeSchema.safeParse(json);
  if (envelope.success) {
    const value = envelope.data;
    return "embedding" in value ? value.embedding : value.embeddings[0];
  }
  throw new ExternalServiceError(service, "unexpected response shape");
}

function isTimeoutError(value: unknown): boolean {
  return value instanceof Error && value.name === "TimeoutError";
}
