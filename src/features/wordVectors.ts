import { ExternalServiceError } from "../common/errors.js";
import type { Logger } from "../logger.js";
import { readLines } from "../io/files.js";
import { zeroVector } from "../common/math.js";
import { tokenize } from "./text.js";

export interface WordVectorLookupService {
  readonly name: string;
  readonly dimension: number;
  lookup(token: string): Promise<number[] | undefined>;
}

/** In-memory word table (GloVe text layout: `word v1 v2 ... vN`). */
export class WordVectorTable implements WordVectorLookupService {
  readonly name = "word-vectors";

  constructor(
    readonly dimension: number,
    private readonly vectors: ReadonlyMap<string, number[]>,
  ) {}

  get size(): number {
    return this.vectors.size;
  }

  async lookup(token: string): Promise<number[] | undefined> {
    return this.vectors.get(token);
  }
}

export interface LoadWordVectorOptions {
  dimension: number;
  /** Only keep these tokens; full GloVe tables do not need to sit in memory. */
  restrictTo?: ReadonlySet<string>;
  logger?: Pick<Logger, "debug" | "info">;
}

export async function loadWordVectorTable(
  path: string,
  options: LoadWordVectorOptions,
): Promise<WordVectorTable> {
  const vectors = new Map<string, number[]>();
  let skipped = 0;
  for await (const line of readLines(path)) {
    const parsed = parseWordVectorLine(line, options.dimension);
    if (!parsed) {
      if (line.trim()) {
        skipped += 1;
      }
      continue;
    }
    if (options.restrictTo && !options.restrictTo.has(parsed.token)) {
      continue;
    }
    vectors.set(parsed.token, parsed.vector);
  }
  options.logger?.info(
    `Loaded ${vectors.size} word vectors (dim=${options.dimension}, skipped_lines=${skipped}) from ${path}`,
  );
  return new WordVectorTable(options.dimension, vectors);
}

export function parseWordVectorLine(
  line: string,
  dimension: number,
): { token: string; vector: number[] } | undefined {
  const parts = line.trim().split(" ");
  if (parts.length !== dimension + 1) {
    return undefined;
  }
  const [token, ...rest] = parts;
  const vector = rest.map(Number);
  if (!token || vector.some((value) => !Number.isFinite(value))) {
    return undefined;
  }
  return { token, vector };
}

/**
 * Mean of the vectors of known tokens. Unknown tokens are skipped; no known
 * tokens (or empty text) yields the zero vector of the table's dimension.
 */
export async function averageWordVectors(
  service: WordVectorLookupService,
  text: string,
): Promise<number[]> {
  const sum = zeroVector(service.dimension);
  let found = 0;
  for (const token of tokenize(text)) {
    const vector = await service.lookup(token);
    if (!vector) {
      continue;
    }
    if (vector.length !== service.dimension) {
      throw new ExternalServiceError(
        service.name,
        `returned ${vector.length} values for "${token}", expected ${service.dimension}`,
      );
    }
    for (let i = 0; i < sum.length; i += 1) {
      sum[i] += vector[i];
    }
    found += 1;
  }
  if (found === 0) {
    return sum;
  }
  return sum.map((value) => value / found);
}
