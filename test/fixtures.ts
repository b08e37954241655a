import { mkdtemp, rm } from "node:fs/promises";
import { tmpdir } from "node:os";
import { join } from "node:path";
import type { TextEmbeddingService, TextKind } from "../src/features/embedding.js";
import { WordVectorTable } from "../src/features/wordVectors.js";
import { Logger } from "../src/logger.js";
import type { CuratedCampaignRecord, RawCampaignRecord } from "../src/types.js";

export function makeRaw(data: Record<string, unknown>): RawCampaignRecord {
  return { data };
}

export function makeCurated(overrides: Partial<CuratedCampaignRecord> = {}): CuratedCampaignRecord {
  return {
    id: "100",
    state: "successful",
    name: "Desk Lamp",
    blurb: "A lamp for desks.",
    category: "design",
    subcategory: "design/product-design",
    country: "Canada",
    location: "Toronto",
    goal_usd: 1000,
    pledged_usd: 1500,
    backers_count: 30,
    currency: "CAD",
    cal_launched_at: 1_000_000,
    cal_deadline: 2_000_000,
    launched_at: "12/01/1970",
    deadline: "24/01/1970",
    campaign_duration_days: 12,
    percent_funded: 150,
    pledge_per_backer: 50,
    is_staff_pick: false,
    creator_id: "c1",
    links: {},
    ...overrides,
  };
}

export function captureLogger(): { logger: Logger; lines: string[] } {
  const lines: string[] = [];
  return { logger: new Logger({ write: (line) => lines.push(line) }), lines };
}

/** Returns `fill`-valued vectors of the right width and remembers every call. */
export class FakeEmbeddingService implements TextEmbeddingService {
  readonly name = "fake-embedding";
  readonly calls: { text: string; kind: TextKind }[] = [];

  constructor(
    private readonly respond: (text: string, kind: TextKind) => Promise<number[]> = async (_text, kind) =>
      new Array<number>(kind === "long_form" ? 768 : 384).fill(0.5),
  ) {}

  async embed(text: string, kind: TextKind): Promise<number[]> {
    this.calls.push({ text, kind });
    return this.respond(text, kind);
  }
}

export function smallWordTable(): WordVectorTable {
  return new WordVectorTable(
    3,
    new Map([
      ["product", [1, 0, 0]],
      ["design", [0, 1, 0]],
      ["canada", [0.5, 0.5, 1]],
    ]),
  );
}

export async function withTempDir<T>(fn: (dir: string) => Promise<T>): Promise<T> {
  const dir = await mkdtemp(join(tmpdir(), "campaign-pipeline-"));
  try {
    return await fn(dir);
  } finally {
    await rm(dir, { recursive: true, force: true });
  }
}
