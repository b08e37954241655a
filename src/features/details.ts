import { z } from "zod";
import { intOrZero } from "../common/records.js";
import { readJsonRecords } from "../io/files.js";
import type { Logger } from "../logger.js";
import type { ProjectDetail } from "../types.js";

const detailSchema = z.object({
  id: z.union([z.number(), z.string().trim().min(1)]).transform(String),
  description: z.string().nullish(),
  risk: z.string().nullish(),
  image_count: z.unknown(),
  video_count: z.unknown(),
});

export interface DetailIndexStats {
  loaded: number;
  invalid: number;
  malformed_lines: number;
  duplicates: number;
}

/** Scraped project pages keyed by campaign id. Text is kept raw; clean-up happens at assembly. */
export class ProjectDetailIndex {
  private constructor(
    private readonly byId: ReadonlyMap<string, ProjectDetail>,
    readonly stats: DetailIndexStats,
  ) {}

  static empty(): ProjectDetailIndex {
    return new ProjectDetailIndex(new Map(), { loaded: 0, invalid: 0, malformed_lines: 0, duplicates: 0 });
  }

  static fromRecords(records: readonly unknown[], malformedLines = 0): ProjectDetailIndex {
    const byId = new Map<string, ProjectDetail>();
    const stats: DetailIndexStats = { loaded: 0, invalid: 0, malformed_lines: malformedLines, duplicates: 0 };
    for (const entry of records) {
      const parsed = detailSchema.safeParse(entry);
      if (!parsed.success) {
        stats.invalid += 1;
        continue;
      }
      const { id, description, risk, image_count, video_count } = parsed.data;
      if (byId.has(id)) {
        stats.duplicates += 1;
        continue;
      }
      byId.set(id, {
        id,
        description: description ?? "",
        risk: risk ?? "",
        image_count: intOrZero(image_count),
        video_count: intOrZero(video_count),
      });
      stats.loaded += 1;
    }
    return new ProjectDetailIndex(byId, stats);
  }

  get size(): number {
    return this.byId.size;
  }

  get(id: string): ProjectDetail | undefined {
    return this.byId.get(id);
  }
}

export async function loadProjectDetails(path: string, logger?: Logger): Promise<ProjectDetailIndex> {
  const { records, malformedLines } = await readJsonRecords(path);
  const index = ProjectDetailIndex.fromRecords(records, malformedLines);
  const { loaded, invalid, malformed_lines, duplicates } = index.stats;
  logger?.info(
    `Project details: loaded=${loaded}, invalid=${invalid}, malformed_lines=${malformed_lines}, duplicates=${duplicates}`,
  );
  return index;
}
