import { z } from "zod";
import { readJsonRecords } from "../io/files.js";
import type { CuratedCampaignRecord } from "../types.js";

const curatedRecordSchema = z.object({
  id: z.string().min(1),
  state: z.enum(["successful", "failed"]),
  name: z.string(),
  blurb: z.string(),
  category: z.string(),
  subcategory: z.string(),
  country: z.string(),
  location: z.string(),
  goal_usd: z.number(),
  pledged_usd: z.number(),
  backers_count: z.number(),
  currency: z.string(),
  cal_launched_at: z.number(),
  cal_deadline: z.number(),
  launched_at: z.string(),
  deadline: z.string(),
  campaign_duration_days: z.number(),
  percent_funded: z.number(),
  pledge_per_backer: z.number(),
  is_staff_pick: z.boolean(),
  creator_id: z.string().optional(),
  links: z.object({
    project: z.string().optional(),
    creator: z.string().optional(),
  }),
});

export interface CuratedRecordsFile {
  records: CuratedCampaignRecord[];
  invalid: number;
}

/** Web database rows read back from disk. Extra keys (history columns) are dropped. */
export function parseCuratedRecords(values: readonly unknown[]): CuratedRecordsFile {
  const records: CuratedCampaignRecord[] = [];
  let invalid = 0;
  for (const value of values) {
    const parsed = curatedRecordSchema.safeParse(value);
    if (parsed.success) {
      records.push(parsed.data);
    } else {
      invalid += 1;
    }
  }
  return { records, invalid };
}

export async function loadCuratedRecords(path: string): Promise<CuratedRecordsFile> {
  const { records, malformedLines } = await readJsonRecords(path);
  const parsed = parseCuratedRecords(records);
  return { records: parsed.records, invalid: parsed.invalid + malformedLines };
}
