import type { JsonRecord } from "./common/records.js";

export type CampaignOutcome = "successful" | "failed";

/** One line of the export dump. The nested `data` object is loosely typed. */
export interface RawCampaignRecord {
  data: JsonRecord;
  [key: string]: unknown;
}

export interface CampaignLinks {
  project?: string;
  creator?: string;
}

export interface CuratedCampaignRecord {
  id: string;
  state: CampaignOutcome;
  name: string;
  blurb: string;
  category: string;
  subcategory: string;
  country: string;
  location: string;
  goal_usd: number;
  pledged_usd: number;
  backers_count: number;
  currency: string;
  cal_launched_at: number;
  cal_deadline: number;
  launched_at: string;
  deadline: string;
  campaign_duration_days: number;
  percent_funded: number;
  pledge_per_backer: number;
  is_staff_pick: boolean;
  creator_id?: string;
  links: CampaignLinks;
}

export interface CreatorHistorySummary {
  previous_projects_count: number;
  previous_successful: number;
  previous_failed: number;
  previous_success_rate: number;
  average_funding_goal: number;
  average_pledged: number;
  have_previous_project: boolean;
}

export interface CreatorHistory {
  creatorId?: string;
  entries: CuratedCampaignRecord[];
  summary: CreatorHistorySummary;
}

export type EnrichedCampaignRecord = CuratedCampaignRecord & CreatorHistorySummary;

export interface ProjectDetail {
  id: string;
  description: string;
  risk: string;
  image_count: number;
  video_count: number;
}

export interface FeatureVector {
  id: string;
  description_embedding: number[];
  blurb_embedding: number[];
  risk_embedding: number[];
  category_embedding: number[];
  subcategory_embedding: number[];
  country_embedding: number[];
  funding_goal_log: number;
  previous_funding_goal_log: number;
  previous_pledged_log: number;
  previous_success_rate: number;
  description_length: number;
  image_count: number;
  video_count: number;
  campaign_duration: number;
  previous_projects_count: number;
  state: 0 | 1;
}

export type FeatureField = Exclude<keyof FeatureVector, "id">;

export type FallbackKind = "empty_input" | "external_service" | "invalid_output" | "unexpected";

export type FieldResult<T> =
  | { status: "ok"; value: T }
  | { status: "fallback"; value: T; kind: FallbackKind; reason: string };

export interface FieldFallback {
  field: FeatureField;
  kind: FallbackKind;
  reason: string;
}

export interface FeatureDiagnostics {
  id: string;
  fallbacks: FieldFallback[];
}

export interface CategoryVocabulary {
  version: string;
  source: "config" | "batch";
  categories: readonly string[];
}

export interface FeatureSink {
  name: string;
  insertMany(records: FeatureVector[]): Promise<void>;
  close(): Promise<void>;
}

export type SinkFormat = "json" | "ndjson";

export interface StagePaths {
  input: string;
  output: string;
  stats: string;
}

export interface DedupConfig extends StagePaths {
  /** Collects duplicate groups and secondary-key diagnostics into the stats file. */
  report: boolean;
}

export type FilterConfig = StagePaths;

export type WebDatabaseConfig = StagePaths;

export type HistoryConfig = StagePaths;

export interface EmbeddingConfig {
  longFormUrl: string;
  shortFormUrl: string;
  timeoutMs: number;
  apiKey?: string;
}

export interface WordVectorConfig {
  path: string;
  dimension: number;
}

export interface FeatureConfig extends StagePaths {
  format: SinkFormat;
  /** Pinned vocabulary file; derived from the batch when absent. */
  vocabulary?: string;
  vocabularyOutput: string;
  details?: string;
  diagnostics: string;
  concurrency: number;
  batchSize: number;
  embedding: EmbeddingConfig;
  wordVectors: WordVectorConfig;
}

export interface ValidateConfig {
  input: string;
  output: string;
}

export interface AnalyzeConfig {
  input: string;
  output: string;
  category?: string;
  sortBy: "projects" | "funds";
  /** Epoch seconds closing the most recent window. */
  endDate?: number;
  top: number;
}

export interface RunAllConfig {
  dedup: DedupConfig;
  filter: FilterConfig;
  webDatabase: WebDatabaseConfig;
  history: HistoryConfig;
  features: FeatureConfig;
  validate: ValidateConfig;
}

export type StageConfig =
  | { command: "dedup"; config: DedupConfig }
  | { command: "filter"; config: FilterConfig }
  | { command: "web-db"; config: WebDatabaseConfig }
  | { command: "history"; config: HistoryConfig }
  | { command: "features"; config: FeatureConfig }
  | { command: "validate"; config: ValidateConfig }
  | { command: "analyze"; config: AnalyzeConfig }
  | { command: "run"; config: RunAllConfig };

export type Command = StageConfig["command"];
