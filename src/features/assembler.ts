import { isPipelineError, stringifyError } from "../common/errors.js";
import { log1pBase10, zeroVector } from "../common/math.js";
import { intOrZero } from "../common/records.js";
import type { Logger } from "../logger.js";
import type {
  CategoryVocabulary,
  CreatorHistorySummary,
  CuratedCampaignRecord,
  FallbackKind,
  FeatureDiagnostics,
  FeatureField,
  FeatureVector,
  FieldFallback,
  FieldResult,
  ProjectDetail,
} from "../types.js";
import { EMBEDDING_DIMENSIONS, type TextEmbeddingService, type TextKind } from "./embedding.js";
import { cleanLongText, cleanShortText, subcategoryText, wordCount } from "./text.js";
import { hasCategory, oneHot } from "./vocabulary.js";
import { averageWordVectors, type WordVectorLookupService } from "./wordVectors.js";

export interface FeatureAssemblerDeps {
  embeddings: TextEmbeddingService;
  wordVectors: WordVectorLookupService;
  vocabulary: CategoryVocabulary;
  logger: Logger;
}

export interface AssemblerInput {
  record: CuratedCampaignRecord;
  history: CreatorHistorySummary;
  detail?: ProjectDetail;
}

export interface AssembledFeatures {
  vector: FeatureVector;
  diagnostics: FeatureDiagnostics;
}

class FieldRejected extends Error {
  constructor(
    readonly kind: FallbackKind,
    message: string,
  ) {
    super(message);
    this.name = "FieldRejected";
  }
}

function fallbackKindOf(error: unknown): FallbackKind {
  if (error instanceof FieldRejected) {
    return error.kind;
  }
  return isPipelineError(error) && error.kind === "external_service" ? "external_service" : "unexpected";
}

/**
 * Builds one fixed-width feature row per campaign. Each field either succeeds
 * or falls back to its default (zero vector or 0); fallbacks are logged and
 * returned as diagnostics, never thrown.
 */
export class FeatureAssembler {
  private readonly embeddings: TextEmbeddingService;
  private readonly wordVectors: WordVectorLookupService;
  private readonly vocabulary: CategoryVocabulary;
  private readonly logger: Logger;

  constructor(deps: FeatureAssemblerDeps) {
    this.embeddings = deps.embeddings;
    this.wordVectors = deps.wordVectors;
    this.vocabulary = deps.vocabulary;
    this.logger = deps.logger;
  }

  async assemble(input: AssemblerInput): Promise<AssembledFeatures> {
    const { record, history, detail } = input;
    const fallbacks: FieldFallback[] = [];
    const settle = <T>(field: FeatureField, result: FieldResult<T>): T => {
      if (result.status === "fallback") {
        fallbacks.push({ field, kind: result.kind, reason: result.reason });
        this.logger.warn(
          `Feature fallback: campaign=${record.id} field=${field} kind=${result.kind} reason=${result.reason}`,
        );
      }
      return result.value;
    };

    const description = cleanLongText(detail?.description);
    const risk = cleanLongText(detail?.risk);
    const blurb = cleanShortText(record.blurb);

    const [descriptionEmbedding, blurbEmbedding, riskEmbedding, subcategoryEmbedding, countryEmbedding] =
      await Promise.all([
        this.embedField(description, "long_form"),
        this.embedField(blurb, "short_form"),
        this.embedField(risk, "short_form"),
        this.wordVectorField(subcategoryText(record.subcategory)),
        this.wordVectorField(record.country),
      ]);

    if (!hasCategory(this.vocabulary, record.category)) {
      this.logger.debug(
        `Category "${record.category}" of campaign ${record.id} not in vocabulary ${this.vocabulary.version}`,
      );
    }

    const vector: FeatureVector = {
      id: record.id,
      description_embedding: settle("description_embedding", descriptionEmbedding),
      blurb_embedding: settle("blurb_embedding", blurbEmbedding),
      risk_embedding: settle("risk_embedding", riskEmbedding),
      category_embedding: oneHot(this.vocabulary, record.category),
      subcategory_embedding: settle("subcategory_embedding", subcategoryEmbedding),
      country_embedding: settle("country_embedding", countryEmbedding),
      funding_goal_log: settle("funding_goal_log", scalarField(log1pBase10(record.goal_usd))),
      previous_funding_goal_log: settle(
        "previous_funding_goal_log",
        scalarField(log1pBase10(history.average_funding_goal)),
      ),
      previous_pledged_log: settle("previous_pledged_log", scalarField(log1pBase10(history.average_pledged))),
      previous_success_rate: settle("previous_success_rate", scalarField(history.previous_success_rate)),
      description_length: wordCount(description),
      image_count: intOrZero(detail?.image_count),
      video_count: intOrZero(detail?.video_count),
      campaign_duration: intOrZero(record.campaign_duration_days),
      previous_projects_count: intOrZero(history.previous_projects_count),
      state: record.state === "successful" ? 1 : 0,
    };

    return { vector, diagnostics: { id: record.id, fallbacks } };
  }

  private async embedField(text: string, kind: TextKind): Promise<FieldResult<number[]>> {
    const dimension = EMBEDDING_DIMENSIONS[kind];
    try {
      if (!text) {
        throw new FieldRejected("empty_input", "empty text");
      }
      const vector = await this.embeddings.embed(text, kind);
      if (vector.length !== dimension) {
        throw new FieldRejected("invalid_output", `expected ${dimension} values, got ${vector.length}`);
      }
      if (vector.some((value) => !Number.isFinite(value))) {
        throw new FieldRejected("invalid_output", "non-finite values");
      }
      return { status: "ok", value: vector };
    } catch (error) {
      return { status: "fallback", value: zeroVector(dimension), kind: fallbackKindOf(error), reason: stringifyError(error) };
    }
  }

  private async wordVectorField(text: string): Promise<FieldResult<number[]>> {
    try {
      return { status: "ok", value: await averageWordVectors(this.wordVectors, text) };
    } catch (error) {
      return {
        status: "fallback",
        value: zeroVector(this.wordVectors.dimension),
        kind: fallbackKindOf(error),
        reason: stringifyError(error),
      };
    }
  }
}

function scalarField(value: number): FieldResult<number> {
  if (Number.isFinite(value)) {
    return { status: "ok", value };
  }
  return { status: "fallback", value: 0, kind: "invalid_output", reason: `non-finite value ${value}` };
}
