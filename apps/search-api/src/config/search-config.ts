import { Global, Module } from "@nestjs/common";
import type { Env } from "@repo/env";
import {
  type VisualModeSetting,
  type WeightVector,
  VISUAL_CHANNEL,
} from "../shared/search-types";
import type { FusionOptions } from "../scoring/score-fusion.service";
import { createWeightVector, normalizeWeights } from "../scoring/weight-model";

export const SEARCH_CONFIG = "SEARCH_CONFIG";

export interface VisualServiceConfig {
  baseUrl: string;
  secret: string;
  timeoutMs: number;
  maxRetries: number;
  /** Base delay for exponential backoff between retries */
  retryBaseDelayMs: number;
}

export interface SearchConfig {
  visualMode: VisualModeSetting;
  multiDenseEnabled: boolean;
  /** Normalized default weights; visual is absent when multi dense is off */
  defaultWeights: WeightVector;
  rerank: {
    candidatePoolSize: number;
    clipWeight: number;
    minScoreRange: number;
  };
  fusion: FusionOptions;
  visualService: VisualServiceConfig;
}

const deepFreeze = <T extends object>(value: T): Readonly<T> => {
  for (const nested of Object.values(value)) {
    const freezable = nested !== null && typeof nested === "object";
    if (freezable && !Object.isFrozen(nested)) {
      deepFreeze(nested);
    }
  }
  return Object.freeze(value);
};

export function buildSearchConfig(env: Env): Readonly<SearchConfig> {
  const entries = [
    { name: "transcript", value: env.WEIGHT_TRANSCRIPT },
    { name: "summary", value: env.WEIGHT_SUMMARY },
    { name: "lexical", value: env.WEIGHT_LEXICAL },
    { name: "visual", value: env.WEIGHT_VISUAL },
  ].filter(
    (entry) => env.MULTI_DENSE_ENABLED || entry.name !== VISUAL_CHANNEL,
  );

  return deepFreeze({
    visualMode: env.VISUAL_MODE,
    multiDenseEnabled: env.MULTI_DENSE_ENABLED,
    defaultWeights: normalizeWeights(createWeightVector(entries)),
    rerank: {
      candidatePoolSize: env.RERANK_CANDIDATE_POOL_SIZE,
      clipWeight: env.RERANK_CLIP_WEIGHT,
      minScoreRange: env.RERANK_MIN_SCORE_RANGE,
    },
    fusion: {
      method: env.FUSION_METHOD,
      rrfK: env.RRF_K,
    },
    visualService: {
      baseUrl: env.CLIP_SERVICE_URL.replace(/\/+$/, ""),
      secret: env.CLIP_SERVICE_SECRET,
      timeoutMs: Math.round(env.CLIP_TEXT_EMBEDDING_TIMEOUT_S * 1000),
      maxRetries: env.CLIP_TEXT_EMBEDDING_MAX_RETRIES,
      retryBaseDelayMs: 100,
    },
  });
}

@Global()
@Module({
  providers: [
    {
      provide: SEARCH_CONFIG,
      useFactory: async (): Promise<Readonly<SearchConfig>> => {
        const { env } = await import("@repo/env");
        return buildSearchConfig(env);
      },
    },
  ],
  exports: [SEARCH_CONFIG],
})
export class SearchConfigModule {}
