import { Inject, Injectable, Logger } from "@nestjs/common";
import { SEARCH_CONFIG, type SearchConfig } from "../config/search-config";
import type { Candidate, VisualMode } from "../shared/search-types";
import {
  VISUAL_SCORER,
  type VisualScorer,
} from "../visual-scoring/visual-scoring.client";

export interface RerankOptions {
  clipWeight?: number;
  minScoreRange?: number;
}

export interface RerankOutcome {
  candidates: Candidate[];
  skipped: boolean;
  skipReason: string | null;
  /** [min, max] of the visual scores returned for the pool */
  scoreRange: [number, number] | null;
  weightUsed: number;
  candidatesScored: number;
}

/**
 * Second-stage reranking with CLIP similarity: one batched scoring call for
 * the whole pool, min-max normalized and blended into the base score.
 */
@Injectable()
export class RerankerService {
  private readonly logger = new Logger(RerankerService.name);

  constructor(
    @Inject(VISUAL_SCORER) private readonly visualScorer: VisualScorer,
    @Inject(SEARCH_CONFIG) private readonly config: SearchConfig,
  ) {}

  async rerank(
    pool: readonly Candidate[],
    queryEmbedding: readonly number[] | null,
    mode: VisualMode,
    options: RerankOptions = {},
  ): Promise<RerankOutcome> {
    const clipWeight = options.clipWeight ?? this.config.rerank.clipWeight;
    const minScoreRange =
      options.minScoreRange ?? this.config.rerank.minScoreRange;

    if (mode !== "rerank") return this.passThrough(pool, `mode is ${mode}`);
    if (queryEmbedding === null || queryEmbedding.length === 0) {
      return this.passThrough(pool, "no query embedding");
    }
    if (pool.length === 0) {
      return this.passThrough(pool, "empty candidate pool");
    }

    let scores: Map<string, number>;
    try {
      scores = await this.visualScorer.batchScore(
        queryEmbedding,
        pool.map((candidate) => candidate.sceneId),
      );
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);
      this.logger.warn(
        `Visual batch scoring failed, keeping base ranking: ${message}`,
      );
      return this.passThrough(pool, "visual scoring failed");
    }

    if (scores.size === 0) {
      return this.passThrough(pool, "no visual scores returned");
    }

    const values = [...scores.values()];
    const min = Math.min(...values);
    const max = Math.max(...values);
    const range = max - min;

    const withVisual = pool.map((candidate) => ({
      ...candidate,
      visualScore: scores.get(candidate.sceneId),
      finalScore: candidate.baseScore,
    }));

    // A single score or identical scores leave nothing to normalize against.
    if (range <= 0 || range < minScoreRange) {
      this.logger.debug(
        `Visual scores flat (range=${range.toFixed(4)} < ${minScoreRange}), ` +
          "keeping base ranking",
      );
      return {
        candidates: withVisual,
        skipped: true,
        skipReason: `flat visual scores (range ${range.toFixed(4)})`,
        scoreRange: [min, max],
        weightUsed: 0,
        candidatesScored: scores.size,
      };
    }

    // Scenes the visual service does not know contribute 0.
    const blended = withVisual
      .map((candidate, position) => {
        const normalized =
          candidate.visualScore === undefined
            ? 0
            : (candidate.visualScore - min) / range;
        const finalScore =
          (1 - clipWeight) * candidate.baseScore + clipWeight * normalized;
        return { candidate: { ...candidate, finalScore }, position };
      })
      .sort(
        (a, b) =>
          b.candidate.finalScore - a.candidate.finalScore ||
          a.position - b.position,
      )
      .map(({ candidate }) => candidate);

    this.logger.debug(
      `Reranked ${pool.length} candidates (${scores.size} scored, ` +
        `range=[${min.toFixed(4)}, ${max.toFixed(4)}], weight=${clipWeight})`,
    );

    return {
      candidates: blended,
      skipped: false,
      skipReason: null,
      scoreRange: [min, max],
      weightUsed: clipWeight,
      candidatesScored: scores.size,
    };
  }

  private passThrough(
    pool: readonly Candidate[],
    reason: string,
  ): RerankOutcome {
    return {
      candidates: pool.map((candidate) => ({
        ...candidate,
        finalScore: candidate.baseScore,
      })),
      skipped: true,
      skipReason: reason,
      scoreRange: null,
      weightUsed: 0,
      candidatesScored: 0,
    };
  }
}
