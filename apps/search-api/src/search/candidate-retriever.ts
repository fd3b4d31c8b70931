import { Inject, Injectable, Logger } from "@nestjs/common";
import type { Pool } from "pg";
import { PG_POOL } from "../database/database.module";
import type {
  ChannelScores,
  RetrievedScene,
  WeightVector,
} from "../shared/search-types";
import { getWeight } from "../scoring/weight-model";

export const CANDIDATE_RETRIEVER = "CANDIDATE_RETRIEVER";

export interface RetrievalRequest {
  queryText: string;
  /** Query embedding for the transcript and summary channels */
  denseEmbedding: number[] | null;
  /** CLIP query embedding, only passed when visual takes part in retrieval */
  visualEmbedding: number[] | null;
  /** Channels to score; anything absent contributes nothing */
  weights: WeightVector;
  threshold: number;
  limit: number;
  videoId?: string;
  ownerId?: string;
}

/**
 * Top-K scene retrieval from the index by weighted channel similarity.
 */
export interface CandidateRetriever {
  retrieve(request: RetrievalRequest): Promise<RetrievedScene[]>;
  /** Owner of a video, or null when there is no such video */
  findVideoOwner(videoId: string): Promise<string | null>;
}

interface SceneRow {
  id: string;
  video_id: string;
  index: number;
  start_s: number;
  end_s: number;
  transcript_segment: string | null;
  visual_summary: string | null;
  thumbnail_url: string | null;
  tags: string[] | null;
  transcript_score: number;
  summary_score: number;
  lexical_score: number;
  visual_score: number;
}

export const RETRIEVE_SCENES_SQL = `
  WITH scored AS (
    SELECT
      vs.id,
      vs.video_id,
      vs.index,
      vs.start_s,
      vs.end_s,
      vs.transcript_segment,
      vs.visual_summary,
      vs.thumbnail_url,
      vs.tags,
      COALESCE(1 - (vs.embedding_transcript <=> $1::vector), 0)::float8
        AS transcript_score,
      COALESCE(1 - (vs.embedding_summary <=> $1::vector), 0)::float8
        AS summary_score,
      LEAST(1, ts_rank_cd(vs.search_tsv, plainto_tsquery('simple', $2)))::float8
        AS lexical_score,
      COALESCE(1 - (vs.embedding_visual_clip <=> $3::vector), 0)::float8
        AS visual_score
    FROM video_scenes vs
    INNER JOIN videos v ON vs.video_id = v.id
    WHERE ($4::uuid IS NULL OR v.owner_id = $4::uuid)
      AND ($5::uuid IS NULL OR vs.video_id = $5::uuid)
  )
  SELECT *
  FROM scored
  WHERE GREATEST(transcript_score, summary_score, visual_score) >= $6::float8
     OR lexical_score > 0
  ORDER BY
    $7::float8 * transcript_score
      + $8::float8 * summary_score
      + $9::float8 * lexical_score
      + $10::float8 * visual_score DESC,
    id
  LIMIT $11
`;

export const VIDEO_OWNER_SQL =
  "SELECT owner_id FROM videos WHERE id = $1::uuid";

@Injectable()
export class PgCandidateRetriever implements CandidateRetriever {
  private readonly logger = new Logger(PgCandidateRetriever.name);

  constructor(@Inject(PG_POOL) private readonly pool: Pool) {}

  async retrieve(request: RetrievalRequest): Promise<RetrievedScene[]> {
    const { weights } = request;
    const has = (name: string) =>
      weights.some((channel) => channel.name === name);

    const denseEmbedding =
      request.denseEmbedding && (has("transcript") || has("summary"))
        ? JSON.stringify(request.denseEmbedding)
        : null;
    const visualEmbedding =
      request.visualEmbedding && has("visual")
        ? JSON.stringify(request.visualEmbedding)
        : null;

    const startTime = Date.now();
    const { rows } = await this.pool.query<SceneRow>(RETRIEVE_SCENES_SQL, [
      denseEmbedding,
      request.queryText,
      visualEmbedding,
      request.ownerId ?? null,
      request.videoId ?? null,
      request.threshold,
      getWeight(weights, "transcript"),
      getWeight(weights, "summary"),
      getWeight(weights, "lexical"),
      getWeight(weights, "visual"),
      request.limit,
    ]);

    this.logger.debug(
      `Retrieved ${rows.length} scenes in ${Date.now() - startTime}ms ` +
        `(limit=${request.limit}, dense=${denseEmbedding !== null}, ` +
        `visual=${visualEmbedding !== null})`,
    );

    return rows.map((row) => ({
      scene: {
        id: row.id,
        videoId: row.video_id,
        index: row.index,
        startS: row.start_s,
        endS: row.end_s,
        transcriptSegment: row.transcript_segment,
        visualSummary: row.visual_summary,
        thumbnailUrl: row.thumbnail_url,
        tags: row.tags ?? [],
      },
      channelScores: this.toChannelScores(row, weights, {
        dense: denseEmbedding !== null,
        visual: visualEmbedding !== null,
      }),
    }));
  }

  async findVideoOwner(videoId: string): Promise<string | null> {
    const { rows } = await this.pool.query<{ owner_id: string }>(
      VIDEO_OWNER_SQL,
      [videoId],
    );
    return rows[0]?.owner_id ?? null;
  }

  /** Scores for the weighted channels that were actually computed */
  private toChannelScores(
    row: SceneRow,
    weights: WeightVector,
    computed: { dense: boolean; visual: boolean },
  ): ChannelScores {
    const scores = new Map<string, number>([["lexical", row.lexical_score]]);
    if (computed.dense) {
      scores.set("transcript", row.transcript_score);
      scores.set("summary", row.summary_score);
    }
    if (computed.visual) {
      scores.set("visual", row.visual_score);
    }

    const result: Record<string, number> = {};
    for (const { name } of weights) {
      const score = scores.get(name);
      if (score !== undefined) result[name] = score;
    }
    return result;
  }
}
