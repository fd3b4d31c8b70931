import {
  BadRequestException,
  ForbiddenException,
  Inject,
  Injectable,
  Logger,
  NotFoundException,
  ServiceUnavailableException,
} from "@nestjs/common";
import { SEARCH_CONFIG, type SearchConfig } from "../config/search-config";
import { calibrateDisplayScores } from "../scoring/display-score";
import { RerankerService } from "../scoring/reranker.service";
import { ScoreFusionService } from "../scoring/score-fusion.service";
import { VisualIntentRouter } from "../scoring/visual-intent-router.service";
import {
  InvalidWeightVectorError,
  weightsToRecord,
} from "../scoring/weight-model";
import {
  disableChannels,
  resolveWeights,
} from "../scoring/weight-resolution";
import {
  type Candidate,
  DENSE_CHANNELS,
  type RetrievedScene,
  VISUAL_CHANNEL,
  type VisualMode,
  type WeightVector,
} from "../shared/search-types";
import {
  VISUAL_SCORER,
  type VisualScorer,
} from "../visual-scoring/visual-scoring.client";
import {
  CANDIDATE_RETRIEVER,
  type CandidateRetriever,
  type RetrievalRequest,
} from "./candidate-retriever";
import type {
  SearchRequestDto,
  SearchResponseDto,
  SearchResultDto,
} from "./dto/search.dto";
import { TEXT_EMBEDDER, type TextEmbedder } from "./text-embedder";

interface StageTimings {
  embedMs: number;
  retrieveMs: number;
  rerankMs: number;
}

const errorMessage = (error: unknown): string =>
  error instanceof Error ? error.message : String(error);

@Injectable()
export class SearchService {
  private readonly logger = new Logger(SearchService.name);

  constructor(
    private readonly router: VisualIntentRouter,
    private readonly fusion: ScoreFusionService,
    private readonly reranker: RerankerService,
    @Inject(SEARCH_CONFIG) private readonly config: SearchConfig,
    @Inject(TEXT_EMBEDDER) private readonly textEmbedder: TextEmbedder,
    @Inject(VISUAL_SCORER) private readonly visualScorer: VisualScorer,
    @Inject(CANDIDATE_RETRIEVER)
    private readonly retriever: CandidateRetriever,
  ) {}

  /**
   * Route the query, resolve weights, retrieve, fuse and (in rerank mode)
   * rerank. The visual service and the text embedder may fail without
   * failing the request; the index may not.
   */
  async search(
    request: SearchRequestDto,
    ownerId?: string,
  ): Promise<SearchResponseDto> {
    const startTime = Date.now();
    const timings: StageTimings = { embedMs: 0, retrieveMs: 0, rerankMs: 0 };

    const decision = this.router.route(
      request.query,
      request.visualMode ?? this.config.visualMode,
    );
    let mode: VisualMode = decision.mode;
    let reason = decision.reason;

    if (!this.config.multiDenseEnabled && mode !== "skip") {
      mode = "skip";
      reason = "visual channel disabled";
    }

    let weights = this.resolveRequestWeights(request, mode);

    if (request.videoId !== undefined) {
      await this.assertVideoAccess(request.videoId, ownerId);
    }

    const embedStart = Date.now();
    const [denseEmbedding, visualEmbedding] = await Promise.all([
      this.embedQuery(request.query),
      mode === "skip"
        ? Promise.resolve(null)
        : this.embedVisualQuery(request.query),
    ]);
    timings.embedMs = Date.now() - embedStart;

    if (mode !== "skip" && visualEmbedding === null) {
      reason = `visual scoring unavailable (${mode}: ${reason})`;
      mode = "skip";
    }

    if (denseEmbedding === null) {
      weights = this.withoutDenseChannels(weights, mode);
      const channels = weights.map((channel) => channel.name).join("+");
      this.logger.warn(
        `Text embedding unavailable, falling back to ${channels} retrieval`,
      );
    } else if (
      mode === "skip" &&
      weights.some((channel) => channel.name === VISUAL_CHANNEL)
    ) {
      weights = disableChannels(weights, [VISUAL_CHANNEL]);
    }

    const fetchLimit =
      mode === "rerank"
        ? Math.max(request.limit, this.config.rerank.candidatePoolSize)
        : request.limit;

    const retrieveStart = Date.now();
    const scenes = await this.retrieve({
      queryText: request.query,
      denseEmbedding,
      visualEmbedding: mode === "recall" ? visualEmbedding : null,
      weights,
      threshold: request.threshold,
      limit: fetchLimit,
      videoId: request.videoId,
      ownerId,
    });
    timings.retrieveMs = Date.now() - retrieveStart;

    let candidates = this.fusion.fuseCandidates(
      scenes,
      weights,
      mode,
      this.config.fusion,
    );

    if (mode === "rerank") {
      const rerankStart = Date.now();
      const outcome = await this.reranker.rerank(
        candidates,
        visualEmbedding,
        mode,
      );
      timings.rerankMs = Date.now() - rerankStart;
      candidates = outcome.candidates;

      if (outcome.skipped) {
        const skipReason = outcome.skipReason ?? "unknown";
        reason = `${reason}; rerank skipped: ${skipReason}`;
      }
    }

    const results = this.toResults(candidates.slice(0, request.limit));
    const latencyMs = Date.now() - startTime;

    this.logger.log(
      `Search completed: mode=${mode} ` +
        `results=${results.length}/${scenes.length} latency=${latencyMs}ms ` +
        `(embed=${timings.embedMs}ms retrieve=${timings.retrieveMs}ms ` +
        `rerank=${timings.rerankMs}ms)`,
    );

    return {
      query: request.query,
      results,
      total: results.length,
      latency_ms: latencyMs,
      visual_mode_used: mode,
      visual_mode_reason: reason,
      weights_applied: weightsToRecord(weights),
    };
  }

  /**
   * 404 for an unknown video, 403 for another caller's video. Without an
   * authenticated caller only existence is checked.
   */
  private async assertVideoAccess(
    videoId: string,
    ownerId: string | undefined,
  ): Promise<void> {
    let videoOwner: string | null;
    try {
      videoOwner = await this.retriever.findVideoOwner(videoId);
    } catch (error) {
      this.logger.error(`Video lookup failed: ${errorMessage(error)}`);
      throw new ServiceUnavailableException("Search index is unavailable");
    }

    if (videoOwner === null) {
      throw new NotFoundException(`Video ${videoId} not found`);
    }
    if (ownerId !== undefined && videoOwner !== ownerId) {
      throw new ForbiddenException("Not authorized to search this video");
    }
  }

  private resolveRequestWeights(
    request: SearchRequestDto,
    mode: VisualMode,
  ): WeightVector {
    try {
      const resolution = resolveWeights({
        requestWeights: request.channelWeights,
        defaults: this.config.defaultWeights,
        mode,
      });
      for (const warning of resolution.warnings) {
        this.logger.warn(warning);
      }
      return resolution.weights;
    } catch (error) {
      if (error instanceof InvalidWeightVectorError) {
        throw new BadRequestException(
          `Invalid channel_weights: ${error.message}`,
        );
      }
      throw error;
    }
  }

  private withoutDenseChannels(
    weights: WeightVector,
    mode: VisualMode,
  ): WeightVector {
    const disabled: string[] = [...DENSE_CHANNELS];
    if (mode === "skip") disabled.push(VISUAL_CHANNEL);

    try {
      return disableChannels(weights, disabled);
    } catch (error) {
      throw new ServiceUnavailableException(
        "No searchable channel left without text embeddings: " +
          errorMessage(error),
      );
    }
  }

  private async embedQuery(text: string): Promise<number[] | null> {
    try {
      return await this.textEmbedder.embed(text);
    } catch (error) {
      this.logger.warn(`Text embedding failed: ${errorMessage(error)}`);
      return null;
    }
  }

  private async embedVisualQuery(text: string): Promise<number[] | null> {
    try {
      return await this.visualScorer.embed(text);
    } catch (error) {
      this.logger.warn(
        "Visual embedding failed, continuing without CLIP: " +
          errorMessage(error),
      );
      return null;
    }
  }

  private async retrieve(
    request: RetrievalRequest,
  ): Promise<RetrievedScene[]> {
    try {
      return await this.retriever.retrieve(request);
    } catch (error) {
      this.logger.error(`Candidate retrieval failed: ${errorMessage(error)}`);
      throw new ServiceUnavailableException("Search index is unavailable");
    }
  }

  private toResults(candidates: readonly Candidate[]): SearchResultDto[] {
    const displayScores = calibrateDisplayScores(
      candidates.map((c) => c.finalScore),
    );

    return candidates.map((candidate, i) => ({
      id: candidate.scene.id,
      video_id: candidate.scene.videoId,
      index: candidate.scene.index,
      start_s: candidate.scene.startS,
      end_s: candidate.scene.endS,
      transcript_segment: candidate.scene.transcriptSegment,
      visual_summary: candidate.scene.visualSummary,
      thumbnail_url: candidate.scene.thumbnailUrl,
      tags: candidate.scene.tags,
      score: candidate.finalScore,
      display_score: displayScores[i],
      base_score: candidate.baseScore,
      visual_score:
        candidate.visualScore ??
        candidate.channelScores[VISUAL_CHANNEL] ??
        null,
    }));
  }
}
