import { beforeEach, describe, expect, it, jest } from "@jest/globals";
import {
  BadRequestException,
  ForbiddenException,
  NotFoundException,
  ServiceUnavailableException,
} from "@nestjs/common";
import { Test, type TestingModule } from "@nestjs/testing";
import { parseEnv } from "@repo/env";
import { SEARCH_CONFIG, buildSearchConfig } from "../config/search-config";
import { RerankerService } from "../scoring/reranker.service";
import { ScoreFusionService } from "../scoring/score-fusion.service";
import { VisualIntentRouter } from "../scoring/visual-intent-router.service";
import type { ChannelScores, RetrievedScene } from "../shared/search-types";
import {
  VISUAL_SCORER,
  type VisualScorer,
} from "../visual-scoring/visual-scoring.client";
import {
  VisualScoringTimeoutError,
} from "../visual-scoring/visual-scoring.errors";
import {
  CANDIDATE_RETRIEVER,
  type CandidateRetriever,
} from "./candidate-retriever";
import { SearchRequestDto } from "./dto/search.dto";
import { SearchService } from "./search.service";
import { TEXT_EMBEDDER, type TextEmbedder } from "./text-embedder";

const retrieved = (
  id: string,
  channelScores: ChannelScores,
): RetrievedScene => ({
  scene: {
    id,
    videoId: "video-1",
    index: 0,
    startS: 0,
    endS: 5,
    transcriptSegment: null,
    visualSummary: null,
    thumbnailUrl: null,
    tags: ["street"],
  },
  channelScores,
});

const searchRequest = (
  fields: Partial<SearchRequestDto>,
): SearchRequestDto => Object.assign(new SearchRequestDto(), fields);

describe("SearchService", () => {
  let service: SearchService;

  const textEmbed = jest.fn<TextEmbedder["embed"]>();
  const visualEmbed = jest.fn<VisualScorer["embed"]>();
  const batchScore = jest.fn<VisualScorer["batchScore"]>();
  const retrieve = jest.fn<CandidateRetriever["retrieve"]>();
  const findVideoOwner = jest.fn<CandidateRetriever["findVideoOwner"]>();

  const denseVector = [0.4, 0.5];
  const clipVector = [0.7, 0.1];

  beforeEach(async () => {
    jest.clearAllMocks();
    textEmbed.mockResolvedValue(denseVector);
    visualEmbed.mockResolvedValue(clipVector);
    batchScore.mockResolvedValue(new Map());
    retrieve.mockResolvedValue([]);
    findVideoOwner.mockResolvedValue("user-1");

    const module: TestingModule = await Test.createTestingModule({
      providers: [
        SearchService,
        VisualIntentRouter,
        ScoreFusionService,
        RerankerService,
        {
          provide: SEARCH_CONFIG,
          useValue: buildSearchConfig(
            parseEnv({ MULTI_DENSE_ENABLED: "true" }),
          ),
        },
        { provide: TEXT_EMBEDDER, useValue: { embed: textEmbed } },
        {
          provide: VISUAL_SCORER,
          useValue: { embed: visualEmbed, batchScore },
        },
        {
          provide: CANDIDATE_RETRIEVER,
          useValue: { retrieve, findVideoOwner },
        },
      ],
    }).compile();

    service = module.get<SearchService>(SearchService);
  });

  describe("recall mode", () => {
    it("should retrieve and fuse with the visual channel", async () => {
      retrieve.mockResolvedValue([
        retrieved("s2", {
          transcript: 0.8,
          summary: 0.2,
          lexical: 0.5,
          visual: 0.1,
        }),
        retrieved("s1", {
          transcript: 0.5,
          summary: 0.5,
          lexical: 0,
          visual: 0.9,
        }),
      ]);

      const response = await service.search(
        searchRequest({ query: "red car" }),
        "user-1",
      );

      expect(retrieve).toHaveBeenCalledWith({
        queryText: "red car",
        denseEmbedding: denseVector,
        visualEmbedding: clipVector,
        weights: [
          { name: "transcript", value: 0.45, locked: false },
          { name: "summary", value: 0.15, locked: false },
          { name: "lexical", value: 0.15, locked: false },
          { name: "visual", value: 0.25, locked: false },
        ],
        threshold: 0.2,
        limit: 10,
        videoId: undefined,
        ownerId: "user-1",
      });
      expect(batchScore).not.toHaveBeenCalled();
      expect(findVideoOwner).not.toHaveBeenCalled();

      expect(response.visual_mode_used).toBe("recall");
      expect(response.visual_mode_reason).toBe(
        "strong visual intent: red, car",
      );
      expect(response.results.map((r) => r.id)).toEqual(["s1", "s2"]);
      expect(response.results[0].score).toBeCloseTo(0.525, 10);
      expect(response.results[1].score).toBeCloseTo(0.49, 10);
      expect(response.results[0].visual_score).toBe(0.9);
      expect(response.results[0].display_score).toBeCloseTo(
        1 - Math.exp(-3),
        6,
      );
      expect(response.results[1].display_score).toBe(0);
      expect(response.total).toBe(2);
    });

    it("should fall back to base channels when the visual embedding fails", async () => {
      visualEmbed.mockRejectedValue(new VisualScoringTimeoutError("timed out"));

      const response = await service.search(
        searchRequest({ query: "red car" }),
      );

      expect(response.visual_mode_used).toBe("skip");
      expect(response.visual_mode_reason).toBe(
        "visual scoring unavailable (recall: strong visual intent: red, car)",
      );
      const [request] = retrieve.mock.calls[0];
      expect(request.visualEmbedding).toBeNull();
      expect(request.weights.map((w) => w.name)).toEqual([
        "transcript",
        "summary",
        "lexical",
      ]);
      expect(request.weights[0].value).toBeCloseTo(0.6, 10);
    });
  });

  describe("skip mode", () => {
    it("should not call the visual service for dialogue queries", async () => {
      retrieve.mockResolvedValue([
        retrieved("s1", { transcript: 0.9, summary: 0.1, lexical: 0.3 }),
      ]);

      const response = await service.search(
        searchRequest({ query: "he says hello" }),
      );

      expect(visualEmbed).not.toHaveBeenCalled();
      expect(batchScore).not.toHaveBeenCalled();
      expect(response.visual_mode_used).toBe("skip");
      expect(response.visual_mode_reason).toBe("he says");
      expect(Object.keys(response.weights_applied)).toEqual([
        "transcript",
        "summary",
        "lexical",
      ]);
      expect(response.weights_applied.transcript).toBeCloseTo(0.6, 10);
      expect(response.results[0].visual_score).toBeNull();
      expect(response.results[0].display_score).toBe(0.5);
    });

    it("should honour a per-request visual mode", async () => {
      const response = await service.search(
        searchRequest({ query: "red car", visualMode: "skip" }),
      );

      expect(visualEmbed).not.toHaveBeenCalled();
      expect(response.visual_mode_used).toBe("skip");
      expect(response.visual_mode_reason).toBe("forced");
    });

    it("should search lexical-only when the text embedder fails", async () => {
      textEmbed.mockRejectedValue(
        new Error("Gemini text embeddings are disabled"),
      );

      const response = await service.search(
        searchRequest({ query: "he says hello" }),
      );

      const [request] = retrieve.mock.calls[0];
      expect(request.denseEmbedding).toBeNull();
      expect(Object.keys(response.weights_applied)).toEqual(["lexical"]);
      expect(response.weights_applied.lexical).toBeCloseTo(1, 10);
    });
  });

  describe("rerank mode", () => {
    it("should fetch the candidate pool and rerank with CLIP scores", async () => {
      retrieve.mockResolvedValue([
        retrieved("a", { transcript: 0.8, summary: 0.8, lexical: 0.5 }),
        retrieved("b", { transcript: 0.6, summary: 0.6, lexical: 0.5 }),
      ]);
      batchScore.mockResolvedValue(
        new Map([
          ["a", 0.1],
          ["b", 0.5],
        ]),
      );

      const response = await service.search(
        searchRequest({ query: "tteokbokki scene", limit: 5 }),
      );

      const [request] = retrieve.mock.calls[0];
      expect(request.limit).toBe(500);
      expect(request.visualEmbedding).toBeNull();
      expect(batchScore).toHaveBeenCalledWith(clipVector, ["a", "b"]);

      expect(response.visual_mode_used).toBe("rerank");
      expect(response.visual_mode_reason).toBe(
        "weak visual intent: tteokbokki, scene",
      );
      expect(response.results.map((r) => [r.id, r.visual_score])).toEqual([
        ["b", 0.5],
        ["a", 0.1],
      ]);
      // 0.7 * 0.435 + 0.3 * 1
      expect(response.results[0].score).toBeCloseTo(0.6045, 10);
      expect(response.results[0].base_score).toBeCloseTo(0.435, 10);
    });

    it("should keep the base ranking when batch scoring fails", async () => {
      retrieve.mockResolvedValue([
        retrieved("a", { transcript: 0.8, summary: 0.8, lexical: 0.5 }),
        retrieved("b", { transcript: 0.6, summary: 0.6, lexical: 0.5 }),
      ]);
      batchScore.mockRejectedValue(new VisualScoringTimeoutError("timed out"));

      const response = await service.search(
        searchRequest({ query: "tteokbokki scene" }),
      );

      expect(response.visual_mode_used).toBe("rerank");
      expect(response.visual_mode_reason).toBe(
        "weak visual intent: tteokbokki, scene; rerank skipped: visual scoring failed",
      );
      expect(response.results.map((r) => r.id)).toEqual(["a", "b"]);
    });

    it("should trim the reranked pool to the requested limit", async () => {
      retrieve.mockResolvedValue([
        retrieved("a", { transcript: 0.8 }),
        retrieved("b", { transcript: 0.6 }),
        retrieved("c", { transcript: 0.4 }),
      ]);
      batchScore.mockResolvedValue(new Map());

      const response = await service.search(
        searchRequest({ query: "tteokbokki scene", limit: 2 }),
      );

      expect(response.results.map((r) => r.id)).toEqual(["a", "b"]);
      expect(response.total).toBe(2);
    });
  });

  describe("errors", () => {
    it("should reject invalid channel weights", async () => {
      await expect(
        service.search(
          searchRequest({ query: "red car", channelWeights: { color: 1 } }),
        ),
      ).rejects.toBeInstanceOf(BadRequestException);
      expect(retrieve).not.toHaveBeenCalled();
    });

    it("should report an unavailable index", async () => {
      retrieve.mockRejectedValue(new Error("connection refused"));

      await expect(
        service.search(searchRequest({ query: "red car" })),
      ).rejects.toBeInstanceOf(ServiceUnavailableException);
    });
  });

  describe("video filter", () => {
    const videoId = "3f1c1f7e-8d7a-4c8e-9d4b-2a6f5e7c9b10";

    it("should search a video the caller owns", async () => {
      await service.search(
        searchRequest({ query: "red car", videoId }),
        "user-1",
      );

      expect(findVideoOwner).toHaveBeenCalledWith(videoId);
      expect(retrieve.mock.calls[0][0].videoId).toBe(videoId);
    });

    it("should report an unknown video as not found", async () => {
      findVideoOwner.mockResolvedValue(null);

      await expect(
        service.search(searchRequest({ query: "red car", videoId }), "user-1"),
      ).rejects.toBeInstanceOf(NotFoundException);
      expect(retrieve).not.toHaveBeenCalled();
    });

    it("should forbid searching another caller's video", async () => {
      findVideoOwner.mockResolvedValue("user-2");

      await expect(
        service.search(searchRequest({ query: "red car", videoId }), "user-1"),
      ).rejects.toBeInstanceOf(ForbiddenException);
      expect(retrieve).not.toHaveBeenCalled();
    });

    it("should only check existence without a caller", async () => {
      findVideoOwner.mockResolvedValue("user-2");

      await service.search(searchRequest({ query: "red car", videoId }));

      expect(retrieve).toHaveBeenCalledTimes(1);
    });
  });
});
