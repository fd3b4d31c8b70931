import { describe, expect, it } from "@jest/globals";
import { parseEnv } from "@repo/env";
import { buildSearchConfig } from "./search-config";

describe("buildSearchConfig", () => {
  it("should drop the visual channel when multi dense is disabled", () => {
    const config = buildSearchConfig(
      parseEnv({ MULTI_DENSE_ENABLED: "false" }),
    );

    expect(config.defaultWeights.map((w) => w.name)).toEqual([
      "transcript",
      "summary",
      "lexical",
    ]);
    // 0.45 / 0.75, 0.15 / 0.75, 0.15 / 0.75
    expect(config.defaultWeights[0].value).toBeCloseTo(0.6, 10);
    expect(config.defaultWeights[1].value).toBeCloseTo(0.2, 10);
    expect(config.defaultWeights[2].value).toBeCloseTo(0.2, 10);
  });

  it("should keep the configured weights when they already sum to 1", () => {
    const config = buildSearchConfig(
      parseEnv({ MULTI_DENSE_ENABLED: "true" }),
    );

    expect(config.defaultWeights).toEqual([
      { name: "transcript", value: 0.45, locked: false },
      { name: "summary", value: 0.15, locked: false },
      { name: "lexical", value: 0.15, locked: false },
      { name: "visual", value: 0.25, locked: false },
    ]);
  });

  it("should map the visual service settings", () => {
    const config = buildSearchConfig(
      parseEnv({
        CLIP_SERVICE_URL: "http://clip.internal:8000/",
        CLIP_SERVICE_SECRET: "test-secret",
        CLIP_TEXT_EMBEDDING_TIMEOUT_S: "2.5",
        CLIP_TEXT_EMBEDDING_MAX_RETRIES: "3",
      }),
    );

    expect(config.visualService).toEqual({
      baseUrl: "http://clip.internal:8000",
      secret: "test-secret",
      timeoutMs: 2500,
      maxRetries: 3,
      retryBaseDelayMs: 100,
    });
    expect(config.rerank).toEqual({
      candidatePoolSize: 500,
      clipWeight: 0.3,
      minScoreRange: 0.05,
    });
    expect(config.visualMode).toBe("auto");
    expect(config.fusion).toEqual({ method: "weighted", rrfK: 60 });
  });

  it("should select reciprocal rank fusion", () => {
    const config = buildSearchConfig(
      parseEnv({ FUSION_METHOD: "rrf", RRF_K: "20" }),
    );

    expect(config.fusion).toEqual({ method: "rrf", rrfK: 20 });
  });

  it("should be frozen", () => {
    const config = buildSearchConfig(parseEnv({}));

    expect(Object.isFrozen(config)).toBe(true);
    expect(Object.isFrozen(config.rerank)).toBe(true);
    expect(Object.isFrozen(config.defaultWeights[0])).toBe(true);
  });
});
