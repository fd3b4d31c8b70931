import { beforeEach, describe, expect, it } from "@jest/globals";
import { Test, type TestingModule } from "@nestjs/testing";
import {
  VisualIntentRouter,
  buildLexiconTable,
  normalizeText,
} from "./visual-intent-router.service";

describe("VisualIntentRouter", () => {
  let router: VisualIntentRouter;

  beforeEach(async () => {
    const module: TestingModule = await Test.createTestingModule({
      providers: [VisualIntentRouter],
    }).compile();

    router = module.get<VisualIntentRouter>(VisualIntentRouter);
  });

  describe("auto routing", () => {
    it.each([
      ["red car", "recall"],
      ["person walking", "recall"],
      ["he says hello", "skip"],
      ["the quote about love", "skip"],
      ["tteokbokki scene", "rerank"],
      ["", "skip"],
    ])('should route "%s" to %s', (query, mode) => {
      expect(router.route(query, "auto").mode).toBe(mode);
    });

    it("should report the matched speech keyword as the reason", () => {
      expect(router.route("the quote about love", "auto")).toEqual({
        mode: "skip",
        reason: "quote",
        matchedTerms: ["quote"],
        strong: false,
      });
    });

    it("should prefer speech phrases when naming the reason", () => {
      const decision = router.route("he says hello", "auto");
      expect(decision.reason).toBe("he says");
      expect(decision.matchedTerms).toEqual(["he says", "says"]);
    });

    it("should give speech precedence over visual terms", () => {
      const decision = router.route(
        "the red car where she said goodbye",
        "auto",
      );
      expect(decision.mode).toBe("skip");
      expect(decision.reason).toBe("said");
    });

    it("should treat a long question as a dialogue search", () => {
      const query = "Why did they cancel the launch last year?";

      expect(router.route(query, "auto")).toEqual({
        mode: "skip",
        reason: "long question",
        matchedTerms: ["long question"],
        strong: false,
      });
    });

    it("should not treat a short question as a dialogue search", () => {
      expect(router.route("what is the red car", "auto").mode).toBe("recall");
    });

    it("should treat quoted text as a dialogue search", () => {
      expect(router.route('"see you tomorrow"', "auto")).toEqual({
        mode: "skip",
        reason: "quoted text",
        matchedTerms: ["quoted text"],
        strong: false,
      });
    });

    it("should explain strong visual intent with the matched terms", () => {
      expect(router.route("Red CAR!", "auto")).toEqual({
        mode: "recall",
        reason: "strong visual intent: red, car",
        matchedTerms: ["red", "car"],
        strong: true,
      });
    });

    it("should recall a lone object query that is not dominated by other words", () => {
      expect(router.route("a dog on the beach", "auto").mode).toBe("recall");
      expect(router.route("sunset over the ocean", "auto").mode).toBe("recall");
    });

    it("should rerank a lone object query dominated by other words", () => {
      const decision = router.route("car chase downtown", "auto");
      expect(decision.mode).toBe("rerank");
      expect(decision.strong).toBe(false);
    });

    it("should rerank color-only and context-only matches", () => {
      expect(router.route("red", "auto").mode).toBe("rerank");
      expect(router.route("tteokbokki scene", "auto").reason).toBe(
        "weak visual intent: tteokbokki, scene",
      );
    });

    it("should match Korean lexicon entries", () => {
      expect(router.route("떡볶이", "auto")).toEqual({
        mode: "rerank",
        reason: "weak visual intent: 떡볶이",
        matchedTerms: ["떡볶이"],
        strong: false,
      });
    });

    it("should fall back to rerank when nothing matches", () => {
      expect(router.route("quarterly budget review", "auto")).toEqual({
        mode: "rerank",
        reason: "no visual or speech terms",
        matchedTerms: [],
        strong: false,
      });
    });

    it("should skip whitespace and punctuation-only queries", () => {
      expect(router.route("   ", "auto").reason).toBe("empty query");
      expect(router.route("?!", "auto").mode).toBe("skip");
    });
  });

  describe("forced modes", () => {
    it.each(["recall", "rerank", "skip"] as const)(
      "should return %s unchanged",
      (mode) => {
        expect(router.route("he says hello", mode)).toEqual({
          mode,
          reason: "forced",
          matchedTerms: [],
          strong: false,
        });
      },
    );
  });

  describe("buildLexiconTable", () => {
    it("should reject a keyword listed under two categories", () => {
      expect(() =>
        buildLexiconTable({
          categories: { speech: ["line"], object: ["Line"] },
          longQuestion: { words: [], minTokens: 7 },
          strengthCategories: ["object"],
          anchorCategories: ["object"],
          stopwords: [],
        }),
      ).toThrow(
        'Lexicon term "line" is listed under both "speech" and "object"',
      );
    });

    it("should split phrases from single keywords", () => {
      const table = buildLexiconTable({
        categories: { speech: ["says", "talks about"] },
        longQuestion: { words: ["what"], minTokens: 7 },
        strengthCategories: [],
        anchorCategories: [],
        stopwords: [],
      });
      expect(table.keywords.get("says")).toBe("speech");
      expect(table.phrases).toEqual([
        { phrase: "talks about", category: "speech" },
      ]);
    });
  });

  describe("normalizeText", () => {
    it("should lower-case, strip punctuation and keep hyphens", () => {
      expect(normalizeText("Close-up, of a DOG!")).toEqual([
        "close-up",
        "of",
        "a",
        "dog",
      ]);
    });
  });
});
