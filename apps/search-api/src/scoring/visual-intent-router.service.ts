import { Injectable, Logger } from "@nestjs/common";
import type {
  RouteDecision,
  VisualModeSetting,
} from "../shared/search-types";
import lexiconData from "./visual-lexicon.json";

export const SPEECH_CATEGORY = "speech";

export interface LexiconData {
  categories: Record<string, string[]>;
  /** Questions this long are searches for what was said */
  longQuestion: { words: string[]; minTokens: number };
  strengthCategories: string[];
  anchorCategories: string[];
  stopwords: string[];
}

export interface LexiconTable {
  /** Single-token keyword → category */
  keywords: Map<string, string>;
  /** Multi-word phrase → category, in table order */
  phrases: Array<{ phrase: string; category: string }>;
  questionWords: Set<string>;
  longQuestionMinTokens: number;
  strengthCategories: Set<string>;
  anchorCategories: Set<string>;
  stopwords: Set<string>;
}

interface LexiconMatch {
  term: string;
  category: string;
  tokens: string[];
}

const QUOTED_TEXT = /["“”「」]/;

/** A speech signal that is not a lexicon term */
const speechCue = (term: string): LexiconMatch => ({
  term,
  category: SPEECH_CATEGORY,
  tokens: [],
});

/**
 * Build the keyword → category lookup. Categories must be disjoint.
 */
export function buildLexiconTable(data: LexiconData): LexiconTable {
  const keywords = new Map<string, string>();
  const phrases: LexiconTable["phrases"] = [];
  const seen = new Map<string, string>();

  for (const [category, terms] of Object.entries(data.categories)) {
    for (const raw of terms) {
      const term = normalizeText(raw).join(" ");
      const previous = seen.get(term);
      if (previous !== undefined) {
        throw new Error(
          `Lexicon term "${term}" is listed under both ` +
            `"${previous}" and "${category}"`,
        );
      }
      seen.set(term, category);

      if (term.includes(" ")) {
        phrases.push({ phrase: term, category });
      } else {
        keywords.set(term, category);
      }
    }
  }

  return {
    keywords,
    phrases,
    questionWords: new Set(data.longQuestion.words),
    longQuestionMinTokens: data.longQuestion.minTokens,
    strengthCategories: new Set(data.strengthCategories),
    anchorCategories: new Set(data.anchorCategories),
    stopwords: new Set(data.stopwords),
  };
}

export function normalizeText(text: string): string[] {
  return text
    .normalize("NFKC")
    .toLowerCase()
    .replace(/[^\p{L}\p{N}\s-]/gu, " ")
    .split(/\s+/)
    .filter((token) => token.length > 0 && token !== "-");
}

/**
 * Keyword router deciding how the CLIP channel takes part in a search:
 * recall (direct retrieval signal), rerank (second-stage only) or skip.
 */
@Injectable()
export class VisualIntentRouter {
  private readonly logger = new Logger(VisualIntentRouter.name);
  private readonly lexicon: LexiconTable;

  constructor() {
    this.lexicon = buildLexiconTable(lexiconData);
  }

  route(queryText: string, configuredMode: VisualModeSetting): RouteDecision {
    if (configuredMode !== "auto") {
      return {
        mode: configuredMode,
        reason: "forced",
        matchedTerms: [],
        strong: false,
      };
    }

    const tokens = normalizeText(queryText ?? "");
    if (tokens.length === 0) {
      return {
        mode: "skip",
        reason: "empty query",
        matchedTerms: [],
        strong: false,
      };
    }

    const matches = this.match(tokens);
    const speech = matches.filter((m) => m.category === SPEECH_CATEGORY);
    if (QUOTED_TEXT.test(queryText)) {
      speech.push(speechCue("quoted text"));
    }
    if (this.isLongQuestion(tokens)) {
      speech.push(speechCue("long question"));
    }

    if (speech.length > 0) {
      return this.decide(queryText, {
        mode: "skip",
        reason: speech[0].term,
        matchedTerms: speech.map((m) => m.term),
        strong: false,
      });
    }

    const visual = matches.filter((m) => m.category !== SPEECH_CATEGORY);
    if (visual.length === 0) {
      return this.decide(queryText, {
        mode: "rerank",
        reason: "no visual or speech terms",
        matchedTerms: [],
        strong: false,
      });
    }

    const strong = this.isStrong(tokens, visual);
    const terms = visual.map((m) => m.term);
    const strength = strong ? "strong" : "weak";

    return this.decide(queryText, {
      mode: strong ? "recall" : "rerank",
      reason: `${strength} visual intent: ${terms.join(", ")}`,
      matchedTerms: terms,
      strong,
    });
  }

  /**
   * Strong when two strength categories match (e.g. color + object), or a
   * single object/action category matches and the remaining content words
   * do not outnumber it.
   */
  private isStrong(tokens: string[], visual: LexiconMatch[]): boolean {
    const strengthMatches = visual.filter((m) =>
      this.lexicon.strengthCategories.has(m.category),
    );
    const categories = new Set(strengthMatches.map((m) => m.category));

    if (categories.size >= 2) return true;
    if (categories.size === 0) return false;

    const [category] = categories;
    if (!this.lexicon.anchorCategories.has(category)) return false;

    const visualTokens = new Set(visual.flatMap((m) => m.tokens));
    const contentTokens = tokens.filter(
      (token) => !visualTokens.has(token) && !this.lexicon.stopwords.has(token),
    );

    return contentTokens.length <= strengthMatches.length;
  }

  private isLongQuestion(tokens: string[]): boolean {
    return (
      tokens.length >= this.lexicon.longQuestionMinTokens &&
      this.lexicon.questionWords.has(tokens[0])
    );
  }

  private match(tokens: string[]): LexiconMatch[] {
    const matches: LexiconMatch[] = [];
    const padded = ` ${tokens.join(" ")} `;

    for (const { phrase, category } of this.lexicon.phrases) {
      if (padded.includes(` ${phrase} `)) {
        matches.push({ term: phrase, category, tokens: phrase.split(" ") });
      }
    }

    const seen = new Set<string>();
    for (const token of tokens) {
      const category = this.lexicon.keywords.get(token);
      if (category === undefined || seen.has(token)) continue;
      seen.add(token);
      matches.push({ term: token, category, tokens: [token] });
    }

    return matches;
  }

  private decide(queryText: string, decision: RouteDecision): RouteDecision {
    this.logger.debug(
      `Visual routing: query="${queryText.slice(0, 50)}" ` +
        `mode=${decision.mode} reason="${decision.reason}" ` +
        `terms=${JSON.stringify(decision.matchedTerms)}`,
    );
    return decision;
  }
}
