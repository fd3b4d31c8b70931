import { Injectable } from "@nestjs/common";
import {
  type Candidate,
  type ChannelScores,
  type ChannelWeight,
  type RetrievedScene,
  VISUAL_CHANNEL,
  type VisualMode,
  type WeightVector,
} from "../shared/search-types";

export const FUSION_METHODS = ["weighted", "rrf"] as const;

export type FusionMethod = (typeof FUSION_METHODS)[number];

export interface FusionOptions {
  method: FusionMethod;
  /** Rank offset for reciprocal rank fusion */
  rrfK: number;
}

export const DEFAULT_FUSION: FusionOptions = { method: "weighted", rrfK: 60 };

const contributes = (channel: ChannelWeight, mode: VisualMode): boolean =>
  channel.name !== VISUAL_CHANNEL || mode === "recall";

@Injectable()
export class ScoreFusionService {
  /**
   * Weighted sum of channel scores over the channels of the weight vector.
   * Missing scores count as 0. The visual weight only applies in recall mode;
   * rerank blends it in later and skip ignores it.
   */
  fuse(
    channelScores: ChannelScores,
    weights: WeightVector,
    mode: VisualMode,
  ): number {
    let score = 0;
    for (const channel of weights) {
      if (!contributes(channel, mode)) continue;
      score += channel.value * (channelScores[channel.name] ?? 0);
    }
    return score;
  }

  /**
   * Score retrieved scenes and order them by base score, keeping retrieval
   * order between equal scores.
   */
  fuseCandidates(
    scenes: readonly RetrievedScene[],
    weights: WeightVector,
    mode: VisualMode,
    options: FusionOptions = DEFAULT_FUSION,
  ): Candidate[] {
    const baseScores =
      options.method === "rrf"
        ? this.reciprocalRankScores(scenes, weights, mode, options.rrfK)
        : scenes.map((r) => this.fuse(r.channelScores, weights, mode));

    return scenes
      .map((retrieved, position) => ({
        position,
        candidate: {
          sceneId: retrieved.scene.id,
          scene: retrieved.scene,
          channelScores: retrieved.channelScores,
          baseScore: baseScores[position],
          finalScore: baseScores[position],
        },
      }))
      .sort(
        (a, b) =>
          b.candidate.baseScore - a.candidate.baseScore ||
          a.position - b.position,
      )
      .map(({ candidate }) => candidate);
  }

  /**
   * Weighted reciprocal rank fusion. Each channel ranks the scenes it scored
   * above 0 and gives each of them `weight / (k + rank)`, rank starting at 1.
   */
  reciprocalRankScores(
    scenes: readonly RetrievedScene[],
    weights: WeightVector,
    mode: VisualMode,
    k: number,
  ): number[] {
    const totals = scenes.map(() => 0);

    for (const channel of weights) {
      if (channel.value <= 0 || !contributes(channel, mode)) continue;

      const ranked = scenes
        .map((retrieved, position) => ({
          position,
          score: retrieved.channelScores[channel.name] ?? 0,
        }))
        .filter((entry) => entry.score > 0)
        .sort((a, b) => b.score - a.score || a.position - b.position);

      ranked.forEach((entry, i) => {
        totals[entry.position] += channel.value / (k + i + 1);
      });
    }

    return totals;
  }
}
