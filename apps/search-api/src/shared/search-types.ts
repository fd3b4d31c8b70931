/**
 * Shared types for the scene search scoring pipeline.
 */

export const SCENE_CHANNELS = [
  "transcript",
  "summary",
  "lexical",
  "visual",
] as const;

export type SceneChannel = (typeof SCENE_CHANNELS)[number];

/** The CLIP channel. Only scored directly in recall mode. */
export const VISUAL_CHANNEL: SceneChannel = "visual";

export const DENSE_CHANNELS: readonly SceneChannel[] = [
  "transcript",
  "summary",
];

export type VisualMode = "recall" | "rerank" | "skip";

export type VisualModeSetting = VisualMode | "auto";

export const VISUAL_MODE_SETTINGS: readonly VisualModeSetting[] = [
  "recall",
  "rerank",
  "skip",
  "auto",
];

export interface ChannelWeight {
  name: string;
  value: number; // 0-1
  locked: boolean;
}

/** Ordered, name-unique list of channel weights. */
export type WeightVector = readonly ChannelWeight[];

export type ChannelScores = Readonly<Partial<Record<string, number>>>;

export interface SceneRecord {
  id: string;
  videoId: string;
  index: number;
  startS: number;
  endS: number;
  transcriptSegment: string | null;
  visualSummary: string | null;
  thumbnailUrl: string | null;
  tags: string[];
}

export interface RetrievedScene {
  scene: SceneRecord;
  channelScores: ChannelScores;
}

export interface Candidate {
  sceneId: string;
  scene: SceneRecord;
  channelScores: ChannelScores;
  baseScore: number;
  visualScore?: number;
  finalScore: number;
}

export type CandidatePool = Candidate[];

export interface RouteDecision {
  mode: VisualMode;
  reason: string;
  matchedTerms: string[];
  strong: boolean;
}
