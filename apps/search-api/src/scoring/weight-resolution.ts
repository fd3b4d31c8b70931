import {
  type ChannelWeight,
  SCENE_CHANNELS,
  VISUAL_CHANNEL,
  type VisualMode,
  type WeightVector,
} from "../shared/search-types";
import {
  InvalidWeightVectorError,
  clampUnit,
  getWeight,
  getWeightsSum,
  normalizeWeights,
} from "./weight-model";

/** Upper bound for the visual channel so sparse CLIP matches cannot dominate */
export const MAX_VISUAL_WEIGHT = 0.8;
/** Lower bound for a lexical channel that is switched on */
export const MIN_LEXICAL_WEIGHT = 0.05;

export type WeightSource = "request" | "default";

export interface WeightResolution {
  weights: WeightVector;
  source: WeightSource;
  clamped: boolean;
  warnings: string[];
}

export interface ResolveWeightsInput {
  /** Per-request overrides, keyed by channel name */
  requestWeights?: Readonly<Record<string, number>> | null;
  defaults: WeightVector;
  mode: VisualMode;
  guardrails?: boolean;
}

const knownChannels = new Set<string>(SCENE_CHANNELS);

export function validateChannelWeights(
  weights: Readonly<Record<string, number>>,
): void {
  const invalid = Object.keys(weights).filter(
    (name) => !knownChannels.has(name),
  );
  if (invalid.length > 0) {
    throw new InvalidWeightVectorError(
      `Invalid channel keys: ${invalid.join(", ")}. ` +
        `Allowed: ${SCENE_CHANNELS.join(", ")}`,
    );
  }

  for (const [name, value] of Object.entries(weights)) {
    if (typeof value !== "number" || !(value >= 0 && value <= 1)) {
      throw new InvalidWeightVectorError(
        `Weight for "${name}" must be in [0, 1], got ${value}`,
      );
    }
  }

  if (!Object.values(weights).some((value) => value > 0)) {
    throw new InvalidWeightVectorError("At least one weight must be > 0");
  }
}

/**
 * Hold the given channels at fixed values and renormalize the rest around
 * them. Lock flags are restored afterwards.
 */
export function pinWeights(
  vector: WeightVector,
  pins: ReadonlyMap<string, number>,
): ChannelWeight[] {
  const pinned = vector.map((channel) => {
    const value = pins.get(channel.name);
    return value === undefined
      ? { ...channel }
      : { ...channel, value, locked: true };
  });

  return normalizeWeights(pinned).map((channel, i) => ({
    ...channel,
    locked: vector[i].locked,
  }));
}

export function applyGuardrails(vector: WeightVector): {
  weights: WeightVector;
  clamped: boolean;
  warnings: string[];
} {
  const pins = new Map<string, number>();
  const warnings: string[] = [];

  const visual = getWeight(vector, VISUAL_CHANNEL);
  if (visual > MAX_VISUAL_WEIGHT) {
    pins.set(VISUAL_CHANNEL, MAX_VISUAL_WEIGHT);
    warnings.push(
      `Visual weight clamped from ${visual.toFixed(2)} ` +
        `to ${MAX_VISUAL_WEIGHT.toFixed(2)}`,
    );
  }

  const lexical = getWeight(vector, "lexical");
  if (lexical > 0 && lexical < MIN_LEXICAL_WEIGHT) {
    pins.set("lexical", MIN_LEXICAL_WEIGHT);
    warnings.push(
      `Lexical weight raised from ${lexical.toFixed(2)} ` +
        `to ${MIN_LEXICAL_WEIGHT.toFixed(2)}`,
    );
  }

  if (pins.size === 0) return { weights: vector, clamped: false, warnings };
  return { weights: pinWeights(vector, pins), clamped: true, warnings };
}

/**
 * Drop channels that cannot be scored for this request and spread their
 * weight over the remaining ones.
 */
export function disableChannels(
  vector: WeightVector,
  channels: readonly string[],
): ChannelWeight[] {
  const active = vector.filter((channel) => !channels.includes(channel.name));
  if (active.length === 0) {
    throw new InvalidWeightVectorError(
      "Cannot redistribute weights: every channel is disabled",
    );
  }
  return normalizeWeights(active);
}

/**
 * Request weights take precedence over the configured defaults. Channels the
 * request leaves out get 0. In skip mode the visual weight is forced to 0.
 */
export function resolveWeights({
  requestWeights,
  defaults,
  mode,
  guardrails = true,
}: ResolveWeightsInput): WeightResolution {
  const warnings: string[] = [];
  let weights: WeightVector = defaults;
  let source: WeightSource = "default";

  if (requestWeights) {
    validateChannelWeights(requestWeights);

    const unavailable = Object.keys(requestWeights).filter(
      (name) => !defaults.some((channel) => channel.name === name),
    );
    if (unavailable.length > 0) {
      warnings.push(
        "Ignoring weights for unavailable channels: " + unavailable.join(", "),
      );
    }

    const requested = defaults.map((channel) => ({
      ...channel,
      value: clampUnit(requestWeights[channel.name] ?? 0),
    }));
    if (getWeightsSum(requested) <= 0) {
      throw new InvalidWeightVectorError(
        "At least one available channel weight must be > 0",
      );
    }

    weights = normalizeWeights(requested);
    source = "request";
  }

  let clamped = false;
  if (guardrails) {
    const result = applyGuardrails(weights);
    weights = result.weights;
    clamped = result.clamped;
    warnings.push(...result.warnings);
  }

  if (mode === "skip" && getWeight(weights, VISUAL_CHANNEL) > 0) {
    weights = pinWeights(weights, new Map([[VISUAL_CHANNEL, 0]]));
    warnings.push("Visual weight forced to 0 (visual_mode=skip)");
  }

  return { weights, source, clamped, warnings };
}
