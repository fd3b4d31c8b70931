import type { ChannelWeight, WeightVector } from "../shared/search-types";

export const WEIGHT_EPSILON = 1e-6;

export class InvalidWeightVectorError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "InvalidWeightVectorError";
  }
}

export interface WeightEntry {
  name: string;
  value: number;
  locked?: boolean;
}

const clamp = (value: number, min: number, max: number): number => {
  if (Number.isNaN(value)) return min;
  return Math.min(max, Math.max(min, value));
};

export const clampUnit = (value: number): number => clamp(value, 0, 1);

/**
 * Build a weight vector from plain entries.
 * An empty list or a repeated channel name is a configuration error.
 */
export function createWeightVector(
  entries: readonly WeightEntry[],
): WeightVector {
  if (entries.length === 0) {
    throw new InvalidWeightVectorError(
      "Weight vector must contain at least one channel",
    );
  }

  const seen = new Set<string>();
  for (const entry of entries) {
    if (seen.has(entry.name)) {
      throw new InvalidWeightVectorError(
        `Duplicate channel "${entry.name}" in weight vector`,
      );
    }
    seen.add(entry.name);
  }

  return entries.map((entry) => ({
    name: entry.name,
    value: clampUnit(entry.value),
    locked: entry.locked ?? false,
  }));
}

export function getWeightsSum(vector: WeightVector): number {
  return vector.reduce((sum, channel) => sum + channel.value, 0);
}

export function isNormalized(vector: WeightVector): boolean {
  return Math.abs(getWeightsSum(vector) - 1) <= WEIGHT_EPSILON;
}

const lockedSum = (vector: WeightVector): number =>
  vector.reduce(
    (sum, channel) => (channel.locked ? sum + channel.value : sum),
    0,
  );

const copy = (vector: WeightVector): ChannelWeight[] =>
  vector.map((channel) => ({ ...channel }));

/**
 * Rescale unlocked channels so the whole vector sums to 1.
 * Locked channels keep their value unless they alone exceed 1, in which case
 * they are scaled down to exactly 1 and every unlocked channel drops to 0.
 */
export function normalizeWeights(vector: WeightVector): ChannelWeight[] {
  if (vector.length === 0) return [];

  const inRange = vector.every(
    (channel) => channel.value >= 0 && channel.value <= 1,
  );
  const locked = lockedSum(vector);

  if (inRange && locked <= 1 + WEIGHT_EPSILON && isNormalized(vector)) {
    return copy(vector);
  }

  const unlocked = vector.filter((channel) => !channel.locked);

  // Locked mass is only rescaled when it overflows the total.
  const lockedScale = locked > 1 + WEIGHT_EPSILON ? locked : 1;

  if (unlocked.length === 0) {
    return vector.map((channel) => ({
      ...channel,
      value: channel.value / lockedScale,
    }));
  }

  if (locked >= 1) {
    return vector.map((channel) =>
      channel.locked
        ? { ...channel, value: channel.value / lockedScale }
        : { ...channel, value: 0 },
    );
  }

  const remaining = 1 - locked;
  const unlockedSum = unlocked.reduce(
    (sum, channel) => sum + clampUnit(channel.value),
    0,
  );

  if (unlockedSum <= 0) {
    const share = remaining / unlocked.length;
    return vector.map((channel) =>
      channel.locked ? { ...channel } : { ...channel, value: share },
    );
  }

  const scale = remaining / unlockedSum;
  return vector.map((channel) =>
    channel.locked
      ? { ...channel }
      : { ...channel, value: clampUnit(channel.value) * scale },
  );
}

/**
 * Set one channel and spread the delta over the other unlocked channels,
 * proportionally to their current values.
 */
export function updateWeight(
  vector: WeightVector,
  name: string,
  newValue: number,
): WeightVector {
  const target = vector.find((channel) => channel.name === name);
  if (!target || target.locked) return vector;

  const locked = lockedSum(vector);
  const others = vector.filter(
    (channel) => !channel.locked && channel.name !== name,
  );
  const maxValue = Math.max(0, 1 - locked);
  // A lone unlocked channel has to carry all of the remaining mass.
  const value = others.length === 0 ? maxValue : clamp(newValue, 0, maxValue);
  const delta = value - target.value;

  const othersSum = others.reduce((sum, channel) => sum + channel.value, 0);

  const adjusted = vector.map((channel): ChannelWeight => {
    if (channel.name === name) return { ...channel, value, locked: true };
    if (channel.locked) return { ...channel };

    let next = channel.value;
    if (othersSum > 0) {
      next -= delta * (channel.value / othersSum);
    } else if (delta < 0) {
      next -= delta / others.length;
    }
    return { ...channel, value: clampUnit(next) };
  });

  // The updated channel is pinned while the remainder is absorbed.
  return normalizeWeights(adjusted).map((channel) =>
    channel.name === name ? { ...channel, locked: false } : channel,
  );
}

/**
 * Apply preset values to unlocked channels. Presets need not sum to 1.
 */
export function applyPreset(
  vector: WeightVector,
  presetValues: Readonly<Record<string, number>>,
): ChannelWeight[] {
  const applied = vector.map((channel) => {
    const preset = presetValues[channel.name];
    if (channel.locked || preset === undefined) return { ...channel };
    return { ...channel, value: clampUnit(preset) };
  });

  return normalizeWeights(applied);
}

const decimalPlaces = (step: number): number => {
  const text = String(step);
  const exponent = /e-(\d+)$/.exec(text);
  if (exponent) return Number.parseInt(exponent[1], 10);
  const fraction = text.split(".")[1];
  return fraction ? fraction.length : 0;
};

export function roundToStep(value: number, step: number): number {
  if (!(step > 0) || !Number.isFinite(value)) return value;
  const rounded = Math.round(value / step) * step;
  return Number.parseFloat(rounded.toFixed(decimalPlaces(step)));
}

export function weightToPercentage(value: number, decimals = 0): string {
  return `${(clampUnit(value) * 100).toFixed(decimals)}%`;
}

export function percentageToWeight(percentage: string): number {
  const parsed = Number.parseFloat(percentage.replace("%", "").trim());
  if (Number.isNaN(parsed)) return 0;
  return clampUnit(parsed / 100);
}

export function weightsToRecord(vector: WeightVector): Record<string, number> {
  return Object.fromEntries(
    vector.map((channel) => [channel.name, channel.value]),
  );
}

export function getWeight(vector: WeightVector, name: string): number {
  return vector.find((channel) => channel.name === name)?.value ?? 0;
}
