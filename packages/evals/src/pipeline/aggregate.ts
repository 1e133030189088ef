import type { ScoreRecord } from "../checkpoint/checkpointStore.js";

/** Integer bands 0 through 5. */
export const SCORE_BANDS = [0, 1, 2, 3, 4, 5] as const;

export type ScoreBand = (typeof SCORE_BANDS)[number];

export interface ScoreSummary {
  mean: number;
  count: number;
  /** Count per band; a fractional score falls in its floor band. */
  histogram: Record<ScoreBand, number>;
}

/** Arithmetic mean of every score present; 0 for an empty record. */
export function meanScore(scores: Readonly<ScoreRecord>): number {
  const values = Object.values(scores).map((entry) => entry.score);
  if (values.length === 0) {
    return 0;
  }
  return values.reduce((sum, value) => sum + value, 0) / values.length;
}

function toBand(score: number): ScoreBand {
  const floor = Math.min(5, Math.max(0, Math.floor(score)));
  return SCORE_BANDS.find((band) => band === floor) ?? 0;
}

export function summarizeScores(scores: Readonly<ScoreRecord>): ScoreSummary {
  const histogram: Record<ScoreBand, number> = {
    0: 0,
    1: 0,
    2: 0,
    3: 0,
    4: 0,
    5: 0,
  };
  for (const { score } of Object.values(scores)) {
    histogram[toBand(score)]++;
  }
  return {
    mean: meanScore(scores),
    count: Object.keys(scores).length,
    histogram,
  };
}

/** One-line report, e.g. `Average score: 4.000 over 2 items`. */
export function formatAverage(
  summary: Pick<ScoreSummary, "mean" | "count">,
): string {
  return `Average score: ${summary.mean.toFixed(3)} over ${summary.count} items`;
}

/** One line per band, e.g. `  score 4: 2`. */
export function formatHistogram(
  histogram: Record<ScoreBand, number>,
): string[] {
  return SCORE_BANDS.map((band) => `  score ${band}: ${histogram[band]}`);
}
