import { ConfigurationError, DeclusterError } from "./errors";
import { SECONDS_PER_DAY } from "./geodesy";
import type { BelowTablePolicy, ReasenbergParams, Window } from "./types";

/** Window models that can be scaled (everything but `scaled` itself). */
export type BaseWindowModel =
  | { kind: "gk-formula" }
  | { kind: "gk-table"; belowTable: BelowTablePolicy }
  | { kind: "fixed"; radiusKm: number; windowDays: number };

/** Resolved box-window model used by the magnitude-ordered engine. */
export type WindowModel =
  | BaseWindowModel
  | { kind: "scaled"; base: BaseWindowModel; factor: number };

/**
 * Gardner & Knopoff (1974) window table: [minMagnitude, radiusKm, windowDays].
 * Rows are sorted by magnitude.
 */
export const GK_TABLE: readonly (readonly [number, number, number])[] = [
  [2.5, 19.5, 6],
  [3.0, 22.5, 11.5],
  [3.5, 26, 22],
  [4.0, 30, 42],
  [4.5, 35, 83],
  [5.0, 40, 155],
  [5.5, 47, 290],
  [6.0, 54, 510],
  [6.5, 61, 790],
  [7.0, 70, 915],
  [7.5, 81, 960],
  [8.0, 94, 985],
];

export const GK_TABLE_MIN_MAGNITUDE = GK_TABLE[0][0];

/** Raised when a magnitude has no row in the lookup table under the `reject` policy. */
export class WindowRangeError extends DeclusterError {
  readonly magnitude: number;

  constructor(magnitude: number) {
    super(
      `Magnitude ${magnitude} is below the lowest window table row (${GK_TABLE_MIN_MAGNITUDE})`,
    );
    this.magnitude = magnitude;
  }
}

/** Continuous G-K empirical fit. */
export function gkFormulaWindow(magnitude: number): Window {
  const radiusKm = 10 ** (0.1238 * magnitude + 0.983);
  const windowDays =
    magnitude >= 6.5
      ? 10 ** (0.032 * magnitude + 2.7389)
      : 10 ** (0.5409 * magnitude - 0.547);
  return { radiusKm, windowDays };
}

/** Step lookup in {@link GK_TABLE}: the highest row whose threshold is <= magnitude. */
export function gkTableWindow(
  magnitude: number,
  belowTable: BelowTablePolicy = "clamp",
): Window {
  if (magnitude < GK_TABLE_MIN_MAGNITUDE && belowTable === "reject") {
    throw new WindowRangeError(magnitude);
  }
  let row = GK_TABLE[0];
  for (const candidate of GK_TABLE) {
    if (candidate[0] > magnitude) break;
    row = candidate;
  }
  return { radiusKm: row[1], windowDays: row[2] };
}

export function windowFor(model: WindowModel, magnitude: number): Window {
  switch (model.kind) {
    case "gk-formula":
      return gkFormulaWindow(magnitude);
    case "gk-table":
      return gkTableWindow(magnitude, model.belowTable);
    case "fixed":
      return { radiusKm: model.radiusKm, windowDays: model.windowDays };
    case "scaled": {
      const { radiusKm, windowDays } = windowFor(model.base, magnitude);
      return {
        radiusKm: radiusKm * model.factor,
        windowDays: windowDays * model.factor,
      };
    }
  }
}

/**
 * Wrap a model so both window extents are multiplied by `factor`.
 * Scaling an already-scaled model multiplies the factors.
 */
export function scaleWindowModel(
  model: WindowModel,
  factor: number,
): WindowModel {
  if (!Number.isFinite(factor) || factor <= 0) {
    throw new ConfigurationError([
      `scale: must be a positive finite number, got ${factor}`,
    ]);
  }
  if (model.kind === "scaled") {
    return { kind: "scaled", base: model.base, factor: model.factor * factor };
  }
  return { kind: "scaled", base: model, factor };
}

/** Temporal half-width of a window in seconds. */
export function windowSeconds(window: Window): number {
  return window.windowDays * SECONDS_PER_DAY;
}

// --- Reasenberg (1985) ---

export const REASENBERG_DEFAULTS: Readonly<ReasenbergParams> = {
  rFact: 10,
  tauMin: 1,
  tauMax: 10,
  p: 0.95,
  xmeff: 1.5,
};

/** Interaction radius in km for a cluster whose largest event has magnitude `mmax`. */
export function interactionRadiusKm(mmax: number, rFact: number): number {
  return rFact * 10 ** (0.11 * mmax + 0.024);
}

/**
 * Adaptive lookback window in days.
 *
 * Omori-law estimate of how long to wait for the next cluster member with
 * confidence `p`, given `elapsedDays` since the cluster's largest event.
 * Clamped to [tauMin, tauMax].
 */
export function lookbackDays(
  mmax: number,
  elapsedDays: number,
  params: ReasenbergParams,
): number {
  const { p, xmeff, tauMin, tauMax } = params;
  const exponent = (2 * (mmax - xmeff - 1)) / 3;
  if (exponent > 300) return tauMin;
  const tau = (-Math.log(1 - p) * elapsedDays) / 10 ** exponent;
  return Math.max(tauMin, Math.min(tauMax, tau));
}
