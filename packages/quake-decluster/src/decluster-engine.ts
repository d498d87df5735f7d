import KDBush from "kdbush";
import type { Catalog } from "./catalog";
import { assignParent, createClassification } from "./classification";
import { coordDistanceKm, SECONDS_PER_DAY } from "./geodesy";
import { windowFor, type WindowModel } from "./window-models";
import type { ClaimMode, Classification } from "./types";

// Slack on the index query so rounding in the day conversion never drops a
// candidate sitting exactly on the window edge; the exact test follows.
const RANGE_SLACK_DAYS = 1e-6;

export interface DeclusterEngineOptions {
  model: WindowModel;
  /** Default: "single-claim" */
  mode?: ClaimMode;
}

/**
 * Magnitude-ordered space-time window declustering (Gardner & Knopoff 1974).
 *
 * Events are visited largest first. Each event that is still independent
 * claims every not-larger event inside its window box. Candidates are
 * pre-selected with a KDBush index over (time in days, magnitude), so the
 * pairwise scan only touches events inside the time band.
 */
export class DeclusterEngine {
  readonly model: WindowModel;
  readonly mode: ClaimMode;

  constructor(options: DeclusterEngineOptions) {
    this.model = options.model;
    this.mode = options.mode ?? "single-claim";
  }

  /**
   * Classify every catalog event. The catalog is not modified.
   */
  classify(catalog: Catalog): Classification {
    const n = catalog.length;
    const state = createClassification(n);
    if (n === 0) return state;

    const { magnitudes, times, coords } = catalog;
    const tree = this._createIndex(catalog);
    const order = this.processingOrder(catalog);
    // Events that have already acted as a trigger are never claimed afterwards
    const triggered = new Uint8Array(n);
    const reevaluate = this.mode === "nearest-in-time";

    for (const p of order) {
      if (state.isDependent[p]) continue;
      triggered[p] = 1;

      const mag = magnitudes[p];
      const { radiusKm, windowDays } = windowFor(this.model, mag);
      const windowSecs = windowDays * SECONDS_PER_DAY;
      const tp = times[p];
      const tpDays = tp / SECONDS_PER_DAY;

      const candidates = tree.range(
        tpDays - windowDays - RANGE_SLACK_DAYS,
        -Infinity,
        tpDays + windowDays + RANGE_SLACK_DAYS,
        mag,
      );

      for (const q of candidates) {
        if (q === p || triggered[q]) continue;
        if (magnitudes[q] > mag) continue;
        const claimed = state.isDependent[q] === 1;
        if (claimed && !reevaluate) continue;

        const dt = times[q] - tp;
        if (Math.abs(dt) > windowSecs) continue;
        const dist = coordDistanceKm(coords, p, q);
        if (dist > radiusKm) continue;

        if (claimed && !this._isCloser(state, q, dt, dist)) continue;
        assignParent(state, q, p, dt, dist);
      }
    }

    return state;
  }

  /**
   * Catalog indices in visiting order: magnitude descending, then origin
   * time ascending, then catalog index.
   */
  processingOrder(catalog: Catalog): Uint32Array {
    const { magnitudes, times } = catalog;
    const order = new Uint32Array(catalog.length);
    for (let i = 0; i < order.length; i++) order[i] = i;
    return order.sort(
      (a, b) => magnitudes[b] - magnitudes[a] || times[a] - times[b] || a - b,
    );
  }

  /** Whether a new candidate parent beats the current one for event `q`. */
  private _isCloser(
    state: Classification,
    q: number,
    dt: number,
    dist: number,
  ): boolean {
    const current = Math.abs(state.deltaTSeconds[q]);
    const candidate = Math.abs(dt);
    if (candidate !== current) return candidate < current;
    return dist < state.deltaDistanceKm[q];
  }

  private _createIndex(catalog: Catalog): KDBush {
    const tree = new KDBush(catalog.length, 64, Float64Array);
    for (let i = 0; i < catalog.length; i++) {
      tree.add(catalog.times[i] / SECONDS_PER_DAY, catalog.magnitudes[i]);
    }
    tree.finish();
    return tree;
  }
}
