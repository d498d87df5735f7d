import type { Catalog } from "./catalog";
import { assignParent, createClassification } from "./classification";
import { coordDistanceKm, SECONDS_PER_DAY } from "./geodesy";
import {
  interactionRadiusKm,
  lookbackDays,
  REASENBERG_DEFAULTS,
} from "./window-models";
import type { Classification, ReasenbergParams } from "./types";

interface OpenCluster {
  state: "open";
  id: number;
  /** Catalog index of the largest event so far */
  mainIndex: number;
  maxMagnitude: number;
  /** Catalog index of the most recent member */
  lastIndex: number;
  members: number[];
}

/** A finished cluster. Never modified once closed. */
export interface ClosedCluster {
  readonly state: "closed";
  readonly id: number;
  readonly mainIndex: number;
  readonly maxMagnitude: number;
  /** Catalog indices in chronological order */
  readonly members: readonly number[];
  /**
   * Catalog index of the event whose arrival closed the cluster, or null
   * when the cluster was still open at the end of the catalog.
   */
  readonly closedBy: number | null;
}

export interface ReasenbergOutput {
  classification: Classification;
  /** Every cluster, singletons included, ordered by creation */
  clusters: ClosedCluster[];
}

function closeCluster(
  cluster: OpenCluster,
  closedBy: number | null,
): ClosedCluster {
  const result: ClosedCluster = {
    state: "closed",
    id: cluster.id,
    mainIndex: cluster.mainIndex,
    maxMagnitude: cluster.maxMagnitude,
    members: Object.freeze(cluster.members.slice()),
    closedBy,
  };
  return Object.freeze(result);
}

/**
 * Interaction-based cluster growth after Reasenberg (1985).
 *
 * Events are visited in time order. An event joins an open cluster when it
 * falls within the cluster's interaction radius (around the cluster's largest
 * event) and within the adaptive lookback window of the cluster's most recent
 * member; otherwise it starts a new cluster. When several clusters qualify,
 * the one with the largest event wins, then the one with the most recent
 * member, then the oldest.
 */
export class ReasenbergEngine {
  readonly params: ReasenbergParams;

  constructor(params: Partial<ReasenbergParams> = {}) {
    this.params = { ...REASENBERG_DEFAULTS, ...params };
  }

  classify(catalog: Catalog): ReasenbergOutput {
    const { magnitudes, times, coords } = catalog;
    const { rFact, tauMax } = this.params;
    const open: OpenCluster[] = [];
    const closed: ClosedCluster[] = [];
    let nextId = 0;

    for (const i of this.processingOrder(catalog)) {
      const t = times[i];

      // Clusters that no later event can reach again
      for (let k = open.length - 1; k >= 0; k--) {
        const idle = (t - times[open[k].lastIndex]) / SECONDS_PER_DAY;
        if (idle > tauMax) {
          closed.push(closeCluster(open[k], i));
          open.splice(k, 1);
        }
      }

      let best: OpenCluster | null = null;
      for (const cluster of open) {
        const idle = (t - times[cluster.lastIndex]) / SECONDS_PER_DAY;
        const elapsed = (t - times[cluster.mainIndex]) / SECONDS_PER_DAY;
        const tau = lookbackDays(cluster.maxMagnitude, elapsed, this.params);
        if (idle > tau) continue;

        const dist = coordDistanceKm(coords, i, cluster.mainIndex);
        if (dist > interactionRadiusKm(cluster.maxMagnitude, rFact)) continue;

        if (best === null || this._outranks(cluster, best, times)) {
          best = cluster;
        }
      }

      if (best === null) {
        open.push({
          state: "open",
          id: nextId++,
          mainIndex: i,
          maxMagnitude: magnitudes[i],
          lastIndex: i,
          members: [i],
        });
        continue;
      }

      best.members.push(i);
      best.lastIndex = i;
      if (magnitudes[i] > best.maxMagnitude) {
        best.maxMagnitude = magnitudes[i];
        best.mainIndex = i;
      }
    }

    for (const cluster of open) closed.push(closeCluster(cluster, null));
    closed.sort((a, b) => a.id - b.id);

    const classification = createClassification(catalog.length);
    for (const cluster of closed) {
      const main = cluster.mainIndex;
      for (const member of cluster.members) {
        if (member === main) continue;
        assignParent(
          classification,
          member,
          main,
          times[member] - times[main],
          coordDistanceKm(coords, member, main),
        );
      }
    }

    return { classification, clusters: closed };
  }

  /** Catalog indices by origin time, ties by catalog index. */
  processingOrder(catalog: Catalog): Uint32Array {
    const { times } = catalog;
    const order = new Uint32Array(catalog.length);
    for (let i = 0; i < order.length; i++) order[i] = i;
    return order.sort((a, b) => times[a] - times[b] || a - b);
  }

  private _outranks(
    a: OpenCluster,
    b: OpenCluster,
    times: Float64Array,
  ): boolean {
    if (a.maxMagnitude !== b.maxMagnitude) {
      return a.maxMagnitude > b.maxMagnitude;
    }
    const lastA = times[a.lastIndex];
    const lastB = times[b.lastIndex];
    if (lastA !== lastB) return lastA > lastB;
    return a.id < b.id;
  }
}
