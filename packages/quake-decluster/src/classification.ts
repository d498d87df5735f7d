import type { Classification } from "./types";

/** Fresh state for `length` events: all independent, no attribution. */
export function createClassification(length: number): Classification {
  return {
    isDependent: new Uint8Array(length),
    parent: new Int32Array(length).fill(-1),
    deltaTSeconds: new Float64Array(length).fill(NaN),
    deltaDistanceKm: new Float64Array(length).fill(NaN),
    length,
  };
}

export function assignParent(
  state: Classification,
  index: number,
  parent: number,
  deltaTSeconds: number,
  deltaDistanceKm: number,
): void {
  state.isDependent[index] = 1;
  state.parent[index] = parent;
  state.deltaTSeconds[index] = deltaTSeconds;
  state.deltaDistanceKm[index] = deltaDistanceKm;
}

/** Number of events tagged dependent. */
export function countDependent(state: Classification): number {
  let count = 0;
  for (let i = 0; i < state.length; i++) count += state.isDependent[i];
  return count;
}
