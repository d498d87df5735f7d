import type { Catalog } from "./catalog";
import type {
  AttributedRecord,
  Classification,
  RejectedRecord,
} from "./types";

export interface AssembledResult<R, D> {
  independent: R[];
  dependent: D[];
  rejected: RejectedRecord<R>[];
}

/**
 * Project a classification back onto the caller's records, in input order.
 * Records are passed through as-is; with `attribution` the dependent ones are
 * copied with the four parent fields appended.
 */
export function assembleResult<R extends object>(
  records: readonly R[],
  catalog: Catalog,
  sourceRows: Int32Array,
  classification: Classification,
  attribution: true,
  rejected?: RejectedRecord<R>[],
): AssembledResult<R, AttributedRecord<R>>;
export function assembleResult<R extends object>(
  records: readonly R[],
  catalog: Catalog,
  sourceRows: Int32Array,
  classification: Classification,
  attribution?: false,
  rejected?: RejectedRecord<R>[],
): AssembledResult<R, R>;
export function assembleResult<R extends object>(
  records: readonly R[],
  catalog: Catalog,
  sourceRows: Int32Array,
  classification: Classification,
  attribution?: boolean,
  rejected?: RejectedRecord<R>[],
): AssembledResult<R, R | AttributedRecord<R>>;
export function assembleResult<R extends object>(
  records: readonly R[],
  catalog: Catalog,
  sourceRows: Int32Array,
  classification: Classification,
  attribution = false,
  rejected: RejectedRecord<R>[] = [],
): AssembledResult<R, R | AttributedRecord<R>> {
  const independent: R[] = [];
  const dependent: (R | AttributedRecord<R>)[] = [];
  const { isDependent, parent, deltaTSeconds, deltaDistanceKm } =
    classification;

  for (let i = 0; i < catalog.length; i++) {
    const record = records[sourceRows[i]];
    if (!isDependent[i]) {
      independent.push(record);
    } else if (!attribution) {
      dependent.push(record);
    } else {
      const p = parent[i];
      dependent.push({
        ...record,
        parent_id: catalog.ids[p],
        parent_magnitude: catalog.magnitudes[p],
        delta_t_seconds: deltaTSeconds[i],
        delta_distance_km: deltaDistanceKm[i],
      });
    }
  }

  return { independent, dependent, rejected };
}
