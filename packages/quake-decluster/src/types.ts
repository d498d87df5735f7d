/**
 * A caller-supplied catalog row. Only the fields named by {@link CatalogFields}
 * are read; everything else is carried through to the output untouched.
 */
export type CatalogRecord = Record<string, unknown>;

/**
 * Names of the record fields the engine reads.
 */
export interface CatalogFields {
  /** Unique event identifier. Default: "event_id" */
  id: string;
  /** Event magnitude. Default: "magnitude" */
  magnitude: string;
  /** Origin time (ISO-8601 string, Date or epoch milliseconds). Default: "timestamp" */
  time: string;
  /** Default: "latitude" */
  latitude: string;
  /** Default: "longitude" */
  longitude: string;
  /** Optional depth in km; absent values read as 0. Default: "depth_km" */
  depth: string;
}

/** Spatial radius and temporal half-width of a space-time neighborhood. */
export interface Window {
  radiusKm: number;
  windowDays: number;
}

/**
 * Box-window model selection. Exactly one family is active per run.
 */
export type WindowModelSpec =
  | { kind: "gk-formula" }
  | {
      kind: "gk-table";
      /** What to do with magnitudes below the first table row. Default: "clamp" */
      belowTable?: BelowTablePolicy;
    }
  | {
      kind: "fixed";
      /** Default: 83.2 */
      radiusKm?: number;
      /** Default: 95.6 */
      windowDays?: number;
    }
  | ({ kind: "reasenberg" } & Partial<ReasenbergParams>);

export type BelowTablePolicy = "clamp" | "reject";

/**
 * Parameters of the adaptive (Reasenberg 1985) cluster-growth model.
 */
export interface ReasenbergParams {
  /** Interaction radius scale factor. Default: 10 */
  rFact: number;
  /** Minimum lookback window in days. Default: 1 */
  tauMin: number;
  /** Maximum lookback window in days. Default: 10 */
  tauMax: number;
  /** Probability of detecting the next event in a cluster. Default: 0.95 */
  p: number;
  /** Effective magnitude threshold. Default: 1.5 */
  xmeff: number;
}

/**
 * How the magnitude-ordered engine treats an event that already has a parent.
 *
 * - `single-claim`: the first qualifying trigger keeps it.
 * - `nearest-in-time`: every qualifying trigger is compared and the one
 *   closest in time wins.
 */
export type ClaimMode = "single-claim" | "nearest-in-time";

export type InvalidRecordPolicy = "throw" | "skip";

/**
 * Options for {@link decluster}.
 */
export interface DeclusterOptions {
  /** Window model. Default: { kind: "gk-formula" } */
  model?: WindowModelSpec;
  /** Multiplier applied to both window extents. Default: 1 */
  scale?: number;
  /** Default: "single-claim" */
  mode?: ClaimMode;
  /** Append parent attribution fields to dependent records. Default: false */
  attribution?: boolean;
  /** Abort on the first invalid record, or leave it out. Default: "throw" */
  onInvalid?: InvalidRecordPolicy;
  /** Field name overrides. */
  fields?: Partial<CatalogFields>;
}

/**
 * Per-event classification state, index-aligned with a {@link Catalog}.
 */
export interface Classification {
  /** 1 if the event was claimed by a parent */
  isDependent: Uint8Array;
  /** Catalog index of the parent, or -1 */
  parent: Int32Array;
  /** Event time minus parent time, in seconds. NaN for independent events */
  deltaTSeconds: Float64Array;
  /** Great-circle distance to the parent. NaN for independent events */
  deltaDistanceKm: Float64Array;
  length: number;
}

export interface Attribution {
  parent_id: string;
  parent_magnitude: number;
  delta_t_seconds: number;
  delta_distance_km: number;
}

export type AttributedRecord<R> = R & Attribution;

export interface RejectedRecord<R> {
  /** Position of the record in the input */
  index: number;
  record: R;
  issues: string[];
}

export interface DeclusterResult<R, D = R> {
  independent: R[];
  dependent: D[];
  rejected: RejectedRecord<R>[];
}
