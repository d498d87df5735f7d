import { z } from "zod";
import { ConfigurationError } from "./errors";
import {
  REASENBERG_DEFAULTS,
  scaleWindowModel,
  type WindowModel,
} from "./window-models";
import type {
  CatalogFields,
  ClaimMode,
  DeclusterOptions,
  InvalidRecordPolicy,
  ReasenbergParams,
} from "./types";

export const DEFAULT_FIELDS: Readonly<CatalogFields> = {
  id: "event_id",
  magnitude: "magnitude",
  time: "timestamp",
  latitude: "latitude",
  longitude: "longitude",
  depth: "depth_km",
};

/** Column layout of USGS-derived catalogs. */
export const USGS_FIELDS: Readonly<CatalogFields> = {
  id: "usgs_id",
  magnitude: "usgs_mag",
  time: "event_at",
  latitude: "latitude",
  longitude: "longitude",
  depth: "depth",
};

const positive = z.number().finite().positive();

const modelSchema = z.discriminatedUnion("kind", [
  z.object({ kind: z.literal("gk-formula") }),
  z.object({
    kind: z.literal("gk-table"),
    belowTable: z.enum(["clamp", "reject"]).default("clamp"),
  }),
  z.object({
    kind: z.literal("fixed"),
    radiusKm: positive.default(83.2),
    windowDays: positive.default(95.6),
  }),
  z.object({
    kind: z.literal("reasenberg"),
    rFact: positive.default(REASENBERG_DEFAULTS.rFact),
    tauMin: positive.default(REASENBERG_DEFAULTS.tauMin),
    tauMax: positive.default(REASENBERG_DEFAULTS.tauMax),
    p: z.number().gt(0).lt(1).default(REASENBERG_DEFAULTS.p),
    xmeff: z.number().finite().default(REASENBERG_DEFAULTS.xmeff),
  }),
]);

const fieldName = z.string().min(1);

const optionsSchema = z
  .object({
    model: modelSchema.default({ kind: "gk-formula" }),
    scale: z.number().default(1),
    mode: z.enum(["single-claim", "nearest-in-time"]).default("single-claim"),
    attribution: z.boolean().default(false),
    onInvalid: z.enum(["throw", "skip"]).default("throw"),
    fields: z
      .object({
        id: fieldName,
        magnitude: fieldName,
        time: fieldName,
        latitude: fieldName,
        longitude: fieldName,
        depth: fieldName,
      })
      .partial()
      .default({}),
  })
  .strict()
  .superRefine((options, ctx) => {
    if (!Number.isFinite(options.scale) || options.scale <= 0) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ["scale"],
        message: "must be a positive finite number",
      });
    }
    const { model } = options;
    if (model.kind !== "reasenberg") return;
    if (model.tauMin > model.tauMax) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ["model", "tauMin"],
        message: `must not exceed tauMax (${model.tauMin} > ${model.tauMax})`,
      });
    }
    if (options.scale !== 1) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ["scale"],
        message: "the reasenberg model has no scalable window",
      });
    }
    if (options.mode !== "single-claim") {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ["mode"],
        message: "the reasenberg model assigns parents per cluster",
      });
    }
  });

/** Magnitude-ordered (Gardner-Knopoff family) run. */
export interface WindowedConfig {
  family: "windowed";
  model: WindowModel;
  mode: ClaimMode;
  attribution: boolean;
  onInvalid: InvalidRecordPolicy;
  fields: CatalogFields;
}

/** Chronological (Reasenberg) run. */
export interface AdaptiveConfig {
  family: "adaptive";
  params: ReasenbergParams;
  attribution: boolean;
  onInvalid: InvalidRecordPolicy;
  fields: CatalogFields;
}

export type ResolvedConfig = WindowedConfig | AdaptiveConfig;

/**
 * Validate options and fill in defaults.
 * Throws {@link ConfigurationError} listing every problem found.
 */
export function resolveConfig(options: DeclusterOptions = {}): ResolvedConfig {
  const parsed = optionsSchema.safeParse(options);
  if (!parsed.success) {
    throw new ConfigurationError(
      parsed.error.issues.map((issue) =>
        issue.path.length > 0
          ? `${issue.path.join(".")}: ${issue.message}`
          : issue.message,
      ),
    );
  }

  const { model, scale, mode, attribution, onInvalid } = parsed.data;
  const fields: CatalogFields = { ...DEFAULT_FIELDS, ...parsed.data.fields };

  if (model.kind === "reasenberg") {
    const { rFact, tauMin, tauMax, p, xmeff } = model;
    return {
      family: "adaptive",
      params: { rFact, tauMin, tauMax, p, xmeff },
      attribution,
      onInvalid,
      fields,
    };
  }

  return {
    family: "windowed",
    model: scaleWindowModel(model, scale),
    mode,
    attribution,
    onInvalid,
    fields,
  };
}
