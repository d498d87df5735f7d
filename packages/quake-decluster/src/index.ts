export { decluster, classifyCatalog } from "./decluster";
export { declusterTable, getCoordBuffer } from "./arrow-helpers";
export type { TableColumns, TableDeclusterOutput } from "./arrow-helpers";
export { DeclusterEngine } from "./decluster-engine";
export type { DeclusterEngineOptions } from "./decluster-engine";
export { ReasenbergEngine } from "./reasenberg-engine";
export type { ClosedCluster, ReasenbergOutput } from "./reasenberg-engine";
export {
  buildCatalog,
  CatalogBuilder,
  parseEvent,
  toEpochMillis,
} from "./catalog";
export type { Catalog, CatalogBuild, RawEventFields } from "./catalog";
export { createClassification, countDependent } from "./classification";
export { assembleResult } from "./result-assembler";
export { resolveConfig, DEFAULT_FIELDS, USGS_FIELDS } from "./config";
export type { ResolvedConfig } from "./config";
export {
  GK_TABLE,
  GK_TABLE_MIN_MAGNITUDE,
  REASENBERG_DEFAULTS,
  gkFormulaWindow,
  gkTableWindow,
  interactionRadiusKm,
  lookbackDays,
  scaleWindowModel,
  windowFor,
  windowSeconds,
  WindowRangeError,
} from "./window-models";
export type { BaseWindowModel, WindowModel } from "./window-models";
export { EARTH_RADIUS_KM, haversineKm } from "./geodesy";
export {
  ConfigurationError,
  DeclusterError,
  EventValidationError,
} from "./errors";
export type {
  Attribution,
  AttributedRecord,
  BelowTablePolicy,
  CatalogFields,
  CatalogRecord,
  ClaimMode,
  Classification,
  DeclusterOptions,
  DeclusterResult,
  InvalidRecordPolicy,
  ReasenbergParams,
  RejectedRecord,
  Window,
  WindowModelSpec,
} from "./types";
