import { buildCatalog, type Catalog, type CatalogBuilderOptions } from "./catalog";
import { resolveConfig, type ResolvedConfig } from "./config";
import { DeclusterEngine } from "./decluster-engine";
import { ReasenbergEngine } from "./reasenberg-engine";
import { assembleResult } from "./result-assembler";
import { GK_TABLE_MIN_MAGNITUDE, type WindowModel } from "./window-models";
import type {
  AttributedRecord,
  CatalogRecord,
  Classification,
  DeclusterOptions,
  DeclusterResult,
} from "./types";

/**
 * Split a catalog into independent events and dependent
 * (aftershock/foreshock) events.
 *
 * Both output lists follow input order. Options are validated before any
 * record is read; see {@link DeclusterOptions} for defaults.
 */
export function decluster<R extends CatalogRecord>(
  records: readonly R[],
  options: DeclusterOptions & { attribution: true },
): DeclusterResult<R, AttributedRecord<R>>;
export function decluster<R extends CatalogRecord>(
  records: readonly R[],
  options?: DeclusterOptions,
): DeclusterResult<R, R | AttributedRecord<R>>;
export function decluster<R extends CatalogRecord>(
  records: readonly R[],
  options: DeclusterOptions = {},
): DeclusterResult<R, R | AttributedRecord<R>> {
  const config = resolveConfig(options);
  const { catalog, sourceRows, rejected } = buildCatalog(
    records,
    config.fields,
    builderOptions(config),
  );
  const classification = classifyCatalog(catalog, config);
  return assembleResult(
    records,
    catalog,
    sourceRows,
    classification,
    config.attribution,
    rejected,
  );
}

/** Run the engine selected by a resolved configuration. */
export function classifyCatalog(
  catalog: Catalog,
  config: ResolvedConfig,
): Classification {
  if (config.family === "adaptive") {
    return new ReasenbergEngine(config.params).classify(catalog).classification;
  }
  return new DeclusterEngine({
    model: config.model,
    mode: config.mode,
  }).classify(catalog);
}

/** Catalog validation settings implied by a configuration. */
export function builderOptions(config: ResolvedConfig): CatalogBuilderOptions {
  if (config.family === "windowed" && rejectsBelowTable(config.model)) {
    return { onInvalid: config.onInvalid, minMagnitude: GK_TABLE_MIN_MAGNITUDE };
  }
  return { onInvalid: config.onInvalid };
}

function rejectsBelowTable(model: WindowModel): boolean {
  const base = model.kind === "scaled" ? model.base : model;
  return base.kind === "gk-table" && base.belowTable === "reject";
}
