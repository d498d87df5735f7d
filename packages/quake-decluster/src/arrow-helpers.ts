import type { Table, Vector } from "apache-arrow";
import { CatalogBuilder } from "./catalog";
import { countDependent } from "./classification";
import { resolveConfig } from "./config";
import { builderOptions, classifyCatalog } from "./decluster";
import { DeclusterError } from "./errors";
import type { DeclusterOptions } from "./types";

/**
 * Read the coordinate buffer of a GeoArrow Point column
 * (FixedSizeList[2] of Float64, layout [lng0, lat0, lng1, lat1, ...]).
 *
 * A single chunk is returned as a view on Arrow's own buffer. Several chunks
 * are copied into one array; rows whose chunk is not Float64-backed are read
 * point by point, and null points become NaN.
 */
export function getCoordBuffer(geomCol: Vector): Float64Array {
  const chunks = geomCol.data;

  if (chunks.length === 1) {
    const view = chunkCoords(chunks[0]);
    if (view) return view;
  }

  const coords = new Float64Array(geomCol.length * 2);
  let row = 0;
  for (const chunk of chunks) {
    const view = chunkCoords(chunk);
    if (view) {
      coords.set(view, row * 2);
    } else {
      for (let j = 0; j < chunk.length; j++) {
        const point: { get(index: number): unknown } | null = geomCol.get(
          row + j,
        );
        const lng = point?.get(0);
        const lat = point?.get(1);
        coords[(row + j) * 2] = typeof lng === "number" ? lng : NaN;
        coords[(row + j) * 2 + 1] = typeof lat === "number" ? lat : NaN;
      }
    }
    row += chunk.length;
  }
  return coords;
}

function chunkCoords(chunk: Vector["data"][number]): Float64Array | null {
  const child = chunk.children?.[0];
  const values: unknown = child?.values;
  if (!child || !(values instanceof Float64Array)) return null;
  // Child offset of a FixedSizeList[2] is twice the parent offset
  const start = child.offset * 2;
  const end = start + chunk.length * 2;
  if (start === 0 && end === values.length) return values;
  return values.subarray(start, end);
}

/** Column names read by {@link declusterTable}. */
export interface TableColumns {
  /** GeoArrow point column. Default: "geometry" */
  geometry?: string;
  /** Default: "magnitude" */
  magnitude?: string;
  /** Epoch milliseconds, Date or ISO-8601 string. Default: "time" */
  time?: string;
  /** Event ids; the row index is used when the column is absent. Default: "id" */
  id?: string;
  /** Depth in km; optional. Default: "depth" */
  depth?: string;
}

/**
 * Output of {@link declusterTable}: typed arrays aligned with table rows.
 */
export interface TableDeclusterOutput {
  /** 1 if the row took part in the run (not masked out, not rejected) */
  classified: Uint8Array;
  /** 1 if the row was claimed by a parent */
  isDependent: Uint8Array;
  /** Table row index of the parent, or -1 */
  parentRow: Int32Array;
  /** Row time minus parent time, in seconds; NaN if independent */
  deltaTSeconds: Float64Array;
  /** Distance to the parent; NaN if independent */
  deltaDistanceKm: Float64Array;
  independentCount: number;
  dependentCount: number;
  length: number;
}

/**
 * Decluster the rows of an Arrow Table.
 *
 * Rows with a zero entry in `filterMask` are left out of the run. Invalid
 * rows (null geometry, missing magnitude, ...) follow `options.onInvalid`.
 */
export function declusterTable(
  table: Table,
  options: Omit<DeclusterOptions, "fields" | "attribution"> = {},
  columns: TableColumns = {},
  filterMask?: Uint8Array | null,
): TableDeclusterOutput {
  const config = resolveConfig(options);
  const numRows = table.numRows;

  const geomCol = requireColumn(table, columns.geometry ?? "geometry");
  const magCol = requireColumn(table, columns.magnitude ?? "magnitude");
  const timeCol = requireColumn(table, columns.time ?? "time");
  const idCol = table.getChild(columns.id ?? "id");
  const depthCol = table.getChild(columns.depth ?? "depth");

  const coords = getCoordBuffer(geomCol);
  const builder = new CatalogBuilder(builderOptions(config));

  for (let i = 0; i < numRows; i++) {
    if (filterMask && !filterMask[i]) continue;
    const id: unknown = idCol ? idCol.get(i) : i;
    const magnitude: unknown = magCol.get(i);
    const time: unknown = timeCol.get(i);
    const depth: unknown = depthCol ? depthCol.get(i) : undefined;
    // Null slots hold zeros in the child buffer
    const hasPoint = geomCol.isValid(i);
    builder.push(i, {
      id: typeof id === "bigint" ? id.toString() : id,
      magnitude,
      time: typeof time === "bigint" ? Number(time) : time,
      latitude: hasPoint ? coords[i * 2 + 1] : null,
      longitude: hasPoint ? coords[i * 2] : null,
      depth,
    });
  }

  const { catalog, sourceRows } = builder.finish();
  const state = classifyCatalog(catalog, config);

  const classified = new Uint8Array(numRows);
  const isDependent = new Uint8Array(numRows);
  const parentRow = new Int32Array(numRows).fill(-1);
  const deltaTSeconds = new Float64Array(numRows).fill(NaN);
  const deltaDistanceKm = new Float64Array(numRows).fill(NaN);

  for (let k = 0; k < catalog.length; k++) {
    const row = sourceRows[k];
    classified[row] = 1;
    if (!state.isDependent[k]) continue;
    isDependent[row] = 1;
    parentRow[row] = sourceRows[state.parent[k]];
    deltaTSeconds[row] = state.deltaTSeconds[k];
    deltaDistanceKm[row] = state.deltaDistanceKm[k];
  }

  const dependentCount = countDependent(state);
  return {
    classified,
    isDependent,
    parentRow,
    deltaTSeconds,
    deltaDistanceKm,
    independentCount: catalog.length - dependentCount,
    dependentCount,
    length: numRows,
  };
}

function requireColumn(table: Table, name: string): Vector {
  const col = table.getChild(name);
  if (!col) {
    throw new DeclusterError(`Column "${name}" not found in Arrow Table`);
  }
  return col;
}
