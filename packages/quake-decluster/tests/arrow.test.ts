import { describe, it, expect } from "vitest";
import {
  makeVector,
  vectorFromArray,
  Field,
  Float64,
  FixedSizeList,
  Table,
} from "apache-arrow";
import {
  decluster,
  declusterTable,
  DeclusterError,
  EventValidationError,
} from "../src/index";
import { getCoordBuffer } from "../src/arrow-helpers";
import {
  buildEventTable,
  buildMultiChunkEventTable,
  generateCatalog,
  quake,
} from "./test-utils";

const scenario = [
  quake("A", 7.0, 0, 0, 0),
  quake("B", 4.5, 10, 0.1, 0.1),
  quake("C", 4.0, 200, 0.1, 0.1),
];
const fixed = {
  model: { kind: "fixed", radiusKm: 100, windowDays: 100 },
} as const;

describe("getCoordBuffer", () => {
  it("returns a zero-copy view for a single chunk", () => {
    const table = buildEventTable(scenario);
    const geomCol = table.getChild("geometry");
    expect(geomCol).not.toBeNull();
    if (!geomCol) return;

    const buf = getCoordBuffer(geomCol);
    expect(Array.from(buf)).toEqual([0, 0, 0.1, 0.1, 0.1, 0.1]);
    expect(buf.buffer).toBe(geomCol.data[0].children[0].values.buffer);
  });

  it("concatenates chunks in row order", () => {
    const events = generateCatalog(100);
    const single = buildEventTable(events).getChild("geometry");
    const multi = buildMultiChunkEventTable(events, 3).getChild("geometry");
    if (!single || !multi) throw new Error("geometry column missing");

    expect(multi.data.length).toBe(3);
    expect(Array.from(getCoordBuffer(multi))).toEqual(
      Array.from(getCoordBuffer(single)),
    );
  });
});

describe("declusterTable", () => {
  it("classifies table rows", () => {
    const out = declusterTable(buildEventTable(scenario), fixed);
    expect(out.length).toBe(3);
    expect(Array.from(out.classified)).toEqual([1, 1, 1]);
    expect(Array.from(out.isDependent)).toEqual([0, 1, 0]);
    expect(Array.from(out.parentRow)).toEqual([-1, 0, -1]);
    expect(out.deltaTSeconds[1]).toBe(864_000);
    expect(out.deltaDistanceKm[1]).toBeCloseTo(15.7253, 3);
    expect(Number.isNaN(out.deltaTSeconds[0])).toBe(true);
    expect(out.independentCount).toBe(2);
    expect(out.dependentCount).toBe(1);
  });

  it("matches the record API on a multi-chunk table", () => {
    const events = generateCatalog(300);
    const out = declusterTable(buildMultiChunkEventTable(events, 4), {
      mode: "nearest-in-time",
    });
    const records = decluster(events, {
      mode: "nearest-in-time",
      attribution: true,
    });

    const dependentRows: number[] = [];
    out.isDependent.forEach((flag, row) => {
      if (flag) dependentRows.push(row);
    });
    expect(dependentRows.map((row) => events[row].event_id)).toEqual(
      records.dependent.map((e) => e.event_id),
    );
    expect(
      dependentRows.map((row) => events[out.parentRow[row]].event_id),
    ).toEqual(records.dependent.map((e) => e.parent_id));
  });

  it("leaves masked rows out of the run", () => {
    const mask = new Uint8Array([0, 1, 1]);
    const out = declusterTable(buildEventTable(scenario), fixed, {}, mask);
    expect(Array.from(out.classified)).toEqual([0, 1, 1]);
    expect(Array.from(out.isDependent)).toEqual([0, 0, 0]);
    expect(out.independentCount).toBe(2);
  });

  it("runs the Reasenberg engine", () => {
    const out = declusterTable(
      buildEventTable([
        quake("m", 6.0, 0, 35, 139),
        quake("a", 4.0, 0.5, 35, 139),
      ]),
      { model: { kind: "reasenberg" } },
    );
    expect(Array.from(out.parentRow)).toEqual([-1, 0]);
  });

  it("reads renamed columns", () => {
    const base = buildEventTable(scenario);
    const geometry = base.getChild("geometry");
    const time = base.getChild("time");
    if (!geometry || !time) throw new Error("column missing");

    const table = new Table({
      geom: geometry,
      mag: makeVector(Float64Array.from([7.0, 4.5, 4.0])),
      origin: time,
    });
    const out = declusterTable(table, fixed, {
      geometry: "geom",
      magnitude: "mag",
      time: "origin",
    });
    expect(Array.from(out.isDependent)).toEqual([0, 1, 0]);
  });

  describe("null geometry", () => {
    const listType = new FixedSizeList(2, new Field("xy", new Float64()));
    const base = buildEventTable(scenario);
    const time = base.getChild("time");
    if (!time) throw new Error("time column missing");
    const table = new Table({
      geometry: vectorFromArray([[0, 0], null, [0.1, 0.1]], listType),
      magnitude: makeVector(Float64Array.from([7.0, 4.5, 4.0])),
      time,
    });

    it("rejects the row by default", () => {
      try {
        declusterTable(table, fixed);
        expect.unreachable();
      } catch (err) {
        expect(err).toBeInstanceOf(EventValidationError);
        if (!(err instanceof EventValidationError)) return;
        expect(err.index).toBe(1);
        expect(err.issues).toEqual([
          "latitude: Expected number, received null",
          "longitude: Expected number, received null",
        ]);
      }
    });

    it("leaves the row unclassified when skipping", () => {
      const out = declusterTable(table, { ...fixed, onInvalid: "skip" });
      expect(Array.from(out.classified)).toEqual([1, 0, 1]);
      expect(Array.from(out.isDependent)).toEqual([0, 0, 0]);
      expect(Array.from(out.parentRow)).toEqual([-1, -1, -1]);
      expect(out.independentCount).toBe(2);
      expect(out.dependentCount).toBe(0);
    });
  });

  it("handles an empty table", () => {
    const out = declusterTable(buildEventTable([]));
    expect(out.length).toBe(0);
    expect(out.independentCount).toBe(0);
    expect(out.dependentCount).toBe(0);
  });

  it("throws on a missing column", () => {
    const table = buildEventTable(scenario);
    expect(() => declusterTable(table, {}, { magnitude: "mag" })).toThrow(
      DeclusterError,
    );
    expect(() => declusterTable(table, {}, { magnitude: "mag" })).toThrow(
      'Column "mag" not found in Arrow Table',
    );
  });
});
