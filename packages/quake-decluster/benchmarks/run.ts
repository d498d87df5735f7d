#!/usr/bin/env tsx
/**
 * quake-decluster benchmark suite
 *
 * Measures engine throughput across catalog sizes.
 * Run: npm run bench (from the repository root)
 */

import {
  buildCatalog,
  decluster,
  declusterTable,
  DeclusterEngine,
  DEFAULT_FIELDS,
  ReasenbergEngine,
  countDependent,
  scaleWindowModel,
  type ClaimMode,
} from "../src/index";
import { buildEventTable, generateCatalog } from "../tests/test-utils";
import {
  fmt,
  fmtDelta,
  fmtMs,
  header,
  divider,
  sectionTitle,
  sparkBar,
  colorize,
  Colors,
  tableHeader,
  tableRow,
  tableDivider,
} from "./format";

// ─── Configuration ──────────────────────────────────────────────────────────

const BASE_SIZES = [1_000, 5_000, 20_000, 50_000];
const INCLUDE_LARGE = process.argv.includes("--large");
const CATALOG_SIZES = INCLUDE_LARGE ? [...BASE_SIZES, 200_000] : BASE_SIZES;
const WARMUP_RUNS = 2;
const BENCH_RUNS = 5;
const SCALES = [0.5, 1, 1.5, 2];

// ─── Timing Utilities ───────────────────────────────────────────────────────

interface TimingResult {
  median: number;
  min: number;
  max: number;
}

function measure(fn: () => void, runs: number, warmup: number): TimingResult {
  for (let i = 0; i < warmup; i++) fn();

  const samples: number[] = [];
  for (let i = 0; i < runs; i++) {
    const start = performance.now();
    fn();
    samples.push(performance.now() - start);
  }

  samples.sort((a, b) => a - b);
  return {
    median: samples[Math.floor(samples.length / 2)],
    min: samples[0],
    max: samples[samples.length - 1],
  };
}

function catalogOf(size: number) {
  const events = generateCatalog(size);
  return buildCatalog(events, DEFAULT_FIELDS, { onInvalid: "throw" });
}

// ─── Benchmark Runners ──────────────────────────────────────────────────────

function benchmarkMode(size: number, mode: ClaimMode) {
  const { catalog } = catalogOf(size);
  const engine = new DeclusterEngine({ model: { kind: "gk-formula" }, mode });
  return {
    time: measure(() => engine.classify(catalog), BENCH_RUNS, WARMUP_RUNS),
    dependent: countDependent(engine.classify(catalog)),
  };
}

function benchmarkReasenberg(size: number) {
  const { catalog } = catalogOf(size);
  const engine = new ReasenbergEngine();
  const time = measure(() => engine.classify(catalog), BENCH_RUNS, WARMUP_RUNS);
  const { classification, clusters } = engine.classify(catalog);
  return {
    time,
    dependent: countDependent(classification),
    clusters: clusters.length,
  };
}

function benchmarkScales(size: number) {
  const { catalog } = catalogOf(size);
  return SCALES.map((scale) => {
    const engine = new DeclusterEngine({
      model: scaleWindowModel({ kind: "gk-formula" }, scale),
    });
    const time = measure(
      () => engine.classify(catalog),
      BENCH_RUNS,
      WARMUP_RUNS,
    );
    return { scale, time, dependent: countDependent(engine.classify(catalog)) };
  });
}

function benchmarkInputs(size: number) {
  const events = generateCatalog(size);
  const table = buildEventTable(events);

  const recordTime = measure(
    () => {
      decluster(events);
    },
    BENCH_RUNS,
    WARMUP_RUNS,
  );
  const tableTime = measure(
    () => {
      declusterTable(table);
    },
    BENCH_RUNS,
    WARMUP_RUNS,
  );
  return { recordTime, tableTime };
}

// ─── Main ───────────────────────────────────────────────────────────────────

function main() {
  console.log("");
  header("quake-decluster  benchmarks");
  console.log("");
  console.log(colorize("  Benchmark Configuration", Colors.dim));
  console.log(
    colorize(
      `  ├─ Catalog sizes:  ${CATALOG_SIZES.map(fmt).join(", ")} events`,
      Colors.dim,
    ),
  );
  console.log(
    colorize(
      `  └─ Bench runs:     ${BENCH_RUNS} (${WARMUP_RUNS} warmup)`,
      Colors.dim,
    ),
  );
  console.log("");

  // ── 1. Claim modes ──────────────────────────────────────────────────────

  sectionTitle("1", "G-K Formula  (single-claim vs nearest-in-time)");
  console.log("");
  tableHeader(["Events", "Single", "Nearest", "Ratio", "Dependent"]);

  for (const size of CATALOG_SIZES) {
    const single = benchmarkMode(size, "single-claim");
    const nearest = benchmarkMode(size, "nearest-in-time");
    tableRow([
      fmt(size),
      fmtMs(single.time.median),
      fmtMs(nearest.time.median),
      fmtDelta(single.time.median / nearest.time.median),
      `${fmt(single.dependent)} / ${fmt(nearest.dependent)}`,
    ]);
  }
  tableDivider();
  console.log("");

  // ── 2. Reasenberg ───────────────────────────────────────────────────────

  sectionTitle("2", "Reasenberg  (chronological cluster growth)");
  console.log("");
  tableHeader(["Events", "Median", "Min", "Dependent", "Clusters"]);

  for (const size of CATALOG_SIZES) {
    const r = benchmarkReasenberg(size);
    tableRow([
      fmt(size),
      fmtMs(r.time.median),
      fmtMs(r.time.min),
      fmt(r.dependent),
      fmt(r.clusters),
    ]);
  }
  tableDivider();
  console.log("");

  // ── 3. Window scale ─────────────────────────────────────────────────────

  const scaleSize = CATALOG_SIZES[CATALOG_SIZES.length - 1];
  sectionTitle("3", `Window Scale  (${fmt(scaleSize)} events)`);
  console.log("");
  tableHeader(["Scale", "Median", "Dependent", "", "", ""]);

  const scaleResults = benchmarkScales(scaleSize);
  const maxDependent = Math.max(1, ...scaleResults.map((r) => r.dependent));
  for (const r of scaleResults) {
    const barLen = Math.max(1, Math.round((r.dependent / maxDependent) * 20));
    tableRow([
      `×${r.scale}`,
      fmtMs(r.time.median),
      fmt(r.dependent),
      "",
      "",
      sparkBar(barLen, 20),
    ]);
  }
  tableDivider();
  console.log("");

  // ── 4. Input format ─────────────────────────────────────────────────────

  sectionTitle("4", "Records vs Arrow Table  (validation + classification)");
  console.log("");
  tableHeader(["Events", "Records", "Arrow", "Speedup"]);

  for (const size of CATALOG_SIZES) {
    const { recordTime, tableTime } = benchmarkInputs(size);
    tableRow([
      fmt(size),
      fmtMs(recordTime.median),
      fmtMs(tableTime.median),
      fmtDelta(recordTime.median / tableTime.median),
    ]);
  }
  tableDivider();
  console.log("");
  divider();
  console.log("");
}

main();
