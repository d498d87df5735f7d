import {
  makeVector,
  vectorFromArray,
  Table,
  Float64,
  Field,
  FixedSizeList,
} from "apache-arrow";

export type TestEvent = {
  event_id: string;
  magnitude: number;
  timestamp: string;
  latitude: number;
  longitude: number;
};

const DAY_MS = 86_400_000;
export const T0 = Date.UTC(2020, 0, 1);

/** ISO timestamp `days` after 2020-01-01T00:00:00Z. */
export function isoAfter(days: number): string {
  return new Date(T0 + days * DAY_MS).toISOString();
}

export function quake(
  id: string,
  magnitude: number,
  days: number,
  latitude: number,
  longitude: number,
): TestEvent {
  return {
    event_id: id,
    magnitude,
    timestamp: isoAfter(days),
    latitude,
    longitude,
  };
}

/**
 * Build an Arrow Table with a GeoArrow Point geometry column, a Float64
 * magnitude column and a Float64 epoch-millisecond time column.
 */
export function buildEventTable(events: TestEvent[]): Table {
  const childField = new Field("xy", new Float64());
  const listType = new FixedSizeList(2, childField);
  const geomVector = vectorFromArray(
    events.map((e) => [e.longitude, e.latitude]),
    listType,
  );

  const magnitudes = Float64Array.from(events, (e) => e.magnitude);
  const times = Float64Array.from(events, (e) => Date.parse(e.timestamp));

  return new Table({
    geometry: geomVector,
    magnitude: makeVector(magnitudes),
    time: makeVector(times),
  });
}

/**
 * Build a multi-chunk table by splitting events into `chunkCount` record
 * batches, as produced by IPC streams with several batches.
 */
export function buildMultiChunkEventTable(
  events: TestEvent[],
  chunkCount: number,
): Table {
  const chunkSize = Math.ceil(events.length / chunkCount);
  const tables: Table[] = [];

  for (let c = 0; c < chunkCount; c++) {
    const slice = events.slice(c * chunkSize, (c + 1) * chunkSize);
    if (slice.length === 0) continue;
    tables.push(buildEventTable(slice));
  }

  return new Table(tables.flatMap((t) => t.batches));
}

/**
 * Deterministic pseudo-random catalog in a 4°×4° region over three years,
 * magnitudes 2.5 to 7.0.
 */
export function generateCatalog(count: number): TestEvent[] {
  let seed = 42;
  const rand = () => {
    seed = (seed * 16807) % 2147483647;
    return seed / 2147483647;
  };

  const events: TestEvent[] = [];
  for (let i = 0; i < count; i++) {
    const days = rand() * 1095;
    const latitude = 34 + rand() * 4;
    const longitude = 138 + rand() * 4;
    // Gutenberg-Richter-like: small events dominate
    const magnitude = Math.round((2.5 + 4.5 * rand() ** 3) * 10) / 10;
    events.push(quake(`ev${i}`, magnitude, days, latitude, longitude));
  }
  return events;
}
