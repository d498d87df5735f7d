import { isValid, parseISO } from "date-fns";
import { z } from "zod";
import { EventValidationError } from "./errors";
import type {
  CatalogFields,
  CatalogRecord,
  InvalidRecordPolicy,
  RejectedRecord,
} from "./types";

/**
 * Index-addressable, columnar event storage. Entry `i` of every array
 * describes the same event; entries are never modified after build.
 */
export interface Catalog {
  readonly length: number;
  readonly ids: readonly string[];
  readonly magnitudes: Float64Array;
  /** Origin times in epoch seconds */
  readonly times: Float64Array;
  /** Interleaved: [lng0, lat0, lng1, lat1, ...] */
  readonly coords: Float64Array;
  readonly depths: Float64Array;
}

/** Raw values of one event, before validation. */
export interface RawEventFields {
  id: unknown;
  magnitude: unknown;
  time: unknown;
  latitude: unknown;
  longitude: unknown;
  depth: unknown;
}

const ZONE_DESIGNATOR = /(?:Z|[+-]\d{2}(?::?\d{2})?)$/i;

/**
 * Epoch milliseconds of an ISO-8601 string, Date, number or bigint.
 * Strings without a zone designator are read as UTC.
 */
export function toEpochMillis(value: unknown): number | null {
  if (value instanceof Date) {
    return isValid(value) ? value.getTime() : null;
  }
  if (typeof value === "number") {
    return Number.isFinite(value) ? value : null;
  }
  if (typeof value === "bigint") return Number(value);
  if (typeof value !== "string") return null;

  const text = value.trim();
  if (text === "") return null;
  let iso = text;
  if (!/[T ]/.test(text)) {
    iso = `${text}T00:00:00Z`;
  } else if (!ZONE_DESIGNATOR.test(text)) {
    iso = `${text}Z`;
  }
  const date = parseISO(iso);
  return isValid(date) ? date.getTime() : null;
}

/** Numeric strings (CSV cells) become numbers; blanks become undefined. */
function numeric<T extends z.ZodTypeAny>(schema: T) {
  return z.preprocess((value) => {
    if (typeof value !== "string") return value;
    const text = value.trim();
    return text === "" ? undefined : Number(text);
  }, schema);
}

const eventSchema = z.object({
  id: z
    .union([z.string().trim().min(1), z.number().finite()])
    .transform(String),
  magnitude: numeric(z.number().finite().positive()),
  time: z.unknown().transform((value, ctx) => {
    const millis = toEpochMillis(value);
    if (millis === null) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        message: `unparseable timestamp ${JSON.stringify(value)}`,
      });
      return z.NEVER;
    }
    return millis / 1000;
  }),
  latitude: numeric(z.number().min(-90).max(90)),
  longitude: numeric(z.number().min(-180).max(180)),
  depth: numeric(z.number().finite().nonnegative().nullish()).transform(
    (value) => value ?? 0,
  ),
});

export type ParsedEvent = z.output<typeof eventSchema>;

/** Validate one event. Returns the parsed values or the list of problems. */
export function parseEvent(
  raw: RawEventFields,
): { ok: true; event: ParsedEvent } | { ok: false; issues: string[] } {
  const result = eventSchema.safeParse(raw);
  if (result.success) return { ok: true, event: result.data };
  return {
    ok: false,
    issues: result.error.issues.map(
      (issue) => `${issue.path.join(".")}: ${issue.message}`,
    ),
  };
}

export interface CatalogBuilderOptions {
  onInvalid: InvalidRecordPolicy;
  /** Reject events below this magnitude (window table coverage). */
  minMagnitude?: number;
}

/**
 * Accumulates validated events into a {@link Catalog}.
 *
 * Every pushed row is either accepted (and mapped to the next catalog index)
 * or rejected. Under the `throw` policy the first rejection aborts the build.
 */
export class CatalogBuilder {
  private ids: string[] = [];
  private magnitudes: number[] = [];
  private times: number[] = [];
  private coords: number[] = [];
  private depths: number[] = [];
  private rows: number[] = [];
  private seen = new Set<string>();

  readonly onInvalid: InvalidRecordPolicy;
  readonly minMagnitude: number;

  constructor(options: CatalogBuilderOptions) {
    this.onInvalid = options.onInvalid;
    this.minMagnitude = options.minMagnitude ?? 0;
  }

  /** Number of events accepted so far. */
  get size(): number {
    return this.ids.length;
  }

  /**
   * Validate and append one row. Returns the problems found (empty when
   * accepted); throws instead under the `throw` policy.
   */
  push(row: number, raw: RawEventFields): string[] {
    const parsed = parseEvent(raw);
    const issues = parsed.ok ? this._checkAccepted(parsed.event) : parsed.issues;

    if (issues.length > 0 && this.onInvalid === "throw") {
      throw new EventValidationError(row, issues);
    }

    if (parsed.ok && issues.length === 0) {
      const { event } = parsed;
      this.seen.add(event.id);
      this.ids.push(event.id);
      this.magnitudes.push(event.magnitude);
      this.times.push(event.time);
      this.coords.push(event.longitude, event.latitude);
      this.depths.push(event.depth);
      this.rows.push(row);
    }
    return issues;
  }

  finish(): { catalog: Catalog; sourceRows: Int32Array } {
    return {
      catalog: {
        length: this.ids.length,
        ids: this.ids.slice(),
        magnitudes: Float64Array.from(this.magnitudes),
        times: Float64Array.from(this.times),
        coords: Float64Array.from(this.coords),
        depths: Float64Array.from(this.depths),
      },
      sourceRows: Int32Array.from(this.rows),
    };
  }

  private _checkAccepted(event: ParsedEvent): string[] {
    const issues: string[] = [];
    if (this.seen.has(event.id)) {
      issues.push(`id: duplicate event id "${event.id}"`);
    }
    if (event.magnitude < this.minMagnitude) {
      issues.push(
        `magnitude: ${event.magnitude} is below the window table minimum ${this.minMagnitude}`,
      );
    }
    return issues;
  }
}

export interface CatalogBuild<R> {
  catalog: Catalog;
  /** Input index of each catalog entry */
  sourceRows: Int32Array;
  rejected: RejectedRecord<R>[];
}

/**
 * Validate caller records and build the event arena.
 * Catalog order is input order with rejected records left out.
 */
export function buildCatalog<R extends CatalogRecord>(
  records: readonly R[],
  fields: CatalogFields,
  options: CatalogBuilderOptions,
): CatalogBuild<R> {
  const builder = new CatalogBuilder(options);
  const rejected: RejectedRecord<R>[] = [];

  records.forEach((record, index) => {
    const issues = builder.push(index, {
      id: record[fields.id],
      magnitude: record[fields.magnitude],
      time: record[fields.time],
      latitude: record[fields.latitude],
      longitude: record[fields.longitude],
      depth: record[fields.depth],
    });
    if (issues.length > 0) rejected.push({ index, record, issues });
  });

  return { ...builder.finish(), rejected };
}
