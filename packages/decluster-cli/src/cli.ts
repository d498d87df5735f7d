import { readFile, writeFile } from "node:fs/promises";
import { parseArgs, type ParseArgsConfig } from "node:util";
import {
  decluster,
  DeclusterError,
  DEFAULT_FIELDS,
  USGS_FIELDS,
  type CatalogFields,
  type DeclusterOptions,
} from "quake-decluster";
import { CsvError, formatCsv, parseCsv } from "./csv";

type OptionSpecs = NonNullable<ParseArgsConfig["options"]>;
type OptionValues = Record<string, string | boolean | (string | boolean)[] | undefined>;

/** Where the CLI reports progress and errors. */
export interface Reporter {
  log(message: string): void;
  error(message: string): void;
}

export class UsageError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "UsageError";
  }
}

interface Command {
  summary: string;
  options: OptionSpecs;
  /** Append parent attribution columns to the aftershock file */
  attribution: boolean;
  configure(values: OptionValues): DeclusterOptions;
}

const ATTRIBUTION_COLUMNS = [
  "parent_id",
  "parent_magnitude",
  "delta_t_seconds",
  "delta_distance_km",
];

// Synthetic id key for inputs without an id column; never written out
const ROW_ID = "__row_id";

const COMMON_OPTIONS: OptionSpecs = {
  input: { type: "string" },
  mainshocks: { type: "string" },
  aftershocks: { type: "string" },
  schema: { type: "string", default: "usgs" },
  "skip-invalid": { type: "boolean", default: false },
  help: { type: "boolean", short: "h", default: false },
};

const COMMANDS = new Map<string, Command>([
  [
    "decluster",
    {
      summary: "Gardner-Knopoff (1974) continuous window formula",
      options: {},
      attribution: false,
      configure: () => ({ model: { kind: "gk-formula" } }),
    },
  ],
  [
    "decluster-table",
    {
      summary: "Gardner-Knopoff (1974) discrete window table",
      options: {},
      attribution: false,
      configure: () => ({ model: { kind: "gk-table" } }),
    },
  ],
  [
    "decluster-fixed",
    {
      summary: "Fixed spatial and temporal window for every magnitude",
      options: {
        radius: { type: "string", default: "83.2" },
        window: { type: "string", default: "95.6" },
      },
      attribution: false,
      configure: (values) => ({
        model: {
          kind: "fixed",
          radiusKm: numberOption(values, "radius"),
          windowDays: numberOption(values, "window"),
        },
      }),
    },
  ],
  [
    "decluster-reasenberg",
    {
      summary: "Reasenberg (1985) interaction-based cluster growth",
      options: {
        rfact: { type: "string", default: "10" },
        "tau-min": { type: "string", default: "1" },
        "tau-max": { type: "string", default: "10" },
        "p-value": { type: "string", default: "0.95" },
        xmeff: { type: "string", default: "1.5" },
      },
      attribution: false,
      configure: (values) => ({
        model: {
          kind: "reasenberg",
          rFact: numberOption(values, "rfact"),
          tauMin: numberOption(values, "tau-min"),
          tauMax: numberOption(values, "tau-max"),
          p: numberOption(values, "p-value"),
          xmeff: numberOption(values, "xmeff"),
        },
      }),
    },
  ],
  [
    "window",
    {
      summary:
        "Scaled G-K formula, nearest-in-time parents; aftershocks carry attribution columns",
      options: { "window-size": { type: "string" } },
      attribution: true,
      configure: (values) => ({
        model: { kind: "gk-formula" },
        scale: numberOption(values, "window-size"),
        mode: "nearest-in-time",
      }),
    },
  ],
]);

function numberOption(values: OptionValues, name: string): number {
  const raw = values[name];
  if (typeof raw !== "string") {
    throw new UsageError(`--${name} is required`);
  }
  const value = Number(raw);
  if (raw.trim() === "" || Number.isNaN(value)) {
    throw new UsageError(`--${name} must be a number, got "${raw}"`);
  }
  return value;
}

function stringOption(values: OptionValues, name: string): string {
  const raw = values[name];
  if (typeof raw !== "string" || raw === "") {
    throw new UsageError(`--${name} is required`);
  }
  return raw;
}

function schemaFields(name: string): CatalogFields {
  if (name === "usgs") return { ...USGS_FIELDS };
  if (name === "standard") return { ...DEFAULT_FIELDS };
  throw new UsageError(`--schema must be "usgs" or "standard", got "${name}"`);
}

export function usage(): string {
  const lines = [
    "Usage: quake-decluster <command> --input <csv> --mainshocks <csv> --aftershocks <csv> [options]",
    "",
    "Commands:",
  ];
  for (const [name, command] of COMMANDS) {
    lines.push(`  ${name.padEnd(22)}${command.summary}`);
  }
  lines.push(
    "",
    "Common options:",
    "  --schema usgs|standard  input column layout (default: usgs)",
    "  --skip-invalid          leave out invalid rows instead of failing",
    "",
    "decluster-fixed:       --radius <km> (83.2)  --window <days> (95.6)",
    "decluster-reasenberg:  --rfact (10)  --tau-min (1)  --tau-max (10)  --p-value (0.95)  --xmeff (1.5)",
    "window:                --window-size <factor> (required)",
  );
  return lines.join("\n");
}

/**
 * Run the CLI. Returns the process exit code.
 */
export async function main(
  argv: string[],
  reporter: Reporter = console,
): Promise<number> {
  const [name, ...rest] = argv;
  if (name === undefined || name === "--help" || name === "-h") {
    reporter.log(usage());
    return name === undefined ? 1 : 0;
  }

  const command = COMMANDS.get(name);
  if (!command) {
    reporter.error(`Error: unknown command "${name}"`);
    reporter.error(usage());
    return 1;
  }

  try {
    return await run(command, rest, reporter);
  } catch (err) {
    if (
      err instanceof UsageError ||
      err instanceof CsvError ||
      err instanceof DeclusterError
    ) {
      reporter.error(`Error: ${err.message}`);
      return 1;
    }
    throw err;
  }
}

async function run(
  command: Command,
  args: string[],
  reporter: Reporter,
): Promise<number> {
  const values = parseOptions(args, { ...COMMON_OPTIONS, ...command.options });
  if (values.help === true) {
    reporter.log(usage());
    return 0;
  }

  const input = stringOption(values, "input");
  const mainshocksPath = stringOption(values, "mainshocks");
  const aftershocksPath = stringOption(values, "aftershocks");
  const fields = schemaFields(stringOption(values, "schema"));
  const options = command.configure(values);

  const { columns, rows } = parseCsv(await readFile(input, "utf8"));

  const required = [fields.magnitude, fields.time, fields.latitude, fields.longitude];
  const missing = required.filter((column) => !columns.includes(column));
  if (missing.length > 0) {
    reporter.error(
      `Error: input CSV missing required columns: ${missing.sort().join(", ")}`,
    );
    return 1;
  }

  let records: Record<string, string>[] = rows;
  if (!columns.includes(fields.id)) {
    records = rows.map((row, i) => ({ ...row, [ROW_ID]: String(i + 1) }));
    fields.id = ROW_ID;
  }

  const result = decluster(records, {
    ...options,
    fields,
    attribution: command.attribution,
    onInvalid: values["skip-invalid"] === true ? "skip" : "throw",
  });

  for (const { index, issues } of result.rejected) {
    reporter.error(`Skipped data row ${index + 1}: ${issues.join("; ")}`);
  }

  const aftershockColumns = command.attribution
    ? [...columns, ...ATTRIBUTION_COLUMNS]
    : columns;

  await writeFile(mainshocksPath, formatCsv(result.independent, columns));
  reporter.log(`Wrote ${result.independent.length} mainshocks to ${mainshocksPath}`);

  await writeFile(aftershocksPath, formatCsv(result.dependent, aftershockColumns));
  reporter.log(`Wrote ${result.dependent.length} aftershocks to ${aftershocksPath}`);

  return 0;
}

function parseOptions(args: string[], options: OptionSpecs): OptionValues {
  try {
    return parseArgs({ args, options, strict: true, allowPositionals: false })
      .values;
  } catch (err) {
    if (err instanceof TypeError) throw new UsageError(err.message);
    throw err;
  }
}
