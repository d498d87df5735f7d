import Papa from "papaparse";

export interface CsvTable {
  columns: string[];
  rows: Record<string, string>[];
}

export class CsvError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "CsvError";
  }
}

/**
 * Parse CSV text with a header row. Cells stay strings; blank lines are
 * skipped. Malformed rows (wrong field count, bad quoting) are an error.
 */
export function parseCsv(text: string): CsvTable {
  const parsed = Papa.parse<Record<string, string>>(text, {
    header: true,
    dynamicTyping: false,
    skipEmptyLines: true,
  });
  if (parsed.errors.length > 0) {
    const [first] = parsed.errors;
    const where = first.row === undefined ? "" : ` (data row ${first.row + 1})`;
    throw new CsvError(`${first.message}${where}`);
  }
  return { columns: parsed.meta.fields ?? [], rows: parsed.data };
}

function cell(value: unknown): string {
  if (value === undefined || value === null) return "";
  if (typeof value === "number" && Number.isNaN(value)) return "";
  return String(value);
}

/** Serialize rows under the given header, in column order, with a final newline. */
export function formatCsv(
  rows: readonly Record<string, unknown>[],
  columns: string[],
): string {
  const text = Papa.unparse(
    {
      fields: columns,
      data: rows.map((row) => columns.map((column) => cell(row[column]))),
    },
    { newline: "\n" },
  );
  return `${text}\n`;
}
