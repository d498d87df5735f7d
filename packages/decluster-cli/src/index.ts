export { main, usage, UsageError } from "./cli";
export type { Reporter } from "./cli";
export { formatCsv, parseCsv, CsvError } from "./csv";
export type { CsvTable } from "./csv";
