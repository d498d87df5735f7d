/**
 * Terminal formatting for benchmark output.
 */

export const Colors = {
  reset: "\x1b[0m",
  dim: "\x1b[2m",
  red: "\x1b[31m",
  green: "\x1b[32m",
  cyan: "\x1b[36m",
} as const;

type Color = (typeof Colors)[keyof typeof Colors];

export function colorize(text: string, color: Color): string {
  return `${color}${text}${Colors.reset}`;
}

export function fmt(n: number): string {
  return n.toLocaleString("en-US");
}

export function fmtMs(ms: number): string {
  if (ms < 1) return `${(ms * 1000).toFixed(0)}µs`;
  if (ms < 1000) return `${ms.toFixed(2)}ms`;
  return `${(ms / 1000).toFixed(2)}s`;
}

/** Ratio of a baseline time to a candidate time. */
export function fmtDelta(ratio: number): string {
  if (!Number.isFinite(ratio)) return colorize("n/a", Colors.dim);
  return ratio >= 1
    ? colorize(`${ratio.toFixed(2)}× faster`, Colors.green)
    : colorize(`${(1 / ratio).toFixed(2)}× slower`, Colors.red);
}

const WIDTH = 76;

export function header(title: string): void {
  const rule = "=".repeat(WIDTH);
  console.log(colorize(`  ${rule}`, Colors.cyan));
  console.log(colorize(`  ${title.padStart((WIDTH + title.length) / 2)}`, Colors.cyan));
  console.log(colorize(`  ${rule}`, Colors.cyan));
}

export function divider(): void {
  console.log(colorize(`  ${"-".repeat(WIDTH)}`, Colors.dim));
}

export function sectionTitle(num: string, title: string): void {
  console.log(colorize(`  ${num}. ${title}`, Colors.cyan));
}

export function sparkBar(filled: number, total: number): string {
  return colorize(
    "#".repeat(filled) + ".".repeat(Math.max(0, total - filled)),
    Colors.green,
  );
}

// Column widths, by position
const COLUMNS = [12, 12, 12, 18, 16, 22];

const ANSI = /\x1b\[[0-9;]*m/g;

function cell(text: string, index: number): string {
  const width = COLUMNS[index] ?? 14;
  const visible = text.replace(ANSI, "").length;
  return text + " ".repeat(Math.max(0, width - visible));
}

export function tableHeader(cols: string[]): void {
  console.log(colorize(`  | ${cols.map(cell).join("| ")}`, Colors.dim));
  const rule = cols.map((_, i) => "-".repeat(COLUMNS[i] ?? 14)).join("+-");
  console.log(colorize(`  | ${rule}`, Colors.dim));
}

export function tableRow(cols: string[]): void {
  console.log(`  | ${cols.map(cell).join("| ")}`);
}

export function tableDivider(): void {
  console.log(colorize(`  +${"-".repeat(WIDTH - 1)}`, Colors.dim));
}
