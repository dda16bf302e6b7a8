import { cellPlainText, type Cell } from "./cell.js";
import type { Page } from "./drivers/base.js";

const MAX_CELL_WIDTH = 200;

export const NULL_TEXT = "NULL";

export type OutputFormat = "table" | "json" | "csv";

interface Column {
  name: string;
  width: number;
}

/** Single-line display form of a cell. */
export function sanitizeCell(cell: Cell): string {
  if (cell.kind === "null") return NULL_TEXT;
  if (cell.kind === "bytes") return `[BLOB ${cell.value.length} bytes]`;
  const str = (cellPlainText(cell) ?? "").replace(/\r?\n/g, "\\n").replace(/\t/g, "\\t");
  if (str.length > MAX_CELL_WIDTH) return str.slice(0, MAX_CELL_WIDTH - 3) + "...";
  return str;
}

/** Clipboard form of a cell: full text, NULL spelled out, bytes as hex. */
export function clipboardCell(cell: Cell): string {
  return cellPlainText(cell) ?? NULL_TEXT;
}

/** Tab separated rows, newline separated lines. */
export function clipboardPayload(rows: readonly (readonly Cell[])[]): string {
  return rows.map((row) => row.map(clipboardCell).join("\t")).join("\n");
}

function jsonValue(cell: Cell): unknown {
  switch (cell.kind) {
    case "null":
      return null;
    case "int":
      return Number.isSafeInteger(Number(cell.value)) ? Number(cell.value) : cell.value.toString();
    case "float":
    case "bool":
      return cell.value;
    case "bytes":
      return `[BLOB ${cell.value.length} bytes]`;
    default:
      return cell.value;
  }
}

export function formatResults(page: Page, format: OutputFormat, totalAvailable?: number): string {
  if (page.rows.length === 0) return "No results.";

  switch (format) {
    case "json":
      return JSON.stringify(
        page.rows.map((row) => Object.fromEntries(page.columns.map((c, i) => [c, jsonValue(row[i])]))),
        null,
        2,
      );
    case "csv":
      return formatCsv(page);
    case "table":
    default:
      return formatTable(page, totalAvailable);
  }
}

function formatCsv(page: Page): string {
  const lines: string[] = [page.columns.map((c) => csvEscape(c)).join(",")];
  for (const row of page.rows) {
    // an unquoted empty field is NULL, a quoted one is the empty string
    lines.push(row.map((cell) => (cell.kind === "null" ? "" : csvEscape(clipboardCell(cell), true))).join(","));
  }
  return lines.join("\n");
}

export function csvEscape(val: string, quoteEmpty = false): string {
  if ((quoteEmpty && val === "") || val.includes(",") || val.includes('"') || val.includes("\n")) {
    return `"${val.replace(/"/g, '""')}"`;
  }
  return val;
}

/** Width of each column: the widest of header and cells, capped. */
export function columnWidths(columns: readonly string[], rows: readonly (readonly string[])[]): number[] {
  return columns.map((name, i) =>
    Math.min(
      rows.reduce((w, cells) => Math.max(w, cells[i]?.length ?? 0), name.length),
      MAX_CELL_WIDTH,
    ),
  );
}

function formatTable(page: Page, totalAvailable?: number): string {
  const cellGrid = page.rows.map((row) => row.map(sanitizeCell));
  const widths = columnWidths(page.columns, cellGrid);
  const columns: Column[] = page.columns.map((name, i) => ({ name, width: widths[i] }));

  const header = columns.map((c) => c.name.padEnd(c.width)).join(" | ");
  const sep = columns.map((c) => "─".repeat(c.width)).join("─┼─");
  const body = cellGrid.map((cells) => cells.map((cell, i) => cell.padEnd(columns[i].width)).join(" | "));

  const lines = [header, sep, ...body];

  if (totalAvailable !== undefined && totalAvailable > page.rows.length) {
    lines.push(`\n(showing ${page.rows.length} of ${totalAvailable} rows)`);
  } else {
    lines.push(`\n(${page.rows.length} row${page.rows.length === 1 ? "" : "s"})`);
  }

  return lines.join("\n");
}
