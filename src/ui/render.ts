/**
 * Turns a view model into screen lines.
 *
 * Pure: no terminal access. Every line comes back exactly `layout.width`
 * columns wide (ANSI sequences excluded) and there are exactly
 * `layout.height` of them.
 */

import type { ViewModel } from "../app.js";
import { NULL_CELL } from "../cell.js";
import { sanitizeCell } from "../format.js";
import type { TableSnapshot, TotalRows } from "../table-state.js";
import type { ConnectionStatus } from "./connection-list.js";
import type { TreeItem } from "./schema-tree.js";

const CSI = "\x1b[";
const RESET = `${CSI}0m`;

export const ansi = {
  bold: (s: string) => `${CSI}1m${s}${RESET}`,
  dim: (s: string) => `${CSI}2m${s}${RESET}`,
  reverse: (s: string) => `${CSI}7m${s}${RESET}`,
  red: (s: string) => `${CSI}31m${s}${RESET}`,
  cyan: (s: string) => `${CSI}36m${s}${RESET}`,
};

const STATUS_MARK: Record<ConnectionStatus, string> = {
  idle: " ",
  connecting: "~",
  connected: "*",
  failed: "!",
};

/** Pad or cut plain text to exactly `width` columns. */
export function fit(text: string, width: number): string {
  if (width <= 0) return "";
  if (text.length > width) return width === 1 ? text.slice(0, 1) : text.slice(0, width - 1) + "…";
  return text + " ".repeat(width - text.length);
}

/** First index of a `size`-long window over `count` items that keeps `cursor` visible. */
export function windowStart(cursor: number, count: number, size: number): number {
  if (count <= size) return 0;
  return Math.max(0, Math.min(cursor - Math.floor(size / 2), count - size));
}

export function render(vm: ViewModel): string[] {
  const { layout } = vm;
  const body = layout.height - 1;
  const left = renderSidebar(vm, body);
  const right = renderTablePane(vm, body);

  const lines: string[] = [];
  for (let i = 0; i < body; i++) {
    lines.push(`${left[i] ?? fit("", layout.sidebarWidth)}${ansi.dim("│")}${right[i] ?? fit("", layout.tableWidth)}`);
  }
  lines.push(renderStatusLine(vm));

  if (vm.help) overlay(lines, layout.width, "Keys", vm.help.map((h) => `${fit(h.action, 18)} ${h.keys}`));
  if (vm.error) {
    const title = vm.error.kind === "connectivity" ? "Connection error" : "Query error";
    overlay(lines, layout.width, title, [...vm.error.message.split("\n"), "", "enter/esc to dismiss"], true);
  }
  return lines;
}

function title(text: string, width: number, focused: boolean): string {
  const fitted = fit(` ${text}`, width);
  return focused ? ansi.bold(ansi.cyan(fitted)) : ansi.bold(fitted);
}

function renderSidebar(vm: ViewModel, body: number): string[] {
  const width = vm.layout.sidebarWidth;
  const out: string[] = [];

  out.push(title("Connections", width, vm.focus === "connections"));
  const { items, cursor } = vm.connections;
  const rows = vm.layout.connectionRows;
  const start = windowStart(cursor, items.length, rows);
  for (let i = start; i < start + rows; i++) {
    const item = items[i];
    if (!item) {
      out.push(fit("", width));
      continue;
    }
    const text = fit(`${STATUS_MARK[item.status]} ${item.label}${item.readOnly ? "" : " (rw)"}`, width);
    out.push(i === cursor && vm.focus === "connections" ? ansi.reverse(text) : text);
  }

  const schema = vm.schema;
  const schemaTitle = schema.filter ? `Schema [/${schema.filter}]` : schema.loading ? "Schema (loading)" : "Schema";
  out.push(title(schemaTitle, width, vm.focus === "schema"));
  const treeRows = Math.max(0, body - out.length);
  const treeStart = windowStart(schema.cursor, schema.items.length, treeRows);
  for (let i = treeStart; i < treeStart + treeRows; i++) {
    const item = schema.items[i];
    if (!item) {
      out.push(fit("", width));
      continue;
    }
    const text = fit(treeLabel(item), width);
    out.push(i === schema.cursor && vm.focus === "schema" ? ansi.reverse(text) : text);
  }
  return out;
}

function treeLabel(item: TreeItem): string {
  if (item.kind === "database") {
    return `${item.expanded ? "▾" : "▸"} ${item.name}${item.loading ? " …" : ""}`;
  }
  return `    ${item.node.name}${item.node.kind === "view" ? " (view)" : ""}`;
}

function renderTablePane(vm: ViewModel, body: number): string[] {
  const width = vm.layout.tableWidth;
  const { tab, table } = vm.table;
  const focused = vm.focus === "table";
  const out: string[] = [];

  const records = tab === "records" ? ansi.reverse(" Records ") : " Records ";
  const columns = tab === "columns" ? ansi.reverse(" Columns ") : " Columns ";
  const name = table.table ? `${table.table.database}.${table.table.name}` : "";
  out.push(`${records}${columns}${fit(` ${name}`, width - 18)}`);

  if (!table.table) {
    out.push(fit(" Select a table in the schema tree.", width));
    while (out.length < body) out.push(fit("", width));
    return out;
  }

  const cols = table.visibleColumns;
  const gapFill = (used: number) => fit("", Math.max(0, width - used));
  const used = cols.reduce((n, c, i) => n + c.width + (i > 0 ? 3 : 0), 0);

  out.push(cols.map((c) => fit(table.columns[c.index] ?? "", c.width)).join(" │ ") + gapFill(used));
  out.push(cols.map((c) => "─".repeat(c.width)).join("─┼─") + gapFill(used));

  const rowsAvailable = body - 4;
  for (let r = 0; r < rowsAvailable; r++) {
    const row = table.visibleRows[r];
    if (!row) {
      out.push(fit("", width));
      continue;
    }
    const cells = cols.map((c) => {
      const cell = row.cells[c.index] ?? NULL_CELL;
      const plain = fit(sanitizeCell(cell), c.width);
      const text = cell.kind === "null" ? ansi.dim(plain) : plain;
      return isSelected(table, row.index, c.index) ? (focused ? ansi.reverse(text) : ansi.bold(text)) : text;
    });
    out.push(cells.join(" │ ") + gapFill(used));
  }

  out.push(fit(footer(table), width));
  return out;
}

function isSelected(table: TableSnapshot, row: number, column: number): boolean {
  const rect = table.selection;
  return rect !== null && row >= rect.top && row <= rect.bottom && column >= rect.left && column <= rect.right;
}

function totalText(total: TotalRows): string {
  switch (total.kind) {
    case "unknown":
      return "?";
    case "estimate":
      return `~${total.count}`;
    case "exact":
      return String(total.count);
  }
}

export function footer(table: TableSnapshot): string {
  const parts: string[] = [];
  if (table.cursor) {
    parts.push(`row ${table.baseOffset + table.cursor.row + 1} of ${totalText(table.total)}`);
  } else {
    parts.push(table.loading ? "" : "no rows");
  }
  if (table.filter) parts.push(`where ${table.filter}`);
  if (table.search) parts.push(`search "${table.search}" (${table.rowCount} match${table.rowCount === 1 ? "" : "es"})`);
  if (table.sort) parts.push(`order by ${table.sort.column} ${table.sort.direction}`);
  if (table.loading) parts.push("loading…");
  return " " + parts.filter(Boolean).join(" | ");
}

function renderStatusLine(vm: ViewModel): string {
  const width = vm.layout.width;
  const prompt = vm.focus === "table" ? vm.table.prompt : vm.focus === "schema" ? vm.schema.prompt : null;
  if (prompt) {
    const prefix = "kind" in prompt ? promptPrefix(prompt.kind) : "/";
    return fit(`${prefix}${prompt.text}`, width);
  }
  const where = vm.connection ? `[${vm.connection}] ` : "";
  return ansi.dim(fit(`${where}${vm.status}  ? for help`, width));
}

function promptPrefix(kind: "filter" | "search" | "execute"): string {
  switch (kind) {
    case "filter":
      return "WHERE ";
    case "search":
      return "search: ";
    case "execute":
      return ":";
  }
}

/** Draw a bordered box centred over `lines`, replacing whole lines. */
function overlay(lines: string[], width: number, heading: string, body: string[], alert = false): void {
  const inner = Math.max(10, Math.min(width - 4, Math.max(heading.length, ...body.map((l) => l.length)) + 2));
  const room = Math.max(1, lines.length - 3);
  const shown = body.slice(0, room);
  const box = [
    `┌─ ${heading} ${"─".repeat(Math.max(0, inner - heading.length - 3))}┐`,
    ...shown.map((l) => `│${fit(` ${l}`, inner)}│`),
    `└${"─".repeat(inner)}┘`,
  ];
  const left = Math.max(0, Math.floor((width - inner - 2) / 2));
  const top = Math.max(0, Math.floor((lines.length - box.length) / 2));
  box.forEach((text, i) => {
    const row = top + i;
    if (row >= lines.length) return;
    const padded = fit(" ".repeat(left) + text, width);
    lines[row] = alert ? ansi.red(padded) : padded;
  });
}
