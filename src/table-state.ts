/**
 * Interactive table state.
 *
 * Owns the row buffer of one result set and everything the user does to it:
 * cursor and block selection, paging through the table, the WHERE filter,
 * client-side search and sort. It never talks to a driver; it hands
 * `TableRequest`s to the `request` callback and takes the answers back through
 * `ingestPage`/`ingestTotal`/`fail`, checking each against the request it is
 * waiting for so late answers cannot touch the buffer.
 */

import { cellPlainText, type Cell } from "./cell.js";
import type { EndJumpPolicy } from "./config.js";
import type { Page, RecordsQuery, SortSpec, TableRef } from "./drivers/base.js";
import { clipboardPayload, columnWidths, sanitizeCell } from "./format.js";

export type TotalRows =
  | { kind: "unknown" }
  | { kind: "estimate"; count: number }
  | { kind: "exact"; count: number };

/**
 * How a page lands in the buffer: `reset` replaces it from offset 0,
 * `append`/`prepend` extend it, `jump` replaces it at an arbitrary offset.
 */
export type LoadMode = "reset" | "append" | "prepend" | "jump";

export interface PageRequest {
  kind: "page";
  mode: LoadMode;
  query: RecordsQuery;
  signature: string;
}

export interface TotalRequest {
  kind: "count" | "estimate";
  table: TableRef;
  filter?: string;
  signature: string;
}

export type TableRequest = PageRequest | TotalRequest;

export interface Position {
  row: number;
  column: number;
}

export interface SelectionRect {
  top: number;
  bottom: number;
  left: number;
  right: number;
}

export interface Viewport {
  width: number;
  height: number;
}

export interface TableStateOptions {
  /** Receives every request the state wants answered. */
  request: (req: TableRequest) => void;
  /** False for single-page sources such as column metadata. */
  paged?: boolean;
  endJumpPolicy?: EndJumpPolicy;
}

export interface TableSnapshot {
  table: TableRef | null;
  columns: string[];
  /** Display text of the rows inside the viewport. */
  visibleRows: { index: number; absolute: number; cells: Cell[] }[];
  visibleColumns: { index: number; width: number }[];
  cursor: Position | null;
  selection: SelectionRect | null;
  rowCount: number;
  baseOffset: number;
  total: TotalRows;
  hasMore: boolean;
  loading: boolean;
  filter: string;
  search: string;
  sort: SortSpec | null;
}

const COLUMN_GAP = 3;

export function signatureOf(table: TableRef | null, filter: string, sort: SortSpec | null): string {
  return JSON.stringify([table?.database ?? null, table?.name ?? null, filter, sort?.column ?? null, sort?.direction ?? null]);
}

function clamp(n: number, lo: number, hi: number): number {
  return Math.max(lo, Math.min(hi, n));
}

export class TableState {
  table: TableRef | null = null;
  columns: string[] = [];
  /** Row buffer; `rows[0]` sits at `baseOffset` in the result set. */
  rows: Cell[][] = [];
  baseOffset = 0;
  hasMore = false;
  total: TotalRows = { kind: "unknown" };
  cursor: Position | null = null;
  anchor: Position | null = null;
  filter = "";
  search = "";
  sort: SortSpec | null = null;
  signature = signatureOf(null, "", null);
  scrollTop = 0;
  scrollLeft = 0;
  viewport: Viewport = { width: 80, height: 20 };

  private awaitingPage: PageRequest | null = null;
  private awaitingTotal: TotalRequest | null = null;
  /** Indices into `rows` that pass the client-side search. */
  private view: number[] = [];
  private stepAfterLoad = 0;
  private endAfterTotal = false;

  private readonly request: (req: TableRequest) => void;
  private readonly paged: boolean;
  private readonly endJumpPolicy: EndJumpPolicy;

  constructor(options: TableStateOptions) {
    this.request = options.request;
    this.paged = options.paged ?? true;
    this.endJumpPolicy = options.endJumpPolicy ?? "count";
  }

  get pageSize(): number {
    return Math.max(1, this.viewport.height);
  }

  get rowCount(): number {
    return this.view.length;
  }

  get loading(): boolean {
    return this.awaitingPage !== null;
  }

  // ── Loading ────────────────────────────────────────────────────────

  /** Show `table` from its first row with no filter, search or sort. */
  open(table: TableRef): void {
    this.table = table;
    this.columns = [];
    this.rows = [];
    this.view = [];
    this.baseOffset = 0;
    this.hasMore = false;
    this.cursor = null;
    this.anchor = null;
    this.filter = "";
    this.search = "";
    this.sort = null;
    this.scrollTop = 0;
    this.scrollLeft = 0;
    this.resign();
    this.requestPage("reset", 0);
  }

  /** Forget the table entirely, e.g. after switching connections. */
  clear(): void {
    this.table = null;
    this.columns = [];
    this.rows = [];
    this.view = [];
    this.baseOffset = 0;
    this.hasMore = false;
    this.cursor = null;
    this.anchor = null;
    this.filter = "";
    this.search = "";
    this.sort = null;
    this.awaitingPage = null;
    this.awaitingTotal = null;
    this.signature = signatureOf(null, "", null);
  }

  /** Reload from the first row keeping filter and sort. */
  refresh(): void {
    if (!this.table) return;
    this.resign();
    this.requestPage("reset", 0);
  }

  /**
   * Apply a page answered for `req`. Returns false when the page is stale:
   * not the request being waited for, or signed for another filter/sort.
   */
  ingestPage(req: PageRequest, page: Page): boolean {
    if (req !== this.awaitingPage || req.signature !== this.signature) return false;
    this.awaitingPage = null;

    const limit = req.query.limit;
    const full = this.paged && page.rows.length >= limit;

    switch (req.mode) {
      case "reset":
        this.columns = page.columns;
        this.rows = page.rows;
        this.baseOffset = 0;
        this.hasMore = full;
        this.cursor = { row: 0, column: 0 };
        this.anchor = null;
        this.scrollTop = 0;
        this.scrollLeft = 0;
        break;
      case "append":
        if (req.query.offset !== this.baseOffset + this.rows.length) return false;
        if (this.columns.length === 0) this.columns = page.columns;
        this.rows = this.rows.concat(page.rows);
        this.hasMore = full;
        break;
      case "prepend": {
        const before = this.view.length;
        this.rows = page.rows.concat(this.rows);
        this.baseOffset = req.query.offset;
        this.rebuildView();
        const shift = this.view.length - before;
        if (this.cursor) this.cursor = { ...this.cursor, row: this.cursor.row + shift };
        if (this.anchor) this.anchor = { ...this.anchor, row: this.anchor.row + shift };
        this.scrollTop += shift;
        break;
      }
      case "jump":
        if (page.rows.length === 0 && req.query.offset > 0) {
          // the estimate overshot the real end; count and try again
          this.total = { kind: "unknown" };
          this.endAfterTotal = true;
          this.requestTotal("count");
          return true;
        }
        this.columns = page.columns;
        this.rows = page.rows;
        this.baseOffset = req.query.offset;
        this.hasMore = full;
        this.anchor = null;
        this.cursor = { row: Number.MAX_SAFE_INTEGER, column: this.cursor?.column ?? 0 };
        break;
    }

    if (this.total.kind === "exact" && this.baseOffset + this.rows.length >= this.total.count) {
      this.hasMore = false;
    }
    if (!this.hasMore && this.paged) {
      this.total = { kind: "exact", count: this.baseOffset + this.rows.length };
    } else if (!this.paged) {
      this.total = { kind: "exact", count: this.rows.length };
    }

    this.rebuildView();
    if (this.stepAfterLoad !== 0 && req.mode !== "reset" && req.mode !== "jump") {
      this.moveCursor(this.stepAfterLoad, 0);
    }
    this.stepAfterLoad = 0;
    this.clampSelection();
    return true;
  }

  /** Apply a row count or estimate. */
  ingestTotal(req: TotalRequest, count: number | null): boolean {
    if (req !== this.awaitingTotal || req.signature !== this.signature) return false;
    this.awaitingTotal = null;

    if (count === null) {
      // the engine keeps no estimate; ask for the real thing
      if (req.kind === "estimate") this.requestTotal("count");
      else this.endAfterTotal = false;
      return true;
    }

    this.total = req.kind === "count" ? { kind: "exact", count } : { kind: "estimate", count };
    if (this.endAfterTotal) {
      this.endAfterTotal = false;
      this.jumpToEnd();
    }
    return true;
  }

  /** The request failed; the buffer stays as it was. */
  fail(req: TableRequest): boolean {
    if (req === this.awaitingPage) {
      this.awaitingPage = null;
      this.stepAfterLoad = 0;
      return true;
    }
    if (req === this.awaitingTotal) {
      this.awaitingTotal = null;
      this.endAfterTotal = false;
      return true;
    }
    return false;
  }

  // ── Movement ───────────────────────────────────────────────────────

  /** Single-step movement; collapses any block selection. */
  moveBy(dRow: number, dColumn: number): void {
    this.anchor = null;
    this.step(dRow, dColumn);
  }

  /** Extend the block selection anchored where extension began. */
  extendBy(dRow: number, dColumn: number): void {
    if (!this.cursor) return;
    this.anchor ??= { ...this.cursor };
    this.step(dRow, dColumn);
  }

  pageDown(): void {
    this.moveBy(this.pageSize, 0);
  }

  pageUp(): void {
    this.moveBy(-this.pageSize, 0);
  }

  /** First row: of the buffer, or of the table when the buffer starts later. */
  toTop(): void {
    this.anchor = null;
    if (this.baseOffset > 0 && this.table) {
      this.requestPage("reset", 0);
      return;
    }
    if (this.cursor) this.moveCursor(-this.cursor.row, 0);
  }

  /** Last buffered row, then the table's true last page when the total is known. */
  toBottom(): void {
    this.anchor = null;
    if (this.cursor) this.moveCursor(this.view.length, 0);
    if (!this.paged || !this.hasMore || !this.table) return;

    if (this.total.kind !== "unknown") {
      this.jumpToEnd();
      return;
    }
    switch (this.endJumpPolicy) {
      case "disable":
        return;
      case "estimate":
        this.endAfterTotal = true;
        this.requestTotal("estimate");
        return;
      case "count":
        this.endAfterTotal = true;
        this.requestTotal("count");
        return;
    }
  }

  private jumpToEnd(): void {
    if (this.total.kind === "unknown") return;
    const bufferEnd = this.baseOffset + this.rows.length;
    const offset = Math.max(0, this.total.count - this.pageSize);
    if (offset <= bufferEnd && !this.hasMore) return;
    if (offset <= bufferEnd) {
      // the last page overlaps the buffer: just keep reading forward
      this.stepAfterLoad = this.pageSize;
      this.requestPage("append", bufferEnd);
      return;
    }
    this.requestPage("jump", offset);
  }

  private step(dRow: number, dColumn: number): void {
    if (!this.cursor) return;
    const target = this.cursor.row + dRow;

    if (target >= this.view.length && this.paged && this.hasMore && !this.loading) {
      this.stepAfterLoad = target - (this.view.length - 1);
      this.requestPage("append", this.baseOffset + this.rows.length);
    } else if (target < 0 && this.baseOffset > 0 && !this.loading) {
      const offset = Math.max(0, this.baseOffset - this.pageSize);
      this.stepAfterLoad = target;
      this.requestPage("prepend", offset, this.baseOffset - offset);
    }
    this.moveCursor(dRow, dColumn);
  }

  private moveCursor(dRow: number, dColumn: number): void {
    if (!this.cursor) return;
    this.cursor = {
      row: this.cursor.row + dRow,
      column: this.cursor.column + dColumn,
    };
    this.clampSelection();
  }

  // ── Filter, search, sort ───────────────────────────────────────────

  /** Fold `filter` into the query and start over from the first row. */
  applyFilter(filter: string): void {
    if (!this.table || !this.paged) return;
    this.filter = filter.trim();
    this.resign();
    this.requestPage("reset", 0);
  }

  /** Client-side substring match over the buffered rows. */
  setSearch(text: string): void {
    this.search = text;
    this.rebuildView();
    if (this.cursor) this.cursor = { ...this.cursor, row: 0 };
    this.anchor = null;
    this.scrollTop = 0;
    this.clampSelection();
  }

  /** Cycle the cursor column through ascending, descending and unsorted. */
  cycleSort(): void {
    if (!this.table || !this.paged || !this.cursor) return;
    const column = this.columns[this.cursor.column];
    if (column === undefined) return;

    if (this.sort?.column !== column) {
      this.sort = { column, direction: "asc" };
    } else if (this.sort.direction === "asc") {
      this.sort = { column, direction: "desc" };
    } else {
      this.sort = null;
    }
    this.resign();
    this.requestPage("reset", 0);
  }

  // ── Selection & viewport ───────────────────────────────────────────

  resize(viewport: Viewport): void {
    this.viewport = { width: Math.max(1, viewport.width), height: Math.max(1, viewport.height) };
    this.clampSelection();
  }

  selectionRect(): SelectionRect | null {
    if (!this.cursor) return null;
    const anchor = this.anchor ?? this.cursor;
    return {
      top: Math.min(anchor.row, this.cursor.row),
      bottom: Math.max(anchor.row, this.cursor.row),
      left: Math.min(anchor.column, this.cursor.column),
      right: Math.max(anchor.column, this.cursor.column),
    };
  }

  selectedCells(): Cell[][] {
    const rect = this.selectionRect();
    if (!rect) return [];
    const out: Cell[][] = [];
    for (let r = rect.top; r <= rect.bottom; r++) {
      out.push(this.rows[this.view[r]].slice(rect.left, rect.right + 1));
    }
    return out;
  }

  /** Clipboard text of the selection; empty when nothing is selected. */
  copyPayload(): string {
    return clipboardPayload(this.selectedCells());
  }

  snapshot(): TableSnapshot {
    const visibleRows: TableSnapshot["visibleRows"] = [];
    const end = Math.min(this.view.length, this.scrollTop + this.viewport.height);
    for (let r = this.scrollTop; r < end; r++) {
      const index = this.view[r];
      visibleRows.push({ index: r, absolute: this.baseOffset + index, cells: this.rows[index] });
    }

    return {
      table: this.table,
      columns: this.columns,
      visibleRows,
      visibleColumns: this.fitColumns(visibleRows.map((r) => r.cells)),
      cursor: this.cursor,
      selection: this.selectionRect(),
      rowCount: this.view.length,
      baseOffset: this.baseOffset,
      total: this.total,
      hasMore: this.hasMore,
      loading: this.loading,
      filter: this.filter,
      search: this.search,
      sort: this.sort,
    };
  }

  // ── Internals ──────────────────────────────────────────────────────

  private resign(): void {
    this.signature = signatureOf(this.table, this.filter, this.sort);
    this.total = { kind: "unknown" };
    this.awaitingTotal = null;
    this.endAfterTotal = false;
    this.stepAfterLoad = 0;
  }

  private requestPage(mode: LoadMode, offset: number, limit = this.pageSize): void {
    if (!this.table) return;
    const query: RecordsQuery = {
      table: this.table,
      offset,
      limit,
      filter: this.filter || undefined,
      sort: this.sort ?? undefined,
    };
    // a new page always supersedes the one being waited for
    const req: PageRequest = { kind: "page", mode, query, signature: this.signature };
    this.awaitingPage = req;
    this.request(req);
  }

  private requestTotal(kind: TotalRequest["kind"]): void {
    if (!this.table) return;
    const req: TotalRequest = {
      kind,
      table: this.table,
      filter: this.filter || undefined,
      signature: this.signature,
    };
    this.awaitingTotal = req;
    this.request(req);
  }

  private rebuildView(): void {
    const needle = this.search.toLowerCase();
    this.view = [];
    for (let i = 0; i < this.rows.length; i++) {
      if (!needle || this.rows[i].some((cell) => cell.kind !== "null" && (cellPlainText(cell) ?? "").toLowerCase().includes(needle))) {
        this.view.push(i);
      }
    }
  }

  /** Keep cursor and anchor inside the displayed buffer and the cursor on screen. */
  private clampSelection(): void {
    if (this.view.length === 0 || this.columns.length === 0) {
      this.cursor = null;
      this.anchor = null;
      this.scrollTop = 0;
      this.scrollLeft = 0;
      return;
    }

    const maxRow = this.view.length - 1;
    const maxColumn = this.columns.length - 1;
    const cursor = this.cursor ?? { row: 0, column: 0 };
    this.cursor = { row: clamp(cursor.row, 0, maxRow), column: clamp(cursor.column, 0, maxColumn) };
    if (this.anchor) {
      this.anchor = { row: clamp(this.anchor.row, 0, maxRow), column: clamp(this.anchor.column, 0, maxColumn) };
    }

    const height = this.viewport.height;
    if (this.cursor.row < this.scrollTop) this.scrollTop = this.cursor.row;
    if (this.cursor.row >= this.scrollTop + height) this.scrollTop = this.cursor.row - height + 1;
    this.scrollTop = clamp(this.scrollTop, 0, Math.max(0, this.view.length - height));
    if (this.cursor.column < this.scrollLeft) this.scrollLeft = this.cursor.column;
    this.scrollLeft = clamp(this.scrollLeft, 0, maxColumn);
    while (this.scrollLeft < this.cursor.column && !this.columnFits(this.cursor.column)) {
      this.scrollLeft++;
    }
  }

  private widths(): number[] {
    const end = Math.min(this.view.length, this.scrollTop + this.viewport.height);
    const cells: string[][] = [];
    for (let r = this.scrollTop; r < end; r++) cells.push(this.rows[this.view[r]].map(sanitizeCell));
    return columnWidths(this.columns, cells);
  }

  private columnFits(column: number): boolean {
    const widths = this.widths();
    let used = 0;
    for (let c = this.scrollLeft; c <= column; c++) {
      used += widths[c] + (c > this.scrollLeft ? COLUMN_GAP : 0);
    }
    return used <= this.viewport.width;
  }

  private fitColumns(rows: Cell[][]): { index: number; width: number }[] {
    const widths = columnWidths(this.columns, rows.map((row) => row.map(sanitizeCell)));
    const out: { index: number; width: number }[] = [];
    let used = 0;
    for (let c = this.scrollLeft; c < this.columns.length; c++) {
      const gap = out.length > 0 ? COLUMN_GAP : 0;
      const remaining = this.viewport.width - used - gap;
      if (remaining <= 0) break;
      // the first column is shown even when wider than the screen, cut to fit
      const width = Math.min(widths[c], remaining);
      if (width < widths[c] && out.length > 0) break;
      out.push({ index: c, width });
      used += gap + width;
    }
    return out;
  }
}
