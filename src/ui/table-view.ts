import type { EndJumpPolicy } from "../config.js";
import type { TableRef } from "../drivers/base.js";
import type { KeyEvent, KeyMap } from "../keys.js";
import type { Handled, KeyHandler } from "../router.js";
import { TableState, type TableRequest, type TableSnapshot } from "../table-state.js";
import { InputLine } from "./input-line.js";

export type TableTab = "records" | "columns";

export type PromptKind = "filter" | "search" | "execute";

export interface TableViewSnapshot {
  tab: TableTab;
  table: TableSnapshot;
  prompt: { kind: PromptKind; text: string; cursor: number } | null;
}

export interface TableViewHooks {
  request(tab: TableTab, req: TableRequest): void;
  copy(text: string, cells: number): void;
  execute(statement: string): void;
}

const ACTIONS = [
  "scrollUp",
  "scrollDown",
  "scrollLeft",
  "scrollRight",
  "extendUp",
  "extendDown",
  "extendLeft",
  "extendRight",
  "pageUp",
  "pageDown",
  "scrollToTop",
  "scrollToBottom",
  "filter",
  "search",
  "sort",
  "copy",
  "refresh",
  "execute",
  "escape",
] as const;

/** The Records and Columns tabs of the open table. */
export class TableView implements KeyHandler {
  tab: TableTab = "records";
  readonly records: TableState;
  readonly columns: TableState;
  private prompt: { kind: PromptKind; line: InputLine } | null = null;

  constructor(
    private readonly keymap: KeyMap,
    private readonly hooks: TableViewHooks,
    endJumpPolicy: EndJumpPolicy = "count",
  ) {
    this.records = new TableState({ request: (req) => hooks.request("records", req), endJumpPolicy });
    this.columns = new TableState({ request: (req) => hooks.request("columns", req), paged: false });
  }

  get active(): TableState {
    return this.tab === "records" ? this.records : this.columns;
  }

  get table(): TableRef | null {
    return this.records.table;
  }

  open(table: TableRef): void {
    this.prompt = null;
    this.tab = "records";
    this.records.open(table);
    this.columns.open(table);
  }

  clear(): void {
    this.prompt = null;
    this.records.clear();
    this.columns.clear();
  }

  setTab(tab: TableTab): void {
    if (this.tab === tab) return;
    this.prompt = null;
    this.tab = tab;
  }

  resize(width: number, height: number): void {
    const viewport = { width, height };
    this.records.resize(viewport);
    this.columns.resize(viewport);
  }

  handleKey(event: KeyEvent): Handled {
    if (this.prompt) {
      this.handlePrompt(event, this.prompt.kind, this.prompt.line);
      return "handled";
    }

    const action = this.keymap.match(event, ACTIONS);
    if (action === null) return "unhandled";
    const state = this.active;

    switch (action) {
      case "scrollUp":
        state.moveBy(-1, 0);
        break;
      case "scrollDown":
        state.moveBy(1, 0);
        break;
      case "scrollLeft":
        state.moveBy(0, -1);
        break;
      case "scrollRight":
        state.moveBy(0, 1);
        break;
      case "extendUp":
        state.extendBy(-1, 0);
        break;
      case "extendDown":
        state.extendBy(1, 0);
        break;
      case "extendLeft":
        state.extendBy(0, -1);
        break;
      case "extendRight":
        state.extendBy(0, 1);
        break;
      case "pageUp":
        state.pageUp();
        break;
      case "pageDown":
        state.pageDown();
        break;
      case "scrollToTop":
        state.toTop();
        break;
      case "scrollToBottom":
        state.toBottom();
        break;
      case "filter":
        if (this.tab !== "records" || !this.records.table) return "unhandled";
        this.prompt = { kind: "filter", line: new InputLine(this.records.filter) };
        break;
      case "search":
        if (!state.table) return "unhandled";
        this.prompt = { kind: "search", line: new InputLine(state.search) };
        break;
      case "sort":
        if (this.tab !== "records") return "unhandled";
        state.cycleSort();
        break;
      case "copy": {
        const cells = state.selectedCells();
        if (cells.length === 0) return "handled";
        this.hooks.copy(state.copyPayload(), cells.reduce((n, row) => n + row.length, 0));
        break;
      }
      case "refresh":
        state.refresh();
        break;
      case "execute":
        this.prompt = { kind: "execute", line: new InputLine() };
        break;
      case "escape":
        if (!state.search) return "unhandled";
        state.setSearch("");
        break;
    }
    return "handled";
  }

  snapshot(): TableViewSnapshot {
    return {
      tab: this.tab,
      table: this.active.snapshot(),
      prompt: this.prompt
        ? { kind: this.prompt.kind, text: this.prompt.line.text, cursor: this.prompt.line.cursor }
        : null,
    };
  }

  private handlePrompt(event: KeyEvent, kind: PromptKind, line: InputLine): void {
    const outcome = line.handleKey(event);
    if (outcome === "cancel") {
      this.prompt = null;
      if (kind === "search") this.active.setSearch("");
      return;
    }
    if (kind === "search") {
      // search narrows as you type
      this.active.setSearch(line.text);
    }
    if (outcome !== "commit") return;

    this.prompt = null;
    if (kind === "filter") {
      this.records.applyFilter(line.text);
    } else if (kind === "execute" && line.text.trim()) {
      this.hooks.execute(line.text.trim());
    }
  }
}
