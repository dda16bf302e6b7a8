import type { Database, TableNode } from "../drivers/base.js";
import type { KeyEvent, KeyMap } from "../keys.js";
import type { Handled, KeyHandler } from "../router.js";
import { InputLine } from "./input-line.js";

interface DatabaseEntry {
  name: string;
  /** null until the first listing arrives. */
  tables: TableNode[] | null;
  expanded: boolean;
  loading: boolean;
}

export type TreeItem =
  | { kind: "database"; name: string; expanded: boolean; loading: boolean; depth: 0 }
  | { kind: "table"; node: TableNode; depth: 1 };

export interface SchemaTreeSnapshot {
  items: TreeItem[];
  cursor: number;
  loading: boolean;
  filter: string;
  prompt: { text: string; cursor: number } | null;
}

export interface SchemaTreeHooks {
  loadDatabases(): void;
  loadTables(database: string): void;
  openTable(table: TableNode): void;
}

const ACTIONS = [
  "scrollUp",
  "scrollDown",
  "scrollLeft",
  "scrollRight",
  "pageUp",
  "pageDown",
  "scrollToTop",
  "scrollToBottom",
  "enter",
  "filter",
  "escape",
  "refresh",
] as const;

/** Databases and their tables, with tables listed lazily on first expand. */
export class SchemaTree implements KeyHandler {
  cursor = 0;
  filter = "";
  loading = false;
  height = 20;
  private databases: DatabaseEntry[] = [];
  private prompt: InputLine | null = null;

  constructor(
    private readonly keymap: KeyMap,
    private readonly hooks: SchemaTreeHooks,
  ) {}

  /** Start over for a new connection. */
  reset(): void {
    this.databases = [];
    this.cursor = 0;
    this.filter = "";
    this.prompt = null;
    this.loading = true;
  }

  /** Replace the listing wholesale, keeping expansion of databases that survive. */
  setDatabases(databases: Database[]): void {
    const previous = new Map(this.databases.map((d) => [d.name, d]));
    this.databases = databases.map((d) => {
      const old = previous.get(d.name);
      return {
        name: d.name,
        tables: d.tables.length > 0 ? d.tables : null,
        expanded: old?.expanded ?? false,
        loading: false,
      };
    });
    this.loading = false;
    for (const db of this.databases) {
      if (db.expanded && db.tables === null) this.requestTables(db);
    }
    this.clampCursor();
  }

  setTables(database: string, tables: TableNode[]): void {
    const db = this.databases.find((d) => d.name === database);
    if (!db) return;
    db.tables = tables;
    db.loading = false;
    this.clampCursor();
  }

  /** A listing failed; leave what is there and stop showing it as loading. */
  failed(database?: string): void {
    if (database === undefined) {
      this.loading = false;
      return;
    }
    const db = this.databases.find((d) => d.name === database);
    if (db) db.loading = false;
  }

  items(): TreeItem[] {
    const needle = this.filter.toLowerCase();
    const out: TreeItem[] = [];
    for (const db of this.databases) {
      const tables = db.tables ?? [];
      const matching = needle ? tables.filter((t) => t.name.toLowerCase().includes(needle)) : tables;
      if (needle && matching.length === 0 && !db.name.toLowerCase().includes(needle)) continue;
      out.push({ kind: "database", name: db.name, expanded: db.expanded, loading: db.loading, depth: 0 });
      if (db.expanded) {
        for (const node of matching) out.push({ kind: "table", node, depth: 1 });
      }
    }
    return out;
  }

  handleKey(event: KeyEvent): Handled {
    if (this.prompt) {
      const outcome = this.prompt.handleKey(event);
      if (outcome === "cancel") {
        this.prompt = null;
      } else {
        this.filter = this.prompt.text;
        if (outcome === "commit") this.prompt = null;
        this.cursor = 0;
        this.clampCursor();
      }
      return "handled";
    }

    const action = this.keymap.match(event, ACTIONS);
    if (action === null) return "unhandled";

    const items = this.items();
    const current = items[this.cursor];
    switch (action) {
      case "scrollUp":
        this.cursor--;
        break;
      case "scrollDown":
        this.cursor++;
        break;
      case "pageUp":
        this.cursor -= this.height;
        break;
      case "pageDown":
        this.cursor += this.height;
        break;
      case "scrollToTop":
        this.cursor = 0;
        break;
      case "scrollToBottom":
        this.cursor = items.length - 1;
        break;
      case "enter":
        if (current?.kind === "table") this.hooks.openTable(current.node);
        else if (current) this.toggle(current.name);
        break;
      case "scrollRight":
        if (current?.kind === "database" && !current.expanded) this.toggle(current.name);
        break;
      case "scrollLeft":
        if (current?.kind === "database" && current.expanded) {
          this.toggle(current.name);
        } else if (current?.kind === "table") {
          const parent = items.findIndex((i) => i.kind === "database" && i.name === current.node.database);
          if (parent >= 0) this.cursor = parent;
        }
        break;
      case "filter":
        this.prompt = new InputLine(this.filter);
        break;
      case "escape":
        if (!this.filter) return "unhandled";
        this.filter = "";
        break;
      case "refresh":
        this.loading = true;
        this.hooks.loadDatabases();
        break;
    }
    this.clampCursor();
    return "handled";
  }

  snapshot(): SchemaTreeSnapshot {
    return {
      items: this.items(),
      cursor: this.cursor,
      loading: this.loading,
      filter: this.filter,
      prompt: this.prompt ? { text: this.prompt.text, cursor: this.prompt.cursor } : null,
    };
  }

  private toggle(name: string): void {
    const db = this.databases.find((d) => d.name === name);
    if (!db) return;
    db.expanded = !db.expanded;
    if (db.expanded && db.tables === null && !db.loading) this.requestTables(db);
  }

  private requestTables(db: DatabaseEntry): void {
    db.loading = true;
    this.hooks.loadTables(db.name);
  }

  private clampCursor(): void {
    const count = this.items().length;
    this.cursor = Math.max(0, Math.min(count - 1, this.cursor));
  }
}
