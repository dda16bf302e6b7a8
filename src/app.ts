/**
 * Application controller.
 *
 * Owns the configuration, the one live connection, the orchestrator and the
 * three components. The terminal host calls `handleKey` for input, `tick`
 * once per frame to apply settled query results, and `viewModel` to draw.
 * Nothing here blocks: every database call goes through the orchestrator.
 */

import { connectionLabel, type TablewalkConfig } from "./config.js";
import { createDriver, type DatabaseDriver, type TableNode } from "./drivers/index.js";
import { ConnectivityError, QueryError, type DbError } from "./errors.js";
import { KeyMap, type Action, type KeyEvent } from "./keys.js";
import { rootLogger } from "./logger.js";
import { isReadOnly } from "./safety.js";
import { QueryOrchestrator, type Delivery, type QueryRequest, type Slot, type Token } from "./orchestrator.js";
import { FocusState, routeKey, type Focus, type Handled, type KeyHandler, type Tier } from "./router.js";
import type { TableRequest } from "./table-state.js";
import { ConnectionList, type ConnectionListSnapshot } from "./ui/connection-list.js";
import { computeLayout, type Layout } from "./ui/layout.js";
import { SchemaTree, type SchemaTreeSnapshot } from "./ui/schema-tree.js";
import { TableView, type TableTab, type TableViewSnapshot } from "./ui/table-view.js";

const log = rootLogger.child("app");

export interface Clipboard {
  write(text: string): void;
}

export type DriverFactory = (conn: TablewalkConfig["connections"][number], allowMutations: boolean) => DatabaseDriver;

export interface AppOptions {
  config: TablewalkConfig;
  keymap?: KeyMap;
  orchestrator?: QueryOrchestrator;
  createDriver?: DriverFactory;
  clipboard?: Clipboard;
}

export interface ErrorOverlay {
  kind: DbError["kind"];
  message: string;
  /** Where focus goes once the overlay is dismissed. */
  returnFocus: Focus;
}

export interface ViewModel {
  layout: Layout;
  focus: Focus;
  connection: string | null;
  connections: ConnectionListSnapshot;
  schema: SchemaTreeSnapshot;
  table: TableViewSnapshot;
  error: ErrorOverlay | null;
  help: { action: Action; keys: string }[] | null;
  status: string;
}

interface PendingTableRequest {
  token: Token;
  tab: TableTab;
  req: TableRequest;
}

const APP_ACTIONS = [
  "focusLeft",
  "focusRight",
  "focusNext",
  "focusPrevious",
  "focusConnections",
  "tabRecords",
  "tabColumns",
  "help",
  "quit",
  "exit",
] as const;

const TABLES_SLOT_PREFIX = "tables:";

export class App {
  readonly focus = new FocusState("connections");
  readonly keymap: KeyMap;
  readonly orchestrator: QueryOrchestrator;
  readonly connectionList: ConnectionList;
  readonly schemaTree: SchemaTree;
  readonly tableView: TableView;

  private pool: DatabaseDriver | null = null;
  private activeIndex: number | null = null;
  private error: ErrorOverlay | null = null;
  private helpVisible = false;
  private status = "";
  private quitRequested = false;
  private layout: Layout;
  private readonly tableRequests = new Map<Slot, PendingTableRequest>();
  private readonly makeDriver: DriverFactory;
  private readonly clipboard: Clipboard | null;

  private readonly errorHandler: KeyHandler = { handleKey: (event) => this.handleErrorKey(event) };
  private readonly helpHandler: KeyHandler = { handleKey: (event) => this.handleHelpKey(event) };
  private readonly appHandler: KeyHandler = { handleKey: (event) => this.handleAppKey(event) };

  constructor(private readonly config: TablewalkConfig, options: Omit<AppOptions, "config"> = {}) {
    this.keymap = options.keymap ?? new KeyMap(config.keyBindings);
    this.orchestrator = options.orchestrator ?? new QueryOrchestrator();
    this.makeDriver = options.createDriver ?? createDriver;
    this.clipboard = options.clipboard ?? null;

    this.connectionList = new ConnectionList(
      config.connections.map((conn) => ({
        label: connectionLabel(conn),
        type: conn.type,
        readOnly: isReadOnly(conn.readOnly, config.allowMutations),
      })),
      this.keymap,
      { connect: (index) => this.connect(index) },
    );
    this.schemaTree = new SchemaTree(this.keymap, {
      loadDatabases: () => this.loadDatabases(),
      loadTables: (database) => this.loadTables(database),
      openTable: (table) => this.openTable(table),
    });
    this.tableView = new TableView(
      this.keymap,
      {
        request: (tab, req) => this.submitTableRequest(tab, req),
        copy: (text, cells) => this.copy(text, cells),
        execute: (statement) => this.execute(statement),
      },
      config.endJumpPolicy,
    );

    this.layout = computeLayout(80, 24, config.connections.length);
    this.applyLayout();
    if (config.connections.length === 0) {
      this.status = "No connections configured.";
    }
  }

  get shouldQuit(): boolean {
    return this.quitRequested;
  }

  get activePool(): DatabaseDriver | null {
    return this.pool;
  }

  get errorOverlay(): ErrorOverlay | null {
    return this.error;
  }

  // ── Input ──────────────────────────────────────────────────────────

  handleKey(event: KeyEvent): Tier {
    return routeKey(event, {
      error: this.error ? this.errorHandler : null,
      help: this.helpVisible ? this.helpHandler : null,
      component: this.focusedComponent(),
      app: this.appHandler,
    });
  }

  private focusedComponent(): KeyHandler {
    switch (this.focus.current) {
      case "connections":
        return this.connectionList;
      case "schema":
        return this.schemaTree;
      case "table":
        return this.tableView;
    }
  }

  private handleErrorKey(event: KeyEvent): Handled {
    if (this.keymap.matches(event, "exit")) {
      this.quitRequested = true;
    } else if (this.keymap.match(event, ["enter", "escape"] as const) && this.error) {
      this.focus.set(this.error.returnFocus);
      this.error = null;
    }
    return "handled";
  }

  private handleHelpKey(event: KeyEvent): Handled {
    if (this.keymap.matches(event, "exit")) {
      this.quitRequested = true;
    } else if (this.keymap.match(event, ["help", "escape", "enter", "quit"] as const)) {
      this.helpVisible = false;
    }
    return "handled";
  }

  private handleAppKey(event: KeyEvent): Handled {
    const action = this.keymap.match(event, APP_ACTIONS);
    switch (action) {
      case null:
        return "unhandled";
      case "focusLeft":
        this.focus.left();
        break;
      case "focusRight":
        this.focus.right();
        break;
      case "focusNext":
        this.focus.next();
        break;
      case "focusPrevious":
        this.focus.previous();
        break;
      case "focusConnections":
        this.focus.set("connections");
        break;
      case "tabRecords":
      case "tabColumns":
        if (!this.tableView.table) return "unhandled";
        this.tableView.setTab(action === "tabRecords" ? "records" : "columns");
        this.focus.set("table");
        break;
      case "help":
        this.helpVisible = true;
        break;
      case "quit":
      case "exit":
        this.quitRequested = true;
        break;
    }
    return "handled";
  }

  // ── Connections ────────────────────────────────────────────────────

  /** Make connection `index` the live one, abandoning whatever was live. */
  connect(index: number): void {
    const conn = this.config.connections[index];
    if (!conn) return;

    this.dropPool();
    this.schemaTree.reset();
    this.tableView.clear();

    const pool = this.makeDriver(conn, this.config.allowMutations);
    this.pool = pool;
    this.activeIndex = index;
    this.connectionList.setStatus(index, "connecting");
    this.status = `Connecting to ${connectionLabel(conn)}...`;
    log.info("connecting", { connection: connectionLabel(conn), driver: pool.driverName });
    this.orchestrator.submit("connect", pool, { kind: "connect" });
  }

  /** Abandon the live pool: its outstanding results go stale and it closes once idle. */
  private dropPool(): void {
    const pool = this.pool;
    this.orchestrator.invalidateAll();
    this.abandonTableRequests();
    this.pool = null;
    if (pool) {
      void this.orchestrator.retire(pool);
    }
  }

  private connectionLost(error: DbError): void {
    if (this.activeIndex !== null) this.connectionList.setStatus(this.activeIndex, "failed");
    this.dropPool();
    this.schemaTree.failed();
    this.status = "Disconnected.";
    this.showError(error);
  }

  // ── Queries ────────────────────────────────────────────────────────

  private submit(slot: Slot, request: QueryRequest): Token | null {
    if (!this.pool) return null;
    return this.orchestrator.submit(slot, this.pool, request);
  }

  private loadDatabases(): void {
    if (!this.submit("schema", { kind: "databases" })) this.schemaTree.failed();
  }

  private loadTables(database: string): void {
    if (!this.submit(TABLES_SLOT_PREFIX + database, { kind: "tables", database })) {
      this.schemaTree.failed(database);
    }
  }

  private openTable(table: TableNode): void {
    this.tableView.open({ database: table.database, name: table.name });
    this.focus.set("table");
    this.status = `${table.database}.${table.name}`;
  }

  private submitTableRequest(tab: TableTab, req: TableRequest): void {
    const state = tab === "records" ? this.tableView.records : this.tableView.columns;
    const slot = tab === "columns" ? "columns" : req.kind === "page" ? "records" : "records-count";
    let request: QueryRequest;
    if (req.kind === "page") {
      request = tab === "records" ? { kind: "rows", query: req.query } : { kind: "columns", table: req.query.table };
    } else if (req.kind === "count") {
      request = { kind: "count", table: req.table, filter: req.filter };
    } else {
      request = { kind: "estimate", table: req.table };
    }

    const token = this.submit(slot, request);
    if (!token) {
      state.fail(req);
      return;
    }
    this.tableRequests.set(slot, { token, tab, req });
  }

  private abandonTableRequests(): void {
    for (const { tab, req } of this.tableRequests.values()) {
      (tab === "records" ? this.tableView.records : this.tableView.columns).fail(req);
    }
    this.tableRequests.clear();
  }

  private execute(statement: string): void {
    if (!this.submit("execute", { kind: "execute", statement })) {
      this.status = "Not connected.";
      return;
    }
    this.status = "Running statement...";
  }

  private copy(text: string, cells: number): void {
    if (!this.clipboard) {
      this.status = "No clipboard available.";
      return;
    }
    this.clipboard.write(text);
    this.status = `Copied ${cells} cell${cells === 1 ? "" : "s"}.`;
  }

  // ── Results ────────────────────────────────────────────────────────

  /** Apply every result that settled since the last tick. True when anything changed. */
  tick(): boolean {
    const deliveries = this.orchestrator.drain();
    for (const delivery of deliveries) this.apply(delivery);
    return deliveries.length > 0;
  }

  private apply(d: Delivery): void {
    // results from a pool that has since been dropped change nothing
    if (d.pool !== this.pool) return;

    switch (d.kind) {
      case "connect":
        if (!d.result.ok) {
          this.connectionLost(d.result.error);
          return;
        }
        if (this.activeIndex !== null) this.connectionList.setStatus(this.activeIndex, "connected");
        this.status = `Connected to ${this.connectionList.items[this.activeIndex ?? 0]?.label ?? ""}.`;
        this.focus.set("schema");
        this.schemaTree.reset();
        this.loadDatabases();
        return;
      case "databases":
        if (d.result.ok) this.schemaTree.setDatabases(d.result.value);
        else this.fail(d.result.error, () => this.schemaTree.failed());
        return;
      case "tables": {
        const { database } = d.request;
        if (d.result.ok) this.schemaTree.setTables(database, d.result.value);
        else this.fail(d.result.error, () => this.schemaTree.failed(database));
        return;
      }
      case "rows":
      case "columns": {
        const pending = this.takeTableRequest(d.slot, d.token);
        if (!pending || pending.req.kind !== "page") return;
        const state = pending.tab === "records" ? this.tableView.records : this.tableView.columns;
        const req = pending.req;
        if (d.result.ok) state.ingestPage(req, d.result.value);
        else this.fail(d.result.error, () => state.fail(req));
        return;
      }
      case "count":
      case "estimate": {
        const pending = this.takeTableRequest(d.slot, d.token);
        if (!pending || pending.req.kind === "page") return;
        const req = pending.req;
        if (d.result.ok) this.tableView.records.ingestTotal(req, d.result.value);
        else this.fail(d.result.error, () => this.tableView.records.fail(req));
        return;
      }
      case "execute":
        if (!d.result.ok) {
          this.fail(d.result.error);
          return;
        }
        this.status = `${d.result.value.affectedRows} row(s) affected.`;
        this.tableView.records.refresh();
        return;
    }
  }

  private takeTableRequest(slot: Slot, token: Token): PendingTableRequest | null {
    const pending = this.tableRequests.get(slot);
    if (!pending || pending.token !== token) return null;
    this.tableRequests.delete(slot);
    return pending;
  }

  /** `rollback` undoes the caller's pending state; connectivity errors also take the connection down. */
  private fail(error: DbError, rollback?: () => void): void {
    rollback?.();
    if (error instanceof ConnectivityError) this.connectionLost(error);
    else this.showError(error);
  }

  /** The newest error replaces whatever overlay is showing. */
  showError(error: DbError): void {
    const returnFocus: Focus =
      error instanceof ConnectivityError ? "connections" : this.error?.returnFocus ?? this.focus.current;
    this.error = { kind: error.kind, message: error.message, returnFocus };
    const level = error instanceof QueryError ? "info" : "warn";
    log[level]("error shown", { kind: error.kind, message: error.message });
  }

  // ── Output ─────────────────────────────────────────────────────────

  resize(width: number, height: number): void {
    this.layout = computeLayout(width, height, this.config.connections.length);
    this.applyLayout();
  }

  private applyLayout(): void {
    this.tableView.resize(this.layout.tableWidth, this.layout.tableRows);
    this.schemaTree.height = this.layout.schemaRows;
  }

  viewModel(): ViewModel {
    return {
      layout: this.layout,
      focus: this.focus.current,
      connection: this.activeIndex === null ? null : this.connectionList.items[this.activeIndex]?.label ?? null,
      connections: this.connectionList.snapshot(),
      schema: this.schemaTree.snapshot(),
      table: this.tableView.snapshot(),
      error: this.error,
      help: this.helpVisible ? this.keymap.describe() : null,
      status: this.status,
    };
  }

  /** Drop the live connection and wait for it to close. */
  async shutdown(): Promise<void> {
    const pool = this.pool;
    this.orchestrator.invalidateAll();
    this.tableRequests.clear();
    this.pool = null;
    if (pool) await this.orchestrator.retire(pool);
  }
}
