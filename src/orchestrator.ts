/**
 * Query orchestration.
 *
 * `submit` starts a query on a later turn of the event loop and returns at
 * once; settled results land in an inbox the main loop drains each tick.
 * Each request belongs to a logical slot ("records", "schema", ...) and only
 * the newest token of a slot is ever delivered: older results are dropped
 * unexamined when they arrive, which is how rapid input cancels work that is
 * already on the wire.
 */

import type {
  Database,
  DatabaseDriver,
  ExecuteOutcome,
  Page,
  RecordsQuery,
  TableNode,
  TableRef,
} from "./drivers/base.js";
import { ConnectivityError, QueryError, errorMessage, isDbError, type DbError, type Result } from "./errors.js";
import { rootLogger } from "./logger.js";

const log = rootLogger.child("orchestrator");

export type Slot = string;

export type QueryRequest =
  | { kind: "connect" }
  | { kind: "databases" }
  | { kind: "tables"; database: string }
  | { kind: "rows"; query: RecordsQuery }
  | { kind: "columns"; table: TableRef }
  | { kind: "count"; table: TableRef; filter?: string }
  | { kind: "estimate"; table: TableRef }
  | { kind: "execute"; statement: string };

export interface OutcomeMap {
  connect: null;
  databases: Database[];
  tables: TableNode[];
  rows: Page;
  columns: Page;
  count: number;
  estimate: number | null;
  execute: ExecuteOutcome;
}

export type RequestKind = QueryRequest["kind"];
export type RequestOf<K extends RequestKind> = Extract<QueryRequest, { kind: K }>;

/** Opaque; compared by identity. */
export interface Token {
  readonly id: number;
  readonly slot: Slot;
}

export interface DeliveryOf<K extends RequestKind> {
  kind: K;
  token: Token;
  slot: Slot;
  request: RequestOf<K>;
  pool: DatabaseDriver;
  result: Result<OutcomeMap[K]>;
}

export type Delivery = { [K in RequestKind]: DeliveryOf<K> }[RequestKind];

export type Scheduler = (task: () => void) => void;

export interface OrchestratorOptions {
  /** Where work starts; defaults to the next macrotask. */
  schedule?: Scheduler;
  /** Called whenever something lands in the inbox. */
  onDelivery?: () => void;
}

async function settle<K extends RequestKind>(
  kind: K,
  request: RequestOf<K>,
  token: Token,
  pool: DatabaseDriver,
  work: () => Promise<OutcomeMap[K]>,
): Promise<DeliveryOf<K>> {
  const base = { kind, token, slot: token.slot, request, pool };
  try {
    return { ...base, result: { ok: true, value: await work() } };
  } catch (e) {
    return { ...base, result: { ok: false, error: normalizeError(kind, e) } };
  }
}

function normalizeError(kind: RequestKind, e: unknown): DbError {
  if (isDbError(e)) return e;
  if (kind === "connect") return new ConnectivityError(errorMessage(e), { cause: e });
  return new QueryError(errorMessage(e), { cause: e });
}

function perform(pool: DatabaseDriver, request: QueryRequest, token: Token): Promise<Delivery> {
  switch (request.kind) {
    case "connect":
      return settle("connect", request, token, pool, () => pool.connect().then(() => null));
    case "databases":
      return settle("databases", request, token, pool, () => pool.listDatabases());
    case "tables": {
      const { database } = request;
      return settle("tables", request, token, pool, () => pool.listTables(database));
    }
    case "rows": {
      const { query } = request;
      return settle("rows", request, token, pool, () => pool.fetchRows(query));
    }
    case "columns": {
      const { table } = request;
      return settle("columns", request, token, pool, () => pool.fetchColumns(table));
    }
    case "count": {
      const { table, filter } = request;
      return settle("count", request, token, pool, () => pool.countRows(table, filter));
    }
    case "estimate": {
      const { table } = request;
      return settle("estimate", request, token, pool, () => pool.estimateRows(table));
    }
    case "execute": {
      const { statement } = request;
      return settle("execute", request, token, pool, () => pool.execute(statement));
    }
  }
}

export class QueryOrchestrator {
  private nextId = 1;
  private readonly latest = new Map<Slot, Token>();
  private inbox: Delivery[] = [];
  private readonly inFlight = new Map<DatabaseDriver, number>();
  private readonly retiring = new Map<DatabaseDriver, Array<() => void>>();
  private readonly schedule: Scheduler;
  private readonly onDelivery?: () => void;
  private discarded = 0;

  constructor(options: OrchestratorOptions = {}) {
    this.schedule = options.schedule ?? ((task) => setImmediate(task));
    this.onDelivery = options.onDelivery;
  }

  /** Queue `request` against `pool`; supersedes whatever the slot was waiting for. */
  submit(slot: Slot, pool: DatabaseDriver, request: QueryRequest): Token {
    const token: Token = { id: this.nextId++, slot };
    const previous = this.latest.get(slot);
    if (previous) log.debug("superseded", { slot, token: previous.id, by: token.id });
    this.latest.set(slot, token);
    this.inFlight.set(pool, (this.inFlight.get(pool) ?? 0) + 1);

    this.schedule(() => {
      const started = performance.now();
      perform(pool, request, token).then(
        (delivery) => {
          log.debug("settled", {
            slot,
            token: token.id,
            kind: request.kind,
            ok: delivery.result.ok,
            durationMs: Math.round(performance.now() - started),
          });
          this.inbox.push(delivery);
          this.release(pool);
          this.onDelivery?.();
        },
        (e: unknown) => {
          // perform() settles every driver failure itself
          log.error("delivery failed", { slot, token: token.id, error: errorMessage(e) });
          this.release(pool);
        },
      );
    });
    return token;
  }

  /**
   * Everything delivered since the last call, in completion order, minus
   * results whose slot has moved on to a newer token.
   */
  drain(): Delivery[] {
    if (this.inbox.length === 0) return [];
    const arrived = this.inbox;
    this.inbox = [];

    const current: Delivery[] = [];
    for (const delivery of arrived) {
      if (this.latest.get(delivery.slot) === delivery.token) {
        this.latest.delete(delivery.slot);
        current.push(delivery);
      } else {
        this.discarded++;
        log.debug("discarded stale result", { slot: delivery.slot, token: delivery.token.id });
      }
    }
    return current;
  }

  /** True while the slot's newest submission has not been drained. */
  isAwaiting(slot: Slot): boolean {
    return this.latest.has(slot);
  }

  /** Make whatever the slot is waiting for stale without submitting anything new. */
  supersede(slot: Slot): void {
    this.latest.delete(slot);
  }

  /** Make every outstanding result stale. */
  invalidateAll(): void {
    this.latest.clear();
  }

  /** Results dropped as stale so far. */
  get discardedCount(): number {
    return this.discarded;
  }

  pendingFor(pool: DatabaseDriver): number {
    return this.inFlight.get(pool) ?? 0;
  }

  /**
   * Close `pool` once nothing submitted against it is still running.
   * In-flight work is never aborted; its results are stale by then.
   */
  retire(pool: DatabaseDriver): Promise<void> {
    if (this.pendingFor(pool) === 0) return this.closePool(pool);
    return new Promise<void>((resolve) => {
      const waiters = this.retiring.get(pool) ?? [];
      waiters.push(resolve);
      this.retiring.set(pool, waiters);
    });
  }

  private release(pool: DatabaseDriver): void {
    const remaining = (this.inFlight.get(pool) ?? 1) - 1;
    if (remaining > 0) {
      this.inFlight.set(pool, remaining);
      return;
    }
    this.inFlight.delete(pool);
    const waiters = this.retiring.get(pool);
    if (waiters) {
      this.retiring.delete(pool);
      void this.closePool(pool).then(() => waiters.forEach((resolve) => resolve()));
    }
  }

  private async closePool(pool: DatabaseDriver): Promise<void> {
    try {
      await pool.close();
      log.info("closed connection", { driver: pool.driverName });
    } catch (e) {
      log.warn("close failed", { driver: pool.driverName, error: errorMessage(e) });
    }
  }
}
