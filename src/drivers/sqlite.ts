import { existsSync, readFileSync, writeFileSync } from "node:fs";
import initSqlJs from "sql.js";
import type { Database as SqlJsDatabase, ParamsObject, SqlJsStatic, SqlValue } from "sql.js";
import {
  bytesCell,
  floatCell,
  intCell,
  jsonCell,
  NULL_CELL,
  temporalCell,
  textCell,
  type Cell,
  type TemporalType,
} from "../cell.js";
import { resolvePath } from "../config.js";
import { ConnectivityError, QueryError, errorMessage, isDbError, type DbError } from "../errors.js";
import { validateQuery } from "../safety.js";
import {
  columnsToPage,
  tableKind,
  type ColumnInfo,
  type Database as SchemaDatabase,
  type DatabaseDriver,
  type ExecuteOutcome,
  type KeyRole,
  type Page,
  type RecordsQuery,
  type TableNode,
  type TableRef,
} from "./base.js";
import { ansiDialect, buildCount, buildSelect } from "./sql.js";

/**
 * Storage class decides the cell, the declared column type only refines
 * text: SQLite has no temporal or JSON storage of its own.
 */
export function temporalTypeOf(declared: string | null): TemporalType | null {
  if (!declared) return null;
  const upper = declared.toUpperCase();
  if (upper.includes("TIMESTAMP") || upper.includes("DATETIME")) return "timestamp";
  if (upper.includes("DATE")) return "date";
  if (upper.includes("TIME")) return "time";
  return null;
}

/** Integers arrive as their decimal text so values past 2^53 keep every digit. */
export function sqliteCell(declared: string | null, storage: string, value: SqlValue): Cell {
  if (value === null || storage === "null") return NULL_CELL;
  if (value instanceof Uint8Array) return bytesCell(value);
  if (storage === "integer") return intCell(typeof value === "number" ? Math.trunc(value) : value);
  if (typeof value === "number") return floatCell(value);
  const temporal = temporalTypeOf(declared);
  if (temporal) return temporalCell(temporal, value);
  if (declared && /^JSONB?$/i.test(declared.trim())) return jsonCell(value);
  return textCell(value);
}

const CONNECTIVITY_MESSAGES = /file is not a database|database disk image is malformed|unable to open database|database closed/i;

export function classifySqliteError(e: unknown): DbError {
  if (isDbError(e)) return e;
  const msg = errorMessage(e);
  if (CONNECTIVITY_MESSAGES.test(msg)) {
    return new ConnectivityError(`SQLite database unusable: ${msg}`, { cause: e });
  }
  return new QueryError(msg, { cause: e });
}

interface TableInfoRow {
  name: string;
  type: string;
  notnull: boolean;
  defaultValue: string | null;
  pk: number;
}

let engine: Promise<SqlJsStatic> | null = null;

/** The WASM engine, compiled once per process. */
function loadEngine(): Promise<SqlJsStatic> {
  if (!engine) {
    // CommonJS package: under NodeNext the callable is the `default` property
    engine = initSqlJs.default().catch((e: unknown) => {
      engine = null;
      throw e;
    });
  }
  return engine;
}

function optionalText(value: SqlValue | undefined): string | null {
  return value === null || value === undefined ? null : String(value);
}

/** Rows of one statement as column-keyed objects. */
function queryObjects(db: SqlJsDatabase, sql: string, params: SqlValue[] = []): ParamsObject[] {
  const stmt = db.prepare(sql, params);
  try {
    const rows: ParamsObject[] = [];
    while (stmt.step()) rows.push(stmt.getAsObject());
    return rows;
  } finally {
    stmt.free();
  }
}

function queryArrays(db: SqlJsDatabase, sql: string): SqlValue[][] {
  const stmt = db.prepare(sql);
  try {
    const rows: SqlValue[][] = [];
    while (stmt.step()) rows.push(stmt.get());
    return rows;
  } finally {
    stmt.free();
  }
}

function tableInfo(db: SqlJsDatabase, table: TableRef): TableInfoRow[] {
  const schema = ansiDialect.quoteIdent(table.database);
  return queryObjects(db, `PRAGMA ${schema}.table_info(${ansiDialect.quoteIdent(table.name)})`).map((r) => ({
    name: String(r.name),
    type: String(r.type ?? ""),
    notnull: Number(r.notnull) !== 0,
    defaultValue: optionalText(r.dflt_value),
    pk: Number(r.pk),
  }));
}

/**
 * SQLite driver on the sql.js WASM engine. The file is read into memory on
 * connect; writes on a writable connection are saved back to it after each
 * statement. Attached databases (`main`, `temp`, ...) form the schema tree.
 * Every call runs to completion on the turn the orchestrator starts it.
 */
export class SqliteDriver implements DatabaseDriver {
  readonly driverName = "sqlite";
  private db: SqlJsDatabase | null = null;
  private readonly dbPath: string;

  constructor(
    path: string,
    private readonly readOnly: boolean,
    private readonly createIfMissing = false,
  ) {
    this.dbPath = path === ":memory:" ? path : resolvePath(path);
  }

  private get inMemory(): boolean {
    return this.dbPath === ":memory:";
  }

  async connect(): Promise<void> {
    try {
      const SQL = await loadEngine();
      if (this.inMemory) {
        this.db = new SQL.Database();
      } else if (existsSync(this.dbPath)) {
        this.db = new SQL.Database(readFileSync(this.dbPath));
      } else if (this.createIfMissing) {
        this.db = new SQL.Database();
        if (!this.readOnly) writeFileSync(this.dbPath, this.db.export());
      } else {
        throw new Error("no such file");
      }
      // reading the schema makes a non-database file fail here rather than later
      queryArrays(this.db, "SELECT count(*) FROM sqlite_master");
    } catch (e) {
      this.db?.close();
      this.db = null;
      throw new ConnectivityError(`Failed to open SQLite database at ${this.dbPath}: ${errorMessage(e)}`, { cause: e });
    }
  }

  async execute(statement: string): Promise<ExecuteOutcome> {
    const safety = validateQuery(statement, !this.readOnly);
    if (!safety.allowed) throw new QueryError(safety.reason ?? "statement blocked");
    return this.use((db) => {
      db.run(statement);
      const affectedRows = db.getRowsModified();
      if (!this.readOnly && !this.inMemory) writeFileSync(this.dbPath, db.export());
      return { affectedRows };
    });
  }

  async listDatabases(): Promise<SchemaDatabase[]> {
    return this.use((db) =>
      queryObjects(db, "PRAGMA database_list").map((r) => ({ name: String(r.name), tables: [] })),
    );
  }

  async listTables(database: string): Promise<TableNode[]> {
    return this.use((db) =>
      queryObjects(
        db,
        `SELECT name, type FROM ${ansiDialect.quoteIdent(database)}.sqlite_master
         WHERE type IN ('table', 'view') AND name NOT LIKE 'sqlite_%'
         ORDER BY name`,
      ).map((r) => ({ name: String(r.name), database, kind: tableKind(String(r.type)) })),
    );
  }

  /**
   * Each column is read as its storage class next to its value, so integers
   * and reals stay apart however the column was declared.
   */
  async fetchRows(query: RecordsQuery): Promise<Page> {
    return this.use((db) => {
      const info = tableInfo(db, query.table);
      if (info.length === 0) {
        throw new QueryError(`no such table: ${query.table.database}.${query.table.name}`);
      }
      const projection = info
        .map((c) => {
          const col = ansiDialect.quoteIdent(c.name);
          return `typeof(${col}), CASE typeof(${col}) WHEN 'integer' THEN CAST(${col} AS TEXT) ELSE ${col} END`;
        })
        .join(", ");
      const orderKeys = this.orderKeys(db, query.table, info);
      const rows = queryArrays(db, buildSelect(ansiDialect, query, { projection, orderKeys }));
      return {
        columns: info.map((c) => c.name),
        rows: rows.map((row) =>
          info.map((c, i) => sqliteCell(c.type || null, String(row[2 * i]), row[2 * i + 1] ?? null)),
        ),
      };
    });
  }

  // Primary key, else the row id of a table, else every column of a view.
  private orderKeys(db: SqlJsDatabase, table: TableRef, info: TableInfoRow[]): string[] {
    const primary = info.filter((c) => c.pk > 0).sort((a, b) => a.pk - b.pk);
    if (primary.length > 0) return primary.map((c) => ansiDialect.quoteIdent(c.name));
    const [master] = queryObjects(
      db,
      `SELECT type FROM ${ansiDialect.quoteIdent(table.database)}.sqlite_master WHERE name = ?`,
      [table.name],
    );
    if (master?.type === "table") return ["rowid"];
    return info.map((c) => ansiDialect.quoteIdent(c.name));
  }

  async fetchColumns(table: TableRef): Promise<Page> {
    return this.use((db) => {
      const schema = ansiDialect.quoteIdent(table.database);
      const name = ansiDialect.quoteIdent(table.name);
      const info = tableInfo(db, table);

      if (info.length === 0) {
        throw new QueryError(`Table "${table.name}" not found.`);
      }

      const foreign = new Set(
        queryObjects(db, `PRAGMA ${schema}.foreign_key_list(${name})`).map((r) => String(r.from)),
      );
      const indexRoles = new Map<string, KeyRole>();
      for (const index of queryObjects(db, `PRAGMA ${schema}.index_list(${name})`)) {
        const unique = Number(index.unique) === 1;
        const cols = queryObjects(db, `PRAGMA ${schema}.index_info(${ansiDialect.quoteIdent(String(index.name))})`);
        for (const col of cols) {
          const colName = optionalText(col.name);
          if (colName === null) continue;
          if (unique || !indexRoles.has(colName)) {
            indexRoles.set(colName, unique ? "UNIQUE" : "INDEX");
          }
        }
      }

      const columns: ColumnInfo[] = info.map((r) => {
        let key: KeyRole | null = indexRoles.get(r.name) ?? null;
        if (foreign.has(r.name) && key !== "UNIQUE") key = "FOREIGN";
        if (r.pk > 0) key = "PRIMARY";
        return {
          name: r.name,
          type: r.type || "ANY",
          nullable: !r.notnull,
          defaultValue: r.defaultValue,
          key,
        };
      });
      return columnsToPage(columns);
    });
  }

  async countRows(table: TableRef, filter?: string): Promise<number> {
    return this.use((db) => {
      const [row] = queryArrays(db, buildCount(ansiDialect, table, filter));
      return Number(row?.[0] ?? 0);
    });
  }

  async estimateRows(_table: TableRef): Promise<number | null> {
    return this.use(() => null);
  }

  async ping(): Promise<boolean> {
    try {
      this.use((db) => queryArrays(db, "SELECT 1"));
      return true;
    } catch {
      return false;
    }
  }

  async close(): Promise<void> {
    if (this.db) {
      this.db.close();
      this.db = null;
    }
  }

  private use<T>(fn: (db: SqlJsDatabase) => T): T {
    if (!this.db) throw new ConnectivityError("SQLite database not open.");
    try {
      return fn(this.db);
    } catch (e) {
      throw classifySqliteError(e);
    }
  }
}
