import pg from "pg";
import type { FieldDef, Pool as PgPool, PoolConfig, TypeOverrides } from "pg";
import {
  boolCell,
  cellFromValue,
  decimalCell,
  floatCell,
  intCell,
  jsonCell,
  NULL_CELL,
  temporalCell,
  textCell,
  type Cell,
} from "../cell.js";
import { expandEnv, type ConnectionConfig } from "../config.js";
import {
  ConnectivityError,
  QueryError,
  errorCode,
  errorMessage,
  isDbError,
  isNetworkCode,
  type DbError,
} from "../errors.js";
import { rootLogger } from "../logger.js";
import { validateQuery } from "../safety.js";
import {
  columnsToPage,
  tableKind,
  type ColumnInfo,
  type Database,
  type DatabaseDriver,
  type ExecuteOutcome,
  type KeyRole,
  type Page,
  type RecordsQuery,
  type TableNode,
  type TableRef,
} from "./base.js";
import { SerialTaskQueue } from "./serial-queue.js";
import { ansiDialect, buildCount, buildSelect, qualifiedName } from "./sql.js";

const log = rootLogger.child("postgres");

/** Type OIDs the normalizer distinguishes. */
export const PG_OID = {
  BOOL: 16,
  BYTEA: 17,
  INT8: 20,
  INT2: 21,
  INT4: 23,
  OID: 26,
  JSON: 114,
  FLOAT4: 700,
  FLOAT8: 701,
  DATE: 1082,
  TIME: 1083,
  TIMESTAMP: 1114,
  TIMESTAMPTZ: 1184,
  TIMETZ: 1266,
  NUMERIC: 1700,
  JSONB: 3802,
} as const;

// int8 and numeric would lose precision as JS numbers, temporal types would be
// shifted into the local zone as Dates; keep the server's text for all of them.
const RAW_TEXT_OIDS = [
  PG_OID.INT8,
  PG_OID.NUMERIC,
  PG_OID.DATE,
  PG_OID.TIME,
  PG_OID.TIMETZ,
  PG_OID.TIMESTAMP,
  PG_OID.TIMESTAMPTZ,
  PG_OID.JSON,
  PG_OID.JSONB,
];

export function rawTextTypes(): TypeOverrides {
  const types = new pg.TypeOverrides();
  for (const oid of RAW_TEXT_OIDS) {
    types.setTypeParser(oid, (value: string) => value);
  }
  return types;
}

export function pgCell(oid: number, value: unknown): Cell {
  if (value === null || value === undefined) return NULL_CELL;

  switch (oid) {
    case PG_OID.BOOL:
      return typeof value === "boolean" ? boolCell(value) : boolCell(value === "t");
    case PG_OID.INT2:
    case PG_OID.INT4:
    case PG_OID.INT8:
    case PG_OID.OID:
      return typeof value === "number" || typeof value === "string" || typeof value === "bigint"
        ? intCell(value)
        : cellFromValue(value);
    case PG_OID.FLOAT4:
    case PG_OID.FLOAT8:
      return floatCell(Number(value));
    case PG_OID.NUMERIC:
      return decimalCell(String(value));
    case PG_OID.DATE:
      return temporalCell("date", String(value));
    case PG_OID.TIME:
    case PG_OID.TIMETZ:
      return temporalCell("time", String(value));
    case PG_OID.TIMESTAMP:
    case PG_OID.TIMESTAMPTZ:
      return temporalCell("timestamp", String(value));
    case PG_OID.JSON:
    case PG_OID.JSONB:
      return typeof value === "string" ? jsonCell(value) : cellFromValue(value);
    default:
      return typeof value === "string" ? textCell(value) : cellFromValue(value);
  }
}

export function normalizePgResult(
  fields: readonly Pick<FieldDef, "name" | "dataTypeID">[],
  rows: readonly (readonly unknown[])[],
): Page {
  return {
    columns: fields.map((f) => f.name),
    rows: rows.map((row) => fields.map((f, i) => pgCell(f.dataTypeID, row[i]))),
  };
}

// SQLSTATE classes: 08 connection exception, 28 invalid authorization,
// 3D invalid catalog name, 57P operator intervention (shutdown).
const CONNECTIVITY_SQLSTATE = /^(08|28|3D|57P)/;

export function classifyPgError(e: unknown): DbError {
  if (isDbError(e)) return e;
  const code = errorCode(e);
  const msg = errorMessage(e);
  if (
    isNetworkCode(code) ||
    (code !== undefined && CONNECTIVITY_SQLSTATE.test(code)) ||
    /Connection terminated|connection error|after calling end on the pool/i.test(msg)
  ) {
    return new ConnectivityError(`PostgreSQL connection lost: ${msg}`, { cause: e });
  }
  return new QueryError(msg, { cause: e });
}

export function pgPoolConfig(conn: ConnectionConfig): PoolConfig {
  const base: PoolConfig = { max: 1, types: rawTextTypes() };
  if (conn.connectionString) {
    return { ...base, connectionString: expandEnv(conn.connectionString) };
  }
  return {
    ...base,
    host: conn.host,
    port: conn.port,
    user: conn.user,
    password: conn.password === undefined ? undefined : expandEnv(conn.password),
    database: conn.database,
  };
}

function keyRole(flags: { pk: boolean; uq: boolean; fk: boolean; indexed: boolean }): KeyRole | null {
  if (flags.pk) return "PRIMARY";
  if (flags.uq) return "UNIQUE";
  if (flags.fk) return "FOREIGN";
  if (flags.indexed) return "INDEX";
  return null;
}

/**
 * PostgreSQL driver. The schemas of the connected database play the part of
 * databases in the schema tree.
 */
export class PostgresDriver implements DatabaseDriver {
  readonly driverName = "postgres";
  private pool: PgPool | null = null;
  private lost: ConnectivityError | null = null;
  private readonly queue = new SerialTaskQueue();
  private readonly orderKeyCache = new Map<string, string[]>();

  constructor(
    private readonly conn: ConnectionConfig,
    private readonly readOnly: boolean,
  ) {}

  async connect(): Promise<void> {
    const pool = new pg.Pool(pgPoolConfig(this.conn));
    pool.on("error", (e) => {
      // idle client dropped by the server; the next call reports it
      this.lost = classifyToConnectivity(e);
      log.warn("idle connection error", { error: e.message });
    });

    // Test the connection
    try {
      const client = await pool.connect();
      client.release();
    } catch (e) {
      await pool.end().catch((endErr: unknown) => log.debug("pool end after failed connect", { error: errorMessage(endErr) }));
      const msg = errorMessage(e);
      if (msg.includes("ECONNREFUSED")) {
        throw new ConnectivityError(`Cannot connect to PostgreSQL: connection refused. Is the server running? Check host/port.`, { cause: e });
      }
      if (msg.includes("password authentication failed")) {
        throw new ConnectivityError(`PostgreSQL authentication failed: wrong password. Check your connection credentials.`, { cause: e });
      }
      if (msg.includes("does not exist")) {
        throw new ConnectivityError(`PostgreSQL database not found. ${msg}`, { cause: e });
      }
      throw new ConnectivityError(`PostgreSQL connection failed: ${msg}`, { cause: e });
    }
    this.pool = pool;
    this.lost = null;
  }

  execute(statement: string): Promise<ExecuteOutcome> {
    const safety = validateQuery(statement, !this.readOnly);
    if (!safety.allowed) return Promise.reject(new QueryError(safety.reason ?? "statement blocked"));
    return this.use(async (pool) => {
      const result = await pool.query(statement);
      return { affectedRows: result.rowCount ?? 0 };
    });
  }

  listDatabases(): Promise<Database[]> {
    return this.use(async (pool) => {
      const result = await pool.query<{ name: string }>(
        `SELECT schema_name AS name
         FROM information_schema.schemata
         WHERE schema_name NOT IN ('pg_catalog', 'information_schema')
           AND schema_name NOT LIKE 'pg\\_toast%'
           AND schema_name NOT LIKE 'pg\\_temp%'
         ORDER BY schema_name`,
      );
      return result.rows.map((r) => ({ name: r.name, tables: [] }));
    });
  }

  listTables(database: string): Promise<TableNode[]> {
    return this.use(async (pool) => {
      const result = await pool.query<{ name: string; type: string }>(
        `SELECT table_name AS name, table_type AS type
         FROM information_schema.tables
         WHERE table_schema = $1
         ORDER BY table_name`,
        [database],
      );
      return result.rows.map((r) => ({ name: r.name, database, kind: tableKind(r.type) }));
    });
  }

  fetchRows(query: RecordsQuery): Promise<Page> {
    return this.use(async (pool) => {
      const orderKeys = await this.orderKeys(pool, query.table);
      const result = await pool.query({ text: buildSelect(ansiDialect, query, { orderKeys }), rowMode: "array" });
      return normalizePgResult(result.fields, result.rows);
    });
  }

  /** Primary key columns, else `ctid` for plain and materialized tables, else nothing (views). */
  private async orderKeys(pool: PgPool, table: TableRef): Promise<string[]> {
    const cacheKey = qualifiedName(ansiDialect, table);
    const cached = this.orderKeyCache.get(cacheKey);
    if (cached) return cached;

    const pk = await pool.query<{ name: string }>(
      `SELECT a.attname::text AS name
       FROM pg_index i
       JOIN pg_attribute a ON a.attrelid = i.indrelid AND a.attnum = ANY(i.indkey)
       WHERE i.indrelid = $1::regclass AND i.indisprimary
       ORDER BY array_position(i.indkey::int2[], a.attnum)`,
      [cacheKey],
    );
    let keys = pk.rows.map((r) => ansiDialect.quoteIdent(r.name));
    if (keys.length === 0) {
      const rel = await pool.query<{ kind: string }>(
        "SELECT relkind::text AS kind FROM pg_class WHERE oid = $1::regclass",
        [cacheKey],
      );
      const kind = rel.rows[0]?.kind;
      keys = kind === "r" || kind === "m" ? ["ctid"] : [];
    }
    this.orderKeyCache.set(cacheKey, keys);
    return keys;
  }

  fetchColumns(table: TableRef): Promise<Page> {
    return this.use(async (pool) => {
      const colResult = await pool.query<{
        column_name: string;
        data_type: string;
        is_nullable: string;
        column_default: string | null;
      }>(
        `SELECT column_name, data_type, is_nullable, column_default
         FROM information_schema.columns
         WHERE table_schema = $1 AND table_name = $2
         ORDER BY ordinal_position`,
        [table.database, table.name],
      );

      if (colResult.rows.length === 0) {
        throw new QueryError(`Table "${table.name}" not found in schema "${table.database}".`);
      }

      const idxResult = await pool.query<{ attname: string; pk: boolean; uq: boolean }>(
        `SELECT a.attname, bool_or(i.indisprimary) AS pk, bool_or(i.indisunique) AS uq
         FROM pg_index i
         JOIN pg_attribute a ON a.attrelid = i.indrelid AND a.attnum = ANY(i.indkey)
         WHERE i.indrelid = $1::regclass
         GROUP BY a.attname`,
        [qualifiedName(ansiDialect, table)],
      );
      const indexed = new Map(idxResult.rows.map((r) => [r.attname, r]));

      const fkResult = await pool.query<{ column_name: string }>(
        `SELECT kcu.column_name
         FROM information_schema.table_constraints tc
         JOIN information_schema.key_column_usage kcu
           ON tc.constraint_name = kcu.constraint_name AND tc.table_schema = kcu.table_schema
         WHERE tc.constraint_type = 'FOREIGN KEY' AND tc.table_schema = $1 AND tc.table_name = $2`,
        [table.database, table.name],
      );
      const fkCols = new Set(fkResult.rows.map((r) => r.column_name));

      const columns: ColumnInfo[] = colResult.rows.map((r) => {
        const idx = indexed.get(r.column_name);
        return {
          name: r.column_name,
          type: r.data_type,
          nullable: r.is_nullable === "YES",
          defaultValue: r.column_default,
          key: keyRole({
            pk: idx?.pk ?? false,
            uq: idx?.uq ?? false,
            fk: fkCols.has(r.column_name),
            indexed: idx !== undefined,
          }),
        };
      });
      return columnsToPage(columns);
    });
  }

  countRows(table: TableRef, filter?: string): Promise<number> {
    return this.use(async (pool) => {
      const result = await pool.query<{ n: string }>(buildCount(ansiDialect, table, filter));
      return Number(result.rows[0]?.n ?? 0);
    });
  }

  estimateRows(table: TableRef): Promise<number | null> {
    return this.use(async (pool) => {
      const result = await pool.query<{ n: string }>(
        `SELECT c.reltuples::bigint AS n
         FROM pg_class c
         JOIN pg_namespace n ON n.oid = c.relnamespace
         WHERE n.nspname = $1 AND c.relname = $2`,
        [table.database, table.name],
      );
      const raw = result.rows[0]?.n;
      if (raw === undefined) return null;
      const n = Number(raw);
      // -1 until the table has been analyzed
      return n < 0 ? null : n;
    });
  }

  async ping(): Promise<boolean> {
    try {
      await this.use((pool) => pool.query("SELECT 1"));
      return true;
    } catch {
      return false;
    }
  }

  async close(): Promise<void> {
    const pool = this.pool;
    this.pool = null;
    this.orderKeyCache.clear();
    if (pool) {
      await pool.end();
    }
  }

  private use<T>(fn: (pool: PgPool) => Promise<T>): Promise<T> {
    return this.queue.run(async () => {
      if (this.lost) throw this.lost;
      if (!this.pool) throw new ConnectivityError("PostgreSQL not connected.");
      try {
        return await fn(this.pool);
      } catch (e) {
        const classified = classifyPgError(e);
        if (classified instanceof ConnectivityError) this.lost = classified;
        throw classified;
      }
    });
  }
}

function classifyToConnectivity(e: unknown): ConnectivityError {
  const classified = classifyPgError(e);
  return classified instanceof ConnectivityError
    ? classified
    : new ConnectivityError(`PostgreSQL connection lost: ${classified.message}`, { cause: e });
}
