import mysql from "mysql2/promise";
import type { Pool as MysqlPool, PoolOptions, ResultSetHeader, RowDataPacket } from "mysql2/promise";
import {
  bytesCell,
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
import { buildCount, buildSelect, mysqlDialect } from "./sql.js";

const log = rootLogger.child("mysql");

/** Column type codes from the MySQL protocol. */
export const MYSQL_TYPE = {
  DECIMAL: 0,
  TINY: 1,
  SHORT: 2,
  LONG: 3,
  FLOAT: 4,
  DOUBLE: 5,
  TIMESTAMP: 7,
  LONGLONG: 8,
  INT24: 9,
  DATE: 10,
  TIME: 11,
  DATETIME: 12,
  YEAR: 13,
  NEWDATE: 14,
  JSON: 245,
  NEWDECIMAL: 246,
} as const;

/** The parts of a mysql2 FieldPacket the normalizer reads. */
export interface MysqlField {
  name: string;
  type?: number;
  columnType?: number;
}

export function mysqlCell(field: MysqlField, value: unknown): Cell {
  if (value === null || value === undefined) return NULL_CELL;

  switch (field.columnType ?? field.type) {
    case MYSQL_TYPE.DECIMAL:
    case MYSQL_TYPE.NEWDECIMAL:
      return decimalCell(String(value));
    case MYSQL_TYPE.TINY:
    case MYSQL_TYPE.SHORT:
    case MYSQL_TYPE.LONG:
    case MYSQL_TYPE.INT24:
    case MYSQL_TYPE.LONGLONG:
    case MYSQL_TYPE.YEAR:
      return typeof value === "number" || typeof value === "string" || typeof value === "bigint"
        ? intCell(value)
        : cellFromValue(value);
    case MYSQL_TYPE.FLOAT:
    case MYSQL_TYPE.DOUBLE:
      return floatCell(Number(value));
    case MYSQL_TYPE.TIMESTAMP:
    case MYSQL_TYPE.DATETIME:
      return temporalCell("timestamp", String(value));
    case MYSQL_TYPE.DATE:
    case MYSQL_TYPE.NEWDATE:
      return temporalCell("date", String(value));
    case MYSQL_TYPE.TIME:
      return temporalCell("time", String(value));
    case MYSQL_TYPE.JSON:
      return typeof value === "string" ? jsonCell(value) : cellFromValue(value);
    default:
      // binary strings and blobs arrive as Buffers
      if (value instanceof Uint8Array) return bytesCell(value);
      return typeof value === "string" ? textCell(value) : cellFromValue(value);
  }
}

export function normalizeMysqlResult(
  fields: readonly MysqlField[],
  rows: readonly (readonly unknown[])[],
): Page {
  return {
    columns: fields.map((f) => f.name),
    rows: rows.map((row) => fields.map((f, i) => mysqlCell(f, row[i]))),
  };
}

const CONNECTIVITY_CODES = new Set([
  "PROTOCOL_CONNECTION_LOST",
  "PROTOCOL_SEQUENCE_TIMEOUT",
  "ER_ACCESS_DENIED_ERROR",
  "ER_BAD_DB_ERROR",
  "ER_CON_COUNT_ERROR",
  "ER_SERVER_SHUTDOWN",
]);

export function classifyMysqlError(e: unknown): DbError {
  if (isDbError(e)) return e;
  const code = errorCode(e);
  const msg = errorMessage(e);
  const fatal = typeof e === "object" && e !== null && "fatal" in e && e.fatal === true;
  if (fatal || isNetworkCode(code) || (code !== undefined && CONNECTIVITY_CODES.has(code)) || /Pool is closed/i.test(msg)) {
    return new ConnectivityError(`MySQL connection lost: ${msg}`, { cause: e });
  }
  return new QueryError(msg, { cause: e });
}

export function mysqlPoolOptions(conn: ConnectionConfig): PoolOptions {
  const base: PoolOptions = {
    connectionLimit: 1,
    supportBigNumbers: true,
    bigNumberStrings: true,
    dateStrings: true,
    jsonStrings: true,
  };
  if (conn.connectionString) {
    return { ...base, uri: expandEnv(conn.connectionString) };
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

const KEY_ROLES: Record<string, KeyRole> = { PRI: "PRIMARY", UNI: "UNIQUE", MUL: "INDEX" };

interface NameRow extends RowDataPacket {
  name: string;
}

interface TableRow extends RowDataPacket {
  name: string;
  type: string;
}

interface ColumnRow extends RowDataPacket {
  name: string;
  type: string;
  nullable: string;
  defaultValue: string | null;
  columnKey: string;
}

interface OrderColumnRow extends RowDataPacket {
  name: string;
  colKey: string;
}

interface CountRow extends RowDataPacket {
  n: number | string | null;
}

export class MysqlDriver implements DatabaseDriver {
  readonly driverName = "mysql";
  private pool: MysqlPool | null = null;
  private lost: ConnectivityError | null = null;
  private readonly queue = new SerialTaskQueue();
  private readonly orderKeyCache = new Map<string, string[]>();

  constructor(
    private readonly conn: ConnectionConfig,
    private readonly readOnly: boolean,
  ) {}

  async connect(): Promise<void> {
    const pool = mysql.createPool(mysqlPoolOptions(this.conn));

    // Test the connection
    try {
      const conn = await pool.getConnection();
      conn.release();
    } catch (e) {
      await pool.end().catch((endErr: unknown) => log.debug("pool end after failed connect", { error: errorMessage(endErr) }));
      const msg = errorMessage(e);
      if (msg.includes("ECONNREFUSED")) {
        throw new ConnectivityError(`Cannot connect to MySQL: connection refused. Is the server running? Check host/port.`, { cause: e });
      }
      if (msg.includes("Access denied")) {
        throw new ConnectivityError(`MySQL access denied: wrong username or password. Check your connection credentials.`, { cause: e });
      }
      if (msg.includes("Unknown database")) {
        throw new ConnectivityError(`MySQL database not found. ${msg}`, { cause: e });
      }
      throw new ConnectivityError(`MySQL connection failed: ${msg}`, { cause: e });
    }
    this.pool = pool;
    this.lost = null;
  }

  execute(statement: string): Promise<ExecuteOutcome> {
    const safety = validateQuery(statement, !this.readOnly);
    if (!safety.allowed) return Promise.reject(new QueryError(safety.reason ?? "statement blocked"));
    return this.use(async (pool) => {
      const [result] = await pool.query<ResultSetHeader | RowDataPacket[]>(statement);
      return { affectedRows: Array.isArray(result) ? 0 : result.affectedRows };
    });
  }

  listDatabases(): Promise<Database[]> {
    return this.use(async (pool) => {
      const [rows] = await pool.query<NameRow[]>(
        `SELECT SCHEMA_NAME AS name FROM information_schema.SCHEMATA ORDER BY SCHEMA_NAME`,
      );
      return rows.map((r) => ({ name: r.name, tables: [] }));
    });
  }

  listTables(database: string): Promise<TableNode[]> {
    return this.use(async (pool) => {
      const [rows] = await pool.query<TableRow[]>(
        `SELECT TABLE_NAME AS name, TABLE_TYPE AS type
         FROM information_schema.TABLES
         WHERE TABLE_SCHEMA = ?
         ORDER BY TABLE_NAME`,
        [database],
      );
      return rows.map((r) => ({ name: r.name, database, kind: tableKind(r.type) }));
    });
  }

  fetchRows(query: RecordsQuery): Promise<Page> {
    return this.use(async (pool) => {
      const orderKeys = await this.orderKeys(pool, query.table);
      const [rows, fields] = await pool.query<RowDataPacket[][]>({
        sql: buildSelect(mysqlDialect, query, { orderKeys }),
        rowsAsArray: true,
      });
      return normalizeMysqlResult(fields, rows);
    });
  }

  // MySQL has no row id: without a primary key every column takes part.
  private async orderKeys(pool: MysqlPool, table: TableRef): Promise<string[]> {
    const cacheKey = `${table.database}.${table.name}`;
    const cached = this.orderKeyCache.get(cacheKey);
    if (cached) return cached;

    const [rows] = await pool.query<OrderColumnRow[]>(
      `SELECT COLUMN_NAME AS name, COLUMN_KEY AS colKey
       FROM information_schema.COLUMNS
       WHERE TABLE_SCHEMA = ? AND TABLE_NAME = ?
       ORDER BY ORDINAL_POSITION`,
      [table.database, table.name],
    );
    const primary = rows.filter((r) => r.colKey === "PRI");
    const keys = (primary.length > 0 ? primary : rows).map((r) => mysqlDialect.quoteIdent(r.name));
    this.orderKeyCache.set(cacheKey, keys);
    return keys;
  }

  fetchColumns(table: TableRef): Promise<Page> {
    return this.use(async (pool) => {
      const [rows] = await pool.query<ColumnRow[]>(
        `SELECT COLUMN_NAME AS name, COLUMN_TYPE AS type, IS_NULLABLE AS nullable,
                COLUMN_DEFAULT AS defaultValue, COLUMN_KEY AS columnKey
         FROM information_schema.COLUMNS
         WHERE TABLE_SCHEMA = ? AND TABLE_NAME = ?
         ORDER BY ORDINAL_POSITION`,
        [table.database, table.name],
      );

      if (rows.length === 0) {
        throw new QueryError(`Table "${table.name}" not found in database "${table.database}".`);
      }

      return columnsToPage(
        rows.map((r) => ({
          name: r.name,
          type: r.type,
          nullable: r.nullable === "YES",
          defaultValue: r.defaultValue,
          key: KEY_ROLES[r.columnKey] ?? null,
        })),
      );
    });
  }

  countRows(table: TableRef, filter?: string): Promise<number> {
    return this.use(async (pool) => {
      const [rows] = await pool.query<CountRow[]>(buildCount(mysqlDialect, table, filter));
      return Number(rows[0]?.n ?? 0);
    });
  }

  estimateRows(table: TableRef): Promise<number | null> {
    return this.use(async (pool) => {
      const [rows] = await pool.query<CountRow[]>(
        `SELECT TABLE_ROWS AS n FROM information_schema.TABLES WHERE TABLE_SCHEMA = ? AND TABLE_NAME = ?`,
        [table.database, table.name],
      );
      const raw = rows[0]?.n;
      return raw === undefined || raw === null ? null : Number(raw);
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

  private use<T>(fn: (pool: MysqlPool) => Promise<T>): Promise<T> {
    return this.queue.run(async () => {
      if (this.lost) throw this.lost;
      if (!this.pool) throw new ConnectivityError("MySQL not connected.");
      try {
        return await fn(this.pool);
      } catch (e) {
        const classified = classifyMysqlError(e);
        if (classified instanceof ConnectivityError) this.lost = classified;
        throw classified;
      }
    });
  }
}
