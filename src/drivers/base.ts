import { NULL_CELL, textCell, type Cell } from "../cell.js";

export type TableKind = "table" | "view";

/** A table or view, referring to its database by name. */
export interface TableNode {
  name: string;
  database: string;
  kind: TableKind;
}

export interface Database {
  name: string;
  tables: TableNode[];
}

export interface TableRef {
  database: string;
  name: string;
}

export type SortDirection = "asc" | "desc";

export interface SortSpec {
  column: string;
  direction: SortDirection;
}

export interface RecordsQuery {
  table: TableRef;
  offset: number;
  limit: number;
  /** SQL boolean expression folded into WHERE. */
  filter?: string;
  sort?: SortSpec;
}

/** One bounded batch of rows with the header that produced it. */
export interface Page {
  columns: string[];
  rows: Cell[][];
}

export interface ExecuteOutcome {
  affectedRows: number;
}

export type KeyRole = "PRIMARY" | "UNIQUE" | "INDEX" | "FOREIGN";

export interface ColumnInfo {
  name: string;
  type: string;
  nullable: boolean;
  defaultValue: string | null;
  key: KeyRole | null;
}

export interface DatabaseDriver {
  /** Human-readable driver name */
  readonly driverName: string;

  /** Open the handle. Throws ConnectivityError with a hint on failure. */
  connect(): Promise<void>;

  /** Run a non-query statement. */
  execute(statement: string): Promise<ExecuteOutcome>;

  /** Databases (or schemas) visible to the credential, without tables. */
  listDatabases(): Promise<Database[]>;

  /** Tables and views of one database. */
  listTables(database: string): Promise<TableNode[]>;

  /** At most `query.limit` rows; header order is stable for the same query shape. */
  fetchRows(query: RecordsQuery): Promise<Page>;

  /** Column metadata encoded as rows. */
  fetchColumns(table: TableRef): Promise<Page>;

  /** Exact row count, honouring the filter. */
  countRows(table: TableRef, filter?: string): Promise<number>;

  /** Catalogue estimate of the row count, or null when the engine keeps none. */
  estimateRows(table: TableRef): Promise<number | null>;

  /** Test if the connection is alive. */
  ping(): Promise<boolean>;

  /** Release the handle. Safe to call more than once. */
  close(): Promise<void>;
}

export const COLUMN_PAGE_HEADER = ["name", "type", "nullable", "default", "key"];

export function columnsToPage(columns: readonly ColumnInfo[]): Page {
  return {
    columns: [...COLUMN_PAGE_HEADER],
    rows: columns.map((c) => [
      textCell(c.name),
      textCell(c.type),
      textCell(c.nullable ? "YES" : "NO"),
      c.defaultValue === null ? NULL_CELL : textCell(c.defaultValue),
      c.key === null ? NULL_CELL : textCell(c.key),
    ]),
  };
}

export function tableKind(raw: string): TableKind {
  return /view/i.test(raw) ? "view" : "table";
}
