/**
 * SQL text shared by the drivers. Identifiers are always quoted; the filter
 * is passed through as written after `validateFilter` has accepted it.
 */

import { QueryError } from "../errors.js";
import { validateFilter } from "../safety.js";
import type { RecordsQuery, TableRef } from "./base.js";

export interface Dialect {
  quoteIdent(name: string): string;
}

export const ansiDialect: Dialect = {
  quoteIdent: (name) => `"${name.replace(/"/g, '""')}"`,
};

export const mysqlDialect: Dialect = {
  quoteIdent: (name) => `\`${name.replace(/`/g, "``")}\``,
};

export function qualifiedName(dialect: Dialect, table: TableRef): string {
  return `${dialect.quoteIdent(table.database)}.${dialect.quoteIdent(table.name)}`;
}

function whereClause(filter: string | undefined): string {
  const trimmed = filter?.trim();
  if (!trimmed) return "";
  const safety = validateFilter(trimmed);
  if (!safety.allowed) throw new QueryError(`invalid filter: ${safety.reason}`);
  return ` WHERE ${trimmed}`;
}

export interface SelectOptions {
  /** Select list; `*` when absent. */
  projection?: string;
  /**
   * Expressions that order rows uniquely (primary key, row id). Appended
   * after the sort column so consecutive pages never overlap.
   */
  orderKeys?: readonly string[];
}

export function buildSelect(dialect: Dialect, query: RecordsQuery, options: SelectOptions = {}): string {
  const limit = Math.max(0, Math.floor(query.limit));
  const offset = Math.max(0, Math.floor(query.offset));
  const projection = options.projection ?? "*";
  let sql = `SELECT ${projection} FROM ${qualifiedName(dialect, query.table)}${whereClause(query.filter)}`;

  const order: string[] = [];
  if (query.sort) {
    order.push(`${dialect.quoteIdent(query.sort.column)} ${query.sort.direction === "desc" ? "DESC" : "ASC"}`);
  }
  order.push(...(options.orderKeys ?? []));
  if (order.length > 0) sql += ` ORDER BY ${order.join(", ")}`;
  return `${sql} LIMIT ${limit} OFFSET ${offset}`;
}

export function buildCount(dialect: Dialect, table: TableRef, filter?: string): string {
  return `SELECT COUNT(*) AS n FROM ${qualifiedName(dialect, table)}${whereClause(filter)}`;
}
