import type { ConnectionConfig } from "../config.js";
import { isReadOnly } from "../safety.js";
import type { DatabaseDriver } from "./base.js";
import { MysqlDriver } from "./mysql.js";
import { PostgresDriver } from "./postgres.js";
import { SqliteDriver } from "./sqlite.js";

export * from "./base.js";

/** Builds the (not yet connected) driver for a configured connection. */
export function createDriver(conn: ConnectionConfig, allowMutations: boolean): DatabaseDriver {
  const readOnly = isReadOnly(conn.readOnly, allowMutations);
  switch (conn.type) {
    case "sqlite":
      return new SqliteDriver(conn.path ?? ":memory:", readOnly, conn.createIfMissing ?? false);
    case "postgres":
      return new PostgresDriver(conn, readOnly);
    case "mysql":
      return new MysqlDriver(conn, readOnly);
  }
}
