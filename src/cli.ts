import { Command, InvalidArgumentError } from "commander";
import { App } from "./app.js";
import {
  DEFAULT_CONFIG_PATH,
  connectionLabel,
  loadConfig,
  maskTarget,
  type ConnectionConfig,
  type TablewalkConfig,
} from "./config.js";
import { createDriver, type DatabaseDriver, type SortSpec } from "./drivers/index.js";
import { ConfigError, errorMessage } from "./errors.js";
import { formatResults, type OutputFormat } from "./format.js";
import { configureLogger, fileSink, parseLogLevel, rootLogger } from "./logger.js";
import { isReadOnly } from "./safety.js";
import { Osc52Clipboard, TerminalHost } from "./terminal.js";

const log = rootLogger.child("cli");

export interface CliIO {
  out(text: string): void;
  err(text: string): void;
}

const consoleIO: CliIO = {
  out: (text) => console.log(text),
  err: (text) => console.error(text),
};

// commander constrains opts types to OptionValues, which interfaces do not satisfy
type GlobalOptions = {
  config: string;
};

interface DumpOptions {
  offset: number;
  limit: number;
  where?: string;
  order?: SortSpec;
  format: OutputFormat;
  count?: boolean;
}

interface SchemaOptions {
  table?: string;
}

function parseCount(value: string): number {
  const n = Number(value);
  if (!Number.isInteger(n) || n < 0) throw new InvalidArgumentError("Not a non-negative integer.");
  return n;
}

function parseFormat(value: string): OutputFormat {
  if (value === "table" || value === "json" || value === "csv") return value;
  throw new InvalidArgumentError("Expected table, json or csv.");
}

/** `column` or `column:asc` / `column:desc`. */
export function parseOrder(value: string): SortSpec {
  const match = /^(.+?)(?::(asc|desc))?$/i.exec(value.trim());
  if (!match || !match[1]) throw new InvalidArgumentError("Expected column or column:desc.");
  return { column: match[1], direction: match[2]?.toLowerCase() === "desc" ? "desc" : "asc" };
}

/** A connection by label, or by its 1-based position in the config. */
export function findConnection(config: TablewalkConfig, name: string): ConnectionConfig {
  const byLabel = config.connections.find((c) => connectionLabel(c) === name);
  if (byLabel) return byLabel;
  const index = Number(name);
  const byIndex = Number.isInteger(index) ? config.connections[index - 1] : undefined;
  if (byIndex) return byIndex;

  const available = config.connections.map((c, i) => `${i + 1}: ${connectionLabel(c)}`);
  throw new ConfigError(
    available.length > 0
      ? `Connection "${name}" not found. Available: ${available.join(", ")}`
      : "No database connections configured.",
  );
}

function setup(command: Command): TablewalkConfig {
  const { config: path } = command.optsWithGlobals<GlobalOptions>();
  const config = loadConfig(path);
  configureLogger({ level: parseLogLevel(config.logLevel), sink: fileSink(config.logFile) });
  return config;
}

/** Connect, run `fn`, and close whatever happens. */
async function withDriver<T>(
  config: TablewalkConfig,
  conn: ConnectionConfig,
  fn: (driver: DatabaseDriver) => Promise<T>,
): Promise<T> {
  const driver = createDriver(conn, config.allowMutations);
  await driver.connect();
  try {
    return await fn(driver);
  } finally {
    await driver.close().catch((e: unknown) => log.warn("close failed", { error: errorMessage(e) }));
  }
}

export function buildProgram(io: CliIO = consoleIO): Command {
  const program = new Command();
  program
    .name("tablewalk")
    .description("Keyboard-driven browser for MySQL, PostgreSQL and SQLite databases")
    .option("--config <path>", "configuration file", DEFAULT_CONFIG_PATH)
    .configureOutput({ writeOut: (s) => io.out(s.trimEnd()), writeErr: (s) => io.err(s.trimEnd()) });

  program
    .command("browse", { isDefault: true })
    .description("Open the interactive browser")
    .action(async (_opts: unknown, command: Command) => {
      const config = setup(command);
      if (!process.stdin.isTTY || !process.stdout.isTTY) {
        throw new ConfigError("The browser needs an interactive terminal.");
      }
      log.info("starting", { connections: config.connections.length });
      const app = new App(config, { clipboard: new Osc52Clipboard(process.stdout) });
      await new TerminalHost(app).run();
      log.info("stopped");
    });

  program
    .command("connections")
    .description("List configured connections")
    .action((_opts: unknown, command: Command) => {
      const config = setup(command);
      if (config.connections.length === 0) {
        io.out("No connections configured.");
        return;
      }
      config.connections.forEach((conn, i) => {
        const mode = isReadOnly(conn.readOnly, config.allowMutations) ? "read-only" : "read-write";
        io.out(`${i + 1}  ${connectionLabel(conn)}  ${conn.type}  ${maskTarget(conn)}  ${mode}`);
      });
    });

  program
    .command("check")
    .description("Connect to every configured connection and report which ones answer")
    .action(async (_opts: unknown, command: Command) => {
      const config = setup(command);
      let failures = 0;
      for (const conn of config.connections) {
        const label = connectionLabel(conn);
        try {
          const alive = await withDriver(config, conn, (driver) => driver.ping());
          io.out(`${label}: ${alive ? "ok" : "no answer"}`);
          if (!alive) failures++;
        } catch (e) {
          failures++;
          io.out(`${label}: ${errorMessage(e)}`);
        }
      }
      if (failures > 0) process.exitCode = 1;
    });

  program
    .command("schema")
    .description("List databases, the tables of one database, or the columns of one table")
    .argument("<connection>", "connection label or number")
    .argument("[database]", "database (schema) to list")
    .option("-t, --table <name>", "describe this table's columns")
    .action(async (name: string, database: string | undefined, opts: SchemaOptions, command: Command) => {
      const config = setup(command);
      const conn = findConnection(config, name);
      await withDriver(config, conn, async (driver) => {
        if (database === undefined) {
          for (const db of await driver.listDatabases()) io.out(db.name);
          return;
        }
        if (opts.table) {
          io.out(formatResults(await driver.fetchColumns({ database, name: opts.table }), "table"));
          return;
        }
        const tables = await driver.listTables(database);
        if (tables.length === 0) io.out("No tables found.");
        for (const t of tables) io.out(`${t.name} (${t.kind})`);
      });
    });

  program
    .command("dump")
    .description("Print one page of a table")
    .argument("<connection>", "connection label or number")
    .argument("<database>", "database (schema) holding the table")
    .argument("<table>", "table or view name")
    .option("-o, --offset <n>", "rows to skip", parseCount, 0)
    .option("-l, --limit <n>", "rows to print", parseCount, 100)
    .option("-w, --where <filter>", "WHERE clause body")
    .option("--order <column[:desc]>", "sort column", parseOrder)
    .option("-f, --format <fmt>", "table, json or csv", parseFormat, "table")
    .option("--count", "report the total number of matching rows")
    .action(async (name: string, database: string, tableName: string, opts: DumpOptions, command: Command) => {
      const config = setup(command);
      const conn = findConnection(config, name);
      const table = { database, name: tableName };
      await withDriver(config, conn, async (driver) => {
        const page = await log.timed("dump", () =>
          driver.fetchRows({
            table,
            offset: opts.offset,
            limit: opts.limit,
            filter: opts.where,
            sort: opts.order,
          }),
        );
        const total = opts.count ? await driver.countRows(table, opts.where) : undefined;
        io.out(formatResults(page, opts.format, total));
      });
    });

  program
    .command("exec")
    .description("Run one statement and report the affected row count")
    .argument("<connection>", "connection label or number")
    .argument("<statement>", "SQL statement")
    .action(async (name: string, statement: string, _opts: unknown, command: Command) => {
      const config = setup(command);
      const conn = findConnection(config, name);
      const outcome = await withDriver(config, conn, (driver) => log.timed("exec", () => driver.execute(statement)));
      io.out(`${outcome.affectedRows} row(s) affected.`);
    });

  return program;
}
