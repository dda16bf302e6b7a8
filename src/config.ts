import { readFileSync } from "node:fs";
import { homedir } from "node:os";
import { join } from "node:path";
import { Type, type Static } from "@sinclair/typebox";
import { Value } from "@sinclair/typebox/value";
import { ConfigError, errorMessage } from "./errors.js";

const DriverName = Type.Union([Type.Literal("mysql"), Type.Literal("postgres"), Type.Literal("sqlite")]);

export const ConnectionSchema = Type.Object({
  type: DriverName,
  label: Type.Optional(Type.String()),
  host: Type.Optional(Type.String()),
  port: Type.Optional(Type.Integer({ minimum: 1, maximum: 65535 })),
  user: Type.Optional(Type.String()),
  password: Type.Optional(Type.String()),
  database: Type.Optional(Type.String()),
  /** URL form; takes precedence over host/port/user/password/database. */
  connectionString: Type.Optional(Type.String()),
  /** SQLite file. */
  path: Type.Optional(Type.String()),
  /** SQLite only: create the file when it does not exist. */
  createIfMissing: Type.Optional(Type.Boolean()),
  readOnly: Type.Optional(Type.Boolean()),
});

export const EndJumpPolicySchema = Type.Union([
  Type.Literal("count"),
  Type.Literal("estimate"),
  Type.Literal("disable"),
]);

const KeySpecs = Type.Union([Type.String(), Type.Array(Type.String(), { minItems: 1 })]);

export const ConfigSchema = Type.Object({
  connections: Type.Array(ConnectionSchema, { default: [] }),
  keyBindings: Type.Record(Type.String(), KeySpecs, { default: {} }),
  endJumpPolicy: Type.Optional(EndJumpPolicySchema),
  allowMutations: Type.Optional(Type.Boolean()),
  logFile: Type.Optional(Type.String()),
  logLevel: Type.Optional(
    Type.Union([
      Type.Literal("debug"),
      Type.Literal("info"),
      Type.Literal("warn"),
      Type.Literal("error"),
      Type.Literal("silent"),
    ]),
  ),
});

export type ConnectionConfig = Static<typeof ConnectionSchema>;
export type EndJumpPolicy = Static<typeof EndJumpPolicySchema>;
export type RawConfig = Static<typeof ConfigSchema>;

export interface TablewalkConfig {
  connections: ConnectionConfig[];
  keyBindings: Record<string, string | string[]>;
  endJumpPolicy: EndJumpPolicy;
  allowMutations: boolean;
  logFile: string;
  logLevel: NonNullable<RawConfig["logLevel"]>;
}

export const DEFAULT_CONFIG_PATH = join(homedir(), ".config", "tablewalk", "config.json");

const DEFAULTS: Omit<TablewalkConfig, "connections" | "keyBindings"> = {
  endJumpPolicy: "count",
  allowMutations: false,
  logFile: join(homedir(), ".cache", "tablewalk", "tablewalk.log"),
  logLevel: "info",
};

/** Validate an already-parsed config object and fill in defaults. */
export function resolveConfig(raw: unknown): TablewalkConfig {
  const withDefaults = Value.Default(ConfigSchema, Value.Clone(raw ?? {}));
  if (!Value.Check(ConfigSchema, withDefaults)) {
    const problems = [...Value.Errors(ConfigSchema, withDefaults)]
      .slice(0, 5)
      .map((e) => `${e.path || "/"}: ${e.message}`);
    throw new ConfigError(`Invalid configuration:\n  ${problems.join("\n  ")}`);
  }

  for (const [i, conn] of withDefaults.connections.entries()) {
    if (conn.type === "sqlite" && !conn.path) {
      throw new ConfigError(`connections[${i}]: sqlite connections need a "path"`);
    }
    if (conn.type !== "sqlite" && !conn.connectionString && !conn.host) {
      throw new ConfigError(`connections[${i}]: ${conn.type} connections need "host" or "connectionString"`);
    }
  }

  return {
    connections: withDefaults.connections,
    keyBindings: withDefaults.keyBindings,
    endJumpPolicy: withDefaults.endJumpPolicy ?? DEFAULTS.endJumpPolicy,
    allowMutations: withDefaults.allowMutations ?? DEFAULTS.allowMutations,
    logFile: withDefaults.logFile ? resolvePath(withDefaults.logFile) : DEFAULTS.logFile,
    logLevel: withDefaults.logLevel ?? DEFAULTS.logLevel,
  };
}

/** Read and validate a JSON config file. */
export function loadConfig(path: string = DEFAULT_CONFIG_PATH): TablewalkConfig {
  const resolved = resolvePath(path);
  let text: string;
  try {
    text = readFileSync(resolved, "utf8");
  } catch (e) {
    throw new ConfigError(`Cannot read config file ${resolved}: ${errorMessage(e)}`, { cause: e });
  }

  let parsed: unknown;
  try {
    parsed = JSON.parse(text);
  } catch (e) {
    throw new ConfigError(`Config file ${resolved} is not valid JSON: ${errorMessage(e)}`, { cause: e });
  }
  return resolveConfig(parsed);
}

/** Label shown for a connection in lists and the status line. */
export function connectionLabel(conn: ConnectionConfig): string {
  if (conn.label) return conn.label;
  if (conn.type === "sqlite") return conn.path ?? ":memory:";
  return `${conn.type}://${maskTarget(conn)}`;
}

/** Target without credentials: host and database at most. */
export function maskTarget(conn: ConnectionConfig): string {
  if (conn.type === "sqlite") return conn.path ?? ":memory:";
  const raw = conn.connectionString;
  if (!raw) {
    const port = conn.port ? `:${conn.port}` : "";
    return `${conn.host ?? "localhost"}${port}/${conn.database ?? ""}`;
  }
  if (raw.startsWith("$")) return raw; // env var reference, safe to show
  try {
    const url = new URL(raw);
    return `${url.host}/${url.pathname.slice(1).split("/")[0] ?? ""}`;
  } catch {
    return "[configured]";
  }
}

/**
 * Expand $ENV_VAR references in a string to their process.env values.
 * Throws if the variable is not set.
 */
export function expandEnv(value: string): string {
  return value.replace(/\$([A-Z_][A-Z0-9_]*)/gi, (_match, name: string) => {
    const val = process.env[name];
    if (val === undefined) {
      throw new ConfigError(`Environment variable $${name} is not set. Set it before connecting.`);
    }
    return val;
  });
}

/**
 * Resolve a path, expanding ~ to home directory and $ENV_VAR references.
 */
export function resolvePath(p: string): string {
  let resolved = expandEnv(p);
  if (resolved.startsWith("~/")) {
    resolved = join(homedir(), resolved.slice(2));
  }
  return resolved;
}
