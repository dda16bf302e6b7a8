const MUTATION_KEYWORDS = [
  "INSERT", "UPDATE", "DELETE", "DROP", "ALTER",
  "TRUNCATE", "CREATE", "REPLACE", "MERGE", "GRANT", "REVOKE",
];

export interface SafetyResult {
  allowed: boolean;
  reason?: string;
}

/**
 * Strip string literals and comments from SQL so keyword detection
 * doesn't false-positive on values like 'DROP me a line'.
 */
export function stripLiteralsAndComments(sql: string): string {
  return sql
    // Remove single-quoted strings
    .replace(/'(?:[^'\\]|\\.)*'/g, "")
    // Remove double-quoted identifiers
    .replace(/"(?:[^"\\]|\\.)*"/g, "")
    // Remove backtick-quoted identifiers
    .replace(/`(?:[^`]|``)*`/g, "")
    // Remove block comments
    .replace(/\/\*[\s\S]*?\*\//g, "")
    // Remove line comments
    .replace(/--[^\n]*/g, "");
}

// Keywords that double as string functions: a call is followed by "(".
const FUNCTION_NAMES = new Set(["REPLACE"]);

function findMutation(sanitized: string): string | undefined {
  return MUTATION_KEYWORDS.find((keyword) => {
    const call = FUNCTION_NAMES.has(keyword) ? "(?!\\s*\\()" : "";
    return new RegExp(`\\b${keyword}\\b${call}`, "i").test(sanitized);
  });
}

/**
 * Check if a statement may run given the mutation policy.
 * This is NOT about SQL injection, the operator IS the user here.
 * It prevents accidental destructive statements on read-only connections.
 *
 * Scans the entire statement body (not just the first token) to catch
 * CTE bypass (WITH x AS (DELETE ...)) and multi-statement bypass (; DROP ...).
 */
export function validateQuery(query: string, allowMutations: boolean): SafetyResult {
  if (allowMutations) return { allowed: true };

  const trimmed = query.trim();

  // Block multiple statements: strip trailing semicolon, then reject if any remain
  const stripped = stripLiteralsAndComments(trimmed).trim().replace(/;\s*$/, "");
  if (stripped.includes(";")) {
    return { allowed: false, reason: "multiple statements not allowed" };
  }

  const keyword = findMutation(stripped);
  if (keyword) {
    return {
      allowed: false,
      reason: `${keyword} blocked: this connection is read-only. Set readOnly: false on the connection or allowMutations: true in config to allow writes.`,
    };
  }

  return { allowed: true };
}

/**
 * A filter is pasted into `WHERE ... LIMIT n OFFSET m`, so beyond the
 * mutation check it must not end the statement, comment out the paging
 * clause or close a parenthesis it did not open.
 */
export function validateFilter(filter: string): SafetyResult {
  if (/--|\/\*/.test(filter.replace(/'(?:[^'\\]|\\.)*'/g, ""))) {
    return { allowed: false, reason: "comments are not allowed in a filter" };
  }

  const sanitized = stripLiteralsAndComments(filter);
  if (sanitized.includes(";")) {
    return { allowed: false, reason: "a filter cannot contain ';'" };
  }

  let depth = 0;
  for (const ch of sanitized) {
    if (ch === "(") depth++;
    if (ch === ")" && --depth < 0) break;
  }
  if (depth !== 0) {
    return { allowed: false, reason: "unbalanced parentheses" };
  }

  const keyword = findMutation(sanitized);
  if (keyword) {
    return { allowed: false, reason: `${keyword} is not allowed in a filter` };
  }

  return { allowed: true };
}

/**
 * Check if a connection is effectively read-only.
 * Per-connection readOnly overrides global allowMutations.
 */
export function isReadOnly(connectionReadOnly: boolean | undefined, globalAllowMutations: boolean): boolean {
  if (connectionReadOnly !== undefined) return connectionReadOnly;
  return !globalAllowMutations;
}
