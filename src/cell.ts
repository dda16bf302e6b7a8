/**
 * Normalized cell values.
 *
 * Every driver converts its native values into this closed set at the driver
 * boundary. Rendering, filtering and copying only ever see a `Cell`.
 */

export type TemporalType = "date" | "time" | "timestamp";

export type Cell =
  | { kind: "null" }
  | { kind: "int"; value: bigint }
  | { kind: "float"; value: number }
  | { kind: "decimal"; value: string }
  | { kind: "bool"; value: boolean }
  | { kind: "text"; value: string }
  | { kind: "temporal"; type: TemporalType; value: string }
  | { kind: "bytes"; value: Uint8Array }
  | { kind: "json"; value: string };

export const NULL_CELL: Cell = { kind: "null" };

export const textCell = (value: string): Cell => ({ kind: "text", value });
export const boolCell = (value: boolean): Cell => ({ kind: "bool", value });
export const floatCell = (value: number): Cell => ({ kind: "float", value });
export const decimalCell = (value: string): Cell => ({ kind: "decimal", value });
export const jsonCell = (value: string): Cell => ({ kind: "json", value });
export const bytesCell = (value: Uint8Array): Cell => ({ kind: "bytes", value });
export const temporalCell = (type: TemporalType, value: string): Cell => ({ kind: "temporal", type, value });

export function intCell(value: bigint | number | string): Cell {
  return { kind: "int", value: BigInt(value) };
}

/**
 * Best-effort conversion for values whose column type is unknown to the
 * driver. Integral numbers become `int`, other numbers `float`.
 */
export function cellFromValue(value: unknown): Cell {
  if (value === null || value === undefined) return NULL_CELL;
  if (typeof value === "bigint") return intCell(value);
  if (typeof value === "number") return Number.isInteger(value) ? intCell(value) : floatCell(value);
  if (typeof value === "boolean") return boolCell(value);
  if (typeof value === "string") return textCell(value);
  if (value instanceof Uint8Array) return bytesCell(value);
  if (value instanceof Date) return temporalCell("timestamp", formatDate(value));
  try {
    return jsonCell(JSON.stringify(value));
  } catch {
    return textCell(String(value));
  }
}

/** `YYYY-MM-DD HH:MM:SS[.fff]` in UTC. */
export function formatDate(d: Date): string {
  const iso = d.toISOString();
  const [date, rest] = iso.split("T");
  const time = rest.replace("Z", "").replace(/\.000$/, "");
  return `${date} ${time}`;
}

export function cellEquals(a: Cell, b: Cell): boolean {
  switch (a.kind) {
    case "null":
      return b.kind === "null";
    case "temporal":
      return b.kind === "temporal" && a.type === b.type && a.value === b.value;
    case "bytes":
      return b.kind === "bytes" && bytesEqual(a.value, b.value);
    default:
      return a.kind === b.kind && "value" in b && a.value === b.value;
  }
}

export function rowEquals(a: readonly Cell[], b: readonly Cell[]): boolean {
  return a.length === b.length && a.every((cell, i) => cellEquals(cell, b[i]));
}

function bytesEqual(a: Uint8Array, b: Uint8Array): boolean {
  if (a.length !== b.length) return false;
  for (let i = 0; i < a.length; i++) {
    if (a[i] !== b[i]) return false;
  }
  return true;
}

/** Plain text of a cell, without truncation. NULL has no plain text. */
export function cellPlainText(cell: Cell): string | null {
  switch (cell.kind) {
    case "null":
      return null;
    case "int":
      return cell.value.toString();
    case "float":
      return String(cell.value);
    case "bool":
      return cell.value ? "true" : "false";
    case "bytes":
      return "\\x" + Buffer.from(cell.value).toString("hex");
    case "decimal":
    case "text":
    case "temporal":
    case "json":
      return cell.value;
  }
}
