/**
 * Abstract key events and the action key map.
 *
 * The terminal host decodes bytes into `KeyEvent`s; everything above it asks
 * the key map whether an event means an action, never what bytes it was.
 */

import { ConfigError } from "./errors.js";

export type NamedKey =
  | "enter"
  | "esc"
  | "tab"
  | "backspace"
  | "delete"
  | "up"
  | "down"
  | "left"
  | "right"
  | "home"
  | "end"
  | "pageup"
  | "pagedown"
  | `f${number}`;

export type KeyEvent =
  | { kind: "char"; char: string; ctrl: boolean; alt: boolean }
  | { kind: "named"; name: NamedKey; ctrl: boolean; alt: boolean; shift: boolean };

export function charKey(char: string, mods: { ctrl?: boolean; alt?: boolean } = {}): KeyEvent {
  return { kind: "char", char, ctrl: mods.ctrl ?? false, alt: mods.alt ?? false };
}

export function namedKey(name: NamedKey, mods: { ctrl?: boolean; alt?: boolean; shift?: boolean } = {}): KeyEvent {
  return { kind: "named", name, ctrl: mods.ctrl ?? false, alt: mods.alt ?? false, shift: mods.shift ?? false };
}

export const DEFAULT_KEY_BINDINGS = {
  scrollUp: ["k", "up"],
  scrollDown: ["j", "down"],
  scrollLeft: ["h"],
  scrollRight: ["l"],
  extendUp: ["K", "shift-up"],
  extendDown: ["J", "shift-down"],
  extendLeft: ["H"],
  extendRight: ["L"],
  pageUp: ["ctrl-u", "pageup"],
  pageDown: ["ctrl-d", "pagedown"],
  scrollToTop: ["g", "home"],
  scrollToBottom: ["G", "end"],
  enter: ["enter"],
  escape: ["esc"],
  filter: ["/"],
  search: ["ctrl-f"],
  sort: ["s"],
  copy: ["y"],
  refresh: ["r"],
  execute: [":"],
  focusLeft: ["left"],
  focusRight: ["right"],
  focusNext: ["tab"],
  focusPrevious: ["shift-tab"],
  focusConnections: ["c"],
  tabRecords: ["1"],
  tabColumns: ["2"],
  help: ["?"],
  quit: ["q"],
  exit: ["ctrl-c"],
} satisfies Record<string, string[]>;

export type Action = keyof typeof DEFAULT_KEY_BINDINGS;

export function isAction(name: string): name is Action {
  return Object.prototype.hasOwnProperty.call(DEFAULT_KEY_BINDINGS, name);
}

const NAMED_KEYS = new Set<string>([
  "enter", "esc", "tab", "backspace", "delete", "up", "down",
  "left", "right", "home", "end", "pageup", "pagedown",
]);

const ALIASES: Record<string, string> = {
  escape: "esc",
  return: "enter",
  del: "delete",
  pgup: "pageup",
  pgdown: "pagedown",
  backtab: "shift-tab",
};

function isNamedKey(name: string): name is NamedKey {
  return NAMED_KEYS.has(name) || /^f([1-9]|1[0-2])$/.test(name);
}

/**
 * Parse a key spec such as `j`, `G`, `ctrl-d`, `shift-tab`, `f1` or `space`.
 * Single characters are case sensitive; everything else is not.
 */
export function parseKeySpec(spec: string): KeyEvent {
  if (spec.length === 1) return charKey(spec);

  const lowered = spec.toLowerCase();
  const aliased = ALIASES[lowered] ?? lowered;
  const parts = aliased.split("-");
  // "-" itself, or a modifier applied to "-"
  const base = spec.endsWith("--") || spec === "-" ? "-" : parts.pop() ?? "";
  const mods = { ctrl: false, alt: false, shift: false };
  for (const mod of parts) {
    if (mod === "ctrl" || mod === "c") mods.ctrl = true;
    else if (mod === "alt" || mod === "meta" || mod === "m") mods.alt = true;
    else if (mod === "shift" || mod === "s") mods.shift = true;
    else if (mod !== "") throw new ConfigError(`Unknown modifier "${mod}" in key "${spec}"`);
  }

  if (base === "space") return charKey(" ", mods);
  if (isNamedKey(base)) return namedKey(base, mods);
  if (base.length === 1) {
    // keep the case the user wrote for the character itself
    const char = spec.slice(-1);
    return mods.shift ? charKey(char.toUpperCase(), mods) : charKey(char, mods);
  }
  throw new ConfigError(`Unknown key "${spec}"`);
}

export function keyEquals(a: KeyEvent, b: KeyEvent): boolean {
  if (a.kind === "char" && b.kind === "char") {
    return a.char === b.char && a.ctrl === b.ctrl && a.alt === b.alt;
  }
  if (a.kind === "named" && b.kind === "named") {
    return a.name === b.name && a.ctrl === b.ctrl && a.alt === b.alt && a.shift === b.shift;
  }
  return false;
}

export function formatKey(key: KeyEvent): string {
  const mods = [key.ctrl ? "ctrl" : "", key.alt ? "alt" : "", key.kind === "named" && key.shift ? "shift" : ""]
    .filter(Boolean);
  const base = key.kind === "char" ? (key.char === " " ? "space" : key.char) : key.name;
  return [...mods, base].join("-");
}

/** A printable character typed without ctrl or alt. */
export function typedChar(key: KeyEvent): string | null {
  return key.kind === "char" && !key.ctrl && !key.alt ? key.char : null;
}

export class KeyMap {
  private readonly bindings = new Map<Action, KeyEvent[]>();

  /** `overrides` replace the default keys of the actions they name. */
  constructor(overrides: Record<string, string | string[]> = {}) {
    for (const [action, specs] of Object.entries(DEFAULT_KEY_BINDINGS)) {
      if (isAction(action)) this.bindings.set(action, specs.map(parseKeySpec));
    }
    for (const [action, specs] of Object.entries(overrides)) {
      if (!isAction(action)) throw new ConfigError(`Unknown action "${action}" in keyBindings`);
      const list = typeof specs === "string" ? [specs] : specs;
      this.bindings.set(action, list.map(parseKeySpec));
    }
  }

  matches(event: KeyEvent, action: Action): boolean {
    return (this.bindings.get(action) ?? []).some((key) => keyEquals(key, event));
  }

  /** First of `actions` the event is bound to. */
  match<A extends Action>(event: KeyEvent, actions: readonly A[]): A | null {
    return actions.find((action) => this.matches(event, action)) ?? null;
  }

  describe(): { action: Action; keys: string }[] {
    return [...this.bindings.entries()].map(([action, keys]) => ({
      action,
      keys: keys.map(formatKey).join(", "),
    }));
  }
}
