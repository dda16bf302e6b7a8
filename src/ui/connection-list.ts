import type { KeyEvent, KeyMap } from "../keys.js";
import type { Handled, KeyHandler } from "../router.js";

export type ConnectionStatus = "idle" | "connecting" | "connected" | "failed";

export interface ConnectionItem {
  label: string;
  type: "mysql" | "postgres" | "sqlite";
  readOnly: boolean;
}

export interface ConnectionListSnapshot {
  items: (ConnectionItem & { status: ConnectionStatus })[];
  cursor: number;
}

export interface ConnectionListHooks {
  connect(index: number): void;
}

const ACTIONS = ["scrollUp", "scrollDown", "scrollToTop", "scrollToBottom", "enter"] as const;

export class ConnectionList implements KeyHandler {
  cursor = 0;
  private readonly status = new Map<number, ConnectionStatus>();

  constructor(
    readonly items: readonly ConnectionItem[],
    private readonly keymap: KeyMap,
    private readonly hooks: ConnectionListHooks,
  ) {}

  handleKey(event: KeyEvent): Handled {
    const action = this.keymap.match(event, ACTIONS);
    if (action === null || this.items.length === 0) return action === null ? "unhandled" : "handled";

    const last = this.items.length - 1;
    switch (action) {
      case "scrollUp":
        this.cursor = Math.max(0, this.cursor - 1);
        break;
      case "scrollDown":
        this.cursor = Math.min(last, this.cursor + 1);
        break;
      case "scrollToTop":
        this.cursor = 0;
        break;
      case "scrollToBottom":
        this.cursor = last;
        break;
      case "enter":
        this.hooks.connect(this.cursor);
        break;
    }
    return "handled";
  }

  /** Only one connection is ever live; marking one resets the others. */
  setStatus(index: number, status: ConnectionStatus): void {
    if (status === "connecting" || status === "connected") this.status.clear();
    this.status.set(index, status);
  }

  statusOf(index: number): ConnectionStatus {
    return this.status.get(index) ?? "idle";
  }

  snapshot(): ConnectionListSnapshot {
    return {
      items: this.items.map((item, i) => ({ ...item, status: this.statusOf(i) })),
      cursor: this.cursor,
    };
  }
}
