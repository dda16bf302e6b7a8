/**
 * Focus and key routing.
 *
 * Every key goes to exactly one tier, tried in order: a visible error
 * overlay, a visible help overlay, the focused component, then the
 * application-level bindings. Overlays swallow everything while shown.
 */

import type { KeyEvent } from "./keys.js";

export type Focus = "connections" | "schema" | "table";

export const FOCUS_ORDER: readonly Focus[] = ["connections", "schema", "table"];

export type Handled = "handled" | "unhandled";

export interface KeyHandler {
  handleKey(event: KeyEvent): Handled;
}

export type Tier = "error" | "help" | "component" | "app" | "none";

export interface RoutingTiers {
  error: KeyHandler | null;
  help: KeyHandler | null;
  component: KeyHandler;
  app: KeyHandler;
}

/** Deliver `event` to the first tier that takes it and say which one did. */
export function routeKey(event: KeyEvent, tiers: RoutingTiers): Tier {
  if (tiers.error) {
    tiers.error.handleKey(event);
    return "error";
  }
  if (tiers.help) {
    tiers.help.handleKey(event);
    return "help";
  }
  if (tiers.component.handleKey(event) === "handled") return "component";
  if (tiers.app.handleKey(event) === "handled") return "app";
  return "none";
}

export class FocusState {
  constructor(private focus: Focus = "connections") {}

  get current(): Focus {
    return this.focus;
  }

  set(focus: Focus): void {
    this.focus = focus;
  }

  next(): Focus {
    return this.shift(1, true);
  }

  previous(): Focus {
    return this.shift(-1, true);
  }

  /** One step toward the table pane, stopping at the edge. */
  right(): Focus {
    return this.shift(1, false);
  }

  left(): Focus {
    return this.shift(-1, false);
  }

  private shift(delta: number, wrap: boolean): Focus {
    const n = FOCUS_ORDER.length;
    const index = FOCUS_ORDER.indexOf(this.focus) + delta;
    const target = wrap ? (index + n) % n : Math.max(0, Math.min(n - 1, index));
    this.focus = FOCUS_ORDER[target];
    return this.focus;
  }
}
