/**
 * Terminal host: raw-mode input, the frame loop and painting.
 *
 * Each frame applies settled query results, then repaints the lines that
 * changed. Keys are handled as they arrive and mark the frame dirty.
 */

import { emitKeypressEvents, type Key } from "node:readline";
import type { App, Clipboard } from "./app.js";
import { errorMessage } from "./errors.js";
import { charKey, namedKey, type KeyEvent, type NamedKey } from "./keys.js";
import { rootLogger } from "./logger.js";
import { render } from "./ui/render.js";

const log = rootLogger.child("terminal");

const CSI = "\x1b[";
const ENTER_ALT_SCREEN = `${CSI}?1049h`;
const LEAVE_ALT_SCREEN = `${CSI}?1049l`;
const HIDE_CURSOR = `${CSI}?25l`;
const SHOW_CURSOR = `${CSI}?25h`;
const CLEAR_LINE = `${CSI}2K`;

const READLINE_NAMES: Record<string, NamedKey> = {
  return: "enter",
  enter: "enter",
  escape: "esc",
  tab: "tab",
  backspace: "backspace",
  delete: "delete",
  up: "up",
  down: "down",
  left: "left",
  right: "right",
  home: "home",
  end: "end",
  pageup: "pageup",
  pagedown: "pagedown",
};

function isFunctionKey(name: string): name is `f${number}` {
  return /^f([1-9]|1[0-2])$/.test(name);
}

/** Translate what readline reports for a keypress; null for sequences we do not know. */
export function decodeKey(str: string | undefined, key: Key | undefined): KeyEvent | null {
  const name = key?.name;
  const mods = { ctrl: key?.ctrl ?? false, alt: key?.meta ?? false, shift: key?.shift ?? false };

  if (name !== undefined) {
    const named: NamedKey | undefined = READLINE_NAMES[name] ?? (isFunctionKey(name) ? name : undefined);
    if (named !== undefined) return namedKey(named, mods);
    if (mods.ctrl && name.length === 1) return charKey(name, { ctrl: true, alt: mods.alt });
  }
  if (str !== undefined && str.length > 0 && str >= " " && str !== "\x7f") {
    return charKey(str, { alt: mods.alt });
  }
  return null;
}

/** Copies through the terminal itself with an OSC 52 escape. */
export class Osc52Clipboard implements Clipboard {
  constructor(private readonly output: NodeJS.WritableStream) {}

  write(text: string): void {
    this.output.write(`\x1b]52;c;${Buffer.from(text, "utf8").toString("base64")}\x07`);
  }
}

/** The parts of a TTY the host drives; stdin and stdout in practice. */
export interface TerminalInput extends NodeJS.ReadableStream {
  isTTY?: boolean;
  setRawMode?(mode: boolean): unknown;
}

export interface TerminalOutput extends NodeJS.WritableStream {
  columns: number;
  rows: number;
}

export interface TerminalHostOptions {
  input?: TerminalInput;
  output?: TerminalOutput;
  frameMs?: number;
}

export class TerminalHost {
  private readonly input: TerminalInput;
  private readonly output: TerminalOutput;
  private readonly frameMs: number;
  private painted: string[] = [];
  private dirty = true;

  constructor(
    private readonly app: App,
    options: TerminalHostOptions = {},
  ) {
    this.input = options.input ?? process.stdin;
    this.output = options.output ?? process.stdout;
    this.frameMs = options.frameMs ?? 33;
  }

  /** Run until the app asks to quit, then restore the terminal and close the connection. */
  run(): Promise<void> {
    return new Promise<void>((resolve, reject) => {
      const onKeypress = (str: string | undefined, key: Key | undefined) => {
        const event = decodeKey(str, key);
        if (!event) return;
        try {
          this.app.handleKey(event);
          this.dirty = true;
        } catch (e) {
          log.error("key handling failed", { error: errorMessage(e) });
          finish(e);
        }
      };
      const onResize = () => {
        this.app.resize(this.output.columns, this.output.rows);
        this.painted = [];
        this.dirty = true;
      };

      const timer = setInterval(() => {
        try {
          if (this.app.tick()) this.dirty = true;
          if (this.app.shouldQuit) {
            finish();
            return;
          }
          if (this.dirty) this.paint();
        } catch (e) {
          log.error("frame failed", { error: errorMessage(e) });
          finish(e);
        }
      }, this.frameMs);

      const finish = (failure?: unknown) => {
        clearInterval(timer);
        this.input.off("keypress", onKeypress);
        this.output.off("resize", onResize);
        this.restore();
        this.app.shutdown().then(
          () => (failure === undefined ? resolve() : reject(failure)),
          (e: unknown) => reject(failure ?? e),
        );
      };

      emitKeypressEvents(this.input);
      if (this.input.isTTY) this.input.setRawMode?.(true);
      this.input.resume();
      this.input.on("keypress", onKeypress);
      this.output.on("resize", onResize);
      this.output.write(ENTER_ALT_SCREEN + HIDE_CURSOR);
      onResize();
    });
  }

  private paint(): void {
    const lines = render(this.app.viewModel());
    let out = "";
    lines.forEach((line, i) => {
      if (this.painted[i] === line) return;
      out += `${CSI}${i + 1};1H${CLEAR_LINE}${line}`;
    });
    if (out) this.output.write(out);
    this.painted = lines;
    this.dirty = false;
  }

  private restore(): void {
    this.output.write(SHOW_CURSOR + LEAVE_ALT_SCREEN);
    if (this.input.isTTY) this.input.setRawMode?.(false);
    this.input.pause();
  }
}
