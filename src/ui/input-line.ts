import { typedChar, type KeyEvent } from "../keys.js";

export type InputOutcome = "commit" | "cancel" | "edit";

/**
 * Single-line text input used by the filter, search and statement prompts.
 * Editing keys are fixed; they are not part of the configurable key map.
 */
export class InputLine {
  text: string;
  cursor: number;

  constructor(initial = "") {
    this.text = initial;
    this.cursor = initial.length;
  }

  handleKey(event: KeyEvent): InputOutcome {
    const char = typedChar(event);
    if (char !== null) {
      this.text = this.text.slice(0, this.cursor) + char + this.text.slice(this.cursor);
      this.cursor += char.length;
      return "edit";
    }

    if (event.kind === "char") {
      if (event.ctrl && event.char === "u") {
        this.text = this.text.slice(this.cursor);
        this.cursor = 0;
      } else if (event.ctrl && event.char === "a") {
        this.cursor = 0;
      } else if (event.ctrl && event.char === "e") {
        this.cursor = this.text.length;
      } else if (event.ctrl && (event.char === "c" || event.char === "g")) {
        return "cancel";
      }
      return "edit";
    }

    switch (event.name) {
      case "enter":
        return "commit";
      case "esc":
        return "cancel";
      case "backspace":
        if (this.cursor > 0) {
          this.text = this.text.slice(0, this.cursor - 1) + this.text.slice(this.cursor);
          this.cursor--;
        }
        break;
      case "delete":
        this.text = this.text.slice(0, this.cursor) + this.text.slice(this.cursor + 1);
        break;
      case "left":
        this.cursor = Math.max(0, this.cursor - 1);
        break;
      case "right":
        this.cursor = Math.min(this.text.length, this.cursor + 1);
        break;
      case "home":
        this.cursor = 0;
        break;
      case "end":
        this.cursor = this.text.length;
        break;
      default:
        break;
    }
    return "edit";
  }
}
