import { visibleLength } from "./colors";
import type { Writer } from "./types";

export const HIDE_CURSOR = "\x1b[?25l";
export const SHOW_CURSOR = "\x1b[?25h";

export const stdoutWriter: Writer = {
  write(text: string) {
    process.stdout.write(text);
  },
};

export function writeLine(out: Writer, text = "") {
  out.write(text + "\n");
}

// Pads a banner with `fill` up to `width` characters.
export function padBanner(text: string, width: number, fill: string): string {
  const missing = width - visibleLength(text);
  return missing > 0 ? text + fill.repeat(missing) : text;
}
