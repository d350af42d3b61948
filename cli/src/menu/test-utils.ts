import { TerminalError } from "../utils/errors";
import type { ActionRunner, KeyReader, MenuAction, Writer } from "./types";

export const KEYS = {
  up: "\x1b[A",
  down: "\x1b[B",
  right: "\x1b[C",
  left: "\x1b[D",
  enter: "\r",
  esc: "\x1b",
  toggle: "`",
  exit: "x",
  ctrlC: "\x03",
  any: " ",
};

// Replays keystrokes; running out behaves like a closed terminal.
export class ScriptedKeys implements KeyReader {
  reads = 0;
  private readonly queue: Uint8Array[];

  constructor(keys: Array<string | number[]>) {
    this.queue = keys.map((k) => (typeof k === "string" ? Buffer.from(k) : Uint8Array.from(k)));
  }

  async read(maxBytes: number): Promise<Uint8Array> {
    const next = this.queue.shift();
    if (!next) throw new TerminalError("TERMINAL_READ_FAILED", "No more scripted keys");
    this.reads++;
    return next.subarray(0, maxBytes);
  }
}

export class RecordingWriter implements Writer {
  chunks: string[] = [];

  write(text: string) {
    this.chunks.push(text);
  }

  get text(): string {
    return this.chunks.join("");
  }
}

export class RecordingActions implements ActionRunner {
  calls: string[] = [];

  async run(name: string, action: MenuAction) {
    this.calls.push(name);
    await action();
  }
}
