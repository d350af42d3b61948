import { TerminalError, errorMessage } from "../../utils/errors";
import { logger } from "../../utils/logger";
import type { KeyReader } from "../types";

// The slice of a tty.ReadStream the reader relies on.
export interface RawInput {
  readonly isTTY?: boolean;
  readonly isRaw?: boolean;
  setRawMode(mode: boolean): unknown;
  on(event: "data", listener: (chunk: Buffer | string) => void): unknown;
  once(event: "end", listener: () => void): unknown;
  once(event: "error", listener: (err: Error) => void): unknown;
  removeListener(event: "data", listener: (chunk: Buffer | string) => void): unknown;
  removeListener(event: "end", listener: () => void): unknown;
  removeListener(event: "error", listener: (err: Error) => void): unknown;
  pause(): unknown;
  resume(): unknown;
}

function trySetRawMode(input: RawInput, enabled: boolean) {
  try {
    input.setRawMode(enabled);
  } catch (err) {
    logger.warn({ event: "tty.restore_failed", error: errorMessage(err) });
  }
}

/**
 * Reads keystrokes from a terminal. Raw mode is held only for the duration of
 * one read and put back the way it was afterwards, whatever the outcome.
 * Bytes past `maxBytes` in a chunk are kept for the following reads.
 */
export class TtyKeyReader implements KeyReader {
  private pending: Uint8Array = new Uint8Array(0);

  constructor(private readonly input: RawInput = process.stdin) {}

  read(maxBytes: number): Promise<Uint8Array> {
    if (this.pending.length > 0) {
      return Promise.resolve(this.take(this.pending, maxBytes));
    }

    const input = this.input;
    if (!input.isTTY) {
      return Promise.reject(new TerminalError("TERMINAL_UNAVAILABLE", "Input is not a terminal"));
    }

    const wasRaw = input.isRaw ?? false;
    try {
      input.setRawMode(true);
    } catch (err) {
      return Promise.reject(new TerminalError("TERMINAL_UNAVAILABLE", "Could not enter raw mode", err));
    }

    return new Promise((resolve, reject) => {
      const cleanup = () => {
        input.removeListener("data", onData);
        input.removeListener("end", onEnd);
        input.removeListener("error", onError);
        input.pause();
        trySetRawMode(input, wasRaw);
      };
      const onData = (chunk: Buffer | string) => {
        cleanup();
        const bytes = typeof chunk === "string" ? Buffer.from(chunk) : chunk;
        resolve(this.take(bytes, maxBytes));
      };
      const onEnd = () => {
        cleanup();
        reject(new TerminalError("TERMINAL_READ_FAILED", "Terminal input closed"));
      };
      const onError = (err: Error) => {
        cleanup();
        reject(new TerminalError("TERMINAL_READ_FAILED", "Failed to read from terminal", err));
      };

      input.on("data", onData);
      input.once("end", onEnd);
      input.once("error", onError);
      input.resume();
    });
  }

  private take(bytes: Uint8Array, maxBytes: number): Uint8Array {
    this.pending = bytes.subarray(maxBytes);
    return bytes.subarray(0, maxBytes);
  }
}
