import type { KeyReader, MenuCommand } from "./types";

// Arrow keys arrive as ESC [ <code>; only the last byte matters.
const ARROW_UP = 65;
const ARROW_DOWN = 66;
const ARROW_RIGHT = 67;
const ARROW_LEFT = 68;

const CTRL_C = 3;
const ESCAPE = 27;
const ENTER = 13;
const BACKTICK = 96;
const EXIT_KEY = 120; // "x"

export const READ_SIZE = 3;

export function decodeKeys(bytes: Uint8Array): MenuCommand {
  if (bytes.length === 0) return { type: "empty" };

  if (bytes.length >= READ_SIZE) {
    switch (bytes[2]) {
      case ARROW_UP:
        return { type: "up" };
      case ARROW_DOWN:
        return { type: "down" };
      case ARROW_LEFT:
        return { type: "back" };
      case ARROW_RIGHT:
        return { type: "enter" };
      default:
        return { type: "down" };
    }
  }

  const first = bytes[0];
  switch (first) {
    case ENTER:
      return { type: "enter" };
    case ESCAPE:
      return { type: "back" };
    case BACKTICK:
      return { type: "toggle" };
    case EXIT_KEY:
    case CTRL_C:
      return { type: "exit" };
    default:
      return { type: "literal", key: String.fromCharCode(first) };
  }
}

export async function readCommand(reader: KeyReader): Promise<MenuCommand> {
  const bytes = await reader.read(READ_SIZE);
  return decodeKeys(bytes.subarray(0, READ_SIZE));
}
