export type MenuAction = () => void | Promise<void>;

export type PromptFunction = () => string;

export type PromptSource =
  | { kind: "static"; text: string }
  | { kind: "dynamic"; generate: PromptFunction };

export type MenuCommand =
  | { type: "up" }
  | { type: "down" }
  | { type: "back" }
  | { type: "enter" }
  | { type: "toggle" }
  | { type: "exit" }
  | { type: "empty" }
  | { type: "literal"; key: string };

// Terminal driver: one blocking read of up to maxBytes raw bytes.
export interface KeyReader {
  read(maxBytes: number): Promise<Uint8Array>;
}

export interface Writer {
  write(text: string): void;
}

// Runs a bound option action; swapped for a recorder in tests.
export interface ActionRunner {
  run(name: string, action: MenuAction): Promise<void>;
}

export const EXIT_HOTKEY = "X";
