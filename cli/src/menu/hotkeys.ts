import { EXIT_HOTKEY } from "./types";

/**
 * Claims the first character of `name` whose uppercase form is not yet a key
 * in `hotKeys`, registering it against `index`.
 *
 * Returns the character in its original case so callers can mark its first
 * occurrence in the label, or null when every character is taken. Letters
 * are only stable for one render: the table is rebuilt on every pass.
 */
export function assignHotkey(name: string, index: number, hotKeys: Map<string, number>): string | null {
  for (const ch of Array.from(name)) {
    const upper = ch.toUpperCase();
    if (upper === EXIT_HOTKEY) continue;
    if (!hotKeys.has(upper)) {
      hotKeys.set(upper, index);
      return ch;
    }
  }
  return null;
}
