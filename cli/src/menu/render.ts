import { assignHotkey } from "./hotkeys";
import { visibleLength, type Styler } from "./colors";
import type { Menu } from "./menu";
import type { Writer } from "./types";

export type MenuLayout = {
  lines: string[];
  longestLine: number;
  lastRenderLines: number;
};

export type RenderArgs = {
  menu: Menu;
  subMenus: Menu[];
  previous: Menu | null;
  styler: Styler;
};

export function splitPrompt(prompt: string): string[] {
  if (prompt === "") return [];
  return prompt.replace(/\r\n/g, "\n").replace(/\n\r/g, "\n").split("\n");
}

function itemLine(label: string, index: number, menu: Menu, styler: Styler): string {
  const hotkey = assignHotkey(label, index, menu.hotKeys);
  const marked = hotkey === null ? label : label.replace(hotkey, () => styler.underline(hotkey));
  return index === menu.selection ? `>${styler.italic(marked)}` : ` ${marked}`;
}

/**
 * Lays out the menu block and records the metrics the next render needs to
 * erase it. Rebuilds the menu's hotkey table as a side effect.
 */
export function layoutMenu(args: RenderArgs): MenuLayout {
  const { menu, subMenus, previous, styler } = args;
  const lines: string[] = [];
  menu.hotKeys = new Map();

  lines.push(`Menu: ${styler.bold(menu.name)}`);
  for (const l of splitPrompt(menu.resolvePrompt())) {
    lines.push(` ${l}`);
  }

  const options = menu.optionNames();
  if (options.length > 0) {
    lines.push(styler.bold("Options:"));
    options.forEach((name, idx) => lines.push(itemLine(name, idx, menu, styler)));
  }

  if (subMenus.length > 0) {
    lines.push(styler.bold("SubMenus:"));
    subMenus.forEach((sub, idx) => lines.push(itemLine(sub.name, idx + options.length, menu, styler)));
  }

  lines.push("");
  const exit = `E${styler.underline("x")}it`;
  lines.push(previous ? ` ←/esc back to ${previous.name}, ${exit} ` : exit);

  const longestLine = Math.max(...lines.map(visibleLength)) + 2;
  menu.longestLine = longestLine;
  menu.lastRenderLines = lines.length + 1;
  return { lines, longestLine, lastRenderLines: menu.lastRenderLines };
}

export function cursorUp(lines: number): string {
  return `\x1b[${lines}A\x1b[0J`;
}

/** Formats a laid-out menu as a bordered block. The last line carries no newline. */
export function formatBlock(layout: MenuLayout): string {
  const { lines, longestLine } = layout;
  let out = "\n" + "*".repeat(longestLine + 4) + "\n";
  lines.forEach((l, idx) => {
    if (idx < lines.length - 1) {
      out += `  ${l}\n`;
    } else {
      const fill = Math.max(0, longestLine - visibleLength(l));
      out += `**${l}${"*".repeat(fill)}**`;
    }
  });
  return out;
}

/**
 * Prints the menu, first moving back over its previous block when the menu
 * has been drawn before and redraw is on.
 */
export function printMenu(out: Writer, args: RenderArgs & { redraw: boolean }): MenuLayout {
  const erase = args.menu.lastRenderLines;
  if (erase > 0 && args.redraw) {
    out.write(cursorUp(erase));
  }
  const layout = layoutMenu(args);
  out.write(formatBlock(layout));
  return layout;
}
