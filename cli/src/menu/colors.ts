// Text attributes for the menu block. Styling never affects navigation.
export const c = {
  reset: "\x1b[0m",
  bold: "\x1b[1m",
  italic: "\x1b[3m",
  underline: "\x1b[4m",
  brightWhite: "\x1b[97m",
};

const ansiPattern = /\x1b\[[0-9;?]*[A-Za-z]/g;

export type Styler = {
  bold(text: string): string;
  italic(text: string): string;
  underline(text: string): string;
};

export function colorBold(text: string) {
  return `${c.bold}${c.brightWhite}${text}${c.reset}`;
}

export function colorItalic(text: string) {
  return `${c.italic}${text}${c.reset}`;
}

export function colorUnderline(text: string) {
  return `${c.underline}${text}${c.reset}`;
}

export const ansiStyler: Styler = {
  bold: colorBold,
  italic: colorItalic,
  underline: colorUnderline,
};

export const plainStyler: Styler = {
  bold: (text) => text,
  italic: (text) => text,
  underline: (text) => text,
};

export function stripAnsi(text: string): string {
  return text.replace(ansiPattern, "");
}

// Width of a line as the terminal shows it.
export function visibleLength(text: string): number {
  return Array.from(stripAnsi(text)).length;
}
