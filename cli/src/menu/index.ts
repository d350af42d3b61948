export { Menu, toPromptSource } from "./menu";
export { MenuTree, menuTreeOptionsSchema, type MenuTreeOptions } from "./tree";
export { MenuSession, directActionRunner, type SessionDeps } from "./session";
export { assignHotkey } from "./hotkeys";
export { decodeKeys, readCommand, READ_SIZE } from "./input";
export { layoutMenu, formatBlock, printMenu, splitPrompt, type MenuLayout } from "./render";
export { ansiStyler, plainStyler, type Styler } from "./colors";
export { TtyKeyReader } from "./effects/tty";
export { stdoutWriter } from "./io";
export { buildMenuTree, loadMenuFile, parseMenuFile, type MenuDefinition, type MenuFile } from "./definition";
export { MenuError, TerminalError, MenuDefinitionError } from "../utils/errors";
export type {
  ActionRunner,
  KeyReader,
  MenuAction,
  MenuCommand,
  PromptFunction,
  PromptSource,
  Writer,
} from "./types";
