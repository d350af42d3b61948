import { MenuError, errorMessage } from "../utils/errors";
import { logger as defaultLogger, type Logger } from "../utils/logger";
import { ansiStyler, type Styler } from "./colors";
import { TtyKeyReader } from "./effects/tty";
import { READ_SIZE, readCommand } from "./input";
import { HIDE_CURSOR, SHOW_CURSOR, padBanner, stdoutWriter, writeLine } from "./io";
import type { Menu } from "./menu";
import { cursorUp, printMenu } from "./render";
import type { MenuTree } from "./tree";
import type { ActionRunner, KeyReader, MenuCommand, Writer } from "./types";

export type SessionDeps = {
  keys: KeyReader;
  out: Writer;
  styler: Styler;
  actions: ActionRunner;
  logger: Logger;
};

export const directActionRunner: ActionRunner = {
  async run(_name, action) {
    await action();
  },
};

const CONTINUE_HINT = "(Press any key to continue)";

/**
 * One interactive session over a menu tree: reads keys, moves the selection,
 * runs actions and keeps the menu block drawn in place.
 */
export class MenuSession {
  private displaying = false;
  private readonly keys: KeyReader;
  private readonly out: Writer;
  private readonly styler: Styler;
  private readonly actions: ActionRunner;
  private readonly logger: Logger;

  constructor(private readonly tree: MenuTree, deps: Partial<SessionDeps> = {}) {
    this.keys = deps.keys ?? new TtyKeyReader();
    this.out = deps.out ?? stdoutWriter;
    this.styler = deps.styler ?? ansiStyler;
    this.actions = deps.actions ?? directActionRunner;
    this.logger = deps.logger ?? defaultLogger;
  }

  async run(): Promise<void> {
    if (this.tree.activeSession) {
      throw new MenuError("SESSION_ACTIVE", "A session is already displaying this menu tree");
    }
    const { bold, underline } = this.styler;
    const redrawPrevious = this.tree.redraw;
    let started = false;

    this.displaying = true;
    this.tree.attachSession(this);
    this.tree.currentMenu.selection = 0;
    this.logger.debug({ event: "session.started", menu: this.tree.name });

    try {
      this.tree.redraw = false;
      writeLine(this.out, "Welcome to menutree.");
      writeLine(this.out, "↕ to move selection cursor.");
      writeLine(this.out, `→/Enter/H${underline("o")}tkey to choose.`);
      writeLine(this.out, `←/Esc to go back, ${underline("x")} to Exit.`);
      writeLine(this.out, `${bold("`")} (backtick) to toggle redraw (small terminals may scramble)`);
      writeLine(this.out, "Press any key to start menu...");
      await this.waitForKey();
      this.render();
      this.tree.redraw = redrawPrevious;
      started = true;
      this.out.write(HIDE_CURSOR);

      while (this.displaying) {
        const command = await readCommand(this.keys);
        await this.handle(command);
      }
      writeLine(this.out);
    } finally {
      if (!started) this.tree.redraw = redrawPrevious;
      this.displaying = false;
      this.tree.attachSession(null);
      this.out.write(SHOW_CURSOR);
      this.logger.debug({ event: "session.ended" });
    }
  }

  render() {
    const menu = this.tree.currentMenu;
    const subMenus = this.tree.subMenusOf(menu);
    const total = menu.optionCount + subMenus.length;
    if (total === 0) {
      menu.selection = 0;
    } else if (menu.selection >= total) {
      menu.selection = total - 1;
    }
    printMenu(this.out, {
      menu,
      subMenus,
      previous: this.tree.previousMenu,
      styler: this.styler,
      redraw: this.tree.redraw,
    });
  }

  async handle(command: MenuCommand): Promise<void> {
    const menu = this.tree.currentMenu;
    switch (command.type) {
      case "up":
        this.moveSelection(menu, -1);
        break;
      case "down":
        this.moveSelection(menu, 1);
        break;
      case "enter":
        await this.execute(menu.selection);
        break;
      case "back": {
        const previous = this.tree.previousMenu;
        if (previous) this.tree.changeMenu(previous);
        break;
      }
      case "toggle":
        this.toggleRedraw();
        break;
      case "exit":
        // Hotkeys are single characters, so nothing can shadow exit.
        this.displaying = false;
        break;
      case "empty":
        break;
      case "literal": {
        const index = menu.hotKeys.get(command.key.toUpperCase());
        if (index !== undefined) {
          menu.selection = index;
          await this.execute(index);
        }
        break;
      }
    }
  }

  private moveSelection(menu: Menu, delta: -1 | 1) {
    const total = menu.optionCount + this.tree.subMenusOf(menu).length;
    menu.selection = total === 0 ? 0 : (menu.selection + delta + total) % total;
    this.render();
  }

  private toggleRedraw() {
    if (this.tree.redraw) {
      this.tree.redraw = false;
      writeLine(this.out, "\nredraw disabled");
      this.render();
    } else {
      // Announce first so the confirmation is not erased.
      writeLine(this.out, "\nredraw enabled");
      this.render();
      this.tree.redraw = true;
    }
  }

  /** Runs the option at `index`, or enters the submenu it points at. */
  async execute(index: number): Promise<void> {
    const menu = this.tree.currentMenu;
    const optionCount = menu.optionCount;
    if (index >= 0 && index < optionCount) {
      await this.executeOption(menu, index);
      return;
    }

    if (!this.tree.hasSubMenuRelation(menu)) {
      await this.reportError(menu, "Error, menu not found in subMenu map.");
      return;
    }
    const subIndex = index - optionCount;
    const child = subIndex >= 0 ? this.tree.subMenusOf(menu)[subIndex] : undefined;
    if (child) {
      this.tree.changeMenu(child);
    } else {
      await this.reportError(menu, "Error, submenu not found in subMenu map.");
    }
  }

  private async executeOption(menu: Menu, index: number) {
    const width = menu.longestLine;
    // Overwrite the blank separator and footer with the banners.
    this.out.write(this.tree.redraw ? `${cursorUp(2)}\n` : "\n");
    menu.lastRenderLines = 0;

    const name = menu.optionAt(index) ?? "";
    writeLine(this.out, padBanner(`*** Executing ${name}... ***`, width, "*"));
    const action = menu.getOption(name);
    if (!action) {
      writeLine(this.out, "\nError, function not found in Options map.");
      writeLine(this.out, CONTINUE_HINT);
      await this.waitForKey();
      writeLine(this.out);
      this.render();
      return;
    }

    writeLine(this.out, padBanner("------------- Output -------------", width, "-"));
    this.logger.debug({ event: "option.executing", menu: menu.name, option: name });
    try {
      await this.actions.run(name, action);
    } catch (err) {
      this.logger.error({ event: "option.failed", menu: menu.name, option: name, error: errorMessage(err) });
      writeLine(this.out, `Error: ${errorMessage(err)}`);
    }
    writeLine(this.out, padBanner("-------------- End ---------------", width, "-"));
    writeLine(this.out, CONTINUE_HINT);
    await this.waitForKey();
    writeLine(this.out);
    // The action may have moved to another menu; draw it fresh below the output.
    this.tree.currentMenu.lastRenderLines = 0;
    this.render();
  }

  private async reportError(menu: Menu, message: string) {
    writeLine(this.out, `\n${message}`);
    writeLine(this.out, CONTINUE_HINT);
    // Three lines now sit below the block; the next erase must cover them.
    menu.lastRenderLines += 3;
    await this.waitForKey();
    this.render();
  }

  private async waitForKey() {
    await this.keys.read(READ_SIZE);
  }
}
