import { z } from "zod";
import { loadConfig } from "../utils/config";
import { logger } from "../utils/logger";
import { Menu } from "./menu";
import { MenuSession, type SessionDeps } from "./session";
import type { PromptFunction } from "./types";

export const menuTreeOptionsSchema = z.object({
  redraw: z.boolean().optional(),
});

export type MenuTreeOptions = z.infer<typeof menuTreeOptionsSchema>;

/**
 * Owns the menu graph: the home menu, the parent→children relation and the
 * current/previous pointers. Only one "back" target is kept, not a history.
 */
export class MenuTree {
  readonly homeMenu: Menu;
  /** Erase and redraw the menu in place. Small terminals may prefer off. */
  redraw: boolean;

  private current: Menu;
  private previous: Menu | null = null;
  private readonly subMenuMap = new Map<Menu, Menu[]>();
  private session: MenuSession | null = null;

  constructor(homeMenu: Menu, options: MenuTreeOptions = {}) {
    const parsed = menuTreeOptionsSchema.parse(options);
    this.homeMenu = homeMenu;
    this.current = homeMenu;
    this.redraw = parsed.redraw ?? loadConfig().redraw;
  }

  get currentMenu(): Menu {
    return this.current;
  }

  get previousMenu(): Menu | null {
    return this.previous;
  }

  get name(): string {
    return this.current.name;
  }

  get prompt(): string {
    return this.current.prompt;
  }

  get activeSession(): MenuSession | null {
    return this.session;
  }

  /** Replaces the current menu's prompt; `promptFunction` wins when both are given. */
  setPrompt(prompt: string, promptFunction?: PromptFunction) {
    this.current.setPrompt(prompt, promptFunction);
    this.session?.render();
  }

  addSubMenu(parent: Menu, child: Menu) {
    this.addSubMenus(parent, [child]);
  }

  addSubMenus(parent: Menu, children: Menu[]) {
    const existing = this.subMenuMap.get(parent) ?? [];
    this.subMenuMap.set(parent, [...existing, ...children]);
  }

  deleteSubMenu(parent: Menu, child: Menu) {
    const existing = this.subMenuMap.get(parent);
    if (!existing) return;
    const idx = existing.indexOf(child);
    if (idx >= 0) {
      this.subMenuMap.set(parent, [...existing.slice(0, idx), ...existing.slice(idx + 1)]);
    }
  }

  subMenusOf(parent: Menu): Menu[] {
    return this.subMenuMap.get(parent) ?? [];
  }

  hasSubMenuRelation(parent: Menu): boolean {
    return this.subMenuMap.has(parent);
  }

  /**
   * Jumps to `menu`. The menu being left becomes the back target, except
   * when jumping home, which clears it.
   */
  changeMenu(menu: Menu) {
    const from = this.current;
    this.previous = menu === this.homeMenu ? null : from;
    this.current = menu;
    menu.lastRenderLines = 0;
    logger.debug({ event: "menu.changed", from: from.name, to: menu.name, previous: this.previous?.name ?? null });
    this.session?.render();
  }

  attachSession(session: MenuSession | null) {
    this.session = session;
  }

  /** Runs an interactive session on the terminal until the user exits. */
  display(deps: Partial<SessionDeps> = {}): Promise<void> {
    return new MenuSession(this, deps).run();
  }
}
