import { afterEach, describe, expect, it } from "vitest";
import { Menu } from "./menu";
import { MenuTree, menuTreeOptionsSchema } from "./tree";

function buildTree() {
  const home = new Menu("Home", "Welcome");
  const a = new Menu("A");
  const b = new Menu("B");
  const tree = new MenuTree(home, { redraw: true });
  tree.addSubMenu(home, a);
  tree.addSubMenu(a, b);
  return { tree, home, a, b };
}

describe("MenuTree", () => {
  afterEach(() => {
    delete process.env.MENUTREE_REDRAW;
  });

  it("starts on the home menu with nowhere to go back to", () => {
    const { tree, home } = buildTree();
    expect(tree.currentMenu).toBe(home);
    expect(tree.previousMenu).toBeNull();
    expect(tree.name).toBe("Home");
    expect(tree.prompt).toBe("Welcome");
  });

  it("remembers the menu it left as the back target", () => {
    const { tree, home, a, b } = buildTree();
    tree.changeMenu(a);
    expect(tree.previousMenu).toBe(home);
    tree.changeMenu(b);
    expect(tree.currentMenu).toBe(b);
    expect(tree.previousMenu).toBe(a);
  });

  it("keeps a single back slot rather than a history", () => {
    const { tree, a, b } = buildTree();
    tree.changeMenu(a);
    tree.changeMenu(b);

    tree.changeMenu(a);
    expect(tree.previousMenu).toBe(b);
    tree.changeMenu(b);
    expect(tree.previousMenu).toBe(a);
  });

  it("clears the back target when returning home", () => {
    const { tree, home, a, b } = buildTree();
    tree.changeMenu(a);
    tree.changeMenu(b);
    tree.changeMenu(home);
    expect(tree.currentMenu).toBe(home);
    expect(tree.previousMenu).toBeNull();
  });

  it("forces a full redraw of the menu it enters", () => {
    const { tree, a } = buildTree();
    a.lastRenderLines = 7;
    tree.changeMenu(a);
    expect(a.lastRenderLines).toBe(0);
  });

  it("adds and removes submenus in order", () => {
    const { tree, home, a } = buildTree();
    const c = new Menu("C");
    const d = new Menu("D");
    tree.addSubMenus(home, [c, d]);
    expect(tree.subMenusOf(home).map((m) => m.name)).toEqual(["A", "C", "D"]);

    tree.deleteSubMenu(home, c);
    tree.deleteSubMenu(home, new Menu("C"));
    expect(tree.subMenusOf(home)).toEqual([a, d]);
  });

  it("tells an empty relation apart from no relation", () => {
    const { tree, a, b } = buildTree();
    tree.deleteSubMenu(a, b);
    expect(tree.subMenusOf(a)).toEqual([]);
    expect(tree.hasSubMenuRelation(a)).toBe(true);
    expect(tree.hasSubMenuRelation(b)).toBe(false);
  });

  it("sets the prompt of the current menu", () => {
    const { tree, a } = buildTree();
    tree.changeMenu(a);
    tree.setPrompt("ignored", () => "from function");
    expect(a.resolvePrompt()).toBe("from function");
    expect(tree.prompt).toBe("from function");
  });

  it("takes the redraw default from the environment", () => {
    process.env.MENUTREE_REDRAW = "false";
    expect(new MenuTree(new Menu("Home")).redraw).toBe(false);
    process.env.MENUTREE_REDRAW = "not-a-flag";
    expect(new MenuTree(new Menu("Home")).redraw).toBe(true);
    expect(new MenuTree(new Menu("Home"), { redraw: false }).redraw).toBe(false);
  });

  it("rejects malformed options", () => {
    expect(menuTreeOptionsSchema.safeParse({ redraw: "yes" }).success).toBe(false);
    expect(menuTreeOptionsSchema.safeParse({}).success).toBe(true);
  });
});
