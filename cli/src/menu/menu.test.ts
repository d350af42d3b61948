import { describe, expect, it, vi } from "vitest";
import { Menu } from "./menu";

describe("Menu", () => {
  it("keeps options in insertion order", () => {
    const menu = new Menu("Main");
    menu.addOption("foo", () => {});
    menu.addOption("bar", () => {});
    expect(menu.optionNames()).toEqual(["foo", "bar"]);
    expect(menu.optionCount).toBe(2);
    expect(menu.optionAt(1)).toBe("bar");
  });

  it("moves a re-added option to the end and replaces its action", () => {
    const first = vi.fn();
    const second = vi.fn();
    const menu = new Menu("Main");
    menu.addOption("foo", first);
    menu.addOption("bar", () => {});
    menu.addOption("foo", second);

    expect(menu.optionNames()).toEqual(["bar", "foo"]);
    expect(menu.getOption("foo")).toBe(second);
  });

  it("deletes options from both the bindings and the order", () => {
    const menu = new Menu("Main");
    menu.addOption("foo", () => {});
    menu.addOption("bar", () => {});
    menu.deleteOption("foo");
    menu.deleteOption("missing");

    expect(menu.optionNames()).toEqual(["bar"]);
    expect(menu.getOption("foo")).toBeUndefined();
  });

  it("returns a copy of the option order", () => {
    const menu = new Menu("Main");
    menu.addOption("foo", () => {});
    menu.optionNames().push("bar");
    expect(menu.optionCount).toBe(1);
  });

  it("prefers the prompt function over static text", () => {
    const menu = new Menu("Main", "static", () => "dynamic");
    expect(menu.resolvePrompt()).toBe("dynamic");
    expect(menu.prompt).toBe("dynamic");
  });

  it("evaluates a prompt function once per resolve", () => {
    let calls = 0;
    const menu = new Menu("Main", "", () => `call ${++calls}`);
    expect(menu.prompt).toBe("");
    expect(menu.resolvePrompt()).toBe("call 1");
    expect(menu.resolvePrompt()).toBe("call 2");
    expect(menu.prompt).toBe("call 2");
  });

  it("switches between static and dynamic prompts", () => {
    const menu = new Menu("Main", "", () => "dynamic");
    menu.resolvePrompt();
    menu.setPrompt("fixed");
    expect(menu.prompt).toBe("fixed");
    expect(menu.resolvePrompt()).toBe("fixed");
  });
});
