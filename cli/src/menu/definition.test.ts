import path from "path";
import { describe, expect, it, vi } from "vitest";
import { MenuDefinitionError } from "../utils/errors";
import { buildMenuTree, loadMenuFile, parseMenuFile } from "./definition";
import { RecordingWriter } from "./test-utils";

const samplePath = path.join(__dirname, "../../../menus/sample.json");

function effects() {
  return { runCommand: vi.fn(async (_command: string) => {}), out: new RecordingWriter() };
}

describe("parseMenuFile", () => {
  it("accepts nested menus", () => {
    const file = parseMenuFile({
      home: {
        name: "Main",
        options: [{ name: "hello", message: "hi" }],
        subMenus: [{ name: "Sub" }],
      },
    });
    expect(file.home.subMenus?.[0].name).toBe("Sub");
  });

  it("requires exactly one of command or message", () => {
    try {
      parseMenuFile({ home: { name: "Main", options: [{ name: "both", command: "ls", message: "hi" }] } });
      expect.unreachable();
    } catch (err) {
      expect(err).toBeInstanceOf(MenuDefinitionError);
      const definitionError = err instanceof MenuDefinitionError ? err : null;
      expect(definitionError?.code).toBe("INVALID_DEFINITION");
      expect(definitionError?.details).toEqual({
        issues: ["home.options.0: Exactly one of command or message must be provided"],
      });
    }
  });

  it("reports a missing home menu at the root", () => {
    expect(() => parseMenuFile({ redraw: true })).toThrow(MenuDefinitionError);
    expect(() => parseMenuFile({ home: { name: "" } })).toThrow("Invalid menu definition");
  });
});

describe("loadMenuFile", () => {
  it("reads the bundled sample", () => {
    const file = loadMenuFile(samplePath);
    expect(file.redraw).toBe(true);
    expect(file.home.name).toBe("Main");
  });

  it("wraps unreadable files", () => {
    expect(() => loadMenuFile(path.join(__dirname, "does-not-exist.json"))).toThrow(MenuDefinitionError);
  });
});

describe("buildMenuTree", () => {
  it("builds the menus and the submenu relation", () => {
    const tree = buildMenuTree(loadMenuFile(samplePath), effects());
    const home = tree.homeMenu;
    expect(home.optionNames()).toEqual(["Git status", "Disk usage"]);
    expect(home.prompt).toBe("Project shortcuts.\nPick something to run.");

    const [notes, tools] = tree.subMenusOf(home);
    expect(notes.name).toBe("Notes");
    expect(notes.optionNames()).toEqual(["Release day", "On call"]);
    expect(tree.subMenusOf(tools).map((m) => m.name)).toEqual(["Cleanup"]);
    expect(tree.hasSubMenuRelation(notes)).toBe(false);
  });

  it("binds commands and messages to options", async () => {
    const fx = effects();
    const tree = buildMenuTree(loadMenuFile(samplePath), fx);
    const [notes] = tree.subMenusOf(tree.homeMenu);

    await tree.homeMenu.getOption("Git status")?.();
    expect(fx.runCommand).toHaveBeenCalledWith("git status --short");

    await notes.getOption("On call")?.();
    expect(fx.out.text).toBe("Check the rota before the weekend.\n");
  });

  it("lets the caller override the file's redraw setting", () => {
    const file = loadMenuFile(samplePath);
    expect(buildMenuTree(file, effects()).redraw).toBe(true);
    expect(buildMenuTree(file, effects(), false).redraw).toBe(false);
  });
});
