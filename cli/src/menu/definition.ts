import { readFileSync } from "fs";
import { z } from "zod";
import { MenuDefinitionError, errorMessage } from "../utils/errors";
import { writeLine } from "./io";
import { Menu } from "./menu";
import { MenuTree } from "./tree";
import type { MenuAction, Writer } from "./types";

export type OptionDefinition = {
  name: string;
  command?: string;
  message?: string;
};

export type MenuDefinition = {
  name: string;
  prompt?: string;
  options?: OptionDefinition[];
  subMenus?: MenuDefinition[];
};

export const optionDefinitionSchema = z
  .object({
    name: z.string().min(1),
    command: z.string().min(1).optional(),
    message: z.string().optional(),
  })
  .refine((data) => (data.command === undefined) !== (data.message === undefined), {
    message: "Exactly one of command or message must be provided",
  });

export const menuDefinitionSchema: z.ZodType<MenuDefinition> = z.lazy(() =>
  z.object({
    name: z.string().min(1),
    prompt: z.string().optional(),
    options: z.array(optionDefinitionSchema).optional(),
    subMenus: z.array(menuDefinitionSchema).optional(),
  })
);

export const menuFileSchema = z.object({
  redraw: z.boolean().optional(),
  home: menuDefinitionSchema,
});

export type MenuFile = z.infer<typeof menuFileSchema>;

export type DefinitionEffects = {
  runCommand(command: string): Promise<void>;
  out: Writer;
};

export function parseMenuFile(raw: unknown): MenuFile {
  const result = menuFileSchema.safeParse(raw);
  if (!result.success) {
    throw new MenuDefinitionError("Invalid menu definition", {
      issues: result.error.issues.map((issue) => `${issue.path.join(".") || "(root)"}: ${issue.message}`),
    });
  }
  return result.data;
}

export function loadMenuFile(filePath: string): MenuFile {
  let raw: unknown;
  try {
    raw = JSON.parse(readFileSync(filePath, "utf8"));
  } catch (err) {
    throw new MenuDefinitionError(`Could not read menu definition ${filePath}`, { cause: errorMessage(err) });
  }
  return parseMenuFile(raw);
}

function optionAction(option: OptionDefinition, effects: DefinitionEffects): MenuAction {
  const { command, message } = option;
  if (command !== undefined) {
    return () => effects.runCommand(command);
  }
  return () => writeLine(effects.out, message ?? "");
}

function createMenu(definition: MenuDefinition, effects: DefinitionEffects): Menu {
  const menu = new Menu(definition.name, definition.prompt ?? "");
  for (const option of definition.options ?? []) {
    menu.addOption(option.name, optionAction(option, effects));
  }
  return menu;
}

function attachSubMenus(tree: MenuTree, parent: Menu, definitions: MenuDefinition[], effects: DefinitionEffects) {
  for (const definition of definitions) {
    const child = createMenu(definition, effects);
    tree.addSubMenu(parent, child);
    attachSubMenus(tree, child, definition.subMenus ?? [], effects);
  }
}

/** Builds a menu tree from a validated definition. `redraw` overrides the file's setting. */
export function buildMenuTree(file: MenuFile, effects: DefinitionEffects, redraw?: boolean): MenuTree {
  const home = createMenu(file.home, effects);
  const tree = new MenuTree(home, { redraw: redraw ?? file.redraw });
  attachSubMenus(tree, home, file.home.subMenus ?? [], effects);
  return tree;
}
