import { Command } from "commander";
import { buildMenuTree, loadMenuFile } from "../menu/definition";
import { runShellCommand } from "../menu/effects/shell";
import { stdoutWriter } from "../menu/io";

export const runCommand = new Command("run")
  .description("Display the menu described by a JSON definition file")
  .argument("<file>", "Path to the menu definition")
  .option("--no-redraw", "Print each menu below the last instead of redrawing in place")
  .action(async (file: string, opts: { redraw: boolean }) => {
    const definition = loadMenuFile(file);
    // commander sets redraw=true unless --no-redraw was passed
    const tree = buildMenuTree(definition, { runCommand: runShellCommand, out: stdoutWriter }, opts.redraw ? undefined : false);
    await tree.display();
  });
