import { Command } from "commander";
import { Menu } from "../menu/menu";
import { MenuTree } from "../menu/tree";
import { runShellCommand } from "../menu/effects/shell";

export function buildDemoTree(redraw?: boolean): MenuTree {
  const home = new Menu("Main", "", () => `It is ${new Date().toLocaleTimeString()}.\nPick something to run.`);
  const system = new Menu("System", "Look around the machine.");
  const greetings = new Menu("Greetings", "Say something.");

  home.addOption("Print working directory", () => console.log(process.cwd()));
  home.addOption("Node version", () => console.log(process.version));

  system.addOption("List files", () => runShellCommand(process.platform === "win32" ? "dir" : "ls -la"));
  system.addOption("Uptime", () => console.log(`${Math.round(process.uptime())}s since start`));

  greetings.addOption("Hello", () => console.log("Hello there."));
  greetings.addOption("Goodbye", () => console.log("See you."));

  const tree = new MenuTree(home, { redraw });
  tree.addSubMenus(home, [system, greetings]);

  const counter = new Menu("Counter");
  let count = 0;
  counter.setPrompt("", () => `Count is ${count}`);
  counter.addOption("Increment", () => {
    count++;
  });
  counter.addOption("Back home", () => tree.changeMenu(home));
  tree.addSubMenu(system, counter);

  return tree;
}

export const demoCommand = new Command("demo")
  .description("Display a sample menu tree")
  .option("--no-redraw", "Print each menu below the last instead of redrawing in place")
  .action(async (opts: { redraw: boolean }) => {
    await buildDemoTree(opts.redraw ? undefined : false).display();
  });
