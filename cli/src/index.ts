#!/usr/bin/env node
import { Command } from "commander";
import { demoCommand } from "./subcommands/demo";
import { runCommand } from "./subcommands/run";
import { MenuError } from "./utils/errors";

const program = new Command();

program
  .name("menutree")
  .description("Keyboard-driven nested menus for the terminal")
  .version("0.1.0");

program.addCommand(runCommand);
program.addCommand(demoCommand);

// With no command, show the demo menu
if (process.argv.length === 2) {
  process.argv.push("demo");
}

program.parseAsync(process.argv).catch((err: unknown) => {
  if (err instanceof MenuError) {
    console.error(`${err.code}: ${err.message}`);
    if (err.details) console.error(JSON.stringify(err.details, null, 2));
  } else {
    console.error(err);
  }
  process.exit(1);
});
