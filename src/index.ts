#!/usr/bin/env node
import { Command } from "commander";
import { registerCreateCommand } from "./commands/create.js";

const program = new Command();

program
  .name("jira-issue")
  .description("Create a Jira issue from --set field assignments and link it with --link")
  .version("0.1.0");

registerCreateCommand(program);

program.parseAsync(process.argv).catch((error: unknown) => {
  const message = error instanceof Error ? error.message : String(error);
  process.stderr.write(`Error: ${message}\n`);
  process.exit(1);
});
