#!/usr/bin/env node
import { Command } from "commander";
import { generateCommand } from "../commands/generate.js";
import { modelsCommand } from "../commands/models.js";

const program = new Command();
program
  .name("diffscribe")
  .description("Conventional commit messages for your pending git changes")
  .version("0.1.0");

program.addCommand(generateCommand, { isDefault: true });
program.addCommand(modelsCommand);

await program.parseAsync(process.argv);
