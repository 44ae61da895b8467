#!/usr/bin/env node
/**
 * protonlink CLI - keeps stable link names pointing at the newest installed
 * Proton builds in a compatibility tools directory.
 */

import { Command } from "commander";
import { linkCommand } from "./commands/link.js";
import { lsCommand } from "./commands/ls.js";
import { rmCommand } from "./commands/rm.js";
import { relinkCommand } from "./commands/relink.js";
import { familiesCommand } from "./commands/families.js";
import { reportCommand } from "./commands/report.js";
import { closeTracer } from "./core/global-tracer.js";

const program = new Command();

program
  .name("protonlink")
  .description("Manage GE-Proton and Proton-EM link slots in a compatibility tools directory")
  .version("0.1.0")
  .option("-d, --extract-dir <dir>", "Directory holding installed releases")
  .option("-f, --family <id>", "Release family (GE-Proton or Proton-EM)")
  .option("-c, --config <path>", "Config file (default: ~/.protonlink/config.yaml)")
  .option("--debug", "Record debug entries in the trace store");

// Register commands
program.addCommand(linkCommand);
program.addCommand(lsCommand);
program.addCommand(rmCommand);
program.addCommand(relinkCommand);
program.addCommand(familiesCommand);
program.addCommand(reportCommand);

await program.parseAsync();
closeTracer();
