#!/usr/bin/env node
import { config as dotenvConfig } from "dotenv";
// .env from the working directory: POM_BLUEPRINT_CONFIG, DEBUG
dotenvConfig();
import { Command } from "commander";
import { analyzeCommand } from "./commands/analyze";
import { selectorCommand } from "./commands/selector";
import { ANALYZER_VERSION } from "../blueprint/builder";

const program = new Command();

program
  .name("pom-blueprint")
  .description("Turns recorded browser-automation scripts into page-object blueprints")
  .version(ANALYZER_VERSION);

// ─── analyze command ──────────────────────────────────────────────────────────

program
  .command("analyze <path>")
  .description("Analyze a script, or every test script under a directory, into blueprint JSON")
  .option("-o, --output <dir>", "Output directory", "./pom-blueprint-output")
  .option("-c, --config <file>", "JSON configuration file (defaults to $POM_BLUEPRINT_CONFIG)")
  .option("--stdout", "Print the blueprint JSON instead of writing files")
  .action(analyzeCommand);

// ─── selector command ─────────────────────────────────────────────────────────

program
  .command("selector <expression>")
  .description("Classify and score a single selector expression")
  .option("-c, --config <file>", "JSON configuration file (defaults to $POM_BLUEPRINT_CONFIG)")
  .action(selectorCommand);

// ─── Parse argv ───────────────────────────────────────────────────────────────

program.parse(process.argv);
