#!/usr/bin/env node

/**
 * CLI entry point for photo-harvest
 * Handles command-line argument parsing and user interaction
 */

import { Command } from "commander";
import { runCommand } from "./commands/run";
import { configCommand } from "./commands/config";
import {
  categoriesCommand,
  categoryCommand,
  detailCommand,
  errorsCommand,
  searchCommand,
  statsCommand,
  tablesCommand,
  urlsCommand,
} from "./commands/report";
import { healthCommand, initCommand, repairCommand } from "./commands/health";

const program = new Command();

program
  .name("photo-harvest")
  .description("Acquire photos from the Unsplash API into a local library")
  .version("0.1.0");

// Acquisition
program
  .command("run")
  .description("Fetch, download and store new photos, resuming from the last cursor")
  .option("-q, --query <keyword>", "Search query instead of the photo listing")
  .option("-r, --rotate", "Visit every catalogue category in turn")
  .option("-o, --orientation <orientation>", "landscape, portrait or squarish (searches only)")
  .option("-m, --max-pages <count>", "Stop after this many pages (per category with --rotate)")
  .option("-c, --config <path>", "Path to custom config file")
  .option("-v, --verbose", "Verbose output")
  .action(runCommand);

// Reports
program
  .command("stats")
  .description("Show library statistics")
  .option("-c, --config <path>", "Path to custom config file")
  .action(statsCommand);

program
  .command("tables")
  .description("List tables with their row counts")
  .option("-c, --config <path>", "Path to custom config file")
  .action(tablesCommand);

program
  .command("search <keyword>")
  .description("Search descriptions, authors and categories")
  .option("-c, --config <path>", "Path to custom config file")
  .action(searchCommand);

program
  .command("category <name>")
  .description("List images in a category")
  .option("-c, --config <path>", "Path to custom config file")
  .action(categoryCommand);

program
  .command("categories")
  .description("List categories with image counts")
  .option("-c, --config <path>", "Path to custom config file")
  .action(categoriesCommand);

program
  .command("detail <id>")
  .description("Show one image with its categories and URLs")
  .option("-c, --config <path>", "Path to custom config file")
  .action(detailCommand);

program
  .command("urls [id]")
  .description("Show recorded URLs, for one image or the most recent")
  .option("-l, --limit <count>", "Number of rows", "20")
  .option("-c, --config <path>", "Path to custom config file")
  .action(urlsCommand);

program
  .command("errors")
  .description("Show the most recent logged errors")
  .option("-l, --limit <count>", "Number of rows", "20")
  .option("-c, --config <path>", "Path to custom config file")
  .action(errorsCommand);

// Maintenance
program
  .command("health")
  .description("Check records against the files on disk")
  .option("-c, --config <path>", "Path to custom config file")
  .action(healthCommand);

program
  .command("repair")
  .description("Remove orphan records and files")
  .option("--dry-run", "Report what would be removed")
  .option("-c, --config <path>", "Path to custom config file")
  .action(repairCommand);

program
  .command("init")
  .description("Create the database and apply migrations")
  .option("-c, --config <path>", "Path to custom config file")
  .action(initCommand);

program
  .command("config")
  .description("Show configuration sources and the resolved settings")
  .option("-c, --config <path>", "Path to custom config file")
  .action(configCommand);

await program.parseAsync();
