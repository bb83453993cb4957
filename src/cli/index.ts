#!/usr/bin/env tsx

/**
 * CLI entry point for the Markdown to HTML post converter
 * Handles command-line argument parsing and user interaction
 */

import { Command } from "commander";
import { convertCommand } from "./commands/convert";
import { configCommand } from "./commands/config";

const program = new Command();

program
  .name("md2post")
  .description("Convert Markdown blog posts to HTML posts with frontmatter")
  .version("0.1.0");

// Main conversion command (default action)
program
  .option("-i, --input <path>", "Input directory containing Markdown posts")
  .option("-o, --output <path>", "Output directory for HTML posts")
  .option("-c, --config <path>", "Path to custom config file")
  .option("--dry-run", "Preview output names without writing files")
  .option("-v, --verbose", "Verbose output")
  .action(convertCommand);

// Config command - show config location
program
  .command("config")
  .description("Show configuration file location")
  .action(configCommand);

await program.parseAsync();
