#!/usr/bin/env node

/**
 * CLI entry point for the OSM scenario generator
 * Handles command-line argument parsing and user interaction
 */

import { Command } from "commander";
import { generateCommand } from "./commands/generate";
import { configCommand } from "./commands/config";
import { stagesCommand } from "./commands/stages";

const program = new Command();

program
  .name("osm-scenario")
  .description("Complete scenario generator from OSM to the activity based mobility generator")
  .version("0.1.0");

// Main generation command (default action)
program
  .option("--osm <path>", "OSM file")
  .option("--out <path>", "Directory for all the output files")
  .option("--profiling", "Print a call-cost profile of the run")
  .option("--no-profiling", "Disable profiling")
  .option("--lefthand", "Generate a left-hand traffic scenario")
  .option("--no-simulation", "Do not launch the simulator at the end")
  .option("-c, --config <path>", "Path to custom config file")
  .option("-v, --verbose", "Verbose output")
  .action(generateCommand);

// Config command - show config location
program
  .command("config")
  .description("Show configuration file location")
  .action(configCommand);

// Stages command - show the stage sequence and artifacts
program
  .command("stages")
  .description("List the pipeline stages with their input and output files")
  .action(stagesCommand);

await program.parseAsync();
