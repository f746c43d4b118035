#!/usr/bin/env node

/**
 * CLI entry point for the Hi-GAL FITS fetcher
 * Handles command-line argument parsing and user interaction
 */

import { Command } from "commander";
import { fetchCommand } from "./commands/fetch";
import { migrateCommand } from "./commands/migrate";
import { bandsCommand } from "./commands/bands";
import { configCommand } from "./commands/config";

const program = new Command();

program
  .name("higal-fetch")
  .description("Fetch Hi-GAL DR1 FITS maps through the ASDC web request form")
  .version("0.1.0");

// Fill the form, trigger the downloads, move the finished files
program
  .command("fetch")
  .description("Search around a sky position and download the band maps")
  .requiredOption("--lon <deg>", "Longitude in decimal degrees (RA for fk5, l for galactic)")
  .requiredOption("--lat <deg>", "Latitude in decimal degrees (Dec for fk5, b for galactic)")
  .requiredOption("-r, --radius <radius>", "Search radius, e.g. 30arcmin, 0.5deg (bare numbers are arcmin)")
  .option("-f, --frame <frame>", "Coordinate frame: fk5 or galactic", "galactic")
  .option("-b, --bands <bands...>", "Bands to download (default: all)")
  .option("-d, --download-dir <path>", "Directory the browser downloads into")
  .option("-o, --output <path>", "Directory the finished files are moved to")
  .option("-p, --pattern <glob>", "Glob selecting the files to move")
  .option("--no-settle", "Do not wait for pop-up windows to close before moving")
  .option("--headless", "Run the browser without a window")
  .option("-c, --config <path>", "Path to custom config file")
  .option("-v, --verbose", "Verbose output")
  .action(fetchCommand);

// Move already downloaded files, no browser involved
program
  .command("migrate [source] [destination]")
  .description("Move finished downloads matching a glob into the output directory")
  .option("-p, --pattern <glob>", "Glob selecting the files to move")
  .option("-m, --marker-suffix <suffix>", "Suffix of in-progress marker files")
  .option("-t, --timeout <seconds>", "Maximum wait per in-progress file")
  .option("-c, --config <path>", "Path to custom config file")
  .option("-v, --verbose", "Verbose output")
  .action(migrateCommand);

program
  .command("bands")
  .description("List the known bands and their form identifiers")
  .option("-c, --config <path>", "Path to custom config file")
  .action(bandsCommand);

// Config command - show config location
program
  .command("config")
  .description("Show configuration file location")
  .action(configCommand);

program.parse();
