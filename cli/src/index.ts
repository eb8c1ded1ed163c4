#!/usr/bin/env node
import { Command } from "commander";
import { registerExtractCommand } from "./commands/extract.js";
import { loadDotEnvFromCwd } from "./lib/env.js";
import { logger } from "./lib/logger.js";

async function main() {
  loadDotEnvFromCwd();

  const program = new Command();

  program
    .name("pdfmeta")
    .description("CLI tool for reading PDF metadata through the metadata API")
    .version("1.0.0");

  registerExtractCommand(program);

  await program.parseAsync(process.argv);
}

main().catch((e) => {
  logger.error("pdfmeta failed:", e);
  process.exit(1);
});
