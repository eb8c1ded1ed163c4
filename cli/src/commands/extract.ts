import type { Command } from "commander";
import fs from "node:fs/promises";
import path from "node:path";
import { extractMetadata } from "../lib/api-client.js";
import { getDefaultApiUrl } from "../lib/env.js";
import { logger } from "../lib/logger.js";
import type { MetadataResult } from "../lib/types.js";

interface ExtractOptions {
  api?: string;
  json?: boolean;
  raw?: boolean;
}

export function formatResult(result: MetadataResult, raw = false): string[] {
  const lines = [`== ${result.filename} (${result.page_count} pages, ${result.size_bytes} bytes)`];
  for (const [label, value] of Object.entries(result.parsed)) {
    lines.push(`${label}: ${value || "-"}`);
  }

  if (raw) {
    lines.push("-- Raw PDF info dictionary --", result.raw_info);
    lines.push("-- XMP metadata --", result.xmp_xml || "No XMP metadata found.");
  }
  return lines;
}

export async function cmdExtract(files: string[], options: ExtractOptions): Promise<void> {
  const api = options.api || getDefaultApiUrl();
  const asJson = options.json === true;

  const results: MetadataResult[] = [];
  for (const file of files) {
    const data = await fs.readFile(file);
    const result = await extractMetadata(api, { filename: path.basename(file), data });

    if (asJson) {
      results.push(result);
      continue;
    }
    for (const line of formatResult(result, options.raw === true)) {
      logger.info(line);
    }
  }

  if (asJson) {
    logger.info(JSON.stringify({ results }, null, 2));
  }
}

export function registerExtractCommand(program: Command): void {
  program
    .command("extract")
    .description("Extract metadata from one or more PDF files")
    .argument("<files...>", "PDF files to inspect")
    .option("--api <url>", "Metadata API URL", getDefaultApiUrl())
    .option("--json", "Output JSON")
    .option("--raw", "Also print the raw info dictionary and XMP packet")
    .action((files: string[], options: ExtractOptions) => cmdExtract(files, options));
}
