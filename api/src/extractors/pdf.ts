import { toDisplayString } from "./coerce.js";
import { buildParsedFields } from "./fields.js";
import type { ParsedFieldOptions, ParsedFields } from "./fields.js";
import { pdfLibParser } from "./pdf-lib-parser.js";
import type { PdfParser } from "./pdf-lib-parser.js";
import { extractXmpXml } from "./xmp.js";

export const PARSE_ERROR_PREFIX = "Failed to read PDF metadata";

export interface PdfMetadataResult {
  filename: string;
  sizeBytes: number;
  pageCount: number;
  parsed: ParsedFields;
  /** Information dictionary as pretty-printed JSON. */
  rawInfo: string;
  xmpXml: string | null;
}

export type PdfMetadataOutcome =
  | { ok: true; result: PdfMetadataResult }
  | { ok: false; error: string };

export interface ExtractPdfOptions extends ParsedFieldOptions {
  parser?: PdfParser;
}

function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

export async function extractPdfMetadata(
  bytes: Uint8Array,
  filename: string,
  options: ExtractPdfOptions = {},
): Promise<PdfMetadataOutcome> {
  const parser = options.parser ?? pdfLibParser;

  try {
    const document = await parser.parse(bytes);

    const info: Record<string, string> = {};
    for (const [key, value] of Object.entries(document.info ?? {})) {
      info[toDisplayString(key)] = toDisplayString(value);
    }

    return {
      ok: true,
      result: {
        filename,
        sizeBytes: bytes.byteLength,
        pageCount: document.pageCount,
        parsed: buildParsedFields(info, document.xmp, { normalizeDates: options.normalizeDates }),
        rawInfo: JSON.stringify(info, null, 2),
        xmpXml: extractXmpXml(document.xmp),
      },
    };
  } catch (error) {
    return { ok: false, error: `${PARSE_ERROR_PREFIX}: ${errorMessage(error)}` };
  }
}
