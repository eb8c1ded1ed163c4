import { extractPdfMetadata } from "../extractors/pdf.js";
import type { PdfMetadataResult } from "../extractors/pdf.js";
import { logger as defaultLogger } from "../logger.js";
import type { RequestLogger } from "../logger.js";

export const DEFAULT_FILENAME = "upload.pdf";

/** Serverless-style request: method, raw body and whether the body arrived base64 encoded. */
export interface HandlerEvent {
  httpMethod: string;
  body?: string | null;
  isBase64Encoded?: boolean;
}

export interface HandlerResponse {
  statusCode: number;
  headers: Record<string, string>;
  body: string;
}

export interface WireMetadataResult {
  filename: string;
  size_bytes: number;
  page_count: number;
  parsed: Record<string, string>;
  raw_info: string;
  xmp_xml: string | null;
}

export type MetadataResponseBody =
  | { ok: true }
  | { ok: true; result: WireMetadataResult }
  | { error: string };

export interface MetadataHandlerDeps {
  log?: RequestLogger;
}

export const RESPONSE_HEADERS: Readonly<Record<string, string>> = {
  "Content-Type": "application/json",
  "Access-Control-Allow-Origin": "*",
  "Access-Control-Allow-Headers": "Content-Type",
  "Access-Control-Allow-Methods": "POST, OPTIONS",
};

function respond(statusCode: number, body: MetadataResponseBody): HandlerResponse {
  return { statusCode, headers: { ...RESPONSE_HEADERS }, body: JSON.stringify(body) };
}

export function toWireResult(result: PdfMetadataResult): WireMetadataResult {
  return {
    filename: result.filename,
    size_bytes: result.sizeBytes,
    page_count: result.pageCount,
    parsed: result.parsed,
    raw_info: result.rawInfo,
    xmp_xml: result.xmpXml,
  };
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function parsePayload(event: HandlerEvent): Record<string, unknown> | null {
  let raw = event.body ?? "";
  if (event.isBase64Encoded) {
    raw = Buffer.from(raw, "base64").toString("utf8");
  }

  let payload: unknown;
  try {
    payload = JSON.parse(raw);
  } catch {
    return null;
  }
  return isRecord(payload) ? payload : null;
}

/**
 * JSON front end. Accepts `{ file_base64, filename? }` via POST and answers with the
 * extracted metadata, dates normalized to UTC+05:30.
 */
export async function handleMetadataEvent(
  event: HandlerEvent,
  deps: MetadataHandlerDeps = {},
): Promise<HandlerResponse> {
  const log = deps.log ?? defaultLogger;
  const method = event.httpMethod.toUpperCase();

  if (method === "OPTIONS") {
    return respond(200, { ok: true });
  }
  if (method !== "POST") {
    return respond(405, { error: "Use POST" });
  }

  const payload = parsePayload(event);
  if (!payload) {
    return respond(400, { error: "Invalid JSON body" });
  }

  const fileBase64 = payload.file_base64;
  if (typeof fileBase64 !== "string" || fileBase64.length === 0) {
    return respond(400, { error: "Missing file_base64" });
  }
  const requestedName = payload.filename;
  const filename =
    typeof requestedName === "string" && requestedName.length > 0 ? requestedName : DEFAULT_FILENAME;

  const bytes = Buffer.from(fileBase64, "base64");
  const outcome = await extractPdfMetadata(bytes, filename, { normalizeDates: true });
  if (!outcome.ok) {
    log.warn({ filename, sizeBytes: bytes.byteLength, error: outcome.error }, "PDF metadata extraction failed");
    return respond(400, { error: outcome.error });
  }

  log.info(
    { filename, sizeBytes: outcome.result.sizeBytes, pageCount: outcome.result.pageCount },
    "Extracted PDF metadata",
  );
  return respond(200, { ok: true, result: toWireResult(outcome.result) });
}
