import type { MetadataFailure, MetadataResult, MetadataSuccess } from "./types.js";

export const METADATA_PATH = "/api/metadata";

export interface UploadFile {
  filename: string;
  data: Uint8Array;
}

function endpoint(api: string): string {
  return `${api.replace(/\/+$/, "")}${METADATA_PATH}`;
}

async function errorDetail(res: Response): Promise<string> {
  const text = await res.text();
  try {
    const body: Partial<MetadataFailure> = JSON.parse(text);
    return typeof body.error === "string" ? body.error : text;
  } catch {
    return text;
  }
}

function isMetadataSuccess(body: unknown): body is MetadataSuccess {
  return (
    typeof body === "object" &&
    body !== null &&
    "result" in body &&
    typeof body.result === "object" &&
    body.result !== null
  );
}

export async function extractMetadata(api: string, file: UploadFile): Promise<MetadataResult> {
  const res = await fetch(endpoint(api), {
    method: "POST",
    headers: { "Content-Type": "application/json" },
    body: JSON.stringify({
      file_base64: Buffer.from(file.data).toString("base64"),
      filename: file.filename,
    }),
  });

  if (!res.ok) {
    throw new Error(`Failed to extract metadata for ${file.filename}: ${res.status} ${await errorDetail(res)}`);
  }

  const body: unknown = await res.json();
  if (!isMetadataSuccess(body)) {
    throw new Error(`Unexpected response from ${endpoint(api)} for ${file.filename}`);
  }
  return body.result;
}
