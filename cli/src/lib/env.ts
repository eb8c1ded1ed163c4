import path from "node:path";
import dotenv from "dotenv";

/** Load `.env` from the working directory. Variables already set win. */
export function loadDotEnvFromCwd(cwd: string = process.cwd()): void {
  dotenv.config({ path: path.join(cwd, ".env") });
}

export function getDefaultApiUrl(): string {
  const explicit = (process.env.PDFMETA_URL || "").trim();
  if (explicit) {
    return explicit;
  }

  const hostPort = (process.env.API_HOST_PORT || "").trim();
  if (/^[0-9]+$/.test(hostPort)) {
    return `http://localhost:${hostPort}`;
  }

  return "http://localhost:8080";
}
