import Fastify from "fastify";
import type { FastifyInstance } from "fastify";
import { webRoutes } from "./routes/web.js";
import { metadataApiRoutes } from "./routes/metadata-api.js";

export const DEFAULT_MAX_UPLOAD_BYTES = 20 * 1024 * 1024; // 20 MB

export interface BuildAppOptions {
  logger?: boolean | { level: string };
  maxUploadBytes?: number;
}

/** Room for base64 expansion of the largest accepted upload, plus the JSON envelope. */
export function jsonBodyLimit(maxUploadBytes: number): number {
  return Math.ceil(maxUploadBytes / 3) * 4 + 64 * 1024;
}

export function buildApp(options: BuildAppOptions = {}): FastifyInstance {
  const maxUploadBytes = options.maxUploadBytes ?? DEFAULT_MAX_UPLOAD_BYTES;
  const app = Fastify({ logger: options.logger ?? true });

  app.get("/healthz", async () => ({ ok: true }));

  app.register(webRoutes, { maxUploadBytes });
  app.register(metadataApiRoutes, { bodyLimit: jsonBodyLimit(maxUploadBytes) });

  return app;
}
