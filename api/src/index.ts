import { buildApp, DEFAULT_MAX_UPLOAD_BYTES } from "./server.js";
import { fileURLToPath } from "node:url";
import path from "node:path";

const LOG_LEVELS = ["fatal", "error", "warn", "info", "debug", "trace", "silent"];

export interface ServerConfig {
  port: number;
  host: string;
  maxUploadBytes: number;
  logLevel: string;
}

function readInteger(raw: string | undefined, fallback: number): number {
  const trimmed = (raw ?? "").trim();
  return trimmed ? Number(trimmed) : fallback;
}

export function readConfig(env: NodeJS.ProcessEnv = process.env): ServerConfig {
  return {
    port: readInteger(env.PORT, 8080),
    host: (env.HOST || "0.0.0.0").trim(),
    maxUploadBytes: readInteger(env.MAX_UPLOAD_BYTES, DEFAULT_MAX_UPLOAD_BYTES),
    logLevel: (env.LOG_LEVEL || "info").trim().toLowerCase(),
  };
}

/**
 * Validate configuration.
 * Returns an array of error messages, or empty array if valid.
 */
export function validateConfig(config: ServerConfig = readConfig()): string[] {
  const errors: string[] = [];

  if (!Number.isInteger(config.port) || config.port < 1 || config.port > 65535) {
    errors.push("PORT must be an integer between 1 and 65535");
  }

  if (!Number.isInteger(config.maxUploadBytes) || config.maxUploadBytes < 1) {
    errors.push("MAX_UPLOAD_BYTES must be a positive integer (e.g., 20971520)");
  }

  if (!LOG_LEVELS.includes(config.logLevel)) {
    errors.push(`LOG_LEVEL must be one of: ${LOG_LEVELS.join(", ")}`);
  }

  return errors;
}

function init() {
  const config = readConfig();
  const configErrors = validateConfig(config);
  const app = buildApp({
    logger: { level: configErrors.length > 0 ? "info" : config.logLevel },
    maxUploadBytes: config.maxUploadBytes,
  });

  if (configErrors.length > 0) {
    app.log.error("Configuration validation failed:");
    configErrors.forEach((error) => app.log.error(`  - ${error}`));
    process.exit(1);
  }

  app.log.info("Configuration validation passed");
  return { app, config };
}

// Only run when this file is executed directly
const entrypointPath = process.argv[1] ? path.resolve(process.argv[1]) : "";

if (entrypointPath && fileURLToPath(import.meta.url) === entrypointPath) {
  const { app, config } = init();
  app.listen({ port: config.port, host: config.host }).catch((err) => {
    app.log.error({ err }, "Server startup failed");
    process.exit(1);
  });
}
