import type { FastifyInstance } from "fastify";
import { RESPONSE_HEADERS, handleMetadataEvent } from "../handlers/metadata.js";

export const METADATA_API_PATH = "/api/metadata";

export interface MetadataApiOptions {
  bodyLimit: number;
}

/**
 * Mounts the serverless handler. Bodies reach it unparsed so malformed JSON
 * gets the handler's own error instead of Fastify's.
 */
export async function metadataApiRoutes(app: FastifyInstance, options: MetadataApiOptions): Promise<void> {
  app.removeAllContentTypeParsers();
  app.addContentTypeParser("*", { parseAs: "string" }, (_request, body, done) => {
    done(null, body);
  });

  // Framework-level rejections (an oversized body) still answer in the endpoint's JSON shape.
  app.setErrorHandler((error, request, reply) => {
    const statusCode = error.statusCode ?? 500;
    if (statusCode >= 500) {
      request.log.error({ err: error }, "Metadata request failed");
    } else {
      request.log.warn({ err: error }, "Metadata request rejected");
    }
    const message = statusCode >= 500 ? "Internal Server Error" : error.message;
    return reply.code(statusCode).headers(RESPONSE_HEADERS).send(JSON.stringify({ error: message }));
  });

  app.route({
    method: ["GET", "POST", "PUT", "PATCH", "DELETE", "OPTIONS"],
    url: METADATA_API_PATH,
    bodyLimit: options.bodyLimit,
    exposeHeadRoute: false,
    handler: async (request, reply) => {
      const response = await handleMetadataEvent(
        {
          httpMethod: request.method,
          body: typeof request.body === "string" ? request.body : null,
        },
        { log: request.log },
      );
      return reply.code(response.statusCode).headers(response.headers).send(response.body);
    },
  });
}
