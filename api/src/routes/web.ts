import type { FastifyInstance, FastifyRequest } from "fastify";
import multipart from "@fastify/multipart";
import { extractPdfMetadata } from "../extractors/pdf.js";
import { renderPage } from "./page.js";
import type { PageState } from "./page.js";

export const UPLOAD_FIELD = "pdf";
export const NO_FILE_MESSAGE = "Please choose a PDF file.";

export interface WebRoutesOptions {
  maxUploadBytes: number;
}

function isFileTooLarge(error: unknown): boolean {
  return error instanceof Error && "code" in error && error.code === "FST_REQ_FILE_TOO_LARGE";
}

async function readUpload(
  request: FastifyRequest,
  maxUploadBytes: number,
): Promise<{ filename: string; data: Buffer } | { error: string }> {
  if (!request.isMultipart()) {
    return { error: NO_FILE_MESSAGE };
  }

  // The first `pdf` part wins; every other part is drained so the iterator can finish.
  let upload: { filename: string; data: Buffer } | undefined;
  try {
    for await (const part of request.files()) {
      if (upload || part.fieldname !== UPLOAD_FIELD) {
        part.file.resume();
        continue;
      }
      upload = { filename: part.filename, data: await part.toBuffer() };
    }
  } catch (error) {
    if (isFileTooLarge(error)) {
      return { error: `File is too large (limit ${maxUploadBytes} bytes).` };
    }
    throw error;
  }

  if (!upload || !upload.filename) {
    return { error: NO_FILE_MESSAGE };
  }
  return upload;
}

/** HTML upload form. Dates are shown exactly as the document stores them. */
export async function webRoutes(app: FastifyInstance, options: WebRoutesOptions): Promise<void> {
  // Anything that is not multipart is accepted and dropped, so the form answers it with its own page.
  app.removeAllContentTypeParsers();
  app.addContentTypeParser("*", { parseAs: "buffer" }, (_request, _body, done) => {
    done(null);
  });
  await app.register(multipart, { limits: { fileSize: options.maxUploadBytes } });

  app.get("/", async (_request, reply) => {
    return reply.type("text/html; charset=utf-8").send(renderPage());
  });

  app.post("/", async (request, reply) => {
    const upload = await readUpload(request, options.maxUploadBytes);

    let state: PageState;
    if ("error" in upload) {
      state = { error: upload.error };
    } else {
      const outcome = await extractPdfMetadata(upload.data, upload.filename);
      if (outcome.ok) {
        request.log.info(
          { filename: upload.filename, sizeBytes: outcome.result.sizeBytes, pageCount: outcome.result.pageCount },
          "Extracted PDF metadata",
        );
        state = { result: outcome.result };
      } else {
        request.log.warn({ filename: upload.filename, error: outcome.error }, "PDF metadata extraction failed");
        state = { error: outcome.error };
      }
    }

    return reply.type("text/html; charset=utf-8").send(renderPage(state));
  });
}
