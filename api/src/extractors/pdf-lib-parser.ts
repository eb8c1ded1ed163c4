import {
  PDFDict,
  PDFDocument,
  PDFHexString,
  PDFName,
  PDFRawStream,
  PDFStream,
  PDFString,
  decodePDFRawStream,
} from "pdf-lib";
import type { PDFObject } from "pdf-lib";
import { toDisplayString } from "./coerce.js";
import { XmpPacket } from "./xmp.js";
import type { XmpMetadataSource } from "./xmp.js";

/** What the extraction routine needs from a PDF parser. */
export interface ParsedPdf {
  pageCount: number;
  /** Document information dictionary, keyed by PDF name (`/Title`). */
  info?: Record<string, unknown>;
  xmp?: XmpMetadataSource;
}

export interface PdfParser {
  parse(bytes: Uint8Array): Promise<ParsedPdf>;
}

function pdfObjectText(value: PDFObject | undefined): string | undefined {
  if (value === undefined) {
    return undefined;
  }
  if (value instanceof PDFName) {
    return value.asString();
  }
  if (value instanceof PDFString || value instanceof PDFHexString) {
    return value.decodeText();
  }
  return value.toString();
}

function readInfo(document: PDFDocument): Record<string, unknown> | undefined {
  const dict = document.context.lookupMaybe(document.context.trailerInfo.Info, PDFDict);
  if (!dict) {
    return undefined;
  }

  const info: Record<string, unknown> = {};
  for (const key of dict.keys()) {
    info[key.asString()] = pdfObjectText(dict.lookup(key));
  }
  return info;
}

function streamBytes(stream: PDFStream): Uint8Array {
  if (stream instanceof PDFRawStream) {
    return decodePDFRawStream(stream).decode();
  }
  return stream.getContents();
}

async function readXmp(document: PDFDocument): Promise<XmpPacket | undefined> {
  const stream = document.catalog.lookupMaybe(PDFName.of("Metadata"), PDFStream);
  if (!stream) {
    return undefined;
  }
  return XmpPacket.fromXml(toDisplayString(streamBytes(stream)));
}

/**
 * Parser backed by pdf-lib. Metadata is read as stored: pdf-lib would otherwise
 * stamp its own Producer and ModDate on load.
 */
export const pdfLibParser: PdfParser = {
  async parse(bytes) {
    const document = await PDFDocument.load(bytes, {
      ignoreEncryption: true,
      updateMetadata: false,
    });

    return {
      pageCount: document.getPageCount(),
      info: readInfo(document),
      xmp: await readXmp(document),
    };
  },
};
