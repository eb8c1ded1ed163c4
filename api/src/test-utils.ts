import { PDFDict, PDFDocument, PDFName } from "pdf-lib";

export interface SamplePdfOptions {
  pages?: number;
  title?: string;
  author?: string;
  creationDate?: Date;
  trapped?: boolean;
  xmp?: string;
}

/** Build a small PDF in memory for tests. */
export async function createSamplePdf(options: SamplePdfOptions = {}): Promise<Uint8Array> {
  const document = await PDFDocument.create({ updateMetadata: false });
  for (let i = 0; i < (options.pages ?? 1); i++) {
    document.addPage([200, 200]);
  }

  if (options.title !== undefined) document.setTitle(options.title);
  if (options.author !== undefined) document.setAuthor(options.author);
  if (options.creationDate !== undefined) document.setCreationDate(options.creationDate);

  if (options.trapped !== undefined) {
    let info = document.context.lookupMaybe(document.context.trailerInfo.Info, PDFDict);
    if (!info) {
      info = document.context.obj({});
      document.context.trailerInfo.Info = document.context.register(info);
    }
    info.set(PDFName.of("Trapped"), PDFName.of(options.trapped ? "True" : "False"));
  }

  if (options.xmp !== undefined) {
    const stream = document.context.stream(options.xmp, { Type: "Metadata", Subtype: "XML" });
    document.catalog.set(PDFName.of("Metadata"), document.context.register(stream));
  }

  return document.save();
}

export function toBase64(bytes: Uint8Array): string {
  return Buffer.from(bytes).toString("base64");
}
