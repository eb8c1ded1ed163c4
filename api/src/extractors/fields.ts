import { normalizePdfDate } from "./pdf-date.js";
import type { XmpField, XmpMetadataSource } from "./xmp.js";

export type ParsedFields = Record<string, string>;

export interface ParsedFieldOptions {
  /** Rewrite CreationDate/ModDate to UTC+05:30 and label them "(IST)". */
  normalizeDates?: boolean;
}

const XMP_LABELS: ReadonlyArray<readonly [string, XmpField]> = [
  ["Title (XMP)", "title"],
  ["Creator (XMP)", "creator"],
  ["Description (XMP)", "description"],
  ["Keywords (XMP)", "keywords"],
  ["CreatorTool (XMP)", "creatorTool"],
  ["CreateDate (XMP)", "createDate"],
  ["ModifyDate (XMP)", "modifyDate"],
  ["Producer (XMP)", "producer"],
];

export function buildParsedFields(
  info: Record<string, string>,
  xmp: XmpMetadataSource | null | undefined,
  options: ParsedFieldOptions = {},
): ParsedFields {
  const entry = (key: string): string => info[`/${key}`] ?? "";
  const date = (key: string): string =>
    options.normalizeDates ? normalizePdfDate(entry(key)) : entry(key);
  const dateLabel = (key: string): string => (options.normalizeDates ? `${key} (IST)` : key);

  const fields: ParsedFields = {
    Title: entry("Title"),
    Author: entry("Author"),
    Subject: entry("Subject"),
    Keywords: entry("Keywords"),
    Creator: entry("Creator"),
    Producer: entry("Producer"),
    [dateLabel("CreationDate")]: date("CreationDate"),
    [dateLabel("ModDate")]: date("ModDate"),
    Trapped: entry("Trapped"),
  };

  if (xmp) {
    for (const [label, field] of XMP_LABELS) {
      const value = xmp[field];
      if (value !== undefined && value !== null) {
        fields[label] = value;
      }
    }
  }

  return fields;
}
