import xml2js from "xml2js";
import { toDisplayString } from "./coerce.js";

type XmlValue = string | Uint8Array | null | undefined;

/** An access point may hold the XML directly or produce it on demand. */
export type XmlAccessPoint = XmlValue | (() => XmlValue);

/**
 * Capabilities an embedded XMP metadata object may offer.
 * Every member is optional; callers probe for what is there.
 */
export interface XmpMetadataSource {
  getXml?: () => XmlValue;
  xml?: XmlAccessPoint;
  xmpmeta?: XmlAccessPoint;

  title?: string;
  creator?: string;
  description?: string;
  keywords?: string;
  creatorTool?: string;
  createDate?: string;
  modifyDate?: string;
  producer?: string;
}

export type XmpField =
  | "title"
  | "creator"
  | "description"
  | "keywords"
  | "creatorTool"
  | "createDate"
  | "modifyDate"
  | "producer";

const XML_ACCESS_POINTS = ["getXml", "xml", "xmpmeta"] as const;

/**
 * Raw XML of the packet, or null when the object is missing or exposes nothing usable.
 * An accessor that throws is skipped in favour of the next one.
 */
export function extractXmpXml(xmp: XmpMetadataSource | null | undefined): string | null {
  if (!xmp) {
    return null;
  }

  for (const name of XML_ACCESS_POINTS) {
    const candidate: XmlAccessPoint = xmp[name];
    if (typeof candidate === "function") {
      try {
        return toDisplayString(candidate.call(xmp));
      } catch {
        continue;
      }
    }
    if (candidate !== undefined && candidate !== null) {
      return toDisplayString(candidate);
    }
  }

  return null;
}

// Local element (or attribute) names, prefixes stripped by the parser.
const FIELD_SOURCES: ReadonlyArray<readonly [XmpField, string]> = [
  ["title", "title"],
  ["creator", "creator"],
  ["description", "description"],
  ["keywords", "Keywords"],
  ["creatorTool", "CreatorTool"],
  ["createDate", "CreateDate"],
  ["modifyDate", "ModifyDate"],
  ["producer", "Producer"],
];

type XmlNode = Record<string, unknown>;

function isNode(value: unknown): value is XmlNode {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function childNodes(node: XmlNode, name: string): unknown[] {
  const children = node[name];
  return Array.isArray(children) ? children : [];
}

function isDefaultLanguage(item: unknown): boolean {
  if (!isNode(item)) return false;
  const attributes = item.$;
  return isNode(attributes) && attributes.lang === "x-default";
}

function textOf(value: unknown): string {
  if (typeof value === "string") {
    return value;
  }
  if (!isNode(value)) {
    return "";
  }

  // rdf:Alt holds language alternatives; prefer x-default
  for (const alt of childNodes(value, "Alt")) {
    if (!isNode(alt)) continue;
    const items = childNodes(alt, "li");
    const preferred = items.find(isDefaultLanguage);
    return textOf(preferred ?? items[0]);
  }

  for (const container of ["Seq", "Bag"]) {
    for (const list of childNodes(value, container)) {
      if (!isNode(list)) continue;
      return childNodes(list, "li").map(textOf).filter((text) => text.length > 0).join(", ");
    }
  }

  const text = value._;
  return typeof text === "string" ? text : "";
}

/** First occurrence of an element or attribute with the given local name, depth first. */
function findValue(node: unknown, name: string): string | undefined {
  if (Array.isArray(node)) {
    for (const item of node) {
      const found = findValue(item, name);
      if (found !== undefined) return found;
    }
    return undefined;
  }
  if (!isNode(node)) {
    return undefined;
  }

  const attributes = node.$;
  if (isNode(attributes)) {
    const attribute = attributes[name];
    if (typeof attribute === "string") return attribute;
  }

  const direct = node[name];
  if (Array.isArray(direct) && direct.length > 0) {
    return textOf(direct[0]);
  }

  for (const [key, child] of Object.entries(node)) {
    if (key === "$" || key === "_") continue;
    const found = findValue(child, name);
    if (found !== undefined) return found;
  }
  return undefined;
}

/** The XMP packet stored in a PDF catalog's /Metadata stream. */
export class XmpPacket implements XmpMetadataSource {
  readonly title?: string;
  readonly creator?: string;
  readonly description?: string;
  readonly keywords?: string;
  readonly creatorTool?: string;
  readonly createDate?: string;
  readonly modifyDate?: string;
  readonly producer?: string;

  private constructor(
    private readonly rawXml: string,
    fields: Partial<Record<XmpField, string>>,
  ) {
    this.title = fields.title;
    this.creator = fields.creator;
    this.description = fields.description;
    this.keywords = fields.keywords;
    this.creatorTool = fields.creatorTool;
    this.createDate = fields.createDate;
    this.modifyDate = fields.modifyDate;
    this.producer = fields.producer;
  }

  getXml(): string {
    return this.rawXml;
  }

  /**
   * Parse the packet's fields. XML that does not parse still yields a packet,
   * with the raw text and no fields.
   */
  static async fromXml(xml: string): Promise<XmpPacket> {
    let document: unknown;
    try {
      document = await xml2js.parseStringPromise(xml, {
        trim: true,
        tagNameProcessors: [xml2js.processors.stripPrefix],
        attrNameProcessors: [xml2js.processors.stripPrefix],
      });
    } catch {
      return new XmpPacket(xml, {});
    }

    const fields: Partial<Record<XmpField, string>> = {};
    for (const [field, source] of FIELD_SOURCES) {
      const value = findValue(document, source);
      if (value !== undefined) {
        fields[field] = value;
      }
    }
    return new XmpPacket(xml, fields);
  }
}
