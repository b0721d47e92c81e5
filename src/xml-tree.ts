/**
 * XML tree: plain node structure shared by the reader and the writer.
 *
 * Reading checks well-formedness with fast-xml-parser's validator, then goes
 * through cheerio in XML mode; the DOM is flattened into `XmlNode`s so the
 * mapper never deals with parser types directly.
 *
 * ### Tag names
 *   Every tag is stored by its local name: a `prefix:` is stripped before
 *   matching, the namespace URI itself stays available as an attribute on
 *   the element that declares it (`xmlns` / `xmlns:prefix`).
 *
 * ### Text content
 *   `content` is the concatenation of the element's direct text and CDATA
 *   children, untrimmed. Elements with no text get `""`.
 */
import * as cheerio from "cheerio";
import { isCDATA, isTag, isText, type ChildNode, type Element } from "domhandler";
import { XMLValidator } from "fast-xml-parser";
import { XmlParseError } from "./errors.js";

// ---------------------------------------------------------------------------
// Types
// ---------------------------------------------------------------------------

export interface XmlNode {
  tag: string;
  attributes: Record<string, string>;
  children: XmlNode[];
  content: string;
}

/** The parsed root plus the namespace prefix it was written with, if any. */
export interface XmlDocument {
  root: XmlNode;
  prefix: string | null;
}

// ---------------------------------------------------------------------------
// Reading
// ---------------------------------------------------------------------------

export function localName(tag: string): string {
  const colon = tag.indexOf(":");
  return colon === -1 ? tag : tag.slice(colon + 1);
}

function textOf(nodes: ChildNode[]): string {
  let text = "";
  for (const n of nodes) {
    if (isText(n)) text += n.data;
    else if (isCDATA(n)) text += textOf(n.children);
  }
  return text;
}

function toXmlNode(el: Element): XmlNode {
  const children: XmlNode[] = [];
  for (const child of el.children) {
    if (isTag(child)) children.push(toXmlNode(child));
  }
  return {
    tag: localName(el.name),
    attributes: { ...el.attribs },
    children,
    content: textOf(el.children),
  };
}

/**
 * Parse an XML document.
 * Throws `XmlParseError` with the validator's message when the text is not
 * well-formed, or when it has no root element.
 */
export function parseXml(text: string): XmlDocument {
  if (!text.trim()) {
    throw new XmlParseError("Malformed XML", "no root element");
  }
  const verdict = XMLValidator.validate(text);
  if (verdict !== true) {
    throw new XmlParseError("Malformed XML", `${verdict.err.msg} (line ${verdict.err.line})`);
  }

  const $ = cheerio.load(text, { xml: true });
  const rootEl = $.root().children().get(0);
  if (!rootEl) {
    throw new XmlParseError("Malformed XML", "no root element");
  }

  const colon = rootEl.name.indexOf(":");
  return {
    root: toXmlNode(rootEl),
    prefix: colon === -1 ? null : rootEl.name.slice(0, colon),
  };
}

// ---------------------------------------------------------------------------
// Traversal helpers
// ---------------------------------------------------------------------------

export function childNamed(node: XmlNode, tag: string): XmlNode | undefined {
  return node.children.find((c) => c.tag === tag);
}

export function childrenNamed(node: XmlNode, tag: string): XmlNode[] {
  return node.children.filter((c) => c.tag === tag);
}

// ---------------------------------------------------------------------------
// Building & writing
// ---------------------------------------------------------------------------

export function element(
  tag: string,
  attributes: Record<string, string> = {},
  children: XmlNode[] = [],
  content = "",
): XmlNode {
  return { tag, attributes, children, content };
}

/**
 * Convert an XmlNode tree back to an XML string.
 * Leaf text is written inline so it reads back unchanged.
 */
export function xmlToString(node: XmlNode, indent = 0): string {
  const pad = "  ".repeat(indent);
  const attrStr = Object.entries(node.attributes)
    .map(([k, v]) => ` ${k}="${escapeXmlAttr(v)}"`)
    .join("");

  if (node.children.length === 0) {
    if (!node.content) return `${pad}<${node.tag}${attrStr} />`;
    return `${pad}<${node.tag}${attrStr}>${escapeXmlText(node.content)}</${node.tag}>`;
  }

  const parts: string[] = [];
  parts.push(`${pad}<${node.tag}${attrStr}>${node.content ? escapeXmlText(node.content) : ""}`);

  for (const child of node.children) {
    parts.push(xmlToString(child, indent + 1));
  }

  parts.push(`${pad}</${node.tag}>`);
  return parts.join("\n");
}

export function xmlDocumentToString(root: XmlNode): string {
  return `<?xml version="1.0" encoding="UTF-8"?>\n${xmlToString(root)}\n`;
}

function escapeXmlAttr(s: string): string {
  return s.replace(/&/g, "&amp;").replace(/"/g, "&quot;").replace(/</g, "&lt;").replace(/>/g, "&gt;");
}

function escapeXmlText(s: string): string {
  return s.replace(/&/g, "&amp;").replace(/</g, "&lt;").replace(/>/g, "&gt;");
}
