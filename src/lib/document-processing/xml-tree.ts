import { parseStringPromise } from "xml2js";

/**
 * Ordered XML element tree.
 * xml2js keeps child order only in the `$$` array when both explicitChildren and
 * preserveChildrenOrder are set; this module narrows that output into plain nodes.
 */
export interface XmlNode {
  name: string;
  attributes: Record<string, string>;
  children: XmlNode[];
  /** Character data directly inside the element (whitespace-only text is dropped by xml2js) */
  text: string;
}

const PARSER_OPTIONS = {
  explicitChildren: true,
  preserveChildrenOrder: true,
  explicitRoot: true,
  charkey: "_",
  attrkey: "$",
  childkey: "$$",
  trim: false,
  normalize: false,
};

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function readAttributes(value: unknown): Record<string, string> {
  const attributes: Record<string, string> = {};
  if (!isRecord(value)) return attributes;
  for (const [key, attr] of Object.entries(value)) {
    if (typeof attr === "string") attributes[key] = attr;
  }
  return attributes;
}

function toNode(name: string, raw: unknown): XmlNode {
  if (typeof raw === "string") {
    return { name, attributes: {}, children: [], text: raw };
  }
  if (!isRecord(raw)) {
    return { name, attributes: {}, children: [], text: "" };
  }

  const children: XmlNode[] = [];
  const ordered = raw["$$"];
  if (Array.isArray(ordered)) {
    for (const child of ordered) {
      const childName = isRecord(child) && typeof child["#name"] === "string" ? child["#name"] : "";
      children.push(toNode(childName, child));
    }
  }

  return {
    name,
    attributes: readAttributes(raw["$"]),
    children,
    text: typeof raw["_"] === "string" ? raw["_"] : "",
  };
}

/**
 * Parse an XML part into its root element.
 * @throws Error when the XML is not well formed or has no root element.
 */
export async function parseXml(xml: string): Promise<XmlNode> {
  const parsed: unknown = await parseStringPromise(xml, PARSER_OPTIONS);
  if (!isRecord(parsed)) {
    throw new Error("XML part has no root element");
  }
  const [rootName] = Object.keys(parsed);
  if (!rootName) {
    throw new Error("XML part has no root element");
  }
  return toNode(rootName, parsed[rootName]);
}

/** Direct children with the given qualified name, in document order. */
export function childElements(node: XmlNode, name: string): XmlNode[] {
  return node.children.filter(child => child.name === name);
}

/** First direct child with the given qualified name. */
export function firstChild(node: XmlNode, name: string): XmlNode | undefined {
  return node.children.find(child => child.name === name);
}

/** Follow a path of direct children, e.g. ["w:body"] or ["p:cSld", "p:spTree"]. */
export function childPath(node: XmlNode, path: string[]): XmlNode | undefined {
  let current: XmlNode | undefined = node;
  for (const segment of path) {
    if (!current) return undefined;
    current = firstChild(current, segment);
  }
  return current;
}

/** All descendants with the given qualified name, depth-first in document order. */
export function descendants(node: XmlNode, name: string): XmlNode[] {
  const found: XmlNode[] = [];
  const visit = (current: XmlNode) => {
    for (const child of current.children) {
      if (child.name === name) found.push(child);
      visit(child);
    }
  };
  visit(node);
  return found;
}

export function attribute(node: XmlNode, name: string): string | undefined {
  return node.attributes[name];
}

/**
 * Text of a text-run element (`w:t`, `a:t`).
 * xml2js drops whitespace-only character data, so a run marked
 * xml:space="preserve" without text is read back as a single space.
 */
export function runText(node: XmlNode): string {
  if (node.text) return node.text;
  return attribute(node, "xml:space") === "preserve" ? " " : "";
}
