import JSZip from "jszip";
import { parseXml, type XmlNode } from "./xml-tree";
import { debug } from "@/lib/utils/debug";

/**
 * Opened OOXML package (.docx / .pptx are zip archives of XML parts).
 */
export interface OfficePackage {
  zip: JSZip;
  partNames: string[];
}

/**
 * Load a zip archive from an uploaded byte buffer.
 * @throws Error if the buffer is not a zip archive.
 */
export async function openPackage(buffer: Uint8Array): Promise<OfficePackage> {
  const zip = await new JSZip().loadAsync(buffer);
  const partNames = Object.keys(zip.files).filter(name => !zip.files[name].dir);
  debug.parse.log("Package opened", { parts: partNames.length });
  return { zip, partNames };
}

/**
 * Read a part as text, or undefined when the package has no such part.
 */
export async function readPartText(pkg: OfficePackage, partName: string): Promise<string | undefined> {
  const entry = pkg.zip.file(partName);
  if (!entry) {
    return undefined;
  }
  return entry.async("text");
}

/**
 * Read and parse an XML part.
 * @throws Error if the part is missing or is not well-formed XML.
 */
export async function readXmlPart(pkg: OfficePackage, partName: string): Promise<XmlNode> {
  const xml = await readPartText(pkg, partName);
  if (xml === undefined) {
    throw new Error(`Part ${partName} not found in package`);
  }
  const root = await parseXml(xml);
  debug.parse.log("XML part parsed", { part: partName, root: root.name, length: xml.length });
  return root;
}

/**
 * Resolve a relationship target against the folder of its source part.
 * "slides/slide1.xml" from "ppt/presentation.xml" → "ppt/slides/slide1.xml".
 */
export function resolvePartTarget(sourcePart: string, target: string): string {
  if (target.startsWith("/")) {
    return target.slice(1);
  }
  const segments = sourcePart.split("/").slice(0, -1);
  for (const piece of target.split("/")) {
    if (piece === "..") segments.pop();
    else if (piece !== "." && piece !== "") segments.push(piece);
  }
  return segments.join("/");
}

/**
 * Relationships part for a source part: "ppt/presentation.xml" → "ppt/_rels/presentation.xml.rels".
 */
export function relationshipsPartFor(sourcePart: string): string {
  const segments = sourcePart.split("/");
  const fileName = segments.pop() ?? "";
  return [...segments, "_rels", `${fileName}.rels`].join("/");
}
