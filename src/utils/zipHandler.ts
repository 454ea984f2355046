import JSZip from "jszip";
import { parseXMLContent, serializeXML } from "./xmlParser.ts";
import type { Logger } from "./logger.ts";
import { silentLogger } from "./logger.ts";

export type PptxBytes = Uint8Array | ArrayBuffer;

export async function loadZip(data: PptxBytes): Promise<JSZip> {
  return JSZip.loadAsync(data);
}

function isXmlPart(name: string): boolean {
  return name.endsWith('.xml') || name.endsWith('.rels');
}

export async function readXmlParts(zipContent: JSZip, logger: Logger = silentLogger): Promise<Map<string, Document>> {
  const parts = new Map<string, Document>();
  const names = Object.keys(zipContent.files).filter((name) => !zipContent.files[name].dir && isXmlPart(name));
  logger.dim(`Parsing ${names.length} XML parts`);

  for (const name of names) {
    const content = await zipContent.files[name].async('string');
    parts.set(name, parseXMLContent(content, name));
  }
  return parts;
}

export function sortSlideFiles(names: string[]): string[] {
  return names
    .filter(name => /^ppt\/slides\/slide[0-9]+\.xml$/.test(name))
    .sort((a, b) => {
      const numA = parseInt(a.match(/slide([0-9]+)\.xml/)?.[1] || '0', 10);
      const numB = parseInt(b.match(/slide([0-9]+)\.xml/)?.[1] || '0', 10);
      return numA - numB;
    });
}

export async function writeZip(
  zipContent: JSZip,
  changed: Iterable<[string, Document]>
): Promise<Buffer> {
  for (const [name, doc] of changed) {
    zipContent.file(name, serializeXML(doc));
  }
  return zipContent.generateAsync({ type: 'nodebuffer', compression: 'DEFLATE' });
}
