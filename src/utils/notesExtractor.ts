import type { SpeakerNotes } from "../types.ts";
import type { PptxDocument, SlideHandle } from "./pptxDocument.ts";
import { REL_TYPES } from "./pptxDocument.ts";
import { placeholderOf, textBodyOf, topLevelShapes } from "./shapeExtractor.ts";
import { readParagraphs } from "./textBody.ts";
import { NS, childPath } from "./xmlParser.ts";

const NOTES_CONTENT_TYPE = 'application/vnd.openxmlformats-officedocument.presentationml.notesSlide+xml';

const NOTES_TEMPLATE = `<?xml version="1.0" encoding="UTF-8" standalone="yes"?>
<p:notes xmlns:a="${NS.a}" xmlns:r="${NS.r}" xmlns:p="${NS.p}"><p:cSld><p:spTree><p:nvGrpSpPr><p:cNvPr id="1" name=""/><p:cNvGrpSpPr/><p:nvPr/></p:nvGrpSpPr><p:grpSpPr/><p:sp><p:nvSpPr><p:cNvPr id="2" name="Slide Image Placeholder 1"/><p:cNvSpPr><a:spLocks noGrp="1" noRot="1" noChangeAspect="1"/></p:cNvSpPr><p:nvPr><p:ph type="sldImg"/></p:nvPr></p:nvSpPr><p:spPr/></p:sp><p:sp><p:nvSpPr><p:cNvPr id="3" name="Notes Placeholder 2"/><p:cNvSpPr><a:spLocks noGrp="1"/></p:cNvSpPr><p:nvPr><p:ph type="body" idx="1"/></p:nvPr></p:nvSpPr><p:spPr/><p:txBody><a:bodyPr/><a:lstStyle/><a:p><a:endParaRPr lang="en-US"/></a:p></p:txBody></p:sp></p:spTree></p:cSld><p:clrMapOvr><a:masterClrMapping/></p:clrMapOvr></p:notes>`;

export function notesPartFor(document: PptxDocument, slide: SlideHandle): string | null {
  const [rel] = document.relationshipsOfType(slide.partName, REL_TYPES.notesSlide);
  return rel && document.getPart(rel.target) ? rel.target : null;
}

export function notesBody(doc: Document): Element | null {
  const spTree = childPath(doc, [[NS.p, 'notes'], [NS.p, 'cSld'], [NS.p, 'spTree']]);
  if (!spTree) return null;
  const body = topLevelShapes(spTree).find((shape) => placeholderOf(shape)?.type === 'body');
  return body ? textBodyOf(body) : null;
}

export function extractNotes(document: PptxDocument, slide: SlideHandle): SpeakerNotes | null {
  const partName = notesPartFor(document, slide);
  const doc = partName ? document.getPart(partName) : null;
  const body = doc ? notesBody(doc) : null;
  if (!body) return null;

  const paragraphs = readParagraphs(body);
  return { paragraphs, text: paragraphs.map((p) => p.text).join('\n') };
}

/**
 * Returns the notes text body of a slide, creating the notes slide when the
 * slide has none. Creation needs a notes master to link to.
 */
export function ensureNotesBody(document: PptxDocument, slide: SlideHandle): { partName: string; body: Element } {
  const existing = notesPartFor(document, slide);
  if (existing) {
    const doc = document.getPart(existing);
    const body = doc ? notesBody(doc) : null;
    if (!body) throw new Error(`${existing} has no notes placeholder`);
    return { partName: existing, body };
  }

  const [master] = document.partNames(/^ppt\/notesMasters\/notesMaster[0-9]+\.xml$/);
  if (!master) {
    throw new Error(`Cannot create notes for slide ${slide.slideNumber}: presentation has no notes master`);
  }

  let n = 1;
  while (document.hasPart(`ppt/notesSlides/notesSlide${n}.xml`)) n++;
  const partName = `ppt/notesSlides/notesSlide${n}.xml`;

  const doc = document.addPart(partName, NOTES_TEMPLATE, NOTES_CONTENT_TYPE);
  document.addRelationship(partName, REL_TYPES.notesMaster, master);
  document.addRelationship(partName, REL_TYPES.slide, slide.partName);
  document.addRelationship(slide.partName, REL_TYPES.notesSlide, partName);

  const body = notesBody(doc);
  if (!body) throw new Error(`Created ${partName} without a notes placeholder`);
  return { partName, body };
}
