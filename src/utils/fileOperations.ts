import { mkdir, readFile, writeFile } from "node:fs/promises";
import { basename, dirname, extname, join } from "node:path";
import type { Presentation } from "../types.ts";
import { DocumentIOError, errorMessage } from "./errors.ts";
import { describeIssue, presentationSchema } from "./presentationSchema.ts";

/** Full structural check of the hand-off JSON against the presentation schema. */
export function isPresentation(value: unknown): value is Presentation {
  return presentationSchema.safeParse(value).success;
}

export function safeParseJSON(text: string): unknown {
  try {
    return JSON.parse(text);
  } catch {
    return null;
  }
}

export async function readPresentationJson(path: string): Promise<Presentation> {
  const content = await readFile(path, 'utf-8').catch((error: unknown) => {
    throw new DocumentIOError(`Failed to read ${path}: ${errorMessage(error)}`, path);
  });
  const result = presentationSchema.safeParse(safeParseJSON(content));
  if (!result.success) {
    throw new DocumentIOError(`${path} is not a presentation JSON document (${describeIssue(result.error)})`, path);
  }
  return result.data;
}

export async function writeOutputFile(path: string, data: string | Uint8Array): Promise<void> {
  try {
    await mkdir(dirname(path), { recursive: true });
    await writeFile(path, data);
  } catch (error) {
    throw new DocumentIOError(`Failed to write ${path}: ${errorMessage(error)}`, path);
  }
}

export async function writePresentationJson(path: string, presentation: Presentation): Promise<void> {
  await writeOutputFile(path, `${JSON.stringify(presentation, null, 2)}\n`);
}

export async function readPptxFile(path: string): Promise<Buffer> {
  try {
    return await readFile(path);
  } catch (error) {
    throw new DocumentIOError(`Failed to read ${path}: ${errorMessage(error)}`, path);
  }
}

/** `deck.pptx` + `_translated`, `.json` → `deck_translated.json` beside the input. */
export function derivedPath(inputPath: string, suffix: string, extension: string): string {
  const base = basename(inputPath, extname(inputPath));
  return join(dirname(inputPath), `${base}${suffix}${extension}`);
}
