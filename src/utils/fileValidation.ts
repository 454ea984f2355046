import { stat } from "node:fs/promises";
import { DocumentIOError } from "./errors.ts";

export const MAX_FILE_SIZE = 50 * 1024 * 1024; // 50MB in bytes

export async function validatePptxFile(path: string): Promise<number> {
  if (!path) {
    throw new DocumentIOError("No file given");
  }

  if (!path.toLowerCase().endsWith('.pptx')) {
    throw new DocumentIOError(`Only .pptx files are allowed: ${path}`, path);
  }

  const info = await stat(path).catch(() => null);
  if (!info || !info.isFile()) {
    throw new DocumentIOError(`File not found: ${path}`, path);
  }

  if (info.size > MAX_FILE_SIZE) {
    throw new DocumentIOError(
      `File size must be less than 50MB. Current size: ${(info.size / (1024 * 1024)).toFixed(2)}MB`,
      path
    );
  }

  return info.size;
}
