export function isBlank(text: string): boolean {
  return text.trim() === '';
}

export function preserveWhitespace(original: string, translated: string): string {
  const pre = original.match(/^\s+/)?.[0] ?? '';
  const suf = original.match(/\s+$/)?.[0] ?? '';
  return `${pre}${translated.trim()}${suf}`;
}

/** Digits, punctuation and symbols only; nothing a translator would change. */
export function isNonTranslatable(text: string): boolean {
  if (!text) return true;
  if (/^\s+$/.test(text)) return true;
  if (/^[\s\d.,%+\-–—()[\]{}<>:;!?/\\|@#^&*=~`'"€$£¥•·…]+$/.test(text)) return true;
  return false;
}

// Characters spreadsheet cells reject: C0 controls other than tab, newline and carriage return.
const ILLEGAL_CELL_CHARS = /[\u0000-\u0008\u000B\u000C\u000E-\u001F]/g;

export function sanitizeCellText(text: string): string {
  return text.replace(ILLEGAL_CELL_CHARS, '');
}
