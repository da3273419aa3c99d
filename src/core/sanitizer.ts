export const PDF_EXTENSION = ".pdf";
export const FALLBACK_NAME = "Untitled";
export const DEFAULT_MAX_FILENAME_LENGTH = 255;

// Windows-illegal characters plus C0 controls and DEL
const ILLEGAL_CHARS = /[\\/:*?"<>|\u0000-\u001f\u007f]/g;
const EDGE_JUNK = /^[\s.]+|[\s.]+$/g;
const TRAILING_JUNK = /[\s.]+$/;

/** Cut a string to at most `budget` UTF-8 bytes without splitting a code point */
function truncateToBytes(value: string, budget: number): string {
  if (Buffer.byteLength(value, "utf-8") <= budget) return value;

  let out = "";
  let used = 0;
  for (const ch of value) {
    const size = Buffer.byteLength(ch, "utf-8");
    if (used + size > budget) break;
    out += ch;
    used += size;
  }
  return out;
}

/**
 * Make a title safe to use as a file's base name.
 *
 * Illegal characters are removed (not replaced), leading/trailing dots and
 * whitespace are stripped, and the result is cut so that base + ".pdf" stays
 * within `maxLength` bytes. Returns "Untitled" if nothing is left.
 * Idempotent: sanitizeTitle(sanitizeTitle(x)) === sanitizeTitle(x).
 */
export function sanitizeTitle(raw: string, maxLength = DEFAULT_MAX_FILENAME_LENGTH): string {
  const cleaned = raw.trim().replace(ILLEGAL_CHARS, "").replace(EDGE_JUNK, "");
  const budget = maxLength - Buffer.byteLength(PDF_EXTENSION, "utf-8");
  const cut = truncateToBytes(cleaned, budget).replace(TRAILING_JUNK, "");
  return cut || FALLBACK_NAME;
}

/** Sanitized base name plus the ".pdf" extension */
export function toCandidateName(raw: string, maxLength = DEFAULT_MAX_FILENAME_LENGTH): string {
  return sanitizeTitle(raw, maxLength) + PDF_EXTENSION;
}
