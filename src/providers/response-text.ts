const CITATION = /\[\d+\]/g;
const SOURCE_LINE = /^\s*Sources?:.*$/gim;
const SUPERSCRIPT = /[¹²³⁴⁵⁶⁷⁸⁹⁰]/g;

/**
 * Flattens provider output into a single chat-friendly line: drops numeric
 * citations, `Source:` lines and superscript footnote marks.
 */
export function cleanResponseText(raw: string): string {
  return String(raw || "")
    .replace(CITATION, "")
    .replace(SOURCE_LINE, "")
    .replace(SUPERSCRIPT, "")
    .replace(/\s+/g, " ")
    .trim();
}
