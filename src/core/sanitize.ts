/*
Purpose: normalize free text coming out of templates and metadata before it reaches the tracker.
Assumptions: input may carry smart quotes, literal escape sequences, stray control characters and
wrapping quotes left over from spreadsheet exports.
*/

const CONTROL_CHARS = /[\u0000-\u0008\u000b\u000c\u000e-\u001f\u007f]/g;

const SMART_REPLACEMENTS: Array<[string, string]> = [
  ["\u2018", "'"],
  ["\u2019", "'"],
  ["\u201c", '"'],
  ["\u201d", '"'],
  ["\u00a0", " "],
];

const ESCAPE_REPLACEMENTS: Array<[string, string]> = [
  ["\\r\\n", "\n"],
  ["\\n", "\n"],
  ["\\t", "\t"],
  ['\\"', '"'],
  ["\\'", "'"],
];

const WRAPPING_QUOTES = new Set(['"', "'", "`"]);

export type SanitizeOptions = {
  multiline?: boolean;
};

export function sanitizeText(value: unknown, options: SanitizeOptions = {}): string {
  if (value === null || value === undefined) return "";
  const multiline = options.multiline ?? true;

  let text = String(value);
  for (const [from, to] of SMART_REPLACEMENTS) text = text.split(from).join(to);
  for (const [from, to] of ESCAPE_REPLACEMENTS) text = text.split(from).join(to);
  text = text.replace(/\r\n/g, "\n").replace(/\r/g, "\n");
  text = text.replace(CONTROL_CHARS, "").trim();
  text = stripWrappingQuotes(text);

  if (multiline) {
    return text
      .split("\n")
      .map((line) => line.trimEnd())
      .join("\n")
      .replace(/\n{3,}/g, "\n\n")
      .trim();
  }

  return text.replace(/\s+/g, " ").trim();
}

/** Issue keys, project keys: single token, no trailing punctuation. */
export function sanitizeKey(value: unknown): string {
  return sanitizeText(value, { multiline: false })
    .replace(/[.,;:]+$/, "")
    .replace(/\s+/g, "");
}

export function ensureBullets(text: string): string {
  const lines = sanitizeText(text)
    .split("\n")
    .map((line) => line.trim())
    .filter((line) => line.length > 0);

  if (lines.length <= 1) return lines.join("\n");
  if (lines.every((line) => line.startsWith("* ") || line.startsWith("- "))) {
    return lines.join("\n");
  }
  return lines.map((line) => `* ${line}`).join("\n");
}

function stripWrappingQuotes(input: string): string {
  let text = input;
  while (text.length >= 2) {
    const first = text[0];
    const last = text[text.length - 1];
    if (first !== last || !WRAPPING_QUOTES.has(first)) break;
    text = text.slice(1, -1).trim();
  }
  return text;
}
