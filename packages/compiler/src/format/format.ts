export interface FormatOptions {
  /** Paragraph lines longer than this are reflowed at word boundaries. */
  readonly printWidth: number;
}

export const DEFAULT_FORMAT_OPTIONS: FormatOptions = { printWidth: 80 };

const HEADING_RE = /^\s*(=+)\s*(.*)$/;
const LET_RE = /^\s*#let\s+([A-Za-z_][A-Za-z0-9_-]*)\s*=\s*(.*)$/;
const INCLUDE_RE = /^\s*#include\s+"([^"]*)"\s*(.*)$/;

type LineKind = "blank" | "heading" | "directive" | "comment" | "text";

/**
 * Canonical layout for a Quill document. The result is stable: formatting it
 * again returns the same text. Line break style follows the first line break of
 * the input.
 */
export function formatQuill(text: string, options: FormatOptions = DEFAULT_FORMAT_OPTIONS): string {
  const eol = text.includes("\r\n") ? "\r\n" : "\n";
  const out: string[] = [];
  let previous: LineKind = "blank";

  for (const raw of text.split(/\r\n|\r|\n/)) {
    const line = raw.trimEnd();
    const kind = classify(line);
    if (kind === "blank") {
      if (previous !== "blank") out.push("");
      previous = "blank";
      continue;
    }
    previous = kind;
    switch (kind) {
      case "heading":
        out.push(formatHeading(line));
        break;
      case "directive":
        out.push(formatDirective(line));
        break;
      case "text":
        out.push(...reflow(line, options.printWidth));
        break;
      case "comment":
        out.push(line);
        break;
    }
  }

  while (out.length > 0 && out[out.length - 1] === "") out.pop();
  return out.length === 0 ? "" : `${out.join(eol)}${eol}`;
}

function classify(line: string): LineKind {
  const trimmed = line.trimStart();
  if (trimmed === "") return "blank";
  if (trimmed.startsWith("//")) return "comment";
  if (trimmed.startsWith("=")) return "heading";
  if (LET_RE.test(line) || INCLUDE_RE.test(line)) return "directive";
  return "text";
}

function formatHeading(line: string): string {
  const match = HEADING_RE.exec(line);
  if (!match) return line;
  const [, markers = "=", title = ""] = match;
  return title === "" ? markers : `${markers} ${title}`;
}

function formatDirective(line: string): string {
  const binding = LET_RE.exec(line);
  if (binding) {
    const [, name = "", value = ""] = binding;
    return value === "" ? `#let ${name} =` : `#let ${name} = ${value}`;
  }
  const include = INCLUDE_RE.exec(line);
  if (include) {
    const [, path = "", rest = ""] = include;
    return rest === "" ? `#include "${path}"` : `#include "${path}" ${rest}`;
  }
  return line;
}

/** Words that would change meaning if they started a line of their own. */
function canStartLine(word: string): boolean {
  return !word.startsWith("=") && !word.startsWith("#let") && !word.startsWith("#include");
}

function reflow(line: string, width: number): string[] {
  if (line.length <= width || line.includes("//")) return [line];
  const indent = line.slice(0, line.length - line.trimStart().length);
  const words = line.trim().split(/\s+/);
  const lines: string[] = [];
  let current = "";
  for (const word of words) {
    if (current === "") {
      current = word;
      continue;
    }
    if (indent.length + current.length + 1 + word.length > width && canStartLine(word)) {
      lines.push(indent + current);
      current = word;
    } else {
      current = `${current} ${word}`;
    }
  }
  if (current !== "") lines.push(indent + current);
  return lines;
}
