import type { DocumentUri, TextSpan } from "../model/primitives.js";
import { resolveIncludeTarget } from "../program/paths.js";
import {
  isDirectiveKeyword,
  type HeadingNode,
  type ModuleItem,
  type ParsedModule,
  type SyntaxError,
  type SyntaxErrorCode,
} from "./ast.js";

const LINE_BREAK_RE = /\r\n|\r|\n/g;
const IDENT_START_RE = /[A-Za-z_]/;
const IDENT_PART_RE = /[A-Za-z0-9_-]/;
const WORD_CHAR_RE = /[A-Za-z0-9]/;
const LABEL_TOKEN_RE = /<[A-Za-z_][A-Za-z0-9_-]*>/g;

type DelimiterChar = "*" | "_";

interface OpenDelimiter {
  readonly char: DelimiterChar;
  readonly offset: number;
}

const DELIMITER_NAMES: Record<DelimiterChar, string> = {
  "*": "strong",
  "_": "emphasis",
};

/**
 * Parse one Quill document into a flat list of items.
 *
 * The grammar is line oriented: every line is a heading, a directive
 * (`#let`, `#include`), a comment, a blank separator, or paragraph text that
 * is scanned for inline markup. Parsing never throws; malformed input yields
 * `errors` next to whatever items could still be recovered.
 */
export function parseModule(uri: DocumentUri, text: string): ParsedModule {
  return new ModuleParser(uri, text).parse();
}

class ModuleParser {
  readonly #uri: DocumentUri;
  readonly #text: string;
  readonly #items: ModuleItem[] = [];
  readonly #errors: SyntaxError[] = [];
  #paragraph: OpenDelimiter[] = [];

  constructor(uri: DocumentUri, text: string) {
    this.#uri = uri;
    this.#text = text;
  }

  parse(): ParsedModule {
    let lineStart = 0;
    for (;;) {
      LINE_BREAK_RE.lastIndex = lineStart;
      const match = LINE_BREAK_RE.exec(this.#text);
      const lineEnd = match ? match.index : this.#text.length;
      this.#visitLine(lineStart, lineEnd);
      if (!match) break;
      lineStart = match.index + match[0].length;
    }
    this.#closeParagraph();
    this.#errors.sort((a, b) => a.span.start - b.span.start || a.span.end - b.span.end);
    return { uri: this.#uri, items: this.#items, errors: this.#errors };
  }

  #visitLine(lineStart: number, lineEnd: number): void {
    const line = this.#text.slice(lineStart, lineEnd);
    const trimmed = line.trim();
    if (trimmed === "") {
      this.#closeParagraph();
      return;
    }
    // Comment lines neither start nor end a paragraph.
    if (trimmed.startsWith("//")) return;

    const start = lineStart + (line.length - line.trimStart().length);
    if (this.#text[start] === "=") {
      this.#closeParagraph();
      this.#parseHeading(start, lineEnd);
    } else if (this.#startsDirective(start, "#let")) {
      this.#closeParagraph();
      this.#parseBinding(start, lineEnd);
    } else if (this.#startsDirective(start, "#include")) {
      this.#closeParagraph();
      this.#parseInclude(start, lineEnd);
    } else {
      this.#scanInline(start, lineEnd, this.#paragraph, this.#items);
    }
  }

  #startsDirective(offset: number, keyword: string): boolean {
    if (!this.#text.startsWith(keyword, offset)) return false;
    const next = this.#text[offset + keyword.length];
    return next === undefined || !IDENT_PART_RE.test(next);
  }

  #parseHeading(start: number, lineEnd: number): void {
    let cursor = start;
    while (this.#text[cursor] === "=") cursor += 1;
    const level = cursor - start;
    cursor = this.#skipSpaces(cursor, lineEnd);

    const contentEnd = this.#trimEnd(cursor, this.#commentStart(cursor, lineEnd));
    const inline: ModuleItem[] = [];
    const open: OpenDelimiter[] = [];
    this.#scanInline(cursor, contentEnd, open, inline);
    this.#reportUnclosed(open);

    const firstLabel = inline.find((item) => item.kind === "label");
    const title = this.#text
      .slice(cursor, contentEnd)
      .replace(LABEL_TOKEN_RE, " ")
      .replace(/\s+/g, " ")
      .trim();
    const lineSpan = { start, end: this.#trimEnd(start, lineEnd) };
    if (title === "") {
      this.#error("empty-heading", "heading has no title", lineSpan);
    }

    const heading: HeadingNode = {
      kind: "heading",
      level,
      title,
      span: lineSpan,
      titleSpan: { start: cursor, end: contentEnd },
      label: firstLabel && firstLabel.kind === "label" ? firstLabel.name : null,
    };
    this.#items.push(heading, ...inline);
  }

  #parseBinding(start: number, lineEnd: number): void {
    const keywordSpan = { start, end: start + "#let".length };
    let cursor = this.#skipSpaces(keywordSpan.end, lineEnd);
    const name = this.#readIdentifier(cursor, lineEnd);
    if (name === null) {
      this.#error("expected-name", "expected a binding name after `#let`", keywordSpan);
      return;
    }
    const nameSpan = { start: cursor, end: cursor + name.length };
    cursor = this.#skipSpaces(nameSpan.end, lineEnd);
    if (this.#text[cursor] !== "=") {
      this.#error("expected-equals", `expected \`=\` after \`${name}\``, nameSpan);
      return;
    }
    const valueStart = this.#skipSpaces(cursor + 1, lineEnd);
    const valueEnd = Math.max(valueStart, this.#trimEnd(valueStart, this.#commentStart(valueStart, lineEnd)));

    this.#items.push({
      kind: "binding",
      name,
      value: this.#text.slice(valueStart, valueEnd),
      span: { start, end: Math.max(nameSpan.end, valueEnd) },
      nameSpan,
      valueSpan: { start: valueStart, end: valueEnd },
    });

    const open: OpenDelimiter[] = [];
    this.#scanInline(valueStart, valueEnd, open, this.#items);
    this.#reportUnclosed(open);
  }

  #parseInclude(start: number, lineEnd: number): void {
    const keywordSpan = { start, end: start + "#include".length };
    const quote = this.#skipSpaces(keywordSpan.end, lineEnd);
    if (this.#text[quote] !== '"') {
      this.#error("expected-path", "expected a quoted path after `#include`", keywordSpan);
      return;
    }
    const close = this.#text.indexOf('"', quote + 1);
    if (close < 0 || close >= lineEnd) {
      this.#error("unterminated-string", "unterminated include path", { start: quote, end: lineEnd });
      return;
    }
    const specifier = this.#text.slice(quote + 1, close);
    if (specifier.trim() === "") {
      this.#error("empty-path", "include path is empty", { start: quote, end: close + 1 });
      return;
    }
    this.#items.push({
      kind: "include",
      specifier,
      target: resolveIncludeTarget(this.#uri, specifier),
      span: { start, end: close + 1 },
      pathSpan: { start: quote + 1, end: close },
    });
  }

  /** Inline markup: labels, references, uses and emphasis delimiters. */
  #scanInline(start: number, end: number, open: OpenDelimiter[], out: ModuleItem[]): void {
    const text = this.#text;
    let i = start;
    while (i < end) {
      const ch = text[i];
      if (ch === "\\") {
        i += 2;
        continue;
      }
      if (ch === "/" && text[i + 1] === "/") return;

      if (ch === "<") {
        const name = this.#readIdentifier(i + 1, end);
        if (name !== null && text[i + 1 + name.length] === ">") {
          const nameSpan = { start: i + 1, end: i + 1 + name.length };
          out.push({ kind: "label", name, span: { start: i, end: nameSpan.end + 1 }, nameSpan });
          i = nameSpan.end + 1;
          continue;
        }
      } else if (ch === "@" || ch === "#") {
        const name = this.#readIdentifier(i + 1, end);
        if (name !== null) {
          const nameSpan = { start: i + 1, end: i + 1 + name.length };
          const itemSpan = { start: i, end: nameSpan.end };
          if (ch === "@") {
            out.push({ kind: "reference", name, span: itemSpan, nameSpan });
          } else if (isDirectiveKeyword(name)) {
            this.#error("misplaced-directive", `\`#${name}\` must start its own line`, itemSpan);
          } else {
            out.push({ kind: "use", name, span: itemSpan, nameSpan });
          }
          i = nameSpan.end;
          continue;
        }
      } else if (ch === "*" || (ch === "_" && this.#isUnderscoreDelimiter(i))) {
        toggleDelimiter(open, ch, i);
      }
      i += 1;
    }
  }

  #isUnderscoreDelimiter(offset: number): boolean {
    const before = this.#text[offset - 1];
    const after = this.#text[offset + 1];
    const wordBefore = before !== undefined && WORD_CHAR_RE.test(before);
    const wordAfter = after !== undefined && WORD_CHAR_RE.test(after);
    return !(wordBefore && wordAfter);
  }

  #closeParagraph(): void {
    this.#reportUnclosed(this.#paragraph);
    this.#paragraph = [];
  }

  #reportUnclosed(open: readonly OpenDelimiter[]): void {
    for (const delimiter of open) {
      this.#error(
        "unclosed-delimiter",
        `unclosed ${DELIMITER_NAMES[delimiter.char]} delimiter \`${delimiter.char}\``,
        { start: delimiter.offset, end: delimiter.offset + 1 },
      );
    }
  }

  #readIdentifier(offset: number, end: number): string | null {
    const first = this.#text[offset];
    if (offset >= end || first === undefined || !IDENT_START_RE.test(first)) return null;
    let cursor = offset + 1;
    while (cursor < end) {
      const ch = this.#text[cursor];
      if (ch === undefined || !IDENT_PART_RE.test(ch)) break;
      cursor += 1;
    }
    return this.#text.slice(offset, cursor);
  }

  #skipSpaces(offset: number, end: number): number {
    let cursor = offset;
    while (cursor < end && (this.#text[cursor] === " " || this.#text[cursor] === "\t")) cursor += 1;
    return cursor;
  }

  #trimEnd(start: number, end: number): number {
    let cursor = end;
    while (cursor > start && /\s/.test(this.#text[cursor - 1] ?? "")) cursor -= 1;
    return cursor;
  }

  /** Offset of a `//` comment on the current line, or `end` when there is none. */
  #commentStart(start: number, end: number): number {
    let i = start;
    while (i < end - 1) {
      if (this.#text[i] === "\\") {
        i += 2;
        continue;
      }
      if (this.#text[i] === "/" && this.#text[i + 1] === "/") return i;
      i += 1;
    }
    return end;
  }

  #error(code: SyntaxErrorCode, message: string, at: TextSpan): void {
    this.#errors.push({ code, message, span: at });
  }
}

function toggleDelimiter(open: OpenDelimiter[], char: DelimiterChar, offset: number): void {
  for (let i = open.length - 1; i >= 0; i -= 1) {
    if (open[i]?.char === char) {
      open.splice(i, 1);
      return;
    }
  }
  open.push({ char, offset });
}
