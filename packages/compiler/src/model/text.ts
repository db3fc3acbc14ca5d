import type { TextPosition, TextRange, TextSpan } from "./primitives.js";

// Canonical text/offset helpers to avoid ad-hoc span math across layers.
// Line starts are computed once per text; lookups are binary searches.
export class LineIndex {
  readonly #text: string;
  readonly #starts: readonly number[];

  constructor(text: string) {
    this.#text = text;
    this.#starts = computeLineStarts(text);
  }

  get lineCount(): number {
    return this.#starts.length;
  }

  positionAt(offset: number): TextPosition {
    const clamped = Math.max(0, Math.min(offset, this.#text.length));
    let low = 0;
    let high = this.#starts.length - 1;
    while (low < high) {
      const mid = (low + high + 1) >> 1;
      if ((this.#starts[mid] ?? 0) <= clamped) low = mid;
      else high = mid - 1;
    }
    return { line: low, character: clamped - (this.#starts[low] ?? 0) };
  }

  /** Offset for a position; characters past the end of a line clamp to the line end. */
  offsetAt(position: TextPosition): number {
    if (position.line < 0) return 0;
    if (position.line >= this.#starts.length) return this.#text.length;
    const lineStart = this.#starts[position.line] ?? 0;
    const lineEnd = this.#lineContentEnd(position.line);
    return Math.min(lineEnd, lineStart + Math.max(0, position.character));
  }

  spanToRange(s: TextSpan): TextRange {
    return { start: this.positionAt(s.start), end: this.positionAt(s.end) };
  }

  rangeToSpan(range: TextRange): TextSpan {
    const start = this.offsetAt(range.start);
    const end = this.offsetAt(range.end);
    return start <= end ? { start, end } : { start: end, end: start };
  }

  #lineContentEnd(line: number): number {
    const next = this.#starts[line + 1];
    if (next === undefined) return this.#text.length;
    let end = next - 1;
    if (end > 0 && this.#text.charCodeAt(end) === 10 /* LF */ && this.#text.charCodeAt(end - 1) === 13 /* CR */) {
      end -= 1;
    }
    return end;
  }
}

export function computeLineStarts(text: string): number[] {
  const starts = [0];
  for (let i = 0; i < text.length; i += 1) {
    const ch = text.charCodeAt(i);
    if (ch === 13 /* CR */ || ch === 10 /* LF */) {
      if (ch === 13 /* CR */ && text.charCodeAt(i + 1) === 10 /* LF */) i += 1;
      starts.push(i + 1);
    }
  }
  return starts;
}

export function spanToRange(s: TextSpan, text: string): TextRange {
  return new LineIndex(text).spanToRange(s);
}

export function offsetAtPosition(text: string, position: TextPosition): number {
  return new LineIndex(text).offsetAt(position);
}
