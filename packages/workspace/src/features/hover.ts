import {
  findItemAt,
  hitSpan,
  relativeDocumentPath,
  type CompiledArtifact,
  type DocumentUri,
  type ModuleItem,
  type TextPosition,
  type TextSpan,
} from "@quill-ls/compiler";
import { defineCacheKind } from "../cache.js";
import type { HoverInfo } from "../types.js";
import type { SnapshotAnalysis } from "./analysis.js";

export const HOVER = defineCacheKind<HoverInfo | null>("hover");

export async function hover(analysis: SnapshotAnalysis, position: TextPosition): Promise<HoverInfo | null> {
  const offset = analysis.offsetAt(analysis.entry.uri, position);
  return analysis.memo(HOVER, { offset }, (bound) => computeHover(bound, offset));
}

async function computeHover(analysis: SnapshotAnalysis, offset: number): Promise<HoverInfo | null> {
  const uri = analysis.entry.uri;
  const module = await analysis.parse(uri);
  if (!module) return null;
  const item = findItemAt(module, offset);
  if (!item) return null;

  const contents = await hoverContents(analysis, uri, item);
  if (contents === null) return null;
  return { contents, range: analysis.rangeOf(uri, hitSpan(item)) };
}

async function hoverContents(analysis: SnapshotAnalysis, uri: DocumentUri, item: ModuleItem): Promise<string | null> {
  switch (item.kind) {
    case "heading": {
      const label = item.label === null ? "" : `, label \`${item.label}\``;
      return `**${item.title}**\n\nHeading level ${item.level}${label}`;
    }
    case "binding":
      return codeBlock(`#let ${item.name} = ${item.value}`);
    case "include": {
      const found = analysis.document(item.target) !== undefined;
      return `Includes \`${relativeDocumentPath(uri, item.target)}\`${found ? "" : " (file not found)"}`;
    }
    case "label": {
      const artifact = await artifactOf(analysis);
      if (!artifact) return `Label \`${item.name}\``;
      const count = artifact.references.filter((ref) => ref.name === item.name).length;
      return `Label \`${item.name}\`, ${count} reference${count === 1 ? "" : "s"}`;
    }
    case "reference": {
      const artifact = await artifactOf(analysis);
      if (!artifact) return null;
      const label = artifact.labels.get(item.name);
      if (!label) return `Unknown label \`${item.name}\``;
      const where = label.uri === uri ? "" : ` in \`${relativeDocumentPath(uri, label.uri)}\``;
      const heading = label.heading === null ? "" : ` on **${label.heading}**`;
      return `Label \`${item.name}\`${heading}${where}`;
    }
    case "use": {
      const artifact = await artifactOf(analysis);
      if (!artifact) return null;
      const use = artifact.uses.find((candidate) => candidate.uri === uri && sameSpan(candidate.span, item.span));
      const target = use?.target ?? null;
      if (target === null) return `Unknown variable \`${item.name}\``;
      if (target.kind === "input") return `\`${item.name}\` = \`${target.value}\` (compile input)`;
      return codeBlock(`#let ${target.binding.name} = ${target.binding.value}`);
    }
  }
}

async function artifactOf(analysis: SnapshotAnalysis): Promise<CompiledArtifact | null> {
  const outcome = await analysis.compile();
  return outcome.ok ? outcome.result.artifact : null;
}

function sameSpan(a: TextSpan, b: TextSpan): boolean {
  return a.start === b.start && a.end === b.end;
}

function codeBlock(code: string): string {
  return "```quill\n" + code + "\n```";
}
