import {
  compareDiagnostics,
  type DiagnosticRelated,
  type DiagnosticSeverity,
  type DiagnosticTag,
  type QuillDiagnostic,
  type QuillDiagnosticCode,
} from "../model/diagnostics.js";
import type { DocumentUri, TextRange, TextSpan } from "../model/primitives.js";
import { LineIndex } from "../model/text.js";
import { relativeDocumentPath } from "../program/paths.js";
import { debug } from "../shared/debug.js";
import type { IncludeNode, ModuleItem } from "../syntax/ast.js";
import type {
  BindingDefinition,
  CompiledArtifact,
  CompileResult,
  IncludeEdge,
  LabelDefinition,
  OutlineEntry,
  ResolvedReference,
  ResolvedUse,
} from "./artifact.js";
import type { CompileWorld } from "./world.js";

export class MissingEntryError extends Error {
  constructor(readonly uri: DocumentUri) {
    super(`entry document is not part of the world: ${uri}`);
    this.name = "MissingEntryError";
  }
}

interface PlacedItem {
  readonly uri: DocumentUri;
  readonly item: ModuleItem;
}

interface MutableBinding {
  readonly name: string;
  readonly value: string;
  readonly uri: DocumentUri;
  readonly span: TextSpan;
  readonly nameSpan: TextSpan;
  readonly valueSpan: TextSpan;
  /** Definition this one shadows, consulted for uses inside its own value. */
  readonly shadows: MutableBinding | undefined;
  used: boolean;
}

interface DiagnosticOptions {
  readonly tags?: readonly DiagnosticTag[];
  readonly related?: readonly DiagnosticRelated[];
}

/**
 * Compile a world rooted at `world.entry`.
 *
 * Includes expand depth first in document order; each file is expanded once.
 * Labels are global to the closure, bindings resolve to the latest definition
 * that precedes the use in expansion order. Pure for a fixed world.
 */
export function compile(world: CompileWorld): CompileResult {
  return new Compilation(world).run();
}

class Compilation {
  readonly #world: CompileWorld;
  readonly #diagnostics = new Map<DocumentUri, QuillDiagnostic[]>();
  readonly #lineIndexes = new Map<DocumentUri, LineIndex>();
  readonly #files: DocumentUri[] = [];
  readonly #placed: PlacedItem[] = [];
  readonly #includes: IncludeEdge[] = [];

  constructor(world: CompileWorld) {
    this.#world = world;
  }

  run(): CompileResult {
    const entry = this.#world.entry;
    if (!this.#world.source(entry)) throw new MissingEntryError(entry);

    this.#expand(entry, [entry]);
    const outline = this.#collectOutline();
    const labels = this.#collectLabels();
    const references = this.#resolveReferences(labels);
    const { bindings, uses } = this.#resolveBindings();

    for (const list of this.#diagnostics.values()) list.sort(compareDiagnostics);

    const artifact: CompiledArtifact = {
      entry,
      files: this.#files,
      outline,
      labels,
      bindings,
      references,
      uses,
      includes: this.#includes,
      inputs: this.#world.inputs,
      fontRevision: this.#world.fontRevision,
    };
    debug.compile("done", {
      entry,
      files: this.#files.length,
      diagnostics: [...this.#diagnostics.values()].reduce((sum, list) => sum + list.length, 0),
    });
    return { artifact, diagnostics: this.#diagnostics };
  }

  #expand(uri: DocumentUri, stack: readonly DocumentUri[]): void {
    const source = this.#world.source(uri);
    if (!source) return;
    this.#files.push(uri);
    this.#diagnostics.set(uri, []);

    for (const error of source.module.errors) {
      this.#report(uri, error.span, error.code, error.message, "error");
    }

    for (const item of source.module.items) {
      if (item.kind !== "include") {
        this.#placed.push({ uri, item });
        continue;
      }
      this.#expandInclude(uri, item, stack);
    }
  }

  #expandInclude(uri: DocumentUri, node: IncludeNode, stack: readonly DocumentUri[]): void {
    const target = node.target;
    const edge = (status: IncludeEdge["status"]): IncludeEdge => ({
      from: uri,
      to: target,
      specifier: node.specifier,
      span: node.span,
      status,
    });

    if (stack.includes(target)) {
      const cycle = [...stack.slice(stack.indexOf(target)), target].map((file) => relativeDocumentPath(uri, file));
      this.#includes.push(edge("cycle"));
      this.#report(uri, node.span, "include-cycle", `include cycle: ${cycle.join(" -> ")}`, "error");
      return;
    }
    if (!this.#world.source(target)) {
      this.#includes.push(edge("missing"));
      this.#report(uri, node.pathSpan, "file-not-found", `file not found: ${node.specifier}`, "error");
      return;
    }
    this.#includes.push(edge("ok"));
    if (this.#diagnostics.has(target)) return;
    this.#expand(target, [...stack, target]);
  }

  #collectOutline(): OutlineEntry[] {
    const outline: OutlineEntry[] = [];
    for (const { uri, item } of this.#placed) {
      if (item.kind !== "heading") continue;
      outline.push({ uri, title: item.title, level: item.level, span: item.span, label: item.label });
    }
    return outline;
  }

  #collectLabels(): Map<string, LabelDefinition> {
    const labels = new Map<string, LabelDefinition>();
    let heading: { uri: DocumentUri; span: TextSpan; title: string } | null = null;

    for (const { uri, item } of this.#placed) {
      if (item.kind === "heading") {
        heading = { uri, span: item.span, title: item.title };
        continue;
      }
      if (item.kind !== "label") continue;

      const onHeading =
        heading !== null && heading.uri === uri && item.span.start >= heading.span.start && item.span.end <= heading.span.end;
      const existing = labels.get(item.name);
      if (existing) {
        this.#report(uri, item.span, "duplicate-label", `label \`${item.name}\` is defined more than once`, "error", {
          related: [
            { uri: existing.uri, range: this.#range(existing.uri, existing.span), message: "first defined here" },
          ],
        });
        continue;
      }
      labels.set(item.name, {
        name: item.name,
        uri,
        span: item.span,
        nameSpan: item.nameSpan,
        heading: onHeading && heading ? heading.title : null,
      });
    }
    return labels;
  }

  #resolveReferences(labels: ReadonlyMap<string, LabelDefinition>): ResolvedReference[] {
    const references: ResolvedReference[] = [];
    for (const { uri, item } of this.#placed) {
      if (item.kind !== "reference") continue;
      const label = labels.get(item.name);
      if (!label) {
        this.#report(uri, item.span, "unknown-label", `label \`${item.name}\` does not exist`, "error");
      }
      references.push({
        name: item.name,
        uri,
        span: item.span,
        target: label ? { uri: label.uri, span: label.nameSpan } : null,
      });
    }
    return references;
  }

  #resolveBindings(): { bindings: BindingDefinition[]; uses: ResolvedUse[] } {
    const scope = new Map<string, MutableBinding>();
    const defined: MutableBinding[] = [];
    const pending: { uri: DocumentUri; name: string; span: TextSpan; binding: MutableBinding | null }[] = [];

    for (const { uri, item } of this.#placed) {
      if (item.kind === "binding") {
        const binding: MutableBinding = {
          name: item.name,
          value: item.value,
          uri,
          span: item.span,
          nameSpan: item.nameSpan,
          valueSpan: item.valueSpan,
          shadows: scope.get(item.name),
          used: false,
        };
        scope.set(item.name, binding);
        defined.push(binding);
        continue;
      }
      if (item.kind !== "use") continue;

      let binding = scope.get(item.name);
      while (binding && binding.uri === uri && item.span.start >= binding.valueSpan.start && item.span.end <= binding.valueSpan.end) {
        binding = binding.shadows;
      }
      if (binding) binding.used = true;
      pending.push({ uri, name: item.name, span: item.span, binding: binding ?? null });
    }

    const frozen = new Map<MutableBinding, BindingDefinition>();
    const freeze = (binding: MutableBinding): BindingDefinition => {
      let result = frozen.get(binding);
      if (!result) {
        result = {
          name: binding.name,
          value: binding.value,
          uri: binding.uri,
          span: binding.span,
          nameSpan: binding.nameSpan,
          used: binding.used,
        };
        frozen.set(binding, result);
      }
      return result;
    };

    const uses: ResolvedUse[] = [];
    for (const use of pending) {
      const binding = use.binding;
      if (binding) {
        uses.push({ name: use.name, uri: use.uri, span: use.span, target: { kind: "binding", binding: freeze(binding) } });
        continue;
      }
      const input = Object.hasOwn(this.#world.inputs, use.name) ? this.#world.inputs[use.name] : undefined;
      if (input !== undefined) {
        uses.push({ name: use.name, uri: use.uri, span: use.span, target: { kind: "input", value: input } });
        continue;
      }
      this.#report(use.uri, use.span, "unknown-variable", `unknown variable \`${use.name}\``, "error");
      uses.push({ name: use.name, uri: use.uri, span: use.span, target: null });
    }

    for (const binding of defined) {
      if (binding.used) continue;
      this.#report(binding.uri, binding.nameSpan, "unused-binding", `\`${binding.name}\` is never used`, "hint", {
        tags: ["unnecessary"],
      });
    }

    return { bindings: defined.map(freeze), uses };
  }

  #report(
    uri: DocumentUri,
    at: TextSpan,
    code: QuillDiagnosticCode,
    message: string,
    severity: DiagnosticSeverity,
    options: DiagnosticOptions = {},
  ): void {
    let list = this.#diagnostics.get(uri);
    if (!list) {
      list = [];
      this.#diagnostics.set(uri, list);
    }
    list.push({
      code,
      message,
      severity,
      range: this.#range(uri, at),
      ...(options.tags ? { tags: options.tags } : {}),
      ...(options.related ? { related: options.related } : {}),
      source: "quill",
    });
  }

  #range(uri: DocumentUri, at: TextSpan): TextRange {
    let index = this.#lineIndexes.get(uri);
    if (!index) {
      index = new LineIndex(this.#world.source(uri)?.text ?? "");
      this.#lineIndexes.set(uri, index);
    }
    return index.spanToRange(at);
  }
}
