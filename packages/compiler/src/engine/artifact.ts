import type { DiagnosticMap } from "../model/diagnostics.js";
import type { DocumentSpan, DocumentUri, TextSpan } from "../model/primitives.js";

export interface OutlineEntry {
  readonly uri: DocumentUri;
  readonly title: string;
  readonly level: number;
  readonly span: TextSpan;
  readonly label: string | null;
}

export interface LabelDefinition {
  readonly name: string;
  readonly uri: DocumentUri;
  readonly span: TextSpan;
  readonly nameSpan: TextSpan;
  /** Title of the heading the label sits on, when it labels a heading. */
  readonly heading: string | null;
}

export interface BindingDefinition {
  readonly name: string;
  readonly value: string;
  readonly uri: DocumentUri;
  readonly span: TextSpan;
  readonly nameSpan: TextSpan;
  readonly used: boolean;
}

export interface ResolvedReference {
  readonly name: string;
  readonly uri: DocumentUri;
  readonly span: TextSpan;
  readonly target: DocumentSpan | null;
}

export type UseTarget =
  | { readonly kind: "binding"; readonly binding: BindingDefinition }
  | { readonly kind: "input"; readonly value: string };

export interface ResolvedUse {
  readonly name: string;
  readonly uri: DocumentUri;
  readonly span: TextSpan;
  readonly target: UseTarget | null;
}

export interface IncludeEdge {
  readonly from: DocumentUri;
  readonly to: DocumentUri;
  readonly specifier: string;
  readonly span: TextSpan;
  readonly status: "ok" | "missing" | "cycle";
}

export interface CompiledArtifact {
  readonly entry: DocumentUri;
  /** Closure documents in depth-first expansion order. */
  readonly files: readonly DocumentUri[];
  readonly outline: readonly OutlineEntry[];
  /** First definition of every label in the closure. */
  readonly labels: ReadonlyMap<string, LabelDefinition>;
  readonly bindings: readonly BindingDefinition[];
  readonly references: readonly ResolvedReference[];
  readonly uses: readonly ResolvedUse[];
  readonly includes: readonly IncludeEdge[];
  readonly inputs: Readonly<Record<string, string>>;
  readonly fontRevision: string;
}

export interface CompileResult {
  readonly artifact: CompiledArtifact;
  readonly diagnostics: DiagnosticMap;
}
