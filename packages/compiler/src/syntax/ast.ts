import type { DocumentUri, TextSpan } from "../model/primitives.js";

export const IDENTIFIER_RE = /^[A-Za-z_][A-Za-z0-9_-]*$/;
export const DIRECTIVE_KEYWORDS = ["let", "include"] as const;
export type DirectiveKeyword = (typeof DIRECTIVE_KEYWORDS)[number];

export function isIdentifier(name: string): boolean {
  return IDENTIFIER_RE.test(name);
}

export function isDirectiveKeyword(name: string): name is DirectiveKeyword {
  return DIRECTIVE_KEYWORDS.some((keyword) => keyword === name);
}

export interface HeadingNode {
  readonly kind: "heading";
  readonly level: number;
  readonly title: string;
  /** Whole heading line, without the line break. */
  readonly span: TextSpan;
  readonly titleSpan: TextSpan;
  /** Name of a `<label>` written on the heading line. */
  readonly label: string | null;
}

export interface LabelNode {
  readonly kind: "label";
  readonly name: string;
  /** `<name>` including the angle brackets. */
  readonly span: TextSpan;
  readonly nameSpan: TextSpan;
}

export interface ReferenceNode {
  readonly kind: "reference";
  readonly name: string;
  /** `@name` including the sigil. */
  readonly span: TextSpan;
  readonly nameSpan: TextSpan;
}

export interface BindingNode {
  readonly kind: "binding";
  readonly name: string;
  readonly value: string;
  readonly span: TextSpan;
  readonly nameSpan: TextSpan;
  readonly valueSpan: TextSpan;
}

export interface UseNode {
  readonly kind: "use";
  readonly name: string;
  /** `#name` including the sigil. */
  readonly span: TextSpan;
  readonly nameSpan: TextSpan;
}

export interface IncludeNode {
  readonly kind: "include";
  readonly specifier: string;
  readonly target: DocumentUri;
  readonly span: TextSpan;
  /** The quoted path, quotes excluded. */
  readonly pathSpan: TextSpan;
}

export type ModuleItem = HeadingNode | LabelNode | ReferenceNode | BindingNode | UseNode | IncludeNode;
export type ModuleItemKind = ModuleItem["kind"];
export type ModuleItemOf<K extends ModuleItemKind> = Extract<ModuleItem, { kind: K }>;

export type SyntaxErrorCode =
  | "unclosed-delimiter"
  | "unterminated-string"
  | "expected-path"
  | "empty-path"
  | "expected-name"
  | "expected-equals"
  | "misplaced-directive"
  | "empty-heading";

export interface SyntaxError {
  readonly code: SyntaxErrorCode;
  readonly message: string;
  readonly span: TextSpan;
}

export interface ParsedModule {
  readonly uri: DocumentUri;
  /** Items in document order. */
  readonly items: readonly ModuleItem[];
  readonly errors: readonly SyntaxError[];
}

export function itemsOfKind<K extends ModuleItemKind>(module: ParsedModule, kind: K): ModuleItemOf<K>[] {
  return module.items.filter((item): item is ModuleItemOf<K> => item.kind === kind);
}
