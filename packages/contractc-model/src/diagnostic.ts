// Compile-time diagnostics for contract declarations.

import type { Span } from "./declaration.ts";

/** Diagnostic kinds reported while compiling a contract. */
export const DiagnosticCode = {
  /** Field receiver is `&mut self`, `self` or a typed `self`. */
  INVALID_RECEIVER_SHAPE: "invalid-receiver-shape",
  /** Field method has no receiver at all. */
  MISSING_RECEIVER: "missing-receiver",
  /** Name starts with the reserved `__` prefix. */
  RESERVED_NAME_PREFIX: "reserved-name-prefix",
  /** Downcast target is not a declared implementer. */
  NON_IMPLEMENTER_DOWNCAST_TARGET: "non-implementer-downcast-target",
  /** Implementer has both an external and a method downcast. */
  DUPLICATE_DOWNCAST_BINDING: "duplicate-downcast-binding",
  /** `context`/`executor` combined with `name`/`description`/`default`. */
  DISALLOWED_DIRECTIVE_COMBINATION: "disallowed-directive-combination",
  /** Destructuring parameter without an explicit name. */
  MALFORMED_ARGUMENT_PATTERN: "malformed-argument-pattern",
  /** Downcast method declared async. */
  UNSUPPORTED_ASYNC_DOWNCAST: "unsupported-asynchronous-downcast",
  /** Downcast method with the wrong result or parameters. */
  INVALID_DOWNCAST_SIGNATURE: "invalid-downcast-signature",
  /** Directive extractor could not parse an annotation. */
  DIRECTIVE_PARSE_FAILURE: "directive-parse-failure",
  /** Second context or executor parameter on one field. */
  DUPLICATE_SPECIAL_ARGUMENT: "duplicate-special-argument",
} as const;

export type DiagnosticCode = (typeof DiagnosticCode)[keyof typeof DiagnosticCode];

/** Second location involved in a conflict. */
export interface RelatedLocation {
  message: string;
  span: Span;
}

export interface Diagnostic {
  code: DiagnosticCode;
  message: string;
  span: Span;
  /** Hints shown below the message. */
  notes: string[];
  related?: RelatedLocation;
}

/** Format a diagnostic as `line:column: code: message`. */
export function formatDiagnostic(diagnostic: Diagnostic): string {
  const { line, column } = diagnostic.span;
  const lines = [`${line}:${column}: ${diagnostic.code}: ${diagnostic.message}`];
  if (diagnostic.related) {
    const related = diagnostic.related;
    lines.push(`  ${related.span.line}:${related.span.column}: ${related.message}`);
  }
  for (const note of diagnostic.notes) {
    lines.push(`  = note: ${note}`);
  }
  return lines.join("\n");
}

/**
 * Compilation aborted with one or more diagnostics.
 *
 * Thrown by the throwing entry points; the result-returning ones hand the
 * diagnostics back instead.
 */
export class CompileError extends Error {
  readonly diagnostics: readonly Diagnostic[];

  constructor(contract: string, diagnostics: readonly Diagnostic[]) {
    super(CompileError.summarize(contract, diagnostics));
    this.name = "CompileError";
    this.diagnostics = diagnostics;
  }

  /** Check if any diagnostic has the given code. */
  has(code: DiagnosticCode): boolean {
    return this.diagnostics.some((d) => d.code === code);
  }

  private static summarize(contract: string, diagnostics: readonly Diagnostic[]): string {
    const count = diagnostics.length === 1 ? "1 error" : `${diagnostics.length} errors`;
    const body = diagnostics.map(formatDiagnostic).join("\n");
    return `could not compile contract \`${contract}\` due to ${count}\n${body}`;
  }
}
