// Diagnostic sink and the messages reported by the compiler stages.
//
// A sink is created by each compile call and passed to every stage, so that
// independent compilations never share state.

import {
  type Diagnostic,
  type DirectiveParseFailure,
  type RelatedLocation,
  type Span,
  DiagnosticCode,
} from "@contractc/model";

/**
 * Thrown by {@link DiagnosticSink.abortIfDirty} to stop the pipeline.
 *
 * Only the assembler catches it; it never leaves a compile call.
 */
export class AbortCompilation extends Error {
  constructor() {
    super("compilation aborted");
    this.name = "AbortCompilation";
  }
}

/** Accumulates diagnostics for one compilation. */
export class DiagnosticSink {
  private items: Diagnostic[] = [];

  /** Record a diagnostic. */
  emit(
    code: DiagnosticCode,
    message: string,
    span: Span,
    extra: { notes?: string[]; related?: RelatedLocation } = {},
  ): void {
    const diagnostic: Diagnostic = { code, message, span, notes: extra.notes ?? [] };
    if (extra.related) {
      diagnostic.related = extra.related;
    }
    this.items.push(diagnostic);
  }

  /** True once any diagnostic was recorded. */
  get dirty(): boolean {
    return this.items.length > 0;
  }

  get diagnostics(): readonly Diagnostic[] {
    return this.items;
  }

  /** Stop the pipeline if anything was reported so far. */
  abortIfDirty(): void {
    if (this.dirty) {
      throw new AbortCompilation();
    }
  }
}

// ============================================================================
// Messages
// ============================================================================

export function directiveParseFailure(sink: DiagnosticSink, failure: DirectiveParseFailure): void {
  sink.emit(DiagnosticCode.DIRECTIVE_PARSE_FAILURE, failure.message, failure.span);
}

export function reservedName(sink: DiagnosticSink, span: Span): void {
  sink.emit(
    DiagnosticCode.RESERVED_NAME_PREFIX,
    "names starting with `__` are reserved for the introspection system",
    span,
    { notes: ["rename it, or mark the contract as `internal`"] },
  );
}

export function invalidReceiver(sink: DiagnosticSink, span: Span): void {
  sink.emit(
    DiagnosticCode.INVALID_RECEIVER_SHAPE,
    "contract method receiver can only be a shared reference `&self`",
    span,
  );
}

export function missingReceiver(sink: DiagnosticSink, span: Span): void {
  sink.emit(
    DiagnosticCode.MISSING_RECEIVER,
    "contract method should have a shared reference receiver `&self`",
    span,
  );
}

export function disallowedDirective(sink: DiagnosticSink, span: Span, directive: string): void {
  sink.emit(
    DiagnosticCode.DISALLOWED_DIRECTIVE_COMBINATION,
    `directive \`${directive} = ...\` is not allowed here`,
    span,
    { notes: ["context and executor arguments are not exposed, so they take no naming directives"] },
  );
}

export function malformedArgument(sink: DiagnosticSink, span: Span): void {
  sink.emit(
    DiagnosticCode.MALFORMED_ARGUMENT_PATTERN,
    "contract method argument should be declared as a single identifier",
    span,
    {
      notes: [
        "use the `name = ...` directive to specify the argument's name without requiring it being a single identifier",
      ],
    },
  );
}

export function duplicateSpecialArgument(
  sink: DiagnosticSink,
  span: Span,
  role: "context" | "executor",
  first: Span,
): void {
  sink.emit(
    DiagnosticCode.DUPLICATE_SPECIAL_ARGUMENT,
    `contract method can accept at most one ${role} argument`,
    span,
    { related: { message: `first ${role} argument declared here`, span: first } },
  );
}

export function invalidDowncastOutput(sink: DiagnosticSink, span: Span): void {
  sink.emit(
    DiagnosticCode.INVALID_DOWNCAST_SIGNATURE,
    "expects contract method return type to be `Option<&ImplementerType>` only",
    span,
  );
}

export function invalidDowncastParams(sink: DiagnosticSink, span: Span): void {
  sink.emit(
    DiagnosticCode.INVALID_DOWNCAST_SIGNATURE,
    "expects contract method to accept `&self` only and, optionally, `&Context`",
    span,
  );
}

export function asyncDowncast(sink: DiagnosticSink, span: Span): void {
  sink.emit(
    DiagnosticCode.UNSUPPORTED_ASYNC_DOWNCAST,
    "async downcast to interface implementer is not supported",
    span,
  );
}

export function onlyImplementerDowncast(sink: DiagnosticSink, span: Span): void {
  sink.emit(
    DiagnosticCode.NON_IMPLEMENTER_DOWNCAST_TARGET,
    "downcasting is possible only to interface implementers",
    span,
  );
}

/** One side of a downcast conflict, e.g. "contract method `asHuman`". */
export interface DowncastSource {
  label: string;
  span: Span;
}

export function duplicateDowncast(
  sink: DiagnosticSink,
  incoming: DowncastSource,
  existing: DowncastSource,
  implementer: string,
): void {
  sink.emit(
    DiagnosticCode.DUPLICATE_DOWNCAST_BINDING,
    `${incoming.label} conflicts with the ${existing.label} declared on the contract ` +
      `to downcast into the implementer type \`${implementer}\``,
    incoming.span,
    {
      notes: ["use the `ignore` directive to exclude this method from implementer downcasting"],
      related: { message: `${existing.label} declared here`, span: existing.span },
    },
  );
}

export function methodSource(ident: string, span: Span): DowncastSource {
  return { label: `contract method \`${ident}\``, span };
}

export function externalSource(fn: string, span: Span): DowncastSource {
  return { label: `external downcast function \`${fn}\``, span };
}
