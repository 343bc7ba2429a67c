// Method classifier.
//
// Decides for every contract method whether it is ignored, a queryable field
// or a downcast operator, and validates its shape. Invalid methods are
// reported and dropped; the caller aborts once all methods have been seen.

import {
  type FieldDefinition,
  type MethodDeclaration,
  type MethodOptions,
  type TypeRef,
  cloneType,
  eraseLifetimes,
  isReservedName,
  lastSegment,
  toCamelCase,
  unitType,
  unraw,
  type Span,
} from "@contractc/model";
import { resolveArguments } from "./arguments.ts";
import {
  type DiagnosticSink,
  asyncDowncast,
  directiveParseFailure,
  invalidDowncastOutput,
  invalidDowncastParams,
  invalidReceiver,
  missingReceiver,
  reservedName,
} from "./diagnostics.ts";

/** A contract method marked as downcast into one implementer. */
export interface MethodDowncast {
  /** Implementer type the method narrows to. */
  type: TypeRef;
  method: string;
  withContext: boolean;
  contextType?: TypeRef;
  span: Span;
}

export type ClassifiedMethod =
  | { kind: "ignored" }
  | { kind: "field"; field: FieldDefinition }
  | { kind: "downcast"; downcast: MethodDowncast };

/**
 * Classify one contract method.
 *
 * @param internal - Whether the contract may use reserved names
 * @returns The classification, or null when the method was rejected
 */
export function classifyMethod(
  method: MethodDeclaration,
  internal: boolean,
  sink: DiagnosticSink,
): ClassifiedMethod | null {
  if (!method.options.ok) {
    directiveParseFailure(sink, method.options.failure);
    return null;
  }
  const options = method.options.value;

  if (options.ignore) {
    return { kind: "ignored" };
  }

  if (options.downcast) {
    const downcast = parseDowncast(method, sink);
    return downcast === null ? null : { kind: "downcast", downcast };
  }

  const field = parseField(method, options, internal, sink);
  return field === null ? null : { kind: "field", field };
}

// ============================================================================
// Downcasts
// ============================================================================

function parseDowncast(method: MethodDeclaration, sink: DiagnosticSink): MethodDowncast | null {
  const type = downcastTarget(method.output);
  if (type === null) {
    invalidDowncastOutput(sink, method.span);
    return null;
  }

  const context = downcastContext(method);
  if (context === null) {
    invalidDowncastParams(sink, method.receiver?.span ?? method.span);
    return null;
  }

  if (method.isAsync) {
    asyncDowncast(sink, method.span);
    return null;
  }

  const downcast: MethodDowncast = {
    type,
    method: method.ident,
    withContext: context.type !== undefined,
    span: method.span,
  };
  if (context.type !== undefined) {
    downcast.contextType = context.type;
  }
  return downcast;
}

/** Accepts exactly `Option<&T>` and returns `T`. */
function downcastTarget(output: TypeRef | undefined): TypeRef | null {
  if (output === undefined || output.kind !== "path" || lastSegment(output) !== "Option") {
    return null;
  }
  if (output.args.length !== 1) {
    return null;
  }
  const inner = output.args[0];
  if (inner.kind !== "ref" || inner.mutable) {
    return null;
  }
  return cloneType(inner.inner);
}

/**
 * Accepts `&self` optionally followed by one `&Context` parameter.
 *
 * @returns `{ type }` with the context type (or undefined when there is
 *   none), or null for any other shape
 */
function downcastContext(method: MethodDeclaration): { type?: TypeRef } | null {
  if (method.receiver === null || method.receiver.form !== "shared") {
    return null;
  }
  if (method.params.length === 0) {
    return {};
  }
  if (method.params.length > 1) {
    return null;
  }
  const param = method.params[0].type;
  if (param.kind !== "ref" || param.mutable) {
    return null;
  }
  return { type: cloneType(param.inner) };
}

// ============================================================================
// Fields
// ============================================================================

function parseField(
  method: MethodDeclaration,
  options: MethodOptions,
  internal: boolean,
  sink: DiagnosticSink,
): FieldDefinition | null {
  const name = options.name?.value ?? toCamelCase(unraw(method.ident));
  if (!internal && isReservedName(name)) {
    reservedName(sink, options.name?.span ?? method.span);
    return null;
  }

  if (method.receiver === null) {
    missingReceiver(sink, method.span);
    return null;
  }
  if (method.receiver.form !== "shared") {
    invalidReceiver(sink, method.receiver.span);
    return null;
  }

  const field: FieldDefinition = {
    name,
    type: eraseLifetimes(method.output ?? unitType()),
    arguments: resolveArguments(method.params, internal, sink),
    method: method.ident,
    isAsync: method.isAsync,
  };
  if (options.description) {
    field.description = options.description.value;
  }
  if (options.deprecated) {
    field.deprecated = { reason: options.deprecated.value };
  }
  return field;
}
