// Argument role resolver.
//
// Classifies each non-receiver parameter of a field method as a context
// value, an executor handle or a regular client-visible argument.

import {
  type ArgumentDefinition,
  type ArgumentOptions,
  type ParamDeclaration,
  type RegularArgument,
  type Span,
  cloneType,
  isReservedName,
  toCamelCase,
  unraw,
  unreferenced,
} from "@contractc/model";
import {
  type DiagnosticSink,
  directiveParseFailure,
  disallowedDirective,
  duplicateSpecialArgument,
  malformedArgument,
  reservedName,
} from "./diagnostics.ts";

/** Parameter names that take a special role without any directive. */
const CONTEXT_NAMES = new Set(["context", "ctx"]);
const EXECUTOR_NAMES = new Set(["executor"]);

/**
 * Resolve the role of a single parameter.
 *
 * @returns The argument, or null when it was rejected (a diagnostic has
 *   been recorded)
 */
export function resolveArgument(
  param: ParamDeclaration,
  internal: boolean,
  sink: DiagnosticSink,
): ArgumentDefinition | null {
  if (!param.options.ok) {
    directiveParseFailure(sink, param.options.failure);
    return null;
  }
  const options = param.options.value;

  const special = specialRole(param, options);
  if (special !== null) {
    if (!ensureNoRegularDirectives(options, sink)) {
      return null;
    }
    return special;
  }

  let name: string;
  if (options.name) {
    name = options.name.value;
  } else if (param.pattern.kind === "ident") {
    name = toCamelCase(unraw(param.pattern.name));
  } else {
    malformedArgument(sink, param.span);
    return null;
  }

  if (!internal && isReservedName(name)) {
    reservedName(sink, options.name?.span ?? param.span);
    return null;
  }

  const argument: RegularArgument = { role: "regular", name, type: cloneType(param.type) };
  if (options.description) {
    argument.description = options.description.value;
  }
  if (options.default) {
    argument.default = structuredClone(options.default.value);
  }
  return argument;
}

/** Explicit directives win over naming conventions. */
function specialRole(param: ParamDeclaration, options: ArgumentOptions): ArgumentDefinition | null {
  if (options.context) {
    return { role: "context", type: cloneType(unreferenced(param.type)) };
  }
  if (options.executor) {
    return { role: "executor" };
  }
  if (param.pattern.kind !== "ident") {
    return null;
  }
  const ident = unraw(param.pattern.name);
  if (CONTEXT_NAMES.has(ident)) {
    return { role: "context", type: cloneType(unreferenced(param.type)) };
  }
  if (EXECUTOR_NAMES.has(ident)) {
    return { role: "executor" };
  }
  return null;
}

function ensureNoRegularDirectives(options: ArgumentOptions, sink: DiagnosticSink): boolean {
  if (options.name) {
    disallowedDirective(sink, options.name.span, "name");
    return false;
  }
  if (options.description) {
    disallowedDirective(sink, options.description.span, "description");
    return false;
  }
  if (options.default) {
    disallowedDirective(sink, options.default.span, "default");
    return false;
  }
  return true;
}

/**
 * Resolve every parameter of a field method, in declaration order.
 *
 * Rejected parameters are left out. A field takes at most one context and
 * one executor argument; later ones are reported and dropped.
 */
export function resolveArguments(
  params: ParamDeclaration[],
  internal: boolean,
  sink: DiagnosticSink,
): ArgumentDefinition[] {
  const resolved: ArgumentDefinition[] = [];
  const seen: { context?: Span; executor?: Span } = {};

  for (const param of params) {
    const argument = resolveArgument(param, internal, sink);
    if (argument === null) continue;

    if (argument.role === "context" || argument.role === "executor") {
      const first = seen[argument.role];
      if (first !== undefined) {
        duplicateSpecialArgument(sink, param.span, argument.role, first);
        continue;
      }
      seen[argument.role] = param.span;
    }
    resolved.push(argument);
  }

  return resolved;
}
