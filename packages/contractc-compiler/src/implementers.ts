// Implementer/downcast resolver.
//
// Merges the declaration's external downcast bindings with the downcast
// methods found by the classifier. External bindings are always applied
// first, so a conflicting method is reported at the method regardless of
// where it sits in the declaration.

import {
  type ExternalDowncast,
  type DowncastBinding,
  type ImplementerDefinition,
  type Span,
  type Spanned,
  type TypeRef,
  cloneType,
  renderType,
  typeEquals,
} from "@contractc/model";
import type { MethodDowncast } from "./classify.ts";
import {
  type DiagnosticSink,
  type DowncastSource,
  duplicateDowncast,
  externalSource,
  methodSource,
  onlyImplementerDowncast,
} from "./diagnostics.ts";

interface Entry {
  definition: ImplementerDefinition;
  /** Where the attached binding was declared, for conflict reports. */
  bindingSpan?: Span;
}

/** Registry of implementers keyed by type, in declaration order. */
export class ImplementerRegistry {
  private entries: Entry[] = [];

  /**
   * Seed the registry from the declared implementer list.
   *
   * Repeated types collapse into their first occurrence.
   */
  static seed(implementers: Spanned<TypeRef>[]): ImplementerRegistry {
    const registry = new ImplementerRegistry();
    for (const implementer of implementers) {
      if (registry.find(implementer.value) === undefined) {
        registry.entries.push({
          definition: { type: cloneType(implementer.value), span: implementer.span },
        });
      }
    }
    return registry;
  }

  private find(type: TypeRef): Entry | undefined {
    return this.entries.find((entry) => typeEquals(entry.definition.type, type));
  }

  /**
   * Attach external downcast bindings.
   *
   * Unknown targets and a second binding for one implementer are reported.
   */
  applyExternal(bindings: ExternalDowncast[], sink: DiagnosticSink): void {
    for (const binding of bindings) {
      const entry = this.find(binding.type);
      if (entry === undefined) {
        onlyImplementerDowncast(sink, binding.function.span);
        continue;
      }
      const existing = entry.definition.downcast;
      if (existing !== undefined) {
        const incoming = externalSource(binding.function.value, binding.function.span);
        duplicateDowncast(sink, incoming, source(entry, existing), renderType(entry.definition.type));
        continue;
      }
      entry.definition.downcast = { kind: "external", function: binding.function.value };
      entry.bindingSpan = binding.function.span;
    }
  }

  /**
   * Attach downcast methods.
   *
   * A method targeting an implementer that already has a binding is a
   * conflict; the binding attached first is kept.
   */
  applyMethods(downcasts: MethodDowncast[], sink: DiagnosticSink): void {
    for (const downcast of downcasts) {
      const entry = this.find(downcast.type);
      if (entry === undefined) {
        onlyImplementerDowncast(sink, downcast.span);
        continue;
      }

      const existing = entry.definition.downcast;
      if (existing !== undefined) {
        const incoming = methodSource(downcast.method, downcast.span);
        duplicateDowncast(sink, incoming, source(entry, existing), renderType(entry.definition.type));
        continue;
      }

      entry.definition.downcast = {
        kind: "method",
        method: downcast.method,
        withContext: downcast.withContext,
      };
      if (downcast.contextType !== undefined) {
        entry.definition.contextType = downcast.contextType;
      }
      entry.bindingSpan = downcast.span;
    }
  }

  /** The implementer definitions, in declaration order. */
  definitions(): ImplementerDefinition[] {
    return this.entries.map((entry) => entry.definition);
  }
}

/** Describe the binding already attached to an entry. */
function source(entry: Entry, downcast: DowncastBinding): DowncastSource {
  const span = entry.bindingSpan ?? entry.definition.span;
  return downcast.kind === "method"
    ? methodSource(downcast.method, span)
    : externalSource(downcast.function, span);
}
