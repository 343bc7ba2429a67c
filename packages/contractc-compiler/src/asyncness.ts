// Async adaptation marker.
//
// If the contract is marked asynchronous, or any of its methods is, every
// method signature returns a suspendable result so that dispatch can be
// called generically. Default-bodied async methods additionally require the
// contract to be shareable across concurrent call sites.

import {
  type CapabilityBound,
  type MethodDeclaration,
  type MethodSignature,
  cloneType,
  unitType,
} from "@contractc/model";

export interface AsyncMarking {
  asynchronous: boolean;
  /** Capability bounds required by asynchrony, if any. */
  bounds: CapabilityBound[];
  methods: MethodSignature[];
}

/**
 * Mark a set of methods for asynchronous dispatch.
 *
 * @param forced - Whether the `asynchronous` directive was given
 * @param methods - Every method of the contract or implementation block,
 *   including ignored and downcast methods
 */
export function markAsync(forced: boolean, methods: MethodDeclaration[]): AsyncMarking {
  const asynchronous = forced || methods.some((m) => m.isAsync);
  const hasDefaultAsync = methods.some((m) => m.isAsync && m.hasDefault);

  const bounds: CapabilityBound[] = [];
  if (asynchronous && hasDefaultAsync) {
    bounds.push({ kind: "shareable" });
  }

  return {
    asynchronous,
    bounds,
    methods: methods.map((m) => adaptSignature(m, asynchronous)),
  };
}

function adaptSignature(method: MethodDeclaration, asynchronous: boolean): MethodSignature {
  return {
    ident: method.ident,
    params: method.params.map((p) => ({
      name: p.pattern.kind === "ident" ? p.pattern.name : p.pattern.text,
      type: cloneType(p.type),
    })),
    output: method.output === undefined ? unitType() : cloneType(method.output),
    isAsync: asynchronous || method.isAsync,
    hasDefault: method.hasDefault,
  };
}
