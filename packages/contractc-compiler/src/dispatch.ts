// Dispatch representation selector.
//
// Open dispatch: a dynamic handle to anything satisfying the contract.
// Membership is unbounded; every call goes through indirection.
//
// Closed dispatch: a tagged union with one variant per implementer. Calls
// switch on the tag. The union re-exposes the contract's associated types,
// constants and methods, since callers address the contract through it.

import {
  type ContractDeclaration,
  type DispatchArtifact,
  type DispatchMode,
  type ImplementerDefinition,
  type MethodSignature,
  type OpenDispatch,
  type ScalarParameterKind,
  type TypeRef,
  cloneType,
  lastSegment,
  renderType,
} from "@contractc/model";
import { cloneScalar } from "./scalar.ts";

/** Suffix of the union name derived from the contract identifier. */
export const CLOSED_SUFFIX = "Value";

export interface DispatchInput {
  declaration: ContractDeclaration;
  mode: DispatchMode | undefined;
  implementers: ImplementerDefinition[];
  scalar: ScalarParameterKind;
  context: TypeRef | undefined;
  /** Contract methods after async adaptation. */
  methods: MethodSignature[];
}

/** Name of the artifact for a requested mode. */
export function artifactIdent(ident: string, mode: DispatchMode | undefined): string {
  if (mode?.mode === "open") {
    return mode.alias.value;
  }
  return mode?.name?.value ?? `${ident}${CLOSED_SUFFIX}`;
}

/**
 * Select and assemble the dispatch artifact.
 *
 * Without a requested mode the artifact is a closed union named after the
 * contract.
 */
export function selectDispatch(input: DispatchInput): DispatchArtifact {
  const { declaration, mode } = input;
  const ident = artifactIdent(declaration.ident, mode);

  if (mode?.mode === "open") {
    const artifact: OpenDispatch = {
      kind: "open",
      ident,
      contract: declaration.ident,
      scalar: cloneScalar(input.scalar),
    };
    if (input.context !== undefined) {
      artifact.context = cloneType(input.context);
    }
    return artifact;
  }

  const associatedTypes: { ident: string; generics: string[] }[] = [];
  const constants: { ident: string; type: TypeRef }[] = [];
  for (const item of declaration.items) {
    if (item.kind === "type") {
      associatedTypes.push({ ident: item.ident, generics: [...item.generics] });
    } else if (item.kind === "const") {
      constants.push({ ident: item.ident, type: cloneType(item.type) });
    }
  }

  return {
    kind: "closed",
    ident,
    contract: declaration.ident,
    variants: variantTags(input.implementers),
    associatedTypes,
    constants,
    methods: input.methods.map(cloneSignature),
  };
}

/**
 * Tag each implementer by its bare type name.
 *
 * Implementers sharing a bare name (`a::Human`, `b::Human`) get numbered
 * tags: `Human`, `Human2`.
 */
function variantTags(implementers: ImplementerDefinition[]): { tag: string; type: TypeRef }[] {
  const used = new Set<string>();
  return implementers.map((implementer) => {
    const base = lastSegment(implementer.type) ?? sanitize(renderType(implementer.type));
    let tag = base;
    for (let n = 2; used.has(tag); n++) {
      tag = `${base}${n}`;
    }
    used.add(tag);
    return { tag, type: cloneType(implementer.type) };
  });
}

function cloneSignature(signature: MethodSignature): MethodSignature {
  return {
    ...signature,
    params: signature.params.map((p) => ({ name: p.name, type: cloneType(p.type) })),
    output: cloneType(signature.output),
  };
}

function sanitize(text: string): string {
  return text.replace(/[^A-Za-z0-9_]+/g, "_").replace(/^_+|_+$/g, "") || "Variant";
}
