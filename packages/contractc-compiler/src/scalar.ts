// Scalar-parameter resolver.
//
// Decides how the payload (scalar) type parameter is threaded through the
// generated signatures:
// - an override naming one of the declaration's own type parameters binds
//   to it (explicit generic)
// - any other override fixes the payload type (concrete)
// - no override synthesizes a parameter with a default (implicit generic)

import {
  type CapabilityBound,
  type GenericParam,
  type ScalarParameterKind,
  type TypeRef,
  bareIdent,
  cloneType,
} from "@contractc/model";
import type { ResolvedCompileOptions } from "./options.ts";

/**
 * Resolve the scalar parameter kind.
 *
 * @param override - Type given by the `scalar` directive, if any
 * @param generics - The declaration's own generic parameters
 */
export function resolveScalar(
  override: TypeRef | undefined,
  generics: GenericParam[],
  options: ResolvedCompileOptions,
): ScalarParameterKind {
  if (override === undefined) {
    return {
      kind: "implicitGeneric",
      param: options.scalarParameter,
      default: cloneType(options.defaultScalarType),
    };
  }

  const ident = bareIdent(override);
  const bound = generics.find((p) => p.kind === "type" && p.name === ident);
  if (bound !== undefined) {
    return { kind: "explicitGeneric", param: bound.name };
  }
  return { kind: "concrete", type: cloneType(override) };
}

/** Name of the parameter carrying the payload type in generated signatures. */
export function scalarParamName(scalar: ScalarParameterKind, options: ResolvedCompileOptions): string {
  switch (scalar.kind) {
    case "explicitGeneric":
    case "implicitGeneric":
      return scalar.param;
    case "concrete":
      return options.scalarParameter;
  }
}

/** Payload type used when a caller does not pick one. */
export function defaultScalar(scalar: ScalarParameterKind, options: ResolvedCompileOptions): TypeRef {
  switch (scalar.kind) {
    case "concrete":
      return cloneType(scalar.type);
    case "implicitGeneric":
      return cloneType(scalar.default);
    case "explicitGeneric":
      return cloneType(options.defaultScalarType);
  }
}

/**
 * Thread the scalar parameter into a contract's generics.
 *
 * Unless the declaration already owns the parameter, one is appended with the
 * default payload type, so that callers naming no payload type are
 * unaffected. The parameter always gets a payload bound, and the contract is
 * required to be usable as a dynamic value over it.
 */
export function threadScalar(
  scalar: ScalarParameterKind,
  generics: GenericParam[],
  options: ResolvedCompileOptions,
): { generics: GenericParam[]; bounds: CapabilityBound[] } {
  const param = scalarParamName(scalar, options);
  const threaded = generics.map(cloneGeneric);
  if (scalar.kind !== "explicitGeneric") {
    threaded.push({ kind: "type", name: param, default: defaultScalar(scalar, options) });
  }
  return {
    generics: threaded,
    bounds: [
      { kind: "scalarValue", param },
      { kind: "dynValue", scalar: param },
    ],
  };
}

/** Copy of a generic parameter, sharing nothing with the input. */
export function cloneGeneric(param: GenericParam): GenericParam {
  switch (param.kind) {
    case "type":
      return param.default === undefined
        ? { kind: "type", name: param.name }
        : { kind: "type", name: param.name, default: cloneType(param.default) };
    case "lifetime":
      return { kind: "lifetime", name: param.name };
    case "const":
      return { kind: "const", name: param.name, type: cloneType(param.type) };
  }
}

export function cloneScalar(scalar: ScalarParameterKind): ScalarParameterKind {
  switch (scalar.kind) {
    case "concrete":
      return { kind: "concrete", type: cloneType(scalar.type) };
    case "explicitGeneric":
      return { kind: "explicitGeneric", param: scalar.param };
    case "implicitGeneric":
      return { kind: "implicitGeneric", param: scalar.param, default: cloneType(scalar.default) };
  }
}
