// Output types: the compiled contract model and its dispatch artifact.
//
// The model is handed to the schema builder, which turns it into the
// server-visible interface type. The dispatch artifact tells the runtime how
// a value of the interface reaches its implementer.

import type { DefaultValue, GenericParam, Span, Visibility } from "./declaration.ts";
import type { PathType, TypeRef } from "./type_ref.ts";

// ============================================================================
// Fields and Arguments
// ============================================================================

/** A regular, client-visible field argument. */
export interface RegularArgument {
  role: "regular";
  name: string;
  type: TypeRef;
  description?: string;
  default?: DefaultValue;
}

/**
 * Role of a method parameter.
 *
 * Context and executor parameters are supplied by the execution engine and
 * never appear in the schema.
 */
export type ArgumentDefinition =
  | { role: "context"; type: TypeRef }
  | { role: "executor" }
  | RegularArgument;

export interface FieldDefinition {
  name: string;
  type: TypeRef;
  description?: string;
  /** Present when deprecated; `reason` is null when none was given. */
  deprecated?: { reason: string | null };
  arguments: ArgumentDefinition[];
  /** Identifier of the contract method backing this field. */
  method: string;
  isAsync: boolean;
}

// ============================================================================
// Implementers
// ============================================================================

/**
 * How a dispatch value is narrowed to one implementer.
 *
 * - method: a contract method marked as downcast
 * - external: a free function named on the declaration
 */
export type DowncastBinding =
  | { kind: "method"; method: string; withContext: boolean }
  | { kind: "external"; function: string };

export interface ImplementerDefinition {
  type: TypeRef;
  downcast?: DowncastBinding;
  /** Context type the downcast method takes, if any. */
  contextType?: TypeRef;
  span: Span;
}

// ============================================================================
// Scalar Parameter
// ============================================================================

/**
 * How the payload (scalar) parameter is threaded through signatures.
 *
 * - concrete: fixed to one payload type
 * - explicitGeneric: bound to one of the declaration's own parameters
 * - implicitGeneric: a synthesized parameter with a default payload type
 */
export type ScalarParameterKind =
  | { kind: "concrete"; type: TypeRef }
  | { kind: "explicitGeneric"; param: string }
  | { kind: "implicitGeneric"; param: string; default: TypeRef };

// ============================================================================
// Signatures and Bounds
// ============================================================================

/** A non-receiver parameter of a method signature. */
export interface SignatureParam {
  name: string;
  type: TypeRef;
}

export interface MethodSignature {
  ident: string;
  params: SignatureParam[];
  output: TypeRef;
  /** After async adaptation: true for every method of an async contract. */
  isAsync: boolean;
  hasDefault: boolean;
}

/**
 * Capability the generated contract must carry.
 *
 * - scalarValue: `param` must be a valid payload type
 * - dynValue: the contract must be usable as a dynamic value over `scalar`
 * - shareable: safely shareable across concurrent call sites; applies to
 *   `param` when given, to the contract itself otherwise
 */
export type CapabilityBound =
  | { kind: "scalarValue"; param: string }
  | { kind: "dynValue"; scalar: string }
  | { kind: "shareable"; param?: string };

// ============================================================================
// Dispatch Artifact
// ============================================================================

export interface ClosedVariant {
  tag: string;
  type: TypeRef;
}

/** Dynamic handle to anything satisfying the contract over `scalar`. */
export interface OpenDispatch {
  kind: "open";
  ident: string;
  contract: string;
  scalar: ScalarParameterKind;
  context?: TypeRef;
}

/** Tagged union with one variant per implementer. */
export interface ClosedDispatch {
  kind: "closed";
  ident: string;
  contract: string;
  variants: ClosedVariant[];
  /** Associated types re-exposed by the union. */
  associatedTypes: { ident: string; generics: string[] }[];
  /** Associated constants re-exposed by the union. */
  constants: { ident: string; type: TypeRef }[];
  /** Every contract method, re-exposed as a delegating member. */
  methods: MethodSignature[];
}

export type DispatchArtifact = OpenDispatch | ClosedDispatch;

// ============================================================================
// Contract Model
// ============================================================================

export interface ContractModel {
  name: string;
  /** Identifier of the dispatch artifact. */
  ident: string;
  visibility: Visibility;
  description?: string;
  context?: TypeRef;
  scalar: ScalarParameterKind;
  /** Generic parameters after the scalar parameter has been threaded in. */
  generics: GenericParam[];
  fields: FieldDefinition[];
  implementers: ImplementerDefinition[];
}

/** Asynchrony and capability requirements of the generated contract. */
export interface AsyncAdaptation {
  asynchronous: boolean;
  bounds: CapabilityBound[];
  /** Every contract method with its adapted signature. */
  methods: MethodSignature[];
}

export interface CompiledContract {
  model: ContractModel;
  dispatch: DispatchArtifact;
  adaptation: AsyncAdaptation;
}

/** Compiled form of an implementation block. */
export interface CompiledImplementation {
  scalar: ScalarParameterKind;
  generics: GenericParam[];
  /** The implemented contract with the payload parameter appended. */
  contract: PathType;
  bounds: CapabilityBound[];
  asynchronous: boolean;
  methods: MethodSignature[];
}

/** Regular arguments of a field, in declaration order. */
export function regularArguments(field: FieldDefinition): RegularArgument[] {
  return field.arguments.filter((arg): arg is RegularArgument => arg.role === "regular");
}
