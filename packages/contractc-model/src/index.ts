// @contractc/model - declaration, model and diagnostic types for contractc
// This package is shared by the compiler and the runtime dispatcher.

export {
  type PathType,
  type RefType,
  type TupleType,
  type SliceType,
  type LifetimeArg,
  type TypeRef,
  type TypeArg,
  ANONYMOUS_LIFETIME,
  pathType,
  refType,
  unitType,
  typeEquals,
  isUnit,
  lastSegment,
  bareIdent,
  unreferenced,
  cloneType,
  clonePath,
  eraseLifetimes,
  renderType,
} from "./type_ref.ts";

export {
  type Span,
  type Spanned,
  type DirectiveParseFailure,
  type Extracted,
  type DefaultValue,
  type ExternalDowncast,
  type DispatchMode,
  type DeclarationOptions,
  type MethodOptions,
  type ArgumentOptions,
  type Visibility,
  type GenericParam,
  type Receiver,
  type ParamPattern,
  type ParamDeclaration,
  type MethodDeclaration,
  type AssociatedTypeDeclaration,
  type ConstDeclaration,
  type ContractItem,
  type ContractDeclaration,
  type ImplementationOptions,
  type ImplementationDeclaration,
  contractMethods,
} from "./declaration.ts";

export {
  type RegularArgument,
  type ArgumentDefinition,
  type FieldDefinition,
  type DowncastBinding,
  type ImplementerDefinition,
  type ScalarParameterKind,
  type SignatureParam,
  type MethodSignature,
  type CapabilityBound,
  type ClosedVariant,
  type OpenDispatch,
  type ClosedDispatch,
  type DispatchArtifact,
  type ContractModel,
  type AsyncAdaptation,
  type CompiledContract,
  type CompiledImplementation,
  regularArguments,
} from "./model.ts";

export {
  DiagnosticCode,
  type RelatedLocation,
  type Diagnostic,
  formatDiagnostic,
  CompileError,
} from "./diagnostic.ts";

export { unraw, toCamelCase, RESERVED_PREFIX, isReservedName } from "./casing.ts";

export {
  type ParamInit,
  type MethodInit,
  type ContractInit,
  type ImplementationInit,
  at,
  spanned,
  param,
  destructured,
  method,
  contract,
  implementation,
} from "./builders.ts";
