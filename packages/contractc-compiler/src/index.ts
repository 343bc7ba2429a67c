// @contractc/compiler - compiles contract declarations into interface models
// and dispatch artifacts.

export {
  type CompileResult,
  compileContract,
  compileContractOrThrow,
  resolveContext,
} from "./compile.ts";

export {
  type ImplementationResult,
  compileImplementation,
  compileImplementationOrThrow,
} from "./implementation.ts";

export {
  type CompileOptions,
  type ResolvedCompileOptions,
  DEFAULT_SCALAR_PARAMETER,
  DEFAULT_SCALAR_TYPE,
  resolveOptions,
} from "./options.ts";

// Stage hooks and logging
export {
  Extensions,
  STAGES,
  type StageName,
  type CompileContext,
  type StageOutcome,
  type CompileHooks,
} from "./hooks.ts";
export { type LoggingOptions, isEnabled, loggingHooks } from "./logging.ts";

// Individual stages, for callers assembling their own pipeline
export { type ClassifiedMethod, type MethodDowncast, classifyMethod } from "./classify.ts";
export { resolveArgument, resolveArguments } from "./arguments.ts";
export { ImplementerRegistry } from "./implementers.ts";
export { resolveScalar, threadScalar, scalarParamName, defaultScalar } from "./scalar.ts";
export { type AsyncMarking, markAsync } from "./asyncness.ts";
export { type DispatchInput, CLOSED_SUFFIX, artifactIdent, selectDispatch } from "./dispatch.ts";
export { AbortCompilation, DiagnosticSink } from "./diagnostics.ts";
