// Assembler: compiles a contract declaration into a model and dispatch artifact.
//
// Diagnostics accumulate in a sink owned by the compile call. The pipeline
// aborts after the external downcasts and again after the methods have been
// classified, so no partial model ever leaves this module.

import {
  type CompiledContract,
  type ContractDeclaration,
  type DeclarationOptions,
  type Diagnostic,
  type FieldDefinition,
  type ImplementerDefinition,
  type TypeRef,
  CompileError,
  cloneType,
  contractMethods,
  isReservedName,
  unraw,
} from "@contractc/model";
import { markAsync } from "./asyncness.ts";
import { type MethodDowncast, classifyMethod } from "./classify.ts";
import { AbortCompilation, DiagnosticSink, directiveParseFailure, reservedName } from "./diagnostics.ts";
import { artifactIdent, selectDispatch } from "./dispatch.ts";
import {
  type CompileContext,
  type CompileHooks,
  type StageName,
  type StageOutcome,
  Extensions,
} from "./hooks.ts";
import { ImplementerRegistry } from "./implementers.ts";
import { type CompileOptions, type ResolvedCompileOptions, resolveOptions } from "./options.ts";
import { resolveScalar, threadScalar } from "./scalar.ts";

/**
 * Result of compiling a contract.
 *
 * Failures carry every diagnostic recorded before the pipeline aborted.
 */
export type CompileResult =
  | { ok: true; compiled: CompiledContract }
  | { ok: false; diagnostics: Diagnostic[] };

/**
 * Runs stages with hooks around them.
 *
 * Shared by the contract and implementation compilers.
 */
export class StageRunner {
  readonly ctx: CompileContext;

  constructor(
    contract: string,
    private hooks: CompileHooks[],
    private sink: DiagnosticSink,
  ) {
    this.ctx = { contract, extensions: new Extensions() };
  }

  run<T>(stage: StageName, body: () => T): T {
    for (const hook of this.hooks) {
      hook.pre?.(this.ctx, stage);
    }
    let value: T;
    try {
      value = body();
    } catch (e) {
      if (e instanceof AbortCompilation) {
        this.post(stage, { ok: false, diagnostics: this.sink.diagnostics });
      }
      throw e;
    }
    this.post(stage, { ok: true, value });
    return value;
  }

  private post(stage: StageName, outcome: StageOutcome): void {
    for (const hook of this.hooks) {
      hook.post?.(this.ctx, stage, outcome);
    }
  }
}

/**
 * Compile a contract declaration.
 *
 * Compiling the same declaration twice yields equal results.
 *
 * @example
 * ```typescript
 * const result = compileContract(declaration);
 * if (!result.ok) {
 *   result.diagnostics.forEach((d) => console.error(formatDiagnostic(d)));
 * }
 * ```
 */
export function compileContract(
  declaration: ContractDeclaration,
  options: CompileOptions = {},
): CompileResult {
  const resolved = resolveOptions(options);
  const sink = new DiagnosticSink();
  const runner = new StageRunner(declaration.ident, resolved.hooks, sink);

  try {
    const compiled = assemble(declaration, runner, sink, resolved);
    return { ok: true, compiled };
  } catch (e) {
    if (e instanceof AbortCompilation) {
      return { ok: false, diagnostics: [...sink.diagnostics] };
    }
    throw e;
  }
}

/**
 * Compile a contract declaration, throwing on failure.
 *
 * @throws CompileError carrying every diagnostic
 */
export function compileContractOrThrow(
  declaration: ContractDeclaration,
  options: CompileOptions = {},
): CompiledContract {
  const result = compileContract(declaration, options);
  if (!result.ok) {
    throw new CompileError(declaration.ident, result.diagnostics);
  }
  return result.compiled;
}

function assemble(
  declaration: ContractDeclaration,
  runner: StageRunner,
  sink: DiagnosticSink,
  options: ResolvedCompileOptions,
): CompiledContract {
  const { meta, name, internal } = runner.run("options", () => {
    if (!declaration.options.ok) {
      directiveParseFailure(sink, declaration.options.failure);
      throw new AbortCompilation();
    }
    const meta = declaration.options.value;
    const internal = meta.internal !== undefined;
    const name = meta.name?.value ?? unraw(declaration.ident);
    if (!internal && isReservedName(name)) {
      reservedName(sink, meta.name?.span ?? declaration.span);
    }
    return { meta, name, internal };
  });

  const registry = runner.run("externalDowncasts", () => {
    const registry = ImplementerRegistry.seed(meta.implementers ?? []);
    registry.applyExternal(meta.externalDowncasts ?? [], sink);
    sink.abortIfDirty();
    return registry;
  });

  const methods = contractMethods(declaration);
  const { fields, downcasts } = runner.run("classify", () => {
    const fields: FieldDefinition[] = [];
    const downcasts: MethodDowncast[] = [];
    for (const method of methods) {
      const classified = classifyMethod(method, internal, sink);
      if (classified?.kind === "field") {
        fields.push(classified.field);
      } else if (classified?.kind === "downcast") {
        downcasts.push(classified.downcast);
      }
    }
    return { fields, downcasts };
  });

  const implementers = runner.run("methodDowncasts", () => {
    registry.applyMethods(downcasts, sink);
    sink.abortIfDirty();
    return registry.definitions();
  });

  const context = runner.run("context", () => resolveContext(meta, fields, implementers));

  const scalar = runner.run("scalar", () => {
    const kind = resolveScalar(meta.scalar?.value, declaration.generics, options);
    return { kind, ...threadScalar(kind, declaration.generics, options) };
  });

  const marking = runner.run("async", () => markAsync(meta.asynchronous !== undefined, methods));

  const dispatch = runner.run("dispatch", () =>
    selectDispatch({
      declaration,
      mode: meta.dispatch,
      implementers,
      scalar: scalar.kind,
      context,
      methods: marking.methods,
    }),
  );

  return runner.run("assemble", () => {
    const compiled: CompiledContract = {
      model: {
        name,
        ident: artifactIdent(declaration.ident, meta.dispatch),
        visibility: declaration.visibility,
        scalar: scalar.kind,
        generics: scalar.generics,
        fields,
        implementers,
      },
      dispatch,
      adaptation: {
        asynchronous: marking.asynchronous,
        bounds: [...scalar.bounds, ...marking.bounds],
        methods: marking.methods,
      },
    };
    if (meta.description) {
      compiled.model.description = meta.description.value;
    }
    if (context !== undefined) {
      compiled.model.context = context;
    }
    return compiled;
  });
}

/**
 * Resolve the contract's context type.
 *
 * The `context` directive wins; otherwise the first context argument of any
 * field, then the context taken by the first downcast method that has one.
 */
export function resolveContext(
  meta: DeclarationOptions,
  fields: FieldDefinition[],
  implementers: ImplementerDefinition[],
): TypeRef | undefined {
  const found =
    meta.context?.value ??
    fieldContext(fields) ??
    implementers.find((i) => i.contextType !== undefined)?.contextType;
  return found === undefined ? undefined : cloneType(found);
}

function fieldContext(fields: FieldDefinition[]): TypeRef | undefined {
  for (const field of fields) {
    for (const argument of field.arguments) {
      if (argument.role === "context") {
        return argument.type;
      }
    }
  }
  return undefined;
}
