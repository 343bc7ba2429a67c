// Implementation-block compiler.
//
// An implementation of a compiled contract must thread the same payload
// parameter through its own signature: the block's generics gain the
// parameter when it is synthesized, and the implemented contract's path gains
// the payload type argument unless the contract binds one of its own
// parameters.

import {
  type CapabilityBound,
  type CompiledImplementation,
  type Diagnostic,
  type GenericParam,
  type ImplementationDeclaration,
  type PathType,
  CompileError,
  clonePath,
  cloneType,
  pathType,
  renderType,
} from "@contractc/model";
import { markAsync } from "./asyncness.ts";
import { StageRunner } from "./compile.ts";
import { AbortCompilation, DiagnosticSink, directiveParseFailure } from "./diagnostics.ts";
import { type CompileOptions, resolveOptions } from "./options.ts";
import { cloneGeneric, resolveScalar } from "./scalar.ts";

export type ImplementationResult =
  | { ok: true; compiled: CompiledImplementation }
  | { ok: false; diagnostics: Diagnostic[] };

/** Compile an implementation block of a contract. */
export function compileImplementation(
  block: ImplementationDeclaration,
  options: CompileOptions = {},
): ImplementationResult {
  const resolved = resolveOptions(options);
  const sink = new DiagnosticSink();
  const runner = new StageRunner(renderType(block.contract), resolved.hooks, sink);

  try {
    const meta = runner.run("options", () => {
      if (!block.options.ok) {
        directiveParseFailure(sink, block.options.failure);
        throw new AbortCompilation();
      }
      return block.options.value;
    });

    const threaded = runner.run("scalar", () => {
      const scalar = resolveScalar(meta.scalar?.value, block.generics, resolved);
      const generics: GenericParam[] = block.generics.map(cloneGeneric);
      const bounds: CapabilityBound[] = [];

      if (scalar.kind === "implicitGeneric") {
        generics.push({ kind: "type", name: scalar.param });
      }
      if (scalar.kind !== "concrete") {
        bounds.push(
          { kind: "scalarValue", param: scalar.param },
          { kind: "shareable", param: scalar.param },
        );
      }

      const contract: PathType = clonePath(block.contract);
      if (scalar.kind !== "explicitGeneric") {
        contract.args.push(scalar.kind === "concrete" ? cloneType(scalar.type) : pathType(scalar.param));
      }
      return { scalar, generics, bounds, contract };
    });

    const marking = runner.run("async", () =>
      markAsync(meta.asynchronous !== undefined, block.methods),
    );

    const compiled = runner.run("assemble", () => ({
      scalar: threaded.scalar,
      generics: threaded.generics,
      contract: threaded.contract,
      bounds: threaded.bounds,
      asynchronous: marking.asynchronous,
      methods: marking.methods,
    }));
    return { ok: true, compiled };
  } catch (e) {
    if (e instanceof AbortCompilation) {
      return { ok: false, diagnostics: [...sink.diagnostics] };
    }
    throw e;
  }
}

/**
 * Compile an implementation block, throwing on failure.
 *
 * @throws CompileError carrying the extractor's failure
 */
export function compileImplementationOrThrow(
  block: ImplementationDeclaration,
  options: CompileOptions = {},
): CompiledImplementation {
  const result = compileImplementation(block, options);
  if (!result.ok) {
    throw new CompileError(renderType(block.contract), result.diagnostics);
  }
  return result.compiled;
}
