// Compiler configuration.

import { type TypeRef, pathType } from "@contractc/model";
import type { CompileHooks } from "./hooks.ts";

export interface CompileOptions {
  /**
   * Name of the synthesized payload parameter. Defaults to "__S".
   * Only used when the declaration does not bind one of its own parameters.
   */
  scalarParameter?: string;

  /**
   * Payload type callers get when they name none.
   * Defaults to `DefaultScalarValue`.
   */
  defaultScalarType?: TypeRef;

  /**
   * Hooks called around every pipeline stage, in order.
   * See `loggingHooks()` for stage logging.
   */
  hooks?: CompileHooks[];
}

export interface ResolvedCompileOptions {
  scalarParameter: string;
  defaultScalarType: TypeRef;
  hooks: CompileHooks[];
}

export const DEFAULT_SCALAR_PARAMETER = "__S";
export const DEFAULT_SCALAR_TYPE = "DefaultScalarValue";

export function resolveOptions(options: CompileOptions = {}): ResolvedCompileOptions {
  return {
    scalarParameter: options.scalarParameter ?? DEFAULT_SCALAR_PARAMETER,
    defaultScalarType: options.defaultScalarType ?? pathType(DEFAULT_SCALAR_TYPE),
    hooks: options.hooks ?? [],
  };
}
