// Runtime dispatch over a compiled contract.
//
// The dispatch artifact picks one of two dispatchers, once, at creation:
// - closed: values are tagged with their variant; membership is fixed to
//   the compiled implementer list
// - open: values are dynamic handles; implementers can be registered at any
//   time, including ones the contract never listed
//
// For an asynchronous contract every field and method call returns a
// Promise, whatever the implementer's function returns.

import {
  type ClosedDispatch,
  type CompiledContract,
  type FieldDefinition,
  type ImplementerDefinition,
  type OpenDispatch,
  lastSegment,
  renderType,
} from "@contractc/model";
import type { ImplementerBinding } from "./binding.ts";
import { DispatchError } from "./errors.ts";

/** Values supplied by the execution engine rather than the client. */
export interface CallEnv {
  context?: unknown;
  executor?: unknown;
}

/** External downcast function: returns the implementer value or null. */
export type DowncastFn = (value: unknown, context?: unknown) => unknown;

/** Default body of a contract method, used when an implementer has none. */
export type DefaultFn = (self: unknown, ...params: unknown[]) => unknown;

export interface DispatcherOptions {
  /** External downcast functions, keyed by the name used in the declaration. */
  externals?: Record<string, DowncastFn>;
  /** Default method bodies supplied by the contract. */
  defaults?: Record<string, DefaultFn>;
}

/** A value of a closed dispatch union. */
export interface Tagged {
  readonly tag: string;
  readonly value: unknown;
}

/** A value behind open dispatch. */
export interface DynHandle {
  readonly implementer: ImplementerBinding;
  readonly value: unknown;
}

// ============================================================================
// Shared call logic
// ============================================================================

/** Field lookup, argument binding and async adaptation for one contract. */
class ContractCalls {
  private fields: Map<string, FieldDefinition>;
  private defaults: Map<string, DefaultFn>;

  constructor(
    readonly compiled: CompiledContract,
    defaults: Record<string, DefaultFn>,
  ) {
    this.fields = new Map(compiled.model.fields.map((f) => [f.name, f]));
    this.defaults = new Map(Object.entries(defaults));
  }

  get contract(): string {
    return this.compiled.model.name;
  }

  field(name: string): FieldDefinition {
    const field = this.fields.get(name);
    if (field === undefined) {
      throw DispatchError.unknownField(this.contract, name);
    }
    return field;
  }

  /** Positional parameters for a field method, in declaration order. */
  params(field: FieldDefinition, args: Record<string, unknown>, env: CallEnv): unknown[] {
    return field.arguments.map((argument) => {
      switch (argument.role) {
        case "context":
          return env.context;
        case "executor":
          return env.executor;
        case "regular":
          if (Object.hasOwn(args, argument.name)) {
            return args[argument.name];
          }
          if (argument.default !== undefined) {
            return argument.default;
          }
          if (argument.type.kind === "path" && lastSegment(argument.type) === "Option") {
            return null;
          }
          throw DispatchError.missingArgument(field.name, argument.name);
      }
    });
  }

  invoke(binding: ImplementerBinding, method: string, self: unknown, params: unknown[]): unknown {
    if (binding.hasMethod(method)) {
      return binding.invoke(method, self, params);
    }
    const fallback = this.defaults.get(method);
    if (fallback === undefined) {
      throw DispatchError.unknownMethod(binding.type, method);
    }
    return fallback(self, ...params);
  }

  /** Run a call, as a Promise when the contract is asynchronous. */
  settle(run: () => unknown): unknown {
    if (!this.compiled.adaptation.asynchronous) {
      return run();
    }
    return new Promise((resolve) => resolve(run()));
  }

  definition(type: string): ImplementerDefinition | undefined {
    return this.compiled.model.implementers.find((i) => renderType(i.type) === type);
  }
}

// ============================================================================
// Closed dispatch
// ============================================================================

export class ClosedDispatcher {
  readonly kind = "closed";
  private calls: ContractCalls;
  private byTag = new Map<string, ImplementerBinding>();

  constructor(
    compiled: CompiledContract,
    readonly artifact: ClosedDispatch,
    bindings: ImplementerBinding[],
    options: DispatcherOptions = {},
  ) {
    this.calls = new ContractCalls(compiled, options.defaults ?? {});

    for (const binding of bindings) {
      if (!artifact.variants.some((v) => renderType(v.type) === binding.type)) {
        throw DispatchError.unknownImplementer(this.calls.contract, binding.type);
      }
    }
    for (const variant of artifact.variants) {
      const type = renderType(variant.type);
      const binding = bindings.find((b) => b.type === type);
      if (binding === undefined) {
        throw DispatchError.unboundImplementer(this.calls.contract, type);
      }
      this.byTag.set(variant.tag, binding);
    }
  }

  get asynchronous(): boolean {
    return this.calls.compiled.adaptation.asynchronous;
  }

  /** Tag a value by the first variant whose binding recognizes it. */
  wrap(value: unknown): Tagged {
    for (const [tag, binding] of this.byTag) {
      if (binding.matches(value)) {
        return { tag, value };
      }
    }
    throw DispatchError.unknownImplementer(this.calls.contract, describe(value));
  }

  /** Build a value of a given variant. */
  variant(tag: string, value: unknown): Tagged {
    const binding = this.binding(tag);
    if (!binding.matches(value)) {
      throw DispatchError.invalidValue(binding.type);
    }
    return { tag, value };
  }

  /** Name of the implementer behind a value. */
  typeName(value: Tagged): string {
    return value.tag;
  }

  resolveField(
    value: Tagged,
    fieldName: string,
    args: Record<string, unknown> = {},
    env: CallEnv = {},
  ): unknown {
    const field = this.calls.field(fieldName);
    const binding = this.binding(value.tag);
    return this.calls.settle(() =>
      this.calls.invoke(binding, field.method, value.value, this.calls.params(field, args, env)),
    );
  }

  /** Delegate any contract method to the variant's implementer. */
  call(value: Tagged, method: string, ...params: unknown[]): unknown {
    if (!this.artifact.methods.some((m) => m.ident === method)) {
      throw DispatchError.unknownMethod(this.artifact.ident, method);
    }
    const binding = this.binding(value.tag);
    return this.calls.settle(() => this.calls.invoke(binding, method, value.value, params));
  }

  /** Delegate an associated constant to the variant's implementer. */
  constant(value: Tagged, name: string): unknown {
    return this.binding(value.tag).constant(name);
  }

  /**
   * Narrow a value to an implementer type.
   *
   * @returns The implementer value, or null when the value is another variant
   * @throws DispatchError if `type` is not a variant of this union
   */
  downcast(value: Tagged, type: string): unknown {
    const variant = this.artifact.variants.find((v) => renderType(v.type) === type);
    if (variant === undefined) {
      throw DispatchError.unknownImplementer(this.calls.contract, type);
    }
    return variant.tag === value.tag ? value.value : null;
  }

  private binding(tag: string): ImplementerBinding {
    const binding = this.byTag.get(tag);
    if (binding === undefined) {
      throw DispatchError.unknownImplementer(this.calls.contract, tag);
    }
    return binding;
  }
}

// ============================================================================
// Open dispatch
// ============================================================================

export class OpenDispatcher {
  readonly kind = "open";
  private calls: ContractCalls;
  private bindings: ImplementerBinding[] = [];
  private externals: Map<string, DowncastFn>;

  constructor(
    compiled: CompiledContract,
    readonly artifact: OpenDispatch,
    bindings: ImplementerBinding[],
    options: DispatcherOptions = {},
  ) {
    this.calls = new ContractCalls(compiled, options.defaults ?? {});
    this.externals = new Map(Object.entries(options.externals ?? {}));
    bindings.forEach((b) => this.register(b));
  }

  get asynchronous(): boolean {
    return this.calls.compiled.adaptation.asynchronous;
  }

  /** Add an implementer. Later registrations of the same type replace earlier ones. */
  register(binding: ImplementerBinding): this {
    this.bindings = this.bindings.filter((b) => b.type !== binding.type);
    this.bindings.push(binding);
    return this;
  }

  /** Wrap a value in a dynamic handle. */
  wrap(value: unknown): DynHandle {
    const implementer = this.bindings.find((b) => b.matches(value));
    if (implementer === undefined) {
      throw DispatchError.unknownImplementer(this.calls.contract, describe(value));
    }
    return { implementer, value };
  }

  typeName(handle: DynHandle): string {
    return handle.implementer.type;
  }

  resolveField(
    handle: DynHandle,
    fieldName: string,
    args: Record<string, unknown> = {},
    env: CallEnv = {},
  ): unknown {
    const field = this.calls.field(fieldName);
    return this.calls.settle(() =>
      this.calls.invoke(
        handle.implementer,
        field.method,
        handle.value,
        this.calls.params(field, args, env),
      ),
    );
  }

  call(handle: DynHandle, method: string, ...params: unknown[]): unknown {
    return this.calls.settle(() =>
      this.calls.invoke(handle.implementer, method, handle.value, params),
    );
  }

  constant(handle: DynHandle, name: string): unknown {
    return handle.implementer.constant(name);
  }

  /**
   * Narrow a handle to an implementer type.
   *
   * Uses the implementer's downcast binding when the contract declares one,
   * and the handle's own implementer otherwise.
   *
   * @returns The implementer value, or null when the handle is not one
   */
  downcast(handle: DynHandle, type: string, context?: unknown): unknown {
    const definition = this.calls.definition(type);
    const downcast = definition?.downcast;

    if (downcast?.kind === "method") {
      const params = downcast.withContext ? [context] : [];
      return this.calls.invoke(handle.implementer, downcast.method, handle.value, params) ?? null;
    }
    if (downcast?.kind === "external") {
      const fn = this.externals.get(downcast.function);
      if (fn === undefined) {
        throw DispatchError.missingExternal(downcast.function);
      }
      return fn(handle.value, context) ?? null;
    }
    return handle.implementer.type === type ? handle.value : null;
  }
}

// ============================================================================
// Creation
// ============================================================================

export type Dispatcher = ClosedDispatcher | OpenDispatcher;

/**
 * Create the dispatcher matching a compiled contract's artifact.
 *
 * @throws DispatchError for a closed artifact whose variants are not all
 *   bound, or a binding that is not one of its variants
 */
export function createDispatcher(
  compiled: CompiledContract,
  bindings: ImplementerBinding[],
  options: DispatcherOptions = {},
): Dispatcher {
  const artifact = compiled.dispatch;
  switch (artifact.kind) {
    case "closed":
      return new ClosedDispatcher(compiled, artifact, bindings, options);
    case "open":
      return new OpenDispatcher(compiled, artifact, bindings, options);
  }
}

function describe(value: unknown): string {
  if (value === null) return "null";
  if (typeof value === "object") {
    return value.constructor?.name ?? "object";
  }
  return typeof value;
}
