// Runtime bindings of implementer types.
//
// A binding ties an implementer named in a compiled contract to the
// functions implementing the contract's methods for it. Bindings are
// type-erased once built, so a dispatcher can hold any mix of implementers.

import { DispatchError } from "./errors.ts";

/** Implementation of one contract method for `TSelf`. */
export type MethodFn<TSelf> = (self: TSelf, ...params: unknown[]) => unknown;

export interface ImplementerSpec<TSelf> {
  /**
   * The implementer type as the compiled contract renders it,
   * e.g. "Human" or "crate::model::Droid".
   */
  type: string;

  /** Recognize values of this implementer. */
  is(value: unknown): value is TSelf;

  /** Contract methods keyed by method identifier. */
  methods: Record<string, MethodFn<TSelf>>;

  /** Values of the contract's associated constants. */
  constants?: Record<string, unknown>;
}

/** A type-erased implementer binding. */
export interface ImplementerBinding {
  readonly type: string;

  matches(value: unknown): boolean;

  hasMethod(method: string): boolean;

  /**
   * Call a method on `self`.
   *
   * @throws DispatchError if `self` is not a value of this implementer or
   *   the method is not provided
   */
  invoke(method: string, self: unknown, params: unknown[]): unknown;

  /** Value of an associated constant, or undefined when not provided. */
  constant(name: string): unknown;
}

/**
 * Build a binding for an implementer.
 *
 * @example
 * ```typescript
 * const human = implementer({
 *   type: "Human",
 *   is: (v): v is Human => v instanceof Human,
 *   methods: {
 *     id: (self) => self.id,
 *     home_planet: (self) => self.homePlanet,
 *   },
 * });
 * ```
 */
export function implementer<TSelf>(spec: ImplementerSpec<TSelf>): ImplementerBinding {
  const methods = new Map(Object.entries(spec.methods));
  const constants = new Map(Object.entries(spec.constants ?? {}));

  return {
    type: spec.type,

    matches(value: unknown): boolean {
      return spec.is(value);
    },

    hasMethod(method: string): boolean {
      return methods.has(method);
    },

    invoke(method: string, self: unknown, params: unknown[]): unknown {
      const fn = methods.get(method);
      if (fn === undefined) {
        throw DispatchError.unknownMethod(spec.type, method);
      }
      if (!spec.is(self)) {
        throw DispatchError.invalidValue(spec.type);
      }
      return fn(self, ...params);
    },

    constant(name: string): unknown {
      return constants.get(name);
    },
  };
}
