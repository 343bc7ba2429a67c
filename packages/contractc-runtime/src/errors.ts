// Runtime dispatch errors.

export type DispatchErrorKind =
  | "unknownField"
  | "unknownMethod"
  | "unknownImplementer"
  | "unboundImplementer"
  | "missingArgument"
  | "missingExternal"
  | "invalidValue";

/** Error raised when a call cannot be dispatched to an implementer. */
export class DispatchError extends Error {
  constructor(
    public kind: DispatchErrorKind,
    message: string,
  ) {
    super(message);
    this.name = "DispatchError";
  }

  static unknownField(contract: string, field: string): DispatchError {
    return new DispatchError("unknownField", `interface ${contract} has no field \`${field}\``);
  }

  static unknownMethod(implementer: string, method: string): DispatchError {
    return new DispatchError(
      "unknownMethod",
      `implementer ${implementer} provides no method \`${method}\` and the contract has no default`,
    );
  }

  static unknownImplementer(contract: string, implementer: string): DispatchError {
    return new DispatchError(
      "unknownImplementer",
      `${implementer} is not an implementer of interface ${contract}`,
    );
  }

  static unboundImplementer(contract: string, implementer: string): DispatchError {
    return new DispatchError(
      "unboundImplementer",
      `no runtime binding for implementer ${implementer} of interface ${contract}`,
    );
  }

  static missingArgument(field: string, argument: string): DispatchError {
    return new DispatchError(
      "missingArgument",
      `field \`${field}\` requires argument \`${argument}\``,
    );
  }

  static missingExternal(fn: string): DispatchError {
    return new DispatchError("missingExternal", `external downcast function \`${fn}\` is not registered`);
  }

  static invalidValue(implementer: string): DispatchError {
    return new DispatchError("invalidValue", `value is not a ${implementer}`);
  }
}
