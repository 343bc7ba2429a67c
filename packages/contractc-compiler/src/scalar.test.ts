import { describe, it, expect } from "vitest";
import { type GenericParam, pathType } from "@contractc/model";
import { resolveOptions } from "./options.ts";
import { defaultScalar, resolveScalar, scalarParamName, threadScalar } from "./scalar.ts";

const defaults = resolveOptions();
const ownParam: GenericParam[] = [{ kind: "type", name: "S" }];

describe("resolveScalar", () => {
  it("synthesizes a parameter without an override", () => {
    expect(resolveScalar(undefined, [], defaults)).toEqual({
      kind: "implicitGeneric",
      param: "__S",
      default: pathType("DefaultScalarValue"),
    });
  });

  it("binds to the declaration's own parameter", () => {
    expect(resolveScalar(pathType("S"), ownParam, defaults)).toEqual({
      kind: "explicitGeneric",
      param: "S",
    });
  });

  it("treats other overrides as concrete", () => {
    expect(resolveScalar(pathType("S"), [], defaults)).toEqual({ kind: "concrete", type: pathType("S") });
    expect(resolveScalar(pathType("custom::Scalar"), ownParam, defaults)).toEqual({
      kind: "concrete",
      type: pathType("custom::Scalar"),
    });
  });

  it("ignores lifetime parameters of the same name", () => {
    expect(resolveScalar(pathType("a"), [{ kind: "lifetime", name: "a" }], defaults).kind).toBe("concrete");
  });

  it("follows configured names", () => {
    const options = resolveOptions({ scalarParameter: "Payload", defaultScalarType: pathType("Json") });
    expect(resolveScalar(undefined, [], options)).toEqual({
      kind: "implicitGeneric",
      param: "Payload",
      default: pathType("Json"),
    });
  });
});

describe("threadScalar", () => {
  it("appends the synthesized parameter with its default", () => {
    const kind = resolveScalar(undefined, [], defaults);
    const threaded = threadScalar(kind, [{ kind: "lifetime", name: "a" }], defaults);

    expect(threaded.generics).toEqual([
      { kind: "lifetime", name: "a" },
      { kind: "type", name: "__S", default: pathType("DefaultScalarValue") },
    ]);
    expect(threaded.bounds).toEqual([
      { kind: "scalarValue", param: "__S" },
      { kind: "dynValue", scalar: "__S" },
    ]);
  });

  it("leaves explicit generics alone", () => {
    const kind = resolveScalar(pathType("S"), ownParam, defaults);
    const threaded = threadScalar(kind, ownParam, defaults);

    expect(threaded.generics).toEqual(ownParam);
    expect(threaded.bounds).toEqual([
      { kind: "scalarValue", param: "S" },
      { kind: "dynValue", scalar: "S" },
    ]);
  });

  it("defaults the parameter to a concrete payload type", () => {
    const kind = resolveScalar(pathType("MyScalar"), [], defaults);
    const threaded = threadScalar(kind, [], defaults);

    expect(threaded.generics).toEqual([{ kind: "type", name: "__S", default: pathType("MyScalar") }]);
  });
});

describe("scalarParamName and defaultScalar", () => {
  it("name the payload parameter and its default", () => {
    const explicit = resolveScalar(pathType("S"), ownParam, defaults);
    expect(scalarParamName(explicit, defaults)).toBe("S");
    expect(defaultScalar(explicit, defaults)).toEqual(pathType("DefaultScalarValue"));

    const concrete = resolveScalar(pathType("MyScalar"), [], defaults);
    expect(scalarParamName(concrete, defaults)).toBe("__S");
    expect(defaultScalar(concrete, defaults)).toEqual(pathType("MyScalar"));
  });
});
