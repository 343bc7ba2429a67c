// Tests for dispatch selection

import { describe, it, expect } from "vitest";
import {
  type ContractDeclaration,
  type ImplementerDefinition,
  type ScalarParameterKind,
  at,
  contract,
  method,
  pathType,
  spanned,
} from "@contractc/model";
import { type DispatchInput, artifactIdent, selectDispatch } from "./dispatch.ts";

const scalar: ScalarParameterKind = {
  kind: "implicitGeneric",
  param: "__S",
  default: pathType("DefaultScalarValue"),
};

function implementer(name: string): ImplementerDefinition {
  return { type: pathType(name), span: at(1) };
}

function input(declaration: ContractDeclaration, extra: Partial<DispatchInput> = {}): DispatchInput {
  return {
    declaration,
    mode: undefined,
    implementers: [implementer("Human"), implementer("Droid")],
    scalar,
    context: undefined,
    methods: [],
    ...extra,
  };
}

describe("artifactIdent", () => {
  it("derives the union name from the contract", () => {
    expect(artifactIdent("Character", undefined)).toBe("CharacterValue");
    expect(artifactIdent("Character", { mode: "closed" })).toBe("CharacterValue");
  });

  it("uses explicit names", () => {
    expect(artifactIdent("Character", { mode: "closed", name: spanned("AnyCharacter") })).toBe("AnyCharacter");
    expect(artifactIdent("Character", { mode: "open", alias: spanned("DynCharacter") })).toBe("DynCharacter");
  });
});

describe("selectDispatch", () => {
  it("builds a closed union by default", () => {
    const artifact = selectDispatch(input(contract("Character")));

    expect(artifact).toEqual({
      kind: "closed",
      ident: "CharacterValue",
      contract: "Character",
      variants: [
        { tag: "Human", type: pathType("Human") },
        { tag: "Droid", type: pathType("Droid") },
      ],
      associatedTypes: [],
      constants: [],
      methods: [],
    });
  });

  it("numbers variants sharing a bare name", () => {
    const artifact = selectDispatch(
      input(contract("Character"), {
        implementers: [implementer("a::Human"), implementer("b::Human"), implementer("c::Human")],
      }),
    );

    expect(artifact.kind === "closed" && artifact.variants.map((v) => v.tag)).toEqual([
      "Human",
      "Human2",
      "Human3",
    ]);
  });

  it("re-exposes associated types, constants and methods", () => {
    const declaration = contract("Character", {
      items: [
        { kind: "type", ident: "Id", generics: [], span: at(2) },
        { kind: "const", ident: "KIND", type: pathType("str"), span: at(3) },
        method("name", { output: pathType("String") }),
      ],
    });
    const methods = [
      { ident: "name", params: [], output: pathType("String"), isAsync: false, hasDefault: false },
    ];
    const artifact = selectDispatch(input(declaration, { methods }));

    expect(artifact.kind).toBe("closed");
    if (artifact.kind !== "closed") return;
    expect(artifact.associatedTypes).toEqual([{ ident: "Id", generics: [] }]);
    expect(artifact.constants).toEqual([{ ident: "KIND", type: pathType("str") }]);
    expect(artifact.methods).toEqual(methods);
  });

  it("builds an open handle under its alias", () => {
    const artifact = selectDispatch(
      input(contract("Character"), {
        mode: { mode: "open", alias: spanned("DynCharacter") },
        context: pathType("Database"),
      }),
    );

    expect(artifact).toEqual({
      kind: "open",
      ident: "DynCharacter",
      contract: "Character",
      scalar,
      context: pathType("Database"),
    });
  });

  it("leaves the context out of an open handle without one", () => {
    const artifact = selectDispatch(
      input(contract("Character"), { mode: { mode: "open", alias: spanned("DynCharacter") } }),
    );
    expect(artifact).not.toHaveProperty("context");
  });
});
