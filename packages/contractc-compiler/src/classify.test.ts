// Tests for the method classifier

import { describe, it, expect } from "vitest";
import {
  type MethodDeclaration,
  DiagnosticCode,
  at,
  method,
  param,
  pathType,
  refType,
  spanned,
  unitType,
} from "@contractc/model";
import { classifyMethod } from "./classify.ts";
import { DiagnosticSink } from "./diagnostics.ts";

const human = pathType("Human");
const database = pathType("Database");
const optionOfHuman = pathType("Option", [refType(human)]);

function classify(m: MethodDeclaration, internal = false) {
  const sink = new DiagnosticSink();
  const classified = classifyMethod(m, internal, sink);
  return { classified, diagnostics: sink.diagnostics };
}

describe("fields", () => {
  it("derives the field from the method", () => {
    const { classified, diagnostics } = classify(
      method("home_planet", { output: pathType("String") }),
    );

    expect(diagnostics).toEqual([]);
    expect(classified).toEqual({
      kind: "field",
      field: {
        name: "homePlanet",
        type: pathType("String"),
        arguments: [],
        method: "home_planet",
        isAsync: false,
      },
    });
  });

  it("uses the unit type when there is no output", () => {
    const { classified } = classify(method("touch"));
    expect(classified?.kind === "field" && classified.field.type).toEqual(unitType());
  });

  it("erases lifetimes from the field type", () => {
    const { classified } = classify(
      method("name", { output: refType(pathType("str"), false, "a") }),
    );
    expect(classified?.kind === "field" && classified.field.type).toEqual(
      refType(pathType("str"), false, "_"),
    );
  });

  it("applies name, description and deprecation directives", () => {
    const { classified } = classify(
      method("id", {
        output: pathType("String"),
        options: {
          name: spanned("identifier"),
          description: spanned("Unique id"),
          deprecated: spanned("use `uuid`"),
        },
      }),
    );

    expect(classified).toEqual({
      kind: "field",
      field: {
        name: "identifier",
        type: pathType("String"),
        description: "Unique id",
        deprecated: { reason: "use `uuid`" },
        arguments: [],
        method: "id",
        isAsync: false,
      },
    });
  });

  it("records deprecation without a reason", () => {
    const { classified } = classify(
      method("legacy", { output: pathType("i32"), options: { deprecated: spanned(null) } }),
    );
    expect(classified?.kind === "field" && classified.field.deprecated).toEqual({ reason: null });
  });

  it("resolves field arguments", () => {
    const { classified } = classify(
      method("friends", {
        params: [param("ctx", refType(database)), param("first", pathType("i32"))],
        output: pathType("Vec", [human]),
        isAsync: true,
      }),
    );

    expect(classified?.kind).toBe("field");
    if (classified?.kind !== "field") return;
    expect(classified.field.isAsync).toBe(true);
    expect(classified.field.arguments).toEqual([
      { role: "context", type: database },
      { role: "regular", name: "first", type: pathType("i32") },
    ]);
  });

  it("rejects a mutable receiver at the receiver", () => {
    const { classified, diagnostics } = classify(
      method("name", { receiver: "mutable", output: pathType("String"), span: at(6, 5) }),
    );

    expect(classified).toBeNull();
    expect(diagnostics).toHaveLength(1);
    expect(diagnostics[0].code).toBe(DiagnosticCode.INVALID_RECEIVER_SHAPE);
    expect(diagnostics[0].span).toEqual({ line: 6, column: 5 });
  });

  it("rejects owned and typed receivers", () => {
    for (const receiver of ["owned", "typed"] as const) {
      const { diagnostics } = classify(method("name", { receiver, output: pathType("String") }));
      expect(diagnostics.map((d) => d.code)).toEqual([DiagnosticCode.INVALID_RECEIVER_SHAPE]);
    }
  });

  it("rejects a missing receiver", () => {
    const { classified, diagnostics } = classify(method("create", { receiver: null }));

    expect(classified).toBeNull();
    expect(diagnostics.map((d) => d.code)).toEqual([DiagnosticCode.MISSING_RECEIVER]);
  });

  it("rejects reserved names unless internal", () => {
    const reserved = method("__typename", { output: pathType("String") });

    expect(classify(reserved).diagnostics.map((d) => d.code)).toEqual([
      DiagnosticCode.RESERVED_NAME_PREFIX,
    ]);
    expect(classify(reserved, true).classified?.kind).toBe("field");
  });

  it("reports the renamed field at the name directive", () => {
    const { diagnostics } = classify(
      method("kind", { options: { name: spanned("__kind", at(2, 20)) }, span: at(3, 5) }),
    );
    expect(diagnostics[0].span).toEqual({ line: 2, column: 20 });
  });
});

describe("ignored methods", () => {
  it("skips every check", () => {
    const { classified, diagnostics } = classify(
      method("helper", { receiver: "mutable", options: { ignore: at(1) } }),
    );

    expect(classified).toEqual({ kind: "ignored" });
    expect(diagnostics).toEqual([]);
  });
});

describe("downcasts", () => {
  it("accepts `Option<&T>` with a shared receiver", () => {
    const { classified, diagnostics } = classify(
      method("as_human", { output: optionOfHuman, options: { downcast: at(1) }, span: at(8, 5) }),
    );

    expect(diagnostics).toEqual([]);
    expect(classified).toEqual({
      kind: "downcast",
      downcast: { type: human, method: "as_human", withContext: false, span: { line: 8, column: 5 } },
    });
  });

  it("accepts a context parameter", () => {
    const { classified } = classify(
      method("as_human", {
        params: [param("db", refType(database))],
        output: optionOfHuman,
        options: { downcast: at(1) },
      }),
    );

    expect(classified?.kind === "downcast" && classified.downcast).toMatchObject({
      withContext: true,
      contextType: database,
    });
  });

  it("rejects other outputs", () => {
    const outputs = [
      human,
      pathType("Option", [human]),
      pathType("Option", [refType(human, true)]),
      pathType("Result", [refType(human)]),
    ];
    for (const output of outputs) {
      const { classified, diagnostics } = classify(
        method("as_human", { output, options: { downcast: at(1) } }),
      );
      expect(classified).toBeNull();
      expect(diagnostics.map((d) => d.code)).toEqual([DiagnosticCode.INVALID_DOWNCAST_SIGNATURE]);
    }
  });

  it("rejects a missing output", () => {
    const { diagnostics } = classify(method("as_human", { options: { downcast: at(1) } }));
    expect(diagnostics[0].message).toBe(
      "expects contract method return type to be `Option<&ImplementerType>` only",
    );
  });

  it("rejects extra parameters", () => {
    const { diagnostics } = classify(
      method("as_human", {
        params: [param("db", refType(database)), param("flag", pathType("bool"))],
        output: optionOfHuman,
        options: { downcast: at(1) },
      }),
    );
    expect(diagnostics.map((d) => d.code)).toEqual([DiagnosticCode.INVALID_DOWNCAST_SIGNATURE]);
    expect(diagnostics[0].message).toBe(
      "expects contract method to accept `&self` only and, optionally, `&Context`",
    );
  });

  it("rejects a mutable receiver", () => {
    const { diagnostics } = classify(
      method("as_human", { receiver: "mutable", output: optionOfHuman, options: { downcast: at(1) } }),
    );
    expect(diagnostics.map((d) => d.code)).toEqual([DiagnosticCode.INVALID_DOWNCAST_SIGNATURE]);
  });

  it("rejects async downcasts", () => {
    const { classified, diagnostics } = classify(
      method("as_human", { output: optionOfHuman, isAsync: true, options: { downcast: at(1) } }),
    );

    expect(classified).toBeNull();
    expect(diagnostics.map((d) => d.code)).toEqual([DiagnosticCode.UNSUPPORTED_ASYNC_DOWNCAST]);
  });
});

describe("extractor failures", () => {
  it("are reported as diagnostics", () => {
    const { classified, diagnostics } = classify(
      method("name", { failure: { message: "expected `=`", span: at(2, 9) } }),
    );

    expect(classified).toBeNull();
    expect(diagnostics.map((d) => d.code)).toEqual([DiagnosticCode.DIRECTIVE_PARSE_FAILURE]);
  });
});
