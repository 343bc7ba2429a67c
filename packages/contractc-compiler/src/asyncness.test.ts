import { describe, it, expect } from "vitest";
import { destructured, method, param, pathType, unitType } from "@contractc/model";
import { markAsync } from "./asyncness.ts";

const string = pathType("String");

describe("markAsync", () => {
  it("leaves synchronous contracts alone", () => {
    const marking = markAsync(false, [method("name", { output: string })]);

    expect(marking.asynchronous).toBe(false);
    expect(marking.bounds).toEqual([]);
    expect(marking.methods).toEqual([
      { ident: "name", params: [], output: string, isAsync: false, hasDefault: false },
    ]);
  });

  it("makes every method async when one is", () => {
    const marking = markAsync(false, [
      method("name", { output: string }),
      method("friends", { output: pathType("Vec", [string]), isAsync: true }),
    ]);

    expect(marking.asynchronous).toBe(true);
    expect(marking.methods.map((m) => m.isAsync)).toEqual([true, true]);
    expect(marking.bounds).toEqual([]);
  });

  it("honors the asynchronous directive", () => {
    const marking = markAsync(true, [method("name", { output: string })]);

    expect(marking.asynchronous).toBe(true);
    expect(marking.methods[0].isAsync).toBe(true);
  });

  it("requires shareability for default-bodied async methods", () => {
    const marking = markAsync(false, [method("greeting", { output: string, isAsync: true, hasDefault: true })]);
    expect(marking.bounds).toEqual([{ kind: "shareable" }]);
  });

  it("does not require shareability for default-bodied sync methods", () => {
    const marking = markAsync(true, [method("greeting", { output: string, hasDefault: true })]);
    expect(marking.bounds).toEqual([]);
  });

  it("describes parameters and unit outputs", () => {
    const pair = { kind: "tuple" as const, elements: [string, string] };
    const marking = markAsync(false, [
      method("rename", { params: [param("new_name", string), destructured("(a, b)", pair)] }),
    ]);

    expect(marking.methods[0].params).toEqual([
      { name: "new_name", type: string },
      { name: "(a, b)", type: pair },
    ]);
    expect(marking.methods[0].output).toEqual(unitType());
  });
});
