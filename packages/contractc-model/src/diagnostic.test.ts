// Tests for diagnostics and CompileError

import { describe, it, expect } from "vitest";
import { type Diagnostic, CompileError, DiagnosticCode, formatDiagnostic } from "./diagnostic.ts";

const receiver: Diagnostic = {
  code: DiagnosticCode.INVALID_RECEIVER_SHAPE,
  message: "contract method receiver can only be a shared reference `&self`",
  span: { line: 4, column: 12 },
  notes: [],
};

const conflict: Diagnostic = {
  code: DiagnosticCode.DUPLICATE_DOWNCAST_BINDING,
  message: "contract method `as_human` conflicts",
  span: { line: 9, column: 5 },
  notes: ["use the `ignore` directive"],
  related: { message: "declared here", span: { line: 2, column: 3 } },
};

describe("formatDiagnostic", () => {
  it("formats location, code and message", () => {
    expect(formatDiagnostic(receiver)).toBe(
      "4:12: invalid-receiver-shape: contract method receiver can only be a shared reference `&self`",
    );
  });

  it("adds related locations and notes", () => {
    expect(formatDiagnostic(conflict)).toBe(
      [
        "9:5: duplicate-downcast-binding: contract method `as_human` conflicts",
        "  2:3: declared here",
        "  = note: use the `ignore` directive",
      ].join("\n"),
    );
  });
});

describe("CompileError", () => {
  it("summarizes every diagnostic", () => {
    const error = new CompileError("Character", [receiver, conflict]);

    expect(error).toBeInstanceOf(Error);
    expect(error.name).toBe("CompileError");
    expect(error.diagnostics).toHaveLength(2);
    expect(error.message.split("\n")[0]).toBe(
      "could not compile contract `Character` due to 2 errors",
    );
  });

  it("uses the singular for one diagnostic", () => {
    const error = new CompileError("Character", [receiver]);
    expect(error.message.split("\n")[0]).toBe("could not compile contract `Character` due to 1 error");
  });

  it("checks for diagnostic codes", () => {
    const error = new CompileError("Character", [receiver]);
    expect(error.has(DiagnosticCode.INVALID_RECEIVER_SHAPE)).toBe(true);
    expect(error.has(DiagnosticCode.MISSING_RECEIVER)).toBe(false);
  });
});
