import { describe, it, expect } from "vitest";
import { implementer } from "./binding.ts";
import { DispatchError } from "./errors.ts";

class Human {
  constructor(readonly id: string) {}
}

const human = implementer<Human>({
  type: "Human",
  is: (v): v is Human => v instanceof Human,
  methods: {
    id: (self) => self.id,
    greet: (self, greeting) => `${String(greeting)}, ${self.id}`,
  },
  constants: { KIND: "human" },
});

describe("implementer", () => {
  it("recognizes its values", () => {
    expect(human.matches(new Human("1000"))).toBe(true);
    expect(human.matches({ id: "1000" })).toBe(false);
  });

  it("invokes methods with parameters", () => {
    expect(human.invoke("greet", new Human("1000"), ["Hello"])).toBe("Hello, 1000");
    expect(human.hasMethod("greet")).toBe(true);
    expect(human.hasMethod("fly")).toBe(false);
  });

  it("rejects unknown methods", () => {
    expect(() => human.invoke("fly", new Human("1000"), [])).toThrow(
      "implementer Human provides no method `fly` and the contract has no default",
    );
  });

  it("rejects values of other types", () => {
    try {
      human.invoke("id", { id: "1000" }, []);
      expect.unreachable();
    } catch (e) {
      expect(e).toBeInstanceOf(DispatchError);
      expect(e instanceof DispatchError && e.kind).toBe("invalidValue");
    }
  });

  it("exposes constants", () => {
    expect(human.constant("KIND")).toBe("human");
    expect(human.constant("MISSING")).toBeUndefined();
  });
});
