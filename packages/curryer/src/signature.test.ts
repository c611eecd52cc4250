/**
 * Tests for signature.ts - declarations, defaults and the calling convention
 */
import { describe, it, expect } from "vitest";
import { argumentsFor, defaultBindings, defineSignature, withReceiver } from "./signature";
import { MissingArgumentError, SignatureError } from "./errors";

const declaration = {
  name: "f",
  params: ["a", "b", "c", "d", "x", "y", "z"],
  defaults: { x: 5, y: 6, z: 7 },
};

describe("defineSignature()", () => {
  it("builds the parameter model", () => {
    const signature = defineSignature(declaration);

    expect(signature.name).toBe("f");
    expect(signature.params).toEqual(["a", "b", "c", "d", "x", "y", "z"]);
    expect(signature.arity).toBe(7);
    expect(signature.hasReceiver).toBe(false);
    expect(signature.required).toEqual(["a", "b", "c", "d"]);
    expect([...signature.defaults]).toEqual([
      ["x", 5],
      ["y", 6],
      ["z", 7],
    ]);
  });

  it("orders defaults by declaration", () => {
    const signature = defineSignature({ name: "g", params: ["a", "x", "y"], defaults: { y: 2, x: 1 } });
    expect([...signature.defaults.keys()]).toEqual(["x", "y"]);
  });

  it("does not share the declared parameter list", () => {
    const params = ["a", "b"];
    const signature = defineSignature({ params }, "h");
    params.push("c");

    expect(signature.params).toEqual(["a", "b"]);
    expect(Object.isFrozen(signature.params)).toBe(true);
  });

  it("falls back to the given name, then to anonymous", () => {
    expect(defineSignature({ params: [] }, "g").name).toBe("g");
    expect(defineSignature({ params: [] }).name).toBe("anonymous");
    expect(defineSignature({ name: "own", params: [] }, "g").name).toBe("own");
  });

  it("marks a leading this as the receiver", () => {
    const signature = defineSignature({ name: "m", params: ["this", "x"] });
    expect(signature.hasReceiver).toBe(true);
    expect(signature.arity).toBe(2);
    expect(signature.required).toEqual(["this", "x"]);
  });

  it("rejects rest parameters", () => {
    try {
      defineSignature({ name: "d", params: ["a", "...rest"] });
      expect.unreachable("rest parameter accepted");
    } catch (error) {
      expect(error).toBeInstanceOf(SignatureError);
      expect((error as SignatureError).reason).toBe("variadic");
      expect((error as SignatureError).message).toBe("Currying variadic function d() is ambiguous.");
    }
  });

  it("rejects duplicate parameters", () => {
    expect(() => defineSignature({ name: "f", params: ["a", "b", "a"] })).toThrow(
      "Invalid signature for f(): duplicate parameter 'a'"
    );
  });

  it("rejects a receiver that is not first", () => {
    expect(() => defineSignature({ name: "f", params: ["a", "this"] })).toThrow(
      "Invalid signature for f(): 'this' must be the first parameter"
    );
  });

  it("rejects defaults for unknown parameters", () => {
    expect(() => defineSignature({ name: "f", params: ["a"], defaults: { q: 1 } })).toThrow(
      "Invalid signature for f(): default given for unknown parameter 'q'"
    );
  });

  it("rejects a default for the receiver", () => {
    expect(() => defineSignature({ name: "f", params: ["this", "x"], defaults: { this: {} } })).toThrow(
      "Invalid signature for f(): 'this' cannot have a default"
    );
  });

  it("rejects a required parameter after a defaulted one", () => {
    expect(() => defineSignature({ name: "f", params: ["a", "x", "y"], defaults: { x: 1 } })).toThrow(
      "Invalid signature for f(): non-default parameter 'y' follows default parameter"
    );
  });

  it("rejects malformed parameter lists", () => {
    expect(() => defineSignature({ name: "f", params: "ab" } as never)).toThrow(
      "Invalid signature for f(): params must be an array of parameter names"
    );
    expect(() => defineSignature({ name: "f", params: ["a", 3] } as never)).toThrow(
      "Invalid signature for f(): parameter 1 is not a name"
    );
    expect(() => defineSignature({ name: "f", params: ["a", ""] })).toThrow(
      "Invalid signature for f(): parameter 1 is not a name"
    );
  });

  it("rejects a missing declaration", () => {
    expect(() => defineSignature(undefined as never, "f")).toThrow(
      "Invalid signature for f(): expected a declaration object"
    );
  });
});

describe("withReceiver()", () => {
  it("adds a receiver slot in front", () => {
    const signature = withReceiver(defineSignature({ name: "m", params: ["x", "y"], defaults: { y: 1 } }));

    expect(signature.params).toEqual(["this", "x", "y"]);
    expect(signature.hasReceiver).toBe(true);
    expect(signature.arity).toBe(3);
    expect(signature.required).toEqual(["this", "x"]);
  });

  it("keeps a signature that already has one", () => {
    const signature = defineSignature({ name: "m", params: ["this", "x"] });
    expect(withReceiver(signature)).toBe(signature);
  });
});

describe("defaultBindings()", () => {
  it("returns a fresh map of the declared defaults", () => {
    const signature = defineSignature(declaration);
    const bindings = defaultBindings(signature);

    bindings.set("a", 1);
    expect(signature.defaults.has("a")).toBe(false);
    expect(defaultBindings(signature).size).toBe(3);
  });
});

describe("argumentsFor()", () => {
  const signature = defineSignature(declaration);

  it("orders bound values by declaration and fills defaults", () => {
    const bound = new Map<string, unknown>([
      ["d", 4],
      ["a", 1],
      ["c", 3],
      ["b", 2],
      ["y", 60],
    ]);

    expect(argumentsFor(signature, bound)).toEqual({
      receiver: undefined,
      args: [1, 2, 3, 4, 5, 60, 7],
    });
  });

  it("names one missing parameter", () => {
    const bound = new Map<string, unknown>([
      ["a", 1],
      ["b", 2],
      ["c", 3],
    ]);
    expect(() => argumentsFor(signature, bound)).toThrow("f() missing 1 required positional argument: 'd'");
  });

  it("names two missing parameters", () => {
    const bound = new Map<string, unknown>([
      ["a", 1],
      ["b", 2],
    ]);
    expect(() => argumentsFor(signature, bound)).toThrow(
      "f() missing 2 required positional arguments: 'c' and 'd'"
    );
  });

  it("names three or more missing parameters", () => {
    try {
      argumentsFor(signature, new Map([["a", 1]]));
      expect.unreachable("missing parameters accepted");
    } catch (error) {
      expect(error).toBeInstanceOf(MissingArgumentError);
      expect((error as MissingArgumentError).missing).toEqual(["b", "c", "d"]);
      expect((error as MissingArgumentError).message).toBe(
        "f() missing 3 required positional arguments: 'b', 'c', and 'd'"
      );
    }
  });

  it("separates the receiver from the positional arguments", () => {
    const receiver = { id: 1 };
    const method = defineSignature({ name: "m", params: ["this", "x"] });

    expect(
      argumentsFor(
        method,
        new Map<string, unknown>([
          ["x", 2],
          ["this", receiver],
        ])
      )
    ).toEqual({ receiver, args: [2] });
  });
});
