import { describe, expect, it } from "vitest";
import type { JsonValue } from "../types.js";
import { type CompiledPath, compilePath } from "./compile.js";
import { evaluate, locate } from "./select.js";

function path(query: string): CompiledPath {
  const result = compilePath(query);
  if (!result.ok) throw new Error(result.error);
  return result.path;
}

const users: JsonValue = {
  users: [{ name: "Alice" }, { name: "Bob" }],
};

describe("evaluate", () => {
  it("should borrow a single field", () => {
    const doc: JsonValue = { user: { name: "Alice" } };
    expect(evaluate(doc, path("$.user.name"))).toEqual([
      { kind: "borrowed", value: "Alice", location: "$.user.name" },
    ]);
  });

  it("should refer into the document rather than copy", () => {
    const inner = { name: "Alice" };
    const doc: JsonValue = { user: inner };
    const [match] = evaluate(doc, path("$.user"));
    expect(match.kind).toBe("borrowed");
    if (match.kind === "borrowed") {
      expect(match.value).toBe(inner);
    }
  });

  it("should return matches in document order", () => {
    expect(evaluate(users, path("$.users[*].name"))).toEqual([
      { kind: "borrowed", value: "Alice", location: "$.users[0].name" },
      { kind: "borrowed", value: "Bob", location: "$.users[1].name" },
    ]);
  });

  it("should report a missing field on a definite path as absent", () => {
    const doc: JsonValue = { user: { name: "Alice" } };
    expect(evaluate(doc, path("$.user.age"))).toEqual([
      { kind: "absent", location: "$.user.age" },
    ]);
  });

  it("should return nothing for an indefinite path without matches", () => {
    expect(evaluate(users, path("$.users[*].email"))).toEqual([]);
  });

  it("should select the whole document for the bare root", () => {
    expect(evaluate(42, path("$"))).toEqual([
      { kind: "borrowed", value: 42, location: "$" },
    ]);
  });

  it("should not descend into scalar documents", () => {
    expect(evaluate(42, path("$.a"))).toEqual([
      { kind: "absent", location: "$.a" },
    ]);
    expect(evaluate(null, path("$[*]"))).toEqual([]);
  });

  it("should not select inherited properties", () => {
    expect(evaluate({}, path("$.constructor"))).toEqual([
      { kind: "absent", location: "$.constructor" },
    ]);
  });

  it("should select own properties named like prototype members", () => {
    const doc: JsonValue = { constructor: "x" };
    expect(evaluate(doc, path("$.constructor"))).toEqual([
      { kind: "borrowed", value: "x", location: "$.constructor" },
    ]);
  });

  it("should present an array length as a computed value", () => {
    expect(evaluate(users, path("$.users.length"))).toEqual([
      { kind: "synthesized", value: 2 },
    ]);
  });

  it("should walk prototype-named keys as plain data", () => {
    const doc: JsonValue = JSON.parse('{"__proto__":{"x":1},"constructor":2}');
    expect(evaluate(doc, path("$.*"))).toEqual([
      { kind: "borrowed", value: { x: 1 }, location: "$.__proto__" },
      { kind: "borrowed", value: 2, location: "$.constructor" },
    ]);
    expect(evaluate(doc, path("$..x"))).toEqual([
      { kind: "borrowed", value: 1, location: "$.__proto__.x" },
    ]);
  });

  it("should filter with predicates", () => {
    const doc: JsonValue = {
      items: [
        { name: "pen", price: 2 },
        { name: "book", price: 12 },
        { name: "cup", price: 5 },
      ],
    };
    const values = evaluate(doc, path("$.items[?(@.price<10)].name")).map(
      (m) => (m.kind === "borrowed" ? m.value : undefined),
    );
    expect(values).toEqual(["pen", "cup"]);
  });

  it("should find fields at any depth", () => {
    const values = evaluate(users, path("$..name")).map((m) =>
      m.kind === "borrowed" ? m.value : undefined,
    );
    expect(values).toEqual(["Alice", "Bob"]);
  });

  it("should not modify the document", () => {
    const doc: JsonValue = { a: [1, { b: 2 }], c: "d" };
    const before = JSON.stringify(doc);
    evaluate(doc, path("$..*"));
    evaluate(doc, path("$.a[1].b"));
    expect(JSON.stringify(doc)).toBe(before);
  });

  it("should be deterministic", () => {
    const first = evaluate(users, path("$..name"));
    const second = evaluate(users, path("$..name"));
    expect(second).toEqual(first);
  });
});

describe("locate", () => {
  const doc: JsonValue = { users: [{ name: "Alice" }, { name: "Bob" }] };

  it("should follow own members", () => {
    expect(locate(doc, ["users", 1, "name"])).toEqual({
      kind: "member",
      value: "Bob",
    });
  });

  it("should accept canonical index strings on arrays", () => {
    expect(locate([10, 20], ["1"])).toEqual({ kind: "member", value: 20 });
    expect(locate([10, 20], ["01"])).toBeUndefined();
  });

  it("should treat an array length as a computed value", () => {
    expect(locate(doc, ["users", "length"])).toEqual({
      kind: "computed",
      value: 2,
    });
    expect(locate(doc, ["users", "length", "x"])).toBeUndefined();
  });

  it("should reject out-of-range indices", () => {
    expect(locate(doc, ["users", 2])).toBeUndefined();
    expect(locate(doc, ["users", -1])).toBeUndefined();
  });

  it("should reject inherited properties", () => {
    expect(locate({}, ["toString"])).toBeUndefined();
    expect(locate({}, ["__proto__"])).toBeUndefined();
  });

  it("should stop at scalars", () => {
    expect(locate({ a: "text" }, ["a", "length"])).toBeUndefined();
  });
});
