import { describe, it, expect } from "vitest";
import { HeaderSet } from "../src/domain/headerSet.js";

describe("HeaderSet", () => {
  it("normalizes keys to lower case on insert and lookup", () => {
    const set = new HeaderSet();
    set.append("WWW-Authenticate", "Bearer realm=api");

    expect(set.keys()).toEqual(["www-authenticate"]);
    expect(set.get("www-AUTHENTICATE")).toEqual(["Bearer realm=api"]);
    expect(set.has("Www-Authenticate")).toBe(true);
  });

  it("keeps every value of a repeated key in insertion order", () => {
    const set = new HeaderSet();
    set.append("x-trace", "a");
    set.append("X-Other", "z");
    set.append("X-TRACE", "b");

    expect(set.get("x-trace")).toEqual(["a", "b"]);
    expect([...set.entries()]).toEqual([
      ["x-trace", "a"],
      ["x-trace", "b"],
      ["x-other", "z"],
    ]);
    expect(set.size).toBe(2);
  });

  it("ignores blank keys", () => {
    const set = new HeaderSet();
    set.append("  ", "value");
    expect(set.isEmpty()).toBe(true);
  });

  it("returns copies so callers cannot mutate stored values", () => {
    const set = HeaderSet.from({ "x-a": "1" });
    set.get("x-a").push("2");
    expect(set.get("x-a")).toEqual(["1"]);
  });

  it("builds from records with single and multiple values", () => {
    const set = HeaderSet.from({ "X-One": "1", "x-many": ["a", "b"] });
    expect(set.toRecord()).toEqual({ "x-one": ["1"], "x-many": ["a", "b"] });
  });

  it("appends another set after existing values", () => {
    const trailers = HeaderSet.from({ "x-shared": "trailer" });
    trailers.appendAll(HeaderSet.from({ "X-Shared": "header", "x-new": "n" }));
    expect(trailers.toRecord()).toEqual({ "x-shared": ["trailer", "header"], "x-new": ["n"] });
  });

  it("clones independently", () => {
    const original = HeaderSet.from({ "x-a": "1" });
    const copy = original.clone();
    copy.append("x-a", "2");
    expect(original.get("x-a")).toEqual(["1"]);
    expect(copy.get("x-a")).toEqual(["1", "2"]);
  });

  it("deletes and clears", () => {
    const set = HeaderSet.from({ "x-a": "1", "x-b": "2" });
    expect(set.delete("X-A")).toBe(true);
    expect(set.keys()).toEqual(["x-b"]);
    set.clear();
    expect(set.isEmpty()).toBe(true);
  });
});
