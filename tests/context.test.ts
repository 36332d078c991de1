import { describe, it, expect } from "vitest";
import { createContext, getPath, globalVar, hasPath, localVar } from "../src/context.js";

describe("getPath", () => {
  const data = { user: { name: "Ada", prefs: { locale: "en" } }, count: 3 };

  it("descends nested objects by dot path", () => {
    expect(getPath(data, "user.prefs.locale")).toBe("en");
    expect(getPath(data, "count")).toBe(3);
  });

  it("returns the fallback for a missing segment", () => {
    expect(getPath(data, "user.email", "n/a")).toBe("n/a");
    expect(getPath(data, "missing")).toBeUndefined();
  });

  it("returns the fallback when a segment lands on a non-object", () => {
    expect(getPath(data, "count.value", 0)).toBe(0);
    expect(getPath(data, "user.name.first", "x")).toBe("x");
  });

  it("rejects a non-string path", () => {
    expect(() => Reflect.apply(getPath, undefined, [data, 42])).toThrow(
      "Invalid key type: expected string but got number"
    );
  });

  it("tells present-but-undefined apart from missing", () => {
    expect(hasPath({ a: { b: undefined } }, "a.b")).toBe(true);
    expect(hasPath({ a: {} }, "a.b")).toBe(false);
  });
});

describe("context resolvers", () => {
  it("globalVar reads the global mapping only", () => {
    const read = globalVar("site.title");
    expect(read({ site: { title: "Home" } }, { site: { title: "Local" } })).toBe("Home");
  });

  it("localVar reads the local mapping and honours the fallback", () => {
    expect(localVar("text")({}, { text: "hi" })).toBe("hi");
    expect(localVar("text", "-")({}, {})).toBe("-");
  });

  it("createContext defaults both mappings to empty objects", () => {
    expect(createContext()).toEqual({ global: {}, local: {} });
    expect(createContext({ a: 1 }).global).toEqual({ a: 1 });
  });
});
