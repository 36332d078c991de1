import { describe, it, expect } from "vitest";
import { RequirementTypeError } from "../src/errors.js";
import { DEFAULT_PRIORITY, Resource, ScriptLoading, ScriptRequirement, StyleRequirement } from "../src/requirements.js";

describe("Resource", () => {
  it("renders a preload link", () => {
    expect(new Resource("/f.woff2", "font", "font/woff2").tag).toBe(
      "<link rel='preload' href='/f.woff2' as='font' type='font/woff2' crossorigin='anonymous'/>"
    );
  });

  it("omits the type without a MIME type", () => {
    expect(new Resource("/a.png", "image").tag).toBe("<link rel='preload' href='/a.png' as='image' crossorigin='anonymous'/>");
  });

  it("rejects an unknown content type", () => {
    expect(() => Reflect.construct(Resource, ["/a.mp4", "video"])).toThrow(RequirementTypeError);
  });

  it("is identified by path", () => {
    expect(new Resource("/a.png", "image").sameAsset(new Resource("/a.png", "fetch"))).toBe(true);
  });
});

describe("ScriptRequirement", () => {
  const init = { name: "app", path: "/a.js" };

  it("defaults to priority 50 and async+defer loading", () => {
    const script = new ScriptRequirement(init);
    expect(script.priority).toBe(DEFAULT_PRIORITY);
    expect(script.loadingTechnique).toBe(ScriptLoading.ASYNC_DEFER);
    expect(script.tag).toBe("<script type='text/javascript' src='/a.js' defer async></script>");
  });

  it("derives the tag flags from the loading bits", () => {
    expect(ScriptLoading.DEFER | ScriptLoading.ASYNC).toBe(ScriptLoading.ASYNC_DEFER);
    expect(new ScriptRequirement({ ...init, loadingTechnique: ScriptLoading.NORMAL }).tag).toBe(
      "<script type='text/javascript' src='/a.js'></script>"
    );
    expect(new ScriptRequirement({ ...init, loadingTechnique: ScriptLoading.DEFER }).tag).toBe(
      "<script type='text/javascript' src='/a.js' defer></script>"
    );
    expect(new ScriptRequirement({ ...init, loadingTechnique: ScriptLoading.ASYNC }).tag).toBe(
      "<script type='text/javascript' src='/a.js' async></script>"
    );
  });

  it("splits a preloaded script into a head link and a plain tag", () => {
    const script = new ScriptRequirement({ ...init, loadingTechnique: ScriptLoading.PRELOAD });
    expect(script.isPreloaded).toBe(true);
    expect(script.preloadTag).toBe("<link rel='preload' href='/a.js' as='script'/>");
    expect(script.tag).toBe("<script type='text/javascript' src='/a.js'></script>");
  });

  it("lists the tags of its preload resources", () => {
    const script = new ScriptRequirement({ ...init, preloadResources: [new Resource("/d.json", "fetch")] });
    expect(script.resourceTags).toEqual(["<link rel='preload' href='/d.json' as='fetch' crossorigin='anonymous'/>"]);
  });

  it("validates its arguments", () => {
    const make = (overrides: Record<string, unknown>) => () => Reflect.construct(ScriptRequirement, [{ ...init, ...overrides }]);
    expect(make({ priority: 1.5 })).toThrow("Invalid type for argument 'priority'; expected <integer>; got <number>");
    expect(make({ name: 3 })).toThrow("Invalid type for argument 'name'; expected <string>; got <number>");
    expect(make({ path: null })).toThrow("Invalid type for argument 'path'; expected <string>; got <null>");
    expect(make({ loadingTechnique: 3 })).toThrow("Invalid type for argument 'loadingTechnique'; expected <ScriptLoading>; got <number>");
    expect(make({ preloadResources: "x" })).toThrow("Invalid type for argument 'preloadResources'; expected <Resource[]>; got <string>");
    expect(make({ preloadResources: ["x"] })).toThrow(
      "Invalid list content for argument 'preloadResources'; all items must be <Resource>"
    );
  });

  it("rejects a missing init object", () => {
    expect(() => Reflect.construct(StyleRequirement, [undefined])).toThrow(
      "Invalid type for argument 'init'; expected <RequirementInit>; got <undefined>"
    );
    expect(() => Reflect.construct(ScriptRequirement, ["app"])).toThrow(RequirementTypeError);
  });

  it("throws a TypeError subclass carrying the argument name", () => {
    let caught: unknown;
    try {
      Reflect.construct(ScriptRequirement, [{ ...init, priority: "high" }]);
    } catch (err) {
      caught = err;
    }
    expect(caught).toBeInstanceOf(TypeError);
    expect(caught instanceof RequirementTypeError && caught.argument).toBe("priority");
  });
});

describe("StyleRequirement", () => {
  it("renders a stylesheet link", () => {
    expect(new StyleRequirement({ name: "base", path: "/s.css" }).tag).toBe("<link rel='stylesheet' href='/s.css'/>");
  });

  it("shares identity by path only", () => {
    const a = new StyleRequirement({ name: "a", path: "/s.css" });
    const b = new StyleRequirement({ name: "b", path: "/s.css", priority: 1 });
    expect(a.sameAsset(b)).toBe(true);
  });
});
