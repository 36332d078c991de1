import { isPlainObject } from "./context.js";
import { RequirementTypeError } from "./errors.js";
import { tag } from "./tags.js";

export const DEFAULT_PRIORITY = 50;

// Bit flags: DEFER | ASYNC === ASYNC_DEFER.
export const ScriptLoading = {
  NORMAL: 1,
  DEFER: 2,
  ASYNC: 4,
  ASYNC_DEFER: 6,
  PRELOAD: 8
} as const;

export type ScriptLoading = (typeof ScriptLoading)[keyof typeof ScriptLoading];

const LOADING_VALUES = new Set<number>(Object.values(ScriptLoading));

export const RESOURCE_CONTENT_TYPES = ["fetch", "font", "image", "script", "style", "track"] as const;
export type ResourceContentType = (typeof RESOURCE_CONTENT_TYPES)[number];

function isContentType(value: unknown): value is ResourceContentType {
  return RESOURCE_CONTENT_TYPES.some((t) => t === value);
}

export function isScriptLoading(value: unknown): value is ScriptLoading {
  return typeof value === "number" && LOADING_VALUES.has(value);
}

function expectString(argument: string, value: unknown): string {
  if (typeof value !== "string") throw RequirementTypeError.invalidType(argument, "string", value);
  return value;
}

function expectPriority(value: unknown): number {
  if (typeof value !== "number" || !Number.isInteger(value)) {
    throw RequirementTypeError.invalidType("priority", "integer", value);
  }
  return value;
}

export function expectResourceList(argument: string, value: unknown): readonly Resource[] {
  if (!Array.isArray(value)) throw RequirementTypeError.invalidType(argument, "Resource[]", value);
  const out: Resource[] = [];
  for (const item of value) {
    if (!(item instanceof Resource)) throw RequirementTypeError.invalidItems(argument, "Resource");
    out.push(item);
  }
  return Object.freeze(out);
}

/** A sub-asset announced to the browser with `<link rel="preload">`. */
export class Resource {
  readonly path: string;
  readonly contentType: ResourceContentType;
  readonly mimeType: string | null;

  constructor(path: string, contentType: ResourceContentType, mimeType: string | null = null) {
    this.path = expectString("path", path);
    if (!isContentType(contentType)) {
      throw RequirementTypeError.invalidType("contentType", RESOURCE_CONTENT_TYPES.join(" | "), contentType);
    }
    this.contentType = contentType;
    if (mimeType !== null && mimeType !== undefined && typeof mimeType !== "string") {
      throw RequirementTypeError.invalidType("mimeType", "string | null", mimeType);
    }
    this.mimeType = mimeType ?? null;
  }

  sameAsset(other: { path: string }) {
    return this.path === other.path;
  }

  get tag(): string {
    return tag("link", {
      attrs: {
        rel: "preload",
        href: this.path,
        as: this.contentType,
        type: this.mimeType,
        crossorigin: "anonymous"
      }
    }).render();
  }

  toString() {
    return `Resource(path='${this.path}', contentType='${this.contentType}')`;
  }
}

export interface RequirementInit {
  name: string;
  path: string;
  priority?: number;
  preloadResources?: readonly Resource[];
}

export interface ScriptRequirementInit extends RequirementInit {
  loadingTechnique?: ScriptLoading;
}

export abstract class Requirement {
  readonly name: string;
  readonly path: string;
  readonly priority: number;
  readonly preloadResources: readonly Resource[];

  constructor(init: RequirementInit) {
    if (!isPlainObject(init)) throw RequirementTypeError.invalidType("init", "RequirementInit", init);
    this.name = expectString("name", init.name);
    this.path = expectString("path", init.path);
    this.priority = expectPriority(init.priority ?? DEFAULT_PRIORITY);
    this.preloadResources = expectResourceList("preloadResources", init.preloadResources ?? []);
  }

  abstract get tag(): string;

  sameAsset(other: { path: string }) {
    return this.path === other.path;
  }

  get resourceTags(): string[] {
    return this.preloadResources.map((r) => r.tag);
  }
}

export class ScriptRequirement extends Requirement {
  readonly loadingTechnique: ScriptLoading;

  constructor(init: ScriptRequirementInit) {
    super(init);
    const technique = init.loadingTechnique ?? ScriptLoading.ASYNC_DEFER;
    if (!isScriptLoading(technique)) {
      throw RequirementTypeError.invalidType("loadingTechnique", "ScriptLoading", technique);
    }
    this.loadingTechnique = technique;
  }

  get isPreloaded() {
    return this.loadingTechnique === ScriptLoading.PRELOAD;
  }

  get tag(): string {
    return tag("script", {
      attrs: {
        src: this.path,
        defer: (this.loadingTechnique & ScriptLoading.DEFER) !== 0,
        async: (this.loadingTechnique & ScriptLoading.ASYNC) !== 0
      }
    }).render();
  }

  // Head half of a PRELOAD script; `tag` goes at the end of the body.
  get preloadTag(): string {
    return tag("link", { attrs: { rel: "preload", href: this.path, as: "script" } }).render();
  }

  toString() {
    return `ScriptRequirement(name='${this.name}', path='${this.path}', priority=${this.priority}, loading=${this.loadingTechnique})`;
  }
}

export class StyleRequirement extends Requirement {
  get tag(): string {
    return tag("link", { attrs: { rel: "stylesheet", href: this.path } }).render();
  }

  toString() {
    return `StyleRequirement(name='${this.name}', path='${this.path}', priority=${this.priority})`;
  }
}
