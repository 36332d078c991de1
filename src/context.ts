import type { ContextData, RenderContext, Resolver } from "./types.js";

const EMPTY: ContextData = Object.freeze({});

export function isPlainObject(value: unknown): value is Record<string, unknown> {
  if (value === null || typeof value !== "object" || Array.isArray(value)) return false;
  const proto = Object.getPrototypeOf(value);
  return proto === Object.prototype || proto === null;
}

export function isResolver(value: unknown): value is Resolver {
  return typeof value === "function";
}

export function createContext(global: ContextData = EMPTY, local: ContextData = EMPTY): RenderContext {
  return { global, local };
}

/**
 * Reads a nested value by dot path: `getPath(data, "user.locale")` is `data.user.locale`.
 * Any segment that is missing, or that lands on something other than a plain object,
 * yields `fallback`.
 */
export function getPath(data: ContextData, path: string, fallback?: unknown): unknown {
  if (typeof path !== "string") {
    throw new TypeError(`Invalid key type: expected string but got ${typeof path}`);
  }
  const segments = path.split(".");
  let current: unknown = data;
  for (const segment of segments) {
    if (!isPlainObject(current) || !Object.prototype.hasOwnProperty.call(current, segment)) return fallback;
    current = current[segment];
  }
  return current;
}

export function hasPath(data: ContextData, path: string) {
  const missing = Symbol("missing");
  return getPath(data, path, missing) !== missing;
}

export function globalVar(path: string, fallback?: unknown): Resolver {
  return (global) => getPath(global, path, fallback);
}

export function localVar(path: string, fallback?: unknown): Resolver {
  return (_global, local) => getPath(local, path, fallback);
}
