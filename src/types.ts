export type ContextData = Readonly<Record<string, unknown>>;

export interface RenderContext {
  global: ContextData;
  local: ContextData;
}

// Called at render time with the page-wide and node-local data.
export type Resolver<T = unknown> = (global: ContextData, local: ContextData) => T;

export type NodeKind = "element" | "page" | "json" | "raw";

export type AttributeValue =
  | string
  | number
  | boolean
  | null
  | undefined
  | Resolver
  | readonly AttributeValue[]
  | AttributeMap;

export interface AttributeMap {
  readonly [key: string]: AttributeValue;
}

export type JsonValue = string | number | boolean | null | JsonValue[] | { [key: string]: JsonValue };

export interface RenderOptions {
  indent?: number;
  whitespaceSensitive?: boolean;
  indentSize?: number;
}

export interface Diagnostic {
  code: string;
  message: string;
  path: string;
  severity: "error" | "warn" | "info";
}
