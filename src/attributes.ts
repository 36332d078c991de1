import { isPlainObject, isResolver } from "./context.js";
import { HtmlAttributeEncodingError } from "./errors.js";
import type { AttributeMap, ContextData, RenderContext } from "./types.js";

const ESCAPES: Record<string, string> = {
  "&": "&amp;",
  "<": "&lt;",
  ">": "&gt;",
  "\"": "&quot;",
  "'": "&#x27;"
};

export function escapeHtml(text: string) {
  return String(text).replace(/[&<>"']/g, (ch) => ESCAPES[ch] ?? ch);
}

// helloWorld -> hello-world, following the dataset naming rules
export function encodeAttributeKey(key: string) {
  return key.replace(/(?<=[a-z0-9])([A-Z])/g, (_m, upper: string) => "-" + upper.toLowerCase());
}

export interface EncodeOptions {
  prefix?: string;
  concatenator?: string;
  dataAttribute?: boolean;
  context?: RenderContext;
}

/**
 * Flattens one attribute value into `key='value'` fragments.
 *
 * Objects become `key.sub`, arrays `key.0`, resolvers are called with the context and their
 * result is encoded in turn. `true` gives the bare key; `false`, `null`, `undefined` and
 * values that stringify to nothing are left out, since an empty attribute reads as `true`.
 */
export function encodeAttributeValue(key: string, value: unknown, concatenator = ".", context?: RenderContext): string {
  const global: ContextData = context?.global ?? {};
  const local: ContextData = context?.local ?? {};

  if (isResolver(value)) {
    return encodeAttributeValue(key, value(global, local), concatenator, context);
  }
  if (Array.isArray(value)) {
    return joinFragments(value.map((item, index) =>
      encodeAttributeValue(`${key}${concatenator}${index}`, item, concatenator, context)));
  }
  if (isPlainObject(value)) {
    return joinFragments(Object.keys(value).map((sub) =>
      encodeAttributeValue(`${key}${concatenator}${sub}`, value[sub], concatenator, context)));
  }
  if (typeof value === "boolean") return value ? key : "";
  if (value === null || value === undefined) return "";
  const text = String(value).trim();
  return text ? `${key}='${escapeHtml(text)}'` : "";
}

export function encodeAttributes(attrs: AttributeMap, opts: EncodeOptions = {}): string {
  const concatenator = opts.concatenator ?? ".";
  const out: string[] = [];
  for (const key of Object.keys(attrs)) {
    if (key.includes("-")) {
      throw new HtmlAttributeEncodingError(`Attribute name '${key}' cannot contain hyphens ('-'); use camelCase instead`, key);
    }
    let name = encodeAttributeKey(key);
    if (opts.prefix) name = `${opts.prefix}${concatenator}${name}`;
    if (opts.dataAttribute) name = `data-${name}`;
    const fragment = encodeAttributeValue(name, attrs[key], concatenator, opts.context);
    if (fragment) out.push(fragment);
  }
  return out.join(" ");
}

function joinFragments(fragments: string[]) {
  return fragments.filter(Boolean).join(" ");
}
