import { readFileSync } from "node:fs";
import { isPlainObject } from "./context.js";
import { Element } from "./element.js";
import type { Child, ElementOverrides } from "./element.js";
import { HtmlStructuralError } from "./errors.js";
import type { AttributeMap } from "./types.js";

export interface TagSpec {
  name: string;
  selfClosing: boolean;
  whitespaceSensitive: boolean;
  defaultAttributes: AttributeMap;
}

// Custom element names must contain a hyphen.
const CUSTOM_ELEMENT = /^[a-z][a-z0-9]*(-[a-z0-9]+)+$/;

interface TagTable {
  elements: string[];
  selfClosing: string[];
  whitespaceSensitive: string[];
  defaultAttributes: Record<string, AttributeMap>;
}

function nameList(table: Record<string, unknown>, field: string): string[] {
  const value = table[field];
  if (!Array.isArray(value)) throw new HtmlStructuralError(`Tag table field '${field}' must be a list`);
  const out: string[] = [];
  for (const item of value) {
    if (typeof item !== "string") throw new HtmlStructuralError(`Tag table field '${field}' must hold tag names`);
    out.push(item);
  }
  return out;
}

function attributeDefaults(value: unknown): Record<string, AttributeMap> {
  if (!isPlainObject(value)) throw new HtmlStructuralError("Tag table field 'defaultAttributes' must be an object");
  const out: Record<string, AttributeMap> = {};
  for (const [name, attrs] of Object.entries(value)) {
    if (!isPlainObject(attrs)) throw new HtmlStructuralError(`Default attributes of <${name}> must be an object`);
    const copy: Record<string, string> = {};
    for (const [key, v] of Object.entries(attrs)) {
      if (typeof v !== "string") throw new HtmlStructuralError(`Default attribute '${key}' of <${name}> must be a string`);
      copy[key] = v;
    }
    out[name] = copy;
  }
  return out;
}

// read beside this module, from src/ under the test runner and dist/ once built
function loadTagTable(): TagTable {
  const raw: unknown = JSON.parse(readFileSync(new URL("./data/html-tags.json", import.meta.url), "utf8"));
  if (!isPlainObject(raw)) throw new HtmlStructuralError("Tag table must be a JSON object");
  return {
    elements: nameList(raw, "elements"),
    selfClosing: nameList(raw, "selfClosing"),
    whitespaceSensitive: nameList(raw, "whitespaceSensitive"),
    defaultAttributes: attributeDefaults(raw.defaultAttributes)
  };
}

const table = loadTagTable();
const SELF_CLOSING = new Set(table.selfClosing);
const WHITESPACE_SENSITIVE = new Set(table.whitespaceSensitive);

const TAGS = new Map<string, TagSpec>();
for (const name of [...table.elements, ...table.selfClosing]) {
  TAGS.set(name, {
    name,
    selfClosing: SELF_CLOSING.has(name),
    whitespaceSensitive: WHITESPACE_SENSITIVE.has(name),
    defaultAttributes: Object.freeze({ ...table.defaultAttributes[name] })
  });
}

export const TAG_NAMES: readonly string[] = Object.freeze([...TAGS.keys()]);

export function tagSpec(name: string): TagSpec | undefined {
  const lower = String(name || "").toLowerCase();
  const known = TAGS.get(lower);
  if (known) return known;
  if (CUSTOM_ELEMENT.test(lower)) {
    return { name: lower, selfClosing: false, whitespaceSensitive: false, defaultAttributes: {} };
  }
  return undefined;
}

export function isKnownTag(name: string) { return tagSpec(name) !== undefined; }
export function isSelfClosingTag(name: string) { return tagSpec(name)?.selfClosing ?? false; }

/**
 * Builds an element from the tag table. The tag's default attributes come first and are
 * overridden by `opts.attrs`; positional children precede `opts.children`.
 *
 * @example
 * const card = tag("div", { attrs: { class: "card" } }, tag("h1", {}, localVar("title")));
 */
export function tag(name: string, opts: ElementOverrides = {}, ...children: Child[]): Element {
  const entry = tagSpec(name);
  if (!entry) throw new HtmlStructuralError(`Unknown tag <${name}>`);
  return new Element({
    tag: entry.name,
    selfClosing: entry.selfClosing,
    children: [...children, ...(opts.children ?? [])],
    attrs: { ...entry.defaultAttributes, ...opts.attrs },
    data: opts.data,
    escapeContent: opts.escapeContent,
    whitespaceSensitive: opts.whitespaceSensitive ?? entry.whitespaceSensitive
  });
}
