import { encodeAttributes, escapeHtml } from "./attributes.js";
import { createContext, getPath, hasPath, isPlainObject, isResolver } from "./context.js";
import { HtmlContextKeyError, HtmlStructuralError } from "./errors.js";
import type { AttributeMap, AttributeValue, JsonValue, NodeKind, RenderContext, RenderOptions, Resolver } from "./types.js";

export const INDENT = 2;

export abstract class HtmlNode {
  abstract readonly kind: NodeKind;
  abstract render(context?: Partial<RenderContext>, opts?: RenderOptions): string;
  abstract clone(): HtmlNode;

  toString() {
    return this.render();
  }
}

export type Child = HtmlNode | string | number | null | undefined | Resolver | readonly Child[];

export interface ElementOverrides {
  children?: readonly Child[];
  attrs?: AttributeMap;
  data?: AttributeMap;
  escapeContent?: boolean;
  whitespaceSensitive?: boolean;
}

export interface ElementInit extends ElementOverrides {
  tag: string;
  selfClosing?: boolean;
}

interface ResolvedOptions {
  indent: number;
  indentSize: number;
  whitespaceSensitive: boolean;
}

// ---- child rendering ----

function resolveOptions(opts: RenderOptions = {}): ResolvedOptions {
  return {
    indent: Math.max(0, opts.indent ?? 0),
    indentSize: Math.max(0, opts.indentSize ?? INDENT),
    whitespaceSensitive: !!opts.whitespaceSensitive
  };
}

export function indentLines(text: string, indent: number) {
  if (indent <= 0) return text;
  const pad = " ".repeat(indent);
  let out = "";
  let start = 0;
  while (start < text.length) {
    const nl = text.indexOf("\n", start);
    const end = nl < 0 ? text.length : nl + 1;
    out += pad + text.slice(start, end);
    start = end;
  }
  return out;
}

export function renderChild(item: unknown, context: RenderContext, opts: RenderOptions = {}): string {
  const o = resolveOptions(opts);
  if (item instanceof HtmlNode) return item.render(context, o);
  if (isResolver(item)) return renderChild(item(context.global, context.local), context, o);
  if (Array.isArray(item)) return renderChildren(item, context, o);
  if (item === null || item === undefined) return "";
  return indentLines(String(item), o.whitespaceSensitive ? 0 : o.indent);
}

export function renderChildren(items: readonly unknown[], context: RenderContext, opts: RenderOptions = {}): string {
  const o = resolveOptions(opts);
  // null and undefined leave no blank line behind
  return items
    .map((item) => renderChild(item, context, o))
    .filter((text) => text !== "")
    .join(o.whitespaceSensitive ? "" : "\n");
}

// ---- deep copies ----

function isChildList(child: Child): child is readonly Child[] {
  return Array.isArray(child);
}

function isAttributeList(value: AttributeValue): value is readonly AttributeValue[] {
  return Array.isArray(value);
}

function isAttributeMap(value: AttributeValue): value is AttributeMap {
  return isPlainObject(value);
}

export function cloneChild(child: Child): Child {
  if (child instanceof HtmlNode) return child.clone();
  if (isChildList(child)) return Object.freeze(child.map(cloneChild));
  return child;
}

function copyAttributeValue(value: AttributeValue): AttributeValue {
  if (isAttributeList(value)) return Object.freeze(value.map(copyAttributeValue));
  if (isAttributeMap(value)) return copyAttributes(value);
  return value;
}

export function copyAttributes(attrs: AttributeMap): AttributeMap {
  const out: Record<string, AttributeValue> = {};
  for (const key of Object.keys(attrs)) out[key] = copyAttributeValue(attrs[key]);
  return Object.freeze(out);
}

// ---- elements ----

function mergeOverrides(node: Element, overrides: ElementOverrides): ElementOverrides {
  return {
    children: overrides.children ?? node.children,
    attrs: overrides.attrs ?? node.attrs,
    data: overrides.data ?? node.data,
    escapeContent: overrides.escapeContent ?? node.escapeContent,
    whitespaceSensitive: overrides.whitespaceSensitive ?? node.whitespaceSensitive
  };
}

/**
 * One tag occurrence. Nodes are immutable: every collection is copied and frozen when the
 * node is built, and `withOverrides` hands back an independent deep copy, so a template
 * declared once at module scope can be reused by any number of concurrent renders.
 */
export class Element extends HtmlNode {
  readonly kind: NodeKind = "element";
  readonly tag: string;
  readonly children: readonly Child[];
  readonly attrs: AttributeMap;
  readonly data: AttributeMap;
  readonly selfClosing: boolean;
  readonly escapeContent: boolean;
  readonly whitespaceSensitive: boolean;

  constructor(init: ElementInit) {
    super();
    const children = init.children ?? [];
    if (init.selfClosing && children.length > 0) {
      throw new HtmlStructuralError(`Self-closing tag <${init.tag}> can't have children`);
    }
    this.tag = init.tag;
    this.children = Object.freeze(children.map(cloneChild));
    this.attrs = copyAttributes(init.attrs ?? {});
    this.data = copyAttributes(init.data ?? {});
    this.selfClosing = !!init.selfClosing;
    this.escapeContent = !!init.escapeContent;
    this.whitespaceSensitive = !!init.whitespaceSensitive;
  }

  withOverrides(overrides: ElementOverrides = {}): Element {
    return new Element({ tag: this.tag, selfClosing: this.selfClosing, ...mergeOverrides(this, overrides) });
  }

  clone(): Element {
    return this.withOverrides();
  }

  render(context: Partial<RenderContext> = {}, opts: RenderOptions = {}): string {
    return this.renderWith(this.children, createContext(context.global, context.local), resolveOptions(opts));
  }

  protected renderAttributes(context: RenderContext) {
    const attrs = encodeAttributes(this.attrs, { context });
    const data = encodeAttributes(this.data, { context, dataAttribute: true });
    return (attrs ? " " + attrs : "") + (data ? " " + data : "");
  }

  protected renderWith(children: readonly Child[], context: RenderContext, o: ResolvedOptions) {
    // sensitivity only switches on going down the tree
    const sensitive = o.whitespaceSensitive || this.whitespaceSensitive;
    const pad = o.whitespaceSensitive ? "" : " ".repeat(o.indent);
    const head = this.tag + this.renderAttributes(context);
    if (this.selfClosing) return `${pad}<${head}/>`;

    let content = "";
    if (children.length > 0) {
      const inner = renderChildren(children, context, {
        indent: o.indent + o.indentSize,
        indentSize: o.indentSize,
        whitespaceSensitive: sensitive
      });
      if (inner !== "") content = sensitive ? inner : `\n${inner}\n`;
    }
    // escaped as one block, after the children have been rendered
    if (this.escapeContent) content = escapeHtml(content);
    return `${pad}<${head}>${content}${sensitive || content === "" ? "" : pad}</${this.tag}>`;
  }
}

export type PageInit = ElementOverrides;

export class Page extends Element {
  override readonly kind: NodeKind = "page";

  constructor(init: PageInit = {}) {
    super({ ...init, tag: "html", selfClosing: false });
  }

  override withOverrides(overrides: ElementOverrides = {}): Page {
    return new Page(mergeOverrides(this, overrides));
  }

  override clone(): Page {
    return this.withOverrides();
  }

  override render(context: Partial<RenderContext> = {}, opts: RenderOptions = {}): string {
    return "<!DOCTYPE html>\n" + super.render(context, opts);
  }
}

// ---- JSON islands ----

export type JsonSource = JsonValue | Resolver;
export type JsonReplacer = (key: string, value: unknown) => unknown;

export interface JsonDataOverrides {
  json?: JsonSource;
  attrs?: AttributeMap;
  data?: AttributeMap;
}

export interface JsonDataInit extends JsonDataOverrides {
  json: JsonSource;
  replacer?: JsonReplacer;
  space?: string | number;
}

export function serializeJson(value: unknown, replacer?: JsonReplacer, space?: string | number): string {
  if (typeof value === "string") {
    try {
      JSON.parse(value);
    } catch (cause) {
      throw new HtmlStructuralError("JsonData content is not a valid JSON string", { cause });
    }
    return value;
  }
  let out: string | undefined;
  try {
    out = JSON.stringify(value, replacer, space);
  } catch (cause) {
    throw new HtmlStructuralError("JsonData content is not JSON serializable", { cause });
  }
  if (out === undefined) throw new HtmlStructuralError("JsonData content is not JSON serializable");
  return out;
}

/** `<script type="application/json">` holding a validated JSON payload. */
export class JsonData extends Element {
  override readonly kind: NodeKind = "json";
  readonly json: JsonSource;
  readonly replacer: JsonReplacer | undefined;
  readonly space: string | number | undefined;

  constructor(init: JsonDataInit) {
    super({ tag: "script", attrs: { type: "application/json", ...init.attrs }, data: init.data });
    if (!isResolver(init.json)) serializeJson(init.json, init.replacer, init.space);
    this.json = init.json;
    this.replacer = init.replacer;
    this.space = init.space;
  }

  // the payload is set through `json` only
  override withOverrides(overrides: JsonDataOverrides & ElementOverrides = {}): JsonData {
    if (overrides.children !== undefined || overrides.escapeContent !== undefined || overrides.whitespaceSensitive !== undefined) {
      throw new HtmlStructuralError("JsonData takes only json, attrs and data overrides");
    }
    return new JsonData({
      json: overrides.json !== undefined ? overrides.json : this.json,
      attrs: overrides.attrs ?? this.attrs,
      data: overrides.data ?? this.data,
      replacer: this.replacer,
      space: this.space
    });
  }

  override clone(): JsonData {
    return this.withOverrides();
  }

  override render(context: Partial<RenderContext> = {}, opts: RenderOptions = {}): string {
    const ctx = createContext(context.global, context.local);
    const value = isResolver(this.json) ? this.json(ctx.global, ctx.local) : this.json;
    return this.renderWith([serializeJson(value, this.replacer, this.space)], ctx, resolveOptions(opts));
  }
}

// ---- raw text ----

export type RawPart = string | number | Resolver;

export interface RawOverrides {
  parts?: readonly RawPart[];
  separator?: string;
  escapeContent?: boolean;
  whitespaceSensitive?: boolean;
  formatContent?: boolean;
}

const PLACEHOLDER = /\{\{|\}\}|\{([^{}]*)\}/g;

/**
 * Substitutes `{global.path}` and `{local.path}` placeholders; `{{` and `}}` stand for
 * literal braces.
 */
export function formatWithContext(text: string, context: RenderContext) {
  return text.replace(PLACEHOLDER, (match, expr: string | undefined) => {
    if (match === "{{") return "{";
    if (match === "}}") return "}";
    const key = (expr ?? "").trim();
    const dot = key.indexOf(".");
    const root = dot < 0 ? key : key.slice(0, dot);
    const path = dot < 0 ? "" : key.slice(dot + 1);
    const data = root === "global" ? context.global : root === "local" ? context.local : null;
    if (!data || !path || !hasPath(data, path)) throw new HtmlContextKeyError(key);
    return String(getPath(data, path));
  });
}

/** Hand-written markup: strings and resolvers joined by `separator`, never tree nodes. */
export class Raw extends HtmlNode {
  readonly kind: NodeKind = "raw";
  readonly parts: readonly RawPart[];
  readonly separator: string;
  readonly escapeContent: boolean;
  readonly whitespaceSensitive: boolean;
  readonly formatContent: boolean;

  constructor(init: RawOverrides = {}) {
    super();
    const parts = init.parts ?? [];
    parts.forEach((part, index) => assertRawPart(part, index));
    this.parts = Object.freeze([...parts]);
    this.separator = init.separator ?? "";
    this.escapeContent = !!init.escapeContent;
    this.whitespaceSensitive = !!init.whitespaceSensitive;
    this.formatContent = !!init.formatContent;
  }

  withOverrides(overrides: RawOverrides = {}): Raw {
    return new Raw({
      parts: overrides.parts ?? this.parts,
      separator: overrides.separator ?? this.separator,
      escapeContent: overrides.escapeContent ?? this.escapeContent,
      whitespaceSensitive: overrides.whitespaceSensitive ?? this.whitespaceSensitive,
      formatContent: overrides.formatContent ?? this.formatContent
    });
  }

  clone(): Raw {
    return this.withOverrides();
  }

  render(context: Partial<RenderContext> = {}, opts: RenderOptions = {}): string {
    const ctx = createContext(context.global, context.local);
    const o = resolveOptions(opts);
    const pieces = this.parts.map((part, index) => {
      assertRawPart(part, index);
      if (!isResolver(part)) return String(part);
      const value = part(ctx.global, ctx.local);
      if (typeof value !== "string") {
        throw new HtmlStructuralError(`Non-string value returned by resolver in part ${index}`);
      }
      return value;
    });
    let text = pieces.join(this.separator);
    if (this.formatContent) text = formatWithContext(text, ctx);
    if (this.escapeContent) text = escapeHtml(text);
    const sensitive = o.whitespaceSensitive || this.whitespaceSensitive;
    return indentLines(text, sensitive ? 0 : o.indent);
  }
}

function assertRawPart(part: unknown, index: number) {
  if (part instanceof HtmlNode) {
    throw new HtmlStructuralError(`Can't render tree nodes inside Raw content (part ${index})`);
  }
}
