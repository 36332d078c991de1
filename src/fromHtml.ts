import * as parse5 from "parse5";
import type { DefaultTreeAdapterMap } from "parse5";
import { escapeHtml } from "./attributes.js";
import { Element, Raw } from "./element.js";
import type { Child } from "./element.js";
import { HtmlAttributeEncodingError, HtmlStructuralError } from "./errors.js";
import { tag, tagSpec } from "./tags.js";
import type { AttributeValue } from "./types.js";

type P5ChildNode = DefaultTreeAdapterMap["childNode"];
type P5Element = DefaultTreeAdapterMap["element"];

const adapter = parse5.defaultTreeAdapter;

// Elements whose whitespace must reach the output untouched.
const VERBATIM_TAGS = new Set(["pre", "textarea", "script", "style"]);

// Raw text elements: their content is never entity-decoded, so it is re-emitted as is.
// Everything else, RCDATA (textarea, title) included, arrives decoded and is escaped again.
const RAW_TEXT_TAGS = new Set(["script", "style"]);

export interface HtmlImportOptions {
  keepComments?: boolean;
}

// aria-label -> ariaLabel, so that attribute encoding turns it back into aria-label
export function camelizeAttributeName(name: string) {
  const camel = name.replace(/-([a-z])/g, (_m, ch: string) => ch.toUpperCase());
  // mixed-case names (viewBox) would come back hyphenated
  if (camel.includes("-") || /[A-Z]/.test(name)) {
    throw new HtmlAttributeEncodingError(`Attribute name '${name}' cannot be expressed as a camelCase attribute key`, name);
  }
  return camel;
}

function collectAttributes(el: P5Element) {
  const attrs: Record<string, AttributeValue> = {};
  const data: Record<string, AttributeValue> = {};
  for (const a of el.attrs) {
    const value: AttributeValue = a.value === "" ? true : a.value;
    if (a.name.startsWith("data-") && a.name.length > 5) {
      data[camelizeAttributeName(a.name.slice(5))] = value;
    } else {
      attrs[camelizeAttributeName(a.name)] = value;
    }
  }
  return { attrs, data };
}

function childNodesOf(el: P5Element): P5ChildNode[] {
  if (el.tagName === "template") return adapter.getTemplateContent(el).childNodes;
  return el.childNodes;
}

function convertNodes(nodes: P5ChildNode[], verbatim: boolean, rawText: boolean, opts: HtmlImportOptions): Child[] {
  const out: Child[] = [];
  for (const n of nodes) {
    if (adapter.isTextNode(n)) {
      const text = verbatim ? n.value : n.value.trim();
      if (text.length > 0) out.push(rawText ? text : escapeHtml(text));
    } else if (adapter.isCommentNode(n)) {
      if (opts.keepComments) out.push(new Raw({ parts: [`<!--${n.data}-->`] }));
    } else if (adapter.isElementNode(n)) {
      out.push(convertElement(n, verbatim, opts));
    }
  }
  return out;
}

function convertElement(el: P5Element, verbatim: boolean, opts: HtmlImportOptions): Element {
  const name = el.tagName.toLowerCase();
  const entry = tagSpec(name);
  const { attrs, data } = collectAttributes(el);
  const keepText = verbatim || VERBATIM_TAGS.has(name);
  const children = convertNodes(childNodesOf(el), keepText, RAW_TEXT_TAGS.has(name), opts);
  if (!entry) {
    // SVG/MathML and other names outside the table keep their own spelling
    return new Element({ tag: name, attrs, data, children, whitespaceSensitive: keepText });
  }
  // attributes come from the markup only, not from the table's defaults
  return tag(entry.name).withOverrides({
    attrs,
    data,
    children: entry.selfClosing ? [] : children,
    whitespaceSensitive: keepText
  });
}

/**
 * Turns a static HTML fragment into tree nodes that render like any other template.
 * Whitespace-only text between elements is dropped (the renderer lays out its own lines)
 * except inside `pre`, `textarea`, `script` and `style`. Text is re-escaped, so markup that
 * was inert in the source stays inert in the output.
 */
export function htmlToElements(html: string, opts: HtmlImportOptions = {}): Child[] {
  const fragment = parse5.parseFragment(html);
  return convertNodes(fragment.childNodes, false, false, opts);
}

export function htmlToElement(html: string, opts: HtmlImportOptions = {}): Element {
  const nodes = htmlToElements(html, opts);
  const [first] = nodes;
  if (nodes.length !== 1 || !(first instanceof Element)) {
    throw new HtmlStructuralError(`Expected exactly one root element, got ${nodes.length} node(s)`);
  }
  return first;
}
