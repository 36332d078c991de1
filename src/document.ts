import type { HtmlData } from "./components.js";
import { INDENT } from "./element.js";
import { PageResourceData } from "./pageResources.js";

const DOCTYPE = "<!DOCTYPE html>\n";

export interface AssembleOptions {
  resources?: PageResourceData;
}

/** Feeds a compiled tree's requirements into `resources` (a fresh collector by default). */
export function collectResources(data: HtmlData, resources: PageResourceData = new PageResourceData()): PageResourceData {
  resources.addStyleList(data.styleRequirements);
  resources.addScriptList(data.scriptRequirements);
  return resources;
}

// Puts `tags` on their own lines before the closing tag at `at`, one level deeper than it.
function insertBefore(code: string, at: number, tags: string[]) {
  const lineStart = code.lastIndexOf("\n", at - 1) + 1;
  const lead = code.slice(lineStart, at);
  if (lead.trim() !== "") return code.slice(0, at) + tags.join("") + code.slice(at);
  const pad = lead + " ".repeat(INDENT);
  return code.slice(0, lineStart) + tags.map((t) => `${pad}${t}\n`).join("") + code.slice(lineStart);
}

/**
 * Places the page's resource tags into compiled markup: head tags before the first `</head>`
 * and body-end tags before the last `</body>`. Without those landmarks the head tags are
 * prepended (after a leading doctype) and the body-end tags appended.
 */
export function assembleDocument(data: HtmlData, opts: AssembleOptions = {}): string {
  const { head, bodyEnd } = collectResources(data, opts.resources).renderTags();
  let code = data.code;

  if (head.length > 0) {
    const at = code.indexOf("</head>");
    if (at >= 0) {
      code = insertBefore(code, at, head);
    } else {
      const start = code.startsWith(DOCTYPE) ? DOCTYPE.length : 0;
      code = code.slice(0, start) + head.join("\n") + "\n" + code.slice(start);
    }
  }

  if (bodyEnd.length > 0) {
    const at = code.lastIndexOf("</body>");
    code = at >= 0 ? insertBefore(code, at, bodyEnd) : code + "\n" + bodyEnd.join("\n");
  }
  return code;
}
