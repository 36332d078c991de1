import { RequirementTypeError } from "./errors.js";
import { expectResourceList, Resource, ScriptRequirement, StyleRequirement } from "./requirements.js";
import type { Requirement } from "./requirements.js";
import type { Diagnostic } from "./types.js";

export interface PageResourceOptions {
  onDiagnostic?: (d: Diagnostic) => void;
}

export interface PageTags {
  head: string[];
  bodyEnd: string[];
}

function expectList<T>(argument: string, value: unknown, ctor: new (...args: never[]) => T, expected: string): T[] {
  if (!Array.isArray(value)) throw RequirementTypeError.invalidType(argument, `${expected}[]`, value);
  const out: T[] = [];
  for (const item of value) {
    if (!(item instanceof ctor)) throw RequirementTypeError.invalidItems(argument, expected);
    out.push(item);
  }
  return out;
}

// Highest priority first; Array#sort is stable, so ties keep insertion order.
function byPriority<T extends Requirement>(items: Iterable<T>): T[] {
  return [...items].sort((a, b) => b.priority - a.priority);
}

/**
 * Collects the script, style and preload declarations of every component on a page and
 * keeps exactly one entry per asset path.
 *
 * When the same path is declared twice, the declaration with the strictly higher priority
 * replaces the stored one; on a tie the first one stays. The incoming declaration's preload
 * resources are merged either way, overwriting colliding resources only when it won.
 */
export class PageResourceData {
  private readonly resourceMap = new Map<string, Resource>();
  private readonly styleMap = new Map<string, StyleRequirement>();
  private readonly scriptMap = new Map<string, ScriptRequirement>();
  private readonly onDiagnostic: ((d: Diagnostic) => void) | undefined;
  readonly diagnostics: Diagnostic[] = [];

  constructor(opts: PageResourceOptions = {}) {
    this.onDiagnostic = opts.onDiagnostic;
  }

  get resourcePreload(): Resource[] { return [...this.resourceMap.values()]; }
  get styleRequirements(): StyleRequirement[] { return [...this.styleMap.values()]; }
  get scriptRequirements(): ScriptRequirement[] { return [...this.scriptMap.values()]; }

  // ---- scripts ----

  addScript(script: ScriptRequirement): void {
    if (!(script instanceof ScriptRequirement)) {
      throw RequirementTypeError.invalidType("scriptRequirement", "ScriptRequirement", script);
    }
    this.upsert(this.scriptMap, script, "SCRIPT");
  }

  addScriptList(scripts: readonly ScriptRequirement[]): void {
    for (const s of expectList("scriptRequirementList", scripts, ScriptRequirement, "ScriptRequirement")) this.addScript(s);
  }

  // ---- stylesheets ----

  addStyle(style: StyleRequirement): void {
    if (!(style instanceof StyleRequirement)) {
      throw RequirementTypeError.invalidType("styleRequirement", "StyleRequirement", style);
    }
    this.upsert(this.styleMap, style, "STYLE");
  }

  addStyleList(styles: readonly StyleRequirement[]): void {
    for (const s of expectList("styleRequirementList", styles, StyleRequirement, "StyleRequirement")) this.addStyle(s);
  }

  // ---- preload resources ----

  addResource(resource: Resource, overwrite = false): void {
    if (!(resource instanceof Resource)) {
      throw RequirementTypeError.invalidType("resource", "Resource", resource);
    }
    const current = this.resourceMap.get(resource.path);
    if (current && current !== resource) {
      this.report(
        "W_DUPLICATE_RESOURCE",
        overwrite ? `Preload resource '${resource.path}' replaced` : `Preload resource '${resource.path}' already declared; keeping the first`,
        resource.path,
        "warn"
      );
    }
    if (!current || overwrite) this.resourceMap.set(resource.path, resource);
  }

  addResourceList(resources: readonly Resource[], overwrite = false): void {
    for (const r of expectResourceList("resourceList", resources)) this.addResource(r, overwrite);
  }

  // ---- ordered output ----

  get stylesheets(): StyleRequirement[] { return byPriority(this.styleMap.values()); }
  get headScripts(): ScriptRequirement[] { return byPriority(this.scriptMap.values()).filter((s) => !s.isPreloaded); }
  get preloadedScripts(): ScriptRequirement[] { return byPriority(this.scriptMap.values()).filter((s) => s.isPreloaded); }

  /**
   * Tags in document order: preloads, stylesheets, preload links of PRELOAD scripts and the
   * remaining script tags go in the head; the PRELOAD scripts themselves close the body.
   */
  renderTags(): PageTags {
    return {
      head: [
        ...this.resourcePreload.map((r) => r.tag),
        ...this.stylesheets.map((s) => s.tag),
        ...this.preloadedScripts.map((s) => s.preloadTag),
        ...this.headScripts.map((s) => s.tag)
      ],
      bodyEnd: this.preloadedScripts.map((s) => s.tag)
    };
  }

  private upsert<T extends Requirement>(store: Map<string, T>, incoming: T, kind: "SCRIPT" | "STYLE") {
    const current = store.get(incoming.path);
    if (!current) {
      store.set(incoming.path, incoming);
      this.addResourceList(incoming.preloadResources);
      return;
    }
    const wins = incoming.priority > current.priority;
    if (wins) {
      store.set(incoming.path, incoming);
      this.report(`I_REPLACED_${kind}`, `'${incoming.path}' now declared by '${incoming.name}' (priority ${current.priority} -> ${incoming.priority})`, incoming.path, "info");
    } else if (current !== incoming) {
      this.report(`W_DUPLICATE_${kind}`, `'${incoming.path}' already declared by '${current.name}' with priority ${current.priority}`, incoming.path, "warn");
    }
    this.addResourceList(incoming.preloadResources, wins);
  }

  private report(code: string, message: string, path: string, severity: Diagnostic["severity"]) {
    const d: Diagnostic = { code, message, path, severity };
    this.diagnostics.push(d);
    this.onDiagnostic?.(d);
  }
}
