import { localVar } from "./context.js";
import { Raw } from "./element.js";
import type { HtmlNode } from "./element.js";
import { HtmlContractError } from "./errors.js";
import type { ScriptRequirement, StyleRequirement } from "./requirements.js";
import { tag } from "./tags.js";
import type { ContextData } from "./types.js";

/** Compiled markup plus the assets it needs; deduplication happens later, in PageResourceData. */
export interface HtmlData {
  code: string;
  scriptRequirements: ScriptRequirement[];
  styleRequirements: StyleRequirement[];
}

const CONTAINER_TEMPLATE = tag("div", {}, localVar("children"));
const WRAPPER_TEMPLATE = tag("div", {}, localVar("child"));
const WIDGET_TEMPLATE = tag("span", {}, localVar("text"));
const RAW_WIDGET_TEMPLATE = new Raw({ parts: [localVar("text")] });

/**
 * Root of the component hierarchy. Subclasses set `template` and their requirement lists as
 * field initializers and fill the template's local context in `compileSelf`.
 */
export abstract class BaseComponent {
  protected template: HtmlNode | null = null;
  protected scriptRequirements: readonly ScriptRequirement[] = [];
  protected styleRequirements: readonly StyleRequirement[] = [];

  compile(_global: ContextData = {}): HtmlData {
    throw new HtmlContractError(`${this.constructor.name}.compile() is not implemented`);
  }

  protected renderTemplate(global: ContextData, local: ContextData): string {
    if (!this.template) throw new HtmlContractError(`${this.constructor.name} has no template`);
    return this.template.render({ global, local });
  }
}

/** Any number of children; their code lands in the `children` slot, in order. */
export class BaseContainer extends BaseComponent {
  protected override template: HtmlNode | null = CONTAINER_TEMPLATE;
  protected readonly children: readonly BaseComponent[];

  constructor(children: readonly BaseComponent[]) {
    super();
    this.children = children;
  }

  override compile(global: ContextData = {}): HtmlData {
    const codes: string[] = [];
    const scriptRequirements = [...this.scriptRequirements];
    const styleRequirements = [...this.styleRequirements];
    for (const child of this.children) {
      const compiled = child.compile(global);
      codes.push(compiled.code);
      scriptRequirements.push(...compiled.scriptRequirements);
      styleRequirements.push(...compiled.styleRequirements);
    }
    return { code: this.compileSelf(global, codes), scriptRequirements, styleRequirements };
  }

  protected compileSelf(global: ContextData, childCodes: string[]): string {
    return this.renderTemplate(global, { children: childCodes });
  }
}

/** Exactly one child, placed in the `child` slot. */
export class BaseWrapper extends BaseComponent {
  protected override template: HtmlNode | null = WRAPPER_TEMPLATE;
  protected readonly child: BaseComponent;

  constructor(child: BaseComponent) {
    super();
    this.child = child;
  }

  override compile(global: ContextData = {}): HtmlData {
    const compiled = this.child.compile(global);
    return {
      code: this.compileSelf(global, compiled.code),
      scriptRequirements: [...this.scriptRequirements, ...compiled.scriptRequirements],
      styleRequirements: [...this.styleRequirements, ...compiled.styleRequirements]
    };
  }

  protected compileSelf(global: ContextData, childCode: string): string {
    return this.renderTemplate(global, { child: childCode });
  }
}

/** No children: renders its own data. */
export class BaseWidget extends BaseComponent {
  protected override template: HtmlNode | null = WIDGET_TEMPLATE;
  protected readonly text: string;

  constructor(text = "") {
    super();
    this.text = text;
  }

  override compile(global: ContextData = {}): HtmlData {
    return {
      code: this.compileSelf(global),
      scriptRequirements: [...this.scriptRequirements],
      styleRequirements: [...this.styleRequirements]
    };
  }

  protected compileSelf(global: ContextData): string {
    return this.renderTemplate(global, { text: this.text });
  }
}

/** Ready-made markup that still declares the assets it depends on. */
export class RawWidget extends BaseWidget {
  protected override template: HtmlNode | null = RAW_WIDGET_TEMPLATE;

  constructor(code: string, scriptRequirements: readonly ScriptRequirement[] = [], styleRequirements: readonly StyleRequirement[] = []) {
    super(code);
    this.scriptRequirements = scriptRequirements;
    this.styleRequirements = styleRequirements;
  }
}
