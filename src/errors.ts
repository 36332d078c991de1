export class HtmlError extends Error {
  code: string;
  constructor(message: string, code = "E_HTML", options?: ErrorOptions) {
    super(message, options);
    this.name = "HtmlError";
    this.code = code;
  }
}

export class HtmlStructuralError extends HtmlError {
  constructor(message: string, options?: ErrorOptions) {
    super(message, "E_STRUCTURE", options);
    this.name = "HtmlStructuralError";
  }
}

export class HtmlAttributeEncodingError extends HtmlError {
  attribute: string;
  constructor(message: string, attribute: string) {
    super(message, "E_ATTR_ENCODING");
    this.name = "HtmlAttributeEncodingError";
    this.attribute = attribute;
  }
}

export class HtmlContextKeyError extends HtmlError {
  key: string;
  constructor(key: string) {
    super(`Key '${key}' not found in global/local context`, "E_CONTEXT_KEY");
    this.name = "HtmlContextKeyError";
    this.key = key;
  }
}

export class HtmlContractError extends HtmlError {
  constructor(message: string) {
    super(message, "E_CONTRACT");
    this.name = "HtmlContractError";
  }
}

// Wrong value handed to a requirement/resource constructor or to PageResourceData.
export class RequirementTypeError extends TypeError {
  code = "E_REQUIREMENT_TYPE";
  argument: string;
  constructor(argument: string, message: string) {
    super(message);
    this.name = "RequirementTypeError";
    this.argument = argument;
  }

  static invalidType(argument: string, expected: string, got: unknown) {
    return new RequirementTypeError(argument, `Invalid type for argument '${argument}'; expected <${expected}>; got <${describeType(got)}>`);
  }

  static invalidItems(argument: string, expected: string) {
    return new RequirementTypeError(argument, `Invalid list content for argument '${argument}'; all items must be <${expected}>`);
  }
}

export function describeType(value: unknown): string {
  if (value === null) return "null";
  if (Array.isArray(value)) return "array";
  if (typeof value === "object") {
    const ctor = Object.getPrototypeOf(value)?.constructor;
    return typeof ctor === "function" && ctor.name ? ctor.name : "object";
  }
  return typeof value;
}
