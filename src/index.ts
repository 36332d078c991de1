export * from "./types.js";
export * from "./errors.js";
export * from "./context.js";
export * from "./attributes.js";
export * from "./element.js";
export * from "./tags.js";
export * from "./fromHtml.js";
export * from "./requirements.js";
export * from "./pageResources.js";
export * from "./components.js";
export * from "./document.js";

// Friendly alias names for public API
export { tag as h } from "./tags.js";
export { htmlToElements as fromHtml } from "./fromHtml.js";
export { assembleDocument as renderDocument } from "./document.js";
