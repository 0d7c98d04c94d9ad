/**
 * Built-in tools barrel export.
 */

import type { ToolDescriptor } from "../types.js";
import { calculatorTool } from "./calculator.js";
import { createSearchDocsTool } from "./search-docs.js";
import { webFetchTool } from "./web-fetch.js";

export { calculatorTool, CALCULATOR_OPERATIONS } from "./calculator.js";
export { createSearchDocsTool, searchDocuments, DEFAULT_DOCS_DIR } from "./search-docs.js";
export type { SearchHit } from "./search-docs.js";
export { webFetchTool, normalizeUrl, SIMULATED_PAGES } from "./web-fetch.js";
export type { SimulatedPage } from "./web-fetch.js";

export interface BuiltinToolOptions {
  /** Directory searched by search_docs. */
  docsDir?: string;
}

/** The demo tool set, in catalog order. */
export function builtinTools(options: BuiltinToolOptions = {}): ToolDescriptor[] {
  return [calculatorTool, createSearchDocsTool(options.docsDir), webFetchTool];
}
