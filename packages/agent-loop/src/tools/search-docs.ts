/**
 * search_docs tool: case-insensitive keyword search over a directory of
 * .txt and .md files.
 */

import { readdir, readFile } from "node:fs/promises";
import path from "node:path";
import { fileURLToPath } from "node:url";
import { ToolError } from "../errors.js";
import type { ToolDescriptor } from "../types.js";
import { numberArg, stringArg } from "./args.js";

/** The sample documents shipped with the package. */
export const DEFAULT_DOCS_DIR = fileURLToPath(new URL("../../docs/", import.meta.url));

const SNIPPET_BEFORE = 50;
const SNIPPET_AFTER = 150;
const SEARCHABLE = new Set([".txt", ".md"]);

export interface SearchHit {
  filename: string;
  snippet: string;
  /** Occurrences of the query in the document. */
  relevance: number;
}

function countOccurrences(haystack: string, needle: string): number {
  let count = 0;
  for (let at = haystack.indexOf(needle); at !== -1; at = haystack.indexOf(needle, at + needle.length)) {
    count += 1;
  }
  return count;
}

/**
 * Search `docsDir`, best match first. Ties keep filename order.
 */
export async function searchDocuments(
  docsDir: string,
  query: string,
  maxResults: number,
): Promise<SearchHit[]> {
  let entries: string[];
  try {
    entries = await readdir(docsDir);
  } catch (error) {
    throw new ToolError(`document directory ${docsDir} is not readable`, { cause: error });
  }

  const needle = query.toLowerCase();
  const hits: SearchHit[] = [];

  for (const filename of entries.sort()) {
    if (!SEARCHABLE.has(path.extname(filename).toLowerCase())) continue;

    const content = await readFile(path.join(docsDir, filename), "utf-8");
    const lower = content.toLowerCase();
    const index = lower.indexOf(needle);
    if (index === -1) continue;

    hits.push({
      filename,
      snippet: content
        .slice(Math.max(0, index - SNIPPET_BEFORE), index + SNIPPET_AFTER)
        .trim(),
      relevance: countOccurrences(lower, needle),
    });
  }

  // Array.prototype.sort is stable, so equal relevance keeps filename order.
  return hits.sort((x, y) => y.relevance - x.relevance).slice(0, maxResults);
}

export function createSearchDocsTool(docsDir: string = DEFAULT_DOCS_DIR): ToolDescriptor {
  return {
    name: "search_docs",
    description: "Searches the local document collection for a keyword or phrase.",
    parameterContract: [
      { name: "query", type: "string", required: true, description: "Text to look for" },
      {
        name: "max_results",
        type: "integer",
        required: false,
        default: 3,
        description: "Maximum number of matching documents to return",
      },
    ],
    capability: async (args) => {
      const query = stringArg(args, "query").trim();
      const maxResults = numberArg(args, "max_results");
      if (query === "") {
        throw new ToolError("query must not be empty");
      }
      if (maxResults < 1) {
        throw new ToolError("max_results must be at least 1");
      }

      const hits = await searchDocuments(docsDir, query, maxResults);
      if (hits.length === 0) {
        throw new ToolError(`no documents found matching "${query}"`);
      }
      return hits;
    },
  };
}
