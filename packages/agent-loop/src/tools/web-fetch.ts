/**
 * web_fetch tool: returns part of a page from a fixed set of simulated
 * sites. Nothing goes over the network.
 */

import { ToolError } from "../errors.js";
import type { ToolDescriptor } from "../types.js";
import { stringArg } from "./args.js";

export interface SimulatedPage {
  title: string;
  summary: string;
  content: string;
}

export const SIMULATED_PAGES: Readonly<Record<string, SimulatedPage>> = {
  "example.com": {
    title: "Example Domain",
    summary: "A domain reserved for use in documentation examples.",
    content:
      "Example Domain. This domain is reserved for illustrative examples in documents " +
      "and may be used in literature without asking for permission.",
  },
  "nodejs.org": {
    title: "Node.js",
    summary: "A JavaScript runtime for servers, tools and scripts.",
    content:
      "Node.js runs JavaScript outside the browser on an event loop with non-blocking I/O. " +
      "It is free to use and runs on every major platform.",
  },
  "github.com": {
    title: "GitHub",
    summary: "A platform for hosting and collaborating on source code.",
    content:
      "GitHub hosts Git repositories and offers code review, issue tracking and " +
      "automated workflows for teams of any size.",
  },
};

const EXTRACT_FIELDS = ["title", "summary", "content"] as const;

/**
 * Reduce a URL to the key used in SIMULATED_PAGES: no scheme, no `www.`,
 * no surrounding slashes.
 */
export function normalizeUrl(url: string): string {
  return url
    .trim()
    .toLowerCase()
    .replace(/^https?:\/\//, "")
    .replace(/^www\./, "")
    .replace(/^\/+|\/+$/g, "");
}

function pickField(page: SimulatedPage, extract: string): string {
  switch (extract) {
    case "title":
      return page.title;
    case "summary":
      return page.summary;
    case "content":
      return page.content;
    default:
      throw new ToolError(`unknown extract type: ${extract}`);
  }
}

export const webFetchTool: ToolDescriptor = {
  name: "web_fetch",
  description: "Fetches the title, summary or content of a web page.",
  parameterContract: [
    { name: "url", type: "string", required: true, description: "Address of the page" },
    {
      name: "extract",
      type: "string",
      required: false,
      enum: EXTRACT_FIELDS,
      default: "content",
      description: "Which part of the page to return",
    },
  ],
  capability: (args) => {
    const url = stringArg(args, "url");
    const host = normalizeUrl(url);
    const page = Object.hasOwn(SIMULATED_PAGES, host) ? SIMULATED_PAGES[host] : undefined;
    if (page === undefined) {
      throw new ToolError(
        `could not fetch ${url}: host unreachable (available: ${Object.keys(SIMULATED_PAGES).join(", ")})`,
      );
    }
    return pickField(page, stringArg(args, "extract"));
  },
};
