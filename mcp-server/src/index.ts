#!/usr/bin/env node
/**
 * Schemelet MCP Server
 *
 * Exposes the Schemelet reader and evaluator to coding agents via the
 * Model Context Protocol, plus the language grammar as a resource.
 */

import { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";
import { StdioServerTransport } from "@modelcontextprotocol/sdk/server/stdio.js";
import { z } from "zod";
import { handleParse, handleEvaluate, readGrammar } from "./handlers";

const server = new McpServer({
  name: "schemelet",
  version: "0.1.0",
});

// -- Register tools -----------------------------------------------------------

// Cast avoids TS2589 (excessively deep type instantiation) on zod shapes.

// Tool: parse
(server.registerTool as Function)(
  "parse",
  {
    description:
      "Parse Schemelet source code. Returns the canonical rendering of every top-level form, or the parse error with its line and column.",
    inputSchema: { code: z.string().describe("Schemelet source code to parse") },
  },
  handleParse,
);

// Tool: evaluate
(server.registerTool as Function)(
  "evaluate",
  {
    description:
      "Evaluate Schemelet source code in a fresh global environment. " +
      "Returns the rendered value of each top-level form and any text written by display/write/newline. " +
      "Evaluation stops at the first error.",
    inputSchema: {
      code: z.string().describe("Schemelet source code to evaluate"),
      args: z.array(z.string()).optional().describe("Strings bound to the variable `args`"),
    },
  },
  handleEvaluate,
);

// -- Register resources -------------------------------------------------------

// Resource: schemelet://grammar-reference
server.registerResource(
  "grammar-reference",
  "schemelet://grammar-reference",
  {
    description: "EBNF grammar of Schemelet: atoms, numbers, strings, characters, booleans, quote, lists and dotted lists.",
    mimeType: "text/plain",
  },
  async (uri) => ({
    contents: [{ uri: uri.href, text: readGrammar(), mimeType: "text/plain" }],
  }),
);

// -- start --------------------------------------------------------------------

async function main() {
  const transport = new StdioServerTransport();
  await server.connect(transport);
}

main().catch((err) => {
  console.error("Fatal error starting Schemelet MCP server:", err);
  process.exit(1);
});
