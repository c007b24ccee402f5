#!/usr/bin/env node
/**
 * Time Warp MCP Server
 *
 * Lets coding agents check, run and identify TW BASIC, TW Pascal and TW Prolog
 * programs over the Model Context Protocol. stdout carries the protocol, so
 * diagnostics go to stderr.
 */

import { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";
import { StdioServerTransport } from "@modelcontextprotocol/sdk/server/stdio.js";
import {
  checkInputSchema,
  detectInputSchema,
  handleCheck,
  handleDetect,
  handleRun,
  readLanguageReference,
  runInputSchema,
} from "./tools";

const server = new McpServer({
  name: "time-warp",
  version: "0.1.0",
});

// -- Register tools -----------------------------------------------------------

server.registerTool(
  "timewarp_check",
  {
    description:
      "Check a TW BASIC, TW Pascal or TW Prolog program for syntax errors without running it. " +
      "Returns the language used and each error with its line and column.",
    inputSchema: checkInputSchema,
  },
  async (args) => handleCheck(args),
);

server.registerTool(
  "timewarp_run",
  {
    description:
      "Run a Time Warp program to completion and return its output lines, the number of turtle " +
      "drawing primitives and the final event. Input requests are answered from `inputs` in order; " +
      "when they run out the run stops with awaitingInput set.",
    inputSchema: runInputSchema,
  },
  async (args) => handleRun(args),
);

server.registerTool(
  "timewarp_detect",
  {
    description: "Detect the language of a program from its file name extension or its content.",
    inputSchema: detectInputSchema,
  },
  async (args) => handleDetect(args),
);

// -- Register resources -------------------------------------------------------

server.registerResource(
  "languages",
  "timewarp://languages",
  {
    description: "Reference of the statements, builtins and turtle commands of the three Time Warp languages.",
    mimeType: "text/markdown",
  },
  async (uri) => ({
    contents: [{ uri: uri.href, text: readLanguageReference(), mimeType: "text/markdown" }],
  }),
);

// -- start --------------------------------------------------------------------

async function main(): Promise<void> {
  const transport = new StdioServerTransport();
  await server.connect(transport);
  console.error("Time Warp MCP server listening on stdio");
}

main().catch((err: unknown) => {
  console.error("Fatal error starting Time Warp MCP server:", err);
  process.exit(1);
});
