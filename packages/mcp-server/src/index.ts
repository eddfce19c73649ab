#!/usr/bin/env node
/**
 * @therapydrift/mcp-server
 *
 * MCP server exposing drift checks over stdio.
 * 2 tools: drift_check, drift_state.
 *
 * Usage: npm run mcp -- [--dir <path>]
 *   --dir <path>  Workgraph directory (default: nearest .workgraph/ upwards)
 */

import { StdioServerTransport } from "@modelcontextprotocol/sdk/server/stdio.js";
import { findWorkgraphDir } from "@therapydrift/architecture";
import { LocalDriftAdapter } from "./local-adapter.js";
import { createServer } from "./server.js";

// Re-export types for library consumers
export { THERAPYDRIFT_MCP_TOOLS } from "@therapydrift/architecture";
export type { TherapydriftMcpApi } from "@therapydrift/architecture";
export { LocalDriftAdapter } from "./local-adapter.js";
export { createServer } from "./server.js";

// ─── CLI entry point ─────────────────────────────────────────────────────────

function parseArgs(): { dir?: string } {
  const args = process.argv.slice(2);
  let dir: string | undefined;

  for (let i = 0; i < args.length; i++) {
    if (args[i] === "--dir" && args[i + 1]) {
      dir = args[i + 1];
      i++;
    }
  }

  return { dir };
}

async function main() {
  const { dir } = parseArgs();
  const wgDir = findWorkgraphDir(dir);

  const adapter = new LocalDriftAdapter(wgDir);
  const mcpServer = createServer(adapter);

  const transport = new StdioServerTransport();
  await mcpServer.connect(transport);

  // Log to stderr so it doesn't interfere with MCP stdio protocol on stdout
  process.stderr.write(`therapydrift-mcp: serving workgraph at ${wgDir}\n`);
}

// Only run main when this file is executed directly (not imported as library)
const isDirectExecution =
  process.argv[1] &&
  (process.argv[1].endsWith("mcp-server/src/index.ts") ||
    process.argv[1].endsWith("mcp-server/src/index.js"));

if (isDirectExecution) {
  main().catch((err: unknown) => {
    process.stderr.write(`therapydrift-mcp: fatal error: ${String(err)}\n`);
    process.exit(1);
  });
}
