/**
 * schemodel MCP server — exposes the JSON Schema compiler over stdio.
 *
 * Usage: schemodel serve [<project-path>]
 */

import { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";
import { StdioServerTransport } from "@modelcontextprotocol/sdk/server/stdio.js";
import { resolve } from "node:path";
import { loadConfig } from "./config/loader.ts";
import { registerSchemaTools } from "./server/tool-registrar.ts";
import { VERSION } from "./version.ts";

/** Start the MCP server for the project at projectPath */
export async function startServer(projectPath: string): Promise<void> {
  console.error(`[schemodel] Loading config from: ${projectPath}`);
  const config = await loadConfig(projectPath);
  console.error(
    `[schemodel] Models: extra=${config.model.extra}, frozen=${config.model.frozen}, module=${config.module}`,
  );

  const server = new McpServer({ name: "schemodel", version: VERSION });
  registerSchemaTools(server, config);

  const transport = new StdioServerTransport();
  await server.connect(transport);
  console.error("[schemodel] MCP server running on stdio");

  process.on("SIGINT", () => {
    console.error("[schemodel] Shutting down...");
    server.close().then(
      () => process.exit(0),
      (err: unknown) => {
        console.error("[schemodel] Error during shutdown:", err);
        process.exit(1);
      },
    );
  });
}

export function runServerMain(args: string[]): void {
  const projectPath = resolve(args[0] ?? ".");
  startServer(projectPath).catch((err: unknown) => {
    console.error("[schemodel] Fatal error:", err);
    process.exit(1);
  });
}
