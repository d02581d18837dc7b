#!/usr/bin/env node
import { run } from "./mcpServer.js";

run().catch((err: unknown) => {
  console.error("Form lifecycle MCP server failed to start:", err);
  process.exit(1);
});
