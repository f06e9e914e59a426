#!/usr/bin/env node
import { StdioServerTransport } from "@modelcontextprotocol/sdk/server/stdio.js";

import { loadConfig } from "./config.js";
import { createServer } from "./mcp.js";
import { AuditLog } from "./state/audit.js";

const { storePath } = loadConfig(process.env, false);
const server = createServer(storePath, new AuditLog(storePath));

// --- Start server ---
const transport = new StdioServerTransport();
await server.connect(transport);
console.error(`[quest-mcp] server started (quest file: ${storePath})`);
