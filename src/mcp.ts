import { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";
import { z } from "zod";

import { PRIORITY_INPUTS, QUEST_STATUSES } from "./priority.js";
import type { AuditLog } from "./state/audit.js";
import { questAdd, questList, questComplete, questRemove } from "./tools/quest.js";
import type { ToolResult } from "./types.js";

export const SERVER_NAME = "quest-mcp";
export const SERVER_VERSION = "0.1.0";

export function respond(result: ToolResult) {
  return {
    content: [{ type: "text" as const, text: JSON.stringify(result, null, 2) }],
    isError: !result.ok,
  };
}

const prioritySchema = z.enum(PRIORITY_INPUTS);

const statusSchema = z.enum(QUEST_STATUSES);

/** Registers the quest tools; the caller connects a transport. */
export function createServer(storePath: string, audit: AuditLog): McpServer {
  const server = new McpServer({
    name: SERVER_NAME,
    version: SERVER_VERSION,
  });

  // --- quest_add ---
  server.tool(
    "quest_add",
    "Add a quest (names are unique; priority defaults to medium)",
    {
      name: z.string(),
      description: z.string(),
      priority: prioritySchema.optional(),
    },
    async ({ name, description, priority }) => {
      const result = await audit.track("quest_add", { name, description, priority }, () =>
        questAdd(storePath, { name, description, priority })
      );
      return respond(result);
    }
  );

  // --- quest_list ---
  server.tool(
    "quest_list",
    "List quests, optionally filtered by status and priority",
    {
      status: statusSchema.optional(),
      priority: prioritySchema.optional(),
      sortByPriority: z.boolean().optional(),
    },
    async ({ status, priority, sortByPriority }) => {
      const result = await audit.track("quest_list", { status, priority, sortByPriority }, () =>
        questList(storePath, { status, priority, sortByPriority })
      );
      return respond(result);
    }
  );

  // --- quest_complete ---
  server.tool(
    "quest_complete",
    "Mark a quest as done",
    { name: z.string() },
    async ({ name }) => {
      const result = await audit.track("quest_complete", { name }, () =>
        questComplete(storePath, { name })
      );
      return respond(result);
    }
  );

  // --- quest_remove ---
  server.tool(
    "quest_remove",
    "Remove a quest",
    { name: z.string() },
    async ({ name }) => {
      const result = await audit.track("quest_remove", { name }, () =>
        questRemove(storePath, { name })
      );
      return respond(result);
    }
  );

  return server;
}
