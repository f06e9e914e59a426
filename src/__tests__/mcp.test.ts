import { describe, it, expect, beforeEach, afterEach } from "vitest";
import { mkdir, readFile, rm } from "node:fs/promises";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { Client } from "@modelcontextprotocol/sdk/client/index.js";
import { InMemoryTransport } from "@modelcontextprotocol/sdk/inMemory.js";
import { createServer, respond } from "../mcp.js";
import { AuditLog } from "../state/audit.js";

const TEST_DIR = join(tmpdir(), "quest-test-mcp");
const TEST_FILE = join(TEST_DIR, "quests.json");

let client: Client | undefined;

async function connect(storePath: string): Promise<{ client: Client; audit: AuditLog }> {
  const audit = new AuditLog(storePath);
  const server = createServer(storePath, audit);
  const [clientTransport, serverTransport] = InMemoryTransport.createLinkedPair();
  await server.connect(serverTransport);
  const connected = new Client({ name: "quest-test-client", version: "0.0.0" });
  await connected.connect(clientTransport);
  client = connected;
  return { client: connected, audit };
}

async function auditLines(audit: AuditLog): Promise<Record<string, unknown>[]> {
  const content = await readFile(audit.getFilePath(), "utf-8");
  return content.trim().split("\n").map((line) => JSON.parse(line));
}

beforeEach(async () => {
  await rm(TEST_DIR, { recursive: true, force: true });
});

afterEach(async () => {
  await client?.close();
  client = undefined;
  await rm(TEST_DIR, { recursive: true, force: true });
});

describe("respond", () => {
  it("marks failed results as errors", () => {
    const failed = respond({ ok: false, kind: "NotFound", error: 'Quest "Ghost" not found.' });
    expect(failed.isError).toBe(true);
    expect(JSON.parse(failed.content[0].text)).toEqual({
      ok: false,
      kind: "NotFound",
      error: 'Quest "Ghost" not found.',
    });

    expect(respond({ ok: true, message: "done" }).isError).toBe(false);
  });
});

describe("createServer", () => {
  it("registers the four quest tools", async () => {
    const { client } = await connect(TEST_FILE);
    const { tools } = await client.listTools();
    expect(tools.map((t) => t.name).sort()).toEqual([
      "quest_add",
      "quest_complete",
      "quest_list",
      "quest_remove",
    ]);
  });

  it("audits successful and failing calls with their full input", async () => {
    const { client, audit } = await connect(TEST_FILE);

    const added = await client.callTool({
      name: "quest_add",
      arguments: { name: "Slay Dragon", description: "Defeat the dragon", priority: "alta" },
    });
    expect(added.isError).toBe(false);

    const missing = await client.callTool({ name: "quest_complete", arguments: { name: "Ghost" } });
    expect(missing.isError).toBe(true);

    const lines = await auditLines(audit);
    expect(lines).toHaveLength(2);
    expect(lines[0]).toMatchObject({
      tool: "quest_add",
      input: { name: "Slay Dragon", description: "Defeat the dragon", priority: "alta" },
      ok: true,
    });
    expect(lines[1]).toMatchObject({
      tool: "quest_complete",
      input: { name: "Ghost" },
      ok: false,
      kind: "NotFound",
    });
  });

  it("audits a call whose store access throws", async () => {
    // the quest file path is a directory, so reading it fails with EISDIR
    await mkdir(TEST_FILE, { recursive: true });
    const { client, audit } = await connect(TEST_FILE);

    await client
      .callTool({ name: "quest_add", arguments: { name: "A", description: "a" } })
      .catch(() => undefined);

    const lines = await auditLines(audit);
    expect(lines).toHaveLength(1);
    expect(lines[0]).toMatchObject({ tool: "quest_add", ok: false });
    expect(String(lines[0].error)).toContain("EISDIR");
  });
});
