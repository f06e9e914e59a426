import { appendFile, mkdir } from "node:fs/promises";
import { dirname, join } from "node:path";
import type { QuestErrorKind, ToolResult } from "../types.js";

export type QuestToolName = "quest_add" | "quest_list" | "quest_complete" | "quest_remove";

export interface AuditEntry {
  ts: string;
  tool: QuestToolName;
  input: Record<string, unknown>;
  ok: boolean;
  kind?: QuestErrorKind;
  error?: string;
}

export const AUDIT_FILE_NAME = "quest-audit.jsonl";

export function auditPathFor(questFile: string): string {
  return join(dirname(questFile), AUDIT_FILE_NAME);
}

/** Append-only JSONL record of quest tool calls, kept beside the quest file. */
export class AuditLog {
  private readonly filePath: string;

  constructor(questFile: string) {
    this.filePath = auditPathFor(questFile);
  }

  /**
   * Runs one tool call and records its outcome. A call that throws is
   * recorded as failed before the error is rethrown.
   */
  async track<T extends ToolResult>(
    tool: QuestToolName,
    input: Record<string, unknown>,
    fn: () => Promise<T>
  ): Promise<T> {
    const ts = new Date().toISOString();
    let result: T;
    try {
      result = await fn();
    } catch (err) {
      const error = err instanceof Error ? err.message : String(err);
      await this.log({ ts, tool, input, ok: false, error });
      throw err;
    }
    await this.log({ ts, tool, input, ok: result.ok, kind: result.kind, error: result.error });
    return result;
  }

  async log(entry: AuditEntry): Promise<void> {
    try {
      await mkdir(dirname(this.filePath), { recursive: true });
      await appendFile(this.filePath, JSON.stringify(entry) + "\n", "utf-8");
    } catch (err) {
      // a failed audit write must not fail the tool call
      const reason = err instanceof Error ? err.message : String(err);
      console.error(`[quest-mcp] audit write failed (${this.filePath}): ${reason}`);
    }
  }

  getFilePath(): string {
    return this.filePath;
  }
}
