import { z } from "zod";
import { PRIORITIES, parsePriority } from "./priority.js";
import type { Quest, StoreResult } from "./types.js";
import { fail, succeed } from "./types.js";

const prioritySchema = z.string().transform((value, ctx) => {
  const priority = parsePriority(value);
  if (!priority) {
    ctx.addIssue({
      code: z.ZodIssueCode.custom,
      message: `unknown priority "${value}" (expected ${PRIORITIES.join(", ")})`,
    });
    return z.NEVER;
  }
  return priority;
});

export const questSchema = z.object({
  name: z.string().refine((name) => name.trim().length > 0, {
    message: "name must not be empty",
  }),
  description: z.string(),
  priority: prioritySchema,
  done: z.boolean(),
});

export const questFileSchema = z.array(questSchema).superRefine((quests, ctx) => {
  const seen = new Set<string>();
  quests.forEach((quest, index) => {
    if (seen.has(quest.name)) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: [index, "name"],
        message: `duplicate quest name "${quest.name}"`,
      });
    }
    seen.add(quest.name);
  });
});

function describeIssues(error: z.ZodError): string {
  return error.issues
    .map((issue) => {
      const at = issue.path.length > 0 ? issue.path.join(".") : "(root)";
      return `${at}: ${issue.message}`;
    })
    .join("; ");
}

/**
 * Parses the raw contents of a quest file. Anything that is not a JSON array
 * of well-formed quests with unique names is reported as CorruptData.
 */
export function parseQuestFile(raw: string, filePath: string): StoreResult<Quest[]> {
  let json: unknown;
  try {
    json = JSON.parse(raw);
  } catch (err) {
    const reason = err instanceof Error ? err.message : String(err);
    return fail("CorruptData", `Quest file "${filePath}" is not valid JSON: ${reason}`);
  }

  const result = questFileSchema.safeParse(json);
  if (!result.success) {
    return fail("CorruptData", `Quest file "${filePath}" is corrupt: ${describeIssues(result.error)}`);
  }
  return succeed(result.data);
}

export function serializeQuests(quests: readonly Quest[]): string {
  return JSON.stringify(quests, null, 2) + "\n";
}
