import type { Priority, Quest, QuestStatus } from "./types.js";

export const PRIORITIES: readonly Priority[] = ["high", "medium", "low"];

/** Every spelling accepted on input. The reference locale uses alta/média/baixa. */
export const PRIORITY_INPUTS = [
  "high",
  "medium",
  "low",
  "alta",
  "média",
  "media",
  "baixa",
] as const;

const PRIORITY_ALIASES = new Map<string, Priority>([
  ["high", "high"],
  ["medium", "medium"],
  ["low", "low"],
  ["alta", "high"],
  ["média", "medium"],
  ["media", "medium"],
  ["baixa", "low"],
]);

export const QUEST_STATUSES = ["pending", "done"] as const;

// Sort key: high → medium → low
export const PRIORITY_ORDER: Record<Priority, number> = { high: 0, medium: 1, low: 2 };

export function parsePriority(value: string): Priority | undefined {
  return PRIORITY_ALIASES.get(value);
}

export function parseStatus(value: string): QuestStatus | undefined {
  return value === "pending" || value === "done" ? value : undefined;
}

/** Stable: quests of equal priority keep their relative order. */
export function sortByPriority(quests: readonly Quest[]): Quest[] {
  return [...quests].sort((a, b) => PRIORITY_ORDER[a.priority] - PRIORITY_ORDER[b.priority]);
}
