import type { Priority, Quest } from "./types.js";

const STATUS_ICONS = {
  pending: "[ ]",
  done: "[x]",
} as const;

const PRIORITY_COLORS: Record<Priority, string> = {
  high: "\x1b[31m",
  medium: "\x1b[33m",
  low: "\x1b[36m",
};

const RESET = "\x1b[0m";
const DIM = "\x1b[2m";

export function formatQuest(quest: Quest, color = false): string {
  const status = quest.done ? "done" : "pending";
  const icon = STATUS_ICONS[status];
  const priority = color ? `${PRIORITY_COLORS[quest.priority]}${quest.priority}${RESET}` : quest.priority;
  const description = quest.description
    ? ` - ${color ? `${DIM}${quest.description}${RESET}` : quest.description}`
    : "";
  return `${icon} ${quest.name}${description} (${status}, priority: ${priority})`;
}

export function formatQuestList(quests: readonly Quest[], color = false): string {
  if (quests.length === 0) return "No quests found.";
  return quests.map((q) => formatQuest(q, color)).join("\n");
}
