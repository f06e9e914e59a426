import { formatQuestList } from "../formatter.js";
import { sortByPriority } from "../priority.js";
import { QuestStore } from "../state/store.js";
import type {
  Quest,
  QuestAddInput,
  QuestListInput,
  QuestNameInput,
  StoreFailure,
  ToolResult,
} from "../types.js";

function toFailure(result: StoreFailure): ToolResult<never> {
  return { ok: false, kind: result.kind, error: result.error };
}

// Every call re-reads the quest file so edits made through the CLI are seen.
async function withStore<T>(
  filePath: string,
  fn: (store: QuestStore) => Promise<ToolResult<T>> | ToolResult<T>
): Promise<ToolResult<T>> {
  const opened = await QuestStore.open(filePath);
  if (!opened.ok) return toFailure(opened);
  return fn(opened.data);
}

// --- quest_add ---

export async function questAdd(
  filePath: string,
  input: QuestAddInput
): Promise<ToolResult<Quest>> {
  return withStore<Quest>(filePath, async (store) => {
    const result = await store.add(input.name, input.description, input.priority);
    if (!result.ok) return toFailure(result);
    return {
      ok: true,
      message: `Added quest "${result.data.name}" (priority: ${result.data.priority}).`,
      data: result.data,
    };
  });
}

// --- quest_list ---

export async function questList(
  filePath: string,
  input: QuestListInput
): Promise<ToolResult<Quest[]>> {
  return withStore<Quest[]>(filePath, (store) => {
    const result = store.listFiltered({ status: input.status, priority: input.priority });
    if (!result.ok) return toFailure(result);

    const quests = input.sortByPriority ? sortByPriority(result.data) : result.data;
    return {
      ok: true,
      message: quests.length > 0
        ? `${quests.length} quest(s):\n${formatQuestList(quests)}`
        : formatQuestList(quests),
      data: quests,
    };
  });
}

// --- quest_complete ---

export async function questComplete(
  filePath: string,
  input: QuestNameInput
): Promise<ToolResult<Quest>> {
  return withStore<Quest>(filePath, async (store) => {
    const result = await store.complete(input.name);
    if (!result.ok) return toFailure(result);
    return { ok: true, message: `Completed quest "${result.data.name}".`, data: result.data };
  });
}

// --- quest_remove ---

export async function questRemove(
  filePath: string,
  input: QuestNameInput
): Promise<ToolResult<Quest>> {
  return withStore<Quest>(filePath, async (store) => {
    const result = await store.remove(input.name);
    if (!result.ok) return toFailure(result);
    return { ok: true, message: `Removed quest "${result.data.name}".`, data: result.data };
  });
}
