import { readFile, writeFile, rename, mkdir, rm } from "node:fs/promises";
import { dirname } from "node:path";
import { PRIORITIES, parsePriority, parseStatus, sortByPriority } from "../priority.js";
import { parseQuestFile, serializeQuests } from "../schema.js";
import type { Quest, QuestFilter, StoreResult } from "../types.js";
import { fail, succeed } from "../types.js";

function isFileNotFound(err: unknown): boolean {
  return err instanceof Error && "code" in err && err.code === "ENOENT";
}

function invalidPriority(value: string): string {
  return `Invalid priority "${value}". Use ${PRIORITIES.join(", ")} (or alta, média, baixa).`;
}

export class QuestStore {
  private quests: Quest[];
  private readonly filePath: string;

  private constructor(filePath: string, quests: Quest[]) {
    this.filePath = filePath;
    this.quests = quests;
  }

  /**
   * Loads the quest file, or starts empty when it does not exist yet.
   * A file that exists but does not hold valid quest data is never
   * overwritten or repaired: the caller gets CorruptData.
   */
  static async open(filePath: string): Promise<StoreResult<QuestStore>> {
    let raw: string;
    try {
      raw = await readFile(filePath, "utf-8");
    } catch (err) {
      if (isFileNotFound(err)) {
        return succeed(new QuestStore(filePath, []));
      }
      throw err;
    }

    const parsed = parseQuestFile(raw, filePath);
    if (!parsed.ok) return parsed;
    return succeed(new QuestStore(filePath, parsed.data));
  }

  getFilePath(): string {
    return this.filePath;
  }

  async add(name: string, description: string, priority: string = "medium"): Promise<StoreResult<Quest>> {
    if (!name.trim()) {
      return fail("InvalidInput", "Quest name must not be empty.");
    }
    if (this.quests.some((q) => q.name === name)) {
      return fail("DuplicateName", `Quest "${name}" already exists.`);
    }
    const level = parsePriority(priority);
    if (!level) {
      return fail("InvalidInput", invalidPriority(priority));
    }

    const quest: Quest = { name, description, priority: level, done: false };
    await this.commit([...this.quests, quest]);
    return succeed({ ...quest });
  }

  list(): Quest[] {
    return this.quests.map((q) => ({ ...q }));
  }

  listByPriority(): Quest[] {
    return sortByPriority(this.list());
  }

  listFiltered(filter: QuestFilter = {}): StoreResult<Quest[]> {
    const status = filter.status ? parseStatus(filter.status) : undefined;
    if (filter.status && !status) {
      return fail("InvalidInput", `Invalid status "${filter.status}". Use pending or done.`);
    }
    const priority = filter.priority ? parsePriority(filter.priority) : undefined;
    if (filter.priority && !priority) {
      return fail("InvalidInput", invalidPriority(filter.priority));
    }

    let quests = this.list();
    if (status) {
      const done = status === "done";
      quests = quests.filter((q) => q.done === done);
    }
    if (priority) {
      quests = quests.filter((q) => q.priority === priority);
    }
    return succeed(quests);
  }

  async complete(name: string): Promise<StoreResult<Quest>> {
    const index = this.quests.findIndex((q) => q.name === name);
    if (index === -1) {
      return fail("NotFound", `Quest "${name}" not found.`);
    }

    const next = this.list();
    next[index].done = true;
    await this.commit(next);
    return succeed({ ...next[index] });
  }

  async remove(name: string): Promise<StoreResult<Quest>> {
    const index = this.quests.findIndex((q) => q.name === name);
    if (index === -1) {
      return fail("NotFound", `Quest "${name}" not found.`);
    }

    const removed = this.quests[index];
    await this.commit(this.quests.filter((_, i) => i !== index));
    return succeed({ ...removed });
  }

  // The whole file is rewritten; memory only changes once the write landed.
  private async commit(next: Quest[]): Promise<void> {
    await mkdir(dirname(this.filePath), { recursive: true });

    const tmpPath = `${this.filePath}.tmp.${process.pid}`;
    try {
      await writeFile(tmpPath, serializeQuests(next), "utf-8");
      await rename(tmpPath, this.filePath);
    } catch (err) {
      await rm(tmpPath, { force: true });
      throw err;
    }
    this.quests = next;
  }
}
