export const DEFAULT_QUEST_FILE = "quests.json";

export interface QuestConfig {
  /** Path of the JSON quest file. */
  storePath: string;
  /** Colorize CLI output. */
  color: boolean;
}

type Env = Record<string, string | undefined>;

export function loadConfig(env: Env, isTTY: boolean): QuestConfig {
  return {
    storePath: env.QUEST_FILE || DEFAULT_QUEST_FILE,
    color: isTTY && !env.NO_COLOR,
  };
}
