import type { QuestConfig } from "./config.js";
import { formatQuestList } from "./formatter.js";
import { sortByPriority } from "./priority.js";
import { QuestStore } from "./state/store.js";
import type { QuestErrorKind, StoreResult } from "./types.js";
import { succeed } from "./types.js";

export const HELP = `
quest - Track quests in a local JSON file

Usage:
  quest add --name <name> --description <text> [--priority high|medium|low]
  quest list [--filter-status pending|done] [--filter-priority high|medium|low] [--sort priority]
  quest complete --name <name>
  quest remove --name <name>

Options:
  --file <path>   Quest file to use (default: $QUEST_FILE or quests.json)
  -h, --help      Show this help

Priorities may also be given as alta, média or baixa.
`.trim();

export const EXIT_OK = 0;
export const EXIT_FAILURE = 1;
export const EXIT_USAGE = 2;
export const EXIT_CORRUPT_DATA = 3;

export interface CliResult {
  exitCode: number;
  /** Printed to stdout on success, to stderr otherwise. */
  output: string;
}

type Action = "add" | "list" | "complete" | "remove";

const ACTIONS: readonly Action[] = ["add", "list", "complete", "remove"];

const KNOWN_FLAGS = new Set([
  "name",
  "description",
  "priority",
  "filter-status",
  "filter-priority",
  "sort",
  "file",
  "help",
]);

interface ParsedArgs {
  action: string | undefined;
  extra: string[];
  flags: Map<string, string>;
  /** Flags written as `--flag` with no value after them. */
  missingValue: string[];
}

function parseArgs(args: string[]): ParsedArgs {
  const positional: string[] = [];
  const flags = new Map<string, string>();
  const missingValue: string[] = [];

  for (let i = 0; i < args.length; i++) {
    const arg = args[i];
    if (arg === "-h") {
      flags.set("help", "");
    } else if (arg.startsWith("--")) {
      const eq = arg.indexOf("=");
      if (eq !== -1) {
        flags.set(arg.slice(2, eq), arg.slice(eq + 1));
        continue;
      }
      const key = arg.slice(2);
      const next: string | undefined = args[i + 1];
      if (key === "help") {
        flags.set(key, "");
      } else if (next === undefined || next.startsWith("--")) {
        flags.set(key, "");
        missingValue.push(key);
      } else {
        flags.set(key, next);
        i++;
      }
    } else {
      positional.push(arg);
    }
  }

  return { action: positional[0], extra: positional.slice(1), flags, missingValue };
}

function isAction(value: string): value is Action {
  return ACTIONS.some((a) => a === value);
}

function usage(message: string): CliResult {
  return { exitCode: EXIT_USAGE, output: `Error: ${message}\n\n${HELP}` };
}

function exitCodeFor(kind: QuestErrorKind): number {
  switch (kind) {
    case "InvalidInput":
    case "DuplicateName":
    case "NotFound":
      return EXIT_FAILURE;
    case "CorruptData":
      return EXIT_CORRUPT_DATA;
  }
}

function toCliResult(result: StoreResult<string>): CliResult {
  if (!result.ok) {
    return { exitCode: exitCodeFor(result.kind), output: `Error: ${result.error}` };
  }
  return { exitCode: EXIT_OK, output: result.data };
}

async function withStore(
  storePath: string,
  fn: (store: QuestStore) => Promise<StoreResult<string>> | StoreResult<string>
): Promise<CliResult> {
  const opened = await QuestStore.open(storePath);
  if (!opened.ok) return toCliResult(opened);
  return toCliResult(await fn(opened.data));
}

/**
 * Runs one quest action. Usage problems are detected before the quest file
 * is touched; store failures map to an exit code by error kind.
 */
export async function run(args: string[], config: QuestConfig): Promise<CliResult> {
  const { action, extra, flags, missingValue } = parseArgs(args);

  if (flags.has("help")) {
    return { exitCode: EXIT_OK, output: HELP };
  }
  for (const key of flags.keys()) {
    if (!KNOWN_FLAGS.has(key)) return usage(`unknown option --${key}.`);
  }
  if (missingValue.length > 0) return usage(`--${missingValue[0]} requires a value.`);
  if (!action) return usage("an action is required (add, list, complete, remove).");
  if (!isAction(action)) return usage(`unknown action "${action}".`);
  if (extra.length > 0) return usage(`unexpected argument "${extra[0]}".`);

  const storePath = flags.get("file") || config.storePath;
  const name = flags.get("name");

  switch (action) {
    case "add": {
      const description = flags.get("description");
      if (!name || !description) return usage("add requires --name and --description.");
      const priority = flags.get("priority") ?? "medium";
      return withStore(storePath, async (store) => {
        const added = await store.add(name, description, priority);
        if (!added.ok) return added;
        return succeed(`Added quest "${added.data.name}" (priority: ${added.data.priority}).`);
      });
    }

    case "list": {
      const sort = flags.get("sort");
      if (sort !== undefined && sort !== "priority") {
        return usage(`unknown sort order "${sort}" (only "priority" is supported).`);
      }
      return withStore(storePath, (store) => {
        const listed = store.listFiltered({
          status: flags.get("filter-status"),
          priority: flags.get("filter-priority"),
        });
        if (!listed.ok) return listed;
        const quests = sort ? sortByPriority(listed.data) : listed.data;
        return succeed(formatQuestList(quests, config.color));
      });
    }

    case "complete": {
      if (!name) return usage("complete requires --name.");
      return withStore(storePath, async (store) => {
        const completed = await store.complete(name);
        if (!completed.ok) return completed;
        return succeed(`Completed quest "${completed.data.name}".`);
      });
    }

    case "remove": {
      if (!name) return usage("remove requires --name.");
      return withStore(storePath, async (store) => {
        const removed = await store.remove(name);
        if (!removed.ok) return removed;
        return succeed(`Removed quest "${removed.data.name}".`);
      });
    }
  }
}
