// --- Enum Types (Union Types) ---

export type Priority = "high" | "medium" | "low";

export type QuestStatus = "pending" | "done";

export type QuestErrorKind =
  | "InvalidInput"
  | "DuplicateName"
  | "NotFound"
  | "CorruptData";

// --- Core Models ---

export interface Quest {
  name: string;
  description: string;
  priority: Priority;
  done: boolean;
}

export interface QuestFilter {
  status?: string;
  priority?: string;
}

// --- Store Results ---

export type StoreResult<T> =
  | { ok: true; data: T }
  | { ok: false; kind: QuestErrorKind; error: string };

export type StoreFailure = Extract<StoreResult<never>, { ok: false }>;

export function succeed<T>(data: T): StoreResult<T> {
  return { ok: true, data };
}

export function fail(kind: QuestErrorKind, error: string): StoreFailure {
  return { ok: false, kind, error };
}

// --- Tool Output Types ---

export interface ToolResult<T = unknown> {
  ok: boolean;
  message?: string;
  error?: string;
  kind?: QuestErrorKind;
  data?: T;
}

// --- Tool Input Types ---

export interface QuestAddInput {
  name: string;
  description: string;
  priority?: string;
}

export interface QuestListInput {
  status?: string;
  priority?: string;
  sortByPriority?: boolean;
}

export interface QuestNameInput {
  name: string;
}
