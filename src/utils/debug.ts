// Lightweight, opt-in debug logging for the engine and its tests

// Topics are enabled through the BLOCKFALL_DEBUG environment variable:
// - "true", "1" or "on" enables every topic
// - a comma list enables specific ones, e.g. BLOCKFALL_DEBUG=spawn,lines

export const DEBUG_ENV_KEY = "BLOCKFALL_DEBUG" as const;

export type DebugTopic =
  | "spawn"
  | "lock"
  | "lines"
  | "gravity"
  | "lifecycle"
  | "render"
  | "input";

let overrideTopics: ReadonlyArray<string> | null = null;

function parseTopics(raw: string | undefined): ReadonlyArray<string> {
  if (raw === undefined) return [];
  const v = raw.trim().toLowerCase();
  if (v === "1" || v === "true" || v === "on") return ["*"];
  return v
    .split(",")
    .map((s) => s.trim())
    .filter((s) => s.length > 0);
}

function readEnvTopics(): ReadonlyArray<string> {
  if (overrideTopics !== null) return overrideTopics;
  if (typeof process === "undefined") return [];
  return parseTopics(process.env[DEBUG_ENV_KEY]);
}

/** Replace the environment-derived topic list; pass null to go back to it. */
export function setDebugTopics(topics: string | null): void {
  overrideTopics = topics === null ? null : parseTopics(topics);
}

export function isDebugEnabled(topic?: DebugTopic): boolean {
  const topics = readEnvTopics();
  if (topics.length === 0) return false;
  if (topics.includes("*")) return true;
  if (topic !== undefined) return topics.includes(topic);
  return true;
}

export function debugLog(
  topic: DebugTopic,
  message: string,
  data?: unknown,
): void {
  if (!isDebugEnabled(topic)) return;
  if (data !== undefined) {
    console.warn(`[DBG:${topic}] ${message}`, data);
  } else {
    console.warn(`[DBG:${topic}] ${message}`);
  }
}
