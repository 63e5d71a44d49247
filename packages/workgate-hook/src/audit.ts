import fs from "node:fs/promises";
import path from "node:path";
import { errorMessage, isErrnoException } from "./errors.js";
import { getPaths } from "./paths.js";

export const EVENT_TYPES = [
  "tool-allowed",
  "tool-blocked",
  "mode-transition",
  "fatal",
] as const;
export type EventType = (typeof EVENT_TYPES)[number];

export type EventRecord = {
  type: EventType;
  [key: string]: unknown;
};

export async function appendEvent(projectRoot: string, record: EventRecord): Promise<void> {
  const { eventsPath } = getPaths(projectRoot);
  await fs.mkdir(path.dirname(eventsPath), { recursive: true });
  await fs.appendFile(eventsPath, JSON.stringify({ ts: new Date().toISOString(), ...record }) + "\n", "utf8");
}

/** Audit failures are reported but never change a decision. */
export async function recordEvent(projectRoot: string, record: EventRecord): Promise<void> {
  try {
    await appendEvent(projectRoot, record);
  } catch (err) {
    console.error(`[workgate] warning: could not append to event log: ${errorMessage(err)}`);
  }
}

export async function readEvents(projectRoot: string): Promise<EventRecord[]> {
  const { eventsPath } = getPaths(projectRoot);
  let raw: string;
  try {
    raw = await fs.readFile(eventsPath, "utf8");
  } catch (err) {
    if (isErrnoException(err) && err.code === "ENOENT") return [];
    throw err;
  }
  const events: EventRecord[] = [];
  for (const line of raw.split("\n")) {
    if (line.trim().length === 0) continue;
    const parsed: unknown = JSON.parse(line);
    if (isEventRecord(parsed)) events.push(parsed);
  }
  return events;
}

function isEventRecord(value: unknown): value is EventRecord {
  if (typeof value !== "object" || value === null || !("type" in value)) return false;
  const type = value.type;
  return EVENT_TYPES.some((t) => t === type);
}
