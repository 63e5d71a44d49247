import crypto from "node:crypto";
import fs from "node:fs/promises";
import path from "node:path";
import { setTimeout as sleep } from "node:timers/promises";
import { z } from "zod";
import { CorruptedDocumentError, StateLockError, isErrnoException } from "./errors.js";
import { getPaths, type GatePaths } from "./paths.js";

export const MODES = ["discussion", "plan", "implementation"] as const;
export type Mode = (typeof MODES)[number];

export const WORK_ITEM_STATUSES = ["pending", "in_progress", "completed"] as const;
export type WorkItemStatus = (typeof WORK_ITEM_STATUSES)[number];

export type WorkItem = {
  content: string;
  status: WorkItemStatus;
};

export type CurrentTask = {
  name?: string;
  branch: string;
  // Names (directory basenames) of the repositories the task touches.
  repositories: string[];
};

export type PlanBookkeeping = {
  previousMode: Mode;
  stashedCount: number;
};

export type SessionState = {
  version: 1;
  mode: Mode;
  currentTask: CurrentTask | null;
  workItems: {
    active: WorkItem[];
    stashed: WorkItem[];
  };
  // Set while in plan mode; cleared on exit.
  plan: PlanBookkeeping | null;
  flags: Record<string, boolean>;
  // Owned by external collaborators; never interpreted here.
  metadata: Record<string, unknown>;
  updatedAt: string;
};

export const workItemSchema = z.object({
  content: z.string(),
  status: z.enum(WORK_ITEM_STATUSES),
});

const stateSchema: z.ZodType<SessionState, z.ZodTypeDef, unknown> = z.object({
  version: z.literal(1).default(1),
  mode: z.enum(MODES),
  currentTask: z
    .object({
      name: z.string().optional(),
      branch: z.string(),
      repositories: z.array(z.string()).default([]),
    })
    .nullable()
    .default(null),
  workItems: z
    .object({
      active: z.array(workItemSchema).default([]),
      stashed: z.array(workItemSchema).default([]),
    })
    .default({}),
  plan: z
    .object({
      previousMode: z.enum(MODES),
      stashedCount: z.number().int().nonnegative(),
    })
    .nullable()
    .default(null),
  flags: z.record(z.boolean()).default({}),
  metadata: z.record(z.unknown()).default({}),
  updatedAt: z.string().default(() => new Date().toISOString()),
});

export function defaultState(): SessionState {
  return {
    version: 1,
    mode: "discussion",
    currentTask: null,
    workItems: { active: [], stashed: [] },
    plan: null,
    flags: {},
    metadata: {},
    updatedAt: new Date().toISOString(),
  };
}

export function parseState(raw: string, filePath: string): SessionState {
  let json: unknown;
  try {
    json = JSON.parse(raw);
  } catch (err) {
    throw new CorruptedDocumentError("state", filePath, "not valid JSON", { cause: err });
  }
  const parsed = stateSchema.safeParse(json);
  if (!parsed.success) {
    const detail = parsed.error.issues.map((i) => `${i.path.join(".") || "(root)"}: ${i.message}`).join("; ");
    throw new CorruptedDocumentError("state", filePath, detail);
  }
  return parsed.data;
}

async function readStateFile(statePath: string): Promise<SessionState> {
  let raw: string;
  try {
    raw = await fs.readFile(statePath, "utf8");
  } catch (err) {
    if (isErrnoException(err) && err.code === "ENOENT") return defaultState();
    throw err;
  }
  return parseState(raw, statePath);
}

export async function writeJsonAtomic(filePath: string, value: unknown): Promise<void> {
  const dir = path.dirname(filePath);
  await fs.mkdir(dir, { recursive: true });
  const tmp = path.join(dir, `.${path.basename(filePath)}.tmp-${crypto.randomBytes(6).toString("hex")}`);
  await fs.writeFile(tmp, JSON.stringify(value, null, 2) + "\n", "utf8");
  await fs.rename(tmp, filePath);
}

export const LOCK_STALE_MS = 10_000;
export const LOCK_WAIT_MS = 2_000;
const LOCK_RETRY_MS = 25;

type LockAge = "fresh" | "stale" | "gone";

const LockInfoSchema = z.object({ lockId: z.string() }).passthrough();

async function lockAge(lockPath: string): Promise<LockAge> {
  try {
    const st = await fs.stat(lockPath);
    return Date.now() - st.mtimeMs > LOCK_STALE_MS ? "stale" : "fresh";
  } catch (err) {
    if (isErrnoException(err) && err.code === "ENOENT") return "gone";
    throw err;
  }
}

/**
 * Moves a stale lock aside before deleting it. When another process replaced
 * the lock between our check and the move, the fresh lock is put back.
 */
export async function removeStaleLock(lockPath: string): Promise<void> {
  const quarantine = `${lockPath}.stale-${crypto.randomBytes(6).toString("hex")}`;
  try {
    await fs.rename(lockPath, quarantine);
  } catch (err) {
    if (isErrnoException(err) && err.code === "ENOENT") return;
    throw err;
  }
  try {
    if ((await lockAge(quarantine)) === "fresh") {
      try {
        await fs.link(quarantine, lockPath);
      } catch (err) {
        // Someone acquired the lock meanwhile; theirs stands.
        if (!isErrnoException(err) || err.code !== "EEXIST") throw err;
      }
    }
  } finally {
    await fs.rm(quarantine, { force: true });
  }
}

async function acquireLock(lockPath: string, waitMs: number): Promise<string> {
  await fs.mkdir(path.dirname(lockPath), { recursive: true });
  const lockId = crypto.randomBytes(8).toString("hex");
  const started = Date.now();
  for (;;) {
    try {
      const handle = await fs.open(lockPath, "wx");
      try {
        await handle.writeFile(JSON.stringify({ lockId, pid: process.pid, acquiredAt: new Date().toISOString() }));
      } finally {
        await handle.close();
      }
      return lockId;
    } catch (err) {
      if (!isErrnoException(err) || err.code !== "EEXIST") throw err;
    }

    const age = await lockAge(lockPath);
    if (age === "gone") continue;
    if (age === "stale") {
      await removeStaleLock(lockPath);
      continue;
    }
    if (Date.now() - started >= waitMs) throw new StateLockError(lockPath, waitMs);
    await sleep(LOCK_RETRY_MS);
  }
}

async function releaseLock(lockPath: string, lockId: string): Promise<void> {
  let raw: string;
  try {
    raw = await fs.readFile(lockPath, "utf8");
  } catch (err) {
    if (isErrnoException(err) && err.code === "ENOENT") return;
    throw err;
  }
  let owner: string | null = null;
  try {
    const parsed = LockInfoSchema.safeParse(JSON.parse(raw));
    owner = parsed.success ? parsed.data.lockId : null;
  } catch {
    // A half-written lock belongs to whoever is writing it.
    owner = null;
  }
  if (owner === lockId) await fs.rm(lockPath, { force: true });
}

export async function withStateLock<T>(paths: GatePaths, fn: () => Promise<T>, waitMs = LOCK_WAIT_MS): Promise<T> {
  const lockId = await acquireLock(paths.lockPath, waitMs);
  try {
    return await fn();
  } finally {
    await releaseLock(paths.lockPath, lockId);
  }
}

/** New state plus whatever the caller wants back from the edit. */
export type Transition<T> = {
  state: SessionState;
  result: T;
};

export interface StateHandle {
  load(): Promise<SessionState>;
  /** Atomic read-modify-write. `fn` must not mutate its argument. */
  transact<T>(fn: (current: SessionState) => Transition<T>): Promise<T>;
}

export async function updateState(
  handle: StateHandle,
  fn: (current: SessionState) => SessionState,
): Promise<SessionState> {
  return handle.transact((current) => {
    const state = fn(current);
    return { state, result: state };
  });
}

export class FileStateHandle implements StateHandle {
  readonly paths: GatePaths;

  constructor(projectRoot: string, env: NodeJS.ProcessEnv = process.env) {
    this.paths = getPaths(projectRoot, env);
  }

  async load(): Promise<SessionState> {
    return readStateFile(this.paths.statePath);
  }

  async transact<T>(fn: (current: SessionState) => Transition<T>): Promise<T> {
    return withStateLock(this.paths, async () => {
      const current = await readStateFile(this.paths.statePath);
      const { state, result } = fn(current);
      await writeJsonAtomic(this.paths.statePath, { ...state, updatedAt: new Date().toISOString() });
      return result;
    });
  }

  async exists(): Promise<boolean> {
    try {
      await fs.access(this.paths.statePath);
      return true;
    } catch {
      return false;
    }
  }
}

/** Keeps a private copy in memory; used for previews and tests. */
export class MemoryStateHandle implements StateHandle {
  private state: SessionState;

  constructor(initial: SessionState = defaultState()) {
    this.state = structuredClone(initial);
  }

  async load(): Promise<SessionState> {
    return structuredClone(this.state);
  }

  async transact<T>(fn: (current: SessionState) => Transition<T>): Promise<T> {
    const { state, result } = fn(structuredClone(this.state));
    this.state = { ...structuredClone(state), updatedAt: new Date().toISOString() };
    return result;
  }
}

/** Creates the state file with defaults when it does not exist yet. */
export async function ensureState(handle: FileStateHandle): Promise<SessionState> {
  if (await handle.exists()) return handle.load();
  return updateState(handle, (current) => current);
}

/** Reads a one-shot flag and clears it. */
export function takeFlag(state: SessionState, name: string): Transition<boolean> {
  const { [name]: value, ...rest } = state.flags;
  return { state: { ...state, flags: rest }, result: value === true };
}

export function setFlag(state: SessionState, name: string, value: boolean): SessionState {
  return { ...state, flags: { ...state.flags, [name]: value } };
}
