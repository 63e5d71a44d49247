import path from "node:path";
import fs from "node:fs/promises";
import { fallback } from "fallback-chain-js";

export const GATE_DIR = ".workgate";

export type GatePaths = {
  projectRoot: string;
  gateDir: string;
  statePath: string;
  lockPath: string;
  configPath: string;
  eventsPath: string;
};

export function getPaths(projectRoot: string, env: NodeJS.ProcessEnv = process.env): GatePaths {
  const gateDir = path.join(projectRoot, GATE_DIR);
  const statePath = path.join(gateDir, "state.json");
  const configOverride = env.WORKGATE_CONFIG_PATH;
  return {
    projectRoot,
    gateDir,
    statePath,
    lockPath: `${statePath}.lock`,
    configPath:
      configOverride && configOverride.trim().length > 0
        ? path.resolve(projectRoot, configOverride)
        : path.join(gateDir, "config.json"),
    eventsPath: path.join(gateDir, "events.jsonl"),
  };
}

export function toPosixRel(p: string): string {
  return p.split(path.sep).join("/");
}

/** Path of `target` relative to `root`, or null when it lies outside it. */
export function relativeInside(root: string, target: string): string | null {
  const rel = path.relative(root, target);
  if (rel === "") return "";
  if (rel.startsWith("..") || path.isAbsolute(rel)) return null;
  return toPosixRel(rel);
}

async function isDirectory(p: string): Promise<boolean> {
  try {
    return (await fs.stat(p)).isDirectory();
  } catch {
    return false;
  }
}

async function findGateAncestor(start: string): Promise<string | null> {
  let dir = path.resolve(start);
  for (;;) {
    if (await isDirectory(path.join(dir, GATE_DIR))) return dir;
    const parent = path.dirname(dir);
    if (parent === dir) return null;
    dir = parent;
  }
}

function present(value: string | null, missing: string): string {
  if (!value) throw new Error(missing);
  return value;
}

/**
 * Project root, first match wins: WORKGATE_PROJECT_ROOT, the nearest
 * ancestor of the request's cwd holding a .workgate directory, the request's
 * cwd itself, the nearest such ancestor of process.cwd(), then process.cwd().
 */
export async function resolveProjectRoot(
  requestCwd: string | undefined,
  env: NodeJS.ProcessEnv = process.env,
): Promise<string> {
  const envRoot = env.WORKGATE_PROJECT_ROOT;
  const envDir = envRoot && envRoot.trim().length > 0 && (await isDirectory(envRoot)) ? path.resolve(envRoot) : null;
  const requestDir = requestCwd && (await isDirectory(requestCwd)) ? path.resolve(requestCwd) : null;
  const requestGate = requestDir ? await findGateAncestor(requestDir) : null;
  const cwdGate = await findGateAncestor(process.cwd());

  return fallback([
    () => present(envDir, "no WORKGATE_PROJECT_ROOT directory"),
    () => present(requestGate, "no .workgate above the request cwd"),
    () => present(requestDir, "no request cwd"),
    () => present(cwdGate, "no .workgate above the process cwd"),
    () => process.cwd(),
  ]);
}
